/**
 * Extraction API
 *
 * POST /extract        - Streams one email's extraction as NDJSON events
 * POST /extract/batch  - Extracts a batch of emails in parallel, ordered results
 * POST /measure        - Runs the sequential vs. batch timing sweep
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  errorMessage,
  runWithContext,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  validateExtractRequest,
  validateBatchRequest,
  validateMeasureRequest,
  createExtractionRequest,
  measureTimes,
  TimingExtractionError,
  type Config,
  type ExtractionRuntime,
  type BatchResponseBody,
  type ErrorEnvelope,
} from '@inbox-entities/shared';

/**
 * One line of the POST /extract response body
 */
export type StreamEvent =
  | { type: 'token'; text: string }
  | { type: 'retry'; attempt: number; delay_ms: number; error: string }
  | { type: 'done' }
  | { type: 'error'; message: string };

function errorEnvelope(
  code: ErrorEnvelope['error']['code'],
  message: string,
  correlationId: string,
  details?: string[]
): ErrorEnvelope {
  return { error: { code, message, correlation_id: correlationId, details } };
}

function correlationIdOf(res: Response): string {
  const header = res.getHeader('X-Correlation-Id');
  return typeof header === 'string' ? header : '';
}

export function createApp(
  runtime: ExtractionRuntime,
  cfg: Pick<Config, 'workerConcurrency' | 'timingLevels' | 'timingOutputFile'>
): express.Express {
  const app = express();

  // Middleware
  app.use(express.json({ limit: '5mb' }));

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header ? header : ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const path = req.route?.path || req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'extraction-api',
      timestamp: new Date().toISOString(),
    });
  });

  // Metrics endpoint
  app.get('/metrics', async (req: Request, res: Response) => {
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  /**
   * POST /extract
   * Streams fragments as they arrive. A "retry" event means the fragments
   * sent so far belong to a failed attempt and should be discarded.
   */
  app.post('/extract', async (req: Request, res: Response) => {
    const validation = validateExtractRequest(req.body);

    if (!validation.valid) {
      res
        .status(400)
        .json(errorEnvelope('invalid_request', 'Invalid extract request', correlationIdOf(res), validation.errors));
      return;
    }

    const request = createExtractionRequest(
      validation.value.email_text,
      validation.value.entity_types ?? []
    );

    // Fires on disconnect, including while the model is silent or a retry
    // is backing off
    const disconnect = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) disconnect.abort();
    });

    const send = (event: StreamEvent) => {
      res.write(`${JSON.stringify(event)}\n`);
    };

    res.status(200);
    res.setHeader('Content-Type', 'application/x-ndjson; charset=utf-8');

    try {
      const fragments = runtime.session.stream(request, {
        signal: disconnect.signal,
        onRetry: (notice) =>
          send({
            type: 'retry',
            attempt: notice.attempt,
            delay_ms: notice.delayMs,
            error: errorMessage(notice.error),
          }),
      });

      for await (const text of fragments) {
        if (disconnect.signal.aborted) {
          break;
        }
        send({ type: 'token', text });
      }

      if (disconnect.signal.aborted) {
        logger.warn('Client disconnected, abandoned extraction stream');
      } else {
        send({ type: 'done' });
      }
    } catch (error) {
      if (disconnect.signal.aborted) {
        logger.warn('Client disconnected, abandoned extraction stream');
      } else {
        logger.error('Streaming extraction failed', error);
        send({ type: 'error', message: errorMessage(error) });
      }
    }

    res.end();
  });

  /**
   * POST /extract/batch
   * Always returns one result per email, in input order
   */
  app.post('/extract/batch', async (req: Request, res: Response) => {
    const validation = validateBatchRequest(req.body);

    if (!validation.valid) {
      res
        .status(400)
        .json(errorEnvelope('invalid_request', 'Invalid batch request', correlationIdOf(res), validation.errors));
      return;
    }

    const { emails, entity_types, worker_limit } = validation.value;
    const requests = emails.map((text) => createExtractionRequest(text, entity_types ?? []));

    try {
      const results = await runtime.orchestrator.runBatch(requests, {
        workerLimit: worker_limit ?? cfg.workerConcurrency,
        onProgress: ({ completed, total }) => {
          logger.debug('Batch progress', { completed, total });
        },
      });

      const body: BatchResponseBody = {
        results: results.map((r) => ({ index: r.index, raw_text: r.rawText })),
      };
      res.json(body);
    } catch (error) {
      logger.error('Batch extraction failed', error);
      res.status(500).json(errorEnvelope('internal_error', errorMessage(error), correlationIdOf(res)));
    }
  });

  /**
   * POST /measure
   * Sequential vs. batch durations per concurrency level
   */
  app.post('/measure', async (req: Request, res: Response) => {
    const validation = validateMeasureRequest(req.body);

    if (!validation.valid) {
      res
        .status(400)
        .json(errorEnvelope('invalid_request', 'Invalid measure request', correlationIdOf(res), validation.errors));
      return;
    }

    const { emails, entity_types, levels } = validation.value;

    try {
      const report = await measureTimes(emails, entity_types ?? [], {
        extractor: runtime.session,
        orchestrator: runtime.orchestrator,
        levels: levels ?? cfg.timingLevels,
        outputFile: cfg.timingOutputFile,
      });

      res.json({
        report: report.lines.join(''),
        output_file: report.outputFile,
        levels: report.levels.map((l) => ({
          level: l.level,
          sequential_seconds: l.sequentialSeconds,
          batch_seconds: l.batchSeconds,
        })),
      });
    } catch (error) {
      logger.error('Timing sweep failed', error);
      if (error instanceof TimingExtractionError) {
        res.status(502).json(errorEnvelope('bad_gateway', errorMessage(error), correlationIdOf(res)));
      } else {
        res.status(500).json(errorEnvelope('internal_error', errorMessage(error), correlationIdOf(res)));
      }
    }
  });

  return app;
}
