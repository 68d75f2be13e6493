/**
 * Batch Orchestrator
 *
 * Runs one blocking extraction per email over a bounded worker pool and
 * returns results in input order, whatever order they complete in.
 * A failed email becomes an "Error: ..." result; it never aborts the batch.
 */

import { ulid } from 'ulid';
import { logger, errorMessage } from '../logger';
import { runWithContextAsync, withChildContext, getContext } from '../context';
import { batchItemsCounter, batchDurationHistogram } from '../metrics';
import type { EntityExtractor } from '../extraction/session';
import type { ExtractionRequest, ExtractionResult, ProgressObserver } from '../types';
import { WorkerPool } from './worker-pool';

export const DEFAULT_WORKER_LIMIT = 8;

export interface BatchOptions {
  workerLimit?: number;
  onProgress?: ProgressObserver;
}

export class BatchOrchestrator {
  constructor(private readonly extractor: EntityExtractor) {}

  async runBatch(
    requests: readonly ExtractionRequest[],
    options: BatchOptions = {}
  ): Promise<ExtractionResult[]> {
    const workerLimit = options.workerLimit ?? DEFAULT_WORKER_LIMIT;
    const pool = new WorkerPool(workerLimit);
    const total = requests.length;

    if (total === 0) {
      return [];
    }

    const batchId = ulid();
    const correlationId = getContext()?.correlationId || batchId;

    return runWithContextAsync({ correlationId, batchId }, async () => {
      const startTime = Date.now();
      // One pre-sized slot per input, each written once by its own worker
      const slots: ExtractionResult[] = requests.map((_, index) => ({ index, rawText: '' }));
      let completed = 0;

      logger.info('Starting batch extraction', { total, worker_limit: workerLimit });

      const report = () => {
        completed += 1;
        if (!options.onProgress) return;
        try {
          options.onProgress({ completed, total });
        } catch (error) {
          logger.warn('Progress observer threw', { error: errorMessage(error) });
        }
      };

      await Promise.all(
        requests.map((request, index) =>
          pool.run(() =>
            withChildContext({ emailIndex: index }, async () => {
              slots[index] = await this.extractOne(request, index);
              report();
            })
          )
        )
      );

      const duration = (Date.now() - startTime) / 1000;
      batchDurationHistogram.observe(duration);
      logger.info('Batch extraction completed', { total, duration_seconds: duration });

      return slots;
    });
  }

  private async extractOne(request: ExtractionRequest, index: number): Promise<ExtractionResult> {
    try {
      const rawText = await this.extractor.extract(request);
      batchItemsCounter.inc({ status: 'success' });
      return { index, rawText };
    } catch (error) {
      batchItemsCounter.inc({ status: 'error' });
      logger.error('Batch extraction failed for email', error, { index });
      return { index, rawText: `Error: ${errorMessage(error)}` };
    }
  }
}
