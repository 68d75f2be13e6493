/**
 * Extraction Session
 *
 * Per-email unit of work: builds the prompt, streams the completion through
 * the model client and retries failed attempts with exponential backoff.
 *
 * Two modes share one state machine:
 * - stream(): forwards fragments as they arrive (live display)
 * - extract(): drains the stream and returns the text of the attempt that
 *   succeeded (batch use)
 *
 * A retry restarts the whole request. Nothing from a failed attempt is
 * resumed or kept.
 */

import { logger } from '../logger';
import { extractionSessionsCounter, extractionRetriesCounter } from '../metrics';
import type { ChatStreamClient } from '../llm/model-client';
import type { ExtractionRequest, TokenFragment } from '../types';
import { buildExtractionMessages } from './prompt';
import {
  DEFAULT_RETRY_POLICY,
  initialRetryState,
  nextRetryState,
  sleep as defaultSleep,
  type RetryPolicy,
  type RetryState,
  type Sleep,
} from './retry';

export const DEFAULT_MAX_TOKENS = 512;
export const DEFAULT_TIMEOUT_MS = 120000;

export interface SessionOptions {
  model: string;
  maxTokens?: number;
  timeoutMs?: number;
  retry?: RetryPolicy;
  /** Injected in tests to skip real backoff delays */
  sleep?: Sleep;
}

export interface RetryNotice {
  /** One-based number of the attempt that failed */
  attempt: number;
  delayMs: number;
  error: unknown;
}

export type SessionEvent =
  | { type: 'token'; fragment: TokenFragment }
  | ({ type: 'retry' } & RetryNotice);

export interface StreamHooks {
  /**
   * Called before each backoff. Fragments already yielded belong to the
   * failed attempt and should be discarded by the consumer.
   */
  onRetry?: (notice: RetryNotice) => void;
  /** Abandons the open stream and any pending backoff, without retrying */
  signal?: AbortSignal;
}

/**
 * Blocking extraction contract used by the batch orchestrator and the
 * timing harness
 */
export interface EntityExtractor {
  extract(request: ExtractionRequest): Promise<string>;
}

export class ExtractionSession implements EntityExtractor {
  readonly model: string;
  readonly maxTokens: number;
  readonly timeoutMs: number;
  readonly retry: RetryPolicy;
  private readonly sleep: Sleep;

  constructor(
    private readonly client: ChatStreamClient,
    options: SessionOptions
  ) {
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Streaming mode. Throws the last attempt's error once retries run out.
   */
  async *stream(
    request: ExtractionRequest,
    hooks: StreamHooks = {}
  ): AsyncGenerator<TokenFragment> {
    for await (const event of this.attempts(request, hooks.signal)) {
      if (event.type === 'token') {
        yield event.fragment;
      } else {
        hooks.onRetry?.({ attempt: event.attempt, delayMs: event.delayMs, error: event.error });
      }
    }
  }

  /**
   * Blocking mode. Throws the last attempt's error once retries run out.
   */
  async extract(request: ExtractionRequest): Promise<string> {
    let text = '';

    for await (const event of this.attempts(request)) {
      if (event.type === 'token') {
        text += event.fragment;
      } else {
        text = '';
      }
    }

    return text;
  }

  private async *attempts(
    request: ExtractionRequest,
    signal?: AbortSignal
  ): AsyncGenerator<SessionEvent> {
    const messages = buildExtractionMessages(request);
    let state: RetryState | null = initialRetryState(this.retry);

    while (state) {
      const current: RetryState = state;

      logger.info('Starting streaming extraction attempt', {
        attempt: current.attempt + 1,
        max_retries: this.retry.maxRetries,
        model: this.model,
        entity_types: request.entityTypes,
      });

      try {
        const fragments = this.client.streamChat({
          model: this.model,
          messages,
          maxTokens: this.maxTokens,
          timeoutMs: this.timeoutMs,
          signal,
        });

        for await (const fragment of fragments) {
          yield { type: 'token', fragment };
        }

        logger.info('Streaming extraction completed', { attempt: current.attempt + 1 });
        extractionSessionsCounter.inc({ status: 'success' });
        return;
      } catch (error) {
        if (signal?.aborted) {
          logger.warn('Streaming extraction abandoned by caller', { attempt: current.attempt + 1 });
          extractionSessionsCounter.inc({ status: 'abandoned' });
          throw error;
        }

        logger.error('Streaming extraction attempt failed', error, {
          attempt: current.attempt + 1,
          max_retries: this.retry.maxRetries,
        });

        state = nextRetryState(current, this.retry);
        if (!state) {
          extractionSessionsCounter.inc({ status: 'failed' });
          throw error;
        }

        extractionRetriesCounter.inc();
        yield { type: 'retry', attempt: current.attempt + 1, delayMs: current.backoffMs, error };
        await this.sleep(current.backoffMs, signal);
      }
    }
  }
}
