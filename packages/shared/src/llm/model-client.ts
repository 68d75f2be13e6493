/**
 * Model Client
 *
 * Thin handle on an OpenAI-compatible chat-completion endpoint (Ollama by
 * default). Holds connection configuration only, so a single instance is
 * shared by every extraction session and worker.
 */

import OpenAI from 'openai';
import type {
  ChatCompletionChunk,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import { logger } from '../logger';
import { llmRequestsCounter, llmRequestDurationHistogram } from '../metrics';
import type { Config } from '../config';
import type { ChatMessage, StreamChatRequest, TokenFragment } from '../types';

/**
 * Anything that can stream a chat completion as text fragments.
 *
 * The returned sequence is single-pass. Consumers either drain it or stop
 * iterating, which closes the underlying connection.
 */
export interface ChatStreamClient {
  streamChat(request: StreamChatRequest): AsyncIterable<TokenFragment>;
}

export interface ModelClientOptions {
  baseUrl: string;
  /** Opaque credential; a local Ollama server accepts any value */
  apiKey: string;
  /** Default per-request timeout, used when a request does not set one */
  timeoutMs: number;
}

/**
 * Yield the text of every content delta, skipping chunks that carry none
 */
export async function* contentDeltas(
  chunks: AsyncIterable<ChatCompletionChunk>
): AsyncGenerator<TokenFragment> {
  for await (const chunk of chunks) {
    const content = chunk.choices[0]?.delta?.content;
    if (content) {
      yield content;
    }
  }
}

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

/**
 * Raised when the endpoint sends nothing for longer than the request timeout,
 * whether before the response headers or between two fragments
 */
export class ChatStreamTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`No response from model for ${timeoutMs}ms`);
    this.name = 'ChatStreamTimeoutError';
  }
}

/**
 * Raised when the caller's abort signal fires while the stream is open
 */
export class ChatStreamAbortedError extends Error {
  constructor() {
    super('Chat completion stream aborted by caller');
    this.name = 'ChatStreamAbortedError';
  }
}

export class ModelClient implements ChatStreamClient {
  private readonly openai: OpenAI;
  readonly baseUrl: string;
  readonly timeoutMs: number;

  constructor(options: ModelClientOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.openai = new OpenAI({
      baseURL: options.baseUrl,
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0, // Retries happen per extraction session
    });
  }

  async *streamChat(request: StreamChatRequest): AsyncGenerator<TokenFragment> {
    const startTime = Date.now();
    const timeout = request.timeoutMs || this.timeoutMs;
    const controller = new AbortController();
    let status: 'success' | 'error' | 'abandoned' = 'abandoned';
    let fragments = 0;

    // The SDK timeout stops at the response headers; this one also bounds
    // every wait between fragments of the body.
    let timedOut = false;
    let idleTimer: NodeJS.Timeout | undefined;
    const armIdleTimer = () => {
      clearTimeout(idleTimer);
      idleTimer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, timeout);
    };

    const onCallerAbort = () => controller.abort();
    request.signal?.addEventListener('abort', onCallerAbort, { once: true });

    // An aborted SDK stream ends quietly, so the reason is checked here
    const interruption = (): Error | undefined => {
      if (timedOut) return new ChatStreamTimeoutError(timeout);
      if (request.signal?.aborted) return new ChatStreamAbortedError();
      return undefined;
    };

    logger.debug('Opening chat completion stream', {
      model: request.model,
      base_url: this.baseUrl,
      max_tokens: request.maxTokens,
      timeout_ms: timeout,
    });

    try {
      if (request.signal?.aborted) {
        throw new ChatStreamAbortedError();
      }

      armIdleTimer();
      const stream = await this.openai.chat.completions.create(
        {
          model: request.model,
          messages: request.messages.map(toMessageParam),
          stream: true,
          max_tokens: request.maxTokens,
        },
        { timeout, signal: controller.signal }
      );

      for await (const fragment of contentDeltas(stream)) {
        fragments++;
        // Paused while the consumer holds the fragment
        clearTimeout(idleTimer);
        yield fragment;
        armIdleTimer();
      }

      const stopped = interruption();
      if (stopped) {
        throw stopped;
      }

      status = 'success';
    } catch (error) {
      const stopped = interruption();
      status = stopped instanceof ChatStreamAbortedError ? 'abandoned' : 'error';
      throw stopped ?? error;
    } finally {
      clearTimeout(idleTimer);
      request.signal?.removeEventListener('abort', onCallerAbort);
      if (status !== 'success') {
        controller.abort();
      }

      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe({ model: request.model }, duration);
      llmRequestsCounter.inc({ model: request.model, status });

      logger.debug('Chat completion stream closed', {
        model: request.model,
        status,
        fragments,
        duration_seconds: duration,
      });
    }
  }
}

/**
 * Build the process-wide model client from configuration.
 * Call once at startup and pass the instance to whoever needs it.
 */
export function createModelClient(
  cfg: Pick<Config, 'llmBaseUrl' | 'llmApiKey' | 'llmRequestTimeoutMs'>
): ModelClient {
  logger.info('Initializing model client', { base_url: cfg.llmBaseUrl });

  return new ModelClient({
    baseUrl: cfg.llmBaseUrl,
    apiKey: cfg.llmApiKey,
    timeoutMs: cfg.llmRequestTimeoutMs,
  });
}
