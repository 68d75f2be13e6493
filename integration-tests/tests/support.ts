/**
 * Test Support
 *
 * In-process stand-ins for the model endpoint.
 */

import type {
  ChatStreamClient,
  StreamChatRequest,
  TokenFragment,
  Sleep,
} from '@inbox-entities/shared';

/**
 * What one streamChat call does. With failAfter set, the call yields that
 * many fragments and then throws.
 */
export interface ScriptedCall {
  fragments: string[];
  failAfter?: number;
  error?: Error;
  /** Wait before the first fragment */
  delayMs?: number;
  /** After this many fragments, go silent until the request's signal fires */
  stallAfter?: number;
}

export type Script = (request: StreamChatRequest, callIndex: number) => ScriptedCall;

export class ScriptedChatClient implements ChatStreamClient {
  readonly calls: StreamChatRequest[] = [];
  inFlight = 0;
  maxInFlight = 0;
  /** Streams that ran their cleanup, whether drained, failed or abandoned */
  closed = 0;

  constructor(private readonly script: Script) {}

  async *streamChat(request: StreamChatRequest): AsyncGenerator<TokenFragment> {
    const callIndex = this.calls.length;
    this.calls.push(request);
    const step = this.script(request, callIndex);

    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    try {
      if (step.delayMs) {
        await sleep(step.delayMs);
      }

      const cut = step.stallAfter ?? step.failAfter;
      const emitted = cut === undefined ? step.fragments : step.fragments.slice(0, cut);
      for (const fragment of emitted) {
        yield fragment;
      }

      if (step.stallAfter !== undefined) {
        await untilAborted(request.signal);
        throw new Error('stream aborted');
      }

      if (step.failAfter !== undefined) {
        throw step.error ?? new Error('stream interrupted');
      }
    } finally {
      this.inFlight--;
      this.closed++;
    }
  }
}

/**
 * Email text of the user message in a request
 */
export function emailOf(request: StreamChatRequest): string {
  const user = request.messages.find((m) => m.role === 'user');
  const content = user ? user.content : '';
  return content.slice(content.indexOf('EMAIL:\n') + 'EMAIL:\n'.length);
}

/**
 * Sleep that returns at once and records every requested delay
 */
export function recordingSleep(): { sleep: Sleep; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

function untilAborted(signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    signal?.addEventListener('abort', () => resolve(), { once: true });
  });
}

/**
 * Poll until the condition holds, failing after timeoutMs
 */
export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`condition not met within ${timeoutMs}ms`);
    }
    await sleep(10);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
