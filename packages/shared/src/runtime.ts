/**
 * Runtime Wiring
 *
 * Builds the model client, session and orchestrator once from
 * configuration. Services call this at startup and share the result.
 */

import type { Config } from './config';
import { createModelClient, type ChatStreamClient } from './llm/model-client';
import { ExtractionSession } from './extraction/session';
import { BatchOrchestrator } from './batch/orchestrator';

export interface ExtractionRuntime {
  client: ChatStreamClient;
  session: ExtractionSession;
  orchestrator: BatchOrchestrator;
}

export function createExtractionRuntime(
  cfg: Config,
  client: ChatStreamClient = createModelClient(cfg)
): ExtractionRuntime {
  const session = new ExtractionSession(client, {
    model: cfg.llmModel,
    maxTokens: cfg.llmMaxTokens,
    timeoutMs: cfg.llmRequestTimeoutMs,
    retry: { maxRetries: cfg.maxRetries, backoffBaseMs: cfg.backoffBaseMs },
  });

  return { client, session, orchestrator: new BatchOrchestrator(session) };
}
