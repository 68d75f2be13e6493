/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  withChildContext,
  type RequestContext,
} from './context';

// Logger
export { logger, errorMessage, type LogContext } from './logger';

// Config
export { config, parseLevels, type Config } from './config';

// Types
export * from './types';

// Metrics
export {
  register,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  extractionSessionsCounter,
  extractionRetriesCounter,
  batchItemsCounter,
  batchDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  validateExtractRequest,
  validateBatchRequest,
  validateMeasureRequest,
  type ValidationResult,
} from './schemas';

// Model client
export {
  ModelClient,
  createModelClient,
  contentDeltas,
  ChatStreamTimeoutError,
  ChatStreamAbortedError,
  type ChatStreamClient,
  type ModelClientOptions,
} from './llm/model-client';

// Extraction session
export {
  EXTRACTION_SYSTEM_PROMPT,
  EXTRACTION_USER_PROMPT_TEMPLATE,
  EXTRACT_ALL_INSTRUCTION,
  buildEntityInstruction,
  buildUserPrompt,
  buildExtractionMessages,
} from './extraction/prompt';
export {
  DEFAULT_RETRY_POLICY,
  backoffDelayMs,
  initialRetryState,
  nextRetryState,
  sleep,
  type RetryPolicy,
  type RetryState,
  type Sleep,
} from './extraction/retry';
export {
  ExtractionSession,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TIMEOUT_MS,
  type SessionOptions,
  type SessionEvent,
  type RetryNotice,
  type StreamHooks,
  type EntityExtractor,
} from './extraction/session';

// Batch
export { WorkerPool } from './batch/worker-pool';
export { BatchOrchestrator, DEFAULT_WORKER_LIMIT, type BatchOptions } from './batch/orchestrator';

// Timing
export {
  measureTimes,
  formatDuration,
  DEFAULT_TIMING_LEVELS,
  DEFAULT_TIMING_OUTPUT_FILE,
  TimingExtractionError,
  type TimingOptions,
  type TimingLevel,
  type TimingReport,
} from './timing/harness';

// Input & display helpers
export {
  splitEmails,
  loadEmailsFromFile,
  parseEntityTypes,
  DEFAULT_ENTITY_TYPES,
  DEFAULT_SELECTED_ENTITY_TYPES,
} from './emails';
export { parseExtractionOutput, renderResult, type ParsedOutput } from './display';

// Runtime wiring
export { createExtractionRuntime, type ExtractionRuntime } from './runtime';
