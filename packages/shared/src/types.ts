/**
 * Shared TypeScript Types
 *
 * Types for the email entity extraction pipeline.
 */

// ============================================================================
// Requests & Results
// ============================================================================

/**
 * One email to extract from. Empty entityTypes means "extract all".
 */
export interface ExtractionRequest {
  readonly emailText: string;
  readonly entityTypes: readonly string[];
}

/**
 * Incremental piece of model output. May split mid-word or mid-JSON-token.
 */
export type TokenFragment = string;

/**
 * Outcome of one email in a batch. rawText is the model output, or
 * "Error: <message>" when the email failed; it is not guaranteed to be JSON.
 */
export interface ExtractionResult {
  index: number;
  rawText: string;
}

export interface BatchProgress {
  readonly completed: number;
  readonly total: number;
}

export type ProgressObserver = (progress: BatchProgress) => void;

// ============================================================================
// Chat Protocol
// ============================================================================

export type ChatRole = 'system' | 'user';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface StreamChatRequest {
  model: string;
  messages: readonly ChatMessage[];
  maxTokens: number;
  timeoutMs: number;
  /** Closes the stream early when the caller no longer wants it */
  signal?: AbortSignal;
}

// ============================================================================
// API Contracts
// ============================================================================

export interface ExtractRequestBody {
  email_text: string;
  entity_types?: string[];
}

export interface BatchRequestBody {
  emails: string[];
  entity_types?: string[];
  worker_limit?: number;
}

export interface MeasureRequestBody {
  emails: string[];
  entity_types?: string[];
  levels?: number[];
}

export interface BatchResponseBody {
  results: Array<{ index: number; raw_text: string }>;
}

export interface ErrorEnvelope {
  error: {
    code: 'invalid_request' | 'bad_gateway' | 'internal_error';
    message: string;
    correlation_id: string;
    details?: string[];
  };
}

/**
 * Build an immutable ExtractionRequest
 */
export function createExtractionRequest(
  emailText: string,
  entityTypes: readonly string[] = []
): ExtractionRequest {
  return Object.freeze({
    emailText,
    entityTypes: Object.freeze([...entityTypes]),
  });
}
