/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables. Only the
 * services read this object; the extraction core takes plain parameters.
 */

export interface Config {
  // LLM endpoint
  llmBaseUrl: string;
  llmApiKey: string;
  llmModel: string;
  llmRequestTimeoutMs: number;
  llmMaxTokens: number;

  // Retry
  maxRetries: number;
  backoffBaseMs: number;

  // Batch
  workerConcurrency: number;

  // Timing harness
  timingLevels: number[];
  timingOutputFile: string;

  // Inputs
  emailsFile: string;

  // HTTP
  port: number;
}

export function parseLevels(value: string): number[] {
  return value
    .split(',')
    .map((v) => parseInt(v.trim(), 10))
    .filter((n) => Number.isInteger(n) && n > 0);
}

export const config: Config = {
  // LLM endpoint (Ollama's OpenAI-compatible API by default)
  llmBaseUrl: process.env.LLM_BASE_URL || 'http://localhost:11434/v1',
  llmApiKey: process.env.LLM_API_KEY || 'ollama',
  llmModel: process.env.LLM_MODEL || 'granite3.3:8b',
  llmRequestTimeoutMs: parseInt(process.env.LLM_REQUEST_TIMEOUT_MS || '120000', 10),
  llmMaxTokens: parseInt(process.env.LLM_MAX_TOKENS || '512', 10),

  // Retry
  maxRetries: parseInt(process.env.MAX_RETRIES || '3', 10),
  backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS || '1000', 10),

  // Batch
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '8', 10),

  // Timing harness
  timingLevels: parseLevels(process.env.TIMING_LEVELS || '2,4,8'),
  timingOutputFile: process.env.TIMING_OUTPUT_FILE || 'performance.txt',

  // Inputs
  emailsFile: process.env.EMAILS_FILE || './example_mails/emails.txt',

  // HTTP
  port: parseInt(process.env.PORT || '8080', 10),
};
