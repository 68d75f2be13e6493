/**
 * Prometheus Metrics
 *
 * Metrics for LLM calls, extraction sessions, batches and the HTTP surface.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// LLM Metrics
// ============================================================================

export const llmRequestsCounter = new promClient.Counter({
  name: 'inbox_entities_llm_requests_total',
  help: 'Total number of streaming chat-completion requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'inbox_entities_llm_request_duration_seconds',
  help: 'Duration of streaming chat-completion requests, first byte to last token',
  labelNames: ['model'],
  buckets: [1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

// ============================================================================
// Extraction Metrics
// ============================================================================

export const extractionSessionsCounter = new promClient.Counter({
  name: 'inbox_entities_extraction_sessions_total',
  help: 'Extraction sessions by final outcome',
  labelNames: ['status'],
  registers: [register],
});

export const extractionRetriesCounter = new promClient.Counter({
  name: 'inbox_entities_extraction_retries_total',
  help: 'Attempts retried after a failed streaming request',
  registers: [register],
});

// ============================================================================
// Batch Metrics
// ============================================================================

export const batchItemsCounter = new promClient.Counter({
  name: 'inbox_entities_batch_items_total',
  help: 'Emails processed through batch extraction',
  labelNames: ['status'],
  registers: [register],
});

export const batchDurationHistogram = new promClient.Histogram({
  name: 'inbox_entities_batch_duration_seconds',
  help: 'Wall-clock duration of batch extraction',
  buckets: [1, 5, 10, 30, 60, 120, 300, 600],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'inbox_entities_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 30, 120],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'inbox_entities_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}
