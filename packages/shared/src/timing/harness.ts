/**
 * Timing Harness
 *
 * For each concurrency level n, times n sequential blocking extractions
 * against one batch of the same n emails with workerLimit = n, then writes
 * the report to a text file. Failures propagate; nothing is retried here.
 */

import fs from 'fs/promises';
import { logger } from '../logger';
import type { BatchOrchestrator } from '../batch/orchestrator';
import type { EntityExtractor } from '../extraction/session';
import { createExtractionRequest } from '../types';

export const DEFAULT_TIMING_LEVELS: readonly number[] = [2, 4, 8];
export const DEFAULT_TIMING_OUTPUT_FILE = 'performance.txt';

/**
 * A sequential extraction failed after its retries; `cause` holds the
 * session's error. Report-file errors are not wrapped.
 */
export class TimingExtractionError extends Error {
  constructor(cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = 'TimingExtractionError';
  }
}

export interface TimingOptions {
  extractor: EntityExtractor;
  orchestrator: Pick<BatchOrchestrator, 'runBatch'>;
  levels?: readonly number[];
  outputFile?: string;
  /** Milliseconds clock, injectable for tests */
  now?: () => number;
}

export interface TimingLevel {
  level: number;
  sequentialSeconds: number;
  batchSeconds: number;
}

export interface TimingReport {
  lines: string[];
  levels: TimingLevel[];
  outputFile: string;
}

/**
 * Format seconds as "<m>min <s>sec", flooring both parts
 */
export function formatDuration(seconds: number): string {
  const mins = Math.floor(seconds / 60);
  const secs = Math.floor(seconds % 60);
  return `${mins}min ${secs}sec`;
}

export async function measureTimes(
  emailTexts: readonly string[],
  entityTypes: readonly string[],
  options: TimingOptions
): Promise<TimingReport> {
  const levels = options.levels ?? DEFAULT_TIMING_LEVELS;
  const outputFile = options.outputFile ?? DEFAULT_TIMING_OUTPUT_FILE;
  const now = options.now ?? Date.now;
  const lines: string[] = [];
  const measured: TimingLevel[] = [];

  for (const level of levels) {
    logger.info('Measuring times', { level });
    lines.push(`SMT = ${level}\n`);

    const requests = emailTexts
      .slice(0, level)
      .map((text) => createExtractionRequest(text, entityTypes));

    const sequentialStart = now();
    for (const request of requests) {
      try {
        await options.extractor.extract(request);
      } catch (error) {
        throw new TimingExtractionError(error);
      }
    }
    const sequentialSeconds = (now() - sequentialStart) / 1000;
    lines.push(`Non Batch: ${formatDuration(sequentialSeconds)}\n`);
    logger.info('Non-batch duration', { level, duration: formatDuration(sequentialSeconds) });

    const batchStart = now();
    await options.orchestrator.runBatch(requests, { workerLimit: level });
    const batchSeconds = (now() - batchStart) / 1000;
    lines.push(`Batch: ${formatDuration(batchSeconds)}\n\n`);
    logger.info('Batch duration', { level, duration: formatDuration(batchSeconds) });

    measured.push({ level, sequentialSeconds, batchSeconds });
  }

  await fs.writeFile(outputFile, lines.join(''), 'utf-8');
  logger.info('Timing results saved', { output_file: outputFile });

  return { lines, levels: measured, outputFile };
}
