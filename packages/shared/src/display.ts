/**
 * Result Display Helpers
 *
 * Model output is opaque text. Display code tries JSON first and falls back
 * to the raw text; a parse failure here is never an extraction error.
 */

import type { ExtractionResult } from './types';

export type ParsedOutput =
  | { kind: 'json'; value: unknown }
  | { kind: 'text'; text: string };

export function parseExtractionOutput(rawText: string): ParsedOutput {
  try {
    return { kind: 'json', value: JSON.parse(rawText) };
  } catch {
    return { kind: 'text', text: rawText };
  }
}

export function renderResult(result: ExtractionResult): string {
  const parsed = parseExtractionOutput(result.rawText);
  const body = parsed.kind === 'json' ? JSON.stringify(parsed.value, null, 2) : parsed.text;
  return `Email #${result.index + 1}\n${body}`;
}
