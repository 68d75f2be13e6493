/**
 * Email Input
 *
 * A text file holds several emails separated by lines containing only "---".
 */

import fs from 'fs/promises';

const EMAIL_SEPARATOR = /\n\s*---\s*\n/;

export const DEFAULT_ENTITY_TYPES: readonly string[] = [
  'Person',
  'Orders',
  'Organization',
  'Date',
  'Time',
  'Location',
  'Money',
  'Product',
];

export const DEFAULT_SELECTED_ENTITY_TYPES: readonly string[] = ['Organization', 'Date'];

export function splitEmails(content: string): string[] {
  return content
    .split(EMAIL_SEPARATOR)
    .map((text) => text.trim())
    .filter((text) => text.length > 0);
}

export async function loadEmailsFromFile(filePath: string): Promise<string[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  return splitEmails(content);
}

/**
 * Parse a comma-separated entity type list ("Person, Date") into labels
 */
export function parseEntityTypes(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((t) => t.trim())
    .filter((t) => t.length > 0);
}
