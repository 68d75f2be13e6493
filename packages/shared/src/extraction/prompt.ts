/**
 * Entity Extraction Prompt
 *
 * The system prompt is static. Only the user instruction varies, depending
 * on whether entity types were requested.
 */

import type { ChatMessage, ExtractionRequest } from '../types';

export const EXTRACTION_SYSTEM_PROMPT = `You are an expert information extraction assistant.

You will receive an email text. Identify and extract entities according to the user request.
Output in valid JSON format with the structure:

{
  "entities": [
    {
      "type": "<entity type>",
      "text": "<exact phrase>",
      "context": "<short explanation or sentence context>"
    }
  ]
}

Be accurate, concise, and preserve the wording of the original text.`;

/**
 * User prompt template with placeholders:
 * - {{instruction}}: which entity types to extract
 * - {{email_text}}: the email body, verbatim
 */
export const EXTRACTION_USER_PROMPT_TEMPLATE = `{{instruction}}

EMAIL:
{{email_text}}`;

export const EXTRACT_ALL_INSTRUCTION =
  'Extract all identifiable entities (names, dates, organizations, amounts, etc.).';

/**
 * Instruction naming the requested entity types verbatim, or asking for
 * everything when none were requested
 */
export function buildEntityInstruction(entityTypes: readonly string[]): string {
  if (entityTypes.length === 0) {
    return EXTRACT_ALL_INSTRUCTION;
  }
  return `Extract the following entity types: ${entityTypes.join(', ')}.`;
}

export function buildUserPrompt(request: ExtractionRequest): string {
  // Replacer functions keep "$&"-style sequences in the email literal
  return EXTRACTION_USER_PROMPT_TEMPLATE.replace('{{instruction}}', () =>
    buildEntityInstruction(request.entityTypes)
  ).replace('{{email_text}}', () => request.emailText);
}

export function buildExtractionMessages(request: ExtractionRequest): ChatMessage[] {
  return [
    { role: 'system', content: EXTRACTION_SYSTEM_PROMPT },
    { role: 'user', content: buildUserPrompt(request) },
  ];
}
