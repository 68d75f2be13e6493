/**
 * Extraction Prompt Tests
 */

import {
  buildEntityInstruction,
  buildExtractionMessages,
  buildUserPrompt,
  createExtractionRequest,
  EXTRACTION_SYSTEM_PROMPT,
  EXTRACT_ALL_INSTRUCTION,
} from '@inbox-entities/shared';

describe('buildEntityInstruction', () => {
  it('asks for all identifiable entities when no types are requested', () => {
    expect(buildEntityInstruction([])).toBe(
      'Extract all identifiable entities (names, dates, organizations, amounts, etc.).'
    );
    expect(buildEntityInstruction([])).toBe(EXTRACT_ALL_INSTRUCTION);
  });

  it('lists requested types verbatim, comma-separated, in order', () => {
    expect(buildEntityInstruction(['Organization', 'Date'])).toBe(
      'Extract the following entity types: Organization, Date.'
    );
    expect(buildEntityInstruction(['Money'])).toBe('Extract the following entity types: Money.');
  });

  it('does not normalise labels', () => {
    expect(buildEntityInstruction(['purchase order #', 'Date'])).toBe(
      'Extract the following entity types: purchase order #, Date.'
    );
  });
});

describe('buildExtractionMessages', () => {
  it('builds a system message and a user message carrying the email verbatim', () => {
    const request = createExtractionRequest('Hi Bob,\nInvoice due 2024-05-01.', ['Date']);
    const messages = buildExtractionMessages(request);

    expect(messages).toEqual([
      { role: 'system', content: EXTRACTION_SYSTEM_PROMPT },
      {
        role: 'user',
        content:
          'Extract the following entity types: Date.\n\nEMAIL:\nHi Bob,\nInvoice due 2024-05-01.',
      },
    ]);
  });

  it('keeps replacement patterns in the email literal', () => {
    const request = createExtractionRequest('Total: $& and $1 {{instruction}}');
    expect(buildUserPrompt(request)).toBe(
      `${EXTRACT_ALL_INSTRUCTION}\n\nEMAIL:\nTotal: $& and $1 {{instruction}}`
    );
  });

  it('fixes the output shape in the system prompt', () => {
    expect(EXTRACTION_SYSTEM_PROMPT).toContain('"entities": [');
    expect(EXTRACTION_SYSTEM_PROMPT).toContain('"type": "<entity type>"');
    expect(EXTRACTION_SYSTEM_PROMPT).toContain('"text": "<exact phrase>"');
    expect(EXTRACTION_SYSTEM_PROMPT).toContain('"context": "<short explanation or sentence context>"');
  });
});

describe('createExtractionRequest', () => {
  it('freezes the request and copies the entity type list', () => {
    const types = ['Person'];
    const request = createExtractionRequest('body', types);
    types.push('Date');

    expect(request.entityTypes).toEqual(['Person']);
    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.entityTypes)).toBe(true);
  });
});
