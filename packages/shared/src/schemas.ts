/**
 * JSON Schema Validation
 *
 * Validates API request bodies with Ajv against the contracts in
 * docs/contracts/.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { SchemaObject, ValidateFunction } from 'ajv';
import { logger } from './logger';
import type { BatchRequestBody, ExtractRequestBody, MeasureRequestBody } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
});

function loadSchema(schemaName: string): SchemaObject {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  throw new Error(`Schema file not found: ${schemaName}`);
}

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: string[] };

function createValidator<T>(schemaName: string, label: string): (data: unknown) => ValidationResult<T> {
  // Compiled on first use
  let validate: ValidateFunction<T> | null = null;

  return (data: unknown) => {
    const compiled = validate ?? (validate = ajv.compile<T>(loadSchema(schemaName)));

    if (compiled(data)) {
      return { valid: true, value: data };
    }

    const errors = (compiled.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.warn(`${label} validation failed`, { errors });
    return { valid: false, errors };
  };
}

/**
 * Validate a POST /extract body against extract_request.schema.json
 */
export const validateExtractRequest = createValidator<ExtractRequestBody>(
  'extract_request.schema.json',
  'ExtractRequest'
);

/**
 * Validate a POST /extract/batch body against batch_request.schema.json
 */
export const validateBatchRequest = createValidator<BatchRequestBody>(
  'batch_request.schema.json',
  'BatchRequest'
);

/**
 * Validate a POST /measure body against measure_request.schema.json
 */
export const validateMeasureRequest = createValidator<MeasureRequestBody>(
  'measure_request.schema.json',
  'MeasureRequest'
);
