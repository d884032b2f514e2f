/**
 * Ajv validation instance with schema validators
 * Run records and quote files must validate before they are trusted
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema, type SchemaName } from './schema_loader';
import type { BatchRunRecord } from '@/types/run_record';
import type { QuoteFileJson } from '@/providers/file_provider';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Add format validators (date-time etc.)
addFormats(ajv);

const validators = new Map<SchemaName, ValidateFunction>();

function getValidator<T>(schemaName: SchemaName): ValidateFunction<T> {
  let validator = validators.get(schemaName);
  if (!validator) {
    validator = ajv.compile(loadSchema(schemaName));
    validators.set(schemaName, validator);
  }
  return validator as ValidateFunction<T>;
}

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

function validateWith<T>(schemaName: SchemaName, data: unknown): ValidationResult<T> {
  const validate = getValidator<T>(schemaName);

  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validateBatchRun(data: unknown): ValidationResult<BatchRunRecord> {
  return validateWith<BatchRunRecord>('batch_run.v1', data);
}

export function validateQuoteFile(data: unknown): ValidationResult<QuoteFileJson> {
  return validateWith<QuoteFileJson>('quote_file.v1', data);
}
