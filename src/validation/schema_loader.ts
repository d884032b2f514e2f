/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

export type Schema = {
  $schema: string;
  $id: string;
  type: string;
  required?: string[];
  properties?: Record<string, unknown>;
};

export type SchemaName = 'batch_run.v1' | 'quote_file.v1';

const SCHEMA_DIR = new URL('../../schemas/', import.meta.url);

const schemaCache = new Map<SchemaName, Schema>();

export function schemaPath(schemaName: SchemaName): string {
  return fileURLToPath(new URL(`${schemaName}.schema.json`, SCHEMA_DIR));
}

export function loadSchema(schemaName: SchemaName): Schema {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const schemaJson = readFileSync(schemaPath(schemaName), 'utf-8');
  const schema = JSON.parse(schemaJson) as Schema;

  schemaCache.set(schemaName, schema);
  return schema;
}
