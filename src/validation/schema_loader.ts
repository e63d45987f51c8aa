/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';

export type SchemaName = 'scanner_config.v1' | 'tick_batch.v1' | 'scan_result.v1';

export type Schema = {
  $schema: string;
  $id: string;
  type: string;
  required?: string[];
  properties?: Record<string, unknown>;
};

const schemaCache = new Map<SchemaName, Schema>();

export function getSchemaDir(): string {
  return process.env.SCANNER_SCHEMA_DIR || join(process.cwd(), 'schemas');
}

export function loadSchema(schemaName: SchemaName): Schema {
  const cached = schemaCache.get(schemaName);
  if (cached) return cached;

  const schemaPath = join(getSchemaDir(), `${schemaName}.schema.json`);
  const schemaJson = readFileSync(schemaPath, 'utf-8');
  const schema = JSON.parse(schemaJson) as Schema;

  schemaCache.set(schemaName, schema);
  return schema;
}
