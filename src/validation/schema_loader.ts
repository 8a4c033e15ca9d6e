/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import type { AnySchemaObject } from 'ajv';

export type SchemaName = 'price_bar.v1' | 'consensus_signal.v1' | 'instrument.v1';

const schemaCache = new Map<SchemaName, AnySchemaObject>();

export function loadSchema(schemaName: SchemaName): AnySchemaObject {
  const cached = schemaCache.get(schemaName);
  if (cached) return cached;

  const schemaPath = join(process.cwd(), 'schemas', `${schemaName}.schema.json`);
  const schema: AnySchemaObject = JSON.parse(readFileSync(schemaPath, 'utf-8'));

  schemaCache.set(schemaName, schema);
  return schema;
}
