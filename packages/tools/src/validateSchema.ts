import { readFileSync } from 'fs';
import { join, resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import Ajv from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';

export type SchemaName =
  | 'campaign-list'
  | 'campaign'
  | 'npc-index'
  | 'npc'
  | 'bestiary'
  | 'combat-session'
  | 'tools-config';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const workspaceRoot = resolve(__dirname, '../../..');

function makeAjv(coerceTypes: boolean): Ajv {
  const ajv = new Ajv({ allErrors: true, strict: false, useDefaults: true, coerceTypes });
  addFormats(ajv);
  return ajv;
}

// stored files and tool arguments; environment values arrive as strings and need coercion
const ajv = makeAjv(false);
const coercingAjv = makeAjv(true);

// ajv memoizes compiled validators by schema object, so each file is parsed once
const loadedSchemas = new Map<SchemaName, SchemaObject>();

function schemaPath(name: SchemaName): string {
  return join(workspaceRoot, 'schemas', `${name}.schema.json`);
}

function loadSchema(name: SchemaName): SchemaObject {
  const loaded = loadedSchemas.get(name);
  if (loaded) {
    return loaded;
  }
  const schema: unknown = JSON.parse(readFileSync(schemaPath(name), 'utf-8'));
  if (typeof schema !== 'object' || schema === null || Array.isArray(schema)) {
    throw new Error(`Schema ${name} is not a JSON object`);
  }
  const schemaObject: SchemaObject = { ...schema };
  loadedSchemas.set(name, schemaObject);
  return schemaObject;
}

/**
 * Compiled validator for one of the schemas under `schemas/`.
 * The type parameter names what a passing value is.
 */
export function fileValidator<T>(name: SchemaName, options: { coerce?: boolean } = {}): ValidateFunction<T> {
  return (options.coerce ? coercingAjv : ajv).compile<T>(loadSchema(name));
}

/**
 * Validator for a schema that lives in code (tool input schemas)
 */
export function compileSchema<T>(schema: SchemaObject): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string[] {
  const messages: string[] = [];
  for (const error of errors ?? []) {
    const path = error.instancePath || error.schemaPath;
    messages.push(`${path}: ${error.message}`);
  }
  return messages;
}
