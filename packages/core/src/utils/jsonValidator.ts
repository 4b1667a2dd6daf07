/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import { readFileSync } from 'node:fs';
import { requireAsset } from './packageAssets.js';

/* ------------------------------------------------------------------ */
/* Public API                                                         */
/* ------------------------------------------------------------------ */
export interface ValidationResult {
  ok: boolean;
  errors?: string[];
}

const ajv = new Ajv({ allErrors: true, strict: false });
const compiled = new Map<string, ValidateFunction>();

function readSchema(schemaFile: string): SchemaObject {
  const schema: SchemaObject = JSON.parse(readFileSync(requireAsset('schemas', schemaFile), 'utf8'));
  return schema;
}

export function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => `${e.instancePath || '(root)'} ${e.message ?? 'is invalid'}`);
}

/**
 * Compiles a schema from `src/schemas/` into a type guard.
 *
 * @param schemaFile    File name (e.g. `"pattern.schema.json"`)
 */
export function compileSchemaFile<T>(schemaFile: string): ValidateFunction<T> {
  return ajv.compile<T>(readSchema(schemaFile));
}

/**
 * Validate `json` against a JSON-Schema file. Compiled validators are cached
 * per file.
 */
export function validateJson(json: unknown, schemaFile: string): ValidationResult {
  let validate = compiled.get(schemaFile);
  if (!validate) {
    try {
      validate = compileSchemaFile<unknown>(schemaFile);
    } catch (error) {
      return { ok: false, errors: [error instanceof Error ? error.message : String(error)] };
    }
    compiled.set(schemaFile, validate);
  }

  return validate(json) ? { ok: true } : { ok: false, errors: formatErrors(validate.errors) };
}
