/**
 * JSON schema validation backed by ajv.
 *
 * Schemas live as `*.schema.json` files in the repository's `schemas/`
 * directory.
 *
 * @packageDocumentation
 */

import { readFileSync } from 'node:fs';
import Ajv from 'ajv';
import type { ErrorObject } from 'ajv';

/**
 * A compiled schema narrowing `unknown` to `T`.
 */
export type SchemaValidator<T> = ((data: unknown) => data is T) & {
  errors?: ErrorObject[] | null;
};

interface SchemaCompiler {
  compile<T>(schema: Record<string, unknown>): SchemaValidator<T>;
}

const ajv = new (Ajv as unknown as new (opts: { allErrors: boolean }) => SchemaCompiler)({
  allErrors: true,
});

const SCHEMA_DIR = new URL('../../schemas/', import.meta.url);

/**
 * Error thrown when a schema file cannot be loaded.
 */
export class SchemaLoadError extends Error {
  public readonly schemaName: string;
  public override readonly cause: Error | undefined;

  constructor(schemaName: string, message: string, cause?: Error) {
    super(message);
    this.name = 'SchemaLoadError';
    this.schemaName = schemaName;
    this.cause = cause;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads `schemas/<name>.schema.json`.
 *
 * @throws SchemaLoadError if the file is missing or not a JSON object.
 */
export function loadSchema(name: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(new URL(`${name}.schema.json`, SCHEMA_DIR), 'utf-8'));
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new SchemaLoadError(name, `Cannot load schema '${name}': ${cause.message}`, cause);
  }
  if (!isRecord(parsed)) {
    throw new SchemaLoadError(name, `Schema '${name}' is not a JSON object`);
  }
  return parsed;
}

/**
 * Result of a schema check.
 */
export type SchemaCheck<T> =
  | { readonly valid: true; readonly value: T }
  | { readonly valid: false; readonly errors: readonly string[] };

/**
 * Formats ajv errors as `<path>: <message>` lines.
 */
export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(
    (e: ErrorObject) =>
      `${e.instancePath === '' ? '/' : e.instancePath}: ${e.message ?? 'Unknown error'}`
  );
}

/**
 * Creates a checker for a named schema. The schema file is read and compiled
 * on first use.
 *
 * The caller names the type the schema describes; each consumer's tests keep
 * the two in step.
 *
 * @example
 * ```typescript
 * const checkProposal = createSchemaCheck<ProjectProposal>('project-proposal');
 * const result = checkProposal(JSON.parse(text));
 * if (!result.valid) console.log(result.errors); // ['/title: must be string']
 * ```
 */
export function createSchemaCheck<T>(name: string): (data: unknown) => SchemaCheck<T> {
  let validator: SchemaValidator<T> | undefined;
  return (data: unknown): SchemaCheck<T> => {
    const check = validator ?? ajv.compile<T>(loadSchema(name));
    validator = check;
    if (check(data)) {
      return { valid: true, value: data };
    }
    return { valid: false, errors: formatSchemaErrors(check.errors) };
  };
}
