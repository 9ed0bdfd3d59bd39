/**
 * Boundary Validation Helpers
 *
 * Validate at every I/O boundary (disk, command line) and hand typed data inward.
 */

import { Result, ok, err } from 'neverthrow';
import type { z } from 'zod';
import type { ValidationFailedError, ParseFailedError } from './app-error.js';
import { Err } from './factories.js';

function describeIssues(error: z.ZodError): string[] {
  return error.errors.map(e => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message));
}

/**
 * Validate caller-supplied tree inputs (command line → memory boundary).
 */
export function validateInputs<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  inputs: unknown
): Result<T, ValidationFailedError> {
  const result = schema.safeParse(inputs);
  if (!result.success) {
    return err(Err.validationFailed('inputs', describeIssues(result.error)));
  }
  return ok(result.data);
}

/**
 * Validate JSON data (disk → memory boundary).
 */
export function validateJSONLoad<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  source: string
): Result<T, ParseFailedError> {
  const result = schema.safeParse(data);
  if (!result.success) {
    return err(Err.parseFailed(source, describeIssues(result.error).join('\n')));
  }
  return ok(result.data);
}

/**
 * Parse JSON text without throwing.
 */
export const parseJsonText = (text: string, source: string): Result<unknown, ParseFailedError> =>
  Result.fromThrowable(
    (raw: string): unknown => JSON.parse(raw),
    (e) => Err.parseFailed(source, e instanceof Error ? e.message : String(e))
  )(text);
