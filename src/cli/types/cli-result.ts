/**
 * CLI Result Types
 *
 * Commands return these; the composition root prints and terminates.
 */

import type { ExitCode } from './exit-code.js';

export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly warnings?: readonly string[];
  readonly suggestions?: readonly string[];
  /** Machine-readable output printed verbatim to stdout instead of the formatted message */
  readonly raw?: string;
}

export type CliResult =
  | { readonly kind: 'success'; readonly output?: CliOutput }
  | { readonly kind: 'failure'; readonly exitCode: ExitCode; readonly output: CliOutput };

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

export function failure(
  message: string,
  options?: {
    exitCode?: ExitCode;
    details?: readonly string[];
    suggestions?: readonly string[];
    raw?: string;
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: options?.exitCode ?? { kind: 'general_error' },
    output: {
      message,
      details: options?.details,
      suggestions: options?.suggestions,
      raw: options?.raw,
    },
  };
}

/**
 * Failure caused by bad arguments (exit code 2).
 */
export function misuse(
  message: string,
  options?: { details?: readonly string[]; suggestions?: readonly string[] }
): CliResult {
  return failure(message, { ...options, exitCode: { kind: 'misuse' } });
}
