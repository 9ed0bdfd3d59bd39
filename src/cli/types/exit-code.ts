/**
 * Typed exit codes for CLI commands (Unix conventions).
 */

import type { ExitCode as ProcessExitCode } from '../../runtime/ports/process-terminator.js';
import { assertNever } from '../../core/errors/type-guards.js';

export type ExitCode =
  | { kind: 'success' }        // 0
  | { kind: 'general_error' }  // 1 - includes an "Error" decision
  | { kind: 'misuse' };        // 2 - bad arguments, unknown tree, invalid inputs

export function toProcessExitCode(exitCode: ExitCode): ProcessExitCode {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'general_error':
      return { kind: 'failure' };
    case 'misuse':
      return { kind: 'usage_error' };
    default:
      return assertNever(exitCode);
  }
}
