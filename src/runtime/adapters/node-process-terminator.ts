import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';
import { assertNever } from '../../core/errors/type-guards.js';

export function toNumericExitCode(code: ExitCode): number {
  switch (code.kind) {
    case 'success':
      return 0;
    case 'failure':
      return 1;
    case 'usage_error':
      return 2;
    default:
      return assertNever(code);
  }
}

export class NodeProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    process.exit(toNumericExitCode(code));
  }
}
