import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Thrown by {@link ThrowingProcessTerminator} so tests can assert on the exit kind.
 */
export class ProcessTerminationRequested extends Error {
  constructor(readonly code: ExitCode) {
    super(`[ProcessTerminator] terminate(${code.kind})`);
    this.name = 'ProcessTerminationRequested';
  }
}

/**
 * Test adapter: never exits the process.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    throw new ProcessTerminationRequested(code);
  }
}
