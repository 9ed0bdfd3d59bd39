/**
 * Port for ending the current process.
 * Only composition roots (the CLI entrypoint) call it.
 */
export type ExitCode =
  | { kind: 'success' }
  | { kind: 'failure' }
  | { kind: 'usage_error' };

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}
