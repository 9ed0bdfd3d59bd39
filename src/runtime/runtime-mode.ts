/**
 * Runtime mode of the current process.
 * Injected through DI; services never infer it from env vars.
 */
export type RuntimeMode =
  | { kind: 'cli' }
  | { kind: 'library' }
  | { kind: 'test' };
