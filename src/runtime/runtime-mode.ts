/**
 * How the current process was started.
 * Chosen at the composition root and injected; services never read env vars to infer it.
 */
export type RuntimeMode =
  | { kind: 'production' }
  | { kind: 'test' }
  | { kind: 'cli' };
