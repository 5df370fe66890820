/**
 * Port for ending the current process early.
 * Only the CLI interpreter and the container's start-up path may use it;
 * a successful run ends on its own once stdout drains.
 */
export type TerminationCode = { kind: 'failure' };

export interface ProcessTerminator {
  terminate(code: TerminationCode): never;
}
