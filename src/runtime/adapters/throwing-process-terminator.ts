import type { TerminationCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: surfaces a termination request as an exception instead of exiting,
 * so a test can assert on it.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: TerminationCode): never {
    throw new Error(`[ProcessTerminator] terminate(${code.kind})`);
  }
}
