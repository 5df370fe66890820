import type { TerminationCode } from '../../runtime/ports/process-terminator.js';

/**
 * Typed exit codes for failed CLI commands (Unix conventions).
 * Success ends the process normally; usage errors are reported by commander
 * before a command runs.
 */
export type ExitCode = { kind: 'general_error' }; // 1 - input, decoding or I/O failure

export function toTerminationCode(exitCode: ExitCode): TerminationCode {
  switch (exitCode.kind) {
    case 'general_error':
      return { kind: 'failure' };
  }
}
