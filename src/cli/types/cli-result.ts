/**
 * CLI Result Types
 *
 * Commands return these; the composition root interprets them.
 */

import type { ExitCode } from './exit-code.js';

/**
 * Human-facing failure output. Goes to stderr; stdout belongs to data.
 */
export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly suggestions?: readonly string[];
}

export type CliResult =
  | { kind: 'success' }
  | { kind: 'failure'; exitCode: ExitCode; output: CliOutput };

export function success(): CliResult {
  return { kind: 'success' };
}

export function failure(
  message: string,
  options?: {
    exitCode?: ExitCode;
    details?: readonly string[];
    suggestions?: readonly string[];
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: options?.exitCode ?? { kind: 'general_error' },
    output: {
      message,
      details: options?.details,
      suggestions: options?.suggestions,
    },
  };
}
