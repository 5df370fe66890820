/**
 * Transform Command
 *
 * Encodes or decodes one input to standard output.
 * Pure function with dependency injection: the use case does the I/O.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import type { TransformInput } from '../../application/use-cases/transform-input.js';
import type { TransformError } from '../../errors/app-error.js';
import { formatAppError } from '../../errors/formatter.js';
import { parseInputSource } from '../../domain/input-source.js';
import { transformModeFromDecodeFlag } from '../../domain/transform-mode.js';
import { assertNever } from '../../runtime/assert-never.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface TransformCommandOptions {
  readonly decode: boolean;
  /** Positional FILE argument; `-` or absent reads standard input. */
  readonly file?: string;
}

export interface TransformCommandDeps {
  readonly transformInput: TransformInput;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

function toFailure(error: TransformError): CliResult {
  switch (error._tag) {
    case 'SourceUnavailable':
      return failure(`${error.path}: cannot open input`, {
        details: [formatAppError(error)],
        suggestions:
          error.reason === 'not_found' ? ['Check the file path, or pass - to read standard input'] : undefined,
      });

    case 'InvalidEncoding':
      return failure('invalid base64url input', {
        details: [formatAppError(error)],
        suggestions: ['Decode input may only contain A-Z a-z 0-9 - _ with no "=" padding'],
      });

    case 'IoFailure':
      return failure(error.operation === 'write' ? 'cannot write output' : 'cannot read input', {
        details: [formatAppError(error)],
      });

    default:
      return assertNever(error);
  }
}

/**
 * Execute the transform command.
 * Success carries no status output; stdout holds only the transformed data.
 */
export async function executeTransformCommand(
  options: TransformCommandOptions,
  deps: TransformCommandDeps
): Promise<CliResult> {
  const mode = transformModeFromDecodeFlag(options.decode);
  const source = parseInputSource(options.file);

  const result = await deps.transformInput(mode, source);

  return result.match(
    () => success(),
    (error) => toFailure(error)
  );
}
