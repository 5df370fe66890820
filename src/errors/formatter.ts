import type { AppError } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    case 'SourceUnavailable':
      return `Cannot open ${error.path} (${error.reason.replace('_', ' ')}): ${error.message}`;

    case 'InvalidEncoding':
      return error.position === undefined
        ? `Invalid input: ${error.message}`
        : `Invalid input at position ${error.position}: ${error.message}`;

    case 'IoFailure':
      return `I/O failure during ${error.operation}: ${error.message}`;

    default:
      return assertNever(error);
  }
}
