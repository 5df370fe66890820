import type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  InvalidEncodingError,
  InvalidEncodingReason,
  IoFailureError,
  IoOperation,
  SourceUnavailableError,
  SourceUnavailableReason,
} from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),

  sourceUnavailable: (path: string, reason: SourceUnavailableReason, message: string): SourceUnavailableError => ({
    _tag: 'SourceUnavailable',
    path,
    reason,
    message,
  }),

  invalidEncoding: (reason: InvalidEncodingReason, message: string, position?: number): InvalidEncodingError =>
    position === undefined
      ? { _tag: 'InvalidEncoding', reason, message }
      : { _tag: 'InvalidEncoding', reason, message, position },

  ioFailure: (operation: IoOperation, message: string): IoFailureError => ({
    _tag: 'IoFailure',
    operation,
    message,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
