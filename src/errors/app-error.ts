import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type SourceUnavailableReason = 'not_found' | 'permission_denied' | 'is_directory' | 'io_error';

/** The requested input file could not be opened. */
export type SourceUnavailableError = Readonly<{
  readonly _tag: 'SourceUnavailable';
  readonly path: string;
  readonly reason: SourceUnavailableReason;
  readonly message: string;
}>;

export type InvalidEncodingReason =
  | 'BASE64URL_INVALID_CHARACTERS'
  | 'BASE64URL_INVALID_LENGTH'
  | 'BASE64URL_NON_CANONICAL'
  | 'INPUT_NOT_UTF8';

/** Decode input is not unpadded base64url text. */
export type InvalidEncodingError = Readonly<{
  readonly _tag: 'InvalidEncoding';
  readonly reason: InvalidEncodingReason;
  readonly position?: number;
  readonly message: string;
}>;

export type IoOperation = 'read' | 'write' | 'close';

/** A read, write or close on an already resolved stream failed. */
export type IoFailureError = Readonly<{
  readonly _tag: 'IoFailure';
  readonly operation: IoOperation;
  readonly message: string;
}>;

export type TransformError = SourceUnavailableError | InvalidEncodingError | IoFailureError;

export type AppError = ConfigInvalidError | TransformError;

/**
 * Branded config type.
 * Lets callers require a validated config without re-checking at runtime.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
