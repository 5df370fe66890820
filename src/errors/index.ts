export type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  SourceUnavailableError,
  SourceUnavailableReason,
  InvalidEncodingError,
  InvalidEncodingReason,
  IoFailureError,
  IoOperation,
  TransformError,
  ValidatedAppConfig,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError } from './formatter.js';
