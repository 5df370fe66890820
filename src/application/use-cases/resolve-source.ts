import type { ResultAsync } from 'neverthrow';
import { okAsync } from 'neverthrow';
import type { InputSource } from '../../domain/input-source.js';
import type { ByteReaderPort } from '../../ports/byte-stream.port.js';
import type { FileOpenerPort, FsError, OpenedFile } from '../../ports/file-opener.port.js';
import type { SourceUnavailableError, SourceUnavailableReason } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import { assertNever } from '../../runtime/assert-never.js';

/**
 * A resolved input. `owned` handles were opened by us and must be closed;
 * borrowed ones (standard input) belong to the process.
 */
export type AcquiredSource =
  | { readonly kind: 'borrowed'; readonly reader: ByteReaderPort }
  | { readonly kind: 'owned'; readonly file: OpenedFile };

export interface ResolveSourceDeps {
  readonly stdin: ByteReaderPort;
  readonly files: FileOpenerPort;
}

function toReason(code: FsError['code']): SourceUnavailableReason {
  switch (code) {
    case 'FS_NOT_FOUND':
      return 'not_found';
    case 'FS_PERMISSION_DENIED':
      return 'permission_denied';
    case 'FS_IS_DIRECTORY':
      return 'is_directory';
    case 'FS_IO_ERROR':
      return 'io_error';
    default:
      return assertNever(code);
  }
}

export function createResolveSource(deps: ResolveSourceDeps) {
  return function resolveSource(source: InputSource): ResultAsync<AcquiredSource, SourceUnavailableError> {
    switch (source.kind) {
      case 'stdin':
        return okAsync<AcquiredSource>({ kind: 'borrowed', reader: deps.stdin });
      case 'file':
        return deps.files
          .open(source.path)
          .map((file): AcquiredSource => ({ kind: 'owned', file }))
          .mapErr((e) => Err.sourceUnavailable(source.path, toReason(e.code), e.message));
      default:
        return assertNever(source);
    }
  };
}

export type ResolveSource = ReturnType<typeof createResolveSource>;
