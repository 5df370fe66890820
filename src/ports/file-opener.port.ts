import type { ResultAsync } from 'neverthrow';
import type { ByteReaderPort } from './byte-stream.port.js';

export type FsError =
  | { readonly code: 'FS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string }
  | { readonly code: 'FS_IS_DIRECTORY'; readonly message: string }
  | { readonly code: 'FS_IO_ERROR'; readonly message: string };

/**
 * A file opened for reading. The caller owns the handle and must `close` it,
 * on the failure path too.
 */
export interface OpenedFile extends ByteReaderPort {
  close(): ResultAsync<void, FsError>;
}

/**
 * Port: opening named files for reading.
 */
export interface FileOpenerPort {
  open(filePath: string): ResultAsync<OpenedFile, FsError>;
}
