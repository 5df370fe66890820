import type { ResultAsync } from 'neverthrow';

export type StreamError =
  | { readonly code: 'STREAM_READ_FAILED'; readonly message: string }
  | { readonly code: 'STREAM_WRITE_FAILED'; readonly message: string };

/**
 * Port: a byte source read once, to completion.
 * Used by: transform-input (standard input, opened files).
 */
export interface ByteReaderPort {
  readToEnd(): ResultAsync<Uint8Array, StreamError>;
}

/**
 * Port: a byte sink.
 * `write` resolves once the bytes are handed to the underlying stream.
 */
export interface ByteWriterPort {
  write(bytes: Uint8Array): ResultAsync<void, StreamError>;
}
