import type { Writable } from 'stream';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA, okAsync } from 'neverthrow';
import type { ByteWriterPort, StreamError } from '../../ports/byte-stream.port.js';
import { errorMessage } from './fs-error.js';

/**
 * Writes to a Node writable stream (standard output in production).
 *
 * Each write holds an 'error' listener until it succeeds. A failed write is
 * followed by an 'error' event, and with no listener (EPIPE on stdout) that
 * event would crash the process.
 */
export class NodeStreamWriter implements ByteWriterPort {
  constructor(
    private readonly stream: Writable,
    private readonly label: string
  ) {}

  write(bytes: Uint8Array): ResultAsync<void, StreamError> {
    if (bytes.length === 0) {
      return okAsync<void, StreamError>(undefined);
    }

    const stream = this.stream;
    const written = new Promise<void>((resolve, reject) => {
      const onError = (e: Error): void => reject(e);
      stream.once('error', onError);
      stream.write(bytes, (e) => {
        if (e) {
          reject(e);
          return;
        }
        stream.off('error', onError);
        resolve();
      });
    });

    return RA.fromPromise(written, (e): StreamError => ({
      code: 'STREAM_WRITE_FAILED',
      message: `Failed to write ${this.label}: ${errorMessage(e)}`,
    }));
  }
}
