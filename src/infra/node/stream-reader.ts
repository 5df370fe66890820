import type { Readable } from 'stream';
import { buffer } from 'stream/consumers';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type { ByteReaderPort, StreamError } from '../../ports/byte-stream.port.js';
import { errorMessage } from './fs-error.js';

/**
 * Reads a Node readable stream (standard input in production) to its end.
 * The stream is not owned: it is never destroyed here. `label` names the
 * stream in error messages.
 */
export class NodeStreamReader implements ByteReaderPort {
  constructor(
    private readonly stream: Readable,
    private readonly label: string
  ) {}

  readToEnd(): ResultAsync<Uint8Array, StreamError> {
    return RA.fromPromise(buffer(this.stream), (e): StreamError => ({
      code: 'STREAM_READ_FAILED',
      message: `Failed to read ${this.label}: ${errorMessage(e)}`,
    })).map((b) => new Uint8Array(b.buffer, b.byteOffset, b.byteLength));
  }
}
