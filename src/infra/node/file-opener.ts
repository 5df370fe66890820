import { open } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type { FileOpenerPort, FsError, OpenedFile } from '../../ports/file-opener.port.js';
import type { StreamError } from '../../ports/byte-stream.port.js';
import { errorMessage, mapFsError } from './fs-error.js';

class IsDirectoryError extends Error {
  readonly code = 'EISDIR';
}

/**
 * Opens the file and rejects directories up front. POSIX lets `open(2)` succeed
 * on a directory and only fails the first read.
 */
async function openForReading(filePath: string): Promise<FileHandle> {
  const handle = await open(filePath, 'r');
  try {
    const stats = await handle.stat();
    if (stats.isDirectory()) {
      throw new IsDirectoryError(`EISDIR: illegal operation on a directory, open '${filePath}'`);
    }
    return handle;
  } catch (e) {
    await handle.close();
    throw e;
  }
}

class NodeOpenedFile implements OpenedFile {
  constructor(
    private readonly path: string,
    private readonly handle: FileHandle
  ) {}

  readToEnd(): ResultAsync<Uint8Array, StreamError> {
    return RA.fromPromise(this.handle.readFile(), (e): StreamError => ({
      code: 'STREAM_READ_FAILED',
      message: `Failed to read ${this.path}: ${errorMessage(e)}`,
    })).map((b) => new Uint8Array(b.buffer, b.byteOffset, b.byteLength));
  }

  close(): ResultAsync<void, FsError> {
    return RA.fromPromise(this.handle.close(), (e) => mapFsError(e, this.path));
  }
}

/**
 * Node file opener over `fs/promises` handles (Node-specific, hidden behind the port).
 */
export class NodeFileOpener implements FileOpenerPort {
  open(filePath: string): ResultAsync<OpenedFile, FsError> {
    return RA.fromPromise(openForReading(filePath), (e) => mapFsError(e, filePath)).map(
      (handle): OpenedFile => new NodeOpenedFile(filePath, handle)
    );
  }
}
