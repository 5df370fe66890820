import type { ResultAsync } from 'neverthrow';
import { okAsync, errAsync } from 'neverthrow';
import type { ByteReaderPort, ByteWriterPort, StreamError } from '../../src/ports/byte-stream.port.js';
import type { FileOpenerPort, FsError, OpenedFile } from '../../src/ports/file-opener.port.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function bytes(text: string): Uint8Array {
  return encoder.encode(text);
}

export function text(data: Uint8Array): string {
  return decoder.decode(data);
}

/**
 * In-memory reader: yields fixed bytes, or fails with a fixed error.
 */
export class InMemoryByteReader implements ByteReaderPort {
  reads = 0;

  constructor(private readonly content: Uint8Array | StreamError) {}

  readToEnd(): ResultAsync<Uint8Array, StreamError> {
    this.reads++;
    return this.content instanceof Uint8Array
      ? okAsync<Uint8Array, StreamError>(this.content)
      : errAsync<Uint8Array, StreamError>(this.content);
  }
}

/**
 * In-memory writer: collects every chunk written.
 */
export class InMemoryByteWriter implements ByteWriterPort {
  readonly chunks: Uint8Array[] = [];

  constructor(private readonly failWith?: StreamError) {}

  write(data: Uint8Array): ResultAsync<void, StreamError> {
    if (this.failWith) return errAsync<void, StreamError>(this.failWith);
    this.chunks.push(data);
    return okAsync<void, StreamError>(undefined);
  }

  written(): Uint8Array {
    const total = this.chunks.reduce((n, c) => n + c.length, 0);
    const out = new Uint8Array(total);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }

  writtenText(): string {
    return text(this.written());
  }
}

type FakeFile = {
  readonly content: Uint8Array | StreamError;
  readonly closeError?: FsError;
};

/**
 * In-memory file opener. Unknown paths fail with FS_NOT_FOUND, like the Node adapter.
 * Records which paths were opened and closed so tests can check handle release.
 */
export class InMemoryFileOpener implements FileOpenerPort {
  readonly opened: string[] = [];
  readonly closed: string[] = [];
  private readonly files = new Map<string, FakeFile>();
  private readonly openErrors = new Map<string, FsError>();

  withFile(path: string, content: Uint8Array | StreamError, closeError?: FsError): this {
    this.files.set(path, { content, closeError });
    return this;
  }

  withOpenError(path: string, error: FsError): this {
    this.openErrors.set(path, error);
    return this;
  }

  open(filePath: string): ResultAsync<OpenedFile, FsError> {
    const openError = this.openErrors.get(filePath);
    if (openError) return errAsync<OpenedFile, FsError>(openError);

    const file = this.files.get(filePath);
    if (!file) return errAsync<OpenedFile, FsError>({ code: 'FS_NOT_FOUND', message: `No such file: ${filePath}` });

    this.opened.push(filePath);
    const reader = new InMemoryByteReader(file.content);
    const closed = this.closed;

    return okAsync<OpenedFile, FsError>({
      readToEnd: () => reader.readToEnd(),
      close: () => {
        closed.push(filePath);
        return file.closeError ? errAsync<void, FsError>(file.closeError) : okAsync<void, FsError>(undefined);
      },
    });
  }
}
