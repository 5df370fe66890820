import { describe, it, expect } from 'vitest';
import { createResolveSource } from '../../src/application/use-cases/resolve-source.js';
import { createTransformInputUseCase, decodeFromInput, trimTrailingWhitespace } from '../../src/application/use-cases/transform-input.js';
import { parseInputSource, STDIN } from '../../src/domain/input-source.js';
import { ENCODE, DECODE } from '../../src/domain/transform-mode.js';
import type { StreamError } from '../../src/ports/byte-stream.port.js';
import { InMemoryByteReader, InMemoryByteWriter, InMemoryFileOpener, bytes } from '../fakes/in-memory-io.js';
import { createCapturingLogger } from '../helpers/capture-logger.js';

function setup(options: { stdin?: Uint8Array | StreamError; files?: InMemoryFileOpener; output?: InMemoryByteWriter } = {}) {
  const stdin = new InMemoryByteReader(options.stdin ?? new Uint8Array(0));
  const files = options.files ?? new InMemoryFileOpener();
  const output = options.output ?? new InMemoryByteWriter();
  const { logger, destination } = createCapturingLogger();

  const transformInput = createTransformInputUseCase({
    resolveSource: createResolveSource({ stdin, files }),
    output,
    logger,
  });

  return { transformInput, stdin, files, output, logs: destination };
}

describe('transformInput: encode', () => {
  it('writes the encoded text and one newline', async () => {
    const { transformInput, output } = setup({ stdin: bytes('hello') });

    const result = await transformInput(ENCODE, STDIN);

    expect(result._unsafeUnwrap()).toEqual({ mode: 'encode', source: '<stdin>', inputBytes: 5, outputBytes: 8 });
    expect(output.writtenText()).toBe('aGVsbG8\n');
  });

  it('encodes empty input to a lone newline', async () => {
    const { transformInput, output } = setup({ stdin: new Uint8Array(0) });

    await transformInput(ENCODE, STDIN);

    expect(output.writtenText()).toBe('\n');
  });

  it('produces the same output for an omitted source and -', async () => {
    const first = setup({ stdin: bytes('John Doe\n') });
    const second = setup({ stdin: bytes('John Doe\n') });

    await first.transformInput(ENCODE, parseInputSource(undefined));
    await second.transformInput(ENCODE, parseInputSource('-'));

    expect(first.output.writtenText()).toBe('Sm9obiBEb2UK\n');
    expect(second.output.written()).toEqual(first.output.written());
    expect(first.stdin.reads).toBe(1);
    expect(second.stdin.reads).toBe(1);
  });

  it('reads a named file and closes it', async () => {
    const files = new InMemoryFileOpener().withFile('sushi.bin', new Uint8Array([0xf0, 0x9f, 0x8d, 0xa3]));
    const { transformInput, output, stdin } = setup({ files });

    const result = await transformInput(ENCODE, { kind: 'file', path: 'sushi.bin' });

    expect(result._unsafeUnwrap().source).toBe('sushi.bin');
    expect(output.writtenText()).toBe('8J-Now\n');
    expect(files.opened).toEqual(['sushi.bin']);
    expect(files.closed).toEqual(['sushi.bin']);
    expect(stdin.reads).toBe(0);
  });
});

describe('transformInput: decode', () => {
  it('writes raw bytes with no trailing newline', async () => {
    const { transformInput, output } = setup({ stdin: bytes('aGVsbG8') });

    const result = await transformInput(DECODE, STDIN);

    expect(output.writtenText()).toBe('hello');
    expect(result._unsafeUnwrap()).toEqual({ mode: 'decode', source: '<stdin>', inputBytes: 7, outputBytes: 5 });
  });

  it.each(['', ' ', '  ', '\n', '\n\n', '\n\n\n'])('ignores trailing whitespace %j', async (trailing) => {
    const { transformInput, output } = setup({ stdin: bytes(`3ppMMp4NW6g57TNb4ZwB2Q${trailing}`) });

    await transformInput(DECODE, STDIN);

    expect(output.written()).toEqual(
      new Uint8Array([0xde, 0x9a, 0x4c, 0x32, 0x9e, 0x0d, 0x5b, 0xa8, 0x39, 0xed, 0x33, 0x5b, 0xe1, 0x9c, 0x01, 0xd9])
    );
  });

  it('decodes a named file', async () => {
    const files = new InMemoryFileOpener().withFile('hello.b64', bytes('aGVsbG8K\n'));
    const { transformInput, output } = setup({ files });

    await transformInput(DECODE, { kind: 'file', path: 'hello.b64' });

    expect(output.writtenText()).toBe('hello\n');
    expect(files.closed).toEqual(['hello.b64']);
  });

  it('fails with InvalidEncoding and writes nothing', async () => {
    const { transformInput, output } = setup({ stdin: bytes('a!b2\n') });

    const error = (await transformInput(DECODE, STDIN))._unsafeUnwrapErr();

    expect(error).toEqual({
      _tag: 'InvalidEncoding',
      reason: 'BASE64URL_INVALID_CHARACTERS',
      position: 1,
      message: 'Invalid base64url character "!" at position 1',
    });
    expect(output.chunks).toHaveLength(0);
  });

  it('rejects a length of 1 mod 4 after trimming', async () => {
    const { transformInput } = setup({ stdin: bytes('a\n') });

    const error = (await transformInput(DECODE, STDIN))._unsafeUnwrapErr();

    expect(error._tag).toBe('InvalidEncoding');
    expect(error._tag === 'InvalidEncoding' && error.reason).toBe('BASE64URL_INVALID_LENGTH');
  });
});

describe('transformInput: failures', () => {
  it('reports a missing file as SourceUnavailable without writing', async () => {
    const { transformInput, output } = setup();

    const error = (await transformInput(ENCODE, { kind: 'file', path: 'missing.bin' }))._unsafeUnwrapErr();

    expect(error).toEqual({
      _tag: 'SourceUnavailable',
      path: 'missing.bin',
      reason: 'not_found',
      message: 'No such file: missing.bin',
    });
    expect(output.chunks).toHaveLength(0);
  });

  it('maps permission errors to SourceUnavailable', async () => {
    const files = new InMemoryFileOpener().withOpenError('secret.bin', {
      code: 'FS_PERMISSION_DENIED',
      message: 'Permission denied: secret.bin',
    });
    const { transformInput } = setup({ files });

    const error = (await transformInput(ENCODE, { kind: 'file', path: 'secret.bin' }))._unsafeUnwrapErr();

    expect(error._tag === 'SourceUnavailable' && error.reason).toBe('permission_denied');
  });

  it('closes the file when reading fails', async () => {
    const files = new InMemoryFileOpener().withFile('broken.bin', {
      code: 'STREAM_READ_FAILED',
      message: 'Failed to read broken.bin: EIO',
    });
    const { transformInput, output } = setup({ files });

    const error = (await transformInput(ENCODE, { kind: 'file', path: 'broken.bin' }))._unsafeUnwrapErr();

    expect(error).toEqual({ _tag: 'IoFailure', operation: 'read', message: 'Failed to read broken.bin: EIO' });
    expect(files.closed).toEqual(['broken.bin']);
    expect(output.chunks).toHaveLength(0);
  });

  it('reports a failed close as IoFailure', async () => {
    const files = new InMemoryFileOpener().withFile('data.bin', bytes('hi'), {
      code: 'FS_IO_ERROR',
      message: 'FS error at data.bin: EIO',
    });
    const { transformInput } = setup({ files });

    const error = (await transformInput(ENCODE, { kind: 'file', path: 'data.bin' }))._unsafeUnwrapErr();

    expect(error).toEqual({ _tag: 'IoFailure', operation: 'close', message: 'FS error at data.bin: EIO' });
  });

  it('reports a stdin read failure as IoFailure', async () => {
    const { transformInput } = setup({
      stdin: { code: 'STREAM_READ_FAILED', message: 'Failed to read <stdin>: EIO' },
    });

    const error = (await transformInput(ENCODE, STDIN))._unsafeUnwrapErr();

    expect(error).toEqual({ _tag: 'IoFailure', operation: 'read', message: 'Failed to read <stdin>: EIO' });
  });

  it('reports a write failure as IoFailure', async () => {
    const output = new InMemoryByteWriter({ code: 'STREAM_WRITE_FAILED', message: 'Failed to write <stdout>: EPIPE' });
    const { transformInput } = setup({ stdin: bytes('hello'), output });

    const error = (await transformInput(ENCODE, STDIN))._unsafeUnwrapErr();

    expect(error).toEqual({ _tag: 'IoFailure', operation: 'write', message: 'Failed to write <stdout>: EPIPE' });
  });
});

describe('transformInput: logging', () => {
  it('logs each stage at debug level', async () => {
    const { transformInput, logs } = setup({ stdin: bytes('hello') });

    await transformInput(ENCODE, STDIN);

    expect(logs.messages()).toEqual(['Source resolved', 'Input read', 'Output written']);
    expect(logs.find('Input read')?.['inputBytes']).toBe(5);
    expect(logs.find('Output written')?.['outputBytes']).toBe(8);
  });

  it('logs the failure', async () => {
    const { transformInput, logs } = setup();

    await transformInput(ENCODE, { kind: 'file', path: 'missing.bin' });

    expect(logs.messages()).toEqual(['Transform failed']);
  });
});

describe('decodeFromInput', () => {
  it('rejects input that is not UTF-8', () => {
    expect(decodeFromInput(new Uint8Array([0xff, 0xfe]))._unsafeUnwrapErr()).toEqual({
      _tag: 'InvalidEncoding',
      reason: 'INPUT_NOT_UTF8',
      message: 'Input is not valid UTF-8 text',
    });
  });

  it('keeps leading and embedded whitespace, which the codec rejects', () => {
    const leading = decodeFromInput(bytes(' aGVsbG8'))._unsafeUnwrapErr();
    expect(leading.position).toBe(0);

    const embedded = decodeFromInput(bytes('aGVs\nbG8\n'))._unsafeUnwrapErr();
    expect(embedded.position).toBe(4);
  });

  it('does not strip a byte-order mark', () => {
    const error = decodeFromInput(new Uint8Array([0xef, 0xbb, 0xbf, 0x61, 0x41]))._unsafeUnwrapErr();
    expect(error.reason).toBe('BASE64URL_INVALID_CHARACTERS');
    expect(error.position).toBe(0);
  });

  it('strips a trailing next-line character', () => {
    const decoded = decodeFromInput(new Uint8Array([0x61, 0x41, 0xc2, 0x85]))._unsafeUnwrap();
    expect(Array.from(decoded)).toEqual([0x68]);
  });

  it('keeps a trailing byte-order mark, which the codec rejects', () => {
    const error = decodeFromInput(new Uint8Array([0x61, 0x41, 0xef, 0xbb, 0xbf]))._unsafeUnwrapErr();
    expect(error.reason).toBe('BASE64URL_INVALID_CHARACTERS');
    expect(error.position).toBe(2);
  });
});

describe('trimTrailingWhitespace', () => {
  it('removes a mixed run of Unicode whitespace from the end only', () => {
    expect(trimTrailingWhitespace(' aGVsbG8 \u00a0\u3000\r\n')).toBe(' aGVsbG8');
  });

  it('leaves text without trailing whitespace unchanged', () => {
    expect(trimTrailingWhitespace('aGVsbG8\ufeff')).toBe('aGVsbG8\ufeff');
    expect(trimTrailingWhitespace('')).toBe('');
  });
});
