import type { Result } from 'neverthrow';
import { ResultAsync, ok, err } from 'neverthrow';
import { encodeBase64UrlNoPad, decodeBase64UrlNoPad } from '../../core/encoding/base64url.js';
import type { InputSource } from '../../domain/input-source.js';
import { describeInputSource } from '../../domain/input-source.js';
import type { TransformMode } from '../../domain/transform-mode.js';
import type { ByteWriterPort } from '../../ports/byte-stream.port.js';
import type { OpenedFile } from '../../ports/file-opener.port.js';
import type { InvalidEncodingError, IoFailureError, TransformError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import type { Logger } from '../../core/logging/types.js';
import { assertNever } from '../../runtime/assert-never.js';
import type { AcquiredSource, ResolveSource } from './resolve-source.js';

/**
 * Appended after the encoded text. Output formatting only; decode never needs it.
 */
export const ENCODED_OUTPUT_TERMINATOR = '\n';

export interface TransformSummary {
  readonly mode: TransformMode['kind'];
  readonly source: string;
  readonly inputBytes: number;
  readonly outputBytes: number;
}

export interface TransformInputDeps {
  readonly resolveSource: ResolveSource;
  readonly output: ByteWriterPort;
  readonly logger: Logger;
}

const utf8Encoder = new TextEncoder();
// ignoreBOM keeps a byte-order mark in the text, where the codec rejects it.
const strictUtf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

// Unicode White_Space. Unlike `trimEnd`, this takes U+0085 and leaves U+FEFF in place.
const WHITE_SPACE = /^[\t\n\v\f\r \u0085\u00a0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]$/;

export function trimTrailingWhitespace(text: string): string {
  let end = text.length;
  while (end > 0 && WHITE_SPACE.test(text.charAt(end - 1))) end--;
  return text.slice(0, end);
}

/**
 * Interpret input as text, drop the trailing whitespace run, decode the rest.
 * Whitespace anywhere else reaches the codec and is rejected there.
 */
export function decodeFromInput(input: Uint8Array): Result<Uint8Array, InvalidEncodingError> {
  let text: string;
  try {
    text = strictUtf8Decoder.decode(input);
  } catch {
    return err(Err.invalidEncoding('INPUT_NOT_UTF8', 'Input is not valid UTF-8 text'));
  }

  return decodeBase64UrlNoPad(trimTrailingWhitespace(text)).mapErr((e) =>
    Err.invalidEncoding(e.code, e.message, e.code === 'BASE64URL_INVALID_CHARACTERS' ? e.position : undefined)
  );
}

function transform(mode: TransformMode, input: Uint8Array): Result<Uint8Array, InvalidEncodingError> {
  switch (mode.kind) {
    case 'encode':
      return ok(encodeForOutput(input));
    case 'decode':
      return decodeFromInput(input);
    default:
      return assertNever(mode);
  }
}

async function readThenClose(file: OpenedFile): Promise<Result<Uint8Array, IoFailureError>> {
  const read = await file.readToEnd();
  const closed = await file.close();

  if (read.isErr()) return err(Err.ioFailure('read', read.error.message));
  if (closed.isErr()) return err(Err.ioFailure('close', closed.error.message));
  return ok(read.value);
}

function readAll(acquired: AcquiredSource): ResultAsync<Uint8Array, IoFailureError> {
  switch (acquired.kind) {
    case 'borrowed':
      return acquired.reader.readToEnd().mapErr((e) => Err.ioFailure('read', e.message));
    case 'owned':
      return new ResultAsync(readThenClose(acquired.file));
    default:
      return assertNever(acquired);
  }
}

/**
 * Resolve the source, read it whole, transform, write.
 *
 * Linear: any failure stops the pipeline before the write, so a failed run
 * never produces partial output.
 */
export function createTransformInputUseCase(deps: TransformInputDeps) {
  const log = deps.logger;

  return function transformInput(mode: TransformMode, source: InputSource): ResultAsync<TransformSummary, TransformError> {
    const sourceLabel = describeInputSource(source);

    return deps
      .resolveSource(source)
      .andThen((acquired) => {
        log.debug({ source: sourceLabel, owned: acquired.kind === 'owned' }, 'Source resolved');
        return readAll(acquired);
      })
      .andThen((input) => {
        log.debug({ inputBytes: input.length }, 'Input read');
        return transform(mode, input).map((output) => ({ input, output }));
      })
      .andThen(({ input, output }) =>
        deps.output
          .write(output)
          .mapErr((e) => Err.ioFailure('write', e.message))
          .map(
            (): TransformSummary => ({
              mode: mode.kind,
              source: sourceLabel,
              inputBytes: input.length,
              outputBytes: output.length,
            })
          )
      )
      .map((summary) => {
        log.debug(summary, 'Output written');
        return summary;
      })
      .mapErr((error) => {
        log.debug({ error }, 'Transform failed');
        return error;
      });
  };
}

export type TransformInput = ReturnType<typeof createTransformInputUseCase>;
