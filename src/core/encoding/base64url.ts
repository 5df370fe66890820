import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../../runtime/brand.js';

const BASE64URL_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_' as const;

// ASCII code point -> 6-bit value, -1 for characters outside the alphabet.
const DECODE_TABLE: Int8Array = (() => {
  const table = new Int8Array(128).fill(-1);
  for (let i = 0; i < BASE64URL_ALPHABET.length; i++) {
    table[BASE64URL_ALPHABET.charCodeAt(i)] = i;
  }
  return table;
})();

export type Base64UrlNoPad = Brand<string, 'Base64UrlNoPad'>;

export type Base64UrlDecodeError =
  | { readonly code: 'BASE64URL_INVALID_CHARACTERS'; readonly message: string; readonly position: number }
  | { readonly code: 'BASE64URL_INVALID_LENGTH'; readonly message: string }
  | { readonly code: 'BASE64URL_NON_CANONICAL'; readonly message: string };

/**
 * Encode bytes to RFC 4648 §5 base64url without padding.
 *
 * Constraints:
 * - Output chars are only [A-Za-z0-9_-]
 * - No '=' padding
 * - Total: every byte sequence (including empty) has an encoding
 */
export function encodeBase64UrlNoPad(bytes: Uint8Array): Base64UrlNoPad {
  let out = '';
  let i = 0;

  for (; i + 2 < bytes.length; i += 3) {
    const group = (bytes[i] << 16) | (bytes[i + 1] << 8) | bytes[i + 2];
    out +=
      BASE64URL_ALPHABET.charAt((group >> 18) & 63) +
      BASE64URL_ALPHABET.charAt((group >> 12) & 63) +
      BASE64URL_ALPHABET.charAt((group >> 6) & 63) +
      BASE64URL_ALPHABET.charAt(group & 63);
  }

  const remaining = bytes.length - i;
  if (remaining === 1) {
    const group = bytes[i] << 16;
    out += BASE64URL_ALPHABET.charAt((group >> 18) & 63) + BASE64URL_ALPHABET.charAt((group >> 12) & 63);
  } else if (remaining === 2) {
    const group = (bytes[i] << 16) | (bytes[i + 1] << 8);
    out +=
      BASE64URL_ALPHABET.charAt((group >> 18) & 63) +
      BASE64URL_ALPHABET.charAt((group >> 12) & 63) +
      BASE64URL_ALPHABET.charAt((group >> 6) & 63);
  }

  return out as Base64UrlNoPad;
}

/**
 * Decode unpadded base64url back to bytes.
 *
 * The input must already be trimmed: whitespace anywhere is an invalid character.
 * Characters are checked before length, so the reported error points at the first
 * bad character when there is one.
 *
 * Decoding is canonical. The unused low bits of a 2- or 3-character final group
 * must be zero, otherwise two different strings would decode to the same bytes.
 */
export function decodeBase64UrlNoPad(encoded: string): Result<Uint8Array, Base64UrlDecodeError> {
  const values = new Uint8Array(encoded.length);

  for (let position = 0; position < encoded.length; position++) {
    const code = encoded.charCodeAt(position);
    const value = code < 128 ? DECODE_TABLE[code] : -1;
    if (value < 0) {
      return err({
        code: 'BASE64URL_INVALID_CHARACTERS',
        message: `Invalid base64url character ${JSON.stringify(encoded.charAt(position))} at position ${position}`,
        position,
      });
    }
    values[position] = value;
  }

  if (encoded.length % 4 === 1) {
    return err({
      code: 'BASE64URL_INVALID_LENGTH',
      message: `Invalid base64url length ${encoded.length}: a final group of one character encodes no byte`,
    });
  }

  const bytes = new Uint8Array(Math.floor((encoded.length * 3) / 4));
  let acc = 0;
  let bits = 0;
  let offset = 0;

  for (const value of values) {
    acc = (acc << 6) | value;
    bits += 6;

    if (bits >= 8) {
      bits -= 8;
      bytes[offset++] = (acc >> bits) & 0xff;
      // Keep only the bits not yet emitted.
      acc &= (1 << bits) - 1;
    }
  }

  if (acc !== 0) {
    return err({
      code: 'BASE64URL_NON_CANONICAL',
      message: 'Non-canonical base64url encoding (unused trailing bits are non-zero)',
    });
  }

  return ok(bytes);
}
