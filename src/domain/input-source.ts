/**
 * Where input bytes come from.
 *
 * `-` is the conventional "read standard input" placeholder; leaving the
 * argument out means the same thing.
 */
export type InputSource =
  | { readonly kind: 'stdin' }
  | { readonly kind: 'file'; readonly path: string };

export const STDIN_SENTINEL = '-';

export const STDIN: InputSource = { kind: 'stdin' };

export function parseInputSource(arg: string | undefined): InputSource {
  if (arg === undefined || arg === STDIN_SENTINEL) {
    return STDIN;
  }
  return { kind: 'file', path: arg };
}

export function describeInputSource(source: InputSource): string {
  return source.kind === 'stdin' ? '<stdin>' : source.path;
}
