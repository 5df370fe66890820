export type TransformMode =
  | { readonly kind: 'encode' }
  | { readonly kind: 'decode' };

export const ENCODE: TransformMode = { kind: 'encode' };
export const DECODE: TransformMode = { kind: 'decode' };

export function transformModeFromDecodeFlag(decode: boolean): TransformMode {
  return decode ? DECODE : ENCODE;
}
