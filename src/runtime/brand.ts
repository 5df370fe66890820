/**
 * Nominal marker for values that passed a boundary check (parsed config,
 * encoded text). Erased at runtime.
 *
 * A string-keyed marker keeps the type nameable in emitted declarations.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
