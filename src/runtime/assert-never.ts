/**
 * Exhaustiveness check for `switch` over discriminated unions.
 * Adding a member to the union turns every unhandled switch into a compile error.
 */
export function assertNever(x: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(x)}`);
}
