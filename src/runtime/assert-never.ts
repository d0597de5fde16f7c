/**
 * Exhaustiveness check for discriminated unions: a `switch` that forgets a
 * member stops compiling here.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
