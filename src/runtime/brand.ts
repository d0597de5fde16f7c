/**
 * Nominal marker for values that passed a parse step ("parse, don't validate").
 *
 * String-keyed rather than a `unique symbol`, so branded types stay nameable
 * in emitted declarations. Erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
