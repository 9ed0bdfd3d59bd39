/**
 * Brand helper for "parse, don't validate".
 *
 * A branded type proves validation happened at a boundary; brands are
 * erased at run time. String-keyed marker rather than a `unique symbol`
 * so exported zod-derived types stay nameable.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
