/**
 * Brand helper for "parse, don't validate".
 *
 * A branded value proves a boundary check happened (a clamped similarity,
 * a config that went through the schema). Brands are erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
