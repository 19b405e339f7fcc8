/**
 * Brand helper for "parse, don't validate".
 *
 * A branded value can only be produced by the parser at a boundary
 * (config loading, ARN parsing), so holding one proves the check ran.
 * Brands are erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
