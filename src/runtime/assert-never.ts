/**
 * Exhaustiveness helper for discriminated unions.
 * Place in the `default` branch of a switch over a union's `kind` or `_tag`.
 */
export function assertNever(value: never, context = 'value'): never {
  throw new Error(`Unhandled ${context}: ${JSON.stringify(value)}`);
}
