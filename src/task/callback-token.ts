import type { Brand } from '../runtime/brand.js';

/**
 * Step Functions task token: a single-use capability for reporting one
 * terminal outcome. Opaque to us; only ever passed back verbatim.
 */
export type CallbackToken = Brand<string, 'CallbackToken'>;

/** Blank or missing means "local-only run, nobody is waiting". */
export function parseCallbackToken(raw: string | undefined): CallbackToken | null {
  const trimmed = raw?.trim();
  return trimmed ? (trimmed as CallbackToken) : null;
}

/** Short, log-safe fingerprint of a token (never log the token itself). */
export function describeToken(token: CallbackToken | null): string {
  if (token === null) return 'none';
  return `${token.length} chars, ends ...${token.slice(-6)}`;
}
