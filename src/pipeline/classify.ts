/**
 * Failure classification for error text coming out of a stage.
 */

import type { FailureKind } from '../schemas/run.js';

/** Exit code a process stage uses to report a transient failure (EX_TEMPFAIL). */
export const TRANSIENT_EXIT_CODE = 75;

const TRANSIENT_PATTERNS: readonly RegExp[] = [
  /\bE(CONNRESET|CONNREFUSED|CONNABORTED|TIMEDOUT|PIPE|AI_AGAIN|NOTFOUND|NETUNREACH|HOSTUNREACH)\b/,
  /socket hang up/i,
  /connection (reset|refused|lost|aborted|closed|error)/i,
  /network (error|is unreachable)/i,
  /\btimed out\b/i,
  /\b(connect|connection|read|request|socket|gateway) time-?out\b/i,
  /too many requests/i,
  /rate.?limit/i,
  /flood.?wait/i,
  // Status codes count only in HTTP phrasing, not as bare numbers.
  /\b(HTTP(\/[\d.]+)?|status( code)?:?)\s*(429|502|503|504)\b/i,
  /bad gateway/i,
  /service unavailable/i,
  /temporar(il)?y unavailable/i,
];

/** Classify a failure message as retryable (transient) or fatal. */
export function classifyFailure(message: string): Extract<FailureKind, 'retryable' | 'fatal'> {
  return TRANSIENT_PATTERNS.some((pattern) => pattern.test(message))
    ? 'retryable'
    : 'fatal';
}
