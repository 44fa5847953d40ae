/**
 * TTL helpers
 *
 * TTLs travel as strings of seconds with an `s` suffix ("3600s", "1.5s").
 * Remote entries report their expiry as an ISO-8601 timestamp. Neither
 * parser throws: malformed input resolves to the default lifetime.
 */

export const DEFAULT_TTL_SECONDS = 3600;

export const DEFAULT_TTL = `${DEFAULT_TTL_SECONDS}s`;

const TTL_PATTERN = /^([0-9]*\.?[0-9]+)s$/;

// Date.parse only keeps millisecond precision; the service reports up to nanoseconds
const FRACTIONAL_SECONDS = /(\.\d{3})\d+/;

export function isValidTtl(value: unknown): value is string {
  return typeof value === 'string' && TTL_PATTERN.test(value);
}

/**
 * Parse a TTL string to seconds, falling back to the default
 */
export function parseTtlToSeconds(ttl: string | null | undefined, fallbackSeconds: number = DEFAULT_TTL_SECONDS): number {
  if (!ttl) {
    return fallbackSeconds;
  }

  const match = TTL_PATTERN.exec(ttl);
  if (!match) {
    return fallbackSeconds;
  }

  const seconds = Number(match[1]);
  return Number.isFinite(seconds) ? seconds : fallbackSeconds;
}

export function formatTtl(seconds: number): string {
  return `${seconds}s`;
}

/**
 * What a remote `expireTime` says about the entry's remaining life
 */
export type RemoteExpiry =
  | { kind: 'remaining'; seconds: number }
  | { kind: 'expired' }
  | { kind: 'unknown' };

/**
 * Interpret a remote expiry timestamp relative to `now` (epoch ms).
 * Absent or unparsable timestamps are `unknown`.
 */
export function resolveRemoteExpiry(expireTime: string | null | undefined, now: number = Date.now()): RemoteExpiry {
  if (!expireTime) {
    return { kind: 'unknown' };
  }

  const parsed = Date.parse(expireTime.trim().replace(FRACTIONAL_SECONDS, '$1'));
  if (Number.isNaN(parsed)) {
    return { kind: 'unknown' };
  }

  const seconds = (parsed - now) / 1000;
  if (seconds <= 0) {
    return { kind: 'expired' };
  }

  return { kind: 'remaining', seconds };
}
