/**
 * Launch signature verification
 *
 * The platform signs the parameters it appends to the app URL:
 *
 *   canonical = sorted `name=value` lines joined with "\n" (no `hash`)
 *   key       = SHA-256(app secret)
 *   hash      = hex(HMAC-SHA-256(key, canonical))
 *
 * A signature never expires by itself, so every check is paired with a
 * timestamp freshness check on `ts`.
 */

import { createHash, createHmac, timingSafeEqual } from 'crypto';
import { SIGNATURE_PARAM, extractSignature, toParameterSet } from './parameters.js';
import type { LaunchCheck, LaunchCheckOptions, ParameterSet, ParameterSource } from './types.js';

/** Replay window applied when the caller does not pass one */
export const DEFAULT_MAX_AGE_SECONDS = 300;

/** How far in the future a timestamp may be (clock skew) */
export const MAX_FUTURE_SKEW_SECONDS = 60;

const INT64_MIN = -9223372036854775808n;
const INT64_MAX = 9223372036854775807n;
const DECIMAL_INTEGER = /^[+-]?[0-9]+$/;

function compareBytes(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

/**
 * Deterministic string to sign: names sorted byte-wise, one `name=value`
 * per line. Values are not escaped.
 */
export function canonicalize(params: ParameterSet): string {
  const names = [...params.keys()].filter(name => name !== SIGNATURE_PARAM).sort(compareBytes);
  return names.map(name => `${name}=${params.get(name) ?? ''}`).join('\n');
}

/**
 * HMAC key derived from the app secret
 */
export function deriveSigningKey(secret: string): Buffer {
  return createHash('sha256').update(secret, 'utf8').digest();
}

/**
 * Lowercase hex signature of a parameter set
 */
export function computeSignature(params: ParameterSet, secret: string): string {
  return createHmac('sha256', deriveSigningKey(secret))
    .update(canonicalize(params), 'utf8')
    .digest('hex');
}

/**
 * Check a supplied signature against the parameter set.
 *
 * Comparison is constant-time. A missing, empty or malformed signature is
 * simply `false`.
 */
export function verifySignature(
  params: ParameterSet,
  suppliedSignature: string | undefined,
  secret: string
): boolean {
  if (typeof suppliedSignature !== 'string' || suppliedSignature.length === 0) {
    return false;
  }

  const expected = Buffer.from(computeSignature(params, secret), 'utf8');
  const supplied = Buffer.from(suppliedSignature, 'utf8');
  if (expected.length !== supplied.length) {
    return false;
  }

  return timingSafeEqual(expected, supplied);
}

/**
 * Whether a `ts` value (decimal seconds since epoch) is inside the replay
 * window: no older than `maxAgeSeconds`, no more than 60s ahead of `now`.
 */
export function isFresh(
  timestampText: string | undefined,
  now: Date = new Date(),
  maxAgeSeconds: number = DEFAULT_MAX_AGE_SECONDS
): boolean {
  if (typeof timestampText !== 'string' || !DECIMAL_INTEGER.test(timestampText)) {
    return false;
  }

  const timestamp = BigInt(timestampText);
  if (timestamp < INT64_MIN || timestamp > INT64_MAX) {
    return false;
  }

  const nowMs = now.getTime();
  if (!Number.isFinite(nowMs) || !Number.isFinite(maxAgeSeconds)) {
    return false;
  }

  const age = BigInt(Math.floor(nowMs / 1000)) - timestamp;
  if (age < -BigInt(MAX_FUTURE_SKEW_SECONDS)) {
    return false;
  }

  return age <= BigInt(Math.floor(maxAgeSeconds));
}

/**
 * Run both checks over a raw launch request
 */
export function checkLaunch(
  source: ParameterSource,
  secret: string,
  options: LaunchCheckOptions = {}
): LaunchCheck {
  const params = toParameterSet(source);

  return {
    signatureValid: verifySignature(params, extractSignature(source), secret),
    timestampFresh: isFresh(params.get('ts'), options.now, options.maxAgeSeconds),
    params
  };
}

/**
 * Issuer side: the parameters plus their `hash`. Used to build launch URLs
 * for local development.
 */
export function signLaunchParams(source: ParameterSource, secret: string): URLSearchParams {
  const params = toParameterSet(source);
  const signed = new URLSearchParams();

  for (const [name, value] of params) {
    signed.append(name, value);
  }
  signed.append(SIGNATURE_PARAM, computeSignature(params, secret));

  return signed;
}
