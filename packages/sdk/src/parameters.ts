/**
 * Launch parameter parsing
 */

import type { LaunchParams, ParameterSet, ParameterSource } from './types.js';

/** Name of the parameter carrying the signature */
export const SIGNATURE_PARAM = 'hash';

function toSearchParams(source: string | URLSearchParams): URLSearchParams {
  if (typeof source !== 'string') {
    return source;
  }
  return new URLSearchParams(source.startsWith('?') ? source.slice(1) : source);
}

function firstValue(value: string | readonly string[] | undefined): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  return value?.[0];
}

/**
 * Build a ParameterSet: one value per name (first occurrence wins), with
 * the signature field left out.
 */
export function toParameterSet(source: ParameterSource): ParameterSet {
  const params = new Map<string, string>();

  if (typeof source === 'string' || source instanceof URLSearchParams) {
    for (const [name, value] of toSearchParams(source)) {
      if (name !== SIGNATURE_PARAM && !params.has(name)) {
        params.set(name, value);
      }
    }
    return params;
  }

  for (const [name, raw] of Object.entries(source)) {
    const value = firstValue(raw);
    if (name !== SIGNATURE_PARAM && value !== undefined) {
      params.set(name, value);
    }
  }
  return params;
}

/**
 * First value of the signature field, or an empty string
 */
export function extractSignature(source: ParameterSource): string {
  if (typeof source === 'string' || source instanceof URLSearchParams) {
    return toSearchParams(source).get(SIGNATURE_PARAM) ?? '';
  }
  if (!Object.prototype.hasOwnProperty.call(source, SIGNATURE_PARAM)) {
    return '';
  }
  return firstValue(source[SIGNATURE_PARAM]) ?? '';
}

/**
 * Typed view of the fields the platform sends. Missing fields are empty.
 */
export function readLaunchParams(params: ParameterSet): LaunchParams {
  return {
    appId: params.get('app_id') ?? '',
    userId: params.get('user_id') ?? '',
    timestamp: params.get('ts') ?? '',
    firstName: params.get('first_name') ?? '',
    lastName: params.get('last_name') ?? ''
  };
}
