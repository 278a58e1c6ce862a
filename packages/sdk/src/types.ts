/**
 * Ton.Place SDK Types
 */

import type { Logger } from './core/logger.js';

/**
 * Request parameters keyed by name, one value per name.
 *
 * A map rather than a plain object: names come from the network and may be
 * `__proto__` or `constructor`.
 */
export type ParameterSet = ReadonlyMap<string, string>;

/**
 * Anything a ParameterSet can be built from
 */
export type ParameterSource =
  | string
  | URLSearchParams
  | Readonly<Record<string, string | readonly string[] | undefined>>;

/**
 * Launch parameters the platform appends to the app URL
 */
export interface LaunchParams {
  /** Application identifier */
  appId: string;
  /** Platform user identifier (decimal) */
  userId: string;
  /** Issue time, seconds since epoch (decimal) */
  timestamp: string;
  firstName: string;
  lastName: string;
}

/**
 * Result of checking a launch request. Both flags must be true before the
 * caller is treated as authenticated.
 */
export interface LaunchCheck {
  signatureValid: boolean;
  timestampFresh: boolean;
  params: ParameterSet;
}

export interface LaunchCheckOptions {
  now?: Date;
  maxAgeSeconds?: number;
}

/**
 * Purchase currencies. Amounts are integer minor units: cents for `eur`,
 * nanotons for `ton`.
 */
export type Currency = 'eur' | 'ton';

export type PurchaseStatus = 'pending' | 'paid';

/**
 * Purchase record as returned by `GET /apps/purchases`
 */
export interface Purchase {
  id: number;
  amount: number;
  currency: Currency | (string & {});
  user_id: number;
  /** Seconds since epoch */
  created_at: number;
  /** `pending` or `paid` today; kept open so new states pass through */
  status: PurchaseStatus | (string & {});
  title: string;
}

export interface PurchaseListOptions {
  /** Page size, the API caps it at 100 */
  count?: number;
}

export interface CreatePurchaseInput {
  userId: number;
  /** Minor units */
  amount: number;
  title: string;
  currency?: Currency;
}

/**
 * Platform API client configuration
 */
export interface PlatformClientConfig {
  appId: string;
  appSecret: string;
  apiUrl?: string;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Error codes for platform API operations
 */
export enum PlatformErrorCode {
  INVALID_CONFIG = 'INVALID_CONFIG',
  NETWORK_ERROR = 'NETWORK_ERROR',
  API_ERROR = 'API_ERROR',
  INVALID_RESPONSE = 'INVALID_RESPONSE'
}

/**
 * Error thrown by the platform API client
 */
export class PlatformError extends Error {
  public readonly code: PlatformErrorCode;
  /** HTTP status, for `API_ERROR` */
  public readonly status?: number;

  constructor(code: PlatformErrorCode, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PlatformError';
    this.code = code;
    this.status = options.status;
  }
}
