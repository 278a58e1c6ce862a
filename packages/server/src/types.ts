/**
 * Server Types
 */

import type { LaunchParams, Purchase } from '@tonplace-miniapp/sdk';

/**
 * Server configuration
 */
export interface ServerConfig {
  port: number;
  host: string;
  appId: string;
  appSecret: string;
  apiUrl: string;
  /** Replay window for launch signatures, seconds */
  signatureMaxAge: number;
  /** Upstream request timeout, milliseconds */
  apiTimeout: number;
  purchaseHistoryLimit: number;
  rateLimitRequests: number;
  /** Milliseconds */
  rateLimitWindow: number;
  corsOrigin?: string;
  httpProxyCount: number;
  logLevel: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';
}

/**
 * Data handed to the page template
 */
export interface PageData {
  user: LaunchParams;
  transactions: Purchase[];
  error?: string;
  isAuthorized: boolean;
}

/**
 * Health check response
 */
export interface HealthResponse {
  status: 'healthy' | 'degraded';
  version: string;
  appId: string;
  configured: boolean;
  uptime: number;
}

/**
 * Standardized error response
 */
export interface ErrorResponse {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Why a launch request was refused. Logged and counted, never returned to
 * the client.
 */
export type LaunchRejection = 'missing' | 'stale' | 'signature' | 'malformed';

/**
 * Server error codes
 */
export enum ServerErrorCode {
  INVALID_REQUEST = 'INVALID_REQUEST',
  UNAUTHORIZED = 'UNAUTHORIZED',
  NOT_FOUND = 'NOT_FOUND',
  UPSTREAM_ERROR = 'UPSTREAM_ERROR',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',
  INTERNAL_ERROR = 'INTERNAL_ERROR'
}

/**
 * Custom server error class
 */
export class ServerError extends Error {
  public readonly code: ServerErrorCode;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ServerErrorCode,
    message: string,
    statusCode: number = 400,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ServerError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}
