/**
 * Ton.Place mini app SDK - Main Entry Point
 */

// Launch verification
export {
  canonicalize,
  deriveSigningKey,
  computeSignature,
  verifySignature,
  isFresh,
  checkLaunch,
  signLaunchParams,
  DEFAULT_MAX_AGE_SECONDS,
  MAX_FUTURE_SKEW_SECONDS
} from './signing.js';
export { toParameterSet, extractSignature, readLaunchParams, SIGNATURE_PARAM } from './parameters.js';

// Platform API
export {
  PlatformClient,
  DEFAULT_API_URL,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_PURCHASE_COUNT
} from './api-client.js';

export type {
  ParameterSet,
  ParameterSource,
  LaunchParams,
  LaunchCheck,
  LaunchCheckOptions,
  Currency,
  Purchase,
  PurchaseStatus,
  PurchaseListOptions,
  CreatePurchaseInput,
  PlatformClientConfig
} from './types.js';

// Error handling
export { PlatformError, PlatformErrorCode } from './types.js';

// Logging
export * from './logger.js';
