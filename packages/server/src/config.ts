import { DEFAULT_API_URL, DEFAULT_MAX_AGE_SECONDS, DEFAULT_PURCHASE_COUNT, DEFAULT_TIMEOUT_MS } from '@tonplace-miniapp/sdk';
import { ServerConfig } from './types.js';

export const PLACEHOLDER_APP_ID = 'YOUR_APP_ID';
export const PLACEHOLDER_APP_SECRET = 'YOUR_APP_SECRET';

const LOG_LEVELS: ReadonlyArray<ServerConfig['logLevel']> = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];

function parseLogLevel(value: string | undefined): ServerConfig['logLevel'] {
  const normalized = value?.toLowerCase();
  return LOG_LEVELS.find(level => level === normalized) ?? 'info';
}

/**
 * Loads configuration from environment variables with defaults
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServerConfig => {
  return {
    port: parseInt(env.PORT || '8080', 10),
    host: env.HOST || '0.0.0.0',
    appId: env.APP_ID || PLACEHOLDER_APP_ID,
    appSecret: env.APP_SECRET || PLACEHOLDER_APP_SECRET,
    apiUrl: env.TON_PLACE_API_URL || DEFAULT_API_URL,
    signatureMaxAge: parseInt(env.SIGNATURE_MAX_AGE || String(DEFAULT_MAX_AGE_SECONDS), 10),
    apiTimeout: parseInt(env.API_TIMEOUT || String(DEFAULT_TIMEOUT_MS), 10),
    purchaseHistoryLimit: parseInt(env.PURCHASE_HISTORY_LIMIT || String(DEFAULT_PURCHASE_COUNT), 10),
    rateLimitRequests: parseInt(env.RATE_LIMIT_REQUESTS || '60', 10),
    rateLimitWindow: parseInt(env.RATE_LIMIT_WINDOW || '60000', 10), // 60 seconds in milliseconds
    corsOrigin: env.CORS_ORIGIN || undefined,
    httpProxyCount: parseInt(env.HTTP_PROXY_COUNT || '0', 10),
    logLevel: parseLogLevel(env.LOG_LEVEL)
  };
};

/**
 * Validates the configuration
 */
export const validateConfig = (config: ServerConfig): void => {
  if (!Number.isInteger(config.port) || config.port <= 0 || config.port > 65535) {
    throw new Error('Invalid port number');
  }

  if (!config.appId || !config.appSecret) {
    throw new Error('APP_ID and APP_SECRET must not be empty');
  }

  try {
    new URL(config.apiUrl);
  } catch {
    throw new Error(`Invalid API URL: ${config.apiUrl}`);
  }

  if (!Number.isInteger(config.signatureMaxAge) || config.signatureMaxAge <= 0 || config.signatureMaxAge > 86400) {
    throw new Error('Signature max age must be between 1 second and 24 hours (in seconds)');
  }

  if (!Number.isInteger(config.apiTimeout) || config.apiTimeout < 1000 || config.apiTimeout > 60000) {
    throw new Error('API timeout must be between 1 and 60 seconds (in milliseconds)');
  }

  if (
    !Number.isInteger(config.purchaseHistoryLimit) ||
    config.purchaseHistoryLimit < 1 ||
    config.purchaseHistoryLimit > 100
  ) {
    throw new Error('Purchase history limit must be between 1 and 100');
  }

  if (!Number.isInteger(config.rateLimitRequests) || config.rateLimitRequests < 1) {
    throw new Error('Rate limit requests must be a positive integer');
  }

  if (config.rateLimitWindow < 1000 || config.rateLimitWindow > 3600000) {
    throw new Error('Rate limit window must be between 1 second and 1 hour (in milliseconds)');
  }

  if (!Number.isInteger(config.httpProxyCount) || config.httpProxyCount < 0) {
    throw new Error('HTTP proxy count must be a non-negative integer');
  }
};

/**
 * True while the credentials are still the placeholders shipped in `.env.example`
 */
export const hasPlaceholderCredentials = (config: ServerConfig): boolean =>
  config.appId === PLACEHOLDER_APP_ID || config.appSecret === PLACEHOLDER_APP_SECRET;
