import { PlatformClient } from '@tonplace-miniapp/sdk';
import { ServerConfig } from '../types.js';
import { createLogger } from '../utils/logger.js';

/**
 * The part of the platform API the routes depend on
 */
export type PurchaseApi = Pick<PlatformClient, 'getPurchases' | 'createPurchase'>;

/**
 * Build the platform client from server configuration
 */
export const createPlatformClient = (config: ServerConfig): PlatformClient =>
  new PlatformClient({
    appId: config.appId,
    appSecret: config.appSecret,
    apiUrl: config.apiUrl,
    timeoutMs: config.apiTimeout,
    logger: createLogger('PlatformClient')
  });
