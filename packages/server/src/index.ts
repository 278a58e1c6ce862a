// Load environment variables before any logger reads LOG_LEVEL
import 'dotenv/config';
import type { Server } from 'http';
import { createApp } from './app.js';
import { hasPlaceholderCredentials, loadConfig, validateConfig } from './config.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('Server');

/**
 * Starts the mini app server
 */
const startServer = async (): Promise<Server> => {
  const config = loadConfig();
  validateConfig(config);

  if (hasPlaceholderCredentials(config)) {
    logger.warn('APP_ID / APP_SECRET are still placeholders; set them in .env before going live');
  }

  logger.info('Starting mini app server...', {
    port: config.port,
    host: config.host,
    appId: config.appId,
    apiUrl: config.apiUrl,
    signatureMaxAge: config.signatureMaxAge
  });

  const app = createApp(config);

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(config.port, config.host, () => resolve(listening));
    listening.once('error', reject);
  });

  logger.info(`Mini app server running on http://${config.host}:${config.port}`, {
    page: '/',
    health: '/api/health',
    metrics: '/metrics'
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);

    server.close(() => {
      logger.info('Server closed');
      process.exit(0);
    });

    // Force close after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown');
      process.exit(1);
    }, 10000).unref();
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));

  return server;
};

// Start server if this file is run directly
if (require.main === module) {
  startServer().catch((error: unknown) => {
    logger.error('Failed to start server', error);
    process.exit(1);
  });
}

export { startServer };
export { createApp } from './app.js';
export type { AppDependencies } from './app.js';
export { loadConfig, validateConfig, hasPlaceholderCredentials } from './config.js';
export { PageRenderer, formatAmount, formatTime } from './views/render.js';
export type { Renderer } from './views/render.js';
export type { PurchaseApi } from './services/purchase-api.js';
export * from './types.js';
