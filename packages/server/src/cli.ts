#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { signLaunchParams } from '@tonplace-miniapp/sdk';
import { startServer } from './index.js';
import { loadConfig } from './config.js';
import { serverLogger } from './utils/logger.js';

const logger = serverLogger.child('cli');
const program = new Command();

program
  .name('tonplace-miniapp')
  .description('Ton.Place mini app backend')
  .version(process.env.npm_package_version ?? '0.1.0');

program
  .command('start')
  .description('Start the mini app server')
  .option('-p, --port <number>', 'Port to listen on')
  .option('-h, --host <string>', 'Host to bind to')
  .option('--api-url <string>', 'Ton.Place API base URL')
  .option('--max-age <seconds>', 'Launch signature max age in seconds')
  .action(async (options: { port?: string; host?: string; apiUrl?: string; maxAge?: string }) => {
    // CLI options override the environment
    if (options.port) process.env.PORT = options.port;
    if (options.host) process.env.HOST = options.host;
    if (options.apiUrl) process.env.TON_PLACE_API_URL = options.apiUrl;
    if (options.maxAge) process.env.SIGNATURE_MAX_AGE = options.maxAge;

    try {
      await startServer();
    } catch (error) {
      logger.error('Failed to start server', error);
      process.exit(1);
    }
  });

program
  .command('health')
  .description('Check if a running server is healthy')
  .option('--url <string>', 'Server URL', 'http://localhost:8080')
  .action(async (options: { url: string }) => {
    try {
      const response = await fetch(`${options.url.replace(/\/+$/, '')}/api/health`);
      const health: unknown = await response.json();

      logger.info('Health check', { status: response.status, health });

      if (typeof health === 'object' && health !== null && 'status' in health && health.status === 'healthy') {
        logger.info('Server is healthy');
        process.exit(0);
      }
      logger.warn('Server is not healthy');
      process.exit(1);
    } catch (error) {
      logger.error('Failed to check server health', error);
      process.exit(1);
    }
  });

program
  .command('config')
  .description('Show current configuration')
  .action(() => {
    const config = loadConfig();
    logger.info('Current configuration', {
      ...config,
      appSecret: config.appSecret ? '********' : ''
    });
  });

program
  .command('sign-url')
  .description('Print a launch URL signed with APP_SECRET, for local development')
  .requiredOption('--user-id <id>', 'User id to launch as')
  .option('--ts <seconds>', 'Launch timestamp (defaults to now)')
  .option('--first-name <name>', 'First name')
  .option('--last-name <name>', 'Last name')
  .option('--base-url <url>', 'Page URL', 'http://localhost:8080/')
  .action((options: { userId: string; ts?: string; firstName?: string; lastName?: string; baseUrl: string }) => {
    const config = loadConfig();
    const params = signLaunchParams(
      {
        app_id: config.appId,
        user_id: options.userId,
        ts: options.ts ?? String(Math.floor(Date.now() / 1000)),
        first_name: options.firstName,
        last_name: options.lastName
      },
      config.appSecret
    );

    const url = new URL(options.baseUrl);
    url.search = params.toString();
    process.stdout.write(`${url.toString()}\n`);
  });

program.parseAsync().catch((error: unknown) => {
  logger.error('Command failed', error);
  process.exit(1);
});
