import { Router, Request, Response } from 'express';
import { HealthResponse, ServerConfig } from '../types.js';
import { hasPlaceholderCredentials } from '../config.js';

export const SERVER_VERSION = process.env.npm_package_version ?? '0.1.0';

/**
 * Creates health check router
 */
export const createHealthRouter = (config: ServerConfig) => {
  const router = Router();
  const startTime = Date.now();

  router.get('/health', (req: Request, res: Response) => {
    const configured = !hasPlaceholderCredentials(config);

    const response: HealthResponse = {
      status: configured ? 'healthy' : 'degraded',
      version: SERVER_VERSION,
      appId: config.appId,
      configured,
      uptime: Math.floor((Date.now() - startTime) / 1000)
    };

    res.json(response);
  });

  return router;
};
