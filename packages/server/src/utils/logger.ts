/**
 * Server Logger
 */

import { Request, Response, NextFunction } from 'express';
import { Logger } from '@tonplace-miniapp/sdk';

/**
 * HTTP request context for structured logging
 */
export interface HttpContext extends Record<string, unknown> {
  method: string;
  path: string;
  statusCode: number;
  duration: number;
  ip?: string;
  userAgent?: string;
  userId?: string;
}

/**
 * Create the root server logger
 */
export function createServerLogger(): Logger {
  const logger = new Logger({
    context: 'miniapp-server'
  });

  logger.addMetadata({
    service: 'tonplace-miniapp',
    version: process.env.npm_package_version ?? 'unknown',
    environment: process.env.NODE_ENV ?? 'production',
    node_version: process.version
  });

  return logger;
}

/**
 * Global server logger instance
 */
export const serverLogger = createServerLogger();

/**
 * Create a logger for a specific component
 */
export function createLogger(component: string, metadata?: Record<string, unknown>): Logger {
  return serverLogger.child(component, metadata);
}

/**
 * Express middleware for request logging. Logs the path only: the query
 * string carries the launch signature.
 */
export function requestLogger(logger: Logger) {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const context: HttpContext = {
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        duration: Date.now() - start,
        ip: req.ip,
        userAgent: req.get('user-agent')
      };

      const launch: unknown = res.locals.launch;
      if (typeof launch === 'object' && launch !== null && 'userId' in launch && typeof launch.userId === 'string') {
        context.userId = launch.userId;
      }

      const message = `${req.method} ${req.path} ${res.statusCode}`;
      if (res.statusCode >= 500) {
        logger.error(message, undefined, context);
      } else if (res.statusCode >= 400) {
        logger.warn(message, context);
      } else {
        logger.info(message, context);
      }
    });

    next();
  };
}
