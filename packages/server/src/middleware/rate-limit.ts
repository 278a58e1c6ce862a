import rateLimit from 'express-rate-limit';
import type { Request, Response } from 'express';
import { ErrorResponse, ServerErrorCode } from '../types.js';

/**
 * Creates rate limiting middleware
 *
 * @param requests Requests allowed per window and client IP
 * @param windowMs Window length in milliseconds
 */
export const createRateLimit = (requests: number, windowMs: number) => {
  const message = `Too many requests, limit is ${requests} requests per ${Math.round(windowMs / 1000)} seconds`;

  return rateLimit({
    windowMs,
    limit: requests,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req: Request, res: Response) => {
      const response: ErrorResponse = {
        error: ServerErrorCode.RATE_LIMIT_EXCEEDED,
        message
      };
      res.status(429).json(response);
    }
  });
};
