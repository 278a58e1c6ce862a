import { Request, Response, NextFunction } from 'express';
import { ServerError, ServerErrorCode, ErrorResponse } from '../types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ErrorHandler');

function isBodyParserSyntaxError(err: Error): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): Response => {
  if (err instanceof ServerError) {
    if (err.statusCode >= 500) {
      logger.error('Request error', err, { path: req.path, method: req.method, ip: req.ip });
    } else {
      logger.debug('Request rejected', { code: err.code, path: req.path, method: req.method });
    }

    const response: ErrorResponse = {
      error: err.code,
      message: err.message,
      details: err.details
    };

    return res.status(err.statusCode).json(response);
  }

  if (isBodyParserSyntaxError(err)) {
    const response: ErrorResponse = {
      error: ServerErrorCode.INVALID_REQUEST,
      message: 'Invalid JSON in request body'
    };

    return res.status(400).json(response);
  }

  logger.error('Unhandled request error', err, {
    path: req.path,
    method: req.method,
    ip: req.ip,
    userAgent: req.get('User-Agent')
  });

  const response: ErrorResponse = {
    error: ServerErrorCode.INTERNAL_ERROR,
    message: 'Internal server error'
  };

  return res.status(500).json(response);
};

/**
 * 404 handler for unknown routes
 */
export const notFoundHandler = (req: Request, res: Response) => {
  const response: ErrorResponse = {
    error: ServerErrorCode.NOT_FOUND,
    message: `Route ${req.method} ${req.path} not found`
  };

  res.status(404).json(response);
};
