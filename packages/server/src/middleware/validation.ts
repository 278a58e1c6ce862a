import { body, validationResult } from 'express-validator';
import { Request, Response, NextFunction } from 'express';
import { ServerError, ServerErrorCode } from '../types.js';

/** The platform rejects longer purchase titles */
export const MAX_TITLE_LENGTH = 150;

/**
 * Validation rules for purchase creation
 */
export const validateCreatePurchase = [
  body('amount')
    .isInt({ min: 1, max: Number.MAX_SAFE_INTEGER })
    .withMessage('amount must be a positive integer (minor units)')
    .bail()
    .toInt(),

  body('title')
    .isString()
    .withMessage('title is required')
    .bail()
    .notEmpty()
    .withMessage('title is required')
    .bail()
    .isLength({ max: MAX_TITLE_LENGTH })
    .withMessage(`title must be ${MAX_TITLE_LENGTH} characters or less`)
];

/**
 * Middleware to handle validation errors
 */
export const handleValidationErrors = (req: Request, res: Response, next: NextFunction) => {
  const errors = validationResult(req);

  if (!errors.isEmpty()) {
    const firstError = errors.array()[0];
    throw new ServerError(
      ServerErrorCode.INVALID_REQUEST,
      `Validation error: ${String(firstError.msg)}`,
      400,
      {
        field: 'path' in firstError ? firstError.path : 'unknown'
      }
    );
  }

  next();
};
