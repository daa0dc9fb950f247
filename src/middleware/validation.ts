import { param, validationResult } from 'express-validator';
import { Request, Response, NextFunction } from 'express';

/**
 * Middleware to handle validation errors
 */
export const handleValidationErrors = (req: Request, res: Response, next: NextFunction) => {
  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    const [first] = errors.array();
    return res.status(400).json({
      success: false,
      error: {
        kind: 'validation',
        message: String(first.msg),
      },
    });
  }
  next();
};

/**
 * Spooler job ids are positive integers.
 */
export const jobIdParam = () =>
  param('id')
    .isInt({ min: 1 })
    .withMessage('Job id must be a positive integer')
    .toInt();
