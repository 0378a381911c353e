import type { Response } from 'express';
import type { z } from 'zod';

/**
 * Standard validation error response format.
 */
export interface ValidationErrorResponse {
  error: string;
  code: 'VALIDATION_ERROR';
  details: Array<{
    path: string;
    message: string;
  }>;
}

/**
 * Build the validation error body from Zod errors.
 */
export function toValidationErrorResponse(
  error: z.ZodError,
): ValidationErrorResponse {
  return {
    error: 'Validation failed',
    code: 'VALIDATION_ERROR',
    details: error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  };
}

/**
 * Send a consistent validation error response.
 */
export function sendValidationError(
  res: Response,
  error: z.ZodError,
  status: number = 400,
): void {
  res.status(status).json(toValidationErrorResponse(error));
}
