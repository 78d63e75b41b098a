/**
 * Request Validation Middleware
 *
 * Validates `req.body` against a Zod schema and returns a structured 400
 * on failure. Path parameters are parsed in the controllers, where a
 * `ZodError` reaches the error handler as a 400 as well.
 *
 * @example
 * { method: 'post', path: '/api/v1/users', handlers: [validateBody(createUserSchema), users.createUser] }
 */

import type { Request, Response, NextFunction } from 'express';
import type { ZodType, ZodError } from 'zod';

export interface FieldError {
  field: string;
  message: string;
}

export function formatZodErrors(error: ZodError): FieldError[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.') || '(root)',
    message: issue.message,
  }));
}

/**
 * On success the parsed (coerced / defaulted) data replaces `req.body`
 * so downstream handlers get typed values.
 */
export function validateBody<T>(schema: ZodType<T>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      res.status(400).json({
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        details: formatZodErrors(result.error),
      });
      return;
    }
    req.body = result.data;
    next();
  };
}
