/**
 * AppError - HTTP-facing application error
 *
 * Carries the status code the error handler should answer with, plus a
 * stable machine-readable code. The metrics middleware also reads
 * `statusCode` to label failed requests.
 *
 * @example
 * throw AppError.notFound('User 42 not found');
 * throw AppError.badRequest('Amount does not match order', { orderId: 7 });
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code?: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  /** 400 - invalid input or a reference to something that does not exist */
  static badRequest(message: string, details?: unknown): AppError {
    return new AppError(message, 400, 'BAD_REQUEST', details);
  }

  /** 402 - payment declined by the (simulated) processor */
  static paymentRequired(message: string, details?: unknown): AppError {
    return new AppError(message, 402, 'PAYMENT_DECLINED', details);
  }

  static notFound(message: string = 'Not found'): AppError {
    return new AppError(message, 404, 'NOT_FOUND');
  }

  /** 409 - the resource is not in a state that allows the operation */
  static conflict(message: string, details?: unknown): AppError {
    return new AppError(message, 409, 'CONFLICT', details);
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }
}
