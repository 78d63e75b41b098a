import { ZodError } from 'zod';
import { AppError } from './AppError';

/** body-parser attaches `status` / `type` to the errors it raises. */
export function bodyParserStatus(error: unknown): number | undefined {
  if (!(error instanceof Error) || !('status' in error) || !('type' in error)) {
    return undefined;
  }
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

/**
 * Status an error is answered with. The error handler responds with it and
 * the HTTP metrics record it when no response was sent.
 */
export function statusCodeForError(error: unknown): number {
  if (error instanceof AppError) return error.statusCode;
  if (error instanceof ZodError) return 400;
  return bodyParserStatus(error) ?? 500;
}
