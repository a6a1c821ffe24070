import { ZodError } from 'zod';
import { InvalidIntervalError } from '../query/intervalResolver';
import { HttpError, toHttpError } from './httpError';

export const INTERNAL_ERROR_MESSAGE = 'Internal server error';

export function mapToHttpError(err: unknown): HttpError {
  if (err instanceof HttpError) {
    return err;
  }

  if (err instanceof InvalidIntervalError) {
    return new HttpError(400, 'invalid_interval', err.message);
  }

  if (err instanceof ZodError) {
    return new HttpError(400, 'invalid_request', 'Invalid request parameters', err.flatten());
  }

  const httpLike = toHttpError(err);
  if (httpLike && httpLike.statusCode < 500) {
    return httpLike;
  }

  // Storage and driver failures never leak their messages to callers.
  return new HttpError(500, 'internal_error', INTERNAL_ERROR_MESSAGE);
}
