import type { FastifyReply, FastifyRequest } from 'fastify';
import type { HttpError } from './httpError';
import { mapToHttpError } from './mapper';

export type ErrorBody = {
  statusCode: number;
  error: string;
  message: string;
  details?: unknown;
};

/** Response body for a mapped error. Details are only echoed back to clients on 4xx. */
export function toErrorBody(httpError: HttpError): ErrorBody {
  const body: ErrorBody = {
    statusCode: httpError.statusCode,
    error: httpError.code,
    message: httpError.message
  };
  if (httpError.statusCode < 500 && httpError.details !== undefined) {
    body.details = httpError.details;
  }
  return body;
}

export function createHttpErrorHandler() {
  return function queryErrorHandler(error: Error, request: FastifyRequest, reply: FastifyReply): void {
    const httpError = mapToHttpError(error);
    const route = { method: request.method, url: request.url };

    if (httpError.statusCode >= 500) {
      request.log.error({ err: error, ...route }, 'query request failed');
    } else {
      request.log.info({ ...route, code: httpError.code, reason: httpError.message }, 'query request rejected');
    }

    if (!reply.sent) {
      reply.status(httpError.statusCode).send(toErrorBody(httpError));
    }
  };
}
