import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { ErrorCodes } from '@dataset-lookup/shared';
import { AppError } from '../utils/errors.js';

function sendError(
  reply: FastifyReply,
  statusCode: number,
  code: string,
  message: string,
  field: string | null,
): void {
  reply.status(statusCode).send({
    data: null,
    meta: null,
    errors: [{ code, field, message }],
  });
}

export function errorHandler(
  error: FastifyError | AppError | ZodError | Error,
  request: FastifyRequest,
  reply: FastifyReply,
): void {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      request.log.error({ service: 'ErrorHandler', err: error }, error.message);
    }
    sendError(reply, error.statusCode, error.code, error.message, error.field ?? null);
    return;
  }

  if (error instanceof ZodError) {
    const firstIssue = error.issues[0];
    sendError(
      reply,
      400,
      ErrorCodes.VALIDATION_ERROR,
      firstIssue?.message ?? 'Validation failed',
      firstIssue?.path.join('.') ?? null,
    );
    return;
  }

  // Fastify's own client errors (malformed JSON, unsupported media type) carry a 4xx statusCode
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500) {
    sendError(reply, error.statusCode, ErrorCodes.VALIDATION_ERROR, error.message, null);
    return;
  }

  // Unexpected error: log full detail, send generic message to client
  request.log.error(
    {
      service: 'ErrorHandler',
      err: error,
      requestId: request.id,
      url: request.url,
      method: request.method,
    },
    'Unhandled error',
  );

  sendError(reply, 500, ErrorCodes.INTERNAL_ERROR, 'An unexpected error occurred', null);
}
