import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { InputError } from '../../pipeline/errors';

export class ApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export function createError(
  message: string,
  statusCode: number = 500,
  code?: string
): ApiError {
  return new ApiError(message, statusCode, code);
}

function toApiError(error: FastifyError | Error): ApiError {
  if (error instanceof ApiError) {
    return error;
  }
  if (error instanceof InputError) {
    return new ApiError(error.message, 400, 'INVALID_INPUT');
  }
  if (error instanceof ZodError) {
    const detail = error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
    return new ApiError(`Invalid request: ${detail}`, 400, 'VALIDATION_ERROR');
  }
  const statusCode = 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : 500;
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return new ApiError(error.message || 'Internal Server Error', statusCode, code);
}

export async function errorHandler(
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply
) {
  const apiError = toApiError(error);

  if (apiError.statusCode >= 500) {
    request.log.error(error, 'Request error');
  } else {
    request.log.warn({ err: error }, 'Request rejected');
  }

  reply.status(apiError.statusCode).send({
    error: {
      message: apiError.message,
      code: apiError.code || 'INTERNAL_ERROR',
      statusCode: apiError.statusCode,
    },
  });
}
