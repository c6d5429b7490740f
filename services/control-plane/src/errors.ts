import { ZodError } from 'zod';
import { InvalidSessionError, SessionNotFoundError } from '@flowbench/shared';

export class HttpError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(statusCode: number, code: string, message: string) {
    super(message);
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.code = code;
  }
}

export interface ErrorResponse {
  statusCode: number;
  error: string;
  message: string;
  details?: unknown;
}

function hasStatusCode(error: unknown): error is { statusCode: number; message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

export const mapErrorToResponse = (error: unknown): ErrorResponse => {
  if (error instanceof HttpError) {
    return { statusCode: error.statusCode, error: error.code, message: error.message };
  }

  if (error instanceof SessionNotFoundError) {
    return { statusCode: 404, error: 'not_found', message: error.message };
  }

  if (error instanceof InvalidSessionError) {
    return { statusCode: 400, error: 'invalid_request', message: error.message };
  }

  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      error: 'invalid_request',
      message: 'Request validation failed',
      details: error.flatten()
    };
  }

  // Fastify's own client errors (malformed JSON, unsupported media type).
  if (hasStatusCode(error) && error.statusCode >= 400 && error.statusCode < 500) {
    return { statusCode: error.statusCode, error: 'invalid_request', message: error.message };
  }

  return {
    statusCode: 500,
    error: 'internal_error',
    message: 'Unexpected error'
  };
};
