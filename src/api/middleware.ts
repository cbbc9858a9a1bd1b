/**
 * API middleware: error handling and HTTP status mapping.
 */

import { Request, Response, NextFunction } from 'express';
import { apiError, createTypedError, internalError, TypedError, validationError } from '../domain/errors';
import { logger } from '../logger';

/** An error carrying a TypedError, raised from a route handler. */
export class ApiError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'ApiError';
  }
}

/** Map a typed error code to its HTTP status. */
export function httpStatusForCode(code: string): number {
  if (code.startsWith('AUTH.')) return 401;
  if (code === 'VALIDATION.SCHEMA') return 400;
  if (code.startsWith('VALIDATION.')) return 422;
  if (code.startsWith('ADMISSION.')) return 409;
  if (code.startsWith('RATE_LIMIT.')) return 429;
  if (code === 'PROVISION.NOT_FOUND') return 404;
  if (code.startsWith('GENERATION.')) return 502;
  if (code.startsWith('PROVISION.')) return 502;
  if (code.startsWith('PUBLISH.')) return 502;
  return 500;
}

/** Errors raised by express.json() carry a status and a type. */
function isBodyParserError(err: unknown): err is Error & { status: number; type: string } {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    'type' in err &&
    typeof err.type === 'string'
  );
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof ApiError) {
    const status = httpStatusForCode(err.typedError.code);
    logger.warn('Request error', { code: err.typedError.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  if (isBodyParserError(err)) {
    if (err.type === 'entity.too.large') {
      res.status(413).json(apiError(createTypedError({
        code: 'VALIDATION.PAYLOAD_TOO_LARGE',
        message: 'Request body is too large',
      })));
      return;
    }
    res.status(400).json(apiError(validationError('Request body is not valid JSON')));
    return;
  }

  logger.error('Unhandled request error', {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });

  // Internal detail stays in the log.
  res.status(500).json(apiError(internalError()));
}
