/**
 * API Middleware — error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { TypedError, createTypedError, errorDomain, toTypedError } from '../domain/errors';
import { errorResponseFrom } from '../engine/reporter';
import { logger } from '../logger';

function getHttpStatus(error: TypedError, err: unknown): number {
  // body-parser marks its own failures (oversized or unreadable bodies) with a 4xx status
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  switch (errorDomain(error)) {
    case 'VALIDATION':
      return 400;
    case 'PROVISIONING':
      return 502;
    default:
      return 500;
  }
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  let typedError = toTypedError(err);
  const status = getHttpStatus(typedError, err);

  if (status < 500 && typedError.code === 'SYSTEM.INTERNAL') {
    typedError = createTypedError({
      code: 'VALIDATION.REQUEST_BODY',
      message: typedError.message,
      retryable: false,
    });
  }

  if (status >= 500) {
    logger.error('Unhandled request error', {
      code: typedError.code,
      error: typedError.message,
      stack: err instanceof Error ? err.stack : undefined,
    });
  } else {
    logger.warn('Request error', { code: typedError.code, status });
  }

  res.status(status).json(errorResponseFrom(typedError));
}
