/**
 * Result/Error Reporter.
 *
 * Translates whatever ended an invocation into the outbound response shape
 * shared by every transport.
 */

import { TypedError, errorDomain, toTypedError } from '../domain/errors';
import { ErrorStatus, HandlerResponse, ProvisionErrorResponse } from '../domain/result';

/** Identifiers echoed back on an error response when known. */
export interface ErrorMeta {
  correlationId?: string;
  projectId?: string;
  groupEmail?: string;
}

export function errorStatusFor(error: TypedError): ErrorStatus {
  return errorDomain(error) === 'VALIDATION' ? 'validation_error' : 'error';
}

export function toErrorResponse(err: unknown, meta: ErrorMeta = {}): ProvisionErrorResponse {
  return errorResponseFrom(toTypedError(err), meta);
}

export function errorResponseFrom(error: TypedError, meta: ErrorMeta = {}): ProvisionErrorResponse {
  return {
    status: errorStatusFor(error),
    error: error.message,
    code: error.code,
    retryable: error.retryable,
    ...(meta.correlationId !== undefined ? { correlationId: meta.correlationId } : {}),
    ...(meta.projectId !== undefined ? { projectId: meta.projectId } : {}),
    ...(meta.groupEmail !== undefined ? { groupEmail: meta.groupEmail } : {}),
  };
}

/** HTTP status code for the response of any entry point. */
export function httpStatusFor(response: HandlerResponse<{ status: 'ok' }>): number {
  if (response.status === 'ok') return 200;
  if (response.status === 'validation_error') return 400;
  if (response.code.startsWith('PROVISIONING.')) return 502;
  return 500;
}
