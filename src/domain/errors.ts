/**
 * Typed error model for machine-actionable error handling.
 *
 * Every failure that leaves the provisioner is a TypedError. The two
 * exception classes below carry one across the throw boundary so the
 * reporter can translate it into the outbound error shape.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain = 'VALIDATION' | 'PROVISIONING' | 'CONFIG' | 'SYSTEM';

/** Typed suggested fix that agents can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in results and log records. */
export interface TypedError {
  /** Namespaced error code (e.g., "PROVISIONING.DUPLICATE_FOLDER"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Reconciliation stage the error was raised in, if any. */
  stage?: string;
  /**
   * Whether redelivering the same event is expected to succeed without
   * changes. A hint for the transport; nothing here retries on its own.
   */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  stage?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    stage: params.stage,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Extract the domain prefix of an error code. */
export function errorDomain(error: TypedError): ErrorDomain {
  const prefix = error.code.split('.')[0];
  switch (prefix) {
    case 'VALIDATION':
    case 'PROVISIONING':
    case 'CONFIG':
      return prefix;
    default:
      return 'SYSTEM';
  }
}

/** Malformed or invalid input. Never retried. */
export class ValidationError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ValidationError';
  }
}

/** A remote call failed or remote state violates an integrity rule. */
export class ProvisioningError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ProvisioningError';
  }
}

/** A configuration value is missing or malformed. */
export class ConfigError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ConfigError';
  }
}

// --- Common error factory functions ---

export function unresolvedTokenError(keys: string[], field: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.UNRESOLVED_TOKEN',
    message: `Unresolved template tokens in ${field}: ${keys.join(', ')}`,
    retryable: false,
    details: { keys, field },
    suggestedFixes: keys.map((key) => ({
      type: 'PROVIDE_TOKEN',
      params: { key },
      description: `Add "${key}" to the request tokens`,
    })),
  });
}

/**
 * Create a typed error for a failed call against the BI platform, with the
 * retryable hint determined by HTTP status code.
 *
 * - No status (network failure, timeout): retryable.
 * - 429 and 5xx: transient, retryable.
 * - Other 4xx: configuration problems (bad credentials, missing template).
 */
export function remoteCallError(
  operation: string,
  message: string,
  statusCode?: number,
  stage?: string,
): TypedError {
  const retryable = statusCode === undefined || statusCode === 429 || statusCode >= 500;
  const fixes: SuggestedFix[] = [];

  if (statusCode === 404) {
    fixes.push({ type: 'FIX_RESOURCE_NOT_FOUND', params: { statusCode }, description: 'Verify the referenced template or folder id exists.' });
  } else if (statusCode === 401 || statusCode === 403) {
    fixes.push({ type: 'CHECK_CREDENTIALS', params: { statusCode }, description: 'Verify the API client id and secret and their permissions.' });
  } else if (retryable) {
    fixes.push({ type: 'REDELIVER_EVENT', params: {}, description: 'Re-send the same event; completed stages are reused.' });
  }

  return createTypedError({
    code: retryable ? 'PROVISIONING.REMOTE_TRANSIENT' : 'PROVISIONING.REMOTE_REJECTED',
    message: `${operation} failed: ${message}`,
    stage,
    retryable,
    details: statusCode !== undefined ? { operation, statusCode } : { operation },
    suggestedFixes: fixes,
  });
}

export function duplicateFolderError(name: string, folderIds: number[], parentId: number | null): TypedError {
  return createTypedError({
    code: 'PROVISIONING.DUPLICATE_FOLDER',
    message: `Found ${folderIds.length} folders named "${name}"; expected at most one`,
    stage: 'ensure_folder',
    retryable: false,
    details: { name, folderIds, parentId },
    suggestedFixes: [
      { type: 'REMOVE_DUPLICATE_FOLDERS', params: { folderIds }, description: 'Keep one folder and rename or delete the rest' },
    ],
  });
}

export function ambiguousGroupError(name: string, groupIds: number[]): TypedError {
  return createTypedError({
    code: 'PROVISIONING.AMBIGUOUS_GROUP',
    message: `Found ${groupIds.length} groups named "${name}"; strict group matching requires exactly one`,
    stage: 'ensure_group',
    retryable: false,
    details: { name, groupIds },
    suggestedFixes: [
      { type: 'REMOVE_DUPLICATE_GROUPS', params: { groupIds } },
      { type: 'SET_GROUP_MATCH_POLICY', params: { policy: 'lenient' } },
    ],
  });
}

export function accessConfigMergeError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'PROVISIONING.ACCESS_CONFIG_MERGE',
    message,
    stage: 'ensure_access_mapping',
    retryable: false,
    details,
  });
}

export function deadlineExceededError(deadlineMs: number, stage?: string): TypedError {
  return createTypedError({
    code: 'PROVISIONING.DEADLINE_EXCEEDED',
    message: `Provisioning exceeded its deadline of ${deadlineMs}ms`,
    stage,
    retryable: true,
    details: { deadlineMs },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { deadlineMs: deadlineMs * 2 } },
    ],
  });
}

export function internalError(message: string): TypedError {
  return createTypedError({
    code: 'SYSTEM.INTERNAL',
    message,
    retryable: false,
  });
}

/** Wrap anything caught at a boundary into a TypedError. */
export function toTypedError(err: unknown): TypedError {
  if (err instanceof ValidationError || err instanceof ProvisioningError || err instanceof ConfigError) {
    return err.typedError;
  }
  return internalError(err instanceof Error ? err.message : String(err));
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/**
 * Replace each occurrence of the given secrets in a message with its
 * masked form. Returns the message unchanged when none occur.
 */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join sidesteps regex escaping
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}
