/**
 * Payload Validator.
 *
 * Turns the raw bytes of an inbound event into a frozen ProvisionRequest.
 * All field errors are collected before reporting, in schema field order.
 */

import { TextDecoder } from 'util';
import { TypedError, ValidationError, createTypedError } from '../domain/errors';
import { ProvisionPayload, ProvisionRequest } from '../domain/request';
import { PROJECT_ID_PATTERN, REQUIRED_PAYLOAD_FIELDS, TOKEN_KEY_PATTERN } from './schema';

/** Validation result. */
export interface PayloadValidationResult {
  valid: boolean;
  errors: TypedError[];
  request?: ProvisionRequest;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fieldError(code: string, field: string, message: string): TypedError {
  return createTypedError({
    code,
    message: `${field}: ${message}`,
    retryable: false,
    details: { field },
  });
}

/**
 * Decode raw input into a JSON value. Strings and byte buffers are parsed;
 * anything else is assumed to be JSON already.
 */
export function decodePayload(raw: unknown): { value?: unknown; error?: TypedError } {
  let text: string;
  if (raw instanceof Uint8Array) {
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(raw);
    } catch {
      return { error: createTypedError({ code: 'VALIDATION.ENCODING', message: 'Payload is not valid UTF-8', retryable: false }) };
    }
  } else if (typeof raw === 'string') {
    text = raw;
  } else {
    return { value: raw };
  }

  try {
    return { value: JSON.parse(text) };
  } catch (err) {
    return {
      error: createTypedError({
        code: 'VALIDATION.MALFORMED_JSON',
        message: `Payload is not valid JSON: ${err instanceof Error ? err.message : 'parse error'}`,
        retryable: false,
      }),
    };
  }
}

/** Template and folder of a single-dashboard clone, with the request they belong to. */
export interface DashboardTarget {
  readonly request: ProvisionRequest;
  readonly templateId: number;
  readonly folderId: number;
}

export interface DashboardTargetValidationResult {
  valid: boolean;
  errors: TypedError[];
  target?: DashboardTarget;
}

/** Validate a raw payload without throwing. */
export function validateProvisionPayload(raw: unknown): PayloadValidationResult {
  const decoded = decodePayload(raw);
  if (decoded.error) {
    return { valid: false, errors: [decoded.error] };
  }
  if (!isRecord(decoded.value)) {
    return {
      valid: false,
      errors: [createTypedError({ code: 'VALIDATION.NOT_AN_OBJECT', message: 'Payload must be a JSON object', retryable: false })],
    };
  }

  const body = decoded.value;
  const payload: ProvisionPayload = {
    projectId: body.projectId,
    groupEmail: body.groupEmail,
    ancestryPath: body.ancestryPath,
    templateDashboardIds: body.templateDashboardIds,
    templateFolderId: body.templateFolderId,
    tokens: body.tokens,
  };
  const errors: TypedError[] = [];

  validateRequiredFields(payload, errors);
  const projectId = validateProjectId(payload.projectId, errors);
  const groupEmail = validateGroupEmail(payload.groupEmail, errors);
  const ancestryPath = validateAncestryPath(payload.ancestryPath, errors);
  const templateDashboardIds = validateTemplateDashboardIds(payload.templateDashboardIds, errors);
  const templateFolderId = validateTemplateFolderId(payload.templateFolderId, errors);
  const tokens = validateTokens(payload.tokens, errors);

  if (errors.length > 0 || projectId === undefined || groupEmail === undefined) {
    return { valid: false, errors };
  }

  const request: ProvisionRequest = Object.freeze({
    projectId,
    groupEmail,
    ...(ancestryPath !== undefined ? { ancestryPath } : {}),
    ...(templateDashboardIds !== undefined ? { templateDashboardIds: Object.freeze(templateDashboardIds) } : {}),
    ...(templateFolderId !== undefined ? { templateFolderId } : {}),
    tokens: Object.freeze(tokens),
  });

  return { valid: true, errors: [], request };
}

/**
 * Parse and validate a raw payload.
 * Throws ValidationError carrying every field error, joined with "; ".
 */
export function parseProvisionPayload(raw: unknown): ProvisionRequest {
  const result = validateProvisionPayload(raw);
  if (!result.valid || !result.request) {
    throw validationFailure(result.errors);
  }
  return result.request;
}

/**
 * Validate a single-dashboard payload: the provisioning fields plus a
 * required `templateDashboardId` and `folderId`. Does not throw.
 */
export function validateDashboardTarget(raw: unknown): DashboardTargetValidationResult {
  const base = validateProvisionPayload(raw);
  const decoded = decodePayload(raw);
  if (decoded.error || !isRecord(decoded.value)) {
    return { valid: false, errors: base.errors };
  }

  const errors = [...base.errors];
  const templateId = validateRequiredId(decoded.value.templateDashboardId, 'templateDashboardId', errors);
  const folderId = validateRequiredId(decoded.value.folderId, 'folderId', errors);

  if (errors.length > 0 || !base.request || templateId === undefined || folderId === undefined) {
    return { valid: false, errors };
  }
  return { valid: true, errors: [], target: Object.freeze({ request: base.request, templateId, folderId }) };
}

/** Parse a single-dashboard payload. Throws ValidationError like parseProvisionPayload. */
export function parseDashboardTarget(raw: unknown): DashboardTarget {
  const result = validateDashboardTarget(raw);
  if (!result.valid || !result.target) {
    throw validationFailure(result.errors);
  }
  return result.target;
}

function validationFailure(errors: TypedError[]): ValidationError {
  return new ValidationError(
    createTypedError({
      code: errors.length === 1 ? errors[0].code : 'VALIDATION.SCHEMA',
      message: errors.map((e) => e.message).join('; '),
      retryable: false,
      details: { errors: errors.map((e) => ({ code: e.code, message: e.message, ...e.details })) },
    }),
  );
}

function validateRequiredFields(payload: ProvisionPayload, errors: TypedError[]): void {
  for (const field of REQUIRED_PAYLOAD_FIELDS) {
    if (payload[field] === undefined || payload[field] === null) {
      errors.push(fieldError('VALIDATION.REQUIRED_FIELD', field, 'is required'));
    }
  }
}

function validateProjectId(value: unknown, errors: TypedError[]): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    errors.push(fieldError('VALIDATION.INVALID_TYPE', 'projectId', 'must be a string'));
    return undefined;
  }
  if (!PROJECT_ID_PATTERN.test(value)) {
    errors.push(
      fieldError(
        'VALIDATION.INVALID_PROJECT_ID',
        'projectId',
        'must be 6-63 characters of lowercase letters, digits or hyphens, start with a letter and end with a letter or digit',
      ),
    );
    return undefined;
  }
  return value;
}

function validateGroupEmail(value: unknown, errors: TypedError[]): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    errors.push(fieldError('VALIDATION.INVALID_TYPE', 'groupEmail', 'must be a string'));
    return undefined;
  }
  const parts = value.split('@');
  if (parts.length !== 2 || parts[0].length === 0 || parts[1].length === 0 || /\s/.test(value)) {
    errors.push(
      fieldError('VALIDATION.INVALID_EMAIL', 'groupEmail', 'must contain exactly one "@" with a non-empty local part and domain'),
    );
    return undefined;
  }
  return value;
}

function validateAncestryPath(value: unknown, errors: TypedError[]): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    errors.push(fieldError('VALIDATION.INVALID_TYPE', 'ancestryPath', 'must be a string'));
    return undefined;
  }
  return value;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function validateTemplateDashboardIds(value: unknown, errors: TypedError[]): number[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) {
    errors.push(fieldError('VALIDATION.INVALID_TYPE', 'templateDashboardIds', 'must be an array of positive integers'));
    return undefined;
  }
  if (value.length === 0) {
    errors.push(fieldError('VALIDATION.EMPTY_TEMPLATES', 'templateDashboardIds', 'must not be empty when present'));
    return undefined;
  }
  const ids: number[] = [];
  value.forEach((item: unknown, index) => {
    if (isPositiveInteger(item)) {
      ids.push(item);
    } else {
      errors.push(
        fieldError('VALIDATION.INVALID_TEMPLATE_ID', `templateDashboardIds[${index}]`, 'must be a positive integer'),
      );
    }
  });
  return ids.length === value.length ? ids : undefined;
}

function validateTemplateFolderId(value: unknown, errors: TypedError[]): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isPositiveInteger(value)) {
    errors.push(fieldError('VALIDATION.INVALID_TEMPLATE_FOLDER', 'templateFolderId', 'must be a positive integer'));
    return undefined;
  }
  return value;
}

function validateRequiredId(value: unknown, field: string, errors: TypedError[]): number | undefined {
  if (value === undefined || value === null) {
    errors.push(fieldError('VALIDATION.REQUIRED_FIELD', field, 'is required'));
    return undefined;
  }
  if (!isPositiveInteger(value)) {
    errors.push(fieldError('VALIDATION.INVALID_ID', field, 'must be a positive integer'));
    return undefined;
  }
  return value;
}

function validateTokens(value: unknown, errors: TypedError[]): Record<string, string> {
  const tokens: Record<string, string> = {};
  if (value === undefined || value === null) return tokens;
  if (!isRecord(value)) {
    errors.push(fieldError('VALIDATION.INVALID_TYPE', 'tokens', 'must be an object of string values'));
    return tokens;
  }
  for (const [key, tokenValue] of Object.entries(value)) {
    if (!TOKEN_KEY_PATTERN.test(key)) {
      errors.push(fieldError('VALIDATION.INVALID_TOKEN_KEY', `tokens.${key}`, 'key must match [A-Za-z0-9_]+'));
      continue;
    }
    if (typeof tokenValue !== 'string') {
      errors.push(fieldError('VALIDATION.INVALID_TOKEN_VALUE', `tokens.${key}`, 'value must be a string'));
      continue;
    }
    tokens[key] = tokenValue;
  }
  return tokens;
}
