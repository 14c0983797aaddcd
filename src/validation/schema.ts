/**
 * Payload schema constants for provisioning requests.
 */

/**
 * Project ids are DNS-label-like: a lowercase letter, then lowercase
 * letters, digits or hyphens, ending in a letter or digit, 6-63 chars.
 */
export const PROJECT_ID_PATTERN = /^[a-z][a-z0-9-]{4,61}[a-z0-9]$/;

/** Token keys accepted in `tokens` and inside `{{...}}` placeholders. */
export const TOKEN_KEY_PATTERN = /^[A-Za-z0-9_]+$/;

/** Fields that must be present on every payload. */
export const REQUIRED_PAYLOAD_FIELDS = ['projectId', 'groupEmail'] as const;

