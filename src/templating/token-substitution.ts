/**
 * Token Substitution Engine.
 *
 * Resolves `{{KEY}}` placeholders in dashboard text against a context built
 * from the request. Unknown keys stay verbatim by default; the `strict`
 * policy turns them into a ValidationError instead.
 */

import { ValidationError, unresolvedTokenError } from '../domain/errors';
import { DashboardTextFields } from '../domain/remote';
import { ProvisionRequest } from '../domain/request';

/** How unknown placeholder keys are treated. */
export type TokenPolicy = 'lenient' | 'strict';

export type TokenContext = Readonly<Record<string, string>>;

const PLACEHOLDER_PATTERN = /\{\{([A-Za-z0-9_]+)\}\}/g;

/** Text fields of a dashboard after substitution, plus what was left over. */
export interface ResolvedDashboardText {
  fields: DashboardTextFields;
  unresolvedTokens: string[];
}

/**
 * Build the substitution context for a request. Caller tokens are applied
 * last and win over the built-in keys.
 */
export function buildTokenContext(
  request: Pick<ProvisionRequest, 'projectId' | 'ancestryPath' | 'tokens'>,
): TokenContext {
  return Object.freeze({
    PROJECT_ID: request.projectId,
    ANCESTRY_PATH: request.ancestryPath ?? '',
    ...request.tokens,
  });
}

function hasKey(context: TokenContext, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(context, key);
}

/** Replace every known `{{KEY}}` in `text`. */
export function substituteTokens(text: string, context: TokenContext): string {
  return text.replace(PLACEHOLDER_PATTERN, (placeholder: string, key: string) =>
    hasKey(context, key) ? context[key] : placeholder,
  );
}

/** Keys referenced by `text` that the context cannot resolve, in first-seen order. */
export function findUnresolvedTokens(text: string, context: TokenContext): string[] {
  const unresolved: string[] = [];
  for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
    const key = match[1];
    if (!hasKey(context, key) && !unresolved.includes(key)) {
      unresolved.push(key);
    }
  }
  return unresolved;
}

/**
 * Apply substitution to a dashboard's text fields.
 * Under the strict policy the first field with unknown keys throws.
 */
export function resolveDashboardText(
  fields: DashboardTextFields,
  context: TokenContext,
  policy: TokenPolicy = 'lenient',
): ResolvedDashboardText {
  const unresolvedTokens: string[] = [];

  for (const field of ['title', 'description'] as const) {
    const missing = findUnresolvedTokens(fields[field], context);
    if (missing.length > 0 && policy === 'strict') {
      throw new ValidationError(unresolvedTokenError(missing, field));
    }
    for (const key of missing) {
      if (!unresolvedTokens.includes(key)) unresolvedTokens.push(key);
    }
  }

  return {
    fields: {
      title: substituteTokens(fields.title, context),
      description: substituteTokens(fields.description, context),
    },
    unresolvedTokens,
  };
}
