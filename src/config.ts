/**
 * Provisioner configuration.
 *
 * Read once from the environment at startup. Every malformed value is
 * collected and reported together in a single ConfigError.
 *
 * Usage:
 *   const config = loadConfig();
 *   const client = createRemoteClient(config);
 */

import { ConfigError, createTypedError } from './domain/errors';
import { GroupMatchPolicy } from './engine/stages';
import { LogLevel, parseLogLevel } from './logger';
import { DEFAULT_API_VERSION, HttpRemoteStateClient } from './remote/http-client';
import { TokenPolicy } from './templating/token-substitution';

/** Connection settings for the BI platform API. */
export interface BiConnectionConfig {
  baseUrl: string;
  clientId: string;
  clientSecret: string;
  apiVersion: string;
}

export interface ProvisionerConfig {
  /** Null when the API credentials are not configured. */
  bi: BiConnectionConfig | null;
  defaultTemplateFolderId?: number;
  defaultTemplateDashboardIds: number[];
  /** Parent of project folders; null is the platform root. */
  parentFolderId: number | null;
  groupMatchPolicy: GroupMatchPolicy;
  groupAliasPrefix: string;
  tokenPolicy: TokenPolicy;
  /** Budget for one invocation. Unbounded when unset. */
  deadlineMs?: number;
  port: number;
  logLevel: LogLevel;
}

export type Env = Record<string, string | undefined>;

export const DEFAULT_PORT = 8080;
export const DEFAULT_GROUP_ALIAS_PREFIX = 'group:';

/** Non-empty trimmed value, or undefined. */
function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function parsePositiveInt(env: Env, key: string, errors: string[]): number | undefined {
  const raw = read(env, key);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(value) || value <= 0) {
    errors.push(`${key} must be a positive integer (got "${raw}")`);
    return undefined;
  }
  return value;
}

/** Accepts `1,2,3` or a JSON array `[1, 2, 3]`. */
export function parseIdList(raw: string): number[] | undefined {
  let items: unknown[];
  if (raw.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(raw);
      if (!Array.isArray(parsed)) return undefined;
      items = parsed;
    } catch {
      return undefined;
    }
  } else {
    items = raw.split(',').map((part) => part.trim()).filter((part) => part.length > 0).map(Number);
  }

  const ids: number[] = [];
  for (const item of items) {
    if (typeof item !== 'number' || !Number.isInteger(item) || item <= 0) return undefined;
    ids.push(item);
  }
  return ids;
}

function parseChoice<T extends string>(env: Env, key: string, choices: readonly T[], fallback: T, errors: string[]): T {
  const raw = read(env, key);
  if (raw === undefined) return fallback;
  const normalized = raw.toLowerCase();
  const match = choices.find((choice) => choice === normalized);
  if (!match) {
    errors.push(`${key} must be one of ${choices.join(', ')} (got "${raw}")`);
    return fallback;
  }
  return match;
}

function readConnection(env: Env, errors: string[]): BiConnectionConfig | null {
  const baseUrl = read(env, 'BI_BASE_URL');
  const clientId = read(env, 'BI_CLIENT_ID');
  const clientSecret = read(env, 'BI_CLIENT_SECRET');
  if (!baseUrl && !clientId && !clientSecret) return null;

  if (!baseUrl || !clientId || !clientSecret) {
    const missing = [
      ...(baseUrl ? [] : ['BI_BASE_URL']),
      ...(clientId ? [] : ['BI_CLIENT_ID']),
      ...(clientSecret ? [] : ['BI_CLIENT_SECRET']),
    ];
    errors.push(`${missing.join(', ')} must be set together with the other BI connection settings`);
    return null;
  }
  if (!/^https?:\/\//.test(baseUrl)) {
    errors.push(`BI_BASE_URL must be an http(s) URL (got "${baseUrl}")`);
    return null;
  }
  return { baseUrl, clientId, clientSecret, apiVersion: read(env, 'BI_API_VERSION') ?? DEFAULT_API_VERSION };
}

/** Load configuration from environment variables. Throws ConfigError. */
export function loadConfig(env: Env = process.env): ProvisionerConfig {
  const errors: string[] = [];

  const bi = readConnection(env, errors);
  const defaultTemplateFolderId = parsePositiveInt(env, 'DEFAULT_TEMPLATE_FOLDER_ID', errors);

  let defaultTemplateDashboardIds: number[] = [];
  const rawIds = read(env, 'DEFAULT_TEMPLATE_DASHBOARD_IDS');
  if (rawIds !== undefined) {
    const ids = parseIdList(rawIds);
    if (ids) {
      defaultTemplateDashboardIds = ids;
    } else {
      errors.push(`DEFAULT_TEMPLATE_DASHBOARD_IDS must list positive integers (got "${rawIds}")`);
    }
  }

  const parentFolderId = parsePositiveInt(env, 'PARENT_FOLDER_ID', errors) ?? null;
  const groupMatchPolicy = parseChoice<GroupMatchPolicy>(env, 'GROUP_MATCH_POLICY', ['lenient', 'strict'], 'lenient', errors);
  const tokenPolicy = parseChoice<TokenPolicy>(env, 'TOKEN_POLICY', ['lenient', 'strict'], 'lenient', errors);
  // An explicitly empty prefix disables the alias lookup.
  const groupAliasPrefix = env.GROUP_ALIAS_PREFIX ?? DEFAULT_GROUP_ALIAS_PREFIX;
  const deadlineMs = parsePositiveInt(env, 'PROVISION_DEADLINE_MS', errors);

  const port = parsePositiveInt(env, 'PORT', errors) ?? DEFAULT_PORT;
  if (port > 65535) {
    errors.push(`PORT must be at most 65535 (got ${port})`);
  }

  let logLevel = LogLevel.Info;
  const rawLevel = read(env, 'LOG_LEVEL');
  if (rawLevel !== undefined) {
    const parsed = parseLogLevel(rawLevel);
    if (parsed) {
      logLevel = parsed;
    } else {
      errors.push(`LOG_LEVEL must be one of ${Object.values(LogLevel).join(', ')} (got "${rawLevel}")`);
    }
  }

  if (errors.length > 0) {
    throw new ConfigError(
      createTypedError({
        code: 'CONFIG.INVALID',
        message: errors.join('; '),
        retryable: false,
        details: { errors },
      }),
    );
  }

  return {
    bi,
    ...(defaultTemplateFolderId !== undefined ? { defaultTemplateFolderId } : {}),
    defaultTemplateDashboardIds,
    parentFolderId,
    groupMatchPolicy,
    groupAliasPrefix,
    tokenPolicy,
    ...(deadlineMs !== undefined ? { deadlineMs } : {}),
    port,
    logLevel,
  };
}

/** Build the HTTP client for the configured platform, or null without credentials. */
export function createRemoteClient(config: ProvisionerConfig): HttpRemoteStateClient | null {
  if (!config.bi) return null;
  return new HttpRemoteStateClient({
    baseUrl: config.bi.baseUrl,
    clientId: config.bi.clientId,
    clientSecret: config.bi.clientSecret,
    apiVersion: config.bi.apiVersion,
  });
}
