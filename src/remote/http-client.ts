/**
 * HTTP remote state client: adapter for a Looker-style REST API.
 *
 * Authenticates with client credentials against `/login`, keeps the bearer
 * token until it expires, and maps each capability onto one REST call.
 * Ids arrive as strings on the wire and are converted to numbers here.
 * A folder with no `parent_id` sits at the root.
 *
 * Usage:
 *   const client = new HttpRemoteStateClient({
 *     baseUrl: 'https://bi.example.com:19999',
 *     clientId: 'test-client',
 *     clientSecret: 'test-secret',
 *   });
 */

import { maskSecretsInMessage } from '../domain/errors';
import {
  AccessConfig,
  AccessGroupMapping,
  DashboardClone,
  DashboardTextFields,
  RemoteDashboard,
  RemoteFolder,
  RemoteGroup,
} from '../domain/remote';
import { RemoteCallError, RemoteStateClient } from './client';
import { matchesCloneTitle } from './title-matching';

export const DEFAULT_API_VERSION = '4.0';

/** Re-login this long before the token's advertised expiry. */
const TOKEN_EXPIRY_MARGIN_MS = 30_000;

export interface HttpClientOptions {
  baseUrl: string;
  clientId: string;
  clientSecret: string;
  apiVersion?: string;
  /** Injectable for tests; defaults to the global fetch. */
  fetchFn?: typeof fetch;
  /** Clock used for token expiry. */
  now?: () => number;
}

/** Wire shapes. Only the fields the adapter reads are declared. */
interface LoginResponse {
  access_token: string;
  token_type?: string;
  expires_in?: number;
}

interface WireGroup {
  id: string | number;
  name: string;
}

interface WireFolder {
  id: string | number;
  name: string;
  parent_id?: string | number | null;
}

interface WireDashboard {
  id?: string | number;
  title?: string | null;
  description?: string | null;
  folder_id?: string | number | null;
}

interface WireSamlGroup {
  name: string;
  looker_group_id: string | number;
  [field: string]: unknown;
}

interface WireSamlConfig {
  enabled?: boolean;
  groups?: WireSamlGroup[] | null;
  [field: string]: unknown;
}

interface RequestParams {
  query?: Record<string, string>;
  body?: unknown;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toId(operation: string, value: unknown): number {
  const id = typeof value === 'number' ? value : typeof value === 'string' && value !== '' ? Number(value) : NaN;
  if (!Number.isSafeInteger(id)) {
    throw new RemoteCallError(operation, `Response entity has no usable id (${String(value)})`);
  }
  return id;
}

function toOptionalId(operation: string, value: unknown): number | null {
  return value === undefined || value === null || value === '' ? null : toId(operation, value);
}

export class HttpRemoteStateClient implements RemoteStateClient {
  private readonly apiRoot: string;
  private readonly fetchFn: typeof fetch;
  private readonly now: () => number;
  private token?: { value: string; expiresAt: number };

  constructor(private options: HttpClientOptions) {
    const base = options.baseUrl.replace(/\/+$/, '');
    this.apiRoot = `${base}/api/${options.apiVersion ?? DEFAULT_API_VERSION}`;
    this.fetchFn = options.fetchFn ?? fetch;
    this.now = options.now ?? Date.now;
  }

  async findGroupByName(name: string): Promise<RemoteGroup[]> {
    const groups = await this.request<WireGroup[]>('findGroupByName', 'GET', '/groups/search', { query: { name } });
    return groups
      .filter((g) => g.name === name)
      .map((g) => ({ id: toId('findGroupByName', g.id), name: g.name }));
  }

  async createGroup(name: string): Promise<RemoteGroup> {
    const group = await this.request<WireGroup>('createGroup', 'POST', '/groups', { body: { name } });
    return { id: toId('createGroup', group.id), name: group.name };
  }

  async getAccessConfig(): Promise<AccessConfig> {
    const raw = await this.request<WireSamlConfig>('getAccessConfig', 'GET', '/saml_config');
    return this.toAccessConfig('getAccessConfig', raw);
  }

  groupIsMappedInAccessConfig(config: AccessConfig, groupId: number): boolean {
    return config.groups.some((entry) => entry.groupId === groupId);
  }

  async appendGroupToAccessConfig(config: AccessConfig, groupId: number, groupName: string): Promise<AccessConfig> {
    const groups = [...config.groups, { groupId, name: groupName }].map(toWireSamlGroup);
    // Only the group list is sent; every other setting stays as the platform has it.
    const res = await this.call('appendGroupToAccessConfig', 'PATCH', '/saml_config', { body: { groups } });
    const raw = await this.readOptionalJson<WireSamlConfig>('appendGroupToAccessConfig', res);
    // A 204 carries no config; read back what the platform stored.
    return raw === undefined ? this.getAccessConfig() : this.toAccessConfig('appendGroupToAccessConfig', raw);
  }

  async findFolderByName(name: string, parentId: number | null): Promise<RemoteFolder[]> {
    const query: Record<string, string> = { name };
    if (parentId !== null) query.parent_id = String(parentId);
    const folders = await this.request<WireFolder[]>('findFolderByName', 'GET', '/folders/search', { query });
    return folders
      .filter((f) => f.name === name)
      .map((f) => this.toFolder('findFolderByName', f))
      .filter((f) => f.parentId === parentId);
  }

  async createFolder(name: string, parentId: number | null): Promise<RemoteFolder> {
    const body: Record<string, unknown> = { name };
    if (parentId !== null) body.parent_id = String(parentId);
    const folder = await this.request<WireFolder>('createFolder', 'POST', '/folders', { body });
    return this.toFolder('createFolder', folder);
  }

  async getDashboard(dashboardId: number): Promise<RemoteDashboard> {
    const dashboard = await this.request<WireDashboard>('getDashboard', 'GET', `/dashboards/${dashboardId}`);
    return this.toDashboard('getDashboard', dashboard, dashboardId);
  }

  async listDashboardsInFolder(folderId: number): Promise<RemoteDashboard[]> {
    const dashboards = await this.request<WireDashboard[]>('listDashboardsInFolder', 'GET', '/dashboards/search', {
      query: { folder_id: String(folderId) },
    });
    return dashboards.map((d) => this.toDashboard('listDashboardsInFolder', d));
  }

  async findDashboardByTitle(title: string, folderId: number): Promise<DashboardClone | null> {
    const dashboards = await this.request<WireDashboard[]>('findDashboardByTitle', 'GET', '/dashboards/search', {
      query: { title, folder_id: String(folderId) },
    });
    const found = dashboards
      .map((d) => this.toDashboard('findDashboardByTitle', d))
      .find((d) => d.folderId === folderId && matchesCloneTitle(d.title, title));
    return found ?? null;
  }

  async cloneDashboard(templateId: number, folderId: number, title: string): Promise<DashboardClone> {
    const dashboard = await this.request<WireDashboard>('cloneDashboard', 'POST', `/dashboards/${templateId}/copy`, {
      query: { folder_id: String(folderId) },
      body: { title, folder_id: String(folderId) },
    });
    return this.toDashboard('cloneDashboard', dashboard);
  }

  async updateDashboardText(dashboardId: number, resolvedFields: DashboardTextFields): Promise<void> {
    const res = await this.call('updateDashboardText', 'PATCH', `/dashboards/${dashboardId}`, {
      body: { title: resolvedFields.title, description: resolvedFields.description },
    });
    await this.readOptionalJson<WireDashboard>('updateDashboardText', res);
  }

  private async authenticate(): Promise<string> {
    if (this.token && this.token.expiresAt > this.now()) {
      return this.token.value;
    }

    const form = new URLSearchParams({
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret,
    });
    const res = await this.send('login', `${this.apiRoot}/login`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: form.toString(),
    });
    const login = await this.readJson<LoginResponse>('login', res);
    if (!login.access_token) {
      throw new RemoteCallError('login', 'Login response did not include an access token', res.status);
    }

    const lifetimeMs = (login.expires_in ?? 3600) * 1000;
    this.token = {
      value: login.access_token,
      expiresAt: this.now() + Math.max(0, lifetimeMs - TOKEN_EXPIRY_MARGIN_MS),
    };
    return login.access_token;
  }

  private async request<T>(
    operation: string,
    method: 'GET' | 'POST' | 'PATCH',
    path: string,
    params: RequestParams = {},
  ): Promise<T> {
    const res = await this.call(operation, method, path, params);
    return this.readJson<T>(operation, res);
  }

  private async call(
    operation: string,
    method: 'GET' | 'POST' | 'PATCH',
    path: string,
    params: RequestParams,
  ): Promise<Response> {
    const token = await this.authenticate();
    const url = new URL(`${this.apiRoot}${path}`);
    for (const [key, value] of Object.entries(params.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const headers: Record<string, string> = { Authorization: `token ${token}`, Accept: 'application/json' };
    const init: RequestInit = { method, headers };
    if (params.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(params.body);
    }

    return this.send(operation, url.toString(), init);
  }

  private async send(operation: string, url: string, init: RequestInit): Promise<Response> {
    let res: Response;
    try {
      res = await this.fetchFn(url, init);
    } catch (err) {
      throw new RemoteCallError(
        operation,
        this.mask(`Connection to ${this.apiRoot} failed: ${err instanceof Error ? err.message : 'unknown error'}`),
      );
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new RemoteCallError(operation, this.mask(`HTTP ${res.status}: ${text.slice(0, 200)}`), res.status);
    }
    return res;
  }

  private async readJson<T>(operation: string, res: Response): Promise<T> {
    const body = await this.readOptionalJson<T>(operation, res);
    if (body === undefined) {
      throw new RemoteCallError(operation, `Empty response (HTTP ${res.status})`, res.status);
    }
    return body;
  }

  /** Parse the body, or undefined when there is none (204 on PATCH). */
  private async readOptionalJson<T>(operation: string, res: Response): Promise<T | undefined> {
    const text = await res.text();
    if (text.length === 0) {
      return undefined;
    }
    try {
      return JSON.parse(text);
    } catch {
      throw new RemoteCallError(operation, `Non-JSON response (HTTP ${res.status}): ${text.slice(0, 200)}`, res.status);
    }
  }

  private mask(message: string): string {
    return maskSecretsInMessage(message, [this.options.clientSecret]);
  }

  private toAccessConfig(operation: string, raw: WireSamlConfig): AccessConfig {
    if (!isObject(raw)) {
      throw new RemoteCallError(operation, 'Access configuration response is not an object');
    }
    const { groups, enabled, ...rest } = raw;
    return {
      ...rest,
      enabled: enabled ?? false,
      groups: (groups ?? []).map((entry): AccessGroupMapping => {
        const { name, looker_group_id, ...attributes } = entry;
        return {
          groupId: toId(operation, looker_group_id),
          name,
          ...(Object.keys(attributes).length > 0 ? { attributes } : {}),
        };
      }),
    };
  }

  private toFolder(operation: string, folder: WireFolder): RemoteFolder {
    return {
      id: toId(operation, folder.id),
      name: folder.name,
      parentId: toOptionalId(operation, folder.parent_id),
    };
  }

  private toDashboard(operation: string, dashboard: WireDashboard, fallbackId?: number): RemoteDashboard {
    const id = toId(operation, dashboard.id ?? fallbackId);
    return {
      id,
      title: dashboard.title ?? `dashboard-${id}`,
      description: dashboard.description ?? '',
      folderId: toOptionalId(operation, dashboard.folder_id),
    };
  }
}

function toWireSamlGroup(mapping: AccessGroupMapping): WireSamlGroup {
  return {
    ...mapping.attributes,
    name: mapping.name,
    looker_group_id: String(mapping.groupId),
  };
}
