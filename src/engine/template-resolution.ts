/**
 * Effective template list for one invocation.
 *
 * Precedence: ids named in the request, then the configured default ids,
 * then every dashboard in the template folder (request, else configured)
 * ordered by id. No source at all yields an empty list.
 */

import { ProvisioningError, remoteCallError } from '../domain/errors';
import { ProvisionRequest } from '../domain/request';
import { RemoteCallError, RemoteStateClient } from '../remote/client';

export interface TemplateDefaults {
  defaultTemplateDashboardIds: readonly number[];
  defaultTemplateFolderId?: number;
}

export type TemplateSource = 'request' | 'default_ids' | 'folder' | 'none';

export interface ResolvedTemplates {
  templateIds: number[];
  source: TemplateSource;
  folderId?: number;
}

export async function resolveTemplateIds(
  request: ProvisionRequest,
  defaults: TemplateDefaults,
  client: RemoteStateClient,
): Promise<ResolvedTemplates> {
  if (request.templateDashboardIds && request.templateDashboardIds.length > 0) {
    return { templateIds: [...request.templateDashboardIds], source: 'request' };
  }
  if (defaults.defaultTemplateDashboardIds.length > 0) {
    return { templateIds: [...defaults.defaultTemplateDashboardIds], source: 'default_ids' };
  }

  const folderId = request.templateFolderId ?? defaults.defaultTemplateFolderId;
  if (folderId === undefined) {
    return { templateIds: [], source: 'none' };
  }

  try {
    const dashboards = await client.listDashboardsInFolder(folderId);
    return {
      templateIds: dashboards.map((d) => d.id).sort((a, b) => a - b),
      source: 'folder',
      folderId,
    };
  } catch (err) {
    if (err instanceof RemoteCallError) {
      throw new ProvisioningError(remoteCallError('listDashboardsInFolder', err.message, err.statusCode));
    }
    throw err;
  }
}
