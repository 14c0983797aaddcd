/**
 * Reconciliation stages.
 *
 * Each stage looks the desired entity up before creating it, so a re-run
 * with the same request finds and reuses everything the previous run
 * committed. Lookup-then-create is not atomic: two concurrent runs can
 * still both create.
 */

import {
  ProvisioningError,
  ValidationError,
  accessConfigMergeError,
  ambiguousGroupError,
  duplicateFolderError,
  remoteCallError,
} from '../domain/errors';
import { Stage } from '../domain/reconciliation';
import { AccessConfig, RemoteGroup, projectFolderName } from '../domain/remote';
import { ProvisionRequest } from '../domain/request';
import {
  AccessMappingAction,
  DashboardOutcome,
  FolderAction,
  GroupAction,
} from '../domain/result';
import { Logger } from '../logger';
import { RemoteCallError, RemoteStateClient } from '../remote/client';
import { cloneTitle } from '../remote/title-matching';
import { TokenPolicy, buildTokenContext, resolveDashboardText } from '../templating/token-substitution';
import { Deadline } from './deadline';

/** What to do when a group name matches more than one remote group. */
export type GroupMatchPolicy = 'lenient' | 'strict';

/** Everything a stage needs from the invocation. */
export interface StageContext {
  client: RemoteStateClient;
  request: ProvisionRequest;
  log: Logger;
  deadline: Deadline;
}

export interface GroupStageOptions {
  policy: GroupMatchPolicy;
  /** Alias looked up when the plain email finds nothing; empty disables it. */
  aliasPrefix: string;
}

export interface GroupStageResult {
  group: RemoteGroup;
  action: GroupAction;
}

export interface FolderStageResult {
  folderId: number;
  action: FolderAction;
}

export interface DashboardStageResult {
  outcomes: DashboardOutcome[];
  warnings: string[];
}

/**
 * Run one remote call under the invocation deadline. Client failures
 * become ProvisioningError; errors already typed pass through.
 */
export async function remoteCall<T>(
  ctx: StageContext,
  stage: Stage,
  operation: string,
  call: () => Promise<T>,
): Promise<T> {
  try {
    return await ctx.deadline.race(call, stage);
  } catch (err) {
    if (err instanceof ProvisioningError || err instanceof ValidationError) {
      throw err;
    }
    if (err instanceof RemoteCallError) {
      throw new ProvisioningError(remoteCallError(operation, err.message, err.statusCode, stage));
    }
    throw new ProvisioningError(
      remoteCallError(operation, err instanceof Error ? err.message : String(err), undefined, stage),
    );
  }
}

export async function ensureGroup(ctx: StageContext, options: GroupStageOptions): Promise<GroupStageResult> {
  const stage = Stage.EnsureGroup;
  const { groupEmail } = ctx.request;

  let matchedName = groupEmail;
  let matches = await remoteCall(ctx, stage, 'findGroupByName', () => ctx.client.findGroupByName(groupEmail));
  if (matches.length === 0 && options.aliasPrefix) {
    matchedName = `${options.aliasPrefix}${groupEmail}`;
    const alias = matchedName;
    matches = await remoteCall(ctx, stage, 'findGroupByName', () => ctx.client.findGroupByName(alias));
  }

  if (matches.length > 1) {
    const groupIds = matches.map((g) => g.id);
    if (options.policy === 'strict') {
      throw new ProvisioningError(ambiguousGroupError(matchedName, groupIds));
    }
    ctx.log.warn('Multiple groups match; using the first', {
      event: 'group.ambiguous',
      groupName: matchedName,
      groupIds,
    });
  }

  if (matches.length > 0) {
    const group = matches[0];
    ctx.log.info('Reusing group', { event: 'group.reuse', groupId: group.id, groupName: group.name });
    return { group, action: 'reused' };
  }

  const group = await remoteCall(ctx, stage, 'createGroup', () => ctx.client.createGroup(groupEmail));
  ctx.log.info('Created group', { event: 'group.create', groupId: group.id, groupName: group.name });
  return { group, action: 'created' };
}

/**
 * Check that a written access config kept every entry it was given and
 * gained the new one. The platform's write replaces the group list, so a
 * dropped entry here means someone else's binding was lost.
 */
export function verifyAccessConfigMerge(before: AccessConfig, after: AccessConfig, groupId: number): void {
  const missing = before.groups.filter(
    (prior) => !after.groups.some((entry) => entry.groupId === prior.groupId && entry.name === prior.name),
  );
  if (missing.length > 0) {
    throw new ProvisioningError(
      accessConfigMergeError(`Access configuration write dropped ${missing.length} existing group mapping(s)`, {
        droppedGroupIds: missing.map((m) => m.groupId),
      }),
    );
  }
  if (!after.groups.some((entry) => entry.groupId === groupId)) {
    throw new ProvisioningError(
      accessConfigMergeError(`Access configuration write did not include group ${groupId}`, { groupId }),
    );
  }
}

export async function ensureAccessMapping(ctx: StageContext, groupId: number): Promise<AccessMappingAction> {
  const stage = Stage.EnsureAccessMapping;
  const config = await remoteCall(ctx, stage, 'getAccessConfig', () => ctx.client.getAccessConfig());

  if (ctx.client.groupIsMappedInAccessConfig(config, groupId)) {
    ctx.log.info('Group already mapped in access configuration', { event: 'access.existing', groupId });
    return 'existing';
  }

  const written = await remoteCall(ctx, stage, 'appendGroupToAccessConfig', () =>
    ctx.client.appendGroupToAccessConfig(config, groupId, ctx.request.groupEmail),
  );
  verifyAccessConfigMerge(config, written, groupId);

  ctx.log.info('Added group to access configuration', {
    event: 'access.added',
    groupId,
    mappedGroups: written.groups.length,
  });
  return 'added';
}

export async function ensureFolder(ctx: StageContext, parentId: number | null): Promise<FolderStageResult> {
  const stage = Stage.EnsureFolder;
  const name = projectFolderName(ctx.request.projectId);

  const matches = await remoteCall(ctx, stage, 'findFolderByName', () => ctx.client.findFolderByName(name, parentId));
  if (matches.length > 1) {
    throw new ProvisioningError(duplicateFolderError(name, matches.map((f) => f.id), parentId));
  }
  if (matches.length === 1) {
    ctx.log.info('Reusing folder', { event: 'folder.reuse', folderId: matches[0].id });
    return { folderId: matches[0].id, action: 'reused' };
  }

  const folder = await remoteCall(ctx, stage, 'createFolder', () => ctx.client.createFolder(name, parentId));
  ctx.log.info('Created folder', { event: 'folder.create', folderId: folder.id, parentId });
  return { folderId: folder.id, action: 'created' };
}

/**
 * Clone each template into the project folder, in order. Existing clones
 * are reused as they are; their text is never rewritten on a re-run.
 * A failed text update on a fresh clone is a warning, any other failure
 * ends the invocation.
 */
export async function cloneDashboards(
  ctx: StageContext,
  folderId: number,
  templateIds: readonly number[],
  tokenPolicy: TokenPolicy,
): Promise<DashboardStageResult> {
  const stage = Stage.CloneDashboards;
  const { projectId } = ctx.request;
  const context = buildTokenContext(ctx.request);
  const outcomes: DashboardOutcome[] = [];
  const warnings: string[] = [];
  // dashboard id -> template that first produced or reused it in this run
  const claimedBy = new Map<number, number>();

  for (const templateId of templateIds) {
    const template = await remoteCall(ctx, stage, 'getDashboard', () => ctx.client.getDashboard(templateId));
    const resolved = resolveDashboardText(
      { title: template.title, description: template.description },
      context,
      tokenPolicy,
    );
    const title = cloneTitle(resolved.fields.title, projectId);

    const existing = await remoteCall(ctx, stage, 'findDashboardByTitle', () =>
      ctx.client.findDashboardByTitle(title, folderId),
    );
    if (existing) {
      const earlierTemplateId = claimedBy.get(existing.id);
      if (earlierTemplateId !== undefined) {
        const warning = `Templates ${earlierTemplateId} and ${templateId} resolve to the same title "${title}"; both map to dashboard ${existing.id}`;
        warnings.push(warning);
        ctx.log.warn('Dashboard title already claimed by another template', {
          event: 'dashboard.title_collision',
          templateId,
          earlierTemplateId,
          dashboardId: existing.id,
        });
      } else {
        claimedBy.set(existing.id, templateId);
      }
      ctx.log.info('Reusing dashboard', { event: 'dashboard.reuse', templateId, dashboardId: existing.id });
      outcomes.push({ templateId, dashboardId: existing.id, title, action: 'reused', unresolvedTokens: [] });
      continue;
    }

    const clone = await remoteCall(ctx, stage, 'cloneDashboard', () =>
      ctx.client.cloneDashboard(templateId, folderId, title),
    );
    claimedBy.set(clone.id, templateId);
    ctx.log.info('Cloned dashboard', { event: 'dashboard.clone', templateId, dashboardId: clone.id });

    if (resolved.unresolvedTokens.length > 0) {
      ctx.log.warn('Template references unknown tokens', {
        event: 'dashboard.unresolved_tokens',
        templateId,
        dashboardId: clone.id,
        keys: resolved.unresolvedTokens,
      });
    }

    try {
      await remoteCall(ctx, stage, 'updateDashboardText', () =>
        ctx.client.updateDashboardText(clone.id, { title, description: resolved.fields.description }),
      );
    } catch (err) {
      if (!(err instanceof ProvisioningError) || err.typedError.code === 'PROVISIONING.DEADLINE_EXCEEDED') {
        throw err;
      }
      const warning = `Dashboard ${clone.id} (template ${templateId}) was cloned but its text was not updated: ${err.message}`;
      warnings.push(warning);
      ctx.log.warn('Dashboard text update failed', {
        event: 'dashboard.text_update_failed',
        templateId,
        dashboardId: clone.id,
        error: err.typedError,
      });
    }

    outcomes.push({
      templateId,
      dashboardId: clone.id,
      title,
      action: 'cloned',
      unresolvedTokens: resolved.unresolvedTokens,
    });
  }

  return { outcomes, warnings };
}
