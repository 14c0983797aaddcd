import { ProvisioningError, ValidationError } from '../../src/domain/errors';
import { AccessConfig } from '../../src/domain/remote';
import { ProvisionRequest } from '../../src/domain/request';
import { Deadline } from '../../src/engine/deadline';
import {
  StageContext,
  cloneDashboards,
  ensureAccessMapping,
  ensureFolder,
  ensureGroup,
  verifyAccessConfigMerge,
} from '../../src/engine/stages';
import { createLogger } from '../../src/logger';
import { MemoryRemoteStateClient } from '../../src/remote/memory-client';
import { captureLogs } from '../helpers/log-capture';

const logs = captureLogs();

function contextFor(client: MemoryRemoteStateClient, overrides: Partial<ProvisionRequest> = {}): StageContext {
  return {
    client,
    request: { projectId: 'demo-proj', groupEmail: 'team@example.com', tokens: {}, ...overrides },
    log: createLogger(),
    deadline: new Deadline(),
  };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('expected a rejection');
}

const lenient = { policy: 'lenient' as const, aliasPrefix: 'group:' };

describe('ensureGroup', () => {
  test('reuses a group named after the email', async () => {
    const client = new MemoryRemoteStateClient({ groups: [{ id: 4, name: 'team@example.com' }] });
    const result = await ensureGroup(contextFor(client), lenient);
    expect(result).toEqual({ group: { id: 4, name: 'team@example.com' }, action: 'reused' });
    expect(client.callCount('createGroup')).toBe(0);
    expect(logs.events()).toEqual(['group.reuse']);
  });

  test('falls back to the prefixed alias', async () => {
    const client = new MemoryRemoteStateClient({ groups: [{ id: 6, name: 'group:team@example.com' }] });
    const result = await ensureGroup(contextFor(client), lenient);
    expect(result.group.id).toBe(6);
    expect(client.callCount('findGroupByName')).toBe(2);
  });

  test('skips the alias lookup when the prefix is empty', async () => {
    const client = new MemoryRemoteStateClient({ groups: [{ id: 6, name: 'group:team@example.com' }] });
    const result = await ensureGroup(contextFor(client), { policy: 'lenient', aliasPrefix: '' });
    expect(result.action).toBe('created');
    expect(client.callCount('findGroupByName')).toBe(1);
  });

  test('creates the group under the plain email', async () => {
    const client = new MemoryRemoteStateClient();
    const result = await ensureGroup(contextFor(client), lenient);
    expect(result).toEqual({ group: { id: 1, name: 'team@example.com' }, action: 'created' });
    expect(logs.events()).toEqual(['group.create']);
  });

  test('lenient policy takes the first of several matches and warns', async () => {
    const client = new MemoryRemoteStateClient({
      groups: [
        { id: 4, name: 'team@example.com' },
        { id: 9, name: 'team@example.com' },
      ],
    });
    const result = await ensureGroup(contextFor(client), lenient);
    expect(result.group.id).toBe(4);
    const warning = logs.entries.find((e) => e.context?.event === 'group.ambiguous');
    expect(warning?.level).toBe('warn');
    expect(warning?.context?.groupIds).toEqual([4, 9]);
  });

  test('strict policy fails on several matches', async () => {
    const client = new MemoryRemoteStateClient({
      groups: [
        { id: 4, name: 'team@example.com' },
        { id: 9, name: 'team@example.com' },
      ],
    });
    const err = await rejection(ensureGroup(contextFor(client), { policy: 'strict', aliasPrefix: 'group:' }));
    expect(err).toBeInstanceOf(ProvisioningError);
    expect(err).toMatchObject({ typedError: { code: 'PROVISIONING.AMBIGUOUS_GROUP', details: { groupIds: [4, 9] } } });
  });

  test('wraps client failures with the stage and operation', async () => {
    const client = new MemoryRemoteStateClient();
    client.failOn('findGroupByName', { statusCode: 503 });
    const err = await rejection(ensureGroup(contextFor(client), lenient));
    expect(err).toMatchObject({
      typedError: {
        code: 'PROVISIONING.REMOTE_TRANSIENT',
        stage: 'ensure_group',
        message: 'findGroupByName failed: findGroupByName unavailable',
        retryable: true,
      },
    });
  });
});

describe('ensureAccessMapping', () => {
  test('leaves an existing mapping alone', async () => {
    const client = new MemoryRemoteStateClient({ accessConfig: { enabled: true, groups: [{ groupId: 4, name: 'x' }] } });
    expect(await ensureAccessMapping(contextFor(client), 4)).toBe('existing');
    expect(client.callCount('appendGroupToAccessConfig')).toBe(0);
  });

  test('appends to the existing mappings', async () => {
    const client = new MemoryRemoteStateClient({
      accessConfig: {
        enabled: true,
        groups: [
          { groupId: 1, name: 'a@example.com' },
          { groupId: 2, name: 'b@example.com' },
        ],
      },
    });
    expect(await ensureAccessMapping(contextFor(client), 7)).toBe('added');
    expect(client.snapshot().accessConfig.groups).toEqual([
      { groupId: 1, name: 'a@example.com' },
      { groupId: 2, name: 'b@example.com' },
      { groupId: 7, name: 'team@example.com' },
    ]);
  });

  test('fails when the write drops an existing mapping', async () => {
    class OverwritingClient extends MemoryRemoteStateClient {
      async appendGroupToAccessConfig(_config: AccessConfig, groupId: number, groupName: string): Promise<AccessConfig> {
        return { enabled: true, groups: [{ groupId, name: groupName }] };
      }
    }
    const client = new OverwritingClient({ accessConfig: { enabled: true, groups: [{ groupId: 1, name: 'a@example.com' }] } });
    const err = await rejection(ensureAccessMapping(contextFor(client), 7));
    expect(err).toMatchObject({
      typedError: { code: 'PROVISIONING.ACCESS_CONFIG_MERGE', stage: 'ensure_access_mapping', details: { droppedGroupIds: [1] } },
    });
  });
});

describe('verifyAccessConfigMerge', () => {
  const before: AccessConfig = { enabled: true, groups: [{ groupId: 1, name: 'a' }] };

  test('accepts prior entries plus the new one', () => {
    expect(() =>
      verifyAccessConfigMerge(before, { enabled: true, groups: [{ groupId: 1, name: 'a' }, { groupId: 2, name: 'b' }] }, 2),
    ).not.toThrow();
  });

  test('rejects a write without the new group', () => {
    expect(() => verifyAccessConfigMerge(before, before, 2)).toThrow('Access configuration write did not include group 2');
  });

  test('rejects a write that renamed a prior entry', () => {
    expect(() =>
      verifyAccessConfigMerge(before, { enabled: true, groups: [{ groupId: 1, name: 'renamed' }, { groupId: 2, name: 'b' }] }, 2),
    ).toThrow('Access configuration write dropped 1 existing group mapping(s)');
  });
});

describe('ensureFolder', () => {
  test('creates the project folder under the parent', async () => {
    const client = new MemoryRemoteStateClient({ folders: [{ id: 50, name: 'Projects', parentId: null }] });
    const result = await ensureFolder(contextFor(client), 50);
    expect(result).toEqual({ folderId: 51, action: 'created' });
    expect(client.snapshot().folders[1]).toEqual({ id: 51, name: 'Project: demo-proj', parentId: 50 });
  });

  test('reuses a single match', async () => {
    const client = new MemoryRemoteStateClient({ folders: [{ id: 8, name: 'Project: demo-proj', parentId: null }] });
    expect(await ensureFolder(contextFor(client), null)).toEqual({ folderId: 8, action: 'reused' });
  });

  test('fails on duplicate folders', async () => {
    const client = new MemoryRemoteStateClient({
      folders: [
        { id: 8, name: 'Project: demo-proj', parentId: null },
        { id: 9, name: 'Project: demo-proj', parentId: null },
      ],
    });
    const err = await rejection(ensureFolder(contextFor(client), null));
    expect(err).toMatchObject({ typedError: { code: 'PROVISIONING.DUPLICATE_FOLDER', details: { folderIds: [8, 9] } } });
    expect(client.callCount('createFolder')).toBe(0);
  });
});

describe('cloneDashboards', () => {
  function withTemplates(): MemoryRemoteStateClient {
    return new MemoryRemoteStateClient({
      folders: [
        { id: 10, name: 'Templates', parentId: null },
        { id: 20, name: 'Project: demo-proj', parentId: null },
      ],
      dashboards: [
        { id: 101, title: 'Costs {{REGION}}', description: 'Spend for {{PROJECT_ID}}', folderId: 10 },
        { id: 102, title: 'Usage', description: 'Owner {{OWNER}}', folderId: 10 },
      ],
    });
  }

  test('clones each template and resolves its text', async () => {
    const client = withTemplates();
    const result = await cloneDashboards(contextFor(client, { tokens: { REGION: 'eu' } }), 20, [101, 102], 'lenient');

    expect(result.outcomes).toEqual([
      { templateId: 101, dashboardId: 103, title: 'Costs eu (project: demo-proj)', action: 'cloned', unresolvedTokens: [] },
      { templateId: 102, dashboardId: 104, title: 'Usage (project: demo-proj)', action: 'cloned', unresolvedTokens: ['OWNER'] },
    ]);
    expect(result.warnings).toEqual([]);
    expect(client.snapshot().dashboards.slice(2)).toEqual([
      { id: 103, title: 'Costs eu (project: demo-proj)', description: 'Spend for demo-proj', folderId: 20 },
      { id: 104, title: 'Usage (project: demo-proj)', description: 'Owner {{OWNER}}', folderId: 20 },
    ]);
    expect(logs.events()).toContain('dashboard.unresolved_tokens');
  });

  test('reuses an existing clone without rewriting it', async () => {
    const client = withTemplates();
    const ctx = contextFor(client, { tokens: { REGION: 'eu' } });
    await cloneDashboards(ctx, 20, [101], 'lenient');
    await client.updateDashboardText(103, { title: 'Costs eu (project: demo-proj)', description: 'edited by hand' });
    client.resetCallCounts();

    const result = await cloneDashboards(ctx, 20, [101], 'lenient');
    expect(result.outcomes).toEqual([
      { templateId: 101, dashboardId: 103, title: 'Costs eu (project: demo-proj)', action: 'reused', unresolvedTokens: [] },
    ]);
    expect(client.mutationCount()).toBe(0);
    expect((await client.getDashboard(103)).description).toBe('edited by hand');
  });

  test('warns when two templates resolve to the same clone title', async () => {
    const client = new MemoryRemoteStateClient({
      folders: [
        { id: 10, name: 'Templates', parentId: null },
        { id: 20, name: 'Project: demo-proj', parentId: null },
      ],
      dashboards: [
        { id: 101, title: 'Costs', description: '', folderId: 10 },
        { id: 102, title: 'Costs', description: '', folderId: 10 },
      ],
    });
    const result = await cloneDashboards(contextFor(client), 20, [101, 102], 'lenient');

    expect(result.outcomes.map((o) => [o.templateId, o.dashboardId, o.action])).toEqual([
      [101, 103, 'cloned'],
      [102, 103, 'reused'],
    ]);
    expect(result.warnings).toEqual([
      'Templates 101 and 102 resolve to the same title "Costs (project: demo-proj)"; both map to dashboard 103',
    ]);
    const warning = logs.entries.find((e) => e.context?.event === 'dashboard.title_collision');
    expect(warning?.level).toBe('warn');
    expect(warning?.context).toMatchObject({ templateId: 102, earlierTemplateId: 101, dashboardId: 103 });
  });

  test('a clone left by an earlier run is not a collision', async () => {
    const client = withTemplates();
    const ctx = contextFor(client, { tokens: { REGION: 'eu' } });
    await cloneDashboards(ctx, 20, [101, 102], 'lenient');
    const result = await cloneDashboards(ctx, 20, [101, 102], 'lenient');
    expect(result.warnings).toEqual([]);
    expect(logs.events()).not.toContain('dashboard.title_collision');
  });

  test('a failed text update becomes a warning', async () => {
    const client = withTemplates();
    client.failOn('updateDashboardText', { statusCode: 500 });
    const result = await cloneDashboards(contextFor(client), 20, [102], 'lenient');

    expect(result.outcomes.map((o) => o.action)).toEqual(['cloned']);
    expect(result.warnings).toEqual([
      'Dashboard 103 (template 102) was cloned but its text was not updated: updateDashboardText failed: updateDashboardText unavailable',
    ]);
    expect(logs.events()).toContain('dashboard.text_update_failed');
  });

  test('a failed clone is fatal', async () => {
    const client = withTemplates();
    client.failOn('cloneDashboard', { statusCode: 500, times: 1 });
    const err = await rejection(cloneDashboards(contextFor(client), 20, [101, 102], 'lenient'));
    expect(err).toMatchObject({ typedError: { code: 'PROVISIONING.REMOTE_TRANSIENT', stage: 'clone_dashboards' } });
    expect(client.callCount('cloneDashboard')).toBe(1);
  });

  test('a missing template is fatal', async () => {
    const client = withTemplates();
    const err = await rejection(cloneDashboards(contextFor(client), 20, [999], 'lenient'));
    expect(err).toMatchObject({
      typedError: { code: 'PROVISIONING.REMOTE_REJECTED', message: 'getDashboard failed: Dashboard 999 not found' },
    });
  });

  test('strict token policy rejects before cloning', async () => {
    const client = withTemplates();
    const err = await rejection(cloneDashboards(contextFor(client), 20, [102], 'strict'));
    expect(err).toBeInstanceOf(ValidationError);
    expect(client.callCount('cloneDashboard')).toBe(0);
  });
});
