import { ProvisioningError, ValidationError } from '../../src/domain/errors';
import { ReconcileStatus, Stage, StageStatus } from '../../src/domain/reconciliation';
import { ProvisionRequest } from '../../src/domain/request';
import { Reconciler } from '../../src/engine/reconciler';
import { MemoryRemoteStateClient } from '../../src/remote/memory-client';
import { captureLogs } from '../helpers/log-capture';

const logs = captureLogs();

const request: ProvisionRequest = Object.freeze({
  projectId: 'demo-proj',
  groupEmail: 'team@example.com',
  tokens: Object.freeze({}),
});

function platform(options: { latencyMs?: number } = {}): MemoryRemoteStateClient {
  return new MemoryRemoteStateClient(
    {
      accessConfig: { enabled: true, groups: [{ groupId: 1, name: 'admins@example.com' }] },
      folders: [{ id: 10, name: 'Templates', parentId: null }],
      dashboards: [{ id: 101, title: 'Cost Overview', description: 'Spend for {{PROJECT_ID}}', folderId: 10 }],
    },
    options,
  );
}

describe('Reconciler', () => {
  test('provisions everything on a fresh platform', async () => {
    const client = platform();
    const result = await new Reconciler(client).reconcile(request, [101], 'corr-1');

    expect(result).toEqual({
      status: 'ok',
      projectId: 'demo-proj',
      groupEmail: 'team@example.com',
      groupId: 102,
      folderId: 103,
      dashboardIds: [104],
      correlationId: 'corr-1',
      actions: {
        group: 'created',
        accessMapping: 'added',
        folder: 'created',
        dashboards: [
          {
            templateId: 101,
            dashboardId: 104,
            title: 'Cost Overview (project: demo-proj)',
            action: 'cloned',
            unresolvedTokens: [],
          },
        ],
      },
      warnings: [],
    });

    const state = client.snapshot();
    expect(state.groups).toEqual([{ id: 102, name: 'team@example.com' }]);
    expect(state.accessConfig.groups).toEqual([
      { groupId: 1, name: 'admins@example.com' },
      { groupId: 102, name: 'team@example.com' },
    ]);
    expect(state.folders[1]).toEqual({ id: 103, name: 'Project: demo-proj', parentId: null });
    expect(state.dashboards[1]).toEqual({
      id: 104,
      title: 'Cost Overview (project: demo-proj)',
      description: 'Spend for demo-proj',
      folderId: 103,
    });
  });

  test('a second run reuses everything and changes nothing', async () => {
    const client = platform();
    const reconciler = new Reconciler(client);
    const first = await reconciler.reconcile(request, [101]);
    client.resetCallCounts();
    const before = client.snapshot();

    const second = await reconciler.reconcile(request, [101]);

    expect(client.mutationCount()).toBe(0);
    expect(client.snapshot()).toEqual(before);
    expect(second.groupId).toBe(first.groupId);
    expect(second.folderId).toBe(first.folderId);
    expect(second.dashboardIds).toEqual(first.dashboardIds);
    expect(second.actions).toEqual({
      group: 'reused',
      accessMapping: 'existing',
      folder: 'reused',
      dashboards: [
        {
          templateId: 101,
          dashboardId: 104,
          title: 'Cost Overview (project: demo-proj)',
          action: 'reused',
          unresolvedTokens: [],
        },
      ],
    });
  });

  test('an empty template list clones nothing', async () => {
    const client = platform();
    const result = await new Reconciler(client).reconcile(request, []);
    expect(result.dashboardIds).toEqual([]);
    expect(client.callCount('cloneDashboard')).toBe(0);
  });

  test('creates the project folder under the configured parent', async () => {
    const client = platform();
    const result = await new Reconciler(client, { parentFolderId: 10 }).reconcile(request, []);
    expect(client.snapshot().folders.find((f) => f.id === result.folderId)?.parentId).toBe(10);
  });

  test('the result is deeply frozen', async () => {
    const result = await new Reconciler(platform()).reconcile(request, [101]);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.actions)).toBe(true);
    expect(Object.isFrozen(result.actions.dashboards[0])).toBe(true);
    expect(Object.isFrozen(result.dashboardIds)).toBe(true);
  });

  test('records stage progress and logs with the invocation identifiers', async () => {
    const outcome = await new Reconciler(platform()).execute(request, [101], 'corr-2');

    expect(outcome.run.status).toBe(ReconcileStatus.Completed);
    expect(Object.values(outcome.run.stages).map((s) => s.status)).toEqual([
      StageStatus.Succeeded,
      StageStatus.Succeeded,
      StageStatus.Succeeded,
      StageStatus.Succeeded,
    ]);

    const events = logs.events();
    expect(events[0]).toBe('provision.start');
    expect(events[events.length - 1]).toBe('provision.complete');
    expect(events.filter((e) => e === 'stage.complete')).toHaveLength(4);
    for (const entry of logs.entries) {
      expect(entry.context).toMatchObject({ projectId: 'demo-proj', correlationId: 'corr-2' });
    }
  });

  test('a failed clone fails the run after earlier stages committed', async () => {
    const client = platform();
    client.failOn('cloneDashboard', { statusCode: 503 });
    const outcome = await new Reconciler(client).execute(request, [101]);

    expect(outcome.result).toBeUndefined();
    expect(outcome.error?.code).toBe('PROVISIONING.REMOTE_TRANSIENT');
    expect(outcome.error?.retryable).toBe(true);
    expect(outcome.run.status).toBe(ReconcileStatus.Failed);
    expect(outcome.run.stages[Stage.EnsureFolder].status).toBe(StageStatus.Succeeded);
    expect(outcome.run.stages[Stage.CloneDashboards].status).toBe(StageStatus.Failed);
    expect(logs.events()).toContain('provision.failed');

    client.clearFailures();
    const retried = await new Reconciler(client).reconcile(request, [101]);
    expect(retried.actions.group).toBe('reused');
    expect(retried.actions.accessMapping).toBe('existing');
    expect(retried.actions.folder).toBe('reused');
    expect(retried.actions.dashboards[0].action).toBe('cloned');
    expect(client.snapshot().groups).toHaveLength(1);
  });

  test('stages after a failure are skipped', async () => {
    const client = platform();
    client.failOn('createGroup', { statusCode: 403 });
    const outcome = await new Reconciler(client).execute(request, [101]);

    expect(outcome.run.stages[Stage.EnsureGroup].status).toBe(StageStatus.Failed);
    expect(outcome.run.stages[Stage.EnsureAccessMapping].status).toBe(StageStatus.Skipped);
    expect(outcome.run.stages[Stage.EnsureFolder].status).toBe(StageStatus.Skipped);
    expect(outcome.run.stages[Stage.CloneDashboards].status).toBe(StageStatus.Skipped);
    expect(outcome.error?.retryable).toBe(false);
  });

  test('reconcile throws ProvisioningError for remote failures', async () => {
    const client = platform();
    client.failOn('getAccessConfig', { statusCode: 500 });
    await expect(new Reconciler(client).reconcile(request, [101])).rejects.toBeInstanceOf(ProvisioningError);
  });

  test('reconcile throws ValidationError for unresolved tokens under the strict policy', async () => {
    const client = new MemoryRemoteStateClient({
      dashboards: [{ id: 101, title: '{{REGION}} costs', description: '', folderId: null }],
    });
    const reconciler = new Reconciler(client, { tokenPolicy: 'strict' });
    await expect(reconciler.reconcile(request, [101])).rejects.toBeInstanceOf(ValidationError);
  });

  test('duplicate project folders stop the run', async () => {
    const client = new MemoryRemoteStateClient({
      folders: [
        { id: 5, name: 'Project: demo-proj', parentId: null },
        { id: 6, name: 'Project: demo-proj', parentId: null },
      ],
    });
    const outcome = await new Reconciler(client).execute(request, []);
    expect(outcome.error?.code).toBe('PROVISIONING.DUPLICATE_FOLDER');
    expect(outcome.run.stages[Stage.CloneDashboards].status).toBe(StageStatus.Skipped);
  });

  test('strict group matching rejects ambiguous groups', async () => {
    const client = new MemoryRemoteStateClient({
      groups: [
        { id: 1, name: 'team@example.com' },
        { id: 2, name: 'team@example.com' },
      ],
    });
    const outcome = await new Reconciler(client, { groupMatchPolicy: 'strict' }).execute(request, []);
    expect(outcome.error?.code).toBe('PROVISIONING.AMBIGUOUS_GROUP');

    const lenient = await new Reconciler(client).reconcile(request, []);
    expect(lenient.groupId).toBe(1);
  });

  test('an exhausted deadline fails the run as retryable', async () => {
    const client = platform({ latencyMs: 30 });
    const outcome = await new Reconciler(client, { deadlineMs: 50 }).execute(request, [101]);

    expect(outcome.error).toMatchObject({ code: 'PROVISIONING.DEADLINE_EXCEEDED', retryable: true, stage: 'ensure_group' });
    expect(outcome.run.status).toBe(ReconcileStatus.Failed);
  });
});
