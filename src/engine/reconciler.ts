/**
 * Provisioning orchestrator.
 *
 * Drives the BI platform toward the desired state for one project in four
 * sequential stages: group, access mapping, folder, dashboards. Each
 * invocation builds its own working state and reads the platform fresh.
 *
 * There is no retry here. A failed invocation is re-sent by the caller
 * (queue redelivery, a repeated HTTP call) and the stages' lookups make
 * the repeat reuse whatever the failed attempt already committed.
 */

import { v4 as uuid } from 'uuid';
import {
  ProvisioningError,
  TypedError,
  ValidationError,
  internalError,
  toTypedError,
} from '../domain/errors';
import {
  ReconcileStatus,
  ReconciliationRun,
  STAGE_ORDER,
  Stage,
  StageRecord,
  StageStatus,
} from '../domain/reconciliation';
import { ProvisionRequest } from '../domain/request';
import { ProvisionResult } from '../domain/result';
import { Logger, logger as rootLogger } from '../logger';
import { RemoteStateClient } from '../remote/client';
import { TokenPolicy } from '../templating/token-substitution';
import { Deadline } from './deadline';
import {
  GroupMatchPolicy,
  StageContext,
  cloneDashboards,
  ensureAccessMapping,
  ensureFolder,
  ensureGroup,
} from './stages';
import { transitionReconcileStatus, transitionStageStatus } from './state-machine';

/** Reconciler configuration. */
export interface ReconcilerOptions {
  /** Parent of project folders; null is the platform root. */
  parentFolderId: number | null;
  groupMatchPolicy: GroupMatchPolicy;
  groupAliasPrefix: string;
  tokenPolicy: TokenPolicy;
  /** Budget for a whole invocation. Unbounded when omitted. */
  deadlineMs?: number;
  logger: Logger;
}

const DEFAULT_OPTIONS: ReconcilerOptions = {
  parentFolderId: null,
  groupMatchPolicy: 'lenient',
  groupAliasPrefix: 'group:',
  tokenPolicy: 'lenient',
  logger: rootLogger,
};

/** Terminal state of one invocation. */
export interface ReconcileOutcome {
  run: ReconciliationRun;
  result?: ProvisionResult;
  error?: TypedError;
}

export class Reconciler {
  private options: ReconcilerOptions;

  constructor(
    private client: RemoteStateClient,
    options?: Partial<ReconcilerOptions>,
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Reconcile and return the result, or throw the ValidationError /
   * ProvisioningError that ended the run.
   */
  async reconcile(
    request: ProvisionRequest,
    templateIds: readonly number[],
    correlationId: string = uuid(),
  ): Promise<ProvisionResult> {
    const outcome = await this.execute(request, templateIds, correlationId);
    if (outcome.result) {
      return outcome.result;
    }
    const error = outcome.error ?? internalError('Reconciliation ended without a result');
    throw error.code.startsWith('VALIDATION.') ? new ValidationError(error) : new ProvisioningError(error);
  }

  /** Reconcile and return the full run record whether it completed or failed. */
  async execute(
    request: ProvisionRequest,
    templateIds: readonly number[],
    correlationId: string = uuid(),
  ): Promise<ReconcileOutcome> {
    const log = this.options.logger.child({ projectId: request.projectId, correlationId });
    const run = createRun(request.projectId, correlationId);
    const ctx: StageContext = {
      client: this.client,
      request,
      log,
      deadline: new Deadline(this.options.deadlineMs),
    };

    transitionRun(run, ReconcileStatus.Running);
    run.startedAt = new Date().toISOString();
    log.info('Provision start', {
      event: 'provision.start',
      groupEmail: request.groupEmail,
      templateDashboardIds: [...templateIds],
    });

    try {
      const groupStage = await this.runStage(run, Stage.EnsureGroup, log, () =>
        ensureGroup(ctx, { policy: this.options.groupMatchPolicy, aliasPrefix: this.options.groupAliasPrefix }),
      );
      const groupId = groupStage.group.id;

      const accessMapping = await this.runStage(run, Stage.EnsureAccessMapping, log, () =>
        ensureAccessMapping(ctx, groupId),
      );

      const folderStage = await this.runStage(run, Stage.EnsureFolder, log, () =>
        ensureFolder(ctx, this.options.parentFolderId),
      );

      const dashboardStage = await this.runStage(run, Stage.CloneDashboards, log, () =>
        cloneDashboards(ctx, folderStage.folderId, templateIds, this.options.tokenPolicy),
      );

      const result = deepFreeze<ProvisionResult>({
        status: 'ok',
        projectId: request.projectId,
        groupEmail: request.groupEmail,
        groupId,
        folderId: folderStage.folderId,
        dashboardIds: dashboardStage.outcomes.map((o) => o.dashboardId),
        correlationId,
        actions: {
          group: groupStage.action,
          accessMapping,
          folder: folderStage.action,
          dashboards: dashboardStage.outcomes,
        },
        warnings: dashboardStage.warnings,
      });

      transitionRun(run, ReconcileStatus.Completed);
      run.completedAt = new Date().toISOString();
      log.info('Provision complete', {
        event: 'provision.complete',
        groupId: result.groupId,
        folderId: result.folderId,
        dashboardIds: [...result.dashboardIds],
        warnings: result.warnings.length,
      });
      return { run, result };
    } catch (err) {
      const error = toTypedError(err);
      run.error = error;
      skipPendingStages(run);
      transitionRun(run, ReconcileStatus.Failed);
      run.completedAt = new Date().toISOString();
      log.error('Provision failed', {
        event: 'provision.failed',
        code: error.code,
        stage: error.stage,
        error: error.message,
        retryable: error.retryable,
      });
      return { run, error };
    }
  }

  private async runStage<T>(run: ReconciliationRun, stage: Stage, log: Logger, work: () => Promise<T>): Promise<T> {
    const record = run.stages[stage];
    transitionStage(record, StageStatus.Running);
    record.startedAt = new Date().toISOString();
    const started = Date.now();
    log.debug('Stage start', { event: 'stage.start', stage });

    try {
      const value = await work();
      transitionStage(record, StageStatus.Succeeded);
      record.completedAt = new Date().toISOString();
      record.durationMs = Date.now() - started;
      log.info('Stage complete', { event: 'stage.complete', stage, durationMs: record.durationMs });
      return value;
    } catch (err) {
      transitionStage(record, StageStatus.Failed);
      record.completedAt = new Date().toISOString();
      record.durationMs = Date.now() - started;
      record.error = toTypedError(err);
      throw err;
    }
  }
}

function createRun(projectId: string, correlationId: string): ReconciliationRun {
  const pending = (stage: Stage): StageRecord => ({ stage, status: StageStatus.Pending });
  return {
    correlationId,
    projectId,
    status: ReconcileStatus.Pending,
    stages: {
      [Stage.EnsureGroup]: pending(Stage.EnsureGroup),
      [Stage.EnsureAccessMapping]: pending(Stage.EnsureAccessMapping),
      [Stage.EnsureFolder]: pending(Stage.EnsureFolder),
      [Stage.CloneDashboards]: pending(Stage.CloneDashboards),
    },
  };
}

function transitionRun(run: ReconciliationRun, target: ReconcileStatus): void {
  const result = transitionReconcileStatus(run.status, target);
  if (!result.success || !result.newStatus) {
    throw new ProvisioningError(result.error ?? internalError(`Cannot move run to ${target}`));
  }
  run.status = result.newStatus;
}

function transitionStage(record: StageRecord, target: StageStatus): void {
  const result = transitionStageStatus(record.status, target);
  if (!result.success || !result.newStatus) {
    throw new ProvisioningError(result.error ?? internalError(`Cannot move stage ${record.stage} to ${target}`));
  }
  record.status = result.newStatus;
}

function skipPendingStages(run: ReconciliationRun): void {
  for (const stage of STAGE_ORDER) {
    if (run.stages[stage].status === StageStatus.Pending) {
      transitionStage(run.stages[stage], StageStatus.Skipped);
    }
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
