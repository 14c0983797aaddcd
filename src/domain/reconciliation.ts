/**
 * Reconciliation run domain model.
 *
 * Per-invocation working state of the Reconciler: one overall status and
 * one status per stage, moving through fixed transition tables.
 */

import { TypedError } from './errors';

/** Reconciliation lifecycle states. */
export enum ReconcileStatus {
  Pending = 'pending',
  Running = 'running',
  Completed = 'completed',
  Failed = 'failed',
}

/** The four ordered stages. */
export enum Stage {
  EnsureGroup = 'ensure_group',
  EnsureAccessMapping = 'ensure_access_mapping',
  EnsureFolder = 'ensure_folder',
  CloneDashboards = 'clone_dashboards',
}

/** Stage execution order. A stage never starts before its predecessor succeeded. */
export const STAGE_ORDER: readonly Stage[] = [
  Stage.EnsureGroup,
  Stage.EnsureAccessMapping,
  Stage.EnsureFolder,
  Stage.CloneDashboards,
];

/** Stage-level states. */
export enum StageStatus {
  Pending = 'pending',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Skipped = 'skipped',
}

/** Valid state transitions for a reconciliation. */
export const VALID_RECONCILE_TRANSITIONS: Record<ReconcileStatus, ReconcileStatus[]> = {
  [ReconcileStatus.Pending]: [ReconcileStatus.Running, ReconcileStatus.Failed],
  [ReconcileStatus.Running]: [ReconcileStatus.Completed, ReconcileStatus.Failed],
  [ReconcileStatus.Completed]: [],
  [ReconcileStatus.Failed]: [],
};

/** Valid state transitions for a stage. */
export const VALID_STAGE_TRANSITIONS: Record<StageStatus, StageStatus[]> = {
  [StageStatus.Pending]: [StageStatus.Running, StageStatus.Skipped],
  [StageStatus.Running]: [StageStatus.Succeeded, StageStatus.Failed],
  [StageStatus.Succeeded]: [],
  [StageStatus.Failed]: [],
  [StageStatus.Skipped]: [],
};

/** Result of a single stage. */
export interface StageRecord {
  stage: Stage;
  status: StageStatus;
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
  error?: TypedError;
}

/** Working state of one invocation. */
export interface ReconciliationRun {
  correlationId: string;
  projectId: string;
  status: ReconcileStatus;
  startedAt?: string;
  completedAt?: string;
  stages: Record<Stage, StageRecord>;
  error?: TypedError;
}
