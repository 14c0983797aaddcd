/**
 * Provisioning outcome model and the outbound response shapes.
 */

/** What the group stage did. */
export type GroupAction = 'created' | 'reused';

/** What the access-mapping stage did. */
export type AccessMappingAction = 'added' | 'existing';

/** What the folder stage did. */
export type FolderAction = 'created' | 'reused';

/** What the dashboard stage did for one template. */
export type DashboardAction = 'cloned' | 'reused';

/** Per-template outcome of the dashboard stage. */
export interface DashboardOutcome {
  templateId: number;
  dashboardId: number;
  title: string;
  action: DashboardAction;
  /** Placeholders left verbatim in the clone's text. */
  unresolvedTokens: string[];
}

/** Created-versus-reused report for a completed run. */
export interface ProvisionActions {
  group: GroupAction;
  accessMapping: AccessMappingAction;
  folder: FolderAction;
  dashboards: DashboardOutcome[];
}

/** Output record of a completed reconciliation. */
export interface ProvisionResult {
  readonly status: 'ok';
  readonly projectId: string;
  readonly groupEmail: string;
  readonly groupId: number;
  readonly folderId: number;
  /** Index-aligned with the effective template list. */
  readonly dashboardIds: readonly number[];
  readonly correlationId: string;
  readonly actions: ProvisionActions;
  /** Non-fatal conditions, such as a failed text update on a fresh clone. */
  readonly warnings: readonly string[];
}

/** Output of the group entry point: group ensured and mapped. */
export interface GroupMappingResult {
  readonly status: 'ok';
  readonly projectId: string;
  readonly groupEmail: string;
  readonly groupId: number;
  readonly correlationId: string;
  readonly actions: Pick<ProvisionActions, 'group' | 'accessMapping'>;
}

/** Output of the folder entry point. */
export interface FolderResult {
  readonly status: 'ok';
  readonly projectId: string;
  readonly groupEmail: string;
  readonly folderId: number;
  readonly correlationId: string;
  readonly actions: Pick<ProvisionActions, 'folder'>;
}

/** Output of the single-dashboard entry point. */
export interface DashboardResult {
  readonly status: 'ok';
  readonly projectId: string;
  readonly groupEmail: string;
  readonly folderId: number;
  readonly dashboardIds: readonly number[];
  readonly correlationId: string;
  readonly actions: Pick<ProvisionActions, 'dashboards'>;
  readonly warnings: readonly string[];
}

export type ErrorStatus = 'error' | 'validation_error';

/** Outbound error shape. */
export interface ProvisionErrorResponse {
  status: ErrorStatus;
  error: string;
  code: string;
  retryable: boolean;
  correlationId?: string;
  projectId?: string;
  groupEmail?: string;
}

/** Every outcome the handler can return. */
export type ProvisionResponse = ProvisionResult | ProvisionErrorResponse;

/** Success or error response of any entry point. */
export type HandlerResponse<R extends { status: 'ok' }> = R | ProvisionErrorResponse;

export function isProvisionResult(response: ProvisionResponse): response is ProvisionResult {
  return response.status === 'ok';
}
