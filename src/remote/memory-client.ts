/**
 * In-memory Remote State Client.
 *
 * Reference implementation for development and testing. Every value
 * crossing the boundary is deep-copied so callers can never mutate the
 * simulated platform state.
 */

import {
  AccessConfig,
  DashboardClone,
  DashboardTextFields,
  RemoteDashboard,
  RemoteFolder,
  RemoteGroup,
} from '../domain/remote';
import { RemoteCallError, RemoteStateClient } from './client';
import { matchesCloneTitle } from './title-matching';

/** Remote calls the fake counts and can be told to fail. */
export type RemoteOperation =
  | 'findGroupByName'
  | 'createGroup'
  | 'getAccessConfig'
  | 'appendGroupToAccessConfig'
  | 'findFolderByName'
  | 'createFolder'
  | 'getDashboard'
  | 'listDashboardsInFolder'
  | 'findDashboardByTitle'
  | 'cloneDashboard'
  | 'updateDashboardText';

/** Operations that add or change remote entities. */
export const MUTATING_OPERATIONS: readonly RemoteOperation[] = [
  'createGroup',
  'appendGroupToAccessConfig',
  'createFolder',
  'cloneDashboard',
  'updateDashboardText',
];

/** The simulated platform. */
export interface MemoryRemoteState {
  groups: RemoteGroup[];
  accessConfig: AccessConfig;
  folders: RemoteFolder[];
  dashboards: RemoteDashboard[];
}

export interface MemoryClientOptions {
  /** Artificial latency added to every remote call. */
  latencyMs?: number;
}

interface InjectedFailure {
  error: RemoteCallError;
  remaining: number;
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

function emptyState(): MemoryRemoteState {
  return {
    groups: [],
    accessConfig: { enabled: true, groups: [] },
    folders: [],
    dashboards: [],
  };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class MemoryRemoteStateClient implements RemoteStateClient {
  private state: MemoryRemoteState;
  private nextId: number;
  private failures = new Map<RemoteOperation, InjectedFailure>();
  private callCounts = new Map<RemoteOperation, number>();

  constructor(seed: Partial<MemoryRemoteState> = {}, private options: MemoryClientOptions = {}) {
    this.state = deepCopy({ ...emptyState(), ...seed });
    const ids = [
      ...this.state.groups.map((g) => g.id),
      ...this.state.folders.map((f) => f.id),
      ...this.state.dashboards.map((d) => d.id),
    ];
    this.nextId = Math.max(0, ...ids) + 1;
  }

  /** Make the next `times` calls of `operation` fail. */
  failOn(operation: RemoteOperation, options: { statusCode?: number; message?: string; times?: number } = {}): void {
    this.failures.set(operation, {
      error: new RemoteCallError(operation, options.message ?? `${operation} unavailable`, options.statusCode),
      remaining: options.times ?? Number.POSITIVE_INFINITY,
    });
  }

  clearFailures(): void {
    this.failures.clear();
  }

  /** How many times `operation` was invoked. */
  callCount(operation: RemoteOperation): number {
    return this.callCounts.get(operation) ?? 0;
  }

  /** Total number of calls that added or changed remote entities. */
  mutationCount(): number {
    return MUTATING_OPERATIONS.reduce((sum, op) => sum + this.callCount(op), 0);
  }

  resetCallCounts(): void {
    this.callCounts.clear();
  }

  /** Deep copy of the whole simulated platform. */
  snapshot(): MemoryRemoteState {
    return deepCopy(this.state);
  }

  async findGroupByName(name: string): Promise<RemoteGroup[]> {
    await this.enter('findGroupByName');
    return this.state.groups.filter((g) => g.name === name).map(deepCopy);
  }

  async createGroup(name: string): Promise<RemoteGroup> {
    await this.enter('createGroup');
    const group: RemoteGroup = { id: this.allocateId(), name };
    this.state.groups.push(group);
    return deepCopy(group);
  }

  async getAccessConfig(): Promise<AccessConfig> {
    await this.enter('getAccessConfig');
    return deepCopy(this.state.accessConfig);
  }

  groupIsMappedInAccessConfig(config: AccessConfig, groupId: number): boolean {
    return config.groups.some((entry) => entry.groupId === groupId);
  }

  async appendGroupToAccessConfig(config: AccessConfig, groupId: number, groupName: string): Promise<AccessConfig> {
    await this.enter('appendGroupToAccessConfig');
    // Writes the caller's view back whole, as the platform's update endpoint does.
    const written: AccessConfig = {
      ...deepCopy(config),
      groups: [...deepCopy(config.groups), { groupId, name: groupName }],
    };
    this.state.accessConfig = written;
    return deepCopy(written);
  }

  async findFolderByName(name: string, parentId: number | null): Promise<RemoteFolder[]> {
    await this.enter('findFolderByName');
    return this.state.folders.filter((f) => f.name === name && f.parentId === parentId).map(deepCopy);
  }

  async createFolder(name: string, parentId: number | null): Promise<RemoteFolder> {
    await this.enter('createFolder');
    if (parentId !== null && !this.state.folders.some((f) => f.id === parentId)) {
      throw new RemoteCallError('createFolder', `Parent folder ${parentId} not found`, 404);
    }
    const folder: RemoteFolder = { id: this.allocateId(), name, parentId };
    this.state.folders.push(folder);
    return deepCopy(folder);
  }

  async getDashboard(dashboardId: number): Promise<RemoteDashboard> {
    await this.enter('getDashboard');
    return deepCopy(this.requireDashboard('getDashboard', dashboardId));
  }

  async listDashboardsInFolder(folderId: number): Promise<RemoteDashboard[]> {
    await this.enter('listDashboardsInFolder');
    return this.state.dashboards.filter((d) => d.folderId === folderId).map(deepCopy);
  }

  async findDashboardByTitle(title: string, folderId: number): Promise<DashboardClone | null> {
    await this.enter('findDashboardByTitle');
    const found = this.state.dashboards.find((d) => d.folderId === folderId && matchesCloneTitle(d.title, title));
    return found ? deepCopy(found) : null;
  }

  async cloneDashboard(templateId: number, folderId: number, title: string): Promise<DashboardClone> {
    await this.enter('cloneDashboard');
    const template = this.requireDashboard('cloneDashboard', templateId);
    if (!this.state.folders.some((f) => f.id === folderId)) {
      throw new RemoteCallError('cloneDashboard', `Folder ${folderId} not found`, 404);
    }
    const clone: DashboardClone = {
      id: this.allocateId(),
      title,
      description: template.description,
      folderId,
    };
    this.state.dashboards.push(clone);
    return deepCopy(clone);
  }

  async updateDashboardText(dashboardId: number, resolvedFields: DashboardTextFields): Promise<void> {
    await this.enter('updateDashboardText');
    const dashboard = this.requireDashboard('updateDashboardText', dashboardId);
    dashboard.title = resolvedFields.title;
    dashboard.description = resolvedFields.description;
  }

  private async enter(operation: RemoteOperation): Promise<void> {
    this.callCounts.set(operation, this.callCount(operation) + 1);
    if (this.options.latencyMs) {
      await sleep(this.options.latencyMs);
    }
    const failure = this.failures.get(operation);
    if (failure && failure.remaining > 0) {
      failure.remaining -= 1;
      if (failure.remaining === 0) this.failures.delete(operation);
      throw failure.error;
    }
  }

  private requireDashboard(operation: RemoteOperation, dashboardId: number): RemoteDashboard {
    const dashboard = this.state.dashboards.find((d) => d.id === dashboardId);
    if (!dashboard) {
      throw new RemoteCallError(operation, `Dashboard ${dashboardId} not found`, 404);
    }
    return dashboard;
  }

  private allocateId(): number {
    const id = this.nextId;
    this.nextId += 1;
    return id;
  }
}
