/**
 * Remote State Client interface.
 *
 * The capability surface the Reconciler needs from the BI platform.
 * Implementations perform exactly one remote round-trip per call where
 * they can and never retry; a failed call surfaces as RemoteCallError.
 */

import {
  AccessConfig,
  DashboardClone,
  DashboardTextFields,
  RemoteDashboard,
  RemoteFolder,
  RemoteGroup,
} from '../domain/remote';

export interface RemoteStateClient {
  /** Every group whose name equals `name` exactly. Empty when absent. */
  findGroupByName(name: string): Promise<RemoteGroup[]>;
  createGroup(name: string): Promise<RemoteGroup>;

  getAccessConfig(): Promise<AccessConfig>;
  groupIsMappedInAccessConfig(config: AccessConfig, groupId: number): boolean;
  /**
   * Read-merge-write: append one mapping to the groups already in `config`
   * and write the whole list back. Returns the config as written.
   */
  appendGroupToAccessConfig(config: AccessConfig, groupId: number, groupName: string): Promise<AccessConfig>;

  /** Folders named exactly `name` directly under `parentId` (null = root). */
  findFolderByName(name: string, parentId: number | null): Promise<RemoteFolder[]>;
  createFolder(name: string, parentId: number | null): Promise<RemoteFolder>;

  getDashboard(dashboardId: number): Promise<RemoteDashboard>;
  listDashboardsInFolder(folderId: number): Promise<RemoteDashboard[]>;
  findDashboardByTitle(title: string, folderId: number): Promise<DashboardClone | null>;
  cloneDashboard(templateId: number, folderId: number, title: string): Promise<DashboardClone>;
  updateDashboardText(dashboardId: number, resolvedFields: DashboardTextFields): Promise<void>;
}

/** A failed call against the BI platform. */
export class RemoteCallError extends Error {
  constructor(
    public operation: string,
    message: string,
    public statusCode?: number,
  ) {
    super(message);
    this.name = 'RemoteCallError';
  }
}
