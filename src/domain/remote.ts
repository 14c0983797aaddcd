/**
 * Remote BI-platform entities.
 *
 * The platform is the only source of truth for these; nothing here is
 * cached between invocations.
 */

/** A BI-platform group. */
export interface RemoteGroup {
  id: number;
  name: string;
}

/** One group binding inside the platform's access configuration. */
export interface AccessGroupMapping {
  groupId: number;
  name: string;
  /** Wire fields of the entry the provisioner does not interpret. */
  attributes?: Record<string, unknown>;
}

/**
 * The platform-wide access configuration (SAML group bindings).
 * Only `groups` is ever changed, and only by appending.
 */
export interface AccessConfig {
  enabled: boolean;
  groups: AccessGroupMapping[];
  /** Fields the provisioner does not interpret are carried through untouched. */
  [field: string]: unknown;
}

/** A folder on the BI platform. `parentId` null means the root. */
export interface RemoteFolder {
  id: number;
  name: string;
  parentId: number | null;
}

/** A dashboard on the BI platform, template or clone. */
export interface RemoteDashboard {
  id: number;
  title: string;
  description: string;
  folderId: number | null;
}

/** A dashboard produced by copying a template into a project folder. */
export type DashboardClone = RemoteDashboard;

/** The text-bearing fields the provisioner is allowed to rewrite. */
export interface DashboardTextFields {
  title: string;
  description: string;
}

/** Canonical folder name for a project. */
export function projectFolderName(projectId: string): string {
  return `Project: ${projectId}`;
}
