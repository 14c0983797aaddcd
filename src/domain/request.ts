/**
 * Provision request domain model.
 *
 * The validated, immutable input of a single provisioning invocation.
 */

/** Caller-supplied template tokens, keyed by `[A-Za-z0-9_]+`. */
export type TokenMap = Readonly<Record<string, string>>;

/** A validated provisioning request. Frozen once built. */
export interface ProvisionRequest {
  readonly projectId: string;
  readonly groupEmail: string;
  readonly ancestryPath?: string;
  /** Ordered template ids; absent means "use the configured defaults". */
  readonly templateDashboardIds?: readonly number[];
  readonly templateFolderId?: number;
  readonly tokens: TokenMap;
}

/** Raw inbound payload shape before validation. */
export interface ProvisionPayload {
  projectId?: unknown;
  groupEmail?: unknown;
  ancestryPath?: unknown;
  templateDashboardIds?: unknown;
  templateFolderId?: unknown;
  tokens?: unknown;
}
