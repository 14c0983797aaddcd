/**
 * Provisioning event handlers.
 *
 * The full handler is the entry point shared by the HTTP route and the CLI:
 * decode the event, validate it, resolve the template list, reconcile and
 * report. The group, folder and dashboard handlers run one stage each on
 * the same contract. Every returned promise resolves to one response object.
 *
 * Accepted events:
 *   - raw bytes or a string holding the JSON payload
 *   - the payload object itself
 *   - a push envelope `{ data: "<base64 JSON>" }` or
 *     `{ message: { data: "<base64 JSON>" } }`
 */

import { v4 as uuid } from 'uuid';
import { ConfigError, createTypedError, toTypedError } from './domain/errors';
import { ProvisionRequest } from './domain/request';
import {
  DashboardResult,
  FolderResult,
  GroupMappingResult,
  HandlerResponse,
  ProvisionResponse,
} from './domain/result';
import { Deadline } from './engine/deadline';
import { Reconciler } from './engine/reconciler';
import { errorResponseFrom } from './engine/reporter';
import { StageContext, cloneDashboards, ensureAccessMapping, ensureFolder, ensureGroup } from './engine/stages';
import { resolveTemplateIds } from './engine/template-resolution';
import { ProvisionerConfig } from './config';
import { Logger, logger as rootLogger } from './logger';
import { RemoteStateClient } from './remote/client';
import {
  decodePayload,
  isRecord,
  parseDashboardTarget,
  parseProvisionPayload,
} from './validation/payload-validator';

export interface ProvisionHandlerOptions {
  /** Null when the platform is not configured; every event then fails. */
  client: RemoteStateClient | null;
  config: ProvisionerConfig;
  logger?: Logger;
  /** Correlation id source. */
  newCorrelationId?: () => string;
}

export type ProvisionHandler = (event: unknown) => Promise<ProvisionResponse>;

/** An entry point that runs part of the provisioning. */
export type StageHandler<R extends { status: 'ok' }> = (event: unknown) => Promise<HandlerResponse<R>>;

/** Every entry point, built over one client and configuration. */
export interface ProvisionHandlers {
  provision: ProvisionHandler;
  groupMapping: StageHandler<GroupMappingResult>;
  folder: StageHandler<FolderResult>;
  dashboard: StageHandler<DashboardResult>;
}

/** What an entry point's work gets once the event is valid and a client exists. */
interface Invocation {
  client: RemoteStateClient;
  correlationId: string;
  /** Carries the project and correlation ids. */
  log: Logger;
  /** From here on the work logs its own failure. */
  handOff(): void;
}

function envelopeData(value: unknown): string | undefined {
  if (!isRecord(value)) return undefined;
  if (typeof value.data === 'string' && !('projectId' in value)) return value.data;
  if (isRecord(value.message) && typeof value.message.data === 'string') return value.message.data;
  return undefined;
}

/**
 * Unwrap a push envelope if there is one. Returns what the payload
 * validator should see: the envelope's decoded bytes, or the event as is.
 */
export function unwrapEvent(event: unknown): unknown {
  const decoded = decodePayload(event);
  if (decoded.error) return event;
  const data = envelopeData(decoded.value);
  return data === undefined ? event : Buffer.from(data, 'base64');
}

function createEntryPoint<I extends { request: ProvisionRequest }, R extends { status: 'ok' }>(
  options: ProvisionHandlerOptions,
  parse: (event: unknown) => I,
  work: (input: I, invocation: Invocation) => Promise<R>,
): StageHandler<R> {
  const { client } = options;
  const baseLogger = options.logger ?? rootLogger;
  const newCorrelationId = options.newCorrelationId ?? (() => uuid());

  return async (event: unknown): Promise<HandlerResponse<R>> => {
    const correlationId = newCorrelationId();
    const log = baseLogger.child({ correlationId });
    let request: ProvisionRequest | undefined;
    let handedOff = false;

    try {
      const input = parse(unwrapEvent(event));
      request = input.request;

      if (!client) {
        throw new ConfigError(
          createTypedError({
            code: 'CONFIG.CLIENT_UNAVAILABLE',
            message: 'BI platform connection is not configured (set BI_BASE_URL, BI_CLIENT_ID and BI_CLIENT_SECRET)',
            retryable: false,
          }),
        );
      }

      return await work(input, {
        client,
        correlationId,
        log: log.child({ projectId: request.projectId }),
        handOff: () => {
          handedOff = true;
        },
      });
    } catch (err) {
      const error = toTypedError(err);
      const response = errorResponseFrom(error, {
        correlationId,
        projectId: request?.projectId,
        groupEmail: request?.groupEmail,
      });
      if (!request) {
        log.warn('Provision request rejected', { event: 'provision.rejected', code: response.code, error: response.error });
      } else if (!handedOff) {
        log.error('Provision request not processed', {
          event: 'provision.failed',
          projectId: request.projectId,
          code: response.code,
          stage: error.stage,
          error: response.error,
        });
      }
      return response;
    }
  };
}

function stageContext(request: ProvisionRequest, invocation: Invocation, config: ProvisionerConfig): StageContext {
  return {
    client: invocation.client,
    request,
    log: invocation.log,
    deadline: new Deadline(config.deadlineMs),
  };
}

/** Run all four stages for one project. */
export function createProvisionHandler(options: ProvisionHandlerOptions): ProvisionHandler {
  const { config } = options;
  const baseLogger = options.logger ?? rootLogger;

  return createEntryPoint(
    options,
    (event) => ({ request: parseProvisionPayload(event) }),
    async ({ request }, invocation) => {
      const templates = await resolveTemplateIds(request, config, invocation.client);
      invocation.log.debug('Templates resolved', {
        event: 'templates.resolved',
        source: templates.source,
        templateIds: templates.templateIds,
      });

      const reconciler = new Reconciler(invocation.client, {
        parentFolderId: config.parentFolderId,
        groupMatchPolicy: config.groupMatchPolicy,
        groupAliasPrefix: config.groupAliasPrefix,
        tokenPolicy: config.tokenPolicy,
        deadlineMs: config.deadlineMs,
        logger: baseLogger,
      });
      invocation.handOff();
      return reconciler.reconcile(request, templates.templateIds, invocation.correlationId);
    },
  );
}

/** Ensure the project's group exists and is mapped in the access configuration. */
export function createGroupMappingHandler(options: ProvisionHandlerOptions): StageHandler<GroupMappingResult> {
  const { config } = options;

  return createEntryPoint(
    options,
    (event) => ({ request: parseProvisionPayload(event) }),
    async ({ request }, invocation): Promise<GroupMappingResult> => {
      const ctx = stageContext(request, invocation, config);
      const { group, action } = await ensureGroup(ctx, {
        policy: config.groupMatchPolicy,
        aliasPrefix: config.groupAliasPrefix,
      });
      const accessMapping = await ensureAccessMapping(ctx, group.id);
      return {
        status: 'ok',
        projectId: request.projectId,
        groupEmail: request.groupEmail,
        groupId: group.id,
        correlationId: invocation.correlationId,
        actions: { group: action, accessMapping },
      };
    },
  );
}

/** Ensure the project folder exists under the configured parent. */
export function createFolderHandler(options: ProvisionHandlerOptions): StageHandler<FolderResult> {
  const { config } = options;

  return createEntryPoint(
    options,
    (event) => ({ request: parseProvisionPayload(event) }),
    async ({ request }, invocation): Promise<FolderResult> => {
      const { folderId, action } = await ensureFolder(stageContext(request, invocation, config), config.parentFolderId);
      return {
        status: 'ok',
        projectId: request.projectId,
        groupEmail: request.groupEmail,
        folderId,
        correlationId: invocation.correlationId,
        actions: { folder: action },
      };
    },
  );
}

/** Clone one template into a given folder, reusing an existing clone. */
export function createDashboardHandler(options: ProvisionHandlerOptions): StageHandler<DashboardResult> {
  const { config } = options;

  return createEntryPoint(
    options,
    parseDashboardTarget,
    async ({ request, templateId, folderId }, invocation): Promise<DashboardResult> => {
      const { outcomes, warnings } = await cloneDashboards(
        stageContext(request, invocation, config),
        folderId,
        [templateId],
        config.tokenPolicy,
      );
      return {
        status: 'ok',
        projectId: request.projectId,
        groupEmail: request.groupEmail,
        folderId,
        dashboardIds: outcomes.map((o) => o.dashboardId),
        correlationId: invocation.correlationId,
        actions: { dashboards: outcomes },
        warnings,
      };
    },
  );
}

export function createProvisionHandlers(options: ProvisionHandlerOptions): ProvisionHandlers {
  return {
    provision: createProvisionHandler(options),
    groupMapping: createGroupMappingHandler(options),
    folder: createFolderHandler(options),
    dashboard: createDashboardHandler(options),
  };
}
