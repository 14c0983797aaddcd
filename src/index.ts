/**
 * BI Provisioner: idempotent onboarding of a cloud project into a BI
 * platform. It creates one group, its access mapping, a project folder and
 * dashboards cloned from templates, reconciled from a single inbound event.
 *
 * Public exports for programmatic use. The HTTP server starts from
 * `main.ts` and the command line from `cli.ts`.
 */

export { createApp, createAppContext, AppContext, VERSION } from './server';
export {
  createDashboardHandler,
  createFolderHandler,
  createGroupMappingHandler,
  createProvisionHandler,
  createProvisionHandlers,
  unwrapEvent,
  ProvisionHandler,
  ProvisionHandlerOptions,
  ProvisionHandlers,
  StageHandler,
} from './handler';
export * from './config';
export * from './domain';
export * from './logger';
export * from './validation/payload-validator';
export * from './templating/token-substitution';
export * from './remote/client';
export * from './remote/http-client';
export * from './remote/memory-client';
export * from './remote/title-matching';
export * from './engine/deadline';
export * from './engine/reconciler';
export * from './engine/reporter';
export * from './engine/stages';
export * from './engine/state-machine';
export * from './engine/template-resolution';
