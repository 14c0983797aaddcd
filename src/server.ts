/**
 * Express server configuration.
 *
 * Assembles the HTTP surface: health check, the provision routes and the
 * error handler, with the handlers and their client injected.
 */

import express from 'express';
import { errorHandler } from './api/middleware';
import { createProvisionRoutes } from './api/provision';
import { ProvisionerConfig, createRemoteClient, loadConfig } from './config';
import { ProvisionHandlers, createProvisionHandlers } from './handler';
import { Logger, logger } from './logger';
import { RemoteStateClient } from './remote/client';

export const VERSION = '1.0.0';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  config: ProvisionerConfig;
  client: RemoteStateClient | null;
  handlers: ProvisionHandlers;
}

/**
 * Create the application context. The client defaults to the HTTP adapter
 * built from the configuration; pass one to run against something else.
 */
export function createAppContext(
  config: ProvisionerConfig = loadConfig(),
  client: RemoteStateClient | null = createRemoteClient(config),
  log: Logger = logger,
): AppContext {
  return {
    config,
    client,
    handlers: createProvisionHandlers({ client, config, logger: log }),
  };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      uptimeMs: Date.now() - startTime,
      remoteConfigured: ctx.client !== null,
    });
  });

  app.use('/', createProvisionRoutes(ctx.handlers));

  app.use(errorHandler);

  return app;
}
