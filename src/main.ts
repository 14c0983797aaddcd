/**
 * HTTP server entry point.
 */

import { ProvisionerConfig, loadConfig } from './config';
import { toTypedError } from './domain/errors';
import { logger, setLogLevel } from './logger';
import { createApp, createAppContext } from './server';

function main(): void {
  let config: ProvisionerConfig;
  try {
    config = loadConfig();
  } catch (err) {
    const error = toTypedError(err);
    logger.error('Invalid configuration', { event: 'config.invalid', code: error.code, error: error.message });
    process.exitCode = 1;
    return;
  }

  setLogLevel(config.logLevel);
  const context = createAppContext(config);
  if (!context.client) {
    logger.warn('BI platform connection is not configured; provision requests will fail', {
      event: 'config.client_unavailable',
    });
  }

  const { port } = config;
  createApp(context).listen(port, () => {
    logger.info('Server listening', { event: 'server.start', port });
  });
}

main();
