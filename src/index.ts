/**
 * Pagewright: automated build and revise pipeline for static web apps.
 *
 * Entry point for the HTTP service, and the public exports for embedding
 * the pipeline with other collaborators.
 */

import { createApp, createAppContext } from './server';
import { loadConfig } from './config';
import { logger, setLogLevel } from './logger';

// Public exports for programmatic use
export { createApp, createAppContext, SERVICE_VERSION } from './server';
export type { AppContext, AppContextOverrides } from './server';
export { loadConfig, configuredSecrets } from './config';
export type { AppConfig } from './config';
export * from './logger';
export * from './domain';
export * from './security';
export * from './attachments';
export * from './collaborators';
export * from './engine';
export * from './notifications';

function main(): void {
  const config = loadConfig(process.env);
  setLogLevel(config.logLevel);

  const context = createAppContext(config);
  const app = createApp(context);
  const server = app.listen(config.port, () => {
    logger.info('Server listening', { port: config.port });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal, pendingNotifications: context.dispatcher.getPending().length });
    server.close(() => {
      context.dispatcher
        .whenIdle()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error('Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
          process.exit(1);
        });
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
  main();
}
