import { config } from './config';
import { log, loggerOptions } from './logger';
import { buildApp } from './server';
import { HaikuStorageService } from './services/haikuStorageService';

/**
 * Main entrypoint for the haiku store.
 * Builds the storage service from env credentials, starts Fastify, and
 * releases the store client on shutdown.
 */
async function main() {
  const storage = new HaikuStorageService({ url: config.store.url, key: config.store.key });
  const app = await buildApp({ storage, logger: loggerOptions });

  app.addHook('onClose', async () => {
    await storage.close();
  });

  if (!storage.isAvailable()) {
    app.log.warn('Haiku storage is not configured; reads return empty results and writes are rejected');
  }

  const shutdown = (signal: string) => {
    app.log.info({ signal }, 'Shutting down');
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Haiku store listening on http://${config.host}:${config.port}`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  log.fatal({ err }, 'Fatal error starting haiku store');
  process.exit(1);
});
