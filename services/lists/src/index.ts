import { buildApp } from './server';
import { config } from './config';
import { closeRedis } from './redis/client';

/**
 * Main entrypoint for the lists service.
 * Loads every collection, registers health + collection routes, and listens on configured host/port.
 */
async function main() {
  const app = await buildApp({ logger: { level: config.logLevel } });

  app.addHook('onClose', async () => {
    await closeRedis();
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Lists server listening on http://${config.host}:${config.port}`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  console.error('Fatal error starting lists service:', err);
  process.exit(1);
});
