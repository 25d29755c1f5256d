import { buildApp } from './app.js';
import { getEnv, getPort, getHost } from './lib/env/index.js';

async function start() {
  try {
    // Validate environment variables
    const env = getEnv();

    // Build application
    const { app, logger } = await buildApp({ env });

    // Start server
    const port = getPort(env);
    const host = getHost(env);

    await app.listen({ port, host });
    logger.info({ port, host }, 'Server listening');

    const shutdown = (signal: NodeJS.Signals) => {
      logger.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error(err instanceof Error ? err : new Error(String(err)), 'Failed to close server');
          process.exit(1);
        }
      );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  } catch (err) {
    console.error('Failed to start server:', err);
    process.exit(1);
  }
}

void start();
