import { ConfigLoader, ConfigValidationError } from './config/schema.js';
import { initLogger } from './observability/logger.js';
import { createApp } from './app.js';

async function main(): Promise<void> {
  const config = ConfigLoader.fromEnv();
  const logger = initLogger(config.observability.logging);

  const app = await createApp(config, logger);
  const { host, port } = config.server;

  await new Promise<void>((resolve, reject) => {
    app.server.once('error', reject);
    app.server.listen(port, host, () => {
      app.server.off('error', reject);
      resolve();
    });
  });
  logger.info({ host, port, env: config.env }, 'Expense server listening');

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Shutting down');
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigValidationError) {
    console.error(error.message);
  } else {
    console.error('Failed to start expense server:', error);
  }
  process.exit(1);
});
