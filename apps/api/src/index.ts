import { getConfig } from '@mergington/config';
import { logger } from '@mergington/utils';

import { setupGracefulShutdown } from './lib/shutdown';
import { createServer } from './server';

async function main() {
  const config = getConfig();

  const app = await createServer({ config });

  // Setup graceful shutdown
  setupGracefulShutdown(app);

  try {
    const address = await app.listen({
      port: config.api.port,
      host: config.api.host,
    });

    logger.info(`Server running at ${address}`);
    if (config.docs.enabled) {
      logger.info(`API docs at ${address}/docs`);
    }
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((error) => {
  logger.error({ error }, 'Unhandled error during startup');
  process.exit(1);
});
