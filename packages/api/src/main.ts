/**
 * Process entrypoint: env config → orchestrator → provider layer → server.
 */

import { Orchestrator, errorMessage } from '@campaigncrew/orchestrator';
import { AdapterManager, AnthropicAdapter } from '@campaigncrew/providers';
import { loadServerConfig } from './config.js';
import { createLogger } from './logger.js';
import { ApiServer } from './server.js';

const logger = createLogger('main');

async function main(): Promise<void> {
  const config = loadServerConfig();

  const orchestrator = new Orchestrator({
    basePath: config.basePath,
    configDir: config.configDir,
    artifactsDir: config.artifactsDir,
    brandsDir: config.brandsDir,
  });
  orchestrator.setEventHandler((event, data) => logger.info({ event, data }, 'Run event'));

  const adapters = new AdapterManager();
  if (config.anthropicApiKey) {
    adapters.register(new AnthropicAdapter({ apiKey: config.anthropicApiKey, model: config.anthropicModel }));
    await adapters.initializeAll();
    orchestrator.setAdapterManager(adapters);
  } else {
    logger.warn('ANTHROPIC_API_KEY not set: planning runs deterministically and research is unavailable');
  }

  const server = new ApiServer({ config, orchestrator });

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Shutting down');
    server
      .stop()
      .then(() => adapters.destroyAll())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await server.start();
}

main().catch((err: unknown) => {
  logger.fatal({ err }, `Failed to start: ${errorMessage(err)}`);
  process.exit(1);
});
