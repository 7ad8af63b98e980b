/**
 * Recipe service entry point.
 *
 * Loads configuration, starts the storage backend (failure is fatal),
 * serves the HTTP API and shuts down gracefully on SIGTERM/SIGINT.
 */

import { ConfigError, loadConfig, type ServiceConfig } from '../config.ts';
import { createLogger } from '../logger.ts';
import { createRecipeStorage, RecipeService } from './recipes/index.ts';
import { buildServer } from './server.ts';

let config: ServiceConfig;
try {
  config = loadConfig();
} catch (err) {
  console.error(err instanceof ConfigError ? err.message : `Failed to load configuration: ${String(err)}`);
  process.exit(1);
}

const logger = createLogger(config.service.name, { level: config.logging.level });
const storage = createRecipeStorage(config.storage, createLogger(`${config.service.name}:storage`, { level: config.logging.level }));
const service = new RecipeService(storage, { logger });

try {
  await service.start();
} catch (err) {
  logger.error('Failed to start recipe storage', { backend: config.storage.backend, error: err });
  process.exit(1);
}

const app = buildServer({
  service,
  logLevel: config.logging.level,
  requestTimeoutMs: config.server.requestTimeoutMs,
});

async function shutdown(signal: string): Promise<void> {
  logger.info('Shutting down', { signal });
  try {
    await app.close();
    await service.stop();
    process.exit(0);
  } catch (err) {
    logger.error('Shutdown failed', { error: err });
    process.exit(1);
  }
}

process.once('SIGTERM', () => void shutdown('SIGTERM'));
process.once('SIGINT', () => void shutdown('SIGINT'));

await app.listen({ port: config.server.port, host: config.server.host });
logger.info('Recipe service listening', { port: config.server.port, backend: config.storage.backend });
