/**
 * sqlcase server - main entry point.
 */

import { buildApp } from './app.js';
import { config } from './config.js';
import { QueryEngine } from './engine.js';
import { logger } from './utils/logger.js';

/**
 * Engine configured from the environment.
 */
export function createEngine(): QueryEngine {
  return new QueryEngine({
    connection: config.DATABASE,
    llm: config.LLM_CONFIG,
    clearDependents: config.CLEAR_DEPENDENTS,
    maxPerCategory: config.MAX_PER_CATEGORY,
    connectTimeoutMs: config.CONNECT_TIMEOUT_MS,
  });
}

/**
 * Start the server.
 */
export async function start(port: number = config.PORT, host: string = config.HOST): Promise<void> {
  const fastify = await buildApp(createEngine());

  const shutdown = async () => {
    logger.info('Shutting down sqlcase API server...');
    await fastify.close();
    process.exit(0);
  };
  process.once('SIGINT', () => void shutdown());
  process.once('SIGTERM', () => void shutdown());

  try {
    await fastify.listen({ port, host });
    logger.info(`Server running at http://localhost:${port}`);
    logger.info(`API docs at http://localhost:${port}/docs`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}
