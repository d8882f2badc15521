/**
 * Fastify application: plugins, routes and error mapping.
 */

import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { ZodError } from 'zod';
import type { QueryEngine } from './engine.js';
import { loggerConfig } from './utils/logger.js';
import { useCaseRoutes } from './routes/use-cases.js';
import { executeRoutes } from './routes/execute.js';
import { connectionRoutes } from './routes/connection.js';
import { utilityRoutes } from './routes/utility.js';
import {
  CatalogGenerationError,
  ConfigurationError,
  LLMError,
  NotFoundError,
  SchemaIntrospectionError,
} from './types/errors.js';

/**
 * Create and configure the server around an engine.
 */
export async function buildApp(engine: QueryEngine): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: loggerConfig,
  });

  await fastify.register(cors, {
    origin: '*',
  });

  await fastify.register(swagger, {
    openapi: {
      info: {
        title: 'sqlcase API',
        description: 'Generate, inspect and execute SQL use cases for a database schema',
        version: '1.0.0',
      },
    },
  });

  await fastify.register(swaggerUi, {
    routePrefix: '/docs',
  });

  await fastify.register(useCaseRoutes, { engine });
  await fastify.register(executeRoutes, { engine });
  await fastify.register(connectionRoutes, { engine });
  await fastify.register(utilityRoutes, { engine });

  fastify.setErrorHandler<FastifyError>((error, _request, reply) => {
    if (error instanceof NotFoundError) {
      reply.status(404).send({
        error: 'NotFoundError',
        message: error.message,
      });
    } else if (error instanceof ConfigurationError) {
      reply.status(400).send({
        error: 'ConfigurationError',
        message: error.message.split('\n')[0],
        issues: error.issues,
        suggestions: error.suggestions,
      });
    } else if (error instanceof ZodError) {
      reply.status(400).send({
        error: 'ValidationError',
        message: 'Invalid request body',
        issues: error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
      });
    } else if (error.validation) {
      reply.status(400).send({
        error: 'ValidationError',
        message: error.message,
      });
    } else if (error instanceof LLMError) {
      reply.status(502).send({
        error: 'LLMError',
        message: 'Language model service unavailable',
        detail: error.message,
      });
    } else if (error instanceof CatalogGenerationError) {
      reply.status(502).send({
        error: 'CatalogGenerationError',
        message: error.message,
        suggestions: error.suggestions,
      });
    } else if (error instanceof SchemaIntrospectionError) {
      reply.status(500).send({
        error: 'SchemaIntrospectionError',
        message: error.message,
      });
    } else {
      reply.status(500).send({
        error: 'InternalServerError',
        message: error.message || 'An unexpected error occurred',
      });
    }
  });

  fastify.addHook('onClose', async () => {
    await engine.close();
  });

  return fastify;
}
