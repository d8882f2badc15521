/**
 * Utility endpoints (health, root).
 */

import type { FastifyPluginAsync } from 'fastify';
import { describeProfile } from '../services/connection.js';
import type { RouteOptions } from './use-cases.js';

export const utilityRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { engine }) => {
  // GET /health - Health check
  fastify.get('/health', async () => {
    return {
      status: 'ok',
      database: {
        backend_kind: engine.backendKind,
        profile: describeProfile(engine.getConnectionProfile()),
      },
    };
  });

  // GET / - Root endpoint
  fastify.get('/', async () => {
    return {
      name: 'sqlcase API',
      version: '1.0.0',
      description: 'Schema-driven use-case query engine',
      docs: '/docs',
    };
  });
};
