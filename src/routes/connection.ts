/**
 * Connection profile endpoint.
 */

import type { FastifyPluginAsync } from 'fastify';
import type { RouteOptions } from './use-cases.js';

export const connectionRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { engine }) => {
  // PUT /api/v1/connection - Swap the database the engine talks to
  fastify.put(
    '/api/v1/connection',
    {
      schema: {
        description: 'Update the database connection; invalidates the catalog',
        tags: ['Connection'],
        body: {
          type: 'object',
          properties: {
            backendKind: { type: 'string', description: 'mysql, postgres or sqlite' },
            host: { type: 'string' },
            port: { description: 'Numeric port; backend default when omitted' },
            database: { type: 'string' },
            user: { type: 'string' },
            password: { type: 'string' },
          },
          required: ['backendKind'],
        },
      },
    },
    async (request) => engine.updateConnectionProfile(request.body)
  );
};
