/**
 * Catalog endpoints.
 */

import type { FastifyPluginAsync } from 'fastify';
import type { QueryEngine } from '../engine.js';

export interface RouteOptions {
  engine: QueryEngine;
}

const IdParamsSchema = {
  type: 'object',
  properties: {
    id: { type: 'string', description: 'Use case id or description' },
  },
  required: ['id'],
};

export const useCaseRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { engine }) => {
  // GET /api/v1/use_cases - List the catalog, generating it on first access
  fastify.get(
    '/api/v1/use_cases',
    { schema: { description: 'List all use cases', tags: ['Use cases'] } },
    async () => {
      const catalog = await engine.listCatalog();
      return {
        use_cases: catalog.useCases.map((useCase) => ({
          id: useCase.id,
          description: useCase.description,
          category: useCase.category,
        })),
        total: catalog.useCases.length,
        backend_kind: catalog.backendKind,
        generated_at: catalog.generatedAt.toISOString(),
      };
    }
  );

  // GET /api/v1/affected_columns - Affected columns of every use case
  fastify.get(
    '/api/v1/affected_columns',
    { schema: { description: 'Affected columns for all use cases', tags: ['Use cases'] } },
    async () => {
      const { useCases } = await engine.listCatalog();
      return {
        affected_columns: useCases.map((useCase) => ({
          id: useCase.id,
          description: useCase.description,
          affected_columns: useCase.affectedColumns,
        })),
      };
    }
  );

  // GET /api/v1/use_case/:id - One use case with its template
  fastify.get<{ Params: { id: string } }>(
    '/api/v1/use_case/:id',
    { schema: { description: 'Use case details', tags: ['Use cases'], params: IdParamsSchema } },
    async (request) => {
      const useCase = await engine.getUseCase(request.params.id);
      return {
        id: useCase.id,
        description: useCase.description,
        category: useCase.category,
        query: useCase.template,
        input_parameters: useCase.inputParameters,
      };
    }
  );

  // GET /api/v1/use_case_columns/:id - Columns a use case reads, writes and takes input for
  fastify.get<{ Params: { id: string } }>(
    '/api/v1/use_case_columns/:id',
    { schema: { description: 'Affected and input columns of a use case', tags: ['Use cases'], params: IdParamsSchema } },
    async (request) => {
      const useCase = await engine.getUseCase(request.params.id);
      return {
        id: useCase.id,
        description: useCase.description,
        affected_columns: useCase.affectedColumns,
        input_columns: useCase.inputColumns,
        input_parameters: useCase.inputParameters,
      };
    }
  );

  // POST /api/v1/use_cases/refresh - Drop the cached catalog
  fastify.post(
    '/api/v1/use_cases/refresh',
    { schema: { description: 'Invalidate the catalog; the next read regenerates it', tags: ['Use cases'] } },
    async () => {
      engine.refreshCatalog();
      return { message: 'Catalog invalidated' };
    }
  );
};
