/**
 * Execution endpoints.
 */

import type { FastifyPluginAsync } from 'fastify';
import {
  DraftQueryRequestSchema,
  ExecuteUseCaseRequestSchema,
  UpdateDataRequestSchema,
  type ExecutionOutcome,
} from '../types/models.js';
import type { RouteOptions } from './use-cases.js';

/**
 * HTTP status for an execution outcome.
 */
export function statusFor(outcome: ExecutionOutcome): number {
  if (outcome.type !== 'failure') {
    return 200;
  }
  switch (outcome.kind) {
    case 'constraint_violation':
      return 409;
    case 'syntax_defect':
      return 400;
    case 'operational':
    case 'connection':
      return 503;
    case 'unknown':
      return 500;
  }
}

export const executeRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { engine }) => {
  // POST /api/v1/execute_use_case - Run a catalog entry with caller inputs
  fastify.post(
    '/api/v1/execute_use_case',
    {
      schema: {
        description: 'Execute a use case from the catalog',
        tags: ['Execution'],
        body: {
          type: 'object',
          properties: {
            use_case: { type: 'string', minLength: 1, description: 'Use case id or description' },
            user_inputs: { description: 'Values by placeholder name (object) or by position (array)' },
          },
          required: ['use_case'],
        },
      },
    },
    async (request, reply) => {
      const body = ExecuteUseCaseRequestSchema.parse(request.body);
      const result = await engine.execute({ useCaseId: body.use_case }, body.user_inputs);
      return reply.status(statusFor(result.outcome)).send(result);
    }
  );

  // POST /api/v1/update_data - Run a caller-supplied template
  fastify.post(
    '/api/v1/update_data',
    {
      schema: {
        description: 'Execute a statement template with parameters',
        tags: ['Execution'],
        body: {
          type: 'object',
          properties: {
            use_case: { type: 'string', description: 'Catalog entry the statement belongs to' },
            query: { type: 'string', minLength: 1 },
            params: { description: 'Values by placeholder name (object) or by position (array)' },
          },
          required: ['query'],
        },
      },
    },
    async (request, reply) => {
      const body = UpdateDataRequestSchema.parse(request.body);
      const useCase = body.use_case ? await engine.getUseCase(body.use_case) : null;
      const result = await engine.execute({ template: body.query }, body.params);
      return reply.status(statusFor(result.outcome)).send({
        ...result,
        useCase: useCase
          ? { id: useCase.id, description: useCase.description, category: useCase.category }
          : null,
      });
    }
  );

  // POST /api/v1/draft_query - Draft one statement from a description
  fastify.post(
    '/api/v1/draft_query',
    {
      schema: {
        description: 'Draft an SQL statement for a business operation (not executed)',
        tags: ['Execution'],
        body: {
          type: 'object',
          properties: {
            use_case: { type: 'string', minLength: 1, maxLength: 500 },
          },
          required: ['use_case'],
        },
      },
    },
    async (request) => {
      const body = DraftQueryRequestSchema.parse(request.body);
      const useCase = await engine.draftQuery(body.use_case);
      return {
        use_case: useCase.description,
        category: useCase.category,
        query: useCase.template,
        input_parameters: useCase.inputParameters,
        input_columns: useCase.inputColumns,
        affected_columns: useCase.affectedColumns,
      };
    }
  );
};
