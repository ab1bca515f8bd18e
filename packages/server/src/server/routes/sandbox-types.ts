import type { FastifyInstance } from 'fastify';
import {
  ApiErrorCode,
  sandboxTypeRegistrationSchema,
  type RegistrationResponse,
  type SandboxTypeRegistration,
} from '@warmbox/shared';
import type { SandboxManager } from '../../sandbox/manager.js';
import { toTypeSummary } from '../../sandbox/registry.js';
import { createErrorResponse, createSuccessResponse } from '../types.js';

/**
 * Register sandbox type routes
 */
export function registerSandboxTypeRoutes(app: FastifyInstance, manager: SandboxManager): void {
  /**
   * GET /api/v1/sandbox-types - List registered types
   */
  app.get('/api/v1/sandbox-types', async (request, reply) => {
    const types = manager.registry.list().map(toTypeSummary);
    return reply.send(createSuccessResponse(types, request.id));
  });

  /**
   * POST /api/v1/sandbox-types - Register or replace a type
   */
  app.post<{ Body: SandboxTypeRegistration }>('/api/v1/sandbox-types', async (request, reply) => {
    const bodyResult = sandboxTypeRegistrationSchema.safeParse(request.body);
    if (!bodyResult.success) {
      return reply
        .status(400)
        .send(
          createErrorResponse(
            ApiErrorCode.BAD_REQUEST,
            'Invalid sandbox type registration',
            { errors: bodyResult.error.errors },
            request.id
          )
        );
    }

    const result = manager.registry.register(bodyResult.data);
    if (!result.success) {
      return reply
        .status(400)
        .send(createErrorResponse(ApiErrorCode.BAD_REQUEST, result.error, undefined, request.id));
    }

    const response: RegistrationResponse = { type: bodyResult.data.type, replaced: result.replaced };
    return reply.status(result.replaced ? 200 : 201).send(createSuccessResponse(response, request.id));
  });
}
