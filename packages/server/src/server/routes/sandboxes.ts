import type { FastifyInstance } from 'fastify';
import {
  ApiErrorCode,
  acquireSandboxBodySchema,
  sandboxIdParamsSchema,
  type AcquireSandboxBody,
  type ReleaseResult,
  type SandboxIdParams,
} from '@warmbox/shared';
import type { SandboxManager } from '../../sandbox/manager.js';
import { createLogger } from '../../utils/logger.js';
import { createErrorResponse, createSuccessResponse } from '../types.js';

const logger = createLogger('routes:sandboxes');

/**
 * Register sandbox lifecycle routes
 */
export function registerSandboxRoutes(app: FastifyInstance, manager: SandboxManager): void {
  /**
   * POST /api/v1/sandboxes - Acquire a sandbox
   */
  app.post<{ Body: AcquireSandboxBody }>('/api/v1/sandboxes', async (request, reply) => {
    const bodyResult = acquireSandboxBodySchema.safeParse(request.body ?? {});
    if (!bodyResult.success) {
      return reply
        .status(400)
        .send(
          createErrorResponse(
            ApiErrorCode.BAD_REQUEST,
            'Invalid request body',
            { errors: bodyResult.error.errors },
            request.id
          )
        );
    }

    const { type, timeoutSeconds, env } = bodyResult.data;
    const handle = await manager.acquire(type, {
      ...(timeoutSeconds !== undefined && { timeoutSeconds }),
      ...(env && { env }),
    });

    logger.debug({ requestId: request.id, sandboxId: handle.id }, 'Acquire served');
    return reply.status(201).send(createSuccessResponse(handle, request.id));
  });

  /**
   * GET /api/v1/sandboxes - List this worker's sandboxes
   */
  app.get('/api/v1/sandboxes', async (request, reply) => {
    return reply.send(createSuccessResponse(manager.list(), request.id));
  });

  /**
   * GET /api/v1/sandboxes/:id - Inspect a sandbox
   */
  app.get<{ Params: SandboxIdParams }>('/api/v1/sandboxes/:id', async (request, reply) => {
    const paramsResult = sandboxIdParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      return reply
        .status(400)
        .send(
          createErrorResponse(
            ApiErrorCode.BAD_REQUEST,
            'Invalid sandbox ID',
            { errors: paramsResult.error.errors },
            request.id
          )
        );
    }

    const inspection = await manager.inspect(paramsResult.data.id);
    return reply.send(createSuccessResponse(inspection, request.id));
  });

  /**
   * DELETE /api/v1/sandboxes/:id - Release a sandbox. Idempotent.
   */
  app.delete<{ Params: SandboxIdParams }>('/api/v1/sandboxes/:id', async (request, reply) => {
    const paramsResult = sandboxIdParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      return reply
        .status(400)
        .send(
          createErrorResponse(
            ApiErrorCode.BAD_REQUEST,
            'Invalid sandbox ID',
            { errors: paramsResult.error.errors },
            request.id
          )
        );
    }

    const { id } = paramsResult.data;
    await manager.release(id);

    const result: ReleaseResult = { id, released: true };
    return reply.send(createSuccessResponse(result, request.id));
  });

  /**
   * POST /api/v1/sandboxes/:id/heartbeat - Record activity
   */
  app.post<{ Params: SandboxIdParams }>('/api/v1/sandboxes/:id/heartbeat', async (request, reply) => {
    const paramsResult = sandboxIdParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      return reply
        .status(400)
        .send(
          createErrorResponse(
            ApiErrorCode.BAD_REQUEST,
            'Invalid sandbox ID',
            { errors: paramsResult.error.errors },
            request.id
          )
        );
    }

    const result = await manager.heartbeat(paramsResult.data.id);
    return reply.send(createSuccessResponse(result, request.id));
  });
}
