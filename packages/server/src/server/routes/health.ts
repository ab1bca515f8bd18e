import type { FastifyInstance } from 'fastify';
import type { ManagerStatus } from '@warmbox/shared';
import type { SandboxManager } from '../../sandbox/manager.js';
import {
  createSuccessResponse,
  type ComponentCheck,
  type LivenessResponse,
  type ReadinessResponse,
} from '../types.js';
import { VERSION } from '../../version.js';

interface HealthResponse {
  status: 'ok' | 'degraded';
  version: string;
  timestamp: string;
  sandbox: ManagerStatus;
}

/**
 * Register health check routes
 */
export function registerHealthRoutes(app: FastifyInstance, manager: SandboxManager): void {
  /**
   * GET /health - Service status with pool and port counts
   */
  app.get('/health', async (request, reply) => {
    const status = await manager.getStatus();

    const response: HealthResponse = {
      status: status.backendAvailable && !status.shuttingDown ? 'ok' : 'degraded',
      version: VERSION,
      timestamp: new Date().toISOString(),
      sandbox: status,
    };
    return reply.send(createSuccessResponse(response, request.id));
  });

  /**
   * GET /health/ready - Readiness check
   * Checks the backend and the shared state store
   */
  app.get('/health/ready', async (request, reply) => {
    const checks = await Promise.all([checkBackend(manager), checkSharedState(manager)]);
    const ready = checks.every((check) => check.healthy) && !manager.isShuttingDown;

    const response: ReadinessResponse = {
      ready,
      checks,
      timestamp: new Date().toISOString(),
    };

    // Return 503 if not ready
    if (!ready) {
      return reply.status(503).send(createSuccessResponse(response, request.id));
    }

    return reply.send(createSuccessResponse(response, request.id));
  });

  /**
   * GET /health/live - Liveness check
   */
  app.get('/health/live', async (request, reply) => {
    const response: LivenessResponse = {
      alive: true,
      timestamp: new Date().toISOString(),
    };
    return reply.send(createSuccessResponse(response, request.id));
  });
}

async function checkBackend(manager: SandboxManager): Promise<ComponentCheck> {
  const start = Date.now();
  const healthy = await manager.isBackendAvailable();
  return {
    name: 'backend',
    healthy,
    message: healthy ? `Backend ${manager.backendName} reachable` : `Backend ${manager.backendName} unreachable`,
    latencyMs: Date.now() - start,
  };
}

async function checkSharedState(manager: SandboxManager): Promise<ComponentCheck> {
  const start = Date.now();
  const healthy = await manager.isStoreReachable();
  return {
    name: 'shared-state',
    healthy,
    message: healthy ? 'Shared state store reachable' : 'Shared state store unreachable',
    latencyMs: Date.now() - start,
  };
}
