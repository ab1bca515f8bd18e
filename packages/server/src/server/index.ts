import type { FastifyInstance } from 'fastify';
import type { ShutdownResult } from '../sandbox/manager.js';
import { createApp, type AppConfig } from './app.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('server');

/**
 * A listening management API bound to its sandbox manager
 */
export interface RunningServer {
  app: FastifyInstance;
  url: string;
  /**
   * Release this worker's sandboxes, then close the listener and the
   * shared store. Repeated calls return the first call's result.
   */
  stop(): Promise<ShutdownResult>;
}

/**
 * Start the management API for an initialized manager.
 *
 * If the listener cannot bind, the manager is shut down before the error
 * is rethrown so warm containers are not left behind.
 */
export async function startServer(config: AppConfig): Promise<RunningServer> {
  const { manager } = config;
  const port = config.port ?? 8000;
  const host = config.host ?? '127.0.0.1';
  const app = await createApp(config);

  try {
    await app.listen({ port, host });
  } catch (error) {
    logger.error({ err: error, host, port }, 'Failed to bind management API');
    await app.close();
    await manager.shutdown();
    await manager.close();
    throw error;
  }

  logger.info({ host, port, workerId: manager.workerId }, 'Management API listening');

  let stopping: Promise<ShutdownResult> | null = null;
  const stop = (): Promise<ShutdownResult> => {
    if (!stopping) {
      stopping = stopServer(app, config);
    }
    return stopping;
  };

  return { app, url: `http://${host}:${port}`, stop };
}

/**
 * Drain the manager before closing the listener, so in-flight releases
 * still reach the backend.
 */
async function stopServer(app: FastifyInstance, config: AppConfig): Promise<ShutdownResult> {
  const result = await config.manager.shutdown();
  await app.close();
  await config.manager.close();
  logger.info(
    { destroyed: result.destroyed.length, abandoned: result.abandoned.length },
    'Management API stopped'
  );
  return result;
}

export { createApp, type AppConfig } from './app.js';
export {
  serverConfigSchema,
  componentCheckSchema,
  readinessResponseSchema,
  livenessResponseSchema,
  SANDBOX_ERROR_STATUS,
  createErrorResponse,
  createSuccessResponse,
  type ServerConfig,
  type ComponentCheck,
  type ReadinessResponse,
  type LivenessResponse,
} from './types.js';
