import Fastify, { type FastifyError, type FastifyInstance, type FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import { nanoid } from 'nanoid';
import { ApiErrorCode } from '@warmbox/shared';
import { SandboxError } from '../sandbox/errors.js';
import type { SandboxManager } from '../sandbox/manager.js';
import { createLogger } from '../utils/logger.js';
import { registerAuth } from './middleware/auth.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerSandboxTypeRoutes } from './routes/sandbox-types.js';
import { registerSandboxRoutes } from './routes/sandboxes.js';
import {
  SANDBOX_ERROR_STATUS,
  createErrorResponse,
  mapStatusToErrorCode,
  serverConfigSchema,
  type ServerConfig,
} from './types.js';

const logger = createLogger('server');

/**
 * Server configuration plus the manager the routes drive
 */
export interface AppConfig extends Partial<ServerConfig> {
  manager: SandboxManager;
  /** Enables bearer-token auth on /api/ routes */
  bearerToken?: string;
}

/**
 * Create and configure a Fastify application instance
 */
export async function createApp(config: AppConfig): Promise<FastifyInstance> {
  const { manager, bearerToken, ...serverConfig } = config;

  // Validate and apply defaults
  const validatedConfig = serverConfigSchema.parse(serverConfig);

  const app = Fastify({
    logger: validatedConfig.enableLogging
      ? {
          level: 'info',
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
            },
          },
        }
      : false,
    requestTimeout: validatedConfig.requestTimeout,
    genReqId: () => nanoid(12),
  });

  await app.register(cors, {
    origin: validatedConfig.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
  });

  // Add request ID to response headers
  app.addHook('onRequest', (request: FastifyRequest, reply, done) => {
    void reply.header('X-Request-ID', request.id);
    done();
  });

  app.setErrorHandler(async (error: FastifyError, request, reply) => {
    if (error instanceof SandboxError) {
      const status = SANDBOX_ERROR_STATUS[error.code];
      if (status >= 500) {
        logger.error({ err: error, requestId: request.id, code: error.code }, 'Sandbox request failed');
      } else {
        logger.warn({ err: error, requestId: request.id, code: error.code }, 'Sandbox request rejected');
      }
      return reply.status(status).send(createErrorResponse(error.code, error.message, undefined, request.id));
    }

    logger.error({ err: error, requestId: request.id }, 'Request error');

    if (error.validation) {
      return reply
        .status(400)
        .send(
          createErrorResponse(
            ApiErrorCode.BAD_REQUEST,
            'Validation error',
            { errors: error.validation },
            request.id
          )
        );
    }

    if (error.statusCode && error.statusCode < 500) {
      return reply
        .status(error.statusCode)
        .send(createErrorResponse(mapStatusToErrorCode(error.statusCode), error.message, undefined, request.id));
    }

    return reply
      .status(500)
      .send(createErrorResponse(ApiErrorCode.INTERNAL_ERROR, 'An unexpected error occurred', undefined, request.id));
  });

  app.setNotFoundHandler(async (request, reply) => {
    return reply
      .status(404)
      .send(
        createErrorResponse(
          ApiErrorCode.NOT_FOUND,
          `Route ${request.method} ${request.url} not found`,
          undefined,
          request.id
        )
      );
  });

  registerAuth(app, bearerToken);

  registerHealthRoutes(app, manager);
  registerSandboxRoutes(app, manager);
  registerSandboxTypeRoutes(app, manager);

  return app;
}
