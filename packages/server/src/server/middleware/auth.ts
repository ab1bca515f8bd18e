import { timingSafeEqual } from 'node:crypto';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ApiErrorCode } from '@warmbox/shared';
import { createErrorResponse } from '../types.js';

function tokensMatch(supplied: string, expected: string): boolean {
  const a = Buffer.from(supplied);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Build a preHandler that validates `Authorization: Bearer <token>`.
 */
export function createBearerAuth(
  bearerToken: string
): (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined> {
  return async function bearerAuth(request, reply) {
    const authHeader = request.headers.authorization;

    if (!authHeader) {
      return reply
        .status(401)
        .send(createErrorResponse(ApiErrorCode.UNAUTHORIZED, 'Authorization header required', undefined, request.id));
    }

    if (!authHeader.startsWith('Bearer ')) {
      return reply
        .status(401)
        .send(
          createErrorResponse(
            ApiErrorCode.UNAUTHORIZED,
            'Invalid authorization format. Use: Bearer <token>',
            undefined,
            request.id
          )
        );
    }

    const token = authHeader.slice(7);

    if (!tokensMatch(token, bearerToken)) {
      return reply
        .status(401)
        .send(createErrorResponse(ApiErrorCode.UNAUTHORIZED, 'Invalid bearer token', undefined, request.id));
    }

    return undefined;
  };
}

/**
 * Guard every /api/ route with the bearer token. Without a token the
 * management API is open.
 */
export function registerAuth(app: FastifyInstance, bearerToken?: string): void {
  if (!bearerToken) {
    return;
  }

  const bearerAuth = createBearerAuth(bearerToken);
  app.addHook('preHandler', async (request, reply) => {
    if (request.url.startsWith('/api/')) {
      return bearerAuth(request, reply);
    }
    return undefined;
  });
}
