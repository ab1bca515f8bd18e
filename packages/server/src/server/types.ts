import { z } from 'zod';
import { ApiErrorCode, type ApiFailure, type ApiSuccess } from '@warmbox/shared';
import type { SandboxErrorCode } from '../sandbox/errors.js';

/**
 * Server configuration schema
 */
export const serverConfigSchema = z.object({
  /** Port to listen on */
  port: z.number().int().min(1).max(65535).default(8000),
  /** Host to bind to */
  host: z.string().default('127.0.0.1'),
  /** CORS origins to allow */
  corsOrigins: z.array(z.string()).default(['*']),
  /** Request timeout in milliseconds; acquire may wait on a container start */
  requestTimeout: z.number().int().positive().default(300000),
  /** Enable request logging */
  enableLogging: z.boolean().default(false),
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;

/**
 * Component check result
 */
export const componentCheckSchema = z.object({
  name: z.string(),
  healthy: z.boolean(),
  message: z.string().optional(),
  latencyMs: z.number().optional(),
});

export type ComponentCheck = z.infer<typeof componentCheckSchema>;

/**
 * Readiness check response
 */
export const readinessResponseSchema = z.object({
  ready: z.boolean(),
  checks: z.array(componentCheckSchema),
  timestamp: z.string().datetime(),
});

export type ReadinessResponse = z.infer<typeof readinessResponseSchema>;

/**
 * Liveness check response
 */
export const livenessResponseSchema = z.object({
  alive: z.literal(true),
  timestamp: z.string().datetime(),
});

export type LivenessResponse = z.infer<typeof livenessResponseSchema>;

/**
 * HTTP status for each sandbox error code
 */
export const SANDBOX_ERROR_STATUS: Record<SandboxErrorCode, number> = {
  UNKNOWN_SANDBOX_TYPE: 400,
  PROVISIONING_FAILED: 502,
  PORTS_EXHAUSTED: 503,
  NOT_FOUND: 404,
  BACKEND_UNAVAILABLE: 503,
  STATE_STORE_ERROR: 503,
  INVALID_STATE_TRANSITION: 500,
};

/**
 * Map HTTP status code to error code
 */
export function mapStatusToErrorCode(status: number): ApiErrorCode {
  switch (status) {
    case 400:
      return ApiErrorCode.BAD_REQUEST;
    case 401:
      return ApiErrorCode.UNAUTHORIZED;
    case 404:
      return ApiErrorCode.NOT_FOUND;
    case 503:
      return ApiErrorCode.SERVICE_UNAVAILABLE;
    default:
      return ApiErrorCode.INTERNAL_ERROR;
  }
}

/**
 * Create a success response
 */
export function createSuccessResponse<T>(data: T, requestId?: string): ApiSuccess<T> {
  return {
    success: true,
    data,
    ...(requestId && { requestId }),
  };
}

/**
 * Create an error response
 */
export function createErrorResponse(
  code: string,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ApiFailure {
  return {
    success: false,
    error: {
      code,
      message,
      ...(details && { details }),
    },
    ...(requestId && { requestId }),
  };
}
