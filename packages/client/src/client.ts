/**
 * Warmbox Client SDK - Main Client Class
 */

import { z } from 'zod';
import type { WarmboxClientConfig } from './types.js';
import { NetworkError, ServerError, errorFromResponse } from './errors.js';
import { SandboxesResource } from './resources/sandboxes.js';
import { SandboxTypesResource } from './resources/sandbox-types.js';

const envelopeSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  error: z
    .object({
      code: z.string(),
      message: z.string(),
      details: z.unknown().optional(),
    })
    .optional(),
  requestId: z.string().optional(),
});

function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

export interface RequestOptions {
  body?: unknown;
}

export type RequestFn = <T>(
  method: string,
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options?: RequestOptions
) => Promise<T>;

/**
 * Warmbox API Client
 *
 * @example
 * ```typescript
 * const client = new WarmboxClient({
 *   baseUrl: 'http://127.0.0.1:8000',
 *   bearerToken: process.env.WARMBOX_BEARER_TOKEN,
 * });
 *
 * const sandbox = await client.sandboxes.acquire({ type: 'base' });
 * // ... call sandbox.baseUrl with sandbox.bearerToken ...
 * await client.sandboxes.release(sandbox.id);
 * ```
 */
export class WarmboxClient {
  private baseUrl: string;
  private bearerToken: string | undefined;
  private timeout: number;
  private fetchFn: typeof fetch;

  /** Sandbox lifecycle */
  public readonly sandboxes: SandboxesResource;

  /** Sandbox type registry */
  public readonly sandboxTypes: SandboxTypesResource;

  constructor(config: WarmboxClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.bearerToken = config.bearerToken;
    this.timeout = config.timeout ?? 300000;
    this.fetchFn = config.fetch ?? fetch;

    const requestFn: RequestFn = (method, path, schema, options) => this.request(method, path, schema, options);

    this.sandboxes = new SandboxesResource(requestFn);
    this.sandboxTypes = new SandboxTypesResource(requestFn);
  }

  private getHeaders(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {};

    if (hasBody) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.bearerToken) {
      headers['Authorization'] = `Bearer ${this.bearerToken}`;
    }

    return headers;
  }

  /**
   * Make an HTTP request to the API and validate the payload
   */
  private async request<T>(
    method: string,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    const url = new URL(path, this.baseUrl);
    const hasBody = options.body !== undefined;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    let response: Response;
    try {
      response = await this.fetchFn(url.toString(), {
        method,
        headers: this.getHeaders(hasBody),
        ...(hasBody && { body: JSON.stringify(options.body) }),
        signal: controller.signal,
      });
    } catch (error) {
      if (isAbortError(error)) {
        throw new NetworkError('Request timeout', error);
      }
      throw new NetworkError('Request failed', error);
    } finally {
      clearTimeout(timeoutId);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new ServerError(`Invalid response body (HTTP ${response.status})`, response.status);
    }

    const envelope = envelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw new ServerError(`Unexpected response shape (HTTP ${response.status})`, response.status);
    }

    if (!response.ok || !envelope.data.success) {
      throw errorFromResponse(
        response.status,
        envelope.data.error ?? { code: 'UNKNOWN', message: `Request failed with HTTP ${response.status}` }
      );
    }

    const data = schema.safeParse(envelope.data.data);
    if (!data.success) {
      throw new ServerError(`Unexpected response data: ${data.error.message}`, response.status);
    }
    return data.data;
  }
}
