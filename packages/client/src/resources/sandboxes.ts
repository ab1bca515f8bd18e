/**
 * Sandboxes Resource API
 */

import { z } from 'zod';
import {
  heartbeatResultSchema,
  releaseResultSchema,
  sandboxHandleSchema,
  sandboxInspectionSchema,
  sandboxSummarySchema,
  type HeartbeatResult,
  type ReleaseResult,
  type SandboxHandle,
  type SandboxInspection,
  type SandboxSummary,
} from '@warmbox/shared';
import type { RequestFn } from '../client.js';
import type { AcquireOptions } from '../types.js';

export class SandboxesResource {
  constructor(private request: RequestFn) {}

  /**
   * Acquire a sandbox, from the warm pool when one is available
   */
  async acquire(options: AcquireOptions = {}): Promise<SandboxHandle> {
    return this.request('POST', '/api/v1/sandboxes', sandboxHandleSchema, { body: options });
  }

  /**
   * Release a sandbox. Releasing twice is not an error.
   */
  async release(id: string): Promise<ReleaseResult> {
    return this.request('DELETE', `/api/v1/sandboxes/${encodeURIComponent(id)}`, releaseResultSchema);
  }

  async inspect(id: string): Promise<SandboxInspection> {
    return this.request('GET', `/api/v1/sandboxes/${encodeURIComponent(id)}`, sandboxInspectionSchema);
  }

  /**
   * List the sandboxes held by the worker that answers
   */
  async list(): Promise<SandboxSummary[]> {
    return this.request('GET', '/api/v1/sandboxes', z.array(sandboxSummarySchema));
  }

  /**
   * Record activity so the sandbox is not swept as idle
   */
  async heartbeat(id: string): Promise<HeartbeatResult> {
    return this.request('POST', `/api/v1/sandboxes/${encodeURIComponent(id)}/heartbeat`, heartbeatResultSchema);
  }
}
