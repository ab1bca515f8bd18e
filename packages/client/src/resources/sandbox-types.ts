/**
 * Sandbox Types Resource API
 */

import { z } from 'zod';
import {
  registrationResponseSchema,
  sandboxTypeSummarySchema,
  type RegistrationResponse,
  type SandboxTypeRegistration,
  type SandboxTypeSummary,
} from '@warmbox/shared';
import type { RequestFn } from '../client.js';

export class SandboxTypesResource {
  constructor(private request: RequestFn) {}

  async list(): Promise<SandboxTypeSummary[]> {
    return this.request('GET', '/api/v1/sandbox-types', z.array(sandboxTypeSummarySchema));
  }

  /**
   * Register a custom sandbox type, or replace one with the same id
   */
  async register(registration: SandboxTypeRegistration): Promise<RegistrationResponse> {
    return this.request('POST', '/api/v1/sandbox-types', registrationResponseSchema, { body: registration });
  }
}
