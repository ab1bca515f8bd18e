/**
 * Sandbox Registry
 *
 * Maps sandbox type identifiers to their image reference, security policy,
 * default timeout and declared environment. Owned by the lifecycle
 * controller; nothing registers at import time.
 */

import { sandboxTypeRegistrationSchema, type SandboxTypeSummary } from '@warmbox/shared';
import { createLogger } from '../utils/logger.js';
import type { SandboxTypeEntry, SandboxTypeSpec } from './types.js';

const logger = createLogger('sandbox:registry');

export type RegistrationResult =
  | { success: true; replaced: boolean }
  | { success: false; error: string };

export class SandboxRegistry {
  private readonly entries = new Map<string, SandboxTypeEntry>();

  /**
   * Register or replace a sandbox type.
   */
  register(spec: SandboxTypeSpec): RegistrationResult {
    const { configure, ...registration } = spec;
    const parsed = sandboxTypeRegistrationSchema.safeParse(registration);

    if (!parsed.success) {
      const error = parsed.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      logger.warn({ type: spec.type, error }, 'Rejected sandbox type registration');
      return { success: false, error };
    }

    const entry: SandboxTypeEntry = { ...parsed.data };
    if (configure) {
      entry.configure = configure;
    }

    const replaced = this.entries.has(entry.type);
    this.entries.set(entry.type, entry);

    logger.info(
      { type: entry.type, image: entry.image, securityLevel: entry.securityLevel, replaced },
      'Sandbox type registered'
    );

    return { success: true, replaced };
  }

  unregister(type: string): boolean {
    return this.entries.delete(type);
  }

  get(type: string): SandboxTypeEntry | undefined {
    return this.entries.get(type);
  }

  has(type: string): boolean {
    return this.entries.has(type);
  }

  list(): SandboxTypeEntry[] {
    return [...this.entries.values()];
  }
}

/**
 * Wire representation of a registry entry. The constructor hook stays
 * in-process.
 */
export function toTypeSummary(entry: SandboxTypeEntry): SandboxTypeSummary {
  return {
    type: entry.type,
    image: entry.image,
    securityLevel: entry.securityLevel,
    timeoutSeconds: entry.timeoutSeconds,
    description: entry.description,
    env: { ...entry.env },
    containerPort: entry.containerPort,
  };
}
