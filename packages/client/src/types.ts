/**
 * Warmbox Client SDK Type Definitions
 */

export type {
  SandboxHandle,
  SandboxInspection,
  SandboxSummary,
  SandboxTypeSummary,
  SandboxTypeRegistration,
  ReleaseResult,
  HeartbeatResult,
  RegistrationResponse,
  InspectState,
} from '@warmbox/shared';

// Client configuration
export interface WarmboxClientConfig {
  baseUrl: string;
  /** Sent as `Authorization: Bearer <token>` */
  bearerToken?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  fetch?: typeof fetch;
}

export interface AcquireOptions {
  type?: string;
  timeoutSeconds?: number;
  env?: Record<string, string>;
}
