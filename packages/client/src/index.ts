/**
 * @warmbox/client - TypeScript client for the warmbox management API
 *
 * @packageDocumentation
 */

// Main client
export { WarmboxClient, type RequestFn, type RequestOptions } from './client.js';

// Types
export type {
  WarmboxClientConfig,
  AcquireOptions,
  SandboxHandle,
  SandboxInspection,
  SandboxSummary,
  SandboxTypeSummary,
  SandboxTypeRegistration,
  ReleaseResult,
  HeartbeatResult,
  RegistrationResponse,
  InspectState,
} from './types.js';

// Errors
export {
  WarmboxError,
  NetworkError,
  NotFoundError,
  ValidationError,
  AuthenticationError,
  ExhaustionError,
  ServiceUnavailableError,
  ServerError,
  errorFromResponse,
  type ApiErrorBody,
} from './errors.js';

// Resources
export { SandboxesResource } from './resources/sandboxes.js';
export { SandboxTypesResource } from './resources/sandbox-types.js';
