/**
 * Error types for the sandbox lifecycle.
 *
 * Every error carries a stable `code` that the HTTP layer maps onto a
 * response status.
 */

export type SandboxErrorCode =
  | 'UNKNOWN_SANDBOX_TYPE'
  | 'PROVISIONING_FAILED'
  | 'PORTS_EXHAUSTED'
  | 'NOT_FOUND'
  | 'BACKEND_UNAVAILABLE'
  | 'STATE_STORE_ERROR'
  | 'INVALID_STATE_TRANSITION';

/**
 * Base class for sandbox lifecycle errors.
 */
export class SandboxError extends Error {
  override readonly name: string = 'SandboxError';
  readonly code: SandboxErrorCode;

  constructor(code: SandboxErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    Object.setPrototypeOf(this, SandboxError.prototype);
  }
}

/**
 * Thrown when a requested sandbox type is not registered.
 */
export class UnknownTypeError extends SandboxError {
  override readonly name = 'UnknownTypeError';
  readonly sandboxType: string;

  constructor(sandboxType: string) {
    super('UNKNOWN_SANDBOX_TYPE', `Unknown sandbox type: ${sandboxType}`);
    this.sandboxType = sandboxType;
    Object.setPrototypeOf(this, UnknownTypeError.prototype);
  }
}

/**
 * Thrown when the backend fails to create or start an instance.
 */
export class ProvisioningError extends SandboxError {
  override readonly name = 'ProvisioningError';
  readonly sandboxType: string;

  constructor(sandboxType: string, message: string, cause?: unknown) {
    super('PROVISIONING_FAILED', `Failed to provision ${sandboxType} sandbox: ${message}`, { cause });
    this.sandboxType = sandboxType;
    Object.setPrototypeOf(this, ProvisioningError.prototype);
  }
}

/**
 * Thrown when every port in the configured range is reserved.
 */
export class ExhaustionError extends SandboxError {
  override readonly name = 'ExhaustionError';
  readonly range: readonly [number, number];

  constructor(range: readonly [number, number]) {
    super('PORTS_EXHAUSTED', `No free port in range ${range[0]}-${range[1]}`);
    this.range = range;
    Object.setPrototypeOf(this, ExhaustionError.prototype);
  }
}

/**
 * Thrown when an instance id is unknown locally and in shared state.
 */
export class NotFoundError extends SandboxError {
  override readonly name = 'NotFoundError';
  readonly sandboxId: string;

  constructor(sandboxId: string) {
    super('NOT_FOUND', `Sandbox not found: ${sandboxId}`);
    this.sandboxId = sandboxId;
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Thrown when the configured execution substrate cannot be reached.
 */
export class BackendUnavailableError extends SandboxError {
  override readonly name = 'BackendUnavailableError';
  readonly backend: string;

  constructor(backend: string, cause?: unknown) {
    super('BACKEND_UNAVAILABLE', `Sandbox backend unavailable: ${backend}`, { cause });
    this.backend = backend;
    Object.setPrototypeOf(this, BackendUnavailableError.prototype);
  }
}

/**
 * Thrown when a critical write to the shared state store fails.
 */
export class StateStoreError extends SandboxError {
  override readonly name = 'StateStoreError';
  readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super('STATE_STORE_ERROR', `Shared state operation failed (${operation})${detail}`, { cause });
    this.operation = operation;
    Object.setPrototypeOf(this, StateStoreError.prototype);
  }
}

/**
 * Thrown when an instance is moved along an edge its state machine lacks.
 */
export class InvalidStateTransitionError extends SandboxError {
  override readonly name = 'InvalidStateTransitionError';
  readonly sandboxId: string;
  readonly from: string;
  readonly event: string;

  constructor(sandboxId: string, from: string, event: string) {
    super('INVALID_STATE_TRANSITION', `Cannot apply '${event}' to sandbox ${sandboxId} in state '${from}'`);
    this.sandboxId = sandboxId;
    this.from = from;
    this.event = event;
    Object.setPrototypeOf(this, InvalidStateTransitionError.prototype);
  }
}
