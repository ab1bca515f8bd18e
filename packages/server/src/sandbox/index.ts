/**
 * Sandbox Module
 *
 * Sandbox type registry, warm pool, port allocation and the lifecycle
 * controller that ties them to a backend driver.
 */

// Types
export type {
  MountSpec,
  ContainerSpec,
  DriverHandle,
  BackendDriver,
  ContainerConfigurer,
  SandboxTypeSpec,
  SandboxTypeEntry,
  SandboxInstance,
  InstanceRecord,
} from './types.js';
export { instanceRecordSchema } from './types.js';

// Errors
export {
  SandboxError,
  UnknownTypeError,
  ProvisioningError,
  ExhaustionError,
  NotFoundError,
  BackendUnavailableError,
  StateStoreError,
  InvalidStateTransitionError,
  type SandboxErrorCode,
} from './errors.js';

// Registry
export { SandboxRegistry, toTypeSummary, type RegistrationResult } from './registry.js';
export { builtinImage, builtinTypeSpecs, registerBuiltinTypes } from './builtin-types.js';

// Building blocks
export { PortAllocator, probeHostPort, portHolder, type PortProbe } from './port-allocator.js';
export { InstanceFactory, resolveEnvironment, LABELS, WORKSPACE_MOUNT } from './instance-factory.js';
export { SandboxPool, type PoolLifecycle, type TakeResult } from './pool.js';
export { FillRetryPolicy } from './retry-policy.js';
export { nextInstanceState, transitionInstance, type InstanceEvent } from './instance-state.js';

// Drivers
export {
  DockerDriver,
  KubernetesDriver,
  createDriver,
  createKubernetesApi,
  toCreateOptions,
  toPodManifest,
  toServiceManifest,
  type KubernetesCoreApi,
} from './drivers/index.js';
export { DockerClient, getDockerClient, resetDockerClients, isSupportedApiVersion, DEFAULT_DOCKER_SOCKET } from './docker-client.js';

// Lifecycle controller
export {
  SandboxManager,
  createSandboxManager,
  type SandboxManagerOptions,
  type AcquireOptions,
  type ReleaseReason,
  type InitializeOptions,
  type ShutdownResult,
} from './manager.js';
