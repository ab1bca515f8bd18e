/**
 * Sandbox Types
 *
 * Defines the backend driver capability and the bookkeeping records the
 * lifecycle controller keeps for each instance.
 */

import { z } from 'zod';
import {
  instanceStateSchema,
  type InstanceState,
  type SandboxResourceLimits,
  type SecurityLevel,
  type SandboxTypeDefinition,
  type SandboxTypeRegistration,
} from '@warmbox/shared';

/**
 * A host directory mounted into the sandbox.
 */
export interface MountSpec {
  hostPath: string;
  containerPath: string;
  readOnly: boolean;
}

/**
 * Everything a driver needs to create one sandbox container.
 */
export interface ContainerSpec {
  /** Instance id, also used as the container name */
  name: string;
  image: string;
  env: Record<string, string>;
  /** Host port reserved for this instance */
  hostPort: number;
  /** Port the sandbox service listens on inside the container */
  containerPort: number;
  mounts: MountSpec[];
  labels: Record<string, string>;
  securityLevel: SecurityLevel;
  resourceLimits?: SandboxResourceLimits;
}

/**
 * Backend-specific reference to a created container.
 */
export interface DriverHandle {
  containerId: string;
  /** Host the sandbox service is reachable on */
  host: string;
}

/**
 * Capability to run single sandbox instances on one execution substrate.
 *
 * Drivers never retry `create`; retry policy lives with the pool.
 */
export interface BackendDriver {
  /** Driver identifier ('docker', 'k8s') */
  readonly name: string;

  /**
   * Check whether the substrate is reachable.
   */
  isAvailable(): Promise<boolean>;

  create(spec: ContainerSpec): Promise<DriverHandle>;

  start(handle: DriverHandle): Promise<void>;

  stop(handle: DriverHandle): Promise<void>;

  /**
   * Remove the container. Destroying an already removed container succeeds.
   */
  destroy(handle: DriverHandle): Promise<void>;

  isAlive(handle: DriverHandle): Promise<boolean>;
}

/**
 * Hook a registered type can use to adjust the container before creation.
 */
export type ContainerConfigurer = (spec: ContainerSpec) => ContainerSpec;

/**
 * Registration input: the wire-level registration plus the constructor hook.
 */
export type SandboxTypeSpec = SandboxTypeRegistration & {
  configure?: ContainerConfigurer;
};

/**
 * A validated registry entry.
 */
export type SandboxTypeEntry = SandboxTypeDefinition & {
  configure?: ContainerConfigurer;
};

/**
 * In-process bookkeeping for one sandbox instance.
 */
export interface SandboxInstance {
  id: string;
  type: string;
  handle: DriverHandle;
  port: number;
  baseUrl: string;
  /** Runtime token the sandbox expects as a bearer token */
  token: string;
  state: InstanceState;
  createdAt: Date;
  lastActivityAt: Date;
  expiresAt: Date | null;
  /** Lease length a heartbeat extends `expiresAt` by */
  leaseSeconds: number | null;
  mountDir: string | null;
  storagePath: string | null;
}

/**
 * Instance record mirrored to the shared state store so peer workers can
 * inspect and release instances they do not own.
 */
export const instanceRecordSchema = z.object({
  id: z.string(),
  type: z.string(),
  owner: z.string(),
  backend: z.string(),
  containerId: z.string(),
  host: z.string(),
  port: z.number().int(),
  baseUrl: z.string(),
  state: instanceStateSchema,
  createdAt: z.string(),
  lastActivityAt: z.string(),
  expiresAt: z.string().nullable(),
  leaseSeconds: z.number().int().nullable(),
  mountDir: z.string().nullable(),
  storagePath: z.string().nullable(),
});

export type InstanceRecord = z.infer<typeof instanceRecordSchema>;
