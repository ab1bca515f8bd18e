import { z } from 'zod';

// Instance lifecycle states
export const instanceStateSchema = z.enum(['warm', 'assigned', 'destroyed']);

export type InstanceState = z.infer<typeof instanceStateSchema>;

/**
 * State reported by inspection. `unknown` is returned when the shared
 * state store could not be read for an instance owned by a peer worker.
 */
export type InspectState = InstanceState | 'unknown';

export const securityLevelSchema = z.enum(['low', 'medium', 'high']);

export type SecurityLevel = z.infer<typeof securityLevelSchema>;

// Sandbox type identifiers double as container name fragments
export const sandboxTypeIdSchema = z
  .string()
  .min(1)
  .max(32)
  .regex(/^[a-z0-9][a-z0-9_-]*$/, 'Type must be lower-case alphanumeric, "-" or "_"');

export const resourceLimitsSchema = z.object({
  memoryMB: z.number().int().min(64).optional(),
  cpuCount: z.number().positive().max(64).optional(),
});

export type SandboxResourceLimits = z.infer<typeof resourceLimitsSchema>;

// A null value marks a variable that must be supplied at acquire time
export const sandboxEnvSchema = z.record(z.string().nullable());

// Register Sandbox Type Request
export const sandboxTypeRegistrationSchema = z.object({
  type: sandboxTypeIdSchema,
  image: z.string().min(1, 'Image reference is required'),
  securityLevel: securityLevelSchema.default('medium'),
  timeoutSeconds: z.number().int().min(1).max(86400).default(300),
  env: sandboxEnvSchema.default({}),
  description: z.string().default(''),
  resourceLimits: resourceLimitsSchema.optional(),
  containerPort: z.number().int().min(1).max(65535).default(80),
});

export type SandboxTypeRegistration = z.input<typeof sandboxTypeRegistrationSchema>;
export type SandboxTypeDefinition = z.output<typeof sandboxTypeRegistrationSchema>;

// Acquire Sandbox Request
export const acquireSandboxBodySchema = z.object({
  type: sandboxTypeIdSchema.optional(),
  timeoutSeconds: z.number().int().min(1).max(86400).optional(),
  env: z.record(z.string()).optional(),
});

export type AcquireSandboxBody = z.infer<typeof acquireSandboxBodySchema>;

// Sandbox ID Params
export const sandboxIdParamsSchema = z.object({
  id: z.string().min(1),
});

export type SandboxIdParams = z.infer<typeof sandboxIdParamsSchema>;

/**
 * Handle returned to a caller that acquired a sandbox. Calls to the
 * sandbox itself go to `baseUrl` with `Authorization: Bearer <bearerToken>`.
 */
export const sandboxHandleSchema = z.object({
  id: z.string(),
  type: z.string(),
  baseUrl: z.string(),
  bearerToken: z.string(),
  expiresAt: z.string(),
});

export type SandboxHandle = z.infer<typeof sandboxHandleSchema>;

export const sandboxInspectionSchema = z.object({
  id: z.string(),
  type: z.string().nullable(),
  state: z.enum(['warm', 'assigned', 'destroyed', 'unknown']),
  port: z.number().nullable(),
  ageMs: z.number().nullable(),
  createdAt: z.string().nullable(),
  lastActivityAt: z.string().nullable(),
  expiresAt: z.string().nullable(),
  // False when the instance belongs to a peer worker
  local: z.boolean(),
});

export type SandboxInspection = z.infer<typeof sandboxInspectionSchema>;

export const sandboxSummarySchema = z.object({
  id: z.string(),
  type: z.string(),
  state: instanceStateSchema,
  port: z.number(),
  baseUrl: z.string(),
  createdAt: z.string(),
  lastActivityAt: z.string(),
  expiresAt: z.string().nullable(),
});

export type SandboxSummary = z.infer<typeof sandboxSummarySchema>;

export const sandboxTypeSummarySchema = z.object({
  type: z.string(),
  image: z.string(),
  securityLevel: securityLevelSchema,
  timeoutSeconds: z.number(),
  description: z.string(),
  env: z.record(z.string().nullable()),
  containerPort: z.number(),
});

export type SandboxTypeSummary = z.infer<typeof sandboxTypeSummarySchema>;

export const releaseResultSchema = z.object({
  id: z.string(),
  released: z.literal(true),
});

export type ReleaseResult = z.infer<typeof releaseResultSchema>;

export const heartbeatResultSchema = z.object({
  id: z.string(),
  lastActivityAt: z.string(),
});

export type HeartbeatResult = z.infer<typeof heartbeatResultSchema>;

export const registrationResponseSchema = z.object({
  type: z.string(),
  replaced: z.boolean(),
});

export type RegistrationResponse = z.infer<typeof registrationResponseSchema>;

export const poolStatusSchema = z.object({
  type: z.string(),
  warm: z.number(),
  // Creations and resets currently in flight
  inflight: z.number(),
  assigned: z.number(),
});

export type PoolStatus = z.infer<typeof poolStatusSchema>;

export const managerStatusSchema = z.object({
  backend: z.string(),
  backendAvailable: z.boolean(),
  workerId: z.string(),
  sharedState: z.boolean(),
  portRange: z.tuple([z.number(), z.number()]),
  // Reserved ports across all workers, null when the store cannot be read
  heldPorts: z.number().nullable(),
  pools: z.array(poolStatusSchema),
  lastSweep: z.string().nullable(),
  shuttingDown: z.boolean(),
});

export type ManagerStatus = z.infer<typeof managerStatusSchema>;
