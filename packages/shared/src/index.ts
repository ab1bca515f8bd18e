export {
  ApiErrorCode,
  type ApiError,
  type ApiFailure,
  type ApiResponse,
  type ApiSuccess,
} from './types/api.js';

export {
  instanceStateSchema,
  securityLevelSchema,
  sandboxTypeIdSchema,
  resourceLimitsSchema,
  sandboxEnvSchema,
  sandboxTypeRegistrationSchema,
  acquireSandboxBodySchema,
  sandboxIdParamsSchema,
  sandboxHandleSchema,
  sandboxInspectionSchema,
  sandboxSummarySchema,
  sandboxTypeSummarySchema,
  releaseResultSchema,
  heartbeatResultSchema,
  registrationResponseSchema,
  poolStatusSchema,
  managerStatusSchema,
  type InstanceState,
  type InspectState,
  type SecurityLevel,
  type SandboxResourceLimits,
  type SandboxTypeRegistration,
  type SandboxTypeDefinition,
  type AcquireSandboxBody,
  type SandboxIdParams,
  type SandboxHandle,
  type SandboxInspection,
  type SandboxSummary,
  type SandboxTypeSummary,
  type ReleaseResult,
  type HeartbeatResult,
  type RegistrationResponse,
  type PoolStatus,
  type ManagerStatus,
} from './types/sandbox.js';
