/**
 * Warmbox Library API
 *
 * Exports the sandbox manager and its building blocks for programmatic usage.
 */

// Sandbox lifecycle
export * from './sandbox/index.js';

// Shared state
export {
  createStateStore,
  MemoryStateStore,
  RedisStateStore,
  createRedisClient,
  StateKeys,
  type SharedStateStore,
  type RedisCommands,
} from './state/index.js';

// Workspace storage
export {
  createWorkspaceStorage,
  LocalStorage,
  OssStorage,
  type WorkspaceStorage,
  type OssStorageOptions,
} from './storage/index.js';

// Configuration
export {
  loadConfig,
  parseConfig,
  getConfig,
  resetConfig,
  type WarmboxConfig,
  type FillRetryConfig,
  type SharedStateConfig,
  type StorageConfig,
  type KubernetesConfig,
  type ImageConfig,
} from './config/index.js';

// HTTP server
export { createApp, startServer, type AppConfig, type RunningServer } from './server/index.js';

// CLI
export { createProgram, runCli } from './control-plane/cli.js';

// Logging
export { createLogger, logger } from './utils/logger.js';
