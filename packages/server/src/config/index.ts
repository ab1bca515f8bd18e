/**
 * Warmbox Configuration Module
 *
 * Reads configuration from WARMBOX_* environment variables, optionally
 * layered over a YAML file named by WARMBOX_CONFIG_FILE, and validates
 * the result. Environment variables win over the file.
 */

import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { sandboxTypeIdSchema } from '@warmbox/shared';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/** Longest prefix that keeps generated names under the Kubernetes 63 char limit */
export const MAX_CONTAINER_PREFIX_LENGTH = 63 - 25;

const portNumber = z.coerce.number().int().min(1).max(65535);

const booleanish = z.preprocess((value) => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
    if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  }
  return value;
}, z.boolean());

// "49152-59152" in env, [49152, 59152] in YAML
const portRangeSchema = z
  .preprocess((value) => {
    if (typeof value === 'string') {
      const match = /^\s*(\d+)\s*-\s*(\d+)\s*$/.exec(value);
      if (match) {
        return [Number(match[1]), Number(match[2])];
      }
    }
    return value;
  }, z.tuple([portNumber, portNumber]))
  .refine(([low, high]) => low <= high, {
    message: 'Port range low bound must not exceed the high bound',
  });

// "base,browser" in env, a list in YAML
const sandboxTypeListSchema = z.preprocess((value) => {
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part.length > 0);
  }
  return value;
}, z.array(sandboxTypeIdSchema).min(1));

// "/host/a:/mnt/a,/host/b:/mnt/b" in env, a map in YAML
const mountMapSchema = z.preprocess((value) => {
  if (typeof value === 'string') {
    const mounts: Record<string, string> = {};
    for (const entry of value.split(',')) {
      const separator = entry.lastIndexOf(':');
      if (separator > 0) {
        mounts[entry.slice(0, separator).trim()] = entry.slice(separator + 1).trim();
      }
    }
    return mounts;
  }
  return value;
}, z.record(z.string().min(1)));

/**
 * Background fill retry policy
 */
const fillRetrySchema = z.object({
  maxAttempts: z.coerce.number().int().min(1).max(100).default(5),
  baseDelayMs: z.coerce.number().int().min(0).default(1000),
  backoffMultiplier: z.coerce.number().min(1).max(10).default(2),
  maxDelayMs: z.coerce.number().int().min(0).default(60000),
});

export type FillRetryConfig = z.infer<typeof fillRetrySchema>;

const sharedStateSchema = z.object({
  enabled: booleanish.default(false),
  host: z.string().default('localhost'),
  port: portNumber.default(6379),
  db: z.coerce.number().int().min(0).default(0),
  username: z.string().optional(),
  password: z.string().optional(),
  namespace: z.string().min(1).default('warmbox'),
});

export type SharedStateConfig = z.infer<typeof sharedStateSchema>;

const ossSchema = z.object({
  endpoint: z.string().optional(),
  accessKeyId: z.string().optional(),
  accessKeySecret: z.string().optional(),
  bucket: z.string().optional(),
});

const storageSchema = z
  .object({
    kind: z.enum(['local', 'oss']).default('local'),
    folder: z.string().optional(),
    oss: ossSchema.default({}),
  })
  .superRefine((storage, ctx) => {
    if (storage.kind !== 'oss') return;
    for (const key of ['endpoint', 'accessKeyId', 'accessKeySecret', 'bucket'] as const) {
      if (!storage.oss[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['oss', key],
          message: `storage.oss.${key} is required when storage kind is oss`,
        });
      }
    }
  });

export type StorageConfig = z.infer<typeof storageSchema>;

const kubernetesSchema = z.object({
  namespace: z.string().min(1).default('default'),
  kubeconfigPath: z.string().optional(),
});

export type KubernetesConfig = z.infer<typeof kubernetesSchema>;

const imagesSchema = z.object({
  registry: z.string().default(''),
  namespace: z.string().min(1).default('warmbox'),
  tag: z.string().min(1).default('latest'),
});

export type ImageConfig = z.infer<typeof imagesSchema>;

// Default service-node-port-range of a Kubernetes API server
const NODE_PORT_RANGE = [30000, 32767] as const;

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Server
  host: z.string().default('127.0.0.1'),
  port: portNumber.default(8000),
  workers: z.coerce.number().int().min(1).max(64).default(1),
  bearerToken: z.string().min(1).optional(),

  // Pooling
  defaultSandboxTypes: sandboxTypeListSchema.default(['base']),
  poolSize: z.coerce.number().int().min(0).max(100).default(1),
  autoCleanup: booleanish.default(true),
  containerPrefix: z
    .string()
    .min(1)
    .max(MAX_CONTAINER_PREFIX_LENGTH)
    .regex(/^[a-z0-9][a-z0-9_-]*$/, 'Container prefix must be lower-case alphanumeric, "-" or "_"')
    .default('warmbox_sandbox_'),

  // Backend
  backend: z.enum(['docker', 'k8s']).default('docker'),
  dockerSocketPath: z.string().optional(),
  defaultMountDir: z.string().optional(),
  readonlyMounts: mountMapSchema.default({}),
  portRange: portRangeSchema.default([49152, 59152]),

  // Timers
  maxIdleSeconds: z.coerce.number().int().min(1).default(600),
  sweepIntervalMs: z.coerce.number().int().min(100).default(30000),
  fillIntervalMs: z.coerce.number().int().min(100).default(5000),
  shutdownGraceMs: z.coerce.number().int().min(0).default(15000),

  fillRetry: fillRetrySchema.default({}),
  sharedState: sharedStateSchema.default({}),
  storage: storageSchema.default({}),
  kubernetes: kubernetesSchema.default({}),
  images: imagesSchema.default({}),
}).superRefine((config, ctx) => {
  const [low, high] = config.portRange;
  if (config.backend === 'k8s' && (low < NODE_PORT_RANGE[0] || high > NODE_PORT_RANGE[1])) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['portRange'],
      message: `Kubernetes NodePorts must lie within ${NODE_PORT_RANGE[0]}-${NODE_PORT_RANGE[1]}`,
    });
  }
});

export type WarmboxConfig = z.output<typeof configSchema>;

type RawValue = string | undefined | RawObject;
interface RawObject {
  [key: string]: RawValue;
}

function env(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value === '' ? undefined : value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Overlay the defined values of `overlay` onto `base`, recursing into objects.
 */
function overlayDefined(base: Record<string, unknown>, overlay: RawObject): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    if (value === undefined) continue;
    if (typeof value === 'string') {
      merged[key] = value;
      continue;
    }
    const current = merged[key];
    merged[key] = overlayDefined(isRecord(current) ? current : {}, value);
  }
  return merged;
}

/**
 * Read the YAML configuration file, if one is configured
 */
function readConfigFile(path: string | undefined): Record<string, unknown> {
  if (!path) {
    return {};
  }

  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new Error(
      `Configuration validation failed: cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed: unknown = parseYaml(content);
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new Error(`Configuration validation failed: ${path} must contain a mapping`);
  }
  return parsed;
}

function readEnvironment(): RawObject {
  return {
    host: env('WARMBOX_HOST'),
    port: env('WARMBOX_PORT'),
    workers: env('WARMBOX_WORKERS'),
    bearerToken: env('WARMBOX_BEARER_TOKEN'),
    defaultSandboxTypes: env('WARMBOX_DEFAULT_SANDBOX_TYPE'),
    poolSize: env('WARMBOX_POOL_SIZE'),
    autoCleanup: env('WARMBOX_AUTO_CLEANUP'),
    containerPrefix: env('WARMBOX_CONTAINER_PREFIX'),
    backend: env('WARMBOX_BACKEND'),
    dockerSocketPath: env('WARMBOX_DOCKER_SOCKET'),
    defaultMountDir: env('WARMBOX_DEFAULT_MOUNT_DIR'),
    readonlyMounts: env('WARMBOX_READONLY_MOUNTS'),
    portRange: env('WARMBOX_PORT_RANGE'),
    maxIdleSeconds: env('WARMBOX_MAX_IDLE_SECONDS'),
    sweepIntervalMs: env('WARMBOX_SWEEP_INTERVAL_MS'),
    fillIntervalMs: env('WARMBOX_FILL_INTERVAL_MS'),
    shutdownGraceMs: env('WARMBOX_SHUTDOWN_GRACE_MS'),
    fillRetry: {
      maxAttempts: env('WARMBOX_FILL_MAX_ATTEMPTS'),
      baseDelayMs: env('WARMBOX_FILL_BASE_DELAY_MS'),
      backoffMultiplier: env('WARMBOX_FILL_BACKOFF_MULTIPLIER'),
      maxDelayMs: env('WARMBOX_FILL_MAX_DELAY_MS'),
    },
    sharedState: {
      enabled: env('WARMBOX_SHARED_STATE_ENABLED'),
      host: env('WARMBOX_REDIS_HOST'),
      port: env('WARMBOX_REDIS_PORT'),
      db: env('WARMBOX_REDIS_DB'),
      username: env('WARMBOX_REDIS_USERNAME'),
      password: env('WARMBOX_REDIS_PASSWORD'),
      namespace: env('WARMBOX_STATE_NAMESPACE'),
    },
    storage: {
      kind: env('WARMBOX_STORAGE_KIND'),
      folder: env('WARMBOX_STORAGE_FOLDER'),
      oss: {
        endpoint: env('WARMBOX_OSS_ENDPOINT'),
        accessKeyId: env('WARMBOX_OSS_ACCESS_KEY_ID'),
        accessKeySecret: env('WARMBOX_OSS_ACCESS_KEY_SECRET'),
        bucket: env('WARMBOX_OSS_BUCKET'),
      },
    },
    kubernetes: {
      namespace: env('WARMBOX_K8S_NAMESPACE'),
      kubeconfigPath: env('WARMBOX_KUBECONFIG'),
    },
    images: {
      registry: env('WARMBOX_IMAGE_REGISTRY'),
      namespace: env('WARMBOX_IMAGE_NAMESPACE'),
      tag: env('WARMBOX_IMAGE_TAG'),
    },
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate a raw configuration object and apply the cross-field rules.
 */
export function parseConfig(raw: Record<string, unknown>): WarmboxConfig {
  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.issues }, 'Invalid configuration');
    throw new Error(`Configuration validation failed: ${formatIssues(result.error)}`);
  }

  const config = result.data;

  // Workers cannot share an in-process store
  if (config.workers > 1 && !config.sharedState.enabled) {
    log.warn({ workers: config.workers }, 'Shared state is disabled, forcing a single worker');
    return { ...config, workers: 1 };
  }

  return config;
}

/**
 * Load configuration from the environment and the optional YAML file
 */
export function loadConfig(): WarmboxConfig {
  const fromFile = readConfigFile(env('WARMBOX_CONFIG_FILE'));
  const config = parseConfig(overlayDefined(fromFile, readEnvironment()));

  log.info(
    {
      backend: config.backend,
      workers: config.workers,
      poolSize: config.poolSize,
      defaultSandboxTypes: config.defaultSandboxTypes,
      portRange: config.portRange,
      sharedState: config.sharedState.enabled,
      storage: config.storage.kind,
    },
    'Configuration loaded'
  );

  return config;
}

/**
 * Singleton configuration instance
 */
let configInstance: WarmboxConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): WarmboxConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
