/**
 * Sandbox Configuration & Environment Validation
 *
 * Validates the SANDBOX_* environment variables and provides typed
 * configuration access, plus the schema that per-session runtime
 * configuration overrides are parsed with.
 */

import { z } from 'zod';
import { Errors } from '../core/errors';

// =============================================================================
// Runtime Configuration Schema
// =============================================================================

export const networkPolicySchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('none') }),
  z.object({ mode: z.literal('allowlist'), domains: z.array(z.string().min(1)).min(1) }),
]);

export const runtimeConfigSchema = z.object({
  backend: z.enum(['docker', 'e2b']).default('docker'),
  idleTimeoutMs: z.number().int().positive().default(300_000),
  maxMemoryMb: z.number().int().positive().default(512),
  maxCpu: z.number().positive().default(1.0),
  maxExecutionTimeMs: z.number().int().positive().default(60_000),
  networkPolicy: networkPolicySchema.default({ mode: 'none' }),
  allowedPackages: z.array(z.string().min(1)).default([]),
  workingDirectory: z.string().startsWith('/').default('/workspace'),
});

export type NetworkPolicy = z.infer<typeof networkPolicySchema>;
export type RuntimeConfig = Readonly<z.output<typeof runtimeConfigSchema>>;
export type RuntimeConfigInput = z.input<typeof runtimeConfigSchema>;
export type BackendKind = RuntimeConfig['backend'];

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Parse a runtime configuration, optionally layered over a base one.
 * The result is frozen; sessions keep it as their configuration snapshot.
 */
export function resolveRuntimeConfig(
  input: RuntimeConfigInput = {},
  base?: RuntimeConfig
): RuntimeConfig {
  const result = runtimeConfigSchema.safeParse({ ...base, ...input });
  if (!result.success) {
    throw Errors.configInvalid(formatIssues(result.error));
  }

  const { networkPolicy, allowedPackages } = result.data;
  return Object.freeze({
    ...result.data,
    networkPolicy: networkPolicy.mode === 'allowlist'
      ? { mode: networkPolicy.mode, domains: [...networkPolicy.domains] }
      : { mode: networkPolicy.mode },
    allowedPackages: [...allowedPackages],
  });
}

// =============================================================================
// Environment Schema
// =============================================================================

const positive = (fallback: string) =>
  z.string().transform(Number).pipe(z.number().positive()).default(fallback);

const list = () =>
  z.string().default('').transform(value => value.split(',').map(v => v.trim()).filter(Boolean));

const envSchema = z.object({
  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Runtime defaults
  SANDBOX_RUNTIME: z.enum(['docker', 'e2b']).default('docker'),
  SANDBOX_IDLE_TIMEOUT_SECONDS: positive('300'),
  SANDBOX_MAX_MEMORY_MB: positive('512'),
  SANDBOX_MAX_CPU: positive('1'),
  SANDBOX_MAX_EXECUTION_SECONDS: positive('60'),
  SANDBOX_NETWORK: z.enum(['none', 'allowlist']).default('none'),
  SANDBOX_ALLOWED_DOMAINS: list(),
  SANDBOX_ALLOWED_PACKAGES: list(),
  SANDBOX_WORKDIR: z.string().startsWith('/').default('/workspace'),

  // Lifecycle
  SANDBOX_REAPER_INTERVAL_SECONDS: positive('30'),
  SANDBOX_SHUTDOWN_GRACE_SECONDS: positive('30'),
  SANDBOX_TERMINATE_TIMEOUT_SECONDS: positive('10'),

  // Docker backend
  SANDBOX_DOCKER_IMAGE: z.string().default('python:3.12-slim'),
  SANDBOX_DOCKER_HOST: z.string().optional(),
  SANDBOX_DOCKER_NETWORK: z.string().default('bridge'),

  // E2B backend (API key comes from the secrets provider)
  SANDBOX_E2B_TEMPLATE: z.string().optional(),

  // Artifacts & object storage (S3-compatible)
  SANDBOX_MAX_ARTIFACT_BYTES: positive(String(10 * 1024 * 1024)),
  SANDBOX_STORAGE: z.enum(['s3', 'local']).default('local'),
  SANDBOX_S3_BUCKET: z.string().optional(),
  SANDBOX_S3_ENDPOINT: z.string().url().optional(),
  AWS_REGION: z.string().default('us-east-1'),
  SANDBOX_LOCAL_STORAGE_DIR: z.string().default('./artifacts'),
  SANDBOX_SIGNED_URL_TTL_SECONDS: positive('3600'),

  // Audit
  SANDBOX_AUDIT_LOG: z.string().transform(v => v === 'true').default('true'),
}).superRefine((env, ctx) => {
  if (env.SANDBOX_NETWORK === 'allowlist' && env.SANDBOX_ALLOWED_DOMAINS.length === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['SANDBOX_ALLOWED_DOMAINS'],
      message: 'required when SANDBOX_NETWORK=allowlist',
    });
  }
  if (env.SANDBOX_STORAGE === 's3' && !env.SANDBOX_S3_BUCKET) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['SANDBOX_S3_BUCKET'],
      message: 'required when SANDBOX_STORAGE=s3',
    });
  }
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Parse an environment map; throws CONFIG_INVALID listing every bad variable
 */
export function parseEnvConfig(env: Record<string, string | undefined>): EnvConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw Errors.configInvalid(formatIssues(result.error));
  }
  return result.data;
}

// =============================================================================
// Configuration Singleton
// =============================================================================

let config: EnvConfig | null = null;

/**
 * Validate and load environment configuration
 */
export function loadConfig(): EnvConfig {
  if (config) return config;
  config = parseEnvConfig(process.env);
  return config;
}

/**
 * Get the current configuration (loads it on first use)
 */
export function getConfig(): EnvConfig {
  if (!config) {
    return loadConfig();
  }
  return config;
}

/**
 * Drop the cached configuration so the next access re-reads the environment
 */
export function resetConfig(): void {
  config = null;
}

// =============================================================================
// Configuration Helpers
// =============================================================================

export interface ServiceSettings {
  runtime: RuntimeConfig;
  reaperIntervalMs: number;
  shutdownGraceMs: number;
  terminateTimeoutMs: number;
  docker: {
    image: string;
    host?: string;
    network: string;
  };
  e2b: {
    template?: string;
  };
  artifacts: {
    maxBytes: number;
    signedUrlTtlSeconds: number;
  };
  storage:
    | { kind: 's3'; bucket: string; region: string; endpoint?: string }
    | { kind: 'local'; directory: string };
  auditLog: boolean;
}

/**
 * Derive typed service settings from validated environment configuration
 */
export function toServiceSettings(cfg: EnvConfig): ServiceSettings {
  const runtime = resolveRuntimeConfig({
    backend: cfg.SANDBOX_RUNTIME,
    idleTimeoutMs: cfg.SANDBOX_IDLE_TIMEOUT_SECONDS * 1000,
    maxMemoryMb: Math.floor(cfg.SANDBOX_MAX_MEMORY_MB),
    maxCpu: cfg.SANDBOX_MAX_CPU,
    maxExecutionTimeMs: cfg.SANDBOX_MAX_EXECUTION_SECONDS * 1000,
    networkPolicy: cfg.SANDBOX_NETWORK === 'allowlist'
      ? { mode: 'allowlist', domains: cfg.SANDBOX_ALLOWED_DOMAINS }
      : { mode: 'none' },
    allowedPackages: cfg.SANDBOX_ALLOWED_PACKAGES,
    workingDirectory: cfg.SANDBOX_WORKDIR,
  });

  return {
    runtime,
    reaperIntervalMs: cfg.SANDBOX_REAPER_INTERVAL_SECONDS * 1000,
    shutdownGraceMs: cfg.SANDBOX_SHUTDOWN_GRACE_SECONDS * 1000,
    terminateTimeoutMs: cfg.SANDBOX_TERMINATE_TIMEOUT_SECONDS * 1000,
    docker: {
      image: cfg.SANDBOX_DOCKER_IMAGE,
      host: cfg.SANDBOX_DOCKER_HOST,
      network: cfg.SANDBOX_DOCKER_NETWORK,
    },
    e2b: {
      template: cfg.SANDBOX_E2B_TEMPLATE,
    },
    artifacts: {
      maxBytes: Math.floor(cfg.SANDBOX_MAX_ARTIFACT_BYTES),
      signedUrlTtlSeconds: cfg.SANDBOX_SIGNED_URL_TTL_SECONDS,
    },
    storage: cfg.SANDBOX_STORAGE === 's3' && cfg.SANDBOX_S3_BUCKET
      ? { kind: 's3', bucket: cfg.SANDBOX_S3_BUCKET, region: cfg.AWS_REGION, endpoint: cfg.SANDBOX_S3_ENDPOINT }
      : { kind: 'local', directory: cfg.SANDBOX_LOCAL_STORAGE_DIR },
    auditLog: cfg.SANDBOX_AUDIT_LOG,
  };
}

/**
 * Get service settings for the current process environment
 */
export function getServiceSettings(): ServiceSettings {
  return toServiceSettings(getConfig());
}
