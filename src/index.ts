/**
 * sandbox-sessions - Ephemeral sandboxes for untrusted code
 *
 * Features:
 * - Named sessions with state that persists across executions
 * - Docker containers or E2B microVMs behind one runtime contract
 * - Memory, CPU, wall-clock and network limits
 * - Produced files returned inline (images) or as signed URLs
 * - Idle sessions reaped in the background
 *
 * @example
 * ```typescript
 * import { createSandboxServiceFromEnv } from 'sandbox-sessions';
 *
 * const { manager, tools } = createSandboxServiceFromEnv();
 *
 * const result = await tools.executeCode('s1', 'python', 'print(2 + 2)');
 * // result.content[0] -> { type: 'text', text: 'STDOUT:\n4\n' }
 *
 * await manager.shutdown();
 * ```
 */

import { SessionManager } from './server/sandbox/manager';
import { ArtifactProcessor } from './server/sandbox/artifacts';
import { LoggingAuditSink, noopAuditSink } from './server/sandbox/audit';
import { createRuntimeFactory } from './server/sandbox/factory';
import { EnvSecretsProvider, type SecretsProvider } from './server/sandbox/secrets';
import { SandboxTools } from './server/sandbox/tools';
import { getServiceSettings, type ServiceSettings } from './server/config';
import { logger } from './server/logger';
import { createObjectStorage } from './storage';

export * from './server/sandbox';
export * from './storage';
export { ErrorCode, Errors, ExecutionTimeoutError, SandboxError, isSandboxError } from './core/errors';
export {
  getConfig,
  getServiceSettings,
  loadConfig,
  resetConfig,
  resolveRuntimeConfig,
  runtimeConfigSchema,
  type ServiceSettings,
} from './server/config';
export { Logger, Metrics, logger, metrics } from './server/logger';
export type { MetricsSnapshot } from './server/logger';

export interface SandboxService {
  manager: SessionManager;
  tools: SandboxTools;
  settings: ServiceSettings;
}

/**
 * Wire a session manager, its collaborators and the tool layer from settings
 */
export function createSandboxService(
  settings: ServiceSettings,
  secrets: SecretsProvider = new EnvSecretsProvider()
): SandboxService {
  const storage = createObjectStorage({
    ...settings.storage,
    signedUrlTtlSeconds: settings.artifacts.signedUrlTtlSeconds,
  });

  const manager = new SessionManager({
    runtimeFactory: createRuntimeFactory({
      docker: settings.docker,
      e2b: settings.e2b,
      secrets,
      terminateTimeoutMs: settings.terminateTimeoutMs,
    }),
    artifacts: new ArtifactProcessor({
      storage,
      maxArtifactBytes: settings.artifacts.maxBytes,
    }),
    defaults: settings.runtime,
    audit: settings.auditLog ? new LoggingAuditSink() : noopAuditSink,
    reaperIntervalMs: settings.reaperIntervalMs,
    shutdownGraceMs: settings.shutdownGraceMs,
  });

  logger.info('Sandbox service ready', {
    backend: settings.runtime.backend,
    storage: storage.name,
  });

  return { manager, tools: new SandboxTools(manager), settings };
}

/**
 * Create the service from SANDBOX_* environment variables
 */
export function createSandboxServiceFromEnv(): SandboxService {
  return createSandboxService(getServiceSettings());
}
