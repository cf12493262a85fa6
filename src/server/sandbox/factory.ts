/**
 * Runtime factory
 *
 * Maps a backend kind to the backend that implements it and wraps the
 * result in a SandboxRuntime. Credentials are resolved here, once.
 */

import type { BackendKind, RuntimeAdapter, RuntimeBackend, RuntimeConfig } from './types';
import { SandboxRuntime } from './runtime';
import { DockerBackend, type DockerBackendOptions } from './providers/docker';
import { E2BBackend, type E2BBackendOptions } from './providers/e2b';
import { EnvSecretsProvider, type SecretsProvider } from './secrets';
import { logger as rootLogger, type Logger } from '../logger';

export type RuntimeFactory = (config: RuntimeConfig) => RuntimeAdapter;

export interface RuntimeFactoryOptions {
  docker?: Partial<DockerBackendOptions>;
  e2b?: Omit<E2BBackendOptions, 'apiKey'>;
  secrets?: SecretsProvider;
  terminateTimeoutMs?: number;
  logger?: Logger;
}

export const DEFAULT_DOCKER_IMAGE = 'python:3.12-slim';

/**
 * Build a factory that creates an unstarted runtime for a session config
 */
export function createRuntimeFactory(options: RuntimeFactoryOptions = {}): RuntimeFactory {
  const log = options.logger ?? rootLogger;
  const secrets = options.secrets ?? new EnvSecretsProvider();
  const e2bApiKey = secrets.getSecret('E2B_API_KEY');

  const backends: Record<BackendKind, () => RuntimeBackend> = {
    docker: () =>
      new DockerBackend({
        ...options.docker,
        image: options.docker?.image ?? DEFAULT_DOCKER_IMAGE,
        logger: log,
      }),
    e2b: () =>
      new E2BBackend({
        ...options.e2b,
        apiKey: e2bApiKey,
        logger: log,
      }),
  };

  return (config) =>
    new SandboxRuntime(backends[config.backend](), config, {
      terminateTimeoutMs: options.terminateTimeoutMs,
      logger: log,
    });
}
