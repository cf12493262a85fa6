/**
 * Base Runtime Backend
 *
 * Abstract base class for runtime backends with common functionality.
 */

import type {
  BackendKind,
  BackendResult,
  ExecuteHooks,
  Language,
  RuntimeBackend,
  RuntimeConfig,
  WorkspaceSnapshot,
} from './types';
import { Errors } from '../../core/errors';
import { logger as rootLogger, type Logger } from '../logger';

/**
 * Interpreter command lines per language
 */
const LANGUAGE_COMMANDS: Record<Language, (code: string) => string[]> = {
  python: (code) => ['python3', '-c', code],
  bash: (code) => ['bash', '-c', code],
  r: (code) => ['Rscript', '-e', code],
};

/**
 * Abstract base class for runtime backends
 */
export abstract class BaseRuntimeBackend implements RuntimeBackend {
  abstract readonly kind: BackendKind;

  protected readonly log: Logger;
  private runtimeConfig: RuntimeConfig | null = null;

  constructor(log?: Logger) {
    this.log = log ?? rootLogger.child({ component: 'backend' });
  }

  /**
   * Configuration the backend was started with
   */
  protected get config(): RuntimeConfig {
    if (!this.runtimeConfig) {
      throw Errors.notStarted('use backend');
    }
    return this.runtimeConfig;
  }

  async start(config: RuntimeConfig): Promise<void> {
    this.runtimeConfig = config;
    await this.boot(config);
  }

  protected abstract boot(config: RuntimeConfig): Promise<void>;

  abstract execute(code: string, language: Language, hooks: ExecuteHooks): Promise<BackendResult>;
  abstract putFile(localPath: string, remotePath: string): Promise<void>;
  abstract getFile(remotePath: string, localPath: string): Promise<void>;
  abstract readFile(remotePath: string): Promise<Buffer>;
  abstract listFiles(remotePath: string): Promise<string[]>;
  abstract snapshot(): Promise<WorkspaceSnapshot>;
  abstract installPackage(spec: string, hooks: ExecuteHooks): Promise<BackendResult>;
  abstract stop(): Promise<void>;
  abstract kill(): Promise<void>;

  /**
   * Command line that runs a one-shot script in the given language
   */
  protected languageCommand(language: Language, code: string): string[] {
    return LANGUAGE_COMMANDS[language](code);
  }
}

/**
 * Index URL pip should use under an allowlist network policy
 */
export function packageIndexUrl(config: RuntimeConfig): string | undefined {
  const policy = config.networkPolicy;
  if (policy.mode !== 'allowlist' || policy.domains.length === 0) {
    return undefined;
  }
  const domain = policy.domains[0];
  return /^https?:\/\//.test(domain) ? domain : `https://${domain}/simple`;
}

/**
 * Parse `find -printf '%P\t%s\t%T@\n'` style output into a snapshot
 */
export function parseSnapshotListing(listing: string): WorkspaceSnapshot {
  const snapshot: WorkspaceSnapshot = new Map();
  for (const line of listing.split('\n')) {
    if (!line) continue;
    const [relPath, size, mtime] = line.split('\t');
    if (!relPath || size === undefined || mtime === undefined) continue;
    snapshot.set(relPath, {
      size: Number(size),
      mtimeMs: Math.round(Number(mtime) * 1000),
    });
  }
  return snapshot;
}
