/**
 * Sandbox Runtime
 *
 * Wraps a backend with the rules every runtime shares: one operation at a
 * time, a supervising wall-clock limit, path confinement, the package
 * allowlist and a bounded, idempotent terminate.
 */

import type {
  BackendKind,
  BackendResult,
  ExecuteHooks,
  RuntimeAdapter,
  RuntimeBackend,
  RuntimeConfig,
  RuntimeExecution,
  TerminationOutcome,
  WorkspaceSnapshot,
} from './types';
import { SUPPORTED_LANGUAGES, isLanguage } from './types';
import { resolveRemotePath } from './paths';
import { isPackageAllowed } from './packages';
import { Errors, ExecutionTimeoutError } from '../../core/errors';
import { errorFields, logger as rootLogger, type Logger } from '../logger';
import { withTimeout } from '../../utils/async';

type RuntimeState = 'created' | 'starting' | 'running' | 'terminated';

export interface SandboxRuntimeOptions {
  /** Bound for the graceful stop and, separately, for the forced kill */
  terminateTimeoutMs?: number;
  logger?: Logger;
}

export class SandboxRuntime implements RuntimeAdapter {
  readonly config: RuntimeConfig;

  private readonly backend: RuntimeBackend;
  private readonly terminateTimeoutMs: number;
  private readonly log: Logger;
  private state: RuntimeState = 'created';
  private activeOperation: string | null = null;
  private startup: Promise<void> | null = null;
  private termination: Promise<TerminationOutcome> | null = null;

  constructor(backend: RuntimeBackend, config: RuntimeConfig, options: SandboxRuntimeOptions = {}) {
    this.backend = backend;
    this.config = config;
    this.terminateTimeoutMs = options.terminateTimeoutMs ?? 10_000;
    this.log = (options.logger ?? rootLogger).child({ component: 'runtime', backend: backend.kind });
  }

  get kind(): BackendKind {
    return this.backend.kind;
  }

  get started(): boolean {
    return this.state === 'running';
  }

  get terminated(): boolean {
    return this.state === 'terminated';
  }

  get busy(): boolean {
    return this.activeOperation !== null;
  }

  async start(): Promise<void> {
    if (this.state !== 'created') {
      throw Errors.alreadyStarted();
    }
    this.state = 'starting';
    this.startup = this.backend.start(this.config);

    try {
      await this.startup;
    } catch (error) {
      this.log.error('Backend failed to start', errorFields(error));
      await (this.termination ?? this.release(true));
      throw Errors.provisionFailure(this.backend.kind, error);
    }

    if (this.termination) {
      await this.termination;
      throw Errors.provisionFailure(this.backend.kind, new Error('terminated during start'));
    }

    this.state = 'running';
  }

  async execute(code: string, language: string): Promise<RuntimeExecution> {
    if (!isLanguage(language)) {
      throw Errors.unsupportedLanguage(language, SUPPORTED_LANGUAGES);
    }
    return this.exclusive('execute', () =>
      this.supervise((hooks) => this.backend.execute(code, language, hooks))
    );
  }

  async upload(localPath: string, remotePath: string): Promise<void> {
    const target = resolveRemotePath(remotePath, this.config.workingDirectory);
    await this.exclusive('upload', () => this.backend.putFile(localPath, target));
  }

  async download(remotePath: string, localPath: string): Promise<void> {
    const source = resolveRemotePath(remotePath, this.config.workingDirectory);
    await this.exclusive('download', () => this.backend.getFile(source, localPath));
  }

  async installPackage(spec: string): Promise<RuntimeExecution> {
    if (!isPackageAllowed(spec, this.config.allowedPackages)) {
      throw Errors.packageNotAllowed(spec, this.config.allowedPackages);
    }

    const result = await this.exclusive('install package', () =>
      this.supervise((hooks) => this.backend.installPackage(spec, hooks))
    );
    if (result.exitCode !== 0) {
      const details = result.stderr.trim().split('\n').pop() || `exit code ${result.exitCode}`;
      throw Errors.installFailed(spec, details);
    }
    return result;
  }

  async listFiles(remotePath: string = '.'): Promise<string[]> {
    const target = resolveRemotePath(remotePath, this.config.workingDirectory);
    return this.exclusive('list files', () => this.backend.listFiles(target));
  }

  async snapshot(): Promise<WorkspaceSnapshot> {
    return this.exclusive('snapshot', () => this.backend.snapshot());
  }

  async readFile(remotePath: string): Promise<Buffer> {
    const source = resolveRemotePath(remotePath, this.config.workingDirectory);
    return this.exclusive('read file', () => this.backend.readFile(source));
  }

  /**
   * Release backend resources. Never throws; repeated calls share one outcome.
   */
  terminate(): Promise<TerminationOutcome> {
    if (this.termination) {
      return this.termination;
    }
    if (this.state === 'created') {
      this.state = 'terminated';
      this.termination = Promise.resolve({ ok: true, alreadyTerminated: true });
      return this.termination;
    }
    if (this.state === 'starting') {
      // Tear down once the boot settles; start() reports its own outcome
      this.termination = Promise.allSettled([this.startup]).then(() => {
        this.state = 'terminated';
        return this.stopBackend(false);
      });
      return this.termination;
    }
    return this.release(false);
  }

  private release(force: boolean): Promise<TerminationOutcome> {
    if (this.termination) {
      return this.termination;
    }
    this.state = 'terminated';
    this.termination = this.stopBackend(force);
    return this.termination;
  }

  private async stopBackend(force: boolean): Promise<TerminationOutcome> {
    if (!force) {
      try {
        await withTimeout(this.backend.stop(), this.terminateTimeoutMs, 'graceful stop');
        this.log.debug('Runtime stopped');
        return { ok: true, method: 'graceful' };
      } catch (error) {
        this.log.warn('Graceful stop failed, forcing kill', errorFields(error));
      }
    }

    try {
      await withTimeout(this.backend.kill(), this.terminateTimeoutMs, 'forced kill');
      this.log.debug('Runtime killed');
      return { ok: true, method: 'forced' };
    } catch (error) {
      this.log.error('Forced kill failed', errorFields(error));
      return { ok: false, error: error instanceof Error ? error.message : String(error) };
    }
  }

  /**
   * Run fn as the only operation on this runtime. The check and the claim
   * happen before the first await, so a concurrent caller sees BUSY.
   */
  private async exclusive<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    if (this.state !== 'running') {
      throw Errors.notStarted(operation);
    }
    if (this.activeOperation) {
      throw Errors.busy(operation);
    }

    this.activeOperation = operation;
    try {
      return await fn();
    } finally {
      this.activeOperation = null;
    }
  }

  /**
   * Enforce the execution time limit independently of the backend.
   * On overrun the call is aborted and the backend force-killed.
   */
  private async supervise(run: (hooks: ExecuteHooks) => Promise<BackendResult>): Promise<RuntimeExecution> {
    const limitMs = this.config.maxExecutionTimeMs;
    const controller = new AbortController();
    let stdout = '';
    let stderr = '';
    const hooks: ExecuteHooks = {
      signal: controller.signal,
      onStdout: (chunk) => {
        stdout += chunk;
      },
      onStderr: (chunk) => {
        stderr += chunk;
      },
    };

    const startedAt = Date.now();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const overrun = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), limitMs);
    });

    try {
      const outcome = await Promise.race([run(hooks), overrun]);

      if (outcome === 'timeout') {
        controller.abort();
        const durationMs = Date.now() - startedAt;
        this.log.warn('Execution exceeded time limit', { limitMs, durationMs });
        await this.release(true);
        throw new ExecutionTimeoutError(limitMs, { stdout, stderr, durationMs });
      }

      return {
        stdout: outcome.stdout,
        stderr: outcome.stderr,
        exitCode: outcome.exitCode,
        executionDurationMs: Date.now() - startedAt,
        declaredOutputs: outcome.outputs ?? [],
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
