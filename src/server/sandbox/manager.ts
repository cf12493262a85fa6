/**
 * Session Manager
 *
 * Owns the session registry and the reaper, and drives a runtime per
 * session through provisioning, execution and termination.
 *
 * Handles:
 * - Get-or-create with exactly one backend boot per new session id
 * - Per-session FIFO serialization of every operation
 * - Artifact post-processing of each execution
 * - Explicit close, idle reaping and a bounded shutdown
 */

import { EventEmitter } from 'events';
import type {
  ExecutionResult,
  RuntimeConfig,
  RuntimeConfigInput,
  RuntimeExecution,
  SessionInfo,
  TerminationOutcome,
  WorkspaceSnapshot,
} from './types';
import { SUPPORTED_LANGUAGES, isLanguage } from './types';
import type { RuntimeFactory } from './factory';
import type { ArtifactProcessor } from './artifacts';
import { noopAuditSink, type AuditSink } from './audit';
import { SessionLock } from './lock';
import { Reaper, type SweepReport } from './reaper';
import { SessionRegistry, toSessionInfo, type SessionRecord } from './registry';
import { resolveRuntimeConfig } from '../config';
import { Errors, ErrorCode, isSandboxError } from '../../core/errors';
import { errorFields, logger as rootLogger, metrics, type Logger, type MetricsSnapshot } from '../logger';
import { computeHash, shortHash } from '../../utils/hash';
import { withTimeout } from '../../utils/async';

export type TerminationReason = 'closed' | 'idle' | 'timeout' | 'shutdown';

export interface SessionManagerOptions {
  runtimeFactory: RuntimeFactory;
  artifacts: ArtifactProcessor;
  /** Base configuration every session's overrides are layered on */
  defaults?: RuntimeConfigInput;
  audit?: AuditSink;
  reaperIntervalMs?: number;
  /** Start the reaper with the manager (default: true) */
  startReaper?: boolean;
  shutdownGraceMs?: number;
  logger?: Logger;
}

export const DEFAULT_SHUTDOWN_GRACE_MS = 30_000;

export class SessionManager extends EventEmitter {
  readonly defaults: RuntimeConfig;

  private readonly registry = new SessionRegistry();
  private readonly runtimeFactory: RuntimeFactory;
  private readonly artifacts: ArtifactProcessor;
  private readonly audit: AuditSink;
  private readonly reaper: Reaper;
  private readonly shutdownGraceMs: number;
  private readonly log: Logger;
  private shutdownPromise: Promise<void> | null = null;

  constructor(options: SessionManagerOptions) {
    super();
    this.defaults = resolveRuntimeConfig(options.defaults);
    this.runtimeFactory = options.runtimeFactory;
    this.artifacts = options.artifacts;
    this.audit = options.audit ?? noopAuditSink;
    this.shutdownGraceMs = options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;
    this.log = (options.logger ?? rootLogger).child({ component: 'session-manager' });
    this.reaper = new Reaper({
      registry: this.registry,
      terminate: (record) => this.retire(record, 'idle'),
      intervalMs: options.reaperIntervalMs,
      logger: options.logger,
    });

    if (options.startReaper !== false) {
      this.reaper.start();
    }
  }

  get shuttingDown(): boolean {
    return this.shutdownPromise !== null;
  }

  /**
   * Return the live session for an id, booting a new one if there is none.
   * Concurrent callers for a new id share one boot and its outcome.
   */
  async getOrCreateSession(sessionId: string, overrides?: RuntimeConfigInput): Promise<SessionInfo> {
    if (typeof sessionId !== 'string' || sessionId.trim() === '') {
      throw Errors.invalidArgument('sessionId', 'a non-empty string');
    }
    if (this.shuttingDown) {
      throw Errors.shuttingDown();
    }

    const { record, created } = this.registry.reserve(sessionId, () =>
      this.createRecord(sessionId, overrides)
    );

    if (!created && record.state !== 'provisioning') {
      this.registry.touch(record);
      return toSessionInfo(record);
    }

    await record.ready;
    return toSessionInfo(record);
  }

  async execute(sessionId: string, code: string, language: string): Promise<ExecutionResult> {
    if (!isLanguage(language)) {
      throw Errors.unsupportedLanguage(language, SUPPORTED_LANGUAGES);
    }

    return this.withSession(sessionId, async (record) => {
      this.notifyAudit(record, code, language);

      const warnings: string[] = [];
      const before = await this.snapshot(record, warnings);
      const run = await record.runtime.execute(code, language);
      const after = before ? await this.snapshot(record, warnings) : null;

      const processed = await this.artifacts.process({
        sessionId,
        source: record.runtime,
        before: before ?? new Map(),
        after: after ?? before ?? new Map(),
        declaredOutputs: run.declaredOutputs,
      });
      warnings.push(...processed.warnings);

      record.executionCount++;
      metrics.inc('sandbox_executions_total', 1, { language, backend: record.config.backend });
      metrics.observe('sandbox_execution_duration_ms', run.executionDurationMs, { language });

      return {
        stdout: run.stdout,
        stderr: appendWarnings(run.stderr, warnings),
        exitCode: run.exitCode,
        artifacts: processed.artifacts,
        executionDurationMs: run.executionDurationMs,
        warnings,
      };
    });
  }

  /**
   * Install a package; shares the session's exclusivity with execute
   */
  async installPackage(sessionId: string, spec: string): Promise<RuntimeExecution> {
    return this.withSession(sessionId, async (record) => {
      const result = await record.runtime.installPackage(spec);
      this.log.info('Package installed', { sessionId, package: spec });
      return result;
    });
  }

  async listFiles(sessionId: string, remotePath: string = '.'): Promise<string[]> {
    return this.withSession(sessionId, (record) => record.runtime.listFiles(remotePath));
  }

  async upload(sessionId: string, localPath: string, remotePath: string): Promise<void> {
    return this.withSession(sessionId, (record) => record.runtime.upload(localPath, remotePath));
  }

  async download(sessionId: string, remotePath: string, localPath: string): Promise<void> {
    return this.withSession(sessionId, (record) => record.runtime.download(remotePath, localPath));
  }

  /**
   * Terminate a session once its current operation finishes
   */
  async closeSession(sessionId: string): Promise<void> {
    const record = this.registry.get(sessionId);
    if (!record || !this.registry.isCurrent(record)) {
      throw Errors.sessionNotFound(sessionId);
    }

    const release = await record.lock.acquire();
    try {
      if (!this.registry.isCurrent(record)) {
        throw Errors.sessionNotFound(sessionId);
      }
      const outcome = await this.retire(record, 'closed');
      if (!outcome.ok) {
        throw Errors.terminationFailure(sessionId, outcome.error ?? 'unknown error');
      }
    } finally {
      release();
    }
  }

  getSession(sessionId: string): SessionInfo | null {
    const record = this.registry.get(sessionId);
    return record && this.registry.isCurrent(record) ? toSessionInfo(record) : null;
  }

  listSessions(): SessionInfo[] {
    return this.registry
      .values()
      .filter((record) => this.registry.isCurrent(record))
      .map(toSessionInfo);
  }

  /**
   * Counters, gauges and histograms recorded by sessions, executions,
   * artifacts and the reaper
   */
  getMetrics(): MetricsSnapshot {
    return metrics.getSnapshot();
  }

  /**
   * Run one reaper pass now
   */
  reapIdleSessions(): Promise<SweepReport> {
    return this.reaper.sweep();
  }

  /**
   * Refuse new sessions, terminate every session within the grace period,
   * then stop the reaper. Safe to call more than once.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.drain();
    }
    return this.shutdownPromise;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private createRecord(sessionId: string, overrides?: RuntimeConfigInput): SessionRecord {
    const config = resolveRuntimeConfig(overrides, this.defaults);
    const runtime = this.runtimeFactory(config);
    const lock = new SessionLock();
    // Entries left by a session this one replaces
    this.artifacts.dropSession(sessionId);

    const record: SessionRecord = {
      sessionId,
      runtime,
      config,
      lock,
      createdAt: new Date(),
      state: 'provisioning',
      lastUsedAt: Date.now(),
      executionCount: 0,
      ready: Promise.resolve(),
    };
    // The lock is held until provisioning settles, so queued operations wait for it
    record.ready = lock.acquire().then((release) => this.provision(record).finally(release));
    this.log.info('Provisioning session', { sessionId, backend: config.backend });
    return record;
  }

  private async provision(record: SessionRecord): Promise<void> {
    const timer = this.log.startTimer('Session provisioned', {
      sessionId: record.sessionId,
      backend: record.config.backend,
    });

    try {
      await record.runtime.start();
    } catch (error) {
      record.state = 'terminated';
      this.registry.remove(record);
      metrics.inc('sandbox_provision_failures_total', 1, { backend: record.config.backend });
      this.log.error('Session provisioning failed', { sessionId: record.sessionId, ...errorFields(error) });
      throw error;
    }

    record.state = 'warm';
    this.registry.touch(record);
    timer.end();
    metrics.inc('sandbox_sessions_created_total', 1, { backend: record.config.backend });
    metrics.set('sandbox_sessions_active', this.registry.size);
    this.emit('session:created', toSessionInfo(record));
  }

  /**
   * Run fn with the session's lock held. The session must still be current
   * once the lock is ours; an execution timeout retires it.
   */
  private async withSession<T>(sessionId: string, fn: (record: SessionRecord) => Promise<T>): Promise<T> {
    const record = this.registry.get(sessionId);
    if (!record || !this.registry.isCurrent(record)) {
      throw Errors.sessionNotFound(sessionId);
    }

    const release = await record.lock.acquire();
    try {
      if (!this.registry.isCurrent(record) || record.state !== 'warm') {
        throw Errors.sessionNotFound(sessionId);
      }

      record.state = 'executing';
      try {
        const result = await fn(record);
        this.registry.touch(record);
        return result;
      } catch (error) {
        if (isSandboxError(error, ErrorCode.EXECUTION_TIMEOUT)) {
          metrics.inc('sandbox_execution_timeouts_total');
          await this.retire(record, 'timeout');
        }
        throw error;
      } finally {
        if (record.state === 'executing') {
          record.state = 'warm';
        }
      }
    } finally {
      release();
    }
  }

  /**
   * terminating -> terminated, then unregister. Caller holds the lock.
   */
  private async retire(record: SessionRecord, reason: TerminationReason): Promise<TerminationOutcome> {
    record.state = 'terminating';
    const outcome = await record.runtime.terminate();
    record.state = 'terminated';

    this.registry.remove(record);
    if (!this.registry.get(record.sessionId)) {
      this.artifacts.dropSession(record.sessionId);
    }
    metrics.set('sandbox_sessions_active', this.registry.size);

    this.log.info('Session terminated', {
      sessionId: record.sessionId,
      reason,
      ok: outcome.ok,
      method: outcome.method,
    });
    this.emit('session:terminated', { sessionId: record.sessionId, reason, outcome });
    return outcome;
  }

  private async snapshot(record: SessionRecord, warnings: string[]): Promise<WorkspaceSnapshot | null> {
    try {
      return await record.runtime.snapshot();
    } catch (error) {
      this.log.warn('Workspace snapshot failed', { sessionId: record.sessionId, ...errorFields(error) });
      warnings.push(`Workspace snapshot failed; produced files were not collected: ${
        error instanceof Error ? error.message : String(error)
      }`);
      return null;
    }
  }

  private notifyAudit(record: SessionRecord, code: string, language: string): void {
    const codeHash = computeHash(code);
    const event = { sessionId: record.sessionId, codeHash, code, language };

    Promise.resolve()
      .then(() => this.audit.notify(event))
      .catch((error) => {
        this.log.warn('Audit notification failed', {
          sessionId: record.sessionId,
          codeHash: shortHash(codeHash),
          ...errorFields(error),
        });
      });
  }

  private async drain(): Promise<void> {
    const records = this.registry.values();
    this.log.info('Shutting down session manager', { sessions: records.length });

    const closing = Promise.allSettled(records.map((record) => this.closeForShutdown(record)));
    try {
      await withTimeout(closing, this.shutdownGraceMs, 'session shutdown');
    } catch (error) {
      this.log.warn('Shutdown grace period elapsed with sessions still closing', {
        remaining: this.registry.size,
        ...errorFields(error),
      });
    }

    await this.reaper.stop();
    this.emit('shutdown');
  }

  private async closeForShutdown(record: SessionRecord): Promise<void> {
    const release = await record.lock.acquire();
    try {
      if (this.registry.get(record.sessionId) !== record || record.state === 'terminated') {
        return;
      }
      const outcome = await this.retire(record, 'shutdown');
      if (!outcome.ok) {
        this.log.error('Failed to terminate session during shutdown', {
          sessionId: record.sessionId,
          error: outcome.error,
        });
      }
    } finally {
      release();
    }
  }
}

function appendWarnings(stderr: string, warnings: string[]): string {
  if (warnings.length === 0) return stderr;
  const lines = warnings.map((warning) => `[sandbox] ${warning}`).join('\n');
  if (!stderr) return `${lines}\n`;
  return `${stderr}${stderr.endsWith('\n') ? '' : '\n'}${lines}\n`;
}
