/**
 * Idle Session Reaper
 *
 * Periodically terminates warm sessions that have been idle longer than
 * their idleTimeoutMs. A session is only reaped while its lock can be taken
 * without waiting, so a running operation is never interrupted.
 */

import type { TerminationOutcome } from './types';
import type { SessionRecord, SessionRegistry } from './registry';
import { errorFields, logger as rootLogger, metrics, type Logger } from '../logger';

export interface SweepReport {
  reaped: string[];
  failed: Array<{ sessionId: string; error: string }>;
}

export interface ReaperOptions {
  registry: SessionRegistry;
  /** Terminates and unregisters a session; called with its lock held */
  terminate: (record: SessionRecord) => Promise<TerminationOutcome>;
  intervalMs?: number;
  now?: () => number;
  logger?: Logger;
}

export const DEFAULT_REAPER_INTERVAL_MS = 30_000;

export class Reaper {
  readonly intervalMs: number;

  private readonly registry: SessionRegistry;
  private readonly terminate: ReaperOptions['terminate'];
  private readonly now: () => number;
  private readonly log: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<SweepReport> | null = null;

  constructor(options: ReaperOptions) {
    this.registry = options.registry;
    this.terminate = options.terminate;
    this.intervalMs = options.intervalMs ?? DEFAULT_REAPER_INTERVAL_MS;
    this.now = options.now ?? Date.now;
    this.log = (options.logger ?? rootLogger).child({ component: 'reaper' });
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      if (this.inFlight) return;
      this.sweep().catch((error) => {
        this.log.error('Sweep failed', errorFields(error));
      });
    }, this.intervalMs);
    this.timer.unref();
  }

  /**
   * Clear the timer and wait for a sweep already in progress
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /**
   * Run one pass over the registry. Concurrent calls share the pass in progress.
   */
  sweep(): Promise<SweepReport> {
    if (!this.inFlight) {
      this.inFlight = this.runSweep().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private isExpired(record: SessionRecord): boolean {
    return record.state === 'warm' && this.now() - record.lastUsedAt > record.config.idleTimeoutMs;
  }

  private async runSweep(): Promise<SweepReport> {
    const report: SweepReport = { reaped: [], failed: [] };

    for (const record of this.registry.values()) {
      if (!this.isExpired(record)) continue;

      const release = record.lock.tryAcquire();
      if (!release) continue;

      try {
        // Re-check under the lock
        if (!this.registry.isCurrent(record) || !this.isExpired(record)) continue;

        const idleMs = this.now() - record.lastUsedAt;
        const outcome = await this.terminate(record);
        if (outcome.ok) {
          report.reaped.push(record.sessionId);
          metrics.inc('sandbox_sessions_reaped_total');
          this.log.info('Reaped idle session', { sessionId: record.sessionId, idleMs });
        } else {
          report.failed.push({ sessionId: record.sessionId, error: outcome.error ?? 'unknown error' });
          this.log.error('Failed to reap idle session', {
            sessionId: record.sessionId,
            error: outcome.error,
          });
        }
      } catch (error) {
        const fields = errorFields(error);
        report.failed.push({ sessionId: record.sessionId, error: String(fields.error) });
        this.log.error('Failed to reap idle session', { sessionId: record.sessionId, ...fields });
      } finally {
        release();
      }
    }

    return report;
  }
}
