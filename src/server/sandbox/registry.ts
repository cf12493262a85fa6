/**
 * Session Registry
 *
 * Maps a session id to its live record. Every structural change is
 * synchronous, so a check followed by an insert cannot interleave with
 * another caller.
 */

import type { RuntimeAdapter, RuntimeConfig, SessionInfo, SessionState } from './types';
import { SessionLock } from './lock';

export interface SessionRecord {
  readonly sessionId: string;
  readonly runtime: RuntimeAdapter;
  readonly config: RuntimeConfig;
  readonly lock: SessionLock;
  readonly createdAt: Date;
  state: SessionState;
  lastUsedAt: number;
  executionCount: number;
  /** Settles when provisioning finishes */
  ready: Promise<void>;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, SessionRecord>();

  get size(): number {
    return this.sessions.size;
  }

  get(sessionId: string): SessionRecord | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * Get the live record for an id, or insert the one built by create.
   * Terminating records are replaced; their own removal leaves the new one alone.
   */
  reserve(
    sessionId: string,
    create: () => SessionRecord
  ): { record: SessionRecord; created: boolean } {
    const existing = this.sessions.get(sessionId);
    if (existing && isLive(existing.state)) {
      return { record: existing, created: false };
    }

    const record = create();
    this.sessions.set(sessionId, record);
    return { record, created: true };
  }

  /**
   * Remove a record if it is still the one registered under its id
   */
  remove(record: SessionRecord): boolean {
    if (this.sessions.get(record.sessionId) !== record) {
      return false;
    }
    return this.sessions.delete(record.sessionId);
  }

  /**
   * True while record is the registered, usable session for its id
   */
  isCurrent(record: SessionRecord): boolean {
    return this.sessions.get(record.sessionId) === record && isLive(record.state);
  }

  /**
   * Refresh lastUsedAt; successive touches are strictly increasing
   */
  touch(record: SessionRecord): void {
    record.lastUsedAt = Math.max(Date.now(), record.lastUsedAt + 1);
  }

  values(): SessionRecord[] {
    return [...this.sessions.values()];
  }
}

function isLive(state: SessionState): boolean {
  return state === 'provisioning' || state === 'warm' || state === 'executing';
}

/**
 * Read-only view of a record
 */
export function toSessionInfo(record: SessionRecord): SessionInfo {
  return {
    sessionId: record.sessionId,
    state: record.state,
    backend: record.config.backend,
    createdAt: record.createdAt,
    lastUsedAt: record.lastUsedAt,
    executionCount: record.executionCount,
    config: record.config,
  };
}
