/**
 * Audit sidecar
 *
 * Receives every piece of code before it runs. Notification is
 * fire-and-forget: a failing sink never blocks or fails the execution.
 */

import { logger as rootLogger, type Logger } from '../logger';

export interface AuditEvent {
  sessionId: string;
  /** SHA-256 of the submitted code */
  codeHash: string;
  code: string;
  language: string;
}

export interface AuditSink {
  notify(event: AuditEvent): void | Promise<void>;
}

/**
 * Writes one AUDIT log line per execution. The code itself is not logged.
 */
export class LoggingAuditSink implements AuditSink {
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = (logger ?? rootLogger).child({ component: 'audit' });
  }

  notify(event: AuditEvent): void {
    this.log.info('AUDIT', {
      sessionId: event.sessionId,
      language: event.language,
      codeHash: event.codeHash,
      codeLength: event.code.length,
    });
  }
}

/**
 * Discards every event
 */
export const noopAuditSink: AuditSink = {
  notify() {},
};
