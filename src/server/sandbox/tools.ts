/**
 * Agent-facing tool layer
 *
 * Maps tool calls onto session manager operations and renders the results
 * as content parts. Failures are reported as text, never thrown.
 */

import type { ExecutionResult } from './types';
import type { SessionManager } from './manager';
import { ErrorCode, isSandboxError } from '../../core/errors';
import { errorFields, logger as rootLogger, type Logger } from '../logger';

export interface TextPart {
  type: 'text';
  text: string;
}

export interface ImagePart {
  type: 'image';
  /** Base64 */
  data: string;
  mimeType: string;
}

export type ContentPart = TextPart | ImagePart;

export interface ToolResult {
  content: ContentPart[];
  isError: boolean;
}

const text = (value: string): TextPart => ({ type: 'text', text: value });

/**
 * Render an execution result: STDOUT, STDERR, exit code, duration, then artifacts
 */
export function formatExecution(result: ExecutionResult): ContentPart[] {
  const parts: ContentPart[] = [];

  if (result.stdout) parts.push(text(`STDOUT:\n${result.stdout}`));
  if (result.stderr) parts.push(text(`STDERR:\n${result.stderr}`));
  parts.push(text(`Exit Code: ${result.exitCode}`));
  if (result.executionDurationMs > 0) {
    parts.push(text(`Duration: ${(result.executionDurationMs / 1000).toFixed(4)}s`));
  }

  for (const artifact of result.artifacts) {
    if (artifact.kind === 'inline') {
      parts.push({ type: 'image', data: artifact.inlineData.toString('base64'), mimeType: artifact.mimeType });
    } else {
      parts.push(text(`Artifact: ${artifact.name} (${artifact.url})`));
    }
  }

  return parts;
}

export class SandboxTools {
  private readonly log: Logger;

  constructor(
    private readonly manager: SessionManager,
    logger?: Logger
  ) {
    this.log = (logger ?? rootLogger).child({ component: 'tools' });
  }

  async executeCode(sessionId: string, language: string, code: string): Promise<ToolResult> {
    try {
      const result = await this.inSession(sessionId, () => this.manager.execute(sessionId, code, language));
      return { content: formatExecution(result), isError: false };
    } catch (error) {
      return this.failure('executing code', sessionId, error);
    }
  }

  async installPackage(sessionId: string, packageName: string): Promise<ToolResult> {
    try {
      await this.inSession(sessionId, () => this.manager.installPackage(sessionId, packageName));
      return { content: [text(`Package '${packageName}' installed successfully`)], isError: false };
    } catch (error) {
      return this.failure('installing package', sessionId, error);
    }
  }

  async listFiles(sessionId: string, remotePath: string = '.'): Promise<ToolResult> {
    try {
      const files = await this.inSession(sessionId, () => this.manager.listFiles(sessionId, remotePath));
      return { content: [text(files.join('\n'))], isError: false };
    } catch (error) {
      return this.failure('listing files', sessionId, error);
    }
  }

  /**
   * Get or create the session, then run op. A session reaped between the two
   * steps is recreated once.
   */
  private async inSession<T>(sessionId: string, op: () => Promise<T>): Promise<T> {
    await this.manager.getOrCreateSession(sessionId);
    try {
      return await op();
    } catch (error) {
      if (!isSandboxError(error, ErrorCode.SESSION_NOT_FOUND)) {
        throw error;
      }
      this.log.debug('Session vanished before use, recreating', { sessionId });
      await this.manager.getOrCreateSession(sessionId);
      return op();
    }
  }

  private failure(action: string, sessionId: string, error: unknown): ToolResult {
    this.log.warn(`Tool call failed while ${action}`, { sessionId, ...errorFields(error) });
    const message = error instanceof Error ? error.message : String(error);
    return { content: [text(`Error ${action}: ${message}`)], isError: true };
  }
}
