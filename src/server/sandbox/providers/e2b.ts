/**
 * E2B Runtime Backend
 *
 * Provides Firecracker microVM sandboxes via E2B (e2b.dev).
 * Features:
 * - Stateful python and R kernels through the code interpreter
 * - Streaming stdout/stderr callbacks
 * - Rich results (charts) reported as declared outputs
 * - Internet access disabled unless the network policy allows it
 *
 * @see https://e2b.dev/docs
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type {
  BackendResult,
  DeclaredOutput,
  ExecuteHooks,
  Language,
  RuntimeConfig,
  WorkspaceSnapshot,
} from '../types';
import { BaseRuntimeBackend, packageIndexUrl, parseSnapshotListing } from '../base-provider';
import { Errors } from '../../../core/errors';
import type { Logger } from '../../logger';

// E2B SDK surface used by the backend
export interface E2BCodeResult {
  stdout: string[];
  stderr: string[];
  error?: { name: string; value: string; traceback: string };
  results: Array<{ png?: string; text?: string }>;
}

export interface E2BCommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface E2BSandboxHandle {
  readonly sandboxId: string;
  runCode(
    code: string,
    opts: {
      language: string;
      timeoutMs: number;
      onStdout: (chunk: string) => void;
      onStderr: (chunk: string) => void;
    }
  ): Promise<E2BCodeResult>;
  runCommand(
    cmd: string,
    opts: {
      cwd?: string;
      timeoutMs?: number;
      user?: 'root' | 'user';
      onStdout?: (chunk: string) => void;
      onStderr?: (chunk: string) => void;
    }
  ): Promise<E2BCommandResult>;
  readFile(filePath: string): Promise<Uint8Array>;
  writeFile(filePath: string, data: Buffer): Promise<void>;
  listDir(dirPath: string): Promise<string[]>;
  setTimeout(timeoutMs: number): Promise<void>;
  kill(): Promise<void>;
}

export interface E2BCreateOptions {
  apiKey?: string;
  template?: string;
  timeoutMs: number;
  allowInternetAccess: boolean;
  metadata: Record<string, string>;
  envs: Record<string, string>;
}

export type CreateE2BSandbox = (opts: E2BCreateOptions) => Promise<E2BSandboxHandle>;

function isCommandExit(error: unknown): error is E2BCommandResult {
  return (
    typeof error === 'object' &&
    error !== null &&
    'exitCode' in error &&
    typeof error.exitCode === 'number' &&
    'stdout' in error &&
    typeof error.stdout === 'string' &&
    'stderr' in error &&
    typeof error.stderr === 'string'
  );
}

/**
 * Create a sandbox with the E2B code interpreter SDK
 */
export const createE2BSandbox: CreateE2BSandbox = async (opts) => {
  const { Sandbox } = await import('@e2b/code-interpreter');

  const sandboxOpts = {
    apiKey: opts.apiKey,
    timeoutMs: opts.timeoutMs,
    metadata: opts.metadata,
    envs: opts.envs,
    allowInternetAccess: opts.allowInternetAccess,
  };
  const sandbox = opts.template
    ? await Sandbox.create(opts.template, sandboxOpts)
    : await Sandbox.create(sandboxOpts);

  return {
    sandboxId: sandbox.sandboxId,

    async runCode(code, runOpts) {
      const execution = await sandbox.runCode(code, {
        language: runOpts.language,
        timeoutMs: runOpts.timeoutMs,
        onStdout: (msg) => runOpts.onStdout(String(msg)),
        onStderr: (msg) => runOpts.onStderr(String(msg)),
      });
      return {
        stdout: execution.logs.stdout,
        stderr: execution.logs.stderr,
        error: execution.error
          ? { name: execution.error.name, value: execution.error.value, traceback: execution.error.traceback }
          : undefined,
        results: execution.results.map((r) => ({ png: r.png, text: r.text })),
      };
    },

    async runCommand(cmd, cmdOpts) {
      try {
        const result = await sandbox.commands.run(cmd, {
          cwd: cmdOpts.cwd,
          timeoutMs: cmdOpts.timeoutMs,
          user: cmdOpts.user,
          onStdout: cmdOpts.onStdout,
          onStderr: cmdOpts.onStderr,
        });
        return { exitCode: result.exitCode, stdout: result.stdout, stderr: result.stderr };
      } catch (error) {
        // Non-zero exits are raised by the SDK
        if (isCommandExit(error)) {
          return { exitCode: error.exitCode, stdout: error.stdout, stderr: error.stderr };
        }
        throw error;
      }
    },

    async readFile(filePath) {
      return sandbox.files.read(filePath, { format: 'bytes' });
    },

    async writeFile(filePath, data) {
      const copy = new ArrayBuffer(data.byteLength);
      new Uint8Array(copy).set(data);
      await sandbox.files.write(filePath, copy);
    },

    async listDir(dirPath) {
      const entries = await sandbox.files.list(dirPath);
      return entries.map((entry) => entry.name);
    },

    async setTimeout(timeoutMs) {
      await sandbox.setTimeout(timeoutMs);
    },

    async kill() {
      await sandbox.kill();
    },
  };
};

/**
 * Quote a value for the sandbox's POSIX shell
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export interface E2BBackendOptions {
  apiKey?: string;
  template?: string;
  createSandbox?: CreateE2BSandbox;
  logger?: Logger;
}

/**
 * E2B Runtime Backend
 */
export class E2BBackend extends BaseRuntimeBackend {
  readonly kind = 'e2b' as const;

  private readonly options: E2BBackendOptions;
  private sandbox: E2BSandboxHandle | null = null;
  private readonly kernelsReady = new Set<Language>();

  constructor(options: E2BBackendOptions = {}) {
    super(options.logger);
    this.options = options;
  }

  get sandboxId(): string | null {
    return this.sandbox?.sandboxId ?? null;
  }

  protected async boot(config: RuntimeConfig): Promise<void> {
    const createSandbox = this.options.createSandbox ?? createE2BSandbox;
    const indexUrl = packageIndexUrl(config);

    // Memory and CPU are fixed by the template
    this.log.debug('E2B resources come from the template', {
      maxMemoryMb: config.maxMemoryMb,
      maxCpu: config.maxCpu,
      template: this.options.template ?? 'default',
    });

    const sandbox = await createSandbox({
      apiKey: this.options.apiKey,
      template: this.options.template,
      timeoutMs: this.lifetimeMs(config),
      allowInternetAccess: config.networkPolicy.mode !== 'none',
      metadata: { managedBy: 'sandbox-sessions' },
      envs: indexUrl ? { PIP_INDEX_URL: indexUrl } : {},
    });
    this.sandbox = sandbox;

    const mkdir = await sandbox.runCommand(
      `mkdir -p ${shellQuote(config.workingDirectory)} && chmod 777 ${shellQuote(config.workingDirectory)}`,
      { user: 'root' }
    );
    if (mkdir.exitCode !== 0) {
      throw new Error(`Failed to create working directory: ${mkdir.stderr.trim()}`);
    }

    this.log.info('E2B sandbox started', { sandboxId: sandbox.sandboxId });
  }

  async execute(code: string, language: Language, hooks: ExecuteHooks): Promise<BackendResult> {
    const sandbox = this.requireSandbox('execute');
    await sandbox.setTimeout(this.lifetimeMs(this.config));

    if (language === 'bash') {
      return sandbox.runCommand(code, {
        cwd: this.config.workingDirectory,
        timeoutMs: this.config.maxExecutionTimeMs,
        onStdout: hooks.onStdout,
        onStderr: hooks.onStderr,
      });
    }

    await this.prepareKernel(sandbox, language);
    const execution = await sandbox.runCode(code, {
      language,
      timeoutMs: this.config.maxExecutionTimeMs,
      onStdout: hooks.onStdout,
      onStderr: hooks.onStderr,
    });

    let stdout = execution.stdout.join('');
    let stderr = execution.stderr.join('');
    const outputs: DeclaredOutput[] = [];

    for (const result of execution.results) {
      if (result.png) {
        outputs.push({
          name: `output-${outputs.length + 1}.png`,
          mimeType: 'image/png',
          data: Buffer.from(result.png, 'base64'),
        });
      } else if (result.text) {
        stdout += stdout && !stdout.endsWith('\n') ? `\n${result.text}\n` : `${result.text}\n`;
      }
    }

    if (execution.error) {
      const { name, value, traceback } = execution.error;
      stderr += `${name}: ${value}\n${traceback}`;
    }

    return { stdout, stderr, exitCode: execution.error ? 1 : 0, outputs };
  }

  async putFile(localPath: string, remotePath: string): Promise<void> {
    const sandbox = this.requireSandbox('upload');
    const data = await fs.readFile(localPath).catch(() => null);
    if (!data) {
      throw Errors.notFound(localPath, 'local');
    }
    await sandbox.writeFile(remotePath, data);
  }

  async getFile(remotePath: string, localPath: string): Promise<void> {
    const data = await this.readFile(remotePath);
    await fs.mkdir(path.dirname(localPath), { recursive: true });
    await fs.writeFile(localPath, data);
  }

  async readFile(remotePath: string): Promise<Buffer> {
    const sandbox = this.requireSandbox('read file');
    const exists = await sandbox.runCommand(`test -f ${shellQuote(remotePath)}`, {});
    if (exists.exitCode !== 0) {
      throw Errors.notFound(remotePath, 'remote');
    }
    return Buffer.from(await sandbox.readFile(remotePath));
  }

  async listFiles(remotePath: string): Promise<string[]> {
    const sandbox = this.requireSandbox('list files');
    const exists = await sandbox.runCommand(`test -d ${shellQuote(remotePath)}`, {});
    if (exists.exitCode !== 0) {
      throw Errors.notFound(remotePath, 'remote');
    }
    return sandbox.listDir(remotePath);
  }

  async snapshot(): Promise<WorkspaceSnapshot> {
    const sandbox = this.requireSandbox('snapshot');
    const result = await sandbox.runCommand(
      `find ${shellQuote(this.config.workingDirectory)} -type f -printf '%P\\t%s\\t%T@\\n'`,
      {}
    );
    if (result.exitCode !== 0) {
      throw new Error(`Failed to snapshot working directory: ${result.stderr.trim()}`);
    }
    return parseSnapshotListing(result.stdout);
  }

  async installPackage(spec: string, hooks: ExecuteHooks): Promise<BackendResult> {
    const sandbox = this.requireSandbox('install package');
    return sandbox.runCommand(`pip install ${shellQuote(spec)}`, {
      cwd: this.config.workingDirectory,
      timeoutMs: this.config.maxExecutionTimeMs,
      onStdout: hooks.onStdout,
      onStderr: hooks.onStderr,
    });
  }

  async stop(): Promise<void> {
    await this.release('stopped');
  }

  async kill(): Promise<void> {
    await this.release('killed');
  }

  private async release(action: string): Promise<void> {
    const sandbox = this.sandbox;
    if (!sandbox) return;
    await sandbox.kill();
    this.sandbox = null;
    this.kernelsReady.clear();
    this.log.info(`E2B sandbox ${action}`, { sandboxId: sandbox.sandboxId });
  }

  /**
   * Move the language kernel into the working directory once
   */
  private async prepareKernel(sandbox: E2BSandboxHandle, language: Language): Promise<void> {
    if (this.kernelsReady.has(language)) return;

    const dir = JSON.stringify(this.config.workingDirectory);
    const code = language === 'r' ? `setwd(${dir})` : `import os\nos.chdir(${dir})`;
    const result = await sandbox.runCode(code, {
      language,
      timeoutMs: this.config.maxExecutionTimeMs,
      onStdout: () => undefined,
      onStderr: () => undefined,
    });
    if (result.error) {
      throw new Error(`Failed to prepare ${language} kernel: ${result.error.name}: ${result.error.value}`);
    }
    this.kernelsReady.add(language);
  }

  /**
   * Sandbox lifetime on the E2B side; refreshed on every execution
   */
  private lifetimeMs(config: RuntimeConfig): number {
    return config.idleTimeoutMs + config.maxExecutionTimeMs + 60_000;
  }

  private requireSandbox(operation: string): E2BSandboxHandle {
    if (!this.sandbox) {
      throw Errors.notStarted(operation);
    }
    return this.sandbox;
  }
}
