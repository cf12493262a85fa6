/**
 * Docker Runtime Backend
 *
 * Provides local container-based isolation via the docker CLI.
 * Features:
 * - Memory, CPU and process limits with all capabilities dropped
 * - No network, or a configured egress network for package indexes
 * - Persistent python state through a REPL driver kept open with `docker exec -i`
 * - File transfer with `docker cp`
 *
 * Requires Docker to be installed and accessible.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { StringDecoder } from 'string_decoder';
import { nanoid } from 'nanoid';
import type {
  BackendResult,
  ExecuteHooks,
  Language,
  RuntimeConfig,
  WorkspaceSnapshot,
} from '../types';
import { BaseRuntimeBackend, packageIndexUrl, parseSnapshotListing } from '../base-provider';
import { requirementName } from '../packages';
import { Errors } from '../../../core/errors';
import type { Logger } from '../../logger';
import {
  defaultSpawn,
  runCommand,
  type CommandResult,
  type RunCommandOptions,
  type SpawnedProcess,
  type SpawnProcess,
} from './command';
import { WheelStager } from './wheels';

/**
 * Python program run inside the container. Reads one JSON request per line,
 * executes it in a shared namespace and writes an end marker to stderr and
 * then `<marker> <exit code>` to stdout.
 */
const PYTHON_DRIVER = [
  'import json, os, sys, traceback',
  'MARK = sys.argv[1]',
  'os.chdir(sys.argv[2])',
  'ns = {"__name__": "__main__"}',
  'while True:',
  '    line = sys.stdin.readline()',
  '    if not line:',
  '        break',
  '    try:',
  '        req = json.loads(line)',
  '    except ValueError:',
  '        continue',
  '    code = 0',
  '    try:',
  '        exec(compile(req["code"], "<sandbox>", "exec"), ns)',
  '    except SystemExit as e:',
  '        code = e.code if isinstance(e.code, int) else (0 if e.code is None else 1)',
  '    except BaseException:',
  '        traceback.print_exc()',
  '        code = 1',
  '    sys.stdout.flush()',
  '    sys.stderr.write(MARK + "\\n")',
  '    sys.stderr.flush()',
  '    sys.stdout.write(MARK + " " + str(code) + "\\n")',
  '    sys.stdout.flush()',
].join('\n');

/**
 * Where staged wheels are copied inside the container
 */
const PACKAGE_STAGING_DIR = '/tmp/packages';

export interface DockerBackendOptions {
  image: string;
  /** Docker daemon host (`-H`) */
  host?: string;
  /** Network used when the policy allows egress */
  network?: string;
  pidsLimit?: number;
  /** Seconds docker waits before killing on a graceful stop */
  stopTimeoutSeconds?: number;
  spawnProcess?: SpawnProcess;
  wheelStager?: WheelStager;
  logger?: Logger;
}

interface PendingRun {
  hooks: ExecuteHooks;
  stdout: string;
  stderr: string;
  stdoutEmitted: number;
  stderrEmitted: number;
  exitCode: number | null;
  stderrDone: boolean;
  resolve: (result: BackendResult) => void;
  reject: (error: Error) => void;
  onAbort: () => void;
}

/**
 * Length of text before an end token, or before a trailing partial one
 */
function visibleLength(text: string, token: string): number {
  const idx = text.indexOf(token);
  if (idx >= 0) return idx;
  for (let n = Math.min(token.length - 1, text.length); n > 0; n--) {
    if (text.endsWith(token.slice(0, n))) {
      return text.length - n;
    }
  }
  return text.length;
}

/**
 * Long-lived python process inside the container
 */
class PythonDriver {
  private pending: PendingRun | null = null;
  private exited = false;

  constructor(
    private readonly proc: SpawnedProcess,
    private readonly marker: string
  ) {
    const stdout = new StringDecoder('utf8');
    const stderr = new StringDecoder('utf8');
    proc.stdout.on('data', (data: Buffer) => this.onStdout(stdout.write(data)));
    proc.stderr.on('data', (data: Buffer) => this.onStderr(stderr.write(data)));
    proc.on('close', () => this.onExit(new Error('python driver exited')));
    proc.on('error', (err) => this.onExit(err instanceof Error ? err : new Error(String(err))));
    proc.stdin.on('error', (err: Error) => this.onExit(err));
  }

  static args(marker: string, workingDirectory: string): string[] {
    return ['python3', '-u', '-c', PYTHON_DRIVER, marker, workingDirectory];
  }

  get alive(): boolean {
    return !this.exited;
  }

  run(code: string, hooks: ExecuteHooks): Promise<BackendResult> {
    if (this.exited) {
      return Promise.reject(new Error('python driver exited'));
    }
    if (hooks.signal.aborted) {
      return Promise.reject(new Error('python execution aborted'));
    }
    return new Promise((resolve, reject) => {
      const run: PendingRun = {
        hooks,
        stdout: '',
        stderr: '',
        stdoutEmitted: 0,
        stderrEmitted: 0,
        exitCode: null,
        stderrDone: false,
        resolve,
        reject,
        onAbort: () => this.abort(run),
      };
      this.pending = run;
      hooks.signal.addEventListener('abort', run.onAbort, { once: true });
      this.proc.stdin.write(`${JSON.stringify({ code })}\n`);
    });
  }

  kill(): void {
    this.exited = true;
    this.proc.kill('SIGKILL');
  }

  private onStdout(text: string): void {
    const run = this.pending;
    if (!run) return;
    run.stdout += text;

    const idx = run.stdout.indexOf(`${this.marker} `);
    if (idx >= 0) {
      const newline = run.stdout.indexOf('\n', idx);
      if (newline < 0) return;
      const exitCode = Number.parseInt(run.stdout.slice(idx + this.marker.length + 1, newline), 10);
      run.exitCode = Number.isNaN(exitCode) ? 1 : exitCode;
      run.stdout = run.stdout.slice(0, idx);
      this.flush(run, 'stdout', run.stdout.length);
      this.settle(run);
      return;
    }

    // Hold back a tail long enough to contain a partial marker
    this.flush(run, 'stdout', run.stdout.length - (this.marker.length + 16));
  }

  private onStderr(text: string): void {
    const run = this.pending;
    if (!run) return;
    run.stderr += text;

    const idx = run.stderr.indexOf(`${this.marker}\n`);
    if (idx >= 0) {
      run.stderr = run.stderr.slice(0, idx);
      run.stderrDone = true;
      this.flush(run, 'stderr', run.stderr.length);
      this.settle(run);
      return;
    }

    this.flush(run, 'stderr', run.stderr.length - (this.marker.length + 1));
  }

  private flush(run: PendingRun, stream: 'stdout' | 'stderr', upTo: number): void {
    if (stream === 'stdout') {
      if (upTo > run.stdoutEmitted) {
        run.hooks.onStdout(run.stdout.slice(run.stdoutEmitted, upTo));
        run.stdoutEmitted = upTo;
      }
    } else if (upTo > run.stderrEmitted) {
      run.hooks.onStderr(run.stderr.slice(run.stderrEmitted, upTo));
      run.stderrEmitted = upTo;
    }
  }

  /**
   * Hand over the output held back for marker detection, then give up on the run
   */
  private abort(run: PendingRun): void {
    if (this.pending !== run) return;
    this.pending = null;
    this.flush(run, 'stdout', visibleLength(run.stdout, `${this.marker} `));
    if (!run.stderrDone) {
      this.flush(run, 'stderr', visibleLength(run.stderr, `${this.marker}\n`));
    }
    run.reject(new Error('python execution aborted'));
  }

  private settle(run: PendingRun): void {
    if (run.exitCode === null || !run.stderrDone) return;
    this.pending = null;
    run.hooks.signal.removeEventListener('abort', run.onAbort);
    run.resolve({ stdout: run.stdout, stderr: run.stderr, exitCode: run.exitCode });
  }

  private onExit(error: Error): void {
    this.exited = true;
    const run = this.pending;
    if (run) {
      this.pending = null;
      run.hooks.signal.removeEventListener('abort', run.onAbort);
      run.reject(error);
    }
  }
}

/**
 * Docker Runtime Backend
 */
export class DockerBackend extends BaseRuntimeBackend {
  readonly kind = 'docker' as const;

  private readonly options: DockerBackendOptions;
  private readonly spawnProcess: SpawnProcess;
  private readonly wheelStager: WheelStager;
  private containerId: string | null = null;
  private driver: PythonDriver | null = null;

  constructor(options: DockerBackendOptions) {
    super(options.logger);
    this.options = options;
    this.spawnProcess = options.spawnProcess ?? defaultSpawn;
    this.wheelStager = options.wheelStager ?? new WheelStager();
  }

  get container(): string | null {
    return this.containerId;
  }

  /**
   * Arguments for `docker run` with limits and network policy applied
   */
  buildRunArgs(config: RuntimeConfig, name: string): string[] {
    const dockerArgs = ['run', '-d'];

    dockerArgs.push('--name', name);
    dockerArgs.push('--label', 'sandbox.managed=true');

    // Resource limits
    dockerArgs.push('-m', `${config.maxMemoryMb}m`);
    dockerArgs.push('--cpus', String(config.maxCpu));
    dockerArgs.push('--pids-limit', String(this.options.pidsLimit ?? 256));

    // Security options
    dockerArgs.push('--cap-drop=ALL');
    dockerArgs.push('--security-opt', 'no-new-privileges');

    // Network mode
    const indexUrl = packageIndexUrl(config);
    if (config.networkPolicy.mode === 'none') {
      dockerArgs.push('--network', 'none');
    } else {
      dockerArgs.push('--network', this.options.network ?? 'bridge');
      if (indexUrl) {
        dockerArgs.push('-e', `PIP_INDEX_URL=${indexUrl}`);
      }
    }

    // Working directory
    dockerArgs.push('-w', config.workingDirectory);

    dockerArgs.push(this.options.image);

    // Keep container running
    dockerArgs.push('tail', '-f', '/dev/null');

    return dockerArgs;
  }

  protected async boot(config: RuntimeConfig): Promise<void> {
    const name = `sandbox-${nanoid(10)}`;
    const result = await this.runDocker(this.buildRunArgs(config, name));
    if (result.exitCode !== 0) {
      throw new Error(`Failed to create container: ${result.stderr.trim()}`);
    }

    this.containerId = result.stdout.trim();
    this.log.info('Container started', { containerId: this.containerId, image: this.options.image });
  }

  async execute(code: string, language: Language, hooks: ExecuteHooks): Promise<BackendResult> {
    const containerId = this.requireContainer('execute');

    if (language === 'python') {
      return this.pythonDriver(containerId).run(code, hooks);
    }

    const result = await this.runDocker(
      ['exec', '-w', this.config.workingDirectory, containerId, ...this.languageCommand(language, code)],
      { signal: hooks.signal, onStdout: hooks.onStdout, onStderr: hooks.onStderr }
    );
    return { stdout: result.stdout, stderr: result.stderr, exitCode: result.exitCode };
  }

  async putFile(localPath: string, remotePath: string): Promise<void> {
    const containerId = this.requireContainer('upload');

    const stat = await fs.stat(localPath).catch(() => null);
    if (!stat || !stat.isFile()) {
      throw Errors.notFound(localPath, 'local');
    }

    await this.checked(['exec', containerId, 'mkdir', '-p', path.posix.dirname(remotePath)], 'create directory');
    await this.checked(['cp', localPath, `${containerId}:${remotePath}`], 'copy file into container');
  }

  async getFile(remotePath: string, localPath: string): Promise<void> {
    const containerId = this.requireContainer('download');

    const exists = await this.runDocker(['exec', containerId, 'test', '-f', remotePath]);
    if (exists.exitCode !== 0) {
      throw Errors.notFound(remotePath, 'remote');
    }

    await fs.mkdir(path.dirname(localPath), { recursive: true });
    await this.checked(['cp', `${containerId}:${remotePath}`, localPath], 'copy file from container');
  }

  async readFile(remotePath: string): Promise<Buffer> {
    const containerId = this.requireContainer('read file');
    const result = await this.runDocker(['exec', containerId, 'cat', remotePath]);
    if (result.exitCode !== 0) {
      throw Errors.notFound(remotePath, 'remote');
    }
    return result.output;
  }

  async listFiles(remotePath: string): Promise<string[]> {
    const containerId = this.requireContainer('list files');
    const result = await this.runDocker(['exec', containerId, 'ls', '-1A', remotePath]);
    if (result.exitCode !== 0) {
      throw Errors.notFound(remotePath, 'remote');
    }
    return result.stdout.split('\n').filter(Boolean);
  }

  async snapshot(): Promise<WorkspaceSnapshot> {
    const containerId = this.requireContainer('snapshot');
    const result = await this.checked(
      ['exec', containerId, 'find', this.config.workingDirectory, '-type', 'f', '-printf', '%P\\t%s\\t%T@\\n'],
      'snapshot working directory'
    );
    return parseSnapshotListing(result.stdout);
  }

  async installPackage(spec: string, hooks: ExecuteHooks): Promise<BackendResult> {
    const containerId = this.requireContainer('install package');
    const streaming: RunCommandOptions = {
      signal: hooks.signal,
      onStdout: hooks.onStdout,
      onStderr: hooks.onStderr,
    };

    if (this.config.networkPolicy.mode === 'allowlist') {
      const result = await this.runDocker(['exec', containerId, 'pip', 'install', spec], streaming);
      return { stdout: result.stdout, stderr: result.stderr, exitCode: result.exitCode };
    }

    const stagingDir = `${PACKAGE_STAGING_DIR}/${requirementName(spec) ?? 'package'}`;
    return this.wheelStager.stage(spec, async (dir) => {
      await this.checked(['exec', containerId, 'mkdir', '-p', stagingDir], 'create package directory');
      await this.checked(['cp', `${dir}/.`, `${containerId}:${stagingDir}`], 'copy wheels into container');
      const result = await this.runDocker(
        ['exec', containerId, 'pip', 'install', '--no-index', '--find-links', stagingDir, spec],
        streaming
      );
      return { stdout: result.stdout, stderr: result.stderr, exitCode: result.exitCode };
    }, hooks.signal);
  }

  async stop(): Promise<void> {
    const containerId = this.containerId;
    this.stopDriver();
    if (!containerId) return;

    await this.checked(['stop', '-t', String(this.options.stopTimeoutSeconds ?? 5), containerId], 'stop container');
    await this.checked(['rm', containerId], 'remove container');
    this.containerId = null;
    this.log.info('Container stopped', { containerId });
  }

  async kill(): Promise<void> {
    const containerId = this.containerId;
    this.stopDriver();
    if (!containerId) return;

    const result = await this.runDocker(['rm', '-f', containerId]);
    if (result.exitCode !== 0 && !/no such container/i.test(result.stderr)) {
      throw new Error(`Failed to remove container: ${result.stderr.trim()}`);
    }
    this.containerId = null;
    this.log.warn('Container force removed', { containerId });
  }

  private pythonDriver(containerId: string): PythonDriver {
    if (this.driver && this.driver.alive) {
      return this.driver;
    }
    const marker = `__sandbox_done_${nanoid(12)}__`;
    const proc = this.spawnProcess('docker', [
      ...this.hostArgs(),
      'exec', '-i', '-w', this.config.workingDirectory, containerId,
      ...PythonDriver.args(marker, this.config.workingDirectory),
    ]);
    this.driver = new PythonDriver(proc, marker);
    return this.driver;
  }

  private stopDriver(): void {
    if (this.driver) {
      this.driver.kill();
      this.driver = null;
    }
  }

  private requireContainer(operation: string): string {
    if (!this.containerId) {
      throw Errors.notStarted(operation);
    }
    return this.containerId;
  }

  private hostArgs(): string[] {
    return this.options.host ? ['-H', this.options.host] : [];
  }

  private async checked(args: string[], action: string): Promise<CommandResult> {
    const result = await this.runDocker(args);
    if (result.exitCode !== 0) {
      throw new Error(`Failed to ${action}: ${result.stderr.trim() || `exit code ${result.exitCode}`}`);
    }
    return result;
  }

  private runDocker(args: string[], options?: RunCommandOptions): Promise<CommandResult> {
    return runCommand(this.spawnProcess, 'docker', [...this.hostArgs(), ...args], options);
  }
}
