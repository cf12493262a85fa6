/**
 * Host-side wheel staging for sandboxes without network access.
 *
 * Packages are downloaded on the host with `pip download`, copied into the
 * container and installed there with `--no-index`.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Errors } from '../../../core/errors';
import { defaultSpawn, runCommand, type SpawnProcess } from './command';

export interface WheelStagerOptions {
  spawnProcess?: SpawnProcess;
  /** Python version of the sandbox image, used when cross-downloading */
  pythonVersion?: string;
  platform?: NodeJS.Platform;
  arch?: string;
}

export class WheelStager {
  private readonly spawnProcess: SpawnProcess;
  private readonly pythonVersion: string;
  private readonly platform: NodeJS.Platform;
  private readonly arch: string;

  constructor(options: WheelStagerOptions = {}) {
    this.spawnProcess = options.spawnProcess ?? defaultSpawn;
    this.pythonVersion = options.pythonVersion ?? '3.12';
    this.platform = options.platform ?? process.platform;
    this.arch = options.arch ?? process.arch;
  }

  /**
   * Arguments for `pip download`. Hosts that are not Linux fetch
   * manylinux wheels for the container's architecture.
   */
  downloadArgs(spec: string, dest: string): string[] {
    const args = ['download', spec, '--dest', dest];
    if (this.platform !== 'linux') {
      const machine = this.arch === 'arm64' ? 'aarch64' : 'x86_64';
      args.push(
        '--only-binary=:all:',
        '--platform', `manylinux2014_${machine}`,
        '--python-version', this.pythonVersion
      );
    }
    return args;
  }

  /**
   * Download wheels for spec into a temporary directory and hand it to fn.
   * The directory is removed afterwards. Aborting signal kills the download
   * and fn is not called.
   */
  async stage<T>(spec: string, fn: (dir: string) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sandbox-wheels-'));
    try {
      const result = await runCommand(this.spawnProcess, 'pip', this.downloadArgs(spec, dir), { signal });
      if (signal?.aborted) {
        throw Errors.installFailed(spec, 'aborted');
      }
      if (result.exitCode !== 0) {
        throw Errors.installFailed(spec, `download failed: ${result.stderr.trim() || `exit code ${result.exitCode}`}`);
      }
      return await fn(dir);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }
}
