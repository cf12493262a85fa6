import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { SandboxRuntime } from '../runtime';
import { resolveRuntimeConfig } from '../../config';
import { ErrorCode, ExecutionTimeoutError } from '../../../core/errors';
import type { RuntimeConfigInput } from '../types';
import { FakeBackend, deferred } from './test-utils';

function makeRuntime(backend: FakeBackend, overrides: RuntimeConfigInput = {}) {
  return new SandboxRuntime(backend, resolveRuntimeConfig(overrides), { terminateTimeoutMs: 50 });
}

describe('SandboxRuntime', () => {
  let backend: FakeBackend;

  beforeEach(() => {
    backend = new FakeBackend();
  });

  describe('start', () => {
    it('boots the backend once with the session configuration', async () => {
      const runtime = makeRuntime(backend, { maxMemoryMb: 256 });
      await runtime.start();

      expect(runtime.started).toBe(true);
      expect(backend.starts).toBe(1);
      expect(backend.config?.maxMemoryMb).toBe(256);
    });

    it('rejects a second start with ALREADY_STARTED', async () => {
      const runtime = makeRuntime(backend);
      await runtime.start();

      await expect(runtime.start()).rejects.toMatchObject({ code: ErrorCode.ALREADY_STARTED });
      expect(backend.starts).toBe(1);
    });

    it('wraps boot failures in PROVISION_FAILURE and releases the backend', async () => {
      backend.bootError = new Error('image not found');
      const runtime = makeRuntime(backend);

      await expect(runtime.start()).rejects.toMatchObject({
        code: ErrorCode.PROVISION_FAILURE,
        message: 'Failed to provision docker sandbox: image not found',
      });
      expect(runtime.terminated).toBe(true);
      expect(backend.kills).toBe(1);
    });

    it('fails the start when terminated while booting', async () => {
      const gate = deferred();
      backend.bootGate = gate.promise;
      const runtime = makeRuntime(backend);

      const starting = runtime.start();
      const terminating = runtime.terminate();
      gate.resolve();

      await expect(starting).rejects.toMatchObject({ code: ErrorCode.PROVISION_FAILURE });
      expect(await terminating).toEqual({ ok: true, method: 'graceful' });
      expect(backend.stops).toBe(1);
    });
  });

  describe('execute', () => {
    it('returns output, exit code and duration', async () => {
      backend.onExecute = () => ({ stdout: '4\n', stderr: '', exitCode: 0 });
      const runtime = makeRuntime(backend);
      await runtime.start();

      const result = await runtime.execute('print(2 + 2)', 'python');

      expect(result.stdout).toBe('4\n');
      expect(result.exitCode).toBe(0);
      expect(result.executionDurationMs).toBeGreaterThanOrEqual(0);
      expect(result.declaredOutputs).toEqual([]);
    });

    it('treats a non-zero exit code as data', async () => {
      backend.onExecute = () => ({ stdout: '', stderr: 'boom\n', exitCode: 3 });
      const runtime = makeRuntime(backend);
      await runtime.start();

      const result = await runtime.execute('exit 3', 'bash');
      expect(result.exitCode).toBe(3);
      expect(result.stderr).toBe('boom\n');
    });

    it('rejects unsupported languages', async () => {
      const runtime = makeRuntime(backend);
      await runtime.start();

      await expect(runtime.execute('console.log(1)', 'javascript')).rejects.toMatchObject({
        code: ErrorCode.UNSUPPORTED_LANGUAGE,
      });
    });

    it('requires a started runtime', async () => {
      const runtime = makeRuntime(backend);
      await expect(runtime.execute('1', 'python')).rejects.toMatchObject({ code: ErrorCode.NOT_STARTED });
    });

    it('rejects a concurrent operation with BUSY', async () => {
      const gate = deferred();
      backend.onExecute = async () => {
        await gate.promise;
        return { stdout: 'done', stderr: '', exitCode: 0 };
      };
      const runtime = makeRuntime(backend);
      await runtime.start();

      const first = runtime.execute('slow()', 'python');
      await expect(runtime.execute('fast()', 'python')).rejects.toMatchObject({ code: ErrorCode.BUSY });
      await expect(runtime.listFiles()).rejects.toMatchObject({ code: ErrorCode.BUSY });

      gate.resolve();
      expect((await first).stdout).toBe('done');
    });

    it('times out, keeps partial output and force-releases the backend', async () => {
      backend.onExecute = (_code, _language, _backend, hooks) => {
        hooks.onStdout('tick\n');
        hooks.onStderr('warn\n');
        return new Promise(() => {});
      };
      const runtime = makeRuntime(backend, { maxExecutionTimeMs: 30 });
      await runtime.start();

      const error = await runtime.execute('while True: pass', 'python').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExecutionTimeoutError);
      if (!(error instanceof ExecutionTimeoutError)) return;
      expect(error.stdout).toBe('tick\n');
      expect(error.stderr).toBe('warn\n');
      expect(error.durationMs).toBeGreaterThanOrEqual(25);
      expect(runtime.terminated).toBe(true);
      expect(backend.kills).toBe(1);
      expect(backend.stops).toBe(0);
    });

    it('aborts the backend call on timeout', async () => {
      let aborted = false;
      backend.onExecute = (_code, _language, _backend, hooks) =>
        new Promise(() => {
          hooks.signal.addEventListener('abort', () => {
            aborted = true;
          });
        });
      const runtime = makeRuntime(backend, { maxExecutionTimeMs: 20 });
      await runtime.start();

      await expect(runtime.execute('sleep 10', 'bash')).rejects.toMatchObject({
        code: ErrorCode.EXECUTION_TIMEOUT,
      });
      expect(aborted).toBe(true);
    });
  });

  describe('file transfer', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'runtime-test-'));
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('uploads into and downloads from the working directory', async () => {
      const runtime = makeRuntime(backend);
      await runtime.start();
      const local = path.join(tempDir, 'input.csv');
      await fs.writeFile(local, 'a,b\n1,2\n');

      await runtime.upload(local, 'data/input.csv');
      expect(backend.hasFile('data/input.csv')).toBe(true);
      expect(await runtime.listFiles('data')).toEqual(['input.csv']);

      const copy = path.join(tempDir, 'out', 'copy.csv');
      await runtime.download('/workspace/data/input.csv', copy);
      expect(await fs.readFile(copy, 'utf8')).toBe('a,b\n1,2\n');
    });

    it('rejects traversal before touching the backend', async () => {
      const runtime = makeRuntime(backend);
      await runtime.start();
      const local = path.join(tempDir, 'evil.txt');
      await fs.writeFile(local, 'x');

      await expect(runtime.upload(local, '../etc/cron.d/evil')).rejects.toMatchObject({
        code: ErrorCode.PATH_VIOLATION,
      });
      expect(await backend.snapshot()).toEqual(new Map());

      await expect(runtime.download('/etc/passwd', path.join(tempDir, 'p'))).rejects.toMatchObject({
        code: ErrorCode.PATH_VIOLATION,
      });
      await expect(fs.access(path.join(tempDir, 'p'))).rejects.toThrow();
    });

    it('reports missing files as NOT_FOUND', async () => {
      const runtime = makeRuntime(backend);
      await runtime.start();

      await expect(runtime.upload(path.join(tempDir, 'missing'), 'x')).rejects.toMatchObject({
        code: ErrorCode.NOT_FOUND,
      });
      await expect(runtime.download('missing.txt', path.join(tempDir, 'x'))).rejects.toMatchObject({
        code: ErrorCode.NOT_FOUND,
      });
    });
  });

  describe('installPackage', () => {
    it('installs allowlisted packages', async () => {
      const runtime = makeRuntime(backend, { allowedPackages: ['pandas'] });
      await runtime.start();

      const result = await runtime.installPackage('pandas>=2.0');
      expect(result.stdout).toBe('Successfully installed pandas>=2.0\n');
      expect(backend.installed).toEqual(['pandas>=2.0']);
    });

    it('rejects packages outside the allowlist before forwarding', async () => {
      const runtime = makeRuntime(backend, { allowedPackages: ['pandas'] });
      await runtime.start();

      await expect(runtime.installPackage('requests')).rejects.toMatchObject({
        code: ErrorCode.PACKAGE_NOT_ALLOWED,
      });
      expect(backend.installed).toEqual([]);
    });

    it('turns a failed install into INSTALL_FAILED', async () => {
      backend.installPackage = async () => ({
        stdout: '',
        stderr: 'Collecting pandas\nERROR: No matching distribution found for pandas\n',
        exitCode: 1,
      });
      const runtime = makeRuntime(backend, { allowedPackages: ['pandas'] });
      await runtime.start();

      await expect(runtime.installPackage('pandas')).rejects.toMatchObject({
        code: ErrorCode.INSTALL_FAILED,
        message: 'Failed to install package pandas: ERROR: No matching distribution found for pandas',
      });
    });
  });

  describe('terminate', () => {
    it('stops gracefully and is idempotent', async () => {
      const runtime = makeRuntime(backend);
      await runtime.start();

      const first = await runtime.terminate();
      const second = await runtime.terminate();

      expect(first).toEqual({ ok: true, method: 'graceful' });
      expect(second).toBe(first);
      expect(backend.stops).toBe(1);
      expect(runtime.terminated).toBe(true);
    });

    it('falls back to a forced kill when stop hangs', async () => {
      backend.stopBehavior = 'hang';
      const runtime = makeRuntime(backend);
      await runtime.start();

      expect(await runtime.terminate()).toEqual({ ok: true, method: 'forced' });
      expect(backend.kills).toBe(1);
    });

    it('reports failure without throwing when nothing works', async () => {
      backend.stopBehavior = 'fail';
      backend.killBehavior = 'hang';
      const runtime = makeRuntime(backend);
      await runtime.start();

      expect(await runtime.terminate()).toEqual({ ok: false, error: 'forced kill timed out after 50ms' });
    });

    it('is a no-op before start', async () => {
      const runtime = makeRuntime(backend);
      expect(await runtime.terminate()).toEqual({ ok: true, alreadyTerminated: true });
      await expect(runtime.start()).rejects.toMatchObject({ code: ErrorCode.ALREADY_STARTED });
    });

    it('refuses operations afterwards', async () => {
      const runtime = makeRuntime(backend);
      await runtime.start();
      await runtime.terminate();

      await expect(runtime.execute('1', 'python')).rejects.toMatchObject({ code: ErrorCode.NOT_STARTED });
    });
  });
});
