import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SessionManager, type SessionManagerOptions } from '../manager';
import { ArtifactProcessor } from '../artifacts';
import type { AuditEvent } from '../audit';
import { ErrorCode } from '../../../core/errors';
import { computeHash } from '../../../utils/hash';
import { delay } from '../../../utils/async';
import { metrics } from '../../logger';
import { FakeBackend, MemoryStorage, deferred, fakeRuntimeFactory } from './test-utils';

const PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

describe('SessionManager', () => {
  let storage: MemoryStorage;
  let backends: FakeBackend[];
  let manager: SessionManager;

  function createManager(
    build?: () => FakeBackend,
    options: Partial<SessionManagerOptions> = {}
  ): SessionManager {
    const fake = fakeRuntimeFactory(build);
    backends = fake.backends;
    manager = new SessionManager({
      runtimeFactory: fake.factory,
      artifacts: new ArtifactProcessor({ storage }),
      startReaper: false,
      shutdownGraceMs: 1_000,
      ...options,
    });
    return manager;
  }

  beforeEach(() => {
    storage = new MemoryStorage();
    metrics.reset();
  });

  afterEach(async () => {
    await manager.shutdown();
  });

  describe('getOrCreateSession', () => {
    it('boots exactly one backend for concurrent callers', async () => {
      const gate = deferred();
      createManager(() => {
        const backend = new FakeBackend();
        backend.bootGate = gate.promise;
        return backend;
      });

      const pending = Array.from({ length: 5 }, () => manager.getOrCreateSession('s1'));
      gate.resolve();
      const infos = await Promise.all(pending);

      expect(backends).toHaveLength(1);
      expect(backends[0].starts).toBe(1);
      expect(infos.map((info) => info.state)).toEqual(['warm', 'warm', 'warm', 'warm', 'warm']);
      expect(manager.listSessions()).toHaveLength(1);
    });

    it('shares a failed boot with every waiter and forgets the session', async () => {
      createManager(() => {
        const backend = new FakeBackend();
        backend.bootError = new Error('daemon unavailable');
        return backend;
      });

      const results = await Promise.allSettled([
        manager.getOrCreateSession('s1'),
        manager.getOrCreateSession('s1'),
      ]);

      expect(results.map((r) => r.status)).toEqual(['rejected', 'rejected']);
      for (const result of results) {
        if (result.status === 'rejected') {
          expect(result.reason).toMatchObject({ code: ErrorCode.PROVISION_FAILURE });
        }
      }
      expect(backends).toHaveLength(1);
      expect(manager.getSession('s1')).toBeNull();

      await expect(manager.getOrCreateSession('s1')).rejects.toMatchObject({
        code: ErrorCode.PROVISION_FAILURE,
      });
      expect(backends).toHaveLength(2);
    });

    it('returns the existing session and applies overrides only at creation', async () => {
      createManager();

      const first = await manager.getOrCreateSession('s1', { maxMemoryMb: 256 });
      const second = await manager.getOrCreateSession('s1', { maxMemoryMb: 1024 });

      expect(backends).toHaveLength(1);
      expect(first.config.maxMemoryMb).toBe(256);
      expect(second.config.maxMemoryMb).toBe(256);
      expect(second.createdAt).toEqual(first.createdAt);
    });

    it('layers overrides on the manager defaults', async () => {
      createManager(undefined, { defaults: { maxCpu: 2, workingDirectory: '/home/user' } });

      const info = await manager.getOrCreateSession('s1', { maxMemoryMb: 256 });

      expect(info.config).toMatchObject({ maxCpu: 2, workingDirectory: '/home/user', maxMemoryMb: 256 });
      expect(backends[0].config?.workingDirectory).toBe('/home/user');
    });

    it('holds back operations submitted while the backend boots', async () => {
      const gate = deferred();
      createManager(() => {
        const backend = new FakeBackend(() => ({ stdout: 'ran\n', stderr: '', exitCode: 0 }));
        backend.bootGate = gate.promise;
        return backend;
      });

      const creating = manager.getOrCreateSession('s1');
      const running = manager.execute('s1', 'print("ran")', 'python');
      await delay(5);
      expect(backends[0].starts).toBe(1);
      expect(await manager.reapIdleSessions()).toEqual({ reaped: [], failed: [] });

      gate.resolve();
      expect((await creating).state).toBe('warm');
      expect((await running).stdout).toBe('ran\n');
    });

    it('rejects empty session ids', async () => {
      createManager();

      await expect(manager.getOrCreateSession('')).rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT });
      await expect(manager.getOrCreateSession('   ')).rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT });
      expect(backends).toHaveLength(0);
    });

    it('emits session:created once the backend is warm', async () => {
      createManager();
      const created = vi.fn();
      manager.on('session:created', created);

      await manager.getOrCreateSession('s1');

      expect(created).toHaveBeenCalledTimes(1);
      expect(created.mock.calls[0][0]).toMatchObject({ sessionId: 's1', state: 'warm', backend: 'docker' });
    });
  });

  describe('execute', () => {
    it('keeps interpreter state between executions', async () => {
      createManager(
        () =>
          new FakeBackend((code, _language, backend) => {
            if (code.startsWith('x = ')) {
              backend.globals.set('x', code.slice(4));
              return { stdout: '', stderr: '', exitCode: 0 };
            }
            return { stdout: `${String(backend.globals.get('x'))}\n`, stderr: '', exitCode: 0 };
          })
      );
      await manager.getOrCreateSession('s1');

      await manager.execute('s1', 'x = 42', 'python');
      const result = await manager.execute('s1', 'print(x)', 'python');

      expect(result.stdout).toBe('42\n');
      expect(result.exitCode).toBe(0);
      expect(manager.getSession('s1')?.executionCount).toBe(2);
    });

    it('advances lastUsedAt strictly with every use', async () => {
      createManager();
      const stamps = [(await manager.getOrCreateSession('s1')).lastUsedAt];

      for (let i = 0; i < 3; i++) {
        await manager.execute('s1', 'pass', 'python');
        stamps.push(manager.getSession('s1')?.lastUsedAt ?? 0);
      }
      stamps.push((await manager.getOrCreateSession('s1')).lastUsedAt);

      for (let i = 1; i < stamps.length; i++) {
        expect(stamps[i]).toBeGreaterThan(stamps[i - 1]);
      }
    });

    it('runs queued operations one at a time in submission order', async () => {
      const gate = deferred();
      const started: string[] = [];
      let running = 0;
      let maxRunning = 0;
      createManager(
        () =>
          new FakeBackend(async (code) => {
            started.push(code);
            running++;
            maxRunning = Math.max(maxRunning, running);
            if (code === 'a') await gate.promise;
            running--;
            return { stdout: code, stderr: '', exitCode: 0 };
          })
      );
      await manager.getOrCreateSession('s1');

      const runs = ['a', 'b', 'c'].map((code) => manager.execute('s1', code, 'python'));
      await delay(10);
      expect(started).toEqual(['a']);

      gate.resolve();
      const results = await Promise.all(runs);

      expect(results.map((r) => r.stdout)).toEqual(['a', 'b', 'c']);
      expect(started).toEqual(['a', 'b', 'c']);
      expect(maxRunning).toBe(1);
    });

    it('fails unknown sessions with SESSION_NOT_FOUND', async () => {
      createManager();

      await expect(manager.execute('missing', 'print(1)', 'python')).rejects.toMatchObject({
        code: ErrorCode.SESSION_NOT_FOUND,
        message: "Session 'missing' not found",
      });
    });

    it('rejects unsupported languages without touching the session', async () => {
      const onExecute = vi.fn(() => ({ stdout: '', stderr: '', exitCode: 0 }));
      createManager(() => new FakeBackend(onExecute));
      await manager.getOrCreateSession('s1');

      await expect(manager.execute('s1', 'console.log(1)', 'javascript')).rejects.toMatchObject({
        code: ErrorCode.UNSUPPORTED_LANGUAGE,
      });
      expect(onExecute).not.toHaveBeenCalled();
      expect(manager.getSession('s1')?.state).toBe('warm');
    });

    it('retires the session when an execution times out', async () => {
      createManager(() => new FakeBackend(() => new Promise(() => {})), {
        defaults: { maxExecutionTimeMs: 30 },
      });
      const terminated = vi.fn();
      manager.on('session:terminated', terminated);
      await manager.getOrCreateSession('s1');

      await expect(manager.execute('s1', 'while True: pass', 'python')).rejects.toMatchObject({
        code: ErrorCode.EXECUTION_TIMEOUT,
      });

      expect(manager.getSession('s1')).toBeNull();
      expect(backends[0].kills).toBe(1);
      expect(terminated).toHaveBeenCalledWith({
        sessionId: 's1',
        reason: 'timeout',
        outcome: { ok: true, method: 'forced' },
      });
      expect(manager.getMetrics().counters).toMatchObject({
        sandbox_execution_timeouts_total: 1,
        'sandbox_sessions_created_total{backend="docker"}': 1,
      });
      expect(manager.getMetrics().gauges.sandbox_sessions_active).toBe(0);

      await manager.getOrCreateSession('s1');
      expect(backends).toHaveLength(2);
    });

    it('collects produced files as artifacts', async () => {
      createManager(
        () =>
          new FakeBackend((_code, _language, backend) => {
            backend.writeFile('plot.png', PNG);
            backend.writeFile('table.csv', 'a,b\n1,2\n');
            return { stdout: '', stderr: '', exitCode: 0 };
          })
      );
      await manager.getOrCreateSession('s1');

      const result = await manager.execute('s1', 'render()', 'python');

      expect(result.artifacts.map((a) => [a.name, a.kind])).toEqual([
        ['plot.png', 'inline'],
        ['table.csv', 'external'],
      ]);
      expect(storage.puts.map((p) => p.key.split('/')[0])).toEqual(['s1']);
      expect(result.warnings).toEqual([]);
    });

    it('appends artifact warnings to stderr', async () => {
      createManager(
        () =>
          new FakeBackend((_code, _language, backend) => {
            backend.writeFile('big.txt', 'hello world');
            return { stdout: 'done\n', stderr: 'note', exitCode: 0 };
          }),
        { artifacts: new ArtifactProcessor({ storage, maxArtifactBytes: 4 }) }
      );
      await manager.getOrCreateSession('s1');

      const result = await manager.execute('s1', 'write()', 'python');

      expect(result.stdout).toBe('done\n');
      expect(result.warnings).toEqual(["Artifact 'big.txt' skipped: 11 bytes exceeds the 4 byte limit"]);
      expect(result.stderr).toBe("note\n[sandbox] Artifact 'big.txt' skipped: 11 bytes exceeds the 4 byte limit\n");
      expect(result.artifacts).toEqual([]);
    });

    it('reports the execution without artifacts when the workspace cannot be listed', async () => {
      createManager(() => {
        const backend = new FakeBackend(() => ({ stdout: 'ok\n', stderr: '', exitCode: 0 }));
        backend.snapshot = () => Promise.reject(new Error('find: permission denied'));
        return backend;
      });
      await manager.getOrCreateSession('s1');

      const result = await manager.execute('s1', 'run()', 'python');

      expect(result.stdout).toBe('ok\n');
      expect(result.warnings).toEqual([
        'Workspace snapshot failed; produced files were not collected: find: permission denied',
      ]);
      expect(result.stderr).toBe(
        '[sandbox] Workspace snapshot failed; produced files were not collected: find: permission denied\n'
      );
    });

    it('notifies the audit sink with the code hash', async () => {
      const events: AuditEvent[] = [];
      createManager(undefined, { audit: { notify: (event) => void events.push(event) } });
      await manager.getOrCreateSession('s1');

      await manager.execute('s1', 'print(1)', 'python');
      await delay(0);

      expect(events).toEqual([
        { sessionId: 's1', codeHash: computeHash('print(1)'), code: 'print(1)', language: 'python' },
      ]);
    });

    it('is not blocked by a failing audit sink', async () => {
      createManager(undefined, {
        audit: {
          notify: () => {
            throw new Error('sink down');
          },
        },
      });
      await manager.getOrCreateSession('s1');

      const first = await manager.execute('s1', 'print(1)', 'python');
      expect(first.exitCode).toBe(0);
      await manager.shutdown();

      createManager(undefined, { audit: { notify: () => Promise.reject(new Error('sink down')) } });
      await manager.getOrCreateSession('s1');
      const second = await manager.execute('s1', 'print(1)', 'python');
      expect(second.exitCode).toBe(0);
    });
  });

  describe('file operations', () => {
    it('installs packages and lists files through the session', async () => {
      createManager(undefined, { defaults: { allowedPackages: ['numpy'] } });
      await manager.getOrCreateSession('s1');
      backends[0].writeFile('data/input.csv', 'x');
      backends[0].writeFile('notes.txt', 'y');

      const install = await manager.installPackage('s1', 'numpy');

      expect(install.stdout).toBe('Successfully installed numpy\n');
      expect(await manager.listFiles('s1')).toEqual(['data', 'notes.txt']);
      expect(await manager.listFiles('s1', 'data')).toEqual(['input.csv']);
      await expect(manager.installPackage('s1', 'requests')).rejects.toMatchObject({
        code: ErrorCode.PACKAGE_NOT_ALLOWED,
      });
      expect(manager.getSession('s1')?.state).toBe('warm');
    });
  });

  describe('closeSession', () => {
    it('terminates and forgets the session', async () => {
      createManager();
      const terminated = vi.fn();
      manager.on('session:terminated', terminated);
      await manager.getOrCreateSession('s1');

      await manager.closeSession('s1');

      expect(manager.getSession('s1')).toBeNull();
      expect(backends[0].stops).toBe(1);
      expect(terminated).toHaveBeenCalledWith({
        sessionId: 's1',
        reason: 'closed',
        outcome: { ok: true, method: 'graceful' },
      });
      await expect(manager.execute('s1', 'print(1)', 'python')).rejects.toMatchObject({
        code: ErrorCode.SESSION_NOT_FOUND,
      });
    });

    it('waits for the running operation before closing', async () => {
      const gate = deferred();
      createManager(
        () =>
          new FakeBackend(async () => {
            await gate.promise;
            return { stdout: 'finished', stderr: '', exitCode: 0 };
          })
      );
      await manager.getOrCreateSession('s1');

      const running = manager.execute('s1', 'slow()', 'python');
      await delay(5);
      const closing = manager.closeSession('s1');
      await delay(5);
      expect(backends[0].stops).toBe(0);

      gate.resolve();
      expect((await running).stdout).toBe('finished');
      await closing;
      expect(backends[0].stops).toBe(1);
    });

    it('keeps the artifact cache of a session that replaced the closing one', async () => {
      let built = 0;
      createManager(() => {
        const backend = new FakeBackend((_code, _language, fake) => {
          fake.writeFile('report.csv', 'a,b\n1,2\n');
          return { stdout: '', stderr: '', exitCode: 0 };
        });
        // The first session's graceful stop never returns, so its close lingers
        if (built++ === 0) backend.stopBehavior = 'hang';
        return backend;
      });
      await manager.getOrCreateSession('s1');

      const closing = manager.closeSession('s1');
      await delay(5);
      expect(manager.getSession('s1')).toBeNull();

      await manager.getOrCreateSession('s1');
      const first = await manager.execute('s1', 'export()', 'python');
      await closing;
      const second = await manager.execute('s1', 'export()', 'python');

      expect(backends).toHaveLength(2);
      const [uploaded] = first.artifacts;
      expect(uploaded.kind).toBe('external');
      expect(storage.puts).toHaveLength(1);
      expect(second.artifacts).toEqual([
        expect.objectContaining({ kind: 'external', url: uploaded.kind === 'external' ? uploaded.url : '' }),
      ]);
    });

    it('raises TERMINATION_FAILURE when the backend cannot be released', async () => {
      createManager(() => {
        const backend = new FakeBackend();
        backend.stopBehavior = 'fail';
        backend.killBehavior = 'fail';
        return backend;
      });
      await manager.getOrCreateSession('s1');

      await expect(manager.closeSession('s1')).rejects.toMatchObject({
        code: ErrorCode.TERMINATION_FAILURE,
        message: "Failed to terminate session 's1': kill failed",
      });
      expect(manager.getSession('s1')).toBeNull();
    });

    it('fails unknown sessions with SESSION_NOT_FOUND', async () => {
      createManager();
      await expect(manager.closeSession('nope')).rejects.toMatchObject({ code: ErrorCode.SESSION_NOT_FOUND });
    });
  });

  describe('reapIdleSessions', () => {
    it('terminates sessions idle past their timeout', async () => {
      createManager(undefined, { defaults: { idleTimeoutMs: 20 } });
      const terminated = vi.fn();
      manager.on('session:terminated', terminated);
      await manager.getOrCreateSession('idle');
      await delay(40);
      await manager.getOrCreateSession('fresh');

      const report = await manager.reapIdleSessions();

      expect(report).toEqual({ reaped: ['idle'], failed: [] });
      expect(manager.listSessions().map((s) => s.sessionId)).toEqual(['fresh']);
      expect(terminated).toHaveBeenCalledWith(expect.objectContaining({ sessionId: 'idle', reason: 'idle' }));
      expect(manager.getMetrics().counters.sandbox_sessions_reaped_total).toBe(1);
      expect(manager.getMetrics().gauges.sandbox_sessions_active).toBe(1);

      await manager.getOrCreateSession('idle');
      expect(backends).toHaveLength(3);
    });
  });

  describe('shutdown', () => {
    it('terminates every session and refuses new ones', async () => {
      createManager();
      const shutdownEvent = vi.fn();
      manager.on('shutdown', shutdownEvent);
      await manager.getOrCreateSession('a');
      await manager.getOrCreateSession('b');

      const first = manager.shutdown();
      expect(manager.shutdown()).toBe(first);
      await first;

      expect(backends.map((b) => b.stops)).toEqual([1, 1]);
      expect(manager.listSessions()).toEqual([]);
      expect(shutdownEvent).toHaveBeenCalledTimes(1);
      await expect(manager.getOrCreateSession('c')).rejects.toMatchObject({ code: ErrorCode.SHUTTING_DOWN });
    });

    it('returns after the grace period even if a session is still busy', async () => {
      createManager(() => new FakeBackend(() => new Promise(() => {})), {
        defaults: { maxExecutionTimeMs: 300 },
        shutdownGraceMs: 30,
      });
      await manager.getOrCreateSession('s1');
      const running = manager.execute('s1', 'while True: pass', 'python').catch((error: unknown) => error);
      await delay(5);

      const startedAt = Date.now();
      await manager.shutdown();

      expect(Date.now() - startedAt).toBeLessThan(250);
      expect(backends[0].kills).toBe(0);

      expect(await running).toMatchObject({ code: ErrorCode.EXECUTION_TIMEOUT });
      expect(backends[0].kills).toBe(1);
    });
  });
});
