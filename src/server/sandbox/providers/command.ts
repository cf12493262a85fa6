/**
 * Child process helpers shared by the CLI-driven backends
 */

import { spawn } from 'child_process';
import { StringDecoder } from 'string_decoder';
import type { Readable, Writable } from 'stream';

/**
 * The part of a child process the backends rely on
 */
export interface SpawnedProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals | number): boolean;
  on(event: string, listener: (...args: unknown[]) => void): unknown;
}

export type SpawnProcess = (command: string, args: string[]) => SpawnedProcess;

export const defaultSpawn: SpawnProcess = (command, args) => spawn(command, args);

/**
 * Command execution result
 */
export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  /** Raw stdout bytes */
  output: Buffer;
}

export interface RunCommandOptions {
  input?: Buffer | string;
  signal?: AbortSignal;
  onStdout?: (chunk: string) => void;
  onStderr?: (chunk: string) => void;
}

/**
 * Run a command to completion, collecting its output.
 * Spawn errors resolve with exit code 1 and the error text on stderr.
 */
export function runCommand(
  spawnProcess: SpawnProcess,
  command: string,
  args: string[],
  options: RunCommandOptions = {}
): Promise<CommandResult> {
  return new Promise((resolve) => {
    const proc = spawnProcess(command, args);

    const stdoutChunks: Buffer[] = [];
    // Chunks may end inside a multi-byte character
    const stdoutText = new StringDecoder('utf8');
    const stderrText = new StringDecoder('utf8');
    let stderr = '';
    let settled = false;

    const finish = (exitCode: number, note = '') => {
      if (settled) return;
      settled = true;
      options.signal?.removeEventListener('abort', onAbort);
      const stdoutTail = stdoutText.end();
      if (stdoutTail) options.onStdout?.(stdoutTail);
      const stderrTail = stderrText.end();
      if (stderrTail) options.onStderr?.(stderrTail);
      const output = Buffer.concat(stdoutChunks);
      resolve({ exitCode, stdout: output.toString('utf8'), stderr: stderr + stderrTail + note, output });
    };

    const onAbort = () => {
      proc.kill('SIGKILL');
    };

    if (options.signal) {
      if (options.signal.aborted) {
        onAbort();
      } else {
        options.signal.addEventListener('abort', onAbort, { once: true });
      }
    }

    proc.stdout.on('data', (data: Buffer) => {
      stdoutChunks.push(data);
      const text = stdoutText.write(data);
      if (text) options.onStdout?.(text);
    });

    proc.stderr.on('data', (data: Buffer) => {
      const text = stderrText.write(data);
      if (!text) return;
      stderr += text;
      options.onStderr?.(text);
    });

    proc.on('close', (code) => {
      finish(typeof code === 'number' ? code : 1);
    });

    proc.on('error', (err) => {
      finish(1, err instanceof Error ? err.message : String(err));
    });

    proc.stdin.on('error', (err: Error) => {
      stderr += `stdin: ${err.message}\n`;
    });

    if (options.input !== undefined) {
      proc.stdin.end(options.input);
    } else {
      proc.stdin.end();
    }
  });
}
