/**
 * Child process runner with a hard wall-clock timeout
 */

import { spawn, type ChildProcess } from 'node:child_process';

export interface ProcessOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
  timeoutMs: number;
  maxOutputBytes: number;
}

export type ProcessOutcome =
  | {
      kind: 'exited';
      exitCode: number | null;
      signal: NodeJS.Signals | null;
      stdout: string;
      stderr: string;
      pid?: number;
    }
  | {
      kind: 'timeout';
      stdout: string;
      stderr: string;
      pid?: number;
    }
  | {
      kind: 'launch-error';
      message: string;
    };

/**
 * Collects a stream up to a byte cap
 */
class OutputCollector {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  private truncated = false;

  constructor(private readonly maxBytes: number) {}

  push(chunk: Buffer): void {
    const room = this.maxBytes - this.size;
    if (room <= 0) {
      this.truncated = true;
      return;
    }
    if (chunk.length > room) {
      this.chunks.push(chunk.subarray(0, room));
      this.size += room;
      this.truncated = true;
      return;
    }
    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  toString(): string {
    const text = Buffer.concat(this.chunks).toString('utf-8');
    if (this.truncated) {
      return `${text}\n[output truncated after ${this.maxBytes} bytes]`;
    }
    return text;
  }
}

/**
 * Children lead their own process group on POSIX so the kill reaches
 * anything they spawned
 */
const USE_PROCESS_GROUP = process.platform !== 'win32';

function killTree(child: ChildProcess): void {
  if (child.pid === undefined) {
    return;
  }
  try {
    if (USE_PROCESS_GROUP) {
      process.kill(-child.pid, 'SIGKILL');
      return;
    }
  } catch {
    // group already gone; fall through to the direct kill
  }
  child.kill('SIGKILL');
}

export function runProcess(
  command: string,
  args: string[],
  options: ProcessOptions
): Promise<ProcessOutcome> {
  return new Promise((resolve) => {
    let child: ChildProcess;
    try {
      child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: USE_PROCESS_GROUP,
      });
    } catch (error) {
      resolve({
        kind: 'launch-error',
        message: error instanceof Error ? error.message : String(error),
      });
      return;
    }

    const stdout = new OutputCollector(options.maxOutputBytes);
    const stderr = new OutputCollector(options.maxOutputBytes);
    let timedOut = false;
    let settled = false;

    const timer = setTimeout(() => {
      timedOut = true;
      killTree(child);
      // Already exited, with the pipes held by something outside the group
      if (child.exitCode !== null || child.signalCode !== null) {
        settleTimeout();
      }
    }, options.timeoutMs);

    child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.once('error', (error) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      // A spawned child that errors later is still ours to kill
      killTree(child);
      resolve({ kind: 'launch-error', message: error.message });
    });

    function settleTimeout(): void {
      settled = true;
      clearTimeout(timer);
      // A detached grandchild can hold the pipes open long after the kill
      child.stdout?.destroy();
      child.stderr?.destroy();
      resolve({
        kind: 'timeout',
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        pid: child.pid,
      });
    }

    // 'close' waits for every pipe holder; after a timeout kill only the
    // direct child's exit counts
    child.once('exit', () => {
      if (!settled && timedOut) {
        settleTimeout();
      }
    });

    child.once('close', (exitCode, signal) => {
      if (settled) {
        return;
      }
      if (timedOut) {
        settleTimeout();
        return;
      }
      settled = true;
      clearTimeout(timer);

      resolve({
        kind: 'exited',
        exitCode,
        signal,
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        pid: child.pid,
      });
    });
  });
}
