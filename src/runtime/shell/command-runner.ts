/**
 * Command Runner - shell command execution with a hard deadline.
 *
 * Commands run through `sh -c` in their own process group so a timeout can
 * take down the whole tree: SIGTERM first, SIGKILL after the grace period.
 * stdout and stderr are captured separately and capped.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { stat } from 'node:fs/promises';
import { ExecutionError, NotADirectoryError, fromFsError } from '../../gateway/errors.js';

export interface CommandOptions {
  /** Working directory; must exist */
  cwd: string;
  timeoutMs: number;
  /** Time between SIGTERM and SIGKILL (default: 2000) */
  killGraceMs?: number | undefined;
  /** Cap per stream in bytes (default: 1 MiB) */
  maxOutputBytes?: number | undefined;
  env?: NodeJS.ProcessEnv | undefined;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  /** null when the process was ended by a signal */
  exit_code: number | null;
  signal: string | null;
  timed_out: boolean;
  duration_ms: number;
  /** Either stream hit the output cap */
  truncated: boolean;
}

export const DEFAULT_KILL_GRACE_MS = 2000;
export const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;

/** Wait after SIGKILL for the pipes to close before settling anyway */
const DRAIN_MARGIN_MS = 500;

/**
 * Collects one output stream up to a byte cap.
 */
class CappedOutput {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

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
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

/**
 * Signal the child's process group, falling back to the child alone.
 */
function signalGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, signal);
  } catch {
    // group already reaped; the direct child may still be around
    child.kill(signal);
  }
}

async function assertDirectory(cwd: string): Promise<void> {
  try {
    const stats = await stat(cwd);
    if (!stats.isDirectory()) {
      throw new NotADirectoryError(cwd);
    }
  } catch (error) {
    throw fromFsError(error, cwd, 'list');
  }
}

/**
 * Run `command` and resolve with its captured result.
 *
 * A non-zero exit is a normal result. Rejects with ExecutionError only when
 * the shell cannot be started. Settles no later than
 * timeout + grace + a short drain margin.
 */
export async function runCommand(command: string, options: CommandOptions): Promise<CommandResult> {
  await assertDirectory(options.cwd);

  const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
  const maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
  const stdout = new CappedOutput(maxOutputBytes);
  const stderr = new CappedOutput(maxOutputBytes);
  const startTime = Date.now();

  return new Promise<CommandResult>((resolve, reject) => {
    let settled = false;
    let timedOut = false;
    let exitCode: number | null = null;
    let exitSignal: string | null = null;
    const timers: NodeJS.Timeout[] = [];

    let child: ChildProcess;
    try {
      child = spawn('sh', ['-c', command], {
        cwd: options.cwd,
        env: options.env ?? process.env,
        detached: true,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      reject(new ExecutionError(`failed to start command: ${reason}`));
      return;
    }

    const finish = (): void => {
      if (settled) return;
      settled = true;
      for (const timer of timers) clearTimeout(timer);
      resolve({
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        exit_code: exitCode,
        signal: exitSignal,
        timed_out: timedOut,
        duration_ms: Date.now() - startTime,
        truncated: stdout.truncated || stderr.truncated,
      });
    };

    child.stdout?.on('data', (chunk: Buffer) => {
      stdout.push(chunk);
    });
    child.stderr?.on('data', (chunk: Buffer) => {
      stderr.push(chunk);
    });

    child.on('error', (error) => {
      if (settled) return;
      if (child.pid === undefined) {
        settled = true;
        for (const timer of timers) clearTimeout(timer);
        reject(new ExecutionError(`failed to start command: ${error.message}`));
      }
    });

    child.on('exit', (code, signal) => {
      exitCode = code;
      exitSignal = signal;
    });

    child.on('close', (code, signal) => {
      exitCode = code;
      exitSignal = signal;
      finish();
    });

    timers.push(
      setTimeout(() => {
        timedOut = true;
        signalGroup(child, 'SIGTERM');

        timers.push(
          setTimeout(() => {
            signalGroup(child, 'SIGKILL');

            // a detached descendant can hold the pipes open past the kill
            timers.push(
              setTimeout(() => {
                child.stdout?.destroy();
                child.stderr?.destroy();
                finish();
              }, DRAIN_MARGIN_MS)
            );
          }, killGraceMs)
        );
      }, options.timeoutMs)
    );
  });
}
