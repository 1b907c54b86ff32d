import { execFile, spawn } from 'child_process';

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface ProcessOutcome extends ProcessExit {
  stdout: string;
  stderr: string;
}

/**
 * Handle on a launched child. `spawned` rejects with the spawn error; `exited`
 * and `closed` never reject.
 */
export interface LaunchedProcess {
  readonly pid: number | undefined;
  readonly spawned: Promise<void>;
  readonly exited: Promise<ProcessExit>;
  /** Settles after exit and once both output pipes have drained */
  readonly closed: Promise<ProcessOutcome>;
  kill(signal: NodeJS.Signals): boolean;
}

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
  error?: Error;
}

export interface LaunchOptions {
  /** Tail of each output stream kept in memory */
  outputLimitBytes: number;
}

export interface ProcessRunner {
  launch(file: string, args: readonly string[], options: LaunchOptions): LaunchedProcess;
  run(file: string, args: readonly string[], options: { timeoutMs: number }): Promise<CommandResult>;
  signal(pid: number, signal: NodeJS.Signals): boolean;
}

/**
 * Last `limit` bytes of a stream. Chunks stay raw and are decoded once, so a
 * character split across chunks survives.
 */
export class OutputTail {
  private chunks: Buffer[] = [];
  private bytes = 0;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer | string): void {
    const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    this.chunks.push(buffer);
    this.bytes += buffer.length;

    while (this.bytes > this.limit && this.chunks.length > 0) {
      const excess = this.bytes - this.limit;
      const head = this.chunks[0];
      if (head.length <= excess) {
        this.chunks.shift();
        this.bytes -= head.length;
      } else {
        this.chunks[0] = head.subarray(excess);
        this.bytes -= excess;
      }
    }
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export const hiddenProcessRunner: ProcessRunner = {
  launch(file, args, options) {
    const child = spawn(file, [...args], {
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true
    });

    const stdout = new OutputTail(options.outputLimitBytes);
    const stderr = new OutputTail(options.outputLimitBytes);
    child.stdout?.on('data', (data: Buffer) => stdout.push(data));
    child.stderr?.on('data', (data: Buffer) => stderr.push(data));

    const spawned = new Promise<void>((resolve, reject) => {
      child.once('spawn', () => resolve());
      child.once('error', (err) => reject(err));
    });

    const exited = new Promise<ProcessExit>((resolve) => {
      child.once('exit', (code, signal) => resolve({ code, signal }));
      // A failed spawn emits 'error' without 'exit'
      child.once('error', () => resolve({ code: child.exitCode, signal: null }));
    });

    const closed = new Promise<ProcessOutcome>((resolve) => {
      child.once('close', (code, signal) =>
        resolve({ code, signal, stdout: stdout.toString(), stderr: stderr.toString() })
      );
    });

    return {
      get pid() {
        return child.pid;
      },
      spawned,
      exited,
      closed,
      kill: (signal) => child.kill(signal)
    };
  },

  run(file, args, options) {
    return new Promise((resolve) => {
      execFile(
        file,
        [...args],
        { timeout: options.timeoutMs, windowsHide: true, encoding: 'utf8' },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ code: 0, stdout, stderr });
            return;
          }
          const code = typeof error.code === 'number' ? error.code : null;
          resolve({ code, stdout, stderr, error: toError(error) });
        }
      );
    });
  },

  signal(pid, signal) {
    try {
      return process.kill(pid, signal);
    } catch {
      // ESRCH: already gone
      return false;
    }
  }
};

/**
 * Direct children of `parentPid` (POSIX only). Empty when there are none or
 * pgrep is unavailable.
 */
export async function listChildPids(runner: ProcessRunner, parentPid: number): Promise<number[]> {
  const result = await runner.run('pgrep', ['-P', String(parentPid)], { timeoutMs: 2000 });
  return result.stdout
    .split('\n')
    .map((line) => Number.parseInt(line.trim(), 10))
    .filter((pid) => Number.isInteger(pid) && pid > 0);
}
