import { spawn, spawnSync } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import type { Readable } from 'node:stream';

export interface ExecOptions {
  env?: NodeJS.ProcessEnv;
}

export interface ExecResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export interface SyncExecResult extends ExecResult {
  /** Set when the program could not be launched at all. */
  error?: Error;
}

/** The subset of `ChildProcess` a supervised server needs. */
export interface ChildHandle extends EventEmitter {
  readonly pid?: number;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
}

/**
 * Seam over `node:child_process`. `exec` rejects only when the program cannot
 * be launched; a non-zero exit is reported through `code`.
 */
export interface CommandRunner {
  exec(file: string, args: readonly string[], options?: ExecOptions): Promise<ExecResult>;
  execSync(file: string, args: readonly string[], options?: ExecOptions): SyncExecResult;
  spawn(file: string, args: readonly string[], options?: ExecOptions): ChildHandle;
}

export const nodeCommandRunner: CommandRunner = {
  exec(file, args, options = {}) {
    return new Promise<ExecResult>((resolve, reject) => {
      const child = spawn(file, args, {
        env: options.env ?? process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      child.stdout.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      child.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      child.once('error', reject);
      child.once('close', (code, signal) => {
        resolve({ code, signal, stdout, stderr });
      });
    });
  },

  execSync(file, args, options = {}) {
    const result = spawnSync(file, args, {
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      encoding: 'utf-8',
    });
    return {
      code: result.status,
      signal: result.signal,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      error: result.error,
    };
  },

  spawn(file, args, options = {}) {
    // stdout is unused by postgres; stderr carries its log and must be drained.
    return spawn(file, args, {
      env: options.env ?? process.env,
      stdio: ['ignore', 'ignore', 'pipe'],
    });
  },
};

const STDERR_LIMIT = 64 * 1024;

export interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/** Resolves `true` if `promise` settles within `ms`, `false` otherwise. */
async function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([promise.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Owns a spawned child. `stop()` asks it to terminate (SIGTERM), waits up to
 * the grace period, then forces it (SIGKILL). Stopping happens at most once.
 */
export class GracefulProcess {
  readonly exit: Promise<ExitInfo>;
  private exitInfo: ExitInfo | null = null;
  private launchError: Error | null = null;
  private stderrOutput = '';
  private stopping: Promise<void> | null = null;

  constructor(
    private readonly child: ChildHandle,
    private readonly gracePeriod: number
  ) {
    this.child.stderr?.on('data', (chunk: Buffer) => {
      this.stderrOutput = (this.stderrOutput + chunk.toString()).slice(-STDERR_LIMIT);
    });

    this.exit = new Promise<ExitInfo>((resolve) => {
      const settle = (info: ExitInfo): void => {
        if (this.exitInfo === null) {
          this.exitInfo = info;
          resolve(info);
        }
      };
      if (child.exitCode !== null || child.signalCode !== null) {
        settle({ code: child.exitCode, signal: child.signalCode });
      }
      child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        settle({ code, signal });
      });
      // A child that failed to spawn never emits 'exit'.
      child.once('error', (err: Error) => {
        if (child.pid === undefined) {
          this.launchError = err;
          settle({ code: null, signal: null });
        }
      });
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get exited(): boolean {
    return this.exitInfo !== null;
  }

  get exitStatus(): ExitInfo | null {
    return this.exitInfo;
  }

  get spawnError(): Error | null {
    return this.launchError;
  }

  get stderr(): string {
    return this.stderrOutput;
  }

  stop(): Promise<void> {
    if (this.stopping === null) {
      this.stopping = this.terminate();
    }
    return this.stopping;
  }

  /** Immediate SIGKILL, for synchronous teardown at process exit. */
  killSync(): void {
    if (this.exited) return;
    try {
      this.child.kill('SIGKILL');
    } catch {
      // Exited in the meantime.
    }
  }

  private async terminate(): Promise<void> {
    if (this.exited) return;

    this.signal('SIGTERM');
    if (await settlesWithin(this.exit, this.gracePeriod)) return;

    this.signal('SIGKILL');
    await settlesWithin(this.exit, this.gracePeriod);
  }

  private signal(signal: NodeJS.Signals): void {
    try {
      this.child.kill(signal);
    } catch {
      // Exited in the meantime.
    }
  }
}
