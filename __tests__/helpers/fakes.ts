import { EventEmitter } from 'node:events';
import { createServer, type Server, type Socket } from 'node:net';
import { basename } from 'node:path';
import { PassThrough } from 'node:stream';
import { Instance, type InstanceInit } from '../../src/instance.js';
import {
  GracefulProcess,
  type ChildHandle,
  type CommandRunner,
  type ExecOptions,
  type ExecResult,
  type SyncExecResult,
} from '../../src/process.js';

export const BIN_DIR = '/opt/pgfixture-test/bin';

/** Instance options pointing at binaries only the fake runner knows about. */
export const fakeBinaries = {
  initdbBinary: `${BIN_DIR}/initdb`,
  postgresBinary: `${BIN_DIR}/postgres`,
  psqlBinary: `${BIN_DIR}/psql`,
};

export type ServerBehavior =
  /** Listens on the `-p` port, like a healthy postmaster. */
  | 'listen'
  /** Runs but never accepts connections. */
  | 'silent'
  /** Exits with code 1 right after starting. */
  | 'crash'
  /** Fails to spawn (ENOENT). */
  | 'enoent';

export interface RecordedCall {
  program: string;
  file: string;
  args: string[];
  env: NodeJS.ProcessEnv;
}

let nextPid = 40_000;

export class FakeChild extends EventEmitter implements ChildHandle {
  pid: number | undefined = nextPid++;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  readonly stderr = new PassThrough();
  readonly signals: NodeJS.Signals[] = [];
  ignoreSigterm = false;
  private server: Server | null = null;
  private readonly sockets = new Set<Socket>();
  private done = false;

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.signals.push(signal);
    if (signal === 'SIGTERM' && this.ignoreSigterm) return true;
    this.exitWith(null, signal);
    return true;
  }

  listen(port: number, host: string): void {
    const server = createServer((socket) => {
      this.sockets.add(socket);
      socket.on('close', () => this.sockets.delete(socket));
      socket.destroy();
    });
    // Port taken: the probe keeps failing and the launch times out.
    server.on('error', (error) => this.stderr.write(`${error.message}\n`));
    server.listen(port, host);
    this.server = server;
  }

  failToSpawn(): void {
    this.pid = undefined;
    setImmediate(() => {
      const error = Object.assign(new Error('spawn postgres ENOENT'), { code: 'ENOENT' });
      this.emit('error', error);
    });
  }

  exitWith(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.done) return;
    this.done = true;
    for (const socket of this.sockets) socket.destroy();
    this.server?.close();
    this.server = null;
    setImmediate(() => {
      this.exitCode = code;
      this.signalCode = signal;
      this.emit('exit', code, signal);
    });
  }
}

const ok: ExecResult = { code: 0, signal: null, stdout: '', stderr: '' };

export interface FakeRunnerOptions {
  server?: ServerBehavior;
  /** Overrides the result of `exec`; throw to simulate a launch failure. */
  exec?: (call: RecordedCall) => ExecResult | Promise<ExecResult>;
}

export function argAfter(args: readonly string[], flag: string): string {
  const index = args.indexOf(flag);
  const value = index >= 0 ? args[index + 1] : undefined;
  if (value === undefined) throw new Error(`missing ${flag} in ${args.join(' ')}`);
  return value;
}

/** Records every invocation; `postgres` becomes an in-process TCP listener. */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  readonly syncCalls: RecordedCall[] = [];
  readonly children: FakeChild[] = [];
  server: ServerBehavior;

  constructor(private readonly options: FakeRunnerOptions = {}) {
    this.server = options.server ?? 'listen';
  }

  async exec(file: string, args: readonly string[], options: ExecOptions = {}): Promise<ExecResult> {
    const call = this.record(this.calls, file, args, options);
    return this.options.exec ? this.options.exec(call) : ok;
  }

  execSync(file: string, args: readonly string[], options: ExecOptions = {}): SyncExecResult {
    this.record(this.syncCalls, file, args, options);
    return ok;
  }

  spawn(file: string, args: readonly string[], options: ExecOptions = {}): ChildHandle {
    this.record(this.calls, file, args, options);
    const child = new FakeChild();
    this.children.push(child);

    switch (this.server) {
      case 'listen':
        child.listen(Number(argAfter(args, '-p')), '127.0.0.1');
        break;
      case 'crash':
        child.stderr.write('FATAL:  could not create lock file\n');
        child.exitWith(1, null);
        break;
      case 'enoent':
        child.failToSpawn();
        break;
      case 'silent':
        break;
    }
    return child;
  }

  /** Calls of one program, e.g. `psql`. */
  callsOf(program: string): RecordedCall[] {
    return this.calls.filter((call) => call.program === program);
  }

  /** The `-c` statements passed to psql, in order. */
  get statements(): string[] {
    return this.callsOf('psql').map((call) => argAfter(call.args, '-c'));
  }

  get syncStatements(): string[] {
    return this.syncCalls.filter((call) => call.program === 'psql').map((call) => argAfter(call.args, '-c'));
  }

  private record(
    into: RecordedCall[],
    file: string,
    args: readonly string[],
    options: ExecOptions
  ): RecordedCall {
    const call = { program: basename(file), file, args: [...args], env: options.env ?? {} };
    into.push(call);
    return call;
  }
}

export function failed(code: number, stderr = ''): ExecResult {
  return { code, signal: null, stdout: '', stderr };
}

/** An `Instance` around a fake child, without initdb or a listener. */
export function fakeInstance(runner: CommandRunner, init: Partial<InstanceInit> = {}): Instance {
  return new Instance({
    host: '127.0.0.1',
    port: 15432,
    superuser: { user: 'postgres', password: 'test-secret' },
    psqlBinary: fakeBinaries.psqlBinary,
    tmpDir: '/tmp/pgfixture-fake-instance',
    dataDir: '/tmp/pgfixture-fake-instance/db',
    server: new GracefulProcess(new FakeChild(), 50),
    runner,
    env: { PATH: '/usr/bin' },
    ...init,
  });
}
