import { rmSync } from 'node:fs';
import { rm } from 'node:fs/promises';
import { EventEmitter } from 'node:events';
import { Client } from './client.js';
import { ADMIN_DATABASE, formatConnectionUrl } from './connection.js';
import { createLogger } from './logger.js';
import type { CommandRunner, GracefulProcess } from './process.js';
import type { ConnectionInfo, Credentials } from './types.js';

const logger = createLogger('instance');

export interface InstanceInit {
  host: string;
  port: number;
  superuser: Credentials;
  psqlBinary: string;
  tmpDir: string;
  dataDir: string;
  server: GracefulProcess;
  runner: CommandRunner;
  env: NodeJS.ProcessEnv;
  /** Called once teardown has finished, e.g. to give the port claim back. */
  onStopped?: () => void;
}

/**
 * A running postgres server owned by this process.
 *
 * Stopping it terminates the server and removes its temporary directory.
 * Emits `exit` (code, signal) if the server dies without `stop()` being called.
 */
export class Instance extends EventEmitter {
  readonly host: string;
  readonly port: number;
  readonly superuser: Credentials;
  readonly psqlBinary: string;
  readonly tmpDir: string;
  readonly dataDir: string;
  readonly runner: CommandRunner;
  readonly env: NodeJS.ProcessEnv;
  private readonly server: GracefulProcess;
  private readonly onStopped: () => void;
  private stopping: Promise<void> | null = null;
  private finished = false;

  constructor(init: InstanceInit) {
    super();
    this.host = init.host;
    this.port = init.port;
    this.superuser = init.superuser;
    this.psqlBinary = init.psqlBinary;
    this.tmpDir = init.tmpDir;
    this.dataDir = init.dataDir;
    this.server = init.server;
    this.runner = init.runner;
    this.env = init.env;
    this.onStopped = init.onStopped ?? (() => {});

    void this.server.exit.then(({ code, signal }) => {
      if (this.stopping === null) {
        logger.warn({ port: this.port, code, signal, stderr: this.server.stderr }, 'postgres exited unexpectedly');
        this.emit('exit', code, signal);
      }
    });
  }

  get pid(): number | undefined {
    return this.server.pid;
  }

  get running(): boolean {
    return this.stopping === null && !this.server.exited;
  }

  get stopped(): boolean {
    return this.stopping !== null;
  }

  /** Superuser URL pointing at the administrative `postgres` database. */
  get superuserUrl(): string {
    return formatConnectionUrl(this.getPgConfig());
  }

  getPgConfig(database: string = ADMIN_DATABASE): ConnectionInfo {
    return {
      host: this.host,
      port: this.port,
      user: this.superuser.user,
      password: this.superuser.password,
      database,
      ssl: false,
    };
  }

  asSuperuser(): Client {
    return new Client(this, this.superuser);
  }

  asUser(user: string, password: string): Client {
    return new Client(this, { user, password });
  }

  /** Terminates the server and removes the temporary directory. Runs once; never rejects. */
  stop(): Promise<void> {
    if (this.stopping === null) {
      this.stopping = this.teardown();
    }
    return this.stopping;
  }

  /** SIGKILL and synchronous cleanup, for use from a process `exit` handler. */
  stopSync(): void {
    if (this.stopping === null) {
      this.stopping = Promise.resolve();
    }
    this.server.killSync();
    try {
      rmSync(this.tmpDir, { recursive: true, force: true });
    } catch (error) {
      logger.warn({ err: error, dir: this.tmpDir }, 'Failed to remove temporary directory');
    }
    this.finish();
  }

  private async teardown(): Promise<void> {
    logger.debug({ port: this.port, pid: this.pid }, 'Stopping postgres');
    await this.server.stop();
    try {
      await rm(this.tmpDir, { recursive: true, force: true });
    } catch (error) {
      logger.warn({ err: error, dir: this.tmpDir }, 'Failed to remove temporary directory');
    }
    this.finish();
    logger.debug({ port: this.port }, 'postgres stopped');
  }

  private finish(): void {
    if (this.finished) return;
    this.finished = true;
    this.onStopped();
  }
}
