/**
 * Fixture provisioning.
 *
 * A `FixtureContext` holds the process-scoped state: port claims, the shared
 * instance registry and every handle not yet released. Most callers use the
 * default context through `createFixture()` / `withFixture()`; it is created
 * on first use and reaped when the process exits.
 */

import { resolveBinary } from './binary.js';
import { loadEnvConfig, parseExternalUrl, type InstanceOptions } from './config.js';
import { ADMIN_DATABASE, formatConnectionUrl, parseConnectionUrl, toTarget } from './connection.js';
import { generateFixtureCredentials } from './credentials.js';
import { ExternalDbHandle, LocalDbHandle, type BaseDbHandle, type DbHandle } from './handle.js';
import { startInstance } from './launcher.js';
import { createLogger } from './logger.js';
import { PortAllocator } from './port.js';
import { nodeCommandRunner, type CommandRunner } from './process.js';
import { runPsql } from './psql.js';
import { SharedInstanceRegistry } from './registry.js';
import { createDatabaseStatement, createRoleStatement } from './statements.js';

const logger = createLogger('fixture');

export interface FixtureContextOptions {
  /** Environment for `PGFIXTURE_*` settings and child processes (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Caller options, applied over the environment's */
  instance?: InstanceOptions;
  runner?: CommandRunner;
  ports?: PortAllocator;
}

export class FixtureContext {
  readonly ports: PortAllocator;
  readonly registry: SharedInstanceRegistry;
  private readonly env: NodeJS.ProcessEnv;
  private readonly runner: CommandRunner;
  private readonly instanceOptions: InstanceOptions;
  private readonly handles = new Set<BaseDbHandle>();

  constructor(options: FixtureContextOptions = {}) {
    this.env = options.env ?? process.env;
    this.runner = options.runner ?? nodeCommandRunner;
    this.ports = options.ports ?? new PortAllocator();
    this.instanceOptions = { ...loadEnvConfig(this.env), ...options.instance };
    this.registry = new SharedInstanceRegistry(() =>
      startInstance(this.instanceOptions, { runner: this.runner, ports: this.ports, env: this.env })
    );
  }

  /** Handles created by this context and not yet released. */
  get outstanding(): number {
    return this.handles.size;
  }

  /**
   * Creates a fresh database and login role for one caller.
   *
   * With `PGFIXTURE_TESTS_URL` set, they are created on that server; otherwise
   * on the shared local instance, which is started if none is running.
   */
  async createFixture(): Promise<DbHandle> {
    const adminUrl = parseExternalUrl(this.env);
    const handle = adminUrl ? await this.createExternal(adminUrl) : await this.createLocal();
    this.handles.add(handle);
    logger.debug({ kind: handle.kind, database: handle.database }, 'Fixture created');
    return handle;
  }

  /** Runs `fn` with a fresh fixture and always releases it afterwards. */
  async withFixture<T>(fn: (db: DbHandle) => T | Promise<T>): Promise<T> {
    const db = await this.createFixture();
    try {
      return await fn(db);
    } finally {
      await db.release();
    }
  }

  /** Releases every outstanding handle. */
  async shutdown(): Promise<void> {
    await Promise.all([...this.handles].map((handle) => handle.release()));
  }

  /**
   * Last-resort cleanup from a process `exit` handler: drops outstanding
   * external fixtures and kills the shared instance, all synchronously.
   */
  reapSync(): void {
    if (this.handles.size > 0) {
      logger.warn({ count: this.handles.size }, 'Fixtures were not released before exit');
    }
    for (const handle of [...this.handles]) {
      handle.releaseSync();
    }
    this.registry.reapSync();
  }

  private readonly forget = (handle: BaseDbHandle): void => {
    this.handles.delete(handle);
  };

  private async createLocal(): Promise<LocalDbHandle> {
    const lease = await this.registry.acquire();
    const creds = generateFixtureCredentials();
    try {
      const su = lease.instance.asSuperuser();
      await su.createUser(creds.user, creds.password);
      await su.createDatabase(creds.database, creds.user);
    } catch (error) {
      await lease.release();
      throw error;
    }
    const url = lease.instance.asUser(creds.user, creds.password).url(creds.database);
    return new LocalDbHandle(url, lease, this.forget);
  }

  private async createExternal(adminUrl: URL): Promise<ExternalDbHandle> {
    const admin = parseConnectionUrl(adminUrl);
    const creds = generateFixtureCredentials();
    const url = formatConnectionUrl({ host: admin.host, port: admin.port, ...creds });
    const cleanup = { runner: this.runner, env: this.env, psqlBinary: this.instanceOptions.psqlBinary };
    const handle = new ExternalDbHandle(url, formatConnectionUrl(admin), cleanup, this.forget);

    const psql = resolveBinary('psql', this.instanceOptions.psqlBinary, this.env);
    const target = toTarget(admin);
    const statements = [
      createRoleStatement(creds.user, creds.password),
      createDatabaseStatement(creds.database, creds.user),
    ];
    try {
      for (const sql of statements) {
        await runPsql(this.runner, psql, target, ADMIN_DATABASE, { sql }, this.env);
      }
    } catch (error) {
      // Undo whatever part got created.
      await handle.release();
      throw error;
    }
    return handle;
  }
}

let defaultContext: FixtureContext | null = null;

/** The process-wide context, created on first use and reaped at exit. */
export function getDefaultContext(): FixtureContext {
  if (defaultContext === null) {
    const context = new FixtureContext();
    process.once('exit', () => context.reapSync());
    defaultContext = context;
  }
  return defaultContext;
}

export async function createFixture(): Promise<DbHandle> {
  return getDefaultContext().createFixture();
}

export async function withFixture<T>(fn: (db: DbHandle) => T | Promise<T>): Promise<T> {
  return getDefaultContext().withFixture(fn);
}
