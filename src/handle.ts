import { findBinary } from './binary.js';
import { ADMIN_DATABASE, parseConnectionUrl, toTarget } from './connection.js';
import { createLogger } from './logger.js';
import type { CommandRunner } from './process.js';
import { runPsql, runPsqlSync } from './psql.js';
import type { SharedInstance } from './registry.js';
import { dropStatements } from './statements.js';
import type { ConnectionInfo } from './types.js';

const logger = createLogger('handle');

export type DbHandleKind = 'local' | 'external';

/**
 * Ownership of one fixture database. `release()` tears it down exactly once,
 * however often it is called or wherever the handle was passed around.
 */
export abstract class BaseDbHandle {
  abstract readonly kind: DbHandleKind;
  private releasing: Promise<void> | null = null;

  constructor(
    readonly url: string,
    private readonly onRelease: (handle: BaseDbHandle) => void = () => {}
  ) {}

  get connectionString(): string {
    return this.url;
  }

  /** node-postgres compatible connection config. */
  get config(): ConnectionInfo {
    return parseConnectionUrl(this.url);
  }

  get database(): string {
    return this.config.database;
  }

  get user(): string {
    return this.config.user;
  }

  get released(): boolean {
    return this.releasing !== null;
  }

  /** Never rejects. */
  release(): Promise<void> {
    if (this.releasing === null) {
      this.releasing = this.teardown().catch((error: unknown) => {
        logger.warn({ err: error, kind: this.kind }, 'Fixture release failed');
      });
      this.onRelease(this);
    }
    return this.releasing;
  }

  /** Synchronous release for process `exit` handlers. */
  releaseSync(): void {
    if (this.releasing !== null) return;
    this.releasing = Promise.resolve();
    this.onRelease(this);
    try {
      this.teardownSync();
    } catch (error) {
      logger.warn({ err: error, kind: this.kind }, 'Fixture release failed');
    }
  }

  toString(): string {
    return this.url;
  }

  protected abstract teardown(): Promise<void>;
  protected abstract teardownSync(): void;
}

/**
 * A fixture on a shared local instance. The database and role are not dropped
 * individually; they go away with the instance.
 */
export class LocalDbHandle extends BaseDbHandle {
  readonly kind = 'local' as const;

  constructor(
    url: string,
    readonly lease: SharedInstance,
    onRelease?: (handle: BaseDbHandle) => void
  ) {
    super(url, onRelease);
  }

  protected async teardown(): Promise<void> {
    await this.lease.release();
  }

  protected teardownSync(): void {
    this.lease.releaseSync();
  }
}

export interface ExternalCleanup {
  runner: CommandRunner;
  env: NodeJS.ProcessEnv;
  /** Configured psql; looked up afresh on PATH when unset. */
  psqlBinary?: string;
}

/**
 * A fixture on an externally managed server. Release drops the database and
 * role through the admin URL, best-effort.
 */
export class ExternalDbHandle extends BaseDbHandle {
  readonly kind = 'external' as const;

  constructor(
    url: string,
    readonly adminUrl: string,
    private readonly cleanup: ExternalCleanup,
    onRelease?: (handle: BaseDbHandle) => void
  ) {
    super(url, onRelease);
  }

  protected async teardown(): Promise<void> {
    const { runner, env } = this.cleanup;
    const psql = this.psqlBinary();
    const admin = toTarget(parseConnectionUrl(this.adminUrl));

    for (const sql of dropStatements(this.database, this.user)) {
      try {
        await runPsql(runner, psql, admin, ADMIN_DATABASE, { sql }, env);
      } catch (error) {
        logger.warn({ err: error, sql }, 'Fixture cleanup statement failed');
      }
    }
  }

  protected teardownSync(): void {
    const { runner, env } = this.cleanup;
    const psql = this.psqlBinary();
    const admin = toTarget(parseConnectionUrl(this.adminUrl));

    for (const sql of dropStatements(this.database, this.user)) {
      const result = runPsqlSync(runner, psql, admin, ADMIN_DATABASE, { sql }, env);
      if (result.error || result.code !== 0) {
        logger.warn({ err: result.error, code: result.code, sql }, 'Fixture cleanup statement failed');
      }
    }
  }

  private psqlBinary(): string {
    return this.cleanup.psqlBinary ?? findBinary('psql', this.cleanup.env) ?? 'psql';
  }
}

export type DbHandle = LocalDbHandle | ExternalDbHandle;
