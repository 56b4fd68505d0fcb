import { ADMIN_DATABASE, formatConnectionUrl } from './connection.js';
import type { Instance } from './instance.js';
import { runPsql, psqlArgs } from './psql.js';
import { createDatabaseStatement, createRoleStatement } from './statements.js';
import type { ConnectionInfo, ConnectionTarget, Credentials } from './types.js';

/**
 * A set of credentials bound to a running instance.
 *
 * Creating a client does no I/O; every command is a separate `psql` run.
 */
export class Client {
  constructor(
    readonly instance: Instance,
    private readonly credentials: Credentials
  ) {}

  get user(): string {
    return this.credentials.user;
  }

  /** URL with this client's credentials against the administrative database. */
  get clientUrl(): string {
    return this.url(ADMIN_DATABASE);
  }

  url(database: string): string {
    return formatConnectionUrl(this.getPgConfig(database));
  }

  getPgConfig(database: string): ConnectionInfo {
    return { ...this.target, database, ssl: false };
  }

  /** Arguments psql needs to reach `database` as this client (password excluded). */
  psqlArgs(database: string): string[] {
    return psqlArgs(this.target, database);
  }

  async runSql(database: string, sql: string): Promise<void> {
    await runPsql(this.instance.runner, this.instance.psqlBinary, this.target, database, { sql }, this.instance.env);
  }

  async loadSql(database: string, file: string): Promise<void> {
    await runPsql(this.instance.runner, this.instance.psqlBinary, this.target, database, { file }, this.instance.env);
  }

  /** Creates a login role. Usually needs superuser credentials. */
  async createUser(user: string, password: string): Promise<void> {
    await this.runSql(ADMIN_DATABASE, createRoleStatement(user, password));
  }

  /** Creates a database owned by `owner`. Usually needs superuser credentials. */
  async createDatabase(database: string, owner: string): Promise<void> {
    await this.runSql(ADMIN_DATABASE, createDatabaseStatement(database, owner));
  }

  private get target(): ConnectionTarget {
    return {
      host: this.instance.host,
      port: this.instance.port,
      user: this.credentials.user,
      password: this.credentials.password,
    };
  }
}
