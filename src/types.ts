export interface ConnectionInfo {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  ssl: false;
}

export interface Credentials {
  user: string;
  password: string;
}

/** Where psql connects to; the database is chosen per invocation. */
export interface ConnectionTarget extends Credentials {
  host: string;
  port: number;
}

export interface FixtureCredentials extends Credentials {
  database: string;
}
