export class PgFixtureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PgFixtureError';
  }
}

export class InvalidConfigError extends PgFixtureError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Invalid pgfixture configuration: ${message}`, options);
    this.name = 'InvalidConfigError';
  }
}

export class BinaryNotFoundError extends PgFixtureError {
  constructor(
    public readonly binary: string,
    public readonly searched: string[]
  ) {
    super(
      `${binary} binary not found. Searched:\n${searched.map((p) => `  - ${p}`).join('\n')}\n\nSet PGFIXTURE_POSTGRES_BIN or pass the ${binary}Binary option.`
    );
    this.name = 'BinaryNotFoundError';
  }
}

export class PortExhaustedError extends PgFixtureError {
  constructor(public readonly requested: number) {
    super(`No unclaimed port left after scanning from ${requested}`);
    this.name = 'PortExhaustedError';
  }
}

export class DataDirectoryError extends PgFixtureError {
  constructor(options?: { cause?: unknown }) {
    super('Could not create temporary directory for database', options);
    this.name = 'DataDirectoryError';
  }
}

export class PasswordFileError extends PgFixtureError {
  constructor(public readonly path: string, options?: { cause?: unknown }) {
    super(`Error writing temporary password file ${path}`, options);
    this.name = 'PasswordFileError';
  }
}

export class InitDbLaunchError extends PgFixtureError {
  constructor(options?: { cause?: unknown }) {
    super('Failed to run initdb', options);
    this.name = 'InitDbLaunchError';
  }
}

/** Shared shape for a subprocess that ran but did not exit cleanly. */
abstract class ExitStatusError extends PgFixtureError {
  constructor(
    program: string,
    public readonly exitCode: number | null,
    public readonly signal: NodeJS.Signals | null,
    public readonly stderr: string
  ) {
    super(
      signal
        ? `${program} was terminated by signal ${signal}`
        : `${program} exited with status ${exitCode}`
    );
  }
}

export class InitDbFailedError extends ExitStatusError {
  constructor(exitCode: number | null, signal: NodeJS.Signals | null, stderr: string) {
    super('initdb', exitCode, signal, stderr);
    this.name = 'InitDbFailedError';
  }
}

export class ServerLaunchError extends PgFixtureError {
  constructor(
    message: string,
    public readonly stderr?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ServerLaunchError';
  }
}

export class StartupTimeoutError extends PgFixtureError {
  constructor(
    public readonly timeout: number,
    public readonly stderr?: string
  ) {
    super(`postgres did not accept TCP connections within ${timeout}ms`);
    this.name = 'StartupTimeoutError';
  }
}

export class PsqlLaunchError extends PgFixtureError {
  constructor(options?: { cause?: unknown }) {
    super('Failed to run psql', options);
    this.name = 'PsqlLaunchError';
  }
}

export class PsqlFailedError extends ExitStatusError {
  constructor(exitCode: number | null, signal: NodeJS.Signals | null, stderr: string) {
    super('psql', exitCode, signal, stderr);
    this.name = 'PsqlFailedError';
  }
}

export type ExternalUrlProblem = 'parse' | 'scheme' | 'host' | 'username';

const EXTERNAL_URL_PROBLEMS: Record<ExternalUrlProblem, string> = {
  parse: 'not a valid URL',
  scheme: 'must use postgres:// scheme',
  host: 'must include a host',
  username: 'must include a username',
};

export class InvalidExternalUrlError extends PgFixtureError {
  constructor(
    public readonly reason: ExternalUrlProblem,
    options?: { cause?: unknown }
  ) {
    super(`Invalid PGFIXTURE_TESTS_URL: ${EXTERNAL_URL_PROBLEMS[reason]}`, options);
    this.name = 'InvalidExternalUrlError';
  }
}
