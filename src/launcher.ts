import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { connect } from 'node:net';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { resolveBinary } from './binary.js';
import { resolveInstanceConfig, type InstanceConfig, type InstanceOptions } from './config.js';
import { randomHex } from './credentials.js';
import {
  DataDirectoryError,
  InitDbFailedError,
  InitDbLaunchError,
  PasswordFileError,
  ServerLaunchError,
  StartupTimeoutError,
} from './errors.js';
import { Instance } from './instance.js';
import { createLogger } from './logger.js';
import { PortAllocator } from './port.js';
import { GracefulProcess, nodeCommandRunner, type ChildHandle, type CommandRunner, type ExecResult } from './process.js';

const logger = createLogger('launcher');

/** Ports claimed by instances started without an explicit allocator. */
export const defaultPortAllocator = new PortAllocator();

export interface LaunchEnvironment {
  runner?: CommandRunner;
  ports?: PortAllocator;
  env?: NodeJS.ProcessEnv;
}

export const TMP_PREFIX = 'pgfixture-';
export const PASSWORD_FILE = 'superuser-pw';

export function initdbArgs(dataDir: string, passwordFile: string, superuser: string): string[] {
  return [
    // No default locale (== 'C').
    '--no-locale',
    // Require a password for all users.
    '--auth=md5',
    '--encoding=UTF8',
    // Skip fsync; the data is thrown away anyway.
    '--nosync',
    '--pgdata',
    dataDir,
    '--pwfile',
    passwordFile,
    '--username',
    superuser,
  ];
}

export function postgresArgs(dataDir: string, port: number, socketDir: string): string[] {
  return ['-D', dataDir, '-p', String(port), '-k', socketDir];
}

/** One TCP connect attempt. */
function probe(host: string, port: number, timeout: number): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = connect({ host, port });
    const finish = (accepted: boolean): void => {
      socket.destroy();
      resolve(accepted);
    };
    socket.setTimeout(timeout, () => finish(false));
    socket.once('connect', () => finish(true));
    socket.once('error', () => finish(false));
  });
}

async function waitForReady(server: GracefulProcess, config: InstanceConfig, port: number): Promise<void> {
  const started = Date.now();
  const connectTimeout = Math.max(config.probeInterval, 1_000);

  while (true) {
    const spawnError = server.spawnError;
    if (spawnError) {
      throw new ServerLaunchError(`Failed to launch postgres: ${spawnError.message}`, server.stderr, {
        cause: spawnError,
      });
    }
    const status = server.exitStatus;
    if (status) {
      const how = status.signal ? `signal ${status.signal}` : `code ${status.code}`;
      throw new ServerLaunchError(`postgres exited with ${how} during startup`, server.stderr);
    }

    if (await probe(config.host, port, connectTimeout)) return;

    if (Date.now() - started >= config.startupTimeout) {
      throw new StartupTimeoutError(config.startupTimeout, server.stderr);
    }
    await sleep(config.probeInterval);
  }
}

async function runInitdb(runner: CommandRunner, initdb: string, args: string[], env: NodeJS.ProcessEnv): Promise<void> {
  let result: ExecResult;
  try {
    result = await runner.exec(initdb, args, { env });
  } catch (error) {
    throw new InitDbLaunchError({ cause: error });
  }
  if (result.code !== 0) {
    throw new InitDbFailedError(result.code, result.signal, result.stderr);
  }
}

/**
 * Starts a postgres server in a fresh temporary directory.
 *
 * Resolves only once the server accepts TCP connections. On failure everything
 * set up so far (process, directory, port claim) is undone before rejecting.
 */
export async function startInstance(
  options: InstanceOptions = {},
  environment: LaunchEnvironment = {}
): Promise<Instance> {
  const config = resolveInstanceConfig(options);
  const runner = environment.runner ?? nodeCommandRunner;
  const ports = environment.ports ?? defaultPortAllocator;
  const env = environment.env ?? process.env;

  const port = await ports.allocate(config.port, config.reusePort);
  // Only a requested port can be reused unclaimed; an allocated one is always claimed.
  const claimed = config.port === undefined || !config.reusePort;
  const releasePort = (): void => {
    if (claimed) ports.release(port);
  };

  let tmpDir: string | undefined;
  let server: GracefulProcess | undefined;

  try {
    const postgres = resolveBinary('postgres', config.postgresBinary, env);
    const initdb = resolveBinary('initdb', config.initdbBinary, env);
    const psql = resolveBinary('psql', config.psqlBinary, env);

    try {
      tmpDir = await mkdtemp(join(tmpdir(), TMP_PREFIX));
    } catch (error) {
      throw new DataDirectoryError({ cause: error });
    }
    const dataDir = config.dataDir ?? join(tmpDir, 'db');

    const password = config.superuserPassword ?? randomHex();
    const passwordFile = join(tmpDir, PASSWORD_FILE);
    try {
      await writeFile(passwordFile, password, { mode: 0o600 });
    } catch (error) {
      throw new PasswordFileError(passwordFile, { cause: error });
    }

    logger.debug({ dataDir, superuser: config.superuser }, 'Running initdb');
    await runInitdb(runner, initdb, initdbArgs(dataDir, passwordFile, config.superuser), env);

    let child: ChildHandle;
    try {
      child = runner.spawn(postgres, postgresArgs(dataDir, port, tmpDir), { env });
    } catch (error) {
      throw new ServerLaunchError('Failed to launch postgres', undefined, { cause: error });
    }
    server = new GracefulProcess(child, config.shutdownTimeout);
    logger.debug({ port, pid: server.pid }, 'Spawned postgres');

    await waitForReady(server, config, port);
    logger.debug({ host: config.host, port }, 'Server ready');

    return new Instance({
      host: config.host,
      port,
      superuser: { user: config.superuser, password },
      psqlBinary: psql,
      tmpDir,
      dataDir,
      server,
      runner,
      env,
      onStopped: releasePort,
    });
  } catch (error) {
    logger.warn({ err: error, port }, 'Instance launch failed');
    if (server) {
      await server.stop();
    }
    if (tmpDir) {
      await rm(tmpDir, { recursive: true, force: true }).catch((rmError: unknown) => {
        logger.warn({ err: rmError, dir: tmpDir }, 'Failed to remove temporary directory');
      });
    }
    releasePort();
    throw error;
  }
}
