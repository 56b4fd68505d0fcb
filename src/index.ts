export { startInstance, defaultPortAllocator, initdbArgs, postgresArgs } from './launcher.js';
export type { LaunchEnvironment } from './launcher.js';
export { Instance } from './instance.js';
export { Client } from './client.js';
export { SharedInstanceRegistry, SharedInstance } from './registry.js';
export { BaseDbHandle, LocalDbHandle, ExternalDbHandle } from './handle.js';
export type { DbHandle, DbHandleKind } from './handle.js';
export { FixtureContext, createFixture, withFixture, getDefaultContext } from './fixture.js';
export type { FixtureContextOptions } from './fixture.js';
export { PortAllocator, findFreePort } from './port.js';
export { escapeIdent, escapeString } from './escape.js';
export { randomHex, generateFixtureCredentials } from './credentials.js';
export { resolveBinary, findBinary } from './binary.js';
export { resolveInstanceConfig, loadEnvConfig, parseExternalUrl, InstanceConfigSchema } from './config.js';
export type { InstanceOptions, InstanceConfig } from './config.js';
export { formatConnectionUrl, parseConnectionUrl, withDatabase, withCredentials } from './connection.js';
export { GracefulProcess, nodeCommandRunner } from './process.js';
export type { CommandRunner, ChildHandle, ExecResult, SyncExecResult } from './process.js';
export {
  PgFixtureError,
  InvalidConfigError,
  BinaryNotFoundError,
  PortExhaustedError,
  DataDirectoryError,
  PasswordFileError,
  InitDbLaunchError,
  InitDbFailedError,
  ServerLaunchError,
  StartupTimeoutError,
  PsqlLaunchError,
  PsqlFailedError,
  InvalidExternalUrlError,
} from './errors.js';
export type { ExternalUrlProblem } from './errors.js';
export type { ConnectionInfo, Credentials, FixtureCredentials } from './types.js';
