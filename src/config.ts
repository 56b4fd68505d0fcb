/**
 * Instance configuration and environment loading.
 *
 * Options are plain objects validated once, when an instance is started.
 * Every field has a documented default; only `superuserPassword` is filled in
 * lazily (a fresh random value per instance).
 */

import { join } from 'node:path';
import { z } from 'zod';
import { InvalidConfigError, InvalidExternalUrlError } from './errors.js';
import { LOG_LEVELS } from './logger.js';

const portSchema = z.number().int().min(1).max(65535);
const pathSchema = z.string().min(1);

export const InstanceConfigSchema = z.object({
  /** Data directory; defaults to `<tmp>/db` inside the instance's temporary directory */
  dataDir: pathSchema.optional(),
  /** Host to bind and probe (default: '127.0.0.1') */
  host: z.string().min(1).default('127.0.0.1'),
  /** Port to listen on; allocated when unset */
  port: portSchema.optional(),
  /** Superuser name (default: 'postgres') */
  superuser: z.string().min(1).default('postgres'),
  /** Superuser password; random when unset */
  superuserPassword: z.string().min(1).optional(),
  /** Explicit path to `initdb`, otherwise looked up on PATH */
  initdbBinary: pathSchema.optional(),
  /** Explicit path to `postgres`, otherwise looked up on PATH */
  postgresBinary: pathSchema.optional(),
  /** Explicit path to `psql`, otherwise looked up on PATH */
  psqlBinary: pathSchema.optional(),
  /** Delay between two readiness probes in milliseconds (default: 100) */
  probeInterval: z.number().int().positive().default(100),
  /** Time to wait for the server to accept connections in milliseconds (default: 10000) */
  startupTimeout: z.number().int().positive().default(10_000),
  /** Grace period between SIGTERM and SIGKILL on teardown in milliseconds (default: 5000) */
  shutdownTimeout: z.number().int().positive().default(5_000),
  /** Use the requested port even if another instance in this process claimed it */
  reusePort: z.boolean().default(false),
});

export type InstanceOptions = z.input<typeof InstanceConfigSchema>;
export type InstanceConfig = z.infer<typeof InstanceConfigSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function resolveInstanceConfig(options: InstanceOptions = {}): InstanceConfig {
  const result = InstanceConfigSchema.safeParse(options);
  if (!result.success) {
    throw new InvalidConfigError(describeIssues(result.error), { cause: result.error });
  }
  return result.data;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const EnvSchema = z.object({
  PGFIXTURE_POSTGRES_BIN: pathSchema.optional(),
  PGFIXTURE_HOST: z.string().min(1).optional(),
  PGFIXTURE_PORT: z.coerce.number().pipe(portSchema).optional(),
  PGFIXTURE_SUPERUSER: z.string().min(1).optional(),
  PGFIXTURE_SUPERUSER_PASSWORD: z.string().min(1).optional(),
  PGFIXTURE_PROBE_INTERVAL_MS: z.coerce.number().int().positive().optional(),
  PGFIXTURE_STARTUP_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  PGFIXTURE_SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  PGFIXTURE_REUSE_PORT: booleanFlag.optional(),
  PGFIXTURE_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  PGFIXTURE_TESTS_URL: z.string().min(1).optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

function parseEnv(env: NodeJS.ProcessEnv): EnvConfig {
  // An exported-but-empty variable counts as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('PGFIXTURE_') && value !== undefined && value !== '')
  );
  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    throw new InvalidConfigError(describeIssues(result.error), { cause: result.error });
  }
  return result.data;
}

/**
 * Reads instance options from `PGFIXTURE_*` variables. Unset variables are
 * left out so the schema defaults (or caller options) apply.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): InstanceOptions {
  const vars = parseEnv(env);
  const options: InstanceOptions = {};

  const binDir = vars.PGFIXTURE_POSTGRES_BIN;
  if (binDir !== undefined) {
    options.initdbBinary = join(binDir, 'initdb');
    options.postgresBinary = join(binDir, 'postgres');
    options.psqlBinary = join(binDir, 'psql');
  }
  if (vars.PGFIXTURE_HOST !== undefined) options.host = vars.PGFIXTURE_HOST;
  if (vars.PGFIXTURE_PORT !== undefined) options.port = vars.PGFIXTURE_PORT;
  if (vars.PGFIXTURE_SUPERUSER !== undefined) options.superuser = vars.PGFIXTURE_SUPERUSER;
  if (vars.PGFIXTURE_SUPERUSER_PASSWORD !== undefined) {
    options.superuserPassword = vars.PGFIXTURE_SUPERUSER_PASSWORD;
  }
  if (vars.PGFIXTURE_PROBE_INTERVAL_MS !== undefined) {
    options.probeInterval = vars.PGFIXTURE_PROBE_INTERVAL_MS;
  }
  if (vars.PGFIXTURE_STARTUP_TIMEOUT_MS !== undefined) {
    options.startupTimeout = vars.PGFIXTURE_STARTUP_TIMEOUT_MS;
  }
  if (vars.PGFIXTURE_SHUTDOWN_TIMEOUT_MS !== undefined) {
    options.shutdownTimeout = vars.PGFIXTURE_SHUTDOWN_TIMEOUT_MS;
  }
  if (vars.PGFIXTURE_REUSE_PORT !== undefined) options.reusePort = vars.PGFIXTURE_REUSE_PORT;

  return options;
}

/**
 * Parses `PGFIXTURE_TESTS_URL`, the administrative URL of an externally
 * managed server. Returns `null` when it is not set.
 */
export function parseExternalUrl(env: NodeJS.ProcessEnv = process.env): URL | null {
  const raw = env.PGFIXTURE_TESTS_URL;
  if (raw === undefined || raw === '') return null;

  let url: URL;
  try {
    url = new URL(raw);
  } catch (error) {
    throw new InvalidExternalUrlError('parse', { cause: error });
  }

  if (url.protocol !== 'postgres:') throw new InvalidExternalUrlError('scheme');
  if (url.hostname === '') throw new InvalidExternalUrlError('host');
  if (url.username === '') throw new InvalidExternalUrlError('username');

  // The URL parser keeps a stray `%` as is; decoding it later would fail.
  try {
    decodeURIComponent(url.username);
    decodeURIComponent(url.password);
    decodeURIComponent(url.pathname);
  } catch (error) {
    throw new InvalidExternalUrlError('parse', { cause: error });
  }

  return url;
}
