import { PsqlFailedError, PsqlLaunchError } from './errors.js';
import type { CommandRunner, ExecOptions, ExecResult, SyncExecResult } from './process.js';
import type { ConnectionTarget } from './types.js';

export type PsqlInput = { sql: string } | { file: string };

export function psqlArgs(target: ConnectionTarget, database: string): string[] {
  return ['-h', target.host, '-p', String(target.port), '-U', target.user, '-d', database];
}

function inputArgs(input: PsqlInput): string[] {
  return 'sql' in input ? ['-c', input.sql] : ['-f', input.file];
}

/** The password travels in the environment, never on the command line. */
function psqlEnv(target: ConnectionTarget, base: NodeJS.ProcessEnv): ExecOptions {
  return { env: { ...base, PGPASSWORD: target.password } };
}

export async function runPsql(
  runner: CommandRunner,
  psqlBinary: string,
  target: ConnectionTarget,
  database: string,
  input: PsqlInput,
  env: NodeJS.ProcessEnv = process.env
): Promise<void> {
  const args = [...psqlArgs(target, database), ...inputArgs(input)];

  let result: ExecResult;
  try {
    result = await runner.exec(psqlBinary, args, psqlEnv(target, env));
  } catch (error) {
    throw new PsqlLaunchError({ cause: error });
  }

  if (result.code !== 0) {
    throw new PsqlFailedError(result.code, result.signal, result.stderr);
  }
}

/** Synchronous variant for process-exit cleanup; reports instead of throwing. */
export function runPsqlSync(
  runner: CommandRunner,
  psqlBinary: string,
  target: ConnectionTarget,
  database: string,
  input: PsqlInput,
  env: NodeJS.ProcessEnv = process.env
): SyncExecResult {
  const args = [...psqlArgs(target, database), ...inputArgs(input)];
  return runner.execSync(psqlBinary, args, psqlEnv(target, env));
}
