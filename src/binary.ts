import { accessSync, constants, statSync } from 'node:fs';
import { delimiter, join, resolve } from 'node:path';
import { BinaryNotFoundError } from './errors.js';

export type PostgresBinary = 'initdb' | 'postgres' | 'psql';

function isExecutable(filePath: string): boolean {
  try {
    accessSync(filePath, constants.X_OK);
    return statSync(filePath).isFile();
  } catch {
    return false;
  }
}

function findInPath(name: string, env: NodeJS.ProcessEnv): string | null {
  const searchPath = env.PATH ?? '';
  for (const dir of searchPath.split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, name);
    if (isExecutable(candidate)) return candidate;
  }
  return null;
}

/** Non-throwing lookup on the search path. */
export function findBinary(name: string, env: NodeJS.ProcessEnv = process.env): string | null {
  return findInPath(name, env);
}

export function resolveBinary(
  name: PostgresBinary,
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  // Level 1: explicit path, taken as given. A missing file surfaces when it is run.
  if (explicitPath) {
    return resolve(explicitPath);
  }

  // Level 2: PATH lookup
  const pathResult = findInPath(name, env);
  if (pathResult) return pathResult;

  throw new BinaryNotFoundError(name, [`PATH lookup (${env.PATH ?? '<unset>'})`]);
}
