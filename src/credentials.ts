import { randomBytes } from 'node:crypto';
import type { FixtureCredentials } from './types.js';

/** 128 random bits as 32 lowercase hex characters. */
export function randomHex(): string {
  return randomBytes(16).toString('hex');
}

export function generateFixtureCredentials(id: string = randomHex()): FixtureCredentials {
  return {
    database: `fixture_db_${id}`,
    user: `fixture_user_${id}`,
    password: `fixture_pass_${id}`,
  };
}
