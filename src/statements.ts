import { escapeIdent, escapeString } from './escape.js';

export function createRoleStatement(user: string, password: string): string {
  return `CREATE ROLE ${escapeIdent(user)} LOGIN ENCRYPTED PASSWORD ${escapeString(password)};`;
}

export function createDatabaseStatement(database: string, owner: string): string {
  return `CREATE DATABASE ${escapeIdent(database)} OWNER ${escapeIdent(owner)};`;
}

/** Database before role: the role cannot be dropped while it still owns the database. */
export function dropStatements(database: string, user: string): string[] {
  return [`DROP DATABASE IF EXISTS ${escapeIdent(database)};`, `DROP ROLE IF EXISTS ${escapeIdent(user)};`];
}
