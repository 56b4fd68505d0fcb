import type { ConnectionInfo, ConnectionTarget } from './types.js';

export const DEFAULT_PG_PORT = 5432;
export const ADMIN_DATABASE = 'postgres';

function formatHost(host: string): string {
  return host.includes(':') && !host.startsWith('[') ? `[${host}]` : host;
}

function stripBrackets(host: string): string {
  return host.startsWith('[') && host.endsWith(']') ? host.slice(1, -1) : host;
}

/**
 * Renders `postgres://<user>:<password>@<host>:<port>/<database>`.
 * Credentials and database are percent-encoded, IPv6 hosts bracketed.
 */
export function formatConnectionUrl(info: Omit<ConnectionInfo, 'ssl'>): string {
  const user = encodeURIComponent(info.user);
  const password = encodeURIComponent(info.password);
  const database = encodeURIComponent(info.database);
  return `postgres://${user}:${password}@${formatHost(info.host)}:${info.port}/${database}`;
}

export function parseConnectionUrl(url: string | URL): ConnectionInfo {
  const parsed = typeof url === 'string' ? new URL(url) : url;
  const database = decodeURIComponent(parsed.pathname.replace(/^\//, ''));
  return {
    host: stripBrackets(parsed.hostname),
    port: parsed.port ? parseInt(parsed.port, 10) : DEFAULT_PG_PORT,
    user: decodeURIComponent(parsed.username),
    password: decodeURIComponent(parsed.password),
    database: database || ADMIN_DATABASE,
    ssl: false,
  };
}

export function toTarget(info: ConnectionInfo): ConnectionTarget {
  return { host: info.host, port: info.port, user: info.user, password: info.password };
}

export function withDatabase(url: string, database: string): string {
  return formatConnectionUrl({ ...parseConnectionUrl(url), database });
}

export function withCredentials(url: string, user: string, password: string): string {
  return formatConnectionUrl({ ...parseConnectionUrl(url), user, password });
}
