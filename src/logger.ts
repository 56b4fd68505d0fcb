import { pino, type Logger } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function isLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const configured = process.env.PGFIXTURE_LOG_LEVEL;

/** Per-module logger, quiet (`warn`) unless PGFIXTURE_LOG_LEVEL says otherwise. */
export function createLogger(module: string): Logger {
  return pino({
    name: `pgfixture:${module}`,
    level: isLevel(configured) ? configured : 'warn',
  });
}
