/**
 * Logger
 *
 * One pino root for the daemon and the organizer packages. Components log
 * through `createLogger({ component })`; file operations add `path` and
 * errors go under `err`, so a moved or skipped file can be traced by path.
 *
 * LOG_LEVEL picks the level (`silent` under tests); development output is
 * pretty-printed, everything else is JSON lines.
 */

import { pino } from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

export const logger = pino({
  name: 'sortwell',
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    pid: process.pid,
    env: NODE_ENV,
  },
  transport: NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname,env',
      translateTime: 'SYS:HH:MM:ss.l',
      messageFormat: '[{component}] {msg}',
    },
  } : undefined,
});

export type Logger = typeof logger;

/**
 * Child logger tagged with the calling component (and any other fixed fields)
 */
export function createLogger(context: { component: string } & Record<string, unknown>): Logger {
  return logger.child(context);
}
