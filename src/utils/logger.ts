/**
 * Structured logging
 *
 * A single pino root logger; every module asks for a child bound to its name
 * and logs with `logger.info({ ...fields }, 'message')`.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

const root = pino({
  name: 'spatial-align',
  level: process.env.LOG_LEVEL ?? 'info',
});

const children: Logger[] = [];

export type { Logger };

/**
 * Create a logger for a module
 */
export function createLogger(module: string): Logger {
  const child = root.child({ module });
  children.push(child);
  return child;
}

/**
 * Change the level of every logger at run time (e.g. from `--verbose`)
 */
export function setLogLevel(level: LevelWithSilent): void {
  root.level = level;
  for (const child of children) {
    child.level = level;
  }
}
