/**
 * consola logger shared by every module.
 *
 * Levels: 0 error, 1 warn, 2 log, 3 info, 4 debug, 5 trace.
 */

import { createConsola, type ConsolaInstance } from 'consola';
import { loggerEnv } from './env.ts';

export type LoggerScope = 'piece-table' | 'history' | 'store' | 'events';

const DEFAULT_LEVEL = loggerEnv.logLevel ?? (loggerEnv.isTest ? 1 : loggerEnv.isDev ? 4 : 3);

export const logger: ConsolaInstance = createConsola({ level: DEFAULT_LEVEL }).withTag('piecework');

const scoped = new Map<LoggerScope, ConsolaInstance>();

/**
 * Child logger tagged `piecework:<scope>`.
 */
export function getLogger(scope: LoggerScope): ConsolaInstance {
  const existing = scoped.get(scope);
  if (existing) return existing;

  const instance = logger.withTag(scope);
  scoped.set(scope, instance);
  return instance;
}
