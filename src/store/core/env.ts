/**
 * Environment read once at load time.
 */

import { z } from 'zod';

type EnvRecord = Record<string, string | undefined>;

const getProcessEnv = (): EnvRecord => {
  if (typeof process === 'undefined') return {};
  return process.env;
};

export const envSchema = z.object({
  PIECEWORK_LOG_LEVEL: z
    .string()
    .trim()
    .regex(/^[0-5]$/, 'expected a consola level from 0 to 5')
    .transform((value) => Number(value))
    .optional(),
  // unknown values fall back to development
  NODE_ENV: z.enum(['development', 'production', 'test']).optional().catch(undefined),
});

export type PieceworkEnv = z.infer<typeof envSchema>;

/**
 * Validate an environment record.
 * Throws with zod's readable issue list when a variable is malformed.
 */
export function parseEnv(source: EnvRecord): PieceworkEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new Error(z.prettifyError(result.error));
  }
  return result.data;
}

const envData = parseEnv(getProcessEnv());

const nodeEnv = envData.NODE_ENV ?? 'development';

export const loggerEnv = {
  nodeEnv,
  isDev: nodeEnv === 'development',
  isTest: nodeEnv === 'test',
  logLevel: envData.PIECEWORK_LOG_LEVEL,
};

export type LoggerEnv = typeof loggerEnv;
