/**
 * Text buffer configuration: defaults and validation.
 */

import { z } from 'zod';
import type { TextBufferConfig } from '../../types/state.ts';

export const DEFAULT_HISTORY_LIMIT = 1000;

export const textBufferConfigSchema = z.object({
  content: z.string().default(''),
  historyLimit: z.number().int().nonnegative().default(DEFAULT_HISTORY_LIMIT),
  pruneEmptyPieces: z.boolean().default(true),
});

/**
 * Configuration with every default filled in.
 */
export type ResolvedTextBufferConfig = z.infer<typeof textBufferConfigSchema>;

/**
 * Validate `config` and apply defaults.
 * Throws an Error listing every invalid option.
 */
export function resolveConfig(config: TextBufferConfig = {}): ResolvedTextBufferConfig {
  const result = textBufferConfigSchema.safeParse(config);
  if (!result.success) {
    throw new Error(`Invalid text buffer config:\n${z.prettifyError(result.error)}`);
  }
  return result.data;
}
