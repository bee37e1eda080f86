/**
 * Runtime configuration schemas
 */

import { LOG_LEVELS } from '@filekit/logging';
import { z } from 'zod';

/**
 * Accepts real booleans as well as the strings an environment variable can hold
 */
const booleanFlag = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0']).transform(value => value === 'true' || value === '1'),
]);

export const FileKitConfigSchema = z.object({
  /** Minimum level of diagnostics written by EnhancedFile */
  log_level: z
    .string()
    .transform(value => value.toUpperCase())
    .pipe(z.enum(LOG_LEVELS))
    .default('WARN'),
  /** Diagnostic line format */
  log_format: z.enum(['json', 'text']).default('text'),
  /** ANSI colors on the level name */
  log_colors: booleanFlag.default(false),
});

export type FileKitConfig = z.output<typeof FileKitConfigSchema>;
export type FileKitConfigInput = z.input<typeof FileKitConfigSchema>;
