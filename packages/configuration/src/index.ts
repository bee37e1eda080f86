import { ErrorFactory } from '@filekit/errors';
import { z } from 'zod';

import { FileKitConfigSchema, type FileKitConfig } from './schemas.js';

export {
  FileKitConfigSchema,
  type FileKitConfig,
  type FileKitConfigInput,
} from './schemas.js';

export const DEFAULT_ENV_PREFIX = 'FILEKIT_';

/**
 * Collect `<prefix>*` variables, keyed by the lowercased remainder of their name
 */
export function readEnvSource(
  env: NodeJS.ProcessEnv,
  prefix: string = DEFAULT_ENV_PREFIX
): Record<string, string> {
  const source: Record<string, string> = {};

  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && key.startsWith(prefix)) {
      source[key.slice(prefix.length).toLowerCase()] = value;
    }
  }

  return source;
}

/**
 * Format zod issues as `field: message` lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Validate a raw configuration object, applying defaults
 */
export function parseConfig(input: unknown): FileKitConfig {
  const result = FileKitConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatIssues(result.error);
    throw ErrorFactory.configuration(`Invalid filekit configuration: ${issues.join('; ')}`, {
      data: { issues },
    });
  }

  return result.data;
}

/**
 * Load configuration from environment variables (`FILEKIT_LOG_LEVEL`, ...)
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  prefix: string = DEFAULT_ENV_PREFIX
): FileKitConfig {
  return parseConfig(readEnvSource(env, prefix));
}
