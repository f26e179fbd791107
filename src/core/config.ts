/**
 * Helper Configuration & Environment Validation
 *
 * git starts the helper with no arguments beyond the remote name and URL, so
 * tuning knobs come from the environment. They are validated once on startup.
 */

import { z } from 'zod';
import { Errors } from './errors';

// =============================================================================
// Environment Schema
// =============================================================================

const envSchema = z.object({
  // Number of objects transferred in parallel during push and fetch
  GIT_REMOTE_BLOB_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),

  // batch: stage a push's objects locally and send them in one transfer
  // sequential: upload objects one by one
  // Either way the ref is written after its objects.
  GIT_REMOTE_BLOB_TRANSFER: z.enum(['batch', 'sequential']).default('batch'),

  // Object format of the repositories being pushed
  GIT_REMOTE_BLOB_HASH: z.enum(['sha1', 'sha256']).default('sha1'),

  // Executables
  GIT_REMOTE_BLOB_RCLONE: z.string().min(1).default('rclone'),
  GIT_REMOTE_BLOB_GIT: z.string().min(1).default('git'),

  // Logging
  LOG_FORMAT: z.enum(['pretty', 'json']).default('pretty'),

  // Set by git for the helper process
  GIT_DIR: z.string().optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

export type TransferMode = EnvConfig['GIT_REMOTE_BLOB_TRANSFER'];

// =============================================================================
// Configuration Singleton
// =============================================================================

let config: EnvConfig | null = null;

/**
 * Validate an environment without caching the result
 */
export function parseConfig(env: NodeJS.ProcessEnv): EnvConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw Errors.configInvalid(
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return result.data;
}

/**
 * Validate and load environment configuration
 * Throws a CONFIG_INVALID HelperError listing every bad variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  if (config) return config;
  config = parseConfig(env);
  return config;
}

/**
 * Forget the cached configuration (tests change the environment between cases)
 */
export function resetConfig(): void {
  config = null;
}
