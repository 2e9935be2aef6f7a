/**
 * Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  /** Root directory for per-repository history caches */
  cacheDir: z.string().min(1).default(join(homedir(), '.cache', 'ebuild-history')),

  /** Disable all git history support */
  gitEnabled: booleanFlag.default('true'),

  // Refs
  /** Published upstream state whose history is cached across runs */
  upstreamRef: z.string().min(1).default('origin/HEAD'),
  /** Local development branch holding unpublished commits */
  localRef: z.string().min(1).default('master'),
  /** Reference that scan targets are diffed against */
  scopeRef: z.string().min(1).default('origin'),

  /** Message of stash entries created while scanning */
  stashLabel: z.string().min(1).default('ebuild-history scan --commits'),
});

export type HistoryConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): HistoryConfig {
  const raw = {
    cacheDir: env['EBUILD_HISTORY_CACHE_DIR'],
    gitEnabled: env['EBUILD_HISTORY_GIT_ENABLED'],
    upstreamRef: env['EBUILD_HISTORY_UPSTREAM_REF'],
    localRef: env['EBUILD_HISTORY_LOCAL_REF'],
    scopeRef: env['EBUILD_HISTORY_SCOPE_REF'],
    stashLabel: env['EBUILD_HISTORY_STASH_LABEL'],
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.issues }, 'Invalid configuration');
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  log.debug(
    {
      cacheDir: result.data.cacheDir,
      gitEnabled: result.data.gitEnabled,
      upstreamRef: result.data.upstreamRef,
      localRef: result.data.localRef,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: HistoryConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): HistoryConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
