/**
 * Scheduler configuration builder.
 *
 * Reads from environment variables with defaults; every value can be
 * overridden programmatically.
 */

import * as path from 'node:path';
import { PID_FILENAME, resolveStateDir } from '../persistence/state-dir.js';
import type { SchedulerConfig } from './types.js';
import { DEFAULT_IGNORED_PATTERNS, DEFAULT_SCHEDULER_CONFIG } from './types.js';

function getEnvNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? fallback : parsed;
}

/**
 * Build scheduler config from environment variables and optional overrides.
 *
 * Environment variables:
 * - SOLSTICE_STATE_DIR: state directory (see resolveStateDir)
 * - SOLSTICE_PID_FILE: use a PID file for single-instance (default: true)
 * - SOLSTICE_WATCH_DEBOUNCE_MS: watcher debounce in ms (default: 200)
 * - SOLSTICE_WATCH_IGNORED: comma-separated additional ignored patterns
 */
export function buildSchedulerConfig(
  overrides?: Partial<SchedulerConfig>,
  env: NodeJS.ProcessEnv = process.env
): SchedulerConfig {
  const stateDir = overrides?.stateDir ?? resolveStateDir(env);
  const pidFilePath = overrides?.pidFilePath ?? path.join(stateDir, PID_FILENAME);

  const envIgnored = env['SOLSTICE_WATCH_IGNORED'];
  const extraIgnored = envIgnored ? envIgnored.split(',').map((p) => p.trim()).filter(Boolean) : [];
  const ignoredPatterns = [
    ...new Set([...DEFAULT_IGNORED_PATTERNS, ...extraIgnored, ...(overrides?.ignoredPatterns ?? [])]),
  ];

  return {
    stateDir,
    usePidFile: overrides?.usePidFile ?? (env['SOLSTICE_PID_FILE'] ?? 'true') === 'true',
    pidFilePath,
    debounceMs:
      overrides?.debounceMs ?? getEnvNumber(env, 'SOLSTICE_WATCH_DEBOUNCE_MS', DEFAULT_SCHEDULER_CONFIG.debounceMs),
    ignoredPatterns,
    startupDelayMs: overrides?.startupDelayMs ?? DEFAULT_SCHEDULER_CONFIG.startupDelayMs,
    hotReload: overrides?.hotReload ?? DEFAULT_SCHEDULER_CONFIG.hotReload,
  };
}

/**
 * Validate a scheduler configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateSchedulerConfig(config: SchedulerConfig): string[] {
  const errors: string[] = [];

  if (!config.stateDir) {
    errors.push('stateDir is required');
  }

  if (config.usePidFile && !config.pidFilePath) {
    errors.push('pidFilePath is required when usePidFile is set');
  }

  if (config.debounceMs < 0) {
    errors.push('debounceMs must not be negative');
  }

  if (config.debounceMs > 10_000) {
    errors.push('debounceMs must not exceed 10000');
  }

  if (config.startupDelayMs < 0) {
    errors.push('startupDelayMs must not be negative');
  }

  return errors;
}
