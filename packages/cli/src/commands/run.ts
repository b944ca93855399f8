/**
 * solstice (default command): startup, then the scheduler loop
 */

import {
  ConfigurationError,
  ModuleManager,
  Scheduler,
  buildSchedulerConfig,
  loadConfig,
  toError,
} from '@solstice/engine';
import type { LoadedConfig } from '@solstice/engine';
import type { Logger } from 'pino';
import type { CliOptions } from '../program.js';
import type { CommandContext } from './types.js';

/** Log a fatal error; returns the exit code */
export function reportFatal(logger: Logger, err: unknown): number {
  if (err instanceof ConfigurationError) {
    logger.error({ errors: err.errors }, err.message);
  } else {
    const error = toError(err);
    logger.error({ err: error }, error.message);
  }
  return 1;
}

export async function runCommand(options: CliOptions, context: CommandContext): Promise<number> {
  const { logger, env, shell } = context;

  const load = (): Promise<LoadedConfig> =>
    loadConfig({ configDir: options.configDir, logger, env, shell, only: options.module });

  let config: LoadedConfig;
  try {
    config = await load();
  } catch (err) {
    return reportFatal(logger, err);
  }

  // The first manager reuses the configuration loaded above; hot reloads read it again
  let pending: LoadedConfig | null = config;
  const createManager = async (): Promise<ModuleManager> => {
    const loaded = pending ?? (await load());
    pending = null;
    return ModuleManager.create({
      definitions: loaded.definitions,
      definedNames: loaded.definedNames,
      context: loaded.context,
      settings: {
        requiresTimeout: loaded.settings.requiresTimeout,
        runTimeout: loaded.settings.runTimeout,
        reprocessModifiedFiles: loaded.settings.reprocessModifiedFiles,
      },
      stateDir: loaded.stateDir,
      logger,
      dryRun: options.dryRun,
      shell,
      env,
    });
  };

  const scheduler = new Scheduler({
    config: buildSchedulerConfig(
      {
        stateDir: config.stateDir,
        startupDelayMs: config.settings.startupDelay * 1000,
        hotReload: config.settings.hotReloadConfig,
      },
      env
    ),
    createManager,
    logger,
    configFiles: config.configFiles,
  });

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Stopping');
    scheduler.stop().catch((err: unknown) => {
      reportFatal(logger, err);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    await scheduler.start();
    await scheduler.waitUntilStopped();
  } catch (err) {
    return reportFatal(logger, err);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }

  logger.info('Stopped');
  return 0;
}
