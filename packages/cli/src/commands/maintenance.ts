/**
 * solstice --cleanup / --reset-setup
 *
 * Both work on the state directory alone, so they also apply to modules
 * that have since been removed from the configuration.
 */

import * as path from 'node:path';
import {
  CREATED_FILES_FILENAME,
  CreatedFiles,
  ExecutedActions,
  SETUP_FILENAME,
  resolveStateDir,
} from '@solstice/engine';
import type { CliOptions } from '../program.js';
import type { CommandContext } from './types.js';

export function cleanupCommand(options: CliOptions, context: CommandContext): number {
  const stateDir = resolveStateDir(context.env);
  const createdFiles = new CreatedFiles(path.join(stateDir, CREATED_FILES_FILENAME), context.logger);

  for (const module of options.cleanup) {
    const result = createdFiles.cleanup(module, { dryRun: options.dryRun, includeSetup: options.includeSetup });
    context.logger.info(
      { module, removed: result.removed.length, restored: result.restored.length, missing: result.missing.length },
      `Cleaned up module "${module}"`
    );
  }
  return 0;
}

export function resetSetupCommand(options: CliOptions, context: CommandContext): number {
  const stateDir = resolveStateDir(context.env);
  const executedActions = new ExecutedActions(path.join(stateDir, SETUP_FILENAME), context.logger);

  let code = 0;
  for (const module of options.resetSetup) {
    if (!executedActions.reset(module)) code = 1;
  }
  return code;
}
