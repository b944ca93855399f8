/**
 * Command-line surface of solstice.
 *
 * One root command: `--reset-setup` and `--cleanup` are one-shot
 * maintenance operations; without them the scheduler runs until a signal
 * arrives or nothing is left to wait for.
 */

import { Command, Option } from 'commander';
import { LOG_LEVELS } from '@solstice/engine';

export interface CliOptions {
  configDir?: string;
  module: string[];
  dryRun: boolean;
  cleanup: string[];
  resetSetup: string[];
  includeSetup: boolean;
  logLevel?: string;
}

export interface CliHandlers {
  run(options: CliOptions): Promise<number>;
  cleanup(options: CliOptions): number;
  resetSetup(options: CliOptions): number;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Build the program. `onExit` receives the exit code of the handler that ran.
 */
export function createProgram(version: string, handlers: CliHandlers, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name('solstice')
    .description('Apply and keep applying configuration modules as time passes and files change')
    .version(version)
    .option('--config-dir <dir>', 'configuration directory')
    .option('--module <name>', 'only run this module (repeatable)', collect, [])
    .option('--dry-run', 'log actions instead of performing them', false)
    .option('--cleanup <name>', 'remove files created by a module and restore backups (repeatable)', collect, [])
    .option('--reset-setup <name>', 'forget the executed on_setup actions of a module (repeatable)', collect, [])
    .option('--include-setup', 'with --cleanup, also remove files created by on_setup', false)
    .addOption(new Option('--log-level <level>', 'minimum log level').choices(LOG_LEVELS))
    .action(async (options: CliOptions) => {
      if (options.resetSetup.length === 0 && options.cleanup.length === 0) {
        onExit(await handlers.run(options));
        return;
      }

      let code = 0;
      if (options.resetSetup.length > 0) {
        code = Math.max(code, handlers.resetSetup(options));
      }
      if (options.cleanup.length > 0) {
        code = Math.max(code, handlers.cleanup(options));
      }
      onExit(code);
    });

  return program;
}
