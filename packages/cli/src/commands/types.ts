import type { Logger } from 'pino';
import type { ShellRunner } from '@solstice/engine';

/** What every command needs from its surroundings */
export interface CommandContext {
  logger: Logger;
  env: NodeJS.ProcessEnv;
  /** Runs requirement, template and `run` commands (default: child processes) */
  shell?: ShellRunner;
}
