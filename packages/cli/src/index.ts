#!/usr/bin/env node

/**
 * solstice CLI - applies configuration modules and keeps them current
 */

import { createRequire } from 'node:module';
import { createLogger, parseLogLevel } from '@solstice/engine';
import { cleanupCommand, resetSetupCommand } from './commands/maintenance.js';
import { runCommand } from './commands/run.js';
import type { CommandContext } from './commands/types.js';
import { createProgram } from './program.js';
import type { CliOptions } from './program.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

let context: CommandContext | null = null;

function contextFor(options: CliOptions): CommandContext {
  context ??= {
    logger: createLogger({ level: parseLogLevel(options.logLevel), pretty: process.stdout.isTTY }),
    env: process.env,
  };
  return context;
}

const program = createProgram(
  pkg.version,
  {
    run: (options) => runCommand(options, contextFor(options)),
    cleanup: (options) => cleanupCommand(options, contextFor(options)),
    resetSetup: (options) => resetSetupCommand(options, contextFor(options)),
  },
  (code) => {
    process.exitCode = code;
  }
);

program.parseAsync().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
