import type { Context } from '../context/context.js';
import type { ModuleDefinition } from '../module/module.js';

export const CONFIG_FILENAME = 'solstice.yml';
export const MODULES_FILENAME = 'modules.yml';
export const CONTEXT_DIRNAME = 'context';

/** One entry of `modules.enabled_modules` */
export interface EnablingStatement {
  /** `name`, `*`, `<dir>::<name>`, `<dir>::*`, `*::*`, `github::<user>/<repo>[::<name>]` */
  name: string;
  /** Pull GitHub sources on every load */
  autoupdate: boolean;
}

/** Parsed `solstice.yml`, with defaults applied */
export interface SolsticeSettings {
  hotReloadConfig: boolean;
  /** Seconds slept before startup */
  startupDelay: number;
  requiresTimeout: number;
  runTimeout: number;
  reprocessModifiedFiles: boolean;
  /** Absolute path of the directory holding module sources */
  modulesDirectory: string;
  enabledModules: EnablingStatement[];
}

export interface ConfigValidationError {
  field: string;
  message: string;
}

/** Everything needed to build a ModuleManager */
export interface LoadedConfig {
  configDir: string;
  settings: SolsticeSettings;
  /** Enabled module definitions, in enabling order */
  definitions: ModuleDefinition[];
  /** Names of every module any loaded source defines */
  definedNames: Set<string>;
  /** Merged global and source context files */
  context: Context;
  stateDir: string;
  /** Files whose modification triggers a hot reload */
  configFiles: string[];
}
