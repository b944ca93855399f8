/**
 * Configuration loader.
 *
 * Reads the config directory:
 *
 *   solstice.yml        global settings
 *   modules.yml         module definitions keyed by name
 *   context/*.yml       initial context sections
 *   <modules_directory>/<dir>/modules.yml, <dir>/context/*.yml
 *
 * Every file is pre-processed (`${VAR}` then template rendering) before YAML
 * parsing. Validation problems are collected and reported together in a
 * single ConfigurationError.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { Context } from '../context/context.js';
import { ConfigurationError, toError } from '../errors.js';
import { parseModuleDefinition } from '../module/module.js';
import type { ModuleDefinition } from '../module/module.js';
import { resolveStateDir } from '../persistence/state-dir.js';
import { NunjucksRenderer } from '../render/renderer.js';
import type { Renderer } from '../render/renderer.js';
import { DEFAULT_REQUIRES_TIMEOUT } from '../requirements/requirement-checker.js';
import { ChildProcessShellRunner } from '../shell/shell-runner.js';
import type { ShellRunner } from '../shell/shell-runner.js';
import { isRecord } from '../utils/guards.js';
import { parseYaml } from '../utils/yaml.js';
import { preprocessConfig } from './preprocess.js';
import { GitRepositoryFetcher, parseGithubRepository } from './repository.js';
import type { RepositoryFetcher } from './repository.js';
import { CONFIG_FILENAME, CONTEXT_DIRNAME, MODULES_FILENAME } from './types.js';
import type { ConfigValidationError, EnablingStatement, LoadedConfig, SolsticeSettings } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  /** Explicit config directory (the `--config-dir` flag) */
  configDir?: string;
  logger: Logger;
  env?: NodeJS.ProcessEnv;
  renderer?: Renderer;
  /** Used by the default renderer's `shell` filter */
  shell?: ShellRunner;
  fetcher?: RepositoryFetcher;
  /** Keep only these modules (by full name) */
  only?: readonly string[];
}

/** A loaded modules.yml together with where its modules live */
interface ModuleSource {
  /** Prepended to every module name: '', `<dir>::` or `github::<user>/<repo>::` */
  prefix: string;
  directory: string;
  file: string;
  definitions: Map<string, unknown>;
}

export const DEFAULT_ENABLED_MODULES: readonly EnablingStatement[] = [
  { name: '*', autoupdate: false },
  { name: '*::*', autoupdate: false },
];

export const DEFAULT_MODULES_DIRECTORY = 'modules';

const TOP_LEVEL_KEYS = new Set(['solstice', 'modules']);
const SOLSTICE_KEYS = new Set(['hot_reload_config', 'startup_delay']);
const MODULES_KEYS = new Set([
  'requires_timeout',
  'run_timeout',
  'reprocess_modified_files',
  'modules_directory',
  'enabled_modules',
]);

// ---------------------------------------------------------------------------
// Config directory
// ---------------------------------------------------------------------------

/**
 * `explicit`, else $SOLSTICE_CONFIG_HOME, else $XDG_CONFIG_HOME/solstice,
 * else ~/.config/solstice.
 */
export function resolveConfigDir(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (explicit) return path.resolve(explicit);

  const home = env['SOLSTICE_CONFIG_HOME'];
  if (home) return path.resolve(home);

  const xdg = env['XDG_CONFIG_HOME'];
  if (xdg) return path.join(xdg, 'solstice');

  return path.join(os.homedir(), '.config', 'solstice');
}

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

function checkKeys(
  section: Record<string, unknown>,
  allowed: ReadonlySet<string>,
  field: string,
  errors: ConfigValidationError[]
): void {
  for (const key of Object.keys(section)) {
    if (!allowed.has(key)) {
      errors.push({ field: field ? `${field}.${key}` : key, message: 'Unknown setting' });
    }
  }
}

function readSection(
  raw: Record<string, unknown>,
  key: string,
  allowed: ReadonlySet<string>,
  errors: ConfigValidationError[]
): Record<string, unknown> {
  const section = raw[key];
  if (section === undefined || section === null) return {};
  if (!isRecord(section)) {
    errors.push({ field: key, message: 'Must be a mapping' });
    return {};
  }
  checkKeys(section, allowed, key, errors);
  return section;
}

function readBoolean(
  section: Record<string, unknown>,
  key: string,
  fallback: boolean,
  field: string,
  errors: ConfigValidationError[]
): boolean {
  const value = section[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'boolean') {
    errors.push({ field: `${field}.${key}`, message: 'Must be true or false' });
    return fallback;
  }
  return value;
}

function readSeconds(
  section: Record<string, unknown>,
  key: string,
  fallback: number,
  field: string,
  errors: ConfigValidationError[]
): number {
  const value = section[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    errors.push({ field: `${field}.${key}`, message: 'Must be a non-negative number of seconds' });
    return fallback;
  }
  return value;
}

function parseEnablingStatements(value: unknown, errors: ConfigValidationError[]): EnablingStatement[] {
  if (value === undefined || value === null) return [...DEFAULT_ENABLED_MODULES];
  if (!Array.isArray(value)) {
    errors.push({ field: 'modules.enabled_modules', message: 'Must be a list' });
    return [];
  }

  const statements: EnablingStatement[] = [];
  value.forEach((entry: unknown, i) => {
    const field = `modules.enabled_modules[${i}]`;
    if (typeof entry === 'string') {
      statements.push({ name: entry, autoupdate: false });
      return;
    }
    if (!isRecord(entry) || typeof entry['name'] !== 'string' || entry['name'] === '') {
      errors.push({ field, message: 'Must be a module name or a mapping with a "name"' });
      return;
    }
    const autoupdate = entry['autoupdate'];
    if (autoupdate !== undefined && typeof autoupdate !== 'boolean') {
      errors.push({ field: `${field}.autoupdate`, message: 'Must be true or false' });
    }
    checkKeys(entry, new Set(['name', 'autoupdate']), field, errors);
    statements.push({ name: entry['name'], autoupdate: autoupdate === true });
  });
  return statements;
}

/** Apply defaults to a parsed solstice.yml */
export function parseSettings(raw: unknown, configDir: string, errors: ConfigValidationError[]): SolsticeSettings {
  const root = raw === undefined ? {} : raw;
  if (!isRecord(root)) {
    errors.push({ field: CONFIG_FILENAME, message: 'Must be a mapping' });
  }
  const top = isRecord(root) ? root : {};
  checkKeys(top, TOP_LEVEL_KEYS, '', errors);

  const general = readSection(top, 'solstice', SOLSTICE_KEYS, errors);
  const modules = readSection(top, 'modules', MODULES_KEYS, errors);

  const modulesDirectory = modules['modules_directory'] ?? DEFAULT_MODULES_DIRECTORY;
  if (typeof modulesDirectory !== 'string') {
    errors.push({ field: 'modules.modules_directory', message: 'Must be a path' });
  }

  return {
    hotReloadConfig: readBoolean(general, 'hot_reload_config', false, 'solstice', errors),
    startupDelay: readSeconds(general, 'startup_delay', 0, 'solstice', errors),
    requiresTimeout: readSeconds(modules, 'requires_timeout', DEFAULT_REQUIRES_TIMEOUT, 'modules', errors),
    runTimeout: readSeconds(modules, 'run_timeout', 0, 'modules', errors),
    reprocessModifiedFiles: readBoolean(modules, 'reprocess_modified_files', false, 'modules', errors),
    modulesDirectory: path.resolve(
      configDir,
      typeof modulesDirectory === 'string' ? modulesDirectory : DEFAULT_MODULES_DIRECTORY
    ),
    enabledModules: parseEnablingStatements(modules['enabled_modules'], errors),
  };
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

class ConfigReader {
  readonly errors: ConfigValidationError[] = [];
  private readonly sources = new Map<string, ModuleSource>();

  constructor(
    private readonly configDir: string,
    private readonly renderer: Renderer,
    private readonly env: NodeJS.ProcessEnv
  ) {}

  /** Pre-process and parse one file; undefined when missing or broken */
  readFile(filePath: string): unknown {
    if (!fs.existsSync(filePath)) return undefined;
    const field = path.relative(this.configDir, filePath) || filePath;
    try {
      const text = fs.readFileSync(filePath, 'utf-8');
      const processed = preprocessConfig(text, { renderer: this.renderer, env: this.env, name: field });
      return parseYaml(processed, filePath);
    } catch (err) {
      this.errors.push({ field, message: toError(err).message });
      return undefined;
    }
  }

  /** Context files of `directory`, merged in file-name order */
  readContext(directory: string, context: Context): void {
    const contextDir = path.join(directory, CONTEXT_DIRNAME);
    if (!isDirectory(contextDir)) return;

    const files = fs
      .readdirSync(contextDir)
      .filter((name) => name.endsWith('.yml') || name.endsWith('.yaml'))
      .sort();

    for (const name of files) {
      const filePath = path.join(contextDir, name);
      const content = this.readFile(filePath);
      if (content === undefined) continue;
      if (!isRecord(content)) {
        this.errors.push({ field: path.relative(this.configDir, filePath), message: 'Context file must be a mapping' });
        continue;
      }
      try {
        context.merge(content);
      } catch (err) {
        this.errors.push({ field: path.relative(this.configDir, filePath), message: toError(err).message });
      }
    }
  }

  /** modules.yml of `directory`, loaded once */
  source(directory: string, prefix: string): ModuleSource {
    const cached = this.sources.get(directory);
    if (cached) return cached;

    const file = path.join(directory, MODULES_FILENAME);
    const raw = this.readFile(file);
    const definitions = new Map<string, unknown>();
    if (isRecord(raw)) {
      for (const [name, definition] of Object.entries(raw)) {
        definitions.set(name, definition);
      }
    } else if (raw !== undefined) {
      this.errors.push({ field: path.relative(this.configDir, file), message: 'Must map module names to definitions' });
    }

    const source: ModuleSource = { prefix, directory, file, definitions };
    this.sources.set(directory, source);
    return source;
  }

  /** Every source loaded so far, global first */
  loadedSources(): ModuleSource[] {
    return [...this.sources.values()];
  }
}

function isDirectory(candidate: string): boolean {
  return fs.existsSync(candidate) && fs.statSync(candidate).isDirectory();
}

function splitStatement(name: string): { scope: string; module: string } | null {
  const parts = name.split('::');
  if (parts.length === 1) return { scope: '', module: name };
  if (parts.length === 2 && parts[0] && parts[1]) return { scope: parts[0], module: parts[1] };
  return null;
}

/**
 * Load and validate the configuration directory.
 * Throws ConfigurationError (or ModuleSourceError) on any problem.
 */
export async function loadConfig(options: LoadConfigOptions): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const logger = options.logger.child({ component: 'config-loader' });
  const configDir = resolveConfigDir(options.configDir, env);

  if (!isDirectory(configDir)) {
    throw new ConfigurationError(`Configuration directory "${configDir}" does not exist`);
  }

  const renderer =
    options.renderer ?? new NunjucksRenderer({ shell: options.shell ?? new ChildProcessShellRunner(), cwd: configDir });
  const fetcher = options.fetcher ?? new GitRepositoryFetcher(options.logger);
  const reader = new ConfigReader(configDir, renderer, env);

  const settings = parseSettings(reader.readFile(path.join(configDir, CONFIG_FILENAME)), configDir, reader.errors);
  const globalSource = reader.source(configDir, '');

  // --- enabling statements -> ordered (source, module) selections ---
  const selected: Array<{ source: ModuleSource; name: string }> = [];

  const select = (source: ModuleSource, module: string, field: string, required: boolean): void => {
    if (module === '*') {
      for (const name of source.definitions.keys()) selected.push({ source, name });
    } else if (source.definitions.has(module)) {
      selected.push({ source, name: module });
    } else if (required) {
      reader.errors.push({ field, message: `Module "${module}" is not defined in ${source.file}` });
    }
  };

  for (const [i, statement] of settings.enabledModules.entries()) {
    const field = `modules.enabled_modules[${i}]`;

    if (statement.name.startsWith('github::')) {
      const rest = statement.name.slice('github::'.length);
      const [repoSpec = '', module = '*', ...extra] = rest.split('::');
      const repository = parseGithubRepository(repoSpec);
      if (!repository || extra.length > 0 || module === '') {
        reader.errors.push({ field, message: `Invalid GitHub module source "${statement.name}"` });
        continue;
      }
      const destination = path.join(settings.modulesDirectory, repository.user, repository.repo);
      await fetcher.fetch(repository, destination, { update: statement.autoupdate });
      select(reader.source(destination, `github::${repoSpec}::`), module, field, true);
      continue;
    }

    const parts = splitStatement(statement.name);
    if (!parts) {
      reader.errors.push({ field, message: `Invalid module name "${statement.name}"` });
      continue;
    }

    if (parts.scope === '') {
      select(globalSource, parts.module, field, true);
    } else if (parts.scope === '*') {
      if (!isDirectory(settings.modulesDirectory)) continue;
      const directories = fs
        .readdirSync(settings.modulesDirectory)
        .sort()
        .map((name) => path.join(settings.modulesDirectory, name))
        .filter((directory) => fs.existsSync(path.join(directory, MODULES_FILENAME)));
      for (const directory of directories) {
        select(reader.source(directory, `${path.basename(directory)}::`), parts.module, field, false);
      }
    } else {
      const directory = path.join(settings.modulesDirectory, parts.scope);
      if (!isDirectory(directory)) {
        reader.errors.push({ field, message: `Module directory "${directory}" does not exist` });
        continue;
      }
      select(reader.source(directory, `${parts.scope}::`), parts.module, field, true);
    }
  }

  // --- definitions ---
  const definedNames = new Set<string>();
  for (const source of reader.loadedSources()) {
    for (const name of source.definitions.keys()) definedNames.add(source.prefix + name);
  }

  const definitions: ModuleDefinition[] = [];
  const seen = new Set<string>();
  for (const { source, name } of selected) {
    const fullName = source.prefix + name;
    if (seen.has(fullName)) continue;
    seen.add(fullName);
    try {
      definitions.push(parseModuleDefinition(fullName, source.definitions.get(name), source.directory));
    } catch (err) {
      reader.errors.push({ field: `modules.${fullName}`, message: toError(err).message });
    }
  }

  let result = definitions;
  if (options.only && options.only.length > 0) {
    for (const name of options.only) {
      if (!seen.has(name)) reader.errors.push({ field: '--module', message: `Module "${name}" is not enabled` });
    }
    const only = new Set(options.only);
    result = definitions.filter((definition) => only.has(definition.name));
  }

  // --- context: global first, then every module source in load order ---
  const context = new Context();
  reader.readContext(configDir, context);
  for (const source of reader.loadedSources()) {
    if (source !== globalSource) reader.readContext(source.directory, context);
  }

  if (reader.errors.length > 0) {
    throw new ConfigurationError(
      'Invalid configuration',
      reader.errors.map((error) => `${error.field}: ${error.message}`)
    );
  }

  logger.debug({ configDir, modules: result.map((definition) => definition.name) }, 'Configuration loaded');

  return {
    configDir,
    settings,
    definitions: result,
    definedNames,
    context,
    stateDir: resolveStateDir(env),
    configFiles: [
      path.join(configDir, CONFIG_FILENAME),
      path.join(configDir, MODULES_FILENAME),
      path.join(configDir, CONTEXT_DIRNAME),
    ],
  };
}
