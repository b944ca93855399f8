import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Logger } from 'pino';
import {
  DEFAULT_ENABLED_MODULES,
  loadConfig,
  parseSettings,
  resolveConfigDir,
} from '../config/config-loader.js';
import type { LoadConfigOptions } from '../config/config-loader.js';
import { substituteEnvironment } from '../config/preprocess.js';
import { parseGithubRepository, repositoryUrl } from '../config/repository.js';
import type { GithubRepository, RepositoryFetcher } from '../config/repository.js';
import type { ConfigValidationError } from '../config/types.js';
import { ConfigurationError } from '../errors.js';
import { DEFAULT_REQUIRES_TIMEOUT } from '../requirements/requirement-checker.js';
import { FakeShellRunner } from './helpers/fake-shell.js';

function createMockLogger(): Logger {
  const logger = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger as unknown as Logger;
}

class FakeFetcher implements RepositoryFetcher {
  readonly calls: Array<{ repository: GithubRepository; destination: string; update: boolean }> = [];

  async fetch(repository: GithubRepository, destination: string, options: { update: boolean }): Promise<void> {
    this.calls.push({ repository, destination, update: options.update });
    fs.mkdirSync(destination, { recursive: true });
    fs.writeFileSync(path.join(destination, 'modules.yml'), 'bar:\n  on_exit:\n    run: goodbye\n');
  }
}

describe('resolveConfigDir', () => {
  it('should prefer an explicit directory', () => {
    expect(resolveConfigDir('/explicit', { SOLSTICE_CONFIG_HOME: '/home' })).toBe('/explicit');
  });

  it('should fall back through SOLSTICE_CONFIG_HOME and XDG_CONFIG_HOME', () => {
    expect(resolveConfigDir(undefined, { SOLSTICE_CONFIG_HOME: '/home', XDG_CONFIG_HOME: '/xdg' })).toBe('/home');
    expect(resolveConfigDir(undefined, { XDG_CONFIG_HOME: '/xdg' })).toBe('/xdg/solstice');
    expect(resolveConfigDir(undefined, {})).toBe(path.join(os.homedir(), '.config', 'solstice'));
  });
});

describe('parseSettings', () => {
  it('should apply defaults to a missing file', () => {
    const errors: ConfigValidationError[] = [];

    expect(parseSettings(undefined, '/cfg', errors)).toEqual({
      hotReloadConfig: false,
      startupDelay: 0,
      requiresTimeout: DEFAULT_REQUIRES_TIMEOUT,
      runTimeout: 0,
      reprocessModifiedFiles: false,
      modulesDirectory: '/cfg/modules',
      enabledModules: [...DEFAULT_ENABLED_MODULES],
    });
    expect(errors).toEqual([]);
  });

  it('should read enabling statements in both forms', () => {
    const errors: ConfigValidationError[] = [];
    const settings = parseSettings(
      { modules: { modules_directory: '/elsewhere', enabled_modules: ['a', { name: 'b', autoupdate: true }] } },
      '/cfg',
      errors
    );

    expect(settings.modulesDirectory).toBe('/elsewhere');
    expect(settings.enabledModules).toEqual([
      { name: 'a', autoupdate: false },
      { name: 'b', autoupdate: true },
    ]);
    expect(errors).toEqual([]);
  });

  it('should collect every validation error', () => {
    const errors: ConfigValidationError[] = [];
    parseSettings(
      { solstice: { hot_reload_config: 'yes', bogus: 1 }, modules: { run_timeout: -1 } },
      '/cfg',
      errors
    );

    expect(errors).toEqual([
      { field: 'solstice.bogus', message: 'Unknown setting' },
      { field: 'solstice.hot_reload_config', message: 'Must be true or false' },
      { field: 'modules.run_timeout', message: 'Must be a non-negative number of seconds' },
    ]);
  });
});

describe('substituteEnvironment', () => {
  it('should replace set variables and keep unset ones', () => {
    expect(substituteEnvironment('a ${HOME} ${UNSET_VARIABLE}', { HOME: '/h' })).toBe('a /h ${UNSET_VARIABLE}');
  });
});

describe('parseGithubRepository', () => {
  it('should split user and repository', () => {
    const repository = parseGithubRepository('someone/dotfiles');

    expect(repository).toEqual({ user: 'someone', repo: 'dotfiles' });
    expect(repository && repositoryUrl(repository)).toBe('https://github.com/someone/dotfiles.git');
  });

  it('should reject anything else', () => {
    expect(parseGithubRepository('dotfiles')).toBeNull();
    expect(parseGithubRepository('a/b/c')).toBeNull();
  });
});

describe('loadConfig', () => {
  let tmpDir: string;
  let configDir: string;
  let stateDir: string;
  let fetcher: FakeFetcher;

  function write(relative: string, content: string): void {
    const filePath = path.join(configDir, relative);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  }

  function load(overrides: Partial<LoadConfigOptions> = {}) {
    return loadConfig({
      configDir,
      logger: createMockLogger(),
      env: { USER_NAME: 'tester', GREETING: 'hi', SOLSTICE_STATE_DIR: stateDir },
      shell: new FakeShellRunner(),
      fetcher,
      ...overrides,
    });
  }

  async function loadErrors(overrides: Partial<LoadConfigOptions> = {}): Promise<string[]> {
    try {
      await load(overrides);
    } catch (err) {
      if (err instanceof ConfigurationError) return err.errors;
      throw err;
    }
    throw new Error('Expected a ConfigurationError');
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'solstice-config-'));
    configDir = path.join(tmpDir, 'config');
    stateDir = path.join(tmpDir, 'state');
    fs.mkdirSync(configDir);
    fetcher = new FakeFetcher();

    write('modules.yml', 'terminal:\n  on_startup:\n    run: echo ${USER_NAME} {{ env.GREETING }}\neditor: {}\n');
    write('modules/desktop/modules.yml', 'wallpaper:\n  on_startup:\n    run: feh\n');
    write('modules/notes/README', 'no modules here\n');
    write('context/colors.yml', 'colors:\n  primary: blue\n');
    write('modules/desktop/context/colors.yml', 'colors:\n  secondary: red\n');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should fail for a missing configuration directory', async () => {
    const missing = path.join(tmpDir, 'missing');

    await expect(load({ configDir: missing })).rejects.toThrow(`Configuration directory "${missing}" does not exist`);
  });

  it('should load global and directory modules by default', async () => {
    const config = await load();

    expect(config.definitions.map((definition) => definition.name)).toEqual([
      'terminal',
      'editor',
      'desktop::wallpaper',
    ]);
    expect(config.definitions[0]?.blocks.on_startup.actions[0]).toMatchObject({ kind: 'run', shell: 'echo tester hi' });
    expect(config.definitions[2]?.directory).toBe(path.join(configDir, 'modules', 'desktop'));
    expect([...config.definedNames].sort()).toEqual(['desktop::wallpaper', 'editor', 'terminal']);
    expect(config.stateDir).toBe(stateDir);
    expect(config.settings.modulesDirectory).toBe(path.join(configDir, 'modules'));
  });

  it('should merge global context before module directory context', async () => {
    write('modules/desktop/context/colors.yml', 'colors:\n  primary: green\n  secondary: red\n');

    const config = await load();

    expect(config.context.toJSON()).toEqual({ colors: { primary: 'green', secondary: 'red' } });
  });

  it('should follow the order of enabling statements', async () => {
    write('solstice.yml', 'modules:\n  enabled_modules:\n    - desktop::wallpaper\n    - terminal\n');

    const config = await load();

    expect(config.definitions.map((definition) => definition.name)).toEqual(['desktop::wallpaper', 'terminal']);
    expect(config.definedNames.has('editor')).toBe(true);
  });

  it('should report every missing module and directory together', async () => {
    write('solstice.yml', 'modules:\n  enabled_modules:\n    - ghost\n    - nowhere::thing\n');

    expect(await loadErrors()).toEqual([
      `modules.enabled_modules[0]: Module "ghost" is not defined in ${path.join(configDir, 'modules.yml')}`,
      `modules.enabled_modules[1]: Module directory "${path.join(configDir, 'modules', 'nowhere')}" does not exist`,
    ]);
  });

  it('should report malformed module definitions', async () => {
    write('modules.yml', 'bad:\n  on_start: {}\n');

    expect(await loadErrors()).toEqual(['modules.bad: modules.bad has unknown keys: on_start']);
  });

  it('should reject context files that are not mappings', async () => {
    write('context/list.yml', '- a\n- b\n');

    expect(await loadErrors()).toEqual([`${path.join('context', 'list.yml')}: Context file must be a mapping`]);
  });

  it('should fetch GitHub sources into the modules directory', async () => {
    write('solstice.yml', 'modules:\n  enabled_modules:\n    - name: github::someone/dots::bar\n      autoupdate: true\n');

    const config = await load();
    const destination = path.join(configDir, 'modules', 'someone', 'dots');

    expect(fetcher.calls).toEqual([{ repository: { user: 'someone', repo: 'dots' }, destination, update: true }]);
    expect(config.definitions.map((definition) => definition.name)).toEqual(['github::someone/dots::bar']);
    expect(config.definitions[0]?.directory).toBe(destination);
  });

  it('should reject malformed GitHub sources', async () => {
    write('solstice.yml', 'modules:\n  enabled_modules:\n    - github::not-a-repository\n');

    expect(await loadErrors()).toEqual([
      'modules.enabled_modules[0]: Invalid GitHub module source "github::not-a-repository"',
    ]);
    expect(fetcher.calls).toEqual([]);
  });

  it('should keep only the requested modules', async () => {
    const config = await load({ only: ['desktop::wallpaper'] });

    expect(config.definitions.map((definition) => definition.name)).toEqual(['desktop::wallpaper']);
    expect(await loadErrors({ only: ['ghost'] })).toEqual(['--module: Module "ghost" is not enabled']);
  });
});
