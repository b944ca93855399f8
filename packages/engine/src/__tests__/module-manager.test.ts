import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { defaultCompileTarget } from '../actions/action-executor.js';
import { ConfigurationError } from '../errors.js';
import { Module, parseModuleDefinition } from '../module/module.js';
import { ModuleManager } from '../module/module-manager.js';
import type { ModuleManagerOptions } from '../module/module-manager.js';
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

describe('parseModuleDefinition', () => {
  it('should default to an enabled static module', () => {
    const definition = parseModuleDefinition('plain', null, '/modules');

    expect(definition.enabled).toBe(true);
    expect(definition.eventListener).toEqual({ type: 'static' });
    expect(definition.requirements).toEqual([]);
    expect(definition.blocks.on_startup.actions).toEqual([]);
  });

  it('should read disabling strings', () => {
    expect(parseModuleDefinition('a', { enabled: 'off' }, '/m').enabled).toBe(false);
    expect(parseModuleDefinition('a', { enabled: 'no' }, '/m').enabled).toBe(false);
    expect(parseModuleDefinition('a', { enabled: 'yes' }, '/m').enabled).toBe(true);
  });

  it('should reject unknown keys', () => {
    expect(() => parseModuleDefinition('a', { on_start: {} }, '/m')).toThrow('modules.a has unknown keys: on_start');
  });
});

describe('Module', () => {
  it('should move between idle and executing until disabled', () => {
    const module = new Module(parseModuleDefinition('a', {}, '/m'), { logger: createMockLogger() });

    expect(module.state).toBe('idle');
    module.beginExecution('on_startup');
    expect(module.state).toBe('executing');
    expect(module.executing).toBe('on_startup');
    module.endExecution();
    expect(module.state).toBe('idle');

    module.disable('requirements not met');
    expect(module.state).toBe('disabled');
    expect(module.actionsFor({ block: 'on_startup' })).toEqual([]);
    expect(() => module.beginExecution('on_event')).toThrow('Module "a" is disabled');
  });

  it('should fail construction on a trigger cycle', () => {
    const definition = parseModuleDefinition(
      'loop',
      { on_startup: { trigger: 'on_exit' }, on_exit: { trigger: 'on_startup' } },
      '/m'
    );

    expect(() => new Module(definition, { logger: createMockLogger() })).toThrow(ConfigurationError);
  });
});

describe('ModuleManager', () => {
  let tmpDir: string;
  let moduleDir: string;
  let stateDir: string;
  let logger: Logger;
  let shell: FakeShellRunner;
  let clock: Date;

  async function createManager(
    modules: Record<string, unknown>,
    overrides: Partial<ModuleManagerOptions> = {}
  ): Promise<ModuleManager> {
    const definitions = Object.entries(modules).map(([name, raw]) => parseModuleDefinition(name, raw, moduleDir));
    return ModuleManager.create({
      definitions,
      stateDir,
      logger,
      shell,
      now: () => clock,
      env: { HOME: tmpDir },
      ...overrides,
    });
  }

  function write(relative: string, content: string): string {
    const filePath = path.join(moduleDir, relative);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  function read(relative: string): string {
    return fs.readFileSync(path.join(moduleDir, relative), 'utf-8');
  }

  beforeEach(() => {
    tmpDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'solstice-manager-')));
    moduleDir = path.join(tmpDir, 'config');
    stateDir = path.join(tmpDir, 'state');
    fs.mkdirSync(moduleDir);
    logger = createMockLogger();
    shell = new FakeShellRunner();
    clock = new Date(2024, 0, 1, 12, 0, 0);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should import all context, then materialize all files, then run commands', async () => {
    write('ctx-a.yml', 'fromA: world\n');
    write('ctx-b.yml', 'fromB: hello\n');
    write('template.a', '{{ fromB }}');
    write('template.b', '{{ fromA }}');
    const filesPresent: boolean[] = [];
    shell = new FakeShellRunner(() => {
      filesPresent.push(fs.existsSync(path.join(moduleDir, 'out', 'a')) && fs.existsSync(path.join(moduleDir, 'out', 'b')));
      return {};
    });

    const manager = await createManager({
      a: {
        on_startup: {
          run: 'a-run',
          compile: { content: 'template.a', target: 'out/a' },
          import_context: { from_path: 'ctx-a.yml' },
        },
      },
      b: {
        on_startup: {
          run: 'b-run',
          import_context: { from_path: 'ctx-b.yml' },
          compile: { content: 'template.b', target: 'out/b' },
        },
      },
    });
    await manager.startup();

    expect(read('out/a')).toBe('hello');
    expect(read('out/b')).toBe('world');
    expect(shell.executed).toEqual(['a-run', 'b-run']);
    expect(filesPresent).toEqual([true, true]);
  });

  it('should leave no trace of modules whose requirements fail', async () => {
    write('ctx.yml', 'leaked: true\n');
    write('template.conf', 'x');

    const manager = await createManager({
      needs_env: {
        requires: { env: 'MISSING_VARIABLE' },
        on_startup: {
          import_context: { from_path: 'ctx.yml' },
          compile: { content: 'template.conf', target: 'out/conf' },
          run: 'should-not-run',
        },
      },
      dependent: {
        requires: { module: 'needs_env' },
        on_startup: { run: 'dependent-run' },
      },
    });
    await manager.startup();
    await manager.exit();

    expect(manager.getModule('needs_env')?.state).toBe('disabled');
    expect(manager.getModule('dependent')?.state).toBe('disabled');
    expect(manager.enabledModules).toEqual([]);
    expect(manager.context.has('leaked')).toBe(false);
    expect(fs.existsSync(path.join(moduleDir, 'out', 'conf'))).toBe(false);
    expect(shell.executed).toEqual([]);
  });

  it('should reject a requirement on an undefined module', async () => {
    await expect(createManager({ a: { requires: { module: 'ghost' } } })).rejects.toThrow(
      'Unresolvable module requirements: module "a" requires undefined module "ghost"'
    );
  });

  it('should reject module requirement cycles', async () => {
    await expect(
      createManager({ a: { requires: { module: 'b' } }, b: { requires: { module: 'a' } } })
    ).rejects.toThrow(ConfigurationError);
  });

  it('should skip modules switched off in their definition', async () => {
    const manager = await createManager({ off: { enabled: false, on_startup: { run: 'nope' } }, on: {} });
    await manager.startup();

    expect(manager.enabledModules.map((module) => module.name)).toEqual(['on']);
    expect(shell.executed).toEqual([]);
  });

  it('should run on_event when the weekday changes', async () => {
    const manager = await createManager({
      weekly: {
        event_listener: { type: 'weekday' },
        on_startup: { run: 'startup {event}' },
        on_event: { run: 'switch {event}' },
      },
    });

    await manager.startup();
    expect(shell.executed).toEqual(['startup monday']);
    expect(manager.nextEventChangeAt()).toEqual(new Date(2024, 0, 2));
    expect(await manager.checkEvents()).toEqual([]);

    clock = new Date(2024, 0, 2, 0, 0, 1);

    expect(await manager.checkEvents()).toEqual(['weekly']);
    expect(shell.executed).toEqual(['startup monday', 'switch tuesday']);
    expect(await manager.checkEvents()).toEqual([]);
    expect(manager.events()).toEqual({ weekly: 'tuesday' });
  });

  it('should resolve trigger paths with the current event', async () => {
    const manager = await createManager({
      weekly: {
        event_listener: { type: 'weekday' },
        on_startup: { trigger: { block: 'on_modified', path: '{event}.conf' } },
        on_modified: { 'monday.conf': { run: 'reload monday' }, 'tuesday.conf': { run: 'reload tuesday' } },
      },
    });

    await manager.startup();

    expect(shell.executed).toEqual(['reload monday']);
  });

  it('should run on_setup actions once across restarts until reset', async () => {
    const modules = { fonts: { on_setup: { run: 'fc-cache' }, on_startup: { run: 'startup' } } };

    await (await createManager(modules)).startup();
    const second = await createManager(modules);
    await second.startup();

    expect(shell.executed).toEqual(['fc-cache', 'startup', 'startup']);

    expect(second.resetSetup('fonts')).toBe(true);
    await (await createManager(modules)).startup();

    expect(shell.executed).toEqual(['fc-cache', 'startup', 'startup', 'fc-cache', 'startup']);
  });

  it('should only log in dry run and record nothing', async () => {
    write('template.conf', 'x');
    const modules = {
      a: {
        on_setup: { run: 'setup' },
        on_startup: { compile: { content: 'template.conf', target: 'out/conf' }, run: 'startup' },
      },
    };

    await (await createManager(modules, { dryRun: true })).startup();

    expect(shell.executed).toEqual([]);
    expect(fs.existsSync(path.join(moduleDir, 'out', 'conf'))).toBe(false);

    await (await createManager(modules)).startup();

    expect(shell.executed).toEqual(['setup', 'startup']);
  });

  it('should dispatch on_modified for a declared path', async () => {
    const template = write('template.conf', 'x');
    const manager = await createManager({
      a: { on_modified: { 'template.conf': { run: 'reload' } } },
    });
    await manager.startup();

    expect(manager.watchedPaths()).toEqual([template]);
    expect(await manager.fileModified(template)).toBe(true);
    expect(await manager.fileModified(path.join(moduleDir, 'other'))).toBe(false);
    expect(shell.executed).toEqual(['reload']);
  });

  it('should recompile a modified template when reprocessing is on', async () => {
    const template = write('template.conf', 'first');
    const manager = await createManager(
      { a: { on_startup: { compile: { content: 'template.conf', target: 'out/conf' } } } },
      { settings: { reprocessModifiedFiles: true } }
    );
    await manager.startup();

    expect(manager.watchedPaths()).toEqual([template]);

    fs.writeFileSync(template, 'second');
    expect(await manager.fileModified(template)).toBe(true);
    expect(read('out/conf')).toBe('second');
  });

  it('should not reprocess without the setting', async () => {
    const template = write('template.conf', 'first');
    const manager = await createManager({
      a: { on_startup: { compile: { content: 'template.conf', target: 'out/conf' } } },
    });
    await manager.startup();

    fs.writeFileSync(template, 'second');

    expect(manager.watchedPaths()).toEqual([]);
    expect(await manager.fileModified(template)).toBe(false);
    expect(read('out/conf')).toBe('first');
  });

  it('should substitute the default compile target into run commands', async () => {
    write('template.conf', 'x');
    const manager = await createManager({
      a: { on_startup: { compile: { content: 'template.conf' }, run: 'cat {template.conf}' } },
    });
    await manager.startup();

    const target = defaultCompileTarget(path.join(stateDir, 'compiled'), path.join(moduleDir, 'template.conf'));
    expect(shell.executed).toEqual([`cat ${target}`]);
  });

  it('should continue after a failing action', async () => {
    const manager = await createManager({
      a: { on_startup: { compile: { content: 'missing.conf', target: 'out' }, run: 'after' } },
    });
    await manager.startup();

    expect(shell.executed).toEqual(['after']);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ module: 'a', action: 'compile' }),
      `Template "${path.join(moduleDir, 'missing.conf')}" does not exist`
    );
    expect(manager.getModule('a')?.state).toBe('idle');
  });

  it('should run a single block of one module', async () => {
    const manager = await createManager({
      a: { on_exit: { run: 'a-exit' } },
      b: { on_exit: { run: 'b-exit' } },
    });

    await manager.runModuleBlock('b', 'on_exit');
    expect(shell.executed).toEqual(['b-exit']);

    await manager.exit();
    expect(shell.executed).toEqual(['b-exit', 'a-exit', 'b-exit']);
  });

  it('should clean up the files of a module', async () => {
    write('template.conf', 'x');
    const manager = await createManager({
      a: { on_startup: { compile: { content: 'template.conf', target: 'out/conf' } } },
    });
    await manager.startup();

    const target = path.join(moduleDir, 'out', 'conf');
    expect(manager.cleanup('a')).toEqual({ removed: [target], restored: [], missing: [] });
    expect(fs.existsSync(target)).toBe(false);
  });
});
