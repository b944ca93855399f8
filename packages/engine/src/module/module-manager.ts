/**
 * Owns the module collection, the shared Context and the persisted logs,
 * and executes action blocks across modules in global phase order:
 *
 *   1. import_context  (every module, declared module order)
 *   2. compile / copy / symlink / stow
 *   3. run
 *
 * A failing action is logged with its module and kind; execution continues
 * with the next action. Only construction (`create`) can throw, and only
 * ConfigurationError.
 */

import * as path from 'node:path';
import type { Logger } from 'pino';
import { Context } from '../context/context.js';
import { toError } from '../errors.js';
import type { Clock } from '../event-listener/types.js';
import { ActionExecutor } from '../actions/action-executor.js';
import type { ActionOutcome } from '../actions/action-executor.js';
import type { BlockRef, ExpandedAction } from '../actions/triggers.js';
import { isFileAction } from '../actions/types.js';
import type { BlockName } from '../actions/types.js';
import { CreatedFiles } from '../persistence/created-files.js';
import type { CleanupOptions, CleanupResult } from '../persistence/created-files.js';
import { ExecutedActions } from '../persistence/executed-actions.js';
import { COMPILED_DIRNAME, CREATED_FILES_FILENAME, SETUP_FILENAME } from '../persistence/state-dir.js';
import { NunjucksRenderer } from '../render/renderer.js';
import type { Renderer } from '../render/renderer.js';
import { RequirementChecker, DEFAULT_REQUIRES_TIMEOUT } from '../requirements/requirement-checker.js';
import { resolveModuleDependencies } from '../requirements/dependencies.js';
import type { DependencyNode } from '../requirements/dependencies.js';
import { ChildProcessShellRunner } from '../shell/shell-runner.js';
import type { ShellRunner } from '../shell/shell-runner.js';
import { Module } from './module.js';
import type { ModuleDefinition } from './module.js';

export interface ModuleSettings {
  /** Default timeout of shell requirements (seconds) */
  requiresTimeout: number;
  /** Default timeout of run actions (seconds) */
  runTimeout: number;
  /** Re-execute compile/copy/stow actions when their sources change */
  reprocessModifiedFiles: boolean;
}

export const DEFAULT_MODULE_SETTINGS: ModuleSettings = {
  requiresTimeout: DEFAULT_REQUIRES_TIMEOUT,
  runTimeout: 0,
  reprocessModifiedFiles: false,
};

export interface ModuleManagerOptions {
  /** Selected module definitions, in execution order */
  definitions: readonly ModuleDefinition[];
  /** Every module name defined anywhere in the configuration */
  definedNames?: ReadonlySet<string>;
  /** Initial context (global context files); mutated in place */
  context?: Context;
  settings?: Partial<ModuleSettings>;
  stateDir: string;
  logger: Logger;
  dryRun?: boolean;
  shell?: ShellRunner;
  renderer?: Renderer;
  now?: Clock;
  env?: NodeJS.ProcessEnv;
}

interface ManagedAction {
  module: Module;
  action: ExpandedAction;
}

type Phase = 'import_context' | 'files' | 'run';

function phaseOf(action: ExpandedAction): Phase {
  if (isFileAction(action)) return 'files';
  return action.kind;
}

const PHASES: readonly Phase[] = ['import_context', 'files', 'run'];

export class ModuleManager {
  readonly context: Context;
  readonly createdFiles: CreatedFiles;
  readonly executedActions: ExecutedActions;
  readonly settings: ModuleSettings;
  readonly dryRun: boolean;

  private readonly allModules: Module[];
  private readonly executor: ActionExecutor;
  private readonly logger: Logger;
  /** Source file -> actions that materialized it */
  private readonly managedSources: Map<string, ManagedAction[]> = new Map();

  private constructor(
    modules: Module[],
    options: ModuleManagerOptions,
    settings: ModuleSettings,
    createdFiles: CreatedFiles,
    executedActions: ExecutedActions,
    shell: ShellRunner
  ) {
    this.allModules = modules;
    this.context = options.context ?? new Context();
    this.settings = settings;
    this.dryRun = options.dryRun ?? false;
    this.logger = options.logger.child({ component: 'module-manager' });
    this.createdFiles = createdFiles;
    this.executedActions = executedActions;
    this.executor = new ActionExecutor({
      renderer: options.renderer ?? new NunjucksRenderer({ shell }),
      shell,
      createdFiles,
      compiledDir: path.join(options.stateDir, COMPILED_DIRNAME),
      runTimeout: settings.runTimeout,
      env: options.env,
    });
  }

  /**
   * Build modules and evaluate their requirements.
   * Throws ConfigurationError for malformed definitions, trigger problems,
   * undefined module requirements and requirement cycles.
   */
  static async create(options: ModuleManagerOptions): Promise<ModuleManager> {
    const settings: ModuleSettings = { ...DEFAULT_MODULE_SETTINGS, ...(options.settings ?? {}) };
    const shell = options.shell ?? new ChildProcessShellRunner();

    const modules = options.definitions.map(
      (definition) => new Module(definition, { logger: options.logger, now: options.now, env: options.env })
    );

    const checker = new RequirementChecker({
      logger: options.logger,
      shell,
      timeout: settings.requiresTimeout,
      env: options.env,
    });

    const nodes: DependencyNode[] = [];
    const failures = new Map<string, string>();
    for (const module of modules) {
      let satisfied = module.enabled;
      if (satisfied) {
        const failed = (await checker.check(module.requirements, module.directory)).find((result) => !result.satisfied);
        if (failed) {
          failures.set(module.name, failed.detail);
          satisfied = false;
        }
      }
      nodes.push({ name: module.name, satisfied, dependsOn: module.dependsOn });
    }

    const definedNames = options.definedNames ?? new Set(modules.map((module) => module.name));
    const resolution = resolveModuleDependencies(nodes, definedNames);
    for (const module of modules) {
      const reason = resolution.disabled.get(module.name);
      if (reason !== undefined && module.enabled) {
        module.disable(failures.get(module.name) ?? reason);
      }
    }

    const createdFiles = new CreatedFiles(path.join(options.stateDir, CREATED_FILES_FILENAME), options.logger);
    const executedActions = new ExecutedActions(path.join(options.stateDir, SETUP_FILENAME), options.logger);
    return new ModuleManager(modules, options, settings, createdFiles, executedActions, shell);
  }

  /** Every constructed module, enabled or not */
  get modules(): readonly Module[] {
    return this.allModules;
  }

  get enabledModules(): Module[] {
    return this.allModules.filter((module) => module.enabled);
  }

  getModule(name: string): Module | undefined {
    return this.allModules.find((module) => module.name === name);
  }

  // ─── Lifecycle ────────────────────────────────────────────────────

  /** on_setup (new actions only), then on_startup; records the current events as seen */
  async startup(): Promise<void> {
    await this.setup();
    for (const module of this.enabledModules) {
      module.listener.markSeen();
    }
    await this.executeBlock({ block: 'on_startup' });
  }

  /** Run on_setup actions that have never been executed before */
  async setup(): Promise<void> {
    const pending: ManagedAction[] = [];
    for (const module of this.enabledModules) {
      for (const action of module.actionsFor({ block: 'on_setup' })) {
        if (this.executedActions.isNew(module.name, action.kind, action.options)) {
          pending.push({ module, action });
        }
      }
    }

    await this.executePlan('on_setup', pending, { setup: true });

    if (!this.dryRun) {
      for (const { module, action } of pending) {
        this.executedActions.record(module.name, action.kind, action.options);
      }
    }
  }

  /** Run on_event for every module whose event changed; returns their names */
  async checkEvents(): Promise<string[]> {
    const changed = this.enabledModules.filter((module) => module.listener.hasChanged());
    if (changed.length === 0) return [];

    for (const module of changed) {
      this.logger.info(
        { module: module.name, event: module.listener.currentEvent() },
        `New event "${module.listener.currentEvent()}" for module "${module.name}"`
      );
    }
    await this.executeBlock({ block: 'on_event' }, changed);
    return changed.map((module) => module.name);
  }

  /**
   * Handle a modified file: run the on_modified blocks declared for it and,
   * when reprocessing is on, re-execute the actions that materialized it.
   */
  async fileModified(modifiedPath: string): Promise<boolean> {
    const absolute = path.resolve(modifiedPath);
    let handled = false;

    for (const module of this.enabledModules) {
      const key = module.modifiedPaths().get(absolute);
      if (key === undefined) continue;
      handled = true;
      this.logger.info({ module: module.name, path: absolute }, `Modified "${absolute}"`);
      await this.executeBlock({ block: 'on_modified', path: key }, [module]);
    }

    if (this.settings.reprocessModifiedFiles) {
      const managed = this.managedSources.get(absolute) ?? [];
      for (const { module, action } of managed) {
        if (!module.enabled) continue;
        handled = true;
        this.logger.info({ module: module.name, path: absolute, action: action.kind }, `Reprocessing "${absolute}"`);
        await this.executePlan('on_modified', [{ module, action }], { setup: false });
      }
    }

    return handled;
  }

  async exit(): Promise<void> {
    await this.executeBlock({ block: 'on_exit' });
  }

  /** Execute one block of a single module, still in phase order */
  async runModuleBlock(name: string, block: BlockName, modifiedPath?: string): Promise<void> {
    const module = this.getModule(name);
    if (!module || !module.enabled) {
      this.logger.warn({ module: name }, `Module "${name}" is not enabled`);
      return;
    }
    await this.executeBlock({ block, path: modifiedPath }, [module]);
  }

  /** Execute a block across `modules` (default: all enabled) in global phase order */
  async executeBlock(ref: BlockRef, modules: readonly Module[] = this.enabledModules): Promise<void> {
    const plan: ManagedAction[] = [];
    for (const module of modules) {
      if (!module.enabled) continue;
      for (const action of module.actionsFor(ref)) {
        plan.push({ module, action });
      }
    }
    await this.executePlan(ref.block, plan, { setup: ref.block === 'on_setup' });
  }

  // ─── Scheduling queries ───────────────────────────────────────────

  /** Earliest upcoming event change across enabled modules, or null */
  nextEventChangeAt(): Date | null {
    let earliest: Date | null = null;
    for (const module of this.enabledModules) {
      const next = module.listener.nextEventChangeAt();
      if (next !== null && (earliest === null || next.getTime() < earliest.getTime())) {
        earliest = next;
      }
    }
    return earliest;
  }

  /** Paths the file watcher should observe */
  watchedPaths(): string[] {
    const paths = new Set<string>();
    for (const module of this.enabledModules) {
      for (const watched of module.modifiedPaths().keys()) {
        paths.add(watched);
      }
    }
    if (this.settings.reprocessModifiedFiles) {
      for (const source of this.managedSources.keys()) {
        paths.add(source);
      }
    }
    return [...paths].sort();
  }

  /** Current event of every enabled module */
  events(): Record<string, string> {
    const events: Record<string, string> = {};
    for (const module of this.enabledModules) {
      events[module.name] = module.listener.currentEvent();
    }
    return events;
  }

  // ─── Persisted state ──────────────────────────────────────────────

  cleanup(module: string, options: CleanupOptions = {}): CleanupResult {
    return this.createdFiles.cleanup(module, { dryRun: this.dryRun, ...options });
  }

  resetSetup(module: string): boolean {
    return this.executedActions.reset(module);
  }

  // ─── Execution ────────────────────────────────────────────────────

  private async executePlan(block: BlockName, plan: readonly ManagedAction[], options: { setup: boolean }): Promise<void> {
    if (plan.length === 0) return;

    const participants = [...new Set(plan.map((entry) => entry.module))];
    for (const module of participants) {
      module.beginExecution(block);
    }

    try {
      for (const phase of PHASES) {
        for (const entry of plan) {
          if (phaseOf(entry.action) !== phase) continue;
          await this.executeAction(entry, options);
        }
      }
    } finally {
      for (const module of participants) {
        module.endExecution();
      }
    }
  }

  private async executeAction(entry: ManagedAction, options: { setup: boolean }): Promise<void> {
    const { module, action } = entry;
    const scope = module.executionScope(this.context, { dryRun: this.dryRun, setup: options.setup });

    let outcome: ActionOutcome;
    try {
      outcome = await this.executor.execute(action, scope);
    } catch (err) {
      const error = toError(err);
      this.logger.error({ module: module.name, action: action.kind, err: error }, error.message);
      return;
    }

    if (action.kind === 'symlink') return;
    for (const { source } of outcome.materialized) {
      const managed = this.managedSources.get(source) ?? [];
      if (!managed.some((existing) => existing.module === module && existing.action === action)) {
        managed.push(entry);
        this.managedSources.set(source, managed);
      }
    }
  }
}
