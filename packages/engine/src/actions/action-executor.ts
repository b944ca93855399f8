/**
 * Executes single actions for a module.
 *
 * The executor is stateless across modules: everything module-specific
 * (directory, context, placeholder scope, dry-run flag) travels in the
 * ExecutionScope. Failures are thrown as ActionFailure; the caller decides
 * to log and carry on.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Logger } from 'pino';
import type { Context } from '../context/context.js';
import { ActionFailure, toError } from '../errors.js';
import type { CreatedFiles, Creation, CreationMethod } from '../persistence/created-files.js';
import type { Renderer } from '../render/renderer.js';
import type { ShellRunner } from '../shell/shell-runner.js';
import { isRecord } from '../utils/guards.js';
import { readYamlFile } from '../utils/yaml.js';
import { prepareTarget } from './backup.js';
import { isDirectory, pathExists, planFiles, unmatchedFiles } from './file-matching.js';
import type { FilePlan } from './file-matching.js';
import { applyPermissions } from './permissions.js';
import { expandPath, substitutePlaceholders } from './placeholders.js';
import type { PlaceholderScope } from './placeholders.js';
import type { ExpandedAction } from './triggers.js';
import type {
  CompileAction,
  CopyAction,
  ImportContextAction,
  Materialized,
  RunAction,
  StowAction,
  SymlinkAction,
} from './types.js';

export interface ExecutionScope {
  module: string;
  /** Anchor of relative paths and working directory of commands */
  directory: string;
  context: Context;
  logger: Logger;
  dryRun: boolean;
  /** Executing on_setup: created files are marked as setup files */
  setup: boolean;
  placeholders: PlaceholderScope;
  /** Written by compile actions; read by placeholder substitution */
  compiledTargets: Map<string, string>;
}

export interface ActionOutcome {
  /** Files compiled or copied from a source (reprocessing candidates) */
  materialized: Materialized[];
  /** Output of a run action */
  stdout?: string;
}

export interface ActionExecutorOptions {
  renderer: Renderer;
  shell: ShellRunner;
  createdFiles: CreatedFiles;
  /** Directory for compile targets that are not configured */
  compiledDir: string;
  /** Default run timeout in seconds */
  runTimeout: number;
  env?: NodeJS.ProcessEnv;
}

const NOTHING: ActionOutcome = { materialized: [] };

/** Deterministic target for a template compiled without a configured target */
export function defaultCompileTarget(compiledDir: string, content: string): string {
  const digest = crypto.createHash('sha256').update(path.resolve(content)).digest('hex').slice(0, 16);
  return path.join(compiledDir, `${digest}-${path.basename(content)}`);
}

export class ActionExecutor {
  private readonly renderer: Renderer;
  private readonly shell: ShellRunner;
  private readonly createdFiles: CreatedFiles;
  private readonly compiledDir: string;
  private readonly runTimeout: number;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ActionExecutorOptions) {
    this.renderer = options.renderer;
    this.shell = options.shell;
    this.createdFiles = options.createdFiles;
    this.compiledDir = options.compiledDir;
    this.runTimeout = options.runTimeout;
    this.env = options.env ?? process.env;
  }

  async execute(action: ExpandedAction, scope: ExecutionScope): Promise<ActionOutcome> {
    try {
      switch (action.kind) {
        case 'import_context':
          this.importContext(action, scope);
          return NOTHING;
        case 'compile':
          return this.compile(action, scope);
        case 'copy':
          return this.copy(action, scope);
        case 'symlink':
          return this.symlink(action, scope);
        case 'stow':
          return this.stow(action, scope);
        case 'run':
          return await this.run(action, scope);
      }
    } catch (err) {
      if (err instanceof ActionFailure) throw err;
      throw new ActionFailure(scope.module, action.kind, toError(err).message);
    }
  }

  // ─── import_context ───────────────────────────────────────────────

  private importContext(action: ImportContextAction, scope: ExecutionScope): void {
    const fromPath = this.resolvePath(action.fromPath, scope);
    const log = scope.logger.child({ action: 'import_context' });

    if (!fs.existsSync(fromPath)) {
      log.warn({ path: fromPath }, `Context file "${fromPath}" does not exist`);
      return;
    }

    const parsed = readYamlFile(fromPath) ?? {};
    if (!isRecord(parsed)) {
      log.warn({ path: fromPath }, `Context file "${fromPath}" does not contain a mapping`);
      return;
    }

    if (action.fromSection === undefined) {
      scope.context.merge(parsed);
      log.debug({ path: fromPath }, 'Imported context');
      return;
    }

    const fromSection = substitutePlaceholders(action.fromSection, scope.placeholders);
    const section = parsed[fromSection];
    if (!isRecord(section)) {
      log.warn({ path: fromPath, section: fromSection }, `Context file "${fromPath}" has no section "${fromSection}"`);
      return;
    }

    const toSection =
      action.toSection !== undefined ? substitutePlaceholders(action.toSection, scope.placeholders) : fromSection;
    scope.context.merge({ [toSection]: section });
    log.debug({ path: fromPath, from: fromSection, to: toSection }, 'Imported context section');
  }

  // ─── compile ──────────────────────────────────────────────────────

  private compile(action: CompileAction, scope: ExecutionScope): ActionOutcome {
    const content = this.resolvePath(action.content, scope);
    if (!pathExists(content)) {
      throw new ActionFailure(scope.module, 'compile', `Template "${content}" does not exist`);
    }

    const target =
      action.target !== undefined
        ? this.resolvePath(action.target, scope)
        : defaultCompileTarget(this.compiledDir, content);
    const plans = planFiles(content, target, this.pattern(action.include, scope));
    // Only a single template has a path for its shortname
    const single = isDirectory(content) ? undefined : plans[0];

    if (scope.dryRun) {
      for (const plan of plans) {
        scope.logger.info({ action: 'compile', ...plan }, `SKIPPED: Compiling "${plan.source}" to "${plan.target}"`);
      }
      if (single) scope.compiledTargets.set(action.content, single.target);
      return NOTHING;
    }

    for (const plan of plans) {
      this.record(scope, 'compiled', this.compileFile(plan, action.permissions, scope));
    }
    if (single) scope.compiledTargets.set(action.content, single.target);
    return { materialized: plans };
  }

  private compileFile(plan: FilePlan, permissions: string | undefined, scope: ExecutionScope): Creation {
    const source = fs.readFileSync(plan.source, 'utf-8');
    const rendered = this.renderer.render(source, this.renderContext(scope), plan.source);

    const backup = prepareTarget(plan.target, this.createdFiles, scope.logger);
    fs.writeFileSync(plan.target, rendered, 'utf-8');
    fs.chmodSync(plan.target, applyPermissions(fs.statSync(plan.source).mode, permissions));

    scope.logger.info({ action: 'compile', ...plan }, `Compiled "${plan.source}" to "${plan.target}"`);
    return { content: plan.source, target: plan.target, backup };
  }

  private renderContext(scope: ExecutionScope): Record<string, unknown> {
    const view = scope.context.toRenderable();
    if (!('env' in view)) {
      view['env'] = { ...this.env };
    }
    return view;
  }

  // ─── copy ─────────────────────────────────────────────────────────

  private copy(action: CopyAction, scope: ExecutionScope): ActionOutcome {
    const content = this.resolvePath(action.content, scope);
    if (!pathExists(content)) {
      throw new ActionFailure(scope.module, 'copy', `Content "${content}" does not exist`);
    }

    const plans = planFiles(content, this.resolvePath(action.target, scope), this.pattern(action.include, scope));
    if (scope.dryRun) {
      for (const plan of plans) {
        scope.logger.info({ action: 'copy', ...plan }, `SKIPPED: Copying "${plan.source}" to "${plan.target}"`);
      }
      return NOTHING;
    }

    for (const plan of plans) {
      this.record(scope, 'copied', this.copyFile(plan, action.permissions, scope));
    }
    return { materialized: plans };
  }

  private copyFile(plan: FilePlan, permissions: string | undefined, scope: ExecutionScope): Creation {
    const backup = prepareTarget(plan.target, this.createdFiles, scope.logger);
    fs.copyFileSync(plan.source, plan.target);
    fs.chmodSync(plan.target, applyPermissions(fs.statSync(plan.source).mode, permissions));

    scope.logger.info({ action: 'copy', ...plan }, `Copied "${plan.source}" to "${plan.target}"`);
    return { content: plan.source, target: plan.target, backup };
  }

  // ─── symlink ──────────────────────────────────────────────────────

  private symlink(action: SymlinkAction, scope: ExecutionScope): ActionOutcome {
    const content = this.resolvePath(action.content, scope);
    if (!pathExists(content)) {
      throw new ActionFailure(scope.module, 'symlink', `Content "${content}" does not exist`);
    }

    const plans = planFiles(content, this.resolvePath(action.target, scope), this.pattern(action.include, scope));
    if (scope.dryRun) {
      for (const plan of plans) {
        scope.logger.info({ action: 'symlink', ...plan }, `SKIPPED: Linking "${plan.target}" to "${plan.source}"`);
      }
      return NOTHING;
    }

    for (const plan of plans) {
      this.record(scope, 'symlinked', this.linkFile(plan, scope));
    }
    return NOTHING;
  }

  private linkFile(plan: FilePlan, scope: ExecutionScope): Creation {
    if (pathExists(plan.target) && fs.lstatSync(plan.target).isSymbolicLink()) {
      if (fs.readlinkSync(plan.target) === plan.source) {
        return { content: plan.source, target: plan.target };
      }
    }

    const backup = prepareTarget(plan.target, this.createdFiles, scope.logger);
    if (pathExists(plan.target)) {
      fs.unlinkSync(plan.target);
    }
    fs.symlinkSync(plan.source, plan.target);

    scope.logger.info({ action: 'symlink', ...plan }, `Linked "${plan.target}" to "${plan.source}"`);
    return { content: plan.source, target: plan.target, backup };
  }

  // ─── stow ─────────────────────────────────────────────────────────

  private stow(action: StowAction, scope: ExecutionScope): ActionOutcome {
    const content = this.resolvePath(action.content, scope);
    if (!isDirectory(content)) {
      throw new ActionFailure(scope.module, 'stow', `Stow content "${content}" is not a directory`);
    }
    const target = this.resolvePath(action.target, scope);

    const pattern = this.pattern(action.templates, scope);
    const templates = planFiles(content, target, pattern);
    const others = action.nonTemplates === 'ignore' ? [] : unmatchedFiles(content, target, pattern);

    if (scope.dryRun) {
      for (const plan of templates) {
        scope.logger.info({ action: 'stow', ...plan }, `SKIPPED: Compiling "${plan.source}" to "${plan.target}"`);
      }
      for (const plan of others) {
        scope.logger.info(
          { action: 'stow', ...plan },
          `SKIPPED: ${action.nonTemplates === 'copy' ? 'Copying' : 'Linking'} "${plan.source}" to "${plan.target}"`
        );
      }
      return NOTHING;
    }

    for (const plan of templates) {
      this.record(scope, 'compiled', this.compileFile(plan, action.permissions, scope));
    }

    if (action.nonTemplates === 'copy') {
      for (const plan of others) {
        this.record(scope, 'copied', this.copyFile(plan, action.permissions, scope));
      }
      return { materialized: [...templates, ...others] };
    }

    for (const plan of others) {
      this.record(scope, 'symlinked', this.linkFile(plan, scope));
    }
    return { materialized: templates };
  }

  // ─── run ──────────────────────────────────────────────────────────

  private async run(action: RunAction, scope: ExecutionScope): Promise<ActionOutcome> {
    const command = substitutePlaceholders(action.shell, scope.placeholders);
    const log = scope.logger.child({ action: 'run' });

    if (scope.dryRun) {
      log.info({ command }, `SKIPPED: Running "${command}"`);
      return NOTHING;
    }

    const timeout = action.timeout ?? this.runTimeout;
    log.info({ command, timeout }, `Running "${command}"`);
    const result = await this.shell.run(command, {
      cwd: scope.directory,
      timeoutMs: timeout * 1000,
      env: this.env,
      onTimeout: 'detach',
    });

    if (result.timedOut) {
      log.warn({ command, timeout }, `Command "${command}" still running after ${timeout}s; leaving it in the background`);
    } else if (result.exitCode !== 0) {
      log.error(
        { command, exitCode: result.exitCode, stderr: result.stderr.trim() },
        `Command "${command}" exited with code ${String(result.exitCode)}`
      );
    }
    if (result.stdout.length > 0) {
      log.debug({ command, stdout: result.stdout }, 'Command output');
    }

    return { materialized: [], stdout: result.stdout };
  }

  // ─── helpers ──────────────────────────────────────────────────────

  private resolvePath(value: string, scope: ExecutionScope): string {
    return expandPath(substitutePlaceholders(value, scope.placeholders), {
      directory: scope.directory,
      env: this.env,
    });
  }

  private pattern(value: string, scope: ExecutionScope): string {
    return substitutePlaceholders(value, scope.placeholders);
  }

  /** Called after each file, before the next one is attempted */
  private record(scope: ExecutionScope, method: CreationMethod, creation: Creation): void {
    this.createdFiles.insert(scope.module, method, [creation], { setup: scope.setup });
  }
}
