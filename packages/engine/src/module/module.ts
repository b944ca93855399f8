/**
 * A module: one functional unit of configuration.
 *
 * Owns one event listener, its requirement clauses and up to five action
 * blocks. The module does not execute anything itself; the ModuleManager
 * asks it for the (trigger-expanded) actions of a block and runs them in
 * global phase order.
 *
 * State: disabled (terminal) | idle <-> executing
 */

import * as path from 'node:path';
import type { Logger } from 'pino';
import type { Context } from '../context/context.js';
import { ConfigurationError, PlaceholderUnresolved, RequirementFailure } from '../errors.js';
import { createEventListener, parseEventListenerConfig } from '../event-listener/factory.js';
import type { EventListener } from '../event-listener/event-listener.js';
import type { Clock, EventListenerConfig } from '../event-listener/types.js';
import { parseRequirements } from '../requirements/requirement-checker.js';
import type { RequirementClause } from '../requirements/types.js';
import { isRecord } from '../utils/guards.js';
import { parseModuleBlocks } from '../actions/parse.js';
import { expandBlock, findModifiedBlock, validateTriggers } from '../actions/triggers.js';
import type { BlockRef, ExpandedAction } from '../actions/triggers.js';
import { expandPath, substitutePlaceholders } from '../actions/placeholders.js';
import type { PlaceholderScope } from '../actions/placeholders.js';
import type { ExecutionScope } from '../actions/action-executor.js';
import type { BlockName, ModuleBlocks } from '../actions/types.js';

export type ModuleState = 'disabled' | 'idle' | 'executing';

/** A validated module definition */
export interface ModuleDefinition {
  /** Unique, possibly namespaced (`<dir>::<name>`) */
  name: string;
  /** Absolute directory relative paths are anchored at */
  directory: string;
  enabled: boolean;
  requirements: RequirementClause[];
  eventListener: EventListenerConfig;
  blocks: ModuleBlocks;
}

const DISABLED_VALUES = new Set(['false', 'off', 'disabled', 'no', '0']);

function parseEnabled(value: unknown, field: string): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') return !DISABLED_VALUES.has(value.trim().toLowerCase());
  throw new ConfigurationError(`${field}.enabled must be a boolean`);
}

const DEFINITION_KEYS = new Set([
  'enabled',
  'requires',
  'event_listener',
  'on_setup',
  'on_startup',
  'on_event',
  'on_exit',
  'on_modified',
]);

/** Validate one entry of a modules file */
export function parseModuleDefinition(name: string, raw: unknown, directory: string): ModuleDefinition {
  const field = `modules.${name}`;
  const definition = raw === null || raw === undefined ? {} : raw;
  if (!isRecord(definition)) {
    throw new ConfigurationError(`${field} must be a mapping`);
  }

  const unknownKeys = Object.keys(definition).filter((key) => !DEFINITION_KEYS.has(key));
  if (unknownKeys.length > 0) {
    throw new ConfigurationError(`${field} has unknown keys: ${unknownKeys.join(', ')}`);
  }

  return {
    name,
    directory: path.resolve(directory),
    enabled: parseEnabled(definition['enabled'], field),
    requirements: parseRequirements(definition['requires'], `${field}.requires`),
    eventListener: parseEventListenerConfig(definition['event_listener'], `${field}.event_listener`),
    blocks: parseModuleBlocks(definition, field),
  };
}

export interface ModuleOptions {
  logger: Logger;
  /** Clock handed to the event listener */
  now?: Clock;
  env?: NodeJS.ProcessEnv;
}

export class Module {
  readonly name: string;
  readonly directory: string;
  readonly requirements: readonly RequirementClause[];
  readonly listener: EventListener;
  readonly blocks: ModuleBlocks;
  /** Template `content` strings, as written, usable as `{placeholders}` */
  readonly shortnames: ReadonlySet<string>;
  /** Latest compile target per shortname */
  readonly compiledTargets: Map<string, string> = new Map();

  private readonly logger: Logger;
  private readonly env: NodeJS.ProcessEnv;
  private _state: ModuleState;
  private _executing: BlockName | null = null;

  constructor(definition: ModuleDefinition, options: ModuleOptions) {
    this.name = definition.name;
    this.directory = definition.directory;
    this.requirements = definition.requirements;
    this.blocks = definition.blocks;
    this.logger = options.logger.child({ module: definition.name });
    this.env = options.env ?? process.env;
    this._state = definition.enabled ? 'idle' : 'disabled';

    validateTriggers(this.blocks, this.name);
    this.shortnames = collectShortnames(this.blocks);
    this.listener = createEventListener(definition.eventListener, { logger: this.logger, now: options.now });
  }

  get state(): ModuleState {
    return this._state;
  }

  get enabled(): boolean {
    return this._state !== 'disabled';
  }

  /** Block currently executing, if any */
  get executing(): BlockName | null {
    return this._executing;
  }

  /** Module names this module requires */
  get dependsOn(): string[] {
    return this.requirements.flatMap((clause) => (clause.kind === 'module' ? [clause.module] : []));
  }

  /** Disabling is permanent for the lifetime of the process */
  disable(reason: string): void {
    if (this._state === 'disabled') return;
    this._state = 'disabled';
    const failure = new RequirementFailure(this.name, `Module "${this.name}" disabled: ${reason}`);
    this.logger.warn({ reason }, failure.message);
  }

  beginExecution(block: BlockName): void {
    if (this._state === 'disabled') {
      throw new Error(`Module "${this.name}" is disabled`);
    }
    this._state = 'executing';
    this._executing = block;
  }

  endExecution(): void {
    if (this._state === 'executing') {
      this._state = 'idle';
    }
    this._executing = null;
  }

  /** Trigger-expanded actions of a block; empty for a disabled module */
  actionsFor(ref: BlockRef): ExpandedAction[] {
    if (!this.enabled) return [];
    if (ref.block === 'on_modified' && (ref.path === undefined || !findModifiedBlock(this.blocks, ref.path))) {
      return [];
    }
    const placeholders = this.placeholderScope();
    return expandBlock(this.blocks, ref, this.name, {
      substitute: (text) => substitutePlaceholders(text, placeholders),
      onUndeclared: (modifiedPath) => {
        this.logger.warn({ path: modifiedPath }, `No on_modified block declared for "${modifiedPath}"; skipping trigger`);
      },
    });
  }

  /** Absolute watched path -> on_modified key as written */
  modifiedPaths(): Map<string, string> {
    const paths = new Map<string, string>();
    for (const key of this.blocks.on_modified.keys()) {
      paths.set(expandPath(key, { directory: this.directory, env: this.env }), key);
    }
    return paths;
  }

  placeholderScope(): PlaceholderScope {
    return {
      currentEvent: () => this.listener.currentEvent(),
      compiledTargets: this.compiledTargets,
      shortnames: this.shortnames,
      onUnresolved: (shortname: string) => {
        const err = new PlaceholderUnresolved(shortname);
        this.logger.warn({ placeholder: shortname }, err.message);
      },
    };
  }

  executionScope(context: Context, options: { dryRun: boolean; setup: boolean }): ExecutionScope {
    return {
      module: this.name,
      directory: this.directory,
      context,
      logger: this.logger,
      dryRun: options.dryRun,
      setup: options.setup,
      placeholders: this.placeholderScope(),
      compiledTargets: this.compiledTargets,
    };
  }
}

function collectShortnames(blocks: ModuleBlocks): Set<string> {
  const shortnames = new Set<string>();
  const all = [blocks.on_setup, blocks.on_startup, blocks.on_event, blocks.on_exit, ...blocks.on_modified.values()];
  for (const block of all) {
    for (const action of block.actions) {
      if (action.kind === 'compile') shortnames.add(action.content);
    }
  }
  return shortnames;
}
