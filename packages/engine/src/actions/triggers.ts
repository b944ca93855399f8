/**
 * Trigger expansion.
 *
 * A trigger inlines the actions of another block of the same module at the
 * trigger's position. Chains are followed up to MAX_TRIGGER_DEPTH; a chain
 * that revisits a block is a cycle. Both are configuration errors, found when
 * the module is constructed.
 */

import * as path from 'node:path';
import { ConfigurationError } from '../errors.js';
import type { Action, ActionBlock, BlockName, ModuleBlocks, TriggerAction } from './types.js';

export const MAX_TRIGGER_DEPTH = 8;

export type ExpandedAction = Exclude<Action, TriggerAction>;

export interface ExpansionOptions {
  /** Applied to a trigger's on_modified path before the block is looked up */
  substitute?: (text: string) => string;
  /** Called instead of failing when an on_modified path names no block; the trigger is dropped */
  onUndeclared?: (modifiedPath: string) => void;
}

const PLACEHOLDER = /\{[^{}]+\}/;

export interface BlockRef {
  block: BlockName;
  /** on_modified key */
  path?: string;
}

function refKey(ref: BlockRef): string {
  return ref.block === 'on_modified' ? `on_modified[${ref.path ?? ''}]` : ref.block;
}

/** Find the on_modified block declared for `modifiedPath`, tolerating `./` and trailing slashes */
export function findModifiedBlock(blocks: ModuleBlocks, modifiedPath: string): ActionBlock | undefined {
  const exact = blocks.on_modified.get(modifiedPath);
  if (exact) return exact;

  const normalized = path.normalize(modifiedPath);
  for (const [key, block] of blocks.on_modified) {
    if (path.normalize(key) === normalized) return block;
  }
  return undefined;
}

function undeclaredPath(module: string, modifiedPath: string): ConfigurationError {
  return new ConfigurationError(`Module "${module}" triggers on_modified for undeclared path "${modifiedPath}"`);
}

function resolveBlock(
  blocks: ModuleBlocks,
  ref: BlockRef,
  module: string,
  options: ExpansionOptions
): ActionBlock | undefined {
  if (ref.block !== 'on_modified') {
    return blocks[ref.block];
  }

  const block = ref.path === undefined ? undefined : findModifiedBlock(blocks, ref.path);
  if (!block) {
    if (options.onUndeclared) {
      options.onUndeclared(ref.path ?? '');
      return undefined;
    }
    throw undeclaredPath(module, ref.path ?? '');
  }
  return block;
}

/** The actions of `ref` with every trigger replaced by the actions it names */
export function expandBlock(
  blocks: ModuleBlocks,
  ref: BlockRef,
  module: string,
  options: ExpansionOptions = {}
): ExpandedAction[] {
  const expanded: ExpandedAction[] = [];
  const substitute = options.substitute ?? ((text: string) => text);

  const visit = (current: BlockRef, chain: string[]): void => {
    const key = refKey(current);
    if (chain.includes(key)) {
      throw new ConfigurationError(`Module "${module}" has a trigger cycle: ${[...chain, key].join(' -> ')}`);
    }
    if (chain.length > MAX_TRIGGER_DEPTH) {
      throw new ConfigurationError(
        `Module "${module}" nests triggers deeper than ${MAX_TRIGGER_DEPTH}: ${[...chain, key].join(' -> ')}`
      );
    }

    const block = resolveBlock(blocks, current, module, options);
    if (!block) return;

    for (const action of block.actions) {
      if (action.kind === 'trigger') {
        const triggerPath = action.path === undefined ? undefined : substitute(action.path);
        visit({ block: action.block, path: triggerPath }, [...chain, key]);
      } else {
        expanded.push(action);
      }
    }
  };

  visit(ref, []);
  return expanded;
}

/**
 * Expand every block once so trigger errors surface at construction.
 * Trigger paths with placeholders depend on the current event and are
 * checked when they are executed.
 */
export function validateTriggers(blocks: ModuleBlocks, module: string): void {
  const options: ExpansionOptions = {
    onUndeclared: (modifiedPath) => {
      if (!PLACEHOLDER.test(modifiedPath)) {
        throw undeclaredPath(module, modifiedPath);
      }
    },
  };
  for (const block of ['on_setup', 'on_startup', 'on_event', 'on_exit'] as const) {
    expandBlock(blocks, { block }, module, options);
  }
  for (const modifiedPath of blocks.on_modified.keys()) {
    expandBlock(blocks, { block: 'on_modified', path: modifiedPath }, module, options);
  }
}
