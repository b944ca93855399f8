/**
 * Validation of raw action blocks into typed actions.
 */

import { ConfigurationError } from '../errors.js';
import { isRecord } from '../utils/guards.js';
import { ACTION_KINDS, BLOCK_NAMES } from './types.js';
import type { Action, ActionBlock, ActionKind, BlockName, ModuleBlocks, NonTemplateHandling } from './types.js';

const DEFAULT_INCLUDE = '(.+)';
const DEFAULT_STOW_TEMPLATES = 'template\\.(.+)';
const NON_TEMPLATE_HANDLING: readonly NonTemplateHandling[] = ['symlink', 'copy', 'ignore'];

function isActionKind(value: string): value is ActionKind {
  return ACTION_KINDS.some((kind) => kind === value);
}

function isBlockName(value: unknown): value is BlockName {
  return typeof value === 'string' && BLOCK_NAMES.some((name) => name === value);
}

function requiredString(options: Record<string, unknown>, key: string, field: string): string {
  const value = options[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigurationError(`${field}.${key} is required and must be a non-empty string`);
  }
  return value;
}

function optionalString(options: Record<string, unknown>, key: string, field: string): string | undefined {
  const value = options[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string') {
    throw new ConfigurationError(`${field}.${key} must be a string`);
  }
  return value;
}

function regexOption(options: Record<string, unknown>, key: string, field: string, fallback: string): string {
  const pattern = optionalString(options, key, field) ?? fallback;
  try {
    new RegExp(pattern);
  } catch (err) {
    throw new ConfigurationError(`${field}.${key} is not a valid regular expression: ${String(err)}`);
  }
  return pattern;
}

/** Octal modes written as YAML numbers arrive as their digits, e.g. 755 */
function permissionsOption(options: Record<string, unknown>, field: string): string | undefined {
  return optionalString(options, 'permissions', field);
}

function normalizeOptions(kind: ActionKind, raw: unknown, field: string): Record<string, unknown> {
  if (typeof raw === 'string') {
    if (kind === 'run') return { shell: raw };
    if (kind === 'trigger') return { block: raw };
  }
  if (!isRecord(raw)) {
    throw new ConfigurationError(`${field} must be a mapping of options`);
  }
  return raw;
}

export function parseAction(kind: ActionKind, raw: unknown, field: string): Action {
  const options = normalizeOptions(kind, raw, field);

  switch (kind) {
    case 'import_context': {
      const fromSection = optionalString(options, 'from_section', field);
      const toSection = optionalString(options, 'to_section', field);
      if (toSection !== undefined && fromSection === undefined) {
        throw new ConfigurationError(`${field}: to_section requires from_section`);
      }
      return {
        kind,
        options,
        fromPath: requiredString(options, 'from_path', field),
        fromSection,
        toSection: toSection ?? fromSection,
      };
    }
    case 'compile':
      return {
        kind,
        options,
        content: requiredString(options, 'content', field),
        target: optionalString(options, 'target', field),
        include: regexOption(options, 'include', field, DEFAULT_INCLUDE),
        permissions: permissionsOption(options, field),
      };
    case 'copy':
      return {
        kind,
        options,
        content: requiredString(options, 'content', field),
        target: requiredString(options, 'target', field),
        include: regexOption(options, 'include', field, DEFAULT_INCLUDE),
        permissions: permissionsOption(options, field),
      };
    case 'symlink':
      return {
        kind,
        options,
        content: requiredString(options, 'content', field),
        target: requiredString(options, 'target', field),
        include: regexOption(options, 'include', field, DEFAULT_INCLUDE),
      };
    case 'stow': {
      const nonTemplates = optionalString(options, 'non_templates', field) ?? 'symlink';
      const handling = NON_TEMPLATE_HANDLING.find((value) => value === nonTemplates.toLowerCase());
      if (handling === undefined) {
        throw new ConfigurationError(`${field}.non_templates must be one of ${NON_TEMPLATE_HANDLING.join(', ')}`);
      }
      return {
        kind,
        options,
        content: requiredString(options, 'content', field),
        target: requiredString(options, 'target', field),
        templates: regexOption(options, 'templates', field, DEFAULT_STOW_TEMPLATES),
        nonTemplates: handling,
        permissions: permissionsOption(options, field),
      };
    }
    case 'run': {
      const timeout = options['timeout'];
      if (timeout !== undefined && timeout !== null && (typeof timeout !== 'number' || timeout < 0)) {
        throw new ConfigurationError(`${field}.timeout must be a non-negative number of seconds`);
      }
      return {
        kind,
        options,
        shell: requiredString(options, 'shell', field),
        timeout: typeof timeout === 'number' ? timeout : undefined,
      };
    }
    case 'trigger': {
      const block = options['block'];
      if (!isBlockName(block)) {
        throw new ConfigurationError(`${field}.block must be one of ${BLOCK_NAMES.join(', ')}`);
      }
      const path = optionalString(options, 'path', field);
      if (block === 'on_modified' && path === undefined) {
        throw new ConfigurationError(`${field}: triggering on_modified requires a path`);
      }
      return { kind, options, block, path };
    }
  }
}

/** Parse `{ <kind>: options | [options] }` keeping declared order */
export function parseActionBlock(raw: unknown, field: string): ActionBlock {
  if (raw === undefined || raw === null) {
    return { actions: [] };
  }
  if (!isRecord(raw)) {
    throw new ConfigurationError(`${field} must be a mapping of action kinds`);
  }

  const actions: Action[] = [];
  for (const [key, value] of Object.entries(raw)) {
    if (!isActionKind(key)) {
      throw new ConfigurationError(`${field}: unknown action kind "${key}" (expected one of ${ACTION_KINDS.join(', ')})`);
    }
    if (value === undefined || value === null) continue;

    const entries: unknown[] = Array.isArray(value) ? value : [value];
    entries.forEach((entry, index) => {
      const entryField = Array.isArray(value) ? `${field}.${key}[${index}]` : `${field}.${key}`;
      actions.push(parseAction(key, entry, entryField));
    });
  }

  return { actions };
}

/** Parse every action block of a module definition */
export function parseModuleBlocks(definition: Record<string, unknown>, field: string): ModuleBlocks {
  const onModified = new Map<string, ActionBlock>();
  const rawModified = definition['on_modified'];
  if (rawModified !== undefined && rawModified !== null) {
    if (!isRecord(rawModified)) {
      throw new ConfigurationError(`${field}.on_modified must map paths to action blocks`);
    }
    for (const [modifiedPath, block] of Object.entries(rawModified)) {
      onModified.set(modifiedPath, parseActionBlock(block, `${field}.on_modified.${modifiedPath}`));
    }
  }

  return {
    on_setup: parseActionBlock(definition['on_setup'], `${field}.on_setup`),
    on_startup: parseActionBlock(definition['on_startup'], `${field}.on_startup`),
    on_event: parseActionBlock(definition['on_event'], `${field}.on_event`),
    on_exit: parseActionBlock(definition['on_exit'], `${field}.on_exit`),
    on_modified: onModified,
  };
}
