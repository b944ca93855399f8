/**
 * Persistent record of executed on_setup actions (setup.yml).
 *
 *   { <module>: { <action kind>: [ <options>, ... ] } }
 *
 * An on_setup action runs only while its exact options are absent from
 * this record.
 */

import type { Logger } from 'pino';
import { toError } from '../errors.js';
import { isRecord } from '../utils/guards.js';
import { readYamlFile, toYaml, writeYamlFile } from '../utils/yaml.js';

type ExecutedByKind = Record<string, unknown[]>;

/** JSON with sorted keys, so option order does not matter */
function canonical(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonical).join(',')}]`;
  }
  if (isRecord(value)) {
    const keys = Object.keys(value).sort();
    return `{${keys.map((key) => `${JSON.stringify(key)}:${canonical(value[key])}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

function isEmptyOptions(options: unknown): boolean {
  if (options === null || options === undefined || options === '') return true;
  if (Array.isArray(options)) return options.length === 0;
  if (isRecord(options)) return Object.keys(options).length === 0;
  return false;
}

export class ExecutedActions {
  private executed: Record<string, ExecutedByKind> = {};
  private readonly filePath: string;
  private readonly logger: Logger;

  constructor(filePath: string, logger: Logger) {
    this.filePath = filePath;
    this.logger = logger.child({ component: 'executed-actions' });
    this.load();
  }

  load(): void {
    this.executed = {};
    let parsed: unknown;
    try {
      parsed = readYamlFile(this.filePath);
    } catch (err) {
      this.logger.error({ err: toError(err), path: this.filePath }, 'Unreadable setup record; starting empty');
      return;
    }
    if (!isRecord(parsed)) return;

    for (const [module, kinds] of Object.entries(parsed)) {
      if (!isRecord(kinds)) continue;
      const byKind: ExecutedByKind = {};
      for (const [kind, list] of Object.entries(kinds)) {
        if (Array.isArray(list)) byKind[kind] = list;
      }
      this.executed[module] = byKind;
    }
  }

  /** Whether this exact action has never been executed for `module`. Empty options never are new. */
  isNew(module: string, kind: string, options: unknown): boolean {
    if (isEmptyOptions(options)) return false;
    const key = canonical(options);
    const previous = this.executed[module]?.[kind] ?? [];
    return !previous.some((entry) => canonical(entry) === key);
  }

  /** Remember an executed action and persist immediately */
  record(module: string, kind: string, options: unknown): void {
    if (!this.isNew(module, kind, options)) return;
    const byKind = this.executed[module] ?? {};
    byKind[kind] = [...(byKind[kind] ?? []), options];
    this.executed[module] = byKind;
    this.save();
  }

  /** Forget every executed setup action of `module`. Returns false when nothing was recorded. */
  reset(module: string): boolean {
    const previous = this.executed[module];
    if (!previous || Object.keys(previous).length === 0) {
      this.logger.error({ module }, `No saved executed on_setup actions for module "${module}"`);
      return false;
    }

    delete this.executed[module];
    this.save();
    this.logger.info({ module }, `Reset on_setup actions for module "${module}":\n${toYaml({ [module]: previous })}`);
    return true;
  }

  save(): void {
    writeYamlFile(this.filePath, this.executed);
  }
}
