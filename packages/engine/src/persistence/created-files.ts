/**
 * Persistent record of files created by modules.
 *
 * Stored in created_files.yml as
 *   { <module>: { <absolute target>: { content, method, hash, backup?, setup? } } }
 * so `cleanup` can remove them (and restore backed-up originals) across
 * process restarts.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import type { Logger } from 'pino';
import { toError } from '../errors.js';
import { isRecord } from '../utils/guards.js';
import { readYamlFile, writeYamlFile } from '../utils/yaml.js';

export type CreationMethod = 'compiled' | 'copied' | 'symlinked';

const CREATION_METHODS: readonly CreationMethod[] = ['compiled', 'copied', 'symlinked'];

export interface CreationRecord {
  /** Source file the target was created from */
  content: string;
  method: CreationMethod;
  /** MD5 of the target right after creation */
  hash: string;
  /** Where the pre-existing file at the target was moved to */
  backup?: string;
  /** Created by an on_setup action */
  setup?: boolean;
}

export interface Creation {
  content: string;
  target: string;
  backup?: string;
}

export interface CleanupOptions {
  dryRun?: boolean;
  /** Also remove files created by on_setup actions */
  includeSetup?: boolean;
}

export interface CleanupResult {
  removed: string[];
  restored: string[];
  missing: string[];
}

type Creations = Record<string, Record<string, CreationRecord>>;

function parseRecord(value: unknown): CreationRecord | null {
  if (!isRecord(value)) return null;
  const { content, method, hash, backup, setup } = value;
  if (typeof content !== 'string' || typeof hash !== 'string') return null;
  const knownMethod = CREATION_METHODS.find((m) => m === method);
  if (knownMethod === undefined) return null;

  return {
    content,
    method: knownMethod,
    hash,
    ...(typeof backup === 'string' ? { backup } : {}),
    ...(setup === true ? { setup } : {}),
  };
}

/** MD5 of a file's bytes; for a symlink, of the path it points to */
export function fileHash(filePath: string): string {
  const hash = crypto.createHash('md5');
  const stats = fs.lstatSync(filePath);
  hash.update(stats.isSymbolicLink() ? fs.readlinkSync(filePath) : fs.readFileSync(filePath));
  return hash.digest('hex');
}

function exists(filePath: string): boolean {
  try {
    fs.lstatSync(filePath);
    return true;
  } catch {
    return false;
  }
}

export class CreatedFiles {
  private creations: Creations = {};
  private readonly filePath: string;
  private readonly logger: Logger;

  constructor(filePath: string, logger: Logger) {
    this.filePath = filePath;
    this.logger = logger.child({ component: 'created-files' });
    this.load();
  }

  get path(): string {
    return this.filePath;
  }

  /** Reload from disk. A corrupt file is logged and treated as empty. */
  load(): void {
    this.creations = {};
    let parsed: unknown;
    try {
      parsed = readYamlFile(this.filePath);
    } catch (err) {
      this.logger.error({ err: toError(err), path: this.filePath }, 'Unreadable created files record; starting empty');
      return;
    }
    if (!isRecord(parsed)) return;

    for (const [module, section] of Object.entries(parsed)) {
      if (!isRecord(section)) continue;
      const records: Record<string, CreationRecord> = {};
      for (const [target, value] of Object.entries(section)) {
        const record = parseRecord(value);
        if (record) records[target] = record;
      }
      this.creations[module] = records;
    }
  }

  /**
   * Record files created by `module`. Targets that do not exist are skipped.
   * A target already recorded keeps its original backup.
   */
  insert(module: string, method: CreationMethod, creations: readonly Creation[], options: { setup?: boolean } = {}): void {
    if (creations.length === 0) return;

    const section = this.creations[module] ?? {};
    let changed = false;

    for (const creation of creations) {
      if (!exists(creation.target)) continue;

      const previous = section[creation.target];
      const backup = previous?.backup ?? creation.backup;
      const record: CreationRecord = {
        content: creation.content,
        method,
        hash: fileHash(creation.target),
        ...(backup !== undefined ? { backup } : {}),
        ...(options.setup || previous?.setup ? { setup: true } : {}),
      };

      if (
        previous === undefined ||
        previous.content !== record.content ||
        previous.method !== record.method ||
        previous.hash !== record.hash ||
        previous.backup !== record.backup ||
        previous.setup !== record.setup
      ) {
        section[creation.target] = record;
        changed = true;
      }
    }

    if (changed) {
      this.creations[module] = section;
      this.save();
    }
  }

  /** Targets recorded for `module` */
  by(module: string): string[] {
    return Object.keys(this.creations[module] ?? {});
  }

  get(module: string, target: string): CreationRecord | undefined {
    return this.creations[module]?.[target];
  }

  /** Whether any module has recorded `target` as its creation */
  isManaged(target: string): boolean {
    return Object.values(this.creations).some((section) => target in section);
  }

  modules(): string[] {
    return Object.keys(this.creations);
  }

  /**
   * Delete files created by `module` and move backups back into place.
   * Files created by on_setup actions stay unless `includeSetup` is set.
   */
  cleanup(module: string, options: CleanupOptions = {}): CleanupResult {
    const result: CleanupResult = { removed: [], restored: [], missing: [] };
    const section = this.creations[module];
    if (!section) {
      this.logger.info({ module }, 'No created files recorded for module');
      return result;
    }

    const remaining: Record<string, CreationRecord> = {};
    for (const [target, record] of Object.entries(section)) {
      if (record.setup && !options.includeSetup) {
        remaining[target] = record;
        continue;
      }

      const details = { module, target, method: record.method, content: record.content };
      if (options.dryRun) {
        this.logger.info(details, `SKIPPED: Deleting "${target}"`);
        remaining[target] = record;
        continue;
      }

      if (exists(target)) {
        fs.rmSync(target, { force: true });
        this.logger.info(details, `Deleted "${target}"`);
        result.removed.push(target);
      } else {
        this.logger.info(details, `Created file "${target}" no longer exists`);
        result.missing.push(target);
      }

      if (record.backup !== undefined && exists(record.backup)) {
        fs.renameSync(record.backup, target);
        this.logger.info({ module, target, backup: record.backup }, `Restored "${target}" from backup`);
        result.restored.push(target);
      }
    }

    if (!options.dryRun) {
      if (Object.keys(remaining).length > 0) {
        this.creations[module] = remaining;
      } else {
        delete this.creations[module];
      }
      this.save();
    }

    return result;
  }

  save(): void {
    writeYamlFile(this.filePath, this.creations);
  }
}
