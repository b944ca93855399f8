/**
 * Evaluates module `requires` clauses.
 *
 * Results of env, installed and shell clauses are cached per clause for the
 * lifetime of the checker. Module clauses are resolved separately, once
 * every module's own clauses are known (see dependencies.ts).
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { ConfigurationError } from '../errors.js';
import { isRecord } from '../utils/guards.js';
import type { ShellRunner } from '../shell/shell-runner.js';
import type { ClauseResult, RequirementClause } from './types.js';

/** Default timeout of shell clauses, in seconds */
export const DEFAULT_REQUIRES_TIMEOUT = 1;

const CLAUSE_KEYS = ['env', 'installed', 'shell', 'timeout', 'module'] as const;


function requireString(raw: Record<string, unknown>, key: string, field: string): string {
  const value = raw[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigurationError(`${field}.${key} must be a non-empty string`);
  }
  return value;
}

/**
 * Parse a raw `requires` value: one mapping or a list of mappings, each
 * with any of `env`, `installed`, `shell` (+ `timeout`) and `module`.
 */
export function parseRequirements(raw: unknown, field = 'requires'): RequirementClause[] {
  if (raw === undefined || raw === null) {
    return [];
  }

  const entries = Array.isArray(raw) ? raw : [raw];
  const clauses: RequirementClause[] = [];

  entries.forEach((entry: unknown, index) => {
    const entryField = Array.isArray(raw) ? `${field}[${index}]` : field;
    if (!isRecord(entry)) {
      throw new ConfigurationError(`${entryField} must be a mapping`);
    }

    const unknownKeys = Object.keys(entry).filter((key) => !CLAUSE_KEYS.some((known) => known === key));
    if (unknownKeys.length > 0) {
      throw new ConfigurationError(`${entryField} has unknown keys: ${unknownKeys.join(', ')}`);
    }

    if ('env' in entry) clauses.push({ kind: 'env', variable: requireString(entry, 'env', entryField) });
    if ('installed' in entry) {
      clauses.push({ kind: 'installed', program: requireString(entry, 'installed', entryField) });
    }
    if ('shell' in entry) {
      const rawTimeout = entry['timeout'];
      let timeout: number | undefined;
      if (rawTimeout !== undefined && rawTimeout !== null) {
        if (typeof rawTimeout !== 'number' || rawTimeout < 0) {
          throw new ConfigurationError(`${entryField}.timeout must be a non-negative number`);
        }
        timeout = rawTimeout;
      }
      clauses.push({ kind: 'shell', command: requireString(entry, 'shell', entryField), timeout });
    }
    if ('module' in entry) clauses.push({ kind: 'module', module: requireString(entry, 'module', entryField) });
  });

  return clauses;
}

export interface RequirementCheckerOptions {
  logger: Logger;
  shell: ShellRunner;
  /** Default shell clause timeout in seconds */
  timeout?: number;
  env?: NodeJS.ProcessEnv;
}

export class RequirementChecker {
  private readonly logger: Logger;
  private readonly shell: ShellRunner;
  private readonly timeout: number;
  private readonly env: NodeJS.ProcessEnv;
  private readonly cache: Map<string, ClauseResult> = new Map();

  constructor(options: RequirementCheckerOptions) {
    this.logger = options.logger.child({ component: 'requirements' });
    this.shell = options.shell;
    this.timeout = options.timeout ?? DEFAULT_REQUIRES_TIMEOUT;
    this.env = options.env ?? process.env;
  }

  /**
   * Evaluate every non-module clause; module clauses are skipped.
   * `cwd` is the directory shell clauses run in.
   */
  async check(clauses: readonly RequirementClause[], cwd?: string): Promise<ClauseResult[]> {
    const results: ClauseResult[] = [];
    for (const clause of clauses) {
      if (clause.kind === 'module') continue;
      results.push(await this.checkClause(clause, cwd));
    }
    return results;
  }

  async isSatisfied(clauses: readonly RequirementClause[], cwd?: string): Promise<boolean> {
    const results = await this.check(clauses, cwd);
    return results.every((result) => result.satisfied);
  }

  private async checkClause(
    clause: Exclude<RequirementClause, { kind: 'module' }>,
    cwd: string | undefined
  ): Promise<ClauseResult> {
    const key = `${clause.kind}:${cwd ?? ''}:${JSON.stringify(clause)}`;
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached;
    }

    let satisfied: boolean;
    let detail: string;

    switch (clause.kind) {
      case 'env':
        satisfied = this.env[clause.variable] !== undefined;
        detail = satisfied
          ? `Found environment variable "${clause.variable}"`
          : `Missing environment variable "${clause.variable}"`;
        break;
      case 'installed':
        satisfied = findExecutable(clause.program, this.env['PATH'] ?? '') !== null;
        detail = satisfied ? `Program installed: "${clause.program}"` : `Program not installed: "${clause.program}"`;
        break;
      case 'shell': {
        const timeout = clause.timeout ?? this.timeout;
        const result = await this.shell.run(clause.command, {
          cwd,
          timeoutMs: timeout * 1000,
          env: this.env,
          onTimeout: 'kill',
        });
        satisfied = result.exitCode === 0;
        if (result.timedOut) {
          detail = `Command timed out after ${timeout}s: "${clause.command}"`;
          this.logger.warn({ command: clause.command, timeout }, 'Requirement command timed out');
        } else {
          detail = satisfied
            ? `Successful command: "${clause.command}"`
            : `Unsuccessful command (exit ${String(result.exitCode)}): "${clause.command}"`;
        }
        break;
      }
    }

    const result: ClauseResult = { clause, satisfied, detail };
    this.cache.set(key, result);
    this.logger.debug({ clause, satisfied }, detail);
    return result;
  }
}

/** Locate `program` on a PATH string, returning its absolute path */
export function findExecutable(program: string, searchPath: string): string | null {
  const candidates = program.includes(path.sep)
    ? [path.resolve(program)]
    : searchPath
        .split(path.delimiter)
        .filter((dir) => dir.length > 0)
        .map((dir) => path.join(dir, program));

  return candidates.find(isExecutableFile) ?? null;
}

function isExecutableFile(candidate: string): boolean {
  try {
    fs.accessSync(candidate, fs.constants.X_OK);
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}
