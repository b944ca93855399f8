import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Logger } from 'pino';
import type { CreatedFiles } from '../persistence/created-files.js';
import { pathExists } from './file-matching.js';

/** `<target>.bak`, or `<target>.bak.<n>` for the first free n */
export function nextBackupPath(target: string): string {
  const base = `${target}.bak`;
  if (!pathExists(base)) return base;

  for (let n = 1; ; n++) {
    const candidate = `${base}.${n}`;
    if (!pathExists(candidate)) return candidate;
  }
}

/**
 * Clear the way for writing `target`.
 *
 * Files recorded by any module are simply replaced. A symlink we do not
 * manage is replaced as well. Any other existing file is renamed to a
 * backup, whose path is returned so it can be restored on cleanup.
 */
export function prepareTarget(target: string, createdFiles: CreatedFiles, logger: Logger): string | undefined {
  if (!pathExists(target)) {
    fs.mkdirSync(path.dirname(target), { recursive: true });
    return undefined;
  }

  const stats = fs.lstatSync(target);
  if (stats.isDirectory()) {
    throw new Error(`Target "${target}" is a directory`);
  }

  if (stats.isSymbolicLink()) {
    fs.unlinkSync(target);
    return undefined;
  }

  if (createdFiles.isManaged(target)) {
    return undefined;
  }

  const backup = nextBackupPath(target);
  fs.renameSync(target, backup);
  logger.info({ target, backup }, `Backed up existing "${path.basename(target)}"`);
  return backup;
}
