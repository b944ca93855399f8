/**
 * Selecting and renaming files for compile, copy, symlink and stow.
 *
 * Filename patterns must match the whole file name. When the pattern has
 * capture groups, the last group that participated in the match becomes the
 * target's file name: `template\.(.+)` maps `template.kitty.conf` to
 * `kitty.conf`.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export interface FilePlan {
  source: string;
  target: string;
}

function anchored(pattern: string): RegExp {
  return new RegExp(`^(?:${pattern})$`);
}

export function matchesFilename(pattern: string, filename: string): boolean {
  return anchored(pattern).test(filename);
}

/** New file name for `filename`, or null when the pattern does not match */
export function renameFor(pattern: string, filename: string): string | null {
  const match = anchored(pattern).exec(filename);
  if (!match) return null;

  for (let index = match.length - 1; index >= 1; index--) {
    const group = match[index];
    if (group !== undefined && group !== '') return group;
  }
  return filename;
}

/** Every file below `root` (recursively), as paths relative to `root`, sorted */
export function listFiles(root: string): string[] {
  const files: string[] = [];

  const walk = (relativeDir: string): void => {
    const entries = fs.readdirSync(path.join(root, relativeDir), { withFileTypes: true });
    for (const entry of entries) {
      const relative = path.join(relativeDir, entry.name);
      if (entry.isDirectory()) {
        walk(relative);
      } else if (entry.isFile() || (entry.isSymbolicLink() && isFile(path.join(root, relative)))) {
        files.push(relative);
      }
    }
  };

  walk('');
  return files.sort();
}

export function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

export function isDirectory(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Pair each selected source file with its target.
 *
 * A file `content` goes to `target`, or into it when `target` is an
 * existing directory. A directory `content` is walked; files whose names
 * match `pattern` keep their relative location under `target`.
 */
export function planFiles(content: string, target: string, pattern: string): FilePlan[] {
  if (isFile(content)) {
    if (isDirectory(target)) {
      const name = path.basename(content);
      return [{ source: content, target: path.join(target, renameFor(pattern, name) ?? name) }];
    }
    return [{ source: content, target }];
  }

  const plans: FilePlan[] = [];
  for (const relative of listFiles(content)) {
    const renamed = renameFor(pattern, path.basename(relative));
    if (renamed === null) continue;
    plans.push({
      source: path.join(content, relative),
      target: path.join(target, path.dirname(relative), renamed),
    });
  }
  return plans;
}

/** Files below a directory `content` whose names do not match `pattern` */
export function unmatchedFiles(content: string, target: string, pattern: string): FilePlan[] {
  return listFiles(content)
    .filter((relative) => !matchesFilename(pattern, path.basename(relative)))
    .map((relative) => ({ source: path.join(content, relative), target: path.join(target, relative) }));
}

export function pathExists(filePath: string): boolean {
  try {
    fs.lstatSync(filePath);
    return true;
  } catch {
    return false;
  }
}
