/**
 * Placeholder substitution and path expansion for action options.
 *
 * `{event}` and `{period}` become the module's current event label.
 * `{<template>}`, where <template> is the `content` of one of the module's
 * compile actions as written, becomes the path that template was last
 * compiled to. Any other brace group is left as is.
 */

import * as os from 'node:os';
import * as path from 'node:path';

const PLACEHOLDER = /\{([^{}]+)\}/g;
const ENV_REFERENCE = /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;

export interface PlaceholderScope {
  currentEvent: () => string;
  /** Declared template shortname -> last compilation target */
  compiledTargets: ReadonlyMap<string, string>;
  shortnames: ReadonlySet<string>;
  /** Called for a declared template that has not been compiled yet */
  onUnresolved?: (shortname: string) => void;
}

export function substitutePlaceholders(text: string, scope: PlaceholderScope): string {
  return text.replace(PLACEHOLDER, (match: string, name: string) => {
    if (name === 'event' || name === 'period') {
      return scope.currentEvent();
    }

    const target = scope.compiledTargets.get(name);
    if (target !== undefined) {
      return target;
    }

    if (scope.shortnames.has(name)) {
      scope.onUnresolved?.(name);
    }
    return match;
  });
}

export interface PathExpansionOptions {
  /** Relative paths are anchored here */
  directory: string;
  env?: NodeJS.ProcessEnv;
}

/** Expand `~`, `$VAR` and `${VAR}`, then anchor relative paths at `directory` */
export function expandPath(value: string, options: PathExpansionOptions): string {
  const env = options.env ?? process.env;
  let expanded = value.replace(ENV_REFERENCE, (match: string, braced: string | undefined, bare: string | undefined) => {
    const name = braced ?? bare ?? '';
    return env[name] ?? match;
  });

  if (expanded === '~') {
    expanded = env['HOME'] ?? os.homedir();
  } else if (expanded.startsWith('~/')) {
    expanded = path.join(env['HOME'] ?? os.homedir(), expanded.slice(2));
  }

  return path.resolve(options.directory, expanded);
}
