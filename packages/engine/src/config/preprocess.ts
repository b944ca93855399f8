/**
 * Text pre-processing applied to every configuration file before parsing:
 *
 *   1. `${NAME}` is replaced by the environment variable (left as written when unset)
 *   2. the result is rendered with `{ env }` as template context
 */

import type { Renderer } from '../render/renderer.js';

const ENV_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export function substituteEnvironment(text: string, env: NodeJS.ProcessEnv): string {
  return text.replace(ENV_REFERENCE, (match, name: string) => env[name] ?? match);
}

export function preprocessConfig(
  text: string,
  options: { renderer: Renderer; env: NodeJS.ProcessEnv; name?: string }
): string {
  const substituted = substituteEnvironment(text, options.env);
  return options.renderer.render(substituted, { env: { ...options.env } }, options.name);
}
