/**
 * Template rendering.
 *
 * Templates are nunjucks (Jinja-compatible) text rendered against a plain
 * object view of the Context. A `shell` filter inserts command output:
 *
 *   {{ 'xrdb -query | grep dpi' | shell }}
 *   {{ 'hostname' | shell(0.5, 'localhost') }}
 */

import nunjucks from 'nunjucks';
import type { ShellRunner } from '../shell/shell-runner.js';

export interface Renderer {
  /** Render template text. `name` only labels errors. */
  render(source: string, context: Record<string, unknown>, name?: string): string;
}

export interface NunjucksRendererOptions {
  shell: ShellRunner;
  /** Default `shell` filter timeout in seconds (default: 2) */
  shellTimeout?: number;
  /** Working directory of `shell` filter commands */
  cwd?: string;
}

export const DEFAULT_SHELL_FILTER_TIMEOUT = 2;

export class NunjucksRenderer implements Renderer {
  private readonly env: InstanceType<typeof nunjucks.Environment>;

  constructor(options: NunjucksRendererOptions) {
    this.env = new nunjucks.Environment(null, {
      autoescape: false,
      throwOnUndefined: false,
      trimBlocks: true,
      lstripBlocks: true,
    });

    const defaultTimeout = options.shellTimeout ?? DEFAULT_SHELL_FILTER_TIMEOUT;
    this.env.addFilter('shell', (command: unknown, timeout?: unknown, fallback?: unknown): string => {
      const seconds = typeof timeout === 'number' ? timeout : defaultTimeout;
      const result = options.shell.runSync(String(command), {
        cwd: options.cwd,
        timeoutMs: seconds * 1000,
        onTimeout: 'kill',
      });
      if (result.exitCode !== 0) {
        return fallback === undefined || fallback === null ? '' : String(fallback);
      }
      return result.stdout.replace(/\r?\n$/, '');
    });
  }

  render(source: string, context: Record<string, unknown>, name?: string): string {
    try {
      return this.env.renderString(source, context);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(name ? `Failed to render ${name}: ${message}` : `Failed to render template: ${message}`);
    }
  }
}
