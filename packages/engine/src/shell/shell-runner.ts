/**
 * Shell command execution.
 *
 * Everything that runs a command goes through a ShellRunner so tests can
 * substitute a recording fake.
 */

import { spawn, spawnSync } from 'node:child_process';

export interface ShellRunOptions {
  /** Working directory (default: process cwd) */
  cwd?: string;
  /** How long to wait for the command (ms). Values <= 0 wait MIN_WAIT_MS. */
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
  /**
   * What to do with a command still running at its timeout:
   * 'kill' terminates it, 'detach' leaves it running in the background.
   */
  onTimeout?: 'kill' | 'detach';
}

export interface ShellResult {
  /** Exit code, or null when the command timed out or failed to spawn */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  durationMs: number;
}

export interface ShellRunner {
  run(command: string, options: ShellRunOptions): Promise<ShellResult>;
  /** Blocking variant for template filters, which render synchronously */
  runSync(command: string, options: ShellRunOptions): ShellResult;
}

/** Grace period given to commands configured with a zero timeout */
export const MIN_WAIT_MS = 100;

/**
 * How long output may keep arriving after the shell exits. Background
 * jobs (`app &`) inherit the pipes and would otherwise hold them open.
 */
const OUTPUT_DRAIN_MS = 50;

function effectiveTimeout(timeoutMs: number): number {
  return timeoutMs > 0 ? timeoutMs : MIN_WAIT_MS;
}

export class ChildProcessShellRunner implements ShellRunner {
  run(command: string, options: ShellRunOptions): Promise<ShellResult> {
    const startTime = Date.now();
    const timeoutMs = effectiveTimeout(options.timeoutMs);

    return new Promise<ShellResult>((resolve) => {
      let stdout = '';
      let stderr = '';
      let settled = false;
      let drain: NodeJS.Timeout | undefined;

      const finish = (result: Omit<ShellResult, 'stdout' | 'stderr' | 'durationMs'>): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        clearTimeout(drain);
        resolve({ ...result, stdout, stderr, durationMs: Date.now() - startTime });
      };

      const release = (): void => {
        child.stdout.destroy();
        child.stderr.destroy();
        child.unref();
      };

      const child = spawn(command, {
        shell: true,
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      child.stdout.on('data', (chunk: Buffer) => {
        if (!settled) stdout += chunk.toString('utf-8');
      });
      child.stderr.on('data', (chunk: Buffer) => {
        if (!settled) stderr += chunk.toString('utf-8');
      });

      const timer = setTimeout(() => {
        if (options.onTimeout === 'detach') {
          release();
        } else if (!child.killed) {
          child.kill('SIGTERM');
        }
        finish({ exitCode: null, timedOut: true });
      }, timeoutMs);

      child.on('error', (err: Error) => {
        stderr += err.message;
        finish({ exitCode: null, timedOut: false });
      });

      child.on('exit', (code: number | null) => {
        drain = setTimeout(() => {
          release();
          finish({ exitCode: code, timedOut: false });
        }, OUTPUT_DRAIN_MS);
      });

      child.on('close', (code: number | null) => {
        finish({ exitCode: code, timedOut: false });
      });
    });
  }

  runSync(command: string, options: ShellRunOptions): ShellResult {
    const startTime = Date.now();
    const result = spawnSync(command, {
      shell: true,
      cwd: options.cwd,
      env: options.env ?? process.env,
      timeout: effectiveTimeout(options.timeoutMs),
      encoding: 'utf-8',
    });

    const timedOut = result.error !== undefined && 'code' in result.error && result.error.code === 'ETIMEDOUT';
    return {
      exitCode: timedOut ? null : result.status,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? result.error?.message ?? '',
      timedOut,
      durationMs: Date.now() - startTime,
    };
  }
}
