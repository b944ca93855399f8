export { ChildProcessShellRunner, MIN_WAIT_MS } from './shell-runner.js';
export type { ShellRunner, ShellRunOptions, ShellResult } from './shell-runner.js';
