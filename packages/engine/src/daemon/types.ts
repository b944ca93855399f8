/**
 * Types for the scheduler daemon.
 *
 * The scheduler owns a ModuleManager, sleeps until the earliest event
 * change of any module or until a watched file is modified, and
 * dispatches to the matching action blocks.
 */

/** Scheduler lifecycle states */
export type SchedulerState = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped';

/** Configuration for the scheduler */
export interface SchedulerConfig {
  /** Directory holding persisted state and the PID file */
  stateDir: string;
  /** Whether to hold a PID file for single-instance enforcement */
  usePidFile: boolean;
  /** Path to the PID file (default: {stateDir}/solstice.pid) */
  pidFilePath: string;
  /** Per-file debounce for watcher events (ms, default: 200) */
  debounceMs: number;
  /** Glob patterns never reported by the watcher */
  ignoredPatterns: string[];
  /** Delay before startup (ms) */
  startupDelayMs: number;
  /** Rebuild every module when a configuration file changes */
  hotReload: boolean;
}

/** Default ignored patterns for the file watcher */
export const DEFAULT_IGNORED_PATTERNS: readonly string[] = [
  '**/.git/**',
  '**/node_modules/**',
  '**/.DS_Store',
  '**/*.swp',
  '**/*.swx',
  '**/*~',
] as const;

export const DEFAULT_SCHEDULER_CONFIG: Omit<SchedulerConfig, 'stateDir' | 'pidFilePath'> = {
  usePidFile: true,
  debounceMs: 200,
  ignoredPatterns: [...DEFAULT_IGNORED_PATTERNS],
  startupDelayMs: 0,
  hotReload: false,
};

/** Largest delay setTimeout accepts */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/** Type of file-system event detected by the watcher */
export type FileEventType = 'add' | 'change' | 'unlink';

/** A single file-system change detected by the watcher */
export interface FileEvent {
  type: FileEventType;
  absolutePath: string;
  /** Timestamp when the event was captured */
  timestamp: number;
}

/** What a dispatch cycle did */
export type Dispatch =
  | { kind: 'event'; modules: string[] }
  | { kind: 'modified'; path: string }
  | { kind: 'reload' };

/** Events emitted by the Scheduler */
export interface SchedulerEvents {
  stateChange: (newState: SchedulerState, oldState: SchedulerState) => void;
  dispatch: (dispatch: Dispatch) => void;
  error: (error: Error) => void;
  /** Scheduler has fully stopped */
  stopped: () => void;
}
