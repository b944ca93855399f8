export { Scheduler } from './scheduler.js';
export type { ManagerFactory, SchedulerOptions, TypedSchedulerEmitter } from './scheduler.js';
export { FileWatcher, createFileWatcher } from './file-watcher.js';
export type { FileWatcherCallbacks, FileWatcherOptions, Watcher, WatcherFactory } from './file-watcher.js';
export { EventQueue } from './event-queue.js';
export { buildSchedulerConfig, validateSchedulerConfig } from './config.js';
export { DEFAULT_IGNORED_PATTERNS, DEFAULT_SCHEDULER_CONFIG, MAX_TIMER_DELAY_MS } from './types.js';
export type { Dispatch, FileEvent, FileEventType, SchedulerConfig, SchedulerEvents, SchedulerState } from './types.js';
