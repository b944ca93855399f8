/**
 * Scheduler - the long-running control loop.
 *
 * Lifecycle: idle -> starting -> running -> stopping -> stopped
 *
 * The scheduler:
 * 1. Builds a ModuleManager and runs setup + on_startup
 * 2. Arms one timer for the earliest upcoming event change of any module
 * 3. Watches on_modified targets, reprocessed sources and (with hot reload)
 *    the configuration files; changes are queued in an EventQueue
 * 4. On every wake-up drains the queue, then checks event changes, and
 *    dispatches to on_modified / on_event
 * 5. On stop runs on_exit and releases the PID lock
 *
 * Dispatch cycles never overlap: a wake-up during a cycle schedules one more
 * cycle after it.
 */

import { EventEmitter } from 'node:events';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { SolsticeError, toError } from '../errors.js';
import type { Clock } from '../event-listener/types.js';
import type { ModuleManager } from '../module/module-manager.js';
import { validateSchedulerConfig } from './config.js';
import { EventQueue } from './event-queue.js';
import { createFileWatcher } from './file-watcher.js';
import type { Watcher, WatcherFactory } from './file-watcher.js';
import { MAX_TIMER_DELAY_MS } from './types.js';
import type { Dispatch, FileEvent, SchedulerConfig, SchedulerEvents, SchedulerState } from './types.js';

/** Builds a fresh ModuleManager from the current configuration */
export type ManagerFactory = () => Promise<ModuleManager>;

export interface SchedulerOptions {
  config: SchedulerConfig;
  createManager: ManagerFactory;
  logger: Logger;
  /** Files and directories whose modification triggers a hot reload */
  configFiles?: readonly string[];
  createWatcher?: WatcherFactory;
  now?: Clock;
}

/**
 * Typed event emitter interface for the scheduler.
 */
export interface TypedSchedulerEmitter {
  on<K extends keyof SchedulerEvents>(event: K, listener: SchedulerEvents[K]): this;
  off<K extends keyof SchedulerEvents>(event: K, listener: SchedulerEvents[K]): this;
  emit<K extends keyof SchedulerEvents>(event: K, ...args: Parameters<SchedulerEvents[K]>): boolean;
}

export class Scheduler extends EventEmitter implements TypedSchedulerEmitter {
  private _state: SchedulerState = 'idle';
  private readonly config: SchedulerConfig;
  private readonly createManager: ManagerFactory;
  private readonly createWatcher: WatcherFactory;
  private readonly configFiles: string[];
  private readonly queue = new EventQueue();
  private readonly logger: Logger;
  private readonly now: Clock;

  private manager: ModuleManager | null = null;
  private watcher: Watcher | null = null;
  private watchedKey: string | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private cycle: Promise<void> | null = null;
  private rerun = false;
  private _dispatchCount = 0;

  constructor(options: SchedulerOptions) {
    super();
    this.config = options.config;
    this.createManager = options.createManager;
    this.createWatcher = options.createWatcher ?? createFileWatcher;
    this.configFiles = (options.configFiles ?? []).map((file) => path.resolve(file));
    this.logger = options.logger.child({ component: 'scheduler' });
    this.now = options.now ?? ((): Date => new Date());
  }

  get state(): SchedulerState {
    return this._state;
  }

  /** The active module manager (null before start) */
  get moduleManager(): ModuleManager | null {
    return this.manager;
  }

  get pendingEvents(): number {
    return this.queue.size;
  }

  /** Number of dispatches since start */
  get dispatchCount(): number {
    return this._dispatchCount;
  }

  /**
   * Start the scheduler.
   *
   * Validates configuration, acquires the PID lock, builds the modules,
   * runs setup and on_startup, then arms the timer and the watcher.
   */
  async start(): Promise<void> {
    if (this._state !== 'idle' && this._state !== 'stopped') {
      throw new SolsticeError(`Cannot start scheduler from state: ${this._state}`);
    }

    this.setState('starting');

    const errors = validateSchedulerConfig(this.config);
    if (errors.length > 0) {
      this.setState('stopped');
      throw new SolsticeError(`Invalid scheduler config: ${errors.join('; ')}`);
    }

    if (this.config.usePidFile) {
      try {
        this.acquirePidLock();
      } catch (err) {
        this.setState('stopped');
        throw err;
      }
    }

    try {
      if (this.config.startupDelayMs > 0) {
        this.logger.info({ delayMs: this.config.startupDelayMs }, 'Delaying startup');
        await sleep(this.config.startupDelayMs);
      }

      this.manager = await this.createManager();
      await this.manager.startup();
      await this.refreshWatcher();

      this.setState('running');
      this.schedule();
      if (this.queue.size > 0) this.wake();
    } catch (err) {
      await this.stopWatcher();
      this.releasePidLock();
      this.manager = null;
      this.setState('stopped');
      throw err;
    }

    if (this.exhausted()) {
      this.logger.info('Nothing left to wait for');
      this.stopInBackground();
    }
  }

  /**
   * Stop the scheduler gracefully.
   *
   * Waits for the running dispatch cycle, runs on_exit for every enabled
   * module and releases the PID lock.
   */
  async stop(): Promise<void> {
    if (this._state === 'stopped' || this._state === 'idle') {
      return;
    }
    if (this._state === 'stopping') {
      return this.waitUntilStopped();
    }

    this.setState('stopping');
    this.clearTimer();
    await this.stopWatcher();

    while (this.cycle) {
      await this.cycle;
    }

    if (this.manager) {
      try {
        await this.manager.exit();
      } catch (err) {
        this.reportError(err);
      }
    }

    this.queue.clear();
    this.releasePidLock();
    this.setState('stopped');
    this.emit('stopped');
  }

  /** Resolves once the scheduler reaches `stopped` */
  waitUntilStopped(): Promise<void> {
    if (this._state === 'stopped') {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.once('stopped', () => resolve());
    });
  }

  /**
   * Run a dispatch cycle now and wait until no cycle is pending
   * (useful for testing or an on-demand check).
   */
  async tick(): Promise<void> {
    this.wake();
    while (this.cycle) {
      await this.cycle;
    }
  }

  /** Queue a file event as if the watcher had reported it */
  notify(event: FileEvent): void {
    this.queue.push(event);
    this.wake();
  }

  // ─── Private helpers ──────────────────────────────────────────────

  private setState(newState: SchedulerState): void {
    const oldState = this._state;
    this._state = newState;
    this.emit('stateChange', newState, oldState);
  }

  private reportError(err: unknown): void {
    const error = toError(err);
    this.logger.error({ err: error }, error.message);
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }

  private dispatched(dispatch: Dispatch): void {
    this._dispatchCount++;
    this.emit('dispatch', dispatch);
  }

  private wake(): void {
    if (this._state !== 'running') return;
    if (this.cycle) {
      this.rerun = true;
      return;
    }

    this.cycle = this.runCycles().finally(() => {
      this.cycle = null;
      if (this._state === 'running' && this.exhausted()) {
        this.logger.info('Nothing left to wait for');
        this.stopInBackground();
      }
    });
  }

  private stopInBackground(): void {
    this.stop().catch((err: unknown) => {
      this.reportError(err);
    });
  }

  private async runCycles(): Promise<void> {
    do {
      this.rerun = false;
      try {
        await this.runCycle();
      } catch (err) {
        this.reportError(err);
      }
    } while (this.rerun && this._state === 'running');
  }

  private async runCycle(): Promise<void> {
    const events = this.queue.drain();

    if (this.config.hotReload && events.some((event) => this.isConfigFile(event.absolutePath))) {
      await this.reload();
    } else if (this.manager) {
      for (const event of events) {
        if (event.type === 'unlink') continue;
        if (await this.manager.fileModified(event.absolutePath)) {
          this.dispatched({ kind: 'modified', path: event.absolutePath });
        }
      }

      const changed = await this.manager.checkEvents();
      if (changed.length > 0) {
        this.dispatched({ kind: 'event', modules: changed });
      }
    }

    if (this._state === 'running') {
      await this.refreshWatcher();
      this.schedule();
    }
  }

  /** Full reinitialisation: on_exit, rebuild, setup + on_startup */
  private async reload(): Promise<void> {
    this.logger.info('Configuration changed, reloading modules');

    if (this.manager) {
      await this.manager.exit();
    }

    try {
      this.manager = await this.createManager();
    } catch (err) {
      this.reportError(err);
      this.logger.warn('Reload failed, restarting the previous modules');
    }

    if (this.manager) {
      await this.manager.startup();
    }
    this.dispatched({ kind: 'reload' });
  }

  private exhausted(): boolean {
    if (!this.manager) return true;
    if (this.manager.nextEventChangeAt() !== null) return false;
    return this.watchPaths().length === 0 && this.queue.size === 0;
  }

  private schedule(): void {
    this.clearTimer();
    if (this._state !== 'running' || !this.manager) return;

    const next = this.manager.nextEventChangeAt();
    if (next === null) return;

    const delayMs = Math.min(Math.max(next.getTime() - this.now().getTime(), 0), MAX_TIMER_DELAY_MS);
    this.logger.debug({ next: next.toISOString(), delayMs }, 'Next event change scheduled');
    this.timer = setTimeout((): void => {
      this.timer = null;
      this.wake();
    }, delayMs);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private watchPaths(): string[] {
    const paths = new Set(this.manager ? this.manager.watchedPaths() : []);
    if (this.config.hotReload) {
      for (const file of this.configFiles) paths.add(file);
    }
    return [...paths].sort();
  }

  private isConfigFile(absolutePath: string): boolean {
    return this.configFiles.some((file) => absolutePath === file || absolutePath.startsWith(file + path.sep));
  }

  /** (Re)start the watcher when the set of watched paths changed */
  private async refreshWatcher(): Promise<void> {
    const paths = this.watchPaths();
    const key = paths.join('\n');
    if (key === this.watchedKey) return;

    await this.stopWatcher();
    this.watchedKey = key;
    if (paths.length === 0) return;

    this.logger.debug({ paths }, 'Watching files');
    const watcher = this.createWatcher(
      { paths, ignoredPatterns: this.config.ignoredPatterns, debounceMs: this.config.debounceMs },
      {
        onEvent: (event: FileEvent): void => {
          this.notify(event);
        },
        onError: (error: Error): void => {
          this.reportError(error);
        },
        onReady: (): void => {
          this.logger.debug({ count: paths.length }, 'File watcher ready');
        },
      }
    );
    this.watcher = watcher;
    await watcher.start();
  }

  private async stopWatcher(): Promise<void> {
    if (this.watcher) {
      await this.watcher.stop();
      this.watcher = null;
    }
    this.watchedKey = null;
  }

  private acquirePidLock(): void {
    const pidPath = this.config.pidFilePath;
    fs.mkdirSync(path.dirname(pidPath), { recursive: true });

    if (fs.existsSync(pidPath)) {
      const existingPid = fs.readFileSync(pidPath, 'utf-8').trim();
      if (existingPid && this.isProcessRunning(parseInt(existingPid, 10))) {
        throw new SolsticeError(
          `Another solstice instance is already running (PID: ${existingPid}). ` +
            `Remove ${pidPath} if this is stale.`
        );
      }
      // Stale PID file
      fs.unlinkSync(pidPath);
    }

    fs.writeFileSync(pidPath, String(process.pid), 'utf-8');
  }

  private releasePidLock(): void {
    if (!this.config.usePidFile || !fs.existsSync(this.config.pidFilePath)) {
      return;
    }
    try {
      const content = fs.readFileSync(this.config.pidFilePath, 'utf-8').trim();
      // Only remove our own PID
      if (content === String(process.pid)) {
        fs.unlinkSync(this.config.pidFilePath);
      }
    } catch (err) {
      this.logger.warn({ err: toError(err), pidFile: this.config.pidFilePath }, 'Could not release PID file');
    }
  }

  private isProcessRunning(pid: number): boolean {
    if (!Number.isInteger(pid) || pid <= 0) return false;
    try {
      // Signal 0 checks existence without killing
      process.kill(pid, 0);
      return true;
    } catch {
      return false;
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
