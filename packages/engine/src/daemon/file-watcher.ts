/**
 * File watcher wrapping chokidar.
 *
 * Watches an explicit set of files and directories (on_modified targets,
 * reprocessed sources, configuration files) and reports debounced
 * FileEvent objects.
 */

import * as path from 'node:path';
import { watch } from 'chokidar';
import type { FSWatcher } from 'chokidar';
import type { FileEvent, FileEventType } from './types.js';

export interface FileWatcherCallbacks {
  onEvent: (event: FileEvent) => void;
  onError: (error: Error) => void;
  onReady: () => void;
}

export interface FileWatcherOptions {
  paths: readonly string[];
  ignoredPatterns: readonly string[];
  debounceMs: number;
}

/** The part of FileWatcher the scheduler depends on */
export interface Watcher {
  readonly isWatching: boolean;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export type WatcherFactory = (options: FileWatcherOptions, callbacks: FileWatcherCallbacks) => Watcher;

/**
 * Events are debounced per file: rapid changes to the same file within
 * `debounceMs` collapse into a single event.
 */
export class FileWatcher implements Watcher {
  private watcher: FSWatcher | null = null;
  private readonly options: FileWatcherOptions;
  private readonly callbacks: FileWatcherCallbacks;
  private readonly debounceTimers: Map<string, ReturnType<typeof setTimeout>> = new Map();
  private _isWatching = false;

  constructor(options: FileWatcherOptions, callbacks: FileWatcherCallbacks) {
    this.options = options;
    this.callbacks = callbacks;
  }

  get isWatching(): boolean {
    return this._isWatching;
  }

  /**
   * Start watching.
   * Resolves when chokidar has finished the initial scan.
   */
  async start(): Promise<void> {
    if (this._isWatching || this.options.paths.length === 0) {
      return;
    }

    return new Promise<void>((resolve, reject) => {
      try {
        this.watcher = watch([...this.options.paths], {
          ignored: [...this.options.ignoredPatterns],
          persistent: true,
          ignoreInitial: true,
          awaitWriteFinish: {
            stabilityThreshold: Math.max(this.options.debounceMs, 50),
            pollInterval: 50,
          },
        });

        this.watcher.on('ready', () => {
          this._isWatching = true;
          this.callbacks.onReady();
          resolve();
        });

        this.watcher.on('error', (error: Error) => {
          this.callbacks.onError(error);
        });

        const eventTypes: FileEventType[] = ['add', 'change', 'unlink'];
        for (const eventType of eventTypes) {
          this.watcher.on(eventType, (filePath: string) => {
            this.handleEvent(eventType, filePath);
          });
        }
      } catch (err) {
        reject(err instanceof Error ? err : new Error(String(err)));
      }
    });
  }

  async stop(): Promise<void> {
    for (const timer of this.debounceTimers.values()) {
      clearTimeout(timer);
    }
    this.debounceTimers.clear();

    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }

    this._isWatching = false;
  }

  private handleEvent(type: FileEventType, filePath: string): void {
    const absolutePath = path.resolve(filePath);

    const existing = this.debounceTimers.get(absolutePath);
    if (existing) {
      clearTimeout(existing);
    }

    const timer = setTimeout(() => {
      this.debounceTimers.delete(absolutePath);
      this.callbacks.onEvent({ type, absolutePath, timestamp: Date.now() });
    }, this.options.debounceMs);

    this.debounceTimers.set(absolutePath, timer);
  }
}

export const createFileWatcher: WatcherFactory = (options, callbacks) => new FileWatcher(options, callbacks);
