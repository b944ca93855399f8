/**
 * In-memory queue of file-system changes awaiting dispatch.
 *
 * Deduplicates events per path (latest event wins) and drains in
 * insertion order. The watcher only ever pushes; the scheduler's control
 * loop is the only consumer.
 */

import type { FileEvent } from './types.js';

export class EventQueue {
  /** Map of absolutePath -> latest FileEvent */
  private readonly events: Map<string, FileEvent> = new Map();

  get size(): number {
    return this.events.size;
  }

  /**
   * Push a new event into the queue.
   * An earlier event for the same path is replaced but keeps its position.
   */
  push(event: FileEvent): void {
    this.events.set(event.absolutePath, event);
  }

  /** Remove and return every queued event */
  drain(): FileEvent[] {
    const drained = Array.from(this.events.values());
    this.events.clear();
    return drained;
  }

  clear(): void {
    this.events.clear();
  }

  has(absolutePath: string): boolean {
    return this.events.has(absolutePath);
  }
}
