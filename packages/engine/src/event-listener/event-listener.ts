/**
 * Base class shared by all event listener types.
 */

import type { Logger } from 'pino';
import type { Clock, EventListenerType } from './types.js';

export interface EventListenerOptions {
  logger: Logger;
  /** Defaults to the system clock */
  now?: Clock;
  forceEvent?: string;
}

export abstract class EventListener {
  abstract readonly type: EventListenerType;

  protected readonly now: Clock;
  protected readonly logger: Logger;
  private readonly forceEvent: string | undefined;
  private lastEvent: string | null = null;

  constructor(options: EventListenerOptions) {
    this.now = options.now ?? ((): Date => new Date());
    this.logger = options.logger;
    this.forceEvent = options.forceEvent;
  }

  /**
   * The finite set of labels this listener can report,
   * or null when the set is unbounded (periodic ticks).
   */
  abstract get events(): readonly string[] | null;

  /** Compute the label for the given instant */
  protected abstract eventAt(now: Date): string;

  /** Instant the label computed by `eventAt` next changes, or null if never */
  protected abstract nextChangeAfter(now: Date): Date | null;

  /** The current event label */
  currentEvent(): string {
    if (this.forceEvent !== undefined) {
      return this.forceEvent;
    }
    return this.eventAt(this.now());
  }

  /** When the current label will change; null when it never will */
  nextEventChangeAt(): Date | null {
    if (this.forceEvent !== undefined) {
      return null;
    }
    return this.nextChangeAfter(this.now());
  }

  /**
   * Whether the label differs from the one seen at the previous call.
   * The first call only records the label and returns false.
   */
  hasChanged(): boolean {
    const event = this.currentEvent();
    const previous = this.lastEvent;
    this.lastEvent = event;
    return previous !== null && previous !== event;
  }

  /** Record the current label as seen, without reporting a change */
  markSeen(): string {
    this.lastEvent = this.currentEvent();
    return this.lastEvent;
  }

  /** Warn once about a forced label outside the listener's label set */
  protected checkForcedEvent(): void {
    const events = this.events;
    const forced = this.forceEvent;
    if (forced === undefined) return;

    const valid = events === null ? /^\d+$/.test(forced) : events.includes(forced);
    if (!valid) {
      this.logger.warn(
        { type: this.type, forceEvent: forced, events },
        'force_event is not a valid event for this listener type; using it anyway'
      );
    }
  }
}
