import { EventListener } from './event-listener.js';
import type { EventListenerOptions } from './event-listener.js';

export interface PeriodicInterval {
  seconds?: number;
  minutes?: number;
  hours?: number;
  days?: number;
}

/** Used when every interval component is zero */
export const DEFAULT_PERIOD_MS = 60 * 60 * 1000;

export function periodMs(interval: PeriodicInterval): number {
  const seconds =
    (interval.seconds ?? 0) +
    (interval.minutes ?? 0) * 60 +
    (interval.hours ?? 0) * 3600 +
    (interval.days ?? 0) * 86_400;
  return seconds > 0 ? seconds * 1000 : DEFAULT_PERIOD_MS;
}

/**
 * Counts elapsed intervals since construction.
 * Labels are '0', '1', '2', ...
 */
export class PeriodicListener extends EventListener {
  readonly type = 'periodic' as const;
  readonly intervalMs: number;
  private readonly startedAt: number;

  constructor(options: EventListenerOptions & { interval?: PeriodicInterval }) {
    super(options);
    this.intervalMs = periodMs(options.interval ?? {});
    this.startedAt = this.now().getTime();
    this.checkForcedEvent();
  }

  get events(): null {
    return null;
  }

  protected eventAt(now: Date): string {
    return String(this.tick(now));
  }

  protected nextChangeAfter(now: Date): Date {
    return new Date(this.startedAt + (this.tick(now) + 1) * this.intervalMs);
  }

  private tick(now: Date): number {
    return Math.max(0, Math.floor((now.getTime() - this.startedAt) / this.intervalMs));
  }
}
