import { EventListener } from './event-listener.js';
import type { EventListenerOptions } from './event-listener.js';
import { WEEKDAYS_BY_INDEX } from './types.js';

/** Reports the local weekday name; changes at local midnight */
export class WeekdayListener extends EventListener {
  readonly type = 'weekday' as const;

  constructor(options: EventListenerOptions) {
    super(options);
    this.checkForcedEvent();
  }

  get events(): readonly string[] {
    return WEEKDAYS_BY_INDEX;
  }

  protected eventAt(now: Date): string {
    return WEEKDAYS_BY_INDEX[now.getDay()] ?? 'sunday';
  }

  protected nextChangeAfter(now: Date): Date {
    return new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1);
  }
}
