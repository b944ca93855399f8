import { EventListener } from './event-listener.js';
import type { EventListenerOptions } from './event-listener.js';

/** A listener with a single label that never changes */
export class StaticListener extends EventListener {
  readonly type = 'static' as const;

  constructor(options: EventListenerOptions) {
    super(options);
    this.checkForcedEvent();
  }

  get events(): readonly string[] {
    return ['static'];
  }

  protected eventAt(): string {
    return 'static';
  }

  protected nextChangeAfter(): Date | null {
    return null;
  }
}
