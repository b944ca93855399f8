export { EventListener } from './event-listener.js';
export type { EventListenerOptions } from './event-listener.js';
export { StaticListener } from './static.js';
export { WeekdayListener } from './weekday.js';
export { TimeOfDayListener, DEFAULT_WORK_SCHEDULE, parseWorkHours } from './time-of-day.js';
export { PeriodicListener, DEFAULT_PERIOD_MS, periodMs } from './periodic.js';
export type { PeriodicInterval } from './periodic.js';
export { SolarListener, DaylightListener } from './solar.js';
export type { Coordinates } from './solar.js';
export { parseEventListenerConfig, createEventListener } from './factory.js';
export type { CreateEventListenerOptions } from './factory.js';
export { EVENT_LISTENER_TYPES, WEEKDAYS_BY_INDEX } from './types.js';
export type {
  Clock,
  EventListenerConfig,
  EventListenerType,
  WeekdayName,
  StaticListenerConfig,
  WeekdayListenerConfig,
  TimeOfDayListenerConfig,
  PeriodicListenerConfig,
  SolarListenerConfig,
} from './types.js';
