/**
 * Types for event listeners.
 *
 * An event listener maps wall-clock time (plus its own options) to a
 * discrete event label, and reports when that label is going to change.
 */

export type EventListenerType = 'static' | 'weekday' | 'time_of_day' | 'periodic' | 'solar' | 'daylight';

export const EVENT_LISTENER_TYPES: readonly EventListenerType[] = [
  'static',
  'weekday',
  'time_of_day',
  'periodic',
  'solar',
  'daylight',
] as const;

export type WeekdayName = 'monday' | 'tuesday' | 'wednesday' | 'thursday' | 'friday' | 'saturday' | 'sunday';

/** Indexed like Date#getDay(): 0 is sunday */
export const WEEKDAYS_BY_INDEX: readonly WeekdayName[] = [
  'sunday',
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
] as const;

/** Source of the current time; injected so tests control the clock */
export type Clock = () => Date;

interface BaseListenerConfig {
  /** Always report this label instead of the computed one */
  forceEvent?: string;
}

export interface StaticListenerConfig extends BaseListenerConfig {
  type: 'static';
}

export interface WeekdayListenerConfig extends BaseListenerConfig {
  type: 'weekday';
}

export interface TimeOfDayListenerConfig extends BaseListenerConfig {
  type: 'time_of_day';
  /** 'HH:MM-HH:MM' per weekday; null or '' means no working hours that day */
  schedule: Partial<Record<WeekdayName, string | null>>;
}

export interface PeriodicListenerConfig extends BaseListenerConfig {
  type: 'periodic';
  seconds?: number;
  minutes?: number;
  hours?: number;
  days?: number;
}

export interface SolarListenerConfig extends BaseListenerConfig {
  type: 'solar' | 'daylight';
  latitude?: number;
  longitude?: number;
  elevation?: number;
}

export type EventListenerConfig =
  | StaticListenerConfig
  | WeekdayListenerConfig
  | TimeOfDayListenerConfig
  | PeriodicListenerConfig
  | SolarListenerConfig;
