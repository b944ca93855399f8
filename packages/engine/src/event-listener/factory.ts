/**
 * Build event listeners from module configuration.
 */

import type { Logger } from 'pino';
import { ConfigurationError } from '../errors.js';
import { isRecord } from '../utils/guards.js';
import type { EventListener } from './event-listener.js';
import { StaticListener } from './static.js';
import { WeekdayListener } from './weekday.js';
import { TimeOfDayListener } from './time-of-day.js';
import { PeriodicListener } from './periodic.js';
import { DaylightListener, SolarListener } from './solar.js';
import { EVENT_LISTENER_TYPES, WEEKDAYS_BY_INDEX } from './types.js';
import type { Clock, EventListenerConfig, EventListenerType, WeekdayName } from './types.js';


function isListenerType(value: unknown): value is EventListenerType {
  return typeof value === 'string' && EVENT_LISTENER_TYPES.some((type) => type === value);
}

function optionalNumber(raw: Record<string, unknown>, key: string, field: string): number | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || Number.isNaN(parsed)) {
    throw new ConfigurationError(`${field}.${key} must be a number`);
  }
  return parsed;
}

/** Coordinates are validated by the listener itself, which falls back rather than failing */
function lenientNumber(raw: Record<string, unknown>, key: string): number | undefined {
  const value = raw[key];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return undefined;
}

/**
 * Validate a raw `event_listener` mapping.
 * A missing mapping means a static listener.
 */
export function parseEventListenerConfig(raw: unknown, field = 'event_listener'): EventListenerConfig {
  if (raw === undefined || raw === null) {
    return { type: 'static' };
  }
  if (!isRecord(raw)) {
    throw new ConfigurationError(`${field} must be a mapping`);
  }

  const type = raw['type'] ?? 'static';
  if (!isListenerType(type)) {
    throw new ConfigurationError(
      `${field}.type must be one of ${EVENT_LISTENER_TYPES.join(', ')}, got '${String(type)}'`
    );
  }

  const rawForced = raw['force_event'];
  const forceEvent = rawForced === undefined || rawForced === null || rawForced === false ? undefined : String(rawForced);

  switch (type) {
    case 'static':
    case 'weekday':
      return { type, forceEvent };
    case 'time_of_day': {
      const schedule: Partial<Record<WeekdayName, string | null>> = {};
      for (const day of WEEKDAYS_BY_INDEX) {
        const value = raw[day];
        if (value === undefined) continue;
        if (value !== null && typeof value !== 'string') {
          throw new ConfigurationError(`${field}.${day} must be a string like '09:00-17:00'`);
        }
        schedule[day] = value;
      }
      return { type, forceEvent, schedule };
    }
    case 'periodic':
      return {
        type,
        forceEvent,
        seconds: optionalNumber(raw, 'seconds', field),
        minutes: optionalNumber(raw, 'minutes', field),
        hours: optionalNumber(raw, 'hours', field),
        days: optionalNumber(raw, 'days', field),
      };
    case 'solar':
    case 'daylight':
      return {
        type,
        forceEvent,
        latitude: lenientNumber(raw, 'latitude'),
        longitude: lenientNumber(raw, 'longitude'),
        elevation: lenientNumber(raw, 'elevation'),
      };
  }
}

export interface CreateEventListenerOptions {
  logger: Logger;
  now?: Clock;
}

export function createEventListener(config: EventListenerConfig, options: CreateEventListenerOptions): EventListener {
  const base = {
    logger: options.logger.child({ component: 'event-listener', type: config.type }),
    now: options.now,
    forceEvent: config.forceEvent,
  };

  switch (config.type) {
    case 'static':
      return new StaticListener(base);
    case 'weekday':
      return new WeekdayListener(base);
    case 'time_of_day':
      return new TimeOfDayListener({ ...base, schedule: config.schedule });
    case 'periodic':
      return new PeriodicListener({
        ...base,
        interval: { seconds: config.seconds, minutes: config.minutes, hours: config.hours, days: config.days },
      });
    case 'solar':
    case 'daylight': {
      const coordinates = {
        ...(config.latitude !== undefined ? { latitude: config.latitude } : {}),
        ...(config.longitude !== undefined ? { longitude: config.longitude } : {}),
        ...(config.elevation !== undefined ? { elevation: config.elevation } : {}),
      };
      return config.type === 'solar'
        ? new SolarListener({ ...base, coordinates })
        : new DaylightListener({ ...base, coordinates });
    }
  }
}
