import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Logger } from 'pino';
import { WeekdayListener } from '../event-listener/weekday.js';
import { TimeOfDayListener } from '../event-listener/time-of-day.js';
import { PeriodicListener, DEFAULT_PERIOD_MS } from '../event-listener/periodic.js';
import { SolarListener, DaylightListener } from '../event-listener/solar.js';
import { StaticListener } from '../event-listener/static.js';
import { createEventListener, parseEventListenerConfig } from '../event-listener/factory.js';
import { ConfigurationError } from '../errors.js';

function createMockLogger(): Logger {
  return {
    child: () => createMockLogger(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

/** A clock the test can move */
function makeClock(start: Date): { now: () => Date; set: (date: Date) => void } {
  let current = start;
  return {
    now: () => current,
    set: (date: Date) => {
      current = date;
    },
  };
}

describe('StaticListener', () => {
  it('should always report the same event and never change', () => {
    const listener = new StaticListener({ logger: createMockLogger() });

    expect(listener.currentEvent()).toBe('static');
    expect(listener.nextEventChangeAt()).toBeNull();
    expect(listener.hasChanged()).toBe(false);
    expect(listener.hasChanged()).toBe(false);
  });
});

describe('WeekdayListener', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  it('should report the local weekday name', () => {
    // 2024-01-01 was a Monday
    const clock = makeClock(new Date(2024, 0, 1, 10, 30));
    const listener = new WeekdayListener({ logger, now: clock.now });

    expect(listener.currentEvent()).toBe('monday');
  });

  it('should change at local midnight', () => {
    const clock = makeClock(new Date(2024, 0, 1, 23, 59));
    const listener = new WeekdayListener({ logger, now: clock.now });

    expect(listener.nextEventChangeAt()?.getTime()).toBe(new Date(2024, 0, 2, 0, 0).getTime());
  });

  it('should detect a day rollover exactly once', () => {
    const clock = makeClock(new Date(2024, 0, 1, 12));
    const listener = new WeekdayListener({ logger, now: clock.now });

    expect(listener.hasChanged()).toBe(false);

    clock.set(new Date(2024, 0, 2, 0, 0, 1));
    expect(listener.hasChanged()).toBe(true);
    expect(listener.currentEvent()).toBe('tuesday');
    expect(listener.hasChanged()).toBe(false);
  });

  it('should honour force_event and warn when it is not a weekday', () => {
    const listener = new WeekdayListener({ logger, forceEvent: 'caturday' });

    expect(listener.currentEvent()).toBe('caturday');
    expect(listener.nextEventChangeAt()).toBeNull();
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('should not warn when force_event is a valid weekday', () => {
    const listener = new WeekdayListener({ logger, forceEvent: 'friday' });

    expect(listener.currentEvent()).toBe('friday');
    expect(logger.warn).not.toHaveBeenCalled();
  });
});

describe('TimeOfDayListener', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  it('should be off before working hours and on during them', () => {
    const clock = makeClock(new Date(2024, 0, 1, 8, 0));
    const listener = new TimeOfDayListener({ logger, now: clock.now });

    expect(listener.currentEvent()).toBe('off');
    expect(listener.nextEventChangeAt()?.getTime()).toBe(new Date(2024, 0, 1, 9, 0).getTime());

    clock.set(new Date(2024, 0, 1, 10, 0));
    expect(listener.currentEvent()).toBe('on');
    expect(listener.nextEventChangeAt()?.getTime()).toBe(new Date(2024, 0, 1, 17, 0).getTime());
  });

  it('should treat the end of the interval as off', () => {
    const clock = makeClock(new Date(2024, 0, 1, 17, 0));
    const listener = new TimeOfDayListener({ logger, now: clock.now });

    expect(listener.currentEvent()).toBe('off');
  });

  it('should skip the weekend when looking for the next change', () => {
    // Friday 2024-01-05 after work
    const clock = makeClock(new Date(2024, 0, 5, 18, 0));
    const listener = new TimeOfDayListener({ logger, now: clock.now });

    expect(listener.currentEvent()).toBe('off');
    expect(listener.nextEventChangeAt()?.getTime()).toBe(new Date(2024, 0, 8, 9, 0).getTime());
  });

  it('should use a custom schedule', () => {
    // Saturday 2024-01-06
    const clock = makeClock(new Date(2024, 0, 6, 11, 0));
    const listener = new TimeOfDayListener({
      logger,
      now: clock.now,
      schedule: { saturday: '10:00-12:30' },
    });

    expect(listener.currentEvent()).toBe('on');
    expect(listener.nextEventChangeAt()?.getTime()).toBe(new Date(2024, 0, 6, 12, 30).getTime());
  });

  it('should never change when no day has working hours', () => {
    const listener = new TimeOfDayListener({
      logger,
      schedule: { monday: null, tuesday: null, wednesday: '', thursday: null, friday: null },
    });

    expect(listener.currentEvent()).toBe('off');
    expect(listener.nextEventChangeAt()).toBeNull();
  });

  it('should reject malformed intervals', () => {
    expect(() => new TimeOfDayListener({ logger, schedule: { monday: 'nine to five' } })).toThrow(
      ConfigurationError
    );
    expect(() => new TimeOfDayListener({ logger, schedule: { monday: '17:00-09:00' } })).toThrow(
      ConfigurationError
    );
  });
});

describe('PeriodicListener', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  it('should default to one hour when every component is zero', () => {
    const listener = new PeriodicListener({
      logger,
      interval: { seconds: 0, minutes: 0, hours: 0, days: 0 },
    });

    expect(listener.intervalMs).toBe(DEFAULT_PERIOD_MS);
    expect(listener.intervalMs).toBe(3_600_000);
  });

  it('should sum all interval components', () => {
    const listener = new PeriodicListener({
      logger,
      interval: { seconds: 1, minutes: 1, hours: 1, days: 1 },
    });

    expect(listener.intervalMs).toBe((86_400 + 3600 + 60 + 1) * 1000);
  });

  it('should count elapsed intervals since construction', () => {
    const start = new Date(2024, 0, 1, 12, 0);
    const clock = makeClock(start);
    const listener = new PeriodicListener({ logger, now: clock.now, interval: { minutes: 30 } });

    expect(listener.currentEvent()).toBe('0');

    clock.set(new Date(start.getTime() + 45 * 60_000));
    expect(listener.currentEvent()).toBe('1');
    expect(listener.nextEventChangeAt()?.getTime()).toBe(start.getTime() + 60 * 60_000);
  });
});

describe('SolarListener', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  function solarAt(date: Date, coordinates = { latitude: 0, longitude: 0, elevation: 0 }): SolarListener {
    return new SolarListener({ logger, now: () => date, coordinates });
  }

  it('should report morning, afternoon and night on the equator at the equinox', () => {
    expect(solarAt(new Date(Date.UTC(2024, 2, 20, 10, 0))).currentEvent()).toBe('morning');
    expect(solarAt(new Date(Date.UTC(2024, 2, 20, 15, 0))).currentEvent()).toBe('afternoon');
    expect(solarAt(new Date(Date.UTC(2024, 2, 20, 1, 0))).currentEvent()).toBe('night');
    expect(solarAt(new Date(Date.UTC(2024, 2, 20, 22, 0))).currentEvent()).toBe('night');
  });

  it('should schedule the next change at solar noon during the morning', () => {
    const next = solarAt(new Date(Date.UTC(2024, 2, 20, 10, 0))).nextEventChangeAt();

    expect(next).not.toBeNull();
    expect(next?.getUTCHours()).toBe(12);
    expect(next?.getUTCMinutes()).toBeLessThan(15);
  });

  it('should fall back to fixed hours when the sun never sets', () => {
    const listener = solarAt(new Date(2024, 5, 21, 13, 0), { latitude: 89, longitude: 0, elevation: 0 });

    expect(listener.currentEvent()).toBe('afternoon');
    expect(listener.nextEventChangeAt()?.getTime()).toBe(new Date(2024, 5, 21, 22, 0).getTime());
  });

  it('should use the reference point and warn on invalid coordinates', () => {
    const listener = new SolarListener({ logger, coordinates: { latitude: 200, longitude: 10 } });

    expect(listener.coordinates).toEqual({ latitude: 0, longitude: 0, elevation: 0 });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('should warn when coordinates are missing', () => {
    const listener = new SolarListener({ logger });

    expect(listener.coordinates).toEqual({ latitude: 0, longitude: 0, elevation: 0 });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

describe('DaylightListener', () => {
  it('should collapse solar events to day and night', () => {
    const logger = createMockLogger();
    const coordinates = { latitude: 0, longitude: 0, elevation: 0 };

    const afternoon = new DaylightListener({ logger, coordinates, now: () => new Date(Date.UTC(2024, 2, 20, 15)) });
    const evening = new DaylightListener({ logger, coordinates, now: () => new Date(Date.UTC(2024, 2, 20, 22)) });

    expect(afternoon.currentEvent()).toBe('day');
    expect(evening.currentEvent()).toBe('night');

    const next = evening.nextEventChangeAt();
    expect(next?.getUTCDate()).toBe(21);
    expect(next?.getUTCHours()).toBe(5);
  });
});

describe('parseEventListenerConfig', () => {
  it('should default to a static listener', () => {
    expect(parseEventListenerConfig(undefined)).toEqual({ type: 'static' });
  });

  it('should reject unknown types', () => {
    expect(() => parseEventListenerConfig({ type: 'lunar' })).toThrow(ConfigurationError);
  });

  it('should parse periodic components', () => {
    expect(parseEventListenerConfig({ type: 'periodic', minutes: '5' })).toEqual({
      type: 'periodic',
      forceEvent: undefined,
      seconds: undefined,
      minutes: 5,
      hours: undefined,
      days: undefined,
    });
  });

  it('should build the configured listener type', () => {
    const logger = createMockLogger();
    const listener = createEventListener(parseEventListenerConfig({ type: 'daylight', latitude: 60, longitude: 10 }), {
      logger,
    });

    expect(listener).toBeInstanceOf(DaylightListener);
    expect(listener.type).toBe('daylight');
  });
});
