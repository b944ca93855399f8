/**
 * Sun-position listeners.
 *
 * Solar reports night → sunrise → morning → afternoon → sunset → night,
 * split at dawn, sunrise, solar noon, sunset and dusk. Daylight collapses
 * that to day/night. Positions come from suncalc.
 *
 * Near the poles suncalc cannot place some of those instants (the sun never
 * crosses the horizon); the day is then split at fixed local hours.
 */

import SunCalc from 'suncalc';
import { EventListener } from './event-listener.js';
import type { EventListenerOptions } from './event-listener.js';

export interface Coordinates {
  latitude: number;
  longitude: number;
  elevation: number;
}

interface SolarBoundaries {
  dawn: Date;
  sunrise: Date;
  solarNoon: Date;
  sunset: Date;
  dusk: Date;
}

const SOLAR_EVENTS = ['sunrise', 'morning', 'afternoon', 'sunset', 'night'] as const;

/** Local hours used when the sun position is undefined */
const FALLBACK_HOURS: Readonly<Record<keyof SolarBoundaries, number>> = {
  dawn: 5,
  sunrise: 6,
  solarNoon: 12,
  sunset: 22,
  dusk: 23,
};

const DAY_MS = 86_400_000;

function isValidCoordinates(value: Partial<Coordinates>): value is Coordinates {
  const { latitude, longitude, elevation } = value;
  return (
    typeof latitude === 'number' &&
    typeof longitude === 'number' &&
    typeof elevation === 'number' &&
    Number.isFinite(latitude) &&
    Number.isFinite(longitude) &&
    Number.isFinite(elevation) &&
    Math.abs(latitude) <= 90 &&
    Math.abs(longitude) <= 180
  );
}

export class SolarListener extends EventListener {
  readonly type: 'solar' | 'daylight' = 'solar';
  readonly coordinates: Coordinates;

  constructor(options: EventListenerOptions & { coordinates?: Partial<Coordinates> }) {
    super(options);

    const requested = { elevation: 0, ...(options.coordinates ?? {}) };
    if (isValidCoordinates(requested)) {
      this.coordinates = requested;
    } else {
      this.logger.warn(
        { coordinates: options.coordinates ?? null },
        'Invalid or missing coordinates for sun position; using latitude 0, longitude 0, elevation 0'
      );
      this.coordinates = { latitude: 0, longitude: 0, elevation: 0 };
    }
    this.checkForcedEvent();
  }

  get events(): readonly string[] {
    return SOLAR_EVENTS;
  }

  protected eventAt(now: Date): string {
    const times = this.boundaries(now);
    const t = now.getTime();

    if (t < times.dawn.getTime()) return 'night';
    if (t < times.sunrise.getTime()) return 'sunrise';
    if (t < times.solarNoon.getTime()) return 'morning';
    if (t < times.sunset.getTime()) return 'afternoon';
    if (t < times.dusk.getTime()) return 'sunset';
    return 'night';
  }

  protected nextChangeAfter(now: Date): Date {
    return this.nextBoundary(now, ['dawn', 'sunrise', 'solarNoon', 'sunset', 'dusk']);
  }

  /** Earliest of the named boundaries strictly after `now`, looking into the next days */
  protected nextBoundary(now: Date, names: ReadonlyArray<keyof SolarBoundaries>): Date {
    const t = now.getTime();
    for (let offset = 0; offset <= 2; offset++) {
      const times = this.boundaries(new Date(t + offset * DAY_MS));
      const upcoming = names.map((name) => times[name].getTime()).filter((candidate) => candidate > t);
      if (upcoming.length > 0) {
        return new Date(Math.min(...upcoming));
      }
    }
    // Unreachable with fallback hours
    return new Date(t + DAY_MS);
  }

  protected boundaries(date: Date): SolarBoundaries {
    const { latitude, longitude, elevation } = this.coordinates;
    const times = SunCalc.getTimes(date, latitude, longitude, elevation);
    const computed: SolarBoundaries = {
      dawn: times.dawn,
      sunrise: times.sunrise,
      solarNoon: times.solarNoon,
      sunset: times.sunset,
      dusk: times.dusk,
    };

    const undefinedInstant = Object.values(computed).some((value) => Number.isNaN(value.getTime()));
    if (!undefinedInstant) {
      return computed;
    }

    const at = (hour: number): Date => new Date(date.getFullYear(), date.getMonth(), date.getDate(), hour);
    return {
      dawn: at(FALLBACK_HOURS.dawn),
      sunrise: at(FALLBACK_HOURS.sunrise),
      solarNoon: at(FALLBACK_HOURS.solarNoon),
      sunset: at(FALLBACK_HOURS.sunset),
      dusk: at(FALLBACK_HOURS.dusk),
    };
  }
}

/** 'day' between dawn and dusk, 'night' otherwise */
export class DaylightListener extends SolarListener {
  readonly type = 'daylight' as const;

  get events(): readonly string[] {
    return ['day', 'night'];
  }

  protected eventAt(now: Date): string {
    return super.eventAt(now) === 'night' ? 'night' : 'day';
  }

  protected nextChangeAfter(now: Date): Date {
    return this.nextBoundary(now, ['dawn', 'dusk']);
  }
}
