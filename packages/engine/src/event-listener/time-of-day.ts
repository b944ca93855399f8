/**
 * Working-hours listener: 'on' inside the configured interval of the
 * current weekday, 'off' outside it.
 */

import { ConfigurationError } from '../errors.js';
import { EventListener } from './event-listener.js';
import type { EventListenerOptions } from './event-listener.js';
import { WEEKDAYS_BY_INDEX } from './types.js';
import type { WeekdayName } from './types.js';

interface WorkHours {
  /** Minutes after local midnight */
  start: number;
  end: number;
}

export const DEFAULT_WORK_SCHEDULE: Readonly<Record<WeekdayName, string | null>> = {
  monday: '09:00-17:00',
  tuesday: '09:00-17:00',
  wednesday: '09:00-17:00',
  thursday: '09:00-17:00',
  friday: '09:00-17:00',
  saturday: null,
  sunday: null,
};

const INTERVAL_PATTERN = /^(\d{1,2}):(\d{2})\s*-\s*(\d{1,2}):(\d{2})$/;

/** Parse 'HH:MM-HH:MM'; null and '' mean a day off */
export function parseWorkHours(day: WeekdayName, value: string | null | undefined): WorkHours | null {
  if (value === null || value === undefined || value.trim() === '') {
    return null;
  }

  const match = INTERVAL_PATTERN.exec(value.trim());
  if (!match) {
    throw new ConfigurationError(`time_of_day.${day}: expected 'HH:MM-HH:MM', got '${value}'`);
  }

  const [startHour, startMinute, endHour, endMinute] = match.slice(1).map(Number);
  if (
    startHour === undefined ||
    startMinute === undefined ||
    endHour === undefined ||
    endMinute === undefined ||
    startHour > 23 ||
    endHour > 24 ||
    startMinute > 59 ||
    endMinute > 59
  ) {
    throw new ConfigurationError(`time_of_day.${day}: invalid time in '${value}'`);
  }

  const start = startHour * 60 + startMinute;
  const end = endHour * 60 + endMinute;
  if (end <= start || end > 24 * 60) {
    throw new ConfigurationError(`time_of_day.${day}: interval '${value}' must end after it starts`);
  }

  return { start, end };
}

export class TimeOfDayListener extends EventListener {
  readonly type = 'time_of_day' as const;
  private readonly hours: ReadonlyMap<number, WorkHours>;

  constructor(options: EventListenerOptions & { schedule?: Partial<Record<WeekdayName, string | null>> }) {
    super(options);

    const merged = { ...DEFAULT_WORK_SCHEDULE, ...(options.schedule ?? {}) };
    const hours = new Map<number, WorkHours>();
    WEEKDAYS_BY_INDEX.forEach((day, index) => {
      const parsed = parseWorkHours(day, merged[day]);
      if (parsed) hours.set(index, parsed);
    });
    this.hours = hours;
    this.checkForcedEvent();
  }

  get events(): readonly string[] {
    return ['on', 'off'];
  }

  protected eventAt(now: Date): string {
    const today = this.hours.get(now.getDay());
    if (!today) return 'off';

    const minute = minutesIntoDay(now);
    return today.start <= minute && minute < today.end ? 'on' : 'off';
  }

  protected nextChangeAfter(now: Date): Date | null {
    if (this.hours.size === 0) {
      return null;
    }

    const minute = minutesIntoDay(now);
    const today = this.hours.get(now.getDay());
    if (today) {
      if (minute < today.start) return atMinute(now, 0, today.start);
      if (minute < today.end) return atMinute(now, 0, today.end);
    }

    for (let offset = 1; offset <= 7; offset++) {
      const day = this.hours.get((now.getDay() + offset) % 7);
      if (day) return atMinute(now, offset, day.start);
    }

    return null;
  }
}

function minutesIntoDay(date: Date): number {
  return date.getHours() * 60 + date.getMinutes() + date.getSeconds() / 60 + date.getMilliseconds() / 60_000;
}

function atMinute(reference: Date, dayOffset: number, minute: number): Date {
  return new Date(
    reference.getFullYear(),
    reference.getMonth(),
    reference.getDate() + dayOffset,
    Math.floor(minute / 60),
    minute % 60
  );
}
