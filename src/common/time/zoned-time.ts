import { DateTime, IANAZone } from 'luxon';
import { ValidationError } from '../errors/scheduling.errors.js';

/** Fixed booking granularity. */
export const SLOT_MINUTES = 30;

const MINUTES_PER_DAY = 24 * 60;

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIME_PATTERN = /^(\d{2}):(\d{2})(?::(\d{2}))?$/;
const LOCAL_DATE_TIME_PATTERN = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2})$/;

export interface LocalSlotPosition {
  date: string;
  minutes: number;
}

export function isValidTimezone(timezone: string): boolean {
  return IANAZone.isValidZone(timezone);
}

/** Validates a calendar date in `YYYY-MM-DD` form. */
export function parseIsoDate(value: string): string {
  if (!DATE_PATTERN.test(value) || !DateTime.fromISO(value).isValid) {
    throw new ValidationError(`Invalid date "${value}", expected YYYY-MM-DD`);
  }
  return value;
}

/** Minutes since midnight for `HH:MM` or `HH:MM:SS`. Seconds are ignored. */
export function parseTimeOfDay(value: string): number {
  const match = TIME_PATTERN.exec(value);
  if (!match) {
    throw new ValidationError(`Invalid time "${value}", expected HH:MM`);
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) {
    throw new ValidationError(`Invalid time "${value}", expected HH:MM`);
  }
  return hours * 60 + minutes;
}

export function formatTimeOfDay(minutes: number): string {
  const hours = Math.floor(minutes / 60)
    .toString()
    .padStart(2, '0');
  const mins = (minutes % 60).toString().padStart(2, '0');
  return `${hours}:${mins}`;
}

/** The instant at which `date` + `minutes` occurs on the wall clock of `timezone`. */
export function zonedInstant(
  date: string,
  minutes: number,
  timezone: string,
): Date {
  const dayOffset = Math.floor(minutes / MINUTES_PER_DAY);
  const dt = DateTime.fromISO(
    `${date}T${formatTimeOfDay(minutes % MINUTES_PER_DAY)}`,
    { zone: timezone },
  ).plus({ days: dayOffset });
  if (!dt.isValid) {
    throw new ValidationError(`Invalid date "${date}" in zone ${timezone}`);
  }
  return dt.toJSDate();
}

/** Parses a naive `YYYY-MM-DDTHH:mm` wall-clock value in `timezone`. */
export function parseLocalDateTime(value: string, timezone: string): Date {
  const match = LOCAL_DATE_TIME_PATTERN.exec(value);
  if (!match) {
    throw new ValidationError(
      `Invalid slot "${value}", expected YYYY-MM-DDTHH:mm`,
    );
  }
  return zonedInstant(parseIsoDate(match[1]), parseTimeOfDay(match[2]), timezone);
}

/** Wall-clock date and minute of day of `instant` in `timezone`. */
export function localPosition(
  instant: Date,
  timezone: string,
): LocalSlotPosition {
  const dt = DateTime.fromJSDate(instant, { zone: timezone });
  const date = dt.toISODate();
  if (date === null) {
    throw new ValidationError(`Cannot express ${instant.toISOString()} in ${timezone}`);
  }
  return { date, minutes: dt.hour * 60 + dt.minute };
}

/** `[start of date, start of next date)` in `timezone`. */
export function localDayRange(
  date: string,
  timezone: string,
): { start: Date; end: Date } {
  const start = DateTime.fromISO(date, { zone: timezone }).startOf('day');
  if (!start.isValid) {
    throw new ValidationError(`Invalid date "${date}" in zone ${timezone}`);
  }
  return {
    start: start.toJSDate(),
    end: start.plus({ days: 1 }).toJSDate(),
  };
}
