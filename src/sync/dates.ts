import { addMinutes } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import type { CalendarDate } from '../model.js';

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

const MINUTES_PER_DAY = 24 * 60;

function dayIn(instant: Date, timeZone: string): CalendarDate {
  return formatInTimeZone(instant, timeZone, 'yyyy-MM-dd');
}

/**
 * First instant of `date` in `timeZone`. That is local midnight, except where a
 * DST change skips midnight, in which case it is the end of the gap.
 */
export function startOfZonedDay(date: CalendarDate, timeZone: string): Date {
  let instant = fromZonedTime(`${date}T00:00:00`, timeZone);
  for (let i = 0; i < MINUTES_PER_DAY && dayIn(instant, timeZone) < date; i++) {
    instant = addMinutes(instant, 1);
  }
  for (let i = 0; i < MINUTES_PER_DAY && dayIn(addMinutes(instant, -1), timeZone) === date; i++) {
    instant = addMinutes(instant, -1);
  }
  return instant;
}

/** Start of `date` in `timeZone`, as epoch seconds. */
export function toStoreTimestamp(date: CalendarDate, timeZone: string): string {
  return String(Math.floor(startOfZonedDay(date, timeZone).getTime() / 1000));
}

/** Calendar date of an epoch-seconds value as seen in `timeZone`. */
export function fromStoreTimestamp(value: string | undefined, timeZone: string): CalendarDate | undefined {
  if (value === undefined || !/^-?\d+$/.test(value.trim())) return undefined;
  return dayIn(new Date(Number(value) * 1000), timeZone);
}
