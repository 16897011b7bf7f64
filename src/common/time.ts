import { format, isValid, parse } from 'date-fns';

const MINUTES_PER_DAY = 24 * 60;
const TIME_FORMATS = ['HH:mm', 'HH:mm:ss', 'h:mm a', 'hh:mm a', 'h:mma', 'hh:mma'];
const REFERENCE_DAY = new Date(2000, 0, 1);

/**
 * Normalizes a time of day to `HH:mm`. Accepts 24-hour input with optional
 * seconds and 12-hour input with an AM/PM marker. Returns null otherwise.
 */
export function parseTimeOfDay(input: string): string | null {
  const value = input.trim();
  for (const pattern of TIME_FORMATS) {
    const parsed = parse(value, pattern, REFERENCE_DAY);
    if (isValid(parsed)) {
      return format(parsed, 'HH:mm');
    }
  }
  return null;
}

export function isCalendarDate(input: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(input)) {
    return false;
  }
  const parsed = parse(input, 'yyyy-MM-dd', REFERENCE_DAY);
  return isValid(parsed) && format(parsed, 'yyyy-MM-dd') === input;
}

export function toMinutes(time: string): number {
  const [hours, minutes] = time.split(':').map(Number);
  return hours * 60 + minutes;
}

/** Inverse of {@link toMinutes}; null past the end of the day. */
export function fromMinutes(total: number): string | null {
  if (total < 0 || total >= MINUTES_PER_DAY) {
    return null;
  }
  const hours = Math.floor(total / 60);
  const minutes = total % 60;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

export function addMinutesToTime(time: string, minutes: number): string | null {
  return fromMinutes(toMinutes(time) + minutes);
}

/** Local instant at which a slot on `date` starting at `time` begins. */
export function startInstant(date: string, time: string): Date {
  return parse(`${date} ${time}`, 'yyyy-MM-dd HH:mm', REFERENCE_DAY);
}

export function toDateString(instant: Date): string {
  return format(instant, 'yyyy-MM-dd');
}

/** Half-open interval intersection over zero-padded `HH:mm` values. */
export function timeRangesOverlap(
  a: { startTime: string; endTime: string },
  b: { startTime: string; endTime: string },
): boolean {
  return a.startTime < b.endTime && b.startTime < a.endTime;
}
