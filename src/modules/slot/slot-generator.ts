import { differenceInCalendarDays, eachDayOfInterval, format, parseISO } from 'date-fns';
import { SchedulingValidationException } from '../../common/errors/scheduling.exceptions.js';
import {
  fromMinutes,
  startInstant,
  timeRangesOverlap,
  toMinutes,
} from '../../common/time.js';
import type { Slot } from '../slot-store/slot-store.types.js';

export interface GenerationWindow {
  startDate: string;
  endDate: string;
  startTime: string;
  endTime: string;
  durationMinutes: number;
}

export interface SlotCandidate {
  date: string;
  startTime: string;
  endTime: string;
}

export interface WindowLimits {
  now: Date;
  maxDays: number;
}

/**
 * Rejects windows that cannot yield a slot or that reach into the past.
 * The first day counts toward `maxDays`.
 */
export function assertGenerationWindow(
  window: GenerationWindow,
  limits: WindowLimits,
): void {
  if (window.startDate > window.endDate) {
    throw new SchedulingValidationException('start_date must not be after end_date');
  }
  if (window.startTime >= window.endTime) {
    throw new SchedulingValidationException('start_time must be before end_time');
  }
  if (window.durationMinutes <= 0) {
    throw new SchedulingValidationException('duration_minutes must be positive');
  }
  if (startInstant(window.startDate, window.startTime) < limits.now) {
    throw new SchedulingValidationException('Cannot generate slots in the past');
  }
  const days =
    differenceInCalendarDays(parseISO(window.endDate), parseISO(window.startDate)) + 1;
  if (days > limits.maxDays) {
    throw new SchedulingValidationException(
      `Generation range spans ${days} days; the limit is ${limits.maxDays}`,
    );
  }
}

/**
 * Expands a window into back-to-back slots per calendar day. A trailing
 * segment shorter than the duration is dropped.
 */
export function expandSlotCandidates(window: GenerationWindow): SlotCandidate[] {
  const dayStart = toMinutes(window.startTime);
  const dayEnd = toMinutes(window.endTime);
  const days = eachDayOfInterval({
    start: parseISO(window.startDate),
    end: parseISO(window.endDate),
  });

  const candidates: SlotCandidate[] = [];
  for (const day of days) {
    const date = format(day, 'yyyy-MM-dd');
    for (
      let cursor = dayStart;
      cursor + window.durationMinutes <= dayEnd;
      cursor += window.durationMinutes
    ) {
      const startTime = fromMinutes(cursor);
      const endTime = fromMinutes(cursor + window.durationMinutes);
      if (startTime === null || endTime === null) {
        break;
      }
      candidates.push({ date, startTime, endTime });
    }
  }
  return candidates;
}

/** Splits candidates into those clear of `occupied` and those that are not. */
export function partitionCandidates<T extends SlotCandidate>(
  candidates: T[],
  occupied: Pick<Slot, 'date' | 'startTime' | 'endTime'>[],
): { free: T[]; blocked: T[] } {
  const free: T[] = [];
  const blocked: T[] = [];
  for (const candidate of candidates) {
    const clash = occupied.some(
      (slot) => slot.date === candidate.date && timeRangesOverlap(slot, candidate),
    );
    (clash ? blocked : free).push(candidate);
  }
  return { free, blocked };
}
