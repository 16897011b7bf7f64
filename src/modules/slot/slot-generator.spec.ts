import { SchedulingValidationException } from '../../common/errors/scheduling.exceptions.js';
import {
  assertGenerationWindow,
  expandSlotCandidates,
  partitionCandidates,
  type GenerationWindow,
} from './slot-generator.js';

describe('slot generator', () => {
  const window: GenerationWindow = {
    startDate: '2025-04-11',
    endDate: '2025-04-11',
    startTime: '10:00',
    endTime: '13:00',
    durationMinutes: 20,
  };
  const limits = { now: new Date(2025, 3, 10, 8, 0), maxDays: 92 };

  describe('expandSlotCandidates', () => {
    it('emits back-to-back slots that end within the window', () => {
      const candidates = expandSlotCandidates(window);

      expect(candidates.map((c) => c.startTime)).toEqual([
        '10:00', '10:20', '10:40', '11:00', '11:20', '11:40', '12:00', '12:20', '12:40',
      ]);
      expect(candidates.at(-1)).toEqual({
        date: '2025-04-11',
        startTime: '12:40',
        endTime: '13:00',
      });
    });

    it('drops a trailing segment shorter than the duration', () => {
      const candidates = expandSlotCandidates({
        ...window,
        endTime: '11:00',
        durationMinutes: 25,
      });

      expect(candidates).toEqual([
        { date: '2025-04-11', startTime: '10:00', endTime: '10:25' },
        { date: '2025-04-11', startTime: '10:25', endTime: '10:50' },
      ]);
    });

    it('repeats the daily grid for every date in the range', () => {
      const candidates = expandSlotCandidates({
        startDate: '2025-04-11',
        endDate: '2025-04-13',
        startTime: '09:00',
        endTime: '10:00',
        durationMinutes: 30,
      });

      expect(candidates.map((c) => `${c.date} ${c.startTime}`)).toEqual([
        '2025-04-11 09:00',
        '2025-04-11 09:30',
        '2025-04-12 09:00',
        '2025-04-12 09:30',
        '2025-04-13 09:00',
        '2025-04-13 09:30',
      ]);
    });
  });

  describe('assertGenerationWindow', () => {
    it('accepts a window within the limits', () => {
      expect(() => assertGenerationWindow(window, limits)).not.toThrow();
    });

    it.each<[string, Partial<GenerationWindow>]>([
      ['reversed dates', { startDate: '2025-04-12', endDate: '2025-04-11' }],
      ['reversed times', { startTime: '13:00', endTime: '10:00' }],
      ['empty time range', { startTime: '10:00', endTime: '10:00' }],
      ['non-positive duration', { durationMinutes: 0 }],
      ['a start in the past', { startDate: '2025-04-09' }],
    ])('rejects %s', (_label, patch) => {
      expect(() => assertGenerationWindow({ ...window, ...patch }, limits)).toThrow(
        SchedulingValidationException,
      );
    });

    it('counts the first day toward the range limit', () => {
      expect(() =>
        assertGenerationWindow({ ...window, endDate: '2025-07-11' }, limits),
      ).not.toThrow();
      expect(() =>
        assertGenerationWindow({ ...window, endDate: '2025-07-12' }, limits),
      ).toThrow(SchedulingValidationException);
    });
  });

  describe('partitionCandidates', () => {
    it('blocks candidates that intersect an occupied interval on the same date', () => {
      const candidates = expandSlotCandidates({ ...window, endTime: '11:00' });

      const { free, blocked } = partitionCandidates(candidates, [
        { date: '2025-04-11', startTime: '10:10', endTime: '10:30' },
        { date: '2025-04-12', startTime: '10:40', endTime: '11:00' },
      ]);

      expect(blocked.map((c) => c.startTime)).toEqual(['10:00', '10:20']);
      expect(free.map((c) => c.startTime)).toEqual(['10:40']);
    });
  });
});
