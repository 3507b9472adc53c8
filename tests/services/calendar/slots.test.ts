import { describe, expect, it } from 'vitest';
import {
  alignToStep,
  checkSlotAvailability,
  generateSlots,
  isWithinWorkingHours,
  localDayAndMinutes,
} from '../../../src/services/calendar/slots.js';
import type { WorkingHoursConfig } from '../../../src/types/index.js';

const utcHours: WorkingHoursConfig = {
  timezone: 'UTC',
  startHour: 9,
  endHour: 17,
  workingDays: [1, 2, 3, 4, 5],
};

const at = (day: number, hour: number, minute = 0) => new Date(Date.UTC(2026, 5, day, hour, minute));

describe('slots', () => {
  describe('localDayAndMinutes', () => {
    it('reads weekday and minutes in the configured zone', () => {
      expect(localDayAndMinutes(at(16, 14, 30), 'UTC')).toEqual({ weekday: 2, minutes: 870 });
      expect(localDayAndMinutes(at(16, 2, 0), 'America/New_York')).toEqual({ weekday: 1, minutes: 22 * 60 });
    });
  });

  describe('isWithinWorkingHours', () => {
    it('requires the whole meeting to fit before the end hour', () => {
      expect(isWithinWorkingHours(at(16, 16, 0), 60, utcHours)).toBe(true);
      expect(isWithinWorkingHours(at(16, 16, 30), 60, utcHours)).toBe(false);
      expect(isWithinWorkingHours(at(16, 8, 30), 30, utcHours)).toBe(false);
    });

    it('skips non-working days', () => {
      expect(isWithinWorkingHours(at(20, 10, 0), 30, utcHours)).toBe(false);
    });

    it('applies hours in the configured timezone', () => {
      const newYork = { ...utcHours, timezone: 'America/New_York' };
      expect(isWithinWorkingHours(at(16, 13, 0), 30, newYork)).toBe(true);
      expect(isWithinWorkingHours(at(16, 12, 30), 30, newYork)).toBe(false);
    });
  });

  describe('checkSlotAvailability', () => {
    it('names the conflicting event', () => {
      const busy = [{ start: at(16, 10), end: at(16, 11), summary: 'Standup' }];
      expect(checkSlotAvailability(at(16, 10, 30), at(16, 11, 30), busy)).toEqual({
        isAvailable: false,
        conflictReason: 'Conflicts with: Standup',
      });
    });

    it('falls back to a generic name', () => {
      const busy = [{ start: at(16, 10), end: at(16, 11) }];
      expect(checkSlotAvailability(at(16, 9, 30), at(16, 10, 30), busy).conflictReason).toBe(
        'Conflicts with: Unknown event'
      );
    });

    it('treats touching intervals as free', () => {
      const busy = [{ start: at(16, 10), end: at(16, 11) }];
      expect(checkSlotAvailability(at(16, 11), at(16, 12), busy)).toEqual({ isAvailable: true });
    });
  });

  describe('alignToStep', () => {
    it('rounds up to the next half hour', () => {
      expect(alignToStep(at(16, 8, 10))).toEqual(at(16, 8, 30));
      expect(alignToStep(at(16, 9, 0))).toEqual(at(16, 9, 0));
    });
  });

  describe('generateSlots', () => {
    it('walks the window in half-hour steps inside working hours', () => {
      const busy = [{ start: at(16, 10), end: at(16, 10, 30), summary: 'Standup' }];
      const slots = generateSlots(at(16, 8, 10), at(16, 12), 60, utcHours, busy);

      expect(slots.map(slot => [slot.start.toISOString(), slot.isAvailable])).toEqual([
        ['2026-06-16T09:00:00.000Z', true],
        ['2026-06-16T09:30:00.000Z', false],
        ['2026-06-16T10:00:00.000Z', false],
        ['2026-06-16T10:30:00.000Z', true],
        ['2026-06-16T11:00:00.000Z', true],
        ['2026-06-16T11:30:00.000Z', true],
      ]);
      expect(slots[1].conflictReason).toBe('Conflicts with: Standup');
      expect(slots[0].end).toEqual(at(16, 10));
      expect(slots[0]).not.toHaveProperty('conflictReason');
    });

    it('produces nothing over a weekend', () => {
      expect(generateSlots(at(20, 0), at(22, 0), 30, utcHours, [])).toEqual([]);
    });
  });
});
