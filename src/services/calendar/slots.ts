/**
 * Slot generation over a busy calendar. Pure functions, no API access.
 */

import { addMinutes } from 'date-fns';
import type { TimeSlot, WorkingHoursConfig } from '../../types/index.js';

export const SLOT_STEP_MINUTES = 30;

export interface BusyInterval {
  start: Date;
  end: Date;
  summary?: string;
}

const WEEKDAY_INDEX: Record<string, number> = {
  Sun: 0, Mon: 1, Tue: 2, Wed: 3, Thu: 4, Fri: 5, Sat: 6,
};

/**
 * Weekday (0 = Sunday) and minutes since local midnight of `date` in `timezone`.
 */
export function localDayAndMinutes(date: Date, timezone: string): { weekday: number; minutes: number } {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    weekday: 'short',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);

  const lookup: Record<string, string> = {};
  parts.forEach(p => (lookup[p.type] = p.value));

  return {
    weekday: WEEKDAY_INDEX[lookup.weekday] ?? 0,
    minutes: Number(lookup.hour) * 60 + Number(lookup.minute),
  };
}

/**
 * True when [start, start + duration) sits on a working day inside working hours.
 */
export function isWithinWorkingHours(start: Date, durationMinutes: number, config: WorkingHoursConfig): boolean {
  const { weekday, minutes } = localDayAndMinutes(start, config.timezone);
  if (!config.workingDays.includes(weekday)) return false;
  return minutes >= config.startHour * 60 && minutes + durationMinutes <= config.endHour * 60;
}

export function checkSlotAvailability(
  start: Date,
  end: Date,
  busy: readonly BusyInterval[]
): { isAvailable: boolean; conflictReason?: string } {
  const conflict = busy.find(interval => start < interval.end && end > interval.start);
  if (!conflict) return { isAvailable: true };
  return { isAvailable: false, conflictReason: `Conflicts with: ${conflict.summary || 'Unknown event'}` };
}

/** Round up to the next multiple of the slot step (UTC-based). */
export function alignToStep(date: Date, stepMinutes: number = SLOT_STEP_MINUTES): Date {
  const stepMs = stepMinutes * 60 * 1000;
  return new Date(Math.ceil(date.getTime() / stepMs) * stepMs);
}

/**
 * Candidate slots every SLOT_STEP_MINUTES between windowStart and windowEnd,
 * limited to working hours, each flagged with its conflict (if any).
 */
export function generateSlots(
  windowStart: Date,
  windowEnd: Date,
  durationMinutes: number,
  config: WorkingHoursConfig,
  busy: readonly BusyInterval[]
): TimeSlot[] {
  const slots: TimeSlot[] = [];

  for (
    let current = alignToStep(windowStart);
    current < windowEnd;
    current = addMinutes(current, SLOT_STEP_MINUTES)
  ) {
    if (!isWithinWorkingHours(current, durationMinutes, config)) continue;

    const end = addMinutes(current, durationMinutes);
    const { isAvailable, conflictReason } = checkSlotAvailability(current, end, busy);
    slots.push(
      conflictReason
        ? { start: current, end, isAvailable, conflictReason }
        : { start: current, end, isAvailable }
    );
  }

  return slots;
}
