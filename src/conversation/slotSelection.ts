import { format } from 'date-fns';
import type { TimeSlot } from '../types/index.js';
import { toWallClock } from '../utils/zonedTime.js';

/**
 * Match a user's reply against the slots that were presented.
 *
 * "option N" is 1-indexed and must be within the list. Otherwise the slot
 * whose start time ("02:00 pm" or "2:00 pm"), read on the clock of
 * `timezone`, appears in the reply wins.
 */
export function selectSlot(input: string, slots: readonly TimeSlot[], timezone?: string): TimeSlot | null {
  const lower = input.toLowerCase();

  const option = lower.match(/\boption\s+(\d+)/);
  if (option) {
    const index = Number(option[1]);
    if (index >= 1 && index <= slots.length) {
      return slots[index - 1];
    }
  }

  for (const slot of slots) {
    const start = toWallClock(slot.start, timezone);
    const candidates = [format(start, 'hh:mm a'), format(start, 'h:mm a')];
    if (candidates.some(candidate => containsTime(lower, candidate.toLowerCase()))) {
      return slot;
    }
  }

  return null;
}

/** Substring match that will not find "2:00 pm" inside "12:00 pm". */
function containsTime(haystack: string, time: string): boolean {
  let from = 0;
  for (;;) {
    const index = haystack.indexOf(time, from);
    if (index === -1) return false;
    if (index === 0 || !/\d/.test(haystack[index - 1])) return true;
    from = index + 1;
  }
}
