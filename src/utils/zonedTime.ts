/**
 * Wall-clock conversion for a named timezone.
 *
 * `toWallClock` returns a Date whose local fields (getHours, getDay, ...) read
 * as the clock in `timezone`, so date-fns arithmetic can run on it directly.
 * `fromWallClock` maps such a Date back to the real instant. Without a
 * timezone both return their input unchanged.
 */

interface ClockFields {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timezone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: timezone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    });
    formatters.set(timezone, formatter);
  }
  return formatter;
}

function clockFields(instant: Date, timezone: string): ClockFields {
  const parts: Record<string, string> = {};
  formatterFor(timezone)
    .formatToParts(instant)
    .forEach(p => (parts[p.type] = p.value));

  return {
    year: Number(parts.year),
    month: Number(parts.month),
    day: Number(parts.day),
    // Some engines print midnight as 24 even with h23
    hour: Number(parts.hour) % 24,
    minute: Number(parts.minute),
    second: Number(parts.second),
  };
}

/** Offset of `timezone` from UTC at `instant`, in ms (New York in summer: -4h). */
function offsetAt(instant: number, timezone: string): number {
  const wholeSeconds = Math.floor(instant / 1000) * 1000;
  const date = new Date(wholeSeconds);
  if (!isValidDate(date)) return 0;
  const f = clockFields(date, timezone);
  return Date.UTC(f.year, f.month - 1, f.day, f.hour, f.minute, f.second) - wholeSeconds;
}

export function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

export function toWallClock(instant: Date, timezone?: string): Date {
  if (!timezone || !isValidDate(instant)) return instant;
  const f = clockFields(instant, timezone);
  return new Date(f.year, f.month - 1, f.day, f.hour, f.minute, f.second, instant.getMilliseconds());
}

export function fromWallClock(wallClock: Date, timezone?: string): Date {
  if (!timezone || !isValidDate(wallClock)) return wallClock;

  const asUtc = Date.UTC(
    wallClock.getFullYear(),
    wallClock.getMonth(),
    wallClock.getDate(),
    wallClock.getHours(),
    wallClock.getMinutes(),
    wallClock.getSeconds(),
    wallClock.getMilliseconds()
  );
  if (Number.isNaN(asUtc)) return new Date(Number.NaN);

  // Second pass picks up a DST change between the guess and the answer
  const guess = asUtc - offsetAt(asUtc, timezone);
  return new Date(asUtc - offsetAt(guess, timezone));
}
