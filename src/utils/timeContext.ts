/**
 * Time Context Utility
 *
 * Gives the LLM the current local time so prompts can stay static while
 * relative phrases ("tomorrow", "next Friday") still extract correctly.
 */

/**
 * Format: [Current time: Tuesday, 2026-06-16 14:05, Timezone: UTC]
 */
export function getTimeContextString(now: Date = new Date(), timezone: string = 'UTC'): string {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    weekday: 'long',
    hourCycle: 'h23',
  });

  const dateParts: Record<string, string> = {};
  formatter.formatToParts(now).forEach(p => (dateParts[p.type] = p.value));

  return `[Current time: ${dateParts.weekday}, ${dateParts.year}-${dateParts.month}-${dateParts.day} ${dateParts.hour}:${dateParts.minute}, Timezone: ${timezone}]`;
}

export function prependTimeContext(message: string, now: Date = new Date(), timezone: string = 'UTC'): string {
  return `${getTimeContextString(now, timezone)}\n\n${message}`;
}
