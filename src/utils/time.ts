/**
 * Natural-language time expression resolver
 *
 * Turns a user fragment ("tomorrow afternoon", "before my flight", "2:30 PM")
 * into a bag of candidate values, then picks one concrete timestamp using a
 * fixed priority order.
 */

import { addDays, addHours, set, setHours, startOfDay } from 'date-fns';
import type { ReferenceEvent, TimeRangeLabel } from '../types/index.js';
import { chronoFuzzyDateParser, DEFAULT_DATE_HOUR, type FuzzyDateParser } from './fuzzyDate.js';
import { fromWallClock, isValidDate, toWallClock } from './zonedTime.js';

/** [startHour, endHour); night wraps past midnight */
export const TIME_RANGES: Readonly<Record<TimeRangeLabel, readonly [number, number]>> = {
  morning: [6, 12],
  afternoon: [12, 17],
  evening: [17, 22],
  night: [22, 6],
};

const TIME_RANGE_ORDER: readonly TimeRangeLabel[] = ['morning', 'afternoon', 'evening', 'night'];

/** Additive, unnormalized weight per detected signal */
export const CONFIDENCE_WEIGHTS = {
  specificTime: 0.4,
  preferredDate: 0.3,
  preferredTimeRange: 0.2,
  relativeOffset: 0.3,
  deadlineReference: 0.4,
  contextEvent: 0.4,
} as const;

const WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'];

const RELATIVE_RULES: ReadonlyArray<{ pattern: RegExp; days: (match: RegExpMatchArray) => number }> = [
  { pattern: /\btomorrow\b/i, days: () => 1 },
  { pattern: /\bnext week\b/i, days: () => 7 },
  { pattern: /\bnext month\b/i, days: () => 30 },
  { pattern: /\bin (\d+) days?\b/i, days: m => Number(m[1]) },
  { pattern: /\bin (\d+) weeks?\b/i, days: m => Number(m[1]) * 7 },
  // Fixed 30-day months, not calendar arithmetic
  { pattern: /\bin (\d+) months?\b/i, days: m => Number(m[1]) * 30 },
];

const STOP_WORDS = new Set([
  'a', 'an', 'the', 'my', 'our', 'your', 'their', 'his', 'her', 'its',
  'at', 'on', 'in', 'to', 'for', 'of', 'with', 'and', 'or', 'from', 'by',
  'is', 'be', 'it', 'this', 'that', 'me', 'we', 'us', 'you', 'can', 'could',
  'would', 'please', 'some', 'sometime', 'time', 'schedule', 'book', 'set', 'up',
  'before', 'after', 'meet',
]);

export interface TimeExpression {
  specificTime?: Date;
  preferredDate?: Date;
  preferredTimeRange?: TimeRangeLabel;
  relativeOffsetDays?: number;
  deadlineReference?: Date;
  contextEvent?: ReferenceEvent;
  confidence: number;
}

export interface ResolutionRule {
  name: string;
  /** Hours and days are counted on the clock of `timezone` (host clock when omitted). */
  resolve(expression: TimeExpression, now: Date, timezone?: string): Date | null;
}

/**
 * Resolution priority. First rule returning a value wins; order is the tie-break.
 */
export const RESOLUTION_RULES: readonly ResolutionRule[] = [
  {
    name: 'absolute_time',
    resolve: expression => expression.specificTime ?? null,
  },
  {
    name: 'deadline_anchor',
    resolve: expression => expression.deadlineReference ?? null,
  },
  {
    name: 'context_event',
    resolve: expression => (expression.contextEvent ? addHours(expression.contextEvent.start, -1) : null),
  },
  {
    name: 'date_with_time_range',
    resolve: (expression, _now, timezone) => {
      if (!expression.preferredDate || !expression.preferredTimeRange) return null;
      const [from, to] = TIME_RANGES[expression.preferredTimeRange];
      const midpoint = Math.floor((from + to) / 2);
      const day = toWallClock(expression.preferredDate, timezone);
      return fromWallClock(set(day, { hours: midpoint, minutes: 0, seconds: 0, milliseconds: 0 }), timezone);
    },
  },
  {
    name: 'date',
    resolve: expression => expression.preferredDate ?? null,
  },
  {
    name: 'relative_offset',
    resolve: (expression, now, timezone) =>
      expression.relativeOffsetDays !== undefined
        ? fromWallClock(addDays(toWallClock(now, timezone), expression.relativeOffsetDays), timezone)
        : null,
  },
];

export function significantWords(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9']+/)
    .map(word => word.replace(/^'+|'+$/g, ''))
    .filter(word => word.length > 1 && !STOP_WORDS.has(word));
}

export class TimeExpressionResolver {
  /**
   * @param timezone - IANA zone whose clock "2 PM", "tomorrow" and the range
   * midpoints are read on; the host clock when omitted
   */
  constructor(
    private readonly fuzzyDates: FuzzyDateParser = chronoFuzzyDateParser,
    private readonly rules: readonly ResolutionRule[] = RESOLUTION_RULES,
    private readonly timezone?: string
  ) {}

  /**
   * Detect every time signal in `text`.
   * @param referenceEvents - Known calendar events that "before/after X" and
   * direct mentions can anchor to
   */
  parse(text: string, referenceEvents: readonly ReferenceEvent[] = [], now: Date = new Date()): TimeExpression {
    const expression: TimeExpression = { confidence: 0 };
    const wallNow = toWallClock(now, this.timezone);

    const preferredDate = this.extractDateReference(text, wallNow);
    if (preferredDate) {
      expression.preferredDate = fromWallClock(preferredDate, this.timezone);
      expression.confidence += CONFIDENCE_WEIGHTS.preferredDate;
    }

    const clock = this.extractClockTime(text);
    if (clock) {
      const specificTime = set(preferredDate ?? wallNow, {
        hours: clock.hours,
        minutes: clock.minutes,
        seconds: 0,
        milliseconds: 0,
      });
      expression.specificTime = fromWallClock(specificTime, this.timezone);
      expression.confidence += CONFIDENCE_WEIGHTS.specificTime;
    }

    const range = this.extractTimeRange(text);
    if (range) {
      expression.preferredTimeRange = range;
      expression.confidence += CONFIDENCE_WEIGHTS.preferredTimeRange;
    }

    const offset = this.extractRelativeOffset(text);
    if (offset !== null) {
      expression.relativeOffsetDays = offset;
      expression.confidence += CONFIDENCE_WEIGHTS.relativeOffset;
    }

    const deadline = this.extractDeadlineReference(text, referenceEvents);
    if (deadline) {
      expression.deadlineReference = deadline;
      expression.confidence += CONFIDENCE_WEIGHTS.deadlineReference;
    }

    const contextEvent = this.extractContextEvent(text, referenceEvents);
    if (contextEvent) {
      expression.contextEvent = contextEvent;
      expression.confidence += CONFIDENCE_WEIGHTS.contextEvent;
    }

    return expression;
  }

  /**
   * Collapse an expression to one timestamp, or null when nothing concrete
   * was said. Never invents a default. A rule whose arithmetic overflows the
   * date range does not count.
   */
  resolve(expression: TimeExpression, now: Date = new Date()): Date | null {
    for (const rule of this.rules) {
      const resolved = this.apply(rule, expression, now);
      if (resolved) return resolved;
    }
    return null;
  }

  /** Name of the rule that would resolve `expression`, for logging. */
  matchedRule(expression: TimeExpression, now: Date = new Date()): string | null {
    const rule = this.rules.find(candidate => this.apply(candidate, expression, now) !== null);
    return rule?.name ?? null;
  }

  private apply(rule: ResolutionRule, expression: TimeExpression, now: Date): Date | null {
    const resolved = rule.resolve(expression, now, this.timezone);
    return resolved && isValidDate(resolved) ? resolved : null;
  }

  /**
   * Nearby times to offer when `unavailable` is taken: same day +-1..3h,
   * next day, same time next week. Only future weekday times between
   * 06:00 and 22:00 are kept.
   */
  suggestAlternatives(unavailable: Date, now: Date = new Date(), limit: number = 5): Date[] {
    const sameClock = (days: number) =>
      fromWallClock(addDays(toWallClock(unavailable, this.timezone), days), this.timezone);
    const candidates = [
      ...[1, 2, 3, -1, -2, -3].map(hours => addHours(unavailable, hours)),
      sameClock(1),
      sameClock(7),
    ];

    return candidates.filter(candidate => this.isSchedulable(candidate, now)).slice(0, limit);
  }

  private isSchedulable(candidate: Date, now: Date): boolean {
    if (!isValidDate(candidate) || candidate.getTime() <= now.getTime()) return false;
    const wall = toWallClock(candidate, this.timezone);
    const hour = wall.getHours();
    if (hour < 6 || hour > 22) return false;
    const day = wall.getDay();
    return day !== 0 && day !== 6;
  }

  private extractClockTime(text: string): { hours: number; minutes: number } | null {
    const twelveHour = text.match(/\b(\d{1,2}):?(\d{2})?\s*(am|pm)\b/i);
    if (twelveHour) {
      let hours = Number(twelveHour[1]);
      const minutes = twelveHour[2] ? Number(twelveHour[2]) : 0;
      const period = twelveHour[3].toLowerCase();

      if (hours >= 1 && hours <= 12 && minutes <= 59) {
        if (period === 'pm' && hours !== 12) hours += 12;
        else if (period === 'am' && hours === 12) hours = 0;
        return { hours, minutes };
      }
    }

    const twentyFourHour = text.match(/\b(\d{1,2}):(\d{2})\b/);
    if (twentyFourHour) {
      const hours = Number(twentyFourHour[1]);
      const minutes = Number(twentyFourHour[2]);
      if (hours <= 23 && minutes <= 59) {
        return { hours, minutes };
      }
    }

    return null;
  }

  private extractDateReference(text: string, now: Date): Date | null {
    const atDefaultHour = (date: Date) => setHours(startOfDay(date), DEFAULT_DATE_HOUR);

    if (/\btoday\b/i.test(text)) return atDefaultHour(now);
    if (/\btomorrow\b/i.test(text)) return atDefaultHour(addDays(now, 1));
    if (/\byesterday\b/i.test(text)) return atDefaultHour(addDays(now, -1));

    const nextWeekday = text.match(/\bnext\s+(sunday|monday|tuesday|wednesday|thursday|friday|saturday)\b/i);
    if (nextWeekday) {
      const target = WEEKDAYS.indexOf(nextWeekday[1].toLowerCase());
      return atDefaultHour(this.nextWeekday(now, target));
    }

    return this.fuzzyDates.parse(text, now);
  }

  /** Strictly after today: asking for today's weekday gives a week out. */
  private nextWeekday(now: Date, target: number): Date {
    let daysAhead = target - now.getDay();
    if (daysAhead <= 0) daysAhead += 7;
    return addDays(now, daysAhead);
  }

  private extractTimeRange(text: string): TimeRangeLabel | null {
    const lower = text.toLowerCase();
    return TIME_RANGE_ORDER.find(label => lower.includes(label)) ?? null;
  }

  private extractRelativeOffset(text: string): number | null {
    for (const rule of RELATIVE_RULES) {
      const match = text.match(rule.pattern);
      if (match) return rule.days(match);
    }
    return null;
  }

  private extractDeadlineReference(text: string, events: readonly ReferenceEvent[]): Date | null {
    const before = text.match(/\bbefore\s+(.+)/i);
    const after = text.match(/\bafter\s+(.+)/i);
    const anchor = before ?? after;
    if (!anchor || events.length === 0) return null;

    const referenceWords = new Set(significantWords(anchor[1]));
    const event = events.find(candidate =>
      significantWords(candidate.title).some(word => referenceWords.has(word))
    );
    if (!event) return null;

    return before ? addHours(event.start, -1) : addHours(event.end, 1);
  }

  private extractContextEvent(text: string, events: readonly ReferenceEvent[]): ReferenceEvent | null {
    const inputWords = new Set(significantWords(text));

    for (const event of events) {
      const titleWords = new Set(significantWords(event.title));
      let overlap = 0;
      for (const word of titleWords) {
        if (inputWords.has(word)) overlap++;
      }
      if (overlap >= 2) return event;
    }

    return null;
  }
}
