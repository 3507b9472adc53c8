/**
 * Fuzzy natural-date parsing behind a small interface so the resolver can be
 * driven by chrono-node in production and by a stub in tests.
 */

import * as chrono from 'chrono-node';
import { set } from 'date-fns';
import { isValidDate } from './zonedTime.js';

export interface FuzzyDateParser {
  parse(text: string, referenceDate: Date): Date | null;
}

/** Hour used when a date is mentioned without a time of day */
export const DEFAULT_DATE_HOUR = 9;

/** "in 3 days", "two weeks", "next month", "a week from now" */
const RELATIVE_PHRASE = /\b\w+\s+(?:day|week|month|year)s?\b|\b(?:from now|later|ago)\b/i;

/**
 * chrono-node backed parser.
 *
 * Only results that name a calendar day ("June 20th", "6/20") count.
 * Weekday-only ("Tuesday") and time-only ("2 PM") results are dropped:
 * weekdays are handled by the explicit "next <weekday>" rule and clock times
 * by the absolute-time signal. Relative phrases are left to the resolver's
 * relative-offset rules.
 */
export const chronoFuzzyDateParser: FuzzyDateParser = {
  parse(text: string, referenceDate: Date): Date | null {
    const results = chrono.parse(text, referenceDate, { forwardDate: true });
    const dated = results.find(result => result.start.isCertain('day') && !RELATIVE_PHRASE.test(result.text));
    if (!dated) return null;

    const date = dated.start.date();
    if (!isValidDate(date)) return null;
    if (dated.start.isCertain('hour')) return date;
    return set(date, { hours: DEFAULT_DATE_HOUR, minutes: 0, seconds: 0, milliseconds: 0 });
  },
};

export const noFuzzyDates: FuzzyDateParser = {
  parse: () => null,
};
