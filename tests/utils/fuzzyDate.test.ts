import { describe, expect, it } from 'vitest';
import { chronoFuzzyDateParser, noFuzzyDates } from '../../src/utils/fuzzyDate.js';

const reference = new Date(2026, 5, 16, 10, 0);

describe('chronoFuzzyDateParser', () => {
  it('parses a calendar date at the default hour', () => {
    expect(chronoFuzzyDateParser.parse('how about June 20', reference)).toEqual(new Date(2026, 5, 20, 9, 0));
  });

  it('keeps an explicit hour', () => {
    expect(chronoFuzzyDateParser.parse('June 20 at 3pm', reference)).toEqual(new Date(2026, 5, 20, 15, 0));
  });

  it('rejects a bare weekday', () => {
    expect(chronoFuzzyDateParser.parse('Tuesday', reference)).toBeNull();
  });

  it('rejects a time without a date', () => {
    expect(chronoFuzzyDateParser.parse('2 PM', reference)).toBeNull();
  });

  it('leaves relative phrases to the offset rules', () => {
    expect(chronoFuzzyDateParser.parse('in 3 days', reference)).toBeNull();
    expect(chronoFuzzyDateParser.parse('next week', reference)).toBeNull();
    expect(chronoFuzzyDateParser.parse('in 2 weeks', reference)).toBeNull();
  });

  it('returns null for text without dates', () => {
    expect(chronoFuzzyDateParser.parse('whenever works for you', reference)).toBeNull();
  });
});

describe('noFuzzyDates', () => {
  it('never finds a date', () => {
    expect(noFuzzyDates.parse('June 20', reference)).toBeNull();
  });
});
