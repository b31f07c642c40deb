import { describe, it, expect } from 'vitest';
import { formatDateKey, matchesDateGrammar, parseDateInput, parseDateKey } from '../dates.js';
import { GraphError } from '../graph/errors.js';

describe('parseDateKey', () => {
  it('pads to the canonical key', () => {
    expect(parseDateKey('2024-3-5')).toBe('2024-03-05');
    expect(parseDateKey('2024-02-29')).toBe('2024-02-29');
  });

  it('returns null for tokens without the date shape', () => {
    expect(parseDateKey('inbox')).toBeNull();
    expect(parseDateKey('2024/03/05')).toBeNull();
    expect(matchesDateGrammar('1-2-3')).toBe(true);
  });

  it('throws MalformedDate for shapes that name no calendar day', () => {
    expect(() => parseDateKey('2023-02-29')).toThrow(GraphError);
    expect(() => parseDateKey('2024-13-01')).toThrow('Malformed date string');
    expect(() => parseDateKey('0-01-01')).toThrow(GraphError);
  });
});

describe('parseDateInput', () => {
  const newYearsEve = new Date(2024, 11, 31, 23, 59);

  it('resolves relative keywords against the given time', () => {
    expect(parseDateInput('today', newYearsEve)).toBe('2024-12-31');
    expect(parseDateInput('Tomorrow', newYearsEve)).toBe('2025-01-01');
    expect(parseDateInput('yesterday', new Date(2024, 2, 1))).toBe('2024-02-29');
  });

  it('maps month names to the first of that month this year', () => {
    expect(parseDateInput('march', newYearsEve)).toBe('2024-03-01');
    expect(parseDateInput('sep', newYearsEve)).toBe('2024-09-01');
  });

  it('rejects anything else', () => {
    expect(() => parseDateInput('someday', newYearsEve)).toThrow(GraphError);
  });
});

describe('formatDateKey', () => {
  it('reads the date in local time', () => {
    expect(formatDateKey(new Date(2024, 0, 9, 23, 0))).toBe('2024-01-09');
  });
});
