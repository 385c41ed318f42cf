import { addDays, daysBetween, parseIsoDate, startOfUtcDay, toIsoDate } from '../../../src/util/dates.js';

describe('dates', () => {
  it('parses plain ISO dates to UTC midnight', () => {
    expect(parseIsoDate('2025-03-16')?.toISOString()).toBe('2025-03-16T00:00:00.000Z');
  });

  it('ignores a trailing time part', () => {
    expect(parseIsoDate('2025-03-16T18:30:00Z')?.toISOString()).toBe('2025-03-16T00:00:00.000Z');
  });

  it('rejects malformed and impossible dates', () => {
    expect(parseIsoDate('16/03/2025')).toBeNull();
    expect(parseIsoDate('next friday')).toBeNull();
    expect(parseIsoDate('2025-02-30')).toBeNull();
    expect(parseIsoDate('2025-13-01')).toBeNull();
  });

  it('rejects a time part that is not a real time', () => {
    expect(parseIsoDate('2025-03-16Tgarbage')).toBeNull();
    expect(parseIsoDate('2025-03-16T')).toBeNull();
    expect(parseIsoDate('2025-03-16T99:99:99')).toBeNull();
    expect(parseIsoDate('2025-03-16T24:00')).toBeNull();
    expect(parseIsoDate('2025-03-16T10:00+02:00')?.toISOString()).toBe('2025-03-16T00:00:00.000Z');
  });

  it('counts calendar days regardless of time of day', () => {
    const from = new Date('2025-03-15T23:59:00Z');
    const to = new Date('2025-03-16T00:01:00Z');
    expect(daysBetween(from, to)).toBe(1);
    expect(daysBetween(to, from)).toBe(-1);
    expect(daysBetween(from, from)).toBe(0);
  });

  it('adds days and formats', () => {
    const d = startOfUtcDay(new Date('2025-12-31T15:00:00Z'));
    expect(toIsoDate(addDays(d, 1))).toBe('2026-01-01');
  });
});
