import { describe, expect, it } from 'vitest';
import { TimeWindow } from './TimeWindow';
import { InvalidWindowError } from '../errors';

describe('TimeWindow', () => {
  const window = TimeWindow.between('2024-05-06T00:00:00Z', '2024-05-20T00:00:00Z');

  it('includes the start and excludes the end', () => {
    expect(window.contains('2024-05-06T00:00:00Z')).toBe(true);
    expect(window.contains('2024-05-19T23:59:59.999Z')).toBe(true);
    expect(window.contains('2024-05-20T00:00:00Z')).toBe(false);
    expect(window.contains(new Date('2024-05-05T23:59:59Z'))).toBe(false);
  });

  it('rejects a start after the end', () => {
    expect(() => TimeWindow.between('2024-05-20', '2024-05-06')).toThrow(InvalidWindowError);
  });

  it('rejects unparseable bounds', () => {
    expect(() => TimeWindow.between('soon', '2024-05-06')).toThrow('Time window bounds must be valid dates');
  });

  it('builds the last N days up to now', () => {
    const now = new Date('2024-05-20T12:00:00Z');
    const last = TimeWindow.lastNDays(14, now);

    expect(last.start.toISOString()).toBe('2024-05-06T12:00:00.000Z');
    expect(last.end.toISOString()).toBe('2024-05-20T12:00:00.000Z');
    expect(last.startDateISO).toBe('2024-05-06');
  });

  it('extends the end only forward', () => {
    const later = window.extendTo(new Date('2024-05-22T00:00:00Z'));
    expect(later.endDateISO).toBe('2024-05-22');
    expect(window.extendTo(new Date('2024-05-10T00:00:00Z'))).toBe(window);
  });

  it('does not leak its internal dates', () => {
    window.start.setFullYear(1999);
    expect(window.startDateISO).toBe('2024-05-06');
  });

  it('reuses an existing window and copies plain bounds', () => {
    expect(TimeWindow.from(window)).toBe(window);
    const copied = TimeWindow.from({ start: new Date('2024-01-01T00:00:00Z'), end: new Date('2024-01-02T00:00:00Z') });
    expect(copied.toString()).toBe('[2024-01-01T00:00:00.000Z, 2024-01-02T00:00:00.000Z)');
  });
});
