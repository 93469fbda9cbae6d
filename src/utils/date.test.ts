import { describe, expect, it } from 'vitest';
import { addDays, diffInDays, fixedClock, isIsoDate, minDate, toLocalIsoDate } from './date';

describe('date utils', () => {
  it('adds days across month, year and leap-day boundaries', () => {
    expect(addDays('2026-10-18', 30)).toBe('2026-11-17');
    expect(addDays('2026-12-31', 1)).toBe('2027-01-01');
    expect(addDays('2026-02-28', 1)).toBe('2026-03-01');
    expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
    expect(addDays('2026-10-18', -1)).toBe('2026-10-17');
  });

  it('counts whole days between two dates', () => {
    expect(diffInDays('2026-10-18', '2026-10-18')).toBe(0);
    expect(diffInDays('2026-10-18', '2026-11-17')).toBe(30);
    expect(diffInDays('2026-10-18', '2026-10-15')).toBe(-3);
    // qua mốc đổi giờ mùa đông (tính theo UTC nên không lệch)
    expect(diffInDays('2026-10-20', '2026-11-05')).toBe(16);
  });

  it('accepts only real YYYY-MM-DD dates', () => {
    expect(isIsoDate('2026-10-18')).toBe(true);
    expect(isIsoDate('2024-02-29')).toBe(true);
    expect(isIsoDate('2026-02-29')).toBe(false);
    expect(isIsoDate('2026-1-05')).toBe(false);
    expect(isIsoDate('2026-10-18T00:00:00Z')).toBe(false);
    expect(isIsoDate(20261018)).toBe(false);
  });

  it('rejects invalid input to date arithmetic', () => {
    expect(() => addDays('not-a-date', 1)).toThrow(RangeError);
  });

  it('formats the local calendar date', () => {
    expect(toLocalIsoDate(new Date(2026, 0, 5, 23, 30))).toBe('2026-01-05');
  });

  it('picks the earlier date', () => {
    expect(minDate('2026-11-01', '2026-10-31')).toBe('2026-10-31');
    expect(minDate('2026-10-31', '2026-10-31')).toBe('2026-10-31');
  });

  it('fixed clock always returns the same day', () => {
    const clock = fixedClock('2026-10-18');
    expect(clock.today()).toBe('2026-10-18');
    expect(clock.today()).toBe('2026-10-18');
  });
});
