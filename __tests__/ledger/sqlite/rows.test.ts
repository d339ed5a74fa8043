/**
 * Tests for GnuCash storage conversions
 */

import { toCalendarDay, toDecimal } from '../../../src/ledger/sqlite/rows';

describe('toDecimal', () => {
  it('should divide the numerator by the denominator exactly', () => {
    expect(toDecimal(7525, 100).toString()).toBe('75.25');
    expect(toDecimal(-25000, 100).toString()).toBe('-250');
  });

  it('should treat a zero denominator as zero', () => {
    expect(toDecimal(5, 0).isZero()).toBe(true);
  });
});

describe('toCalendarDay', () => {
  it('should read the date part of a current-format timestamp', () => {
    expect(toCalendarDay('2024-01-05 10:59:00').toISOString()).toBe('2024-01-05T00:00:00.000Z');
  });

  it('should read the legacy compact format', () => {
    expect(toCalendarDay('20240105105900').toISOString()).toBe('2024-01-05T00:00:00.000Z');
  });

  it('should read a date without a time as that day', () => {
    expect(toCalendarDay('2024-01-05').toISOString()).toBe('2024-01-05T00:00:00.000Z');
  });

  it('should take the local date of a timestamp written at local midnight', () => {
    const instant = new Date(Date.UTC(2024, 0, 4, 22, 0, 0));
    const localDay = Date.UTC(instant.getFullYear(), instant.getMonth(), instant.getDate());

    expect(toCalendarDay('2024-01-04 22:00:00').getTime()).toBe(localDay);
    expect(toCalendarDay('20240104220000').getTime()).toBe(localDay);
  });

  it('should map missing or unreadable values to the epoch', () => {
    expect(toCalendarDay(null).getTime()).toBe(0);
    expect(toCalendarDay('yesterday').getTime()).toBe(0);
  });
});
