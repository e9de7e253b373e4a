import { addMinutes, formatDateTime, formatDuration, minutesBetween } from './date.util';

describe('formatDuration', () => {
  it('formats zero', () => {
    expect(formatDuration(0)).toBe(`0:00'00"`);
  });

  it('formats hours, minutes and seconds', () => {
    expect(formatDuration((8 * 3600 + 9 * 60 + 10) * 1000)).toBe(`8:09'10"`);
  });

  it('keeps counting hours past a day', () => {
    expect(formatDuration((2 * 86400 + 8 * 3600 + 9 * 60 + 10) * 1000)).toBe(`56:09'10"`);
  });

  it('drops milliseconds and clamps negatives', () => {
    expect(formatDuration(61_999)).toBe(`0:01'01"`);
    expect(formatDuration(-5000)).toBe(`0:00'00"`);
  });
});

describe('minutesBetween', () => {
  it('returns fractional minutes', () => {
    expect(minutesBetween(new Date('2026-07-18T06:00:00Z'), new Date('2026-07-18T06:01:30Z'))).toBe(1.5);
  });
});

describe('addMinutes', () => {
  it('moves a date forward and back', () => {
    const date = new Date('2026-07-18T06:00:00Z');
    expect(addMinutes(date, 90).toISOString()).toBe('2026-07-18T07:30:00.000Z');
    expect(addMinutes(date, -0.5).toISOString()).toBe('2026-07-18T05:59:30.000Z');
  });
});

describe('formatDateTime', () => {
  it('shows wall-clock time in the race time zone', () => {
    expect(formatDateTime(new Date('2026-07-18T12:00:00Z'), 'America/Denver')).toBe('Sat Jul 18 06:00 AM');
    expect(formatDateTime(new Date('2026-07-18T21:45:00Z'), 'America/Denver')).toBe('Sat Jul 18 03:45 PM');
  });
});
