import { formatCalendarDate, parseCalendarDate } from './calendar-date';

describe('calendar dates', () => {
  it('parses a day to midnight UTC', () => {
    expect(parseCalendarDate('1990-04-12')).toEqual(new Date('1990-04-12T00:00:00.000Z'));
  });

  it('accepts leap days in leap years only', () => {
    expect(parseCalendarDate('2024-02-29')).not.toBeNull();
    expect(parseCalendarDate('2023-02-29')).toBeNull();
  });

  it.each(['2026-02-30', '2026-13-01', '1990-4-12', '12/04/1990', '1990-04-12T10:00:00Z', ''])(
    'rejects %p',
    (value) => {
      expect(parseCalendarDate(value)).toBeNull();
    },
  );

  it('formats the UTC day of a date', () => {
    expect(formatCalendarDate(new Date('1990-04-12T23:30:00.000Z'))).toBe('1990-04-12');
  });
});
