import { formatDate, getCurrentDate, isValidDateFormat } from './date-utils';

describe('date-utils', () => {
  it('formats the UTC calendar day', () => {
    expect(formatDate(new Date('2026-03-02T23:30:00Z'))).toBe('2026-03-02');
  });

  it('returns today as YYYY-MM-DD', () => {
    expect(getCurrentDate()).toMatch(/^\d{4}-\d{2}-\d{2}$/);
  });

  it.each([
    ['2026-02-28', true],
    ['2026-02-30', false],
    ['2026-2-3', false],
    ['not a date', false],
  ])('isValidDateFormat(%s) is %s', (value, expected) => {
    expect(isValidDateFormat(value)).toBe(expected);
  });
});
