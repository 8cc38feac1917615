import { PRICE_PATTERN, fromCents, sumLineTotals, toCents } from './money';

describe('money', () => {
  it.each([
    ['0', true],
    ['45.5', true],
    ['1234567890.99', true],
    ['-1.00', false],
    ['1.005', false],
    ['12345678901', false],
    ['abc', false],
  ])('PRICE_PATTERN on %s is %s', (value, expected) => {
    expect(PRICE_PATTERN.test(value)).toBe(expected);
  });

  it('converts between amounts and cents', () => {
    expect(toCents('19.99')).toBe(1999);
    expect(toCents(0.1)).toBe(10);
    expect(fromCents(1999)).toBe('19.99');
    expect(fromCents(5)).toBe('0.05');
  });

  it('sums lines in cents', () => {
    expect(sumLineTotals([])).toBe('0.00');
    expect(
      sumLineTotals([
        { quantity: 1, unitPrice: '0.10' },
        { quantity: 1, unitPrice: '0.20' },
        { quantity: 2, unitPrice: '12.35' },
      ]),
    ).toBe('25.00');
  });
});
