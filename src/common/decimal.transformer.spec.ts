import { decimalTransformer } from './decimal.transformer';

describe('decimalTransformer', () => {
  it('formats numeric reads with two decimals', () => {
    expect(decimalTransformer.from('150')).toBe('150.00');
    expect(decimalTransformer.from(7.5)).toBe('7.50');
    expect(decimalTransformer.from('12.30')).toBe('12.30');
  });

  it('passes null through', () => {
    expect(decimalTransformer.from(null)).toBeNull();
  });

  it('writes values unchanged', () => {
    expect(decimalTransformer.to('99.99')).toBe('99.99');
  });
});
