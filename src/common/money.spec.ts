import { parseMoney, roundTo, toDecimal } from './money';

describe('parseMoney', () => {
  it.each([
    ['2.55', 25_500],
    ['5', 50_000],
    ['5.00', 50_000],
    ['.5', 5_000],
    ['1,250.00', 12_500_000],
    ['0.001', 10],
    ['-3.2', -32_000],
  ])('parses %s', (text, units) => {
    expect(parseMoney(text)).toBe(units);
  });

  it('rounds digits past the fourth decimal half away from zero', () => {
    expect(parseMoney('0.00005')).toBe(1);
    expect(parseMoney('0.00004')).toBe(0);
  });

  it.each(['', 'abc', '1.2.3', '.', '1e3'])('returns null for %p', (text) => {
    expect(parseMoney(text)).toBeNull();
  });

  it('returns null for undefined', () => {
    expect(parseMoney(undefined)).toBeNull();
  });
});

describe('toDecimal', () => {
  it('computes net amounts exactly in fixed point', () => {
    expect(toDecimal(-3 * (parseMoney('5.00') ?? 0))).toBe(-15);
    expect(toDecimal(3 * (parseMoney('0.1') ?? 0))).toBe(0.3);
  });
});

describe('roundTo', () => {
  it('rounds to the requested decimals', () => {
    expect(roundTo(28.571428, 2)).toBe(28.57);
    expect(roundTo(195.00000000000003, 2)).toBe(195);
  });
});
