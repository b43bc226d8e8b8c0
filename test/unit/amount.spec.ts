import {
  Amount,
  AmountFormatError,
  parseCombinedLimit,
  parseCurrencyCode,
} from '../../src';

describe('Amount', () => {
  describe('parse', () => {
    it('should keep two decimal places in canonical form', () => {
      expect(Amount.parse('1000').toString()).toBe('1000.00');
      expect(Amount.parse('1000.5').toString()).toBe('1000.50');
      expect(Amount.parse(' 12.34 ').toString()).toBe('12.34');
      expect(Amount.parse(12.5).toString()).toBe('12.50');
      expect(Amount.parse('0007.10').toString()).toBe('7.10');
    });

    it('should accept sixteen integer digits', () => {
      expect(Amount.parse('9999999999999999.99').toString()).toBe('9999999999999999.99');
    });

    it.each([
      ['-1', 'Amount cannot be negative: -1'],
      ['1.005', 'Invalid decimal amount: 1.005'],
      ['1e3', 'Invalid decimal amount: 1e3'],
      ['abc', 'Invalid decimal amount: abc'],
      ['', 'Invalid decimal amount: '],
      ['12345678901234567', 'Amount exceeds precision (18,2): 12345678901234567'],
    ])('should reject %p', (input, message) => {
      expect(() => Amount.parse(input)).toThrow(AmountFormatError);
      expect(() => Amount.parse(input)).toThrow(message);
    });

    it('should reject non-finite numbers', () => {
      expect(() => Amount.parse(Number.POSITIVE_INFINITY)).toThrow(AmountFormatError);
    });
  });

  describe('comparison', () => {
    it('should compare exactly without floating point drift', () => {
      const limit = Amount.parse('0.30');
      const usage = Amount.parse('0.3');

      expect(usage.equals(limit)).toBe(true);
      expect(usage.isGreaterThan(limit)).toBe(false);
      expect(Amount.parse('0.31').isGreaterThan(limit)).toBe(true);
      expect(Amount.zero().isZero()).toBe(true);
    });

    it('should serialize to its canonical string', () => {
      expect(JSON.stringify({ amount: Amount.parse('5') })).toBe('{"amount":"5.00"}');
    });
  });
});

describe('parseCurrencyCode', () => {
  it('should uppercase three-letter codes', () => {
    expect(parseCurrencyCode('usd')).toBe('USD');
    expect(parseCurrencyCode(' eur ')).toBe('EUR');
  });

  it('should reject anything else', () => {
    expect(() => parseCurrencyCode('US')).toThrow(AmountFormatError);
    expect(() => parseCurrencyCode('dollars')).toThrow(
      'Currency must be a 3-letter ISO 4217 code: dollars',
    );
  });
});

describe('parseCombinedLimit', () => {
  it('should split "5000.00 USD" into amount and currency', () => {
    const parsed = parseCombinedLimit('5000.00 USD');

    expect(parsed.amount.toString()).toBe('5000.00');
    expect(parsed.currency).toBe('USD');
  });

  it('should accept the currency first', () => {
    const parsed = parseCombinedLimit('USD 250');

    expect(parsed.amount.toString()).toBe('250.00');
    expect(parsed.currency).toBe('USD');
  });

  it('should return a null currency when none is present', () => {
    const parsed = parseCombinedLimit('75.5');

    expect(parsed.amount.toString()).toBe('75.50');
    expect(parsed.currency).toBeNull();
  });

  it('should reject negative limits', () => {
    expect(() => parseCombinedLimit('-5 USD')).toThrow('Amount cannot be negative: -5 USD');
  });

  it('should reject a currency that is not three letters', () => {
    expect(() => parseCombinedLimit('100 USDT')).toThrow(AmountFormatError);
  });
});
