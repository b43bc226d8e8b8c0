const SCALE = 100n;
const MAX_INTEGER_DIGITS = 16;
const DECIMAL_PATTERN = /^(\d+)(?:\.(\d{1,2}))?$/;

/**
 * Amount value object - non-negative decimal with precision (18,2)
 * Stored as an exact count of hundredths, parsed locale-invariantly
 */
export class Amount {
  private constructor(private readonly hundredths: bigint) {}

  /**
   * Parse a decimal string ("1000", "1000.5", "1000.50") or a finite number.
   * Rejects negatives, exponent forms, more than two decimals and overflow.
   */
  static parse(input: string | number): Amount {
    const text = typeof input === 'number' ? Amount.numberToText(input) : input.trim();

    if (text.startsWith('-')) {
      throw new AmountFormatError(`Amount cannot be negative: ${text}`, text);
    }

    const match = DECIMAL_PATTERN.exec(text);
    if (!match) {
      throw new AmountFormatError(`Invalid decimal amount: ${text}`, text);
    }

    const [, integerPart, fractionPart = ''] = match;
    if (integerPart.replace(/^0+(?=\d)/, '').length > MAX_INTEGER_DIGITS) {
      throw new AmountFormatError(`Amount exceeds precision (18,2): ${text}`, text);
    }

    return new Amount(
      BigInt(integerPart) * SCALE + BigInt(fractionPart.padEnd(2, '0')),
    );
  }

  static zero(): Amount {
    return new Amount(0n);
  }

  private static numberToText(value: number): string {
    if (!Number.isFinite(value)) {
      throw new AmountFormatError(`Invalid decimal amount: ${value}`, String(value));
    }
    return String(value);
  }

  isZero(): boolean {
    return this.hundredths === 0n;
  }

  isGreaterThan(other: Amount): boolean {
    return this.hundredths > other.hundredths;
  }

  equals(other: Amount): boolean {
    return this.hundredths === other.hundredths;
  }

  /**
   * Canonical two-decimal representation, e.g. "5000.00"
   */
  toString(): string {
    const whole = this.hundredths / SCALE;
    const fraction = (this.hundredths % SCALE).toString().padStart(2, '0');
    return `${whole}.${fraction}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

/**
 * Parse an ISO 4217-shaped currency code: three letters, uppercased
 */
export function parseCurrencyCode(input: string): string {
  const code = input.trim().toUpperCase();
  if (!/^[A-Z]{3}$/.test(code)) {
    throw new AmountFormatError(`Currency must be a 3-letter ISO 4217 code: ${input}`, input);
  }
  return code;
}

/**
 * Amount or currency text that does not reduce to a valid value
 */
export class AmountFormatError extends Error {
  constructor(
    message: string,
    public readonly input: string,
  ) {
    super(message);
    this.name = 'AmountFormatError';
  }
}
