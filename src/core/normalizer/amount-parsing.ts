import { Amount, AmountFormatError, parseCurrencyCode } from '../domain/value-objects/amount.vo';

export interface ParsedLimit {
  amount: Amount;
  currency: string | null;
}

/**
 * Split a combined "<number> <currency>" limit such as "5000.00 USD".
 * The amount keeps digits and '.', the currency keeps letters only.
 */
export function parseCombinedLimit(raw: string): ParsedLimit {
  if (/-\s*\d/.test(raw)) {
    throw new AmountFormatError(`Amount cannot be negative: ${raw}`, raw);
  }

  const amountText = raw.replace(/[^0-9.]/g, '');
  const currencyText = raw.replace(/[^A-Za-z]/g, '');

  return {
    amount: Amount.parse(amountText),
    currency: currencyText.length > 0 ? parseCurrencyCode(currencyText) : null,
  };
}
