import { findCurrencyAmounts, isDigitsOnly, parseDigits } from './CurrencyAmountPattern.js';

/**
 * Sums every currency-tagged amount in the text ("160 Tk and 80 Tk" is 240).
 * A message made only of digits is taken as the amount itself. Returns null
 * when there is nothing to extract.
 */
export const extractAmount = (text: string): number | null => {
  if (!text) {
    return null;
  }

  const amounts = findCurrencyAmounts(text);
  if (amounts.length > 0) {
    return amounts.reduce((total, amount) => total + amount, 0);
  }

  const stripped = text.trim();
  if (isDigitsOnly(stripped)) {
    return parseDigits(stripped);
  }

  return null;
};
