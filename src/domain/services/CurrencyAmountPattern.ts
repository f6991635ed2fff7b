/**
 * Currency-tagged amount grammar shared by the classifier and the extractor.
 *
 * Matches a currency token (`tk`, `taka`, `bdt`, `৳`) on either side of a
 * number, e.g. `BDT 90`, `Tk. 160`, `160 Tk`, `৳500`, `1,200 taka`.
 * Bump the version whenever the grammar changes so stored results can be
 * traced back to the rules that produced them.
 */
export const CURRENCY_AMOUNT_PATTERN_VERSION = 1;

const CURRENCY = '(?:tk|taka|bdt|৳)';
const NUMBER = '([0-9][0-9,]*)';

const source = `${CURRENCY}\\.?\\s*${NUMBER}|${NUMBER}\\s*${CURRENCY}\\.?`;

// Global regexes carry lastIndex state, so every caller gets its own instance.
export const currencyAmountPattern = (): RegExp => new RegExp(source, 'gi');

// Any script's decimal digits, so "২০০" reads like "200".
const digitsOnly = /^\p{Nd}+$/u;
const decimalDigit = /^\p{Nd}$/u;

export const isDigitsOnly = (text: string): boolean => digitsOnly.test(text.trim());

// Decimal digit blocks run in tens from their zero, so a digit's value is its
// distance from the start of its run, modulo ten.
const digitValue = (digit: string): number => {
  let codePoint = digit.codePointAt(0) ?? 0;
  let offset = 0;

  while (codePoint > 0 && decimalDigit.test(String.fromCodePoint(codePoint - 1))) {
    codePoint -= 1;
    offset += 1;
  }

  return offset % 10;
};

/** Value of a digits-only string written in any script. */
export const parseDigits = (text: string): number =>
  Array.from(text.trim()).reduce((value, digit) => value * 10 + digitValue(digit), 0);

/**
 * Every non-overlapping currency-tagged amount in the text, thousands
 * separators removed.
 */
export const findCurrencyAmounts = (text: string): number[] => {
  const amounts: number[] = [];

  for (const match of text.matchAll(currencyAmountPattern())) {
    const raw = match[1] ?? match[2];
    if (!raw) {
      continue;
    }

    const digits = raw.replace(/[^\d]/g, '');
    if (digits) {
      amounts.push(Number.parseInt(digits, 10));
    }
  }

  return amounts;
};
