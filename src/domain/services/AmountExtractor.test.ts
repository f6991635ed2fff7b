import { describe, expect, it } from 'vitest';
import { extractAmount } from './AmountExtractor.js';
import { CURRENCY_AMOUNT_PATTERN_VERSION, findCurrencyAmounts } from './CurrencyAmountPattern.js';

describe('extractAmount', () => {
  it('sums every currency-tagged amount in a message', () => {
    expect(extractAmount('Saved 160 Tk and 80 Tk')).toBe(240);
    expect(extractAmount('৳ 500 and ৳250')).toBe(750);
  });

  it('drops thousands separators', () => {
    expect(extractAmount('BDT 1,200')).toBe(1200);
    expect(extractAmount('saved 2,500 taka this month')).toBe(2500);
  });

  it('reads the currency token before or after the number', () => {
    expect(extractAmount('Tk. 160 saved')).toBe(160);
    expect(extractAmount('skipped lunch, 150taka')).toBe(150);
    expect(extractAmount('90 BDT.')).toBe(90);
  });

  it('falls back to a message made only of digits', () => {
    expect(extractAmount('200')).toBe(200);
    expect(extractAmount(' 75 ')).toBe(75);
  });

  it('reads bare numbers written in Bengali digits', () => {
    expect(extractAmount('২০০')).toBe(200);
    expect(extractAmount('১৫০৯')).toBe(1509);
  });

  it('keeps an explicit zero apart from no amount', () => {
    expect(extractAmount('0 tk')).toBe(0);
    expect(extractAmount('hello')).toBeNull();
    expect(extractAmount('200 people joined')).toBeNull();
    expect(extractAmount('')).toBeNull();
  });
});

describe('findCurrencyAmounts', () => {
  it('returns each occurrence in order', () => {
    expect(findCurrencyAmounts('BDT 90, then 1,000 tk and tk 5')).toEqual([90, 1000, 5]);
  });

  it('can be called repeatedly without leaking match state', () => {
    expect(findCurrencyAmounts('10 tk')).toEqual([10]);
    expect(findCurrencyAmounts('10 tk')).toEqual([10]);
  });

  it('is versioned', () => {
    expect(CURRENCY_AMOUNT_PATTERN_VERSION).toBe(1);
  });
});
