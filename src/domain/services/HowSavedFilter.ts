import { extractAmount } from './AmountExtractor.js';

const amountOnly = [/^\d+$/, /^(bdt\s*)?\d+$/i, /^\d+\s*(tk|taka|bdt)$/i];

const genericPhrasings = [
  /^i saved \d+ ?tk$/,
  /^i saved \d+ ?taka$/,
  /^i saved \d+ ?bdt$/,
  /^i saved \d+ ?tk today$/,
  /^today i saved \d+ ?tk$/,
  /^i saved total \d+ ?tk$/,
];

/**
 * True when a deposit's text says how the money was saved rather than just
 * reporting an amount ("BDT 20", "i saved 30 tk").
 */
export const hasSavingNarrative = (text: string): boolean => {
  const trimmed = text.trim();
  if (!trimmed) {
    return false;
  }

  if (amountOnly.some((pattern) => pattern.test(trimmed))) {
    return false;
  }

  if (!/[a-z]/i.test(trimmed)) {
    return false;
  }

  if (extractAmount(trimmed) === null) {
    return false;
  }

  const lower = trimmed.toLowerCase();
  return !genericPhrasings.some((pattern) => pattern.test(lower));
};
