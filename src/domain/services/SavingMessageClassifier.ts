import { findCurrencyAmounts, isDigitsOnly } from './CurrencyAmountPattern.js';

const WEEKLY_ANNOUNCEMENT = 'weekly ghost fund';

/**
 * Decides whether a chat message records a deposit.
 *
 * Weekly total broadcasts look like deposits ("My weekly ghost fund ... BDT 90")
 * and are rejected first. After that any currency-tagged amount, or a message
 * that is nothing but a number, counts as a deposit.
 */
export const isSavingMessage = (text: string): boolean => {
  if (!text) {
    return false;
  }

  if (text.toLowerCase().includes(WEEKLY_ANNOUNCEMENT)) {
    return false;
  }

  if (findCurrencyAmounts(text).length > 0) {
    return true;
  }

  return isDigitsOnly(text);
};
