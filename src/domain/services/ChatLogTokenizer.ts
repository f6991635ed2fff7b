import type { ChatMessage } from '../entities/ChatMessage.js';

const messageStart = /^(\d{1,2}\/\d{1,2}\/\d{2}),\s+(\d{1,2}:\d{2}\s*[ap]m) - (.*)$/i;
const narrowNoBreakSpace = /\u202f/g;
const invisibleMarks = /[\u200e\ufeff]/g;

const cleanLine = (raw: string): string => raw.replace(narrowNoBreakSpace, ' ').replace(invisibleMarks, '');

// "9:00PM", "9:00 pm" and "9:00  PM" all become "9:00 PM".
const canonicalTime = (time: string): string => time.trim().replace(/\s*([ap]m)$/i, ' $1').toUpperCase();

const openMessage = (date: string, time: string, rest: string): ChatMessage => {
  const separator = rest.indexOf(': ');

  if (separator === -1) {
    return { date: date.trim(), time: canonicalTime(time), text: rest.trim() };
  }

  const sender = rest.slice(0, separator).trim();

  return {
    date: date.trim(),
    time: canonicalTime(time),
    sender: sender || undefined,
    text: rest.slice(separator + 2).trim(),
  };
};

/**
 * Rebuilds logical messages from an exported chat log. A line starting with
 * `D/M/YY, H:MM AM - ` opens a message; every other line is a continuation of
 * the one before it. Lines ahead of the first message are dropped.
 */
export const tokenizeChatLog = (exportText: string): ChatMessage[] => {
  const messages: ChatMessage[] = [];
  let current: ChatMessage | null = null;

  for (const raw of exportText.split(/\r?\n/)) {
    const line = cleanLine(raw);
    const match = messageStart.exec(line);

    if (match) {
      if (current) {
        messages.push(current);
      }

      const [, date, time, rest] = match;
      current = openMessage(date, time, rest);
      continue;
    }

    const continuation = line.trim();
    if (current && continuation) {
      current.text = current.text ? `${current.text} ${continuation}` : continuation;
    }
  }

  if (current) {
    messages.push(current);
  }

  return messages;
};
