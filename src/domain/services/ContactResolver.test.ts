import { describe, expect, it } from 'vitest';
import { tokenizeChatLog } from './ChatLogTokenizer.js';
import { buildAddressBook, normalizePhone, resolveContact } from './ContactResolver.js';

const book = buildAddressBook([
  { savedName: 'Alice Rahman', displayName: 'Ali', phone: '+880 1711-000001' },
  { savedName: '', displayName: 'Bob D', phone: '01811 000002' },
  { savedName: '', displayName: '', phone: '+8801911000003' },
  { savedName: '', displayName: '', phone: '' },
]);

describe('normalizePhone', () => {
  it('keeps digits and a leading plus', () => {
    expect(normalizePhone('  +1 (555) 010-0000 ')).toBe('+15550100000');
    expect(normalizePhone('5+5')).toBe('55');
    expect(normalizePhone('+')).toBe('');
  });
});

describe('buildAddressBook', () => {
  it('prefers the saved name, then the display name, then the phone', () => {
    expect(book.byName.get('alice rahman')).toEqual({ name: 'Alice Rahman', phone: '+8801711000001' });
    expect(book.byName.get('bob d')).toEqual({ name: 'Bob D', phone: '01811000002' });
    expect(book.byName.get('+8801911000003')).toEqual({ name: '+8801911000003', phone: '+8801911000003' });
  });

  it('skips rows without a name or phone', () => {
    expect(book.byName.size).toBe(3);
    expect(book.byPhone.size).toBe(3);
  });
});

describe('resolveContact', () => {
  it('matches names ignoring case', () => {
    expect(resolveContact('alice rahman', book)).toEqual({ name: 'Alice Rahman', phone: '+8801711000001' });
  });

  it('falls back to the phone number when the label has digits', () => {
    expect(resolveContact('+880 1711-000001', book)).toEqual({ name: 'Alice Rahman', phone: '+8801711000001' });
    expect(resolveContact('+880 1911-000003', book)).toEqual({ name: '+8801911000003', phone: '+8801911000003' });
  });

  it('sees through the bidi marks exports put around phone numbers', () => {
    const [message] = tokenizeChatLog('3/5/24, 9:00 PM - \u202a+880 1711-000001\u202c: 160 tk');

    expect(normalizePhone('\u202a+880 1711-000001\u202c')).toBe('+8801711000001');
    expect(resolveContact(message.sender ?? '', book)).toEqual({ name: 'Alice Rahman', phone: '+8801711000001' });
  });

  it('keeps unknown senders as they are', () => {
    expect(resolveContact(' Carol ', book)).toEqual({ name: 'Carol', phone: '' });
    expect(resolveContact('+880 1999-999999', book)).toEqual({ name: '+880 1999-999999', phone: '' });
  });
});
