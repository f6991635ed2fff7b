import type { ContactBookRow } from '../../domain/services/ContactResolver.js';

export interface ContactBookReaderPort {
  read(rawContactBook: Buffer, options: { fileName: string }): Promise<ContactBookRow[]>;
}
