export interface ContactEntry {
  name: string;
  phone: string; // digits and an optional leading '+'
}

export interface AddressBook {
  byName: Map<string, ContactEntry>;
  byPhone: Map<string, ContactEntry>;
}
