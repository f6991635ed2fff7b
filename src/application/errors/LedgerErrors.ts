export class LedgerError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class LedgerEmptyError extends LedgerError {
  constructor() {
    super('No data available', 404);
  }
}

export class MemberNotFoundError extends LedgerError {
  constructor(readonly identifier: string) {
    super(`No savings recorded for "${identifier}"`, 404);
  }
}

export class NoNarrativeEntriesError extends LedgerError {
  constructor() {
    super('No reason-based savings found', 404);
  }
}

export class ContactBookError extends LedgerError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class EmptyExportError extends LedgerError {
  constructor() {
    super('No messages parsed from txt file.', 400);
  }
}

export class InvalidUploadError extends LedgerError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class LedgerReadError extends LedgerError {
  constructor(location: string, cause: unknown) {
    super(`Ledger at ${location} could not be read: ${cause instanceof Error ? cause.message : String(cause)}`, 500);
  }
}
