/**
 * Vestwise Engine — Error Types
 *
 * Thrown for malformed input and broken ledger invariants. Missing prices and
 * missing tax preferences are not errors: they come back as tagged results.
 *
 * @module engine-errors
 */

export class GrantValidationError extends Error {
  constructor(
    message: string,
    public grantId: string,
    public field: string,
  ) {
    super(`Grant ${grantId}: ${message}`)
    this.name = 'GrantValidationError'
  }
}

export class VestEventInvariantError extends Error {
  constructor(
    message: string,
    public eventId: string,
    public field: string,
  ) {
    super(`Vest event ${eventId}: ${message}`)
    this.name = 'VestEventInvariantError'
  }
}

export class LedgerLookupError extends Error {
  constructor(
    public kind: 'grant' | 'vest_event',
    public id: string,
  ) {
    super(`Unknown ${kind === 'grant' ? 'grant' : 'vest event'} "${id}"`)
    this.name = 'LedgerLookupError'
  }
}

export class SettingsError extends Error {
  constructor(public issues: { path: string; message: string }[]) {
    super(`Invalid engine settings: ${issues.map(i => `${i.path} ${i.message}`).join('; ')}`)
    this.name = 'SettingsError'
  }
}

export class LedgerSnapshotError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid ledger snapshot: ${issues.join('; ')}`)
    this.name = 'LedgerSnapshotError'
  }
}
