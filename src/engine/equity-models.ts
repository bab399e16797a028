/**
 * Vestwise Engine — Equity Data Model
 *
 * Plain data shared by the schedule generator, the ledger and the valuation
 * engine. Dates are ISO calendar dates (YYYY-MM-DD).
 *
 * @module equity-models
 */

// ─── Grants ───────────────────────────────────────────────────────────────

export type GrantKind = 'new_hire' | 'annual' | 'promotion' | 'kickass' | 'espp' | 'cash'

export type InstrumentType = 'rsu' | 'iso_5y' | 'iso_6y' | 'cash'

export interface Grant {
  id: string
  userId: string
  kind: GrantKind
  instrument: InstrumentType
  totalUnits: number         // shares, or USD for cash
  grantDate: string
  pricePerUnit: number       // strike for ISOs, ignored for cash
  vestingMonths?: number     // only where the policy is grant-configurable
  cliffMonths?: number
  notes?: string
}

export type GrantInput = Omit<Grant, 'id'> & { id?: string }

export function isOption(instrument: InstrumentType): boolean {
  return instrument === 'iso_5y' || instrument === 'iso_6y'
}

// ─── Vest Events ──────────────────────────────────────────────────────────

/** Generator output, before the ledger assigns identity. */
export interface ScheduledVest {
  vestDate: string
  units: number
  isCliff: boolean
}

export interface VestEvent {
  id: string
  grantId: string
  vestDate: string
  isCliff: boolean
  unitsVesting: number
  unitsWithheld: number
  unitsReceived: number      // unitsVesting - unitsWithheld
  unitsSold: number
  unitsExercised: number     // ISO only
  cashPaidForTaxes: number
  note: string
}

/**
 * Everything the estimator needs about one event: the event's own figures
 * plus the two grant attributes that drive cost basis.
 */
export interface VestPosition {
  eventId: string
  grantId: string
  instrument: InstrumentType
  strikePrice: number
  vestDate: string
  unitsVesting: number
  unitsWithheld: number
  unitsSold: number
  unitsExercised: number
  cashPaidForTaxes: number
}

export function toPosition(grant: Grant, event: VestEvent): VestPosition {
  return {
    eventId: event.id,
    grantId: grant.id,
    instrument: grant.instrument,
    strikePrice: grant.pricePerUnit,
    vestDate: event.vestDate,
    unitsVesting: event.unitsVesting,
    unitsWithheld: event.unitsWithheld,
    unitsSold: event.unitsSold,
    unitsExercised: event.unitsExercised,
    cashPaidForTaxes: event.cashPaidForTaxes,
  }
}

// ─── Sales ────────────────────────────────────────────────────────────────

/** One actual sale of shares received from a vest event. */
export interface StockSale {
  id: string
  eventId: string
  saleDate: string
  units: number
  salePrice: number          // per share
  fees: number               // commission, subtracted from proceeds
  note: string
}

export type SaleInput = Pick<StockSale, 'saleDate' | 'units' | 'salePrice'> & {
  fees?: number
  note?: string
}

// ─── Prices & Tax Preferences ─────────────────────────────────────────────

export interface PricePoint {
  userId: string
  effectiveDate: string
  price: number
}

export interface TaxPreference {
  federalRate: number
  stateRate: number
  includePayrollTax: boolean
  payrollRate: number        // caller-supplied; wage cap already applied
}
