/**
 * Vestwise Engine — Vest Valuation & Tax Estimator
 *
 * The single place where a vest event's money figures are derived:
 * cost basis, value at vest, withholding, current value, unrealized gain,
 * holding period and the two tax estimates. Every input arrives as an
 * argument (prices as tagged lookups, tax settings as a tagged lookup,
 * "today" as `asOf`), so the result is the same from a request handler,
 * a batch job or a test.
 *
 * Cost basis per unit:
 *   ISO          strike price on the grant
 *   RSU / ESPP   price on the vest date
 *   Cash         1 (units are dollars)
 *
 * A figure that depends on a missing input is `null`, and the input is
 * listed in `missing`. Nothing is ever filled in with zero.
 *
 * `realizeSale` does the same for a recorded sale: proceeds net of fees
 * against the same cost basis, with the holding period measured to the
 * sale date.
 *
 * @module vest-valuation
 */

import { differenceInCalendarDays, parseISO } from 'date-fns'
import { DEFAULT_ENGINE_SETTINGS, type EngineSettings } from './engine-settings'
import { isOption, type StockSale, type TaxPreference, type VestPosition } from './equity-models'
import type { PriceLookup } from './price-history'
import { combinedOrdinaryRate, type TaxPreferenceLookup } from './tax-preferences'

// ─── Types ────────────────────────────────────────────────────────────────

export type MissingInput = 'price_at_vest' | 'current_price' | 'tax_preference'

export interface ValuationResult {
  eventId: string
  costBasisPerUnit: number | null
  grossValueAtVest: number | null
  taxAtVest: number | null           // ordinary income estimate
  taxWithheld: number | null
  taxWithheldSource: 'recorded' | 'estimated' | null
  netValueReceived: number | null
  unitsReceived: number
  unitsHeld: number
  currentMarketValue: number | null
  unrealizedGain: number | null
  vested: boolean
  holdingPeriodDays: number | null   // null until vested
  isLongTerm: boolean | null
  estimatedTaxOnSale: number | null  // negative for a loss
  missing: MissingInput[]
  indeterminate: boolean
}

export interface RealizedSale {
  saleId: string
  eventId: string
  saleDate: string
  units: number
  proceeds: number
  fees: number
  netProceeds: number
  costBasisPerUnit: number | null
  totalCostBasis: number | null
  realizedGain: number | null        // negative for a loss
  holdingPeriodDays: number | null
  isLongTerm: boolean | null
  estimatedTax: number | null
  missing: MissingInput[]
  indeterminate: boolean
}

// ─── Helpers ──────────────────────────────────────────────────────────────

function priceOf(lookup: PriceLookup): number | null {
  return lookup.status === 'found' ? lookup.price : null
}

function times(a: number | null, b: number | null): number | null {
  return a === null || b === null ? null : a * b
}

function minus(a: number | null, b: number | null): number | null {
  return a === null || b === null ? null : a - b
}

/** ISO: strike. RSU/ESPP: price at vest. Cash: 1. */
function costBasisFor(position: VestPosition, vestPrice: number | null): number | null {
  if (position.instrument === 'cash') return 1
  if (isOption(position.instrument)) return position.strikePrice
  return vestPrice
}

export function holdingPeriodDays(vestDate: string, asOf: string): number | null {
  const days = differenceInCalendarDays(parseISO(asOf), parseISO(vestDate))
  return days >= 0 ? days : null
}

export function isLongTermHolding(days: number, settings: EngineSettings = DEFAULT_ENGINE_SETTINGS): boolean {
  return days >= settings.longTermHoldingDays
}

/**
 * Tax if the gain were realized today. Long-term gains use the flat
 * long-term rate plus state; short-term gains are taxed like wages
 * (federal plus state). Losses are not floored.
 */
export function capitalGainsTax(
  gain: number,
  longTerm: boolean,
  preference: TaxPreference,
  settings: EngineSettings = DEFAULT_ENGINE_SETTINGS,
): number {
  const rate = longTerm
    ? settings.longTermCapitalGainsRate + preference.stateRate
    : preference.federalRate + preference.stateRate
  return gain * rate
}

// ─── Estimator ────────────────────────────────────────────────────────────

export function evaluate(
  position: VestPosition,
  priceAtVest: PriceLookup,
  currentPrice: PriceLookup,
  taxPreference: TaxPreferenceLookup,
  asOf: string,
  settings: EngineSettings = DEFAULT_ENGINE_SETTINGS,
): ValuationResult {
  const isCash = position.instrument === 'cash'
  const missing: MissingInput[] = []

  // Cash is denominated in dollars; price lookups do not apply to it.
  const vestPrice = isCash ? 1 : priceOf(priceAtVest)
  const marketPrice = isCash ? 1 : priceOf(currentPrice)
  if (vestPrice === null) missing.push('price_at_vest')
  if (marketPrice === null) missing.push('current_price')

  const preference = taxPreference.status === 'available' ? taxPreference.preference : null
  if (!preference) missing.push('tax_preference')

  const costBasisPerUnit = costBasisFor(position, vestPrice)

  const unitsReceived = Math.max(0, position.unitsVesting - position.unitsWithheld)
  const unitsHeld = Math.max(0, unitsReceived - position.unitsSold)

  const grossValueAtVest = times(position.unitsVesting, vestPrice)
  const taxAtVest = preference ? times(grossValueAtVest, combinedOrdinaryRate(preference)) : null

  const hasRecordedWithholding = position.unitsWithheld > 0 || position.cashPaidForTaxes > 0
  let taxWithheld: number | null
  let taxWithheldSource: ValuationResult['taxWithheldSource']
  if (hasRecordedWithholding) {
    const withheldValue = times(position.unitsWithheld, vestPrice)
    taxWithheld = withheldValue === null ? null : withheldValue + position.cashPaidForTaxes
    taxWithheldSource = taxWithheld === null ? null : 'recorded'
  } else {
    taxWithheld = taxAtVest
    taxWithheldSource = taxAtVest === null ? null : 'estimated'
  }
  const netValueReceived = minus(grossValueAtVest, taxWithheld)

  const currentMarketValue = times(unitsHeld, marketPrice)

  const days = holdingPeriodDays(position.vestDate, asOf)
  const vested = days !== null
  const isLongTerm = days === null ? null : isLongTermHolding(days, settings)

  // Cash never gains, vested or not.
  let unrealizedGain: number | null = null
  if (isCash) unrealizedGain = 0
  else if (vested) unrealizedGain = minus(currentMarketValue, times(unitsHeld, costBasisPerUnit))

  let estimatedTaxOnSale: number | null = null
  if (unrealizedGain !== null && isLongTerm !== null && preference) {
    estimatedTaxOnSale = capitalGainsTax(unrealizedGain, isLongTerm, preference, settings)
  }

  return {
    eventId: position.eventId,
    costBasisPerUnit,
    grossValueAtVest,
    taxAtVest,
    taxWithheld,
    taxWithheldSource,
    netValueReceived,
    unitsReceived,
    unitsHeld,
    currentMarketValue,
    unrealizedGain,
    vested,
    holdingPeriodDays: days,
    isLongTerm,
    estimatedTaxOnSale,
    missing,
    indeterminate: missing.length > 0,
  }
}

// ─── Realized Sales ───────────────────────────────────────────────────────

export function realizeSale(
  position: VestPosition,
  sale: StockSale,
  priceAtVest: PriceLookup,
  taxPreference: TaxPreferenceLookup,
  settings: EngineSettings = DEFAULT_ENGINE_SETTINGS,
): RealizedSale {
  const missing: MissingInput[] = []

  const vestPrice = position.instrument === 'cash' ? 1 : priceOf(priceAtVest)
  const costBasisPerUnit = costBasisFor(position, vestPrice)
  if (costBasisPerUnit === null) missing.push('price_at_vest')

  const preference = taxPreference.status === 'available' ? taxPreference.preference : null
  if (!preference) missing.push('tax_preference')

  const proceeds = sale.units * sale.salePrice
  const netProceeds = proceeds - sale.fees
  const totalCostBasis = times(sale.units, costBasisPerUnit)
  const realizedGain = minus(netProceeds, totalCostBasis)

  const days = holdingPeriodDays(position.vestDate, sale.saleDate)
  const isLongTerm = days === null ? null : isLongTermHolding(days, settings)

  let estimatedTax: number | null = null
  if (realizedGain !== null && isLongTerm !== null && preference) {
    estimatedTax = capitalGainsTax(realizedGain, isLongTerm, preference, settings)
  }

  return {
    saleId: sale.id,
    eventId: position.eventId,
    saleDate: sale.saleDate,
    units: sale.units,
    proceeds,
    fees: sale.fees,
    netProceeds,
    costBasisPerUnit,
    totalCostBasis,
    realizedGain,
    holdingPeriodDays: days,
    isLongTerm,
    estimatedTax,
    missing,
    indeterminate: missing.length > 0,
  }
}
