/**
 * Vestwise Engine — Portfolio Summary
 *
 * Assembles everything a page needs in one pass: each vest event is valued
 * exactly once through `evaluate`, and totals are built from those results
 * rather than recomputed.
 *
 * @module portfolio-summary
 */

import { DEFAULT_ENGINE_SETTINGS, type EngineSettings } from './engine-settings'
import {
  toPosition,
  type Grant,
  type PricePoint,
  type StockSale,
  type VestEvent,
  type VestPosition,
} from './equity-models'
import { latestPrice, priceAsOf, type PriceLookup } from './price-history'
import type { TaxPreferenceLookup } from './tax-preferences'
import { evaluate, realizeSale, type RealizedSale, type ValuationResult } from './vest-valuation'

export interface ValuationContext {
  userId: string
  prices: PricePoint[]
  taxPreference: TaxPreferenceLookup
  asOf: string
  settings?: EngineSettings
}

export interface ValuedVest {
  grant: Grant
  event: VestEvent
  priceAtVest: PriceLookup
  currentPrice: PriceLookup
  valuation: ValuationResult
}

export interface RealizedRow {
  grant: Grant
  event: VestEvent
  sale: StockSale
  realized: RealizedSale
}

export interface PortfolioTotals {
  vestedShares: number    // cash grants excluded
  unvestedShares: number
  vestedValue: number | null
  unvestedValue: number | null
  unrealizedGain: number | null
  estimatedTaxOnSale: number | null
  estimatedTaxAtVest: number | null
  realizedGain: number | null
  estimatedTaxOnRealized: number | null
  indeterminateEvents: number
  nextVest: { grantId: string; eventId: string; vestDate: string; units: number } | null
}

export interface PortfolioSummary {
  asOf: string
  rows: ValuedVest[]
  realized: RealizedRow[]
  totals: PortfolioTotals
}

/**
 * Look up both prices for one position and value it. A vest date still in
 * the future is looked up as of `asOf`, so unvested figures are projections
 * at the price known on that day.
 */
export function valuateFromHistory(position: VestPosition, context: ValuationContext): {
  priceAtVest: PriceLookup
  currentPrice: PriceLookup
  valuation: ValuationResult
} {
  const vestLookupDate = position.vestDate > context.asOf ? context.asOf : position.vestDate
  const priceAtVest = priceAsOf(context.prices, context.userId, vestLookupDate)
  const currentPrice = latestPrice(context.prices, context.userId, context.asOf)
  const valuation = evaluate(
    position,
    priceAtVest,
    currentPrice,
    context.taxPreference,
    context.asOf,
    context.settings ?? DEFAULT_ENGINE_SETTINGS,
  )
  return { priceAtVest, currentPrice, valuation }
}

/** Realized gain and tax for one recorded sale, with the cost basis looked up from history. */
export function realizeFromHistory(
  position: VestPosition,
  sale: StockSale,
  context: ValuationContext,
): { priceAtVest: PriceLookup; realized: RealizedSale } {
  const priceAtVest = priceAsOf(context.prices, context.userId, position.vestDate)
  const realized = realizeSale(
    position,
    sale,
    priceAtVest,
    context.taxPreference,
    context.settings ?? DEFAULT_ENGINE_SETTINGS,
  )
  return { priceAtVest, realized }
}

/**
 * Adds up `pick` over rows; any row with a null figure makes the total
 * null, so an unknown price never shrinks a total silently.
 */
function sumOrNull<R>(rows: R[], pick: (row: R) => number | null): number | null {
  let total = 0
  for (const row of rows) {
    const value = pick(row)
    if (value === null) return null
    total += value
  }
  return total
}

function shareRows(rows: ValuedVest[]): ValuedVest[] {
  return rows.filter(r => r.grant.instrument !== 'cash')
}

/**
 * Values every vest event of the context user once. Sales dated after
 * `asOf` are left out of the realized figures.
 */
export function summarizePortfolio(
  grants: Grant[],
  events: VestEvent[],
  context: ValuationContext,
  sales: StockSale[] = [],
): PortfolioSummary {
  const grantsById = new Map(grants.map(g => [g.id, g]))

  const rows: ValuedVest[] = []
  for (const event of [...events].sort((a, b) => a.vestDate.localeCompare(b.vestDate))) {
    const grant = grantsById.get(event.grantId)
    if (!grant || grant.userId !== context.userId) continue
    const { priceAtVest, currentPrice, valuation } = valuateFromHistory(toPosition(grant, event), context)
    rows.push({ grant, event, priceAtVest, currentPrice, valuation })
  }

  const rowsByEvent = new Map(rows.map(r => [r.event.id, r]))
  const realized: RealizedRow[] = []
  for (const sale of [...sales].sort((a, b) => a.saleDate.localeCompare(b.saleDate))) {
    const row = rowsByEvent.get(sale.eventId)
    if (!row || sale.saleDate > context.asOf) continue
    const position = toPosition(row.grant, row.event)
    const { realized: figures } = realizeFromHistory(position, sale, context)
    realized.push({ grant: row.grant, event: row.event, sale, realized: figures })
  }

  const vestedRows = rows.filter(r => r.valuation.vested)
  const unvestedRows = rows.filter(r => !r.valuation.vested)
  const upcoming = unvestedRows[0]

  return {
    asOf: context.asOf,
    rows,
    realized,
    totals: {
      vestedShares: shareRows(vestedRows).reduce((s, r) => s + r.valuation.unitsHeld, 0),
      unvestedShares: shareRows(unvestedRows).reduce((s, r) => s + r.event.unitsVesting, 0),
      vestedValue: sumOrNull(vestedRows, r => r.valuation.currentMarketValue),
      unvestedValue: sumOrNull(unvestedRows, r => r.valuation.currentMarketValue),
      unrealizedGain: sumOrNull(vestedRows, r => r.valuation.unrealizedGain),
      estimatedTaxOnSale: sumOrNull(vestedRows, r => r.valuation.estimatedTaxOnSale),
      estimatedTaxAtVest: sumOrNull(unvestedRows, r => r.valuation.taxAtVest),
      realizedGain: sumOrNull(realized, r => r.realized.realizedGain),
      estimatedTaxOnRealized: sumOrNull(realized, r => r.realized.estimatedTax),
      indeterminateEvents: rows.filter(r => r.valuation.indeterminate).length,
      nextVest: upcoming
        ? {
            grantId: upcoming.grant.id,
            eventId: upcoming.event.id,
            vestDate: upcoming.event.vestDate,
            units: upcoming.event.unitsVesting,
          }
        : null,
    },
  }
}
