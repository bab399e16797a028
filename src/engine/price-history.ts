/**
 * Vestwise Engine — Price History Lookup
 *
 * Resolves "price as of a date" from a user's own price points. The result
 * is tagged so that "no price on record" can never be confused with a
 * recorded price of zero.
 *
 * @module price-history
 */

import { differenceInCalendarDays, parseISO } from 'date-fns'
import type { PricePoint } from './equity-models'

export type PriceLookup =
  | { status: 'found'; price: number; effectiveDate: string }
  | { status: 'not_found'; asOf: string; reason: 'no_history' | 'none_on_or_before' }

export function priceFound(price: number, effectiveDate: string): PriceLookup {
  return { status: 'found', price, effectiveDate }
}

export function priceMissing(asOf: string, reason: 'no_history' | 'none_on_or_before' = 'none_on_or_before'): PriceLookup {
  return { status: 'not_found', asOf, reason }
}

/**
 * Latest price point for `userId` dated on or before `asOf`. Points that
 * belong to other users or sit in the future are ignored; on a tie for the
 * same date the later entry in `points` wins.
 */
export function priceAsOf(points: PricePoint[], userId: string, asOf: string): PriceLookup {
  const own = points.filter(p => p.userId === userId)
  if (own.length === 0) return priceMissing(asOf, 'no_history')

  let best: PricePoint | undefined
  for (const point of own) {
    if (point.effectiveDate > asOf) continue
    if (!best || point.effectiveDate >= best.effectiveDate) best = point
  }

  return best ? priceFound(best.price, best.effectiveDate) : priceMissing(asOf)
}

/** "Current price": the latest point not after `today`. */
export function latestPrice(points: PricePoint[], userId: string, today: string): PriceLookup {
  return priceAsOf(points, userId, today)
}

/** Age of a found price in days relative to `asOf`, for staleness display. */
export function priceAgeDays(lookup: PriceLookup, asOf: string): number | null {
  if (lookup.status !== 'found') return null
  return differenceInCalendarDays(parseISO(asOf), parseISO(lookup.effectiveDate))
}
