/**
 * Vestwise Engine — Vesting Schedule Generator
 *
 * Turns a grant's static terms into its full list of vest dates and unit
 * counts. Pure and deterministic: the same grant always yields the same
 * schedule, and persisting it is the caller's job.
 *
 *   - Semi-annual (RSU, cash): first vest at the first calendar anchor on or
 *     after grant date + cliff, then every following anchor.
 *   - Monthly (ISO): the vesting window opens 12 or 24 months after grant;
 *     the cliff vests 6/48 of the grant, then 42 monthly vests of 1/48.
 *   - Purchase (ESPP): everything vests at the first purchase anchor
 *     strictly after the grant date.
 *
 * The last event of every schedule absorbs the division remainder, so the
 * units always add up to the grant total.
 *
 * @module vesting-schedule
 */

import { addDays, addMonths, format, parseISO } from 'date-fns'
import { GrantValidationError } from './engine-errors'
import { DEFAULT_ENGINE_SETTINGS, type CalendarAnchor, type EngineSettings } from './engine-settings'
import type { Grant, ScheduledVest } from './equity-models'
import { grantSchema } from './validation'
import { resolveVestingPolicy, type VestingPolicy } from './vesting-policy'

// ─── Calendar Helpers ─────────────────────────────────────────────────────

/** Month arithmetic always measured from the given date; day clamps to month end. */
export function addCalendarMonths(isoDate: string, months: number): string {
  return format(addMonths(parseISO(isoDate), months), 'yyyy-MM-dd')
}

function nextDay(isoDate: string): string {
  return format(addDays(parseISO(isoDate), 1), 'yyyy-MM-dd')
}

function anchorDate(year: number, anchor: CalendarAnchor): string {
  return `${year}-${String(anchor.month).padStart(2, '0')}-${String(anchor.day).padStart(2, '0')}`
}

function sortedAnchors(anchors: CalendarAnchor[]): CalendarAnchor[] {
  return [...anchors].sort((a, b) => a.month - b.month || a.day - b.day)
}

/**
 * Successive anchor dates, starting with the first one on or after `from`.
 */
export function anchorsFrom(from: string, anchors: CalendarAnchor[], count: number): string[] {
  const ordered = sortedAnchors(anchors)
  if (ordered.length === 0) throw new Error('At least one calendar anchor is required')

  let year = Number(from.slice(0, 4))
  let index = ordered.findIndex(a => anchorDate(year, a) >= from)
  if (index === -1) {
    year += 1
    index = 0
  }

  const dates: string[] = []
  while (dates.length < count) {
    dates.push(anchorDate(year, ordered[index]))
    index += 1
    if (index === ordered.length) {
      index = 0
      year += 1
    }
  }
  return dates
}

// ─── Unit Allocation ──────────────────────────────────────────────────────

/**
 * Splits `total` by `shares / denominator` per event; the final event takes
 * whatever is left so the running sum lands exactly on `total`.
 */
function allocate(total: number, shares: number[], denominator: number): number[] {
  const units: number[] = []
  let allocated = 0
  shares.forEach((share, i) => {
    if (i === shares.length - 1) {
      units.push(total - allocated)
      return
    }
    const amount = (total * share) / denominator
    units.push(amount)
    allocated += amount
  })
  return units
}

// ─── Generator ────────────────────────────────────────────────────────────

export function generateSchedule(
  grant: Grant,
  settings: EngineSettings = DEFAULT_ENGINE_SETTINGS,
): ScheduledVest[] {
  const parsed = grantSchema.safeParse(grant)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new GrantValidationError(issue.message, grant.id, issue.path.join('.') || 'grant')
  }

  const policy = resolveVestingPolicy(grant, settings)
  return buildEvents(grant, policy)
}

function buildEvents(grant: Grant, policy: VestingPolicy): ScheduledVest[] {
  switch (policy.cadence) {
    case 'purchase': {
      // An enrollment dated on a purchase day joins the following period.
      const [purchaseDate] = anchorsFrom(nextDay(grant.grantDate), policy.anchors, 1)
      return [{ vestDate: purchaseDate, units: grant.totalUnits, isCliff: false }]
    }

    case 'monthly': {
      const cliffOffset = policy.windowOffsetMonths + policy.cliffMonths
      const monthlyCount = policy.windowMonths - policy.cliffMonths
      const dates: string[] = []
      for (let i = 0; i <= monthlyCount; i++) {
        dates.push(addCalendarMonths(grant.grantDate, cliffOffset + i))
      }
      const shares = dates.map((_, i) => (i === 0 ? policy.cliffMonths : 1))
      const units = allocate(grant.totalUnits, shares, policy.windowMonths)
      return dates.map((vestDate, i) => ({ vestDate, units: units[i], isCliff: i === 0 }))
    }

    case 'semiannual': {
      const periods = policy.durationMonths / 6
      const cliffPeriods = policy.cliffMonths / 6
      const count = periods - cliffPeriods + 1
      const firstEligible = addCalendarMonths(grant.grantDate, policy.cliffMonths)
      const dates = anchorsFrom(firstEligible, policy.anchors, count)
      const shares = dates.map((_, i) => (i === 0 ? cliffPeriods : 1))
      const units = allocate(grant.totalUnits, shares, periods)
      return dates.map((vestDate, i) => ({ vestDate, units: units[i], isCliff: i === 0 }))
    }
  }
}

/** Sum of scheduled units, added in schedule order. */
export function scheduledTotal(events: ScheduledVest[]): number {
  return events.reduce((sum, e) => sum + e.units, 0)
}
