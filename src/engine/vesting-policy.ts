/**
 * Vestwise Engine — Vesting Policy Resolution
 *
 * Maps a grant's kind and instrument to the rule its schedule follows.
 * Combinations not listed here are rejected rather than defaulted.
 *
 *   rsu     new_hire, annual        semi-annual, 60 months, 12-month cliff
 *   rsu     promotion, kickass      semi-annual, 12-60 months, 12-month cliff
 *   rsu     espp                    one purchase at the next ESPP anchor
 *   iso_*   any non-ESPP, non-cash  monthly over a 48-month window
 *   cash    cash, annual, kickass   semi-annual, grant-configured months
 *
 * @module vesting-policy
 */

import { GrantValidationError } from './engine-errors'
import type { CalendarAnchor, EngineSettings } from './engine-settings'
import type { Grant, GrantKind, InstrumentType } from './equity-models'

export type VestingPolicy =
  | {
      cadence: 'semiannual'
      durationMonths: number
      cliffMonths: number
      anchors: CalendarAnchor[]
    }
  | {
      cadence: 'monthly'
      windowOffsetMonths: number
      windowMonths: number
      cliffMonths: number
    }
  | {
      cadence: 'purchase'
      anchors: CalendarAnchor[]
    }

type PolicyGrant = Pick<Grant, 'id' | 'kind' | 'instrument' | 'vestingMonths' | 'cliffMonths'>

const STANDARD_RSU_MONTHS = 60
const RSU_CLIFF_MONTHS = 12
const DEFAULT_CASH_MONTHS = 12
const MIN_CONFIGURABLE_MONTHS = 12
const SEMIANNUAL_STEP = 6

const ACCEPTED_KINDS: Record<InstrumentType, GrantKind[]> = {
  rsu: ['new_hire', 'annual', 'promotion', 'kickass', 'espp'],
  iso_5y: ['new_hire', 'annual', 'promotion', 'kickass'],
  iso_6y: ['new_hire', 'annual', 'promotion', 'kickass'],
  cash: ['cash', 'annual', 'kickass'],
}

export function resolveVestingPolicy(grant: PolicyGrant, settings: EngineSettings): VestingPolicy {
  if (!ACCEPTED_KINDS[grant.instrument].includes(grant.kind)) {
    throw new GrantValidationError(
      `Unsupported instrument "${grant.instrument}" for grant kind "${grant.kind}"`,
      grant.id,
      'instrument',
    )
  }

  switch (grant.instrument) {
    case 'iso_5y':
    case 'iso_6y':
      rejectConfiguredMonths(grant)
      return {
        cadence: 'monthly',
        windowOffsetMonths: settings.isoWindowOffsetMonths[grant.instrument],
        windowMonths: settings.isoWindowMonths,
        cliffMonths: settings.isoCliffMonths,
      }

    case 'cash': {
      const durationMonths = grant.vestingMonths ?? DEFAULT_CASH_MONTHS
      const cliffMonths = grant.cliffMonths ?? Math.min(DEFAULT_CASH_MONTHS, durationMonths)
      requireSemiannualMonths(grant, 'vestingMonths', durationMonths, SEMIANNUAL_STEP, Infinity)
      requireSemiannualMonths(grant, 'cliffMonths', cliffMonths, SEMIANNUAL_STEP, durationMonths)
      return { cadence: 'semiannual', durationMonths, cliffMonths, anchors: settings.rsuVestAnchors }
    }

    case 'rsu':
      if (grant.kind === 'espp') {
        rejectConfiguredMonths(grant)
        return { cadence: 'purchase', anchors: settings.esppPurchaseAnchors }
      }
      if (grant.cliffMonths !== undefined) {
        throw new GrantValidationError('RSU cliff is fixed at 12 months', grant.id, 'cliffMonths')
      }
      if (grant.kind === 'promotion' || grant.kind === 'kickass') {
        const durationMonths = grant.vestingMonths ?? STANDARD_RSU_MONTHS
        requireSemiannualMonths(grant, 'vestingMonths', durationMonths, MIN_CONFIGURABLE_MONTHS, STANDARD_RSU_MONTHS)
        return { cadence: 'semiannual', durationMonths, cliffMonths: RSU_CLIFF_MONTHS, anchors: settings.rsuVestAnchors }
      }
      if (grant.vestingMonths !== undefined) {
        throw new GrantValidationError(
          `Vesting length is fixed for "${grant.kind}" RSU grants`,
          grant.id,
          'vestingMonths',
        )
      }
      return {
        cadence: 'semiannual',
        durationMonths: STANDARD_RSU_MONTHS,
        cliffMonths: RSU_CLIFF_MONTHS,
        anchors: settings.rsuVestAnchors,
      }
  }
}

function rejectConfiguredMonths(grant: PolicyGrant): void {
  if (grant.vestingMonths !== undefined) {
    throw new GrantValidationError('Vesting length is not configurable for this grant', grant.id, 'vestingMonths')
  }
  if (grant.cliffMonths !== undefined) {
    throw new GrantValidationError('Cliff is not configurable for this grant', grant.id, 'cliffMonths')
  }
}

function requireSemiannualMonths(
  grant: PolicyGrant,
  field: 'vestingMonths' | 'cliffMonths',
  months: number,
  min: number,
  max: number,
): void {
  if (!Number.isInteger(months) || months % SEMIANNUAL_STEP !== 0 || months < min || months > max) {
    const upper = Number.isFinite(max) ? ` and at most ${max}` : ''
    throw new GrantValidationError(
      `${field} must be a multiple of ${SEMIANNUAL_STEP}, at least ${min}${upper} (got ${months})`,
      grant.id,
      field,
    )
  }
}
