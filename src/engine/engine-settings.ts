/**
 * Vestwise Engine — Engine Settings
 * Calendar anchors, ISO window rules, holding-period threshold and the flat
 * rates the estimator and the payroll helper use. Callers pass a settings
 * object explicitly; nothing reads it from module state.
 *
 * @module engine-settings
 */

import { z } from 'zod'
import { SettingsError } from './engine-errors'
import type { TaxPreference } from './equity-models'

// ─── Types ────────────────────────────────────────────────────────────────

export interface CalendarAnchor {
  month: number // 1-12
  day: number
}

export interface EngineSettings {
  rsuVestAnchors: CalendarAnchor[]
  esppPurchaseAnchors: CalendarAnchor[]
  isoWindowMonths: number
  isoCliffMonths: number
  isoWindowOffsetMonths: { iso_5y: number; iso_6y: number }
  longTermHoldingDays: number
  longTermCapitalGainsRate: number // flat, no brackets
  socialSecurityRate: number
  socialSecurityWageBase: number
  medicareRate: number
  defaultTaxPreference: Omit<TaxPreference, 'payrollRate'>
}

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  rsuVestAnchors: [{ month: 6, day: 15 }, { month: 11, day: 15 }],
  esppPurchaseAnchors: [{ month: 5, day: 15 }, { month: 10, day: 15 }],
  isoWindowMonths: 48,
  isoCliffMonths: 6,
  isoWindowOffsetMonths: { iso_5y: 12, iso_6y: 24 },
  longTermHoldingDays: 365,
  longTermCapitalGainsRate: 0.15,
  socialSecurityRate: 0.062,
  socialSecurityWageBase: 176_100,
  medicareRate: 0.0145,
  defaultTaxPreference: { federalRate: 0.22, stateRate: 0, includePayrollTax: true },
}

// ─── Environment Overlay ──────────────────────────────────────────────────

const rate = z.coerce.number().min(0).max(1)
const positiveInt = z.coerce.number().int().positive()

const envSchema = z.object({
  VESTWISE_LTCG_RATE: rate.optional(),
  VESTWISE_LONG_TERM_DAYS: positiveInt.optional(),
  VESTWISE_SS_RATE: rate.optional(),
  VESTWISE_SS_WAGE_BASE: z.coerce.number().positive().optional(),
  VESTWISE_MEDICARE_RATE: rate.optional(),
})

type Env = Record<string, string | undefined>

/**
 * Defaults overlaid with any VESTWISE_* variables present in `env`.
 * Empty strings count as unset.
 */
export function loadEngineSettings(env: Env = process.env): EngineSettings {
  const present: Env = {}
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key]
    if (value !== undefined && value.trim() !== '') present[key] = value.trim()
  }

  const parsed = envSchema.safeParse(present)
  if (!parsed.success) {
    throw new SettingsError(parsed.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    })))
  }

  const overrides = parsed.data
  const defaults = DEFAULT_ENGINE_SETTINGS
  return {
    ...defaults,
    longTermCapitalGainsRate: overrides.VESTWISE_LTCG_RATE ?? defaults.longTermCapitalGainsRate,
    longTermHoldingDays: overrides.VESTWISE_LONG_TERM_DAYS ?? defaults.longTermHoldingDays,
    socialSecurityRate: overrides.VESTWISE_SS_RATE ?? defaults.socialSecurityRate,
    socialSecurityWageBase: overrides.VESTWISE_SS_WAGE_BASE ?? defaults.socialSecurityWageBase,
    medicareRate: overrides.VESTWISE_MEDICARE_RATE ?? defaults.medicareRate,
  }
}
