/**
 * Vestwise Engine — Tax Preferences
 *
 * Turns whatever the caller holds for a user's tax settings into a tagged
 * lookup the estimator can consume. Default rates are substituted only when
 * the caller asks for them.
 *
 * The Social Security wage cap lives here, in `payrollRateFor`: the
 * estimator multiplies whatever payroll rate it is handed.
 *
 * @module tax-preferences
 */

import { DEFAULT_ENGINE_SETTINGS, type EngineSettings } from './engine-settings'
import type { TaxPreference } from './equity-models'
import { taxPreferenceSchema } from './validation'

export type TaxPreferenceLookup =
  | { status: 'available'; preference: TaxPreference; source: 'user' | 'default' }
  | { status: 'missing'; reason: 'not_provided' | 'invalid'; issues: string[] }

export interface ResolveOptions {
  allowDefaults?: boolean
  payrollRate?: number // used when the stored preference carries none
  settings?: EngineSettings
}

export function resolveTaxPreference(raw: unknown, options: ResolveOptions = {}): TaxPreferenceLookup {
  const settings = options.settings ?? DEFAULT_ENGINE_SETTINGS

  if (raw === undefined || raw === null) {
    if (!options.allowDefaults) return { status: 'missing', reason: 'not_provided', issues: [] }
    const defaults = settings.defaultTaxPreference
    return {
      status: 'available',
      source: 'default',
      preference: {
        ...defaults,
        payrollRate: defaults.includePayrollTax ? options.payrollRate ?? payrollRateFor({ ytdWages: 0 }, settings) : 0,
      },
    }
  }

  const parsed = taxPreferenceSchema.safeParse(raw)
  if (!parsed.success) {
    return {
      status: 'missing',
      reason: 'invalid',
      issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
    }
  }

  const { federalRate, stateRate, includePayrollTax } = parsed.data
  const payrollRate = parsed.data.payrollRate ?? options.payrollRate
  if (includePayrollTax && payrollRate === undefined) {
    return {
      status: 'missing',
      reason: 'invalid',
      issues: ['payrollRate: required when includePayrollTax is set'],
    }
  }

  return {
    status: 'available',
    source: 'user',
    preference: { federalRate, stateRate, includePayrollTax, payrollRate: includePayrollTax ? payrollRate ?? 0 : 0 },
  }
}

export function taxPreferenceAvailable(preference: TaxPreference): TaxPreferenceLookup {
  return { status: 'available', preference, source: 'user' }
}

/** Federal + state + payroll (when enabled), as applied to ordinary income at vest. */
export function combinedOrdinaryRate(preference: TaxPreference): number {
  return preference.federalRate + preference.stateRate + (preference.includePayrollTax ? preference.payrollRate : 0)
}

// ─── Payroll Rate ─────────────────────────────────────────────────────────

/**
 * Effective payroll rate for income paid after `ytdWages` of earlier wages.
 * Social Security stops at the wage base; Medicare has no cap. With an
 * `amount`, a vest that straddles the wage base gets the blended rate.
 */
export function payrollRateFor(
  wages: { ytdWages: number; amount?: number },
  settings: EngineSettings = DEFAULT_ENGINE_SETTINGS,
): number {
  const room = Math.max(0, settings.socialSecurityWageBase - Math.max(0, wages.ytdWages))
  if (wages.amount === undefined || wages.amount <= 0) {
    return (room > 0 ? settings.socialSecurityRate : 0) + settings.medicareRate
  }
  const ssTaxable = Math.min(room, wages.amount)
  return (ssTaxable * settings.socialSecurityRate) / wages.amount + settings.medicareRate
}
