/**
 * Vestwise Engine - Data Validation Schemas
 * Runtime validation for grant input, vest events, stock sales, price
 * history, tax preferences and serialized ledger snapshots. Uses Zod for
 * type-safe validation.
 *
 * @module validation
 */

import { parseISO, isValid, format } from 'date-fns'
import { z } from 'zod'

// ─── Primitive Validators ─────────────────────────────────────────────────

const positiveNumber = z.number().min(0)
const rate = z.number().min(0).max(1)
const recordId = z.string().min(1).max(64)

export const dateString = z.string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date')
  .refine(value => {
    const parsed = parseISO(value)
    return isValid(parsed) && format(parsed, 'yyyy-MM-dd') === value
  }, 'Not a calendar date')

// ─── Grants ───────────────────────────────────────────────────────────────

export const grantKindSchema = z.enum([
  'new_hire', 'annual', 'promotion', 'kickass', 'espp', 'cash',
])

export const instrumentSchema = z.enum(['rsu', 'iso_5y', 'iso_6y', 'cash'])

const grantFields = {
  userId: recordId,
  kind: grantKindSchema,
  instrument: instrumentSchema,
  totalUnits: z.number().finite().positive('Total units must be greater than zero'),
  grantDate: dateString,
  pricePerUnit: positiveNumber,
  vestingMonths: z.number().int().positive().optional(),
  cliffMonths: z.number().int().positive().optional(),
  notes: z.string().max(2000).optional(),
}

export const grantInputSchema = z.object({ id: recordId.optional(), ...grantFields })

export const grantSchema = z.object({ id: recordId, ...grantFields })

// ─── Vest Events ──────────────────────────────────────────────────────────

export const vestEventSchema = z.object({
  id: recordId,
  grantId: recordId,
  vestDate: dateString,
  isCliff: z.boolean(),
  unitsVesting: positiveNumber,
  unitsWithheld: positiveNumber,
  unitsReceived: positiveNumber,
  unitsSold: positiveNumber,
  unitsExercised: positiveNumber,
  cashPaidForTaxes: positiveNumber,
  note: z.string(),
})

// ─── Sales ────────────────────────────────────────────────────────────────

export const saleInputSchema = z.object({
  saleDate: dateString,
  units: z.number().finite().positive('Units sold must be greater than zero'),
  salePrice: positiveNumber,
  fees: positiveNumber.optional(),
  note: z.string().max(2000).optional(),
})

export const stockSaleSchema = z.object({
  id: recordId,
  eventId: recordId,
  saleDate: dateString,
  units: z.number().finite().positive(),
  salePrice: positiveNumber,
  fees: positiveNumber,
  note: z.string(),
})

// ─── Prices & Tax Preferences ─────────────────────────────────────────────

export const pricePointSchema = z.object({
  userId: recordId,
  effectiveDate: dateString,
  price: positiveNumber,
})

export const taxPreferenceSchema = z.object({
  federalRate: rate,
  stateRate: rate,
  includePayrollTax: z.boolean(),
  payrollRate: rate.optional(),
})

// ─── Ledger Snapshot ──────────────────────────────────────────────────────

export const ledgerSnapshotSchema = z.object({
  version: z.literal(1),
  grants: z.array(grantSchema),
  events: z.array(vestEventSchema),
  sales: z.array(stockSaleSchema).default([]),
})

export type LedgerSnapshot = z.infer<typeof ledgerSnapshotSchema>

// ─── Validation Functions ─────────────────────────────────────────────────

export interface ValidationResult {
  valid: boolean
  errors: { path: string; message: string }[]
  warnings: { path: string; message: string }[]
}

function issuesOf(error: z.ZodError): ValidationResult['errors'] {
  return error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
}

/** Validate grant input, with domain warnings on success */
export function validateGrant(data: unknown, today?: string): ValidationResult {
  const result = grantInputSchema.safeParse(data)
  if (!result.success) return { valid: false, errors: issuesOf(result.error), warnings: [] }
  return { valid: true, errors: [], warnings: grantWarnings(result.data, today) }
}

/** Validate a single price point */
export function validatePricePoint(data: unknown): ValidationResult {
  const result = pricePointSchema.safeParse(data)
  if (result.success) return { valid: true, errors: [], warnings: [] }
  return { valid: false, errors: issuesOf(result.error), warnings: [] }
}

/** Validate tax preference input */
export function validateTaxPreference(data: unknown): ValidationResult {
  const result = taxPreferenceSchema.safeParse(data)
  if (!result.success) return { valid: false, errors: issuesOf(result.error), warnings: [] }
  const warnings: ValidationResult['warnings'] = []
  const total = result.data.federalRate + result.data.stateRate
    + (result.data.includePayrollTax ? result.data.payrollRate ?? 0 : 0)
  if (total > 0.7) {
    warnings.push({ path: 'federalRate', message: `Combined rate of ${(total * 100).toFixed(1)}% is unusually high` })
  }
  return { valid: true, errors: [], warnings }
}

// ─── Warning Generator ────────────────────────────────────────────────────

function grantWarnings(
  grant: z.infer<typeof grantInputSchema>,
  today?: string,
): ValidationResult['warnings'] {
  const warnings: ValidationResult['warnings'] = []

  if ((grant.instrument === 'iso_5y' || grant.instrument === 'iso_6y') && grant.pricePerUnit === 0) {
    warnings.push({ path: 'pricePerUnit', message: 'ISO grant has no strike price; cost basis will be zero' })
  }
  if (grant.instrument !== 'cash' && !Number.isInteger(grant.totalUnits)) {
    warnings.push({ path: 'totalUnits', message: `${grant.totalUnits} is a fractional share count` })
  }
  if (today && grant.grantDate > today) {
    warnings.push({ path: 'grantDate', message: `Grant date ${grant.grantDate} is in the future` })
  }

  return warnings
}
