/**
 * Grant Ledger — Test Suite
 * Validates: schedule materialization, replace-or-fail regeneration,
 * cascade delete, vest event invariants, snapshot round trip
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import {
  GrantValidationError,
  LedgerLookupError,
  LedgerSnapshotError,
  VestEventInvariantError,
} from './engine-errors'
import type { GrantInput, SaleInput } from './equity-models'
import { GrantLedger } from './grant-ledger'

const rsuGrant: GrantInput = {
  userId: 'user-1',
  kind: 'new_hire',
  instrument: 'rsu',
  totalUnits: 1000,
  grantDate: '2024-01-01',
  pricePerUnit: 0,
}

const isoGrant: GrantInput = {
  userId: 'user-1',
  kind: 'new_hire',
  instrument: 'iso_5y',
  totalUnits: 4800,
  grantDate: '2023-01-01',
  pricePerUnit: 12,
}

function sale(units: number, overrides: Partial<SaleInput> = {}): SaleInput {
  return { units, saleDate: '2025-07-01', salePrice: 55, ...overrides }
}

function expectInvariant(fn: () => unknown, field: string) {
  try {
    fn()
  } catch (err) {
    expect(err).toBeInstanceOf(VestEventInvariantError)
    if (err instanceof VestEventInvariantError) expect(err.field).toBe(field)
    return
  }
  throw new Error(`Expected ${field} invariant to fail`)
}

let ledger: GrantLedger

beforeEach(() => {
  ledger = new GrantLedger()
  vi.spyOn(console, 'warn').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
})

// ── Grants ─────────────────────────────────────────────────────────────────

describe('addGrant', () => {
  it('should store the grant with its full schedule', () => {
    const { grant, events } = ledger.addGrant(rsuGrant)

    expect(grant.id).toBe('grant_1')
    expect(events).toHaveLength(9)
    expect(events[0]).toMatchObject({
      grantId: 'grant_1',
      vestDate: '2025-06-15',
      isCliff: true,
      unitsVesting: 200,
      unitsWithheld: 0,
      unitsReceived: 200,
      unitsSold: 0,
      unitsExercised: 0,
      cashPaidForTaxes: 0,
      note: '',
    })
    expect(new Set(events.map(e => e.id)).size).toBe(9)
    expect(ledger.getVestEvents('grant_1')).toEqual(events)
  })

  it('should keep a caller-supplied id and refuse to reuse it', () => {
    ledger.addGrant({ ...rsuGrant, id: 'rsu-2024' })
    try {
      ledger.addGrant({ ...rsuGrant, id: 'rsu-2024' })
      throw new Error('expected duplicate id to be rejected')
    } catch (err) {
      expect(err).toBeInstanceOf(GrantValidationError)
      if (err instanceof GrantValidationError) expect(err.field).toBe('id')
    }
    expect(ledger.listGrants()).toHaveLength(1)
  })

  it('should store nothing when the schedule cannot be generated', () => {
    expect(() => ledger.addGrant({ ...rsuGrant, totalUnits: 0 })).toThrow(GrantValidationError)
    expect(ledger.listGrants()).toEqual([])
  })

  it('should list grants by date and filter by user', () => {
    ledger.addGrant({ ...rsuGrant, id: 'late', grantDate: '2024-05-01' })
    ledger.addGrant({ ...rsuGrant, id: 'early' })
    ledger.addGrant({ ...rsuGrant, id: 'other', userId: 'user-2' })

    expect(ledger.listGrants('user-1').map(g => g.id)).toEqual(['early', 'late'])
    expect(ledger.listGrants().map(g => g.id)).toEqual(['early', 'other', 'late'])
  })
})

describe('updateGrant', () => {
  it('should replace the schedule with one built from the new terms', () => {
    const { grant, events: before } = ledger.addGrant(rsuGrant)
    const { events: after } = ledger.updateGrant(grant.id, { totalUnits: 2000 })

    expect(after).toHaveLength(9)
    expect(after[0].unitsVesting).toBe(400)
    expect(ledger.getVestEvent(before[0].id)).toBeUndefined()
    expect(ledger.requireGrant(grant.id).totalUnits).toBe(2000)
  })

  it('should leave grant and events untouched when the update is invalid', () => {
    const { grant, events: before } = ledger.addGrant(rsuGrant)

    expect(() => ledger.updateGrant(grant.id, { totalUnits: 0 })).toThrow(GrantValidationError)
    expect(() => ledger.updateGrant(grant.id, { instrument: 'cash' })).toThrow(GrantValidationError)

    expect(ledger.requireGrant(grant.id)).toEqual(grant)
    expect(ledger.getVestEvents(grant.id)).toEqual(before)
  })

  it('should warn when regeneration drops recorded activity', () => {
    const { grant, events } = ledger.addGrant(rsuGrant)
    ledger.recordSale(events[0].id, sale(10))

    ledger.updateGrant(grant.id, { grantDate: '2024-02-01' })

    expect(console.warn).toHaveBeenCalledWith(
      '[Ledger] Regenerating grant grant_1 discards recorded activity on 1 vest event(s)',
    )
  })

  it('should reject unknown grants', () => {
    expect(() => ledger.updateGrant('missing', { totalUnits: 10 })).toThrow(LedgerLookupError)
    expect(() => ledger.regenerateSchedule('missing')).toThrow('Unknown grant "missing"')
  })
})

describe('deleteGrant', () => {
  it('should remove the grant and every one of its events', () => {
    const { grant, events } = ledger.addGrant(rsuGrant)

    expect(ledger.deleteGrant(grant.id)).toBe(9)
    expect(ledger.getGrant(grant.id)).toBeUndefined()
    expect(events.every(e => ledger.getVestEvent(e.id) === undefined)).toBe(true)
    expect(() => ledger.getVestEvents(grant.id)).toThrow(LedgerLookupError)
  })
})

// ── Vest Events ────────────────────────────────────────────────────────────

describe('vest event activity', () => {
  it('should derive units received from withholding', () => {
    const { events } = ledger.addGrant(rsuGrant)
    const updated = ledger.recordWithholding(events[0].id, { unitsWithheld: 60, cashPaidForTaxes: 25 })

    expect(updated.unitsWithheld).toBe(60)
    expect(updated.unitsReceived).toBe(140)
    expect(updated.cashPaidForTaxes).toBe(25)
  })

  it('should reject withholding beyond the vesting units', () => {
    const { events } = ledger.addGrant(rsuGrant)
    expectInvariant(() => ledger.recordWithholding(events[0].id, { unitsWithheld: 250 }), 'unitsWithheld')
    expectInvariant(() => ledger.recordWithholding(events[0].id, { unitsWithheld: -1 }), 'unitsWithheld')
    expectInvariant(
      () => ledger.recordWithholding(events[0].id, { unitsWithheld: 0, cashPaidForTaxes: -5 }),
      'cashPaidForTaxes',
    )
  })

  it('should cap sales at the units still held', () => {
    const { events } = ledger.addGrant(rsuGrant)
    const id = events[0].id
    ledger.recordWithholding(id, { unitsWithheld: 60 })
    ledger.recordSale(id, sale(100))

    expect(() => ledger.recordSale(id, sale(50)))
      .toThrow(`Vest event ${id}: Only 40 unit(s) remain after earlier sales and exercises`)
    ledger.recordSale(id, sale(40))
    expect(ledger.getVestEvent(id)?.unitsSold).toBe(140)
    expectInvariant(() => ledger.recordSale(id, sale(0)), 'units')
  })

  it('should refuse withholding that would undercut earlier sales', () => {
    const { events } = ledger.addGrant(rsuGrant)
    ledger.recordSale(events[0].id, sale(100))
    expectInvariant(() => ledger.recordWithholding(events[0].id, { unitsWithheld: 150 }), 'unitsWithheld')
    expect(ledger.getVestEvent(events[0].id)?.unitsWithheld).toBe(0)
  })

  it('should only record exercises on ISO events', () => {
    const { events: rsuEvents } = ledger.addGrant(rsuGrant)
    expectInvariant(() => ledger.recordExercise(rsuEvents[0].id, 10), 'unitsExercised')

    const { events } = ledger.addGrant(isoGrant)
    expect(events[0].unitsVesting).toBe(600)
    const exercised = ledger.recordExercise(events[0].id, 100)
    expect(exercised.unitsExercised).toBe(100)
    expect(() => ledger.recordSale(events[0].id, sale(501))).toThrow(VestEventInvariantError)
  })

  it('should expose a position that carries the strike price', () => {
    const { events } = ledger.addGrant(isoGrant)
    const position = ledger.positionFor(events[0].id)
    expect(position.instrument).toBe('iso_5y')
    expect(position.strikePrice).toBe(12)
    expect(position.vestDate).toBe('2024-07-01')
  })

  it('should reject unknown events', () => {
    expect(() => ledger.setNote('vest_missing', 'x')).toThrow('Unknown vest event "vest_missing"')
  })
})

// ── Sales ──────────────────────────────────────────────────────────────────

describe('stock sales', () => {
  it('should keep the date, price and fees of each sale', () => {
    const { events } = ledger.addGrant(rsuGrant)
    const recorded = ledger.recordSale(events[0].id, sale(30, { salePrice: 61.5, fees: 4.95 }))

    expect(recorded).toEqual({
      id: recorded.id,
      eventId: events[0].id,
      saleDate: '2025-07-01',
      units: 30,
      salePrice: 61.5,
      fees: 4.95,
      note: '',
    })
    expect(ledger.getVestEvent(events[0].id)?.unitsSold).toBe(30)
    expect(ledger.getSales(events[0].id)).toEqual([recorded])
  })

  it('should list a grant\'s sales by sale date', () => {
    const { grant, events } = ledger.addGrant(rsuGrant)
    const later = ledger.recordSale(events[0].id, sale(10, { saleDate: '2026-02-01' }))
    const earlier = ledger.recordSale(events[1].id, sale(10, { saleDate: '2025-12-01' }))
    ledger.addGrant(isoGrant)

    expect(ledger.listSales(grant.id).map(s => s.id)).toEqual([earlier.id, later.id])
    expect(ledger.listSales()).toHaveLength(2)
  })

  it('should refuse a sale dated before the vest', () => {
    const { events } = ledger.addGrant(rsuGrant)
    expectInvariant(() => ledger.recordSale(events[0].id, sale(10, { saleDate: '2025-06-14' })), 'saleDate')
    expect(ledger.getSales(events[0].id)).toEqual([])
  })

  it('should refuse negative prices and fees', () => {
    const { events } = ledger.addGrant(rsuGrant)
    expectInvariant(() => ledger.recordSale(events[0].id, sale(10, { salePrice: -1 })), 'salePrice')
    expectInvariant(() => ledger.recordSale(events[0].id, sale(10, { fees: -1 })), 'fees')
  })

  it('should refuse to sell a cash payout', () => {
    const { events } = ledger.addGrant({ ...rsuGrant, kind: 'cash', instrument: 'cash', totalUnits: 5000 })
    expectInvariant(() => ledger.recordSale(events[0].id, sale(100)), 'unitsSold')
  })

  it('should drop sales with their grant', () => {
    const { grant, events } = ledger.addGrant(rsuGrant)
    ledger.recordSale(events[0].id, sale(10))

    ledger.updateGrant(grant.id, { totalUnits: 2000 })
    expect(ledger.listSales()).toEqual([])

    const fresh = ledger.getVestEvents(grant.id)
    ledger.recordSale(fresh[0].id, sale(10))
    ledger.deleteGrant(grant.id)
    expect(ledger.listSales()).toEqual([])
  })
})

// ── Events ─────────────────────────────────────────────────────────────────

describe('ledger events', () => {
  it('should emit one event per change in order', () => {
    const { grant, events } = ledger.addGrant(rsuGrant)
    ledger.setNote(events[0].id, 'sold to cover')
    ledger.updateGrant(grant.id, { totalUnits: 1200 })
    ledger.deleteGrant(grant.id)

    expect(ledger.bus.getLog().map(e => e.type)).toEqual([
      'grant:created',
      'vest:updated',
      'grant:updated',
      'schedule:regenerated',
      'grant:deleted',
    ])
    expect(ledger.bus.getLog()[3].payload).toEqual({
      grantId: grant.id,
      previousCount: 9,
      eventCount: 9,
      discardedActivity: 1,
    })
  })
})

// ── Serialization ──────────────────────────────────────────────────────────

describe('serialization', () => {
  it('should round-trip grants and recorded activity', () => {
    const { events } = ledger.addGrant(rsuGrant)
    ledger.addGrant(isoGrant)
    ledger.recordWithholding(events[0].id, { unitsWithheld: 60 })
    ledger.recordSale(events[0].id, sale(20, { fees: 9.95, note: 'tuition' }))

    const restored = GrantLedger.deserialize(ledger.serialize())
    expect(restored.snapshot()).toEqual(ledger.snapshot())
  })

  it('should assign fresh ids that do not collide after restore', () => {
    ledger.addGrant(rsuGrant)
    const restored = GrantLedger.deserialize(ledger.serialize())
    const { grant, events } = restored.addGrant(rsuGrant)

    const existing = new Set(ledger.snapshot().events.map(e => e.id))
    expect(grant.id).not.toBe('grant_1')
    expect(events.some(e => existing.has(e.id))).toBe(false)
  })

  it('should wrap malformed JSON in a snapshot error', () => {
    expect(() => GrantLedger.deserialize('{"version": 1,')).toThrow(LedgerSnapshotError)
    expect(() => GrantLedger.deserialize('not json')).toThrow('Invalid ledger snapshot: not valid JSON')
  })

  it('should reject a snapshot that reuses an event id', () => {
    const { events } = ledger.addGrant(rsuGrant)
    const snapshot = ledger.snapshot()
    const copy = { ...events[8], vestDate: '2029-11-15' }
    const json = JSON.stringify({ ...snapshot, events: [...snapshot.events, { ...copy, id: events[0].id }] })

    expect(() => GrantLedger.deserialize(json)).toThrow(`events: duplicate id ${events[0].id}`)
  })

  it('should reject two events on the same date for one grant', () => {
    const { events } = ledger.addGrant(rsuGrant)
    const snapshot = ledger.snapshot()
    const json = JSON.stringify({
      ...snapshot,
      events: snapshot.events.map(e => (e.id === events[1].id ? { ...e, vestDate: events[0].vestDate } : e)),
    })

    expect(() => GrantLedger.deserialize(json))
      .toThrow(`events: grant grant_1 has more than one event on ${events[0].vestDate}`)
  })

  it('should reject events that do not add up to the grant total', () => {
    ledger.addGrant(rsuGrant)
    const snapshot = ledger.snapshot()
    const json = JSON.stringify({ ...snapshot, events: snapshot.events.slice(1) })

    expect(() => GrantLedger.deserialize(json)).toThrow('grants: grant_1 vest events sum to 800, expected 1000')
  })

  it('should reject sales that disagree with units sold', () => {
    const { events } = ledger.addGrant(rsuGrant)
    ledger.recordSale(events[0].id, sale(20))
    const snapshot = ledger.snapshot()
    const json = JSON.stringify({ ...snapshot, sales: [] })

    expect(() => GrantLedger.deserialize(json))
      .toThrow(`events: ${events[0].id} unitsSold does not match its recorded sales`)
  })

  it('should reject snapshots that break invariants', () => {
    const event = {
      id: 'vest-1',
      grantId: 'missing',
      vestDate: '2025-06-15',
      isCliff: true,
      unitsVesting: 10,
      unitsWithheld: 0,
      unitsReceived: 10,
      unitsSold: 0,
      unitsExercised: 0,
      cashPaidForTaxes: 0,
      note: '',
    }
    const json = JSON.stringify({ version: 1, grants: [], events: [event] })

    expect(() => GrantLedger.deserialize(json))
      .toThrow('Invalid ledger snapshot: events: vest-1 references unknown grant missing')
    expect(() => GrantLedger.deserialize(JSON.stringify({ version: 2, grants: [], events: [] })))
      .toThrow(LedgerSnapshotError)
  })
})
