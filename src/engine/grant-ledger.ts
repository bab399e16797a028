/**
 * Vestwise Engine — Grant Ledger
 *
 * In-memory owner of grants and their vest events:
 *   - Creating a grant generates and stores its whole schedule
 *   - Editing a grant regenerates the schedule; the old events are only
 *     dropped once the new list has been built (replace-or-fail)
 *   - Deleting a grant removes its events
 *   - Withholding, sales and exercises are recorded per event, guarded by
 *     received = vesting - withheld and sold + exercised <= received
 *   - Each sale keeps its date, price and fees so realized gains can be
 *     computed later; deleting or regenerating a grant drops its sales
 */

import {
  GrantValidationError,
  LedgerLookupError,
  LedgerSnapshotError,
  VestEventInvariantError,
} from './engine-errors'
import { DEFAULT_ENGINE_SETTINGS, type EngineSettings } from './engine-settings'
import {
  isOption,
  toPosition,
  type Grant,
  type GrantInput,
  type SaleInput,
  type ScheduledVest,
  type StockSale,
  type VestEvent,
  type VestPosition,
} from './equity-models'
import { LedgerEventBus } from './ledger-events'
import { ledgerSnapshotSchema, saleInputSchema, type LedgerSnapshot } from './validation'
import { generateSchedule } from './vesting-schedule'

export type GrantPatch = Partial<Omit<Grant, 'id' | 'userId'>>

export interface LedgerOptions {
  settings?: EngineSettings
  bus?: LedgerEventBus
}

const UNIT_TOLERANCE = 1e-9

function hasRecordedActivity(event: VestEvent): boolean {
  return event.unitsWithheld > 0 || event.unitsSold > 0 || event.unitsExercised > 0
    || event.cashPaidForTaxes > 0 || event.note !== ''
}

function byDate(a: VestEvent, b: VestEvent): number {
  return a.vestDate.localeCompare(b.vestDate)
}

function bySaleDate(a: StockSale, b: StockSale): number {
  return a.saleDate.localeCompare(b.saleDate) || a.id.localeCompare(b.id)
}

// ─── Ledger ───────────────────────────────────────────────────────────────

export class GrantLedger {
  private grants = new Map<string, Grant>()
  private eventsByGrant = new Map<string, VestEvent[]>()
  private salesByEvent = new Map<string, StockSale[]>()
  private counter = 0
  private settings: EngineSettings
  readonly bus: LedgerEventBus

  constructor(options: LedgerOptions = {}) {
    this.settings = options.settings ?? DEFAULT_ENGINE_SETTINGS
    this.bus = options.bus ?? new LedgerEventBus()
  }

  private genId(prefix: 'grant' | 'vest' | 'sale'): string {
    let id: string
    do {
      this.counter += 1
      id = `${prefix}_${this.counter.toString(36)}`
    } while (this.grants.has(id) || this.findEvent(id) || this.findSale(id))
    return id
  }

  private dropSales(events: VestEvent[]): void {
    for (const event of events) this.salesByEvent.delete(event.id)
  }

  private materialize(grantId: string, schedule: ScheduledVest[]): VestEvent[] {
    return schedule.map(vest => ({
      id: this.genId('vest'),
      grantId,
      vestDate: vest.vestDate,
      isCliff: vest.isCliff,
      unitsVesting: vest.units,
      unitsWithheld: 0,
      unitsReceived: vest.units,
      unitsSold: 0,
      unitsExercised: 0,
      cashPaidForTaxes: 0,
      note: '',
    }))
  }

  // ─── Grants ───────────────────────────────────────────────────────

  addGrant(input: GrantInput): { grant: Grant; events: VestEvent[] } {
    if (input.id !== undefined && this.grants.has(input.id)) {
      throw new GrantValidationError('A grant with this id already exists', input.id, 'id')
    }
    const grant: Grant = { ...input, id: input.id ?? this.genId('grant') }
    const events = this.materialize(grant.id, generateSchedule(grant, this.settings))

    this.grants.set(grant.id, grant)
    this.eventsByGrant.set(grant.id, events)
    this.bus.emit('grant:created', { grantId: grant.id, eventCount: events.length }, 'addGrant')
    return { grant: { ...grant }, events: events.map(e => ({ ...e })) }
  }

  /**
   * Applies `patch` and rebuilds the schedule. If the patched grant does not
   * produce a schedule, the ledger is left exactly as it was.
   */
  updateGrant(id: string, patch: GrantPatch): { grant: Grant; events: VestEvent[] } {
    const existing = this.requireGrant(id)
    const next: Grant = { ...existing, ...patch, id, userId: existing.userId }
    return this.replaceSchedule(next, 'updateGrant')
  }

  /** Rebuild a grant's schedule from its current terms and settings. */
  regenerateSchedule(id: string): { grant: Grant; events: VestEvent[] } {
    return this.replaceSchedule(this.requireGrant(id), 'regenerateSchedule')
  }

  private replaceSchedule(grant: Grant, source: string): { grant: Grant; events: VestEvent[] } {
    const schedule = generateSchedule(grant, this.settings)

    const previous = this.eventsByGrant.get(grant.id) ?? []
    const discarded = previous.filter(hasRecordedActivity).length
    if (discarded > 0) {
      console.warn(`[Ledger] Regenerating grant ${grant.id} discards recorded activity on ${discarded} vest event(s)`)
    }

    const events = this.materialize(grant.id, schedule)
    this.dropSales(previous)
    this.grants.set(grant.id, grant)
    this.eventsByGrant.set(grant.id, events)

    if (source === 'updateGrant') this.bus.emit('grant:updated', { grantId: grant.id }, source)
    this.bus.emit('schedule:regenerated', {
      grantId: grant.id,
      previousCount: previous.length,
      eventCount: events.length,
      discardedActivity: discarded,
    }, source)
    return { grant: { ...grant }, events: events.map(e => ({ ...e })) }
  }

  /** Removes the grant and all of its vest events; returns how many events went with it. */
  deleteGrant(id: string): number {
    this.requireGrant(id)
    const events = this.eventsByGrant.get(id) ?? []
    const removed = events.length
    this.dropSales(events)
    this.grants.delete(id)
    this.eventsByGrant.delete(id)
    this.bus.emit('grant:deleted', { grantId: id, eventCount: removed }, 'deleteGrant')
    return removed
  }

  getGrant(id: string): Grant | undefined {
    const grant = this.grants.get(id)
    return grant ? { ...grant } : undefined
  }

  requireGrant(id: string): Grant {
    const grant = this.grants.get(id)
    if (!grant) throw new LedgerLookupError('grant', id)
    return { ...grant }
  }

  listGrants(userId?: string): Grant[] {
    return [...this.grants.values()]
      .filter(g => userId === undefined || g.userId === userId)
      .sort((a, b) => a.grantDate.localeCompare(b.grantDate) || a.id.localeCompare(b.id))
      .map(g => ({ ...g }))
  }

  // ─── Vest Events ──────────────────────────────────────────────────

  getVestEvents(grantId: string): VestEvent[] {
    this.requireGrant(grantId)
    return [...(this.eventsByGrant.get(grantId) ?? [])].sort(byDate).map(e => ({ ...e }))
  }

  getVestEvent(eventId: string): VestEvent | undefined {
    const event = this.findEvent(eventId)
    return event ? { ...event } : undefined
  }

  positionFor(eventId: string): VestPosition {
    const event = this.requireEvent(eventId)
    return toPosition(this.requireGrant(event.grantId), event)
  }

  private findEvent(eventId: string): VestEvent | undefined {
    for (const events of this.eventsByGrant.values()) {
      const match = events.find(e => e.id === eventId)
      if (match) return match
    }
    return undefined
  }

  private requireEvent(eventId: string): VestEvent {
    const event = this.findEvent(eventId)
    if (!event) throw new LedgerLookupError('vest_event', eventId)
    return event
  }

  recordWithholding(eventId: string, withholding: { unitsWithheld: number; cashPaidForTaxes?: number }): VestEvent {
    const event = this.requireEvent(eventId)
    const { unitsWithheld } = withholding
    const cashPaid = withholding.cashPaidForTaxes ?? event.cashPaidForTaxes

    if (!(unitsWithheld >= 0) || unitsWithheld > event.unitsVesting + UNIT_TOLERANCE) {
      throw new VestEventInvariantError(
        `Withheld units must be between 0 and ${event.unitsVesting}`,
        eventId,
        'unitsWithheld',
      )
    }
    if (!(cashPaid >= 0)) {
      throw new VestEventInvariantError('Cash paid for taxes cannot be negative', eventId, 'cashPaidForTaxes')
    }

    const unitsReceived = Math.max(0, event.unitsVesting - unitsWithheld)
    if (event.unitsSold + event.unitsExercised > unitsReceived + UNIT_TOLERANCE) {
      throw new VestEventInvariantError(
        'Withholding would leave fewer units received than already sold or exercised',
        eventId,
        'unitsWithheld',
      )
    }

    event.unitsWithheld = unitsWithheld
    event.unitsReceived = unitsReceived
    event.cashPaidForTaxes = cashPaid
    this.bus.emit('vest:updated', { eventId, field: 'unitsWithheld' }, 'recordWithholding')
    return { ...event }
  }

  /**
   * Records an actual sale out of the units received on `eventId`. The sale
   * cannot predate the vest, and cash payouts have no shares to sell.
   */
  recordSale(eventId: string, input: SaleInput): StockSale {
    const event = this.requireEvent(eventId)
    const parsed = saleInputSchema.safeParse(input)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      throw new VestEventInvariantError(issue.message, eventId, issue.path.join('.') || 'sale')
    }
    const { saleDate, units, salePrice, fees = 0, note = '' } = parsed.data

    if (this.requireGrant(event.grantId).instrument === 'cash') {
      throw new VestEventInvariantError('Cash vest events cannot be sold', eventId, 'unitsSold')
    }
    if (saleDate < event.vestDate) {
      throw new VestEventInvariantError(
        `Sale date ${saleDate} is before the vest date ${event.vestDate}`,
        eventId,
        'saleDate',
      )
    }
    this.requireDisposable(event, units, 'unitsSold')

    const sale: StockSale = { id: this.genId('sale'), eventId, saleDate, units, salePrice, fees, note }
    const sales = this.salesByEvent.get(eventId) ?? []
    sales.push(sale)
    this.salesByEvent.set(eventId, sales)
    event.unitsSold += units
    this.bus.emit('vest:updated', { eventId, field: 'unitsSold', saleId: sale.id }, 'recordSale')
    return { ...sale }
  }

  getSales(eventId: string): StockSale[] {
    this.requireEvent(eventId)
    return [...(this.salesByEvent.get(eventId) ?? [])].sort(bySaleDate).map(s => ({ ...s }))
  }

  /** All sales, or those drawn from one grant's vest events, by sale date. */
  listSales(grantId?: string): StockSale[] {
    const events = grantId === undefined
      ? [...this.eventsByGrant.values()].flat()
      : this.eventsByGrant.get(this.requireGrant(grantId).id) ?? []
    return events
      .flatMap(e => this.salesByEvent.get(e.id) ?? [])
      .sort(bySaleDate)
      .map(s => ({ ...s }))
  }

  private findSale(saleId: string): StockSale | undefined {
    for (const sales of this.salesByEvent.values()) {
      const match = sales.find(s => s.id === saleId)
      if (match) return match
    }
    return undefined
  }

  recordExercise(eventId: string, units: number): VestEvent {
    const event = this.requireEvent(eventId)
    const grant = this.requireGrant(event.grantId)
    if (!isOption(grant.instrument)) {
      throw new VestEventInvariantError(
        `Only ISO vest events can be exercised (grant is ${grant.instrument})`,
        eventId,
        'unitsExercised',
      )
    }
    this.requireDisposable(event, units, 'unitsExercised')
    event.unitsExercised += units
    this.bus.emit('vest:updated', { eventId, field: 'unitsExercised' }, 'recordExercise')
    return { ...event }
  }

  setNote(eventId: string, note: string): VestEvent {
    const event = this.requireEvent(eventId)
    event.note = note
    this.bus.emit('vest:updated', { eventId, field: 'note' }, 'setNote')
    return { ...event }
  }

  private requireDisposable(event: VestEvent, units: number, field: 'unitsSold' | 'unitsExercised'): void {
    if (!(units > 0)) {
      throw new VestEventInvariantError('Units must be greater than zero', event.id, field)
    }
    const available = event.unitsReceived - event.unitsSold - event.unitsExercised
    if (units > available + UNIT_TOLERANCE) {
      throw new VestEventInvariantError(
        `Only ${available} unit(s) remain after earlier sales and exercises`,
        event.id,
        field,
      )
    }
  }

  // ─── Serialization ────────────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    const grants = this.listGrants()
    return {
      version: 1,
      grants,
      events: grants.flatMap(g => this.getVestEvents(g.id)),
      sales: grants.flatMap(g => this.listSales(g.id)),
    }
  }

  serialize(): string {
    return JSON.stringify(this.snapshot())
  }

  static deserialize(json: string, options: LedgerOptions = {}): GrantLedger {
    let raw: unknown
    try {
      raw = JSON.parse(json)
    } catch (err) {
      throw new LedgerSnapshotError([`not valid JSON: ${err instanceof Error ? err.message : String(err)}`])
    }
    const parsed = ledgerSnapshotSchema.safeParse(raw)
    if (!parsed.success) {
      throw new LedgerSnapshotError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`))
    }

    const issues: string[] = []
    const ledger = new GrantLedger(options)
    for (const grant of parsed.data.grants) {
      if (ledger.grants.has(grant.id)) issues.push(`grants: duplicate id ${grant.id}`)
      ledger.grants.set(grant.id, grant)
      ledger.eventsByGrant.set(grant.id, [])
    }

    const eventsById = new Map<string, VestEvent>()
    for (const event of parsed.data.events) {
      const list = ledger.eventsByGrant.get(event.grantId)
      if (!list) {
        issues.push(`events: ${event.id} references unknown grant ${event.grantId}`)
        continue
      }
      if (eventsById.has(event.id)) issues.push(`events: duplicate id ${event.id}`)
      if (list.some(e => e.vestDate === event.vestDate)) {
        issues.push(`events: grant ${event.grantId} has more than one event on ${event.vestDate}`)
      }
      if (Math.abs(event.unitsReceived - (event.unitsVesting - event.unitsWithheld)) > UNIT_TOLERANCE) {
        issues.push(`events: ${event.id} unitsReceived does not equal unitsVesting - unitsWithheld`)
      }
      if (event.unitsSold + event.unitsExercised > event.unitsReceived + UNIT_TOLERANCE) {
        issues.push(`events: ${event.id} sold and exercised units exceed units received`)
      }
      eventsById.set(event.id, event)
      list.push(event)
    }

    for (const [grantId, events] of ledger.eventsByGrant) {
      const total = ledger.grants.get(grantId)?.totalUnits ?? 0
      const sum = events.reduce((s, e) => s + e.unitsVesting, 0)
      if (Math.abs(sum - total) > UNIT_TOLERANCE * Math.max(1, total)) {
        issues.push(`grants: ${grantId} vest events sum to ${sum}, expected ${total}`)
      }
    }

    const saleIds = new Set<string>()
    for (const sale of parsed.data.sales) {
      const event = eventsById.get(sale.eventId)
      if (!event) {
        issues.push(`sales: ${sale.id} references unknown vest event ${sale.eventId}`)
        continue
      }
      if (saleIds.has(sale.id) || eventsById.has(sale.id)) issues.push(`sales: duplicate id ${sale.id}`)
      if (sale.saleDate < event.vestDate) issues.push(`sales: ${sale.id} is dated before its vest date`)
      saleIds.add(sale.id)
      const list = ledger.salesByEvent.get(sale.eventId) ?? []
      list.push(sale)
      ledger.salesByEvent.set(sale.eventId, list)
    }
    for (const event of eventsById.values()) {
      const sold = (ledger.salesByEvent.get(event.id) ?? []).reduce((s, sale) => s + sale.units, 0)
      if (Math.abs(sold - event.unitsSold) > UNIT_TOLERANCE * Math.max(1, event.unitsSold)) {
        issues.push(`events: ${event.id} unitsSold does not match its recorded sales`)
      }
    }

    if (issues.length > 0) throw new LedgerSnapshotError(issues)
    return ledger
  }
}
