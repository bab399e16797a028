/**
 * Vestwise Engine - Ledger Event Bus
 * Lets callers react to grant and schedule changes (refresh a cached
 * portfolio summary, write rows to a database) without the ledger knowing
 * about them. Each ledger owns its own bus; there is no shared instance.
 *
 * @module ledger-events
 */

// ─── Event Types ──────────────────────────────────────────────────────────

export type LedgerEventType =
  | 'grant:created'
  | 'grant:updated'
  | 'grant:deleted'
  | 'schedule:regenerated'
  | 'vest:updated'

export interface LedgerEvent<T = unknown> {
  type: LedgerEventType
  payload: T
  sequence: number
  source: string // ledger method that emitted
}

type EventHandler<T = unknown> = (event: LedgerEvent<T>) => void

// ─── Event Bus ────────────────────────────────────────────────────────────

export class LedgerEventBus {
  private handlers = new Map<LedgerEventType, Set<EventHandler>>()
  private eventLog: LedgerEvent[] = []
  private maxLogSize = 200
  private sequence = 0

  /** Subscribe to an event type */
  on(type: LedgerEventType, handler: EventHandler): () => void {
    let handlerSet = this.handlers.get(type)
    if (!handlerSet) {
      handlerSet = new Set()
      this.handlers.set(type, handlerSet)
    }
    const set = handlerSet
    set.add(handler)

    // Return unsubscribe function
    return () => { set.delete(handler) }
  }

  /** Subscribe to multiple event types */
  onAny(types: LedgerEventType[], handler: EventHandler): () => void {
    const unsubs = types.map(t => this.on(t, handler))
    return () => unsubs.forEach(u => u())
  }

  emit<T>(type: LedgerEventType, payload: T, source: string): void {
    this.sequence += 1
    const event: LedgerEvent = { type, payload, sequence: this.sequence, source }

    this.eventLog.push(event)
    if (this.eventLog.length > this.maxLogSize) {
      this.eventLog = this.eventLog.slice(-Math.round(this.maxLogSize * 0.8))
    }

    const handlers = this.handlers.get(type)
    if (!handlers) return
    for (const handler of handlers) {
      try { handler(event) } catch (err) { console.error(`[LedgerEvents] Handler error for ${type}:`, err) }
    }
  }

  /** Get recent event log */
  getLog(limit: number = 50): LedgerEvent[] {
    return this.eventLog.slice(-limit)
  }

  /** Clear all handlers and the log */
  clear(): void {
    this.handlers.clear()
    this.eventLog = []
  }
}
