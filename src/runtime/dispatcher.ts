// src/runtime/dispatcher.ts — Serial lifecycle event dispatch
//
// Handlers for one event run to completion before the next event is
// delivered, whoever emits it. Handlers must not await emit() themselves.

import { describeError } from "../charm/errors.js"
import type { Relation } from "./model.js"

export type RelationEventKind =
  | "relation-created"
  | "relation-joined"
  | "relation-changed"
  | "relation-departed"
  | "relation-broken"

export type CharmEvent =
  | { kind: "install" }
  | { kind: "start" }
  | { kind: "leader-elected" }
  | { kind: "config-changed" }
  | { kind: "upgrade-charm" }
  | { kind: "update-status" }
  | { kind: "pebble-ready"; container: string }
  | { kind: RelationEventKind; relation: Relation; unit?: string }

export type EventKind = CharmEvent["kind"]
export type RelationEvent = Extract<CharmEvent, { relation: Relation }>

export type EventHandler = (event: CharmEvent) => Promise<void> | void

export function isRelationEvent(event: CharmEvent): event is RelationEvent {
  return "relation" in event
}

// ---------------------------------------------------------------------------
// Async mutex — promise-chain lock
// ---------------------------------------------------------------------------

export class AsyncMutex {
  private chain: Promise<void> = Promise.resolve()

  /** Acquire the lock, execute fn, then release. */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => {}
    const gate = new Promise<void>((resolve) => { release = resolve })

    // Enqueue behind current chain
    const prev = this.chain
    this.chain = gate

    await prev
    try {
      return await fn()
    } finally {
      release()
    }
  }
}

// ---------------------------------------------------------------------------
// EventDispatcher
// ---------------------------------------------------------------------------

export class EventDispatcher {
  private table = new Map<EventKind, EventHandler[]>()
  private mutex = new AsyncMutex()
  private delivered = 0

  on(kind: EventKind, handler: EventHandler): void {
    const handlers = this.table.get(kind) ?? []
    handlers.push(handler)
    this.table.set(kind, handlers)
  }

  /** Deliver an event; handler errors propagate to the caller. */
  emit(event: CharmEvent): Promise<void> {
    return this.mutex.runExclusive(async () => {
      this.delivered++
      for (const handler of this.table.get(event.kind) ?? []) {
        try {
          await handler(event)
        } catch (err) {
          console.error(`[runtime] ${event.kind} handler failed: ${describeError(err)}`)
          throw err
        }
      }
    })
  }

  /** Number of events delivered so far. */
  get deliveredCount(): number {
    return this.delivered
  }
}
