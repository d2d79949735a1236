// src/fleet/status-store.ts — Per-server health history, single writer / many readers
//
// apply() builds the next map from a copy of the current one and swaps it in with one
// assignment, so a reader holding a view never observes a half-applied round.

import type { FleetView, ProbeOutcome, RoundSnapshot, ServerDescriptor, ServerStatus } from "./types.js"

export class StatusStore {
  private current: ReadonlyMap<string, ServerStatus> = new Map()
  private readonly descriptors = new Map<string, ServerDescriptor>()
  private roundsApplied = 0
  private updatedAt: number | null = null
  private currentView: FleetView = Object.freeze({ round: 0, updatedAt: null, servers: Object.freeze([]) })

  constructor(descriptors: readonly ServerDescriptor[]) {
    for (const d of descriptors) {
      this.descriptors.set(d.id, d)
    }
  }

  /**
   * Fold a round into the store. Outcomes for servers that are not part of the
   * configured set are ignored.
   */
  apply(snapshot: RoundSnapshot): Map<string, ServerStatus> {
    const next = new Map(this.current)

    for (const outcome of snapshot.outcomes) {
      const descriptor = this.descriptors.get(outcome.serverId)
      if (!descriptor) continue
      next.set(outcome.serverId, nextStatus(descriptor, next.get(outcome.serverId), outcome))
    }

    this.roundsApplied++
    this.updatedAt = snapshot.completedAt
    this.current = next
    this.currentView = Object.freeze({
      round: this.roundsApplied,
      updatedAt: this.updatedAt,
      servers: Object.freeze(this.ordered(next)),
    })
    return new Map(next)
  }

  /** Current state in configured order. Safe to hold across later applies. */
  view(): FleetView {
    return this.currentView
  }

  /** A copy of the per-server map; changing it does not touch the store. */
  statuses(): Map<string, ServerStatus> {
    return new Map(this.current)
  }

  get(id: string): ServerStatus | undefined {
    return this.current.get(id)
  }

  get size(): number {
    return this.current.size
  }

  configured(): ServerDescriptor[] {
    return Array.from(this.descriptors.values())
  }

  private ordered(map: ReadonlyMap<string, ServerStatus>): ServerStatus[] {
    const result: ServerStatus[] = []
    for (const id of this.descriptors.keys()) {
      const status = map.get(id)
      if (status) result.push(status)
    }
    return result
  }
}

/** Pure counter update for one outcome. */
export function nextStatus(
  descriptor: ServerDescriptor,
  prev: ServerStatus | undefined,
  outcome: ProbeOutcome,
): ServerStatus {
  const success = outcome.status === "success"
  const totalSuccesses = (prev?.totalSuccesses ?? 0) + (success ? 1 : 0)
  const totalFailures = (prev?.totalFailures ?? 0) + (success ? 0 : 1)
  const lastSuccessAt = success ? outcome.issuedAt + outcome.durationMs : prev?.lastSuccessAt

  return Object.freeze({
    descriptor,
    lastOutcome: outcome,
    consecutiveFailures: success ? 0 : (prev?.consecutiveFailures ?? 0) + 1,
    totalRounds: (prev?.totalRounds ?? 0) + 1,
    totalSuccesses,
    totalFailures,
    ...(lastSuccessAt !== undefined ? { lastSuccessAt } : {}),
  })
}

/** Share of successful rounds, 0-100; null before the first round. */
export function successRate(status: ServerStatus | undefined): number | null {
  if (!status || status.totalRounds === 0) return null
  return Math.round((status.totalSuccesses / status.totalRounds) * 100)
}
