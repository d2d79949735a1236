// tests/fleet/status-store.test.ts — Status Store counters, ordering and copy-on-write views

import { describe, it, expect } from "vitest"
import * as fc from "fast-check"
import { StatusStore, nextStatus, successRate } from "../../src/fleet/status-store.js"
import type { ServerStatus } from "../../src/fleet/types.js"
import { failure, server, snapshot, success } from "../helpers/fleet.js"

const A = server("a")
const B = server("b")

describe("StatusStore", () => {
  it("starts empty at round 0", () => {
    const store = new StatusStore([A, B])
    expect(store.view()).toEqual({ round: 0, updatedAt: null, servers: [] })
    expect(store.size).toBe(0)
    expect(store.configured().map((d) => d.id)).toEqual(["a", "b"])
  })

  it("records a first success", () => {
    const store = new StatusStore([A])
    store.apply(snapshot(1, [success("a", { issuedAt: 1_000, durationMs: 50 })]))

    expect(store.get("a")).toMatchObject({
      consecutiveFailures: 0,
      totalRounds: 1,
      totalSuccesses: 1,
      totalFailures: 0,
      lastSuccessAt: 1_050,
    })
  })

  it("counts consecutive failures and resets on success", () => {
    const store = new StatusStore([A])
    const seen: number[] = []
    const outcomes = [failure("a"), failure("a"), success("a"), failure("a")]
    outcomes.forEach((outcome, i) => {
      store.apply(snapshot(i + 1, [outcome]))
      seen.push(store.get("a")?.consecutiveFailures ?? -1)
    })

    expect(seen).toEqual([1, 2, 0, 1])
    expect(store.get("a")).toMatchObject({ totalRounds: 4, totalSuccesses: 1, totalFailures: 3 })
  })

  it("keeps lastSuccessAt across later failures", () => {
    const store = new StatusStore([A])
    store.apply(snapshot(1, [success("a", { issuedAt: 5_000, durationMs: 20 })]))
    store.apply(snapshot(2, [failure("a")]))
    expect(store.get("a")?.lastSuccessAt).toBe(5_020)
  })

  it("applies the same snapshot twice as two rounds", () => {
    const store = new StatusStore([A])
    const snap = snapshot(1, [success("a")])
    store.apply(snap)
    store.apply(snap)

    expect(store.view().round).toBe(2)
    expect(store.get("a")?.totalRounds).toBe(2)
    expect(store.get("a")?.lastOutcome).toEqual(snap.outcomes[0])
  })

  it("leaves earlier views untouched", () => {
    const store = new StatusStore([A])
    store.apply(snapshot(1, [success("a")]))
    const before = store.view()

    store.apply(snapshot(2, [failure("a")]))
    const after = store.view()

    expect(before).not.toBe(after)
    expect(before.round).toBe(1)
    expect(before.servers[0].totalRounds).toBe(1)
    expect(before.servers[0].lastOutcome.status).toBe("success")
    expect(after.servers[0].lastOutcome.status).toBe("timeout")
    expect(Object.isFrozen(after.servers)).toBe(true)
  })

  it("hands out copies of the status map", () => {
    const store = new StatusStore([A])
    const applied = store.apply(snapshot(1, [success("a")]))
    expect(applied).toEqual(store.statuses())

    applied.delete("a")
    store.statuses().clear()

    expect(store.size).toBe(1)
    expect(store.get("a")?.totalRounds).toBe(1)
    expect(store.statuses().get("a")).toBe(store.view().servers[0])
  })

  it("orders the view by configuration, not outcome order", () => {
    const store = new StatusStore([A, B])
    store.apply(snapshot(1, [success("b"), success("a")]))
    expect(store.view().servers.map((s) => s.descriptor.id)).toEqual(["a", "b"])
  })

  it("ignores outcomes for unconfigured servers", () => {
    const store = new StatusStore([A])
    store.apply(snapshot(1, [success("a"), success("zzz")]))
    expect(store.size).toBe(1)
    expect(store.get("zzz")).toBeUndefined()
  })

  it("stamps updatedAt with the round completion time", () => {
    const store = new StatusStore([A])
    store.apply(snapshot(1, [success("a")], 10_000))
    expect(store.view().updatedAt).toBe(12_000)
  })

  it("keeps counters consistent for any outcome sequence", () => {
    fc.assert(
      fc.property(fc.array(fc.boolean(), { maxLength: 40 }), (results) => {
        let status: ServerStatus | undefined
        for (const ok of results) {
          status = nextStatus(A, status, ok ? success("a") : failure("a"))
        }
        if (!status) return results.length === 0

        let trailing = 0
        for (let i = results.length - 1; i >= 0 && !results[i]; i--) trailing++

        return status.totalRounds === results.length
          && status.totalSuccesses + status.totalFailures === status.totalRounds
          && status.consecutiveFailures === trailing
      }),
    )
  })
})

describe("successRate", () => {
  it("is null before the first round", () => {
    expect(successRate(undefined)).toBeNull()
  })

  it("rounds to a whole percent", () => {
    let status = nextStatus(A, undefined, success("a"))
    status = nextStatus(A, status, failure("a"))
    status = nextStatus(A, status, failure("a"))
    expect(successRate(status)).toBe(33)
  })
})
