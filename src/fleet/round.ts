// src/fleet/round.ts — Round Coordinator: fan out one probe per server, bounded by a deadline
//
// Each probe races a coordinator-owned timer. The timer is authoritative: once it
// fires the slot is finalized as "timeout" and the probe's signal is aborted. A result
// that arrives after that is discarded, never retro-applied.

import { ulid } from "ulid"
import { errorMessage } from "./errors.js"
import type { Prober } from "./probe.js"
import type { FailureOutcome, Logger, ProbeOutcome, RoundSnapshot, ServerDescriptor } from "./types.js"

export interface RoundCoordinatorOptions {
  prober: Prober
  clock?: () => number
  logger?: Logger
  idFactory?: () => string
}

/** Anything that can run a round. The poller depends only on this. */
export interface RoundRunner {
  runRound(descriptors: readonly ServerDescriptor[], perProbeTimeoutMs: number): Promise<RoundSnapshot>
}

export class RoundCoordinator implements RoundRunner {
  private readonly prober: Prober
  private readonly clock: () => number
  private readonly logger: Logger
  private readonly idFactory: () => string
  private roundCount = 0
  private discarded = 0

  constructor(opts: RoundCoordinatorOptions) {
    this.prober = opts.prober
    this.clock = opts.clock ?? Date.now
    this.logger = opts.logger ?? console
    this.idFactory = opts.idFactory ?? ulid
  }

  /** Late results dropped since construction (for diagnostics). */
  get discardedCount(): number {
    return this.discarded
  }

  async runRound(descriptors: readonly ServerDescriptor[], perProbeTimeoutMs: number): Promise<RoundSnapshot> {
    const round = ++this.roundCount
    const startedAt = this.clock()

    const outcomes = await Promise.all(
      descriptors.map((d) => this.runOne(d, perProbeTimeoutMs, round)),
    )

    return Object.freeze({
      roundId: this.idFactory(),
      round,
      startedAt,
      completedAt: this.clock(),
      outcomes: Object.freeze(outcomes),
    })
  }

  private runOne(descriptor: ServerDescriptor, timeoutMs: number, round: number): Promise<ProbeOutcome> {
    const issuedAt = this.clock()
    const controller = new AbortController()

    const failure = (status: "timeout" | "protocol_error", errorDetail: string): FailureOutcome =>
      Object.freeze({
        serverId: descriptor.id,
        issuedAt,
        durationMs: this.clock() - issuedAt,
        status,
        errorDetail,
      })

    return new Promise<ProbeOutcome>((resolve) => {
      let settled = false

      const timer = setTimeout(() => {
        if (settled) return
        settled = true
        controller.abort()
        resolve(failure("timeout", `no result within ${timeoutMs}ms`))
      }, timeoutMs)

      let call: Promise<ProbeOutcome>
      try {
        call = this.prober.probe(descriptor, { timeoutMs, signal: controller.signal })
      } catch (err) {
        call = Promise.reject(err)
      }

      void call.then(
        (outcome) => {
          if (settled) {
            this.discarded++
            this.logger.log(`[round] ${round}: discarded late ${outcome.status} result for ${descriptor.id}`)
            return
          }
          settled = true
          clearTimeout(timer)
          resolve(outcome)
        },
        (err: unknown) => {
          if (settled) {
            this.discarded++
            return
          }
          settled = true
          clearTimeout(timer)
          this.logger.warn(`[round] ${round}: probe for ${descriptor.id} threw:`, errorMessage(err))
          resolve(failure("protocol_error", `probe failed: ${errorMessage(err)}`))
        },
      )
    })
  }
}
