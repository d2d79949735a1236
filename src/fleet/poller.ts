// src/fleet/poller.ts — Polling Scheduler: one-shot or fixed-delay continuous rounds
//
// States:
//   idle → running → idle                    (one-shot done)
//   idle → running → waiting → running ...   (continuous)
//   running | waiting → cancelled            (terminal)
//
// Cancellation during waiting cuts the wait short and no further round starts.
// Cancellation during running lets the bounded round finish, apply and render first.

import { EventEmitter } from "node:events"
import { FleetError, errorMessage } from "./errors.js"
import type { RoundRunner } from "./round.js"
import type { StatusStore } from "./status-store.js"
import type { Logger, RoundSnapshot, ServerDescriptor } from "./types.js"
import type { Renderer } from "../render/types.js"

export type PollMode =
  | { kind: "one-shot" }
  | { kind: "continuous"; delayMs: number }

export type PollerState = "idle" | "running" | "waiting" | "cancelled"

export interface PollerTransition {
  from: PollerState
  to: PollerState
}

export interface PollResult {
  state: PollerState
  rounds: number
  lastSnapshot?: RoundSnapshot
}

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>

export interface FleetPollerOptions {
  descriptors: readonly ServerDescriptor[]
  mode: PollMode
  perProbeTimeoutMs: number
  coordinator: RoundRunner
  store: StatusStore
  renderer: Renderer
  logger?: Logger
  clock?: () => number
  sleep?: Sleep
}

/** Resolve after `ms`, or as soon as `signal` aborts. Never rejects. */
export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve()
      return
    }
    const done = () => {
      clearTimeout(timer)
      signal.removeEventListener("abort", done)
      resolve()
    }
    const timer = setTimeout(done, ms)
    signal.addEventListener("abort", done, { once: true })
  })

export class FleetPoller extends EventEmitter {
  private readonly opts: FleetPollerOptions
  private readonly logger: Logger
  private readonly clock: () => number
  private readonly sleep: Sleep
  private readonly cancelController = new AbortController()
  private current: PollerState = "idle"
  private active = false

  constructor(opts: FleetPollerOptions) {
    super()
    this.opts = opts
    this.logger = opts.logger ?? console
    this.clock = opts.clock ?? Date.now
    this.sleep = opts.sleep ?? abortableSleep
  }

  get state(): PollerState {
    return this.current
  }

  /** Request cancellation. Observed at the next state boundary. */
  cancel(): void {
    this.cancelController.abort()
  }

  async run(signal?: AbortSignal): Promise<PollResult> {
    if (this.active || this.current === "cancelled") {
      throw new Error(`FleetPoller.run() called in state "${this.current}"`)
    }
    this.active = true

    const cancelled = this.cancelController.signal
    const forward = () => this.cancelController.abort()
    if (signal?.aborted) forward()
    signal?.addEventListener("abort", forward, { once: true })

    let rounds = 0
    let lastSnapshot: RoundSnapshot | undefined

    try {
      if (cancelled.aborted) {
        this.transition("cancelled")
        return { state: this.current, rounds }
      }

      for (;;) {
        this.transition("running")
        lastSnapshot = await this.runRound()
        rounds++

        if (cancelled.aborted) {
          this.transition("cancelled")
          break
        }
        if (this.opts.mode.kind === "one-shot") {
          this.transition("idle")
          break
        }

        const delayMs = this.opts.mode.delayMs
        this.transition("waiting")
        const nextRoundAt = this.clock() + delayMs
        await this.safeRender("waiting", () => this.opts.renderer.waiting?.(nextRoundAt, delayMs))
        await this.sleep(delayMs, cancelled)

        if (cancelled.aborted) {
          this.transition("cancelled")
          break
        }
      }
    } finally {
      signal?.removeEventListener("abort", forward)
      this.active = false
    }

    return { state: this.current, rounds, lastSnapshot }
  }

  private async runRound(): Promise<RoundSnapshot> {
    const { descriptors, perProbeTimeoutMs, coordinator, store, renderer } = this.opts
    const round = store.view().round + 1

    await this.safeRender("roundStarted", () => renderer.roundStarted?.(round, descriptors))

    const snapshot = await coordinator.runRound(descriptors, perProbeTimeoutMs)
    store.apply(snapshot)
    this.emit("round", snapshot)

    await this.safeRender("renderRound", () => renderer.renderRound(snapshot, store.view()))
    return snapshot
  }

  /** Renderer failures are logged and never stop the loop. */
  private async safeRender(stage: string, fn: () => void | Promise<void>): Promise<void> {
    try {
      await fn()
    } catch (err) {
      this.logger.error(`[poller] ${stage} failed: ${errorMessage(err)}`)
      this.emit("render-error", new FleetError("RENDER_FAILED", `${stage}: ${errorMessage(err)}`, { stage }))
    }
  }

  private transition(to: PollerState): void {
    const from = this.current
    if (from === to) return
    this.current = to
    const event: PollerTransition = { from, to }
    this.emit("transition", event)
  }
}
