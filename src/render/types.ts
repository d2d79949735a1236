// src/render/types.ts — Renderer capability interface

import type { FleetView, RoundSnapshot, ServerDescriptor } from "../fleet/types.js"

/**
 * A renderer only formats. It receives frozen snapshots and views and never
 * mutates store state. Hooks other than renderRound are optional.
 */
export interface Renderer {
  readonly interactive: boolean
  start?(): void
  roundStarted?(round: number, servers: readonly ServerDescriptor[]): void
  renderRound(snapshot: RoundSnapshot, view: FleetView): void | Promise<void>
  waiting?(nextRoundAt: number, delayMs: number): void
  stop?(): void
}

export type RendererKind = "console" | "interactive"
