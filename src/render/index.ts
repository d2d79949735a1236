// src/render/index.ts — Renderer module barrel export and startup selection

import { ConsoleRenderer } from "./console.js"
import { InteractiveRenderer, type FleetViewSource, type KeyInput, type TerminalOutput } from "./interactive.js"
import type { RendererKind } from "./types.js"

export { ConsoleRenderer } from "./console.js"
export type { ConsoleRendererOptions } from "./console.js"
export { InteractiveRenderer, buildFrame } from "./interactive.js"
export type { FleetViewSource, FrameInput, InteractiveRendererOptions, KeyInput, Phase, TerminalOutput } from "./interactive.js"
export type { Renderer, RendererKind } from "./types.js"

export interface RendererDeps {
  source: FleetViewSource
  cancel: AbortController
  output: TerminalOutput
  input?: KeyInput
  out?: Pick<Console, "log">
  tickMs?: number
  color?: boolean
}

/** Chosen once at startup; the rest of the program only sees the Renderer interface. */
export function createRenderer(kind: RendererKind, deps: RendererDeps): ConsoleRenderer | InteractiveRenderer {
  switch (kind) {
    case "console":
      return new ConsoleRenderer({ out: deps.out, color: deps.color })
    case "interactive":
      return new InteractiveRenderer({
        source: deps.source,
        cancel: deps.cancel,
        output: deps.output,
        input: deps.input,
        tickMs: deps.tickMs,
        color: deps.color,
      })
  }
}
