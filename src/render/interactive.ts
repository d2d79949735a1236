// src/render/interactive.ts — Full-screen auto-refreshing terminal renderer
//
// Refresh loop: draw, then wait for whichever comes first of the tick timer, a
// wake-up (round started/finished, key, resize) or cancellation. Reads always go
// through the status source, never through a live store reference.

import {
  clockTime,
  describeCountdown,
  describeHealth,
  describeOutcome,
  formatDuration,
  paint,
  statusTone,
  truncate,
} from "./format.js"
import type { Renderer } from "./types.js"
import type { FleetView, Logger, RoundSnapshot, ServerDescriptor } from "../fleet/types.js"

const DEFAULT_TICK_MS = 250
const DEFAULT_WIDTH = 80
const MAX_NOTICES = 3

const ENTER_SCREEN = "\x1b[?1049h\x1b[?25l"
const LEAVE_SCREEN = "\x1b[?25h\x1b[?1049l"
const HOME_AND_CLEAR = "\x1b[H\x1b[2J"

export interface KeyInfo {
  name?: string
  ctrl?: boolean
}

export type KeyListener = (str: string | undefined, key: KeyInfo | undefined) => void

/** Keypress source (process.stdin after readline.emitKeypressEvents). */
export interface KeyInput {
  on(event: "keypress", listener: KeyListener): unknown
  off(event: "keypress", listener: KeyListener): unknown
  setRawMode?(mode: boolean): unknown
  isTTY?: boolean
  resume?(): unknown
  pause?(): unknown
}

export interface TerminalOutput {
  write(chunk: string): unknown
  columns?: number
  on?(event: "resize", listener: () => void): unknown
  off?(event: "resize", listener: () => void): unknown
}

export interface FleetViewSource {
  view(): FleetView
  configured(): ServerDescriptor[]
}

export type Phase =
  | { kind: "starting" }
  | { kind: "running"; round: number; since: number }
  | { kind: "done"; round: number; failed: number; total: number }
  | { kind: "waiting"; nextRoundAt: number; delayMs: number }

export interface FrameInput {
  view: FleetView
  configured: readonly ServerDescriptor[]
  phase: Phase
  now: number
  width: number
  notices: readonly string[]
  color: boolean
}

function footerMessage(phase: Phase, now: number): string {
  switch (phase.kind) {
    case "starting":
      return "Ready to start probes..."
    case "running":
      return `Probing all servers (round ${phase.round}, ${formatDuration(now - phase.since)} elapsed)...`
    case "done":
      return phase.failed === 0
        ? "All probes passed"
        : `${phase.failed} of ${phase.total} servers failed`
    case "waiting":
      return describeCountdown(now, phase.nextRoundAt, phase.delayMs)
  }
}

/** Build one screen worth of lines. Pure; the renderer only writes them out. */
export function buildFrame(input: FrameInput): string[] {
  const { view, configured, phase, now, width, color } = input
  const fit = (text: string) => truncate(text, width)
  const lines: string[] = []

  const round = phase.kind === "running" ? phase.round : view.round
  const title = round > 0 ? `MODEL SERVER PROBES - ROUND ${round}` : "MODEL SERVER PROBES"
  lines.push(paint(fit(title), "bold", color))
  lines.push("=".repeat(Math.max(0, width)))

  const byId = new Map(view.servers.map((s) => [s.descriptor.id, s]))
  for (const d of configured) {
    const status = byId.get(d.id)
    lines.push(paint(fit(`[${d.id}] ${d.hostLabel} | ${d.apiBaseUrl}`), "cyan", color))
    lines.push(fit(`  Model: ${d.model}`))

    if (phase.kind === "running") {
      lines.push(paint(fit("  Status: PROBING..."), "blue", color))
    } else if (!status) {
      lines.push(fit("  Status: WAITING"))
    } else {
      const outcome = status.lastOutcome
      lines.push(paint(fit(`  Status: ${describeOutcome(outcome)}`), statusTone(outcome.status), color))
    }
    if (status) {
      lines.push(fit(`  Health: ${describeHealth(status)}`))
    }
    lines.push("")
  }

  lines.push("-".repeat(Math.max(0, width)))
  const tone = phase.kind === "done" ? (phase.failed === 0 ? "green" : "red") : "yellow"
  lines.push(paint(fit(`[${clockTime(now)}] ${footerMessage(phase, now)}`), tone, color))
  for (const notice of input.notices) {
    lines.push(paint(fit(notice), "dim", color))
  }
  lines.push(fit("Press 'q' to quit, 'r' to refresh"))
  return lines
}

export interface InteractiveRendererOptions {
  source: FleetViewSource
  /** Shared cancellation; quitting aborts it, and its abort stops the refresh loop. */
  cancel: AbortController
  output: TerminalOutput
  input?: KeyInput
  tickMs?: number
  clock?: () => number
  color?: boolean
}

export class InteractiveRenderer implements Renderer {
  readonly interactive = true
  readonly logger: Logger

  private readonly opts: InteractiveRendererOptions
  private readonly tickMs: number
  private readonly clock: () => number
  private phase: Phase = { kind: "starting" }
  private notices: string[] = []
  private wakeUp: (() => void) | null = null
  private started = false
  private stopped = false
  private loop: Promise<void> | null = null
  private draws = 0

  private readonly onKey: KeyListener = (str, key) => this.handleKey(key?.name ?? str, key?.ctrl ?? false)
  private readonly onResize = () => this.wake()
  private readonly onAbort = () => this.stop()

  constructor(opts: InteractiveRendererOptions) {
    this.opts = opts
    this.tickMs = opts.tickMs ?? DEFAULT_TICK_MS
    this.clock = opts.clock ?? Date.now
    this.logger = {
      log: (...args: unknown[]) => this.notice(args.map(String).join(" ")),
      warn: (...args: unknown[]) => this.notice(args.map(String).join(" ")),
      error: (...args: unknown[]) => this.notice(args.map(String).join(" ")),
    }
  }

  /** Number of frames written so far. */
  get drawCount(): number {
    return this.draws
  }

  get currentPhase(): Phase {
    return this.phase
  }

  start(): void {
    if (this.started) return
    this.started = true

    const { input, output, cancel } = this.opts
    if (cancel.signal.aborted) {
      this.stopped = true
      return
    }
    cancel.signal.addEventListener("abort", this.onAbort, { once: true })

    if (input) {
      if (input.isTTY) input.setRawMode?.(true)
      input.on("keypress", this.onKey)
      input.resume?.()
    }
    output.on?.("resize", this.onResize)
    output.write(ENTER_SCREEN)

    this.loop = this.refreshLoop()
  }

  stop(): void {
    if (!this.started || this.stopped) return
    this.stopped = true

    const { input, output, cancel } = this.opts
    cancel.signal.removeEventListener("abort", this.onAbort)
    if (input) {
      input.off("keypress", this.onKey)
      if (input.isTTY) input.setRawMode?.(false)
      input.pause?.()
    }
    output.off?.("resize", this.onResize)
    this.wake()
    output.write(LEAVE_SCREEN)
  }

  /** Resolves once the refresh loop has exited. */
  async closed(): Promise<void> {
    await this.loop
  }

  roundStarted(round: number, _servers: readonly ServerDescriptor[]): void {
    this.phase = { kind: "running", round, since: this.clock() }
    this.wake()
  }

  renderRound(snapshot: RoundSnapshot, _view: FleetView): void {
    const failed = snapshot.outcomes.filter((o) => o.status !== "success").length
    this.phase = { kind: "done", round: snapshot.round, failed, total: snapshot.outcomes.length }
    this.wake()
  }

  waiting(nextRoundAt: number, delayMs: number): void {
    this.phase = { kind: "waiting", nextRoundAt, delayMs }
    this.wake()
  }

  /** Show a log line in the footer instead of writing over the screen. */
  notice(line: string): void {
    this.notices.push(`[${clockTime(this.clock())}] ${line}`)
    if (this.notices.length > MAX_NOTICES) {
      this.notices = this.notices.slice(-MAX_NOTICES)
    }
    this.wake()
  }

  handleKey(name: string | undefined, ctrl: boolean): void {
    if (name === "q" || (ctrl && name === "c")) {
      this.opts.cancel.abort()
    } else if (name === "r") {
      this.wake()
    }
  }

  private wake(): void {
    const resolve = this.wakeUp
    this.wakeUp = null
    resolve?.()
  }

  private async refreshLoop(): Promise<void> {
    while (!this.stopped) {
      this.draw()
      await new Promise<void>((resolve) => {
        const timer = setTimeout(() => {
          this.wakeUp = null
          resolve()
        }, this.tickMs)
        this.wakeUp = () => {
          clearTimeout(timer)
          resolve()
        }
      })
    }
  }

  private draw(): void {
    const { source, output } = this.opts
    const lines = buildFrame({
      view: source.view(),
      configured: source.configured(),
      phase: this.phase,
      now: this.clock(),
      width: output.columns ?? DEFAULT_WIDTH,
      notices: this.notices,
      color: this.opts.color ?? false,
    })
    output.write(HOME_AND_CLEAR + lines.join("\n"))
    this.draws++
  }
}
