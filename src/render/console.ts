// src/render/console.ts — Console renderer: one text report per round

import { describeHealth, describeOutcome, formatDuration, paint, statusTone, clockTime } from "./format.js"
import type { Renderer } from "./types.js"
import type { FleetView, RoundSnapshot, ServerStatus } from "../fleet/types.js"

const RULE_WIDTH = 60

export interface ConsoleRendererOptions {
  out?: Pick<Console, "log">
  color?: boolean
}

export class ConsoleRenderer implements Renderer {
  readonly interactive = false
  private readonly out: Pick<Console, "log">
  private readonly color: boolean
  start?(): void
  stop?(): void

  constructor(opts: ConsoleRendererOptions = {}) {
    this.out = opts.out ?? console
    this.color = opts.color ?? false
  }

  renderRound(snapshot: RoundSnapshot, view: FleetView): void {
    for (const line of this.formatRound(snapshot, view)) {
      this.out.log(line)
    }
  }

  waiting(_nextRoundAt: number, delayMs: number): void {
    this.out.log(paint(`Waiting ${Math.round(delayMs / 1000)}s before next round... Press Ctrl+C to exit`, "bold", this.color))
  }

  /** Report lines for one round, in configured server order. */
  formatRound(snapshot: RoundSnapshot, view: FleetView): string[] {
    const lines: string[] = []
    const byId = new Map<string, ServerStatus>(view.servers.map((s) => [s.descriptor.id, s]))

    lines.push(paint("=".repeat(RULE_WIDTH), "yellow", this.color))
    lines.push(paint(
      `ROUND ${snapshot.round} | ${clockTime(snapshot.startedAt)} | ${formatDuration(snapshot.completedAt - snapshot.startedAt)}`,
      "yellow",
      this.color,
    ))
    lines.push(paint("=".repeat(RULE_WIDTH), "yellow", this.color))

    for (const outcome of snapshot.outcomes) {
      const status = byId.get(outcome.serverId)
      const tag = paint(`[${outcome.serverId}]`, "bold", this.color)
      if (status) {
        const d = status.descriptor
        lines.push(paint(`SERVER: ${d.id} (${d.model})`, "cyan", this.color))
        lines.push(`${tag} ${d.hostLabel} | ${d.apiBaseUrl}`)
      }
      lines.push(`${tag} ${paint(describeOutcome(outcome), statusTone(outcome.status), this.color)}`)
      if (status) {
        lines.push(`${tag} ${describeHealth(status)}`)
      }
      lines.push("-".repeat(RULE_WIDTH))
    }

    const failed = snapshot.outcomes.filter((o) => o.status !== "success").length
    const total = snapshot.outcomes.length
    lines.push(failed === 0
      ? paint("SUMMARY: All probes passed", "green", this.color)
      : paint(`SUMMARY: ${failed} of ${total} servers failed`, "red", this.color))

    return lines
  }
}
