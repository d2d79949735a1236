// src/render/format.ts — Shared text formatting for the console and interactive renderers

import { successRate } from "../fleet/status-store.js"
import type { ProbeOutcome, ProbeStatus, ServerStatus } from "../fleet/types.js"

export const ANSI = {
  green: "\x1b[92m",
  red: "\x1b[91m",
  blue: "\x1b[94m",
  cyan: "\x1b[96m",
  yellow: "\x1b[93m",
  dim: "\x1b[2m",
  bold: "\x1b[1m",
  reset: "\x1b[0m",
} as const

export type Tone = keyof typeof ANSI

export function paint(text: string, tone: Tone, color: boolean): string {
  return color ? `${ANSI[tone]}${text}${ANSI.reset}` : text
}

const STATUS_LABELS: Record<ProbeStatus, string> = {
  success: "OK",
  timeout: "TIMEOUT",
  connection_error: "CONNECTION ERROR",
  protocol_error: "PROTOCOL ERROR",
  auth_error: "AUTH ERROR",
}

export function statusLabel(status: ProbeStatus): string {
  return STATUS_LABELS[status]
}

export function statusTone(status: ProbeStatus): Tone {
  return status === "success" ? "green" : "red"
}

export function formatDuration(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`
}

/** Token count, or "unknown" when the provider did not report usage. */
export function formatTokens(outcome: ProbeOutcome): string {
  if (outcome.status !== "success") return "-"
  return outcome.tokenCount === null ? "unknown" : String(outcome.tokenCount)
}

/** One-line result, e.g. "OK in 0.05s, tokens: 12". */
export function describeOutcome(outcome: ProbeOutcome): string {
  if (outcome.status === "success") {
    const empty = outcome.emptyCompletion ? " (empty completion)" : ""
    return `OK in ${formatDuration(outcome.durationMs)}, tokens: ${formatTokens(outcome)}${empty}`
  }
  return `${statusLabel(outcome.status)} after ${formatDuration(outcome.durationMs)}: ${outcome.errorDetail}`
}

/** e.g. "3/4 rounds ok (75%), consecutive failures: 1" */
export function describeHealth(status: ServerStatus): string {
  const rate = successRate(status)
  return `${status.totalSuccesses}/${status.totalRounds} rounds ok (${rate ?? 0}%), consecutive failures: ${status.consecutiveFailures}`
}

/** "[====      ]" for fraction 0.4 at width 10. Fraction is clamped to [0, 1]. */
export function progressBar(fraction: number, width = 20): string {
  const clamped = Math.min(1, Math.max(0, fraction))
  const filled = Math.floor(width * clamped)
  return `[${"=".repeat(filled)}${" ".repeat(width - filled)}]`
}

/** Countdown line shown while waiting for the next round. */
export function describeCountdown(now: number, nextRoundAt: number, delayMs: number): string {
  const remainingMs = Math.max(0, nextRoundAt - now)
  const elapsed = delayMs > 0 ? (delayMs - remainingMs) / delayMs : 1
  const percent = Math.floor(Math.min(1, Math.max(0, elapsed)) * 100)
  return `NEXT ROUND: ${Math.ceil(remainingMs / 1000)}s remaining ${progressBar(elapsed)} ${percent}%`
}

export function clockTime(ms: number): string {
  return new Date(ms).toTimeString().slice(0, 8)
}

export function truncate(text: string, width: number): string {
  if (width <= 0) return ""
  if (text.length <= width) return text
  if (width <= 3) return text.slice(0, width)
  return `${text.slice(0, width - 3)}...`
}
