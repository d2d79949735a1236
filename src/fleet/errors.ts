// src/fleet/errors.ts — Typed error class for fatal and best-effort failures

/**
 * Error codes. Per-probe failures are never thrown; they are recorded as
 * ProbeOutcome values instead.
 */
export type FleetErrorCode =
  | "CONFIG_NOT_FOUND"
  | "CONFIG_INVALID"
  | "DUPLICATE_SERVER_ID"
  | "NO_SERVERS"
  | "USAGE_INVALID"
  | "RENDER_FAILED"

const CONFIG_CODES: ReadonlySet<FleetErrorCode> = new Set([
  "CONFIG_NOT_FOUND",
  "CONFIG_INVALID",
  "DUPLICATE_SERVER_ID",
  "NO_SERVERS",
])

export class FleetError extends Error {
  readonly name = "FleetError"
  readonly code: FleetErrorCode
  readonly context: Record<string, unknown>

  constructor(code: FleetErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(`[fleet-probe] ${code}: ${message}`)
    this.code = code
    this.context = context
  }

  /** Config errors abort startup before any round runs. */
  get isConfigError(): boolean {
    return CONFIG_CODES.has(this.code)
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    }
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
