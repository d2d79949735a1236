// src/fleet/types.ts — Fleet probe data model

// --- Server descriptors ---

export type ApiKeyRef =
  | { kind: "env"; name: string }
  | { kind: "literal"; value: string }

export interface ServerDescriptor {
  readonly id: string              // configured shortname, unique per config load
  readonly hostLabel: string       // e.g., "rbdgx2", "api.openai.com"
  readonly apiBaseUrl: string      // e.g., "http://127.0.0.1:1234/v1"
  readonly apiKeyRef: ApiKeyRef
  readonly model: string
}

// --- Probe outcomes ---

export type ProbeStatus =
  | "success"
  | "timeout"
  | "connection_error"
  | "protocol_error"
  | "auth_error"

export type FailureStatus = Exclude<ProbeStatus, "success">

export interface TokenUsage {
  promptTokens?: number
  completionTokens?: number
  totalTokens?: number
}

interface ProbeOutcomeBase {
  readonly serverId: string
  readonly issuedAt: number        // epoch ms at dispatch
  readonly durationMs: number
}

export interface SuccessOutcome extends ProbeOutcomeBase {
  readonly status: "success"
  /** null when the provider did not report usage. */
  readonly tokenCount: number | null
  readonly usage?: Readonly<TokenUsage>
  readonly emptyCompletion: boolean
}

export interface FailureOutcome extends ProbeOutcomeBase {
  readonly status: FailureStatus
  readonly errorDetail: string
  readonly httpStatus?: number
}

export type ProbeOutcome = SuccessOutcome | FailureOutcome

export function isSuccess(outcome: ProbeOutcome): outcome is SuccessOutcome {
  return outcome.status === "success"
}

// --- Rounds ---

export interface RoundSnapshot {
  readonly roundId: string
  readonly round: number
  readonly startedAt: number
  readonly completedAt: number
  /** One entry per configured server, in configured order. */
  readonly outcomes: readonly ProbeOutcome[]
}

// --- Aggregated status ---

export interface ServerStatus {
  readonly descriptor: ServerDescriptor
  readonly lastOutcome: ProbeOutcome
  readonly consecutiveFailures: number
  readonly totalRounds: number
  readonly totalSuccesses: number
  readonly totalFailures: number
  readonly lastSuccessAt?: number
}

export interface FleetView {
  /** Number of rounds applied so far. */
  readonly round: number
  readonly updatedAt: number | null
  readonly servers: readonly ServerStatus[]
}

export type Logger = Pick<Console, "log" | "warn" | "error">
