// tests/helpers/fleet.ts — Builders for descriptors, outcomes and snapshots

import type {
  FailureOutcome,
  FailureStatus,
  ProbeOutcome,
  RoundSnapshot,
  ServerDescriptor,
  SuccessOutcome,
} from "../../src/fleet/types.js"

export function server(id: string, overrides: Partial<ServerDescriptor> = {}): ServerDescriptor {
  return {
    id,
    hostLabel: `host-${id}`,
    apiBaseUrl: `http://${id}.test/v1`,
    apiKeyRef: { kind: "env", name: "TEST_KEY" },
    model: `model-${id}`,
    ...overrides,
  }
}

export function success(
  serverId: string,
  overrides: Partial<Omit<SuccessOutcome, "status" | "serverId">> = {},
): SuccessOutcome {
  return {
    serverId,
    issuedAt: 1_000,
    durationMs: 50,
    status: "success",
    tokenCount: 12,
    emptyCompletion: false,
    ...overrides,
  }
}

export function failure(
  serverId: string,
  status: FailureStatus = "timeout",
  overrides: Partial<Omit<FailureOutcome, "status" | "serverId">> = {},
): FailureOutcome {
  return {
    serverId,
    issuedAt: 1_000,
    durationMs: 2_000,
    status,
    errorDetail: "no result within 2000ms",
    ...overrides,
  }
}

export function snapshot(round: number, outcomes: ProbeOutcome[], startedAt = 1_000): RoundSnapshot {
  return {
    roundId: `round-${round}`,
    round,
    startedAt,
    completedAt: startedAt + 2_000,
    outcomes,
  }
}

export function recordingLogger() {
  const lines: string[] = []
  const push = (...args: unknown[]) => {
    lines.push(args.map(String).join(" "))
  }
  return { lines, logger: { log: push, warn: push, error: push } }
}
