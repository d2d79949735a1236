// src/fleet/index.ts — Fleet probe engine barrel export

export { ProbeExecutor, chatCompletionsUrl, DEFAULT_PROBE_PROMPT, DEFAULT_PROBE_MAX_TOKENS } from "./probe.js"
export type { Prober, ProbeOptions, ProbeExecutorConfig } from "./probe.js"
export { RoundCoordinator } from "./round.js"
export type { RoundCoordinatorOptions, RoundRunner } from "./round.js"
export { StatusStore, nextStatus, successRate } from "./status-store.js"
export { FleetPoller, abortableSleep } from "./poller.js"
export type { FleetPollerOptions, PollMode, PollResult, PollerState, PollerTransition, Sleep } from "./poller.js"
export { loadServerConfig, parseServerConfig, filterServers, parseApiKeyRef, resolveApiKey } from "./server-config.js"
export type { ServerFilter } from "./server-config.js"
export { FleetError } from "./errors.js"
export type { FleetErrorCode } from "./errors.js"
export { isSuccess } from "./types.js"
export type {
  ApiKeyRef,
  FailureOutcome,
  FailureStatus,
  FleetView,
  Logger,
  ProbeOutcome,
  ProbeStatus,
  RoundSnapshot,
  ServerDescriptor,
  ServerStatus,
  SuccessOutcome,
  TokenUsage,
} from "./types.js"
