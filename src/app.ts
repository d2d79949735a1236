// src/app.ts — Wires config, engine, renderer and optional status endpoint for one run

import { serve } from "@hono/node-server"
import { FleetPoller, type PollMode, type PollResult } from "./fleet/poller.js"
import { ProbeExecutor } from "./fleet/probe.js"
import { RoundCoordinator } from "./fleet/round.js"
import { StatusStore } from "./fleet/status-store.js"
import { createStatusApp } from "./gateway/status-routes.js"
import { createRenderer, type KeyInput, type TerminalOutput } from "./render/index.js"
import type { RunSettings } from "./cli-args.js"
import type { Logger, ServerDescriptor } from "./fleet/types.js"

export const EXIT_OK = 0
export const EXIT_CONFIG_ERROR = 1
export const EXIT_ALL_FAILED = 2

export interface RunDeps {
  /** Process-wide cancellation shared by the poller and the interactive renderer */
  cancel: AbortController
  output: TerminalOutput
  input?: KeyInput
  /** Line sink for the console renderer */
  out?: Pick<Console, "log">
  fetch?: typeof globalThis.fetch
  color?: boolean
  logger?: Logger
  /** Starts the status HTTP server; returns its close function. */
  startStatusServer?: (app: ReturnType<typeof createStatusApp>, port: number) => () => Promise<void>
}

export interface RunReport {
  exitCode: number
  result: PollResult
}

/** Non-zero only when a one-shot round saw every server fail. A cancelled run exits cleanly. */
export function exitCodeFor(mode: PollMode, result: PollResult): number {
  const snapshot = result.lastSnapshot
  if (mode.kind === "one-shot" && result.state !== "cancelled" && snapshot && snapshot.outcomes.length > 0
    && snapshot.outcomes.every((o) => o.status !== "success")) {
    return EXIT_ALL_FAILED
  }
  return EXIT_OK
}

function defaultStatusServer(app: ReturnType<typeof createStatusApp>, port: number): () => Promise<void> {
  const server = serve({ fetch: app.fetch, port })
  return () => new Promise<void>((resolve) => {
    server.close(() => resolve())
  })
}

function untilAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve()
  return new Promise<void>((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true })
  })
}

export async function runFleetProbe(
  settings: RunSettings,
  descriptors: readonly ServerDescriptor[],
  deps: RunDeps,
): Promise<RunReport> {
  const store = new StatusStore(descriptors)
  const renderer = createRenderer(settings.renderer, {
    source: store,
    cancel: deps.cancel,
    output: deps.output,
    input: deps.input,
    out: deps.out,
    tickMs: settings.refreshTickMs,
    color: deps.color,
  })
  const logger = renderer.interactive ? renderer.logger : (deps.logger ?? console)

  const coordinator = new RoundCoordinator({
    prober: new ProbeExecutor({
      prompt: settings.probe.prompt,
      maxTokens: settings.probe.maxTokens,
      fetch: deps.fetch,
    }),
    logger,
  })

  const poller = new FleetPoller({
    descriptors,
    mode: settings.mode,
    perProbeTimeoutMs: settings.perProbeTimeoutMs,
    coordinator,
    store,
    renderer,
    logger,
  })

  let stopServer: (() => Promise<void>) | undefined
  if (settings.statusPort !== null) {
    const app = createStatusApp({ source: store, getPollerState: () => poller.state })
    stopServer = (deps.startStatusServer ?? defaultStatusServer)(app, settings.statusPort)
    logger.log(`[fleet-probe] status endpoint listening on :${settings.statusPort}`)
  }

  const modeText = settings.mode.kind === "continuous"
    ? `every ${Math.round(settings.mode.delayMs / 1000)}s`
    : "once"
  logger.log(`[fleet-probe] probing ${descriptors.length} server(s) ${modeText}, timeout ${settings.perProbeTimeoutMs}ms`)

  renderer.start?.()
  let result: PollResult
  try {
    result = await poller.run(deps.cancel.signal)

    // Keep the screen (and status endpoint) up after a one-shot round until the user quits.
    if (result.state !== "cancelled" && (renderer.interactive || stopServer)) {
      await untilAborted(deps.cancel.signal)
    }
  } finally {
    renderer.stop?.()
    if (renderer.interactive) await renderer.closed()
    if (stopServer) await stopServer()
  }

  return { exitCode: exitCodeFor(settings.mode, result), result }
}
