// tests/app.test.ts — One full run through config, engine, renderer and status endpoint

import { describe, it, expect, vi } from "vitest"
import { EXIT_ALL_FAILED, EXIT_OK, exitCodeFor, runFleetProbe } from "../src/app.js"
import { createStatusApp } from "../src/gateway/status-routes.js"
import type { RunSettings } from "../src/cli-args.js"
import { failure, recordingLogger, server, snapshot, success } from "./helpers/fleet.js"

const SERVERS = [
  server("a", { apiKeyRef: { kind: "literal", value: "test-secret" } }),
  server("b", { apiKeyRef: { kind: "literal", value: "test-secret" } }),
]

const SETTINGS: RunSettings = {
  configPath: "model_servers.yaml",
  renderer: "console",
  mode: { kind: "one-shot" },
  perProbeTimeoutMs: 1_000,
  filter: {},
  statusPort: null,
  refreshTickMs: 250,
  probe: { prompt: "What is 2+2?", maxTokens: 16 },
}

const COMPLETION = JSON.stringify({
  choices: [{ message: { content: "4" } }],
  usage: { total_tokens: 9 },
})

/** Server "a" answers; any other host returns `failStatus`. */
function fleetFetch(failStatus = 500) {
  return vi.fn(async (input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    const url = String(input)
    if (url === "http://a.test/v1/chat/completions") {
      return new Response(COMPLETION, { status: 200 })
    }
    return new Response("upstream unavailable", { status: failStatus })
  })
}

function deps(fetch: ReturnType<typeof fleetFetch>) {
  const out = { log: vi.fn() }
  const { lines, logger } = recordingLogger()
  return { out, lines, base: { cancel: new AbortController(), output: { write: vi.fn() }, out, fetch, logger } }
}

describe("runFleetProbe", () => {
  it("runs one round and exits cleanly when a server answers", async () => {
    const { out, lines, base } = deps(fleetFetch())

    const report = await runFleetProbe(SETTINGS, SERVERS, base)

    expect(report.exitCode).toBe(EXIT_OK)
    expect(report.result.state).toBe("idle")
    expect(report.result.lastSnapshot?.outcomes.map((o) => o.status)).toEqual(["success", "protocol_error"])
    expect(lines).toContain("[fleet-probe] probing 2 server(s) once, timeout 1000ms")
    expect(out.log).toHaveBeenCalledWith(expect.stringMatching(/^\[a\] OK in \d+\.\d{2}s, tokens: 9$/))
    expect(out.log).toHaveBeenLastCalledWith("SUMMARY: 1 of 2 servers failed")
  })

  it("exits with the all-failed code when every server fails", async () => {
    const fetch = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> =>
      new Response("nope", { status: 401 }))
    const { out, base } = deps(fetch)

    const report = await runFleetProbe(SETTINGS, SERVERS, base)

    expect(report.exitCode).toBe(EXIT_ALL_FAILED)
    expect(out.log).toHaveBeenCalledWith(expect.stringMatching(/^\[b\] AUTH ERROR after \d+\.\d{2}s: HTTP 401: nope$/))
  })

  it("serves status until cancelled", async () => {
    const { out, lines, base } = deps(fleetFetch())
    const close = vi.fn(async () => {})
    let app: ReturnType<typeof createStatusApp> | undefined
    const startStatusServer = vi.fn((served: ReturnType<typeof createStatusApp>, _port: number) => {
      app = served
      return close
    })

    const pending = runFleetProbe({ ...SETTINGS, statusPort: 0 }, SERVERS, { ...base, startStatusServer })
    await vi.waitFor(() => expect(out.log).toHaveBeenCalledWith("SUMMARY: 1 of 2 servers failed"))

    expect(startStatusServer).toHaveBeenCalledWith(expect.anything(), 0)
    expect(lines).toContain("[fleet-probe] status endpoint listening on :0")
    const res = await app?.request("/health")
    expect(await res?.json()).toMatchObject({ status: "degraded", round: 1, poller: "idle" })
    expect(close).not.toHaveBeenCalled()

    base.cancel.abort()
    const report = await pending
    expect(report.exitCode).toBe(EXIT_OK)
    expect(close).toHaveBeenCalledOnce()
  })
})

describe("exitCodeFor", () => {
  it("only fails a one-shot round where nothing succeeded", () => {
    const allFailed = { state: "idle" as const, rounds: 1, lastSnapshot: snapshot(1, [failure("a"), failure("b")]) }
    const mixed = { state: "idle" as const, rounds: 1, lastSnapshot: snapshot(1, [success("a"), failure("b")]) }

    expect(exitCodeFor({ kind: "one-shot" }, allFailed)).toBe(EXIT_ALL_FAILED)
    expect(exitCodeFor({ kind: "one-shot" }, mixed)).toBe(EXIT_OK)
    expect(exitCodeFor({ kind: "continuous", delayMs: 1_000 }, allFailed)).toBe(EXIT_OK)
    expect(exitCodeFor({ kind: "one-shot" }, { state: "cancelled", rounds: 0 })).toBe(EXIT_OK)
  })

  it("treats a cancelled one-shot run as a clean shutdown even if every server failed", () => {
    const cancelled = { state: "cancelled" as const, rounds: 1, lastSnapshot: snapshot(1, [failure("a"), failure("b")]) }
    expect(exitCodeFor({ kind: "one-shot" }, cancelled)).toBe(EXIT_OK)
  })
})
