// tests/cli-args.test.ts — Argument parsing and settings resolution

import { describe, it, expect } from "vitest"
import { USAGE, parseCliArgs, resolveSettings } from "../src/cli-args.js"
import { loadConfig } from "../src/config.js"
import { FleetError } from "../src/fleet/errors.js"

function usageError(args: string[]): string {
  try {
    parseCliArgs(args)
  } catch (err) {
    if (err instanceof FleetError && err.code === "USAGE_INVALID") return err.message
    throw err
  }
  return "no error"
}

describe("parseCliArgs", () => {
  it("defaults to the interactive single round", () => {
    expect(parseCliArgs([])).toEqual({ help: false, console: false, localOnly: false })
  })

  it("reads flags in both spellings", () => {
    expect(parseCliArgs([
      "--config", "servers.yaml",
      "--console",
      "--delay=30",
      "--timeout", "2.5",
      "--only", "a, b,",
      "--local-only",
      "--serve=9090",
    ])).toEqual({
      help: false,
      console: true,
      localOnly: true,
      configPath: "servers.yaml",
      delaySec: 30,
      timeoutSec: 2.5,
      only: ["a", "b"],
      servePort: 9090,
    })
  })

  it("recognizes help", () => {
    expect(parseCliArgs(["-h"]).help).toBe(true)
  })

  it("documents exit codes in the usage text", () => {
    expect(USAGE.split("\n").slice(-4)).toEqual([
      "Exit codes:",
      "  0  clean run, or a run cancelled by Ctrl+C / SIGTERM before it finished",
      "  1  configuration or usage error",
      "  2  single round in which every server failed",
    ])
  })

  it("rejects bad input", () => {
    expect(usageError(["--bogus"])).toBe('[fleet-probe] USAGE_INVALID: Unknown argument "--bogus"')
    expect(usageError(["--delay"])).toBe("[fleet-probe] USAGE_INVALID: --delay requires a value")
    expect(usageError(["--timeout", "0"])).toBe("[fleet-probe] USAGE_INVALID: --timeout must be greater than 0")
    expect(usageError(["--delay", "-5"]))
      .toBe('[fleet-probe] USAGE_INVALID: --delay expects a non-negative number of seconds (got "-5")')
    expect(usageError(["--serve", "70000"]))
      .toBe('[fleet-probe] USAGE_INVALID: --serve expects a port number (got "70000")')
  })
})

describe("resolveSettings", () => {
  const config = loadConfig({})

  it("runs once with environment defaults", () => {
    const settings = resolveSettings(parseCliArgs([]), config)
    expect(settings).toMatchObject({
      configPath: "model_servers.yaml",
      renderer: "interactive",
      mode: { kind: "one-shot" },
      perProbeTimeoutMs: 30_000,
      statusPort: null,
    })
  })

  it("lets flags override the environment", () => {
    const settings = resolveSettings(
      parseCliArgs(["--console", "--delay", "1.5", "--timeout", "2", "--config", "x.yaml"]),
      loadConfig({ FLEET_POLL_DELAY_MS: "60000" }),
    )
    expect(settings).toMatchObject({
      configPath: "x.yaml",
      renderer: "console",
      mode: { kind: "continuous", delayMs: 1_500 },
      perProbeTimeoutMs: 2_000,
    })
  })

  it("treats a zero delay as a single round", () => {
    const settings = resolveSettings(parseCliArgs(["--delay", "0"]), loadConfig({ FLEET_POLL_DELAY_MS: "5000" }))
    expect(settings.mode).toEqual({ kind: "one-shot" })
  })

  it("passes the server filter through", () => {
    const settings = resolveSettings(parseCliArgs(["--only", "a", "--local-only"]), config)
    expect(settings.filter).toEqual({ only: ["a"], localOnly: true })
  })
})
