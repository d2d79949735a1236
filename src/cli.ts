#!/usr/bin/env node
// src/cli.ts — fleet-probe CLI entry point
// Usage: fleet-probe [--config path] [--console] [--delay s] [--timeout s] [--only a,b] [--local-only] [--serve port]

import { emitKeypressEvents } from "node:readline"
import { loadConfig } from "./config.js"
import { USAGE, parseCliArgs, resolveSettings } from "./cli-args.js"
import { EXIT_CONFIG_ERROR, runFleetProbe } from "./app.js"
import type { RunSettings } from "./cli-args.js"
import type { ServerDescriptor } from "./fleet/types.js"
import { FleetError, errorMessage } from "./fleet/errors.js"
import { filterServers, loadServerConfig } from "./fleet/server-config.js"

function printError(err: unknown): void {
  if (err instanceof FleetError) {
    console.error(JSON.stringify(err.toJSON()))
  } else {
    console.error(JSON.stringify({ error: "FleetError", code: "CONFIG_INVALID", message: errorMessage(err) }))
  }
}

async function main(): Promise<number> {
  let settings: RunSettings
  let descriptors: ServerDescriptor[]
  try {
    const args = parseCliArgs(process.argv.slice(2))
    if (args.help) {
      console.log(USAGE)
      return 0
    }
    settings = resolveSettings(args, loadConfig())
    descriptors = filterServers(loadServerConfig(settings.configPath), settings.filter)
  } catch (err) {
    printError(err)
    if (err instanceof FleetError && err.code === "USAGE_INVALID") {
      console.error("")
      console.error(USAGE)
    }
    return EXIT_CONFIG_ERROR
  }

  if (settings.renderer === "interactive" && !(process.stdout.isTTY && process.stdin.isTTY)) {
    console.warn("[fleet-probe] not a terminal, falling back to --console output")
    settings = { ...settings, renderer: "console" }
  }

  const cancel = new AbortController()
  const rendererKind = settings.renderer

  // First signal cancels cooperatively; a second one forces exit.
  let signalled = false
  const handleSignal = (signal: string) => {
    if (signalled) {
      console.error(`[fleet-probe] ${signal} again, forcing exit`)
      process.exit(130)
    }
    signalled = true
    if (rendererKind === "console") {
      console.log(`\n[fleet-probe] ${signal} received, finishing current round...`)
    }
    cancel.abort()
  }
  process.on("SIGINT", () => handleSignal("SIGINT"))
  process.on("SIGTERM", () => handleSignal("SIGTERM"))

  if (rendererKind === "interactive") {
    emitKeypressEvents(process.stdin)
  }

  const report = await runFleetProbe(settings, descriptors, {
    cancel,
    output: process.stdout,
    input: rendererKind === "interactive" ? process.stdin : undefined,
    color: Boolean(process.stdout.isTTY),
  })
  return report.exitCode
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error("[fleet-probe] fatal:", err)
    process.exit(1)
  },
)
