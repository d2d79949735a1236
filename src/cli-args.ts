// src/cli-args.ts — fleet-probe argument parsing and settings resolution

import { FleetError } from "./fleet/errors.js"
import type { FleetConfig } from "./config.js"
import type { ServerFilter } from "./fleet/server-config.js"
import type { PollMode } from "./fleet/poller.js"
import type { RendererKind } from "./render/types.js"

export const USAGE = [
  "Usage: fleet-probe [options]",
  "",
  "Probe every configured OpenAI-compatible server with a small chat completion.",
  "",
  "Options:",
  "  --config <path>     Server list (default: model_servers.yaml, env FLEET_CONFIG)",
  "  --console           Plain console report instead of the full-screen display",
  "  --delay <seconds>   Repeat rounds with this delay (0 = single round)",
  "  --timeout <seconds> Per-probe deadline (default: 30)",
  "  --only <a,b,...>    Probe only these shortnames",
  "  --local-only        Skip servers hosted on api.openai.com",
  "  --serve <port>      Expose read-only status over HTTP",
  "  -h, --help          Show this help",
  "",
  "Exit codes:",
  "  0  clean run, or a run cancelled by Ctrl+C / SIGTERM before it finished",
  "  1  configuration or usage error",
  "  2  single round in which every server failed",
].join("\n")

export interface CliArgs {
  help: boolean
  console: boolean
  localOnly: boolean
  configPath?: string
  delaySec?: number
  timeoutSec?: number
  only?: string[]
  servePort?: number
}

const VALUE_FLAGS = new Set(["--config", "--delay", "--timeout", "--only", "--serve"])

function parseSeconds(flag: string, raw: string): number {
  const value = Number(raw)
  if (!raw.trim() || !Number.isFinite(value) || value < 0) {
    throw new FleetError("USAGE_INVALID", `${flag} expects a non-negative number of seconds (got "${raw}")`, { flag })
  }
  return value
}

function parsePort(raw: string): number {
  const value = Number(raw)
  if (!Number.isInteger(value) || value < 0 || value > 65535) {
    throw new FleetError("USAGE_INVALID", `--serve expects a port number (got "${raw}")`, { flag: "--serve" })
  }
  return value
}

/** Parse argv without the node and script entries. */
export function parseCliArgs(args: readonly string[]): CliArgs {
  const result: CliArgs = { help: false, console: false, localOnly: false }

  for (let i = 0; i < args.length; i++) {
    let flag = args[i]
    let value: string | undefined

    const eq = flag.indexOf("=")
    if (flag.startsWith("--") && eq !== -1) {
      value = flag.slice(eq + 1)
      flag = flag.slice(0, eq)
    }

    if (VALUE_FLAGS.has(flag) && value === undefined) {
      if (i + 1 >= args.length) {
        throw new FleetError("USAGE_INVALID", `${flag} requires a value`, { flag })
      }
      value = args[++i]
    }

    switch (flag) {
      case "-h":
      case "--help":
        result.help = true
        break
      case "--console":
        result.console = true
        break
      case "--local-only":
        result.localOnly = true
        break
      case "--config":
        result.configPath = value
        break
      case "--delay":
        result.delaySec = parseSeconds(flag, value ?? "")
        break
      case "--timeout": {
        const seconds = parseSeconds(flag, value ?? "")
        if (seconds === 0) {
          throw new FleetError("USAGE_INVALID", "--timeout must be greater than 0", { flag })
        }
        result.timeoutSec = seconds
        break
      }
      case "--only":
        result.only = (value ?? "").split(",").map((s) => s.trim()).filter(Boolean)
        break
      case "--serve":
        result.servePort = parsePort(value ?? "")
        break
      default:
        throw new FleetError("USAGE_INVALID", `Unknown argument "${args[i]}"`, { argument: args[i] })
    }
  }

  return result
}

export interface RunSettings {
  configPath: string
  renderer: RendererKind
  mode: PollMode
  perProbeTimeoutMs: number
  filter: ServerFilter
  statusPort: number | null
  refreshTickMs: number
  probe: { prompt: string; maxTokens: number }
}

/** Merge CLI flags over environment settings. */
export function resolveSettings(args: CliArgs, config: FleetConfig): RunSettings {
  const delayMs = args.delaySec !== undefined ? Math.round(args.delaySec * 1000) : config.pollDelayMs
  const perProbeTimeoutMs = args.timeoutSec !== undefined
    ? Math.max(1, Math.round(args.timeoutSec * 1000))
    : config.probe.timeoutMs

  return {
    configPath: args.configPath ?? config.configPath,
    renderer: args.console ? "console" : "interactive",
    mode: delayMs > 0 ? { kind: "continuous", delayMs } : { kind: "one-shot" },
    perProbeTimeoutMs,
    filter: { only: args.only, localOnly: args.localOnly },
    statusPort: args.servePort ?? config.statusPort,
    refreshTickMs: config.refreshTickMs,
    probe: { prompt: config.probe.prompt, maxTokens: config.probe.maxTokens },
  }
}
