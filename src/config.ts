// src/config.ts — Runtime settings from environment variables (CLI flags override these)

import { DEFAULT_PROBE_MAX_TOKENS, DEFAULT_PROBE_PROMPT } from "./fleet/probe.js"

export interface FleetConfig {
  /** Path to the YAML server list */
  configPath: string

  probe: {
    timeoutMs: number
    prompt: string
    maxTokens: number
  }

  /** 0 = one-shot, otherwise delay between continuous rounds */
  pollDelayMs: number

  /** Interactive renderer redraw tick */
  refreshTickMs: number

  /** Port for the read-only status endpoint; null disables it */
  statusPort: number | null
}

type Env = Record<string, string | undefined>

/** Parse an integer from an environment variable, failing fast on NaN. */
function parseIntEnv(env: Env, envKey: string, fallback: string): number {
  const raw = env[envKey] ?? fallback
  const value = parseInt(raw, 10)
  if (isNaN(value)) {
    throw new Error(`${envKey} must be a valid integer (got "${raw}")`)
  }
  return value
}

function parseNonNegativeEnv(env: Env, envKey: string, fallback: string): number {
  const value = parseIntEnv(env, envKey, fallback)
  if (value < 0) {
    throw new Error(`${envKey} must not be negative (got ${value})`)
  }
  return value
}

export function loadConfig(env: Env = process.env): FleetConfig {
  const timeoutMs = parseNonNegativeEnv(env, "FLEET_PROBE_TIMEOUT_MS", "30000")
  if (timeoutMs === 0) {
    throw new Error("FLEET_PROBE_TIMEOUT_MS must be greater than 0")
  }

  return {
    configPath: env.FLEET_CONFIG ?? "model_servers.yaml",

    probe: {
      timeoutMs,
      prompt: env.FLEET_PROBE_PROMPT ?? DEFAULT_PROBE_PROMPT,
      maxTokens: parseNonNegativeEnv(env, "FLEET_PROBE_MAX_TOKENS", String(DEFAULT_PROBE_MAX_TOKENS)),
    },

    pollDelayMs: parseNonNegativeEnv(env, "FLEET_POLL_DELAY_MS", "0"),
    refreshTickMs: Math.max(50, parseIntEnv(env, "FLEET_REFRESH_TICK_MS", "250")),

    statusPort: env.FLEET_STATUS_PORT ? parseIntEnv(env, "FLEET_STATUS_PORT", "0") : null,
  }
}
