// src/gateway/status-routes.ts — Read-only HTTP view of the status store
//
// GET /health              overall fleet status (503 when every server is failing)
// GET /api/v1/servers      all configured servers with their current status
// GET /api/v1/servers/:id  one server, 404 for an unknown id

import { Hono } from "hono"
import { describeApiKeyRef } from "../fleet/server-config.js"
import { successRate } from "../fleet/status-store.js"
import type { PollerState } from "../fleet/poller.js"
import type { FleetView, ProbeOutcome, ServerDescriptor, ServerStatus } from "../fleet/types.js"

export type FleetHealth = "pending" | "healthy" | "degraded" | "unhealthy"

export interface StatusRouteDeps {
  source: {
    view(): FleetView
    configured(): ServerDescriptor[]
  }
  getPollerState?: () => PollerState
}

export function fleetHealth(view: FleetView, configuredCount: number): FleetHealth {
  if (view.round === 0) return "pending"
  const ok = view.servers.filter((s) => s.lastOutcome.status === "success").length
  if (ok === configuredCount) return "healthy"
  if (ok === 0) return "unhealthy"
  return "degraded"
}

function serializeOutcome(outcome: ProbeOutcome): Record<string, unknown> {
  const base = {
    status: outcome.status,
    issued_at: new Date(outcome.issuedAt).toISOString(),
    duration_ms: outcome.durationMs,
  }
  if (outcome.status === "success") {
    return {
      ...base,
      token_count: outcome.tokenCount,
      empty_completion: outcome.emptyCompletion,
    }
  }
  return {
    ...base,
    error_detail: outcome.errorDetail,
    http_status: outcome.httpStatus,
  }
}

function serializeServer(d: ServerDescriptor, status: ServerStatus | undefined): Record<string, unknown> {
  return {
    id: d.id,
    host: d.hostLabel,
    api_base: d.apiBaseUrl,
    model: d.model,
    api_key: describeApiKeyRef(d.apiKeyRef),
    last_outcome: status ? serializeOutcome(status.lastOutcome) : null,
    consecutive_failures: status?.consecutiveFailures ?? 0,
    total_rounds: status?.totalRounds ?? 0,
    total_successes: status?.totalSuccesses ?? 0,
    success_rate: successRate(status),
  }
}

export function createStatusApp(deps: StatusRouteDeps) {
  const app = new Hono()

  app.get("/health", (c) => {
    const view = deps.source.view()
    const configured = deps.source.configured()
    const status = fleetHealth(view, configured.length)
    return c.json({
      status,
      round: view.round,
      updated_at: view.updatedAt !== null ? new Date(view.updatedAt).toISOString() : null,
      poller: deps.getPollerState?.() ?? "unknown",
      servers: {
        total: configured.length,
        healthy: view.servers.filter((s) => s.lastOutcome.status === "success").length,
      },
    }, status === "unhealthy" ? 503 : 200)
  })

  app.get("/api/v1/servers", (c) => {
    const view = deps.source.view()
    const byId = new Map(view.servers.map((s) => [s.descriptor.id, s]))
    return c.json({
      round: view.round,
      servers: deps.source.configured().map((d) => serializeServer(d, byId.get(d.id))),
    })
  })

  app.get("/api/v1/servers/:id", (c) => {
    const id = c.req.param("id")
    const descriptor = deps.source.configured().find((d) => d.id === id)
    if (!descriptor) {
      return c.json({ error: "Not found", code: "UNKNOWN_SERVER" }, 404)
    }
    const status = deps.source.view().servers.find((s) => s.descriptor.id === id)
    return c.json(serializeServer(descriptor, status))
  })

  return app
}
