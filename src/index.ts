// src/index.ts — fleet-probe library entry point

export * from "./fleet/index.js"
export * from "./render/index.js"
export { createStatusApp, fleetHealth } from "./gateway/status-routes.js"
export type { FleetHealth, StatusRouteDeps } from "./gateway/status-routes.js"
export { loadConfig } from "./config.js"
export type { FleetConfig } from "./config.js"
export { runFleetProbe, exitCodeFor } from "./app.js"
export type { RunDeps, RunReport } from "./app.js"
