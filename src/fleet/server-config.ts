// src/fleet/server-config.ts — Server list loader (YAML + TypeBox validation)
//
// File shape:
//   servers:
//     - server: "rbdgx2"
//       shortname: "llama"
//       openai_api_key: "${VLLM_API_KEY}"
//       openai_api_base: "http://10.0.0.12:80/v1"
//       openai_model: "meta-llama/Llama-3.3-70B-Instruct"
//
// Every problem is reported here, before any round starts.

import { existsSync, readFileSync } from "node:fs"
import { parse as parseYaml } from "yaml"
import { Type, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { FleetError, errorMessage } from "./errors.js"
import type { ApiKeyRef, ServerDescriptor } from "./types.js"

export const DEFAULT_API_KEY_ENV = "OPENAI_API_KEY"

// Required fields must hold at least one non-whitespace character; values are trimmed later.
const NonBlank = () => Type.String({ pattern: "\\S" })

const ServerEntrySchema = Type.Object({
  server: Type.Optional(Type.String()),
  shortname: NonBlank(),
  openai_api_key: Type.Optional(Type.String()),
  openai_api_base: NonBlank(),
  openai_model: NonBlank(),
})

const ServerFileSchema = Type.Object({
  servers: Type.Array(ServerEntrySchema),
})

export type ServerEntry = Static<typeof ServerEntrySchema>

const ENV_REF_RE = /^\$\{([A-Za-z_][A-Za-z0-9_]*)\}$/

/** "${VAR}" → env reference; anything else non-empty → inline key. */
export function parseApiKeyRef(raw: string | undefined): ApiKeyRef {
  const value = (raw ?? "").trim()
  if (!value) return { kind: "env", name: DEFAULT_API_KEY_ENV }
  const match = ENV_REF_RE.exec(value)
  if (match) return { kind: "env", name: match[1] }
  return { kind: "literal", value }
}

/** Resolve a key reference. Returns undefined when the variable is unset or empty. */
export function resolveApiKey(
  ref: ApiKeyRef,
  env: Record<string, string | undefined> = process.env,
): string | undefined {
  if (ref.kind === "literal") return ref.value
  const value = env[ref.name]
  return value ? value : undefined
}

export function describeApiKeyRef(ref: ApiKeyRef): string {
  return ref.kind === "env" ? `\${${ref.name}}` : "<inline>"
}

function toDescriptor(entry: ServerEntry, index: number, source: string): ServerDescriptor {
  let url: URL
  try {
    url = new URL(entry.openai_api_base)
  } catch {
    throw new FleetError("CONFIG_INVALID", `servers[${index}].openai_api_base is not a valid URL`, {
      source,
      shortname: entry.shortname,
      value: entry.openai_api_base,
    })
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new FleetError("CONFIG_INVALID", `servers[${index}].openai_api_base must be http(s)`, {
      source,
      shortname: entry.shortname,
      value: entry.openai_api_base,
    })
  }

  return Object.freeze({
    id: entry.shortname.trim(),
    hostLabel: entry.server?.trim() || url.hostname,
    apiBaseUrl: entry.openai_api_base.trim(),
    apiKeyRef: Object.freeze(parseApiKeyRef(entry.openai_api_key)),
    model: entry.openai_model.trim(),
  })
}

/** Parse and validate config file contents. Order of `servers` is preserved. */
export function parseServerConfig(text: string, source = "<inline>"): ServerDescriptor[] {
  let doc: unknown
  try {
    doc = parseYaml(text)
  } catch (err) {
    throw new FleetError("CONFIG_INVALID", `Cannot parse ${source}: ${errorMessage(err)}`, { source })
  }

  if (!Value.Check(ServerFileSchema, doc)) {
    const first = [...Value.Errors(ServerFileSchema, doc)][0]
    const where = first ? `${first.path || "/"}: ${first.message}` : "unknown schema error"
    throw new FleetError("CONFIG_INVALID", `Invalid server config in ${source} (${where})`, { source })
  }

  if (doc.servers.length === 0) {
    throw new FleetError("NO_SERVERS", `No servers configured in ${source}`, { source })
  }

  const descriptors = doc.servers.map((entry, i) => toDescriptor(entry, i, source))

  const seen = new Set<string>()
  for (const d of descriptors) {
    if (seen.has(d.id)) {
      throw new FleetError("DUPLICATE_SERVER_ID", `Duplicate shortname "${d.id}" in ${source}`, {
        source,
        shortname: d.id,
      })
    }
    seen.add(d.id)
  }

  return descriptors
}

export function loadServerConfig(path: string): ServerDescriptor[] {
  if (!existsSync(path)) {
    throw new FleetError("CONFIG_NOT_FOUND", `Config not found: ${path}`, { path })
  }
  let text: string
  try {
    text = readFileSync(path, "utf8")
  } catch (err) {
    throw new FleetError("CONFIG_INVALID", `Unable to read ${path}: ${errorMessage(err)}`, { path })
  }
  return parseServerConfig(text, path)
}

// --- Filtering ---

export interface ServerFilter {
  /** Keep only these shortnames (configured order is kept). */
  only?: string[]
  /** Drop servers hosted on api.openai.com. */
  localOnly?: boolean
}

export function isOpenAiHosted(descriptor: ServerDescriptor): boolean {
  return descriptor.apiBaseUrl.includes("api.openai.com")
}

export function filterServers(
  descriptors: readonly ServerDescriptor[],
  filter: ServerFilter,
): ServerDescriptor[] {
  let result = [...descriptors]

  if (filter.only && filter.only.length > 0) {
    const known = new Set(descriptors.map((d) => d.id))
    const unknown = filter.only.filter((name) => !known.has(name))
    if (unknown.length > 0) {
      throw new FleetError("USAGE_INVALID", `Unknown server(s) in --only: ${unknown.join(", ")}`, {
        unknown,
      })
    }
    const wanted = new Set(filter.only)
    result = result.filter((d) => wanted.has(d.id))
  }

  if (filter.localOnly) {
    result = result.filter((d) => !isOpenAiHosted(d))
  }

  if (result.length === 0) {
    throw new FleetError("NO_SERVERS", "No servers left to probe after filtering", {
      only: filter.only,
      localOnly: filter.localOnly ?? false,
    })
  }

  return result
}
