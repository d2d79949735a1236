// src/fleet/probe.ts — Probe Executor: one chat-completion test call per server
//
// Error taxonomy (every failure becomes a value, probe() never rejects):
//   key reference unresolved     → auth_error (no request sent)
//   deadline / caller abort      → timeout
//   refused, DNS, TLS, reset     → connection_error
//   401 / 403                    → auth_error
//   other non-2xx (incl. 429)    → protocol_error
//   body not JSON / no message   → protocol_error

import { describeApiKeyRef, resolveApiKey } from "./server-config.js"
import { tokenBudgetFor } from "./model-params.js"
import type {
  FailureOutcome,
  FailureStatus,
  ProbeOutcome,
  ServerDescriptor,
  SuccessOutcome,
  TokenUsage,
} from "./types.js"

export const DEFAULT_PROBE_PROMPT = "What is 2+2? Please provide a short, direct answer."
export const DEFAULT_PROBE_MAX_TOKENS = 50

const BODY_EXCERPT_CHARS = 200
const AUTH_STATUS_CODES = new Set([401, 403])

export interface ProbeOptions {
  timeoutMs: number
  /** Aborting this signal ends the probe with a timeout outcome. */
  signal?: AbortSignal
}

/** Anything that can probe one server. The Round Coordinator depends only on this. */
export interface Prober {
  probe(descriptor: ServerDescriptor, options: ProbeOptions): Promise<ProbeOutcome>
}

export interface ProbeExecutorConfig {
  prompt?: string
  maxTokens?: number
  fetch?: typeof globalThis.fetch
  env?: Record<string, string | undefined>
  clock?: () => number
}

export function chatCompletionsUrl(apiBaseUrl: string): string {
  return `${apiBaseUrl.replace(/\/+$/, "")}/chat/completions`
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function readNumber(obj: Record<string, unknown>, key: string): number | undefined {
  const value = obj[key]
  return typeof value === "number" && Number.isFinite(value) ? value : undefined
}

/** Pull token usage out of a completion response; undefined when not reported. */
export function readUsage(body: Record<string, unknown>): TokenUsage | undefined {
  const usage = body.usage
  if (!isRecord(usage)) return undefined

  const promptTokens = readNumber(usage, "prompt_tokens")
  const completionTokens = readNumber(usage, "completion_tokens")
  let totalTokens = readNumber(usage, "total_tokens")
  if (totalTokens === undefined && promptTokens !== undefined && completionTokens !== undefined) {
    totalTokens = promptTokens + completionTokens
  }
  if (promptTokens === undefined && completionTokens === undefined && totalTokens === undefined) {
    return undefined
  }
  return { promptTokens, completionTokens, totalTokens }
}

type CompletionRead =
  | { ok: true; content: string }
  | { ok: false; reason: string }

/** Validate `choices[0].message.content`. Null content reads as an empty completion. */
export function readCompletion(body: Record<string, unknown>): CompletionRead {
  const choices = body.choices
  if (!Array.isArray(choices) || choices.length === 0) {
    return { ok: false, reason: "response has no choices" }
  }
  const first: unknown = choices[0]
  if (!isRecord(first) || !isRecord(first.message)) {
    return { ok: false, reason: "choices[0].message missing" }
  }
  const content = first.message.content
  if (content === null || content === undefined) {
    return { ok: true, content: "" }
  }
  if (typeof content !== "string") {
    return { ok: false, reason: "choices[0].message.content is not a string" }
  }
  return { ok: true, content }
}

/** Flatten a fetch failure (undici wraps the socket error in `cause`). */
export function describeNetworkError(err: unknown): string {
  if (!(err instanceof Error)) return String(err)
  const cause: unknown = err.cause
  if (cause instanceof Error) {
    const code = "code" in cause && typeof cause.code === "string" ? cause.code : undefined
    return code ? `${err.message}: ${code} ${cause.message}` : `${err.message}: ${cause.message}`
  }
  return err.message
}

function excerpt(text: string): string {
  const trimmed = text.trim()
  return trimmed.length > BODY_EXCERPT_CHARS ? `${trimmed.slice(0, BODY_EXCERPT_CHARS)}...` : trimmed
}

export class ProbeExecutor implements Prober {
  private readonly prompt: string
  private readonly maxTokens: number
  private readonly fetchFn: typeof globalThis.fetch
  private readonly env: Record<string, string | undefined>
  private readonly clock: () => number

  constructor(config: ProbeExecutorConfig = {}) {
    this.prompt = config.prompt ?? DEFAULT_PROBE_PROMPT
    this.maxTokens = config.maxTokens ?? DEFAULT_PROBE_MAX_TOKENS
    this.fetchFn = config.fetch ?? globalThis.fetch
    this.env = config.env ?? process.env
    this.clock = config.clock ?? Date.now
  }

  /** Build the fixed test request body for a server. */
  buildRequestBody(descriptor: ServerDescriptor): Record<string, unknown> {
    return {
      model: descriptor.model,
      messages: [{ role: "user", content: this.prompt }],
      ...tokenBudgetFor(descriptor.model, this.maxTokens),
    }
  }

  async probe(descriptor: ServerDescriptor, options: ProbeOptions): Promise<ProbeOutcome> {
    const issuedAt = this.clock()
    const fail = (status: FailureStatus, errorDetail: string, httpStatus?: number): FailureOutcome =>
      Object.freeze({
        serverId: descriptor.id,
        issuedAt,
        durationMs: this.clock() - issuedAt,
        status,
        errorDetail,
        ...(httpStatus !== undefined ? { httpStatus } : {}),
      })

    const apiKey = resolveApiKey(descriptor.apiKeyRef, this.env)
    if (!apiKey) {
      return fail("auth_error", `API key ${describeApiKeyRef(descriptor.apiKeyRef)} is not set`)
    }

    if (options.signal?.aborted) {
      return fail("timeout", "probe cancelled before dispatch")
    }

    const controller = new AbortController()
    const onAbort = () => controller.abort()
    options.signal?.addEventListener("abort", onAbort, { once: true })
    const timer = setTimeout(() => controller.abort(), options.timeoutMs)

    try {
      const res = await this.fetchFn(chatCompletionsUrl(descriptor.apiBaseUrl), {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify(this.buildRequestBody(descriptor)),
        signal: controller.signal,
      })
      const text = await res.text()

      if (AUTH_STATUS_CODES.has(res.status)) {
        return fail("auth_error", `HTTP ${res.status}: ${excerpt(text) || "authentication rejected"}`, res.status)
      }
      if (res.status === 429) {
        return fail("protocol_error", `rate limited (HTTP 429): ${excerpt(text)}`, res.status)
      }
      if (!res.ok) {
        return fail("protocol_error", `HTTP ${res.status}: ${excerpt(text)}`, res.status)
      }

      let body: unknown
      try {
        body = JSON.parse(text)
      } catch {
        return fail("protocol_error", `response is not JSON: ${excerpt(text)}`, res.status)
      }
      if (!isRecord(body)) {
        return fail("protocol_error", "response is not a JSON object", res.status)
      }

      const completion = readCompletion(body)
      if (!completion.ok) {
        return fail("protocol_error", completion.reason, res.status)
      }

      const usage = readUsage(body)
      const outcome: SuccessOutcome = {
        serverId: descriptor.id,
        issuedAt,
        durationMs: this.clock() - issuedAt,
        status: "success",
        tokenCount: usage?.totalTokens ?? null,
        emptyCompletion: completion.content.length === 0,
        ...(usage ? { usage: Object.freeze(usage) } : {}),
      }
      return Object.freeze(outcome)
    } catch (err) {
      if (controller.signal.aborted) {
        return fail("timeout", `no response within ${options.timeoutMs}ms`)
      }
      return fail("connection_error", describeNetworkError(err))
    } finally {
      clearTimeout(timer)
      options.signal?.removeEventListener("abort", onAbort)
    }
  }
}
