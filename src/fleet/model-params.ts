// src/fleet/model-params.ts — Per-model token budget parameters for the probe request

/**
 * Models that reject `max_tokens` and need `max_completion_tokens` instead.
 * Reasoning models get a larger budget so the probe still produces visible output.
 */
const COMPLETION_TOKEN_MODELS: Record<string, number> = {
  "o3": 100,
  "o4-mini": 150,
  "gpt-4.1": 50,
  "scout": 50,
  "Qwen": 50,
  "meta-llama/Llama-3.3-70B-Instruct": 50,
}

export type TokenBudgetParams =
  | { max_tokens: number }
  | { max_completion_tokens: number }

export function tokenBudgetFor(model: string, defaultMaxTokens: number): TokenBudgetParams {
  const override = COMPLETION_TOKEN_MODELS[model]
  if (override !== undefined) {
    return { max_completion_tokens: override }
  }
  return { max_tokens: defaultMaxTokens }
}
