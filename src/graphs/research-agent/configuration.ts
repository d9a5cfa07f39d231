/**
 * Configuration for the research agent graph.
 *
 * The graph is configured from a flat `configurable` dict. Keys are
 * accepted in snake_case (preferred) or camelCase; snake_case wins when
 * both are present. Unknown keys are silently ignored.
 *
 * Research-specific settings:
 *
 * - `maxIterations` — hard cap on Section Researcher invocations. The
 *   reflector forces `researchComplete` once it is reached, whatever the
 *   model says.
 * - `reflectionPolicy` — what happens after a reflection that did not
 *   declare the research complete (see `routing.ts`).
 * - `maxConcurrency` — how many search queries are worked on at once.
 * - `callTimeoutMs` / `maxRetries` / `retryBaseDelayMs` — the call
 *   policy applied to every collaborator call.
 */

import type { SearchDepth } from "./collaborators";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * `"always-finalize"` — write the report right after the first reflection.
 * `"until-complete"` — loop back to research until the reflection (or the
 * iteration cap) marks the research complete.
 */
export type ReflectionPolicy = "always-finalize" | "until-complete";

export interface ResearchAgentConfig {
  // LLM
  /** Fully-qualified `provider:model` string (e.g. `"openai:gpt-4o-mini"`). */
  modelName: string;
  temperature: number;
  /** Optional hard token limit per LLM call. */
  maxTokens: number | null;
  /** If set, routes LLM calls to this OpenAI-compatible endpoint. */
  baseUrl: string | null;
  /** Model name override when `baseUrl` is used. */
  customModelName: string | null;
  /** API key for the custom endpoint. */
  customApiKey: string | null;

  // Search
  searchMaxResults: number;
  searchDepth: SearchDepth;

  // Workflow
  maxIterations: number;
  maxConcurrency: number;
  reflectionPolicy: ReflectionPolicy;
  /** Persist state per session through a checkpointer. */
  checkpointEnabled: boolean;

  // Collaborator call policy
  callTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;

  /** Per-name prompt template overrides. */
  promptOverrides: Record<string, string>;
}

// ---------------------------------------------------------------------------
// Default values
// ---------------------------------------------------------------------------

export const DEFAULT_MODEL_NAME = "openai:gpt-4o-mini";
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 4096;
export const DEFAULT_SEARCH_MAX_RESULTS = 5;
export const DEFAULT_SEARCH_DEPTH: SearchDepth = "advanced";
export const DEFAULT_MAX_ITERATIONS = 10;
export const DEFAULT_MAX_CONCURRENCY = 3;
export const DEFAULT_REFLECTION_POLICY: ReflectionPolicy = "always-finalize";
export const DEFAULT_CALL_TIMEOUT_MS = 60_000;
export const DEFAULT_MAX_RETRIES = 2;
export const DEFAULT_RETRY_BASE_DELAY_MS = 500;

// ---------------------------------------------------------------------------
// Field readers
// ---------------------------------------------------------------------------

type Raw = Record<string, unknown>;

function pick(raw: Raw, snakeKey: string, camelKey: string): unknown {
  return raw[snakeKey] ?? raw[camelKey];
}

function readString(raw: Raw, snakeKey: string, camelKey: string): string | null {
  const value = pick(raw, snakeKey, camelKey);
  return typeof value === "string" && value ? value : null;
}

function readNumber(raw: Raw, snakeKey: string, camelKey: string): number | null {
  const value = pick(raw, snakeKey, camelKey);
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

/** Read an integer and clamp it into `[min, max]`. */
function readClampedInt(
  raw: Raw,
  snakeKey: string,
  camelKey: string,
  fallback: number,
  min: number,
  max: number,
): number {
  const value = readNumber(raw, snakeKey, camelKey);
  if (value === null) return fallback;
  return Math.max(min, Math.min(max, Math.round(value)));
}

function readBoolean(raw: Raw, snakeKey: string, camelKey: string, fallback: boolean): boolean {
  const value = pick(raw, snakeKey, camelKey);
  return typeof value === "boolean" ? value : fallback;
}

function parseSearchDepth(value: unknown): SearchDepth {
  return value === "basic" || value === "advanced" ? value : DEFAULT_SEARCH_DEPTH;
}

function parseReflectionPolicy(value: unknown): ReflectionPolicy {
  return value === "always-finalize" || value === "until-complete"
    ? value
    : DEFAULT_REFLECTION_POLICY;
}

function parsePromptOverrides(value: unknown): Record<string, string> {
  if (!value || typeof value !== "object" || Array.isArray(value)) return {};
  const overrides: Record<string, string> = {};
  for (const [name, template] of Object.entries(value)) {
    if (typeof template === "string" && template) {
      overrides[name] = template;
    }
  }
  return overrides;
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/**
 * Parse a `configurable` dict into a validated config object.
 *
 * @example
 *   const config = parseResearchConfig({ model_name: "openai:gpt-4o", max_iterations: 3 });
 *   config.maxIterations // → 3
 */
export function parseResearchConfig(
  configurable?: Record<string, unknown> | null,
): ResearchAgentConfig {
  const raw = configurable ?? {};

  return {
    modelName: readString(raw, "model_name", "modelName") ?? DEFAULT_MODEL_NAME,
    temperature: readNumber(raw, "temperature", "temperature") ?? DEFAULT_TEMPERATURE,
    // An explicit null lifts the limit.
    maxTokens:
      raw.max_tokens === null || raw.maxTokens === null
        ? null
        : (readNumber(raw, "max_tokens", "maxTokens") ?? DEFAULT_MAX_TOKENS),
    baseUrl: readString(raw, "base_url", "baseUrl"),
    customModelName: readString(raw, "custom_model_name", "customModelName"),
    customApiKey: readString(raw, "custom_api_key", "customApiKey"),

    searchMaxResults: readClampedInt(
      raw,
      "search_max_results",
      "searchMaxResults",
      DEFAULT_SEARCH_MAX_RESULTS,
      1,
      20,
    ),
    searchDepth: parseSearchDepth(pick(raw, "search_depth", "searchDepth")),

    maxIterations: readClampedInt(
      raw,
      "max_iterations",
      "maxIterations",
      DEFAULT_MAX_ITERATIONS,
      1,
      100,
    ),
    maxConcurrency: readClampedInt(
      raw,
      "max_concurrency",
      "maxConcurrency",
      DEFAULT_MAX_CONCURRENCY,
      1,
      16,
    ),
    reflectionPolicy: parseReflectionPolicy(pick(raw, "reflection_policy", "reflectionPolicy")),
    checkpointEnabled: readBoolean(raw, "checkpoint_enabled", "checkpointEnabled", true),

    callTimeoutMs: readClampedInt(
      raw,
      "call_timeout_ms",
      "callTimeoutMs",
      DEFAULT_CALL_TIMEOUT_MS,
      0,
      600_000,
    ),
    maxRetries: readClampedInt(raw, "max_retries", "maxRetries", DEFAULT_MAX_RETRIES, 0, 10),
    retryBaseDelayMs: readClampedInt(
      raw,
      "retry_base_delay_ms",
      "retryBaseDelayMs",
      DEFAULT_RETRY_BASE_DELAY_MS,
      0,
      60_000,
    ),

    promptOverrides: parsePromptOverrides(pick(raw, "prompt_overrides", "promptOverrides")),
  };
}
