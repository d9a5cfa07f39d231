/**
 * Typed environment configuration for the deep research agent.
 *
 * All configuration is read from environment variables with sensible
 * defaults. Nothing below the CLI reads the environment: the parsed
 * {@link AppConfig} is turned into an explicit configurable dict
 * ({@link toConfigurable}) and key map ({@link apiKeysFrom}) that are
 * handed to the graph factory. Secrets are never logged or exposed in
 * error messages.
 */

import packageJson from "../package.json";
import { ConfigurationError } from "./models/errors";
import { extractProvider, PROVIDER_TO_KEY_NAME } from "./graphs/research-agent/providers";

/** Current version. Derived from `package.json` — do NOT hardcode. */
export const VERSION: string = packageJson.version;

/** Service identifier used in logging. */
export const SERVICE_NAME = "deep-research-agent";

type Env = Record<string, string | undefined>;

export interface AppConfig {
  /** OpenAI API key. Required for `openai:*` models. */
  openaiApiKey: string | undefined;
  /** Anthropic API key. Required for `anthropic:*` models. */
  anthropicApiKey: string | undefined;
  /** Google API key. Required for `google:*` models. */
  googleApiKey: string | undefined;
  /** Custom endpoint API key. Used when `llmBaseUrl` is set. */
  customApiKey: string | undefined;
  /** Tavily API key. Always required. */
  tavilyApiKey: string | undefined;

  /** `provider:model` name (default: "openai:gpt-4o-mini"). */
  modelName: string;
  /** OpenAI-compatible endpoint (e.g. "https://api.deepseek.com"). */
  llmBaseUrl: string | undefined;
  /** Model name sent to the custom endpoint. */
  customModelName: string | undefined;
  temperature: number;
  maxTokens: number;

  searchMaxResults: number;
  searchDepth: string;

  maxIterations: number;
  maxConcurrency: number;
  reflectionPolicy: string;
  checkpointEnabled: boolean;
  callTimeoutMs: number;
  maxRetries: number;

  /** Langfuse secret key. Enables tracing when set alongside `langfusePublicKey`. */
  langfuseSecretKey: string | undefined;
  /** Langfuse public key. Enables tracing when set alongside `langfuseSecretKey`. */
  langfusePublicKey: string | undefined;
  /** Langfuse server URL (default: "https://cloud.langfuse.com"). */
  langfuseBaseUrl: string | undefined;
}

function parseInteger(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    console.warn(`[config] Invalid ${name} "${raw}", falling back to ${fallback}`);
    return fallback;
  }
  return parsed;
}

function parseDecimal(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    console.warn(`[config] Invalid ${name} "${raw}", falling back to ${fallback}`);
    return fallback;
  }
  return parsed;
}

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const normalized = raw.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) return true;
  if (["false", "0", "no"].includes(normalized)) return false;
  return fallback;
}

/**
 * Load configuration from environment variables.
 *
 * This is a function (not a top-level const) so tests can pass their own
 * environment.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    openaiApiKey: env.OPENAI_API_KEY || undefined,
    anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
    googleApiKey: env.GOOGLE_API_KEY || undefined,
    customApiKey: env.CUSTOM_API_KEY || undefined,
    tavilyApiKey: env.TAVILY_API_KEY || undefined,

    modelName: env.MODEL_NAME || "openai:gpt-4o-mini",
    llmBaseUrl: env.LLM_BASE_URL || undefined,
    customModelName: env.CUSTOM_MODEL_NAME || undefined,
    temperature: parseDecimal("LLM_TEMPERATURE", env.LLM_TEMPERATURE, 0.7),
    maxTokens: parseInteger("LLM_MAX_TOKENS", env.LLM_MAX_TOKENS, 4096),

    searchMaxResults: parseInteger("SEARCH_MAX_RESULTS", env.SEARCH_MAX_RESULTS, 5),
    searchDepth: env.SEARCH_DEPTH || "advanced",

    maxIterations: parseInteger("RESEARCH_MAX_ITERATIONS", env.RESEARCH_MAX_ITERATIONS, 10),
    maxConcurrency: parseInteger("RESEARCH_MAX_CONCURRENCY", env.RESEARCH_MAX_CONCURRENCY, 3),
    reflectionPolicy: env.RESEARCH_REFLECTION_POLICY || "always-finalize",
    checkpointEnabled: parseBoolean(env.RESEARCH_CHECKPOINT_ENABLED, true),
    callTimeoutMs: parseInteger("RESEARCH_CALL_TIMEOUT_MS", env.RESEARCH_CALL_TIMEOUT_MS, 60_000),
    maxRetries: parseInteger("RESEARCH_MAX_RETRIES", env.RESEARCH_MAX_RETRIES, 2),

    langfuseSecretKey: env.LANGFUSE_SECRET_KEY || undefined,
    langfusePublicKey: env.LANGFUSE_PUBLIC_KEY || undefined,
    langfuseBaseUrl: env.LANGFUSE_BASE_URL || undefined,
  };
}

/**
 * Provider key map handed to the chat model factory.
 */
export function apiKeysFrom(config: AppConfig): Record<string, string | undefined> {
  return {
    OPENAI_API_KEY: config.openaiApiKey,
    ANTHROPIC_API_KEY: config.anthropicApiKey,
    GOOGLE_API_KEY: config.googleApiKey,
  };
}

/**
 * Check that every credential a run needs is present.
 *
 * @throws {ConfigurationError} naming the missing variables (never their values).
 */
export function validateConfig(config: AppConfig): void {
  const missing: string[] = [];

  if (!config.tavilyApiKey) {
    missing.push("TAVILY_API_KEY");
  }

  if (!config.llmBaseUrl) {
    const keyName = PROVIDER_TO_KEY_NAME[extractProvider(config.modelName)];
    if (keyName && !apiKeysFrom(config)[keyName]) {
      missing.push(keyName);
    }
  }

  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missing.join(", ")}`,
      missing,
    );
  }
}

/**
 * Map the environment configuration onto the graph's configurable dict.
 */
export function toConfigurable(config: AppConfig): Record<string, unknown> {
  return {
    model_name: config.modelName,
    temperature: config.temperature,
    max_tokens: config.maxTokens,
    base_url: config.llmBaseUrl ?? null,
    custom_model_name: config.customModelName ?? null,
    custom_api_key: config.customApiKey ?? null,
    search_max_results: config.searchMaxResults,
    search_depth: config.searchDepth,
    max_iterations: config.maxIterations,
    max_concurrency: config.maxConcurrency,
    reflection_policy: config.reflectionPolicy,
    checkpoint_enabled: config.checkpointEnabled,
    call_timeout_ms: config.callTimeoutMs,
    max_retries: config.maxRetries,
  };
}

/**
 * Check whether Langfuse tracing is configured (both keys present).
 */
export function isLangfuseConfigured(config: AppConfig): boolean {
  return Boolean(config.langfuseSecretKey && config.langfusePublicKey);
}
