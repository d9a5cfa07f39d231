/**
 * Multi-provider LLM factory for the research agent.
 *
 * Selects the LangChain chat model class from the `provider:model`
 * naming convention.
 *
 * Two code paths:
 *   1. **Custom endpoint** (`baseUrl` is set) → `ChatOpenAI` with a custom
 *      `configuration.baseURL`. Covers vLLM, Ollama, LiteLLM, DeepSeek and
 *      any other OpenAI-compatible API.
 *   2. **Standard provider** (no `baseUrl`) → `initChatModel` from
 *      `langchain`, which resolves the provider from the `provider:model`
 *      string and instantiates the matching class.
 *
 * API keys are passed in explicitly; nothing here reads the environment.
 */

import { initChatModel } from "langchain";
import { ChatOpenAI } from "@langchain/openai";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";

import type { ResearchAgentConfig } from "./configuration";

// ---------------------------------------------------------------------------
// Provider prefix parsing
// ---------------------------------------------------------------------------

/**
 * Extract the provider prefix from a `provider:model` string.
 *
 * @example
 *   extractProvider("anthropic:claude-sonnet-4-0") // → "anthropic"
 *   extractProvider("gpt-4o")                      // → "openai"
 */
export function extractProvider(modelName: string): string {
  const colonIndex = modelName.indexOf(":");
  if (colonIndex === -1) {
    return "openai";
  }
  return modelName.slice(0, colonIndex).toLowerCase();
}

/**
 * Extract the model name from a `provider:model` string.
 *
 * @example
 *   extractModelName("openai:gpt-4o") // → "gpt-4o"
 *   extractModelName("deepseek-chat") // → "deepseek-chat"
 */
export function extractModelName(modelName: string): string {
  const colonIndex = modelName.indexOf(":");
  if (colonIndex === -1) {
    return modelName;
  }
  return modelName.slice(colonIndex + 1);
}

// ---------------------------------------------------------------------------
// API key resolution
// ---------------------------------------------------------------------------

/** Provider name → conventional API key variable name. */
export const PROVIDER_TO_KEY_NAME: Record<string, string> = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  google: "GOOGLE_API_KEY",
};

/**
 * Resolve the API key for a provider from an explicit key map.
 *
 * - `custom` → `config.customApiKey`, else `"EMPTY"` (local endpoints
 *   without auth).
 * - standard providers → `apiKeys[<PROVIDER>_API_KEY]`.
 */
export function getApiKeyForProvider(
  provider: string,
  config: Pick<ResearchAgentConfig, "customApiKey">,
  apiKeys: Record<string, string | undefined>,
): string | undefined {
  if (provider === "custom") {
    return config.customApiKey ?? "EMPTY";
  }

  const keyName = PROVIDER_TO_KEY_NAME[provider];
  const key = keyName ? apiKeys[keyName] : undefined;
  return key && key.length > 0 ? key : undefined;
}

// ---------------------------------------------------------------------------
// Chat model factory
// ---------------------------------------------------------------------------

/**
 * Create a chat model instance from the research configuration.
 *
 * @example
 *   const model = await createChatModel(
 *     parseResearchConfig({ model_name: "custom:", base_url: "https://api.deepseek.com", custom_model_name: "deepseek-chat" }),
 *     {},
 *   );
 */
export async function createChatModel(
  config: ResearchAgentConfig,
  apiKeys: Record<string, string | undefined>,
): Promise<BaseChatModel> {
  const provider = extractProvider(config.modelName);

  // ── Custom endpoint ────────────────────────────────────────────────
  if (config.baseUrl) {
    const apiKey = getApiKeyForProvider("custom", config, apiKeys);
    const modelName = extractModelName(config.customModelName || config.modelName);

    console.log(
      `[providers] Custom endpoint: base_url=${maskUrl(config.baseUrl)} model=${modelName}`,
    );

    return new ChatOpenAI({
      configuration: {
        baseURL: config.baseUrl,
      },
      apiKey,
      model: modelName,
      temperature: config.temperature,
      ...(config.maxTokens !== null ? { maxTokens: config.maxTokens } : {}),
    });
  }

  // ── Standard provider via initChatModel ────────────────────────────
  const apiKey = getApiKeyForProvider(provider, config, apiKeys);

  console.log(
    `[providers] Standard provider: provider=${provider} model=${config.modelName} api_key_present=${Boolean(apiKey)}`,
  );

  return initChatModel(config.modelName, {
    temperature: config.temperature,
    ...(config.maxTokens !== null ? { maxTokens: config.maxTokens } : {}),
    ...(apiKey ? { apiKey } : {}),
  });
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/**
 * Mask a URL for safe logging — shows scheme + host, hides path/query.
 */
export function maskUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}/***`;
  } catch {
    return "***";
  }
}
