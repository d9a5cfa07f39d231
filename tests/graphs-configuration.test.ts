/**
 * Tests for research graph configuration (`configuration.ts`).
 *
 * Tests cover:
 *   - Defaults for null / undefined / empty input
 *   - snake_case and camelCase keys, snake_case precedence
 *   - Clamping of numeric settings
 *   - Enum fallbacks (search depth, reflection policy)
 *   - Prompt override filtering
 */

import { describe, test, expect } from "vitest";

import {
  DEFAULT_CALL_TIMEOUT_MS,
  DEFAULT_MAX_CONCURRENCY,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_MAX_TOKENS,
  DEFAULT_MODEL_NAME,
  DEFAULT_REFLECTION_POLICY,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_SEARCH_DEPTH,
  DEFAULT_SEARCH_MAX_RESULTS,
  DEFAULT_TEMPERATURE,
  parseResearchConfig,
} from "../src/graphs/research-agent/configuration";

// ===================================================================
// Defaults
// ===================================================================

describe("parseResearchConfig — defaults", () => {
  test("returns defaults for null input", () => {
    expect(parseResearchConfig(null)).toEqual({
      modelName: DEFAULT_MODEL_NAME,
      temperature: DEFAULT_TEMPERATURE,
      maxTokens: DEFAULT_MAX_TOKENS,
      baseUrl: null,
      customModelName: null,
      customApiKey: null,
      searchMaxResults: DEFAULT_SEARCH_MAX_RESULTS,
      searchDepth: DEFAULT_SEARCH_DEPTH,
      maxIterations: DEFAULT_MAX_ITERATIONS,
      maxConcurrency: DEFAULT_MAX_CONCURRENCY,
      reflectionPolicy: DEFAULT_REFLECTION_POLICY,
      checkpointEnabled: true,
      callTimeoutMs: DEFAULT_CALL_TIMEOUT_MS,
      maxRetries: DEFAULT_MAX_RETRIES,
      retryBaseDelayMs: DEFAULT_RETRY_BASE_DELAY_MS,
      promptOverrides: {},
    });
  });

  test("undefined and empty input match null input", () => {
    expect(parseResearchConfig(undefined)).toEqual(parseResearchConfig(null));
    expect(parseResearchConfig({})).toEqual(parseResearchConfig(null));
  });

  test("default constants", () => {
    expect(DEFAULT_MODEL_NAME).toBe("openai:gpt-4o-mini");
    expect(DEFAULT_MAX_ITERATIONS).toBe(10);
    expect(DEFAULT_SEARCH_MAX_RESULTS).toBe(5);
    expect(DEFAULT_SEARCH_DEPTH).toBe("advanced");
    expect(DEFAULT_REFLECTION_POLICY).toBe("always-finalize");
  });
});

// ===================================================================
// Key styles
// ===================================================================

describe("parseResearchConfig — key styles", () => {
  test("parses snake_case keys", () => {
    const config = parseResearchConfig({
      model_name: "anthropic:claude-sonnet-4-0",
      max_iterations: 4,
      search_max_results: 8,
      reflection_policy: "until-complete",
      checkpoint_enabled: false,
    });
    expect(config.modelName).toBe("anthropic:claude-sonnet-4-0");
    expect(config.maxIterations).toBe(4);
    expect(config.searchMaxResults).toBe(8);
    expect(config.reflectionPolicy).toBe("until-complete");
    expect(config.checkpointEnabled).toBe(false);
  });

  test("parses camelCase keys", () => {
    const config = parseResearchConfig({
      modelName: "openai:gpt-4o",
      maxConcurrency: 6,
      searchDepth: "basic",
      baseUrl: "http://localhost:8000/v1",
    });
    expect(config.modelName).toBe("openai:gpt-4o");
    expect(config.maxConcurrency).toBe(6);
    expect(config.searchDepth).toBe("basic");
    expect(config.baseUrl).toBe("http://localhost:8000/v1");
  });

  test("snake_case wins when both are present", () => {
    const config = parseResearchConfig({ max_iterations: 2, maxIterations: 9 });
    expect(config.maxIterations).toBe(2);
  });

  test("ignores unknown keys", () => {
    const config = parseResearchConfig({ unknown_key: "value" });
    expect(config).toEqual(parseResearchConfig(null));
  });
});

// ===================================================================
// Value handling
// ===================================================================

describe("parseResearchConfig — value handling", () => {
  test("clamps numeric settings into range", () => {
    const config = parseResearchConfig({
      search_max_results: 50,
      max_iterations: 0,
      max_concurrency: 100,
      max_retries: -3,
      call_timeout_ms: 10_000_000,
    });
    expect(config.searchMaxResults).toBe(20);
    expect(config.maxIterations).toBe(1);
    expect(config.maxConcurrency).toBe(16);
    expect(config.maxRetries).toBe(0);
    expect(config.callTimeoutMs).toBe(600_000);
  });

  test("rounds fractional integers", () => {
    expect(parseResearchConfig({ max_iterations: 2.6 }).maxIterations).toBe(3);
  });

  test("ignores non-numeric values", () => {
    const config = parseResearchConfig({ max_iterations: "5", temperature: "hot" });
    expect(config.maxIterations).toBe(DEFAULT_MAX_ITERATIONS);
    expect(config.temperature).toBe(DEFAULT_TEMPERATURE);
  });

  test("explicit null max_tokens lifts the limit", () => {
    expect(parseResearchConfig({ max_tokens: null }).maxTokens).toBeNull();
    expect(parseResearchConfig({ max_tokens: 1024 }).maxTokens).toBe(1024);
  });

  test("unknown enum values fall back to defaults", () => {
    const config = parseResearchConfig({ search_depth: "deep", reflection_policy: "sometimes" });
    expect(config.searchDepth).toBe(DEFAULT_SEARCH_DEPTH);
    expect(config.reflectionPolicy).toBe(DEFAULT_REFLECTION_POLICY);
  });

  test("empty strings count as unset", () => {
    const config = parseResearchConfig({ model_name: "", base_url: "" });
    expect(config.modelName).toBe(DEFAULT_MODEL_NAME);
    expect(config.baseUrl).toBeNull();
  });

  test("keeps only non-empty string prompt overrides", () => {
    const config = parseResearchConfig({
      prompt_overrides: {
        "research-agent-planner-system": "Plan carefully.",
        "research-agent-reporter-system": "",
        "research-agent-reflector-system": 42,
      },
    });
    expect(config.promptOverrides).toEqual({
      "research-agent-planner-system": "Plan carefully.",
    });
  });

  test("ignores prompt overrides that are not an object", () => {
    expect(parseResearchConfig({ prompt_overrides: ["a"] }).promptOverrides).toEqual({});
  });
});
