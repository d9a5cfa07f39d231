/**
 * Tests for infra/tracing — Langfuse integration and LangSmith disabling.
 *
 * Tests cover:
 * - LangSmith tracing disabled by default (LANGCHAIN_TRACING_V2)
 * - Langfuse initialization and shutdown lifecycle
 * - Callback handler creation
 * - injectTracing() config augmentation
 * - Graceful degradation when Langfuse is not configured
 */

import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import type { RunnableConfig } from "@langchain/core/runnables";

import {
  _resetTracingState,
  getLangfuseCallbackHandler,
  initializeLangfuse,
  injectTracing,
  isLangfuseEnabled,
  shutdownLangfuse,
} from "../src/infra/tracing";

function makeConfig(): RunnableConfig {
  return {
    configurable: { thread_id: "test-thread" },
    recursionLimit: 30,
  };
}

beforeEach(() => {
  _resetTracingState();
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  _resetTracingState();
  vi.restoreAllMocks();
});

// ===========================================================================
// LangSmith Disabling
// ===========================================================================

describe("LangSmith Disabling", () => {
  test("LANGCHAIN_TRACING_V2 defaults to 'false' after module import", () => {
    expect(process.env.LANGCHAIN_TRACING_V2).toBe("false");
  });
});

// ===========================================================================
// Disabled path
// ===========================================================================

describe("Langfuse — not configured", () => {
  test("initializeLangfuse returns false and logs why", async () => {
    await expect(initializeLangfuse({ enabled: false })).resolves.toBe(false);
    expect(isLangfuseEnabled()).toBe(false);
    expect(console.log).toHaveBeenCalledWith(
      "[tracing] Langfuse not configured (LANGFUSE_SECRET_KEY / LANGFUSE_PUBLIC_KEY not set) — tracing disabled",
    );
  });

  test("getLangfuseCallbackHandler returns null", () => {
    expect(getLangfuseCallbackHandler({ sessionId: "s1" })).toBeNull();
  });

  test("injectTracing returns the config unchanged", () => {
    const config = makeConfig();
    expect(injectTracing(config, { sessionId: "s1", traceName: "research-run" })).toBe(config);
  });

  test("shutdownLangfuse is a no-op", () => {
    shutdownLangfuse();
    expect(isLangfuseEnabled()).toBe(false);
    expect(console.log).not.toHaveBeenCalled();
  });
});

// ===========================================================================
// Enabled path
// ===========================================================================

describe("Langfuse — enabled", () => {
  test("initializes once and reports enabled", async () => {
    await expect(initializeLangfuse({ enabled: true })).resolves.toBe(true);
    await expect(initializeLangfuse({ enabled: true })).resolves.toBe(true);
    expect(isLangfuseEnabled()).toBe(true);
  });

  test("injectTracing adds a handler, metadata and run name", async () => {
    await initializeLangfuse({ enabled: true });
    const config = makeConfig();

    const traced = injectTracing(config, {
      sessionId: "session-1",
      userId: "user-1",
      traceName: "research-run",
      tags: ["research"],
    });

    expect(traced).not.toBe(config);
    expect(Array.isArray(traced.callbacks) ? traced.callbacks.length : 0).toBe(1);
    expect(traced.metadata).toEqual({
      langfuseSessionId: "session-1",
      langfuseUserId: "user-1",
      langfuseTags: ["research"],
    });
    expect(traced.runName).toBe("research-run");
    expect(traced.configurable).toEqual({ thread_id: "test-thread" });
    expect(traced.recursionLimit).toBe(30);
  });

  test("shutdown turns tracing off again", async () => {
    await initializeLangfuse({ enabled: true });
    shutdownLangfuse();
    expect(isLangfuseEnabled()).toBe(false);
    expect(getLangfuseCallbackHandler()).toBeNull();
  });
});
