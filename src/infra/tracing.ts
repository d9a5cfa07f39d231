/**
 * Tracing configuration for the deep research agent.
 *
 * Handles Langfuse initialization and provides callback handlers for
 * LangGraph runs. Disables LangSmith tracing by default.
 *
 * Usage:
 *
 *   import { initializeLangfuse, injectTracing } from "./infra/tracing";
 *
 *   // At startup
 *   await initializeLangfuse({ enabled: isLangfuseConfigured(config), baseUrl });
 *
 *   // Per run
 *   const tracedConfig = injectTracing(runConfig, {
 *     sessionId,
 *     traceName: "research-run",
 *   });
 *   const result = await graph.invoke(input, tracedConfig);
 *
 * The Langfuse handler reads its credentials from `LANGFUSE_SECRET_KEY`,
 * `LANGFUSE_PUBLIC_KEY` and `LANGFUSE_BASE_URL` itself.
 */

import type { RunnableConfig } from "@langchain/core/runnables";

import { errorMessage } from "../models/errors";

// ---------------------------------------------------------------------------
// Disable LangSmith tracing by default
// ---------------------------------------------------------------------------
// LangChain checks this env var to decide whether to send traces to
// LangSmith. Users can still set LANGCHAIN_TRACING_V2=true explicitly.
if (!process.env.LANGCHAIN_TRACING_V2) {
  process.env.LANGCHAIN_TRACING_V2 = "false";
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Options for per-run tracing injection. */
export interface InjectTracingOptions {
  /** Owner / user identity for trace attribution. */
  userId?: string;
  /** Research session identifier for grouping. */
  sessionId?: string;
  /** Human-readable name shown in the Langfuse UI. */
  traceName?: string;
  /** Freeform tags for filtering in the Langfuse dashboard. */
  tags?: string[];
}

type CallbackHandlerClass = typeof import("@langfuse/langchain").CallbackHandler;
type CallbackHandler = InstanceType<CallbackHandlerClass>;

// ---------------------------------------------------------------------------
// Module state
// ---------------------------------------------------------------------------

/** Whether Langfuse has been successfully initialized. */
let langfuseInitialized = false;

/**
 * Cached reference to the Langfuse `CallbackHandler` class, loaded on
 * first successful initialization so `@langfuse/langchain` is never
 * imported when tracing is disabled.
 */
let handlerClass: CallbackHandlerClass | null = null;

// ---------------------------------------------------------------------------
// Public helpers
// ---------------------------------------------------------------------------

/**
 * Return `true` if the Langfuse integration has been initialized.
 */
export function isLangfuseEnabled(): boolean {
  return langfuseInitialized;
}

/**
 * Initialize the Langfuse integration.
 *
 * If tracing is not enabled or initialization fails, tracing stays off
 * and the application continues to function normally.
 *
 * @returns `true` if Langfuse was initialized, `false` otherwise.
 */
export async function initializeLangfuse(options: {
  enabled: boolean;
  baseUrl?: string;
}): Promise<boolean> {
  if (langfuseInitialized) {
    return true;
  }

  if (!options.enabled) {
    console.log(
      "[tracing] Langfuse not configured " +
        "(LANGFUSE_SECRET_KEY / LANGFUSE_PUBLIC_KEY not set) " +
        "— tracing disabled",
    );
    return false;
  }

  try {
    const langfuseLangchain = await import("@langfuse/langchain");
    handlerClass = langfuseLangchain.CallbackHandler;
    langfuseInitialized = true;

    console.log(
      `[tracing] Langfuse tracing initialized; baseUrl=${options.baseUrl || "https://cloud.langfuse.com"}`,
    );
    return true;
  } catch (error: unknown) {
    console.warn(`[tracing] Failed to initialize Langfuse — tracing disabled: ${errorMessage(error)}`);
    return false;
  }
}

/**
 * Turn tracing off again. Safe to call when it was never on.
 */
export function shutdownLangfuse(): void {
  if (!langfuseInitialized) {
    return;
  }
  langfuseInitialized = false;
  handlerClass = null;
  console.log("[tracing] Langfuse tracing shut down");
}

/**
 * Create a Langfuse `CallbackHandler` for a single run.
 *
 * @returns A handler, or `null` if Langfuse is not initialized.
 */
export function getLangfuseCallbackHandler(
  options?: InjectTracingOptions,
): CallbackHandler | null {
  if (!langfuseInitialized || !handlerClass) {
    return null;
  }

  try {
    return new handlerClass({
      ...(options?.userId ? { userId: options.userId } : {}),
      ...(options?.sessionId ? { sessionId: options.sessionId } : {}),
      ...(options?.tags ? { tags: options.tags } : {}),
    });
  } catch (error: unknown) {
    console.warn(`[tracing] Failed to create Langfuse callback handler: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Augment a run config with Langfuse tracing.
 *
 * If Langfuse is not initialized the config is returned unchanged, so
 * this is safe to call unconditionally for every run.
 *
 * 1. Appends a fresh `CallbackHandler` to the config's `callbacks` list.
 * 2. Adds `langfuseUserId`, `langfuseSessionId` and `langfuseTags` to
 *    `metadata`.
 * 3. Sets `runName` from `traceName`.
 *
 * @returns A **new** config with tracing injected, or the original one.
 */
export function injectTracing<T extends RunnableConfig>(
  config: T,
  options?: InjectTracingOptions,
): T {
  const handler = getLangfuseCallbackHandler(options);
  if (handler === null) {
    return config;
  }

  const existingCallbacks = Array.isArray(config.callbacks) ? config.callbacks : [];

  const langfuseMetadata: Record<string, unknown> = {};
  if (options?.userId) {
    langfuseMetadata.langfuseUserId = options.userId;
  }
  if (options?.sessionId) {
    langfuseMetadata.langfuseSessionId = options.sessionId;
  }
  if (options?.tags) {
    langfuseMetadata.langfuseTags = options.tags;
  }

  return {
    ...config,
    callbacks: [...existingCallbacks, handler],
    metadata: { ...(config.metadata ?? {}), ...langfuseMetadata },
    ...(options?.traceName ? { runName: options.traceName } : {}),
  };
}

/**
 * Reset module-level state for test isolation.
 *
 * **Warning:** tests only.
 */
export function _resetTracingState(): void {
  langfuseInitialized = false;
  handlerClass = null;
}

