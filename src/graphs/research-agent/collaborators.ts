/**
 * External collaborators of the research workflow.
 *
 * The graph only sees two interfaces:
 *
 * - {@link TextGenerator} — turns an ordered list of role-tagged turns
 *   into a reply. Backed by a LangChain chat model in production.
 * - {@link WebSearcher} — returns ranked hits for a query. Backed by
 *   Tavily in production.
 *
 * Both are injected when the graph is built; no node reads global
 * configuration or constructs a client. {@link guardTextGenerator} and
 * {@link guardWebSearcher} attach a per-call timeout and bounded retry
 * with exponential backoff to any implementation.
 */

import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { tavily } from "@tavily/core";

import {
  CollaboratorError,
  CollaboratorTimeoutError,
  errorMessage,
  type CollaboratorName,
} from "../../models/errors";
import type { ChatTurn, SearchHit } from "./state";

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export type SearchDepth = "basic" | "advanced";

/** Per-call options shared by both collaborators. */
export interface CallOptions {
  /** Aborted when the call's time budget runs out. */
  signal?: AbortSignal;
  /** The attempt's time budget, for clients that take their own timeout. */
  timeoutMs?: number;
}

export interface TextGenerator {
  generate(messages: ChatTurn[], options?: CallOptions): Promise<string>;
}

export interface WebSearcher {
  /**
   * Search the web. Must return at most `maxResults` hits; an empty
   * list is a valid answer.
   */
  search(
    query: string,
    maxResults: number,
    depth: SearchDepth,
    options?: CallOptions,
  ): Promise<SearchHit[]>;
}

// ---------------------------------------------------------------------------
// LangChain chat model adapter
// ---------------------------------------------------------------------------

/**
 * Extract the text content from a LangChain message response.
 *
 * Handles plain strings, `{ content: string }`, and multimodal content
 * block arrays (only `text` blocks are kept).
 */
export function extractContent(response: unknown): string {
  if (typeof response === "string") return response;

  if (response !== null && typeof response === "object" && "content" in response) {
    const content: unknown = response.content;
    if (typeof content === "string") return content;

    if (Array.isArray(content)) {
      return content
        .map((block: unknown) => {
          if (typeof block === "string") return block;
          if (
            typeof block === "object" &&
            block !== null &&
            "type" in block &&
            block.type === "text" &&
            "text" in block
          ) {
            return String(block.text ?? "");
          }
          return "";
        })
        .filter((text) => text.length > 0)
        .join(" ");
    }
  }

  return "";
}

/**
 * {@link TextGenerator} backed by any LangChain chat model.
 */
export class ChatModelTextGenerator implements TextGenerator {
  private readonly model: BaseChatModel;

  constructor(model: BaseChatModel) {
    this.model = model;
  }

  async generate(messages: ChatTurn[], options?: CallOptions): Promise<string> {
    const response = await this.model.invoke(
      messages.map((turn) => ({ role: turn.role, content: turn.content })),
      options?.signal ? { signal: options.signal } : undefined,
    );
    return extractContent(response);
  }
}

// ---------------------------------------------------------------------------
// Tavily adapter
// ---------------------------------------------------------------------------

/** The part of the Tavily client the adapter uses. */
export interface TavilySearchClient {
  search(
    query: string,
    options: { searchDepth: SearchDepth; maxResults: number; timeout?: number },
  ): Promise<{ results: Array<{ url: string; title: string; content: string }> }>;
}

/**
 * {@link WebSearcher} backed by the Tavily search API.
 *
 * The client takes no `AbortSignal`, so a timed-out attempt is bounded by
 * the client's own `timeout` (whole seconds) rather than cancelled.
 */
export class TavilyWebSearcher implements WebSearcher {
  private readonly client: TavilySearchClient;

  constructor(options: { apiKey: string } | { client: TavilySearchClient }) {
    this.client = "client" in options ? options.client : tavily({ apiKey: options.apiKey });
  }

  async search(
    query: string,
    maxResults: number,
    depth: SearchDepth,
    options?: CallOptions,
  ): Promise<SearchHit[]> {
    options?.signal?.throwIfAborted();
    const response = await this.client.search(query, {
      searchDepth: depth,
      maxResults,
      ...(options?.timeoutMs ? { timeout: Math.max(1, Math.ceil(options.timeoutMs / 1000)) } : {}),
    });

    return response.results.slice(0, maxResults).map((result) => ({
      url: result.url,
      title: result.title,
      content: result.content,
    }));
  }
}

// ---------------------------------------------------------------------------
// Timeout and retry
// ---------------------------------------------------------------------------

export interface CallPolicy {
  /** Per-attempt time budget in ms. `0` disables the timeout. */
  timeoutMs: number;
  /** Extra attempts after the first failure. */
  maxRetries: number;
  /** Delay before the first retry; doubles on each further retry. */
  retryBaseDelayMs: number;
}

/**
 * HTTP statuses that will not change on retry. Anything else (network
 * errors, 408, 429, 5xx, timeouts) is retried.
 */
function isPermanentFailure(error: unknown): boolean {
  if (error instanceof CollaboratorError) return !error.retryable;
  if (typeof error === "object" && error !== null && "status" in error) {
    const status = error.status;
    if (typeof status === "number") {
      return status >= 400 && status < 500 && status !== 408 && status !== 429;
    }
  }
  return false;
}

function toCollaboratorError(
  collaborator: CollaboratorName,
  error: unknown,
): CollaboratorError {
  if (error instanceof CollaboratorError) return error;
  return new CollaboratorError(
    collaborator,
    `${collaborator} call failed: ${errorMessage(error)}`,
    { retryable: !isPermanentFailure(error), cause: error },
  );
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function withTimeout<T>(
  collaborator: CollaboratorName,
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs <= 0) {
    return operation(controller.signal);
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new CollaboratorTimeoutError(collaborator, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run a collaborator call under a {@link CallPolicy}.
 *
 * @throws {CollaboratorError} once the call has failed permanently or
 *   every retry has been used.
 */
export async function callWithPolicy<T>(
  collaborator: CollaboratorName,
  operation: (signal: AbortSignal) => Promise<T>,
  policy: CallPolicy,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await withTimeout(collaborator, operation, policy.timeoutMs);
    } catch (error: unknown) {
      const failure = toCollaboratorError(collaborator, error);
      if (!failure.retryable || attempt >= policy.maxRetries) {
        throw failure;
      }

      const delay = policy.retryBaseDelayMs * 2 ** attempt;
      console.warn(
        `[research-agent] ${collaborator} attempt ${attempt + 1} failed (${failure.message}); retrying in ${delay}ms`,
      );
      await sleep(delay);
    }
  }
}

/** Wrap a {@link TextGenerator} with timeout and retry. */
export function guardTextGenerator(
  generator: TextGenerator,
  policy: CallPolicy,
): TextGenerator {
  return {
    generate: (messages) =>
      callWithPolicy(
        "text-generation",
        (signal) => generator.generate(messages, { signal }),
        policy,
      ),
  };
}

/** Wrap a {@link WebSearcher} with timeout and retry. */
export function guardWebSearcher(
  searcher: WebSearcher,
  policy: CallPolicy,
): WebSearcher {
  return {
    search: (query, maxResults, depth) =>
      callWithPolicy(
        "web-search",
        (signal) =>
          searcher.search(query, maxResults, depth, {
            signal,
            ...(policy.timeoutMs > 0 ? { timeoutMs: policy.timeoutMs } : {}),
          }),
        policy,
      ),
  };
}
