/**
 * In-process collaborator stand-ins for the research workflow tests.
 *
 * Replies are routed by the system prompt of each exchange, so a test
 * can script the planner, summariser, reflector and reporter separately
 * regardless of the order concurrent calls arrive in.
 */

import type {
  CallOptions,
  SearchDepth,
  TextGenerator,
  WebSearcher,
} from "../src/graphs/research-agent/collaborators";
import {
  PLANNER_SYSTEM_PROMPT,
  REFLECTOR_SYSTEM_PROMPT,
  REPORTER_SYSTEM_PROMPT,
  SUMMARIZER_SYSTEM_PROMPT,
} from "../src/graphs/research-agent/prompts";
import type { ChatTurn, SearchHit } from "../src/graphs/research-agent/state";

export type StepName = "planner" | "summarizer" | "reflector" | "reporter";

/** A scripted reply: a fixed string, or computed from the user turn. */
export type ScriptedReply = string | ((userContent: string) => string);

const STEP_BY_SYSTEM_PROMPT: Record<string, StepName> = {
  [PLANNER_SYSTEM_PROMPT]: "planner",
  [SUMMARIZER_SYSTEM_PROMPT]: "summarizer",
  [REFLECTOR_SYSTEM_PROMPT]: "reflector",
  [REPORTER_SYSTEM_PROMPT]: "reporter",
};

export interface RecordedGeneration {
  step: StepName;
  messages: ChatTurn[];
}

/**
 * Text generator that answers each step from its own reply queue. The
 * last reply of a queue is repeated once the queue runs dry. A step can
 * also be told to fail its next N calls.
 */
export class ScriptedTextGenerator implements TextGenerator {
  readonly calls: RecordedGeneration[] = [];
  private readonly replies: Partial<Record<StepName, ScriptedReply[]>>;
  private readonly failures: Partial<Record<StepName, number>> = {};
  private failureError: Error = new Error("unavailable");

  constructor(replies: Partial<Record<StepName, ScriptedReply[]>>) {
    this.replies = replies;
  }

  failNext(step: StepName, times: number, error: Error = new Error(`${step} unavailable`)): void {
    this.failures[step] = times;
    this.failureError = error;
  }

  callsFor(step: StepName): RecordedGeneration[] {
    return this.calls.filter((call) => call.step === step);
  }

  async generate(messages: ChatTurn[], _options?: CallOptions): Promise<string> {
    const system = messages.find((turn) => turn.role === "system")?.content ?? "";
    const user = messages.find((turn) => turn.role === "user")?.content ?? "";
    const step = STEP_BY_SYSTEM_PROMPT[system];
    if (step === undefined) {
      throw new Error(`Unexpected system prompt: ${system}`);
    }

    const remainingFailures = this.failures[step] ?? 0;
    if (remainingFailures > 0) {
      this.failures[step] = remainingFailures - 1;
      throw this.failureError;
    }

    this.calls.push({ step, messages });

    const queue = this.replies[step] ?? [];
    const reply = queue.length > 1 ? queue.shift() : queue[0];
    if (reply === undefined) {
      throw new Error(`No scripted reply for ${step}`);
    }
    return typeof reply === "string" ? reply : reply(user);
  }
}

export interface RecordedSearch {
  query: string;
  maxResults: number;
  depth: SearchDepth;
}

/**
 * Web searcher backed by a fixed query → hits table. Unknown queries
 * return no hits.
 */
export class FakeWebSearcher implements WebSearcher {
  readonly calls: RecordedSearch[] = [];
  private readonly table: Record<string, SearchHit[]>;
  private failuresLeft = 0;

  constructor(table: Record<string, SearchHit[]> = {}) {
    this.table = table;
  }

  failNext(times: number): void {
    this.failuresLeft = times;
  }

  async search(
    query: string,
    maxResults: number,
    depth: SearchDepth,
    _options?: CallOptions,
  ): Promise<SearchHit[]> {
    if (this.failuresLeft > 0) {
      this.failuresLeft -= 1;
      throw new Error("search backend unavailable");
    }
    this.calls.push({ query, maxResults, depth });
    return (this.table[query] ?? []).slice(0, maxResults);
  }
}

/** Build a hit whose fields are derived from `id`. */
export function hit(id: string, content = `Content about ${id}.`): SearchHit {
  return { url: `https://example.test/${id}`, title: `Title ${id}`, content };
}
