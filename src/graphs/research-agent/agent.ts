/**
 * Deep research workflow.
 *
 *     START
 *       → plan_queries        (LLM: split the topic into queries + sections)
 *       → research_sections   (search + summarise every query, bounded pool)
 *       → reflect             (LLM: score completeness)
 *           ├─ continue → research_sections
 *           └─ finalize → write_report
 *       → write_report        (LLM: synthesise the report, append sources)
 *     END
 *
 * Which edge leaves `reflect` is decided by the configured reflection
 * policy (see `routing.ts`). The graph is checkpointed per session
 * (`thread_id = sessionId`) so a run that failed part-way can be resumed
 * from its last completed step.
 */

import { END, MemorySaver, START, StateGraph } from "@langchain/langgraph";
import type { BaseCheckpointSaver } from "@langchain/langgraph";

import {
  apiKeysFrom,
  loadConfig,
  toConfigurable,
  validateConfig,
  type AppConfig,
} from "../../config";
import { injectTracing } from "../../infra/tracing";
import {
  ConfigurationError,
  ResearchInputError,
  SessionConflictError,
} from "../../models/errors";
import type { GraphFactoryOptions } from "../types";
import {
  ChatModelTextGenerator,
  TavilyWebSearcher,
  guardTextGenerator,
  guardWebSearcher,
  type WebSearcher,
} from "./collaborators";
import { parseResearchConfig, type ResearchAgentConfig } from "./configuration";
import { createPlannerNode } from "./nodes/planner";
import { createReflectorNode } from "./nodes/reflector";
import { createReporterNode } from "./nodes/reporter";
import { createResearcherNode } from "./nodes/researcher";
import type { NodeDependencies } from "./nodes/shared";
import { createChatModel } from "./providers";
import { REPORT_NODE, RESEARCH_NODE, decideAfterReflection, nextNodeFor } from "./routing";
import {
  ResearchStateAnnotation,
  ResearchStateSchema,
  createInitialState,
  type ResearchState,
} from "./state";

// ---------------------------------------------------------------------------
// Graph builder
// ---------------------------------------------------------------------------

/**
 * Construct and compile the research StateGraph.
 *
 * The collaborators in `deps` are wrapped with the configured timeout and
 * retry policy here, so the nodes only ever see guarded ones.
 */
export function buildResearchGraph(deps: NodeDependencies, checkpointer?: BaseCheckpointSaver) {
  const { config } = deps;
  const policy = {
    timeoutMs: config.callTimeoutMs,
    maxRetries: config.maxRetries,
    retryBaseDelayMs: config.retryBaseDelayMs,
  };
  const guarded: NodeDependencies = {
    config,
    textGenerator: guardTextGenerator(deps.textGenerator, policy),
    webSearcher: guardWebSearcher(deps.webSearcher, policy),
  };

  const compiled = new StateGraph(ResearchStateAnnotation)
    .addNode("plan_queries", createPlannerNode(guarded))
    .addNode(RESEARCH_NODE, createResearcherNode(guarded))
    .addNode("reflect", createReflectorNode(guarded))
    .addNode(REPORT_NODE, createReporterNode(guarded))
    .addEdge(START, "plan_queries")
    .addEdge("plan_queries", RESEARCH_NODE)
    .addEdge(RESEARCH_NODE, "reflect")
    .addConditionalEdges(
      "reflect",
      (state: ResearchState) =>
        nextNodeFor(decideAfterReflection(state, config.reflectionPolicy)),
      [RESEARCH_NODE, REPORT_NODE],
    )
    .addEdge(REPORT_NODE, END)
    .compile({ checkpointer });

  console.info(
    `[research-agent] graph compiled: policy=${config.reflectionPolicy}, max_iterations=${config.maxIterations}, checkpointer=${checkpointer ? "yes" : "none"}`,
  );

  return compiled;
}

export type ResearchGraph = ReturnType<typeof buildResearchGraph>;

/** A compiled graph together with the settings it was built from. */
export interface ResearchRunner {
  graph: ResearchGraph;
  config: ResearchAgentConfig;
  checkpointer: BaseCheckpointSaver | undefined;
}

// ---------------------------------------------------------------------------
// Public graph factory
// ---------------------------------------------------------------------------

/**
 * Build a research runner from a configurable dict.
 *
 * 1. Parses the configurable dict into a typed `ResearchAgentConfig`.
 * 2. Uses the injected collaborators, or builds a chat model via the
 *    multi-provider factory and a Tavily searcher from `tavilyApiKey`.
 * 3. Picks the checkpointer: the injected one, a `MemorySaver`, or none
 *    when checkpointing is disabled.
 *
 * @throws {ConfigurationError} when no web searcher can be built.
 *
 * @example
 *   const runner = await graph(
 *     { model_name: "openai:gpt-4o", reflection_policy: "until-complete" },
 *     { apiKeys: { OPENAI_API_KEY: "test-key" }, tavilyApiKey: "test-key" },
 *   );
 */
export async function graph(
  configurable: Record<string, unknown> = {},
  options: GraphFactoryOptions = {},
): Promise<ResearchRunner> {
  const config = parseResearchConfig(configurable);

  console.info(
    `[research-agent] graph() invoked; model_name=${config.modelName}, ` +
      `base_url_present=${Boolean(config.baseUrl)}, ` +
      `max_iterations=${config.maxIterations}, max_concurrency=${config.maxConcurrency}`,
  );

  let webSearcher: WebSearcher;
  if (options.webSearcher) {
    webSearcher = options.webSearcher;
  } else if (options.tavilyApiKey) {
    webSearcher = new TavilyWebSearcher({ apiKey: options.tavilyApiKey });
  } else {
    throw new ConfigurationError("A web searcher or TAVILY_API_KEY is required", [
      "TAVILY_API_KEY",
    ]);
  }

  const textGenerator =
    options.textGenerator ??
    new ChatModelTextGenerator(await createChatModel(config, options.apiKeys ?? {}));

  const checkpointer = config.checkpointEnabled
    ? (options.checkpointer ?? new MemorySaver())
    : undefined;

  return {
    graph: buildResearchGraph({ textGenerator, webSearcher, config }, checkpointer),
    config,
    checkpointer,
  };
}

/**
 * Build a runner from environment configuration.
 */
export function createRunnerFromConfig(appConfig: AppConfig): Promise<ResearchRunner> {
  return graph(toConfigurable(appConfig), {
    apiKeys: apiKeysFrom(appConfig),
    tavilyApiKey: appConfig.tavilyApiKey,
  });
}

let defaultRunner: Promise<ResearchRunner> | null = null;

/**
 * Runner built from the environment, validated before first use. A failed
 * build is not cached, so a corrected environment is picked up next call.
 */
function getDefaultRunner(): Promise<ResearchRunner> {
  if (defaultRunner === null) {
    const pending = (async () => {
      const appConfig = loadConfig();
      validateConfig(appConfig);
      return createRunnerFromConfig(appConfig);
    })();
    defaultRunner = pending;
    pending.catch(() => {
      if (defaultRunner === pending) defaultRunner = null;
    });
  }
  return defaultRunner;
}

// ---------------------------------------------------------------------------
// Running
// ---------------------------------------------------------------------------

/** Step budget that always leaves room for `maxIterations` research rounds. */
export function recursionLimitFor(config: Pick<ResearchAgentConfig, "maxIterations">): number {
  return 2 * config.maxIterations + 10;
}

/**
 * Read the stored state for a session.
 *
 * @returns The last checkpointed state, or `null` when the runner has no
 *   checkpointer or the session has never run.
 */
export async function loadSession(
  sessionId: string,
  runner: ResearchRunner,
): Promise<ResearchState | null> {
  if (!runner.checkpointer) return null;

  const snapshot = await runner.graph.getState({ configurable: { thread_id: sessionId } });
  return parseStoredState(snapshot.values);
}

function parseStoredState(values: unknown): ResearchState | null {
  const parsed = ResearchStateSchema.safeParse(values);
  if (!parsed.success || parsed.data.query === "") {
    return null;
  }
  return parsed.data;
}

/**
 * Run the research workflow for `query` under `sessionId`.
 *
 * With a checkpointer:
 * - a session whose last run stopped part-way is resumed from its last
 *   completed step;
 * - a completed session with the same query returns its stored state
 *   without calling any collaborator;
 * - a session holding another query is rejected.
 *
 * @throws {ResearchInputError} when `query` is empty.
 * @throws {SessionConflictError} when the session holds another query.
 */
export async function runResearch(
  query: string,
  sessionId: string,
  runner?: ResearchRunner,
): Promise<ResearchState> {
  const topic = query.trim();
  if (topic === "") {
    throw new ResearchInputError("Research query must not be empty");
  }

  const activeRunner = runner ?? (await getDefaultRunner());
  const runConfig = injectTracing(
    {
      configurable: { thread_id: sessionId },
      recursionLimit: recursionLimitFor(activeRunner.config),
    },
    { sessionId, traceName: "research-run" },
  );

  if (activeRunner.checkpointer) {
    const snapshot = await activeRunner.graph.getState({
      configurable: { thread_id: sessionId },
    });
    const stored = parseStoredState(snapshot.values);

    if (stored !== null) {
      if (stored.query !== topic) {
        throw new SessionConflictError(
          sessionId,
          `Session '${sessionId}' already holds research for another query`,
        );
      }

      if (snapshot.next.length > 0) {
        console.info(
          `[research-agent] resuming session ${sessionId} at ${snapshot.next.join(", ")}`,
        );
        return activeRunner.graph.invoke(null, runConfig);
      }

      console.info(`[research-agent] session ${sessionId} already complete; returning stored state`);
      return stored;
    }
  }

  console.info(`[research-agent] starting session ${sessionId}: ${topic.slice(0, 80)}`);
  return activeRunner.graph.invoke(createInitialState(topic), runConfig);
}
