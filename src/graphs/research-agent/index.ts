/**
 * Research Agent — plan, research, reflect, report.
 *
 * The graph factory uses dependency injection for its collaborators and
 * persistence; it never reads the environment itself.
 *
 * Usage:
 *
 *   import { graph, runResearch } from "./graphs/research-agent";
 *
 *   const runner = await graph(configurable, { textGenerator, webSearcher });
 *   const state = await runResearch("solid-state batteries", "session-1", runner);
 */

export {
  graph,
  buildResearchGraph,
  createRunnerFromConfig,
  loadSession,
  recursionLimitFor,
  runResearch,
  type ResearchGraph,
  type ResearchRunner,
} from "./agent";
export {
  ChatModelTextGenerator,
  TavilyWebSearcher,
  callWithPolicy,
  guardTextGenerator,
  guardWebSearcher,
  type CallPolicy,
  type SearchDepth,
  type TextGenerator,
  type WebSearcher,
} from "./collaborators";
export {
  parseResearchConfig,
  DEFAULT_MODEL_NAME,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_REFLECTION_POLICY,
  type ReflectionPolicy,
  type ResearchAgentConfig,
} from "./configuration";
export { PROMPT_NAMES } from "./prompts";
export {
  createInitialState,
  type ChatTurn,
  type ResearchResult,
  type ResearchState,
  type SearchHit,
  type SourceRecord,
} from "./state";
