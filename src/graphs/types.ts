/**
 * Shared graph types.
 *
 * These define the contract between a graph factory and whoever runs the
 * graph (the CLI, tests). Everything a graph touches outside its own
 * process arrives through {@link GraphFactoryOptions}.
 */

import type { BaseCheckpointSaver } from "@langchain/langgraph";

import type { TextGenerator, WebSearcher } from "./research-agent/collaborators";

/**
 * Options passed to a graph factory alongside the configurable dict.
 *
 * Every field is optional. Missing collaborators are built from the
 * configuration and keys; a missing checkpointer means a `MemorySaver`
 * when checkpointing is enabled, none otherwise.
 */
export interface GraphFactoryOptions {
  /** Checkpoint store for session persistence. */
  checkpointer?: BaseCheckpointSaver;

  /** Text-generation collaborator. Defaults to a LangChain chat model. */
  textGenerator?: TextGenerator;

  /** Web-search collaborator. Defaults to Tavily. */
  webSearcher?: WebSearcher;

  /** Provider API keys by variable name (e.g. `OPENAI_API_KEY`). */
  apiKeys?: Record<string, string | undefined>;

  /** Tavily API key for the default web searcher. */
  tavilyApiKey?: string;
}
