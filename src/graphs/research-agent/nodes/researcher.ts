/**
 * Section Researcher — searches each query, summarises the top hits,
 * and files the result under the query's section.
 *
 * Queries are worked on concurrently (bounded by `maxConcurrency`). Each
 * query's summary is generated from that query's own hits only, and the
 * per-query outcomes are reassembled in query order before the update is
 * returned, so the merge does not depend on which call finished first.
 * If any query fails the whole step rejects and nothing is merged.
 */

import { PROMPT_NAMES } from "../prompts";
import type {
  ChatTurn,
  ResearchResult,
  ResearchState,
  ResearchStateUpdate,
  ResultsBySection,
  SearchHit,
  SourceRecord,
} from "../state";
import { resultsForSection, setSectionResults } from "../state";
import { mapWithConcurrency } from "../utils/concurrency";
import { exchange, type NodeDependencies } from "./shared";

export const SOURCE_CONTENT_LIMIT = 500;
export const SUMMARY_HIT_COUNT = 3;
export const SUMMARY_CONTENT_LIMIT = 300;
export const NO_RESULTS_TEXT = "No search results were returned for this query.";

/** First `limit` code points of `text`; never splits a surrogate pair. */
export function truncateText(text: string, limit: number): string {
  if (text.length <= limit) return text;
  return Array.from(text).slice(0, limit).join("");
}

/** `sections[i]` when in range, else `"Section i+1"`. */
export function resolveSection(sections: string[], index: number): string {
  return index < sections.length ? sections[index] : `Section ${index + 1}`;
}

/**
 * Condensed view of the top hits that the summariser sees.
 */
export function condenseHits(hits: SearchHit[]): string {
  if (hits.length === 0) return NO_RESULTS_TEXT;
  return hits
    .slice(0, SUMMARY_HIT_COUNT)
    .map(
      (hit) =>
        `Title: ${hit.title || "N/A"}\nContent: ${truncateText(hit.content || "N/A", SUMMARY_CONTENT_LIMIT)}`,
    )
    .join("\n\n");
}

interface QueryOutcome {
  section: string;
  sources: SourceRecord[];
  result: ResearchResult;
  turns: ChatTurn[];
}

export function createResearcherNode(deps: NodeDependencies) {
  const { maxConcurrency, searchMaxResults, searchDepth } = deps.config;

  async function researchQuery(
    query: string,
    index: number,
    sections: string[],
  ): Promise<QueryOutcome> {
    const section = resolveSection(sections, index);
    const hits = await deps.webSearcher.search(query, searchMaxResults, searchDepth);

    const { reply, turns } = await exchange(
      deps,
      { system: PROMPT_NAMES.summarizerSystem, user: PROMPT_NAMES.summarizerUser },
      { query, results: condenseHits(hits) },
    );

    return {
      section,
      sources: hits.map((hit) => ({
        url: hit.url,
        title: hit.title,
        content: truncateText(hit.content, SOURCE_CONTENT_LIMIT),
      })),
      result: {
        query,
        summary: reply,
        rawResults: hits.slice(0, SUMMARY_HIT_COUNT),
      },
      turns,
    };
  }

  return async function researchSections(state: ResearchState): Promise<ResearchStateUpdate> {
    const queries = state.searchQueries;
    if (queries.length === 0) {
      return {};
    }

    const outcomes = await mapWithConcurrency(queries, maxConcurrency, (query, index) =>
      researchQuery(query, index, state.sections),
    );

    const sources: SourceRecord[] = [];
    const resultsBySection: ResultsBySection = {};
    const messageLog: ChatTurn[] = [];
    for (const outcome of outcomes) {
      sources.push(...outcome.sources);
      setSectionResults(resultsBySection, outcome.section, [
        ...resultsForSection(resultsBySection, outcome.section),
        outcome.result,
      ]);
      messageLog.push(...outcome.turns);
    }

    const iterationCount = state.iterationCount + 1;
    console.info(
      `[research-agent] research_sections: iteration ${iterationCount}, ${queries.length} queries, ${sources.length} sources`,
    );

    return {
      resultsBySection,
      sources,
      messageLog,
      iterationCount,
    };
  };
}
