/**
 * Research state for the deep research workflow.
 *
 * One aggregate is threaded through every node. Nodes never mutate it;
 * they return a {@link ResearchStateUpdate} holding only the keys they
 * changed, and the reducers below decide how each key is merged:
 *
 * - replace:   `sections`, `searchQueries`, `confidenceScore`,
 *              `reflectionFeedback`, `suggestedActions`, `reportDraft`
 * - append:    `sources`, `messageLog`, `resultsBySection` (per section)
 * - monotonic: `iterationCount` (never decreases),
 *              `researchComplete` (false → true only),
 *              `query` (first non-empty value wins)
 */

import { Annotation } from "@langchain/langgraph";
import { z } from "zod";

// ---------------------------------------------------------------------------
// Record types
// ---------------------------------------------------------------------------

/** A single hit returned by the web-search collaborator. */
export interface SearchHit {
  url: string;
  title: string;
  content: string;
}

/** A source kept for the report. `content` is capped at 500 chars. */
export type SourceRecord = SearchHit;

/** One search query's outcome under its owning section. */
export interface ResearchResult {
  query: string;
  summary: string;
  /** The first three raw hits for the query. */
  rawResults: SearchHit[];
}

export type ChatRole = "system" | "user" | "assistant";

/** A role-tagged turn, as sent to or received from the text generator. */
export interface ChatTurn {
  role: ChatRole;
  content: string;
}

export type ResultsBySection = Record<string, ResearchResult[]>;

// ---------------------------------------------------------------------------
// Reducers
// ---------------------------------------------------------------------------

function replace<T>(_previous: T, next: T): T {
  return next;
}

function append<T>(previous: T[], next: T[]): T[] {
  return next.length === 0 ? previous : [...previous, ...next];
}

/**
 * Results stored under `section`, or `[]`. Section names come from the
 * model, so only own keys count ("constructor" must not resolve to
 * `Object.prototype.constructor`).
 */
export function resultsForSection(map: ResultsBySection, section: string): ResearchResult[] {
  return Object.hasOwn(map, section) ? map[section] : [];
}

/** Define `section` as an own data key, including "__proto__". */
export function setSectionResults(
  map: ResultsBySection,
  section: string,
  results: ResearchResult[],
): void {
  Object.defineProperty(map, section, {
    value: results,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Append each section's new results after the ones already stored.
 * Sections are created on first write.
 */
export function mergeResultsBySection(
  previous: ResultsBySection,
  next: ResultsBySection,
): ResultsBySection {
  const merged: ResultsBySection = { ...previous };
  for (const [section, results] of Object.entries(next)) {
    setSectionResults(merged, section, [...resultsForSection(merged, section), ...results]);
  }
  return merged;
}

// ---------------------------------------------------------------------------
// State annotation
// ---------------------------------------------------------------------------

export const ResearchStateAnnotation = Annotation.Root({
  /** The original research topic. */
  query: Annotation<string>({
    reducer: (previous, next) => (previous !== "" ? previous : next),
    default: () => "",
  }),

  /** Section labels the topic is broken into. */
  sections: Annotation<string[]>({
    reducer: replace,
    default: () => [],
  }),

  /** Search queries; index `i` belongs to `sections[i]` when present. */
  searchQueries: Annotation<string[]>({
    reducer: replace,
    default: () => [],
  }),

  resultsBySection: Annotation<ResultsBySection>({
    reducer: mergeResultsBySection,
    default: () => ({}),
  }),

  sources: Annotation<SourceRecord[]>({
    reducer: append,
    default: () => [],
  }),

  /** Number of Section Researcher invocations so far. */
  iterationCount: Annotation<number>({
    reducer: (previous, next) => Math.max(previous, next),
    default: () => 0,
  }),

  /** Normalised completeness score in [0, 1], set by the reflector. */
  confidenceScore: Annotation<number | null>({
    reducer: replace,
    default: () => null,
  }),

  researchComplete: Annotation<boolean>({
    reducer: (previous, next) => previous || next,
    default: () => false,
  }),

  reflectionFeedback: Annotation<string | null>({
    reducer: replace,
    default: () => null,
  }),

  /** Next actions suggested by the last reflection. */
  suggestedActions: Annotation<string[]>({
    reducer: replace,
    default: () => [],
  }),

  reportDraft: Annotation<string>({
    reducer: replace,
    default: () => "",
  }),

  /** Every model invocation's input and output, in call order. */
  messageLog: Annotation<ChatTurn[]>({
    reducer: append,
    default: () => [],
  }),
});

export type ResearchState = typeof ResearchStateAnnotation.State;
export type ResearchStateUpdate = typeof ResearchStateAnnotation.Update;

// ---------------------------------------------------------------------------
// Construction and validation
// ---------------------------------------------------------------------------

/**
 * Build the initial state for a fresh run: every field at its default
 * except `query`.
 */
export function createInitialState(query: string): ResearchState {
  return {
    query,
    sections: [],
    searchQueries: [],
    resultsBySection: {},
    sources: [],
    iterationCount: 0,
    confidenceScore: null,
    researchComplete: false,
    reflectionFeedback: null,
    suggestedActions: [],
    reportDraft: "",
    messageLog: [],
  };
}

const SearchHitSchema = z.object({
  url: z.string(),
  title: z.string(),
  content: z.string(),
});

/** Shape check for state read back from a checkpoint. */
export const ResearchStateSchema = z.object({
  query: z.string(),
  sections: z.array(z.string()),
  searchQueries: z.array(z.string()),
  resultsBySection: z.record(
    z.string(),
    z.array(
      z.object({
        query: z.string(),
        summary: z.string(),
        rawResults: z.array(SearchHitSchema),
      }),
    ),
  ),
  sources: z.array(SearchHitSchema),
  iterationCount: z.number().int().nonnegative(),
  confidenceScore: z.number().min(0).max(1).nullable(),
  researchComplete: z.boolean(),
  reflectionFeedback: z.string().nullable(),
  suggestedActions: z.array(z.string()),
  reportDraft: z.string(),
  messageLog: z.array(
    z.object({
      role: z.enum(["system", "user", "assistant"]),
      content: z.string(),
    }),
  ),
});
