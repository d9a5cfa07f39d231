/**
 * Quality Reflector — scores how complete the research is and decides
 * whether it is done.
 *
 * `researchComplete` is forced true once `iterationCount` reaches
 * `maxIterations`, whatever the model replied. A reply that cannot be
 * parsed never claims completeness on its own.
 */

import { z } from "zod";

import { parseStructuredReply } from "../parsing";
import { PROMPT_NAMES } from "../prompts";
import { resultsForSection } from "../state";
import type { ResearchState, ResearchStateUpdate } from "../state";
import { exchange, type NodeDependencies } from "./shared";

export const FALLBACK_SCORE = 5;
export const FALLBACK_FEEDBACK = "Unable to parse reflection";
export const DEFAULT_FEEDBACK = "No feedback provided";
/** Score at or above which a reply without `is_complete` counts as complete. */
export const COMPLETE_SCORE_THRESHOLD = 8;

export const ReflectionReplySchema = z.object({
  score: z.number().optional(),
  feedback: z.string().optional(),
  next_actions: z.array(z.string()).optional(),
  is_complete: z.boolean().optional(),
});

/**
 * Build the status summary the reflector evaluates.
 */
export function buildResearchStatus(state: ResearchState): string {
  const lines = [
    `Research Query: ${state.query}`,
    "",
    `Sections to cover: ${state.sections.join(", ")}`,
    "",
    "Current Research Status:",
  ];

  for (const section of state.sections) {
    const results = resultsForSection(state.resultsBySection, section);
    lines.push(
      results.length > 0
        ? `- ${section}: ${results.length} summaries collected`
        : `- ${section}: Not yet researched`,
    );
  }

  return lines.join("\n");
}

/** Normalise a 0–10 score into [0, 1]. */
export function normaliseScore(score: number): number {
  return Math.max(0, Math.min(10, score)) / 10;
}

export function createReflectorNode(deps: NodeDependencies) {
  const { maxIterations } = deps.config;

  return async function reflect(state: ResearchState): Promise<ResearchStateUpdate> {
    const capReached = state.iterationCount >= maxIterations;

    const { reply, turns } = await exchange(
      deps,
      { system: PROMPT_NAMES.reflectorSystem, user: PROMPT_NAMES.reflectorUser },
      { status: buildResearchStatus(state) },
    );

    const parsed = parseStructuredReply(reply, ReflectionReplySchema);
    if (!parsed.ok) {
      console.warn(
        `[research-agent] reflect: ${parsed.reason} — using fallback score ${FALLBACK_SCORE}`,
      );
      return {
        confidenceScore: normaliseScore(FALLBACK_SCORE),
        reflectionFeedback: FALLBACK_FEEDBACK,
        suggestedActions: [],
        researchComplete: capReached,
        messageLog: turns,
      };
    }

    const score = parsed.value.score ?? FALLBACK_SCORE;
    const isComplete = parsed.value.is_complete ?? score >= COMPLETE_SCORE_THRESHOLD;
    const researchComplete = isComplete || capReached;

    console.info(
      `[research-agent] reflect: score=${score}/10 complete=${researchComplete} iteration=${state.iterationCount}/${maxIterations}`,
    );

    return {
      confidenceScore: normaliseScore(score),
      reflectionFeedback: parsed.value.feedback ?? DEFAULT_FEEDBACK,
      suggestedActions: parsed.value.next_actions ?? [],
      researchComplete,
      messageLog: turns,
    };
  };
}
