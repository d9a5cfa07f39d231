/**
 * Query Planner — breaks the topic into search queries and sections.
 */

import { z } from "zod";

import { parseStructuredReply } from "../parsing";
import { PROMPT_NAMES } from "../prompts";
import type { ResearchState, ResearchStateUpdate } from "../state";
import { exchange, type NodeDependencies } from "./shared";

export const FALLBACK_SECTIONS = ["Overview", "Details", "Conclusion"];

const nonEmptyStrings = z.array(z.string().trim().min(1)).min(1);

export const PlannerReplySchema = z.object({
  queries: nonEmptyStrings,
  sections: nonEmptyStrings,
});

export function createPlannerNode(deps: NodeDependencies) {
  return async function planQueries(state: ResearchState): Promise<ResearchStateUpdate> {
    if (state.sections.length > 0) {
      return {};
    }

    const { reply, turns } = await exchange(
      deps,
      { system: PROMPT_NAMES.plannerSystem, user: PROMPT_NAMES.plannerUser },
      { query: state.query },
    );

    const parsed = parseStructuredReply(reply, PlannerReplySchema);
    if (!parsed.ok) {
      console.warn(
        `[research-agent] plan_queries: ${parsed.reason} — falling back to the original query`,
      );
      return {
        searchQueries: [state.query],
        sections: [...FALLBACK_SECTIONS],
        messageLog: turns,
      };
    }

    console.info(
      `[research-agent] plan_queries: ${parsed.value.queries.length} queries, ${parsed.value.sections.length} sections for query: ${state.query.slice(0, 80)}`,
    );
    return {
      searchQueries: parsed.value.queries,
      sections: parsed.value.sections,
      messageLog: turns,
    };
  };
}
