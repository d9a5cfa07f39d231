/**
 * Routing after reflection.
 *
 * Both edges out of `reflect` exist in the graph; which one is taken is a
 * policy decision, not a structural one.
 */

import type { ReflectionPolicy } from "./configuration";
import type { ResearchState } from "./state";

export type ReflectionDecision = { kind: "continue" } | { kind: "finalize" };

export const RESEARCH_NODE = "research_sections";
export const REPORT_NODE = "write_report";

export function decideAfterReflection(
  state: Pick<ResearchState, "researchComplete">,
  policy: ReflectionPolicy,
): ReflectionDecision {
  switch (policy) {
    case "always-finalize":
      return { kind: "finalize" };
    case "until-complete":
      return state.researchComplete ? { kind: "finalize" } : { kind: "continue" };
  }
}

/** Map a decision onto the node the graph moves to next. */
export function nextNodeFor(
  decision: ReflectionDecision,
): typeof RESEARCH_NODE | typeof REPORT_NODE {
  return decision.kind === "continue" ? RESEARCH_NODE : REPORT_NODE;
}
