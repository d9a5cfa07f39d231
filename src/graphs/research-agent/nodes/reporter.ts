/**
 * Report Synthesizer — the terminal step.
 */

import { PROMPT_NAMES } from "../prompts";
import { resultsForSection } from "../state";
import type { ResearchState, ResearchStateUpdate, SourceRecord } from "../state";
import { exchange, type NodeDependencies } from "./shared";

export const REPORT_SOURCE_LIMIT = 10;
export const EMPTY_SECTION_TEXT = "No research data available for this section.";

/**
 * Render the collected summaries, section by section, in `sections` order.
 */
export function renderResearchContent(state: ResearchState): string {
  let content = `# Research Report: ${state.query}\n\n`;

  for (const section of state.sections) {
    content += `## ${section}\n\n`;
    const results = resultsForSection(state.resultsBySection, section);
    if (results.length > 0) {
      for (const result of results) {
        content += `${result.summary}\n\n`;
      }
    } else {
      content += `${EMPTY_SECTION_TEXT}\n\n`;
    }
  }

  return content;
}

/**
 * Numbered source list for the first {@link REPORT_SOURCE_LIMIT} sources.
 * Empty string when there are none.
 */
export function renderSourcesBlock(sources: SourceRecord[]): string {
  if (sources.length === 0) return "";

  const lines = sources
    .slice(0, REPORT_SOURCE_LIMIT)
    .map((source, index) => `${index + 1}. [${source.title || "Untitled"}](${source.url || "#"})`);
  return `\n\n## Sources\n\n${lines.join("\n")}\n`;
}

export function createReporterNode(deps: NodeDependencies) {
  return async function writeReport(state: ResearchState): Promise<ResearchStateUpdate> {
    const { reply, turns } = await exchange(
      deps,
      { system: PROMPT_NAMES.reporterSystem, user: PROMPT_NAMES.reporterUser },
      { query: state.query, findings: renderResearchContent(state) },
    );

    const reportDraft = reply + renderSourcesBlock(state.sources);
    console.info(
      `[research-agent] write_report: ${reportDraft.length} chars, ${Math.min(state.sources.length, REPORT_SOURCE_LIMIT)} sources listed`,
    );

    return {
      reportDraft,
      researchComplete: true,
      messageLog: turns,
    };
  };
}
