/**
 * Default prompts for the research workflow.
 *
 * Each step uses a system prompt plus a user template. Templates use
 * `{{variable}}` placeholders filled by `renderPrompt()`; any of them can
 * be replaced at run time through `prompt_overrides`.
 */

import { registerDefaultPrompt } from "../../infra/prompts";

export const PLANNER_SYSTEM_PROMPT =
  "You are a research assistant that breaks down complex topics into searchable queries.";

export const PLANNER_USER_PROMPT = `You are a research assistant. Break down the following research query into 3-5 specific search queries and identify key sections to research.

Research Query: {{query}}

Generate:
1. A list of 3-5 specific search queries (each should be focused and searchable)
2. A list of 3-5 research sections/topics to cover

Respond in JSON format:
{
    "queries": ["query1", "query2", ...],
    "sections": ["section1", "section2", ...]
}`;

export const SUMMARIZER_SYSTEM_PROMPT =
  "You are a research assistant that summarizes search results.";

export const SUMMARIZER_USER_PROMPT = `Summarize the following search results for the query: "{{query}}"

Search Results:
{{results}}

Provide a concise summary (2-3 sentences) of the key findings.`;

export const REFLECTOR_SYSTEM_PROMPT = "You are a research quality evaluator.";

export const REFLECTOR_USER_PROMPT = `Evaluate the completeness of this research:

{{status}}

Rate the research completeness on a scale of 0-10 and provide:
1. Completeness score (0-10)
2. What's missing or needs improvement
3. Suggested next actions (if score < 8)

Respond in JSON format:
{
    "score": 7,
    "feedback": "What's missing...",
    "next_actions": ["action1", "action2"],
    "is_complete": false
}`;

export const REPORTER_SYSTEM_PROMPT = "You are a professional research report writer.";

export const REPORTER_USER_PROMPT = `Based on the following research findings, write a comprehensive, well-structured research report.

Research Query: {{query}}

Research Findings:
{{findings}}

Write a professional research report with:
1. Executive Summary
2. Detailed findings for each section
3. Key insights and conclusions
4. References to sources`;

export const PROMPT_NAMES = {
  plannerSystem: "research-agent-planner-system",
  plannerUser: "research-agent-planner-user",
  summarizerSystem: "research-agent-summarizer-system",
  summarizerUser: "research-agent-summarizer-user",
  reflectorSystem: "research-agent-reflector-system",
  reflectorUser: "research-agent-reflector-user",
  reporterSystem: "research-agent-reporter-system",
  reporterUser: "research-agent-reporter-user",
} as const;

registerDefaultPrompt(PROMPT_NAMES.plannerSystem, PLANNER_SYSTEM_PROMPT);
registerDefaultPrompt(PROMPT_NAMES.plannerUser, PLANNER_USER_PROMPT);
registerDefaultPrompt(PROMPT_NAMES.summarizerSystem, SUMMARIZER_SYSTEM_PROMPT);
registerDefaultPrompt(PROMPT_NAMES.summarizerUser, SUMMARIZER_USER_PROMPT);
registerDefaultPrompt(PROMPT_NAMES.reflectorSystem, REFLECTOR_SYSTEM_PROMPT);
registerDefaultPrompt(PROMPT_NAMES.reflectorUser, REFLECTOR_USER_PROMPT);
registerDefaultPrompt(PROMPT_NAMES.reporterSystem, REPORTER_SYSTEM_PROMPT);
registerDefaultPrompt(PROMPT_NAMES.reporterUser, REPORTER_USER_PROMPT);
