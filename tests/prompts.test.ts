/**
 * Tests for the prompt registry (`infra/prompts.ts`) and the research
 * workflow's default prompts.
 *
 * Tests cover:
 *   - Variable substitution
 *   - Registration (first wins) and name listing
 *   - Rendering with overrides and variables
 *   - Every research prompt is registered under its name
 */

import { describe, test, expect } from "vitest";

import {
  getRegisteredPromptNames,
  registerDefaultPrompt,
  renderPrompt,
  substituteVariables,
} from "../src/infra/prompts";
import {
  PLANNER_SYSTEM_PROMPT,
  PROMPT_NAMES,
  REPORTER_USER_PROMPT,
} from "../src/graphs/research-agent/prompts";

// ===================================================================
// substituteVariables
// ===================================================================

describe("prompts — substituteVariables", () => {
  test("replaces known placeholders", () => {
    expect(substituteVariables("Topic: {{query}}", { query: "tides" })).toBe("Topic: tides");
  });

  test("replaces every occurrence", () => {
    expect(substituteVariables("{{a}} and {{a}}", { a: "x" })).toBe("x and x");
  });

  test("leaves unknown placeholders untouched", () => {
    expect(substituteVariables("{{query}} {{other}}", { query: "tides" })).toBe(
      "tides {{other}}",
    );
  });

  test("does not expand placeholders inside substituted values", () => {
    expect(substituteVariables("{{a}}", { a: "{{b}}", b: "nested" })).toBe("{{b}}");
  });
});

// ===================================================================
// Registry
// ===================================================================

describe("prompts — registry", () => {
  test("first registration of a name wins", () => {
    registerDefaultPrompt("test-first-wins", "original");
    registerDefaultPrompt("test-first-wins", "replacement");
    expect(renderPrompt("test-first-wins")).toBe("original");
  });

  test("registered names include every research prompt", () => {
    const names = getRegisteredPromptNames();
    for (const name of Object.values(PROMPT_NAMES)) {
      expect(names).toContain(name);
    }
  });

  test("research prompt names follow research-agent-<step>-<role>", () => {
    for (const name of Object.values(PROMPT_NAMES)) {
      expect(name).toMatch(/^research-agent-(planner|summarizer|reflector|reporter)-(system|user)$/);
    }
  });
});

// ===================================================================
// renderPrompt
// ===================================================================

describe("prompts — renderPrompt", () => {
  test("renders a registered default", () => {
    expect(renderPrompt(PROMPT_NAMES.plannerSystem)).toBe(PLANNER_SYSTEM_PROMPT);
  });

  test("substitutes variables into the default", () => {
    const rendered = renderPrompt(PROMPT_NAMES.reporterUser, {
      variables: { query: "tides", findings: "## Overview" },
    });
    expect(rendered).toBe(
      REPORTER_USER_PROMPT.replace("{{query}}", "tides").replace("{{findings}}", "## Overview"),
    );
  });

  test("an override replaces the default template", () => {
    const rendered = renderPrompt(PROMPT_NAMES.plannerUser, {
      overrides: { [PROMPT_NAMES.plannerUser]: "List queries for {{query}}." },
      variables: { query: "tides" },
    });
    expect(rendered).toBe("List queries for tides.");
  });

  test("overrides for other names are ignored", () => {
    const rendered = renderPrompt(PROMPT_NAMES.plannerSystem, {
      overrides: { [PROMPT_NAMES.reporterSystem]: "Something else" },
    });
    expect(rendered).toBe(PLANNER_SYSTEM_PROMPT);
  });

  test("throws for an unknown name", () => {
    expect(() => renderPrompt("no-such-prompt")).toThrow("Unknown prompt 'no-such-prompt'");
  });
});
