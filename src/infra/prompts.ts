/**
 * Prompt registry for the research workflow.
 *
 * Graphs register their hardcoded default templates by name at module
 * level. At call time {@link renderPrompt} resolves the template (a
 * runtime override from `prompt_overrides` wins over the default) and
 * fills in `{{variable}}` placeholders.
 *
 * Runtime override (sent via the configurable dict):
 *
 *   {
 *     "prompt_overrides": {
 *       "research-agent-planner-system": "You are a meticulous analyst."
 *     }
 *   }
 */

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

const registeredPrompts: Map<string, string> = new Map();

/**
 * Register a default template. First registration of a name wins.
 */
export function registerDefaultPrompt(name: string, template: string): void {
  if (registeredPrompts.has(name)) {
    return;
  }
  registeredPrompts.set(name, template);
}

/** Names of every registered prompt, in registration order. */
export function getRegisteredPromptNames(): string[] {
  return [...registeredPrompts.keys()];
}

// ---------------------------------------------------------------------------
// Substitution
// ---------------------------------------------------------------------------

/**
 * Regex matching `{{variable}}` placeholders.
 */
const VARIABLE_PATTERN = /\{\{(\w+)\}\}/g;

/**
 * Replace `{{key}}` placeholders in a text string.
 *
 * Unknown placeholders are left untouched.
 *
 * @example
 *   substituteVariables("Topic: {{query}}", { query: "tides" }) // → "Topic: tides"
 */
export function substituteVariables(
  template: string,
  variables: Record<string, string>,
): string {
  return template.replace(VARIABLE_PATTERN, (match, key: string) => {
    const value = variables[key];
    return value !== undefined ? value : match;
  });
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export interface RenderPromptOptions {
  /** Per-name template overrides (from `prompt_overrides`). */
  overrides?: Record<string, string> | null;
  /** `{{key}}` substitution values. */
  variables?: Record<string, string> | null;
}

/**
 * Resolve a prompt by name and substitute its variables.
 *
 * @throws {Error} when `name` was never registered and has no override.
 */
export function renderPrompt(name: string, options?: RenderPromptOptions): string {
  const template = options?.overrides?.[name] ?? registeredPrompts.get(name);
  if (template === undefined) {
    throw new Error(`Unknown prompt '${name}'`);
  }
  return options?.variables ? substituteVariables(template, options.variables) : template;
}
