/**
 * Pieces shared by the workflow nodes.
 */

import { renderPrompt } from "../../../infra/prompts";
import type { TextGenerator, WebSearcher } from "../collaborators";
import type { ResearchAgentConfig } from "../configuration";
import type { ChatTurn } from "../state";

/** What every node closes over. Collaborators arrive already guarded. */
export interface NodeDependencies {
  textGenerator: TextGenerator;
  webSearcher: WebSearcher;
  config: ResearchAgentConfig;
}

/** A model reply plus the turns to append to `messageLog`. */
export interface ModelExchange {
  reply: string;
  turns: ChatTurn[];
}

/**
 * Render a system/user prompt pair, call the text generator, and
 * return the reply along with the full exchange.
 */
export async function exchange(
  deps: NodeDependencies,
  promptNames: { system: string; user: string },
  variables: Record<string, string>,
): Promise<ModelExchange> {
  const overrides = deps.config.promptOverrides;
  const messages: ChatTurn[] = [
    { role: "system", content: renderPrompt(promptNames.system, { overrides }) },
    { role: "user", content: renderPrompt(promptNames.user, { overrides, variables }) },
  ];

  const reply = await deps.textGenerator.generate(messages);
  return {
    reply,
    turns: [...messages, { role: "assistant", content: reply }],
  };
}
