import type { AgentDefinition, PanelConfig } from '../config/schema.js';
import type { ChatMessage, ChatOptions } from '../providers/types.js';
import { renderTranscript, type Turn } from '../history/store.js';

/**
 * Build the message array for one speaker.
 *
 * system: shared rules, then the persona verbatim.
 * user:   the frozen transcript, then the turn-taking instruction.
 */
export function buildPanelistMessages(
  rules: string,
  agent: AgentDefinition,
  snapshot: readonly Turn[],
): ChatMessage[] {
  const turnPrompt =
    `It is now your turn, ${agent.name}. ` +
    'Reply to the conversation above in your own voice. Write only your own words, without a speaker label.';

  const userParts: string[] = [];
  if (snapshot.length > 0) {
    userParts.push(`## Conversation so far\n\n${renderTranscript(snapshot)}`);
  }
  userParts.push(turnPrompt);

  return [
    { role: 'system', content: `${rules.trim()}\n\n${agent.persona.trim()}` },
    { role: 'user', content: userParts.join('\n\n') },
  ];
}

/** Per-agent overrides win over the panel's defaults. */
export function resolveSampling(agent: AgentDefinition, config: PanelConfig): { model: string; options: ChatOptions } {
  return {
    model: agent.model ?? config.model,
    options: {
      temperature: agent.temperature ?? config.temperature,
      maxTokens: agent.maxTokens ?? config.maxTokens,
    },
  };
}
