import type { RuntimeEnv } from '../../src/config/env.js';
import { PanelConfigSchema, type AgentDefinition, type PanelConfig } from '../../src/config/schema.js';
import type { StreamEvent } from '../../src/roundtable/types.js';

export const TEST_ENV: RuntimeEnv = {
  OPENAI_API_KEY: 'test-secret',
  OPENAI_BASE_URL: 'http://panel.test/v1',
  LOG_LEVEL: 'silent',
};

/** Agent "a" is named "Agent A" and requests model "model-a", which fakes route on. */
export function agent(id: string, overrides: Partial<AgentDefinition> = {}): AgentDefinition {
  return {
    id,
    name: `Agent ${id.toUpperCase()}`,
    persona: `You are agent ${id}.`,
    model: `model-${id}`,
    ...overrides,
  };
}

export function panelConfig(agents: AgentDefinition[], overrides: Partial<PanelConfig> = {}): PanelConfig {
  return PanelConfigSchema.parse({ rules: 'Be brief.', agents, ...overrides });
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

/** Compact form for order assertions: "delta:hi", "done", "failed:timeout". */
export function summarize(event: StreamEvent): string {
  switch (event.type) {
    case 'delta':
      return `delta:${event.text}`;
    case 'done':
      return 'done';
    case 'failed':
      return `failed:${event.cause.kind}`;
  }
}
