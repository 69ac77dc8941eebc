import { PanelConfigSchema, type PanelConfig } from '../config/schema.js';

/** Built-in fallback preset: a 3-speaker panel, used when no "default" preset file is found. */
export const DEFAULT_PRESET: PanelConfig = PanelConfigSchema.parse({
  name: 'Default Panel',
  description: 'Balanced 3-speaker panel discussion',
  rules:
    'You are one speaker on a small live panel. Reply in at most three short paragraphs. ' +
    'Speak in your own voice, address other speakers by name when you respond to them, ' +
    'and never write lines on behalf of anyone else.',
  agents: [
    {
      id: 'analyst',
      name: 'The Analyst',
      persona:
        'You are a careful analytical thinker. Weigh evidence, name the key numbers, and keep your claims precise.',
    },
    {
      id: 'skeptic',
      name: 'The Skeptic',
      persona:
        'You question assumptions and point out what others have missed. Be direct but fair.',
      temperature: 0.9,
    },
    {
      id: 'pragmatist',
      name: 'The Pragmatist',
      persona:
        'You care about what can actually be done next. Turn the discussion into concrete, modest steps.',
    },
  ],
});
