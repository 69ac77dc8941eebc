import { z } from 'zod';
import { DEFAULT_AGENT_TIMEOUT_S, DEFAULT_MODEL } from './defaults.js';

export const AgentDefinitionSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  /** Persona directive, sent verbatim in the agent's system message. */
  persona: z.string().min(1),
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
});

export const PanelConfigSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  /** Global discussion rules shared by every agent. */
  rules: z.string().min(1),
  model: z.string().min(1).default(DEFAULT_MODEL),
  temperature: z.number().min(0).max(2).default(0.8),
  maxTokens: z.number().int().positive().default(512),
  /** Speaker label for user turns in rendered transcripts. */
  userLabel: z.string().min(1).default('User'),
  /** Per-agent session timeout in seconds. */
  agentTimeout: z.number().positive().default(DEFAULT_AGENT_TIMEOUT_S),
  /** Optional deadline for a whole round, in seconds. */
  roundTimeout: z.number().positive().optional(),
  /** Worker ceiling; defaults to the roster size. */
  maxConcurrency: z.number().int().positive().optional(),
  agents: z
    .array(AgentDefinitionSchema)
    .min(1, { message: 'At least one agent is required' })
    .max(8)
    .refine((agents) => new Set(agents.map((a) => a.id)).size === agents.length, {
      message: 'Agent ids must be unique',
    }),
});

export type AgentDefinition = z.infer<typeof AgentDefinitionSchema>;
export type PanelConfig = z.infer<typeof PanelConfigSchema>;
export type PanelConfigInput = z.input<typeof PanelConfigSchema>;
