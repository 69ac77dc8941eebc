import type { SessionError, SessionErrorKind } from '../errors.js';
import type { Turn } from '../history/store.js';

/** Decoded output of one session. At most one terminal event, always last. */
export type StreamEvent =
  | { type: 'delta'; text: string }
  | { type: 'done' }
  | { type: 'failed'; cause: SessionError };

export type SessionState = 'pending' | 'connecting' | 'streaming' | 'completed' | 'failed' | 'cancelled';

/** An event on the dispatcher's merged channel. */
export interface AgentEvent {
  agentId: string;
  event: StreamEvent;
}

export interface RoundStats {
  round: number;
  completed: number;
  failed: number;
  totalTokensEstimate: number;
  durationMs: number;
}

export type RoundEvent =
  | { type: 'round_start'; round: number; agents: string[] }
  | { type: 'agent_start'; agentId: string; agentName: string }
  | { type: 'agent_chunk'; agentId: string; text: string }
  | { type: 'agent_done'; agentId: string; agentName: string; fullResponse: string; turn: Turn }
  | {
      type: 'agent_failed';
      agentId: string;
      agentName: string;
      kind: SessionErrorKind;
      error: string;
      partial: string;
    }
  | { type: 'round_end'; round: number; stats: RoundStats };
