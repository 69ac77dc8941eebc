import type { AgentDefinition } from '../config/schema.js';
import { PreconditionError } from '../errors.js';
import type { ConversationHistory } from '../history/store.js';
import { makeLogger, type Logger } from '../observability/logger.js';
import type { Dispatcher } from './dispatcher.js';
import type { RoundEvent } from './types.js';

const defaultLogger = makeLogger({ component: 'turn-coordinator' });

/**
 * Estimate tokens from text length (rough: ~3.5 chars per token).
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 3.5);
}

/**
 * Drives one round at a time against a shared history.
 *
 * The caller appends the user's turn before calling runRound(). Agent turns
 * are appended as each stream finishes, so history order is completion
 * order, not roster order. Failed agents append nothing.
 */
export class TurnCoordinator {
  private readonly agents: ReadonlyMap<string, AgentDefinition>;
  private active = false;
  private roundCount = 0;
  private readonly logger: Logger;

  constructor(
    roster: readonly AgentDefinition[],
    private readonly dispatcher: Dispatcher,
    logger?: Logger,
  ) {
    this.agents = new Map(roster.map((agent) => [agent.id, agent]));
    this.logger = logger ?? defaultLogger;
  }

  get rounds(): number {
    return this.roundCount;
  }

  isRunning(): boolean {
    return this.active;
  }

  /**
   * Run one round and yield its events. The generator finishes after
   * `round_end`, once every session has reached a terminal state.
   */
  async *runRound(history: ConversationHistory): AsyncGenerator<RoundEvent> {
    if (this.active) {
      throw new PreconditionError('A round is already in progress');
    }
    if (this.agents.size === 0) {
      throw new PreconditionError('Cannot run a round with an empty roster');
    }
    if (history.last()?.author !== 'user') {
      throw new PreconditionError('Append the user turn before starting a round');
    }

    this.active = true;
    try {
      const round = ++this.roundCount;
      const startTime = Date.now();
      const roster = [...this.agents.values()];
      // Frozen once; appends below stay invisible to sessions in flight.
      const snapshot = history.snapshot();
      const replies = new Map<string, string[]>();
      let completed = 0;
      let failed = 0;
      let totalTokens = 0;

      yield { type: 'round_start', round, agents: roster.map((a) => a.name) };

      for await (const { agentId, event } of this.dispatcher.run(roster, snapshot)) {
        const agent = this.agents.get(agentId);
        if (!agent) {
          this.logger.error({ agentId }, 'Event for an agent outside the roster');
          continue;
        }

        switch (event.type) {
          case 'delta': {
            let parts = replies.get(agentId);
            if (!parts) {
              parts = [];
              replies.set(agentId, parts);
              yield { type: 'agent_start', agentId, agentName: agent.name };
            }
            parts.push(event.text);
            yield { type: 'agent_chunk', agentId, text: event.text };
            break;
          }

          case 'done': {
            const fullResponse = (replies.get(agentId) ?? []).join('');
            const turn = history.append({ author: 'agent', agentId, speaker: agent.name, text: fullResponse });
            completed++;
            totalTokens += estimateTokens(fullResponse);
            yield { type: 'agent_done', agentId, agentName: agent.name, fullResponse, turn };
            break;
          }

          case 'failed': {
            failed++;
            this.logger.warn({ agentId, kind: event.cause.kind }, 'Agent session failed');
            yield {
              type: 'agent_failed',
              agentId,
              agentName: agent.name,
              kind: event.cause.kind,
              error: event.cause.message,
              partial: (replies.get(agentId) ?? []).join(''),
            };
            break;
          }
        }
      }

      const stats = { round, completed, failed, totalTokensEstimate: totalTokens, durationMs: Date.now() - startTime };
      this.logger.info(stats, 'Round complete');
      yield { type: 'round_end', round, stats };
    } finally {
      this.active = false;
    }
  }
}
