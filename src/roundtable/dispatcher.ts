import type { AgentDefinition } from '../config/schema.js';
import { PreconditionError, SessionError, formatBudget, toSessionError } from '../errors.js';
import type { Turn } from '../history/store.js';
import { makeLogger, type Logger } from '../observability/logger.js';
import type { StreamSession } from '../providers/session.js';
import { AsyncChannel } from './channel.js';
import type { AgentEvent } from './types.js';

const defaultLogger = makeLogger({ component: 'dispatcher' });

export type SessionFactory = (agent: AgentDefinition, snapshot: readonly Turn[]) => StreamSession;

export interface DispatcherOptions {
  /** Worker ceiling; defaults to the roster size. */
  maxConcurrency?: number;
  /** Round deadline. Sessions not terminal by then fail with a timeout. */
  roundTimeoutMs?: number;
  /** Merge buffer size before producers wait on the consumer. */
  bufferSize?: number;
  logger?: Logger;
}

/**
 * Fans one snapshot out to every agent and merges their streams.
 *
 * Ordering contract: fine-grained interleave. Events from different agents
 * are surfaced in arrival order, whichever session has an event ready first,
 * regardless of roster position; each agent's own events keep their order.
 * The sequence ends once every session has produced its terminal event.
 */
export class Dispatcher {
  private readonly logger: Logger;

  constructor(
    private readonly createSession: SessionFactory,
    private readonly options: DispatcherOptions = {},
  ) {
    this.logger = options.logger ?? defaultLogger;
  }

  async *run(agents: readonly AgentDefinition[], snapshot: readonly Turn[]): AsyncGenerator<AgentEvent> {
    if (agents.length === 0) {
      throw new PreconditionError('Cannot dispatch a round with an empty roster');
    }

    const sessions = agents.map((agent) => this.createSession(agent, snapshot));
    const channel = new AsyncChannel<AgentEvent>(this.options.bufferSize ?? 16);
    const workerCount = Math.min(this.options.maxConcurrency ?? sessions.length, sessions.length);
    let nextIndex = 0;

    const pump = async (session: StreamSession): Promise<void> => {
      let terminated = false;
      try {
        for await (const event of session.start().events()) {
          terminated = event.type !== 'delta';
          await channel.push({ agentId: session.agentId, event });
        }
      } catch (err) {
        // Sessions report failures as events; a throw here is a bug in the session.
        const cause = toSessionError(err, 'protocol');
        this.logger.error({ agentId: session.agentId, err: cause.message }, 'Session threw');
        if (!terminated) {
          await channel.push({ agentId: session.agentId, event: { type: 'failed', cause } });
        }
      }
    };

    const worker = async (): Promise<void> => {
      while (nextIndex < sessions.length) {
        const session = sessions[nextIndex++];
        if (session.state !== 'pending') continue;
        await pump(session);
      }
    };

    const { roundTimeoutMs } = this.options;
    const deadline =
      roundTimeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            this.logger.warn({ roundTimeoutMs }, 'Round deadline reached');
            const cause = new SessionError(`Round deadline of ${formatBudget(roundTimeoutMs)} exceeded`, 'timeout');
            for (const session of sessions) session.fail(cause);
          }, roundTimeoutMs);

    const workers = Promise.all(Array.from({ length: workerCount }, worker)).finally(() => {
      channel.close();
    });

    try {
      yield* channel;
    } finally {
      clearTimeout(deadline);
      for (const session of sessions) session.cancel();
      channel.close();
      await workers;
    }
  }
}
