import type { PanelConfig } from '../config/schema.js';
import { loadEnv, requireApiKey, type RuntimeEnv } from '../config/env.js';
import { PreconditionError } from '../errors.js';
import { ConversationHistory } from '../history/store.js';
import type { Logger } from '../observability/logger.js';
import { RequestSession } from '../providers/session.js';
import type { FetchLike } from '../providers/types.js';
import { resolveSampling } from './context.js';
import { TurnCoordinator } from './coordinator.js';
import { Dispatcher, type SessionFactory } from './dispatcher.js';
import type { RoundEvent } from './types.js';

export interface PanelOptions {
  env?: RuntimeEnv;
  fetch?: FetchLike;
  logger?: Logger;
}

export interface Panel {
  config: PanelConfig;
  history: ConversationHistory;
  coordinator: TurnCoordinator;
  /** Append the user's message, then run a round over it. */
  say(text: string): AsyncGenerator<RoundEvent>;
}

/** Session factory that talks to the chat-completion endpoint over HTTP. */
export function createHttpSessionFactory(
  config: PanelConfig,
  env: RuntimeEnv,
  options: Pick<PanelOptions, 'fetch' | 'logger'> = {},
): SessionFactory {
  const apiKey = requireApiKey(env);
  return (agent, snapshot) => {
    const { model, options: sampling } = resolveSampling(agent, config);
    return new RequestSession(agent, snapshot, {
      baseUrl: env.OPENAI_BASE_URL,
      apiKey,
      rules: config.rules,
      model,
      options: sampling,
      timeoutMs: config.agentTimeout * 1000,
      fetch: options.fetch,
      logger: options.logger,
    });
  };
}

/**
 * Wire history, dispatcher and coordinator for one panel.
 * Missing credentials or an empty roster fail here, before any round.
 */
export function createPanel(config: PanelConfig, options: PanelOptions = {}): Panel {
  if (config.agents.length === 0) {
    throw new PreconditionError('Panel has no agents');
  }
  const env = options.env ?? loadEnv();
  const dispatcher = new Dispatcher(createHttpSessionFactory(config, env, options), {
    maxConcurrency: config.maxConcurrency,
    roundTimeoutMs: config.roundTimeout === undefined ? undefined : config.roundTimeout * 1000,
    logger: options.logger,
  });
  const history = new ConversationHistory();
  const coordinator = new TurnCoordinator(config.agents, dispatcher, options.logger);

  return {
    config,
    history,
    coordinator,
    async *say(text: string): AsyncGenerator<RoundEvent> {
      if (coordinator.isRunning()) {
        throw new PreconditionError('A round is already in progress');
      }
      history.append({ author: 'user', speaker: config.userLabel, text });
      yield* coordinator.runRound(history);
    },
  };
}
