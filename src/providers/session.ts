import type { AgentDefinition } from '../config/schema.js';
import { SessionError, causeFromSignal, formatBudget, toSessionError } from '../errors.js';
import type { Turn } from '../history/store.js';
import { makeLogger, type Logger } from '../observability/logger.js';
import { buildPanelistMessages } from '../roundtable/context.js';
import type { SessionState, StreamEvent } from '../roundtable/types.js';
import { decodeEventStream } from './sse.js';
import type { ChatCompletionRequest, FetchLike, SessionSettings } from './types.js';

const defaultLogger = makeLogger({ component: 'request-session' });

const ERROR_BODY_LIMIT = 200;

/** What the dispatcher needs from a session; RequestSession is the HTTP one. */
export interface StreamSession {
  readonly agentId: string;
  readonly state: SessionState;
  start(): this;
  events(): AsyncGenerator<StreamEvent>;
  cancel(): void;
  fail(cause: SessionError): void;
}

type Connection = { ok: true; response: Response } | { ok: false; err: unknown };

function isTerminal(state: SessionState): boolean {
  return state === 'completed' || state === 'failed' || state === 'cancelled';
}

async function readErrorBody(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text.length > ERROR_BODY_LIMIT ? `${text.slice(0, ERROR_BODY_LIMIT)}...` : text;
  } catch (err) {
    return err instanceof Error ? `(unreadable body: ${err.message})` : '(unreadable body)';
  }
}

/**
 * One agent's streaming chat-completion request against a frozen snapshot.
 *
 * pending -> connecting -> streaming -> completed | failed | cancelled.
 * The timeout runs from start() and fails the session even mid-stream;
 * deltas already yielded stay yielded. There is no retry.
 */
export class RequestSession implements StreamSession {
  private _state: SessionState = 'pending';
  private readonly controller = new AbortController();
  private connection: Promise<Connection> | undefined;
  private body: ChatCompletionRequest | undefined;
  private timer: ReturnType<typeof setTimeout> | undefined;
  private consumed = false;
  private startedAt = 0;
  private readonly logger: Logger;

  constructor(
    readonly agent: AgentDefinition,
    private readonly snapshot: readonly Turn[],
    private readonly settings: SessionSettings,
  ) {
    this.logger = settings.logger ?? defaultLogger;
  }

  get agentId(): string {
    return this.agent.id;
  }

  get state(): SessionState {
    return this._state;
  }

  /** The request body sent by start(); undefined before that. */
  get requestBody(): ChatCompletionRequest | undefined {
    return this.body;
  }

  start(): this {
    if (this._state !== 'pending') {
      throw new Error(`Session for ${this.agent.id} already started`);
    }
    this._state = 'connecting';
    this.startedAt = Date.now();

    const { baseUrl, apiKey, rules, model, options, timeoutMs } = this.settings;
    this.body = {
      model,
      messages: buildPanelistMessages(rules, this.agent, this.snapshot),
      temperature: options.temperature,
      max_tokens: options.maxTokens,
      stream: true,
    };

    if (this.controller.signal.aborted) {
      // Failed before dispatch (round deadline): no request goes out.
      this.connection = Promise.resolve({ ok: false, err: this.controller.signal.reason });
      return this;
    }

    this.timer = setTimeout(() => {
      this.fail(
        new SessionError(
          `${this.agent.name} (${model}) timed out after ${formatBudget(timeoutMs)}`,
          'timeout',
        ),
      );
    }, timeoutMs);

    const fetchImpl: FetchLike = this.settings.fetch ?? fetch;
    this.logger.debug({ agentId: this.agent.id, model }, 'Session connecting');
    this.connection = fetchImpl(`${baseUrl.replace(/\/+$/, '')}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'text/event-stream',
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify(this.body),
      signal: this.controller.signal,
    }).then(
      (response): Connection => ({ ok: true, response }),
      (err: unknown): Connection => ({ ok: false, err }),
    );
    return this;
  }

  /** Consumable once. Ends silently after cancel(). */
  async *events(): AsyncGenerator<StreamEvent> {
    if (this.consumed) throw new Error(`Events for ${this.agent.id} already consumed`);
    this.consumed = true;
    const connection = this.connection;
    if (!connection) throw new Error(`Session for ${this.agent.id} not started`);

    try {
      const outcome = await connection;
      if (this.isCancelled()) return;

      if (!outcome.ok) {
        const cause = this.controller.signal.aborted
          ? causeFromSignal(this.controller.signal)
          : toSessionError(outcome.err, 'connection');
        yield this.track({ type: 'failed', cause });
        return;
      }

      const { response } = outcome;
      if (!response.ok) {
        const detail = await readErrorBody(response);
        if (this.isCancelled()) return;
        const cause = this.controller.signal.aborted
          ? causeFromSignal(this.controller.signal)
          : new SessionError(`Upstream error: ${response.status} ${response.statusText} ${detail}`.trim(), 'upstream', response.status);
        yield this.track({ type: 'failed', cause });
        return;
      }

      if (!response.body) {
        yield this.track({ type: 'failed', cause: new SessionError('Response body is empty', 'protocol') });
        return;
      }

      for await (const event of decodeEventStream(response.body, {
        signal: this.controller.signal,
        logger: this.logger,
      })) {
        if (this.isCancelled()) return;
        yield this.track(event);
        if (event.type !== 'delta') return;
      }
    } finally {
      clearTimeout(this.timer);
      if (!isTerminal(this._state)) {
        // Consumer stopped early; release the connection.
        this.cancel();
      }
      this.logger.info(
        { agentId: this.agent.id, state: this._state, durationMs: Date.now() - this.startedAt },
        'Session ended',
      );
    }
  }

  cancel(): void {
    if (isTerminal(this._state)) return;
    this._state = 'cancelled';
    clearTimeout(this.timer);
    this.controller.abort(new SessionError('Session cancelled', 'cancelled'));
  }

  /** Abort with a cause; the sequence ends with `failed(cause)` unless it already ended. */
  fail(cause: SessionError): void {
    if (isTerminal(this._state) || this.controller.signal.aborted) return;
    clearTimeout(this.timer);
    this.controller.abort(cause);
  }

  // A method rather than an inline comparison: cancel() can run while awaiting.
  private isCancelled(): boolean {
    return this._state === 'cancelled';
  }

  private track(event: StreamEvent): StreamEvent {
    switch (event.type) {
      case 'delta':
        if (this._state === 'connecting') this._state = 'streaming';
        break;
      case 'done':
        this._state = 'completed';
        break;
      case 'failed':
        this._state = 'failed';
        break;
    }
    return event;
  }
}
