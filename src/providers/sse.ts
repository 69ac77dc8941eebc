import { createParser, type EventSourceMessage } from 'eventsource-parser';
import { z } from 'zod';
import { SessionError, causeFromSignal, toSessionError } from '../errors.js';
import { makeLogger, type Logger } from '../observability/logger.js';
import type { StreamEvent } from '../roundtable/types.js';

const defaultLogger = makeLogger({ component: 'sse-decoder' });

/** Payload marking the end of a chat-completion stream. */
export const END_MARKER = '[DONE]';

/** The part of a chat-completion chunk we read: choices[0].delta.content. */
const ChunkSchema = z.object({
  choices: z.array(
    z.object({
      delta: z.object({ content: z.string().nullish() }).optional(),
    }),
  ),
});

const ErrorPayloadSchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string() })]),
});

type Payload =
  | { kind: 'end' }
  | { kind: 'delta'; text: string }
  | { kind: 'empty' }
  | { kind: 'upstream_error'; message: string }
  | { kind: 'malformed'; reason: string }
  | { kind: 'foreign' };

function interpretPayload(data: string): Payload {
  if (data.trim() === END_MARKER) return { kind: 'end' };

  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch (err) {
    return { kind: 'malformed', reason: err instanceof Error ? err.message : 'JSON parse error' };
  }

  const error = ErrorPayloadSchema.safeParse(json);
  if (error.success) {
    const e = error.data.error;
    return { kind: 'upstream_error', message: typeof e === 'string' ? e : e.message };
  }

  const chunk = ChunkSchema.safeParse(json);
  if (!chunk.success) return { kind: 'foreign' };

  const content = chunk.data.choices[0]?.delta?.content;
  return content ? { kind: 'delta', text: content } : { kind: 'empty' };
}

type ReadOutcome = { kind: 'chunk'; value: Uint8Array } | { kind: 'end' } | { kind: 'error'; err: unknown };

interface ChunkReader {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
}

async function readNext(reader: ChunkReader): Promise<ReadOutcome> {
  try {
    const { done, value } = await reader.read();
    return done || !value ? { kind: 'end' } : { kind: 'chunk', value };
  } catch (err) {
    return { kind: 'error', err };
  }
}

export interface DecodeOptions {
  /** Aborting cancels the reader and ends the sequence with `failed`. */
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Decode a chat-completion SSE body into stream events.
 *
 * Pulls one network chunk at a time, so a slow consumer holds the reader
 * rather than growing a buffer. Malformed and foreign records are skipped.
 * A clean close after at least one record counts as `done`.
 */
export async function* decodeEventStream(
  body: ReadableStream<Uint8Array>,
  options: DecodeOptions = {},
): AsyncGenerator<StreamEvent> {
  const { signal, logger = defaultLogger } = options;
  const reader = body.getReader();
  const decoder = new TextDecoder();
  const queue: EventSourceMessage[] = [];
  const parser = createParser({
    onEvent(event: EventSourceMessage) {
      queue.push(event);
    },
  });
  let records = 0;

  const onAbort = (): void => {
    reader.cancel(signal?.reason).catch((err: unknown) => {
      logger.debug({ err: err instanceof Error ? err.message : String(err) }, 'Reader cancel failed');
    });
  };
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    if (signal?.aborted) {
      yield { type: 'failed', cause: causeFromSignal(signal) };
      return;
    }

    while (true) {
      const outcome = await readNext(reader);

      if (signal?.aborted) {
        yield { type: 'failed', cause: causeFromSignal(signal) };
        return;
      }
      if (outcome.kind === 'error') {
        yield { type: 'failed', cause: toSessionError(outcome.err, 'connection') };
        return;
      }

      if (outcome.kind === 'chunk') {
        parser.feed(decoder.decode(outcome.value, { stream: true }));
      } else {
        // Terminate a trailing line and dispatch a record left without its blank line.
        parser.feed(`${decoder.decode()}\n\n`);
      }

      while (queue.length > 0) {
        if (signal?.aborted) {
          yield { type: 'failed', cause: causeFromSignal(signal) };
          return;
        }
        const message = queue.shift();
        if (!message) break;
        const payload = interpretPayload(message.data);

        switch (payload.kind) {
          case 'end':
            yield { type: 'done' };
            return;
          case 'delta':
            records++;
            yield { type: 'delta', text: payload.text };
            break;
          case 'empty':
            records++;
            break;
          case 'upstream_error':
            yield { type: 'failed', cause: new SessionError(`Upstream stream error: ${payload.message}`, 'upstream') };
            return;
          case 'malformed':
            logger.warn({ dataLength: message.data.length }, `Malformed SSE data: ${payload.reason}`);
            break;
          case 'foreign':
            logger.debug({ dataLength: message.data.length }, 'Skipping record outside the chunk envelope');
            break;
        }
      }

      if (outcome.kind === 'end') {
        yield records > 0
          ? { type: 'done' }
          : { type: 'failed', cause: new SessionError('Stream closed before any event', 'protocol') };
        return;
      }
    }
  } finally {
    signal?.removeEventListener('abort', onAbort);
    await reader.cancel().catch((err: unknown) => {
      logger.debug({ err: err instanceof Error ? err.message : String(err) }, 'Reader cancel failed');
    });
    reader.releaseLock();
  }
}
