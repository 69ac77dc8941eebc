import { describe, expect, it } from 'vitest';
import { decodeEventStream } from '../../src/providers/sse.js';
import { SessionError } from '../../src/errors.js';
import { makeNoopLogger } from '../../src/observability/logger.js';
import { SSE_DONE, scriptedBody, sseDelta, type Step } from '../helpers/fake-endpoint.js';
import { collect, summarize } from '../helpers/fixtures.js';

function chunks(...parts: string[]): Step[] {
  return parts.map((chunk) => ({ chunk }));
}

async function decode(steps: Step[]): Promise<string[]> {
  const events = await collect(decodeEventStream(scriptedBody(steps)));
  return events.map(summarize);
}

describe('decodeEventStream', () => {
  it('yields deltas in order and stops at the end marker without emitting it', async () => {
    expect(await decode(chunks(sseDelta('hi'), sseDelta(' there'), SSE_DONE))).toEqual([
      'delta:hi',
      'delta: there',
      'done',
    ]);
  });

  it('reassembles a record split across network chunks', async () => {
    const steps = chunks('data: {"choi', 'ces":[{"delta":{"content":"Hel', 'lo"}}]}\n', '\n', SSE_DONE);
    expect(await decode(steps)).toEqual(['delta:Hello', 'done']);
  });

  it('keeps multi-byte characters intact when split mid-sequence', async () => {
    const bytes = new TextEncoder().encode(sseDelta('café'));
    const cut = bytes.indexOf(0xc3) + 1;
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(bytes.slice(0, cut));
        controller.enqueue(bytes.slice(cut));
        controller.enqueue(new TextEncoder().encode(SSE_DONE));
        controller.close();
      },
    });

    const events = await collect(decodeEventStream(body));
    expect(events.map(summarize)).toEqual(['delta:café', 'done']);
  });

  it('skips an unparsable record between two valid deltas', async () => {
    expect(await decode(chunks(sseDelta('one'), 'data: {not json}\n\n', sseDelta('two'), SSE_DONE))).toEqual([
      'delta:one',
      'delta:two',
      'done',
    ]);
  });

  it('ignores comments, foreign payloads and content-less chunks', async () => {
    const steps = chunks(
      ': keep-alive\n\n',
      'event: ping\ndata: {"type":"ping"}\n\n',
      'data: {"choices":[{"delta":{"role":"assistant"}}]}\n\n',
      sseDelta('x'),
      'data: {"choices":[{"delta":{},"finish_reason":"stop"}]}\n\n',
      SSE_DONE,
    );
    expect(await decode(steps)).toEqual(['delta:x', 'done']);
  });

  it('treats a clean close after a record as done', async () => {
    expect(await decode(chunks(sseDelta('partial')))).toEqual(['delta:partial', 'done']);
  });

  it('keeps a final record that closes without its blank line', async () => {
    const steps = chunks(sseDelta('hi'), 'data: {"choices":[{"delta":{"content":" there"}}]}\n');
    expect(await decode(steps)).toEqual(['delta:hi', 'delta: there', 'done']);
  });

  it('keeps a final record whose line has no newline at all', async () => {
    const steps = chunks(sseDelta('hi'), 'data: {"choices":[{"delta":{"content":"!"}}]}');
    expect(await decode(steps)).toEqual(['delta:hi', 'delta:!', 'done']);
  });

  it('fails with a protocol error when the stream closes before any record', async () => {
    expect(await decode(chunks(': nothing here\n\n'))).toEqual(['failed:protocol']);
  });

  it('fails with a connection error on a transport error after content', async () => {
    const events = await collect(
      decodeEventStream(scriptedBody([{ chunk: sseDelta('a') }, { error: new Error('socket hang up') }])),
    );

    expect(events.map(summarize)).toEqual(['delta:a', 'failed:connection']);
    const last = events[1];
    expect(last.type === 'failed' && last.cause.message).toBe('socket hang up');
  });

  it('fails with an upstream error when the stream carries an error payload', async () => {
    const events = await collect(
      decodeEventStream(scriptedBody(chunks(sseDelta('a'), 'data: {"error":{"message":"overloaded"}}\n\n', SSE_DONE))),
    );

    expect(events.map(summarize)).toEqual(['delta:a', 'failed:upstream']);
    const last = events[1];
    expect(last.type === 'failed' && last.cause.message).toBe('Upstream stream error: overloaded');
  });

  it('ends with the abort reason when the signal fires mid-stream', async () => {
    const controller = new AbortController();
    const cause = new SessionError('too slow', 'timeout');
    const stream = decodeEventStream(
      scriptedBody([{ chunk: sseDelta('a') }, { delayMs: 200, chunk: sseDelta('b') }, { chunk: SSE_DONE }]),
      { signal: controller.signal },
    );

    const first = await stream.next();
    expect(first.value).toEqual({ type: 'delta', text: 'a' });

    controller.abort(cause);
    const second = await stream.next();
    expect(second.value).toEqual({ type: 'failed', cause });
    expect((await stream.next()).done).toBe(true);
  });

  it('stops before records still queued from the same chunk once aborted', async () => {
    const controller = new AbortController();
    const cause = new SessionError('too slow', 'timeout');
    const stream = decodeEventStream(scriptedBody(chunks(sseDelta('a') + sseDelta('b') + sseDelta('c') + SSE_DONE)), {
      signal: controller.signal,
      logger: makeNoopLogger(),
    });

    expect((await stream.next()).value).toEqual({ type: 'delta', text: 'a' });
    controller.abort(cause);

    expect(await collect(stream)).toEqual([{ type: 'failed', cause }]);
  });

  it('reports a plain abort as cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const events = await collect(decodeEventStream(scriptedBody(chunks(sseDelta('a'))), { signal: controller.signal }));
    expect(events.map(summarize)).toEqual(['failed:cancelled']);
  });
});
