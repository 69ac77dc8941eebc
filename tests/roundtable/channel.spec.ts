import { describe, expect, it } from 'vitest';
import { AsyncChannel } from '../../src/roundtable/channel.js';

describe('AsyncChannel', () => {
  it('hands items to a waiting consumer in push order', async () => {
    const channel = new AsyncChannel<number>(4);
    const first = channel.next();

    await channel.push(1);
    await channel.push(2);

    expect(await first).toEqual({ value: 1, done: false });
    expect(await channel.next()).toEqual({ value: 2, done: false });
  });

  it('holds producers while the buffer is full', async () => {
    const channel = new AsyncChannel<string>(1);
    await channel.push('a');

    let accepted = false;
    const pending = channel.push('b').then((ok) => {
      accepted = ok;
    });
    await Promise.resolve();
    expect(accepted).toBe(false);
    expect(channel.size).toBe(1);

    expect(await channel.next()).toEqual({ value: 'a', done: false });
    await pending;
    expect(accepted).toBe(true);
    expect(await channel.next()).toEqual({ value: 'b', done: false });
  });

  it('drains buffered items after close, then reports done', async () => {
    const channel = new AsyncChannel<number>(4);
    await channel.push(1);
    await channel.push(2);
    channel.close();

    expect(await channel.push(3)).toBe(false);
    const drained: number[] = [];
    for await (const n of channel) drained.push(n);
    expect(drained).toEqual([1, 2]);
  });

  it('releases blocked producers on close', async () => {
    const channel = new AsyncChannel<number>(1);
    await channel.push(1);
    const blocked = channel.push(2);

    channel.close();

    expect(await blocked).toBe(false);
    expect(channel.isClosed()).toBe(true);
  });

  it('ends a waiting consumer on close', async () => {
    const channel = new AsyncChannel<number>();
    const waiting = channel.next();
    channel.close();
    expect(await waiting).toEqual({ value: undefined, done: true });
  });

  it('discards the buffer when the consumer breaks out', async () => {
    const channel = new AsyncChannel<number>(4);
    await channel.push(1);
    await channel.push(2);

    for await (const n of channel) {
      expect(n).toBe(1);
      break;
    }
    expect(channel.size).toBe(0);
    expect(channel.isClosed()).toBe(true);
  });

  it('rejects a capacity below one', () => {
    expect(() => new AsyncChannel<number>(0)).toThrow(RangeError);
  });
});
