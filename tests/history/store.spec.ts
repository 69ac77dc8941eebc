import { describe, expect, it } from 'vitest';
import { ConversationHistory, renderTranscript } from '../../src/history/store.js';

describe('ConversationHistory', () => {
  it('numbers turns from 1 in append order', () => {
    const history = new ConversationHistory();
    const first = history.append({ author: 'user', speaker: 'User', text: 'Hi' });
    const second = history.append({ author: 'agent', agentId: 'a', speaker: 'Agent A', text: 'Hello' });

    expect(first.seq).toBe(1);
    expect(second).toEqual({ author: 'agent', agentId: 'a', speaker: 'Agent A', text: 'Hello', seq: 2 });
    expect(history.length).toBe(2);
    expect(history.last()).toBe(second);
  });

  it('freezes stored turns', () => {
    const history = new ConversationHistory();
    const turn = history.append({ author: 'user', speaker: 'User', text: 'Hi' });
    expect(Object.isFrozen(turn)).toBe(true);
  });

  it('keeps a snapshot unchanged by later appends', () => {
    const history = new ConversationHistory();
    history.append({ author: 'user', speaker: 'User', text: 'Hi' });

    const snapshot = history.snapshot();
    history.append({ author: 'agent', agentId: 'a', speaker: 'Agent A', text: 'Hello' });

    expect(snapshot).toHaveLength(1);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(history.snapshot()).toHaveLength(2);
  });

  it('has no last turn while empty', () => {
    const history = new ConversationHistory();
    expect(history.last()).toBeUndefined();
    expect(history.render()).toBe('');
  });
});

describe('renderTranscript', () => {
  it('renders one bracketed speaker line per turn', () => {
    const history = new ConversationHistory();
    history.append({ author: 'user', speaker: 'Host', text: 'Is tea better than coffee?' });
    history.append({ author: 'agent', agentId: 'a', speaker: 'Agent A', text: 'Yes.' });

    expect(renderTranscript(history.snapshot())).toBe('[Host]: Is tea better than coffee?\n[Agent A]: Yes.');
  });
});
