export type TurnInput =
  | { author: 'user'; speaker: string; text: string }
  | { author: 'agent'; agentId: string; speaker: string; text: string };

/** One utterance, numbered on append. Frozen once stored. */
export type Turn = Readonly<TurnInput & { seq: number }>;

/** Render turns as `[speaker]: text`, one per line, in order. */
export function renderTranscript(turns: readonly Turn[]): string {
  return turns.map((turn) => `[${turn.speaker}]: ${turn.text}`).join('\n');
}

/**
 * Append-only conversation store, shared by reference across rounds.
 *
 * Sessions never read it live: they get a `snapshot()` taken once at round
 * start, so replies appended mid-round stay invisible to siblings in flight.
 */
export class ConversationHistory {
  private readonly turns: Turn[] = [];

  get length(): number {
    return this.turns.length;
  }

  append(input: TurnInput): Turn {
    const turn: Turn = Object.freeze({ ...input, seq: this.turns.length + 1 });
    this.turns.push(turn);
    return turn;
  }

  last(): Turn | undefined {
    return this.turns[this.turns.length - 1];
  }

  snapshot(): readonly Turn[] {
    return Object.freeze([...this.turns]);
  }

  render(): string {
    return renderTranscript(this.turns);
  }
}
