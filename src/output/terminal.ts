import type { RoundEvent } from '../roundtable/types.js';

// ANSI color codes for agent names
const COLORS = [
  '\x1b[36m', // cyan
  '\x1b[33m', // yellow
  '\x1b[35m', // magenta
  '\x1b[32m', // green
  '\x1b[34m', // blue
  '\x1b[91m', // bright red
];
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';
const RED = '\x1b[31m';

export type Writer = (text: string) => void;

export interface RendererOptions {
  write?: Writer;
  color?: boolean;
}

interface HeldReply {
  agentName: string;
  text: string;
  status: 'streaming' | 'done' | 'failed';
  error?: string;
}

/**
 * Paints round events to a terminal.
 *
 * Only one reply can stream on a terminal at a time: the first agent to
 * speak owns the live line, and everyone else is held until it finishes.
 * Held replies are then flushed in the order they started.
 */
export class TerminalRenderer {
  private readonly write: Writer;
  private readonly color: boolean;
  private readonly agentColors = new Map<string, string>();
  private readonly held = new Map<string, HeldReply>();
  private live: string | null = null;

  constructor(options: RendererOptions = {}) {
    this.write = options.write ?? ((text) => void process.stdout.write(text));
    this.color = options.color ?? Boolean(process.stdout.isTTY);
  }

  handle(event: RoundEvent): void {
    switch (event.type) {
      case 'round_start': {
        this.write(`\n${this.paint(BOLD, `=== Round ${event.round} ===`)}\n`);
        this.write(`${this.paint(DIM, `Speakers: ${event.agents.join(', ')}`)}\n\n`);
        break;
      }

      case 'agent_start': {
        if (this.live === null) {
          this.live = event.agentId;
          this.write(this.header(event.agentId, event.agentName));
        } else {
          this.held.set(event.agentId, { agentName: event.agentName, text: '', status: 'streaming' });
        }
        break;
      }

      case 'agent_chunk': {
        if (event.agentId === this.live) {
          this.write(event.text);
        } else {
          const reply = this.held.get(event.agentId);
          if (reply) reply.text += event.text;
        }
        break;
      }

      case 'agent_done': {
        if (event.agentId === this.live) {
          this.write('\n\n');
          this.live = null;
          this.promote();
        } else if (this.held.has(event.agentId)) {
          this.settleHeld(event.agentId, { status: 'done' });
        } else if (this.live === null) {
          // Finished without a single delta
          this.write(`${this.header(event.agentId, event.agentName)}${this.paint(DIM, '(no reply)')}\n\n`);
        } else {
          this.held.set(event.agentId, { agentName: event.agentName, text: '', status: 'done' });
        }
        break;
      }

      case 'agent_failed': {
        const error = `${event.kind}: ${event.error}`;
        if (event.agentId === this.live) {
          this.write(`\n${this.notice(error)}`);
          this.live = null;
          this.promote();
        } else if (this.held.has(event.agentId)) {
          this.settleHeld(event.agentId, { status: 'failed', error });
        } else if (this.live === null) {
          this.write(`${this.header(event.agentId, event.agentName)}${this.notice(error)}`);
        } else {
          this.held.set(event.agentId, { agentName: event.agentName, text: '', status: 'failed', error });
        }
        break;
      }

      case 'round_end': {
        const s = event.stats;
        const duration = (s.durationMs / 1000).toFixed(1);
        this.write(
          `${this.paint(DIM, `--- Round ${s.round} done (${s.completed} replied, ${s.failed} failed, ~${s.totalTokensEstimate} tokens, ${duration}s) ---`)}\n\n`,
        );
        break;
      }
    }
  }

  private settleHeld(agentId: string, outcome: { status: 'done' | 'failed'; error?: string }): void {
    const reply = this.held.get(agentId);
    if (!reply) return;
    reply.status = outcome.status;
    reply.error = outcome.error;
    this.promote();
  }

  /** Flush held replies in start order until one is still streaming. */
  private promote(): void {
    if (this.live !== null) return;
    for (const [agentId, reply] of this.held) {
      this.held.delete(agentId);
      this.write(`${this.header(agentId, reply.agentName)}${reply.text}`);
      if (reply.status === 'streaming') {
        this.live = agentId;
        return;
      }
      if (reply.status === 'failed') {
        this.write(`${reply.text ? '\n' : ''}${this.notice(reply.error ?? 'failed')}`);
      } else {
        this.write(reply.text ? '\n\n' : `${this.paint(DIM, '(no reply)')}\n\n`);
      }
    }
  }

  private header(agentId: string, agentName: string): string {
    return `${this.paint(`${this.colorFor(agentId)}${BOLD}`, `[${agentName}]`)}\n`;
  }

  private notice(error: string): string {
    return `${this.paint(RED, `(no reply: ${error})`)}\n\n`;
  }

  private colorFor(agentId: string): string {
    let color = this.agentColors.get(agentId);
    if (!color) {
      color = COLORS[this.agentColors.size % COLORS.length];
      this.agentColors.set(agentId, color);
    }
    return color;
  }

  private paint(code: string, text: string): string {
    return this.color ? `${code}${text}${RESET}` : text;
  }
}

/**
 * Render round events to the terminal as they arrive.
 */
export async function renderToTerminal(
  events: AsyncIterable<RoundEvent>,
  renderer: TerminalRenderer = new TerminalRenderer(),
): Promise<void> {
  for await (const event of events) {
    renderer.handle(event);
  }
}
