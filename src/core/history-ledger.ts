import type { ConversationTurn, TurnRole } from './context';

/** Cuts `text` to at most `max` UTF-16 units without ending on half a surrogate pair. */
export function clip(text: string, max: number): string {
  if (text.length <= max) return text;
  const last = text.charCodeAt(max - 1);
  return last >= 0xd800 && last <= 0xdbff ? text.slice(0, max - 1) : text.slice(0, max);
}

type HistoryLedgerOpts = {
  capacity?: number;
  maxTextLength?: number;
  now?: () => number;
};

export class HistoryLedger {
  readonly capacity: number;
  private maxTextLength: number;
  private now: () => number;
  private turns: ConversationTurn[] = [];
  private seq = 0;
  private lastTimestamp = 0;

  constructor(opts: HistoryLedgerOpts = {}) {
    this.capacity = Math.max(1, opts.capacity ?? 100);
    this.maxTextLength = opts.maxTextLength ?? Number.POSITIVE_INFINITY;
    this.now = opts.now ?? Date.now;
  }

  get length(): number {
    return this.turns.length;
  }

  record(role: TurnRole, text: string): ConversationTurn {
    // ordering follows assignment, so a clock that steps back is clamped
    const timestamp = Math.max(this.now(), this.lastTimestamp);
    this.lastTimestamp = timestamp;
    this.seq += 1;

    const turn: ConversationTurn = Object.freeze({
      seq: this.seq,
      role,
      text: clip(text, this.maxTextLength),
      timestamp
    });
    this.turns.push(turn);
    if (this.turns.length > this.capacity) {
      this.turns.splice(0, this.turns.length - this.capacity);
    }
    return turn;
  }

  recent(n: number): ConversationTurn[] {
    if (n <= 0) return [];
    return this.turns.slice(-n);
  }

  all(): ConversationTurn[] {
    return this.turns.slice();
  }
}
