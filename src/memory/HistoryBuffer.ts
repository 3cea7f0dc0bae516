import { Turn, Summary } from '../campaign/types.js';
import { InvalidTurnOrder } from '../errors.js';
import { countTokens } from '../utils/tokenCounter.js';
import { createLogger, NAMESPACES } from '../logging.js';

const bufferLog = createLogger(NAMESPACES.memory.buffer);

export interface ContextView {
  summary?: Summary;
  turns: readonly Turn[];
}

export function formatTurn(turn: Turn): string {
  const speaker = turn.role === 'npc' ? turn.speaker || 'NPC' : turn.role === 'player' ? 'Player' : 'Narrator';
  return `${speaker}: ${turn.content}`;
}

/**
 * Append-only log of turns for one agent. The archival sequence is never
 * shortened; a summary only hides a prefix of it from the context view.
 */
export class HistoryBuffer {
  private readonly turns: Turn[] = [];
  private readonly turnCosts: number[] = [];
  private compacted?: Summary;
  private compactedCount = 0;
  private summaryCost = 0;

  constructor(seed: readonly Turn[] = []) {
    for (const turn of seed) this.append(turn);
  }

  append(turn: Turn): void {
    const last = this.turns[this.turns.length - 1];
    if (last && turn.timestamp <= last.timestamp) {
      throw new InvalidTurnOrder(turn.timestamp, last.timestamp);
    }
    this.turns.push(Object.freeze({ ...turn }));
    this.turnCosts.push(countTokens(formatTurn(turn)));
  }

  get length(): number {
    return this.turns.length;
  }

  lastTimestamp(): number | undefined {
    return this.turns[this.turns.length - 1]?.timestamp;
  }

  /** Estimated token cost of what downstream generation would see. */
  size(): number {
    let cost = this.summaryCost;
    for (let i = this.compactedCount; i < this.turnCosts.length; i++) cost += this.turnCosts[i];
    return cost;
  }

  snapshot(): readonly Turn[] {
    return Object.freeze(this.turns.slice());
  }

  contextView(): ContextView {
    return {
      summary: this.compacted,
      turns: Object.freeze(this.turns.slice(this.compactedCount))
    };
  }

  currentSummary(): Summary | undefined {
    return this.compacted;
  }

  /** Number of leading turns currently represented by the summary. */
  coveredCount(): number {
    return this.compactedCount;
  }

  applySummary(summary: Summary): void {
    if (summary.covers.kind !== 'turns') {
      throw new RangeError('Only turn-range summaries can compact a buffer');
    }
    const { from, to } = summary.covers;
    if (from !== 0 || to < this.compactedCount - 1 || to >= this.turns.length) {
      throw new RangeError(`Summary range ${from}..${to} does not fit a buffer of ${this.turns.length} turns`);
    }
    this.compacted = summary;
    this.compactedCount = to + 1;
    this.summaryCost = countTokens(summary.text);
    bufferLog('compacted %d turns into %d summary tokens', this.compactedCount, this.summaryCost);
  }
}
