import { Turn } from '../campaign/types.js';

export type BreakSignal = 'scene-conclusion' | 'encounter-end';

export type BreakKind = BreakSignal | 'idle';

export interface BreakContext {
  /** Names of known NPCs; a turn mentioning one is NPC-relevant. */
  npcNames: readonly string[];
  idleTurnThreshold: number;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function isNpcRelevant(turn: Turn, npcNames: readonly string[]): boolean {
  if (turn.role === 'npc') return true;
  return npcNames.some((name) => name.trim() && new RegExp(`\\b${escapeRegExp(name.trim())}\\b`, 'i').test(turn.content));
}

/**
 * Natural story break detection.
 *
 * An explicit scene conclusion always counts. Every other break needs the
 * current exchange to be finished, i.e. the last turn must not be a player
 * turn still waiting for its reply.
 */
export function detectBreak(turns: readonly Turn[], signals: readonly BreakSignal[], context: BreakContext): BreakKind | null {
  if (signals.includes('scene-conclusion')) return 'scene-conclusion';

  const last = turns[turns.length - 1];
  if (!last || last.role === 'player') return null;

  if (signals.includes('encounter-end')) return 'encounter-end';

  const threshold = Math.max(1, context.idleTurnThreshold);
  if (turns.length < threshold) return null;
  const tail = turns.slice(-threshold);
  return tail.some((turn) => isNpcRelevant(turn, context.npcNames)) ? null : 'idle';
}
