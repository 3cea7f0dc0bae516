import { ContextView, formatTurn } from '../memory/HistoryBuffer.js';
import { countTokens } from '../utils/tokenCounter.js';
import { excerptWorld } from '../world/worldState.js';
import { activeBeat } from '../world/storyPlan.js';
import { unresolvedThreads } from '../world/openThreads.js';
import type { SceneSeed } from './SceneAgent.js';
import { StoryBeat, WorldState } from './types.js';

/** Everything handed to generation for one turn, already trimmed to budget. */
export interface ContextWindow {
  campaignName: string;
  /** Summaries of earlier scenes. */
  campaignMemory: string[];
  sceneSummary?: string;
  recentTurns: string[];
  world: WorldState;
  activeBeat?: StoryBeat;
  openThreads: string[];
  playerInput: string;
  tokenCount: number;
}

const RECENT_TURNS_FOR_EXCERPT = 6;

function windowCost(window: Omit<ContextWindow, 'tokenCount'>): number {
  const parts: string[] = [
    window.campaignName,
    ...window.campaignMemory,
    window.sceneSummary ?? '',
    ...window.recentTurns,
    ...window.openThreads,
    window.activeBeat?.description ?? '',
    window.playerInput
  ];
  for (const entity of [...window.world.npcs, ...window.world.locations, ...window.world.items]) {
    parts.push(`${entity.name}: ${entity.description}`);
  }
  return parts.reduce((sum, part) => sum + (part ? countTokens(part) : 0), 0);
}

/**
 * Assemble the generation context for a scene turn. When the window exceeds
 * `budgetTokens`, the oldest material goes first: campaign memory, then the
 * world excerpt, then the oldest recent turns. The latest turn and the player
 * input are always kept.
 */
export function buildContextWindow(view: ContextView, seed: Readonly<SceneSeed>, world: WorldState, playerInput: string, budgetTokens: number): ContextWindow {
  const turns = view.turns.map(formatTurn);
  const excerptSource = [...turns.slice(-RECENT_TURNS_FOR_EXCERPT), playerInput].join('\n');

  const memory: string[] = [];
  if (seed.memory.summary) memory.push(seed.memory.summary.text);
  memory.push(...seed.memory.turns.map((turn) => turn.content));

  const draft: Omit<ContextWindow, 'tokenCount'> = {
    campaignName: seed.campaignName,
    campaignMemory: memory,
    sceneSummary: view.summary?.text,
    recentTurns: turns,
    world: excerptWorld(world, excerptSource),
    activeBeat: activeBeat(seed.storyPlan),
    openThreads: unresolvedThreads(seed.openThreads).map((thread) => thread.text),
    playerInput
  };

  let cost = windowCost(draft);
  while (cost > budgetTokens && draft.campaignMemory.length > 0) {
    draft.campaignMemory = draft.campaignMemory.slice(1);
    cost = windowCost(draft);
  }
  for (const collection of ['items', 'locations', 'npcs'] as const) {
    while (cost > budgetTokens && draft.world[collection].length > 0) {
      draft.world = { ...draft.world, [collection]: draft.world[collection].slice(0, -1) };
      cost = windowCost(draft);
    }
  }
  while (cost > budgetTokens && draft.recentTurns.length > 1) {
    draft.recentTurns = draft.recentTurns.slice(1);
    cost = windowCost(draft);
  }

  return { ...draft, tokenCount: cost };
}
