export type TurnRole = 'player' | 'narrator' | 'npc';

export interface Turn {
  readonly role: TurnRole;
  readonly content: string;
  /** Epoch milliseconds; strictly increasing within one buffer. */
  readonly timestamp: number;
  readonly sceneId: string;
  /** NPC name for `npc` turns. */
  readonly speaker?: string;
}

export type SummaryCoverage =
  | { kind: 'turns'; from: number; to: number }
  | { kind: 'scene'; sceneId: string };

export interface Summary {
  covers: SummaryCoverage;
  text: string;
  createdAt: string;
}

export interface Entity {
  name: string;
  description: string;
  tags: string[];
}

export type EntityCollection = 'npcs' | 'locations' | 'items';

export const ENTITY_COLLECTIONS: readonly EntityCollection[] = ['npcs', 'locations', 'items'];

export interface WorldState {
  npcs: Entity[];
  locations: Entity[];
  items: Entity[];
}

export type BeatStatus = 'pending' | 'active' | 'done';

export interface StoryBeat {
  order: number;
  description: string;
  status: BeatStatus;
}

export interface OpenThread {
  text: string;
  createdAt: string;
  resolved: boolean;
}

export type SceneKind = 'dialogue' | 'combat' | 'exploration';

export interface SceneRecord {
  sceneId: string;
  title: string;
  kind: SceneKind;
  startedAt: string;
  endedAt: string;
  turnCount: number;
  summary: Summary;
  transcriptRef: string;
}

export type CampaignStatus = 'active' | 'archived';

export type SaveSectionName = 'Metadata' | 'World State' | 'Story Plan' | 'Scene History' | 'Open Threads';

export const SAVE_SECTIONS: readonly SaveSectionName[] = ['Metadata', 'World State', 'Story Plan', 'Scene History', 'Open Threads'];

export interface CampaignState {
  version: number;
  name: string;
  status: CampaignStatus;
  synopsis?: string;
  createdAt: string;
  lastPlayedAt: string;
  world: WorldState;
  storyPlan: StoryBeat[];
  sceneHistory: SceneRecord[];
  openThreads: OpenThread[];
  /** Lines inside recognized save sections that this reader does not understand, kept verbatim. */
  annotations: Partial<Record<SaveSectionName, string[]>>;
}

export interface BeatTransition {
  order: number;
  status: BeatStatus;
}

/** Everything a scene may change in the campaign, applied by the Master Agent's merge. */
export interface SceneDelta {
  upserts: Partial<Record<EntityCollection, Entity[]>>;
  beatTransition?: BeatTransition;
  newThreads: string[];
  resolvedThreads: string[];
}

export interface SceneConclusion {
  sceneId: string;
  title: string;
  kind: SceneKind;
  /** Revision of the campaign state the scene was seeded from. */
  baseRevision: number;
  startedAt: string;
  endedAt: string;
  summary: Summary;
  delta: SceneDelta;
  transcript: readonly Turn[];
}

export function emptyWorld(): WorldState {
  return { npcs: [], locations: [], items: [] };
}

export function emptyDelta(): SceneDelta {
  return { upserts: {}, newThreads: [], resolvedThreads: [] };
}
