import { CompressionOutcome, Compressor } from '../memory/Compressor.js';
import { ContextView, HistoryBuffer } from '../memory/HistoryBuffer.js';
import { CampaignSaver } from '../persistence/SaveStore.js';
import { TranscriptWriter } from '../persistence/TranscriptStore.js';
import { InvalidStateTransition, MergeConflict } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { frozenCopy } from '../utils/freeze.js';
import { slugify } from '../utils/slug.js';
import { addThread, resolveThread } from '../world/openThreads.js';
import { applyBeatTransition, createStoryPlan, validateStoryPlan } from '../world/storyPlan.js';
import { validateWorld, upsertEntity } from '../world/worldState.js';
import { TurnAcceptor } from './capabilities.js';
import { SceneAgent } from './SceneAgent.js';
import {
  CampaignState,
  ENTITY_COLLECTIONS,
  Entity,
  SceneConclusion,
  SceneKind,
  SceneRecord,
  Summary,
  Turn,
  TurnRole,
  emptyWorld
} from './types.js';

const masterLog = createLogger(NAMESPACES.campaign.master);

export const CAMPAIGN_STATE_VERSION = 1;

export type MasterStatus = 'uninitialized' | 'planning' | 'active' | 'paused' | 'archived';

/** What planning hands over to become version 1 of a campaign. */
export interface CampaignDraft {
  title: string;
  synopsis?: string;
  acts: string[];
  npcs?: Entity[];
  locations?: Entity[];
  items?: Entity[];
  openThreads?: string[];
}

export interface MasterAgentOptions {
  compressor: Compressor;
  saves: CampaignSaver;
  transcripts: TranscriptWriter;
  clock?: () => Date;
}

export interface SceneRequest {
  title: string;
  kind: SceneKind;
  sceneId?: string;
}

export interface MergeResult {
  record: SceneRecord;
  revision: number;
  memory: CompressionOutcome;
  /** Resolves with the save path once the merged state is on disk. */
  persisted: Promise<string>;
}

const MASTER_SCENE_ID = 'campaign';

/**
 * Owns the canonical campaign state. Scenes are spawned from a read-only seed
 * and only reach the state through `merge`, which is serialized and atomic:
 * every delta applies and a save is queued, or nothing changes.
 */
export class MasterAgent implements TurnAcceptor {
  readonly kind = 'master';

  private status: MasterStatus = 'uninitialized';
  private state?: CampaignState;
  private revision = 0;
  private memory = new HistoryBuffer();
  private liveScene?: SceneAgent;
  private mergeChain: Promise<unknown> = Promise.resolve();
  private planningName?: string;
  private readonly compressor: Compressor;
  private readonly saves: CampaignSaver;
  private readonly transcripts: TranscriptWriter;
  private readonly clock: () => Date;

  constructor(options: MasterAgentOptions) {
    this.compressor = options.compressor;
    this.saves = options.saves;
    this.transcripts = options.transcripts;
    this.clock = options.clock ?? (() => new Date());
  }

  getStatus(): MasterStatus {
    return this.status;
  }

  getRevision(): number {
    return this.revision;
  }

  /** Deep-frozen copy of the canonical state. */
  getState(): Readonly<CampaignState> {
    return frozenCopy(this.requireState('read state'));
  }

  getLiveScene(): SceneAgent | undefined {
    return this.liveScene;
  }

  private requireState(action: string): CampaignState {
    if (!this.state) throw new InvalidStateTransition(this.status, action);
    return this.state;
  }

  private requireStatus(action: string, ...allowed: MasterStatus[]): void {
    if (!allowed.includes(this.status)) throw new InvalidStateTransition(this.status, action);
  }

  beginPlanning(name?: string): void {
    this.requireStatus('begin planning', 'uninitialized');
    this.status = 'planning';
    this.planningName = name;
    masterLog('planning started%s', name ? ` for "${name}"` : '');
  }

  /** Turn a planning draft into version 1 of the campaign state and save it. */
  async completePlanning(draft: CampaignDraft): Promise<string> {
    this.requireStatus('complete planning', 'planning');
    const now = this.clock().toISOString();
    const name = draft.title.trim() || this.planningName?.trim() || 'Untitled Campaign';
    const world = emptyWorld();
    for (const entity of draft.npcs ?? []) upsertEntity(world, 'npcs', entity);
    for (const entity of draft.locations ?? []) upsertEntity(world, 'locations', entity);
    for (const entity of draft.items ?? []) upsertEntity(world, 'items', entity);

    const state: CampaignState = {
      version: CAMPAIGN_STATE_VERSION,
      name,
      status: 'active',
      createdAt: now,
      lastPlayedAt: now,
      world,
      storyPlan: createStoryPlan(draft.acts),
      sceneHistory: [],
      openThreads: [],
      annotations: {}
    };
    if (draft.synopsis?.trim()) state.synopsis = draft.synopsis.trim();
    for (const thread of draft.openThreads ?? []) addThread(state.openThreads, thread, now);
    validateStoryPlan(state.storyPlan);

    this.state = state;
    this.revision = 1;
    this.memory = new HistoryBuffer();
    this.status = 'active';
    masterLog('campaign "%s" created with %d beats', name, state.storyPlan.length);
    return this.persist();
  }

  /** Adopt a loaded save. Archived campaigns come back read-only. */
  restore(state: CampaignState): void {
    this.requireStatus('restore', 'uninitialized', 'paused');
    validateStoryPlan(state.storyPlan);
    validateWorld(state.world);
    this.state = structuredClone(state);
    this.revision = 1;
    this.memory = this.rebuildMemory(this.state.sceneHistory);
    this.status = state.status === 'archived' ? 'archived' : 'active';
    masterLog('restored "%s" with %d scenes (%s)', state.name, state.sceneHistory.length, this.status);
  }

  private rebuildMemory(history: readonly SceneRecord[]): HistoryBuffer {
    const buffer = new HistoryBuffer();
    for (const record of history) {
      const ended = Date.parse(record.endedAt);
      const last = buffer.lastTimestamp();
      const timestamp = Number.isNaN(ended) ? (last ?? 0) + 1 : last === undefined ? ended : Math.max(ended, last + 1);
      buffer.append({ role: 'narrator', content: `Scene "${record.title}": ${record.summary.text}`, timestamp, sceneId: record.sceneId });
    }
    return buffer;
  }

  /** Campaign memory a new scene is seeded with. */
  memoryView(): ContextView {
    return this.memory.contextView();
  }

  /** Record a campaign-level narration turn outside any scene. */
  acceptTurn(role: TurnRole, content: string, speaker?: string): Turn {
    this.requireStatus('accept a turn', 'active');
    const now = this.clock().getTime();
    const last = this.memory.lastTimestamp();
    const turn: Turn = {
      role,
      content,
      timestamp: last === undefined ? now : Math.max(now, last + 1),
      sceneId: MASTER_SCENE_ID,
      ...(speaker ? { speaker } : {})
    };
    this.memory.append(turn);
    return turn;
  }

  async produceSummary(): Promise<Summary | undefined> {
    if (this.memory.length === 0) return this.memory.currentSummary();
    const summary = await this.compressor.compress(this.memory, { npcNames: this.npcNames() });
    this.memory.applySummary(summary);
    return summary;
  }

  private npcNames(): string[] {
    return this.state ? this.state.world.npcs.map((npc) => npc.name) : [];
  }

  private nextSceneId(state: CampaignState): string {
    const taken = new Set(state.sceneHistory.map((record) => record.sceneId));
    let n = state.sceneHistory.length + 1;
    let id = `scene-${String(n).padStart(3, '0')}`;
    while (taken.has(id)) id = `scene-${String(++n).padStart(3, '0')}`;
    return id;
  }

  spawnScene(request: SceneRequest): SceneAgent {
    this.requireStatus('spawn a scene', 'active');
    const state = this.requireState('spawn a scene');
    if (this.liveScene) {
      throw new InvalidStateTransition(`running scene ${this.liveScene.sceneId}`, 'spawn a scene');
    }
    const sceneId = request.sceneId ?? this.nextSceneId(state);
    if (state.sceneHistory.some((record) => record.sceneId === sceneId)) {
      throw new MergeConflict(sceneId, 'a scene with this id was already merged');
    }
    const scene = new SceneAgent({
      sceneId,
      title: request.title.trim() || sceneId,
      kind: request.kind,
      compressor: this.compressor,
      clock: this.clock,
      seed: {
        campaignName: state.name,
        revision: this.revision,
        world: state.world,
        storyPlan: state.storyPlan,
        openThreads: state.openThreads,
        memory: this.memory.contextView()
      }
    });
    scene.start();
    this.liveScene = scene;
    return scene;
  }

  /** Conclude the live scene and merge it; a rejected merge leaves the scene playable. */
  async concludeScene(): Promise<MergeResult> {
    const scene = this.liveScene;
    if (!scene) throw new InvalidStateTransition(this.status, 'conclude a scene without a live scene');
    const conclusion = await scene.conclude();
    try {
      return await this.merge(conclusion);
    } catch (error) {
      if (this.liveScene === scene) scene.reopen();
      throw error;
    }
  }

  abortScene(): void {
    const scene = this.liveScene;
    if (!scene) return;
    scene.abort();
    this.liveScene = undefined;
  }

  merge(conclusion: SceneConclusion): Promise<MergeResult> {
    const run = this.mergeChain.catch(() => undefined).then(() => this.mergeNow(conclusion));
    this.mergeChain = run;
    return run;
  }

  private assertMergeable(conclusion: SceneConclusion, state: CampaignState): void {
    const scene = this.liveScene;
    if (!scene || scene.sceneId !== conclusion.sceneId || scene.getStatus() !== 'concluding') {
      throw new MergeConflict(conclusion.sceneId, 'scene is not awaiting a merge');
    }
    if (state.sceneHistory.some((record) => record.sceneId === conclusion.sceneId)) {
      throw new MergeConflict(conclusion.sceneId, 'scene was already merged');
    }
    if (conclusion.baseRevision !== this.revision) {
      throw new MergeConflict(conclusion.sceneId, `seeded from revision ${conclusion.baseRevision}, campaign is at ${this.revision}`);
    }
  }

  private applyConclusion(base: CampaignState, conclusion: SceneConclusion, transcriptRef: string, now: string): CampaignState {
    const next = structuredClone(base);
    const { delta } = conclusion;
    for (const collection of ENTITY_COLLECTIONS) {
      for (const entity of delta.upserts[collection] ?? []) upsertEntity(next.world, collection, entity);
    }
    validateWorld(next.world);
    if (delta.beatTransition) next.storyPlan = applyBeatTransition(next.storyPlan, delta.beatTransition);
    validateStoryPlan(next.storyPlan);
    for (const text of delta.resolvedThreads) {
      if (!resolveThread(next.openThreads, text)) masterLog('no open thread matches "%s"; ignoring', text);
    }
    for (const text of delta.newThreads) addThread(next.openThreads, text, now);
    next.sceneHistory.push({
      sceneId: conclusion.sceneId,
      title: conclusion.title,
      kind: conclusion.kind,
      startedAt: conclusion.startedAt,
      endedAt: conclusion.endedAt,
      turnCount: conclusion.transcript.length,
      summary: structuredClone(conclusion.summary),
      transcriptRef
    });
    next.lastPlayedAt = now;
    return next;
  }

  private async mergeNow(conclusion: SceneConclusion): Promise<MergeResult> {
    this.requireStatus('merge a scene', 'active');
    const state = this.requireState('merge a scene');
    this.assertMergeable(conclusion, state);

    const transcriptRef = this.transcripts.refFor(slugify(state.name), conclusion.sceneId);
    const next = this.applyConclusion(state, conclusion, transcriptRef, this.clock().toISOString());

    await this.transcripts.write(transcriptRef, conclusion.transcript);
    try {
      this.assertMergeable(conclusion, state);
    } catch (error) {
      // Aborted while the transcript was being written
      await this.transcripts.remove(transcriptRef);
      throw error;
    }

    // Commit point: nothing below may leave the state half-applied
    const record = next.sceneHistory[next.sceneHistory.length - 1];
    this.state = next;
    this.revision += 1;
    this.liveScene?.terminate();
    this.liveScene = undefined;
    const persisted = this.persist();
    masterLog('merged scene %s at revision %d', conclusion.sceneId, this.revision);

    const last = this.memory.lastTimestamp();
    const ended = Date.parse(conclusion.endedAt);
    this.memory.append({
      role: 'narrator',
      content: `Scene "${conclusion.title}": ${conclusion.summary.text}`,
      timestamp: last === undefined ? ended : Math.max(ended, last + 1),
      sceneId: conclusion.sceneId
    });
    const memory = await this.compressor.compactIfNeeded(this.memory, ['scene-conclusion'], { npcNames: this.npcNames() });

    return { record, revision: this.revision, memory, persisted };
  }

  private persist(): Promise<string> {
    const snapshot = frozenCopy(this.requireState('save'));
    const pending = this.saves.save(snapshot);
    void pending.then(
      (savedPath) => masterLog('state saved to %s', savedPath),
      (error: unknown) => {
        masterLog('save failed: %s', error instanceof Error ? error.message : String(error));
        console.warn('[CAMPAIGN] Failed to save campaign state:', error instanceof Error ? error.message : String(error));
      }
    );
    return pending;
  }

  /** Abort any running scene, save, and stop accepting play. */
  async pause(): Promise<string> {
    this.requireStatus('pause', 'active');
    this.abortScene();
    await this.mergeChain.catch(() => undefined);
    const saved = await this.persist();
    this.status = 'paused';
    return saved;
  }

  resume(): void {
    this.requireStatus('resume', 'paused');
    this.status = 'active';
  }

  async archive(): Promise<string> {
    this.requireStatus('archive', 'active', 'paused');
    const state = this.requireState('archive');
    this.abortScene();
    await this.mergeChain.catch(() => undefined);
    this.state = { ...structuredClone(state), status: 'archived', lastPlayedAt: this.clock().toISOString() };
    this.status = 'archived';
    masterLog('campaign "%s" archived', state.name);
    return this.persist();
  }
}
