import { CompressionOutcome, Compressor } from '../memory/Compressor.js';
import { BreakSignal } from '../memory/breakDetector.js';
import { ContextView, HistoryBuffer } from '../memory/HistoryBuffer.js';
import { InvalidEntity, SceneAlreadyTerminated } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { applyBeatTransition } from '../world/storyPlan.js';
import { entityKey, upsertEntity } from '../world/worldState.js';
import { deepFreeze, frozenCopy } from '../utils/freeze.js';
import { TurnAcceptor } from './capabilities.js';
import {
  ENTITY_COLLECTIONS,
  OpenThread,
  SceneConclusion,
  SceneDelta,
  SceneKind,
  StoryBeat,
  Summary,
  Turn,
  TurnRole,
  WorldState,
  emptyDelta,
  emptyWorld
} from './types.js';

const sceneLog = createLogger(NAMESPACES.campaign.scene);

export type SceneStatus = 'spawned' | 'active' | 'concluding' | 'terminated';

/** Read-only view of the campaign a scene starts from. */
export interface SceneSeed {
  campaignName: string;
  revision: number;
  world: WorldState;
  storyPlan: StoryBeat[];
  openThreads: OpenThread[];
  /** Campaign memory: compacted summary and recent scene summaries. */
  memory: ContextView;
}

export interface SceneAgentOptions {
  sceneId: string;
  title: string;
  kind: SceneKind;
  seed: SceneSeed;
  compressor: Compressor;
  clock?: () => Date;
}

export interface DeltaInput {
  upserts?: SceneDelta['upserts'];
  beatTransition?: SceneDelta['beatTransition'];
  newThreads?: string[];
  resolvedThreads?: string[];
}

export class SceneAgent implements TurnAcceptor {
  readonly kind = 'scene';
  readonly sceneId: string;
  readonly title: string;
  readonly sceneKind: SceneKind;
  readonly seed: Readonly<SceneSeed>;

  private status: SceneStatus = 'spawned';
  private buffer = new HistoryBuffer();
  private delta: SceneDelta = emptyDelta();
  /** Entities introduced during the scene, so later turns see them before the merge. */
  private localWorld: WorldState = emptyWorld();
  private pendingSignals: BreakSignal[] = [];
  private startedAt?: string;
  private readonly compressor: Compressor;
  private readonly clock: () => Date;

  constructor(options: SceneAgentOptions) {
    this.sceneId = options.sceneId;
    this.title = options.title;
    this.sceneKind = options.kind;
    this.seed = frozenCopy(options.seed);
    this.compressor = options.compressor;
    this.clock = options.clock ?? (() => new Date());
  }

  getStatus(): SceneStatus {
    return this.status;
  }

  get turnCount(): number {
    return this.buffer.length;
  }

  start(): void {
    if (this.status !== 'spawned') return;
    this.status = 'active';
    this.startedAt = this.clock().toISOString();
    sceneLog('scene %s "%s" started (%s)', this.sceneId, this.title, this.sceneKind);
  }

  private assertAccepting(): void {
    if (this.status === 'concluding' || this.status === 'terminated') {
      throw new SceneAlreadyTerminated(this.sceneId, this.status);
    }
  }

  acceptTurn(role: TurnRole, content: string, speaker?: string): Turn {
    this.assertAccepting();
    this.start();
    const now = this.clock().getTime();
    const last = this.buffer.lastTimestamp();
    const turn: Turn = {
      role,
      content,
      timestamp: last === undefined ? now : Math.max(now, last + 1),
      sceneId: this.sceneId,
      ...(speaker ? { speaker } : {})
    };
    this.buffer.append(turn);
    return turn;
  }

  /** Queue a break signal for the next compaction check. */
  signal(signal: BreakSignal): void {
    if (!this.pendingSignals.includes(signal)) this.pendingSignals.push(signal);
  }

  npcNames(): string[] {
    const names = new Map<string, string>();
    for (const npc of [...this.seed.world.npcs, ...this.localWorld.npcs]) names.set(npc.name.toLowerCase(), npc.name);
    return [...names.values()];
  }

  /** World as the scene currently knows it: seed plus entities upserted so far. */
  currentWorld(): WorldState {
    const world = structuredClone(this.seed.world);
    for (const collection of ENTITY_COLLECTIONS) {
      for (const entity of this.localWorld[collection]) upsertEntity(world, collection, entity);
    }
    return world;
  }

  async compactIfNeeded(): Promise<CompressionOutcome> {
    const signals = this.pendingSignals;
    const outcome = await this.compressor.compactIfNeeded(this.buffer, signals, { npcNames: this.npcNames() });
    if (outcome.status !== 'skipped' || outcome.decision.reason !== 'deferred') {
      // Signals only carry over while compression is waiting for them
      this.pendingSignals = this.pendingSignals.filter((s) => !signals.includes(s));
    }
    return outcome;
  }

  /**
   * Throws what the merge would throw for this delta (InvalidEntity for an
   * unnamed entity, InvalidBeatTransition against the seeded story plan).
   * Records nothing.
   */
  checkDelta(input: DeltaInput): void {
    for (const collection of ENTITY_COLLECTIONS) {
      for (const entity of input.upserts?.[collection] ?? []) {
        if (!entityKey(entity.name)) throw new InvalidEntity(`Cannot store an unnamed entry in ${collection}`);
      }
    }
    if (input.beatTransition) applyBeatTransition(this.seed.storyPlan, input.beatTransition);
  }

  recordDelta(input: DeltaInput): void {
    this.assertAccepting();
    this.checkDelta(input);
    for (const collection of ENTITY_COLLECTIONS) {
      for (const entity of input.upserts?.[collection] ?? []) {
        upsertEntity(this.localWorld, collection, entity);
        const list = this.delta.upserts[collection] ?? [];
        list.push(structuredClone(entity));
        this.delta.upserts[collection] = list;
      }
    }
    if (input.beatTransition) {
      if (this.delta.beatTransition) {
        sceneLog('scene %s replaces beat transition %o with %o', this.sceneId, this.delta.beatTransition, input.beatTransition);
      }
      this.delta.beatTransition = { ...input.beatTransition };
    }
    this.delta.newThreads.push(...(input.newThreads ?? []));
    this.delta.resolvedThreads.push(...(input.resolvedThreads ?? []));
  }

  pendingDelta(): Readonly<SceneDelta> {
    return frozenCopy(this.delta);
  }

  contextView(): ContextView {
    return this.buffer.contextView();
  }

  snapshot(): readonly Turn[] {
    return this.buffer.snapshot();
  }

  /** Summarize what the scene still shows: its compacted summary plus the uncompacted turns. */
  async produceSummary(): Promise<Summary> {
    const view = this.buffer.contextView();
    return this.compressor.summarizeScene(view.turns, this.sceneId, { npcNames: this.npcNames() }, view.summary?.text);
  }

  /**
   * Move to Concluding and package the scene for the Master Agent's merge.
   * If the summary cannot be produced the scene goes back to Active.
   */
  async conclude(): Promise<SceneConclusion> {
    this.assertAccepting();
    this.start();
    this.status = 'concluding';
    let summary: Summary;
    try {
      summary = await this.produceSummary();
    } catch (error) {
      if (this.getStatus() === 'concluding') this.status = 'active';
      throw error;
    }
    // An abort may have landed while the summary was being produced
    const status = this.getStatus();
    if (status !== 'concluding') {
      throw new SceneAlreadyTerminated(this.sceneId, status);
    }
    sceneLog('scene %s concluded after %d turns', this.sceneId, this.buffer.length);
    return deepFreeze({
      sceneId: this.sceneId,
      title: this.title,
      kind: this.sceneKind,
      baseRevision: this.seed.revision,
      startedAt: this.startedAt ?? this.clock().toISOString(),
      endedAt: this.clock().toISOString(),
      summary,
      delta: structuredClone(this.delta),
      transcript: this.buffer.snapshot()
    });
  }

  /** Back to Active after a merge that did not go through. */
  reopen(): void {
    if (this.status !== 'concluding') return;
    this.status = 'active';
    sceneLog('scene %s reopened after a failed merge', this.sceneId);
  }

  /** Called by the Master Agent once the scene's conclusion is merged. */
  terminate(): void {
    this.status = 'terminated';
    sceneLog('scene %s terminated', this.sceneId);
  }

  /** Drop the scene without merging anything. */
  abort(): void {
    if (this.status === 'terminated') return;
    this.status = 'terminated';
    this.buffer = new HistoryBuffer();
    this.delta = emptyDelta();
    this.localWorld = emptyWorld();
    this.pendingSignals = [];
    sceneLog('scene %s aborted', this.sceneId);
  }
}
