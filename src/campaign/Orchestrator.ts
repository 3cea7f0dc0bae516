import { GenerationDeltas, Generation, ImageGenerator, LanguageGenerator, SpeechSynthesizer, SpeechToText } from '../collaborators/types.js';
import { InvalidBeatTransition, SceneAlreadyTerminated, InvalidStateTransition, classifyCollaboratorError } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { CompressionOutcome } from '../memory/Compressor.js';
import { buildContextWindow } from './contextBuilder.js';
import { EffectChannel, EffectJob } from './EffectChannel.js';
import { MasterAgent, MergeResult } from './MasterAgent.js';
import { DeltaInput, SceneAgent } from './SceneAgent.js';
import { ENTITY_COLLECTIONS, SceneKind, Turn } from './types.js';

const orchestratorLog = createLogger(NAMESPACES.campaign.orchestrator);

export interface OrchestratorOptions {
  master: MasterAgent;
  generator: LanguageGenerator;
  effects: EffectChannel;
  /** Token budget for the generation context window. */
  contextBudgetTokens: number;
  speech?: SpeechSynthesizer;
  images?: ImageGenerator;
}

export interface TurnResult {
  turns: Turn[];
  generation: Generation;
  compression: CompressionOutcome;
  effects: EffectJob[];
  /** Parts of the generation's deltas that were dropped, and why. */
  rejected: string[];
}

/**
 * Turn loop: player input goes to generation with the scene's context window;
 * only a successful generation appends turns, so a failed turn can be retried
 * with the same input.
 */
export class Orchestrator {
  private readonly master: MasterAgent;
  private readonly generator: LanguageGenerator;
  private readonly effects: EffectChannel;
  private readonly contextBudgetTokens: number;
  private readonly speech?: SpeechSynthesizer;
  private readonly images?: ImageGenerator;

  constructor(options: OrchestratorOptions) {
    this.master = options.master;
    this.generator = options.generator;
    this.effects = options.effects;
    this.contextBudgetTokens = options.contextBudgetTokens;
    this.speech = options.speech;
    this.images = options.images;
  }

  currentScene(): SceneAgent | undefined {
    return this.master.getLiveScene();
  }

  private requireScene(action: string): SceneAgent {
    const scene = this.master.getLiveScene();
    if (!scene) throw new InvalidStateTransition('no live scene', action);
    return scene;
  }

  startScene(title: string, kind: SceneKind = 'exploration'): SceneAgent {
    const scene = this.master.spawnScene({ title, kind });
    orchestratorLog('started scene %s "%s"', scene.sceneId, scene.title);
    const images = this.images;
    if (images) {
      this.effects.dispatch('image', scene.sceneId, () => images.render(`${kind} scene: ${scene.title}`));
    }
    return scene;
  }

  async handlePlayerInput(text: string): Promise<TurnResult> {
    const scene = this.requireScene('handle player input');
    const status = scene.getStatus();
    if (status === 'concluding' || status === 'terminated') {
      throw new SceneAlreadyTerminated(scene.sceneId, status);
    }
    const input = text.trim();
    const window = buildContextWindow(scene.contextView(), scene.seed, scene.currentWorld(), input, this.contextBudgetTokens);

    let generation: Generation;
    try {
      generation = await this.generator.generate({
        sceneId: scene.sceneId,
        sceneTitle: scene.title,
        sceneKind: scene.sceneKind,
        playerInput: input,
        window
      });
    } catch (error) {
      const failure = classifyCollaboratorError('language-generator', error);
      orchestratorLog('generation failed (retryable=%s): %s', failure.retryable, failure.message);
      throw failure;
    }

    const screened = generation.deltas ? this.screenDeltas(scene, generation.deltas) : undefined;
    const rejected = screened?.rejected ?? [];
    if (rejected.length > 0) orchestratorLog('scene %s dropped deltas: %o', scene.sceneId, rejected);

    const turns: Turn[] = [scene.acceptTurn('player', input)];
    if (generation.narration) turns.push(scene.acceptTurn('narrator', generation.narration));
    for (const line of generation.npcLines) {
      turns.push(scene.acceptTurn('npc', line.content, line.speaker));
    }
    if (generation.deltas && screened) this.applyDeltas(scene, generation.deltas, screened.input);

    const compression = await scene.compactIfNeeded();
    if (compression.status === 'failed') {
      orchestratorLog('scene %s keeps its uncompressed history: %s', scene.sceneId, compression.error.message);
    }

    const effects: EffectJob[] = [];
    const speech = this.speech;
    if (speech && generation.narration) {
      effects.push(this.effects.dispatch('speech', scene.sceneId, () => speech.synthesize(generation.narration)));
    }
    const images = this.images;
    const introduced = generation.deltas?.introduceNpc;
    if (images && introduced && introduced.name.trim()) {
      effects.push(this.effects.dispatch('image', scene.sceneId, () => images.render(`${introduced.name}: ${introduced.description}`)));
    }
    return { turns, generation, compression, effects, rejected };
  }

  /**
   * Split a generation's deltas into what the scene will accept and what it
   * would refuse: unnamed entities and beat transitions the story plan does
   * not allow are dropped, so they never reach the merge.
   */
  private screenDeltas(scene: SceneAgent, deltas: GenerationDeltas): { input: DeltaInput; rejected: string[] } {
    const rejected: string[] = [];
    const proposed = { ...(deltas.upserts ?? {}) };
    if (deltas.introduceNpc) proposed.npcs = [...(proposed.npcs ?? []), deltas.introduceNpc];

    const upserts: NonNullable<DeltaInput['upserts']> = {};
    for (const collection of ENTITY_COLLECTIONS) {
      const entries = proposed[collection] ?? [];
      const named = entries.filter((entity) => entity.name.trim());
      if (named.length < entries.length) rejected.push(`unnamed ${collection} entry`);
      if (named.length > 0) upserts[collection] = named;
    }

    let beatTransition = deltas.beatTransition;
    if (beatTransition) {
      try {
        scene.checkDelta({ beatTransition });
      } catch (error) {
        if (!(error instanceof InvalidBeatTransition)) throw error;
        rejected.push(error.message);
        beatTransition = undefined;
      }
    }
    return {
      input: { upserts, beatTransition, newThreads: deltas.newThreads, resolvedThreads: deltas.resolvedThreads },
      rejected
    };
  }

  private applyDeltas(scene: SceneAgent, deltas: GenerationDeltas, input: DeltaInput): void {
    scene.recordDelta(input);
    for (const note of deltas.memoryAppend ?? []) {
      if (note.trim()) this.master.acceptTurn('narrator', note.trim());
    }
    if (deltas.encounterEnded) scene.signal('encounter-end');
  }

  /** Feed every transcribed utterance through the turn loop, in order. */
  async ingest(source: SpeechToText, onTurn?: (result: TurnResult) => void): Promise<number> {
    let handled = 0;
    for await (const utterance of source.transcribe()) {
      if (!utterance.trim()) continue;
      const result = await this.handlePlayerInput(utterance);
      handled += 1;
      onTurn?.(result);
    }
    return handled;
  }

  /** The player closed an encounter; compress if the scene is over budget. */
  async endEncounter(): Promise<CompressionOutcome> {
    const scene = this.requireScene('end an encounter');
    scene.signal('encounter-end');
    return scene.compactIfNeeded();
  }

  async concludeScene(): Promise<MergeResult> {
    const scene = this.requireScene('conclude a scene');
    const result = await this.master.concludeScene();
    this.effects.cancelScene(scene.sceneId);
    return result;
  }

  abortScene(): void {
    const scene = this.master.getLiveScene();
    if (!scene) return;
    this.master.abortScene();
    this.effects.cancelScene(scene.sceneId);
    orchestratorLog('aborted scene %s', scene.sceneId);
  }
}
