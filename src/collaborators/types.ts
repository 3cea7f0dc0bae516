import { BeatTransition, Entity, EntityCollection, SceneKind } from '../campaign/types.js';
import type { ContextWindow } from '../campaign/contextBuilder.js';

/** Yields one candidate utterance per player turn. */
export interface SpeechToText {
  transcribe(): AsyncIterable<string>;
}

export interface GenerationRequest {
  sceneId: string;
  sceneTitle: string;
  sceneKind: SceneKind;
  playerInput: string;
  window: ContextWindow;
}

export interface NpcLine {
  speaker: string;
  content: string;
}

/** Structured changes a generation proposes for the running scene. */
export interface GenerationDeltas {
  upserts?: Partial<Record<EntityCollection, Entity[]>>;
  /** NPC the narration brings into play; upserted into the scene's world. */
  introduceNpc?: Entity;
  beatTransition?: BeatTransition;
  newThreads?: string[];
  resolvedThreads?: string[];
  /** Lines worth remembering in the campaign memory. */
  memoryAppend?: string[];
  encounterEnded?: boolean;
}

export interface Generation {
  narration: string;
  npcLines: NpcLine[];
  deltas?: GenerationDeltas;
}

export interface LanguageGenerator {
  generate(request: GenerationRequest): Promise<Generation>;
}

export interface SpeechSynthesizer {
  synthesize(text: string): Promise<Uint8Array>;
}

export interface ImageGenerator {
  /** Returns a location (path or URL) of the rendered image. */
  render(description: string): Promise<string>;
}
