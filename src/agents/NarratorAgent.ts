import nunjucks from 'nunjucks';
import type { ValidateFunction } from 'ajv';
import { BaseAgent } from './BaseAgent.js';
import { loadValidator } from './context/jsonValidation.js';
import { ConfigManager } from '../configManager.js';
import { BeatStatus, Entity } from '../campaign/types.js';
import { Generation, GenerationDeltas, GenerationRequest, LanguageGenerator } from '../collaborators/types.js';
import { createLogger, NAMESPACES } from '../logging.js';

const narratorLog = createLogger(NAMESPACES.agents.narrator);

interface RawEntity {
  name: string;
  description?: string;
  tags?: string[];
}

/** Shape of src/schemas/narration.schema.json. */
export interface NarrationResponse {
  narration: string;
  npcLines?: Array<{ speaker: string; content: string }>;
  introduceNpc?: RawEntity;
  upserts?: { npcs?: RawEntity[]; locations?: RawEntity[]; items?: RawEntity[] };
  beatTransition?: { order: number; status: BeatStatus };
  newThreads?: string[];
  resolvedThreads?: string[];
  memoryAppend?: string[];
  encounterEnded?: boolean;
}

function toEntity(raw: RawEntity): Entity {
  return { name: raw.name, description: raw.description ?? '', tags: raw.tags ?? [] };
}

export function toGeneration(response: NarrationResponse): Generation {
  const deltas: GenerationDeltas = {};
  if (response.upserts) {
    deltas.upserts = {};
    if (response.upserts.npcs) deltas.upserts.npcs = response.upserts.npcs.map(toEntity);
    if (response.upserts.locations) deltas.upserts.locations = response.upserts.locations.map(toEntity);
    if (response.upserts.items) deltas.upserts.items = response.upserts.items.map(toEntity);
  }
  if (response.introduceNpc) deltas.introduceNpc = toEntity(response.introduceNpc);
  if (response.beatTransition) deltas.beatTransition = { ...response.beatTransition };
  if (response.newThreads?.length) deltas.newThreads = response.newThreads;
  if (response.resolvedThreads?.length) deltas.resolvedThreads = response.resolvedThreads;
  if (response.memoryAppend?.length) deltas.memoryAppend = response.memoryAppend;
  if (response.encounterEnded) deltas.encounterEnded = true;

  return {
    narration: response.narration.trim(),
    npcLines: (response.npcLines ?? []).map((line) => ({ speaker: line.speaker.trim(), content: line.content.trim() })),
    deltas: Object.keys(deltas).length > 0 ? deltas : undefined
  };
}

export class NarratorAgent extends BaseAgent implements LanguageGenerator {
  private readonly validator: ValidateFunction<NarrationResponse>;

  constructor(configManager: ConfigManager, env: nunjucks.Environment) {
    super('narrator', configManager, env);
    this.validator = loadValidator<NarrationResponse>('narration');
  }

  async generate(request: GenerationRequest): Promise<Generation> {
    const systemPrompt = this.renderTemplate('narrator', {
      scene: { id: request.sceneId, title: request.sceneTitle, kind: request.sceneKind },
      window: request.window
    });
    const response = await this.callJson(systemPrompt, request.playerInput, this.validator);
    const generation = toGeneration(response);
    narratorLog('scene %s: narration of %d chars, %d npc lines', request.sceneId, generation.narration.length, generation.npcLines.length);
    return generation;
  }
}
