import { Entity, EntityCollection, ENTITY_COLLECTIONS, WorldState } from '../campaign/types.js';
import { InvalidEntity } from '../errors.js';

export function entityKey(name: string): string {
  return name.trim().toLowerCase();
}

function normalizeTags(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const tag of tags) {
    const trimmed = tag.trim();
    if (trimmed && !seen.has(trimmed.toLowerCase())) {
      seen.add(trimmed.toLowerCase());
      result.push(trimmed);
    }
  }
  return result;
}

/**
 * Insert or replace an entity by case-insensitive name. Last write wins; the
 * entity keeps its position in the collection so saves diff cleanly.
 */
export function upsertEntity(world: WorldState, collection: EntityCollection, entity: Entity): void {
  const name = entity.name.trim();
  if (!name) throw new InvalidEntity(`Cannot store an unnamed entry in ${collection}`);
  const next: Entity = { name, description: entity.description.trim(), tags: normalizeTags(entity.tags) };
  const key = entityKey(name);
  const entries = world[collection];
  const index = entries.findIndex((existing) => entityKey(existing.name) === key);
  if (index === -1) {
    entries.push(next);
  } else {
    entries[index] = next;
  }
}

/** Every entity is named and names are unique (case-insensitive) per collection. */
export function validateWorld(world: WorldState): void {
  for (const collection of ENTITY_COLLECTIONS) {
    const seen = new Set<string>();
    for (const entity of world[collection]) {
      const key = entityKey(entity.name);
      if (!key) throw new InvalidEntity(`Unnamed entry in ${collection}`);
      if (seen.has(key)) throw new InvalidEntity(`Duplicate ${collection} entry "${entity.name}"`);
      seen.add(key);
    }
  }
}

/**
 * Entities whose name appears in `text`, mentioned ones first, capped at `limit`
 * per collection. Used to build the world excerpt handed to generation.
 */
export function excerptWorld(world: WorldState, text: string, limit = 8): WorldState {
  const haystack = text.toLowerCase();
  const pick = (entries: Entity[]): Entity[] => {
    const mentioned = entries.filter((e) => haystack.includes(entityKey(e.name)));
    const rest = entries.filter((e) => !haystack.includes(entityKey(e.name)));
    return [...mentioned, ...rest].slice(0, limit);
  };
  return { npcs: pick(world.npcs), locations: pick(world.locations), items: pick(world.items) };
}
