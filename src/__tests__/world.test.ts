import { describe, it, expect } from 'vitest';
import { emptyWorld } from '../campaign/types.js';
import { InvalidBeatTransition, InvalidEntity } from '../errors.js';
import { addThread, resolveThread, unresolvedThreads } from '../world/openThreads.js';
import { activeBeat, applyBeatTransition, createStoryPlan, validateStoryPlan } from '../world/storyPlan.js';
import { excerptWorld, upsertEntity, validateWorld } from '../world/worldState.js';
import { OpenThread } from '../campaign/types.js';

describe('world state', () => {
  it('upserts by case-insensitive name and keeps the original position', () => {
    const world = emptyWorld();
    upsertEntity(world, 'npcs', { name: 'Mira', description: 'A smuggler', tags: ['ally'] });
    upsertEntity(world, 'npcs', { name: 'Orrin', description: 'A guard', tags: [] });
    upsertEntity(world, 'npcs', { name: ' mira ', description: ' A former smuggler ', tags: ['ally', 'Ally', ' pilot ', ''] });

    expect(world.npcs).toEqual([
      { name: 'mira', description: 'A former smuggler', tags: ['ally', 'pilot'] },
      { name: 'Orrin', description: 'A guard', tags: [] }
    ]);
  });

  it('rejects unnamed entries', () => {
    expect(() => upsertEntity(emptyWorld(), 'items', { name: '  ', description: 'x', tags: [] })).toThrow(InvalidEntity);
    expect(() => upsertEntity(emptyWorld(), 'items', { name: '  ', description: 'x', tags: [] })).toThrow('Cannot store an unnamed entry in items');
  });

  it('detects duplicate names within a collection', () => {
    const world = emptyWorld();
    world.locations.push({ name: 'Dock', description: '', tags: [] }, { name: 'dock', description: '', tags: [] });
    expect(() => validateWorld(world)).toThrow('Duplicate locations entry "dock"');
  });

  it('rejects blank names when validating a whole world', () => {
    const world = emptyWorld();
    world.items.push({ name: ' ', description: 'a stray note', tags: [] });
    expect(() => validateWorld(world)).toThrow(InvalidEntity);
    expect(() => validateWorld(world)).toThrow('Unnamed entry in items');
  });

  it('puts mentioned entities first in an excerpt', () => {
    const world = emptyWorld();
    for (const name of ['Ash', 'Birch', 'Cedar']) upsertEntity(world, 'items', { name, description: '', tags: [] });
    const excerpt = excerptWorld(world, 'I pick up the cedar staff', 2);
    expect(excerpt.items.map((item) => item.name)).toEqual(['Cedar', 'Ash']);
  });
});

describe('story plan', () => {
  it('numbers beats from 1 and activates the first', () => {
    const plan = createStoryPlan(['Arrive', ' ', 'Investigate', 'Confront']);
    expect(plan).toEqual([
      { order: 1, description: 'Arrive', status: 'active' },
      { order: 2, description: 'Investigate', status: 'pending' },
      { order: 3, description: 'Confront', status: 'pending' }
    ]);
    expect(activeBeat(plan)?.order).toBe(1);
  });

  it('advances to the next pending beat when the active one is done', () => {
    const plan = createStoryPlan(['Arrive', 'Investigate', 'Confront']);
    const next = applyBeatTransition(plan, { order: 1, status: 'done' });
    expect(next.map((beat) => beat.status)).toEqual(['done', 'active', 'pending']);
    expect(plan[0].status).toBe('active');
  });

  it('rejects a second active beat and unknown orders', () => {
    const plan = createStoryPlan(['Arrive', 'Investigate']);
    expect(() => applyBeatTransition(plan, { order: 2, status: 'active' })).toThrow(InvalidBeatTransition);
    expect(() => applyBeatTransition(plan, { order: 9, status: 'done' })).toThrow('No story beat with order 9');
    expect(applyBeatTransition(plan, { order: 1, status: 'active' })).toEqual(plan);
  });

  it('validates contiguous orders and a single active beat', () => {
    expect(() => validateStoryPlan([{ order: 2, description: 'x', status: 'pending' }])).toThrow(InvalidBeatTransition);
    expect(() =>
      validateStoryPlan([
        { order: 1, description: 'a', status: 'active' },
        { order: 2, description: 'b', status: 'active' }
      ])
    ).toThrow('Story plan has 2 active beats (1, 2)');
  });
});

describe('open threads', () => {
  it('adds each open thread once and resolves the oldest match', () => {
    const threads: OpenThread[] = [];
    addThread(threads, 'Who stole the map?', '2026-03-01T10:00:00.000Z');
    addThread(threads, 'who stole the map? ', '2026-03-01T10:05:00.000Z');
    addThread(threads, '   ', '2026-03-01T10:06:00.000Z');
    expect(threads).toHaveLength(1);

    expect(resolveThread(threads, 'WHO STOLE THE MAP?')).toBe(true);
    expect(resolveThread(threads, 'Who stole the map?')).toBe(false);
    addThread(threads, 'Who stole the map?', '2026-03-02T09:00:00.000Z');
    expect(threads).toHaveLength(2);
    expect(unresolvedThreads(threads)).toEqual([{ text: 'Who stole the map?', createdAt: '2026-03-02T09:00:00.000Z', resolved: false }]);
  });
});
