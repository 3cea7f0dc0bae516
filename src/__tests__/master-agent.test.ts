import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect } from 'vitest';
import { CampaignDraft, MasterAgent } from '../campaign/MasterAgent.js';
import { InvalidBeatTransition, InvalidStateTransition, MergeConflict, SceneAlreadyTerminated } from '../errors.js';
import { Compressor } from '../memory/Compressor.js';
import { renderSave } from '../persistence/saveFormat.js';
import { TranscriptStore } from '../persistence/TranscriptStore.js';
import { FakeSummarizer, MemorySaver, MemoryTranscripts, memorySettings, sampleState, steppingClock } from './support/fakes.js';

const DRAFT: CampaignDraft = {
  title: ' Salt & Ember ',
  synopsis: ' Smugglers ',
  acts: ['Arrive', 'Investigate', 'Confront'],
  npcs: [{ name: 'Mira', description: 'A smuggler', tags: ['ally'] }],
  locations: [{ name: 'Dock', description: 'Wet planks', tags: [] }],
  openThreads: ['Who hired Mira?']
};

function createMaster() {
  const saver = new MemorySaver();
  const transcripts = new MemoryTranscripts();
  const summarizer = new FakeSummarizer();
  const master = new MasterAgent({
    compressor: new Compressor(summarizer, memorySettings()),
    saves: saver,
    transcripts,
    clock: steppingClock()
  });
  return { master, saver, transcripts, summarizer };
}

async function activeMaster() {
  const parts = createMaster();
  parts.master.beginPlanning();
  await parts.master.completePlanning(DRAFT);
  return parts;
}

function playScene(master: MasterAgent) {
  const scene = master.spawnScene({ title: 'At the dock', kind: 'dialogue' });
  scene.acceptTurn('player', 'Hello there');
  scene.acceptTurn('npc', 'Keep your voice down.', 'Mira');
  return scene;
}

describe('MasterAgent planning', () => {
  it('turns the draft into version 1 of the campaign and saves it', async () => {
    const { master, saver } = createMaster();
    master.beginPlanning();
    expect(master.getStatus()).toBe('planning');

    const saved = await master.completePlanning(DRAFT);

    expect(saved).toBe('memory://save-1');
    expect(master.getStatus()).toBe('active');
    expect(master.getRevision()).toBe(1);
    expect(master.getState()).toEqual({
      version: 1,
      name: 'Salt & Ember',
      status: 'active',
      synopsis: 'Smugglers',
      createdAt: '2026-03-01T10:00:00.000Z',
      lastPlayedAt: '2026-03-01T10:00:00.000Z',
      world: {
        npcs: [{ name: 'Mira', description: 'A smuggler', tags: ['ally'] }],
        locations: [{ name: 'Dock', description: 'Wet planks', tags: [] }],
        items: []
      },
      storyPlan: [
        { order: 1, description: 'Arrive', status: 'active' },
        { order: 2, description: 'Investigate', status: 'pending' },
        { order: 3, description: 'Confront', status: 'pending' }
      ],
      sceneHistory: [],
      openThreads: [{ text: 'Who hired Mira?', createdAt: '2026-03-01T10:00:00.000Z', resolved: false }],
      annotations: {}
    });
    expect(saver.saved).toHaveLength(1);
  });

  it('rejects planning steps out of order', async () => {
    const { master } = createMaster();
    await expect(master.completePlanning(DRAFT)).rejects.toThrow(InvalidStateTransition);
    master.beginPlanning();
    expect(() => master.beginPlanning()).toThrow('Cannot begin planning while planning');
    expect(() => master.spawnScene({ title: 'Too early', kind: 'combat' })).toThrow(InvalidStateTransition);
  });

  it('hands out frozen copies of the state', async () => {
    const { master } = await activeMaster();
    const state = master.getState();
    expect(Object.isFrozen(state)).toBe(true);
    expect(Object.isFrozen(state.world.npcs[0])).toBe(true);
  });
});

describe('MasterAgent scenes and merges', () => {
  it('merges a concluded scene into the campaign', async () => {
    const { master, saver, transcripts, summarizer } = await activeMaster();
    const scene = playScene(master);
    scene.recordDelta({
      upserts: { npcs: [{ name: 'Orrin', description: 'A dock guard', tags: [] }] },
      beatTransition: { order: 1, status: 'done' },
      newThreads: ['Where is the map?'],
      resolvedThreads: ['Who hired Mira?']
    });

    const result = await master.concludeScene();

    expect(summarizer.calls[0].lines).toEqual(['Player: Hello there', 'Mira: Keep your voice down.']);
    expect(result.record).toEqual({
      sceneId: 'scene-001',
      title: 'At the dock',
      kind: 'dialogue',
      startedAt: '2026-03-01T10:00:01.000Z',
      endedAt: '2026-03-01T10:00:05.000Z',
      turnCount: 2,
      summary: { covers: { kind: 'scene', sceneId: 'scene-001' }, text: 'Summary of 2 lines.', createdAt: '2026-03-01T10:00:04.000Z' },
      transcriptRef: 'transcripts/salt-ember/scene-001.transcript.jsonl'
    });
    expect(result.revision).toBe(2);
    expect(result.memory.status).toBe('skipped');
    expect(await result.persisted).toBe('memory://save-2');

    const state = master.getState();
    expect(state.world.npcs.map((npc) => npc.name)).toEqual(['Mira', 'Orrin']);
    expect(state.storyPlan.map((beat) => beat.status)).toEqual(['done', 'active', 'pending']);
    expect(state.openThreads).toEqual([
      { text: 'Who hired Mira?', createdAt: '2026-03-01T10:00:00.000Z', resolved: true },
      { text: 'Where is the map?', createdAt: '2026-03-01T10:00:06.000Z', resolved: false }
    ]);
    expect(state.lastPlayedAt).toBe('2026-03-01T10:00:06.000Z');
    expect(transcripts.files.get('transcripts/salt-ember/scene-001.transcript.jsonl')).toHaveLength(2);
    expect(saver.saved[1].sceneHistory).toHaveLength(1);
    expect(scene.getStatus()).toBe('terminated');
    expect(master.getLiveScene()).toBeUndefined();
    expect(master.memoryView().turns.map((t) => t.content)).toEqual(['Scene "At the dock": Summary of 2 lines.']);
  });

  it('seeds scenes with a frozen snapshot that later merges do not touch', async () => {
    const { master } = await activeMaster();
    const scene = playScene(master);
    expect(Object.isFrozen(scene.seed.world.npcs)).toBe(true);
    scene.recordDelta({ upserts: { npcs: [{ name: 'Orrin', description: 'A dock guard', tags: [] }] } });
    await master.concludeScene();

    expect(scene.seed.world.npcs.map((npc) => npc.name)).toEqual(['Mira']);
    expect(scene.seed.revision).toBe(1);
  });

  it('leaves the state untouched when a beat transition is invalid', async () => {
    const { master, saver, transcripts } = await activeMaster();
    const before = JSON.stringify(master.getState());
    const scene = playScene(master);
    scene.recordDelta({ upserts: { items: [{ name: 'Map', description: '', tags: [] }] }, beatTransition: { order: 2, status: 'active' } });

    await expect(master.concludeScene()).rejects.toThrow(InvalidBeatTransition);

    expect(JSON.stringify(master.getState())).toBe(before);
    expect(master.getRevision()).toBe(1);
    expect(transcripts.files.size).toBe(0);
    expect(saver.saved).toHaveLength(1);
    expect(scene.getStatus()).toBe('active');
  });

  it('leaves the state untouched when the transcript cannot be written', async () => {
    const { master, saver, transcripts } = await activeMaster();
    const before = JSON.stringify(master.getState());
    const scene = playScene(master);
    transcripts.failure = new Error('disk full');

    await expect(master.concludeScene()).rejects.toThrow('disk full');

    expect(JSON.stringify(master.getState())).toBe(before);
    expect(saver.saved).toHaveLength(1);
    expect(master.getLiveScene()).toBe(scene);
    expect(scene.getStatus()).toBe('active');
  });

  it('drops the merge and its transcript when the scene is aborted mid-merge', async () => {
    const { master, saver, transcripts } = await activeMaster();
    const before = JSON.stringify(master.getState());
    playScene(master);
    transcripts.onWrite = () => master.abortScene();

    await expect(master.concludeScene()).rejects.toThrow(MergeConflict);

    expect(JSON.stringify(master.getState())).toBe(before);
    expect(transcripts.files.size).toBe(0);
    expect(saver.saved).toHaveLength(1);
    expect(master.getLiveScene()).toBeUndefined();
  });

  it('rejects a conclusion seeded from an older revision', async () => {
    const { master } = await activeMaster();
    const scene = playScene(master);
    const conclusion = await scene.conclude();

    await expect(master.merge({ ...conclusion, baseRevision: 0 })).rejects.toThrow('seeded from revision 0, campaign is at 1');
    expect(master.getRevision()).toBe(1);
  });

  it('applies a conclusion only once when merges race', async () => {
    const { master } = await activeMaster();
    const scene = playScene(master);
    const conclusion = await scene.conclude();

    const [first, second] = await Promise.allSettled([master.merge(conclusion), master.merge(conclusion)]);

    expect(first.status).toBe('fulfilled');
    expect(second.status === 'rejected' && second.reason).toBeInstanceOf(MergeConflict);
    expect(master.getState().sceneHistory).toHaveLength(1);
    expect(master.getRevision()).toBe(2);
  });

  it('allows one live scene at a time and never reuses a scene id', async () => {
    const { master } = await activeMaster();
    playScene(master);
    expect(() => master.spawnScene({ title: 'Second', kind: 'combat' })).toThrow(InvalidStateTransition);
    await master.concludeScene();

    expect(() => master.spawnScene({ title: 'Again', kind: 'combat', sceneId: 'scene-001' })).toThrow(MergeConflict);
    expect(master.spawnScene({ title: 'Next', kind: 'combat' }).sceneId).toBe('scene-002');
  });

  it('stops a concluded scene from taking more turns', async () => {
    const { master } = await activeMaster();
    const scene = playScene(master);
    await master.concludeScene();
    expect(() => scene.acceptTurn('player', 'Wait!')).toThrow(SceneAlreadyTerminated);
  });
});

describe('MasterAgent lifecycle', () => {
  it('pauses by aborting the live scene and saving', async () => {
    const { master, saver } = await activeMaster();
    const scene = playScene(master);

    expect(await master.pause()).toBe('memory://save-2');
    expect(master.getStatus()).toBe('paused');
    expect(scene.getStatus()).toBe('terminated');
    expect(saver.saved[1].sceneHistory).toEqual([]);

    master.resume();
    expect(master.getStatus()).toBe('active');
  });

  it('rejects every mutation once archived', async () => {
    const { master, saver } = await activeMaster();
    await master.archive();

    expect(master.getStatus()).toBe('archived');
    expect(saver.saved[1].status).toBe('archived');
    expect(() => master.spawnScene({ title: 'Late', kind: 'dialogue' })).toThrow(InvalidStateTransition);
    expect(() => master.acceptTurn('narrator', 'An epilogue')).toThrow(InvalidStateTransition);
    await expect(master.pause()).rejects.toThrow(InvalidStateTransition);
  });

  it('restores archived saves as read-only', () => {
    const { master } = createMaster();
    master.restore(sampleState({ status: 'archived' }));
    expect(master.getStatus()).toBe('archived');
    expect(() => master.spawnScene({ title: 'Late', kind: 'dialogue' })).toThrow(InvalidStateTransition);
  });

  it('summarizes campaign memory on request', async () => {
    const { master } = createMaster();
    master.restore(sampleState());
    master.acceptTurn('narrator', 'The storm passed.');

    const summary = await master.produceSummary();

    expect(summary?.text).toBe('Summary of 2 lines.');
    expect(master.memoryView().turns).toEqual([]);
  });
});

describe('a first scene of forty turns', () => {
  it('compresses once at the break and keeps every turn in the transcript', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'campaign-transcripts-'));
    try {
      const summarizer = new FakeSummarizer();
      const transcripts = new TranscriptStore(dir);
      const master = new MasterAgent({
        compressor: new Compressor(summarizer, memorySettings({ budgetTokens: 20, hardCeilingTokens: 100_000, idleTurnThreshold: 1000 })),
        saves: new MemorySaver(),
        transcripts,
        clock: steppingClock()
      });
      master.beginPlanning();
      await master.completePlanning({ title: 'Salt & Ember', acts: ['Arrive', 'Investigate'] });
      expect(master.getState().version).toBe(1);
      expect(renderSave(master.getState())).toContain('# Open Threads\n---\n---\n');

      const scene = master.spawnScene({ title: 'Harbour night', kind: 'exploration' });
      for (let i = 0; i < 39; i++) {
        scene.acceptTurn(i % 2 === 0 ? 'player' : 'narrator', `Line ${i}`);
        const outcome = await scene.compactIfNeeded();
        expect(outcome.status).toBe('skipped');
      }
      expect(summarizer.calls).toHaveLength(0);

      scene.acceptTurn('narrator', 'Line 39');
      scene.signal('encounter-end');
      const outcome = await scene.compactIfNeeded();

      expect(outcome.status === 'compressed' && outcome.summary.covers).toEqual({ kind: 'turns', from: 0, to: 39 });
      expect(summarizer.calls).toHaveLength(1);
      expect(scene.contextView()).toEqual({ summary: expect.objectContaining({ text: 'Summary of 40 lines.' }), turns: [] });

      const { record } = await master.concludeScene();

      expect(record.turnCount).toBe(40);
      expect(record.transcriptRef).toBe('transcripts/salt-ember/scene-001.transcript.jsonl');
      const archived = await transcripts.read(record.transcriptRef);
      expect(archived.map((t) => t.content)).toEqual(Array.from({ length: 40 }, (_, i) => `Line ${i}`));
      expect(master.getState().sceneHistory).toEqual([record]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
