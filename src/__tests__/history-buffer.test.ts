import { describe, it, expect } from 'vitest';
import { HistoryBuffer, formatTurn } from '../memory/HistoryBuffer.js';
import { InvalidTurnOrder } from '../errors.js';
import { countTokens } from '../utils/tokenCounter.js';
import { START, turn } from './support/fakes.js';

describe('HistoryBuffer', () => {
  it('appends turns in timestamp order', () => {
    const buffer = new HistoryBuffer();
    buffer.append(turn(0));
    buffer.append(turn(1));
    expect(buffer.length).toBe(2);
    expect(buffer.lastTimestamp()).toBe(START + 1000);
    expect(buffer.snapshot().map((t) => t.content)).toEqual(['Line 0', 'Line 1']);
  });

  it('rejects a turn that is not strictly after the last one', () => {
    const buffer = new HistoryBuffer([turn(0), turn(1)]);
    expect(() => buffer.append(turn(2, { timestamp: START + 1000 }))).toThrow(InvalidTurnOrder);
    expect(() => buffer.append(turn(2, { timestamp: START }))).toThrow(InvalidTurnOrder);
    expect(buffer.length).toBe(2);
  });

  it('stores frozen copies of appended turns', () => {
    const buffer = new HistoryBuffer();
    const original = { ...turn(0) };
    buffer.append(original);
    original.content = 'changed';
    const [stored] = buffer.snapshot();
    expect(stored.content).toBe('Line 0');
    expect(Object.isFrozen(stored)).toBe(true);
  });

  it('sizes the active context as the sum of formatted turn costs', () => {
    const turns = [turn(0), turn(1), turn(2)];
    const buffer = new HistoryBuffer(turns);
    const expected = turns.reduce((sum, t) => sum + countTokens(formatTurn(t)), 0);
    expect(buffer.size()).toBe(expected);
  });

  it('hides the covered prefix behind a summary without shortening the archive', () => {
    const turns = [turn(0), turn(1), turn(2), turn(3)];
    const buffer = new HistoryBuffer(turns);
    buffer.applySummary({ covers: { kind: 'turns', from: 0, to: 2 }, text: 'Earlier things happened.', createdAt: '2026-03-01T10:00:10.000Z' });

    const view = buffer.contextView();
    expect(view.summary?.text).toBe('Earlier things happened.');
    expect(view.turns.map((t) => t.content)).toEqual(['Line 3']);
    expect(buffer.snapshot()).toHaveLength(4);
    expect(buffer.coveredCount()).toBe(3);
    expect(buffer.size()).toBe(countTokens('Earlier things happened.') + countTokens(formatTurn(turns[3])));
  });

  it('refuses summaries that do not fit the buffer', () => {
    const buffer = new HistoryBuffer([turn(0), turn(1), turn(2)]);
    expect(() => buffer.applySummary({ covers: { kind: 'turns', from: 1, to: 2 }, text: 'x', createdAt: '' })).toThrow(RangeError);
    expect(() => buffer.applySummary({ covers: { kind: 'turns', from: 0, to: 3 }, text: 'x', createdAt: '' })).toThrow(RangeError);
    expect(() => buffer.applySummary({ covers: { kind: 'scene', sceneId: 'scene-001' }, text: 'x', createdAt: '' })).toThrow(RangeError);

    buffer.applySummary({ covers: { kind: 'turns', from: 0, to: 1 }, text: 'first two', createdAt: '' });
    expect(() => buffer.applySummary({ covers: { kind: 'turns', from: 0, to: 0 }, text: 'shrinks', createdAt: '' })).toThrow(RangeError);
  });

  it('formats turns with their speaker', () => {
    expect(formatTurn(turn(0))).toBe('Player: Line 0');
    expect(formatTurn(turn(1))).toBe('Narrator: Line 1');
    expect(formatTurn(turn(3, { role: 'npc', speaker: 'Mira' }))).toBe('Mira: Line 3');
    expect(formatTurn(turn(3, { role: 'npc' }))).toBe('NPC: Line 3');
  });
});
