import fs from 'fs/promises';
import path from 'path';
import { Turn, TurnRole } from '../campaign/types.js';
import { MalformedSave } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';

const transcriptLog = createLogger(NAMESPACES.persistence.transcripts);

export interface TranscriptWriter {
  refFor(campaignSlug: string, sceneId: string): string;
  write(ref: string, turns: readonly Turn[]): Promise<void>;
  remove(ref: string): Promise<void>;
}

const ROLES: readonly TurnRole[] = ['player', 'narrator', 'npc'];

function toTurn(value: unknown, line: number): Turn {
  if (typeof value !== 'object' || value === null) throw new MalformedSave('transcript entry is not an object', line);
  const role = ROLES.find((r) => r === Reflect.get(value, 'role'));
  const content: unknown = Reflect.get(value, 'content');
  const timestamp: unknown = Reflect.get(value, 'timestamp');
  const sceneId: unknown = Reflect.get(value, 'sceneId');
  const speaker: unknown = Reflect.get(value, 'speaker');
  if (!role || typeof content !== 'string' || typeof timestamp !== 'number' || typeof sceneId !== 'string') {
    throw new MalformedSave('transcript entry is missing role, content, timestamp or sceneId', line);
  }
  return typeof speaker === 'string' ? { role, content, timestamp, sceneId, speaker } : { role, content, timestamp, sceneId };
}

/**
 * Full scene transcripts, one JSON turn per line. References are paths
 * relative to the saves directory so a save folder can be moved as a whole.
 */
export class TranscriptStore implements TranscriptWriter {
  constructor(private readonly savesDir: string) {}

  refFor(campaignSlug: string, sceneId: string): string {
    return `transcripts/${campaignSlug}/${sceneId}.transcript.jsonl`;
  }

  private resolve(ref: string): string {
    return path.join(this.savesDir, ...ref.split('/'));
  }

  async write(ref: string, turns: readonly Turn[]): Promise<void> {
    const target = this.resolve(ref);
    await fs.mkdir(path.dirname(target), { recursive: true });
    const body = turns.map((turn) => JSON.stringify(turn)).join('\n');
    const tmp = `${target}.tmp`;
    await fs.writeFile(tmp, turns.length > 0 ? `${body}\n` : '', 'utf-8');
    await fs.rename(tmp, target);
    transcriptLog('wrote %d turns to %s', turns.length, ref);
  }

  async read(ref: string): Promise<Turn[]> {
    const text = await fs.readFile(this.resolve(ref), 'utf-8');
    const turns: Turn[] = [];
    text.split('\n').forEach((line, index) => {
      if (!line.trim()) return;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        throw new MalformedSave(`transcript ${ref} has invalid JSON`, index + 1);
      }
      turns.push(toTurn(parsed, index + 1));
    });
    return turns;
  }

  async remove(ref: string): Promise<void> {
    await fs.rm(this.resolve(ref), { force: true });
  }
}
