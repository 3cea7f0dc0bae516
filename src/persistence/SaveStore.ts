import fs from 'fs/promises';
import path from 'path';
import { CampaignState } from '../campaign/types.js';
import { MalformedSave, SchemaVersionMismatch } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { fileTimestamp, slugify } from '../utils/slug.js';
import { SAVE_EXTENSION, parseSave, renderSave } from './saveFormat.js';

const saveLog = createLogger(NAMESPACES.persistence.saves);

export interface SaveEntry {
  slug: string;
  path: string;
  modifiedAt: Date;
}

export type ResumeResult =
  | { kind: 'restored'; state: CampaignState; path: string }
  | { kind: 'no-save' };

/** What the Master Agent needs from persistence. */
export interface CampaignSaver {
  save(state: CampaignState): Promise<string>;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && Reflect.get(error, 'code') === 'ENOENT';
}

/**
 * Markdown saves on disk, one file per save: `<slug>_<timestamp>.dnd-save.md`.
 * Writes for the same campaign are serialized, each going to a temp file that
 * is renamed into place.
 */
export class SaveStore implements CampaignSaver {
  private readonly writeChains = new Map<string, Promise<unknown>>();

  constructor(public readonly savesDir: string) {}

  fileNameFor(state: CampaignState): string {
    return `${slugify(state.name)}_${fileTimestamp(new Date(state.lastPlayedAt))}${SAVE_EXTENSION}`;
  }

  save(state: CampaignState): Promise<string> {
    const slug = slugify(state.name);
    const content = renderSave(state);
    const target = path.join(this.savesDir, this.fileNameFor(state));

    const previous = this.writeChains.get(slug) ?? Promise.resolve();
    const write = previous
      .catch(() => undefined)
      .then(async () => {
        await fs.mkdir(this.savesDir, { recursive: true });
        const tmp = `${target}.tmp`;
        await fs.writeFile(tmp, content, 'utf-8');
        await fs.rename(tmp, target);
        saveLog('saved %s', target);
        return target;
      });
    this.writeChains.set(slug, write);
    return write;
  }

  /** Wait for every queued write to settle. */
  async flush(): Promise<void> {
    await Promise.allSettled([...this.writeChains.values()]);
  }

  async load(filePath: string): Promise<CampaignState> {
    const text = await fs.readFile(filePath, 'utf-8');
    return parseSave(text);
  }

  async listSaves(slug?: string): Promise<SaveEntry[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.savesDir);
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }

    const entries: SaveEntry[] = [];
    for (const name of names) {
      if (!name.endsWith(SAVE_EXTENSION)) continue;
      const entrySlug = name.slice(0, name.lastIndexOf('_'));
      if (slug !== undefined && entrySlug !== slug) continue;
      const filePath = path.join(this.savesDir, name);
      const stat = await fs.stat(filePath);
      entries.push({ slug: entrySlug, path: filePath, modifiedAt: stat.mtime });
    }
    // Newest first; the file name carries the save time, so it breaks mtime ties
    return entries.sort((a, b) => b.modifiedAt.getTime() - a.modifiedAt.getTime() || b.path.localeCompare(a.path));
  }

  /**
   * Load the newest save for a campaign (or for any campaign when no slug is
   * given). Parse errors propagate as MalformedSave / SchemaVersionMismatch.
   */
  async resume(slug?: string): Promise<ResumeResult> {
    const [latest] = await this.listSaves(slug === undefined ? undefined : slugify(slug));
    if (!latest) {
      saveLog('no save found for %s', slug ?? '(any campaign)');
      return { kind: 'no-save' };
    }
    const state = await this.load(latest.path);
    saveLog('resumed %s from %s', state.name, latest.path);
    return { kind: 'restored', state, path: latest.path };
  }
}

export function isUnreadableSave(error: unknown): error is MalformedSave | SchemaVersionMismatch {
  return error instanceof MalformedSave || error instanceof SchemaVersionMismatch;
}
