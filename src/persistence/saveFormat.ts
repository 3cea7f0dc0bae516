/**
 * Serializer/parser pair for `*.dnd-save.md` campaign saves.
 *
 * A save is five level-1 sections in fixed order, each written as
 *
 *     # <Section>
 *     ---
 *     <body>
 *     ---
 *
 * Body grammars:
 * - Metadata: `key: value` lines (`version`, `campaign`, `status`, `created`,
 *   `last_played`, optional `synopsis`).
 * - World State: `## NPCs` / `## Locations` / `## Items` sub-headings, each
 *   entry `- **Name** _(tag, tag)_: description`.
 * - Story Plan: `1. [active] description`.
 * - Scene History: one `<details>` block per scene.
 * - Open Threads: `- [ ] <created> | text`, `[x]` once resolved.
 *
 * Inline values escape `\` and line breaks with a backslash; names also escape
 * `*`, tags also escape `,()_`. Lines the reader does not recognize inside a
 * known section are kept in `CampaignState.annotations` and written back at
 * the end of that section, except World State, where they go above the first
 * sub-heading so an unclaimed entity line stays unclaimed.
 *
 * Timestamps must be readable by `Date.parse`, and the parsed story plan and
 * world must satisfy the same invariants a live campaign does.
 */
import {
  BeatStatus,
  CampaignState,
  ENTITY_COLLECTIONS,
  Entity,
  EntityCollection,
  OpenThread,
  SAVE_SECTIONS,
  SaveSectionName,
  SceneKind,
  SceneRecord,
  StoryBeat,
  WorldState,
  emptyWorld
} from '../campaign/types.js';
import { InvalidBeatTransition, InvalidEntity, MalformedSave, SchemaVersionMismatch } from '../errors.js';
import { validateStoryPlan } from '../world/storyPlan.js';
import { validateWorld } from '../world/worldState.js';

export const SUPPORTED_SAVE_VERSION = 1;
export const SAVE_EXTENSION = '.dnd-save.md';

const DELIMITER = '---';

const COLLECTION_HEADINGS: Record<EntityCollection, string> = {
  npcs: 'NPCs',
  locations: 'Locations',
  items: 'Items'
};

const SCENE_KINDS: readonly SceneKind[] = ['dialogue', 'combat', 'exploration'];
const BEAT_STATUSES: readonly BeatStatus[] = ['pending', 'active', 'done'];

// ---------------------------------------------------------------------------
// Inline escaping
// ---------------------------------------------------------------------------

export function escapeInline(text: string, specials = ''): string {
  let out = '';
  for (const ch of text) {
    if (ch === '\\') out += '\\\\';
    else if (ch === '\n') out += '\\n';
    else if (ch === '\r') out += '\\r';
    else if (specials.includes(ch)) out += `\\${ch}`;
    else out += ch;
  }
  return out;
}

export function unescapeInline(text: string): string {
  let out = '';
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch !== '\\' || i === text.length - 1) {
      out += ch;
      continue;
    }
    const next = text[++i];
    out += next === 'n' ? '\n' : next === 'r' ? '\r' : next;
  }
  return out;
}

/** Read raw (still escaped) text from `start` up to an unescaped `terminator`. */
function readUntil(line: string, start: number, terminator: string): { raw: string; end: number } | null {
  for (let i = start; i < line.length; i++) {
    if (line[i] === '\\') {
      i++;
      continue;
    }
    if (line.startsWith(terminator, i)) {
      return { raw: line.slice(start, i), end: i + terminator.length };
    }
  }
  return null;
}

function splitUnescaped(raw: string, separator: string): string[] {
  const parts: string[] = [];
  let current = '';
  for (let i = 0; i < raw.length; i++) {
    if (raw[i] === '\\' && i < raw.length - 1) {
      current += raw[i] + raw[i + 1];
      i++;
    } else if (raw[i] === separator) {
      parts.push(current);
      current = '';
    } else {
      current += raw[i];
    }
  }
  parts.push(current);
  return parts;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

function renderEntity(entity: Entity): string {
  const tags = entity.tags.length > 0 ? ` _(${entity.tags.map((t) => escapeInline(t, ',()_')).join(', ')})_` : '';
  const description = entity.description ? ` ${escapeInline(entity.description)}` : '';
  return `- **${escapeInline(entity.name, '*')}**${tags}:${description}`;
}

function renderSceneRecord(record: SceneRecord): string[] {
  const lines = [
    '<details>',
    `<summary>${record.endedAt.slice(0, 10)} – "${escapeInline(record.title, '"')}"</summary>`,
    '',
    `**Scene**: ${escapeInline(record.sceneId)}`,
    `**Kind**: ${record.kind}`,
    `**Started**: ${record.startedAt}`,
    `**Ended**: ${record.endedAt}`,
    `**Turns**: ${record.turnCount}`,
    `**Summarized**: ${record.summary.createdAt}`,
    '**Summary**:'
  ];
  for (const line of record.summary.text.split('\n')) {
    lines.push(line ? `> ${line}` : '>');
  }
  lines.push(`**Transcript**: [[${escapeInline(record.transcriptRef, ']')}]]`);
  lines.push('</details>');
  return lines;
}

function renderThread(thread: OpenThread): string {
  return `- [${thread.resolved ? 'x' : ' '}] ${thread.createdAt} | ${escapeInline(thread.text)}`;
}

function renderSectionBody(name: SaveSectionName, state: CampaignState): string[] {
  switch (name) {
    case 'Metadata': {
      const lines = [
        `version: ${state.version}`,
        `campaign: ${escapeInline(state.name)}`,
        `status: ${state.status}`,
        `created: ${state.createdAt}`,
        `last_played: ${state.lastPlayedAt}`
      ];
      if (state.synopsis !== undefined) lines.push(`synopsis: ${escapeInline(state.synopsis)}`);
      return lines;
    }
    case 'World State': {
      const lines: string[] = [];
      for (const collection of ENTITY_COLLECTIONS) {
        lines.push(`## ${COLLECTION_HEADINGS[collection]}`);
        lines.push(...state.world[collection].map(renderEntity));
      }
      return lines;
    }
    case 'Story Plan':
      return state.storyPlan.map((beat) => `${beat.order}. [${beat.status}] ${escapeInline(beat.description)}`);
    case 'Scene History':
      return state.sceneHistory.flatMap((record, index) => (index === 0 ? renderSceneRecord(record) : ['', ...renderSceneRecord(record)]));
    case 'Open Threads':
      return state.openThreads.map(renderThread);
  }
}

export function renderSave(state: CampaignState): string {
  const out: string[] = [];
  for (const name of SAVE_SECTIONS) {
    out.push(`# ${name}`, DELIMITER);
    const body = renderSectionBody(name, state);
    const notes = state.annotations[name] ?? [];
    out.push(...(name === 'World State' ? [...notes, ...body] : [...body, ...notes]));
    out.push(DELIMITER, '');
  }
  return out.join('\n');
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

interface RawSection {
  name: string;
  /** 1-based line number of the first body line. */
  firstLine: number;
  body: string[];
}

function splitSections(text: string): RawSection[] {
  const lines = text.replace(/\r\n/g, '\n').split('\n');
  const headings: number[] = [];
  for (let i = 0; i < lines.length - 1; i++) {
    if (/^# \S/.test(lines[i]) && lines[i + 1] === DELIMITER) headings.push(i);
  }
  if (headings.length === 0) throw new MalformedSave('no sections found');

  const preamble = lines.slice(0, headings[0]).filter((l) => l.trim());
  if (preamble.length > 0) throw new MalformedSave('unexpected content before the first section', 1);

  return headings.map((start, k) => {
    const stop = k + 1 < headings.length ? headings[k + 1] : lines.length;
    const region = lines.slice(start + 2, stop);
    while (region.length > 0 && region[region.length - 1].trim() === '') region.pop();
    const name = lines[start].slice(2).trim();
    if (region[region.length - 1] !== DELIMITER) {
      throw new MalformedSave(`section "${name}" is missing its closing ${DELIMITER}`, start + 1);
    }
    return { name, firstLine: start + 3, body: region.slice(0, -1) };
  });
}

function readTimestamp(value: string, field: string, line?: number): string {
  if (Number.isNaN(Date.parse(value))) throw new MalformedSave(`${field} "${value}" is not a timestamp`, line);
  return value;
}

interface ParsedMetadata {
  version: number;
  name: string;
  status: CampaignState['status'];
  createdAt: string;
  lastPlayedAt: string;
  synopsis?: string;
  extra: string[];
}

function parseMetadata(section: RawSection): ParsedMetadata {
  const values = new Map<string, string>();
  const extra: string[] = [];
  section.body.forEach((line, offset) => {
    if (!line.trim()) return;
    const match = /^([A-Za-z_][\w-]*):(?: (.*))?$/.exec(line);
    if (!match) throw new MalformedSave('metadata lines must be "key: value"', section.firstLine + offset);
    const [, key, value = ''] = match;
    if (['version', 'campaign', 'status', 'created', 'last_played', 'synopsis'].includes(key)) {
      values.set(key, value);
    } else {
      extra.push(line);
    }
  });

  const required = ['version', 'campaign', 'created', 'last_played'];
  for (const key of required) {
    if (!values.has(key)) throw new MalformedSave(`metadata is missing "${key}"`);
  }
  const versionText = values.get('version') ?? '';
  if (!/^\d+$/.test(versionText)) throw new MalformedSave(`metadata version "${versionText}" is not an integer`);

  const status = values.get('status') ?? 'active';
  if (status !== 'active' && status !== 'archived') throw new MalformedSave(`unknown campaign status "${status}"`);

  const synopsis = values.get('synopsis');
  return {
    version: Number(versionText),
    name: unescapeInline(values.get('campaign') ?? ''),
    status,
    createdAt: values.get('created') ?? '',
    lastPlayedAt: values.get('last_played') ?? '',
    synopsis: synopsis === undefined ? undefined : unescapeInline(synopsis),
    extra
  };
}

function parseEntity(line: string): Entity | null {
  if (!line.startsWith('- **')) return null;
  const name = readUntil(line, 4, '**');
  if (!name) return null;
  let pos = name.end;
  let tags: string[] = [];
  if (line.startsWith(' _(', pos)) {
    const rawTags = readUntil(line, pos + 3, ')_');
    if (!rawTags) return null;
    tags = splitUnescaped(rawTags.raw, ',')
      .map((t) => unescapeInline(t.trim()))
      .filter(Boolean);
    pos = rawTags.end;
  }
  if (line[pos] !== ':') return null;
  pos++;
  if (line[pos] === ' ') pos++;
  return { name: unescapeInline(name.raw), description: unescapeInline(line.slice(pos)), tags };
}

function parseWorld(section: RawSection, extra: string[]): WorldState {
  const world = emptyWorld();
  const byHeading = new Map<string, EntityCollection>(
    ENTITY_COLLECTIONS.map((collection) => [COLLECTION_HEADINGS[collection].toLowerCase(), collection])
  );
  let current: EntityCollection | null = null;
  for (const line of section.body) {
    if (!line.trim()) continue;
    const heading = /^## (.+)$/.exec(line);
    if (heading) {
      current = byHeading.get(heading[1].trim().toLowerCase()) ?? null;
      if (!current) extra.push(line);
      continue;
    }
    const entity = current ? parseEntity(line) : null;
    if (current && entity) {
      world[current].push(entity);
    } else {
      extra.push(line);
    }
  }
  return world;
}

function parseStoryPlan(section: RawSection, extra: string[]): StoryBeat[] {
  const plan: StoryBeat[] = [];
  for (const line of section.body) {
    if (!line.trim()) continue;
    const match = /^(\d+)\. \[(\w+)\] ?(.*)$/.exec(line);
    const status = match ? BEAT_STATUSES.find((s) => s === match[2]) : undefined;
    if (match && status) {
      plan.push({ order: Number(match[1]), status, description: unescapeInline(match[3]) });
    } else {
      extra.push(line);
    }
  }
  return plan;
}

function parseSceneBlock(block: string[], firstLine: number): SceneRecord {
  const fields = new Map<string, string>();
  const summaryLines: string[] = [];
  let title: string | undefined;
  for (const line of block) {
    const header = /^<summary>\S* – "(.*)"<\/summary>$/.exec(line);
    if (header) {
      title = unescapeInline(header[1]);
      continue;
    }
    if (line === '>' || line.startsWith('> ')) {
      summaryLines.push(line.slice(2));
      continue;
    }
    const field = /^\*\*([A-Za-z ]+)\*\*:(?: (.*))?$/.exec(line);
    if (field) fields.set(field[1], field[2] ?? '');
  }

  const need = (key: string): string => {
    const value = fields.get(key);
    if (value === undefined) throw new MalformedSave(`scene block is missing "${key}"`, firstLine);
    return value;
  };
  if (title === undefined) throw new MalformedSave('scene block is missing its <summary> line', firstLine);

  const kind = SCENE_KINDS.find((k) => k === need('Kind'));
  if (!kind) throw new MalformedSave(`unknown scene kind "${need('Kind')}"`, firstLine);
  const transcript = /^\[\[(.*)\]\]$/.exec(need('Transcript'));
  if (!transcript) throw new MalformedSave('transcript reference must be written as [[path]]', firstLine);
  const turnCount = Number(need('Turns'));
  if (!Number.isInteger(turnCount) || turnCount < 0) throw new MalformedSave('scene turn count is not a number', firstLine);

  const sceneId = unescapeInline(need('Scene'));
  return {
    sceneId,
    title,
    kind,
    startedAt: readTimestamp(need('Started'), 'scene start', firstLine),
    endedAt: readTimestamp(need('Ended'), 'scene end', firstLine),
    turnCount,
    summary: {
      covers: { kind: 'scene', sceneId },
      text: summaryLines.join('\n'),
      createdAt: readTimestamp(need('Summarized'), 'summary time', firstLine)
    },
    transcriptRef: unescapeInline(transcript[1])
  };
}

function parseSceneHistory(section: RawSection, extra: string[]): SceneRecord[] {
  const records: SceneRecord[] = [];
  let block: string[] | null = null;
  let blockStart = 0;
  for (let offset = 0; offset < section.body.length; offset++) {
    const line = section.body[offset];
    if (block) {
      if (line === '</details>') {
        records.push(parseSceneBlock(block, blockStart));
        block = null;
      } else {
        block.push(line);
      }
    } else if (line === '<details>') {
      block = [];
      blockStart = section.firstLine + offset;
    } else if (line.trim()) {
      extra.push(line);
    }
  }
  if (block) throw new MalformedSave('unterminated <details> block', blockStart);
  return records;
}

function parseOpenThreads(section: RawSection, extra: string[]): OpenThread[] {
  const threads: OpenThread[] = [];
  section.body.forEach((line, offset) => {
    if (!line.trim()) return;
    const match = /^- \[( |x)\] (\S+) \| ?(.*)$/.exec(line);
    if (match) {
      const createdAt = readTimestamp(match[2], 'thread time', section.firstLine + offset);
      threads.push({ resolved: match[1] === 'x', createdAt, text: unescapeInline(match[3]) });
    } else {
      extra.push(line);
    }
  });
  return threads;
}

function checkInvariants(world: WorldState, storyPlan: StoryBeat[], sceneHistory: SceneRecord[]): void {
  try {
    validateWorld(world);
    validateStoryPlan(storyPlan);
  } catch (error) {
    if (error instanceof InvalidEntity || error instanceof InvalidBeatTransition) throw new MalformedSave(error.message);
    throw error;
  }
  const seen = new Set<string>();
  for (const record of sceneHistory) {
    if (seen.has(record.sceneId)) throw new MalformedSave(`scene ${record.sceneId} appears more than once`);
    seen.add(record.sceneId);
  }
}

export function parseSave(text: string): CampaignState {
  const sections = splitSections(text);
  if (sections[0].name !== 'Metadata') {
    throw new MalformedSave(`first section must be Metadata, found "${sections[0].name}"`);
  }
  const metadata = parseMetadata(sections[0]);
  if (metadata.version > SUPPORTED_SAVE_VERSION) {
    throw new SchemaVersionMismatch(metadata.version, SUPPORTED_SAVE_VERSION);
  }
  readTimestamp(metadata.createdAt, 'created');
  readTimestamp(metadata.lastPlayedAt, 'last_played');

  SAVE_SECTIONS.forEach((expected, index) => {
    const found = sections[index];
    if (!found) throw new MalformedSave(`missing required section "${expected}"`);
    if (found.name !== expected) {
      throw new MalformedSave(`expected section "${expected}" but found "${found.name}"`, found.firstLine - 2);
    }
  });
  if (sections.length > SAVE_SECTIONS.length) {
    throw new MalformedSave(`unknown section "${sections[SAVE_SECTIONS.length].name}"`);
  }

  const annotations: CampaignState['annotations'] = {};
  const collect = <T>(name: SaveSectionName, parse: (section: RawSection, extra: string[]) => T): T => {
    const extra: string[] = [];
    const result = parse(sections[SAVE_SECTIONS.indexOf(name)], extra);
    if (extra.length > 0) annotations[name] = extra;
    return result;
  };

  if (metadata.extra.length > 0) annotations.Metadata = metadata.extra;
  const world = collect('World State', parseWorld);
  const storyPlan = collect('Story Plan', parseStoryPlan);
  const sceneHistory = collect('Scene History', parseSceneHistory);
  const openThreads = collect('Open Threads', parseOpenThreads);
  checkInvariants(world, storyPlan, sceneHistory);

  const state: CampaignState = {
    version: metadata.version,
    name: metadata.name,
    status: metadata.status,
    createdAt: metadata.createdAt,
    lastPlayedAt: metadata.lastPlayedAt,
    world,
    storyPlan,
    sceneHistory,
    openThreads,
    annotations
  };
  if (metadata.synopsis !== undefined) state.synopsis = metadata.synopsis;
  return state;
}
