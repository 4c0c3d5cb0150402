import { z } from 'zod';
import { extractJsonObject, stripFactsBlock } from './utils/chapterText.js';

/**
 * One chapter of the outline
 */
export type OutlineChapter = {
  /** Chapter number, 1-based, counted across acts */
  index: number;
  title: string;
  summary: string;
  /** Characters the chapter involves */
  characters: string[];
  locations: string[];
};

export type OutlineAct = {
  title: string;
  chapters: OutlineChapter[];
};

export type StoryOutline = {
  acts: OutlineAct[];
};

const StringListSchema = z
  .array(z.union([z.string(), z.object({ name: z.string() })]))
  .transform((items) =>
    items.map((item) => (typeof item === 'string' ? item : item.name).trim()).filter(Boolean)
  )
  .catch([]);

const RawChapterSchema = z.object({
  title: z.string().catch(''),
  summary: z.string().catch(''),
  characters: StringListSchema,
  locations: StringListSchema,
});

const RawActSchema = z.object({
  title: z.string().catch(''),
  chapters: z.array(RawChapterSchema).min(1),
});

const RawActsSchema = z.array(RawActSchema).min(1);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * `act_1`, `act_2`, ... keys of an object, in act order
 */
function actsFromKeyedObject(value: Record<string, unknown>): unknown[] {
  return Object.keys(value)
    .map((key) => ({ key, match: /^act[_\s-]?(\d+)$/i.exec(key) }))
    .filter((entry) => entry.match !== null)
    .sort((a, b) => Number(a.match?.[1]) - Number(b.match?.[1]))
    .map((entry) => value[entry.key]);
}

function collectActs(raw: Record<string, unknown>): unknown[] {
  if (Array.isArray(raw.acts)) return raw.acts;

  const inner = raw.outline;
  if (Array.isArray(inner)) return inner;
  if (isRecord(inner)) {
    if (Array.isArray(inner.acts)) return inner.acts;
    const keyed = actsFromKeyedObject(inner);
    if (keyed.length > 0) return keyed;
    if (Array.isArray(inner.chapters)) return [inner];
  }

  const keyed = actsFromKeyedObject(raw);
  if (keyed.length > 0) return keyed;

  if (Array.isArray(raw.chapters)) return [{ title: '', chapters: raw.chapters }];
  return [];
}

function parseOutlineObject(raw: Record<string, unknown>): StoryOutline | null {
  const parsed = RawActsSchema.safeParse(collectActs(raw));
  if (!parsed.success) return null;

  let index = 0;
  const acts = parsed.data.map((act) => ({
    title: act.title,
    chapters: act.chapters.map((chapter) => ({ index: ++index, ...chapter })),
  }));
  return { acts };
}

/**
 * Parse the outline stage text: a JSON act list, fenced or bare, possibly
 * followed by a facts block.
 */
export function parseOutline(text: string): StoryOutline | null {
  const candidates = [stripFactsBlock(text), text];
  for (const candidate of candidates) {
    const raw = extractJsonObject(candidate);
    const outline = raw ? parseOutlineObject(raw) : null;
    if (outline) return outline;
  }
  return null;
}

export function outlineChapters(outline: StoryOutline): OutlineChapter[] {
  return outline.acts.flatMap((act) => act.chapters);
}

export function getOutlineChapter(outline: StoryOutline, chapterIndex: number): OutlineChapter | null {
  return outlineChapters(outline).find((chapter) => chapter.index === chapterIndex) ?? null;
}

/**
 * Names an outline entry puts in scope for its chapter
 */
export function chapterScope(chapter: OutlineChapter | null): string[] {
  return chapter ? [...chapter.characters, ...chapter.locations] : [];
}

export function formatOutlineChapter(chapter: OutlineChapter): string {
  const summary = chapter.summary ? `: ${chapter.summary}` : '';
  return `${chapter.index}. ${chapter.title || `Chapter ${chapter.index}`}${summary}`;
}

/**
 * Brief for the chapter being written
 */
export function formatChapterBrief(chapter: OutlineChapter): string {
  const lines = [`Title: ${chapter.title || `Chapter ${chapter.index}`}`];
  if (chapter.summary) lines.push(`Summary: ${chapter.summary}`);
  if (chapter.characters.length > 0) lines.push(`Characters: ${chapter.characters.join(', ')}`);
  if (chapter.locations.length > 0) lines.push(`Locations: ${chapter.locations.join(', ')}`);
  return lines.join('\n');
}

export function describeOutline(outline: StoryOutline): string {
  const chapters = outlineChapters(outline);
  const titles = outline.acts.map((act) => act.title).filter(Boolean);
  const acts = `${outline.acts.length} act${outline.acts.length === 1 ? '' : 's'}`;
  return `Outline of ${chapters.length} chapters in ${acts}${titles.length > 0 ? `: ${titles.join(' / ')}` : ''}.`;
}
