/**
 * Story knowledge - type definitions
 *
 * Structured facts extracted from generated text: entities with their
 * attributes, the relative order of story events, and plot threads. The
 * consistency checker queries this; the prompt composer digests it.
 */

export type EntityCategory = 'character' | 'location' | 'object';

export const ENTITY_CATEGORIES: readonly EntityCategory[] = ['character', 'location', 'object'];

/**
 * One assertion of an attribute value
 */
export type AttributeAssertion = {
  value: string;
  /** StageResult that asserted it */
  assertedBy: string;
  /** Stage key of that result (concept, outline, chapter:n) */
  stage: string;
};

/**
 * Current value of an attribute plus every later assertion that disagreed with it
 */
export type AttributeRecord = AttributeAssertion & {
  disputed: AttributeAssertion[];
};

export type Entity = {
  name: string;
  category: EntityCategory;
  /** Other names folded onto this entity ("Dr. Smith" for "Smith") */
  aliases: string[];
  /** Attribute name (camelCase) -> record */
  attributes: Record<string, AttributeRecord>;
  /** StageResult that first mentioned the entity */
  firstSeenBy: string;
  /** Chapters whose facts mentioned the entity, ascending */
  touchedChapters: number[];
};

/**
 * A story event. `order` is a relative narration key, never a wall-clock time.
 */
export type TimelineEvent = {
  id: string;
  label: string;
  order: number;
  assertedBy: string;
  /** Chapter that introduced the event (0 for concept/outline) */
  chapter: number;
};

/**
 * "before happens before after" in story time
 */
export type TimelineRelation = {
  before: string;
  after: string;
  assertedBy: string;
};

export type PlotThreadStatus = 'open' | 'resolved';

export type PlotThread = {
  id: string;
  title: string;
  status: PlotThreadStatus;
  openedBy: string;
  openedInChapter: number;
  resolvedBy?: string;
  resolvedInChapter?: number;
};

export type StoryKnowledge = {
  /** Data version */
  version: string;
  /** Key: `${category}:${normalized name}` */
  entities: Record<string, Entity>;
  /** Ordered by `order` */
  timeline: TimelineEvent[];
  precedence: TimelineRelation[];
  /** Relations rejected because they would close a precedence cycle */
  disputedRelations: TimelineRelation[];
  threads: PlotThread[];
};

/**
 * Facts proposed by one stage, as read from its generated text
 */
export type FactUpdates = {
  entities: {
    name: string;
    category: EntityCategory;
    attributes: Record<string, string>;
  }[];
  events: {
    id: string;
    label: string;
    /** Ids of events this one happens before */
    before: string[];
    /** Ids of events this one happens after */
    after: string[];
  }[];
  threadsOpened: { id: string; title: string }[];
  threadsResolved: string[];
  /** Short summary of the stage text, if the model supplied one */
  summary?: string;
};

export function createEmptyKnowledge(): StoryKnowledge {
  return {
    version: '1.0.0',
    entities: {},
    timeline: [],
    precedence: [],
    disputedRelations: [],
    threads: [],
  };
}

export function createEmptyFactUpdates(): FactUpdates {
  return {
    entities: [],
    events: [],
    threadsOpened: [],
    threadsResolved: [],
  };
}

const HONORIFICS = new Set([
  'dr', 'doctor', 'mr', 'mrs', 'ms', 'miss', 'mx', 'prof', 'professor',
  'sir', 'dame', 'lord', 'lady', 'captain', 'capt', 'sgt', 'sergeant',
  'lt', 'lieutenant', 'col', 'colonel', 'gen', 'general', 'king', 'queen',
  'prince', 'princess', 'father', 'mother', 'sister', 'brother', 'aunt', 'uncle',
]);

/**
 * Lowercased words of a name or value, punctuation removed
 */
export function nameTokens(name: string): string[] {
  return name
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s'-]/gu, ' ')
    .split(/\s+/)
    .map((token) => token.replace(/^['-]+|['-]+$/g, ''))
    .filter(Boolean);
}

/**
 * Name tokens with leading honorifics and articles removed
 */
export function foldNameTokens(name: string): string[] {
  const tokens = nameTokens(name);
  let start = 0;
  while (start < tokens.length - 1 && (HONORIFICS.has(tokens[start]) || tokens[start] === 'the')) {
    start++;
  }
  return tokens.slice(start);
}

export function normalizeName(name: string): string {
  return nameTokens(name).join(' ');
}

const HONORIFIC_FORMS: Record<string, string> = {
  doctor: 'dr',
  professor: 'prof',
  captain: 'capt',
  sergeant: 'sgt',
  lieutenant: 'lt',
  colonel: 'col',
  general: 'gen',
};

function leadingHonorifics(name: string): string[] {
  const tokens = nameTokens(name);
  const folded = foldNameTokens(name).length;
  return tokens
    .slice(0, tokens.length - folded)
    .filter((token) => HONORIFICS.has(token))
    .map((token) => HONORIFIC_FORMS[token] ?? token);
}

/**
 * False when both names carry honorifics and none is shared ("Lord Byron" / "Lady Byron")
 */
export function honorificsCompatible(a: string, b: string): boolean {
  const left = leadingHonorifics(a);
  const right = leadingHonorifics(b);
  return left.length === 0 || right.length === 0 || left.some((title) => right.includes(title));
}

/**
 * Same name once honorifics are dropped ("Dr. Smith" / "Smith")
 */
export function namesEqual(a: string, b: string): boolean {
  const left = foldNameTokens(a);
  return left.length > 0 && left.join(' ') === foldNameTokens(b).join(' ') && honorificsCompatible(a, b);
}

/**
 * True when two names plausibly denote the same entity: equal after folding
 * honorifics, or one is a trailing or leading part of the other ("Smith" /
 * "Dr. John Smith", "Alice" / "Alice Moreau").
 */
export function namesMatch(a: string, b: string): boolean {
  const left = foldNameTokens(a);
  const right = foldNameTokens(b);
  if (left.length === 0 || right.length === 0 || !honorificsCompatible(a, b)) return false;
  const [shorter, longer] = left.length <= right.length ? [left, right] : [right, left];
  const tail = longer.slice(longer.length - shorter.length);
  const head = longer.slice(0, shorter.length);
  return shorter.every((token, i) => token === tail[i]) || shorter.every((token, i) => token === head[i]);
}

export function entityKey(category: EntityCategory, name: string): string {
  return `${category}:${normalizeName(name)}`;
}

/**
 * "eye color", "eye_color", "Eye-Color" and "eyeColor" all become "eyeColor"
 */
export function normalizeAttributeKey(attribute: string): string {
  const words = attribute
    .trim()
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean)
    .map((word) => word.toLowerCase());
  return words
    .map((word, i) => (i === 0 ? word : word.charAt(0).toUpperCase() + word.slice(1)))
    .join('');
}

/**
 * Identifier for an event or thread given by the model as free text
 */
export function slugify(value: string): string {
  return value
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^\p{L}\p{N}]+/gu, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Most recent chapter that mentioned the entity, or 0
 */
export function lastTouchedChapter(entity: Entity): number {
  return entity.touchedChapters.length > 0
    ? entity.touchedChapters[entity.touchedChapters.length - 1]
    : 0;
}

/**
 * One-line digest of an entity for prompts
 */
export function formatEntityForPrompt(entity: Entity): string {
  const attributes = Object.entries(entity.attributes)
    .map(([name, record]) => `${name}=${record.value}`)
    .join('; ');
  const aliases = entity.aliases.length > 0 ? ` (also: ${entity.aliases.join(', ')})` : '';
  return `- ${entity.name} [${entity.category}]${aliases}${attributes ? `: ${attributes}` : ''}`;
}

export function formatThreadForPrompt(thread: PlotThread): string {
  const where = thread.openedInChapter > 0 ? `chapter ${thread.openedInChapter}` : 'planning';
  return `- ${thread.title} (open since ${where})`;
}
