/**
 * Story knowledge store
 *
 * Reads facts out of generated text and folds them into StoryKnowledge.
 * `commit` is pure and never deletes: a differing attribute value is kept
 * under `disputed`, a relation that would close a precedence cycle goes to
 * `disputedRelations`, and resolved threads stay in the list.
 */

import { z } from 'zod';
import { ExtractionError, errorMessage } from '../errors.js';
import { outlineChapters, parseOutline } from '../outline.js';
import { warn } from '../services/logger.js';
import {
  ENTITY_CATEGORIES,
  createEmptyFactUpdates,
  createEmptyKnowledge,
  entityKey,
  lastTouchedChapter,
  namesMatch,
  normalizeAttributeKey,
  normalizeName,
  slugify,
  type Entity,
  type EntityCategory,
  type FactUpdates,
  type PlotThread,
  type PlotThreadStatus,
  type StoryKnowledge,
  type TimelineEvent,
} from '../types/knowledge.js';
import { stageChapter, stageKey, type StageKind, type StageResult } from '../types/project.js';
import { readFactsBlock } from '../utils/chapterText.js';
import { DEFAULT_EQUIVALENCE_RULES, valuesEquivalent, type EquivalenceRule } from './equivalence.js';
import { addRelation, buildPrecedenceGraph, conflictingChain, getEvent, hasRelation } from './timelineManager.js';

/**
 * Turns stage text into proposed facts. Implementations throw
 * ExtractionError when the text carries no usable facts.
 */
export interface FactExtractor {
  extract(text: string, stage: StageKind): FactUpdates;
}

const AttributeValueSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value).trim());

const FactsBlockSchema = z.object({
  summary: z.string().optional(),
  entities: z
    .array(
      z.object({
        name: z.string().trim().min(1),
        category: z.enum(['character', 'location', 'object']).catch('character'),
        attributes: z.record(AttributeValueSchema).catch({}),
      })
    )
    .default([]),
  events: z
    .array(
      z.object({
        id: z.string().optional(),
        label: z.string().trim().min(1),
        before: z.array(z.string()).default([]),
        after: z.array(z.string()).default([]),
      })
    )
    .default([]),
  threadsOpened: z
    .array(z.union([z.string(), z.object({ id: z.string().optional(), title: z.string().trim().min(1) })]))
    .default([]),
  threadsResolved: z.array(z.string()).default([]),
});

type FactsBlock = z.infer<typeof FactsBlockSchema>;

function mergeEntity(updates: FactUpdates, name: string, category: EntityCategory, attributes: Record<string, string>): void {
  const key = entityKey(category, name);
  const existing = updates.entities.find((entity) => entityKey(entity.category, entity.name) === key);
  // A second, disagreeing mention stays a separate entry so validation sees both values
  const disagrees = existing
    ? Object.entries(attributes).some(([attribute, value]) => {
        const earlier = existing.attributes[attribute];
        return earlier !== undefined && earlier !== value;
      })
    : false;
  if (existing && !disagrees) {
    existing.attributes = { ...attributes, ...existing.attributes };
    return;
  }
  updates.entities.push({ name, category, attributes });
}

function toFactUpdates(block: FactsBlock): FactUpdates {
  const updates = createEmptyFactUpdates();

  for (const entity of block.entities) {
    const attributes: Record<string, string> = {};
    for (const [attribute, value] of Object.entries(entity.attributes)) {
      const key = normalizeAttributeKey(attribute);
      if (key && value) attributes[key] = value;
    }
    mergeEntity(updates, entity.name, entity.category, attributes);
  }

  for (const event of block.events) {
    const id = slugify(event.id || event.label);
    if (!id) continue;
    updates.events.push({
      id,
      label: event.label,
      before: event.before.map(slugify).filter((other) => other && other !== id),
      after: event.after.map(slugify).filter((other) => other && other !== id),
    });
  }

  for (const thread of block.threadsOpened) {
    const title = typeof thread === 'string' ? thread.trim() : thread.title;
    const id = slugify(typeof thread === 'string' ? thread : thread.id || thread.title);
    if (id && title) updates.threadsOpened.push({ id, title });
  }

  updates.threadsResolved = block.threadsResolved.map(slugify).filter(Boolean);

  const summary = block.summary?.trim();
  if (summary) updates.summary = summary;
  return updates;
}

/**
 * Default extractor: the trailing ```facts JSON block of the stage text. The
 * outline stage also contributes every character and location its chapters list.
 */
export class JsonFactExtractor implements FactExtractor {
  extract(text: string, stage: StageKind): FactUpdates {
    const raw = readFactsBlock(text);
    let updates = createEmptyFactUpdates();

    if (raw) {
      const parsed = FactsBlockSchema.safeParse(raw);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ExtractionError(`Malformed facts block at ${issue.path.join('.') || '(root)'}: ${issue.message}`);
      }
      updates = toFactUpdates(parsed.data);
    }

    if (stage.kind === 'outline') {
      const outline = parseOutline(text);
      for (const chapter of outline ? outlineChapters(outline) : []) {
        for (const name of chapter.characters) mergeEntity(updates, name, 'character', {});
        for (const name of chapter.locations) mergeEntity(updates, name, 'location', {});
      }
      if (raw || outline) return updates;
    }

    if (!raw) {
      throw new ExtractionError('No facts block in the generated text');
    }
    return updates;
  }
}

export const defaultFactExtractor: FactExtractor = new JsonFactExtractor();

/**
 * Facts proposed by a stage. Extraction failures are logged and degrade to an
 * empty update set; they never fail the stage.
 */
export function extract(
  text: string,
  stage: StageKind,
  extractor: FactExtractor = defaultFactExtractor
): FactUpdates {
  try {
    return extractor.extract(text, stage);
  } catch (err) {
    warn('Fact extraction failed, continuing without facts', {
      stage: stageKey(stage),
      kind: err instanceof ExtractionError ? err.kind : 'unexpected',
      reason: errorMessage(err),
    });
    return createEmptyFactUpdates();
  }
}

/**
 * Entity of the category whose name or alias matches `name`
 */
export function findEntity(
  knowledge: StoryKnowledge,
  category: EntityCategory,
  name: string
): Entity | undefined {
  const exact = knowledge.entities[entityKey(category, name)];
  if (exact) return exact;
  return Object.values(knowledge.entities).find(
    (entity) =>
      entity.category === category &&
      (namesMatch(entity.name, name) || entity.aliases.some((alias) => namesMatch(alias, name)))
  );
}

export type CommitContext = {
  stageResultId: string;
  stage: StageKind;
  rules?: readonly EquivalenceRule[];
};

function ensureEvent(knowledge: StoryKnowledge, id: string, label: string, ctx: CommitContext): TimelineEvent {
  const existing = getEvent(knowledge, id);
  if (existing) return existing;
  const order = knowledge.timeline.reduce((max, event) => Math.max(max, event.order), 0) + 1;
  const event: TimelineEvent = {
    id,
    label,
    order,
    assertedBy: ctx.stageResultId,
    chapter: stageChapter(ctx.stage),
  };
  knowledge.timeline.push(event);
  return event;
}

/**
 * Fold a stage's facts into a copy of the knowledge
 */
export function commit(knowledge: StoryKnowledge, updates: FactUpdates, ctx: CommitContext): StoryKnowledge {
  const next = structuredClone(knowledge);
  const chapter = stageChapter(ctx.stage);
  const stage = stageKey(ctx.stage);
  const rules = ctx.rules ?? DEFAULT_EQUIVALENCE_RULES;

  for (const proposed of updates.entities) {
    let entity = findEntity(next, proposed.category, proposed.name);
    if (!entity) {
      entity = {
        name: proposed.name.trim(),
        category: proposed.category,
        aliases: [],
        attributes: {},
        firstSeenBy: ctx.stageResultId,
        touchedChapters: [],
      };
      next.entities[entityKey(proposed.category, proposed.name)] = entity;
    } else {
      const alias = proposed.name.trim();
      const known = [entity.name, ...entity.aliases].map(normalizeName);
      if (!known.includes(normalizeName(alias))) entity.aliases.push(alias);
    }

    if (chapter > 0 && !entity.touchedChapters.includes(chapter)) {
      entity.touchedChapters.push(chapter);
      entity.touchedChapters.sort((a, b) => a - b);
    }

    for (const [attribute, value] of Object.entries(proposed.attributes)) {
      const key = normalizeAttributeKey(attribute);
      if (!key || !value.trim()) continue;
      const assertion = { value: value.trim(), assertedBy: ctx.stageResultId, stage };
      const record = entity.attributes[key];
      if (!record) {
        entity.attributes[key] = { ...assertion, disputed: [] };
      } else if (
        !valuesEquivalent(record.value, assertion.value, rules, key) &&
        !record.disputed.some(
          (d) => d.assertedBy === assertion.assertedBy && valuesEquivalent(d.value, assertion.value, rules, key)
        )
      ) {
        record.disputed.push(assertion);
      }
    }
  }

  for (const proposed of updates.events) {
    ensureEvent(next, proposed.id, proposed.label, ctx);
  }

  const graph = buildPrecedenceGraph(next.precedence);
  for (const proposed of updates.events) {
    const pairs = [
      ...proposed.before.map((other) => [proposed.id, other] as const),
      ...proposed.after.map((other) => [other, proposed.id] as const),
    ];
    for (const [before, after] of pairs) {
      ensureEvent(next, before, before, ctx);
      ensureEvent(next, after, after, ctx);
      const relation = { before, after, assertedBy: ctx.stageResultId };
      if (hasRelation(next.precedence, before, after)) continue;
      if (conflictingChain(graph, before, after)) {
        if (!hasRelation(next.disputedRelations, before, after)) next.disputedRelations.push(relation);
        continue;
      }
      next.precedence.push(relation);
      addRelation(graph, relation);
    }
  }
  next.timeline.sort((a, b) => a.order - b.order);

  for (const opened of updates.threadsOpened) {
    if (next.threads.some((thread) => thread.id === opened.id)) continue;
    next.threads.push({
      id: opened.id,
      title: opened.title,
      status: 'open',
      openedBy: ctx.stageResultId,
      openedInChapter: chapter,
    });
  }

  for (const resolvedId of updates.threadsResolved) {
    const thread = next.threads.find(
      (candidate) => candidate.status === 'open' && (candidate.id === resolvedId || slugify(candidate.title) === resolvedId)
    );
    if (thread) {
      thread.status = 'resolved';
      thread.resolvedBy = ctx.stageResultId;
      thread.resolvedInChapter = chapter;
    }
  }

  return next;
}

export type KnowledgeFilter = {
  categories?: EntityCategory[];
  /** Entity names, alias-folded */
  names?: string[];
  /** Entities touched in any of these chapters */
  chapters?: number[];
  threadStatus?: PlotThreadStatus;
};

export type KnowledgeView = {
  entities: Entity[];
  threads: PlotThread[];
};

/**
 * Entities (most recently touched first) and threads matching every given criterion
 */
export function query(knowledge: StoryKnowledge, filter: KnowledgeFilter = {}): KnowledgeView {
  const categories = filter.categories ?? ENTITY_CATEGORIES;
  const entities = Object.values(knowledge.entities)
    .filter((entity) => categories.includes(entity.category))
    .filter(
      (entity) =>
        !filter.names ||
        filter.names.some(
          (name) => namesMatch(entity.name, name) || entity.aliases.some((alias) => namesMatch(alias, name))
        )
    )
    .filter(
      (entity) => !filter.chapters || entity.touchedChapters.some((chapter) => filter.chapters?.includes(chapter))
    )
    .sort((a, b) => lastTouchedChapter(b) - lastTouchedChapter(a) || a.name.localeCompare(b.name));

  const threads = knowledge.threads.filter(
    (thread) => !filter.threadStatus || thread.status === filter.threadStatus
  );

  return { entities, threads };
}

/**
 * Knowledge as it stood after the given results, replayed in order
 */
export function rebuildKnowledge(
  results: readonly StageResult[],
  rules: readonly EquivalenceRule[] = DEFAULT_EQUIVALENCE_RULES
): StoryKnowledge {
  return results.reduce(
    (knowledge, result) => commit(knowledge, result.facts, { stageResultId: result.id, stage: result.stage, rules }),
    createEmptyKnowledge()
  );
}
