import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { outlineReply, withFacts } from '../testing/fakeAdapter.js';
import { stageResult } from '../testing/fixtures.js';
import { createEmptyFactUpdates, createEmptyKnowledge, type FactUpdates } from '../types/knowledge.js';
import { CONCEPT_STAGE, OUTLINE_STAGE, chapterStage } from '../types/project.js';
import { commit, extract, query, rebuildKnowledge } from './knowledgeStore.js';

function facts(partial: Partial<FactUpdates>): FactUpdates {
  return { ...createEmptyFactUpdates(), ...partial };
}

describe('extract', () => {
  const warnings = () => vi.mocked(console.warn);

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reads entities, events and threads from the facts block', () => {
    const text = withFacts('Chapter prose.', {
      entities: [{ name: 'Alice Moreau', category: 'character', attributes: { 'eye color': 'blue', age: 34 } }],
      events: [{ label: 'The archive burns', before: ['Trial'] }],
      threadsOpened: ['Who took the ledger?'],
    });

    expect(extract(text, chapterStage(1))).toEqual({
      entities: [{ name: 'Alice Moreau', category: 'character', attributes: { eyeColor: 'blue', age: '34' } }],
      events: [{ id: 'the-archive-burns', label: 'The archive burns', before: ['trial'], after: [] }],
      threadsOpened: [{ id: 'who-took-the-ledger', title: 'Who took the ledger?' }],
      threadsResolved: [],
    });
    expect(warnings()).not.toHaveBeenCalled();
  });

  it('degrades to empty facts when the block is missing', () => {
    expect(extract('Prose without facts.', chapterStage(2))).toEqual(createEmptyFactUpdates());
    expect(warnings()).toHaveBeenCalledTimes(1);
  });

  it('degrades to empty facts when the block is malformed', () => {
    const text = 'Prose.\n\n```facts\n{"entities": "nope"}\n```';
    expect(extract(text, chapterStage(2))).toEqual(createEmptyFactUpdates());
    expect(warnings()).toHaveBeenCalledTimes(1);
  });

  it('collects outline characters and locations', () => {
    const updates = extract(outlineReply(2, ['Alice Moreau', 'Bob']), OUTLINE_STAGE);
    expect(updates.entities).toEqual([
      { name: 'Alice Moreau', category: 'character', attributes: {} },
      { name: 'Bob', category: 'character', attributes: {} },
      { name: 'Lyon', category: 'location', attributes: {} },
    ]);
  });
});

describe('commit', () => {
  const alice = (attributes: Record<string, string>, name = 'Alice Moreau') => ({
    name,
    category: 'character' as const,
    attributes,
  });

  it('does not modify its input', () => {
    const empty = createEmptyKnowledge();
    commit(empty, facts({ entities: [alice({ eyeColor: 'blue' })] }), { stageResultId: 'r1', stage: CONCEPT_STAGE });
    expect(empty).toEqual(createEmptyKnowledge());
  });

  it('folds aliases and keeps disagreeing values as disputed', () => {
    let knowledge = commit(createEmptyKnowledge(), facts({ entities: [alice({ eyeColor: 'blue' })] }), {
      stageResultId: 'r1',
      stage: CONCEPT_STAGE,
    });
    knowledge = commit(knowledge, facts({ entities: [alice({ eyeColor: 'Blue.' }, 'Alice')] }), {
      stageResultId: 'r2',
      stage: chapterStage(1),
    });
    knowledge = commit(knowledge, facts({ entities: [alice({ eyeColor: 'green' }, 'Alice')] }), {
      stageResultId: 'r3',
      stage: chapterStage(2),
    });

    expect(Object.keys(knowledge.entities)).toEqual(['character:alice moreau']);
    const entity = knowledge.entities['character:alice moreau'];
    expect(entity.aliases).toEqual(['Alice']);
    expect(entity.touchedChapters).toEqual([1, 2]);
    expect(entity.attributes.eyeColor).toEqual({
      value: 'blue',
      assertedBy: 'r1',
      stage: 'concept',
      disputed: [{ value: 'green', assertedBy: 'r3', stage: 'chapter:2' }],
    });
  });

  it('keeps precedence acyclic and records the closing relation as disputed', () => {
    let knowledge = commit(
      createEmptyKnowledge(),
      facts({
        events: [
          { id: 'a', label: 'A', before: ['b'], after: [] },
          { id: 'b', label: 'B', before: ['c'], after: [] },
        ],
      }),
      { stageResultId: 'r1', stage: chapterStage(1) }
    );
    knowledge = commit(knowledge, facts({ events: [{ id: 'c', label: 'C', before: ['a'], after: [] }] }), {
      stageResultId: 'r2',
      stage: chapterStage(2),
    });

    expect(knowledge.timeline.map((event) => [event.id, event.order])).toEqual([
      ['a', 1],
      ['b', 2],
      ['c', 3],
    ]);
    expect(knowledge.precedence).toEqual([
      { before: 'a', after: 'b', assertedBy: 'r1' },
      { before: 'b', after: 'c', assertedBy: 'r1' },
    ]);
    expect(knowledge.disputedRelations).toEqual([{ before: 'c', after: 'a', assertedBy: 'r2' }]);
  });

  it('opens and resolves plot threads without removing them', () => {
    let knowledge = commit(
      createEmptyKnowledge(),
      facts({ threadsOpened: [{ id: 'ledger', title: 'The missing ledger' }] }),
      { stageResultId: 'r1', stage: chapterStage(1) }
    );
    knowledge = commit(knowledge, facts({ threadsResolved: ['ledger'] }), {
      stageResultId: 'r3',
      stage: chapterStage(3),
    });

    expect(knowledge.threads).toEqual([
      {
        id: 'ledger',
        title: 'The missing ledger',
        status: 'resolved',
        openedBy: 'r1',
        openedInChapter: 1,
        resolvedBy: 'r3',
        resolvedInChapter: 3,
      },
    ]);
  });
});

describe('query and rebuildKnowledge', () => {
  const results = [
    stageResult('r1', chapterStage(1), {
      entities: [
        { name: 'Alice Moreau', category: 'character', attributes: {} },
        { name: 'Lyon', category: 'location', attributes: {} },
      ],
      threadsOpened: [{ id: 'ledger', title: 'The missing ledger' }],
    }),
    stageResult('r2', chapterStage(2), {
      entities: [{ name: 'Bob', category: 'character', attributes: {} }],
    }),
  ];

  it('filters by category, chapter and name', () => {
    const knowledge = rebuildKnowledge(results);
    const names = (view: ReturnType<typeof query>) => view.entities.map((entity) => entity.name);

    expect(names(query(knowledge))).toEqual(['Bob', 'Alice Moreau', 'Lyon']);
    expect(names(query(knowledge, { categories: ['location'] }))).toEqual(['Lyon']);
    expect(names(query(knowledge, { chapters: [2] }))).toEqual(['Bob']);
    expect(names(query(knowledge, { names: ['Moreau'] }))).toEqual(['Alice Moreau']);
    expect(query(knowledge, { threadStatus: 'resolved' }).threads).toEqual([]);
  });

  it('replays results into the same knowledge as sequential commits', () => {
    const sequential = commit(
      commit(createEmptyKnowledge(), results[0].facts, { stageResultId: 'r1', stage: chapterStage(1) }),
      results[1].facts,
      { stageResultId: 'r2', stage: chapterStage(2) }
    );
    expect(rebuildKnowledge(results)).toEqual(sequential);
  });
});
