import { describe, expect, it } from 'vitest';
import { estimateTokens, packContext, rankEntitiesForChapter, type ContextItem } from './contextOptimizer.js';
import { ConfigurationError } from './errors.js';
import { createEmptyKnowledge, type Entity } from './types/knowledge.js';

function entity(name: string, touchedChapters: number[]): Entity {
  return { name, category: 'character', aliases: [], attributes: {}, firstSeenBy: 'r1', touchedChapters };
}

describe('estimateTokens', () => {
  it('weighs CJK characters double', () => {
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('你好')).toBe(1);
    expect(estimateTokens('你好ab')).toBe(2);
    expect(estimateTokens('')).toBe(0);
  });
});

describe('packContext', () => {
  const render = (items: readonly ContextItem[]) => items.map((item) => item.text).join('');
  const item = (text: string): ContextItem => ({ section: 's', text, rank: 0 });

  it('adds optional items in order while they fit', () => {
    const packed = packContext({
      budgetTokens: 3,
      mandatory: [item('aaaa')],
      optional: [item('bbbbbbbb'), item('cccc'), item('dddd')],
      render,
    });
    expect(packed.items.map((i) => i.text)).toEqual(['aaaa', 'cccc', 'dddd']);
    expect(packed.dropped.map((i) => i.text)).toEqual(['bbbbbbbb']);
    expect(packed.tokens).toBe(3);
  });

  it('rejects a budget the mandatory items overflow', () => {
    expect(() => packContext({ budgetTokens: 1, mandatory: [item('aaaaaaaa')], optional: [], render })).toThrow(
      ConfigurationError
    );
  });
});

describe('rankEntitiesForChapter', () => {
  it('splits entities into recent, in scope and others', () => {
    const knowledge = createEmptyKnowledge();
    for (const e of [entity('Alice', [4]), entity('Bob', [1]), entity('Carol', [2]), entity('Dan', [5])]) {
      knowledge.entities[`character:${e.name.toLowerCase()}`] = e;
    }
    const ranked = rankEntitiesForChapter(knowledge, 5, ['Bob']);
    expect(ranked.mandatory.map((e) => e.name)).toEqual(['Dan', 'Alice']);
    expect(ranked.inScope.map((e) => e.name)).toEqual(['Bob']);
    expect(ranked.others.map((e) => e.name)).toEqual(['Carol']);
  });
});
