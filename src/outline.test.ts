import { describe, expect, it } from 'vitest';
import { describeOutline, getOutlineChapter, outlineChapters, parseOutline } from './outline.js';
import { outlineReply } from './testing/fakeAdapter.js';

const keyed = JSON.stringify({
  outline: {
    act_2: { title: 'Two', chapters: [{ title: 'C' }] },
    act_1: { title: 'One', chapters: [{ title: 'A' }, { title: 'B', characters: [{ name: 'Bob' }, 'Eve'] }] },
  },
});

describe('parseOutline', () => {
  it('numbers chapters across acts', () => {
    const outline = parseOutline(outlineReply(4));
    expect(outline?.acts).toHaveLength(2);
    expect(outline && outlineChapters(outline).map((chapter) => chapter.index)).toEqual([1, 2, 3, 4]);
    expect(outline && getOutlineChapter(outline, 3)).toEqual({
      index: 3,
      title: 'Chapter 3',
      summary: 'Events of chapter 3',
      characters: ['Alice Moreau'],
      locations: ['Lyon'],
    });
  });

  it('orders act_N keys numerically and fills missing fields', () => {
    const outline = parseOutline(keyed);
    expect(outline && outlineChapters(outline).map((chapter) => chapter.title)).toEqual(['A', 'B', 'C']);
    expect(outline && getOutlineChapter(outline, 2)?.characters).toEqual(['Bob', 'Eve']);
    expect(outline && getOutlineChapter(outline, 3)).toEqual({
      index: 3,
      title: 'C',
      summary: '',
      characters: [],
      locations: [],
    });
  });

  it('ignores a facts block after the outline', () => {
    const outline = parseOutline(`${outlineReply(2)}\n\n\`\`\`facts\n{"summary": "x"}\n\`\`\``);
    expect(outline && outlineChapters(outline)).toHaveLength(2);
  });

  it('returns null when no outline can be read', () => {
    expect(parseOutline('The story begins in winter.')).toBeNull();
    expect(parseOutline('{"acts": []}')).toBeNull();
  });
});

describe('outline rendering', () => {
  it('describes acts and chapter count', () => {
    const outline = parseOutline(keyed);
    expect(outline && describeOutline(outline)).toBe('Outline of 3 chapters in 2 acts: One / Two.');
  });
});
