/**
 * Context optimizer
 *
 * Fits story context into a prompt token budget:
 * 1. Mandatory items always go in; if they alone overflow, the budget is unusable
 * 2. Optional items are added in priority order while the whole prompt still fits
 * 3. Entities are ranked by relevance to the chapter being written
 */

import { ConfigurationError } from './errors.js';
import { namesMatch, lastTouchedChapter, type Entity, type StoryKnowledge } from './types/knowledge.js';

/**
 * Rough estimate: about 0.5 token per CJK character, 0.25 per other character
 */
export function estimateTokens(text: string): number {
  const cjkChars = (text.match(/[\u3040-\u30ff\u3400-\u4dbf\u4e00-\u9fff\uac00-\ud7af]/g) || []).length;
  const otherChars = text.length - cjkChars;
  return Math.ceil(cjkChars * 0.5 + otherChars * 0.25);
}

/**
 * One line of context destined for a prompt section
 */
export type ContextItem = {
  section: string;
  text: string;
  /** Position within its section when rendered */
  rank: number;
};

export type PackedContext = {
  items: ContextItem[];
  rendered: string;
  tokens: number;
  /** Optional items that did not fit */
  dropped: ContextItem[];
};

/**
 * Items of one section, in rank order
 */
export function sectionLines(items: readonly ContextItem[], section: string): string[] {
  return items
    .filter((item) => item.section === section)
    .sort((a, b) => a.rank - b.rank)
    .map((item) => item.text);
}

/**
 * Greedy fill: mandatory items first, then each optional item (already in
 * priority order) that keeps the rendered prompt within budget. The full
 * rendering is re-measured after every addition.
 */
export function packContext(args: {
  budgetTokens: number;
  mandatory: readonly ContextItem[];
  optional: readonly ContextItem[];
  render: (items: readonly ContextItem[]) => string;
}): PackedContext {
  const { budgetTokens, mandatory, optional, render } = args;

  const items = [...mandatory];
  let rendered = render(items);
  let tokens = estimateTokens(rendered);
  if (tokens > budgetTokens) {
    throw new ConfigurationError(
      `Prompt budget of ${budgetTokens} tokens is too small: mandatory context alone needs ${tokens}`
    );
  }

  const dropped: ContextItem[] = [];
  for (const item of optional) {
    const candidate = render([...items, item]);
    const candidateTokens = estimateTokens(candidate);
    if (candidateTokens > budgetTokens) {
      dropped.push(item);
      continue;
    }
    items.push(item);
    rendered = candidate;
    tokens = candidateTokens;
  }

  return { items, rendered, tokens, dropped };
}

/**
 * Entities split by relevance to chapter `chapterIndex`
 */
export type RankedEntities = {
  /** Touched in the previous or current chapter */
  mandatory: Entity[];
  /** Named by the chapter's outline entry */
  inScope: Entity[];
  /** Everything else, most recently touched first */
  others: Entity[];
};

export function rankEntitiesForChapter(
  knowledge: StoryKnowledge,
  chapterIndex: number,
  scopeNames: readonly string[]
): RankedEntities {
  const ranked: RankedEntities = { mandatory: [], inScope: [], others: [] };

  const byRecency = Object.values(knowledge.entities).sort(
    (a, b) => lastTouchedChapter(b) - lastTouchedChapter(a) || a.name.localeCompare(b.name)
  );

  for (const entity of byRecency) {
    const names = [entity.name, ...entity.aliases];
    if (entity.touchedChapters.some((chapter) => chapter === chapterIndex || chapter === chapterIndex - 1)) {
      ranked.mandatory.push(entity);
    } else if (scopeNames.some((scoped) => names.some((name) => namesMatch(name, scoped)))) {
      ranked.inScope.push(entity);
    } else {
      ranked.others.push(entity);
    }
  }

  return ranked;
}
