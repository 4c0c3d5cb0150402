import {
  estimateTokens,
  packContext,
  rankEntitiesForChapter,
  sectionLines,
  type ContextItem,
} from './contextOptimizer.js';
import {
  chapterScope,
  formatChapterBrief,
  formatOutlineChapter,
  getOutlineChapter,
  outlineChapters,
  parseOutline,
  type StoryOutline,
} from './outline.js';
import { formatEntityForPrompt, formatThreadForPrompt, type Entity, type StoryKnowledge } from './types/knowledge.js';
import type { Premise, StageKind, StageResult } from './types/project.js';
import { stripFactsBlock } from './utils/chapterText.js';
import { ConfigurationError } from './errors.js';

export type ComposeOptions = {
  premise: Premise;
  chapterCount: number;
  promptBudgetTokens: number;
};

export type ComposedPrompt = {
  system: string;
  prompt: string;
  /** Estimate for system and prompt together */
  estimatedTokens: number;
  /** Context items left out to stay within budget */
  droppedItems: number;
};

const FACTS_INSTRUCTIONS = `
After the text, append one fenced block tagged "facts" holding JSON with the
facts this text establishes. Use exactly this shape:

\`\`\`facts
{
  "summary": "two or three sentences summarising the text",
  "entities": [
    { "name": "Alice Moreau", "category": "character", "attributes": { "eyeColor": "blue", "occupation": "archivist" } },
    { "name": "The Lantern House", "category": "location", "attributes": { "city": "Lyon" } }
  ],
  "events": [
    { "id": "fire-at-archive", "label": "The archive burns", "before": ["trial"], "after": ["alice-arrives"] }
  ],
  "threadsOpened": [{ "id": "missing-ledger", "title": "Who took the ledger?" }],
  "threadsResolved": ["earlier-thread-id"]
}
\`\`\`

Rules for the facts block:
- category is one of character, location, object
- attributes hold stable, checkable facts (appearance, age, relations, home), camelCase keys
- "before"/"after" list ids of events that happen after/before this one in story time
- reuse ids of known events and threads when you refer to them
`.trim();

function describePremise(premise: Premise): string {
  const lines = [`Title: ${premise.title}`, `Core idea: ${premise.coreIdea}`];
  if (premise.genre) lines.push(`Genre: ${premise.genre}`);
  if (premise.theme) lines.push(`Theme: ${premise.theme}`);
  if (premise.style) lines.push(`Style: ${premise.style}`);
  return lines.join('\n');
}

function findResult(results: readonly StageResult[], kind: 'concept' | 'outline'): StageResult | undefined {
  return results.find((result) => result.stage.kind === kind);
}

function fullText(system: string, prompt: string): string {
  return `${system}\n\n${prompt}`;
}

function measured(system: string, prompt: string, budget: number, droppedItems = 0): ComposedPrompt {
  const estimatedTokens = estimateTokens(fullText(system, prompt));
  if (estimatedTokens > budget) {
    throw new ConfigurationError(
      `Prompt budget of ${budget} tokens is too small: the prompt needs ${estimatedTokens}`
    );
  }
  return { system, prompt, estimatedTokens, droppedItems };
}

function composeConcept(options: ComposeOptions): ComposedPrompt {
  const system = `
You are an experienced novelist and story architect. You turn a premise into a
concept document that later drives an outline and ${options.chapterCount} chapters.
Be concrete: named characters with fixed physical details, named places, a clear
central conflict. Write in English prose unless the premise asks otherwise.
`.trim();

  const prompt = `
[Premise]
${describePremise(options.premise)}

[Task]
Write the story concept:
1. Logline (one sentence)
2. Main characters: name, role, appearance, motivation
3. Setting: time, places, rules of the world
4. Central conflict and stakes
5. Themes and tone

${FACTS_INSTRUCTIONS}
`.trim();

  return measured(system, prompt, options.promptBudgetTokens);
}

function composeOutline(results: readonly StageResult[], options: ComposeOptions): ComposedPrompt {
  const concept = findResult(results, 'concept');
  if (!concept) {
    throw new ConfigurationError('Outline stage needs a completed concept');
  }

  const system = `
You are a story structure editor. You break a concept into acts and chapters
with steadily escalating conflict. Every chapter moves the main plot forward.
`.trim();

  const prompt = `
[Concept]
${stripFactsBlock(concept.text)}

[Task]
Produce the outline as JSON in a fenced \`\`\`json block, three acts, exactly
${options.chapterCount} chapters in total, numbered in reading order:

\`\`\`json
{
  "acts": [
    {
      "title": "Act title",
      "chapters": [
        { "title": "Chapter title", "summary": "what happens", "characters": ["Alice Moreau"], "locations": ["The Lantern House"] }
      ]
    }
  ]
}
\`\`\`

Use the character and location names from the concept.

${FACTS_INSTRUCTIONS}
`.trim();

  return measured(system, prompt, options.promptBudgetTokens);
}

const SECTION_HEADINGS: [string, string][] = [
  ['outline', '[Outline]'],
  ['summaries', '[Story so far]'],
  ['entities', '[Known facts: keep these consistent]'],
  ['threads', '[Open plot threads]'],
  ['brief', '[This chapter]'],
];

function chapterSystem(chapterIndex: number, chapterCount: number): string {
  const isFinal = chapterIndex === chapterCount;
  return `
You are a novelist writing a serialised book one chapter at a time.

Hard rules:
- Stay consistent with the known facts: names, appearances, places and the order of events
- Only when is_final_chapter=true may you resolve the main conflict and write an ending
- When is_final_chapter=false: no ending, epilogue or farewell; close on a hook into the next chapter
- Advance the conflict in every chapter

is_final_chapter: ${isFinal ? 'true - write the ending' : 'false - do not conclude the story'}
`.trim();
}

function composeChapter(
  chapterIndex: number,
  knowledge: StoryKnowledge,
  results: readonly StageResult[],
  options: ComposeOptions
): ComposedPrompt {
  const outlineResult = findResult(results, 'outline');
  if (!outlineResult) {
    throw new ConfigurationError('Chapter stages need a completed outline');
  }

  const { chapterCount } = options;
  const outline: StoryOutline | null = parseOutline(outlineResult.text);
  const entry = outline ? getOutlineChapter(outline, chapterIndex) : null;
  const system = chapterSystem(chapterIndex, chapterCount);

  const header = `
[Chapter info]
- chapter_index: ${chapterIndex}
- total_chapters: ${chapterCount}
- is_final_chapter: ${chapterIndex === chapterCount}
`.trim();

  const task = `
[Task]
Write chapter ${chapterIndex} in full prose, starting with its title on the first line.

${FACTS_INSTRUCTIONS}
`.trim();

  const renderPrompt = (items: readonly ContextItem[]): string => {
    const parts = [header];
    for (const [section, heading] of SECTION_HEADINGS) {
      const lines = sectionLines(items, section);
      if (lines.length > 0) parts.push(`${heading}\n${lines.join('\n')}`);
    }
    parts.push(task);
    return parts.join('\n\n');
  };

  const ranked = rankEntitiesForChapter(knowledge, chapterIndex, chapterScope(entry));
  const entityItem = (entity: Entity, rank: number): ContextItem => ({
    section: 'entities',
    text: formatEntityForPrompt(entity),
    rank,
  });

  const mandatory = ranked.mandatory.map((entity, i) => entityItem(entity, i));
  const optional: ContextItem[] = [];

  if (entry) {
    optional.push({ section: 'brief', text: formatChapterBrief(entry), rank: 0 });
  }

  optional.push(
    ...ranked.inScope.map((entity, i) => entityItem(entity, 1000 + i))
  );

  // Most recent summaries first; rendered in chapter order
  const priorChapters = results
    .filter((result) => result.stage.kind === 'chapter' && result.summary)
    .map((result) => ({ index: result.stage.kind === 'chapter' ? result.stage.index : 0, summary: result.summary }))
    .filter((chapter) => chapter.index < chapterIndex)
    .sort((a, b) => b.index - a.index);
  optional.push(
    ...priorChapters.map((chapter) => ({
      section: 'summaries',
      text: `Chapter ${chapter.index}: ${chapter.summary}`,
      rank: chapter.index,
    }))
  );

  const openThreads = knowledge.threads.filter((thread) => thread.status === 'open');
  optional.push(
    ...openThreads.map((thread, i) => ({ section: 'threads', text: formatThreadForPrompt(thread), rank: i }))
  );

  optional.push(...ranked.others.map((entity, i) => entityItem(entity, 2000 + i)));

  if (outline) {
    const remaining = outlineChapters(outline)
      .filter((chapter) => chapter.index !== chapterIndex)
      .sort((a, b) => Math.abs(a.index - chapterIndex) - Math.abs(b.index - chapterIndex) || a.index - b.index);
    optional.push(
      ...remaining.map((chapter) => ({ section: 'outline', text: formatOutlineChapter(chapter), rank: chapter.index }))
    );
  } else {
    optional.push({ section: 'outline', text: stripFactsBlock(outlineResult.text), rank: 0 });
  }

  const packed = packContext({
    budgetTokens: options.promptBudgetTokens,
    mandatory,
    optional,
    render: (items) => fullText(system, renderPrompt(items)),
  });

  return measured(system, renderPrompt(packed.items), options.promptBudgetTokens, packed.dropped.length);
}

/**
 * System and user prompt for a stage. Throws ConfigurationError when the stage
 * cannot be composed (missing prerequisite, budget too small).
 */
export function compose(
  stage: StageKind,
  knowledge: StoryKnowledge,
  priorResults: readonly StageResult[],
  options: ComposeOptions
): ComposedPrompt {
  switch (stage.kind) {
    case 'concept':
      return composeConcept(options);
    case 'outline':
      return composeOutline(priorResults, options);
    case 'chapter':
      return composeChapter(stage.index, knowledge, priorResults, options);
  }
}
