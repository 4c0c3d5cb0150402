const FENCED_BLOCK = /```([a-zA-Z]*)[ \t]*\r?\n([\s\S]*?)```/g;

function stripCodeFence(text: string): string {
  return text.replace(/```[a-zA-Z]*\s*|```\s*/g, '').trim();
}

function tryParseJsonCandidate(candidate: string): unknown {
  try {
    return JSON.parse(candidate);
  } catch {
    try {
      // Best-effort fix for trailing commas.
      const fixed = candidate.replace(/,\s*([}\]])/g, '$1');
      return JSON.parse(fixed);
    } catch {
      return null;
    }
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * First JSON object found in a model response, tolerating code fences,
 * surrounding prose and trailing commas
 */
export function extractJsonObject(raw: string): Record<string, unknown> | null {
  const cleaned = stripCodeFence(raw);
  const candidates = [cleaned];

  const firstBrace = cleaned.indexOf('{');
  const lastBrace = cleaned.lastIndexOf('}');
  if (firstBrace >= 0 && lastBrace > firstBrace) {
    candidates.push(cleaned.slice(firstBrace, lastBrace + 1));
  }

  for (const candidate of candidates) {
    const parsed = tryParseJsonCandidate(candidate);
    if (isPlainObject(parsed)) {
      return parsed;
    }
  }

  return null;
}

type FencedBlock = { lang: string; body: string; start: number; end: number };

function fencedBlocks(text: string): FencedBlock[] {
  const blocks: FencedBlock[] = [];
  for (const match of text.matchAll(FENCED_BLOCK)) {
    const start = match.index ?? 0;
    blocks.push({ lang: match[1].toLowerCase(), body: match[2], start, end: start + match[0].length });
  }
  return blocks;
}

/**
 * The trailing ```facts block of a stage response (a ```json block is accepted
 * when it is the last thing in the text)
 */
function findFactsBlock(text: string): FencedBlock | null {
  const blocks = fencedBlocks(text);
  for (let i = blocks.length - 1; i >= 0; i--) {
    if (blocks[i].lang === 'facts') return blocks[i];
  }
  const last = blocks[blocks.length - 1];
  if (last && last.lang === 'json' && text.slice(last.end).trim() === '') {
    return last;
  }
  return null;
}

/**
 * Parsed body of the facts block, or null when there is none or it is not JSON
 */
export function readFactsBlock(text: string): Record<string, unknown> | null {
  const block = findFactsBlock(text);
  if (!block) return null;
  const parsed = tryParseJsonCandidate(block.body.trim());
  return isPlainObject(parsed) ? parsed : null;
}

/**
 * Stage text without its facts block
 */
export function stripFactsBlock(text: string): string {
  const block = findFactsBlock(text);
  if (!block) return text.trim();
  return `${text.slice(0, block.start)}${text.slice(block.end)}`.trim();
}

/**
 * Fallback summary: leading sentences of the prose, capped at maxChars
 */
export function fallbackSummary(text: string, maxChars = 400): string {
  const prose = stripFactsBlock(text).replace(/\s+/g, ' ').trim();
  if (prose.length <= maxChars) return prose;

  const sentences = prose.match(/[^.!?。！？]+[.!?。！？]+/g) ?? [];
  let summary = '';
  for (const sentence of sentences) {
    if ((summary + sentence).length > maxChars) break;
    summary += sentence;
  }
  return (summary || prose.slice(0, maxChars)).trim();
}
