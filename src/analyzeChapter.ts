import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { GenerationOptions, ProviderRegistry } from './services/aiClient.js';
import type { GenerationSession } from './services/credentials.js';
import { warn } from './services/logger.js';
import { extractJsonObject, fallbackSummary } from './utils/chapterText.js';

/**
 * Summary and cast of a piece of chapter text
 */
export type ChapterAnalysis = {
  summary: string;
  characters: string[];
};

const AnalysisSchema = z.object({
  summary: z.string().trim().min(1),
  characters: z
    .array(z.union([z.string(), z.object({ name: z.string() })]))
    .transform((items) => items.map((item) => (typeof item === 'string' ? item : item.name).trim()).filter(Boolean))
    .catch([]),
});

const SYSTEM = `
You are a fiction editor. Read the chapter and reply with JSON only:
{ "summary": "three to five sentences", "characters": ["every named character who appears"] }
`.trim();

const ANALYSIS_OPTIONS: GenerationOptions = { temperature: 0.2, maxOutputTokens: 1024 };

/**
 * Parse the model's reply; falls back to the reply's leading sentences when it
 * is not the requested JSON.
 */
export function parseChapterAnalysis(reply: string): ChapterAnalysis {
  const raw = extractJsonObject(reply);
  const parsed = AnalysisSchema.safeParse(raw);
  if (parsed.success) {
    return { summary: parsed.data.summary, characters: [...new Set(parsed.data.characters)] };
  }
  warn('Chapter analysis reply was not valid JSON, using plain text');
  return { summary: fallbackSummary(reply), characters: [] };
}

export async function analyzeChapter(
  registry: ProviderRegistry,
  args: { provider: string; model: string; text: string },
  session: GenerationSession
): Promise<ChapterAnalysis> {
  if (!args.text.trim()) {
    throw new ConfigurationError('Chapter text must not be empty');
  }

  const reply = await registry.generate({
    provider: args.provider,
    model: args.model,
    credential: session.credential,
    system: SYSTEM,
    prompt: `[Chapter]\n${args.text.trim()}`,
    options: ANALYSIS_OPTIONS,
    signal: session.signal,
  });
  return parseChapterAnalysis(reply);
}
