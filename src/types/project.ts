/**
 * Project and pipeline - type definitions
 */

import type { ErrorKind } from '../errors.js';
import type { FactUpdates, StoryKnowledge } from './knowledge.js';

export type StageKind =
  | { kind: 'concept' }
  | { kind: 'outline' }
  | { kind: 'chapter'; index: number };

export type ValidationOutcome = 'pass' | 'flagged';

export type ContradictionSeverity = 'warning' | 'critical';

/**
 * A fact as asserted by one StageResult
 */
export type AssertedFact = {
  value: string;
  stageResultId: string;
};

/**
 * Conflict between a newly proposed fact and a committed one. The `previous`
 * side is treated as ground truth; nothing is resolved automatically.
 */
export type Contradiction = {
  id: string;
  /** StageResult whose facts raised it */
  stageResultId: string;
  kind: 'attribute' | 'timeline';
  severity: ContradictionSeverity;
  /** Entity name (attribute contradictions) */
  entity?: string;
  attribute?: string;
  /** Event pair whose order is contested (timeline contradictions) */
  events?: [string, string];
  previous: AssertedFact;
  proposed: AssertedFact;
  description: string;
};

/**
 * Immutable record of one completed stage
 */
export type StageResult = {
  id: string;
  stage: StageKind;
  /** Raw generated text */
  text: string;
  /** Short summary used by later chapter prompts */
  summary: string;
  /** Facts extracted from `text`; replayed to rebuild knowledge */
  facts: FactUpdates;
  validation: ValidationOutcome;
  contradictions: Contradiction[];
  provider: string;
  model: string;
  /** Provider calls it took */
  attempts: number;
  createdAt: string;
};

export type FailureRecord = {
  kind: ErrorKind;
  message: string;
  stage: StageKind;
  attempts: number;
  at: string;
  /** Blocking contradictions, for ContradictionBlocked failures */
  contradictions?: Contradiction[];
};

export type PipelineState =
  | { status: 'idle' }
  | { status: 'concept_pending' }
  | { status: 'outline_pending' }
  | { status: 'chapter_pending'; chapter: number }
  | { status: 'complete' }
  | { status: 'failed'; failure: FailureRecord };

/**
 * User-supplied premise (concept stage input)
 */
export type Premise = {
  title: string;
  coreIdea: string;
  genre?: string;
  theme?: string;
  style?: string;
};

export type ProjectSettings = {
  provider: string;
  model: string;
  chapterCount: number;
  temperature: number;
  maxOutputTokens: number;
};

export type Project = {
  /** Schema version of the persisted form */
  version: number;
  id: string;
  title: string;
  createdAt: string;
  updatedAt: string;
  premise: Premise;
  settings: ProjectSettings;
  state: PipelineState;
  /** Append-only, in pipeline order */
  results: StageResult[];
  knowledge: StoryKnowledge;
};

export const PROJECT_SCHEMA_VERSION = 1;

export const CONCEPT_STAGE: StageKind = { kind: 'concept' };
export const OUTLINE_STAGE: StageKind = { kind: 'outline' };

export function chapterStage(index: number): StageKind {
  return { kind: 'chapter', index };
}

/**
 * Stable string form: concept, outline, chapter:n
 */
export function stageKey(stage: StageKind): string {
  return stage.kind === 'chapter' ? `chapter:${stage.index}` : stage.kind;
}

export function parseStageKey(key: string): StageKind | null {
  if (key === 'concept') return CONCEPT_STAGE;
  if (key === 'outline') return OUTLINE_STAGE;
  const match = /^chapter[:\s-]?(\d+)$/i.exec(key.trim());
  if (match) {
    const index = Number(match[1]);
    return index >= 1 ? chapterStage(index) : null;
  }
  return null;
}

export function sameStage(a: StageKind, b: StageKind): boolean {
  return stageKey(a) === stageKey(b);
}

/**
 * Chapter number of a stage, 0 for concept and outline
 */
export function stageChapter(stage: StageKind): number {
  return stage.kind === 'chapter' ? stage.index : 0;
}

export function describeStage(stage: StageKind): string {
  switch (stage.kind) {
    case 'concept':
      return 'Concept';
    case 'outline':
      return 'Outline';
    case 'chapter':
      return `Chapter ${stage.index}`;
  }
}
