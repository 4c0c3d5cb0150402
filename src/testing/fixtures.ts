import { CredentialHandle, type GenerationSession } from '../services/credentials.js';
import { createEmptyFactUpdates, createEmptyKnowledge, type FactUpdates } from '../types/knowledge.js';
import {
  PROJECT_SCHEMA_VERSION,
  type Premise,
  type Project,
  type StageKind,
  type StageResult,
} from '../types/project.js';

export const TEST_SECRET = 'test-secret';

export function testSession(signal?: AbortSignal): GenerationSession {
  return { credential: CredentialHandle.from(TEST_SECRET), signal };
}

export const premise: Premise = {
  title: 'The Lantern House',
  coreIdea: 'An archivist finds a ledger that rewrites the past',
  genre: 'mystery',
};

export function stageResult(
  id: string,
  stage: StageKind,
  facts: Partial<FactUpdates> = {},
  text = `Text of ${id}`
): StageResult {
  return {
    id,
    stage,
    text,
    summary: `Summary of ${id}`,
    facts: { ...createEmptyFactUpdates(), ...facts },
    validation: 'pass',
    contradictions: [],
    provider: 'fake',
    model: 'fake-model',
    attempts: 1,
    createdAt: '2024-01-01T00:00:00.000Z',
  };
}

export function makeProject(id: string, createdAt = '2024-01-01T00:00:00.000Z'): Project {
  return {
    version: PROJECT_SCHEMA_VERSION,
    id,
    title: `Book ${id}`,
    createdAt,
    updatedAt: createdAt,
    premise,
    settings: { provider: 'fake', model: 'fake-model', chapterCount: 3, temperature: 0.8, maxOutputTokens: 2048 },
    state: { status: 'concept_pending' },
    results: [],
    knowledge: createEmptyKnowledge(),
  };
}
