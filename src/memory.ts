import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { ProjectNotFoundError, StoreIOError, errorMessage, isMissingFile, type ErrorKind } from './errors.js';
import { warn } from './services/logger.js';
import type { Project, PipelineState } from './types/project.js';

/**
 * Persistence contract for projects. A project is always written as a whole
 * unit; one writer per project id is assumed.
 */
export interface ProjectStore {
  /** @throws ProjectNotFoundError, StoreIOError */
  load(id: string): Promise<Project>;
  /** @throws StoreIOError */
  save(project: Project): Promise<void>;
  list(): Promise<ProjectSummary[]>;
  /** @throws ProjectNotFoundError */
  delete(id: string): Promise<void>;
}

/**
 * Listing entry
 */
export type ProjectSummary = {
  id: string;
  title: string;
  createdAt: string;
  updatedAt: string;
  status: PipelineState['status'];
  /** Committed StageResults */
  stages: number;
  provider: string;
};

const ERROR_KINDS = [
  'ConfigurationError',
  'AuthError',
  'RateLimitError',
  'TransientError',
  'ContentPolicyError',
  'ExtractionError',
  'GenerationCancelled',
  'ProjectNotFound',
  'StoreIOError',
  'PipelineBusy',
  'InvalidTransition',
  'ContradictionBlocked',
] as const satisfies readonly ErrorKind[];

const StageKindSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('concept') }),
  z.object({ kind: z.literal('outline') }),
  z.object({ kind: z.literal('chapter'), index: z.number().int().min(1) }),
]);

const AssertedFactSchema = z.object({ value: z.string(), stageResultId: z.string() });

const ContradictionSchema = z.object({
  id: z.string(),
  stageResultId: z.string(),
  kind: z.enum(['attribute', 'timeline']),
  severity: z.enum(['warning', 'critical']),
  entity: z.string().optional(),
  attribute: z.string().optional(),
  events: z.tuple([z.string(), z.string()]).optional(),
  previous: AssertedFactSchema,
  proposed: AssertedFactSchema,
  description: z.string(),
});

const EntityCategorySchema = z.enum(['character', 'location', 'object']);

const FactUpdatesSchema = z.object({
  entities: z.array(
    z.object({ name: z.string(), category: EntityCategorySchema, attributes: z.record(z.string()) })
  ),
  events: z.array(
    z.object({ id: z.string(), label: z.string(), before: z.array(z.string()), after: z.array(z.string()) })
  ),
  threadsOpened: z.array(z.object({ id: z.string(), title: z.string() })),
  threadsResolved: z.array(z.string()),
  summary: z.string().optional(),
});

const StageResultSchema = z.object({
  id: z.string(),
  stage: StageKindSchema,
  text: z.string(),
  summary: z.string(),
  facts: FactUpdatesSchema,
  validation: z.enum(['pass', 'flagged']),
  contradictions: z.array(ContradictionSchema),
  provider: z.string(),
  model: z.string(),
  attempts: z.number().int().min(0),
  createdAt: z.string(),
});

const FailureRecordSchema = z.object({
  kind: z.enum(ERROR_KINDS),
  message: z.string(),
  stage: StageKindSchema,
  attempts: z.number().int().min(0),
  at: z.string(),
  contradictions: z.array(ContradictionSchema).optional(),
});

const PipelineStateSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('idle') }),
  z.object({ status: z.literal('concept_pending') }),
  z.object({ status: z.literal('outline_pending') }),
  z.object({ status: z.literal('chapter_pending'), chapter: z.number().int().min(1) }),
  z.object({ status: z.literal('complete') }),
  z.object({ status: z.literal('failed'), failure: FailureRecordSchema }),
]);

const AttributeAssertionSchema = z.object({ value: z.string(), assertedBy: z.string(), stage: z.string() });

const KnowledgeSchema = z.object({
  version: z.string(),
  entities: z.record(
    z.object({
      name: z.string(),
      category: EntityCategorySchema,
      aliases: z.array(z.string()),
      attributes: z.record(AttributeAssertionSchema.extend({ disputed: z.array(AttributeAssertionSchema) })),
      firstSeenBy: z.string(),
      touchedChapters: z.array(z.number().int()),
    })
  ),
  timeline: z.array(
    z.object({ id: z.string(), label: z.string(), order: z.number(), assertedBy: z.string(), chapter: z.number().int() })
  ),
  precedence: z.array(z.object({ before: z.string(), after: z.string(), assertedBy: z.string() })),
  disputedRelations: z.array(z.object({ before: z.string(), after: z.string(), assertedBy: z.string() })),
  threads: z.array(
    z.object({
      id: z.string(),
      title: z.string(),
      status: z.enum(['open', 'resolved']),
      openedBy: z.string(),
      openedInChapter: z.number().int(),
      resolvedBy: z.string().optional(),
      resolvedInChapter: z.number().int().optional(),
    })
  ),
});

export const ProjectSchema = z.object({
  version: z.number().int(),
  id: z.string(),
  title: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  premise: z.object({
    title: z.string(),
    coreIdea: z.string(),
    genre: z.string().optional(),
    theme: z.string().optional(),
    style: z.string().optional(),
  }),
  settings: z.object({
    provider: z.string(),
    model: z.string(),
    chapterCount: z.number().int().min(1),
    temperature: z.number(),
    maxOutputTokens: z.number().int(),
  }),
  state: PipelineStateSchema,
  results: z.array(StageResultSchema),
  knowledge: KnowledgeSchema,
});

const PROJECT_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export function isValidProjectId(id: string): boolean {
  return PROJECT_ID_PATTERN.test(id);
}

export function summarizeProject(project: Project): ProjectSummary {
  return {
    id: project.id,
    title: project.title,
    createdAt: project.createdAt,
    updatedAt: project.updatedAt,
    status: project.state.status,
    stages: project.results.length,
    provider: project.settings.provider,
  };
}

function newestFirst(a: ProjectSummary, b: ProjectSummary): number {
  return b.createdAt.localeCompare(a.createdAt);
}

/**
 * Parse and validate a persisted project
 */
export function parseProject(raw: string, source: string): Project {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new StoreIOError(`Corrupt project file ${source}: ${errorMessage(error)}`, { cause: error });
  }
  const parsed = ProjectSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new StoreIOError(`Invalid project file ${source}: ${issue.path.join('.')}: ${issue.message}`);
  }
  return parsed.data;
}

/**
 * One JSON file per project under `dataDir`: `<id>.json`
 */
export class FileProjectStore implements ProjectStore {
  constructor(private readonly dataDir: string) {}

  private projectPath(id: string): string {
    if (!isValidProjectId(id)) {
      throw new ProjectNotFoundError(id);
    }
    return path.join(this.dataDir, `${id}.json`);
  }

  async load(id: string): Promise<Project> {
    const filePath = this.projectPath(id);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) throw new ProjectNotFoundError(id);
      throw new StoreIOError(`Failed to read project ${id}: ${errorMessage(error)}`, { cause: error });
    }
    return parseProject(raw, filePath);
  }

  /**
   * Writes a temp file next to the target, then renames it over the target
   */
  async save(project: Project): Promise<void> {
    const filePath = this.projectPath(project.id);
    const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
    try {
      await fs.mkdir(this.dataDir, { recursive: true });
      await fs.writeFile(tempPath, JSON.stringify(project, null, 2), 'utf-8');
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new StoreIOError(`Failed to save project ${project.id}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async list(): Promise<ProjectSummary[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.dataDir);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw new StoreIOError(`Failed to list projects: ${errorMessage(error)}`, { cause: error });
    }

    const summaries: ProjectSummary[] = [];
    for (const file of files.filter((name) => name.endsWith('.json'))) {
      const id = file.slice(0, -'.json'.length);
      if (!isValidProjectId(id)) continue;
      try {
        summaries.push(summarizeProject(await this.load(id)));
      } catch (error) {
        // Deleted between readdir and load
        if (error instanceof ProjectNotFoundError) continue;
        if (!(error instanceof StoreIOError)) throw error;
        warn('Skipping unreadable project file', { file, reason: error.message });
      }
    }
    return summaries.sort(newestFirst);
  }

  async delete(id: string): Promise<void> {
    const filePath = this.projectPath(id);
    try {
      await fs.unlink(filePath);
    } catch (error) {
      if (isMissingFile(error)) throw new ProjectNotFoundError(id);
      throw new StoreIOError(`Failed to delete project ${id}: ${errorMessage(error)}`, { cause: error });
    }
  }
}

/**
 * Keeps deep copies, so callers never share state with the store
 */
export class InMemoryProjectStore implements ProjectStore {
  private readonly projects = new Map<string, Project>();

  async load(id: string): Promise<Project> {
    const project = this.projects.get(id);
    if (!project) throw new ProjectNotFoundError(id);
    return structuredClone(project);
  }

  async save(project: Project): Promise<void> {
    this.projects.set(project.id, structuredClone(project));
  }

  async list(): Promise<ProjectSummary[]> {
    return [...this.projects.values()].map(summarizeProject).sort(newestFirst);
  }

  async delete(id: string): Promise<void> {
    if (!this.projects.delete(id)) throw new ProjectNotFoundError(id);
  }
}
