/**
 * Pipeline orchestrator
 *
 * Drives a project through concept -> outline -> chapters. Each stage runs
 * compose -> generate (with retry) -> extract -> validate -> commit, and the
 * project is saved exactly once per committed transition. Credentials arrive
 * with every call and are never stored.
 */

import { nanoid } from 'nanoid';
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from '../config.js';
import { blockingContradictions, validate, validationOutcome } from '../context/consistencyChecker.js';
import { DEFAULT_EQUIVALENCE_RULES, type EquivalenceRule } from '../context/equivalence.js';
import {
  commit,
  defaultFactExtractor,
  extract,
  rebuildKnowledge,
  type FactExtractor,
} from '../context/knowledgeStore.js';
import { estimateTokens } from '../contextOptimizer.js';
import {
  ConfigurationError,
  ContradictionBlockedError,
  GenerationCancelledError,
  PipelineBusyError,
  StoryPipelineError,
  TransientError,
  errorMessage,
} from '../errors.js';
import { eventBus as defaultEventBus, type PipelineEventBus } from '../eventBus.js';
import type { ProjectStore } from '../memory.js';
import { describeOutline, parseOutline } from '../outline.js';
import { compose, type ComposedPrompt } from '../promptComposer.js';
import type { ProviderRegistry } from '../services/aiClient.js';
import type { GenerationSession } from '../services/credentials.js';
import {
  clearProjectMetrics,
  createTimer,
  error as logError,
  getProjectStats,
  info,
  logGenerationMetrics,
  measureSync,
  measureTime,
  warn,
  type GenerationMetrics,
  type GenerationPhase,
  type ProjectStats,
} from '../services/logger.js';
import { getDefaultModel, normalizeProviderId } from '../services/providerCatalog.js';
import { createEmptyKnowledge, type FactUpdates } from '../types/knowledge.js';
import {
  CONCEPT_STAGE,
  PROJECT_SCHEMA_VERSION,
  describeStage,
  stageKey,
  type Premise,
  type Project,
  type StageKind,
  type StageResult,
} from '../types/project.js';
import { fallbackSummary } from '../utils/chapterText.js';
import { withRetry, type Sleep } from './retry.js';
import { failedState, pendingStage, regenerationCut, stateAfter, stateFor } from './stateMachine.js';

/**
 * Provider selection and generation settings for a new project
 */
export type ProviderConfig = {
  provider: string;
  /** Defaults to the provider's first catalog model */
  model?: string;
  chapterCount?: number;
  temperature?: number;
  maxOutputTokens?: number;
};

export type OrchestratorDeps = {
  store: ProjectStore;
  registry: ProviderRegistry;
  config?: Partial<PipelineConfig>;
  extractor?: FactExtractor;
  events?: PipelineEventBus;
  rules?: readonly EquivalenceRule[];
  sleep?: Sleep;
  now?: () => Date;
};

type StageOutcome = {
  project: Project;
  /** Set when the stage failed; `project` is then in the failed state */
  failure?: StoryPipelineError;
  result?: StageResult;
  metrics: GenerationMetrics;
};

function summarizeStage(stage: StageKind, text: string, facts: FactUpdates): string {
  if (facts.summary) return facts.summary;
  if (stage.kind === 'outline') {
    const outline = parseOutline(text);
    if (outline) return describeOutline(outline);
  }
  return fallbackSummary(text);
}

export class PipelineOrchestrator {
  private readonly store: ProjectStore;
  private readonly registry: ProviderRegistry;
  private readonly config: PipelineConfig;
  private readonly extractor: FactExtractor;
  private readonly events: PipelineEventBus;
  private readonly rules: readonly EquivalenceRule[];
  private readonly sleep?: Sleep;
  private readonly now: () => Date;
  private readonly inFlight = new Set<string>();

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store;
    this.registry = deps.registry;
    this.config = { ...DEFAULT_PIPELINE_CONFIG, ...deps.config };
    this.extractor = deps.extractor ?? defaultFactExtractor;
    this.events = deps.events ?? defaultEventBus;
    this.rules = deps.rules ?? DEFAULT_EQUIVALENCE_RULES;
    this.sleep = deps.sleep;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Generate the concept of a new project. The project is persisted only once
   * the concept succeeds; otherwise the error is raised and nothing is stored.
   */
  async startProject(premise: Premise, providerConfig: ProviderConfig, session: GenerationSession): Promise<Project> {
    if (!premise.title.trim() || !premise.coreIdea.trim()) {
      throw new ConfigurationError('A premise needs a title and a core idea');
    }

    const provider = normalizeProviderId(providerConfig.provider);
    this.registry.resolve(provider);
    const model = providerConfig.model?.trim() || getDefaultModel(provider);
    if (!model) {
      throw new ConfigurationError(`No model given and provider ${provider} has no default model`);
    }

    const createdAt = this.now().toISOString();
    const draft: Project = {
      version: PROJECT_SCHEMA_VERSION,
      id: `story_${nanoid()}`,
      title: premise.title.trim(),
      createdAt,
      updatedAt: createdAt,
      premise,
      settings: {
        provider,
        model,
        chapterCount: providerConfig.chapterCount ?? this.config.chapterCount,
        temperature: providerConfig.temperature ?? this.config.temperature,
        maxOutputTokens: providerConfig.maxOutputTokens ?? this.config.maxOutputTokens,
      },
      state: { status: 'concept_pending' },
      results: [],
      knowledge: createEmptyKnowledge(),
    };

    if (!Number.isInteger(draft.settings.chapterCount) || draft.settings.chapterCount < 1) {
      throw new ConfigurationError('chapterCount must be a positive integer');
    }

    return this.exclusive(draft.id, async () => {
      const outcome = await this.runStage(draft, CONCEPT_STAGE, session);
      if (outcome.failure) {
        this.report(outcome);
        throw outcome.failure;
      }
      await this.persist(outcome);
      return outcome.project;
    });
  }

  /**
   * Generate the pending stage. A complete project is returned unchanged
   * (no provider call, no save); a failed one re-enters its failed stage.
   */
  async advanceStage(projectId: string, session: GenerationSession): Promise<Project> {
    return this.exclusive(projectId, async () => {
      const project = await this.store.load(projectId);
      const stage = pendingStage(project.state);
      if (!stage) {
        return project;
      }
      const outcome = await this.runStage(project, stage, session);
      await this.persist(outcome);
      return outcome.project;
    });
  }

  /**
   * Drop `stage` and every later result, rebuild knowledge from what remains,
   * then generate `stage` again.
   */
  async regenerateStage(projectId: string, stage: StageKind, session: GenerationSession): Promise<Project> {
    return this.exclusive(projectId, async () => {
      const project = await this.store.load(projectId);
      const cut = regenerationCut(project, stage);
      const kept = project.results.slice(0, cut);
      const truncated: Project = {
        ...project,
        results: kept,
        knowledge: rebuildKnowledge(kept, this.rules),
        state: stateFor(stage),
      };

      info(`Regenerating ${describeStage(stage)}`, {
        projectId,
        dropped: project.results.length - kept.length,
      });

      const outcome = await this.runStage(truncated, stage, session);
      await this.persist(outcome);
      return outcome.project;
    });
  }

  getProject(projectId: string): Promise<Project> {
    return this.store.load(projectId);
  }

  /**
   * Generation figures recorded by this process, or null before the first stage
   */
  getStats(projectId: string): ProjectStats | null {
    return getProjectStats(projectId);
  }

  isBusy(projectId: string): boolean {
    return this.inFlight.has(projectId);
  }

  /**
   * Forget in-memory state held for a project (busy marker, metrics)
   */
  releaseProject(projectId: string): void {
    this.inFlight.delete(projectId);
    clearProjectMetrics(projectId);
  }

  private async exclusive<T>(projectId: string, fn: () => Promise<T>): Promise<T> {
    if (this.inFlight.has(projectId)) {
      throw new PipelineBusyError(projectId);
    }
    this.inFlight.add(projectId);
    try {
      return await fn();
    } finally {
      this.inFlight.delete(projectId);
    }
  }

  private async persist(outcome: StageOutcome): Promise<void> {
    await measureTime('state_save', () => this.store.save(outcome.project), outcome.metrics.phaseTimes);
    this.report(outcome);
  }

  private report(outcome: StageOutcome): void {
    const { project, failure, result, metrics } = outcome;
    logGenerationMetrics(metrics);

    if (failure) {
      this.events.publish({
        type: 'stage_failed',
        projectId: project.id,
        stage: metrics.stage,
        errorKind: failure.kind,
        message: failure.message,
        attempts: metrics.attempts,
      });
      logError(`${metrics.stage} failed`, { projectId: project.id, kind: failure.kind, attempts: metrics.attempts });
      return;
    }

    if (result) {
      this.events.publish({
        type: 'stage_committed',
        projectId: project.id,
        stage: metrics.stage,
        stageResultId: result.id,
        attempts: result.attempts,
        contradictions: result.contradictions.length,
      });
      info(`${metrics.stage} committed`, {
        projectId: project.id,
        attempts: result.attempts,
        contradictions: result.contradictions.length,
        state: project.state.status,
      });
    }
  }

  private async runStage(project: Project, stage: StageKind, session: GenerationSession): Promise<StageOutcome> {
    const key = stageKey(stage);
    const { settings } = project;
    const timer = createTimer();
    const phaseTimes: Partial<Record<GenerationPhase, number>> = {};
    const metrics = (fields: Partial<GenerationMetrics>): GenerationMetrics => ({
      projectId: project.id,
      stage: key,
      promptTokens: 0,
      outputTokens: 0,
      generationTime: timer.elapsed(),
      phaseTimes,
      attempts: 0,
      contradictions: 0,
      model: settings.model,
      provider: settings.provider,
      timestamp: this.now(),
      ...fields,
    });
    const fail = (failure: StoryPipelineError, fields: Partial<GenerationMetrics>): StageOutcome => {
      const attempts = fields.attempts ?? 0;
      const message = session.credential.scrub(failure.message);
      return {
        project: {
          ...project,
          updatedAt: this.now().toISOString(),
          state: failedState({
            stage,
            kind: failure.kind,
            message,
            attempts,
            at: this.now().toISOString(),
            contradictions: failure instanceof ContradictionBlockedError ? failure.contradictions : undefined,
          }),
        },
        failure,
        metrics: metrics({ ...fields, error: failure.kind }),
      };
    };

    if (session.signal?.aborted) {
      throw new GenerationCancelledError();
    }

    this.events.publish({ type: 'stage_started', projectId: project.id, stage: key });
    info(`Generating ${describeStage(stage)}`, { projectId: project.id, provider: settings.provider, model: settings.model });

    let composed: ComposedPrompt;
    try {
      composed = measureSync(
        'prompt_compose',
        () =>
          compose(stage, project.knowledge, project.results, {
            premise: project.premise,
            chapterCount: settings.chapterCount,
            promptBudgetTokens: this.config.promptBudgetTokens,
          }),
        phaseTimes
      );
    } catch (err) {
      if (err instanceof StoryPipelineError) return fail(err, {});
      throw err;
    }

    const generated = await measureTime(
      'model_call',
      () =>
        withRetry(
          () =>
            this.registry.generate({
              provider: settings.provider,
              model: settings.model,
              credential: session.credential,
              system: composed.system,
              prompt: composed.prompt,
              options: { temperature: settings.temperature, maxOutputTokens: settings.maxOutputTokens },
              signal: session.signal,
            }),
          {
            policy: this.config,
            sleep: this.sleep,
            signal: session.signal,
            onRetry: ({ attempt, delayMs, error }) => {
              const errorKind = error instanceof StoryPipelineError ? error.kind : 'TransientError';
              this.events.publish({ type: 'retry_scheduled', projectId: project.id, stage: key, attempt, delayMs, errorKind });
              warn(`${key} attempt ${attempt} failed, retrying in ${delayMs}ms`, { projectId: project.id, kind: errorKind });
            },
          }
        ),
      phaseTimes
    );

    if (!generated.ok) {
      if (generated.error instanceof GenerationCancelledError) {
        warn(`${key} cancelled`, { projectId: project.id, attempts: generated.attempts });
        throw generated.error;
      }
      // An adapter that throws outside the error taxonomy still leaves the stage failed and resumable
      const failure =
        generated.error instanceof StoryPipelineError
          ? generated.error
          : new TransientError(`${settings.provider} adapter failed: ${errorMessage(generated.error)}`, {
              cause: generated.error,
            });
      return fail(failure, { promptTokens: composed.estimatedTokens, attempts: generated.attempts });
    }

    if (session.signal?.aborted) {
      throw new GenerationCancelledError();
    }

    const text = generated.value;
    const resultId = `res_${nanoid(12)}`;
    const facts = measureSync('extraction', () => extract(text, stage, this.extractor), phaseTimes);
    const contradictions = measureSync(
      'validation',
      () => validate({ id: resultId, facts }, project.knowledge, { rules: this.rules }),
      phaseTimes
    );
    const counts = {
      promptTokens: composed.estimatedTokens,
      outputTokens: estimateTokens(text),
      attempts: generated.attempts,
      contradictions: contradictions.length,
    };

    const blocking = blockingContradictions(contradictions, this.config.blockingSeverity);
    if (blocking.length > 0) {
      return fail(new ContradictionBlockedError(blocking), counts);
    }

    const createdAt = this.now().toISOString();
    const result: StageResult = {
      id: resultId,
      stage,
      text,
      summary: summarizeStage(stage, text, facts),
      facts,
      validation: validationOutcome(contradictions),
      contradictions,
      provider: settings.provider,
      model: settings.model,
      attempts: generated.attempts,
      createdAt,
    };

    return {
      project: {
        ...project,
        updatedAt: createdAt,
        state: stateAfter(stage, settings.chapterCount),
        results: [...project.results, result],
        knowledge: commit(project.knowledge, facts, { stageResultId: resultId, stage, rules: this.rules }),
      },
      result,
      metrics: metrics(counts),
    };
  }
}
