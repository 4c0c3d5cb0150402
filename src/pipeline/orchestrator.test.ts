import { describe, expect, it, vi } from 'vitest';
import type { PipelineConfig } from '../config.js';
import {
  AuthError,
  ConfigurationError,
  GenerationCancelledError,
  InvalidTransitionError,
  PipelineBusyError,
  TransientError,
} from '../errors.js';
import { PipelineEventBus, type PipelineEvent } from '../eventBus.js';
import { InMemoryProjectStore } from '../memory.js';
import { FakeAdapter, fakeRegistry, outlineReply, withFacts } from '../testing/fakeAdapter.js';
import { TEST_SECRET, premise, testSession } from '../testing/fixtures.js';
import { chapterStage, stageKey, type Project } from '../types/project.js';
import { PipelineOrchestrator } from './orchestrator.js';

const providerConfig = { provider: 'fake', model: 'fake-model' };

const conceptText = withFacts('Concept of the book.', {
  summary: 'An archivist and a ledger.',
  entities: [{ name: 'Alice Moreau', category: 'character', attributes: { eyeColor: 'blue' } }],
});

function chapterText(n: number, facts: Record<string, unknown> = {}, prose = `Chapter ${n} prose.`): string {
  return withFacts(prose, { summary: `Chapter ${n} summary.`, ...facts });
}

const greenEyes = { entities: [{ name: 'Alice', category: 'character', attributes: { eyeColor: 'green' } }] };

function setup(config: Partial<PipelineConfig> = {}) {
  const adapter = new FakeAdapter('fake');
  const store = new InMemoryProjectStore();
  const events = new PipelineEventBus();
  const seen: PipelineEvent[] = [];
  events.subscribe((event) => seen.push(event));
  const orchestrator = new PipelineOrchestrator({
    store,
    registry: fakeRegistry(adapter),
    config: { chapterCount: 3, backoffBaseMs: 0, ...config },
    events,
    sleep: async () => {},
  });
  return { adapter, store, orchestrator, seen };
}

type Ctx = ReturnType<typeof setup>;

async function started(ctx: Ctx): Promise<Project> {
  ctx.adapter.push(conceptText);
  return ctx.orchestrator.startProject(premise, providerConfig, testSession());
}

async function completeBook(ctx: Ctx, chapter3Facts: Record<string, unknown> = {}): Promise<Project> {
  let project = await started(ctx);
  ctx.adapter.push(outlineReply(3), chapterText(1), chapterText(2), chapterText(3, chapter3Facts));
  for (let i = 0; i < 4; i++) {
    project = await ctx.orchestrator.advanceStage(project.id, testSession());
  }
  return project;
}

describe('PipelineOrchestrator: happy path', () => {
  it('persists the project once the concept succeeds', async () => {
    const ctx = setup();
    const project = await started(ctx);

    expect(project.state).toEqual({ status: 'outline_pending' });
    expect(project.settings).toEqual({
      provider: 'fake',
      model: 'fake-model',
      chapterCount: 3,
      temperature: 0.8,
      maxOutputTokens: 8192,
    });
    expect(project.results[0].summary).toBe('An archivist and a ledger.');
    await expect(ctx.store.load(project.id)).resolves.toEqual(project);
    expect(ctx.seen.map((event) => event.type)).toEqual(['stage_started', 'stage_committed']);
  });

  it('runs concept, outline and every chapter to complete', async () => {
    const ctx = setup();
    const project = await completeBook(ctx);

    expect(project.state).toEqual({ status: 'complete' });
    expect(project.results.map((result) => stageKey(result.stage))).toEqual([
      'concept',
      'outline',
      'chapter:1',
      'chapter:2',
      'chapter:3',
    ]);
    expect(project.results[1].summary).toBe('Outline of 3 chapters in 3 acts: Act 1 / Act 2 / Act 3.');
    expect(project.results[4].summary).toBe('Chapter 3 summary.');
    expect(ctx.adapter.calls).toBe(5);
    await expect(ctx.store.load(project.id)).resolves.toEqual(project);
  });

  it('tells the model which chapter is the last', async () => {
    const ctx = setup();
    await completeBook(ctx);
    const systems = ctx.adapter.requests.map((request) => request.system ?? '');
    expect(systems[3]).toContain('is_final_chapter: false');
    expect(systems[4]).toContain('is_final_chapter: true');
  });

  it('leaves a complete project untouched', async () => {
    const ctx = setup();
    const project = await completeBook(ctx);
    const save = vi.spyOn(ctx.store, 'save');

    const again = await ctx.orchestrator.advanceStage(project.id, testSession());

    expect(again).toEqual(project);
    expect(ctx.adapter.calls).toBe(5);
    expect(save).not.toHaveBeenCalled();
  });
});

describe('PipelineOrchestrator: contradictions', () => {
  it('flags a changed attribute and keeps the first value', async () => {
    const ctx = setup();
    let project = await started(ctx);
    ctx.adapter.push(outlineReply(3), chapterText(1, greenEyes));
    project = await ctx.orchestrator.advanceStage(project.id, testSession());
    project = await ctx.orchestrator.advanceStage(project.id, testSession());

    const chapter = project.results[2];
    expect(project.state).toEqual({ status: 'chapter_pending', chapter: 2 });
    expect(chapter.validation).toBe('flagged');
    expect(chapter.contradictions).toHaveLength(1);
    expect(chapter.contradictions[0]).toMatchObject({
      attribute: 'eyeColor',
      previous: { value: 'blue', stageResultId: project.results[0].id },
      proposed: { value: 'green', stageResultId: chapter.id },
    });
    const alice = project.knowledge.entities['character:alice moreau'];
    expect(alice.attributes.eyeColor.value).toBe('blue');
    expect(alice.attributes.eyeColor.disputed.map((d) => d.value)).toEqual(['green']);
  });

  it('fails the stage without appending when contradictions block', async () => {
    const ctx = setup({ blockingSeverity: 'warning' });
    let project = await started(ctx);
    ctx.adapter.push(outlineReply(3), chapterText(1, greenEyes));
    project = await ctx.orchestrator.advanceStage(project.id, testSession());
    const save = vi.spyOn(ctx.store, 'save');
    project = await ctx.orchestrator.advanceStage(project.id, testSession());

    expect(save).toHaveBeenCalledTimes(1);
    expect(project.results).toHaveLength(2);
    expect(project.state.status).toBe('failed');
    if (project.state.status === 'failed') {
      expect(project.state.failure.kind).toBe('ContradictionBlocked');
      expect(project.state.failure.stage).toEqual(chapterStage(1));
      expect(project.state.failure.contradictions).toHaveLength(1);
    }
    expect(project.knowledge.entities['character:alice moreau'].attributes.eyeColor.disputed).toEqual([]);

    ctx.adapter.push(chapterText(1));
    project = await ctx.orchestrator.advanceStage(project.id, testSession());
    expect(project.state).toEqual({ status: 'chapter_pending', chapter: 2 });
  });
});

describe('PipelineOrchestrator: failures and retries', () => {
  it('stops after maxAttempts transient failures and records the failure', async () => {
    const ctx = setup();
    const project = await started(ctx);
    ctx.adapter.push(
      new TransientError(`upstream rejected ${TEST_SECRET}`),
      new TransientError('timeout'),
      new TransientError('timeout')
    );

    const failed = await ctx.orchestrator.advanceStage(project.id, testSession());

    expect(ctx.adapter.calls).toBe(4);
    expect(failed.state).toMatchObject({
      status: 'failed',
      failure: { kind: 'TransientError', attempts: 3, stage: { kind: 'outline' } },
    });
    expect(ctx.seen.filter((event) => event.type === 'retry_scheduled')).toHaveLength(2);
    expect(ctx.seen[ctx.seen.length - 1]).toMatchObject({ type: 'stage_failed', errorKind: 'TransientError' });
    await expect(ctx.store.load(project.id)).resolves.toEqual(failed);
  });

  it('never stores the credential, even when an error echoes it', async () => {
    const ctx = setup({ maxAttempts: 1 });
    const project = await started(ctx);
    ctx.adapter.push(new TransientError(`upstream rejected ${TEST_SECRET}`));

    const failed = await ctx.orchestrator.advanceStage(project.id, testSession());

    expect(failed.state.status === 'failed' && failed.state.failure.message).toBe('upstream rejected [credential]');
    expect(JSON.stringify(await ctx.store.load(project.id))).not.toContain(TEST_SECRET);
    expect(ctx.adapter.requests[0].credential.reveal()).toBe(TEST_SECRET);
  });

  it('does not retry auth failures and re-enters the failed stage', async () => {
    const ctx = setup();
    const project = await started(ctx);
    ctx.adapter.push(new AuthError('bad key'));

    const failed = await ctx.orchestrator.advanceStage(project.id, testSession());
    expect(ctx.adapter.calls).toBe(2);
    expect(failed.state).toMatchObject({ status: 'failed', failure: { kind: 'AuthError', attempts: 1 } });

    ctx.adapter.push(outlineReply(3));
    const recovered = await ctx.orchestrator.advanceStage(project.id, testSession());
    expect(recovered.state).toEqual({ status: 'chapter_pending', chapter: 1 });
  });

  it('records a failed stage when the adapter throws an unclassified error', async () => {
    const ctx = setup();
    const project = await started(ctx);
    ctx.adapter.push(new Error(`adapter crashed with ${TEST_SECRET}`));

    const failed = await ctx.orchestrator.advanceStage(project.id, testSession());

    expect(ctx.adapter.calls).toBe(2);
    expect(failed.state).toMatchObject({
      status: 'failed',
      failure: {
        kind: 'TransientError',
        attempts: 1,
        message: 'fake adapter failed: adapter crashed with [credential]',
        stage: { kind: 'outline' },
      },
    });
    await expect(ctx.store.load(project.id)).resolves.toEqual(failed);
    expect(ctx.orchestrator.getStats(project.id)).toMatchObject({
      totalStages: 2,
      successfulStages: 1,
      failedStages: 1,
    });
  });

  it('persists nothing when the concept fails', async () => {
    const ctx = setup();
    ctx.adapter.push(new TransientError('a'), new TransientError('b'), new TransientError('c'));

    await expect(ctx.orchestrator.startProject(premise, providerConfig, testSession())).rejects.toBeInstanceOf(
      TransientError
    );
    expect(ctx.adapter.calls).toBe(3);
    await expect(ctx.store.list()).resolves.toEqual([]);
  });

  it('rejects unknown providers and unusable budgets before any call', async () => {
    const ctx = setup({ promptBudgetTokens: 300 });
    await expect(
      ctx.orchestrator.startProject(premise, { provider: 'nope', model: 'm' }, testSession())
    ).rejects.toBeInstanceOf(ConfigurationError);
    await expect(ctx.orchestrator.startProject(premise, providerConfig, testSession())).rejects.toBeInstanceOf(
      ConfigurationError
    );
    expect(ctx.adapter.calls).toBe(0);
  });
});

describe('PipelineOrchestrator: cancellation and concurrency', () => {
  it('makes no call and no save when already cancelled', async () => {
    const ctx = setup();
    const project = await started(ctx);
    const save = vi.spyOn(ctx.store, 'save');
    const controller = new AbortController();
    controller.abort();

    await expect(
      ctx.orchestrator.advanceStage(project.id, testSession(controller.signal))
    ).rejects.toBeInstanceOf(GenerationCancelledError);
    expect(ctx.adapter.calls).toBe(1);
    expect(save).not.toHaveBeenCalled();
  });

  it('discards a reply that arrives after cancellation', async () => {
    const ctx = setup();
    const project = await started(ctx);
    const controller = new AbortController();
    ctx.adapter.push(() => {
      controller.abort();
      return outlineReply(3);
    });

    await expect(
      ctx.orchestrator.advanceStage(project.id, testSession(controller.signal))
    ).rejects.toBeInstanceOf(GenerationCancelledError);
    await expect(ctx.store.load(project.id)).resolves.toEqual(project);
  });

  it('rejects a second operation on a project in flight', async () => {
    const ctx = setup();
    const project = await started(ctx);
    let release: (text: string) => void = () => {};
    ctx.adapter.push(
      () =>
        new Promise<string>((resolve) => {
          release = resolve;
        })
    );

    const first = ctx.orchestrator.advanceStage(project.id, testSession());
    await expect(ctx.orchestrator.advanceStage(project.id, testSession())).rejects.toBeInstanceOf(
      PipelineBusyError
    );
    expect(ctx.orchestrator.isBusy(project.id)).toBe(true);

    await vi.waitFor(() => expect(ctx.adapter.calls).toBe(2));
    release(outlineReply(3));
    await expect(first).resolves.toMatchObject({ state: { status: 'chapter_pending', chapter: 1 } });
    expect(ctx.orchestrator.isBusy(project.id)).toBe(false);
  });
});

describe('PipelineOrchestrator: regeneration', () => {
  const bob = { entities: [{ name: 'Bob', category: 'character', attributes: {} }] };

  it('drops the stage and everything after it, then regenerates', async () => {
    const ctx = setup();
    const book = await completeBook(ctx, bob);
    expect(book.knowledge.entities['character:bob']).toBeDefined();
    ctx.adapter.push(chapterText(2, {}, 'Chapter 2 rewritten.'));

    const project = await ctx.orchestrator.regenerateStage(book.id, chapterStage(2), testSession());

    expect(project.results.map((result) => result.id)).toEqual([
      ...book.results.slice(0, 3).map((result) => result.id),
      project.results[3].id,
    ]);
    expect(project.results[3].text).toContain('Chapter 2 rewritten.');
    expect(project.state).toEqual({ status: 'chapter_pending', chapter: 3 });
    expect(project.knowledge.entities['character:bob']).toBeUndefined();
  });

  it('saves the truncated project when regeneration fails', async () => {
    const ctx = setup();
    const book = await completeBook(ctx);
    ctx.adapter.push(new AuthError('bad key'));

    const project = await ctx.orchestrator.regenerateStage(book.id, chapterStage(2), testSession());

    expect(project.results).toHaveLength(3);
    expect(project.state).toMatchObject({ status: 'failed', failure: { kind: 'AuthError', stage: chapterStage(2) } });
    await expect(ctx.store.load(book.id)).resolves.toEqual(project);
  });

  it('refuses stages that were never reached', async () => {
    const ctx = setup();
    const project = await started(ctx);
    await expect(
      ctx.orchestrator.regenerateStage(project.id, chapterStage(1), testSession())
    ).rejects.toBeInstanceOf(InvalidTransitionError);
    expect(ctx.adapter.calls).toBe(1);
  });
});
