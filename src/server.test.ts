import { once } from 'node:events';
import type { Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { resolveConfig } from './config.js';
import { AuthError } from './errors.js';
import { InMemoryProjectStore } from './memory.js';
import { PipelineOrchestrator } from './pipeline/orchestrator.js';
import { createApp } from './server.js';
import { FakeAdapter, fakeRegistry, outlineReply, withFacts } from './testing/fakeAdapter.js';
import { TEST_SECRET } from './testing/fixtures.js';

const CreatedProject = z.object({ project: z.object({ id: z.string() }) });

describe('HTTP API', () => {
  let adapter: FakeAdapter;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    adapter = new FakeAdapter('fake');
    const store = new InMemoryProjectStore();
    const registry = fakeRegistry(adapter);
    const config = resolveConfig({}, { AI_PROVIDER: 'fake', AI_MODEL: 'fake-model' });
    const orchestrator = new PipelineOrchestrator({
      store,
      registry,
      config: { chapterCount: 2 },
      sleep: async () => {},
    });
    server = createApp({ orchestrator, store, registry, config }).listen(0, '127.0.0.1');
    await once(server, 'listening');
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('Server is not listening on a port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    const closed = once(server, 'close');
    server.close();
    server.closeAllConnections();
    await closed;
  });

  function call(route: string, init: { method?: string; body?: unknown; key?: string } = {}) {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (init.key) headers['x-ai-key'] = init.key;
    return fetch(`${baseUrl}${route}`, {
      method: init.method ?? 'GET',
      headers,
      body: init.body === undefined ? undefined : JSON.stringify(init.body),
    });
  }

  const newBook = { title: 'The Lantern House', coreIdea: 'A ledger rewrites the past' };

  async function createBook(): Promise<string> {
    adapter.push(withFacts('Concept.', { summary: 'A concept.' }));
    const response = await call('/api/projects', { method: 'POST', body: newBook, key: TEST_SECRET });
    expect(response.status).toBe(201);
    return CreatedProject.parse(await response.json()).project.id;
  }

  it('reports health and registered providers', async () => {
    const response = await call('/api/health');
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ success: true, status: 'ok', providers: ['fake'] });
  });

  it('requires the credential header', async () => {
    const response = await call('/api/projects', { method: 'POST', body: newBook });
    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({
      success: false,
      kind: 'AuthError',
      error: 'Missing X-AI-Key header',
    });
    expect(adapter.calls).toBe(0);
  });

  it('validates request bodies', async () => {
    const response = await call('/api/projects', { method: 'POST', body: { title: 'x' }, key: TEST_SECRET });
    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ success: false, kind: 'ConfigurationError' });
  });

  it('creates, advances, lists and deletes a project', async () => {
    const id = await createBook();
    expect(adapter.requests[0].credential.reveal()).toBe(TEST_SECRET);

    adapter.push(outlineReply(2));
    const advanced = await call(`/api/projects/${id}/advance`, { method: 'POST', key: TEST_SECRET });
    const advancedText = await advanced.text();
    expect(advanced.status).toBe(200);
    expect(advancedText).not.toContain(TEST_SECRET);
    expect(JSON.parse(advancedText)).toMatchObject({
      success: true,
      summary: { id, status: 'chapter_pending', stages: 2, provider: 'fake' },
    });

    const list = await call('/api/projects');
    expect(await list.json()).toMatchObject({ success: true, projects: [{ id, stages: 2 }] });

    const detail = await call(`/api/projects/${id}`);
    expect(await detail.json()).toMatchObject({
      success: true,
      project: { id, state: { status: 'chapter_pending', chapter: 1 } },
      stats: { totalStages: 2, successfulStages: 2, failedStages: 0, averageAttempts: 1, totalContradictions: 0 },
    });

    const removed = await call(`/api/projects/${id}`, { method: 'DELETE' });
    expect(await removed.json()).toEqual({ success: true });

    const missing = await call(`/api/projects/${id}`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toMatchObject({ success: false, kind: 'ProjectNotFound' });
  });

  it('rejects unknown and unreached stages for regeneration', async () => {
    const id = await createBook();

    const unknown = await call(`/api/projects/${id}/regenerate`, {
      method: 'POST',
      body: { stage: 'banana' },
      key: TEST_SECRET,
    });
    expect(unknown.status).toBe(400);

    const unreached = await call(`/api/projects/${id}/regenerate`, {
      method: 'POST',
      body: { stage: 'chapter:2' },
      key: TEST_SECRET,
    });
    expect(unreached.status).toBe(400);
    expect(await unreached.json()).toMatchObject({ kind: 'InvalidTransition' });
    expect(adapter.calls).toBe(1);
  });

  it('maps provider auth failures to 401', async () => {
    adapter.push(new AuthError('openai rejected the credential (HTTP 401)'));
    const response = await call('/api/projects', { method: 'POST', body: newBook, key: TEST_SECRET });
    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({
      success: false,
      kind: 'AuthError',
      error: 'openai rejected the credential (HTTP 401)',
    });
  });

  it('analyzes chapter text', async () => {
    adapter.push('{"summary": "A quiet day.", "characters": ["Alice", "Bob", "Alice"]}');
    const response = await call('/api/analyze-chapter', {
      method: 'POST',
      body: { text: 'Alice met Bob.' },
      key: TEST_SECRET,
    });
    expect(await response.json()).toEqual({ success: true, summary: 'A quiet day.', characters: ['Alice', 'Bob'] });
    expect(adapter.requests[0].model).toBe('fake-model');
  });

  it('tests a provider connection', async () => {
    adapter.push('Hello');
    const response = await call('/api/providers/test', { method: 'POST', body: { provider: 'fake' }, key: TEST_SECRET });
    expect(await response.json()).toEqual({ success: true, message: 'Connected. Reply: "Hello"', model: 'fake-model' });
  });
});
