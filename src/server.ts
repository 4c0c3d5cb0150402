import express, { type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import cors from 'cors';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import { analyzeChapter } from './analyzeChapter.js';
import { loadConfig, type AppConfig } from './config.js';
import {
  AuthError,
  ConfigurationError,
  InvalidTransitionError,
  PipelineBusyError,
  ProjectNotFoundError,
  StoryPipelineError,
  errorMessage,
  isGenerationError,
} from './errors.js';
import { FileProjectStore, summarizeProject, type ProjectStore } from './memory.js';
import { PipelineOrchestrator } from './pipeline/orchestrator.js';
import { createDefaultRegistry, testConnection, type ProviderRegistry } from './services/aiClient.js';
import { CredentialHandle, type GenerationSession } from './services/credentials.js';
import { error as logError, info, setLogConfig } from './services/logger.js';
import { getDefaultModel, getProviderPresets, normalizeProviderId } from './services/providerCatalog.js';
import { parseStageKey } from './types/project.js';

export type ServerDeps = {
  orchestrator: PipelineOrchestrator;
  store: ProjectStore;
  registry: ProviderRegistry;
  config: AppConfig;
};

const CREDENTIAL_HEADER = 'x-ai-key';

const CreateProjectBody = z.object({
  title: z.string().trim().min(1),
  coreIdea: z.string().trim().min(1),
  genre: z.string().trim().optional(),
  theme: z.string().trim().optional(),
  style: z.string().trim().optional(),
  provider: z.string().trim().min(1).optional(),
  model: z.string().trim().min(1).optional(),
  chapterCount: z.number().int().min(1).max(500).optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxOutputTokens: z.number().int().min(64).optional(),
});

const RegenerateBody = z.object({
  /** concept, outline or chapter:n */
  stage: z.string().trim().min(1),
});

const AnalyzeBody = z.object({
  text: z.string().trim().min(1),
  provider: z.string().trim().min(1).optional(),
  model: z.string().trim().min(1).optional(),
});

const ProviderTestBody = z.object({
  provider: z.string().trim().min(1),
  model: z.string().trim().min(1).optional(),
});

/**
 * HTTP status for an error raised by the pipeline
 */
export function statusForError(err: unknown): number {
  if (err instanceof ProjectNotFoundError) return 404;
  if (err instanceof ConfigurationError || err instanceof InvalidTransitionError) return 400;
  if (err instanceof PipelineBusyError) return 409;
  if (err instanceof AuthError) return 401;
  if (err instanceof StoryPipelineError && err.kind === 'RateLimitError') return 429;
  if (err instanceof StoryPipelineError && err.kind === 'ContradictionBlocked') return 422;
  if (isGenerationError(err)) return 502;
  return 500;
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid request: ${details}`);
  }
  return parsed.data;
}

/**
 * Credential from the request header, plus a signal that aborts when the
 * client goes away before the response is written
 */
function sessionFrom(req: Request, res: Response): GenerationSession {
  const header = req.header(CREDENTIAL_HEADER);
  const credential = CredentialHandle.from(header ?? '');
  if (credential.isEmpty) {
    throw new AuthError('Missing X-AI-Key header');
  }
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) controller.abort();
  });
  return { credential, signal: controller.signal };
}

function modelFor(provider: string, model: string | undefined, config: AppConfig): string {
  const chosen = model || (normalizeProviderId(provider) === normalizeProviderId(config.provider) ? config.model : '');
  return chosen || getDefaultModel(provider) || '';
}

function route(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function createApp(deps: ServerDeps): express.Express {
  const { orchestrator, store, registry, config } = deps;
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '5mb' }));

  // ==================== API Routes ====================

  app.get('/api/health', (_req, res) => {
    res.json({ success: true, status: 'ok', providers: registry.ids() });
  });

  app.get('/api/providers', (_req, res) => {
    const providers = getProviderPresets().filter((preset) => registry.has(preset.id));
    res.json({ success: true, providers });
  });

  app.get(
    '/api/projects',
    route(async (_req, res) => {
      res.json({ success: true, projects: await store.list() });
    })
  );

  app.get(
    '/api/projects/:id',
    route(async (req, res) => {
      const project = await orchestrator.getProject(req.params.id);
      res.json({ success: true, project, stats: orchestrator.getStats(project.id) });
    })
  );

  /**
   * POST /api/projects - create a project by generating its concept
   */
  app.post(
    '/api/projects',
    route(async (req, res) => {
      const body = parseBody(CreateProjectBody, req.body);
      const session = sessionFrom(req, res);
      const provider = body.provider ?? config.provider;
      const project = await orchestrator.startProject(
        { title: body.title, coreIdea: body.coreIdea, genre: body.genre, theme: body.theme, style: body.style },
        {
          provider,
          model: modelFor(provider, body.model, config) || undefined,
          chapterCount: body.chapterCount,
          temperature: body.temperature,
          maxOutputTokens: body.maxOutputTokens,
        },
        session
      );
      res.status(201).json({ success: true, project });
    })
  );

  app.post(
    '/api/projects/:id/advance',
    route(async (req, res) => {
      const session = sessionFrom(req, res);
      const project = await orchestrator.advanceStage(req.params.id, session);
      res.json({ success: true, project, summary: summarizeProject(project) });
    })
  );

  app.post(
    '/api/projects/:id/regenerate',
    route(async (req, res) => {
      const body = parseBody(RegenerateBody, req.body);
      const stage = parseStageKey(body.stage);
      if (!stage) {
        throw new ConfigurationError(`Unknown stage "${body.stage}"; use concept, outline or chapter:n`);
      }
      const session = sessionFrom(req, res);
      const project = await orchestrator.regenerateStage(req.params.id, stage, session);
      res.json({ success: true, project, summary: summarizeProject(project) });
    })
  );

  app.delete(
    '/api/projects/:id',
    route(async (req, res) => {
      const { id } = req.params;
      if (orchestrator.isBusy(id)) {
        throw new PipelineBusyError(id);
      }
      await store.delete(id);
      orchestrator.releaseProject(id);
      res.json({ success: true });
    })
  );

  app.post(
    '/api/analyze-chapter',
    route(async (req, res) => {
      const body = parseBody(AnalyzeBody, req.body);
      const session = sessionFrom(req, res);
      const provider = body.provider ?? config.provider;
      const analysis = await analyzeChapter(
        registry,
        { provider, model: modelFor(provider, body.model, config), text: body.text },
        session
      );
      res.json({ success: true, ...analysis });
    })
  );

  app.post(
    '/api/providers/test',
    route(async (req, res) => {
      const body = parseBody(ProviderTestBody, req.body);
      const { credential } = sessionFrom(req, res);
      const result = await testConnection(registry, {
        provider: body.provider,
        model: modelFor(body.provider, body.model, config),
        credential,
      });
      res.json(result);
    })
  );

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const status = statusForError(err);
    if (status === 500) {
      logError('Unhandled request error', { message: errorMessage(err) });
    }
    const kind = err instanceof StoryPipelineError ? err.kind : 'InternalError';
    res.status(status).json({ success: false, kind, error: status === 500 ? 'Internal server error' : errorMessage(err) });
  });

  return app;
}

// ==================== Start Server ====================

export async function main(): Promise<void> {
  const config = await loadConfig();
  setLogConfig({ level: config.logLevel });

  const store = new FileProjectStore(config.dataDir);
  const registry = createDefaultRegistry({ timeoutMs: config.requestTimeoutMs, customBaseUrl: config.baseUrl });
  const orchestrator = new PipelineOrchestrator({ store, registry, config: config.pipeline });

  const app = createApp({ orchestrator, store, registry, config });
  app.listen(config.port, () => {
    info(`Story pipeline API running at http://localhost:${config.port}`, { dataDir: config.dataDir });
  });
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err: unknown) => {
    logError('Server failed to start', { message: errorMessage(err) });
    process.exitCode = 1;
  });
}
