import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { loadConfig } from './config.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { eventBus as defaultEventBus, type PipelineEventBus } from './eventBus.js';
import { FileProjectStore } from './memory.js';
import { PipelineOrchestrator } from './pipeline/orchestrator.js';
import { sleep as defaultSleep, type Sleep } from './pipeline/retry.js';
import { createDefaultRegistry } from './services/aiClient.js';
import { CredentialHandle, type GenerationSession } from './services/credentials.js';
import { error as logError, info, setLogConfig, warn } from './services/logger.js';
import { describeStage, type Project } from './types/project.js';
import { pendingStage } from './pipeline/stateMachine.js';

type RunOptions = {
  orchestrator: PipelineOrchestrator;
  projectId: string;
  session: GenerationSession;
  /** Stages to generate at most (default: until complete or failed) */
  maxStages?: number;
  /** Delay between stages in milliseconds */
  delayBetweenStages?: number;
  sleep?: Sleep;
};

/**
 * Advance a project stage by stage until it completes, fails, or `maxStages`
 * stages have been generated
 */
export async function runOneBook(options: RunOptions): Promise<Project> {
  const {
    orchestrator,
    projectId,
    session,
    maxStages = Number.POSITIVE_INFINITY,
    delayBetweenStages = 2000,
    sleep = defaultSleep,
  } = options;

  let project = await orchestrator.getProject(projectId);
  info(`Running ${project.title}`, { projectId, state: project.state.status, stages: project.results.length });

  for (let generated = 0; generated < maxStages; generated++) {
    const stage = pendingStage(project.state);
    if (!stage) {
      info('Book is complete', { projectId });
      break;
    }
    if (generated > 0 && delayBetweenStages > 0) {
      await sleep(delayBetweenStages, session.signal);
    }

    project = await orchestrator.advanceStage(projectId, session);
    if (project.state.status === 'failed') {
      const { failure } = project.state;
      warn(`${describeStage(failure.stage)} failed, stopping`, { projectId, kind: failure.kind });
      break;
    }
  }

  return project;
}

/**
 * Print pipeline events as progress lines
 */
function attachProgress(events: PipelineEventBus): () => void {
  return events.subscribe((event) => {
    switch (event.type) {
      case 'stage_started':
        console.log(`📝 ${event.stage}...`);
        break;
      case 'retry_scheduled':
        console.log(`   ⏳ attempt ${event.attempt} failed (${event.errorKind}), retrying in ${event.delayMs / 1000}s`);
        break;
      case 'stage_committed':
        console.log(`   ✅ ${event.stage} (${event.attempts} attempt(s), ${event.contradictions} contradiction(s))`);
        break;
      case 'stage_failed':
        console.log(`   ❌ ${event.stage}: ${event.message}`);
        break;
    }
  });
}

const USAGE =
  'Usage: story-pipeline-run <projectId> [--stages n] | --title <title> --idea <core idea> [--genre g] [--chapters n] [--stages n]';

const CountArg = z.coerce.number().int().positive();

const ResumeArgs = z.object({
  projectId: z.string().trim().min(1),
  stages: CountArg.optional(),
});

const StartArgs = z.object({
  title: z.string({ required_error: 'required' }).trim().min(1),
  idea: z.string({ required_error: 'required' }).trim().min(1),
  genre: z.string().trim().min(1).optional(),
  chapters: CountArg.optional(),
  stages: CountArg.optional(),
});

export type CliArgs =
  | ({ mode: 'resume' } & z.infer<typeof ResumeArgs>)
  | ({ mode: 'start' } & z.infer<typeof StartArgs>);

function usageError(message: string, cause?: unknown): ConfigurationError {
  return new ConfigurationError(`${message}\n${USAGE}`, { cause });
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw usageError(`--${issue.path.join('.')}: ${issue.message}`);
  }
  return parsed.data;
}

/**
 * Command line of the runner: a project id to resume, or a premise to start
 */
export function parseCliArgs(args: string[]): CliArgs {
  let parsedArgs: ReturnType<typeof parseCommandLine>;
  try {
    parsedArgs = parseCommandLine(args);
  } catch (err) {
    throw usageError(errorMessage(err), err);
  }

  const { values, positionals } = parsedArgs;
  const projectId = positionals[0];
  if (projectId !== undefined) {
    return { mode: 'resume', ...parseWith(ResumeArgs, { projectId, stages: values.stages }) };
  }
  return { mode: 'start', ...parseWith(StartArgs, values) };
}

function parseCommandLine(args: string[]) {
  return parseArgs({
    args,
    allowPositionals: true,
    options: {
      title: { type: 'string' },
      idea: { type: 'string' },
      genre: { type: 'string' },
      chapters: { type: 'string' },
      stages: { type: 'string' },
    },
  });
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));

  const config = await loadConfig();
  setLogConfig({ level: config.logLevel });

  const credential = CredentialHandle.from(process.env.AI_API_KEY ?? '');
  if (credential.isEmpty) {
    throw new Error('Missing AI_API_KEY environment variable');
  }
  const session: GenerationSession = { credential };

  const store = new FileProjectStore(config.dataDir);
  const registry = createDefaultRegistry({ timeoutMs: config.requestTimeoutMs, customBaseUrl: config.baseUrl });
  const orchestrator = new PipelineOrchestrator({ store, registry, config: config.pipeline });
  const detach = attachProgress(defaultEventBus);

  try {
    let projectId: string;
    if (args.mode === 'resume') {
      projectId = args.projectId;
    } else {
      const project = await orchestrator.startProject(
        { title: args.title, coreIdea: args.idea, genre: args.genre },
        { provider: config.provider, model: config.model || undefined, chapterCount: args.chapters },
        session
      );
      projectId = project.id;
      console.log(`📖 Created ${project.id}`);
    }

    const project = await runOneBook({ orchestrator, projectId, session, maxStages: args.stages });
    console.log(`\nState: ${project.state.status}, ${project.results.length} stage(s) committed`);
    const stats = orchestrator.getStats(project.id);
    if (stats) {
      console.log(
        `Stages: ${stats.successfulStages} ok, ${stats.failedStages} failed, ` +
          `${stats.totalContradictions} contradiction(s), ~${stats.totalTokensUsed} tokens`
      );
    }
  } finally {
    detach();
  }
}

// CLI entry - only when executed directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err: unknown) => {
    logError('Run failed', { message: errorMessage(err) });
    process.exitCode = 1;
  });
}
