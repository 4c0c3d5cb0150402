import fs from 'node:fs/promises';
import path from 'node:path';
import 'dotenv/config';
import { z } from 'zod';
import { TIMEOUTS } from './config/timeouts.js';
import { ConfigurationError, errorMessage, isMissingFile } from './errors.js';

/**
 * Severity at which a contradiction stops the pipeline. `never` only flags.
 */
export const BlockingSeveritySchema = z.enum(['never', 'warning', 'critical']);
export type BlockingSeverity = z.infer<typeof BlockingSeveritySchema>;

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const PipelineConfigSchema = z.object({
  /** Chapters generated after the outline */
  chapterCount: z.number().int().min(1).max(500),
  /** Total provider calls per stage, first attempt included */
  maxAttempts: z.number().int().min(1).max(10),
  backoffBaseMs: z.number().int().min(0),
  backoffMaxMs: z.number().int().min(0),
  /** Prompt size budget (token estimate, system + user) */
  promptBudgetTokens: z.number().int().min(256),
  blockingSeverity: BlockingSeveritySchema,
  temperature: z.number().min(0).max(2),
  maxOutputTokens: z.number().int().min(64),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

const AppConfigSchema = z.object({
  port: z.number().int().min(0).max(65535),
  dataDir: z.string().min(1),
  logLevel: LogLevelSchema,
  /** Default provider for new projects */
  provider: z.string().min(1),
  /** Default model; empty means the provider's first listed model */
  model: z.string(),
  /** Override base URL for OpenAI-compatible providers */
  baseUrl: z.string().url().optional(),
  requestTimeoutMs: z.number().int().min(1000),
  pipeline: PipelineConfigSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  chapterCount: 12,
  maxAttempts: 3,
  backoffBaseMs: 1000,
  backoffMaxMs: 30000,
  promptBudgetTokens: 24000,
  blockingSeverity: 'never',
  temperature: 0.8,
  maxOutputTokens: 8192,
};

const DEFAULT_CONFIG: AppConfig = {
  port: 3001,
  dataDir: path.join(process.cwd(), 'data'),
  logLevel: 'info',
  provider: 'gemini',
  model: '',
  requestTimeoutMs: TIMEOUTS.AI_REQUEST,
  pipeline: DEFAULT_PIPELINE_CONFIG,
};

const CONFIG_PATH = path.join(process.cwd(), 'config.json');

let cachedConfig: AppConfig | null = null;

function intFromEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`Environment variable ${key} must be a number, got "${raw}"`);
  }
  return value;
}

function definedOnly(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, value]) => value !== undefined));
}

/**
 * Read overrides from the environment (after dotenv has populated it)
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): {
  app: Record<string, unknown>;
  pipeline: Record<string, unknown>;
} {
  return {
    app: definedOnly({
      port: intFromEnv(env, 'PORT'),
      dataDir: env.DATA_DIR,
      logLevel: env.LOG_LEVEL,
      provider: env.AI_PROVIDER,
      model: env.AI_MODEL,
      baseUrl: env.AI_BASE_URL,
      requestTimeoutMs: intFromEnv(env, 'AI_REQUEST_TIMEOUT_MS'),
    }),
    pipeline: definedOnly({
      chapterCount: intFromEnv(env, 'CHAPTER_COUNT'),
      maxAttempts: intFromEnv(env, 'MAX_ATTEMPTS'),
      backoffBaseMs: intFromEnv(env, 'BACKOFF_BASE_MS'),
      backoffMaxMs: intFromEnv(env, 'BACKOFF_MAX_MS'),
      promptBudgetTokens: intFromEnv(env, 'PROMPT_BUDGET_TOKENS'),
      blockingSeverity: env.BLOCKING_SEVERITY,
    }),
  };
}

/**
 * Merge defaults, config.json and environment, then validate
 */
export function resolveConfig(
  fileConfig: unknown,
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const fromFile = z
    .object({ pipeline: z.record(z.unknown()).optional() })
    .passthrough()
    .safeParse(fileConfig ?? {});
  if (!fromFile.success) {
    throw new ConfigurationError('config.json must contain a JSON object');
  }

  const { pipeline: filePipeline, ...fileApp } = fromFile.data;
  const fromEnv = configFromEnv(env);

  const merged = {
    ...DEFAULT_CONFIG,
    ...fileApp,
    ...fromEnv.app,
    pipeline: {
      ...DEFAULT_PIPELINE_CONFIG,
      ...filePipeline,
      ...fromEnv.pipeline,
    },
  };

  const parsed = AppConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}

/**
 * Load configuration from config.json (optional) and the environment
 */
export async function loadConfig(): Promise<AppConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  let fileConfig: unknown = {};
  try {
    const content = await fs.readFile(CONFIG_PATH, 'utf-8');
    fileConfig = JSON.parse(content);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`config.json is not valid JSON: ${error.message}`);
    }
    if (!isMissingFile(error)) {
      throw new ConfigurationError(`Cannot read config.json: ${errorMessage(error)}`, { cause: error });
    }
  }

  cachedConfig = resolveConfig(fileConfig);
  return cachedConfig;
}

