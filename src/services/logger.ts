/**
 * Logging and generation metrics
 *
 * Records the key figures of each stage generation for debugging and tuning.
 * Prompt bodies and credentials are never logged, only token estimates.
 */

/**
 * Phases of one stage generation
 */
export type GenerationPhase =
  | 'prompt_compose'
  | 'model_call'
  | 'extraction'
  | 'validation'
  | 'state_save';

/**
 * Metrics for one stage generation
 */
export interface GenerationMetrics {
  /** Project id */
  projectId: string;
  /** Stage key (concept, outline, chapter:n) */
  stage: string;
  /** Prompt size (estimate) */
  promptTokens: number;
  /** Output size (estimate) */
  outputTokens: number;
  /** Wall time of the whole stage in milliseconds */
  generationTime: number;
  /** Time spent per phase */
  phaseTimes: Partial<Record<GenerationPhase, number>>;
  /** Provider calls made */
  attempts: number;
  /** Contradictions flagged */
  contradictions: number;
  model: string;
  provider: string;
  /** Error kind when the stage failed */
  error?: string;
  timestamp: Date;
}

/**
 * Aggregated figures for a project
 */
export interface ProjectStats {
  totalStages: number;
  successfulStages: number;
  failedStages: number;
  averageGenerationTime: number;
  /** Average provider calls per successful stage */
  averageAttempts: number;
  totalContradictions: number;
  totalTokensUsed: number;
  averagePhaseTimes: Partial<Record<GenerationPhase, number>>;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogConfig {
  level: LogLevel;
  /** Maximum metric entries kept per project */
  maxEntries: number;
}

const DEFAULT_LOG_CONFIG: LogConfig = {
  level: 'info',
  maxEntries: 1000,
};

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const metricsStore = new Map<string, GenerationMetrics[]>();
let logConfig = { ...DEFAULT_LOG_CONFIG };

export function setLogConfig(config: Partial<LogConfig>): void {
  logConfig = { ...logConfig, ...config };
}

/**
 * Record the metrics of one stage generation
 */
export function logGenerationMetrics(metrics: GenerationMetrics): void {
  const projectMetrics = metricsStore.get(metrics.projectId) ?? [];
  projectMetrics.push(metrics);

  if (projectMetrics.length > logConfig.maxEntries) {
    projectMetrics.shift();
  }
  metricsStore.set(metrics.projectId, projectMetrics);

  log(metrics.error ? 'warn' : 'info', `[${metrics.stage}] ${metrics.error ? 'failed' : 'generated'} in ${metrics.generationTime}ms`, {
    projectId: metrics.projectId,
    provider: metrics.provider,
    model: metrics.model,
    tokens: metrics.promptTokens + metrics.outputTokens,
    attempts: metrics.attempts,
    contradictions: metrics.contradictions,
    error: metrics.error,
  });
}

/**
 * Aggregate statistics for a project, or null when nothing was recorded
 */
export function getProjectStats(projectId: string): ProjectStats | null {
  const metrics = metricsStore.get(projectId);

  if (!metrics || metrics.length === 0) {
    return null;
  }

  const successful = metrics.filter((m) => !m.error);
  const failed = metrics.filter((m) => m.error);

  const avgTime = successful.length > 0
    ? successful.reduce((sum, m) => sum + m.generationTime, 0) / successful.length
    : 0;

  const avgAttempts = successful.length > 0
    ? successful.reduce((sum, m) => sum + m.attempts, 0) / successful.length
    : 0;

  const phaseTotals = new Map<GenerationPhase, { sum: number; count: number }>();
  for (const m of successful) {
    for (const [phase, time] of phaseEntries(m.phaseTimes)) {
      const total = phaseTotals.get(phase) ?? { sum: 0, count: 0 };
      total.sum += time;
      total.count += 1;
      phaseTotals.set(phase, total);
    }
  }

  const averagePhaseTimes: Partial<Record<GenerationPhase, number>> = {};
  for (const [phase, data] of phaseTotals) {
    averagePhaseTimes[phase] = data.sum / data.count;
  }

  return {
    totalStages: metrics.length,
    successfulStages: successful.length,
    failedStages: failed.length,
    averageGenerationTime: avgTime,
    averageAttempts: avgAttempts,
    totalContradictions: metrics.reduce((sum, m) => sum + m.contradictions, 0),
    totalTokensUsed: metrics.reduce((sum, m) => sum + m.promptTokens + m.outputTokens, 0),
    averagePhaseTimes,
  };
}

function phaseEntries(times: Partial<Record<GenerationPhase, number>>): [GenerationPhase, number][] {
  const entries: [GenerationPhase, number][] = [];
  for (const phase of ['prompt_compose', 'model_call', 'extraction', 'validation', 'state_save'] as const) {
    const time = times[phase];
    if (time !== undefined) entries.push([phase, time]);
  }
  return entries;
}

export function clearProjectMetrics(projectId: string): void {
  metricsStore.delete(projectId);
}

/**
 * Generic log function
 */
export function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[logConfig.level]) {
    return;
  }

  const timestamp = new Date().toISOString();
  const prefix = `[${timestamp}] [${level.toUpperCase()}]`;
  const write = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;

  if (data) {
    write(prefix, message, JSON.stringify(data));
  } else {
    write(prefix, message);
  }
}

export function debug(message: string, data?: Record<string, unknown>): void {
  log('debug', message, data);
}

export function info(message: string, data?: Record<string, unknown>): void {
  log('info', message, data);
}

export function warn(message: string, data?: Record<string, unknown>): void {
  log('warn', message, data);
}

export function error(message: string, data?: Record<string, unknown>): void {
  log('error', message, data);
}

export function createTimer(): { elapsed: () => number } {
  const start = Date.now();
  return {
    elapsed: () => Date.now() - start,
  };
}

/**
 * Run fn and store its duration under the given phase
 */
export async function measureTime<T>(
  phase: GenerationPhase,
  fn: () => Promise<T>,
  phaseTimes: Partial<Record<GenerationPhase, number>>
): Promise<T> {
  const timer = createTimer();
  try {
    return await fn();
  } finally {
    phaseTimes[phase] = timer.elapsed();
  }
}

/**
 * Synchronous variant of measureTime
 */
export function measureSync<T>(
  phase: GenerationPhase,
  fn: () => T,
  phaseTimes: Partial<Record<GenerationPhase, number>>
): T {
  const timer = createTimer();
  try {
    return fn();
  } finally {
    phaseTimes[phase] = timer.elapsed();
  }
}
