export * from './errors.js';
export { loadConfig, resolveConfig, DEFAULT_PIPELINE_CONFIG, type AppConfig, type PipelineConfig, type BlockingSeverity } from './config.js';
export { CredentialHandle, type GenerationSession } from './services/credentials.js';
export {
  ProviderRegistry,
  OpenAICompatibleAdapter,
  GeminiAdapter,
  AnthropicAdapter,
  createDefaultRegistry,
  classifyProviderError,
  testConnection,
  type ProviderAdapter,
  type GenerationRequest,
  type GenerationOptions,
} from './services/aiClient.js';
export { getProviderPresets, getProviderPreset, normalizeProviderId, type ProviderPreset } from './services/providerCatalog.js';
export { compose, type ComposeOptions, type ComposedPrompt } from './promptComposer.js';
export { estimateTokens } from './contextOptimizer.js';
export {
  extract,
  commit,
  query,
  rebuildKnowledge,
  findEntity,
  JsonFactExtractor,
  type FactExtractor,
  type KnowledgeFilter,
  type CommitContext,
} from './context/knowledgeStore.js';
export { validate, blockingContradictions, type ValidationOptions } from './context/consistencyChecker.js';
export { DEFAULT_EQUIVALENCE_RULES, normalizedTextRule, nameAliasRule, type EquivalenceRule } from './context/equivalence.js';
export { PipelineOrchestrator, type ProviderConfig, type OrchestratorDeps } from './pipeline/orchestrator.js';
export { FileProjectStore, InMemoryProjectStore, type ProjectStore, type ProjectSummary } from './memory.js';
export { PipelineEventBus, eventBus, type PipelineEvent } from './eventBus.js';
export { parseOutline, type StoryOutline, type OutlineChapter } from './outline.js';
export { analyzeChapter, type ChapterAnalysis } from './analyzeChapter.js';
export { runOneBook } from './runOneBook.js';
export { createApp } from './server.js';
export * from './types/knowledge.js';
export * from './types/project.js';
