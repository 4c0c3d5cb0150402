import Anthropic from '@anthropic-ai/sdk';
import { GoogleGenAI } from '@google/genai';
import OpenAI from 'openai';
import { TIMEOUTS, getTimeoutInSeconds } from '../config/timeouts.js';
import {
  AuthError,
  ConfigurationError,
  ContentPolicyError,
  GenerationCancelledError,
  RateLimitError,
  StoryPipelineError,
  TransientError,
  errorMessage,
} from '../errors.js';
import type { CredentialHandle } from './credentials.js';
import {
  getProviderPresets,
  normalizeProviderId,
  type ProviderPreset,
  type ProviderProtocol,
} from './providerCatalog.js';

export type GenerationOptions = {
  maxOutputTokens: number;
  temperature: number;
};

/**
 * One provider call. Lives only for the duration of `generate`.
 */
export type GenerationRequest = {
  provider: string;
  model: string;
  credential: CredentialHandle;
  system?: string;
  prompt: string;
  options: GenerationOptions;
  signal?: AbortSignal;
};

/**
 * Send prompt, receive text. Makes at most one network call and never retries;
 * failures are raised as one of the GenerationError kinds.
 */
export interface ProviderAdapter {
  readonly id: string;
  readonly protocol: ProviderProtocol;
  generate(request: GenerationRequest): Promise<string>;
}

export type AdapterSettings = {
  baseUrl?: string;
  timeoutMs: number;
};

const CONTENT_POLICY_PATTERN = /content[_ -]?(policy|filter|management)|safety|moderation|prohibited|refus/i;
// Gemini answers a bad key with HTTP 400 rather than 401
const INVALID_CREDENTIAL_PATTERN = /api[_ ]?key|credential|unauthori[sz]ed|permission/i;
const TRANSIENT_ERROR_NAMES = new Set([
  'APIConnectionError',
  'APIConnectionTimeoutError',
  'TimeoutError',
  'FetchError',
]);
const TRANSIENT_ERROR_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EAI_AGAIN', 'EPIPE']);
const GEMINI_BLOCKED_FINISH = new Set(['SAFETY', 'PROHIBITED_CONTENT', 'BLOCKLIST', 'SPII', 'IMAGE_SAFETY']);

function readNumberField(error: unknown, field: 'status'): number | undefined {
  if (typeof error === 'object' && error !== null && field in error) {
    const value: unknown = Reflect.get(error, field);
    return typeof value === 'number' ? value : undefined;
  }
  return undefined;
}

function readStringField(error: unknown, field: 'name' | 'code'): string | undefined {
  if (typeof error === 'object' && error !== null && field in error) {
    const value: unknown = Reflect.get(error, field);
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

/**
 * Retry-After (seconds) from an SDK error's response headers, in milliseconds
 */
function readRetryAfterMs(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('headers' in error)) return undefined;
  const headers: unknown = error.headers;
  let raw: unknown;
  if (headers instanceof Headers) {
    raw = headers.get('retry-after');
  } else if (typeof headers === 'object' && headers !== null) {
    raw = Reflect.get(headers, 'retry-after');
  }
  if (typeof raw !== 'string') return undefined;
  const seconds = Number(raw);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

/**
 * Map an SDK / network failure onto the pipeline's error taxonomy
 */
export function classifyProviderError(
  providerId: string,
  error: unknown,
  credential: CredentialHandle,
  signal?: AbortSignal
): StoryPipelineError {
  if (error instanceof StoryPipelineError) {
    return error;
  }

  const name = readStringField(error, 'name');
  if (signal?.aborted || name === 'APIUserAbortError' || name === 'AbortError') {
    return new GenerationCancelledError(`${providerId} request cancelled`);
  }

  const status = readNumberField(error, 'status');
  const message = credential.scrub(errorMessage(error));
  const cause = { cause: error };

  if (status === 401 || status === 403) {
    return new AuthError(`${providerId} rejected the credential (HTTP ${status})`);
  }
  if (status === 429) {
    return new RateLimitError(`${providerId} rate limit: ${message}`, readRetryAfterMs(error), cause);
  }
  if (status === 408 || status === 409 || (status !== undefined && status >= 500)) {
    return new TransientError(`${providerId} HTTP ${status}: ${message}`, cause);
  }
  if (status !== undefined && status >= 400) {
    // Raw text: the scrubbed one carries the [credential] placeholder
    if (INVALID_CREDENTIAL_PATTERN.test(errorMessage(error))) {
      return new AuthError(`${providerId} rejected the credential (HTTP ${status})`);
    }
    if (CONTENT_POLICY_PATTERN.test(message)) {
      return new ContentPolicyError(`${providerId} refused the content: ${message}`, cause);
    }
    return new ConfigurationError(`${providerId} rejected the request (HTTP ${status}): ${message}`, cause);
  }

  const code = readStringField(error, 'code');
  if ((name && TRANSIENT_ERROR_NAMES.has(name)) || (code && (TRANSIENT_ERROR_CODES.has(code) || code.startsWith('UND_ERR')))) {
    return new TransientError(`${providerId} connection failed: ${message}`, cause);
  }

  // Unknown failure without an HTTP status: most likely the network
  return new TransientError(`${providerId} request failed: ${message}`, cause);
}

/**
 * Shared request validation and error translation; subclasses only talk to their SDK.
 */
abstract class SdkProviderAdapter implements ProviderAdapter {
  abstract readonly protocol: ProviderProtocol;

  constructor(
    readonly id: string,
    protected readonly settings: AdapterSettings
  ) {}

  async generate(request: GenerationRequest): Promise<string> {
    if (!request.prompt.trim()) {
      throw new ConfigurationError('Prompt must not be empty');
    }
    if (!request.model.trim()) {
      throw new ConfigurationError(`No model configured for provider ${this.id}`);
    }
    if (request.credential.isEmpty) {
      throw new AuthError(`No credential supplied for provider ${this.id}`);
    }
    if (request.signal?.aborted) {
      throw new GenerationCancelledError();
    }

    let text: string;
    try {
      text = await this.complete(request);
    } catch (error) {
      throw classifyProviderError(this.id, error, request.credential, request.signal);
    }

    if (!text.trim()) {
      throw new TransientError(`${this.id}: empty model response`);
    }
    return text.trim();
  }

  protected abstract complete(request: GenerationRequest): Promise<string>;
}

/**
 * OpenAI and every OpenAI-compatible endpoint (DeepSeek, Moonshot, Qwen, ...)
 */
export class OpenAICompatibleAdapter extends SdkProviderAdapter {
  readonly protocol = 'openai' as const;

  protected async complete(request: GenerationRequest): Promise<string> {
    const client = new OpenAI({
      apiKey: request.credential.reveal(),
      baseURL: this.settings.baseUrl,
      maxRetries: 0,
      timeout: this.settings.timeoutMs,
    });

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (request.system) {
      messages.push({ role: 'system', content: request.system });
    }
    messages.push({ role: 'user', content: request.prompt });

    const response = await client.chat.completions.create(
      {
        model: request.model,
        messages,
        temperature: request.options.temperature,
        max_tokens: request.options.maxOutputTokens,
      },
      { signal: request.signal }
    );

    const choice = response.choices[0];
    if (choice?.finish_reason === 'content_filter') {
      throw new ContentPolicyError(`${this.id} content filter stopped the completion`);
    }
    return choice?.message?.content ?? '';
  }
}

export class GeminiAdapter extends SdkProviderAdapter {
  readonly protocol = 'gemini' as const;

  protected async complete(request: GenerationRequest): Promise<string> {
    const client = new GoogleGenAI({
      apiKey: request.credential.reveal(),
      httpOptions: { timeout: this.settings.timeoutMs },
    });

    const response = await client.models.generateContent({
      model: request.model,
      config: {
        systemInstruction: request.system,
        temperature: request.options.temperature,
        maxOutputTokens: request.options.maxOutputTokens,
        abortSignal: request.signal,
      },
      contents: [{ role: 'user', parts: [{ text: request.prompt }] }],
    });

    const blockReason = response.promptFeedback?.blockReason;
    if (blockReason) {
      throw new ContentPolicyError(`${this.id} blocked the prompt (${String(blockReason)})`);
    }

    const candidate = response.candidates?.[0];
    const finishReason = candidate?.finishReason ? String(candidate.finishReason) : '';
    if (GEMINI_BLOCKED_FINISH.has(finishReason)) {
      throw new ContentPolicyError(`${this.id} stopped the completion (${finishReason})`);
    }

    if (response.text) {
      return response.text;
    }
    return (candidate?.content?.parts ?? [])
      .map((part) => part.text ?? '')
      .join('');
  }
}

export class AnthropicAdapter extends SdkProviderAdapter {
  readonly protocol = 'anthropic' as const;

  protected async complete(request: GenerationRequest): Promise<string> {
    const client = new Anthropic({
      apiKey: request.credential.reveal(),
      baseURL: this.settings.baseUrl,
      maxRetries: 0,
      timeout: this.settings.timeoutMs,
    });

    const response = await client.messages.create(
      {
        model: request.model,
        max_tokens: request.options.maxOutputTokens,
        temperature: Math.min(request.options.temperature, 1),
        system: request.system,
        messages: [{ role: 'user', content: request.prompt }],
      },
      { signal: request.signal }
    );

    if (String(response.stop_reason) === 'refusal') {
      throw new ContentPolicyError(`${this.id} refused the request`);
    }

    return response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');
  }
}

function createAdapter(preset: ProviderPreset, settings: AdapterSettings): ProviderAdapter {
  switch (preset.protocol) {
    case 'gemini':
      return new GeminiAdapter(preset.id, settings);
    case 'anthropic':
      return new AnthropicAdapter(preset.id, settings);
    case 'openai':
      return new OpenAICompatibleAdapter(preset.id, settings);
  }
}

/**
 * Static provider id → adapter map, resolved once at startup.
 */
export class ProviderRegistry {
  private readonly adapters = new Map<string, ProviderAdapter>();

  constructor(adapters: Iterable<ProviderAdapter>) {
    for (const adapter of adapters) {
      this.adapters.set(normalizeProviderId(adapter.id), adapter);
    }
  }

  has(provider: string): boolean {
    return this.adapters.has(normalizeProviderId(provider));
  }

  ids(): string[] {
    return [...this.adapters.keys()];
  }

  /**
   * @throws ConfigurationError for unknown providers
   */
  resolve(provider: string): ProviderAdapter {
    const adapter = this.adapters.get(normalizeProviderId(provider));
    if (!adapter) {
      throw new ConfigurationError(
        `Unknown provider "${provider}". Registered: ${this.ids().join(', ') || '(none)'}`
      );
    }
    return adapter;
  }

  generate(request: GenerationRequest): Promise<string> {
    return this.resolve(request.provider).generate(request);
  }
}

/**
 * Registry over every catalog preset. `custom` is only registered when a base
 * URL is configured.
 */
export function createDefaultRegistry(options: {
  timeoutMs?: number;
  customBaseUrl?: string;
} = {}): ProviderRegistry {
  const timeoutMs = options.timeoutMs ?? TIMEOUTS.AI_REQUEST;
  const adapters: ProviderAdapter[] = [];

  for (const preset of getProviderPresets()) {
    const baseUrl = preset.isCustom ? options.customBaseUrl : preset.defaultBaseUrl;
    if (preset.isCustom && !baseUrl) continue;
    // SDK defaults already point at the first-party endpoints
    const ownEndpoint = preset.protocol !== 'openai' || preset.id === 'openai';
    adapters.push(createAdapter(preset, { baseUrl: ownEndpoint ? undefined : baseUrl, timeoutMs }));
  }

  return new ProviderRegistry(adapters);
}

/**
 * Probe a provider/model/credential combination with a one-word prompt
 */
export async function testConnection(
  registry: ProviderRegistry,
  args: { provider: string; model: string; credential: CredentialHandle }
): Promise<{ success: boolean; message: string; model?: string }> {
  try {
    const response = await registry.generate({
      provider: args.provider,
      model: args.model,
      credential: args.credential,
      system: 'You are a helpful assistant.',
      prompt: 'Say "Hello" in one word.',
      options: { temperature: 0, maxOutputTokens: 16 },
      signal: AbortSignal.timeout(TIMEOUTS.TEST_CONNECTION),
    });

    return {
      success: true,
      message: `Connected. Reply: "${response}"`,
      model: args.model,
    };
  } catch (error) {
    if (error instanceof GenerationCancelledError) {
      return {
        success: false,
        message: `Connection test timed out after ${getTimeoutInSeconds(TIMEOUTS.TEST_CONNECTION)}s`,
      };
    }
    return {
      success: false,
      message: `Connection failed: ${errorMessage(error)}`,
    };
  }
}
