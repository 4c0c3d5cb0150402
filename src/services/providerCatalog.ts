export type ProviderProtocol = 'openai' | 'gemini' | 'anthropic';

export type ProviderPreset = {
  id: string;
  label: string;
  protocol: ProviderProtocol;
  defaultBaseUrl?: string;
  /** Commonly used models; the first one is the default */
  models: string[];
  aliases?: string[];
  /** Needs a base URL from configuration */
  isCustom?: boolean;
};

const PRESETS: ProviderPreset[] = [
  { id: 'openai', label: 'OpenAI', protocol: 'openai', defaultBaseUrl: 'https://api.openai.com/v1', models: ['gpt-4o', 'gpt-4o-mini', 'gpt-4-turbo', 'o1', 'o1-mini'] },
  { id: 'anthropic', label: 'Anthropic', protocol: 'anthropic', defaultBaseUrl: 'https://api.anthropic.com', models: ['claude-3-5-sonnet-latest', 'claude-3-5-haiku-latest', 'claude-3-opus-latest'], aliases: ['claude'] },
  { id: 'gemini', label: 'Google Gemini', protocol: 'gemini', defaultBaseUrl: 'https://generativelanguage.googleapis.com', models: ['gemini-2.0-flash', 'gemini-2.5-pro', 'gemini-2.5-flash', 'gemini-1.5-pro'], aliases: ['google'] },
  { id: 'deepseek', label: 'DeepSeek', protocol: 'openai', defaultBaseUrl: 'https://api.deepseek.com/v1', models: ['deepseek-chat', 'deepseek-reasoner'] },
  { id: 'zai', label: 'Zhipu GLM (zAI)', protocol: 'openai', defaultBaseUrl: 'https://open.bigmodel.cn/api/paas/v4', models: ['glm-4-plus', 'glm-4-flash'], aliases: ['zhipu', 'glm', 'bigmodel', 'z-ai'] },
  { id: 'moonshot', label: 'Moonshot (Kimi)', protocol: 'openai', defaultBaseUrl: 'https://api.moonshot.cn/v1', models: ['moonshot-v1-32k', 'moonshot-v1-128k'], aliases: ['kimi'] },
  { id: 'qwen', label: 'Qwen / DashScope', protocol: 'openai', defaultBaseUrl: 'https://dashscope.aliyuncs.com/compatible-mode/v1', models: ['qwen-max', 'qwen-plus'], aliases: ['dashscope', 'aliyun', 'alibaba', 'bailian'] },
  { id: 'baidu', label: 'Baidu Qianfan', protocol: 'openai', defaultBaseUrl: 'https://qianfan.baidubce.com/v2', models: ['ernie-4.0-8k', 'ernie-3.5-8k'], aliases: ['qianfan', 'ernie'] },
  { id: 'openrouter', label: 'OpenRouter', protocol: 'openai', defaultBaseUrl: 'https://openrouter.ai/api/v1', models: ['openai/gpt-4o'] },
  { id: 'groq', label: 'Groq', protocol: 'openai', defaultBaseUrl: 'https://api.groq.com/openai/v1', models: ['llama-3.3-70b-versatile'] },
  { id: 'xai', label: 'xAI', protocol: 'openai', defaultBaseUrl: 'https://api.x.ai/v1', models: ['grok-2-latest'], aliases: ['grok'] },
  { id: 'mistral', label: 'Mistral', protocol: 'openai', defaultBaseUrl: 'https://api.mistral.ai/v1', models: ['mistral-large-latest'] },
  { id: 'custom', label: 'Custom (OpenAI-compatible)', protocol: 'openai', models: [], isCustom: true },
];

const PRESET_BY_ID = new Map<string, ProviderPreset>();
const ALIAS_TO_ID = new Map<string, string>();

for (const preset of PRESETS) {
  PRESET_BY_ID.set(preset.id, preset);
  ALIAS_TO_ID.set(preset.id, preset.id);
  for (const alias of preset.aliases || []) {
    ALIAS_TO_ID.set(alias, preset.id);
  }
}

function sanitizeProvider(raw: string): string {
  return raw.trim().toLowerCase().replace(/[\s_]+/g, '-');
}

/**
 * Canonical provider id for a user-supplied name or alias. Unknown names are
 * returned sanitized, so the registry can reject them.
 */
export function normalizeProviderId(provider?: string): string {
  const raw = (provider || '').trim();
  if (!raw) return '';
  const candidate = sanitizeProvider(raw);
  return ALIAS_TO_ID.get(candidate) || candidate;
}

export function getProviderPreset(provider?: string): ProviderPreset | null {
  const normalized = normalizeProviderId(provider);
  return PRESET_BY_ID.get(normalized) || null;
}

export function getProviderPresets(): ProviderPreset[] {
  return PRESETS.map((preset) => ({ ...preset, models: [...preset.models] }));
}

export function getDefaultModel(provider?: string): string | undefined {
  return getProviderPreset(provider)?.models[0];
}
