/**
 * Assistant provider settings.
 *
 * Values come from the local store (`askerp settings set`) and fall back to
 * environment variables. Nothing here is cached globally: callers that want
 * caching hold a SettingsCache with an explicit TTL.
 */

export const PROVIDERS = {
  OpenAI: {
    defaultModel: 'gpt-4o-mini',
    models: ['gpt-4o-mini', 'gpt-4o', 'gpt-4-turbo', 'gpt-3.5-turbo'],
    requiresBaseUrl: false,
  },
  DeepSeek: {
    defaultModel: 'deepseek-chat',
    models: ['deepseek-chat', 'deepseek-reasoner'],
    requiresBaseUrl: true,
  },
} as const;

export type ProviderName = keyof typeof PROVIDERS;

export interface AssistantSettings {
  provider: ProviderName;
  apiKey?: string;
  model: string;
  baseUrl?: string;
  temperature: number;
}

/** Raw values as kept in the local store's settings table */
export type StoredSettings = Partial<Record<SettingKey, string>>;

export const SETTING_KEYS = ['provider', 'api_key', 'model', 'base_url', 'temperature'] as const;
export type SettingKey = (typeof SETTING_KEYS)[number];

export const DEFAULT_TEMPERATURE = 0.1;

export function isProviderName(value: string): value is ProviderName {
  return Object.hasOwn(PROVIDERS, value);
}

export function isSettingKey(value: string): value is SettingKey {
  return SETTING_KEYS.some((k) => k === value);
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Merge stored settings over the environment. Throws on an unknown provider
 * or a temperature that is not a number in [0, 2].
 */
export function resolveSettings(
  stored: StoredSettings = {},
  env: NodeJS.ProcessEnv = process.env,
): AssistantSettings {
  const providerRaw = nonEmpty(stored.provider) ?? nonEmpty(env.ASKERP_PROVIDER) ?? 'OpenAI';
  if (!isProviderName(providerRaw)) {
    throw new Error(
      `Unknown provider "${providerRaw}". Expected one of: ${Object.keys(PROVIDERS).join(', ')}.`,
    );
  }
  const provider = providerRaw;

  const tempRaw = nonEmpty(stored.temperature) ?? nonEmpty(env.ASKERP_TEMPERATURE);
  const temperature = tempRaw === undefined ? DEFAULT_TEMPERATURE : Number(tempRaw);
  if (!Number.isFinite(temperature) || temperature < 0 || temperature > 2) {
    throw new Error(`Invalid temperature "${tempRaw}". Expected a number between 0 and 2.`);
  }

  return {
    provider,
    apiKey: nonEmpty(stored.api_key) ?? nonEmpty(env.ASKERP_API_KEY) ?? nonEmpty(env.OPENAI_API_KEY),
    model: nonEmpty(stored.model) ?? nonEmpty(env.ASKERP_MODEL) ?? PROVIDERS[provider].defaultModel,
    baseUrl: nonEmpty(stored.base_url) ?? nonEmpty(env.ASKERP_BASE_URL),
    temperature,
  };
}

/** Problems that keep the settings from reaching a provider; empty when usable */
export function validateProviderSettings(settings: AssistantSettings): string[] {
  const problems: string[] = [];
  const provider = PROVIDERS[settings.provider];

  if (!settings.apiKey) {
    problems.push(
      `${settings.provider} API key is not configured. ` +
        'Run `askerp settings set api_key <key>` or set ASKERP_API_KEY.',
    );
  }
  if (!provider.models.some((m) => m === settings.model)) {
    problems.push(
      `Model "${settings.model}" is not available for ${settings.provider}. ` +
        `Choose one of: ${provider.models.join(', ')}.`,
    );
  }
  if (provider.requiresBaseUrl && !settings.baseUrl) {
    problems.push(`${settings.provider} requires a base URL (settings key base_url or ASKERP_BASE_URL).`);
  }
  return problems;
}

export interface SettingsCacheOptions {
  ttlMs: number;
  /** Clock in epoch milliseconds; Date.now by default */
  now?: () => number;
}

/**
 * Holds one loaded value for `ttlMs`, then loads again on next access.
 */
export class SettingsCache<T> {
  private value: T | undefined;
  private loadedAt = 0;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(
    private readonly load: () => T,
    options: SettingsCacheOptions,
  ) {
    if (!(options.ttlMs >= 0)) {
      throw new Error(`ttlMs must be a non-negative number, got ${options.ttlMs}`);
    }
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  get(): T {
    const now = this.now();
    if (this.value === undefined || now - this.loadedAt >= this.ttlMs) {
      this.value = this.load();
      this.loadedAt = now;
    }
    return this.value;
  }

  invalidate(): void {
    this.value = undefined;
  }
}
