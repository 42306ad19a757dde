/**
 * Generation Client
 *
 * Unified client over the configured providers. Picks one provider at
 * construction time (Anthropic first, then OpenAI) and applies the retry
 * policy to every call. Never throws: with no provider configured every
 * call returns the configuration failure without touching the network.
 */

import { config } from '../config';
import { loggers, serializeError } from '../logging';
import { FAILURE_MESSAGES, failure } from './errors';
import { AnthropicProvider, OpenAIProvider } from './providers';
import { DEFAULT_RETRY_POLICY, retryGeneration, RetryPolicy, sleep, Sleep } from './retry';
import {
  GenerateOptions,
  GenerationResult,
  PROVIDER_DISPLAY_NAMES,
  PROVIDER_PRIORITY,
  ProviderCredentials,
  ProviderFactories,
  ProviderName,
  TextGenerator,
  TextProvider
} from './types';

export interface GenerationClientOptions {
  credentials: ProviderCredentials;
  /** Provider constructors keyed by name; defaults build the SDK-backed providers */
  factories?: Partial<ProviderFactories>;
  retry?: Partial<RetryPolicy>;
  sleep?: Sleep;
  /** Default per-call options forwarded to the provider */
  generateOptions?: GenerateOptions;
}

function credentialFor(name: ProviderName, credentials: ProviderCredentials): string {
  const key = name === 'anthropic' ? credentials.anthropicApiKey : credentials.openaiApiKey;
  return (key ?? '').trim();
}

export function createDefaultFactories(): ProviderFactories {
  const { anthropic, openai, generation } = config.llm;
  return {
    anthropic: (apiKey) => new AnthropicProvider({ apiKey, models: anthropic.models, ...generation }),
    openai: (apiKey) => new OpenAIProvider({
      apiKey,
      model: openai.model,
      baseURL: openai.baseURL,
      ...generation
    })
  };
}

/**
 * Pick the first provider in priority order that has a credential and can
 * be constructed. Returns null when none can.
 */
export function selectProvider(
  credentials: ProviderCredentials,
  factories: ProviderFactories
): TextProvider | null {
  for (const name of PROVIDER_PRIORITY) {
    const apiKey = credentialFor(name, credentials);
    if (!apiKey) continue;

    try {
      return factories[name](apiKey);
    } catch (error) {
      loggers.llm.error(
        { provider: name, error: serializeError(error) },
        'Failed to initialize provider, trying the next one'
      );
    }
  }
  return null;
}

export class GenerationClient implements TextGenerator {
  private readonly provider: TextProvider | null;
  private readonly policy: RetryPolicy;
  private readonly wait: Sleep;
  private readonly generateOptions: GenerateOptions;

  constructor(options: GenerationClientOptions) {
    const factories: ProviderFactories = { ...createDefaultFactories(), ...options.factories };
    this.provider = selectProvider(options.credentials, factories);
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.wait = options.sleep ?? sleep;
    this.generateOptions = options.generateOptions ?? {};

    if (this.provider) {
      loggers.llm.info({ provider: this.provider.name }, 'Generation provider selected');
    } else {
      loggers.llm.warn('No generation provider configured');
    }
  }

  isAvailable(): boolean {
    return this.provider !== null;
  }

  /**
   * Display name of the active provider, or "None"
   */
  getProviderName(): string {
    return this.provider ? PROVIDER_DISPLAY_NAMES[this.provider.name] : 'None';
  }

  /**
   * One attempt, no retry
   */
  async generateContent(prompt: string): Promise<GenerationResult> {
    if (!this.provider) {
      return failure('configuration', FAILURE_MESSAGES.configuration);
    }
    return this.provider.generate(prompt, this.generateOptions);
  }

  async generateWithRetry(
    prompt: string,
    maxAttempts: number = this.policy.maxAttempts
  ): Promise<GenerationResult> {
    const provider = this.provider;
    if (!provider) {
      return failure('configuration', FAILURE_MESSAGES.configuration);
    }

    return retryGeneration(
      () => provider.generate(prompt, this.generateOptions),
      { ...this.policy, maxAttempts },
      this.wait
    );
  }
}

/**
 * Build a client from the loaded environment configuration
 */
export function createGenerationClientFromEnv(): GenerationClient {
  return new GenerationClient({
    credentials: {
      anthropicApiKey: config.llm.anthropic.apiKey,
      openaiApiKey: config.llm.openai.apiKey
    },
    retry: config.llm.retry
  });
}
