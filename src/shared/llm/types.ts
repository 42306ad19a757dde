/**
 * LLM Types
 *
 * Provider names, generation results and the capability interfaces shared by
 * the provider clients and the unified generation client.
 */

/**
 * Supported providers, in selection priority order
 */
export type ProviderName = 'anthropic' | 'openai';

export const PROVIDER_PRIORITY: readonly ProviderName[] = ['anthropic', 'openai'];

export const PROVIDER_DISPLAY_NAMES: Record<ProviderName, string> = {
  anthropic: 'Anthropic',
  openai: 'OpenAI'
};

/**
 * Failure classes a generation call can end in
 */
export type FailureKind =
  | 'configuration'
  | 'rate_limited'
  | 'invalid_request'
  | 'transient'
  | 'unexpected';

export interface GenerationFailure {
  kind: FailureKind;
  /** Short human-readable text, starting with one of FAILURE_PREFIXES */
  message: string;
}

export interface GenerationSuccess {
  ok: true;
  text: string;
  provider: ProviderName;
  model: string;
}

export interface GenerationError {
  ok: false;
  failure: GenerationFailure;
}

export type GenerationResult = GenerationSuccess | GenerationError;

/**
 * Per-call overrides of the provider's generation parameters
 */
export interface GenerateOptions {
  temperature?: number;
  maxTokens?: number;
  model?: string;
}

/**
 * Bounded generation parameters shared by both providers
 */
export interface GenerationParameters {
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export const DEFAULT_GENERATION_PARAMETERS: GenerationParameters = {
  temperature: 0.7,
  maxTokens: 1024,
  timeoutMs: 30000
};

/**
 * One external text-generation API. Implementations never throw from
 * `generate`; every failure comes back classified.
 */
export interface TextProvider {
  readonly name: ProviderName;
  generate(prompt: string, options?: GenerateOptions): Promise<GenerationResult>;
}

/**
 * The generation surface content generators depend on
 */
export interface TextGenerator {
  generateContent(prompt: string): Promise<GenerationResult>;
  generateWithRetry(prompt: string, maxAttempts?: number): Promise<GenerationResult>;
  getProviderName(): string;
}

/**
 * Credentials read from configuration; an empty string means "not configured"
 */
export interface ProviderCredentials {
  anthropicApiKey?: string;
  openaiApiKey?: string;
}

export type ProviderFactory = (apiKey: string) => TextProvider;

export type ProviderFactories = Record<ProviderName, ProviderFactory>;
