/**
 * Environment Configuration
 *
 * Loads environment variables once and exposes a typed configuration object.
 * Malformed numeric values fail fast. Missing LLM credentials do not: the
 * generation client reports the "no provider" state instead.
 *
 * Usage:
 *   import { config } from '../shared/config';
 *   console.log(config.llm.anthropic.models);
 */

import 'dotenv/config';

// =============================================================================
// Types
// =============================================================================

export type NodeEnv = 'development' | 'production' | 'test';

export interface ServerConfig {
  port: number;
  nodeEnv: NodeEnv;
  isDevelopment: boolean;
  isProduction: boolean;
  isTest: boolean;
  logLevel: string;
}

export interface DatabaseConfig {
  /** SQLite file path, or ':memory:' */
  path: string;
}

export interface AnthropicSettings {
  apiKey: string;
  /** Ordered fallback list, first entry is the preferred model */
  models: string[];
}

export interface OpenAISettings {
  apiKey: string;
  model: string;
  /** Any OpenAI-compatible endpoint (e.g. OpenRouter); null for api.openai.com */
  baseURL: string | null;
}

export interface GenerationSettings {
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export interface RetrySettings {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface LLMConfig {
  anthropic: AnthropicSettings;
  openai: OpenAISettings;
  generation: GenerationSettings;
  retry: RetrySettings;
  hasAnthropicKey: boolean;
  hasOpenaiKey: boolean;
}

export interface CorsConfig {
  origins: string[];
}

export interface Config {
  server: ServerConfig;
  database: DatabaseConfig;
  llm: LLMConfig;
  cors: CorsConfig;
}

export const DEFAULT_ANTHROPIC_MODELS = [
  'claude-sonnet-4-20250514',
  'claude-3-7-sonnet-20250219',
  'claude-3-5-haiku-20241022',
];

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

// =============================================================================
// Validation Helpers
// =============================================================================

class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string): string {
  return (env[key] || '').trim();
}

function getEnvWithDefault(env: Env, key: string, defaultValue: string): string {
  return getEnv(env, key) || defaultValue;
}

/**
 * Get a numeric environment variable
 */
function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = getEnv(env, key);
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(
      `Invalid numeric value for ${key}: "${value}". Expected a number.`
    );
  }
  return parsed;
}

/**
 * Parse a comma-separated list, dropping blanks
 */
function parseList(value: string): string[] {
  if (!value) return [];
  return value.split(',').map(item => item.trim()).filter(Boolean);
}

function parseNodeEnv(value: string): NodeEnv {
  const valid: NodeEnv[] = ['development', 'production', 'test'];
  const match = valid.find(candidate => candidate === value);
  return match ?? 'development';
}

function defaultLogLevel(nodeEnv: NodeEnv): string {
  if (nodeEnv === 'test') return 'silent';
  return nodeEnv === 'development' ? 'debug' : 'info';
}

// =============================================================================
// Configuration Loader
// =============================================================================

/**
 * Build a configuration object from an environment map.
 * Exposed so tests and tools can load a configuration without touching process.env.
 */
export function loadConfig(env: Env = process.env): Config {
  const nodeEnv = parseNodeEnv(getEnvWithDefault(env, 'NODE_ENV', 'development'));

  const anthropicApiKey = getEnv(env, 'ANTHROPIC_API_KEY');
  const openaiApiKey = getEnv(env, 'OPENAI_API_KEY');
  const anthropicModels = parseList(getEnv(env, 'ANTHROPIC_MODELS'));

  const maxAttempts = getEnvNumber(env, 'LLM_MAX_ATTEMPTS', 3);
  if (maxAttempts < 1) {
    throw new ConfigurationError(`LLM_MAX_ATTEMPTS must be at least 1, got ${maxAttempts}`);
  }

  return {
    server: {
      port: getEnvNumber(env, 'PORT', 3001),
      nodeEnv,
      isDevelopment: nodeEnv === 'development',
      isProduction: nodeEnv === 'production',
      isTest: nodeEnv === 'test',
      logLevel: getEnvWithDefault(env, 'LOG_LEVEL', defaultLogLevel(nodeEnv)),
    },

    database: {
      path: getEnvWithDefault(env, 'DATABASE_PATH', './data/resumes.db'),
    },

    llm: {
      anthropic: {
        apiKey: anthropicApiKey,
        models: anthropicModels.length > 0 ? anthropicModels : [...DEFAULT_ANTHROPIC_MODELS],
      },
      openai: {
        apiKey: openaiApiKey,
        model: getEnvWithDefault(env, 'OPENAI_MODEL', DEFAULT_OPENAI_MODEL),
        baseURL: getEnv(env, 'OPENAI_BASE_URL') || null,
      },
      generation: {
        temperature: getEnvNumber(env, 'LLM_TEMPERATURE', 0.7),
        maxTokens: getEnvNumber(env, 'LLM_MAX_TOKENS', 1024),
        timeoutMs: getEnvNumber(env, 'LLM_TIMEOUT_MS', 30000),
      },
      retry: {
        maxAttempts,
        baseDelayMs: getEnvNumber(env, 'LLM_BASE_DELAY_MS', 1000),
        maxDelayMs: getEnvNumber(env, 'LLM_MAX_DELAY_MS', 30000),
      },
      hasAnthropicKey: !!anthropicApiKey,
      hasOpenaiKey: !!openaiApiKey,
    },

    cors: {
      origins: parseList(
        getEnvWithDefault(env, 'CORS_ORIGINS', 'http://localhost:5173,http://localhost:3000')
      ),
    },
  };
}

// =============================================================================
// Export
// =============================================================================

/**
 * Application configuration loaded from environment variables at import time.
 */
export const config: Config = loadConfig();

export { ConfigurationError };
