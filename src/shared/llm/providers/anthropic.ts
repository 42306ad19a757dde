/**
 * Anthropic Provider
 *
 * Primary provider. Walks an ordered model list when the preferred model is
 * rejected as unavailable, so an account without access to the newest model
 * still gets a completion from an older one.
 */

import Anthropic from '@anthropic-ai/sdk';
import { DEFAULT_ANTHROPIC_MODELS } from '../../config';
import { ErrorHandler } from '../../errors';
import { loggers } from '../../logging';
import { classifyProviderError, failure, isModelUnavailable } from '../errors';
import {
  DEFAULT_GENERATION_PARAMETERS,
  GenerateOptions,
  GenerationParameters,
  GenerationResult,
  TextProvider
} from '../types';

export interface AnthropicMessageRequest {
  model: string;
  max_tokens: number;
  temperature: number;
  messages: Array<{ role: 'user'; content: string }>;
}

export interface AnthropicMessageResponse {
  model: string;
  content: Array<{ type: string; text?: string }>;
}

/**
 * The single SDK call this provider makes
 */
export interface AnthropicTransport {
  createMessage(request: AnthropicMessageRequest): Promise<AnthropicMessageResponse>;
}

export interface AnthropicProviderOptions extends Partial<GenerationParameters> {
  apiKey: string;
  /** Ordered fallback list; the first entry is tried first */
  models?: string[];
  transport?: AnthropicTransport;
}

export function createAnthropicTransport(client: Anthropic): AnthropicTransport {
  return {
    createMessage: (request) => client.messages.create(request)
  };
}

export class AnthropicProvider implements TextProvider {
  readonly name = 'anthropic' as const;
  private readonly models: string[];
  private readonly params: GenerationParameters;
  private readonly transport: AnthropicTransport;

  constructor(options: AnthropicProviderOptions) {
    if (!options.apiKey) {
      throw ErrorHandler.createConfigurationError(
        'Anthropic API key is not configured',
        'ANTHROPIC_API_KEY is empty'
      );
    }

    this.models = options.models && options.models.length > 0
      ? [...options.models]
      : [...DEFAULT_ANTHROPIC_MODELS];
    this.params = {
      temperature: options.temperature ?? DEFAULT_GENERATION_PARAMETERS.temperature,
      maxTokens: options.maxTokens ?? DEFAULT_GENERATION_PARAMETERS.maxTokens,
      timeoutMs: options.timeoutMs ?? DEFAULT_GENERATION_PARAMETERS.timeoutMs
    };
    // SDK retries are off: the unified client owns the retry policy
    this.transport = options.transport ?? createAnthropicTransport(
      new Anthropic({ apiKey: options.apiKey, timeout: this.params.timeoutMs, maxRetries: 0 })
    );
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<GenerationResult> {
    const models = options.model
      ? [options.model, ...this.models.filter(model => model !== options.model)]
      : this.models;
    const rejected: string[] = [];

    for (const model of models) {
      try {
        const response = await this.transport.createMessage({
          model,
          max_tokens: options.maxTokens ?? this.params.maxTokens,
          temperature: options.temperature ?? this.params.temperature,
          messages: [{ role: 'user', content: prompt }]
        });

        const text = response.content
          .filter(block => block.type === 'text')
          .map(block => block.text ?? '')
          .join('')
          .trim();

        if (!text) {
          return failure('transient', 'An error occurred: the model returned no content');
        }

        return { ok: true, text, provider: this.name, model: response.model || model };
      } catch (error) {
        if (isModelUnavailable(error)) {
          loggers.llm.warn({ model }, 'Anthropic model unavailable, trying next model');
          rejected.push(model);
          continue;
        }

        const classified = classifyProviderError(error);
        loggers.llm.warn({ model, kind: classified.kind }, classified.message);
        return { ok: false, failure: classified };
      }
    }

    return failure(
      'invalid_request',
      `Invalid request: none of the configured models are available (${rejected.join(', ')})`
    );
  }
}
