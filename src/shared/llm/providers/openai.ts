/**
 * OpenAI Provider
 *
 * Secondary provider over the chat completions API. Works against any
 * OpenAI-compatible endpoint (OpenRouter, a local gateway) through `baseURL`.
 */

import OpenAI from 'openai';
import { DEFAULT_OPENAI_MODEL } from '../../config';
import { ErrorHandler } from '../../errors';
import { loggers } from '../../logging';
import { classifyProviderError, failure } from '../errors';
import {
  DEFAULT_GENERATION_PARAMETERS,
  GenerateOptions,
  GenerationParameters,
  GenerationResult,
  TextProvider
} from '../types';

export interface ChatCompletionRequest {
  model: string;
  max_tokens: number;
  temperature: number;
  messages: Array<{ role: 'user'; content: string }>;
}

export interface ChatCompletionResponse {
  model: string;
  choices: Array<{ message: { content: string | null } }>;
}

export interface ChatTransport {
  createChatCompletion(request: ChatCompletionRequest): Promise<ChatCompletionResponse>;
}

export interface OpenAIProviderOptions extends Partial<GenerationParameters> {
  apiKey: string;
  model?: string;
  baseURL?: string | null;
  transport?: ChatTransport;
}

export function createChatTransport(client: OpenAI): ChatTransport {
  return {
    createChatCompletion: (request) => client.chat.completions.create(request)
  };
}

export class OpenAIProvider implements TextProvider {
  readonly name = 'openai' as const;
  private readonly model: string;
  private readonly params: GenerationParameters;
  private readonly transport: ChatTransport;

  constructor(options: OpenAIProviderOptions) {
    if (!options.apiKey) {
      throw ErrorHandler.createConfigurationError(
        'OpenAI API key is not configured',
        'OPENAI_API_KEY is empty'
      );
    }

    this.model = options.model || DEFAULT_OPENAI_MODEL;
    this.params = {
      temperature: options.temperature ?? DEFAULT_GENERATION_PARAMETERS.temperature,
      maxTokens: options.maxTokens ?? DEFAULT_GENERATION_PARAMETERS.maxTokens,
      timeoutMs: options.timeoutMs ?? DEFAULT_GENERATION_PARAMETERS.timeoutMs
    };
    this.transport = options.transport ?? createChatTransport(
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL ?? undefined,
        timeout: this.params.timeoutMs,
        maxRetries: 0
      })
    );
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<GenerationResult> {
    const model = options.model ?? this.model;

    try {
      const response = await this.transport.createChatCompletion({
        model,
        max_tokens: options.maxTokens ?? this.params.maxTokens,
        temperature: options.temperature ?? this.params.temperature,
        messages: [{ role: 'user', content: prompt }]
      });

      const text = (response.choices[0]?.message.content ?? '').trim();
      if (!text) {
        return failure('transient', 'An error occurred: the model returned no content');
      }

      return { ok: true, text, provider: this.name, model: response.model || model };
    } catch (error) {
      const classified = classifyProviderError(error);
      loggers.llm.warn({ model, kind: classified.kind }, classified.message);
      return { ok: false, failure: classified };
    }
  }
}
