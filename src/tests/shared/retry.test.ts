/**
 * Tests for the retry policy and the unified generation client
 */

import { describe, it, expect, vi } from 'vitest';
import {
  computeBackoffDelay,
  DEFAULT_RETRY_POLICY,
  failure,
  FAILURE_MESSAGES,
  GenerationClient,
  GenerationResult,
  ProviderName,
  retryGeneration,
  TextProvider
} from '../../shared/llm';

const success: GenerationResult = { ok: true, text: 'Generated text', provider: 'anthropic', model: 'test-model' };

/**
 * Provider that replays `results` in order, repeating the last one
 */
function scriptedProvider(name: ProviderName, results: GenerationResult[]) {
  const prompts: string[] = [];
  const provider: TextProvider = {
    name,
    generate: async (prompt: string) => {
      prompts.push(prompt);
      return results[Math.min(prompts.length, results.length) - 1];
    }
  };
  return { provider, prompts };
}

function recordingSleep() {
  const delays: number[] = [];
  const sleep = async (ms: number) => {
    delays.push(ms);
  };
  return { sleep, delays };
}

describe('computeBackoffDelay', () => {
  it('should double the delay after each failed attempt', () => {
    expect(computeBackoffDelay(DEFAULT_RETRY_POLICY, 1)).toBe(1000);
    expect(computeBackoffDelay(DEFAULT_RETRY_POLICY, 2)).toBe(2000);
    expect(computeBackoffDelay(DEFAULT_RETRY_POLICY, 3)).toBe(4000);
  });

  it('should cap the delay at maxDelayMs', () => {
    expect(computeBackoffDelay(DEFAULT_RETRY_POLICY, 6)).toBe(30000);
    expect(computeBackoffDelay({ ...DEFAULT_RETRY_POLICY, maxDelayMs: 1500 }, 2)).toBe(1500);
  });
});

describe('retryGeneration', () => {
  it('should sleep 1s then 2s and return the last failure after three rate-limited attempts', async () => {
    const { sleep, delays } = recordingSleep();
    const lastFailure = failure('rate_limited', FAILURE_MESSAGES.rateLimited);
    const operation = vi.fn(async () => lastFailure);

    const result = await retryGeneration(operation, DEFAULT_RETRY_POLICY, sleep);

    expect(result).toBe(lastFailure);
    expect(operation).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it('should stop retrying once an attempt succeeds', async () => {
    const { sleep, delays } = recordingSleep();
    const results: GenerationResult[] = [failure('transient', 'An error occurred: overloaded'), success];
    let attempt = 0;

    const result = await retryGeneration(async () => results[attempt++], DEFAULT_RETRY_POLICY, sleep);

    expect(result).toEqual(success);
    expect(attempt).toBe(2);
    expect(delays).toEqual([1000]);
  });

  it('should succeed on the third attempt after two rate-limited failures', async () => {
    const { sleep, delays } = recordingSleep();
    const rateLimited = failure('rate_limited', FAILURE_MESSAGES.rateLimited);
    const results: GenerationResult[] = [rateLimited, rateLimited, success];
    let attempt = 0;

    const result = await retryGeneration(async () => results[attempt++], DEFAULT_RETRY_POLICY, sleep);

    expect(result).toEqual(success);
    expect(attempt).toBe(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it.each([
    ['invalid_request', 'Invalid request: bad input'],
    ['configuration', FAILURE_MESSAGES.configuration],
    ['unexpected', 'Unexpected error: boom']
  ] as const)('should return a %s failure without retrying', async (kind, message) => {
    const { sleep, delays } = recordingSleep();
    const operation = vi.fn(async () => failure(kind, message));

    const result = await retryGeneration(operation, DEFAULT_RETRY_POLICY, sleep);

    expect(result).toEqual({ ok: false, failure: { kind, message } });
    expect(operation).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('should pass the 1-based attempt number to the operation', async () => {
    const { sleep } = recordingSleep();
    const attempts: number[] = [];

    await retryGeneration(async (attempt) => {
      attempts.push(attempt);
      return failure('transient', 'An error occurred: overloaded');
    }, DEFAULT_RETRY_POLICY, sleep);

    expect(attempts).toEqual([1, 2, 3]);
  });
});

describe('GenerationClient', () => {
  describe('provider selection', () => {
    it('should report "None" and never build a provider without credentials', async () => {
      const anthropic = vi.fn((_apiKey: string) => scriptedProvider('anthropic', [success]).provider);
      const openai = vi.fn((_apiKey: string) => scriptedProvider('openai', [success]).provider);

      const client = new GenerationClient({ credentials: {}, factories: { anthropic, openai } });

      expect(client.getProviderName()).toBe('None');
      expect(client.isAvailable()).toBe(false);
      expect(anthropic).not.toHaveBeenCalled();
      expect(openai).not.toHaveBeenCalled();
    });

    it('should return the configuration failure with zero provider calls', async () => {
      const { sleep, delays } = recordingSleep();
      const client = new GenerationClient({ credentials: { anthropicApiKey: '  ', openaiApiKey: '' }, sleep });

      expect(await client.generateContent('prompt')).toEqual({
        ok: false,
        failure: {
          kind: 'configuration',
          message: 'No AI provider configured. Please set ANTHROPIC_API_KEY or OPENAI_API_KEY.'
        }
      });
      expect(await client.generateWithRetry('prompt')).toEqual(failure('configuration', FAILURE_MESSAGES.configuration));
      expect(delays).toEqual([]);
    });

    it('should prefer Anthropic when both credentials are present', () => {
      const anthropic = vi.fn((_apiKey: string) => scriptedProvider('anthropic', [success]).provider);
      const openai = vi.fn((_apiKey: string) => scriptedProvider('openai', [success]).provider);

      const client = new GenerationClient({
        credentials: { anthropicApiKey: 'test-anthropic-key', openaiApiKey: 'test-openai-key' },
        factories: { anthropic, openai }
      });

      expect(client.getProviderName()).toBe('Anthropic');
      expect(anthropic).toHaveBeenCalledWith('test-anthropic-key');
      expect(openai).not.toHaveBeenCalled();
    });

    it('should use OpenAI when only its credential is present', () => {
      const openai = vi.fn((_apiKey: string) => scriptedProvider('openai', [success]).provider);

      const client = new GenerationClient({
        credentials: { openaiApiKey: 'test-openai-key' },
        factories: { openai }
      });

      expect(client.getProviderName()).toBe('OpenAI');
      expect(client.isAvailable()).toBe(true);
    });

    it('should fall through to OpenAI when the Anthropic provider cannot be built', () => {
      const client = new GenerationClient({
        credentials: { anthropicApiKey: 'test-anthropic-key', openaiApiKey: 'test-openai-key' },
        factories: {
          anthropic: () => {
            throw new Error('SDK failed to load');
          },
          openai: () => scriptedProvider('openai', [success]).provider
        }
      });

      expect(client.getProviderName()).toBe('OpenAI');
    });
  });

  describe('generateWithRetry', () => {
    it('should retry transient failures with 1s and 2s backoff', async () => {
      const { sleep, delays } = recordingSleep();
      const lastFailure = failure('transient', FAILURE_MESSAGES.timeout);
      const { provider, prompts } = scriptedProvider('anthropic', [lastFailure]);
      const client = new GenerationClient({
        credentials: { anthropicApiKey: 'test-key' },
        factories: { anthropic: () => provider },
        sleep
      });

      const result = await client.generateWithRetry('Write a summary');

      expect(result).toBe(lastFailure);
      expect(prompts).toEqual(['Write a summary', 'Write a summary', 'Write a summary']);
      expect(delays).toEqual([1000, 2000]);
    });

    it('should not sleep at all for an invalid request', async () => {
      const { sleep, delays } = recordingSleep();
      const { provider, prompts } = scriptedProvider('openai', [failure('invalid_request', FAILURE_MESSAGES.invalidApiKey)]);
      const client = new GenerationClient({
        credentials: { openaiApiKey: 'test-key' },
        factories: { openai: () => provider },
        sleep
      });

      const result = await client.generateWithRetry('prompt');

      expect(result).toEqual(failure('invalid_request', 'Invalid API key. Please check your configuration.'));
      expect(prompts).toHaveLength(1);
      expect(delays).toEqual([]);
    });

    it('should honour an explicit attempt count and the configured ceiling', async () => {
      const { sleep, delays } = recordingSleep();
      const { provider, prompts } = scriptedProvider('anthropic', [failure('rate_limited', FAILURE_MESSAGES.rateLimited)]);
      const client = new GenerationClient({
        credentials: { anthropicApiKey: 'test-key' },
        factories: { anthropic: () => provider },
        retry: { baseDelayMs: 10, maxDelayMs: 25 },
        sleep
      });

      await client.generateWithRetry('prompt', 5);

      expect(prompts).toHaveLength(5);
      expect(delays).toEqual([10, 20, 25, 25]);
    });

    it('should make a single attempt through generateContent', async () => {
      const { sleep, delays } = recordingSleep();
      const { provider, prompts } = scriptedProvider('anthropic', [failure('transient', FAILURE_MESSAGES.connection), success]);
      const client = new GenerationClient({
        credentials: { anthropicApiKey: 'test-key' },
        factories: { anthropic: () => provider },
        sleep
      });

      const result = await client.generateContent('prompt');

      expect(result).toEqual(failure('transient', 'Connection error. Please check your internet connection.'));
      expect(prompts).toHaveLength(1);
      expect(delays).toEqual([]);
    });
  });
});
