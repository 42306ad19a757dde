/**
 * Provider Error Classification
 *
 * Maps whatever an SDK call throws onto the failure classes the retry loop
 * and the UI understand. Messages keep stable prefixes so callers can
 * pattern-match on them.
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { FailureKind, GenerationError, GenerationFailure } from './types';

export const FAILURE_MESSAGES = {
  configuration: 'No AI provider configured. Please set ANTHROPIC_API_KEY or OPENAI_API_KEY.',
  rateLimited: 'Rate limit exceeded. Please wait a moment and try again.',
  invalidApiKey: 'Invalid API key. Please check your configuration.',
  timeout: 'Request timed out. Please try again.',
  connection: 'Connection error. Please check your internet connection.'
} as const;

/**
 * Every failure message starts with one of these
 */
export const FAILURE_PREFIXES = [
  'No AI provider configured',
  'Rate limit',
  'Invalid',
  'Request timed out',
  'Connection error',
  'An error occurred',
  'Unexpected error'
] as const;

const RETRYABLE_KINDS: ReadonlySet<FailureKind> = new Set<FailureKind>(['rate_limited', 'transient']);

export function isRetryableFailure(failure: GenerationFailure): boolean {
  return RETRYABLE_KINDS.has(failure.kind);
}

/**
 * True when a piece of text is a failure message rather than generated content
 */
export function isFailureMessage(text: string): boolean {
  return FAILURE_PREFIXES.some(prefix => text.startsWith(prefix));
}

export function failure(kind: FailureKind, message: string): GenerationError {
  return { ok: false, failure: { kind, message } };
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * HTTP status carried by an SDK error (or anything shaped like one)
 */
export function statusOf(error: unknown): number | undefined {
  if (error instanceof Anthropic.APIError || error instanceof OpenAI.APIError) {
    return error.status;
  }
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const status = error.status;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

function isTimeout(error: unknown): boolean {
  if (error instanceof Anthropic.APIConnectionTimeoutError || error instanceof OpenAI.APIConnectionTimeoutError) {
    return true;
  }
  return error instanceof Error && /timed? ?out/i.test(error.message);
}

function isConnectionFailure(error: unknown): boolean {
  if (error instanceof Anthropic.APIConnectionError || error instanceof OpenAI.APIConnectionError) {
    return true;
  }
  return error instanceof Error && /ECONNREFUSED|ENOTFOUND|ECONNRESET|fetch failed/i.test(error.message);
}

/**
 * Whether the request was rejected because the requested model is not
 * available to this account or does not exist
 */
export function isModelUnavailable(error: unknown): boolean {
  const status = statusOf(error);
  if (status === 404) return true;
  if (status === 400) {
    const message = errorMessage(error);
    return /model/i.test(message) && /not found|not supported|unavailable|does not exist|invalid model/i.test(message);
  }
  return false;
}

/**
 * Classify a thrown provider error
 */
export function classifyProviderError(error: unknown): GenerationFailure {
  const status = statusOf(error);
  const message = errorMessage(error);

  if (status === 429 || /quota|rate.?limit|resource.?exhausted/i.test(message)) {
    return { kind: 'rate_limited', message: FAILURE_MESSAGES.rateLimited };
  }

  if (status === 401 || status === 403) {
    return { kind: 'invalid_request', message: FAILURE_MESSAGES.invalidApiKey };
  }

  if (status === 400 || status === 404 || status === 413 || status === 422) {
    return { kind: 'invalid_request', message: `Invalid request: ${message}` };
  }

  if (status === undefined) {
    if (isTimeout(error)) {
      return { kind: 'transient', message: FAILURE_MESSAGES.timeout };
    }
    if (isConnectionFailure(error)) {
      return { kind: 'transient', message: FAILURE_MESSAGES.connection };
    }
    if (/api.?key/i.test(message)) {
      return { kind: 'invalid_request', message: FAILURE_MESSAGES.invalidApiKey };
    }
  }

  // 408, 409, 5xx, 529 (overloaded) and anything unrecognized
  return { kind: 'transient', message: `An error occurred: ${message}` };
}
