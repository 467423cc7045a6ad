/**
 * Provider factory for the local model endpoint.
 *
 * Responsibilities:
 * - Resolve the model, endpoint, credentials and request limits from the environment.
 * - Build an OpenAI-compatible provider pointed at the Ollama `/v1` API.
 *
 * Consumers:
 * - `LanguageModelClient` (textCompletion.ts) resolves its chat model through `createModelProvider()`.
 * - The CLI calls `resolveModelConfiguration()` once at startup so bad values fail fast.
 */

import { createOpenAI, type OpenAIProvider } from '@ai-sdk/openai';

import { DEFAULT_MODEL, DEFAULT_OLLAMA_URL } from '../constants.js';
import { ConfigurationError } from '../errors.js';

export interface ModelConfiguration {
  model: string;
  /** OpenAI-compatible API root, always ending in `/v1`. */
  baseURL: string;
  apiKey: string;
  timeoutMs: number | null;
  maxRetries: number | null;
}

const ENDPOINT_PATHS = /\/(?:api\/(?:chat|generate)|v1\/(?:chat\/completions|completions))\/?$/;

function firstNonEmpty(...values: Array<string | undefined>): string | null {
  for (const value of values) {
    if (typeof value === 'string' && value.trim()) {
      return value.trim();
    }
  }
  return null;
}

function resolveBaseURL(env: NodeJS.ProcessEnv): string {
  const variable = env.OLLAMA_URL?.trim() ? 'OLLAMA_URL' : 'AGENT_BASE_URL';
  const raw = firstNonEmpty(env.OLLAMA_URL, env.AGENT_BASE_URL) ?? DEFAULT_OLLAMA_URL;

  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(variable, `must be a valid URL: ${message}`);
  }

  if (ENDPOINT_PATHS.test(parsed.pathname)) {
    throw new ConfigurationError(
      variable,
      'should reference the server root (e.g., http://127.0.0.1:11434) rather than a specific endpoint.',
    );
  }

  const trimmed = raw.replace(/\/+$/, '');
  return trimmed.endsWith('/v1') ? trimmed : `${trimmed}/v1`;
}

function parseTimeout(rawValue: string | undefined): number | null {
  if (typeof rawValue === 'undefined' || rawValue.trim() === '') {
    return null;
  }

  const parsed = Number(rawValue);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError('AGENT_TIMEOUT_MS', 'must be a positive integer when provided.');
  }

  return parsed;
}

function parseMaxRetries(rawValue: string | undefined): number | null {
  if (typeof rawValue === 'undefined' || rawValue.trim() === '') {
    return null;
  }

  const parsed = Number(rawValue);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigurationError('AGENT_MAX_RETRIES', 'must be a non-negative integer when provided.');
  }

  return parsed;
}

export function resolveModelConfiguration(env: NodeJS.ProcessEnv = process.env): ModelConfiguration {
  return {
    model: firstNonEmpty(env.OLLAMA_MODEL, env.AGENT_MODEL) ?? DEFAULT_MODEL,
    baseURL: resolveBaseURL(env),
    // Ollama ignores the key, but the OpenAI provider insists on one.
    apiKey: firstNonEmpty(env.AGENT_API_KEY) ?? 'ollama',
    timeoutMs: parseTimeout(env.AGENT_TIMEOUT_MS),
    maxRetries: parseMaxRetries(env.AGENT_MAX_RETRIES),
  };
}

export function createModelProvider(configuration: ModelConfiguration): OpenAIProvider {
  const clientOptions = {
    apiKey: configuration.apiKey,
    baseURL: configuration.baseURL,
    name: 'ollama',
  } satisfies Parameters<typeof createOpenAI>[0];

  return createOpenAI(clientOptions);
}
