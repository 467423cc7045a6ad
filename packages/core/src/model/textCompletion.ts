import { generateText, type LanguageModel } from 'ai';

import { createLogger, type Logger } from '../utils/logger.js';
import { createModelProvider, type ModelConfiguration } from './client.js';

export interface CompletionRequest {
  prompt: string;
  system?: string;
  signal?: AbortSignal;
}

/** Anything that turns a prompt into text; the decision engine and CLI depend on this. */
export interface TextCompleter {
  complete(request: CompletionRequest): Promise<string>;
}

export interface TextGenerationOptions {
  model: LanguageModel;
  prompt: string;
  system?: string;
  abortSignal?: AbortSignal;
  maxRetries?: number;
}

export type TextGenerator = (options: TextGenerationOptions) => Promise<{ text: string }>;

const generateWithAiSdk: TextGenerator = async ({ model, prompt, system, abortSignal, maxRetries }) => {
  const result = await generateText({ model, prompt, system, abortSignal, maxRetries });
  return { text: typeof result.text === 'string' ? result.text : '' };
};

export interface LanguageModelClientOptions {
  configuration: ModelConfiguration;
  /** Defaults to the chat model of the configured OpenAI-compatible provider. */
  languageModel?: LanguageModel;
  generate?: TextGenerator;
  logger?: Logger;
}

interface ScopedSignal {
  signal: AbortSignal | undefined;
  dispose: () => void;
}

function scopeSignal(signal: AbortSignal | undefined, timeoutMs: number | null): ScopedSignal {
  if (timeoutMs === null) {
    return { signal, dispose: () => {} };
  }

  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new Error(`Model request timed out after ${timeoutMs}ms.`));
  }, timeoutMs);
  const forward = () => controller.abort(signal?.reason);

  if (signal?.aborted) {
    forward();
  } else {
    signal?.addEventListener('abort', forward, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forward);
    },
  };
}

export class LanguageModelClient implements TextCompleter {
  readonly configuration: ModelConfiguration;

  private readonly languageModel: LanguageModel;

  private readonly generate: TextGenerator;

  private readonly logger: Logger;

  constructor({ configuration, languageModel, generate = generateWithAiSdk, logger }: LanguageModelClientOptions) {
    this.configuration = configuration;
    this.languageModel = languageModel ?? createModelProvider(configuration).chat(configuration.model);
    this.generate = generate;
    this.logger = logger ?? createLogger('model');
  }

  get model(): string {
    return this.configuration.model;
  }

  async complete({ prompt, system, signal }: CompletionRequest): Promise<string> {
    const scoped = scopeSignal(signal, this.configuration.timeoutMs);
    const startedAt = Date.now();

    try {
      const { text } = await this.generate({
        model: this.languageModel,
        prompt,
        system,
        abortSignal: scoped.signal,
        maxRetries: this.configuration.maxRetries ?? undefined,
      });
      this.logger.debug(`${this.model} answered in ${Date.now() - startedAt}ms (${text.length} chars).`);
      return text.trim();
    } finally {
      scoped.dispose();
    }
  }
}
