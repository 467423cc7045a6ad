import { describe, expect, jest, test } from '@jest/globals';

import { silentLogger } from '../../utils/logger.js';
import { resolveModelConfiguration, type ModelConfiguration } from '../client.js';
import { LanguageModelClient, type TextGenerator } from '../textCompletion.js';

const baseConfiguration = resolveModelConfiguration({});

function createClient(generate: TextGenerator, overrides: Partial<ModelConfiguration> = {}) {
  return new LanguageModelClient({
    configuration: { ...baseConfiguration, ...overrides },
    generate,
    logger: silentLogger,
  });
}

const waitForAbort: TextGenerator = ({ abortSignal }) =>
  new Promise((_resolve, reject) => {
    const signal = abortSignal;
    if (!signal) {
      reject(new Error('expected an abort signal'));
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason));
  });

describe('LanguageModelClient.complete', () => {
  test('returns the trimmed generated text', async () => {
    const generate = jest.fn<TextGenerator>().mockResolvedValue({ text: '  hello there \n' });
    const client = createClient(generate);

    await expect(client.complete({ prompt: 'hi', system: 'be brief' })).resolves.toBe('hello there');
    expect(generate).toHaveBeenCalledTimes(1);
    expect(generate.mock.calls[0]?.[0]).toMatchObject({
      prompt: 'hi',
      system: 'be brief',
      abortSignal: undefined,
      maxRetries: undefined,
    });
  });

  test('passes the configured retry limit', async () => {
    const generate = jest.fn<TextGenerator>().mockResolvedValue({ text: 'ok' });
    const client = createClient(generate, { maxRetries: 1 });

    await client.complete({ prompt: 'hi' });

    expect(generate.mock.calls[0]?.[0].maxRetries).toBe(1);
  });

  test('aborts requests that exceed the configured timeout', async () => {
    const client = createClient(waitForAbort, { timeoutMs: 20 });

    await expect(client.complete({ prompt: 'hi' })).rejects.toThrow('Model request timed out after 20ms.');
  });

  test('forwards cancellation from the caller', async () => {
    const client = createClient(waitForAbort, { timeoutMs: 5_000 });
    const controller = new AbortController();

    const pending = client.complete({ prompt: 'hi', signal: controller.signal });
    controller.abort(new Error('interrupted'));

    await expect(pending).rejects.toThrow('interrupted');
  });

  test('reports the configured model', () => {
    const client = createClient(jest.fn<TextGenerator>());

    expect(client.model).toBe('llama3.2:3b');
  });
});
