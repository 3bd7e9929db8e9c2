import { describe, it, expect, vi } from 'vitest';
import { ChatCompletionClassifier, isRetryable, toBaseUrl } from './chatClassifier.js';

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function completion(content: string | null) {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model: 'test-model',
    choices: [{ index: 0, finish_reason: 'stop', message: { role: 'assistant', content } }],
  };
}

const serverError = () => jsonResponse(500, { error: { message: 'upstream unavailable' } });

function scriptedFetch(responses: Array<() => Response>) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => {
    const next = responses.shift();
    if (!next) {
      throw new Error('unexpected request');
    }
    return next();
  });
}

function makeClassifier(fetch: ReturnType<typeof scriptedFetch>, maxRetries = 0) {
  const sleep = vi.fn(async (_ms: number) => {});
  const classifier = new ChatCompletionClassifier({
    apiKey: 'test-secret',
    model: 'test-model',
    endpoint: 'https://openrouter.ai/api/v1/chat/completions',
    maxRetries,
    sleep,
    fetch,
  });
  return { classifier, sleep };
}

describe('toBaseUrl', () => {
  it('accepts either the API base or the chat completions URL', () => {
    expect(toBaseUrl('https://openrouter.ai/api/v1/chat/completions')).toBe('https://openrouter.ai/api/v1');
    expect(toBaseUrl('http://localhost:8080/v1/')).toBe('http://localhost:8080/v1');
  });
});

describe('ChatCompletionClassifier', () => {
  it('posts the prompt as a single user message and returns the reply text', async () => {
    const fetch = scriptedFetch([() => jsonResponse(200, completion('[]'))]);
    const { classifier } = makeClassifier(fetch);

    await expect(classifier.classify('classify these')).resolves.toBe('[]');

    expect(fetch).toHaveBeenCalledTimes(1);
    const [input, init] = fetch.mock.calls[0] ?? [];
    expect(String(input)).toBe('https://openrouter.ai/api/v1/chat/completions');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toMatchObject({
      model: 'test-model',
      messages: [{ role: 'user', content: 'classify these' }],
    });
    const headers = new Headers(init?.headers);
    expect(headers.get('authorization')).toBe('Bearer test-secret');
    expect(headers.get('x-title')).toBe('comment-moderation-script');
    expect(headers.get('http-referer')).toBe('http://localhost');
  });

  it('fails after a single attempt by default', async () => {
    const fetch = scriptedFetch([serverError]);
    const { classifier, sleep } = makeClassifier(fetch);

    await expect(classifier.classify('x')).rejects.toThrow();
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries server errors with linear backoff', async () => {
    const fetch = scriptedFetch([serverError, serverError, () => jsonResponse(200, completion('ok'))]);
    const { classifier, sleep } = makeClassifier(fetch, 2);

    await expect(classifier.classify('x')).resolves.toBe('ok');
    expect(fetch).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[2000], [4000]]);
  });

  it('stops once the retry budget is spent', async () => {
    const fetch = scriptedFetch([serverError, serverError]);
    const { classifier } = makeClassifier(fetch, 1);

    await expect(classifier.classify('x')).rejects.toThrow();
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('does not retry client errors', async () => {
    const fetch = scriptedFetch([() => jsonResponse(400, { error: { message: 'bad model' } })]);
    const { classifier } = makeClassifier(fetch, 3);

    await expect(classifier.classify('x')).rejects.toThrow();
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('treats a reply without content as an error', async () => {
    const fetch = scriptedFetch([() => jsonResponse(200, completion(null))]);
    const { classifier } = makeClassifier(fetch);

    await expect(classifier.classify('x')).rejects.toThrow('Chat completion response did not include message content.');
  });
});

describe('isRetryable', () => {
  it('ignores plain errors', () => {
    expect(isRetryable(new Error('boom'))).toBe(false);
  });
});
