import OpenAI, { type ClientOptions } from 'openai';
import { DEFAULT_ENDPOINT } from '../config.js';
import type { Logger } from '../utils/logger.js';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep.js';

export interface CommentClassifier {
  /** Sends one prompt and resolves with the model's raw reply text. */
  classify(prompt: string): Promise<string>;
}

export interface ChatCompletionClassifierOptions {
  apiKey: string;
  model: string;
  endpoint?: string;
  maxRetries?: number;
  retryBackoffMs?: number;
  requestTimeoutMs?: number | undefined;
  referer?: string;
  title?: string;
  logger?: Logger;
  sleep?: Sleep;
  fetch?: ClientOptions['fetch'];
}

const CHAT_COMPLETIONS_SUFFIX = /\/chat\/completions\/?$/;

export function toBaseUrl(endpoint: string): string {
  return endpoint.trim().replace(CHAT_COMPLETIONS_SUFFIX, '').replace(/\/+$/, '');
}

export class ChatCompletionClassifier implements CommentClassifier {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly maxRetries: number;
  private readonly retryBackoffMs: number;
  private readonly logger: Logger | undefined;
  private readonly sleep: Sleep;

  constructor(options: ChatCompletionClassifierOptions) {
    this.model = options.model;
    this.maxRetries = options.maxRetries ?? 0;
    this.retryBackoffMs = options.retryBackoffMs ?? 2000;
    this.logger = options.logger;
    this.sleep = options.sleep ?? defaultSleep;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: toBaseUrl(options.endpoint ?? DEFAULT_ENDPOINT),
      // retries are handled here so the backoff is visible in the logs
      maxRetries: 0,
      ...(options.requestTimeoutMs !== undefined ? { timeout: options.requestTimeoutMs } : {}),
      ...(options.fetch ? { fetch: options.fetch } : {}),
      defaultHeaders: {
        'HTTP-Referer': options.referer ?? 'http://localhost',
        'X-Title': options.title ?? 'comment-moderation-script',
      },
    });
  }

  async classify(prompt: string): Promise<string> {
    for (let attempt = 0; ; attempt += 1) {
      try {
        return await this.request(prompt);
      } catch (error) {
        if (attempt >= this.maxRetries || !isRetryable(error)) {
          throw error;
        }

        const waitMs = this.retryBackoffMs * (attempt + 1);
        this.logger?.(`${describeError(error)}. Retrying in ${waitMs}ms (retry #${attempt + 1}).`);
        await this.sleep(waitMs);
      }
    }
  }

  private async request(prompt: string): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: 'user', content: prompt }],
    });

    const content = completion.choices[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new Error('Chat completion response did not include message content.');
    }
    return content;
  }
}

export function isRetryable(error: unknown): boolean {
  if (error instanceof OpenAI.APIConnectionError) {
    return true;
  }
  if (error instanceof OpenAI.APIError) {
    return error.status === 429 || (error.status !== undefined && error.status >= 500);
  }
  return false;
}

export function describeError(error: unknown): string {
  if (error instanceof OpenAI.APIError && error.status !== undefined) {
    return `Request failed with status ${error.status}`;
  }
  return error instanceof Error ? error.message : String(error);
}
