import { z } from 'zod';
import { InferenceError, errorMessage } from './errors.js';
import type { ChatCompletion, ChatCompletionRequest } from './types.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface InferenceClientOptions {
  baseUrl: string;
  /** Defaults to the global `fetch` at call time. */
  fetch?: FetchLike;
}

export interface CompletionCallOptions {
  signal?: AbortSignal;
}

const ChatCompletionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      })
    )
    .min(1),
});

/**
 * Client for an OpenAI-compatible chat completion endpoint. One instance is
 * created per run and shared by every request task.
 */
export class InferenceClient {
  readonly baseUrl: string;
  private fetchImpl?: FetchLike;

  constructor(options: InferenceClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetch;
  }

  get completionsUrl(): string {
    return `${this.baseUrl}/v1/chat/completions`;
  }

  async createChatCompletion(
    body: ChatCompletionRequest,
    options: CompletionCallOptions = {}
  ): Promise<ChatCompletion> {
    const doFetch = this.fetchImpl ?? globalThis.fetch;

    let response: Response;
    try {
      response = await doFetch(this.completionsUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: options.signal,
      });
    } catch (error) {
      throw new InferenceError(`Request failed: ${errorMessage(error)}`, 'transport');
    }

    if (!response.ok) {
      // Drain the body so the connection can be reused.
      await response.text().catch(() => '');
      const statusText = response.statusText ? ` ${response.statusText}` : '';
      throw new InferenceError(`HTTP ${response.status}${statusText}`, 'http', response.status);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      if (options.signal?.aborted) {
        throw new InferenceError(`Request failed: ${errorMessage(error)}`, 'transport');
      }
      throw new InferenceError(`Response body is not valid JSON: ${errorMessage(error)}`, 'malformed');
    }

    const parsed = ChatCompletionResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new InferenceError('Response is missing choices[0].message.content', 'malformed');
    }

    return {
      content: parsed.data.choices[0].message.content,
      model: parsed.data.model ?? 'unknown',
    };
  }
}
