import { InferenceError, errorMessage } from './errors.js';
import type { InferenceClient } from './inference-client.js';
import type {
  ChatCompletionRequest,
  ErrorKind,
  ErrorOutcome,
  LoadTestConfig,
  RequestOutcome,
  SuccessOutcome,
} from './types.js';

export type RequestSettings = Pick<LoadTestConfig, 'model' | 'maxTokens' | 'temperature' | 'timeoutMs'>;

export interface RequestTaskOptions extends RequestSettings {
  /** Run-level cancellation. */
  signal?: AbortSignal;
}

export type RequestTaskFn = (
  client: InferenceClient,
  requestId: number,
  options: RequestTaskOptions
) => Promise<RequestOutcome>;

export function buildPrompt(requestId: number): string {
  return `Generate a short response about artificial intelligence. Request ID: ${requestId}`;
}

export function buildRequestBody(requestId: number, settings: RequestSettings): ChatCompletionRequest {
  return {
    model: settings.model,
    messages: [{ role: 'user', content: buildPrompt(requestId) }],
    max_tokens: settings.maxTokens,
    temperature: settings.temperature,
    stream: false,
  };
}

export function countTokens(text: string): number {
  return text.split(/\s+/).filter(word => word.length > 0).length;
}

/**
 * Issues one chat completion and reports how it went. Every failure mode
 * becomes an error outcome; the returned promise never rejects.
 */
export const runRequestTask: RequestTaskFn = async (client, requestId, options) => {
  const timestamp = Date.now() / 1000;
  const start = performance.now();

  if (options.signal?.aborted) {
    return failure(requestId, timestamp, 0, 'cancelled', 'Run cancelled before dispatch');
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const onRunAbort = () => controller.abort();
  options.signal?.addEventListener('abort', onRunAbort, { once: true });

  try {
    const completion = await client.createChatCompletion(buildRequestBody(requestId, options), {
      signal: controller.signal,
    });
    const latencyMs = performance.now() - start;

    const outcome: SuccessOutcome = {
      requestId,
      status: 'success',
      latencyMs,
      timestamp,
      tokensGenerated: countTokens(completion.content),
      model: completion.model,
    };
    return Object.freeze(outcome);
  } catch (error) {
    const latencyMs = performance.now() - start;

    if (timedOut) {
      return failure(requestId, timestamp, latencyMs, 'timeout', `Request timed out after ${options.timeoutMs}ms`);
    }
    if (options.signal?.aborted) {
      return failure(requestId, timestamp, latencyMs, 'cancelled', 'Run cancelled while request was in flight');
    }
    if (error instanceof InferenceError) {
      return failure(requestId, timestamp, latencyMs, error.kind, error.message, error.statusCode);
    }
    return failure(requestId, timestamp, latencyMs, 'internal', errorMessage(error));
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onRunAbort);
  }
};

export function failure(
  requestId: number,
  timestamp: number,
  latencyMs: number,
  errorKind: ErrorKind,
  message: string,
  errorCode?: number
): RequestOutcome {
  const outcome: ErrorOutcome = {
    requestId,
    status: 'error',
    latencyMs,
    timestamp,
    errorKind,
    errorMessage: message,
    ...(errorCode !== undefined && { errorCode }),
  };
  return Object.freeze(outcome);
}
