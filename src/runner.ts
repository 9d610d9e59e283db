import { setMaxListeners } from 'node:events';
import { errorMessage } from './errors.js';
import type { InferenceClient } from './inference-client.js';
import { ConcurrencyLimiter } from './limiter.js';
import { type RequestTaskFn, failure, runRequestTask } from './request-task.js';
import type { LoadTestConfig, LoadTestRun, RequestOutcome } from './types.js';

export interface RunnerOptions {
  client: InferenceClient;
  signal?: AbortSignal;
  onOutcome?: (outcome: RequestOutcome, completed: number) => void;
  task?: RequestTaskFn;
}

export async function runLoadTest(config: LoadTestConfig, options: RunnerOptions): Promise<LoadTestRun> {
  const { client, signal, onOutcome, task = runRequestTask } = options;
  const limiter = new ConcurrencyLimiter(config.concurrency);
  const slots: (RequestOutcome | undefined)[] = new Array(config.totalRequests).fill(undefined);
  let completed = 0;
  let reportProgress = onOutcome;

  // Each in-flight request listens on the run signal.
  if (signal) {
    setMaxListeners(config.concurrency + 1, signal);
  }

  const dispatch = async (requestId: number): Promise<void> => {
    let outcome: RequestOutcome;
    try {
      outcome = await limiter.run(() =>
        task(client, requestId, {
          model: config.model,
          maxTokens: config.maxTokens,
          temperature: config.temperature,
          timeoutMs: config.timeoutMs,
          signal,
        })
      );
    } catch (error) {
      outcome = failure(requestId, Date.now() / 1000, 0, 'internal', `Task threw: ${errorMessage(error)}`);
    }

    slots[requestId] = outcome;
    completed++;
    try {
      reportProgress?.(outcome, completed);
    } catch (error) {
      reportProgress = undefined;
      console.error(`Progress reporting disabled: ${errorMessage(error)}`);
    }
  };

  const startedAt = new Date();
  const startTime = performance.now();

  const ids = Array.from({ length: config.totalRequests }, (_, i) => i);
  await Promise.all(ids.map(dispatch));

  const elapsedSeconds = (performance.now() - startTime) / 1000;

  const outcomes = slots.filter((o): o is RequestOutcome => o !== undefined);
  if (outcomes.length !== config.totalRequests) {
    throw new Error(`Collected ${outcomes.length} outcomes for ${config.totalRequests} requests`);
  }

  return { outcomes, elapsedSeconds, startedAt };
}
