/**
 * Unit Tests: LoadRunner dispatch, concurrency bound and per-task isolation.
 */
import { describe, it, expect, afterEach, vi } from 'vitest';
import { summarize } from '../../src/metrics.js';
import { type RequestTaskFn, runRequestTask } from '../../src/request-task.js';
import { runLoadTest } from '../../src/runner.js';
import type { RequestOutcome } from '../../src/types.js';
import {
  createFakeTransport,
  createTestClient,
  mockCompletionResponse,
  mockErrorResponse,
  testConfig,
} from '../helpers/mock-fetch.js';

function sortedIds(outcomes: RequestOutcome[]): number[] {
  return outcomes.map(o => o.requestId).sort((a, b) => a - b);
}

const TWENTY_WORDS = Array.from({ length: 20 }, (_, i) => `word${i}`).join(' ');

describe('runLoadTest', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('collects one outcome per request id', async () => {
    const transport = createFakeTransport({ latencyMs: 2 });
    const config = testConfig({ totalRequests: 25, concurrency: 4 });

    const run = await runLoadTest(config, { client: createTestClient(transport.fetch) });

    expect(run.outcomes).toHaveLength(25);
    expect(sortedIds(run.outcomes)).toEqual(Array.from({ length: 25 }, (_, i) => i));
    expect(transport.bodies).toHaveLength(25);
  });

  it('never exceeds the configured concurrency', async () => {
    const transport = createFakeTransport({ latencyMs: 10 });
    const config = testConfig({ totalRequests: 30, concurrency: 5 });

    await runLoadTest(config, { client: createTestClient(transport.fetch) });

    expect(transport.maxActive).toBe(5);
    expect(transport.active).toBe(0);
  });

  it('runs strictly one at a time with concurrency 1', async () => {
    const transport = createFakeTransport({ latencyMs: 1 });
    const config = testConfig({ totalRequests: 6, concurrency: 1 });

    await runLoadTest(config, { client: createTestClient(transport.fetch) });

    expect(transport.maxActive).toBe(1);
  });

  it('summarizes a fixed-latency all-success run', async () => {
    const transport = createFakeTransport({
      latencyMs: 50,
      respond: () => mockCompletionResponse(TWENTY_WORDS),
    });
    const config = testConfig({ totalRequests: 10, concurrency: 3 });

    const run = await runLoadTest(config, { client: createTestClient(transport.fetch) });
    const summary = summarize(config, run);

    expect(summary.successRate).toBe(1);
    expect(summary.successfulRequests).toBe(10);
    expect(summary.failedRequests).toBe(0);
    expect(summary.kind).toBe('complete');
    if (summary.kind === 'complete') {
      expect(summary.latency.mean).toBeGreaterThanOrEqual(45);
      expect(summary.latency.mean).toBeLessThan(150);
      expect(summary.tokens).toEqual({ mean: 20, total: 200 });
    }
    // 10 requests at 3 wide take four 50ms waves.
    expect(run.elapsedSeconds).toBeGreaterThanOrEqual(0.18);
    expect(summary.throughputRps).toBeCloseTo(10 / run.elapsedSeconds, 10);
  });

  it('completes and flags the summary when every request fails', async () => {
    const transport = createFakeTransport({ respond: () => mockErrorResponse(500) });
    const config = testConfig({ totalRequests: 5, concurrency: 5 });

    const run = await runLoadTest(config, { client: createTestClient(transport.fetch) });
    const summary = summarize(config, run);

    expect(run.outcomes).toHaveLength(5);
    expect(summary.kind).toBe('no-successful-requests');
    expect(summary.successRate).toBe(0);
    expect(summary.failedRequests).toBe(5);
    expect(summary.throughputRps).toBe(0);
    expect(summary.errors).toEqual({ HTTP_500: 5 });
  });

  it('keeps partial failures alongside successes', async () => {
    const transport = createFakeTransport({
      respond: (_, call) => (call % 3 === 0 ? mockErrorResponse(429) : mockCompletionResponse('ok')),
    });
    const config = testConfig({ totalRequests: 9, concurrency: 3 });

    const run = await runLoadTest(config, { client: createTestClient(transport.fetch) });
    const summary = summarize(config, run);

    expect(summary.successfulRequests).toBe(6);
    expect(summary.failedRequests).toBe(3);
    expect(summary.errors).toEqual({ HTTP_429: 3 });
  });

  it('converts a task that throws into an internal error outcome', async () => {
    const transport = createFakeTransport();
    const task: RequestTaskFn = async (client, requestId, options) => {
      if (requestId === 3) {
        throw new Error('task exploded');
      }
      return runRequestTask(client, requestId, options);
    };
    const config = testConfig({ totalRequests: 6, concurrency: 2 });

    const run = await runLoadTest(config, { client: createTestClient(transport.fetch), task });

    expect(run.outcomes).toHaveLength(6);
    const failed = run.outcomes.find(o => o.requestId === 3);
    expect(failed).toMatchObject({
      status: 'error',
      errorKind: 'internal',
      errorMessage: 'Task threw: task exploded',
    });
    expect(run.outcomes.filter(o => o.status === 'success')).toHaveLength(5);
  });

  it('reports progress once per outcome', async () => {
    const transport = createFakeTransport();
    const config = testConfig({ totalRequests: 7, concurrency: 2 });
    const seen: number[] = [];

    await runLoadTest(config, {
      client: createTestClient(transport.fetch),
      onOutcome: (_, completed) => seen.push(completed),
    });

    expect(seen).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it('keeps collecting outcomes when the progress hook throws', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const transport = createFakeTransport({ latencyMs: 2 });
    const config = testConfig({ totalRequests: 6, concurrency: 2 });
    const seen: number[] = [];

    const run = await runLoadTest(config, {
      client: createTestClient(transport.fetch),
      onOutcome: (_, completed) => {
        seen.push(completed);
        if (completed === 1) throw new Error('terminal closed');
      },
    });

    expect(run.outcomes).toHaveLength(6);
    expect(sortedIds(run.outcomes)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(transport.bodies).toHaveLength(6);
    expect(seen).toEqual([1]);
    expect(error).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith('Progress reporting disabled: terminal closed');
  });

  it('times out only the request that outlasts the timeout', async () => {
    const transport = createFakeTransport({
      latencyMs: body => (body.messages[0].content.endsWith('Request ID: 2') ? 1000 : 5),
    });
    const config = testConfig({ totalRequests: 5, concurrency: 5, timeoutMs: 50 });

    const run = await runLoadTest(config, { client: createTestClient(transport.fetch) });

    const failed = run.outcomes.filter(o => o.status === 'error');
    expect(failed).toHaveLength(1);
    expect(failed[0]).toMatchObject({
      requestId: 2,
      errorKind: 'timeout',
      errorMessage: 'Request timed out after 50ms',
    });
    expect(run.outcomes.filter(o => o.status === 'success')).toHaveLength(4);
    expect(run.elapsedSeconds).toBeLessThan(1);
  });

  it('shares the run signal across many in-flight requests without a listener leak warning', async () => {
    const warnings: Error[] = [];
    const onWarning = (warning: Error) => warnings.push(warning);
    process.on('warning', onWarning);
    try {
      const transport = createFakeTransport({ latencyMs: 10 });
      const config = testConfig({ totalRequests: 40, concurrency: 20 });
      const controller = new AbortController();

      const run = await runLoadTest(config, {
        client: createTestClient(transport.fetch),
        signal: controller.signal,
      });
      // Process warnings are emitted on a later tick.
      await new Promise(resolve => setTimeout(resolve, 20));

      expect(run.outcomes.filter(o => o.status === 'success')).toHaveLength(40);
      expect(transport.maxActive).toBe(20);
      expect(warnings.filter(w => w.name === 'MaxListenersExceededWarning')).toEqual([]);
    } finally {
      process.off('warning', onWarning);
    }
  });

  it('yields a cancelled outcome for every request after the run is aborted', async () => {
    const transport = createFakeTransport({ latencyMs: 1000 });
    const config = testConfig({ totalRequests: 8, concurrency: 2 });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    const run = await runLoadTest(config, {
      client: createTestClient(transport.fetch),
      signal: controller.signal,
    });

    expect(run.outcomes).toHaveLength(8);
    expect(sortedIds(run.outcomes)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    expect(run.outcomes.every(o => o.status === 'error' && o.errorKind === 'cancelled')).toBe(true);
    // Only the first wave reached the transport.
    expect(transport.bodies).toHaveLength(2);
    expect(run.elapsedSeconds).toBeLessThan(1);
  });
});
