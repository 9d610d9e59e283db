import type {
  ErrorOutcome,
  LatencyStats,
  LoadTestConfig,
  LoadTestRun,
  LoadTestSummary,
  RequestOutcome,
  SuccessOutcome,
  TokenStats,
} from './types.js';

export const NO_SUCCESSFUL_REQUESTS = 'No successful requests';

export function mean(values: number[]): number {
  if (values.length === 0) {
    throw new RangeError('mean of an empty sample');
  }
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Expects an ascending sample. Even-sized samples average the two middle values. */
export function median(sorted: number[]): number {
  if (sorted.length === 0) {
    throw new RangeError('median of an empty sample');
  }
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Nearest-rank percentile: the value at 1-based rank ceil(p/100 * n) of an
 * ascending sample. Never interpolates, so the result is always a sample value.
 */
export function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) {
    throw new RangeError('percentile of an empty sample');
  }
  const index = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.min(sorted.length - 1, Math.max(0, index))];
}

export function calculateLatencyStats(latencies: number[]): LatencyStats {
  const sorted = [...latencies].sort((a, b) => a - b);

  return {
    mean: mean(sorted),
    median: median(sorted),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
    min: sorted[0],
    max: sorted[sorted.length - 1],
  };
}

export function calculateTokenStats(tokenCounts: number[]): TokenStats {
  return {
    mean: mean(tokenCounts),
    total: tokenCounts.reduce((a, b) => a + b, 0),
  };
}

export function errorKey(outcome: ErrorOutcome): string {
  switch (outcome.errorKind) {
    case 'http':
      return outcome.errorCode !== undefined ? `HTTP_${outcome.errorCode}` : 'HTTP';
    case 'malformed':
      return 'MALFORMED_RESPONSE';
    default:
      return outcome.errorKind.toUpperCase();
  }
}

function isSuccess(outcome: RequestOutcome): outcome is Readonly<SuccessOutcome> {
  return outcome.status === 'success';
}

function isError(outcome: RequestOutcome): outcome is Readonly<ErrorOutcome> {
  return outcome.status === 'error';
}

/**
 * Reduces a finished run to its summary. Latency and token figures cover
 * successful requests only; with none, those blocks are left out.
 */
export function summarize(config: LoadTestConfig, run: LoadTestRun): LoadTestSummary {
  const succeeded = run.outcomes.filter(isSuccess);
  const failed = run.outcomes.filter(isError);

  const errors: Record<string, number> = {};
  for (const outcome of failed) {
    const key = errorKey(outcome);
    errors[key] = (errors[key] ?? 0) + 1;
  }

  const base = {
    label: config.label,
    concurrency: config.concurrency,
    startedAt: run.startedAt.toISOString(),
    totalRequests: config.totalRequests,
    successfulRequests: succeeded.length,
    failedRequests: failed.length,
    successRate: config.totalRequests > 0 ? succeeded.length / config.totalRequests : 0,
    totalTimeSeconds: run.elapsedSeconds,
    errors,
  };

  if (succeeded.length === 0) {
    return { ...base, kind: 'no-successful-requests', throughputRps: 0 };
  }

  return {
    ...base,
    kind: 'complete',
    throughputRps: run.elapsedSeconds > 0 ? succeeded.length / run.elapsedSeconds : 0,
    latency: calculateLatencyStats(succeeded.map(o => o.latencyMs)),
    tokens: calculateTokenStats(succeeded.map(o => o.tokensGenerated)),
  };
}
