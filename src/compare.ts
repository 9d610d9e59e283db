import type { LoadTestSummary } from './types.js';

export interface Comparison {
  baseline: string;
  optimized: string;
  /** optimized ÷ baseline throughput; undefined when the baseline had none. */
  throughputImprovement?: number;
  /** baseline ÷ optimized mean latency. */
  meanLatencyImprovement?: number;
  /** baseline ÷ optimized p95 latency. */
  p95LatencyImprovement?: number;
  successRateDelta: number;
}

function ratio(numerator: number, denominator: number): number | undefined {
  return denominator > 0 ? numerator / denominator : undefined;
}

export function compareSummaries(baseline: LoadTestSummary, optimized: LoadTestSummary): Comparison {
  const comparison: Comparison = {
    baseline: baseline.label,
    optimized: optimized.label,
    throughputImprovement: ratio(optimized.throughputRps, baseline.throughputRps),
    successRateDelta: optimized.successRate - baseline.successRate,
  };

  if (baseline.kind === 'complete' && optimized.kind === 'complete') {
    comparison.meanLatencyImprovement = ratio(baseline.latency.mean, optimized.latency.mean);
    comparison.p95LatencyImprovement = ratio(baseline.latency.p95, optimized.latency.p95);
  }

  return comparison;
}
