import chalk from 'chalk';
import type { Comparison } from './compare.js';
import { toSummaryDocument } from './summary-document.js';
import type { LoadTestSummary } from './types.js';

export type OutputFormat = 'pretty' | 'json' | 'csv';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['pretty', 'json', 'csv'];

export interface ReporterOptions {
  format: OutputFormat;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

function formatDuration(seconds: number): string {
  if (seconds < 1) return `${Math.round(seconds * 1000)}ms`;
  return `${seconds.toFixed(1)}s`;
}

function formatLatency(ms: number): string {
  return ms.toFixed(2);
}

function formatRatio(value: number | undefined): string {
  return value === undefined ? 'n/a' : `${value.toFixed(2)}x`;
}

export function printResults(summary: LoadTestSummary, options: ReporterOptions = { format: 'pretty' }): void {
  switch (options.format) {
    case 'json':
      console.log(renderJson(summary));
      break;
    case 'csv':
      console.log(renderCsv(summary));
      break;
    default:
      printPretty(summary);
  }
}

export function renderJson(summary: LoadTestSummary): string {
  return JSON.stringify(toSummaryDocument(summary), null, 2);
}

export const CSV_HEADER =
  'configuration,concurrency,total,succeeded,failed,success_rate,duration_s,throughput_rps,mean_ms,median_ms,p95_ms,p99_ms,min_ms,max_ms,mean_tokens,total_tokens';

export function renderCsv(summary: LoadTestSummary): string {
  const stats =
    summary.kind === 'complete'
      ? [
          summary.latency.mean.toFixed(2),
          summary.latency.median.toFixed(2),
          summary.latency.p95.toFixed(2),
          summary.latency.p99.toFixed(2),
          summary.latency.min.toFixed(2),
          summary.latency.max.toFixed(2),
          summary.tokens.mean.toFixed(2),
          summary.tokens.total,
        ]
      : ['', '', '', '', '', '', '', ''];

  const row = [
    summary.label,
    summary.concurrency,
    summary.totalRequests,
    summary.successfulRequests,
    summary.failedRequests,
    summary.successRate.toFixed(4),
    summary.totalTimeSeconds.toFixed(3),
    summary.throughputRps.toFixed(2),
    ...stats,
  ];

  return `${CSV_HEADER}\n${row.join(',')}`;
}

function printPretty(summary: LoadTestSummary): void {
  const successPct = (summary.successRate * 100).toFixed(1);
  const failedPct = (100 - summary.successRate * 100).toFixed(1);

  console.log('');
  console.log(chalk.bold('LLM Load Test Results'));
  console.log(chalk.gray('══════════════════════════════════════'));
  console.log(`${chalk.cyan('Configuration:')} ${summary.label}`);
  console.log(`${chalk.cyan('Concurrency:')}   ${summary.concurrency}`);
  console.log(`${chalk.cyan('Duration:')}      ${formatDuration(summary.totalTimeSeconds)}`);
  console.log('');

  console.log(chalk.bold('Requests:'));
  console.log(`  Total:        ${summary.totalRequests}`);
  console.log(`  Succeeded:    ${chalk.green(summary.successfulRequests)} (${successPct}%)`);
  console.log(`  Failed:       ${chalk.red(summary.failedRequests)} (${failedPct}%)`);
  console.log('');

  if (summary.kind === 'complete') {
    console.log(chalk.bold('Latency (ms):'));
    console.log(`  Mean:         ${formatLatency(summary.latency.mean)}`);
    console.log(`  Median:       ${formatLatency(summary.latency.median)}`);
    console.log(`  p95:          ${formatLatency(summary.latency.p95)}`);
    console.log(`  p99:          ${formatLatency(summary.latency.p99)}`);
    console.log(`  Min:          ${formatLatency(summary.latency.min)}`);
    console.log(`  Max:          ${formatLatency(summary.latency.max)}`);
    console.log('');

    console.log(chalk.bold('Tokens:'));
    console.log(`  Mean:         ${summary.tokens.mean.toFixed(1)}`);
    console.log(`  Total:        ${summary.tokens.total}`);
    console.log('');
  } else {
    console.log(chalk.yellow('No successful requests: latency and token statistics unavailable'));
    console.log('');
  }

  const errorEntries = Object.entries(summary.errors);
  if (errorEntries.length > 0) {
    console.log(chalk.bold('Errors:'));
    for (const [key, count] of errorEntries) {
      console.log(`  ${chalk.red(key)}:  ${count}`);
    }
    console.log('');
  }

  console.log(`${chalk.cyan('Throughput:')}    ${chalk.bold(summary.throughputRps.toFixed(2))} req/s`);
  console.log(chalk.gray('══════════════════════════════════════'));
  console.log('');
}

export const COMPARISON_CSV_HEADER =
  'baseline,optimized,throughput_improvement,mean_latency_improvement,p95_latency_improvement,success_rate_delta';

export function renderComparisonCsv(comparison: Comparison): string {
  const ratio = (value: number | undefined) => (value === undefined ? '' : value.toFixed(4));
  const row = [
    comparison.baseline,
    comparison.optimized,
    ratio(comparison.throughputImprovement),
    ratio(comparison.meanLatencyImprovement),
    ratio(comparison.p95LatencyImprovement),
    comparison.successRateDelta.toFixed(4),
  ];
  return `${COMPARISON_CSV_HEADER}\n${row.join(',')}`;
}

export function renderComparisonJson(comparison: Comparison): string {
  return JSON.stringify(
    {
      baseline: comparison.baseline,
      optimized: comparison.optimized,
      throughput_improvement: comparison.throughputImprovement ?? null,
      mean_latency_improvement: comparison.meanLatencyImprovement ?? null,
      p95_latency_improvement: comparison.p95LatencyImprovement ?? null,
      success_rate_delta: comparison.successRateDelta,
    },
    null,
    2
  );
}

export function printComparison(comparison: Comparison, options: ReporterOptions = { format: 'pretty' }): void {
  switch (options.format) {
    case 'json':
      console.log(renderComparisonJson(comparison));
      return;
    case 'csv':
      console.log(renderComparisonCsv(comparison));
      return;
    default:
      break;
  }

  console.log('');
  console.log(chalk.bold(`${comparison.baseline} → ${comparison.optimized}`));
  console.log(chalk.gray('══════════════════════════════════════'));
  console.log(`  Throughput:      ${chalk.bold(formatRatio(comparison.throughputImprovement))}`);
  console.log(`  Mean latency:    ${chalk.bold(formatRatio(comparison.meanLatencyImprovement))}`);
  console.log(`  p95 latency:     ${chalk.bold(formatRatio(comparison.p95LatencyImprovement))}`);
  const delta = (comparison.successRateDelta * 100).toFixed(1);
  console.log(`  Success rate:    ${comparison.successRateDelta >= 0 ? chalk.green(`+${delta}%`) : chalk.red(`${delta}%`)}`);
  console.log(chalk.gray('══════════════════════════════════════'));
  console.log('');
}
