import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { SummaryDocumentError, errorMessage } from './errors.js';
import { NO_SUCCESSFUL_REQUESTS } from './metrics.js';
import type { LoadTestSummary } from './types.js';

// Field names are consumed by external reporting and telemetry-merge tooling.
const DocumentBaseSchema = z.object({
  configuration: z.string(),
  concurrency: z.number().int().positive(),
  started_at: z.string(),
  total_requests: z.number().int().nonnegative(),
  successful_requests: z.number().int().nonnegative(),
  failed_requests: z.number().int().nonnegative(),
  success_rate: z.number().min(0).max(1),
  total_time_seconds: z.number().nonnegative(),
  throughput_rps: z.number().nonnegative(),
  errors: z.record(z.number().int().nonnegative()),
});

const CompleteDocumentSchema = DocumentBaseSchema.extend({
  latency_stats: z.object({
    mean_ms: z.number(),
    median_ms: z.number(),
    p95_ms: z.number(),
    p99_ms: z.number(),
    min_ms: z.number(),
    max_ms: z.number(),
  }),
  tokens_stats: z.object({
    mean_tokens: z.number(),
    total_tokens: z.number(),
  }),
});

const EmptyDocumentSchema = DocumentBaseSchema.extend({
  error: z.literal(NO_SUCCESSFUL_REQUESTS),
});

export const SummaryDocumentSchema = z.union([CompleteDocumentSchema, EmptyDocumentSchema]);

export type SummaryDocument = z.infer<typeof SummaryDocumentSchema>;

export function toSummaryDocument(summary: LoadTestSummary): SummaryDocument {
  const base = {
    configuration: summary.label,
    concurrency: summary.concurrency,
    started_at: summary.startedAt,
    total_requests: summary.totalRequests,
    successful_requests: summary.successfulRequests,
    failed_requests: summary.failedRequests,
    success_rate: summary.successRate,
    total_time_seconds: summary.totalTimeSeconds,
    throughput_rps: summary.throughputRps,
    errors: summary.errors,
  };

  if (summary.kind === 'no-successful-requests') {
    return { ...base, error: NO_SUCCESSFUL_REQUESTS };
  }

  return {
    ...base,
    latency_stats: {
      mean_ms: summary.latency.mean,
      median_ms: summary.latency.median,
      p95_ms: summary.latency.p95,
      p99_ms: summary.latency.p99,
      min_ms: summary.latency.min,
      max_ms: summary.latency.max,
    },
    tokens_stats: {
      mean_tokens: summary.tokens.mean,
      total_tokens: summary.tokens.total,
    },
  };
}

export function fromSummaryDocument(doc: SummaryDocument): LoadTestSummary {
  const base = {
    label: doc.configuration,
    concurrency: doc.concurrency,
    startedAt: doc.started_at,
    totalRequests: doc.total_requests,
    successfulRequests: doc.successful_requests,
    failedRequests: doc.failed_requests,
    successRate: doc.success_rate,
    totalTimeSeconds: doc.total_time_seconds,
    throughputRps: doc.throughput_rps,
    errors: doc.errors,
  };

  if (!('latency_stats' in doc)) {
    return { ...base, kind: 'no-successful-requests' };
  }

  return {
    ...base,
    kind: 'complete',
    latency: {
      mean: doc.latency_stats.mean_ms,
      median: doc.latency_stats.median_ms,
      p95: doc.latency_stats.p95_ms,
      p99: doc.latency_stats.p99_ms,
      min: doc.latency_stats.min_ms,
      max: doc.latency_stats.max_ms,
    },
    tokens: {
      mean: doc.tokens_stats.mean_tokens,
      total: doc.tokens_stats.total_tokens,
    },
  };
}

export function parseSummaryDocument(source: string, text: string): LoadTestSummary {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new SummaryDocumentError(source, `not valid JSON (${errorMessage(error)})`);
  }

  const result = SummaryDocumentSchema.safeParse(raw);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first && first.path.length > 0 ? `${first.path.join('.')}: ` : '';
    throw new SummaryDocumentError(source, `not a load test summary (${where}${first?.message ?? 'invalid'})`);
  }

  return fromSummaryDocument(result.data);
}

export async function writeSummaryFile(path: string, summary: LoadTestSummary): Promise<void> {
  await writeFile(path, `${JSON.stringify(toSummaryDocument(summary), null, 2)}\n`, 'utf8');
}

export async function readSummaryFile(path: string): Promise<LoadTestSummary> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new SummaryDocumentError(path, `cannot be read (${errorMessage(error)})`);
  }
  return parseSummaryDocument(path, text);
}
