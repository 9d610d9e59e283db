export type ErrorKind = 'transport' | 'timeout' | 'http' | 'malformed' | 'cancelled' | 'internal';

interface OutcomeBase {
  requestId: number;
  latencyMs: number;
  /** Request start, epoch seconds. */
  timestamp: number;
}

export interface SuccessOutcome extends OutcomeBase {
  status: 'success';
  tokensGenerated: number;
  model: string;
}

export interface ErrorOutcome extends OutcomeBase {
  status: 'error';
  errorKind: ErrorKind;
  errorCode?: number;
  errorMessage: string;
}

export type RequestOutcome = Readonly<SuccessOutcome> | Readonly<ErrorOutcome>;

export interface LoadTestConfig {
  serviceUrl: string;
  totalRequests: number;
  concurrency: number;
  timeoutMs: number;
  model: string;
  maxTokens: number;
  temperature: number;
  label: string;
}

export interface LatencyStats {
  mean: number;
  median: number;
  p95: number;
  p99: number;
  min: number;
  max: number;
}

export interface TokenStats {
  mean: number;
  total: number;
}

interface SummaryBase {
  label: string;
  concurrency: number;
  startedAt: string;
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  successRate: number;
  totalTimeSeconds: number;
  throughputRps: number;
  errors: Record<string, number>;
}

export interface CompleteSummary extends SummaryBase {
  kind: 'complete';
  latency: LatencyStats;
  tokens: TokenStats;
}

export interface EmptySummary extends SummaryBase {
  kind: 'no-successful-requests';
}

export type LoadTestSummary = CompleteSummary | EmptySummary;

export interface LoadTestRun {
  outcomes: RequestOutcome[];
  elapsedSeconds: number;
  startedAt: Date;
}

export interface ChatCompletionRequest {
  model: string;
  messages: { role: 'user'; content: string }[];
  max_tokens: number;
  temperature: number;
  stream: false;
}

export interface ChatCompletion {
  content: string;
  model: string;
}
