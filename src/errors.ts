import type { ErrorKind } from './types.js';

export class InferenceError extends Error {
  kind: ErrorKind;
  statusCode?: number;

  constructor(message: string, kind: ErrorKind, statusCode?: number) {
    super(message);
    this.name = 'InferenceError';
    this.kind = kind;
    this.statusCode = statusCode;
  }
}

export class ConfigError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class SummaryDocumentError extends Error {
  source: string;

  constructor(source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = 'SummaryDocumentError';
    this.source = source;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
