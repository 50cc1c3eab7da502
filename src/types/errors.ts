import type { CheckFailure } from './health-harness.js';
import type { ReportFormat } from './report.js';

/** Raised by callers that convert a failed {@link CheckOutcome} into an exception. */
export class HarnessCheckError extends Error {
  readonly failures: CheckFailure[];

  constructor(failures: CheckFailure[]) {
    super(failures.map((failure) => failure.message).join('; ') || 'Health check failed');
    this.name = 'HarnessCheckError';
    this.failures = failures;
  }
}

export class ReportWriteError extends Error {
  readonly path: string;
  readonly format: ReportFormat;

  constructor(format: ReportFormat, path: string, cause: unknown) {
    super(`Failed to write ${format} report to ${path}: ${describeError(cause)}`, { cause });
    this.name = 'ReportWriteError';
    this.path = path;
    this.format = format;
  }
}

export class ProbeTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Health check timed out after ${timeoutMs}ms`);
    this.name = 'ProbeTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`${source} is invalid: ${issues.join(' | ')}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

/** First line of an error message; stack frames and paths beyond it are dropped. */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message.split('\n')[0] || err.name;
  }
  return String(err).split('\n')[0] ?? 'unknown error';
}
