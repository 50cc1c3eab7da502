import type { HarnessRun, HarnessRunOptions, HarnessSource } from '../types/health-harness.js';
import { HealthHarness, type HarnessLogLevel } from './health-harness.js';
import { SmokeReport } from './smoke-report.js';
import { logThought } from '../utils/logger.js';

export interface SmokeSuiteOptions extends HarnessRunOptions {
  applicationName: string;
  environment: string;
  now?: () => Date;
  /** Mirror harness log lines somewhere besides the report (e.g. the console). */
  onLog?: (level: HarnessLogLevel, message: string) => void;
}

export interface SmokeSuiteResult {
  run: HarnessRun;
  report: SmokeReport;
}

/**
 * Run every check against `source` and fold the results and log lines into
 * a fresh {@link SmokeReport}.
 */
export async function runSmokeSuite(source: HarnessSource, options: SmokeSuiteOptions): Promise<SmokeSuiteResult> {
  const now = options.now ?? (() => new Date());
  const report = new SmokeReport(options.applicationName, options.environment, { now });

  const harness = new HealthHarness({
    now,
    log: (level, message) => {
      const line = level === 'info' ? message : `[${level.toUpperCase()}] ${message}`;
      report.addLog(line);
      void logThought(line);
      options.onLog?.(level, message);
    },
  });

  const run = await harness.runAll(source, options);
  const results = harness.results();
  // A failed check with no failure in the run (an optional service) is a warning.
  const failedSubjects = new Set(run.failures.map((failure) => failure.subject));
  report.addCheckResults(results.values(), (result) => !failedSubjects.has(result.subjectName));

  for (const failure of run.failures) {
    if (!results.has(failure.subject)) {
      // Failures with no descriptor behind them (empty container list, unreadable manifest).
      report.addResult(failure.subject, false, failure.message, 0);
    }
  }

  return { run, report };
}
