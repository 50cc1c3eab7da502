import type {
  CheckFailure,
  CheckOperation,
  CheckOutcome,
  CheckResult,
  ContainerDescriptor,
  EndToEndCallback,
  HarnessRun,
  HarnessRunOptions,
  HarnessSource,
  HarnessSummary,
  ServiceDescriptor,
} from '../types/health-harness.js';
import { describeError, HarnessCheckError } from '../types/errors.js';
import { logThought } from '../utils/logger.js';

export const END_TO_END_SUBJECT = 'End-to-End';

export type HarnessLogLevel = 'info' | 'warn' | 'error';

export type HarnessLogSink = (level: HarnessLogLevel, message: string) => void;

export interface HealthHarnessOptions {
  now?: () => Date;
  /** Receives every banner, summary and warning line. Defaults to the daily log file. */
  log?: HarnessLogSink;
}

const OPERATION_TITLES: Record<CheckOperation, string> = {
  containers: 'Container Health Check',
  'external-services': 'External Services Connectivity Check',
  'end-to-end': 'End-to-End Functionality Check',
};

function defaultLogSink(level: HarnessLogLevel, message: string): void {
  void logThought(level === 'info' ? message : `[${level.toUpperCase()}] ${message}`);
}

/**
 * Orchestrates container, external-service and end-to-end checks and keeps
 * the results of every check it has run, keyed by subject name in insertion
 * order (a later result for the same name replaces the earlier one).
 *
 * Each operation evaluates every descriptor it is given, records one result
 * per descriptor, and returns a tagged {@link CheckOutcome} listing every
 * failure. Nothing is thrown; use {@link assertOutcome} to convert.
 *
 * Not safe for concurrent use: run operations on one instance sequentially.
 */
export class HealthHarness {
  readonly #results = new Map<string, CheckResult>();
  readonly #now: () => Date;
  readonly #log: HarnessLogSink;

  constructor(options: HealthHarnessOptions = {}) {
    this.#now = options.now ?? (() => new Date());
    this.#log = options.log ?? defaultLogSink;
  }

  // ── Check operations ───────────────────────────────────────────────────────

  async checkContainers(containers: readonly ContainerDescriptor[]): Promise<CheckOutcome> {
    return this.#runOperation('containers', async () => {
      if (containers.length === 0) {
        return {
          results: [],
          failures: [
            {
              kind: 'no_containers',
              subject: OPERATION_TITLES.containers,
              message: 'At least one container must be configured for the health check',
            },
          ],
        };
      }

      const results: CheckResult[] = [];
      const failures: CheckFailure[] = [];

      for (const container of containers) {
        const result = this.#validateContainer(container);
        this.#record(result);
        results.push(result);

        if (!result.healthy) {
          failures.push({
            kind: container.running ? 'unhealthy' : 'not_running',
            subject: container.name,
            message: `Container '${container.name}' health check failed: ${result.message}`,
          });
        }
      }

      return { results, failures };
    });
  }

  async checkExternalServices(services: readonly ServiceDescriptor[]): Promise<CheckOutcome> {
    return this.#runOperation('external-services', async () => {
      if (services.length === 0) {
        this.#log('info', 'No external services configured for connectivity check');
        return { results: [], failures: [] };
      }

      const results: CheckResult[] = [];
      const failures: CheckFailure[] = [];

      for (const service of services) {
        const result = await this.#validateService(service);
        this.#record(result);
        results.push(result);

        if (result.healthy) continue;

        if (service.required) {
          failures.push({
            kind: 'required_service_unreachable',
            subject: service.name,
            message: `Required external service '${service.name}' connectivity failed: ${result.message}`,
          });
        } else {
          this.#log('warn', `Optional external service '${service.name}' connectivity failed: ${result.message}`);
        }
      }

      return { results, failures };
    });
  }

  async checkEndToEnd(callback: EndToEndCallback): Promise<CheckOutcome> {
    return this.#runOperation('end-to-end', async () => {
      const started = performance.now();
      try {
        await callback();
        const result = this.#result(END_TO_END_SUBJECT, true, 'End-to-end workflow completed', started);
        this.#record(result);
        this.#log('info', 'End-to-end functionality check passed');
        return { results: [result], failures: [] };
      } catch (err) {
        const cause = describeError(err);
        const result = this.#result(END_TO_END_SUBJECT, false, `End-to-end workflow failed: ${cause}`, started);
        this.#record(result);
        this.#log('error', `End-to-end functionality check failed: ${cause}`);
        return {
          results: [result],
          failures: [
            {
              kind: 'end_to_end_failure',
              subject: END_TO_END_SUBJECT,
              message: `End-to-end functionality test failed: ${cause}`,
            },
          ],
        };
      }
    });
  }

  /**
   * Run the three operations in order against `source`. A failing operation
   * does not prevent the later ones from running.
   */
  async runAll(source: HarnessSource, options: HarnessRunOptions = {}): Promise<HarnessRun> {
    const outcomes: CheckOutcome[] = [];

    if (!options.skipContainers) {
      outcomes.push(await this.#fromSource('containers', () => source.getContainers(), (c) => this.checkContainers(c)));
    }
    if (!options.skipServices) {
      outcomes.push(
        await this.#fromSource('external-services', () => source.getServices(), (s) => this.checkExternalServices(s)),
      );
    }
    if (!options.skipEndToEnd) {
      outcomes.push(await this.checkEndToEnd(() => source.performEndToEnd()));
    }

    const failures = outcomes.flatMap((outcome) => (outcome.ok ? [] : outcome.failures));
    return { ok: failures.length === 0, outcomes, failures };
  }

  // ── Accessors ──────────────────────────────────────────────────────────────

  results(): ReadonlyMap<string, CheckResult> {
    return new Map(this.#results);
  }

  summary(): HarnessSummary {
    let healthy = 0;
    for (const result of this.#results.values()) {
      if (result.healthy) healthy += 1;
    }
    return { total: this.#results.size, healthy, unhealthy: this.#results.size - healthy };
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  #validateContainer(container: ContainerDescriptor): CheckResult {
    const started = performance.now();
    this.#log('info', `Checking container: ${container.name} (${container.kind})`);

    if (!container.running) {
      return this.#result(container.name, false, 'Container is not running', started);
    }
    if (!container.healthy) {
      return this.#result(container.name, false, 'Container health check failed', started);
    }

    const diagnostics = `host=${container.host} port=${container.port ?? 'none'} image=${container.image}`;
    this.#log('info', `Container '${container.name}' is healthy: ${diagnostics}`);
    return this.#result(container.name, true, diagnostics, started);
  }

  async #validateService(service: ServiceDescriptor): Promise<CheckResult> {
    const started = performance.now();
    this.#log('info', `Checking external service: ${service.name} (${service.url})`);

    try {
      if (!(await service.probe())) {
        return this.#result(service.name, false, 'Failed to connect to external service', started);
      }
    } catch (err) {
      this.#log('error', `Error checking external service '${service.name}': ${describeError(err)}`);
      return this.#result(service.name, false, `Probe raised: ${describeError(err)}`, started);
    }

    const diagnostics = `url=${service.url} kind=${service.kind}`;
    this.#log('info', `External service '${service.name}' is accessible: ${diagnostics}`);
    return this.#result(service.name, true, diagnostics, started);
  }

  async #fromSource<T>(
    operation: CheckOperation,
    read: () => T[] | Promise<T[]>,
    check: (items: T[]) => Promise<CheckOutcome>,
  ): Promise<CheckOutcome> {
    let items: T[];
    try {
      items = await read();
    } catch (err) {
      const message = `Unable to load descriptors for ${OPERATION_TITLES[operation]}: ${describeError(err)}`;
      this.#log('error', message);
      return {
        ok: false,
        operation,
        results: [],
        failures: [{ kind: 'unhealthy', subject: OPERATION_TITLES[operation], message }],
      };
    }
    return check(items);
  }

  async #runOperation(
    operation: CheckOperation,
    body: () => Promise<{ results: CheckResult[]; failures: CheckFailure[] }>,
  ): Promise<CheckOutcome> {
    const title = OPERATION_TITLES[operation];
    const started = performance.now();
    this.#log('info', `=== Starting ${title} at ${this.#now().toISOString()} ===`);

    const { results, failures } = await body();

    const elapsed = Math.round(performance.now() - started);
    this.#log('info', `=== ${title} Completed in ${elapsed}ms ===`);
    if (operation !== 'end-to-end' && results.length > 0) {
      this.#logSummary(results);
    }

    return failures.length === 0
      ? { ok: true, operation, results }
      : { ok: false, operation, results, failures };
  }

  #result(subjectName: string, healthy: boolean, message: string, started: number): CheckResult {
    return {
      subjectName,
      healthy,
      message,
      elapsedMs: Math.round(performance.now() - started),
      timestamp: this.#now(),
    };
  }

  #record(result: CheckResult): void {
    this.#results.set(result.subjectName, result);
  }

  /** Summarise one operation's results, not everything recorded so far. */
  #logSummary(results: readonly CheckResult[]): void {
    const healthy = results.filter((result) => result.healthy).length;
    this.#log('info', '=== Health Check Summary ===');
    this.#log('info', `Total Checks: ${results.length}`);
    this.#log('info', `Healthy: ${healthy}`);
    this.#log('info', `Unhealthy: ${results.length - healthy}`);
    for (const result of results) {
      this.#log('info', `  - ${result.subjectName}: ${result.healthy ? 'HEALTHY' : 'UNHEALTHY'} (${result.elapsedMs}ms)`);
    }
    this.#log('info', '============================');
  }
}

/** Throw a {@link HarnessCheckError} when `outcome` failed; otherwise return it unchanged. */
export function assertOutcome(outcome: CheckOutcome): CheckOutcome {
  if (!outcome.ok) {
    throw new HarnessCheckError(outcome.failures);
  }
  return outcome;
}
