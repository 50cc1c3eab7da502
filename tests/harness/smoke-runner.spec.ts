import { describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
}));

import { runSmokeSuite } from '../../src/services/smoke-runner.js';
import { defineService, type HarnessSource } from '../../src/types/health-harness.js';
import { logThought } from '../../src/utils/logger.js';

function source(overrides: Partial<HarnessSource> = {}): HarnessSource {
  return {
    getContainers: () => [
      {
        name: 'Redis',
        kind: 'Cache',
        host: 'localhost',
        port: 6379,
        image: 'redis:7-alpine',
        running: true,
        healthy: true,
      },
    ],
    getServices: () => [
      defineService({ name: 'External Kafka', kind: 'Messaging', url: 'kafka.test:9092', required: false, probe: () => false }),
    ],
    performEndToEnd: async () => undefined,
    ...overrides,
  };
}

describe('runSmokeSuite', () => {
  it('copies every harness result into the report in run order', async () => {
    const { run, report } = await runSmokeSuite(source(), { applicationName: 'orders', environment: 'ci' });

    expect(run.ok).toBe(true);
    expect(report.entries().map((entry) => [entry.name, entry.passed])).toEqual([
      ['Redis', true],
      ['External Kafka', false],
      ['End-to-End', true],
    ]);
    expect(report.summary()).toMatchObject({ total: 3, passed: 2, failed: 1 });
  });

  it('renders a failed optional service as a warning and a failed container as a failure', async () => {
    const stopped = source({
      getContainers: () => [
        {
          name: 'Redis',
          kind: 'Cache',
          host: 'localhost',
          port: 6379,
          image: 'redis:7-alpine',
          running: false,
          healthy: false,
        },
      ],
    });

    const { report } = await runSmokeSuite(stopped, { applicationName: 'orders', environment: 'ci', skipEndToEnd: true });

    const lines = report.formatConsole().split('\n');
    expect(lines.some((line) => /^\[✗ FAIL\] Redis \(\d+ms\)$/.test(line))).toBe(true);
    expect(lines.some((line) => /^\[⚠ WARN\] External Kafka \(\d+ms\)$/.test(line))).toBe(true);
  });

  it('adds a failed entry for failures that have no recorded result', async () => {
    const { run, report } = await runSmokeSuite(source({ getContainers: () => [] }), {
      applicationName: 'orders',
      environment: 'ci',
      skipServices: true,
      skipEndToEnd: true,
    });

    expect(run.ok).toBe(false);
    expect(report.entries()).toEqual([
      {
        name: 'Container Health Check',
        passed: false,
        message: 'At least one container must be configured for the health check',
        durationMs: 0,
      },
    ]);
  });

  it('mirrors harness log lines into the report, the log file and onLog', async () => {
    const onLog = vi.fn();

    const { report } = await runSmokeSuite(source(), {
      applicationName: 'orders',
      environment: 'ci',
      skipContainers: true,
      skipEndToEnd: true,
      onLog,
    });

    const warning =
      "Optional external service 'External Kafka' connectivity failed: Failed to connect to external service";
    expect(onLog).toHaveBeenCalledWith('warn', warning);
    expect(report.toDocument().logs).toContain(`[WARN] ${warning}`);
    expect(vi.mocked(logThought)).toHaveBeenCalledWith(`[WARN] ${warning}`);
  });

  it('stamps the report with the injected clock', async () => {
    const now = () => new Date(2026, 0, 15, 8, 30, 0);

    const { report } = await runSmokeSuite(source(), {
      applicationName: 'orders',
      environment: 'ci',
      now,
      skipContainers: true,
      skipServices: true,
    });

    expect(report.toDocument().testStartTime).toBe('2026-01-15 08:30:00');
  });
});
