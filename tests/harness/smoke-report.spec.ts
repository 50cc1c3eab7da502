import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
}));

import { formatTimestamp, SmokeReport } from '../../src/services/smoke-report.js';
import { ReportWriteError } from '../../src/types/errors.js';
import type { SmokeReportDocument } from '../../src/types/report.js';

const STARTED = new Date(2026, 2, 1, 9, 5, 7);

function sampleReport(): SmokeReport {
  const report = new SmokeReport('orders-service', 'staging', { now: () => STARTED });
  report.addResult('Redis', true, 'host=localhost port=6379 image=redis:7-alpine', 12);
  report.addResult('External API', false, 'Failed to connect to external service', 30.6);
  report.addLog('=== Starting Container Health Check ===');
  return report;
}

describe('formatTimestamp', () => {
  it('formats local time as YYYY-MM-DD HH:mm:ss', () => {
    expect(formatTimestamp(STARTED)).toBe('2026-03-01 09:05:07');
  });
});

describe('SmokeReport entries and summary', () => {
  it('keeps passed + failed equal to total across any sequence of additions', () => {
    const report = new SmokeReport('app', 'local');
    const outcomes = [true, false, true, true, false];

    outcomes.forEach((passed, index) => {
      report.addResult(`check-${index % 3}`, passed, null, index);
      const { total, passed: ok, failed } = report.summary();
      expect(ok + failed).toBe(total);
    });
  });

  it('returns an identical summary when called twice without changes', () => {
    const report = sampleReport();

    expect(report.summary()).toEqual(report.summary());
    expect(report.summary()).toEqual({ total: 2, passed: 1, failed: 1, totalDurationMs: 43 });
  });

  it('overwrites an entry with the same name', () => {
    const report = sampleReport();
    report.addResult('External API', true, 'url=http://api.test kind=REST API', 5);

    expect(report.summary()).toEqual({ total: 2, passed: 2, failed: 0, totalDurationMs: 17 });
    expect(report.entries().map((entry) => entry.name)).toEqual(['Redis', 'External API']);
  });

  it('stores an empty message as null and clamps negative durations', () => {
    const report = new SmokeReport('app', 'local');
    report.addResult('Blank', true, '', -4);

    expect(report.entries()).toEqual([{ name: 'Blank', passed: true, message: null, durationMs: 0 }]);
  });

  it('folds harness results in their recorded order', () => {
    const report = new SmokeReport('app', 'local');
    report.addCheckResults([
      { subjectName: 'Kafka', healthy: false, message: 'Container is not running', elapsedMs: 3, timestamp: STARTED },
      { subjectName: 'Redis', healthy: true, message: 'ok', elapsedMs: 1, timestamp: STARTED },
    ]);

    expect(report.entries()).toEqual([
      { name: 'Kafka', passed: false, message: 'Container is not running', durationMs: 3 },
      { name: 'Redis', passed: true, message: 'ok', durationMs: 1 },
    ]);
  });
});

describe('SmokeReport.formatConsole', () => {
  it('prints the banner, the summary line and one line per result', () => {
    const lines = sampleReport().formatConsole().split('\n');

    expect(lines).toEqual([
      '',
      '='.repeat(80),
      'SMOKE TEST REPORT',
      '='.repeat(80),
      'Application: orders-service',
      'Environment: staging',
      'Test Time: 2026-03-01 09:05:07',
      '-'.repeat(80),
      'Total Tests: 2 | Passed: 1 | Failed: 1 | Duration: 43ms',
      '-'.repeat(80),
      '[✓ PASS] Redis (12ms)',
      '[✗ FAIL] External API (31ms)',
      '    Reason: Failed to connect to external service',
      '='.repeat(80),
      '',
    ]);
  });

  it('sends the formatted text to the supplied writer', () => {
    const report = sampleReport();
    const write = vi.fn();

    report.printConsole(write);

    expect(write).toHaveBeenCalledWith(report.formatConsole());
  });
});

describe('SmokeReport text formats', () => {
  it('renders the JSON document with the expected shape', () => {
    const document = JSON.parse(sampleReport().formatJson()) as SmokeReportDocument;

    expect(document).toEqual({
      applicationName: 'orders-service',
      environment: 'staging',
      testStartTime: '2026-03-01 09:05:07',
      summary: { total: 2, passed: 1, failed: 1, totalDurationMs: 43 },
      testResults: {
        Redis: {
          name: 'Redis',
          passed: true,
          message: 'host=localhost port=6379 image=redis:7-alpine',
          durationMs: 12,
        },
        'External API': {
          name: 'External API',
          passed: false,
          message: 'Failed to connect to external service',
          durationMs: 31,
        },
      },
      logs: ['=== Starting Container Health Check ==='],
    });
  });

  it('marks HTML results with pass and fail classes and escapes values', () => {
    const report = sampleReport();
    report.addResult('<script>', false, 'a & b', 1);

    const html = report.formatHtml();

    expect(html).toContain('<div class="test-result pass">');
    expect(html).toContain('<div class="test-result fail">');
    expect(html).toContain('<strong>✗ FAIL</strong> &lt;script&gt; <em>(1ms)</em>');
    expect(html).toContain('<br><small>Reason: a &amp; b</small>');
    expect(html).toContain('<title>Smoke Test Report - orders-service</title>');
  });

  it('renders Markdown headings per result with the failure reason', () => {
    const lines = sampleReport().formatMarkdown().split('\n');

    expect(lines[0]).toBe('# Smoke Test Report');
    expect(lines).toContain('| Total Tests | 2 |');
    expect(lines).toContain('### ✅ PASS Redis');
    expect(lines).toContain('### ❌ FAIL External API');
    expect(lines).toContain('- **Reason:** Failed to connect to external service');
    expect(lines).toContain('- === Starting Container Health Check ===');
  });

  it('renders a failure flagged as a warning as WARN in every human-readable format', () => {
    const report = new SmokeReport('orders-service', 'staging', { now: () => STARTED });
    report.addResult('External Redis', false, 'Failed to connect to external service', 4, { warning: true });

    expect(report.formatConsole().split('\n')).toContain('[⚠ WARN] External Redis (4ms)');
    expect(report.formatHtml()).toContain('<div class="test-result warn">');
    expect(report.formatHtml()).toContain('<strong>⚠ WARN</strong> External Redis <em>(4ms)</em>');
    expect(report.formatMarkdown().split('\n')).toContain('### ⚠️ WARN External Redis');
    expect(report.summary()).toMatchObject({ total: 1, passed: 0, failed: 1 });
    expect(report.toDocument().testResults['External Redis']).toEqual({
      name: 'External Redis',
      passed: false,
      message: 'Failed to connect to external service',
      durationMs: 4,
    });
  });

  it('drops the warning when a later result for the same name replaces it', () => {
    const report = new SmokeReport('orders-service', 'staging');
    report.addResult('External Redis', false, 'timeout', 4, { warning: true });
    report.addResult('External Redis', false, 'refused', 5);

    expect(report.formatConsole().split('\n')).toContain('[✗ FAIL] External Redis (5ms)');
  });

  it('keeps a result named __proto__ in the JSON document', () => {
    const report = new SmokeReport('orders-service', 'staging');
    report.addResult('__proto__', true, null, 1);

    const parsed = JSON.parse(report.formatJson()) as SmokeReportDocument;

    expect(Object.keys(parsed.testResults)).toEqual(['__proto__']);
    expect(Object.keys(report.toDocument().testResults)).toEqual(['__proto__']);
  });

  it('does not change entries when rendered repeatedly', () => {
    const report = sampleReport();
    const before = report.entries();

    report.formatHtml();
    report.formatMarkdown();
    report.formatJson();

    expect(report.entries()).toEqual(before);
  });
});

describe('SmokeReport file rendering', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'smoke-report-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes JSON that parses back to the live summary counts', async () => {
    const report = sampleReport();
    const target = path.join(dir, 'nested', 'report.json');

    await expect(report.renderJson(target)).resolves.toBe(target);

    const parsed = JSON.parse(await readFile(target, 'utf8')) as SmokeReportDocument;
    const { total, passed, failed } = report.summary();
    expect({ total: parsed.summary.total, passed: parsed.summary.passed, failed: parsed.summary.failed }).toEqual({
      total,
      passed,
      failed,
    });
  });

  it('rejects with ReportWriteError when the target directory cannot be created', async () => {
    const blocker = path.join(dir, 'blocker');
    await writeFile(blocker, 'not a directory', 'utf8');
    const target = path.join(blocker, 'report.html');

    const error = await sampleReport()
      .renderHtml(target)
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ReportWriteError);
    expect(error).toMatchObject({ format: 'html', path: target });
  });

  it('writes every format with renderAll and reports each one', async () => {
    const artifacts = await sampleReport().renderAll(dir);

    expect(artifacts).toEqual([
      { format: 'json', path: path.join(dir, 'smoke-test-report.json'), ok: true },
      { format: 'html', path: path.join(dir, 'smoke-test-report.html'), ok: true },
      { format: 'markdown', path: path.join(dir, 'smoke-test-report.md'), ok: true },
    ]);
    const markdown = await readFile(path.join(dir, 'smoke-test-report.md'), 'utf8');
    expect(markdown.startsWith('# Smoke Test Report\n')).toBe(true);
  });

  it('keeps writing the other formats when one fails', async () => {
    const report = sampleReport();
    const blocker = path.join(dir, 'blocker');
    await writeFile(blocker, 'file', 'utf8');

    const artifacts = await report.renderAll(path.join(blocker, 'out'));
    await report.renderMarkdown(path.join(dir, 'after.md'));

    expect(artifacts.map((artifact) => artifact.ok)).toEqual([false, false, false]);
    expect(artifacts[0].error).toMatch(/^Failed to write json report to /);
    await expect(readFile(path.join(dir, 'after.md'), 'utf8')).resolves.toContain('# Smoke Test Report');
  });
});
