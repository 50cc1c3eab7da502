import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { CheckResult } from '../types/health-harness.js';
import type {
  RenderedArtifact,
  ReportEntry,
  ReportFormat,
  ReportSummary,
  SmokeReportDocument,
} from '../types/report.js';
import { describeError, ReportWriteError } from '../types/errors.js';
import { logThought } from '../utils/logger.js';

const RULE_WIDTH = 80;

const FILE_EXTENSIONS: Record<ReportFormat, string> = {
  json: 'json',
  html: 'html',
  markdown: 'md',
};

export interface SmokeReportOptions {
  now?: () => Date;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYY-MM-DD HH:mm:ss` in local time. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function escapeMarkdown(value: string): string {
  return value.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|');
}

type EntryStatus = 'pass' | 'warn' | 'fail';

const STATUS_LABELS: Record<EntryStatus, string> = {
  pass: '✓ PASS',
  warn: '⚠ WARN',
  fail: '✗ FAIL',
};

const MARKDOWN_LABELS: Record<EntryStatus, string> = {
  pass: '✅ PASS',
  warn: '⚠️ WARN',
  fail: '❌ FAIL',
};

export interface AddResultOptions {
  /** A failure that does not fail the run, such as an optional service; rendered as a warning. */
  warning?: boolean;
}

// ─── Report ───────────────────────────────────────────────────────────────────

/**
 * Accumulates named pass/fail entries plus free-form log lines and renders
 * them to the console, JSON, HTML or Markdown. Rendering never mutates the
 * entries and may be repeated in any order.
 */
export class SmokeReport {
  readonly applicationName: string;
  readonly environment: string;
  readonly testStartTime: Date;
  readonly #entries = new Map<string, ReportEntry>();
  readonly #warnings = new Set<string>();
  readonly #logs: string[] = [];

  constructor(applicationName: string, environment: string, options: SmokeReportOptions = {}) {
    this.applicationName = applicationName;
    this.environment = environment;
    this.testStartTime = (options.now ?? (() => new Date()))();
  }

  addResult(
    name: string,
    passed: boolean,
    message: string | null,
    durationMs: number,
    options: AddResultOptions = {},
  ): void {
    if (!passed && options.warning) {
      this.#warnings.add(name);
    } else {
      this.#warnings.delete(name);
    }
    this.#entries.set(name, {
      name,
      passed,
      message: message === null || message.length === 0 ? null : message,
      durationMs: Math.max(0, Math.round(durationMs)),
    });
  }

  /** Fold harness results in, in their recorded order. */
  addCheckResults(results: Iterable<CheckResult>, isWarning: (result: CheckResult) => boolean = () => false): void {
    for (const result of results) {
      this.addResult(result.subjectName, result.healthy, result.message, result.elapsedMs, {
        warning: isWarning(result),
      });
    }
  }

  #status(entry: ReportEntry): EntryStatus {
    if (entry.passed) return 'pass';
    return this.#warnings.has(entry.name) ? 'warn' : 'fail';
  }

  addLog(line: string): void {
    this.#logs.push(line);
  }

  entries(): ReportEntry[] {
    return [...this.#entries.values()].map((entry) => ({ ...entry }));
  }

  summary(): ReportSummary {
    let passed = 0;
    let totalDurationMs = 0;
    for (const entry of this.#entries.values()) {
      if (entry.passed) passed += 1;
      totalDurationMs += entry.durationMs;
    }
    const total = this.#entries.size;
    return { total, passed, failed: total - passed, totalDurationMs };
  }

  toDocument(): SmokeReportDocument {
    const testResults: Record<string, ReportEntry> = Object.fromEntries(
      this.entries().map((entry) => [entry.name, entry]),
    );
    return {
      applicationName: this.applicationName,
      environment: this.environment,
      testStartTime: formatTimestamp(this.testStartTime),
      summary: this.summary(),
      testResults,
      logs: [...this.#logs],
    };
  }

  // ── Console ────────────────────────────────────────────────────────────────

  formatConsole(): string {
    const { total, passed, failed, totalDurationMs } = this.summary();
    const lines: string[] = [];

    lines.push('');
    lines.push('='.repeat(RULE_WIDTH));
    lines.push('SMOKE TEST REPORT');
    lines.push('='.repeat(RULE_WIDTH));
    lines.push(`Application: ${this.applicationName}`);
    lines.push(`Environment: ${this.environment}`);
    lines.push(`Test Time: ${formatTimestamp(this.testStartTime)}`);
    lines.push('-'.repeat(RULE_WIDTH));
    lines.push(`Total Tests: ${total} | Passed: ${passed} | Failed: ${failed} | Duration: ${totalDurationMs}ms`);
    lines.push('-'.repeat(RULE_WIDTH));

    for (const entry of this.#entries.values()) {
      lines.push(`[${STATUS_LABELS[this.#status(entry)]}] ${entry.name} (${entry.durationMs}ms)`);
      if (!entry.passed && entry.message !== null) {
        lines.push(`    Reason: ${entry.message}`);
      }
    }

    lines.push('='.repeat(RULE_WIDTH));
    lines.push('');
    return lines.join('\n');
  }

  printConsole(write: (text: string) => void = console.log): void {
    write(this.formatConsole());
  }

  // ── Files ──────────────────────────────────────────────────────────────────

  formatJson(): string {
    return `${JSON.stringify(this.toDocument(), null, 2)}\n`;
  }

  formatHtml(): string {
    const { total, passed, failed, totalDurationMs } = this.summary();
    const app = escapeHtml(this.applicationName);
    const lines: string[] = [];

    lines.push('<!DOCTYPE html>');
    lines.push('<html>');
    lines.push('<head>');
    lines.push('<meta charset="utf-8">');
    lines.push(`<title>Smoke Test Report - ${app}</title>`);
    lines.push('<style>');
    lines.push('body { font-family: Arial, sans-serif; margin: 20px; background-color: #f5f5f5; }');
    lines.push('.container { max-width: 1200px; margin: 0 auto; background: white; padding: 20px; box-shadow: 0 0 10px rgba(0,0,0,0.1); }');
    lines.push('h1 { color: #333; border-bottom: 3px solid #007bff; padding-bottom: 10px; }');
    lines.push('.summary { background: #e9ecef; padding: 15px; border-radius: 5px; margin: 20px 0; }');
    lines.push('.test-result { margin: 10px 0; padding: 10px; border-left: 4px solid; }');
    lines.push('.pass { border-color: #28a745; background: #d4edda; }');
    lines.push('.fail { border-color: #dc3545; background: #f8d7da; }');
    lines.push('.warn { border-color: #ffc107; background: #fff3cd; }');
    lines.push('.metric { display: inline-block; margin-right: 20px; }');
    lines.push('</style>');
    lines.push('</head>');
    lines.push('<body>');
    lines.push('<div class="container">');
    lines.push('<h1>Smoke Test Report</h1>');
    lines.push('<div class="summary">');
    lines.push(`<p><strong>Application:</strong> ${app}</p>`);
    lines.push(`<p><strong>Environment:</strong> ${escapeHtml(this.environment)}</p>`);
    lines.push(`<p><strong>Test Time:</strong> ${formatTimestamp(this.testStartTime)}</p>`);
    lines.push('<div>');
    lines.push(`<span class="metric"><strong>Total:</strong> ${total}</span>`);
    lines.push(`<span class="metric pass-count"><strong>Passed:</strong> ${passed}</span>`);
    lines.push(`<span class="metric fail-count"><strong>Failed:</strong> ${failed}</span>`);
    lines.push(`<span class="metric"><strong>Duration:</strong> ${totalDurationMs}ms</span>`);
    lines.push('</div>');
    lines.push('</div>');
    lines.push('<h2>Test Results</h2>');

    for (const entry of this.#entries.values()) {
      const status = this.#status(entry);
      lines.push(`<div class="test-result ${status}">`);
      lines.push(
        `<strong>${STATUS_LABELS[status]}</strong> ${escapeHtml(entry.name)} <em>(${entry.durationMs}ms)</em>`,
      );
      if (!entry.passed && entry.message !== null) {
        lines.push(`<br><small>Reason: ${escapeHtml(entry.message)}</small>`);
      }
      lines.push('</div>');
    }

    if (this.#logs.length > 0) {
      lines.push('<h2>Logs</h2>');
      lines.push('<pre>');
      for (const log of this.#logs) {
        lines.push(escapeHtml(log));
      }
      lines.push('</pre>');
    }

    lines.push('</div>');
    lines.push('</body>');
    lines.push('</html>');
    lines.push('');
    return lines.join('\n');
  }

  formatMarkdown(): string {
    const { total, passed, failed, totalDurationMs } = this.summary();
    const lines: string[] = [];

    lines.push('# Smoke Test Report');
    lines.push('');
    lines.push('## Summary');
    lines.push('');
    lines.push(`- **Application:** ${escapeMarkdown(this.applicationName)}`);
    lines.push(`- **Environment:** ${escapeMarkdown(this.environment)}`);
    lines.push(`- **Test Time:** ${formatTimestamp(this.testStartTime)}`);
    lines.push('');
    lines.push('### Results');
    lines.push('');
    lines.push('| Metric | Value |');
    lines.push('|--------|-------|');
    lines.push(`| Total Tests | ${total} |`);
    lines.push(`| Passed | ${passed} |`);
    lines.push(`| Failed | ${failed} |`);
    lines.push(`| Duration | ${totalDurationMs}ms |`);
    lines.push('');
    lines.push('## Test Results');
    lines.push('');

    for (const entry of this.#entries.values()) {
      lines.push(`### ${MARKDOWN_LABELS[this.#status(entry)]} ${escapeMarkdown(entry.name)}`);
      lines.push('');
      lines.push(`- **Duration:** ${entry.durationMs}ms`);
      if (!entry.passed && entry.message !== null) {
        lines.push(`- **Reason:** ${escapeMarkdown(entry.message)}`);
      }
      lines.push('');
    }

    if (this.#logs.length > 0) {
      lines.push('## Logs');
      lines.push('');
      for (const log of this.#logs) {
        lines.push(`- ${escapeMarkdown(log)}`);
      }
      lines.push('');
    }

    return lines.join('\n');
  }

  async renderJson(outputPath: string): Promise<string> {
    return this.#write('json', outputPath, this.formatJson());
  }

  async renderHtml(outputPath: string): Promise<string> {
    return this.#write('html', outputPath, this.formatHtml());
  }

  async renderMarkdown(outputPath: string): Promise<string> {
    return this.#write('markdown', outputPath, this.formatMarkdown());
  }

  /**
   * Write every format into `dir` as `<basename>.<ext>`. A format that fails
   * to write is reported in the returned list; the others are still written.
   */
  async renderAll(dir: string, basename = 'smoke-test-report'): Promise<RenderedArtifact[]> {
    const artifacts: RenderedArtifact[] = [];
    const formats: ReportFormat[] = ['json', 'html', 'markdown'];

    for (const format of formats) {
      const target = path.join(dir, `${basename}.${FILE_EXTENSIONS[format]}`);
      try {
        await this.render(format, target);
        artifacts.push({ format, path: target, ok: true });
      } catch (err) {
        artifacts.push({ format, path: target, ok: false, error: describeError(err) });
      }
    }

    return artifacts;
  }

  async render(format: ReportFormat, outputPath: string): Promise<string> {
    switch (format) {
      case 'json':
        return this.renderJson(outputPath);
      case 'html':
        return this.renderHtml(outputPath);
      case 'markdown':
        return this.renderMarkdown(outputPath);
    }
  }

  async #write(format: ReportFormat, outputPath: string, contents: string): Promise<string> {
    try {
      await mkdir(path.dirname(outputPath), { recursive: true });
      await writeFile(outputPath, contents, 'utf8');
    } catch (err) {
      const error = new ReportWriteError(format, outputPath, err);
      void logThought(`[Report] ${error.message}`);
      throw error;
    }
    void logThought(`[Report] ${format.toUpperCase()} report generated: ${outputPath}`);
    return outputPath;
  }
}
