import Docker from 'dockerode';
import type { Server } from 'node:http';
import { loadSmokeConfig, type SmokeConfig } from '../config/smoke-config.js';
import { createEnvironmentSource } from '../adapters/environment-source.js';
import { startApiServer } from '../api/router.js';
import type { HarnessRunOptions, HarnessSource } from '../types/health-harness.js';
import type { ReportFormat } from '../types/report.js';
import { describeError } from '../types/errors.js';
import { runSmokeSuite } from '../services/smoke-runner.js';
import type { SmokeReport } from '../services/smoke-report.js';

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: smoke-harness [command] [options]

Commands:
  run                 Check containers, external services and the end-to-end workflow (default)
  serve               Serve GET /health and GET /health/live over HTTP

Run options:
  --json <path>       Write the JSON report to <path>
  --html <path>       Write the HTML report to <path>
  --markdown <path>   Write the Markdown report to <path>
  --report-dir <dir>  Write all three formats into <dir> (default SMOKE_REPORT_DIR)
  --skip-containers   Skip the container health check
  --skip-services     Skip the external services connectivity check
  --skip-e2e          Skip the end-to-end functionality check

Serve options:
  --port <n>          Listen port (default SMOKE_API_PORT or 18790)

Options:
  --help, -h          Show this help message

Exit codes:
  0  every required check passed
  1  a required check failed, or the configuration is invalid

Examples:
  smoke-harness run --report-dir reports/smoke
  smoke-harness run --json out/smoke.json --skip-e2e
  smoke-harness serve --port 8081
`.trim();

const KNOWN_COMMANDS = new Set(['run', 'serve']);

// ── Argument parsing ─────────────────────────────────────────────────────────

export interface RunArgs {
  outputs: Array<{ format: ReportFormat; path: string }>;
  reportDir?: string;
  skipContainers: boolean;
  skipServices: boolean;
  skipEndToEnd: boolean;
}

const OUTPUT_FLAGS: Record<string, ReportFormat> = {
  '--json': 'json',
  '--html': 'html',
  '--markdown': 'markdown',
};

export function parseRunArgs(argv: string[]): RunArgs {
  const parsed: RunArgs = { outputs: [], skipContainers: false, skipServices: false, skipEndToEnd: false };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    const next = argv[i + 1];
    const hasValue = next !== undefined && next !== '' && !next.startsWith('--');

    const format = OUTPUT_FLAGS[token];
    if (format && hasValue) {
      parsed.outputs.push({ format, path: next });
      i += 1;
      continue;
    }
    if (token === '--report-dir' && hasValue) {
      parsed.reportDir = next;
      i += 1;
      continue;
    }
    if (token === '--skip-containers') parsed.skipContainers = true;
    if (token === '--skip-services') parsed.skipServices = true;
    if (token === '--skip-e2e') parsed.skipEndToEnd = true;
  }

  return parsed;
}

function parsePort(argv: string[], fallback: number): number | null {
  const index = argv.indexOf('--port');
  if (index === -1) return fallback;
  const raw = argv[index + 1] ?? '';
  const port = Number(raw);
  return /^\d+$/.test(raw) && port >= 1 && port <= 65535 ? port : null;
}

// ── Dependencies ─────────────────────────────────────────────────────────────

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  createSource?: (config: SmokeConfig) => HarnessSource;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

function resolveDeps(deps: CliDeps) {
  return {
    env: deps.env ?? process.env,
    createSource:
      deps.createSource ?? ((config: SmokeConfig) => createEnvironmentSource(config, { docker: new Docker() })),
    stdout: deps.stdout ?? ((text: string) => console.log(text)),
    stderr: deps.stderr ?? ((text: string) => console.error(text)),
  };
}

/** Load config; print every issue and return null when any value was rejected. */
function loadConfigOrReport(env: NodeJS.ProcessEnv, stderr: (text: string) => void): SmokeConfig | null {
  const { config, issues } = loadSmokeConfig(env);
  if (issues.length === 0) {
    return config;
  }
  stderr('[Smoke] Configuration is invalid:');
  for (const issue of issues) {
    stderr(`  ✗ ${issue.message}`);
    stderr(`    → ${issue.remediation}`);
  }
  return null;
}

async function writeReports(
  report: SmokeReport,
  args: RunArgs,
  stdout: (text: string) => void,
  stderr: (text: string) => void,
): Promise<void> {
  for (const output of args.outputs) {
    try {
      await report.render(output.format, output.path);
      stdout(`[Smoke] ${output.format.toUpperCase()} report → ${output.path}`);
    } catch (err) {
      stderr(`[Smoke] ${describeError(err)}`);
    }
  }

  if (args.reportDir) {
    for (const artifact of await report.renderAll(args.reportDir)) {
      if (artifact.ok) {
        stdout(`[Smoke] ${artifact.format.toUpperCase()} report → ${artifact.path}`);
      } else {
        stderr(`[Smoke] ${artifact.error ?? `Failed to write ${artifact.path}`}`);
      }
    }
  }
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle the `run` command (also the default when no command is given).
 * Sets exit code 0 when every required check passed, 1 otherwise.
 * Returns `true` when the command was recognized and handled.
 */
export async function handleRunCli(argv: string[], deps: CliDeps = {}): Promise<boolean> {
  if (argv.length > 0 && argv[0] !== 'run' && !argv[0].startsWith('--')) return false;

  const { env, createSource, stdout, stderr } = resolveDeps(deps);
  const config = loadConfigOrReport(env, stderr);
  if (!config) {
    process.exitCode = 1;
    return true;
  }

  const args = parseRunArgs(argv[0] === 'run' ? argv.slice(1) : argv);
  if (args.outputs.length === 0 && !args.reportDir && config.reportDir) {
    args.reportDir = config.reportDir;
  }
  const runOptions: HarnessRunOptions = {
    skipContainers: args.skipContainers,
    skipServices: args.skipServices,
    skipEndToEnd: args.skipEndToEnd || config.appBaseUrl === null,
  };
  if (!args.skipEndToEnd && config.appBaseUrl === null) {
    stdout('[Smoke] SMOKE_APP_BASE_URL is not set; skipping the end-to-end functionality check.');
  }

  try {
    const { run, report } = await runSmokeSuite(createSource(config), {
      applicationName: config.applicationName,
      environment: config.environment,
      ...runOptions,
      onLog: (level, message) => {
        if (level !== 'info') stderr(`[Smoke] ${message}`);
      },
    });

    report.printConsole(stdout);
    await writeReports(report, args, stdout, stderr);

    if (run.ok) {
      stdout('[Smoke] All required checks passed.');
      process.exitCode = 0;
    } else {
      stderr('[Smoke] Smoke test FAILED:');
      for (const failure of run.failures) {
        stderr(`  ✗ ${failure.message}`);
      }
      process.exitCode = 1;
    }
  } catch (err) {
    stderr(`[Smoke] Smoke run aborted: ${describeError(err)}`);
    process.exitCode = 1;
  }

  return true;
}

/**
 * Handle the `serve` command. Resolves with the listening server, or null
 * when the command was not `serve` or could not start.
 */
export async function handleServeCli(argv: string[], deps: CliDeps = {}): Promise<Server | null> {
  if (argv[0] !== 'serve') return null;

  const { env, createSource, stderr } = resolveDeps(deps);
  const config = loadConfigOrReport(env, stderr);
  if (!config) {
    process.exitCode = 1;
    return null;
  }

  const port = parsePort(argv.slice(1), config.apiPort);
  if (port === null) {
    stderr('[Smoke] --port must be an integer in range 1–65535.');
    process.exitCode = 1;
    return null;
  }

  try {
    return await startApiServer(
      {
        createSource: () => createSource(config),
        applicationName: config.applicationName,
        environment: config.environment,
        runOptions: { skipEndToEnd: config.appBaseUrl === null },
      },
      port,
    );
  } catch (err) {
    stderr(`[Smoke] Failed to start health API: ${describeError(err)}`);
    process.exitCode = 1;
    return null;
  }
}

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[], stdout: (text: string) => void = console.log): boolean {
  if (!argv.includes('--help') && !argv.includes('-h')) return false;

  stdout(HELP_TEXT);
  process.exitCode = 0;
  return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[], stderr: (text: string) => void = console.error): boolean {
  if (argv.length === 0) return false;

  const command = argv[0];
  if (KNOWN_COMMANDS.has(command) || command.startsWith('--') || command === '-h') {
    return false;
  }

  stderr(`[Smoke] Unknown command: '${command}'`);
  stderr(`Run 'smoke-harness --help' to see available commands.`);
  process.exitCode = 1;
  return true;
}
