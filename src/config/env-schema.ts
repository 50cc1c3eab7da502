/**
 * Registry of every environment key the harness reads.
 *
 * Each entry declares:
 *   - `key`         The exact env variable name.
 *   - `format`      How the raw value is validated.
 *   - `scope`       Subsystem that owns the key.
 *   - `description` Human-readable purpose.
 *   - `remediation` Actionable hint when the value is invalid.
 *
 * Every key is optional: an absent key falls back to its default, and an
 * absent EXTERNAL_* key leaves that service out of the connectivity check.
 */

export type EnvKeyFormat = 'string' | 'url' | 'host-port' | 'positive-int' | 'non-negative-int' | 'port';

export type EnvKeyScope = 'runtime' | 'report' | 'containers' | 'external-services' | 'end-to-end';

export interface EnvKeySpec {
  key: string;
  format: EnvKeyFormat;
  scope: EnvKeyScope;
  description: string;
  remediation: string;
}

export const ENV_SCHEMA: readonly EnvKeySpec[] = [
  // ── Runtime ─────────────────────────────────────────────────────────────────
  {
    key: 'SMOKE_APP_NAME',
    format: 'string',
    scope: 'report',
    description: 'Application name printed in every report.',
    remediation: 'Set SMOKE_APP_NAME to the name of the application under test.',
  },
  {
    key: 'SMOKE_ENVIRONMENT',
    format: 'string',
    scope: 'report',
    description: 'Environment label printed in every report (local, ci, staging, …).',
    remediation: 'Set SMOKE_ENVIRONMENT to a short environment label.',
  },
  {
    key: 'SMOKE_REPORT_DIR',
    format: 'string',
    scope: 'report',
    description: 'Directory receiving JSON, HTML and Markdown reports when `run` is given no output flag. Unset writes no files.',
    remediation: 'Point SMOKE_REPORT_DIR at a writable directory.',
  },
  {
    key: 'SMOKE_LOG_DIR',
    format: 'string',
    scope: 'runtime',
    description: 'Directory for the daily harness log file.',
    remediation: 'Point SMOKE_LOG_DIR at a writable directory.',
  },
  {
    key: 'SMOKE_API_PORT',
    format: 'port',
    scope: 'runtime',
    description: 'Port of the `serve` health endpoint.',
    remediation: 'SMOKE_API_PORT must be an integer between 1 and 65535.',
  },
  {
    key: 'SMOKE_CONNECT_TIMEOUT_MS',
    format: 'positive-int',
    scope: 'external-services',
    description: 'Per-probe connect/read timeout in milliseconds.',
    remediation: 'SMOKE_CONNECT_TIMEOUT_MS must be a positive integer (default 5000).',
  },
  {
    key: 'SMOKE_RETRY_COUNT',
    format: 'positive-int',
    scope: 'external-services',
    description: 'Attempts per external-service probe.',
    remediation: 'SMOKE_RETRY_COUNT must be a positive integer (default 3).',
  },
  {
    key: 'SMOKE_RETRY_DELAY_MS',
    format: 'non-negative-int',
    scope: 'external-services',
    description: 'Delay between probe attempts in milliseconds.',
    remediation: 'SMOKE_RETRY_DELAY_MS must be zero or a positive integer (default 1000).',
  },

  // ── Containers ──────────────────────────────────────────────────────────────
  {
    key: 'SMOKE_MANIFEST_PATH',
    format: 'string',
    scope: 'containers',
    description: 'Path of the container manifest (smoke-harness.json).',
    remediation: 'Point SMOKE_MANIFEST_PATH at a manifest listing the expected containers.',
  },
  {
    key: 'SMOKE_CONTAINER_HOST',
    format: 'string',
    scope: 'containers',
    description: 'Host name reported for published container ports.',
    remediation: 'Set SMOKE_CONTAINER_HOST to the address the Docker ports are published on.',
  },

  // ── External services ───────────────────────────────────────────────────────
  {
    key: 'EXTERNAL_REDIS_URL',
    format: 'host-port',
    scope: 'external-services',
    description: 'Optional external Redis, `redis://host:port` or `host:port`.',
    remediation: 'Use the form redis://host:6379.',
  },
  {
    key: 'EXTERNAL_KAFKA_URL',
    format: 'host-port',
    scope: 'external-services',
    description: 'Optional external Kafka bootstrap server, `host:port`.',
    remediation: 'Use the form broker-host:9092.',
  },
  {
    key: 'EXTERNAL_CASSANDRA_URL',
    format: 'host-port',
    scope: 'external-services',
    description: 'Optional external Cassandra contact point, `host:port`.',
    remediation: 'Use the form cassandra-host:9042.',
  },
  {
    key: 'EXTERNAL_API_HEALTH_CHECK_URL',
    format: 'url',
    scope: 'external-services',
    description: 'Health URL of a required external API; must answer 2xx.',
    remediation: 'Use an absolute http(s) URL, e.g. https://api.internal/health.',
  },

  // ── End-to-end ──────────────────────────────────────────────────────────────
  {
    key: 'SMOKE_APP_BASE_URL',
    format: 'url',
    scope: 'end-to-end',
    description: 'Base URL of the running application; enables the end-to-end workflow.',
    remediation: 'Use an absolute http(s) URL, e.g. http://localhost:8080.',
  },
];
