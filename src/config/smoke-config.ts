import { ENV_SCHEMA } from './env-schema.js';
import type { EnvKeySpec } from './env-schema.js';

export interface ProbeTimeouts {
  connectMs: number;
  retryCount: number;
  retryDelayMs: number;
}

export interface ExternalServiceUrls {
  redis: string | null;
  kafka: string | null;
  cassandra: string | null;
  apiHealthCheck: string | null;
}

export interface SmokeConfig {
  applicationName: string;
  environment: string;
  /** Where `run` writes every report format when no output flag is given; null writes none. */
  reportDir: string | null;
  manifestPath: string;
  containerHost: string;
  apiPort: number;
  timeouts: ProbeTimeouts;
  external: ExternalServiceUrls;
  appBaseUrl: string | null;
}

export interface ConfigIssue {
  key: string;
  message: string;
  remediation: string;
}

export interface LoadedSmokeConfig {
  config: SmokeConfig;
  /** Keys whose values were rejected; each fell back to its default. */
  issues: ConfigIssue[];
}

export interface HostPort {
  host: string;
  port: number;
}

export const CONFIG_DEFAULTS = {
  applicationName: 'application',
  environment: 'local',
  manifestPath: 'smoke-harness.json',
  containerHost: 'localhost',
  apiPort: 18790,
  connectMs: 5000,
  retryCount: 3,
  retryDelayMs: 1000,
} as const;

// ── Parsing helpers ──────────────────────────────────────────────────────────

function readRaw(env: NodeJS.ProcessEnv, key: string): string | null {
  const raw = env[key];
  if (typeof raw !== 'string') return null;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function parseInteger(raw: string): number | null {
  if (!/^-?\d+$/.test(raw)) return null;
  const parsed = Number(raw);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

function isHttpUrl(raw: string): boolean {
  try {
    const url = new URL(raw);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Split `host:port`, optionally prefixed by a scheme (`redis://host:6379`).
 * The port falls back to `defaultPort` when omitted; returns null when the
 * host is empty or the port is not in 1–65535.
 */
export function parseHostPort(raw: string, defaultPort: number): HostPort | null {
  const withoutScheme = raw.trim().replace(/^[a-z][a-z0-9+.-]*:\/\//i, '');
  const authority = withoutScheme.split('/')[0] ?? '';
  const hostPart = authority.includes('@') ? authority.slice(authority.lastIndexOf('@') + 1) : authority;
  if (hostPart.length === 0) return null;

  if (hostPart.startsWith('[')) {
    // Bracketed IPv6 literal: [::1] or [::1]:9042
    const close = hostPart.indexOf(']');
    const host = close === -1 ? '' : hostPart.slice(1, close);
    const rest = close === -1 ? '' : hostPart.slice(close + 1);
    if (host.length === 0 || (rest.length > 0 && !rest.startsWith(':'))) return null;
    if (rest.length === 0) return { host, port: defaultPort };
    const port = parseInteger(rest.slice(1));
    return port !== null && port >= 1 && port <= 65535 ? { host, port } : null;
  }

  const separator = hostPart.lastIndexOf(':');
  if (separator === -1) {
    return { host: hostPart, port: defaultPort };
  }

  const host = hostPart.slice(0, separator);
  const port = parseInteger(hostPart.slice(separator + 1));
  if (host.length === 0 || port === null || port < 1 || port > 65535) {
    return null;
  }
  return { host, port };
}

/** Validate one key's raw value against its declared format. Returns an issue message or null. */
function formatError(spec: EnvKeySpec, raw: string): string | null {
  switch (spec.format) {
    case 'string':
      return null;
    case 'url':
      return isHttpUrl(raw) ? null : `${spec.key} must be an absolute http(s) URL, got '${raw}'.`;
    case 'host-port':
      return parseHostPort(raw, 1) ? null : `${spec.key} must look like host:port, got '${raw}'.`;
    case 'positive-int': {
      const parsed = parseInteger(raw);
      return parsed !== null && parsed > 0 ? null : `${spec.key} must be a positive integer, got '${raw}'.`;
    }
    case 'non-negative-int': {
      const parsed = parseInteger(raw);
      return parsed !== null && parsed >= 0 ? null : `${spec.key} must be a non-negative integer, got '${raw}'.`;
    }
    case 'port': {
      const parsed = parseInteger(raw);
      return parsed !== null && parsed >= 1 && parsed <= 65535
        ? null
        : `${spec.key} must be an integer in range 1–65535, got '${raw}'.`;
    }
  }
}

// ── Loader ───────────────────────────────────────────────────────────────────

/**
 * Read the harness configuration from `env`. Invalid values are reported as
 * issues and replaced by their defaults; nothing here throws.
 */
export function loadSmokeConfig(env: NodeJS.ProcessEnv = process.env): LoadedSmokeConfig {
  const issues: ConfigIssue[] = [];
  const valid = new Map<string, string>();

  for (const spec of ENV_SCHEMA) {
    const raw = readRaw(env, spec.key);
    if (raw === null) continue;

    const error = formatError(spec, raw);
    if (error) {
      issues.push({ key: spec.key, message: error, remediation: spec.remediation });
      continue;
    }
    valid.set(spec.key, raw);
  }

  const text = (key: string, fallback: string): string => valid.get(key) ?? fallback;
  const int = (key: string, fallback: number): number => {
    const raw = valid.get(key);
    return raw === undefined ? fallback : Number(raw);
  };
  const optional = (key: string): string | null => valid.get(key) ?? null;

  const config: SmokeConfig = {
    applicationName: text('SMOKE_APP_NAME', CONFIG_DEFAULTS.applicationName),
    environment: text('SMOKE_ENVIRONMENT', CONFIG_DEFAULTS.environment),
    reportDir: optional('SMOKE_REPORT_DIR'),
    manifestPath: text('SMOKE_MANIFEST_PATH', CONFIG_DEFAULTS.manifestPath),
    containerHost: text('SMOKE_CONTAINER_HOST', CONFIG_DEFAULTS.containerHost),
    apiPort: int('SMOKE_API_PORT', CONFIG_DEFAULTS.apiPort),
    timeouts: {
      connectMs: int('SMOKE_CONNECT_TIMEOUT_MS', CONFIG_DEFAULTS.connectMs),
      retryCount: int('SMOKE_RETRY_COUNT', CONFIG_DEFAULTS.retryCount),
      retryDelayMs: int('SMOKE_RETRY_DELAY_MS', CONFIG_DEFAULTS.retryDelayMs),
    },
    external: {
      redis: optional('EXTERNAL_REDIS_URL'),
      kafka: optional('EXTERNAL_KAFKA_URL'),
      cassandra: optional('EXTERNAL_CASSANDRA_URL'),
      apiHealthCheck: optional('EXTERNAL_API_HEALTH_CHECK_URL'),
    },
    appBaseUrl: optional('SMOKE_APP_BASE_URL'),
  };

  return { config, issues };
}
