import { Socket } from 'node:net';
import { lookup } from 'node:dns/promises';
import type { Probe } from '../types/health-harness.js';
import { describeError, ProbeTimeoutError } from '../types/errors.js';
import { logThought } from '../utils/logger.js';
import { RETRY_DEFAULTS, sleep, withRetry } from '../utils/retry.js';

export const DEFAULT_TIMEOUT_MS = 5000;
export const DEFAULT_RETRY_COUNT = RETRY_DEFAULTS.maxAttempts;
export const DEFAULT_RETRY_DELAY_MS = RETRY_DEFAULTS.baseDelayMs;

const AVAILABILITY_ATTEMPT_TIMEOUT_MS = 1000;
const AVAILABILITY_POLL_INTERVAL_MS = 500;

export interface ConnectionMetrics {
  success: boolean;
  elapsedMs: number;
  error?: string;
}

export interface AvailabilityOptions {
  attemptTimeoutMs?: number;
  pollIntervalMs?: number;
}

// ── Primitive probes ─────────────────────────────────────────────────────────
//
// Every probe resolves to a boolean. I/O errors and timeouts are logged and
// reported as `false`; nothing here rejects except executeWithTimeout.

/** Resolve `true` iff a TCP connection to `host:port` completes within `timeoutMs`. */
export function testTcpConnection(host: string, port: number, timeoutMs = DEFAULT_TIMEOUT_MS): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = new Socket();
    let settled = false;

    const finish = (ok: boolean, reason?: string): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      if (!ok) {
        void logThought(`[Probe] TCP connection failed to ${host}:${port} - ${reason ?? 'unknown error'}`);
      }
      resolve(ok);
    };

    const timer = setTimeout(() => finish(false, `timed out after ${timeoutMs}ms`), timeoutMs);

    socket.once('connect', () => finish(true));
    socket.once('error', (err) => finish(false, err.message));

    try {
      socket.connect({ host, port });
    } catch (err) {
      // Out-of-range ports throw synchronously.
      finish(false, describeError(err));
    }
  });
}

/**
 * Issue a GET against `url`; `true` iff the status is 2xx. The timeout bounds
 * the whole exchange, connect through reading the body.
 */
export async function testHttpEndpoint(url: string, timeoutMs = DEFAULT_TIMEOUT_MS): Promise<boolean> {
  try {
    const response = await fetch(url, {
      method: 'GET',
      signal: AbortSignal.timeout(timeoutMs),
    });
    await response.arrayBuffer();

    if (response.status >= 200 && response.status < 300) {
      return true;
    }
    void logThought(`[Probe] HTTP endpoint check failed: ${url} (Status: ${response.status})`);
    return false;
  } catch (err) {
    void logThought(`[Probe] HTTP endpoint check failed: ${url} - ${describeError(err)}`);
    return false;
  }
}

export async function verifyDnsResolution(hostname: string): Promise<boolean> {
  try {
    await lookup(hostname);
    return true;
  } catch (err) {
    void logThought(`[Probe] DNS resolution failed for ${hostname}: ${describeError(err)}`);
    return false;
  }
}

// ── Composition ──────────────────────────────────────────────────────────────

/**
 * Call `probe` up to `retryCount` times with `delayMs` between attempts.
 * A probe that throws counts as a failed attempt. A `retryCount` below 1,
 * or one that is not a finite number, makes no call and returns false.
 */
export async function testConnectionWithRetry(
  probe: Probe,
  retryCount = DEFAULT_RETRY_COUNT,
  delayMs = DEFAULT_RETRY_DELAY_MS,
  label = 'connection',
): Promise<boolean> {
  if (!Number.isFinite(retryCount) || retryCount < 1) {
    void logThought(`[Probe] ${label} not attempted: retry count ${retryCount} allows no calls.`);
    return false;
  }

  const result = await withRetry(
    async () => {
      if (!(await probe())) {
        throw new Error('probe reported unreachable');
      }
      return true;
    },
    { maxAttempts: retryCount, baseDelayMs: delayMs, backoffFactor: 1, label },
  );
  return result.ok;
}

/** Poll `host:port` until it accepts a TCP connection or `timeoutMs` elapses. */
export async function waitForServiceAvailability(
  host: string,
  port: number,
  timeoutMs: number,
  options: AvailabilityOptions = {},
): Promise<boolean> {
  const attemptTimeoutMs = options.attemptTimeoutMs ?? AVAILABILITY_ATTEMPT_TIMEOUT_MS;
  const pollIntervalMs = options.pollIntervalMs ?? AVAILABILITY_POLL_INTERVAL_MS;
  const deadline = Date.now() + timeoutMs;

  while (Date.now() < deadline) {
    const remaining = deadline - Date.now();
    if (await testTcpConnection(host, port, Math.min(attemptTimeoutMs, Math.max(remaining, 1)))) {
      return true;
    }
    if (Date.now() + pollIntervalMs >= deadline) {
      break;
    }
    await sleep(pollIntervalMs);
  }

  void logThought(`[Probe] Service ${host}:${port} did not become available within ${timeoutMs}ms`);
  return false;
}

/** Time a single probe call. Exceptions are captured in `error`, not rethrown. */
export async function measureConnectionTime(probe: Probe): Promise<ConnectionMetrics> {
  const started = performance.now();
  try {
    const success = await probe();
    return { success, elapsedMs: Math.round(performance.now() - started) };
  } catch (err) {
    const error = describeError(err);
    void logThought(`[Probe] Connection measurement failed: ${error}`);
    return { success: false, elapsedMs: Math.round(performance.now() - started), error };
  }
}

/** Race `task` against a deadline; rejects with {@link ProbeTimeoutError} when it loses. */
export async function executeWithTimeout<T>(task: () => Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ProbeTimeoutError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([task(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

// ── Probe factories ──────────────────────────────────────────────────────────

export function tcpProbe(host: string, port: number, timeoutMs = DEFAULT_TIMEOUT_MS): Probe {
  return () => testTcpConnection(host, port, timeoutMs);
}

export function httpProbe(url: string, timeoutMs = DEFAULT_TIMEOUT_MS): Probe {
  return () => testHttpEndpoint(url, timeoutMs);
}

export function retryingProbe(
  probe: Probe,
  retryCount = DEFAULT_RETRY_COUNT,
  delayMs = DEFAULT_RETRY_DELAY_MS,
  label?: string,
): Probe {
  return () => testConnectionWithRetry(probe, retryCount, delayMs, label);
}
