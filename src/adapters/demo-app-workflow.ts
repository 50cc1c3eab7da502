import type { EndToEndCallback } from '../types/health-harness.js';

export interface DemoAppWorkflowOptions {
  timeoutMs?: number;
  message?: string;
}

interface CacheTestResponse {
  key?: unknown;
  retrievedValue?: unknown;
  success?: unknown;
}

const DEFAULT_TIMEOUT_MS = 5000;

function endpoint(baseUrl: string, route: string): string {
  return new URL(route, baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`).toString();
}

async function requestJson(url: string, init: RequestInit, timeoutMs: number): Promise<unknown> {
  const response = await fetch(url, {
    ...init,
    headers: { accept: 'application/json', ...(init.body ? { 'content-type': 'application/json' } : {}) },
    signal: AbortSignal.timeout(timeoutMs),
  });
  const text = await response.text();

  if (!response.ok) {
    throw new Error(`${init.method ?? 'GET'} ${url} returned HTTP ${response.status}`);
  }
  if (text.length === 0) {
    return null;
  }
  try {
    return JSON.parse(text) as unknown;
  } catch {
    throw new Error(`${init.method ?? 'GET'} ${url} returned a non-JSON body`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * End-to-end workflow over the demo application's REST API:
 *
 * 1. `GET /cache/test` writes and reads back a cache key; `success` must be `"true"`.
 * 2. `POST /kafka/produce` publishes a message.
 * 3. `GET /cassandra/users` queries the user table.
 *
 * Any non-2xx status or unexpected payload rejects with the failing step.
 */
export function createDemoAppWorkflow(baseUrl: string, options: DemoAppWorkflowOptions = {}): EndToEndCallback {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const message = options.message ?? 'e2e-smoke-test-message';

  return async () => {
    const cache = await requestJson(endpoint(baseUrl, 'cache/test'), { method: 'GET' }, timeoutMs);
    const cacheBody: CacheTestResponse = isRecord(cache) ? cache : {};
    if (String(cacheBody.success) !== 'true') {
      throw new Error(`Cache round-trip failed: retrieved ${JSON.stringify(cacheBody.retrievedValue ?? null)}`);
    }

    await requestJson(
      endpoint(baseUrl, 'kafka/produce'),
      { method: 'POST', body: JSON.stringify({ message }) },
      timeoutMs,
    );

    const users = await requestJson(endpoint(baseUrl, 'cassandra/users'), { method: 'GET' }, timeoutMs);
    if (!Array.isArray(users)) {
      throw new Error('Datastore query failed: /cassandra/users did not return a list');
    }
  };
}
