import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

export type LogLevel = 'info' | 'warn' | 'error';

const REDACTED = '[REDACTED]';

const SENSITIVE_ENV_PATTERN = /(SECRET|TOKEN|PASSWORD|PASSWD|API_KEY|PRIVATE_KEY|CREDENTIAL)/i;

const KEY_VALUE_PATTERN =
  /\b([A-Za-z0-9_]*(?:secret|token|password|passwd|api[_-]?key|private[_-]?key)[A-Za-z0-9_]*)\s*[=:]\s*("[^"]*"|'[^']*'|[^\s,;&]+)/gi;

const BEARER_PATTERN = /\bBearer\s+[A-Za-z0-9._~+/-]+=*/g;

const URL_CREDENTIALS_PATTERN = /(\b[a-z][a-z0-9+.-]*:\/\/)([^\s/:@]+):([^\s/@]+)@/gi;

function logDir(): string {
  return process.env.SMOKE_LOG_DIR?.trim() || 'logs';
}

function currentDateIso(): string {
  return new Date().toISOString().slice(0, 10);
}

/**
 * Redact credentials before text reaches a log file, console or report:
 * `key=value` pairs with sensitive keys, bearer tokens, `user:pass@` in URLs,
 * and the raw values of sensitive environment variables wherever they appear.
 */
export function scrubSensitiveText(text: string): string {
  let scrubbed = text
    .replace(KEY_VALUE_PATTERN, (_match, key: string) => `${key}=${REDACTED}`)
    .replace(BEARER_PATTERN, `Bearer ${REDACTED}`)
    .replace(URL_CREDENTIALS_PATTERN, (_match, scheme: string, user: string) => `${scheme}${user}:${REDACTED}@`);

  for (const [key, value] of Object.entries(process.env)) {
    if (!value || value.length < 8 || !SENSITIVE_ENV_PATTERN.test(key)) {
      continue;
    }
    scrubbed = scrubbed.split(value).join(REDACTED);
  }

  return scrubbed;
}

/**
 * Append a timestamped line to today's log file (`<SMOKE_LOG_DIR>/<YYYY-MM-DD>.md`).
 * Logging failures are reported on stderr and never propagate to the caller.
 */
export async function logThought(message: string): Promise<void> {
  const line = `- ${new Date().toISOString()} ${scrubSensitiveText(message)}\n`;
  const dir = logDir();

  try {
    await mkdir(dir, { recursive: true });
    await appendFile(path.join(dir, `${currentDateIso()}.md`), line, 'utf8');
  } catch (err) {
    console.error(`[Smoke] Failed to write log entry: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/** Print to the console and mirror the line into the daily log file. */
export function logConsole(level: LogLevel, message: string): void {
  const scrubbed = scrubSensitiveText(message);
  if (level === 'error') {
    console.error(scrubbed);
  } else if (level === 'warn') {
    console.warn(scrubbed);
  } else {
    console.log(scrubbed);
  }
  void logThought(level === 'info' ? scrubbed : `[${level.toUpperCase()}] ${scrubbed}`);
}
