import { readFile } from 'node:fs/promises';
import { describeError } from '../types/errors.js';

type JsonRecord = Record<string, unknown>;

/** One container the harness expects to find running. */
export interface ManifestContainer {
  /** Subject name used in results and reports, e.g. `Redis`. */
  name: string;
  /** Category: cache, messaging, database, … */
  kind: string;
  /** Docker container name (without the leading slash). */
  container: string;
  /** Port inside the container whose published mapping is reported. */
  port: number;
}

export interface ContainerManifest {
  containers: ManifestContainer[];
}

export interface ManifestValidationResult {
  valid: boolean;
  errors: string[];
  manifest: ContainerManifest | null;
}

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readRequiredString(parent: JsonRecord, key: string, path: string, errors: string[]): string | null {
  const value = parent[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    errors.push(`${path} must be a non-empty string.`);
    return null;
  }
  return value.trim();
}

function readRequiredPort(parent: JsonRecord, key: string, path: string, errors: string[]): number | null {
  const value = parent[key];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    errors.push(`${path} must be an integer.`);
    return null;
  }
  if (value < 1 || value > 65535) {
    errors.push(`${path} must be between 1 and 65535.`);
    return null;
  }
  return value;
}

export function validateContainerManifest(input: unknown): ManifestValidationResult {
  const errors: string[] = [];

  if (!isRecord(input)) {
    return { valid: false, errors: ['Manifest root must be a JSON object.'], manifest: null };
  }

  const rawContainers = input.containers;
  if (!Array.isArray(rawContainers)) {
    return { valid: false, errors: ['containers must be an array.'], manifest: null };
  }

  const containers: ManifestContainer[] = [];
  const seen = new Set<string>();

  rawContainers.forEach((entry: unknown, index) => {
    const path = `containers[${index}]`;
    if (!isRecord(entry)) {
      errors.push(`${path} must be an object.`);
      return;
    }

    const name = readRequiredString(entry, 'name', `${path}.name`, errors);
    const kind = readRequiredString(entry, 'kind', `${path}.kind`, errors);
    const container = readRequiredString(entry, 'container', `${path}.container`, errors);
    const port = readRequiredPort(entry, 'port', `${path}.port`, errors);

    if (name !== null && seen.has(name)) {
      errors.push(`${path}.name '${name}' is declared more than once.`);
      return;
    }
    if (name === null || kind === null || container === null || port === null) {
      return;
    }

    seen.add(name);
    containers.push({ name, kind, container: container.replace(/^\//, ''), port });
  });

  return errors.length === 0
    ? { valid: true, errors, manifest: { containers } }
    : { valid: false, errors, manifest: null };
}

/** Read and validate a manifest file. I/O and JSON errors come back as validation errors. */
export async function loadContainerManifest(manifestPath: string): Promise<ManifestValidationResult> {
  let raw: string;
  try {
    raw = await readFile(manifestPath, 'utf8');
  } catch (err) {
    return { valid: false, errors: [`Unable to read ${manifestPath}: ${describeError(err)}`], manifest: null };
  }

  try {
    return validateContainerManifest(JSON.parse(raw) as unknown);
  } catch (err) {
    return { valid: false, errors: [`Unable to parse ${manifestPath}: ${describeError(err)}`], manifest: null };
  }
}
