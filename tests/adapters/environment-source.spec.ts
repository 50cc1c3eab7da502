import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
}));

import { createEnvironmentSource } from '../../src/adapters/environment-source.js';
import type { DockerClient } from '../../src/adapters/docker-container-source.js';
import { loadSmokeConfig, type SmokeConfig } from '../../src/config/smoke-config.js';
import { ConfigValidationError } from '../../src/types/errors.js';

const docker: DockerClient = {
  listContainers: async () => [
    {
      Names: ['/smoke-redis'],
      Image: 'redis:7-alpine',
      State: 'running',
      Status: 'Up 1 minute (healthy)',
      Ports: [{ PrivatePort: 6379, PublicPort: 6379, Type: 'tcp' }],
    },
  ],
};

describe('createEnvironmentSource', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'smoke-env-source-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function configFor(env: NodeJS.ProcessEnv): SmokeConfig {
    return loadSmokeConfig({ SMOKE_MANIFEST_PATH: path.join(dir, 'manifest.json'), ...env }).config;
  }

  it('joins the manifest with live Docker state', async () => {
    await writeFile(
      path.join(dir, 'manifest.json'),
      JSON.stringify({ containers: [{ name: 'Redis', kind: 'Cache', container: 'smoke-redis', port: 6379 }] }),
      'utf8',
    );
    const source = createEnvironmentSource(configFor({ SMOKE_CONTAINER_HOST: 'docker.test' }), { docker });

    await expect(source.getContainers()).resolves.toEqual([
      {
        name: 'Redis',
        kind: 'Cache',
        host: 'docker.test',
        port: 6379,
        image: 'redis:7-alpine',
        running: true,
        healthy: true,
      },
    ]);
  });

  it('rejects with ConfigValidationError when the manifest is invalid', async () => {
    await writeFile(path.join(dir, 'manifest.json'), JSON.stringify({ containers: {} }), 'utf8');
    const manifestPath = path.join(dir, 'manifest.json');
    const source = createEnvironmentSource(configFor({}), { docker });

    const error = await Promise.resolve(source.getContainers()).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConfigValidationError);
    expect(error).toMatchObject({ message: `${manifestPath} is invalid: containers must be an array.` });
  });

  it('lists only the configured external services', async () => {
    const source = createEnvironmentSource(
      configFor({ EXTERNAL_KAFKA_URL: 'kafka.test:9092', EXTERNAL_API_HEALTH_CHECK_URL: 'http://api.test/health' }),
      { docker, probeFactories: { tcp: () => () => true, http: () => () => true } },
    );

    const services = await source.getServices();

    expect(services.map((service) => service.name)).toEqual(['External Kafka', 'External API']);
  });

  it('fails the end-to-end workflow when no application URL is configured', async () => {
    const source = createEnvironmentSource(configFor({}), { docker });

    await expect(Promise.resolve(source.performEndToEnd())).rejects.toThrow(
      'SMOKE_APP_BASE_URL is not set; no application to exercise',
    );
  });
});
