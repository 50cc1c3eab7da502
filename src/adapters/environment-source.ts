import type { SmokeConfig } from '../config/smoke-config.js';
import { loadContainerManifest } from '../config/manifest-schema.js';
import type { ContainerDescriptor, HarnessSource, ServiceDescriptor } from '../types/health-harness.js';
import { ConfigValidationError } from '../types/errors.js';
import { DockerContainerSource, type DockerClient } from './docker-container-source.js';
import { buildExternalServices, type ProbeFactories } from './external-services.js';
import { createDemoAppWorkflow } from './demo-app-workflow.js';

export interface EnvironmentSourceDeps {
  docker: DockerClient;
  probeFactories?: ProbeFactories;
}

/**
 * Wire the default collaborators: containers from the manifest plus live
 * Docker state, external services from EXTERNAL_* configuration, and the
 * demo application's REST workflow as the end-to-end check.
 */
export function createEnvironmentSource(config: SmokeConfig, deps: EnvironmentSourceDeps): HarnessSource {
  return {
    async getContainers(): Promise<ContainerDescriptor[]> {
      const loaded = await loadContainerManifest(config.manifestPath);
      if (!loaded.manifest) {
        throw new ConfigValidationError(config.manifestPath, loaded.errors);
      }
      const source = new DockerContainerSource({
        docker: deps.docker,
        host: config.containerHost,
        containers: loaded.manifest.containers,
      });
      return source.getContainers();
    },

    getServices(): ServiceDescriptor[] {
      return buildExternalServices(config.external, config.timeouts, deps.probeFactories);
    },

    async performEndToEnd(): Promise<void> {
      if (!config.appBaseUrl) {
        throw new Error('SMOKE_APP_BASE_URL is not set; no application to exercise');
      }
      await createDemoAppWorkflow(config.appBaseUrl, { timeoutMs: config.timeouts.connectMs })();
    },
  };
}
