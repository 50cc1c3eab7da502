import type { ContainerDescriptor } from '../types/health-harness.js';
import type { ManifestContainer } from '../config/manifest-schema.js';

/** The slice of a dockerode container listing the source reads. */
export interface DockerContainerSummary {
  Names: string[];
  Image: string;
  /** `running`, `exited`, `created`, … */
  State: string;
  /** Human status, e.g. `Up 3 minutes (healthy)`. */
  Status: string;
  Ports: Array<{ PrivatePort: number; PublicPort?: number; Type: string }>;
}

/** Narrow view of a dockerode client; `new Docker()` satisfies it. */
export interface DockerClient {
  listContainers(options: { all: boolean }): Promise<DockerContainerSummary[]>;
}

export type ContainerHealthStatus = 'healthy' | 'unhealthy' | 'starting' | 'none';

/** Read the health suffix Docker appends to a container's status line. */
export function parseHealthStatus(status: string): ContainerHealthStatus {
  if (/\(unhealthy\)/i.test(status)) return 'unhealthy';
  if (/\(health:\s*starting\)/i.test(status)) return 'starting';
  if (/\(healthy\)/i.test(status)) return 'healthy';
  return 'none';
}

export interface DockerContainerSourceOptions {
  docker: DockerClient;
  /** Host reported for published ports. */
  host: string;
  containers: readonly ManifestContainer[];
}

/**
 * Builds {@link ContainerDescriptor}s from live Docker state for the
 * containers named in the manifest. A container Docker does not know about
 * is reported as not running. A running container without a healthcheck
 * counts as healthy.
 */
export class DockerContainerSource {
  readonly #docker: DockerClient;
  readonly #host: string;
  readonly #expected: readonly ManifestContainer[];

  constructor(options: DockerContainerSourceOptions) {
    this.#docker = options.docker;
    this.#host = options.host;
    this.#expected = options.containers;
  }

  async getContainers(): Promise<ContainerDescriptor[]> {
    const listing = await this.#docker.listContainers({ all: true });

    return this.#expected.map((expected) => {
      const match = listing.find((summary) => summary.Names.some((name) => name.replace(/^\//, '') === expected.container));
      if (!match) {
        return {
          name: expected.name,
          kind: expected.kind,
          host: this.#host,
          port: null,
          image: 'unknown',
          running: false,
          healthy: false,
        };
      }

      const running = match.State === 'running';
      const health = parseHealthStatus(match.Status);
      const published = match.Ports.find((p) => p.PrivatePort === expected.port && typeof p.PublicPort === 'number');

      return {
        name: expected.name,
        kind: expected.kind,
        host: this.#host,
        port: published?.PublicPort ?? null,
        image: match.Image,
        running,
        healthy: running && (health === 'healthy' || health === 'none'),
      };
    });
  }
}
