import type { ExternalServiceUrls, ProbeTimeouts } from '../config/smoke-config.js';
import { parseHostPort } from '../config/smoke-config.js';
import type { Probe, ServiceDescriptor } from '../types/health-harness.js';
import { defineService } from '../types/health-harness.js';
import { httpProbe, retryingProbe, tcpProbe } from '../services/connectivity-probes.js';

interface TcpServiceDef {
  key: keyof Omit<ExternalServiceUrls, 'apiHealthCheck'>;
  name: string;
  kind: string;
  defaultPort: number;
}

const TCP_SERVICES: readonly TcpServiceDef[] = [
  { key: 'redis', name: 'External Redis', kind: 'Cache', defaultPort: 6379 },
  { key: 'kafka', name: 'External Kafka', kind: 'Messaging', defaultPort: 9092 },
  { key: 'cassandra', name: 'External Cassandra', kind: 'Database', defaultPort: 9042 },
];

export interface ProbeFactories {
  tcp: (host: string, port: number, timeoutMs: number) => Probe;
  http: (url: string, timeoutMs: number) => Probe;
}

const DEFAULT_FACTORIES: ProbeFactories = { tcp: tcpProbe, http: httpProbe };

function unreachable(): Probe {
  return () => Promise.resolve(false);
}

/**
 * Build the external-service list from configured URLs. Unset URLs are left
 * out entirely. The data stores are optional; the external API health URL is
 * required. Every probe is retried per `timeouts`.
 */
export function buildExternalServices(
  urls: ExternalServiceUrls,
  timeouts: ProbeTimeouts,
  factories: ProbeFactories = DEFAULT_FACTORIES,
): ServiceDescriptor[] {
  const services: ServiceDescriptor[] = [];
  const withRetry = (probe: Probe, label: string): Probe =>
    retryingProbe(probe, timeouts.retryCount, timeouts.retryDelayMs, label);

  for (const def of TCP_SERVICES) {
    const url = urls[def.key];
    if (!url) continue;

    const target = parseHostPort(url, def.defaultPort);
    services.push(
      defineService({
        name: def.name,
        kind: def.kind,
        url,
        required: false,
        probe: target
          ? withRetry(factories.tcp(target.host, target.port, timeouts.connectMs), def.name)
          : unreachable(),
      }),
    );
  }

  if (urls.apiHealthCheck) {
    services.push(
      defineService({
        name: 'External API',
        kind: 'REST API',
        url: urls.apiHealthCheck,
        probe: withRetry(factories.http(urls.apiHealthCheck, timeouts.connectMs), 'External API'),
      }),
    );
  }

  return services;
}
