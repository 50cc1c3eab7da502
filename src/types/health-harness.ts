// ─── Descriptors ─────────────────────────────────────────────────────────────

/**
 * One infrastructure dependency expected to be running (cache, broker, database, …).
 * Built fresh from live infrastructure state for every harness invocation.
 */
export interface ContainerDescriptor {
  readonly name: string;
  readonly kind: string;
  readonly host: string;
  readonly port: number | null;
  /** Version-tagged image reference, e.g. `redis:7-alpine`. */
  readonly image: string;
  readonly running: boolean;
  readonly healthy: boolean;
}

/** Zero-argument reachability test. Must resolve to a boolean; never relied on to throw. */
export type Probe = () => boolean | Promise<boolean>;

/** An external (non-container) service to validate connectivity against. */
export interface ServiceDescriptor {
  readonly name: string;
  readonly kind: string;
  readonly url: string;
  /** A required service failing its probe fails the whole connectivity check. */
  readonly required: boolean;
  readonly probe: Probe;
}

export type ServiceDescriptorInput = Omit<ServiceDescriptor, 'required'> & { required?: boolean };

/**
 * Build a {@link ServiceDescriptor}, defaulting `required` to `true` when the
 * caller does not say otherwise.
 */
export function defineService(input: ServiceDescriptorInput): ServiceDescriptor {
  return { ...input, required: input.required ?? true };
}

// ─── Results ─────────────────────────────────────────────────────────────────

export interface CheckResult {
  readonly subjectName: string;
  readonly healthy: boolean;
  /** Failure reason, or a diagnostic summary on success. Never empty when unhealthy. */
  readonly message: string;
  readonly elapsedMs: number;
  readonly timestamp: Date;
}

export type CheckFailureKind =
  | 'not_running'
  | 'unhealthy'
  | 'required_service_unreachable'
  | 'end_to_end_failure'
  | 'no_containers';

export interface CheckFailure {
  kind: CheckFailureKind;
  /** Descriptor name, or the operation label when no descriptor applies. */
  subject: string;
  message: string;
}

export type CheckOperation = 'containers' | 'external-services' | 'end-to-end';

export type CheckOutcome =
  | { ok: true; operation: CheckOperation; results: CheckResult[] }
  | { ok: false; operation: CheckOperation; results: CheckResult[]; failures: CheckFailure[] };

export interface HarnessSummary {
  total: number;
  healthy: number;
  unhealthy: number;
}

/** End-to-end workflow exercising the real business logic. Throws or rejects on failure. */
export type EndToEndCallback = () => void | Promise<void>;

/**
 * The three collaborators the harness consumes but never implements: live
 * container state, configured external services, and the end-to-end workflow.
 */
export interface HarnessSource {
  getContainers(): ContainerDescriptor[] | Promise<ContainerDescriptor[]>;
  getServices(): ServiceDescriptor[] | Promise<ServiceDescriptor[]>;
  performEndToEnd: EndToEndCallback;
}

export interface HarnessRunOptions {
  skipContainers?: boolean;
  skipServices?: boolean;
  skipEndToEnd?: boolean;
}

export interface HarnessRun {
  ok: boolean;
  outcomes: CheckOutcome[];
  failures: CheckFailure[];
}
