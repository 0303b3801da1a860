/** Service registry types — declarative description of each backend. */
export type RestartPolicy = "never" | "always";

export type PortBinding = {
  bindAddress: string;
  hostPort: number;
  containerPort: number;
};

type ProbeTiming = {
  intervalMs: number;
  retries: number;
  attemptTimeoutMs: number;
};

export type ReadinessProbeSpec =
  | ({ kind: "tcp"; port?: number } & ProbeTiming)
  | ({ kind: "http"; port?: number; path: string; expectStatus?: number } & ProbeTiming)
  | ({ kind: "exec"; command: string[] } & ProbeTiming);

export type ServiceSpec = {
  readonly name: string;
  readonly image: string;
  readonly command?: readonly string[];
  readonly ports: readonly PortBinding[];
  readonly env: Readonly<Record<string, string>>;
  readonly restartPolicy: RestartPolicy;
  readonly readiness: ReadinessProbeSpec;
};

export type InstanceState = "starting" | "ready" | "failed" | "stopped";

/** Opaque runtime handle; for docker, the container name. */
export type ProcessHandle = {
  id: string;
};

export type ServiceInstance = {
  spec: ServiceSpec;
  handle: ProcessHandle | null;
  state: InstanceState;
  startedAt: string;
  readyAt?: string;
  stoppedAt?: string;
  error?: string;
  /** Teardown gave up on it; the container may still be up. */
  leaked?: boolean;
};
