import type { ProcessHandle, ServiceSpec } from "../types/service.js";

export type LaunchContext = {
  project: string;
  runId: string;
};

/**
 * Provisioning interface to the backends. The supervisor only talks to this;
 * DockerRuntime drives the docker CLI, tests use an in-memory fake.
 */
export type ContainerRuntime = {
  launch(spec: ServiceSpec, ctx: LaunchContext): Promise<ProcessHandle>;
  isRunning(handle: ProcessHandle): Promise<boolean>;
  /** Graceful shutdown; the runtime may escalate once graceMs elapses. */
  terminate(handle: ProcessHandle, graceMs: number): Promise<void>;
  kill(handle: ProcessHandle): Promise<void>;
  /** Run a command inside the instance and return its exit code. */
  exec(handle: ProcessHandle, argv: readonly string[], timeoutMs: number): Promise<number>;
};
