import { ProvisionError, RegistryError, StateTransitionError, errorMessage } from "../core/errors.js";
import type { Logger } from "../utils/logger.js";
import type { InstanceState, ProcessHandle, ServiceInstance, ServiceSpec } from "../types/service.js";
import type { ContainerRuntime } from "./runtime.js";
import { createProbe, waitUntilReady, type ProbeAttempt } from "./probes.js";

const ALLOWED: Record<InstanceState, readonly InstanceState[]> = {
  starting: ["ready", "failed", "stopped"],
  ready: ["stopped"],
  failed: ["stopped"],
  stopped: [],
};

function move(instance: ServiceInstance, to: InstanceState): void {
  if (!ALLOWED[instance.state].includes(to)) {
    throw new StateTransitionError(`${instance.spec.name}:${instance.state}`, to);
  }
  instance.state = to;
}

export type SupervisorOptions = {
  project: string;
  runId: string;
  graceMs: number;
  logger: Logger;
  /** Override how readiness is checked; defaults to the service's own probe. */
  probeFactory?: (spec: ServiceSpec, handle: ProcessHandle, runtime: ContainerRuntime) => ProbeAttempt;
};

export type StopReport = {
  stopped: string[];
  forced: string[];
  errors: Array<{ service: string; message: string }>;
};

/**
 * Owns the lifecycle of every service instance of one pipeline run.
 *
 * start() launches and probes all specs concurrently and either returns a
 * fully ready fleet or tears down whatever it launched before throwing.
 */
export class ServiceSupervisor {
  private readonly instances = new Map<string, ServiceInstance>();
  private readonly log: Logger;

  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly opts: SupervisorOptions,
  ) {
    this.log = opts.logger.child({ component: "supervisor" });
  }

  async start(specs: readonly ServiceSpec[]): Promise<Map<string, ServiceInstance>> {
    const batch = new Map<string, ServiceInstance>();
    for (const spec of specs) {
      if (batch.has(spec.name) || this.instances.has(spec.name)) {
        throw new RegistryError(`Service '${spec.name}' is already supervised`, { service: spec.name });
      }
      const instance: ServiceInstance = { spec, handle: null, state: "starting", startedAt: new Date().toISOString() };
      batch.set(spec.name, instance);
    }
    for (const [name, instance] of batch) this.instances.set(name, instance);

    const outcomes = await Promise.allSettled([...batch.values()].map((instance) => this.bringUp(instance)));

    const firstFailure = outcomes.findIndex((o) => o.status === "rejected");
    if (firstFailure !== -1) {
      const failed = outcomes[firstFailure];
      const spec = specs[firstFailure];
      this.log.error({ service: spec.name }, "provisioning failed; tearing down batch");
      await this.stop(batch);
      throw new ProvisionError(spec.name, failed.status === "rejected" ? failed.reason : undefined);
    }

    this.log.info({ services: [...batch.keys()] }, "all services ready");
    return batch;
  }

  /**
   * Shut down every instance that is not already stopped. Never throws; failures
   * are logged and returned so teardown of one instance cannot block the rest.
   */
  async stop(instances: ReadonlyMap<string, ServiceInstance> = this.instances): Promise<StopReport> {
    const report: StopReport = { stopped: [], forced: [], errors: [] };
    const pending = [...instances.values()].filter((i) => i.state !== "stopped" || i.leaked);

    await Promise.all(pending.map((instance) => this.shutdown(instance, report)));

    if (pending.length > 0) {
      this.log.info({ stopped: report.stopped, forced: report.forced, errors: report.errors.length }, "services stopped");
    }
    return report;
  }

  /** Instances launched by this supervisor and not yet stopped, or whose forced stop failed. */
  running(): ServiceInstance[] {
    return [...this.instances.values()].filter((i) => i.state !== "stopped" || i.leaked);
  }

  get(name: string): ServiceInstance | undefined {
    return this.instances.get(name);
  }

  private async bringUp(instance: ServiceInstance): Promise<void> {
    const { spec } = instance;
    const log = this.log.child({ service: spec.name });
    try {
      instance.handle = await this.runtime.launch(spec, { project: this.opts.project, runId: this.opts.runId });
      log.debug({ handle: instance.handle.id, image: spec.image }, "launched");

      const handle = instance.handle;
      const factory = this.opts.probeFactory ?? createProbe;
      const attempts = await waitUntilReady(spec.readiness, factory(spec, handle, this.runtime), {
        isAlive: () => this.runtime.isRunning(handle),
        onAttempt: (n, ok) => log.trace({ attempt: n, ok }, "readiness probe"),
      });

      move(instance, "ready");
      instance.readyAt = new Date().toISOString();
      log.info({ attempts }, "ready");
    } catch (e) {
      // a teardown racing with startup has already moved it on
      if (instance.state === "starting") move(instance, "failed");
      instance.error = errorMessage(e);
      log.warn({ err: instance.error }, "failed to become ready");
      throw e;
    }
  }

  private async shutdown(instance: ServiceInstance, report: StopReport): Promise<void> {
    const name = instance.spec.name;
    const handle = instance.handle;
    let leaked = false;

    if (handle) {
      try {
        await this.runtime.terminate(handle, this.opts.graceMs);
        if (await this.runtime.isRunning(handle)) {
          await this.runtime.kill(handle);
          report.forced.push(name);
        }
      } catch (e) {
        this.log.warn({ service: name, err: errorMessage(e) }, "graceful stop failed; forcing");
        try {
          await this.runtime.kill(handle);
          report.forced.push(name);
        } catch (killErr) {
          leaked = true;
          instance.error = errorMessage(killErr);
          report.errors.push({ service: name, message: errorMessage(killErr) });
          this.log.error({ service: name, err: errorMessage(killErr) }, "forced stop failed");
        }
      }
    }

    // a later stop() retries a leaked instance
    if (instance.state !== "stopped") move(instance, "stopped");
    instance.stoppedAt = new Date().toISOString();
    if (leaked) {
      instance.leaked = true;
      return;
    }
    delete instance.leaked;
    report.stopped.push(name);
  }
}
