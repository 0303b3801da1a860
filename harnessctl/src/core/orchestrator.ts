import { FinalizationError, HarnessError, errorMessage } from "./errors.js";
import { aggregateStatus, nextState, type PipelineState } from "./pipeline-state.js";
import { buildPhaseEnv } from "./phase-env.js";
import type { RunStore } from "./run-store.js";
import { buildNumber } from "../git/identity.js";
import type { IdentitySource } from "../git/identity.js";
import type { Ack, FinalStatus } from "../report/finalizer.js";
import type { StopReport } from "../services/supervisor.js";
import type { BuildNumberFormat } from "../types/config.js";
import type { PhaseResult, PhaseSpec } from "../types/phase.js";
import type { BuildIdentity, PipelineRun, ServiceRecord } from "../types/run.js";
import type { ServiceInstance, ServiceSpec } from "../types/service.js";
import type { Logger } from "../utils/logger.js";

/** The collaborators, narrowed to what the orchestrator calls. */
export type PipelineDeps = {
  identity: IdentitySource;
  supervisor: {
    start(specs: readonly ServiceSpec[]): Promise<Map<string, ServiceInstance>>;
    stop(instances?: ReadonlyMap<string, ServiceInstance>): Promise<StopReport>;
  };
  phaseRunner: {
    run(phase: PhaseSpec, env: Readonly<Record<string, string>>): Promise<PhaseResult>;
    skip(phase: PhaseSpec, reason: string): Promise<PhaseResult>;
  };
  finalizer: {
    finalize(identity: BuildIdentity, status: FinalStatus): Promise<Ack>;
  };
  store: RunStore;
  logger: Logger;
};

export type PipelineOptions = {
  runId: string;
  services: readonly ServiceSpec[];
  phases: readonly PhaseSpec[];
  env?: Readonly<Record<string, string>>;
  passEnv?: readonly string[];
  hostEnv?: NodeJS.ProcessEnv;
  buildNumberFormat?: BuildNumberFormat;
  /** Stops after the in-flight phase; remaining phases are skipped. */
  signal?: AbortSignal;
};

function toError(e: unknown): { code: string; message: string } {
  return e instanceof HarnessError ? { code: e.code, message: e.message } : { code: "UNEXPECTED", message: errorMessage(e) };
}

function serviceRecords(instances: Iterable<ServiceInstance>): ServiceRecord[] {
  return [...instances].map((i) => ({
    name: i.spec.name,
    image: i.spec.image,
    state: i.state,
    ...(i.readyAt ? { readyAt: i.readyAt } : {}),
    ...(i.error ? { error: i.error } : {}),
    ...(i.leaked ? { leaked: true } : {}),
  }));
}

/** A runner that throws still yields a failed result; siblings keep running. */
function crashedPhase(phase: PhaseSpec, e: unknown): PhaseResult {
  const now = new Date().toISOString();
  return Object.freeze({
    phase: phase.name,
    exitStatus: "failure" as const,
    error: toError(e),
    logRef: "",
    startedAt: now,
    finishedAt: now,
    durationMs: 0,
  });
}

/**
 * Drives one pipeline run:
 * idle → resolving_identity → provisioning → running_phases → tearing_down →
 * finalizing → completed | aborted.
 *
 * Teardown follows every exit from running_phases; finalize is called exactly
 * once whenever an identity and a fleet were obtained. Phase outcome and
 * reporting outcome are kept apart: a failed finalize never rewrites
 * overallStatus.
 */
export class PipelineOrchestrator {
  private state: PipelineState = "idle";
  private readonly log: Logger;

  constructor(private readonly deps: PipelineDeps) {
    this.log = deps.logger.child({ component: "orchestrator" });
  }

  get currentState(): PipelineState {
    return this.state;
  }

  async run(opts: PipelineOptions): Promise<PipelineRun> {
    if (this.state !== "idle") {
      throw new HarnessError("Orchestrator instances run a single pipeline", "ORCHESTRATOR_REUSED");
    }
    const { store } = this.deps;
    const run = store.create(opts.runId);
    const log = this.log.child({ runId: opts.runId });

    const enter = (to: PipelineState): void => {
      log.debug({ from: this.state, to }, "transition");
      this.state = nextState(this.state, to);
      run.state = to;
      store.save(run);
    };

    // resolving_identity
    enter("resolving_identity");
    let identity: BuildIdentity;
    try {
      identity = await this.deps.identity.resolve();
    } catch (e) {
      run.error = toError(e);
      run.overallStatus = "aborted";
      log.error({ err: run.error }, "build identity unavailable; run aborted before provisioning");
      enter("aborted");
      return run;
    }
    run.identity = identity;
    run.buildNumber = buildNumber(identity, opts.buildNumberFormat);
    log.info({ identity, buildNumber: run.buildNumber }, "build identity resolved");

    // provisioning
    enter("provisioning");
    let instances: Map<string, ServiceInstance>;
    try {
      instances = await this.deps.supervisor.start(opts.services);
    } catch (e) {
      run.error = toError(e);
      run.overallStatus = "aborted";
      log.error({ err: run.error }, "provisioning failed; run aborted");
      enter("aborted");
      return run;
    }
    run.services = serviceRecords(instances.values());

    // running_phases
    let aborted = false;
    try {
      enter("running_phases");
      aborted = await this.runPhases(run, opts, identity, instances, log);
    } catch (e) {
      run.error = toError(e);
      aborted = true;
      log.error({ err: run.error }, "phase execution interrupted");
    } finally {
      // the fleet is stopped even when the record cannot be written
      try {
        enter("tearing_down");
      } finally {
        const report = await this.deps.supervisor.stop(instances);
        run.services = serviceRecords(instances.values());
        if (report.errors.length > 0) log.warn({ errors: report.errors }, "teardown incomplete");
      }
    }

    run.overallStatus = aggregateStatus(run.phaseResults, aborted);
    log.info(
      { overallStatus: run.overallStatus, phases: run.phaseResults.map((r) => `${r.phase}:${r.exitStatus}`) },
      "phases complete",
    );

    // finalizing
    enter("finalizing");
    const status: FinalStatus = run.overallStatus === "pending" ? "aborted" : run.overallStatus;
    try {
      const ack = await this.deps.finalizer.finalize(identity, status);
      run.finalization = { ok: true, ...ack, finishedAt: new Date().toISOString() };
      enter("completed");
    } catch (e) {
      const attempts = e instanceof FinalizationError ? e.attempts : 0;
      run.finalization = { ok: false, attempts, error: errorMessage(e), finishedAt: new Date().toISOString() };
      log.error({ err: errorMessage(e) }, "finalize failed; test outcome unchanged");
      enter("aborted");
    }
    return run;
  }

  /** Returns true when an abort signal arrived before or during the phases. */
  private async runPhases(
    run: PipelineRun,
    opts: PipelineOptions,
    identity: BuildIdentity,
    instances: Map<string, ServiceInstance>,
    log: Logger,
  ): Promise<boolean> {
    const env = buildPhaseEnv({
      hostEnv: opts.hostEnv ?? {},
      configEnv: opts.env ?? {},
      passEnv: opts.passEnv ?? [],
      identity,
      buildNumber: run.buildNumber ?? identity.shortRevision,
      runId: run.runId,
      instances,
    });

    let blockedBy: string | null = null;

    for (const phase of opts.phases) {
      let result: PhaseResult;
      if (opts.signal?.aborted) {
        result = await this.deps.phaseRunner.skip(phase, "run aborted");
      } else if (blockedBy) {
        result = await this.deps.phaseRunner.skip(phase, `blocking phase '${blockedBy}' failed`);
      } else {
        log.info({ phase: phase.name }, "phase started");
        try {
          result = await this.deps.phaseRunner.run(phase, env);
        } catch (e) {
          result = crashedPhase(phase, e);
        }
        log.info({ phase: phase.name, exitStatus: result.exitStatus, durationMs: result.durationMs }, "phase finished");
        if (result.exitStatus === "failure" && phase.blocking) blockedBy = phase.name;
      }
      run.phaseResults.push(result);
      this.deps.store.save(run);
    }

    return opts.signal?.aborted === true;
  }
}
