import { describe, expect, it, vi, type Mock } from "vitest";
import { IdentityError } from "../src/core/errors.js";
import { PipelineOrchestrator, type PipelineDeps } from "../src/core/orchestrator.js";
import { RunStore } from "../src/core/run-store.js";
import type { PipelineRun } from "../src/types/run.js";
import { PhaseRunner } from "../src/phases/phase-runner.js";
import { ResultFinalizer, type ReportTransport } from "../src/report/finalizer.js";
import { ServiceSupervisor } from "../src/services/supervisor.js";
import { exitCodeFor } from "../src/commands/exit-codes.js";
import type { PhaseSpec } from "../src/types/phase.js";
import type { CommandExecutor } from "../src/utils/exec.js";
import { FakeRuntime } from "./helpers/fake-runtime.js";
import { phase, quietLogger, service, tmpDir } from "./helpers/fixtures.js";

const IDENTITY = { commitCount: 42, shortRevision: "c0ffee1" };
const HOST_ENV = { PATH: "/usr/bin:/bin", COVERALLS_REPO_TOKEN: "test-token", UNRELATED: "nope" };
const SERVICES = [service("postgres", 5432), service("mysql", 3306)];
const PHASES: PhaseSpec[] = [
  phase("unit", { commands: ["run-unit"] }),
  phase("integration", { commands: ["run-integration"], filter: "integration_tests" }),
  phase("lint", { commands: ["run-lint"] }),
];

type Harness = {
  orchestrator: PipelineOrchestrator;
  runtime: FakeRuntime;
  transport: Mock<Parameters<ReportTransport>, ReturnType<ReportTransport>>;
  commands: string[];
  envs: Array<NodeJS.ProcessEnv | undefined>;
  store: RunStore;
};

function harness(
  opts: {
    failing?: string[];
    neverReady?: string[];
    identity?: PipelineDeps["identity"];
    webhook?: number[];
    onCommand?: (command: string) => void;
    phaseRunner?: PipelineDeps["phaseRunner"];
    store?: RunStore;
  } = {},
): Harness {
  const logger = quietLogger();
  const store = opts.store ?? new RunStore(tmpDir("orch"));
  const runtime = new FakeRuntime();
  const commands: string[] = [];
  const envs: Array<NodeJS.ProcessEnv | undefined> = [];

  const exec: CommandExecutor = async (_file, args, execOpts) => {
    const command = args[1];
    commands.push(command);
    envs.push(execOpts.env);
    opts.onCommand?.(command);
    if (opts.failing?.includes(command)) {
      throw Object.assign(new Error(`${command} failed`), { code: 1, stdout: "", stderr: "boom\n" });
    }
    return { stdout: `${command} ok\n`, stderr: "" };
  };

  const webhook = [...(opts.webhook ?? [200])];
  const transport = vi.fn<Parameters<ReportTransport>, ReturnType<ReportTransport>>(async () => ({
    status: webhook.shift() ?? 200,
    data: {},
  }));

  const neverReady = opts.neverReady ?? [];
  const deps: PipelineDeps = {
    identity: opts.identity ?? { resolve: async () => IDENTITY },
    supervisor: new ServiceSupervisor(runtime, {
      project: "demo",
      runId: "run-1",
      graceMs: 0,
      logger,
      probeFactory: (spec) => async () => !neverReady.includes(spec.name),
    }),
    phaseRunner: opts.phaseRunner ?? new PhaseRunner({ logsDir: store.logsDir("run-1"), cwd: tmpDir("repo"), logger, exec }),
    finalizer: new ResultFinalizer(
      {
        enabled: true,
        endpoint: "https://coveralls.example/webhook",
        tokenEnv: "COVERALLS_REPO_TOKEN",
        backoffMs: 0,
        timeoutMs: 1000,
        buildNumberFormat: "revision",
      },
      { env: HOST_ENV, logger, transport, delay: async () => undefined },
    ),
    store,
    logger,
  };

  return { orchestrator: new PipelineOrchestrator(deps), runtime, transport, commands, envs, store };
}

const runOpts = (extra: { signal?: AbortSignal; phases?: PhaseSpec[] } = {}) => ({
  runId: "run-1",
  services: SERVICES,
  phases: extra.phases ?? PHASES,
  env: { PYTHONDONTWRITEBYTECODE: "1" },
  passEnv: ["COVERALLS_REPO_TOKEN"],
  hostEnv: HOST_ENV,
  signal: extra.signal,
});

describe("PipelineOrchestrator", () => {
  it("runs every phase past a failure and reports a partial failure once", async () => {
    const h = harness({ failing: ["run-integration"] });

    const run = await h.orchestrator.run(runOpts());

    expect(run.phaseResults.map((r) => [r.phase, r.exitStatus])).toEqual([
      ["unit", "success"],
      ["integration", "failure"],
      ["lint", "success"],
    ]);
    expect(run.overallStatus).toBe("partial_failure");
    expect(run.state).toBe("completed");
    expect(h.runtime.live.size).toBe(0);
    expect(h.transport).toHaveBeenCalledTimes(1);
    expect(h.transport.mock.calls[0][1]).toBe("payload%5Bbuild_num%5D=c0ffee1&payload%5Bstatus%5D=failed");
    expect(exitCodeFor(run)).toBe(1);
  });

  it("completes a clean run with status done and exit 0", async () => {
    const h = harness();

    const run = await h.orchestrator.run(runOpts());

    expect(run.overallStatus).toBe("success");
    expect(run.state).toBe("completed");
    expect(run.buildNumber).toBe("c0ffee1");
    expect(run.finalization).toMatchObject({ ok: true, attempts: 1, status: 200, skipped: false });
    expect(h.transport.mock.calls[0][1]).toBe("payload%5Bbuild_num%5D=c0ffee1&payload%5Bstatus%5D=done");
    expect(h.commands).toEqual(["run-unit", "run-integration", "run-lint"]);
    expect(run.services.map((s) => [s.name, s.state])).toEqual([
      ["postgres", "stopped"],
      ["mysql", "stopped"],
    ]);
    expect(exitCodeFor(run)).toBe(0);
  });

  it("persists the final record", async () => {
    const h = harness();
    const run = await h.orchestrator.run(runOpts());

    const stored = h.store.load("run-1");
    expect(stored.state).toBe("completed");
    expect(stored.phaseResults).toHaveLength(3);
    expect(stored.identity).toEqual(IDENTITY);
    expect(stored.updatedAt).toBe(run.updatedAt);
  });

  it("aborts before provisioning when no identity can be formed", async () => {
    const h = harness({
      identity: {
        resolve: async () => {
          throw new IdentityError("No commit history: fatal: bad revision 'HEAD'");
        },
      },
    });

    const run = await h.orchestrator.run(runOpts());

    expect(run.state).toBe("aborted");
    expect(run.overallStatus).toBe("aborted");
    expect(run.error).toEqual({ code: "IDENTITY_UNAVAILABLE", message: "No commit history: fatal: bad revision 'HEAD'" });
    expect(h.runtime.events).toEqual([]);
    expect(run.phaseResults).toEqual([]);
    expect(h.transport).not.toHaveBeenCalled();
    expect(exitCodeFor(run)).toBe(2);
  });

  it("aborts without phases or report when provisioning fails", async () => {
    const h = harness({ neverReady: ["mysql"] });

    const run = await h.orchestrator.run(runOpts());

    expect(run.state).toBe("aborted");
    expect(run.overallStatus).toBe("aborted");
    expect(run.error?.code).toBe("PROVISION_FAILED");
    expect(h.runtime.live.size).toBe(0);
    expect(h.commands).toEqual([]);
    expect(h.transport).not.toHaveBeenCalled();
  });

  it("keeps the test outcome when finalize fails", async () => {
    const h = harness({ webhook: [503, 503] });

    const run = await h.orchestrator.run(runOpts());

    expect(run.overallStatus).toBe("success");
    expect(run.state).toBe("aborted");
    expect(run.finalization).toMatchObject({ ok: false, attempts: 2 });
    expect(h.transport).toHaveBeenCalledTimes(2);
    expect(exitCodeFor(run)).toBe(3);
  });

  it("skips the remaining phases after a blocking failure", async () => {
    const h = harness({ failing: ["run-unit"] });
    const phases = [phase("unit", { commands: ["run-unit"], blocking: true }), ...PHASES.slice(1)];

    const run = await h.orchestrator.run(runOpts({ phases }));

    expect(run.phaseResults.map((r) => r.exitStatus)).toEqual(["failure", "skipped", "skipped"]);
    expect(run.phaseResults[1].error?.message).toBe("blocking phase 'unit' failed");
    expect(h.commands).toEqual(["run-unit"]);
    expect(run.overallStatus).toBe("partial_failure");
  });

  it("finishes the in-flight phase on abort, then tears down and reports", async () => {
    const controller = new AbortController();
    const h = harness({ onCommand: (c) => c === "run-unit" && controller.abort() });

    const run = await h.orchestrator.run(runOpts({ signal: controller.signal }));

    expect(run.phaseResults.map((r) => r.exitStatus)).toEqual(["success", "skipped", "skipped"]);
    expect(run.overallStatus).toBe("aborted");
    expect(h.runtime.live.size).toBe(0);
    expect(h.transport.mock.calls[0][1]).toBe("payload%5Bbuild_num%5D=c0ffee1&payload%5Bstatus%5D=aborted");
  });

  it("ends aborted when the signal arrives during the last phase", async () => {
    const controller = new AbortController();
    const h = harness({ onCommand: (c) => c === "run-lint" && controller.abort() });

    const run = await h.orchestrator.run(runOpts({ signal: controller.signal }));

    expect(run.phaseResults.map((r) => r.exitStatus)).toEqual(["success", "success", "success"]);
    expect(run.overallStatus).toBe("aborted");
    expect(h.runtime.live.size).toBe(0);
    expect(h.transport.mock.calls[0][1]).toBe("payload%5Bbuild_num%5D=c0ffee1&payload%5Bstatus%5D=aborted");
    expect(exitCodeFor(run)).toBe(2);
  });

  it("stops the fleet even when the record cannot be saved during teardown", async () => {
    class FullDiskStore extends RunStore {
      save(run: PipelineRun): void {
        if (run.state === "tearing_down") throw new Error("ENOSPC: no space left on device");
        super.save(run);
      }
    }
    const h = harness({ store: new FullDiskStore(tmpDir("orch")) });

    await expect(h.orchestrator.run(runOpts())).rejects.toThrow("ENOSPC");
    expect(h.runtime.ops("terminate")).toEqual(["postgres", "mysql"]);
    expect(h.runtime.live.size).toBe(0);
    expect(h.transport).not.toHaveBeenCalled();
  });

  it("stops the fleet when the record cannot be saved on entering the phases", async () => {
    class FullDiskStore extends RunStore {
      save(run: PipelineRun): void {
        if (run.state === "running_phases") throw new Error("ENOSPC: no space left on device");
        super.save(run);
      }
    }
    const h = harness({ store: new FullDiskStore(tmpDir("orch")) });

    const run = await h.orchestrator.run(runOpts());

    expect(h.commands).toEqual([]);
    expect(run.error).toEqual({ code: "UNEXPECTED", message: "ENOSPC: no space left on device" });
    expect(run.overallStatus).toBe("aborted");
    expect(h.runtime.live.size).toBe(0);
  });

  it("gives phases the service addresses and nothing else from the host", async () => {
    const h = harness();
    await h.orchestrator.run(runOpts());

    const env = h.envs[1] ?? {};
    expect(env.HARNESS_SVC_POSTGRES_HOST).toBe("127.0.0.1");
    expect(env.HARNESS_SVC_POSTGRES_PORT).toBe("5432");
    expect(env.HARNESS_SVC_MYSQL_PORT).toBe("3306");
    expect(env.HARNESS_BUILD_NUMBER).toBe("c0ffee1");
    expect(env.HARNESS_COMMIT_COUNT).toBe("42");
    expect(env.HARNESS_PHASE_FILTER).toBe("integration_tests");
    expect(env.PYTHONDONTWRITEBYTECODE).toBe("1");
    expect(env.COVERALLS_REPO_TOKEN).toBe("test-token");
    expect(env.UNRELATED).toBeUndefined();
  });

  it("tears down even when the phase runner itself throws", async () => {
    const explode = async (): Promise<never> => {
      throw new Error("runner exploded");
    };
    const h = harness({ phaseRunner: { run: explode, skip: explode } });

    const run = await h.orchestrator.run(runOpts());

    expect(run.phaseResults.map((r) => r.exitStatus)).toEqual(["failure", "failure", "failure"]);
    expect(run.phaseResults[0].error).toEqual({ code: "UNEXPECTED", message: "runner exploded" });
    expect(h.runtime.live.size).toBe(0);
    expect(run.state).toBe("completed");
    expect(run.overallStatus).toBe("partial_failure");
  });

  it("runs a single pipeline per instance", async () => {
    const h = harness();
    await h.orchestrator.run(runOpts());
    await expect(h.orchestrator.run(runOpts())).rejects.toThrow("Orchestrator instances run a single pipeline");
  });
});
