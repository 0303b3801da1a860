import { describe, expect, it } from "vitest";
import { ProvisionError, RegistryError } from "../src/core/errors.js";
import { ServiceSupervisor } from "../src/services/supervisor.js";
import type { ServiceSpec } from "../src/types/service.js";
import { FakeRuntime } from "./helpers/fake-runtime.js";
import { quietLogger, service, tcpProbe } from "./helpers/fixtures.js";

function supervisorFor(runtime: FakeRuntime, neverReady: readonly string[] = []) {
  return new ServiceSupervisor(runtime, {
    project: "demo",
    runId: "run-1",
    graceMs: 100,
    logger: quietLogger(),
    probeFactory: (spec) => async () => !neverReady.includes(spec.name),
  });
}

const fleet = (): ServiceSpec[] => [service("orientdb", 2480), service("postgres", 5432), service("mysql", 3306)];

describe("ServiceSupervisor", () => {
  it("launches every service before probing any of them", async () => {
    const runtime = new FakeRuntime();
    const supervisor = supervisorFor(runtime);
    const instances = await supervisor.start(fleet());

    expect([...instances.keys()]).toEqual(["orientdb", "postgres", "mysql"]);
    expect([...instances.values()].map((i) => i.state)).toEqual(["ready", "ready", "ready"]);
    expect(runtime.events.slice(0, 3)).toEqual([
      { op: "launch", service: "orientdb" },
      { op: "launch", service: "postgres" },
      { op: "launch", service: "mysql" },
    ]);
    expect(instances.get("postgres")?.handle).toEqual({ id: "demo-run-1-postgres" });
  });

  it("leaves nothing running after start then stop", async () => {
    const runtime = new FakeRuntime();
    const supervisor = supervisorFor(runtime);
    await supervisor.start(fleet());
    expect(runtime.live.size).toBe(3);

    const report = await supervisor.stop();

    expect(runtime.live.size).toBe(0);
    expect(supervisor.running()).toEqual([]);
    expect([...report.stopped].sort()).toEqual(["mysql", "orientdb", "postgres"]);
    expect(report.forced).toEqual([]);
    expect(supervisor.get("mysql")?.state).toBe("stopped");
  });

  it("treats a second stop as a no-op", async () => {
    const runtime = new FakeRuntime();
    const supervisor = supervisorFor(runtime);
    await supervisor.start(fleet());
    await supervisor.stop();
    const terminations = runtime.ops("terminate").length;

    const again = await supervisor.stop();

    expect(again).toEqual({ stopped: [], forced: [], errors: [] });
    expect(runtime.ops("terminate")).toHaveLength(terminations);
  });

  it("rolls back the whole batch when one probe never succeeds", async () => {
    const runtime = new FakeRuntime();
    const supervisor = supervisorFor(runtime, ["postgres"]);

    const err = await supervisor.start(fleet()).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProvisionError);
    if (!(err instanceof ProvisionError)) return;
    expect(err.serviceName).toBe("postgres");
    expect(err.message).toBe("Service 'postgres' failed to become ready: tcp probe did not succeed after 3 attempts");
    expect(runtime.live.size).toBe(0);
    expect(supervisor.running()).toEqual([]);
    expect(supervisor.get("orientdb")?.state).toBe("stopped");
    expect(supervisor.get("postgres")?.error).toBe("tcp probe did not succeed after 3 attempts");
  });

  it("rolls back when a launch fails", async () => {
    const runtime = new FakeRuntime();
    runtime.failLaunch.add("mysql");
    const supervisor = supervisorFor(runtime);

    await expect(supervisor.start(fleet())).rejects.toThrow(
      "Service 'mysql' failed to become ready: image mysql:latest not found",
    );
    expect(runtime.live.size).toBe(0);
    expect([...runtime.ops("terminate")].sort()).toEqual(["orientdb", "postgres"]);
    expect(supervisor.get("mysql")?.state).toBe("stopped");
  });

  it("reports the first failing service in declaration order", async () => {
    const runtime = new FakeRuntime();
    const supervisor = supervisorFor(runtime, ["mysql", "orientdb"]);
    const err = await supervisor.start(fleet()).catch((e: unknown) => e);
    expect(err instanceof ProvisionError && err.serviceName).toBe("orientdb");
  });

  it("gives up early on a process that exits while starting", async () => {
    const runtime = new FakeRuntime();
    runtime.dieOnLaunch.add("postgres");
    const supervisor = supervisorFor(runtime, ["postgres"]);
    const specs = [service("postgres", 5432, { readiness: tcpProbe({ retries: 50 }) })];

    await expect(supervisor.start(specs)).rejects.toThrow(
      "Service 'postgres' failed to become ready: process exited before becoming ready (attempt 1)",
    );
  });

  it("probes exec readiness inside the instance", async () => {
    const runtime = new FakeRuntime();
    const supervisor = new ServiceSupervisor(runtime, { project: "demo", runId: "r", graceMs: 0, logger: quietLogger() });
    const pg = service("postgres", 5432, {
      readiness: { kind: "exec", command: ["pg_isready"], intervalMs: 1, retries: 2, attemptTimeoutMs: 100 },
    });

    await supervisor.start([pg]);
    expect(runtime.ops("exec")).toEqual(["postgres"]);
    await supervisor.stop();

    runtime.execExitCode = 1;
    const failing = new ServiceSupervisor(runtime, { project: "demo", runId: "r2", graceMs: 0, logger: quietLogger() });
    await expect(failing.start([pg])).rejects.toThrow("exec probe did not succeed after 2 attempts");
  });

  it("forces instances that ignore or fail a graceful stop", async () => {
    const runtime = new FakeRuntime();
    runtime.ignoreTerminate.add("orientdb");
    runtime.failTerminate.add("mysql");
    const supervisor = supervisorFor(runtime);
    await supervisor.start(fleet());

    const report = await supervisor.stop();

    expect([...report.forced].sort()).toEqual(["mysql", "orientdb"]);
    expect(report.errors).toEqual([]);
    expect(runtime.live.size).toBe(0);
  });

  it("keeps an instance visible as running when even the forced stop fails", async () => {
    const runtime = new FakeRuntime();
    runtime.failTerminate.add("mysql");
    runtime.failKill.add("mysql");
    const supervisor = supervisorFor(runtime);
    await supervisor.start(fleet());

    const report = await supervisor.stop();

    expect([...report.stopped].sort()).toEqual(["orientdb", "postgres"]);
    expect(report.errors).toEqual([{ service: "mysql", message: "daemon not responding" }]);
    expect(supervisor.running().map((i) => i.spec.name)).toEqual(["mysql"]);
    expect(supervisor.get("mysql")?.leaked).toBe(true);
    expect(runtime.live.has("demo-run-1-mysql")).toBe(true);

    runtime.failKill.delete("mysql");
    const retry = await supervisor.stop();

    expect(retry.forced).toEqual(["mysql"]);
    expect(supervisor.running()).toEqual([]);
    expect(supervisor.get("mysql")?.leaked).toBeUndefined();
    expect(runtime.live.size).toBe(0);
  });

  it("refuses duplicate names", async () => {
    const runtime = new FakeRuntime();
    const supervisor = supervisorFor(runtime);
    await expect(supervisor.start([service("db", 5432), service("db", 5433)])).rejects.toThrow(RegistryError);
    expect(runtime.events).toEqual([]);
  });
});
