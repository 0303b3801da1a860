import { describeExecFailure, execCommand, type CommandExecutor } from "../utils/exec.js";
import type { ProcessHandle, ServiceSpec } from "../types/service.js";
import type { ContainerRuntime, LaunchContext } from "./runtime.js";

export const RUN_LABEL = "dbfleet.run";

/** Docker container names: [a-zA-Z0-9][a-zA-Z0-9_.-]* */
export function containerName(project: string, runId: string, service: string): string {
  const raw = `${project}-${runId}-${service}`.toLowerCase();
  return raw.replace(/[^a-z0-9_.-]/g, "-").replace(/^[^a-z0-9]+/, "");
}

export function dockerRunArgs(spec: ServiceSpec, name: string, ctx: LaunchContext): string[] {
  const args = ["run", "--detach", "--name", name, "--label", `${RUN_LABEL}=${ctx.runId}`];
  args.push("--restart", spec.restartPolicy === "always" ? "always" : "no");
  for (const p of spec.ports) {
    args.push("--publish", `${p.bindAddress}:${p.hostPort}:${p.containerPort}`);
  }
  for (const [key, value] of Object.entries(spec.env)) {
    args.push("--env", `${key}=${value}`);
  }
  args.push(spec.image, ...(spec.command ?? []));
  return args;
}

/** Drives service instances through the docker CLI. */
export class DockerRuntime implements ContainerRuntime {
  constructor(
    private readonly execFn: CommandExecutor = execCommand,
    private readonly binary = "docker",
  ) {}

  async launch(spec: ServiceSpec, ctx: LaunchContext): Promise<ProcessHandle> {
    const name = containerName(ctx.project, ctx.runId, spec.name);
    try {
      await this.docker(dockerRunArgs(spec, name, ctx), 300_000);
    } catch (e) {
      const failure = describeExecFailure(e);
      throw new Error(`docker run failed for ${spec.image}: ${failure.stderr.trim() || failure.message}`);
    }
    return { id: name };
  }

  async isRunning(handle: ProcessHandle): Promise<boolean> {
    try {
      const { stdout } = await this.docker(["inspect", "--format", "{{.State.Running}}", handle.id], 30_000);
      return stdout.trim() === "true";
    } catch {
      // inspect fails once the container is gone
      return false;
    }
  }

  async terminate(handle: ProcessHandle, graceMs: number): Promise<void> {
    const seconds = Math.max(0, Math.ceil(graceMs / 1000));
    await this.docker(["stop", "--time", String(seconds), handle.id], graceMs + 30_000);
    await this.docker(["rm", "--volumes", handle.id], 30_000);
  }

  async kill(handle: ProcessHandle): Promise<void> {
    await this.docker(["rm", "--force", "--volumes", handle.id], 30_000);
  }

  async exec(handle: ProcessHandle, argv: readonly string[], timeoutMs: number): Promise<number> {
    try {
      await this.docker(["exec", handle.id, ...argv], timeoutMs);
      return 0;
    } catch (e) {
      return describeExecFailure(e).exitCode ?? -1;
    }
  }

  private docker(args: readonly string[], timeout: number) {
    return this.execFn(this.binary, args, { timeout, maxBuffer: 10 * 1024 * 1024 });
  }
}
