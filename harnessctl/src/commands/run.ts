import path from "node:path";
import { loadConfig, type LoadedConfig } from "../config/loader.js";
import { HarnessError, errorMessage } from "../core/errors.js";
import { PipelineOrchestrator } from "../core/orchestrator.js";
import { RunStore, makeRunId } from "../core/run-store.js";
import { BuildIdentityResolver, type IdentitySource } from "../git/identity.js";
import { PhaseRunner } from "../phases/phase-runner.js";
import { ResultFinalizer, type ReportTransport } from "../report/finalizer.js";
import { DockerRuntime } from "../services/docker-runtime.js";
import type { ContainerRuntime } from "../services/runtime.js";
import { ServiceSupervisor } from "../services/supervisor.js";
import type { PipelineRun } from "../types/run.js";
import type { CommandExecutor } from "../utils/exec.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { EXIT, exitCodeFor, type ExitCode } from "./exit-codes.js";

export type RunOpts = {
  configDir?: string;
  envName?: string;
  runsRoot?: string;
  /** Checkout under test; phases run here and identity is read from it. */
  repoPath?: string;
  runId?: string;
  signal?: AbortSignal;
  hostEnv?: NodeJS.ProcessEnv;
  logger?: Logger;
  runtime?: ContainerRuntime;
  identity?: IdentitySource;
  transport?: ReportTransport;
  exec?: CommandExecutor;
  delay?: (ms: number) => Promise<unknown>;
};

export type RunResult =
  | { ok: true; run: PipelineRun; statePath: string; exitCode: ExitCode }
  | { ok: false; error: { code: string; message: string }; exitCode: ExitCode };

/** Wire the collaborators from config and drive one pipeline run. */
export async function run(opts: RunOpts = {}): Promise<RunResult> {
  const hostEnv = opts.hostEnv ?? process.env;
  const logger = opts.logger ?? createLogger("harnessctl");
  const repoPath = path.resolve(opts.repoPath ?? process.cwd());

  let loaded: LoadedConfig;
  try {
    loaded = loadConfig({ envName: opts.envName, configDir: opts.configDir, env: hostEnv });
  } catch (e) {
    const error = e instanceof HarnessError ? { code: e.code, message: e.message } : { code: "CONFIG_ERROR", message: errorMessage(e) };
    logger.error({ err: error }, "configuration rejected; nothing launched");
    return { ok: false, error, exitCode: EXIT.INVALID_CONFIG };
  }
  const { config, registry } = loaded;

  const store = new RunStore(opts.runsRoot ?? path.resolve(repoPath, config.runsDir));
  const runId = opts.runId ?? makeRunId();

  const orchestrator = new PipelineOrchestrator({
    identity: opts.identity ?? new BuildIdentityResolver(repoPath, { allowShallow: config.identity.allowShallow }),
    supervisor: new ServiceSupervisor(opts.runtime ?? new DockerRuntime(), {
      project: config.project,
      runId,
      graceMs: config.supervisor.graceMs,
      logger,
    }),
    phaseRunner: new PhaseRunner({ logsDir: store.logsDir(runId), cwd: repoPath, logger, exec: opts.exec }),
    finalizer: new ResultFinalizer(config.report, { env: hostEnv, logger, transport: opts.transport, delay: opts.delay }),
    store,
    logger,
  });

  const record = await orchestrator.run({
    runId,
    services: registry.list(),
    phases: config.phases,
    env: config.env,
    passEnv: config.passEnv,
    hostEnv,
    buildNumberFormat: config.report.buildNumberFormat,
    signal: opts.signal,
  });

  return { ok: true, run: record, statePath: store.recordPath(runId), exitCode: exitCodeFor(record) };
}
