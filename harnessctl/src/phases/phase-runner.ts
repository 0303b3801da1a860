import fs from "node:fs";
import { appendFile, mkdir, rm } from "node:fs/promises";
import path from "node:path";
import { parseJunitCountsFile } from "../adapter/junit-xml.js";
import { CoverageMissingError, HarnessError, PhaseExecutionError, errorMessage } from "../core/errors.js";
import type { PhaseResult, PhaseSpec, TestCounts } from "../types/phase.js";
import { describeExecFailure, execCommand, type CommandExecutor } from "../utils/exec.js";
import type { Logger } from "../utils/logger.js";
import { redactSensitiveInfo, sanitizePathComponent, secretValues } from "../utils/security.js";
import { expandCommand, phaseValues } from "./command.js";

export const FILTER_ENV = "HARNESS_PHASE_FILTER";
const MAX_OUTPUT = 64 * 1024 * 1024;

export type PhaseRunnerOptions = {
  /** Directory receiving one <phase>.log per phase. */
  logsDir: string;
  /** Base working directory; a phase's workdir resolves against it. */
  cwd: string;
  logger: Logger;
  exec?: CommandExecutor;
  shell?: string;
  cpuCount?: number;
};

/** Executes one phase's commands in order against the running fleet. */
export class PhaseRunner {
  private readonly exec: CommandExecutor;
  private readonly shell: string;
  private readonly log: Logger;

  constructor(private readonly opts: PhaseRunnerOptions) {
    this.exec = opts.exec ?? execCommand;
    this.shell = opts.shell ?? "/bin/sh";
    this.log = opts.logger.child({ component: "phase-runner" });
  }

  /**
   * Run `phase` with exactly `env` (plus the phase's own variables). Stops at
   * the first failing command. The phase log is written on every path.
   */
  async run(phase: PhaseSpec, env: Readonly<Record<string, string>>): Promise<PhaseResult> {
    const startedAt = new Date();
    const log = this.log.child({ phase: phase.name });
    const logRef = path.join(this.opts.logsDir, `${sanitizePathComponent(phase.name)}.log`);
    await mkdir(this.opts.logsDir, { recursive: true });

    const cwd = phase.workdir ? path.resolve(this.opts.cwd, phase.workdir) : this.opts.cwd;
    const phaseEnv: Record<string, string> = { ...env, ...phase.env };
    if (phase.filter !== undefined) phaseEnv[FILTER_ENV] = phase.filter;
    const secrets = secretValues(phaseEnv);
    const write = (text: string) => appendFile(logRef, redactSensitiveInfo(text, secrets), "utf8");

    await write(`## phase ${phase.name} started ${startedAt.toISOString()} cwd=${cwd}\n`);

    const finish = (fields: Omit<PhaseResult, "phase" | "logRef" | "startedAt" | "finishedAt" | "durationMs">) => {
      const finishedAt = new Date();
      const tests = this.readJunit(phase, cwd, log);
      const result: PhaseResult = {
        phase: phase.name,
        ...fields,
        ...(tests ? { tests } : {}),
        logRef,
        startedAt: startedAt.toISOString(),
        finishedAt: finishedAt.toISOString(),
        durationMs: finishedAt.getTime() - startedAt.getTime(),
      };
      return Object.freeze(result);
    };

    let commands: string[];
    try {
      const values = phaseValues(phase, this.opts.cpuCount);
      commands = phase.commands.map((c) => expandCommand(c, values));
    } catch (e) {
      const err = e instanceof HarnessError ? e : new HarnessError(errorMessage(e), "PHASE_CONFIG");
      await write(`!! ${err.message}\n`);
      log.error({ err: err.message }, "phase commands could not be prepared");
      return finish({ exitStatus: "failure", error: { code: err.code, message: err.message } });
    }

    // the artifact must come from this invocation, not an earlier phase or run
    const artifact = phase.producesCoverage ? path.resolve(cwd, phase.coverageArtifact ?? ".coverage") : null;
    if (artifact) await rm(artifact, { force: true });

    for (const command of commands) {
      await write(`$ ${command}\n`);
      log.info({ command: redactSensitiveInfo(command, secrets) }, "running");
      try {
        const { stdout, stderr } = await this.exec(this.shell, ["-c", command], {
          cwd,
          env: phaseEnv,
          timeout: phase.timeoutMs,
          maxBuffer: MAX_OUTPUT,
        });
        await write(`${stdout}${stderr}[exit 0]\n`);
      } catch (e) {
        const failure = describeExecFailure(e);
        const detail = failure.killed ? "timed out" : undefined;
        const err = new PhaseExecutionError(phase.name, redactSensitiveInfo(command, secrets), failure.exitCode, detail);
        await write(`${failure.stdout}${failure.stderr}[exit ${failure.exitCode ?? failure.signal ?? "?"}]\n`);
        log.warn({ exitCode: failure.exitCode, signal: failure.signal }, "command failed");
        return finish({
          exitStatus: "failure",
          failedCommand: redactSensitiveInfo(command, secrets),
          exitCode: failure.exitCode,
          error: { code: err.code, message: redactSensitiveInfo(err.message, secrets) },
        });
      }
    }

    if (artifact) {
      if (!fs.existsSync(artifact)) {
        const err = new CoverageMissingError(phase.name, artifact);
        await write(`!! ${err.message}\n`);
        log.warn({ artifact }, "coverage artifact missing");
        return finish({ exitStatus: "failure", error: { code: err.code, message: err.message } });
      }
      await write(`## coverage ${artifact}\n`);
      return finish({ exitStatus: "success", exitCode: 0, coverageArtifact: artifact });
    }

    return finish({ exitStatus: "success", exitCode: 0 });
  }

  /** A phase that never ran still gets a log entry. */
  async skip(phase: PhaseSpec, reason: string): Promise<PhaseResult> {
    await mkdir(this.opts.logsDir, { recursive: true });
    const logRef = path.join(this.opts.logsDir, `${sanitizePathComponent(phase.name)}.log`);
    const now = new Date().toISOString();
    await appendFile(logRef, `## phase ${phase.name} skipped ${now}: ${reason}\n`, "utf8");
    return Object.freeze({
      phase: phase.name,
      exitStatus: "skipped" as const,
      error: { code: "PHASE_SKIPPED", message: reason },
      logRef,
      startedAt: now,
      finishedAt: now,
      durationMs: 0,
    });
  }

  private readJunit(phase: PhaseSpec, cwd: string, log: Logger): TestCounts | undefined {
    if (!phase.junitReport) return undefined;
    const reportPath = path.resolve(cwd, phase.junitReport);
    if (!fs.existsSync(reportPath)) return undefined;
    try {
      return parseJunitCountsFile(reportPath);
    } catch (e) {
      log.warn({ report: reportPath, err: errorMessage(e) }, "unreadable junit report");
      return undefined;
    }
  }
}
