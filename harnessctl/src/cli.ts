#!/usr/bin/env node

import { Command, Option } from "commander";
import { validateAll } from "./commands/validate.js";
import { run } from "./commands/run.js";
import { identity } from "./commands/identity.js";
import { describeRun, listRuns, resolveRunsRoot, status } from "./commands/status.js";
import { EXIT } from "./commands/exit-codes.js";
import type { BuildNumberFormat } from "./types/config.js";

type Format = "human" | "jsonl";

const formatOption = () => new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human");

function emit(format: Format, record: Record<string, unknown>, human: string): void {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify(record) + "\n");
  } else {
    console.log(human);
  }
}

const program = new Command();

program
  .name("harnessctl")
  .description("Provision database services and run test phases against them")
  .version("0.1.0");

program
  .command("validate")
  .description("Check config, schema and service registry without launching anything")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Environment overlay (<name>.yaml)")
  .addOption(formatOption())
  .action((opts: { config?: string; env?: string; format: Format }) => {
    const res = validateAll({ configDir: opts.config, envName: opts.env });

    if (!res.ok) {
      if (opts.format === "jsonl") {
        for (const err of res.errors) process.stdout.write(JSON.stringify(err) + "\n");
      } else {
        for (const err of res.errors) console.error(err.message);
      }
      process.exit(EXIT.INVALID_CONFIG);
    }

    for (const w of res.warnings) {
      if (opts.format === "jsonl") process.stdout.write(JSON.stringify(w) + "\n");
      else console.error(`warning: ${w.message}`);
    }
    emit(
      opts.format,
      { level: "info", code: "OK", ...res.summary },
      `OK  services=${res.summary.services.join(",")}  phases=${res.summary.phases.join(",")}`,
    );
  });

program
  .command("run")
  .description("Provision services, run every phase, tear down and report")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Environment overlay (<name>.yaml)")
  .option("--runs-root <path>", "Runs root directory (default: runs_dir from config)")
  .option("--repo <path>", "Checkout under test", ".")
  .addOption(formatOption())
  .action(async (opts: { config?: string; env?: string; runsRoot?: string; repo: string; format: Format }) => {
    const controller = new AbortController();
    const onSignal = (signal: NodeJS.Signals) => {
      console.error(`${signal} received; finishing current phase then tearing down`);
      controller.abort();
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);

    const res = await run({
      configDir: opts.config,
      envName: opts.env,
      runsRoot: opts.runsRoot,
      repoPath: opts.repo,
      signal: controller.signal,
    });

    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);

    if (!res.ok) {
      emit(opts.format, { level: "error", ...res.error }, res.error.message);
      process.exit(res.exitCode);
    }

    if (opts.format === "jsonl") {
      process.stdout.write(
        JSON.stringify({
          level: res.exitCode === EXIT.SUCCESS ? "info" : "error",
          runId: res.run.runId,
          state: res.run.state,
          overallStatus: res.run.overallStatus,
          statePath: res.statePath,
        }) + "\n",
      );
    } else {
      for (const line of describeRun(res.run)) console.log(line);
    }
    process.exit(res.exitCode);
  });

program
  .command("identity")
  .description("Print the build identity of a checkout")
  .option("--repo <path>", "Repository path", ".")
  .addOption(new Option("--build-format <format>", "Build number format").choices(["revision", "count", "count-revision"]).default("revision"))
  .option("--allow-shallow", "Accept a shallow clone")
  .addOption(formatOption())
  .action(async (opts: { repo: string; buildFormat: BuildNumberFormat; allowShallow?: boolean; format: Format }) => {
    const res = await identity({ repoPath: opts.repo, format: opts.buildFormat, allowShallow: opts.allowShallow });
    if (!res.ok) {
      emit(opts.format, { level: "error", ...res.error }, res.error.message);
      process.exit(EXIT.ABORTED);
    }
    emit(
      opts.format,
      { level: "info", ...res.identity, buildNumber: res.buildNumber },
      `${res.buildNumber}  (commits=${res.identity.commitCount} revision=${res.identity.shortRevision})`,
    );
  });

program
  .command("status")
  .description("Show a run record, or list runs")
  .argument("[runId]", "Run id (omit to list all)")
  .option("--runs-root <path>", "Runs root directory")
  .option("--repo <path>", "Checkout the runs_dir is relative to", ".")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Environment overlay")
  .addOption(formatOption())
  .action((runId: string | undefined, opts: { runsRoot?: string; repo: string; config?: string; env?: string; format: Format }) => {
    const runsRoot = resolveRunsRoot({ runsRoot: opts.runsRoot, repoPath: opts.repo, configDir: opts.config, envName: opts.env });
    if (runId) {
      const res = status({ runsRoot, runId });
      if (!res.ok) {
        emit(opts.format, { level: "error", error: res.error }, res.error);
        process.exit(1);
      }
      if (opts.format === "jsonl") process.stdout.write(JSON.stringify(res.run) + "\n");
      else for (const line of describeRun(res.run)) console.log(line);
      return;
    }

    const list = listRuns(runsRoot);
    if (opts.format === "jsonl") {
      for (const item of list) process.stdout.write(JSON.stringify(item) + "\n");
    } else {
      if (list.length === 0) {
        console.log("No runs found.");
        return;
      }
      for (const item of list) console.log(`${item.runId}  ${item.state}  ${item.overallStatus}  ${item.updatedAt}`);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.INVALID_CONFIG);
});
