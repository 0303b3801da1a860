import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { RunStore, type RunSummary } from "../core/run-store.js";
import { errorMessage } from "../core/errors.js";
import type { PipelineRun } from "../types/run.js";

export type StatusResult =
  | { ok: true; run: PipelineRun }
  | { ok: false; error: string };

/** Where `run` puts its records: runs_dir relative to the checkout unless overridden. */
export function resolveRunsRoot(opts: { runsRoot?: string; repoPath?: string; configDir?: string; envName?: string }): string {
  if (opts.runsRoot) return path.resolve(opts.runsRoot);
  const { config } = loadConfig({ configDir: opts.configDir, envName: opts.envName });
  return path.resolve(opts.repoPath ?? process.cwd(), config.runsDir);
}

/** Read the persisted record of one run. */
export function status(opts: { runsRoot: string; runId: string }): StatusResult {
  try {
    return { ok: true, run: new RunStore(opts.runsRoot).load(opts.runId) };
  } catch (e) {
    return { ok: false, error: errorMessage(e) };
  }
}

/** All runs under the runs root, newest first. */
export function listRuns(runsRoot: string): RunSummary[] {
  return new RunStore(runsRoot).list();
}

/** One line per phase plus the service and reporting axes. */
export function describeRun(run: PipelineRun): string[] {
  const lines = [
    `run ${run.runId}  state=${run.state}  status=${run.overallStatus}  build=${run.buildNumber ?? "-"}`,
  ];
  for (const svc of run.services) {
    const leaked = svc.leaked ? "  LEAKED" : "";
    lines.push(`  service ${svc.name}  ${svc.state}${leaked}${svc.error ? `  (${svc.error})` : ""}`);
  }
  for (const r of run.phaseResults) {
    const extra = r.error ? `  ${r.error.code}: ${r.error.message}` : "";
    lines.push(`  phase ${r.phase}  ${r.exitStatus}  ${r.durationMs}ms${extra}`);
  }
  if (run.finalization) {
    lines.push(
      run.finalization.ok
        ? `  report  ${run.finalization.skipped ? "skipped" : "acknowledged"}  attempts=${run.finalization.attempts}`
        : `  report  failed  attempts=${run.finalization.attempts}  ${run.finalization.error}`,
    );
  }
  if (run.error) lines.push(`  error ${run.error.code}: ${run.error.message}`);
  return lines;
}
