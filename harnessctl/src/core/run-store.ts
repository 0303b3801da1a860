import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import { bundledSchemas } from "../schema/registry.js";
import type { PipelineRun } from "../types/run.js";
import { sanitizePathComponent } from "../utils/security.js";

export function makeRunId(now: Date = new Date()): string {
  const ts = now.toISOString().replace(/[:.]/g, "-");
  return `${ts}-${crypto.randomBytes(3).toString("hex")}`;
}

export type RunSummary = { runId: string; state: string; overallStatus: string; updatedAt: string };

/**
 * Run records on disk: <runsRoot>/<runId>/run.json plus logs/ for phase
 * output. Rewritten after every orchestrator transition.
 */
export class RunStore {
  readonly runsRoot: string;

  constructor(runsRoot: string) {
    this.runsRoot = path.resolve(runsRoot);
  }

  runDir(runId: string): string {
    return path.join(this.runsRoot, sanitizePathComponent(runId));
  }

  logsDir(runId: string): string {
    return path.join(this.runDir(runId), "logs");
  }

  recordPath(runId: string): string {
    return path.join(this.runDir(runId), "run.json");
  }

  create(runId: string): PipelineRun {
    const now = new Date().toISOString();
    const run: PipelineRun = {
      runId,
      createdAt: now,
      updatedAt: now,
      state: "idle",
      identity: null,
      buildNumber: null,
      services: [],
      phaseResults: [],
      overallStatus: "pending",
      error: null,
      finalization: null,
    };
    this.save(run);
    return run;
  }

  save(run: PipelineRun): void {
    run.updatedAt = new Date().toISOString();
    const target = this.recordPath(run.runId);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    // write-then-rename so a reader never sees half a record
    const tmp = `${target}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(run, null, 2) + "\n", "utf8");
    fs.renameSync(tmp, target);
  }

  /** Read and schema-check a run record. */
  load(runId: string): PipelineRun {
    const target = this.recordPath(runId);
    if (!fs.existsSync(target)) throw new Error(`No run found: ${runId}`);
    const data: unknown = JSON.parse(fs.readFileSync(target, "utf8"));
    if (!isPipelineRun(data)) {
      throw new Error(`Run record invalid (${target}): ${bundledSchemas().validate("run", data, "run").errors}`);
    }
    return data;
  }

  list(): RunSummary[] {
    if (!fs.existsSync(this.runsRoot)) return [];
    const results: RunSummary[] = [];
    for (const entry of fs.readdirSync(this.runsRoot, { withFileTypes: true })) {
      if (!entry.isDirectory()) continue;
      try {
        const run = this.load(entry.name);
        results.push({ runId: run.runId, state: run.state, overallStatus: run.overallStatus, updatedAt: run.updatedAt });
      } catch {
        results.push({ runId: entry.name, state: "corrupted", overallStatus: "unknown", updatedAt: "" });
      }
    }
    return results.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }
}

function isPipelineRun(data: unknown): data is PipelineRun {
  return bundledSchemas().validate("run", data, "run").valid;
}
