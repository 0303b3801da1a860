/** Pipeline run record — persisted to <runs_dir>/<runId>/run.json. */
import type { InstanceState } from "./service.js";
import type { PhaseResult } from "./phase.js";

export type BuildIdentity = {
  readonly commitCount: number;
  readonly shortRevision: string;
};

export type OverallStatus = "pending" | "success" | "partial_failure" | "aborted";

export type FinalizationRecord =
  | { ok: true; attempts: number; status: number; skipped: boolean; finishedAt: string }
  | { ok: false; attempts: number; error: string; finishedAt: string };

export type ServiceRecord = {
  name: string;
  image: string;
  state: InstanceState;
  readyAt?: string;
  error?: string;
  leaked?: boolean;
};

export type PipelineRun = {
  runId: string;
  createdAt: string;
  updatedAt: string;
  state: string;
  identity: BuildIdentity | null;
  buildNumber: string | null;
  services: ServiceRecord[];
  phaseResults: PhaseResult[];
  overallStatus: OverallStatus;
  error: { code: string; message: string } | null;
  finalization: FinalizationRecord | null;
};
