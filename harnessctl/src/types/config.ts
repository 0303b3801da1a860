/** Configuration types — layered config system. */
import type { ServiceSpec } from "./service.js";
import type { PhaseSpec } from "./phase.js";

export type BuildNumberFormat = "revision" | "count" | "count-revision";

export type ReportConfig = {
  enabled: boolean;
  endpoint: string;
  tokenEnv: string;
  backoffMs: number;
  timeoutMs: number;
  buildNumberFormat: BuildNumberFormat;
};

export type SupervisorConfig = {
  graceMs: number;
};

export type IdentityConfig = {
  allowShallow: boolean;
};

export type HarnessConfig = {
  schemaVersion: string;
  project: string;
  runsDir: string;
  env: Readonly<Record<string, string>>;
  /** Host variables forwarded to phases by name. */
  passEnv: readonly string[];
  services: readonly ServiceSpec[];
  phases: readonly PhaseSpec[];
  supervisor: SupervisorConfig;
  identity: IdentityConfig;
  report: ReportConfig;
};
