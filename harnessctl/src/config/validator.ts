import { ConfigError } from "../core/errors.js";
import { bundledSchemas } from "../schema/registry.js";
import { parsePortBinding, type RawPort } from "../registry/ports.js";
import type { BuildNumberFormat, HarnessConfig } from "../types/config.js";
import type { PhaseSpec } from "../types/phase.js";
import type { ReadinessProbeSpec, ServiceSpec } from "../types/service.js";

type EnvValue = string | number | boolean;

type RawProbe = {
  kind: "tcp" | "http" | "exec";
  port?: number;
  path?: string;
  expect_status?: number;
  command?: string[];
  interval_ms?: number;
  retries?: number;
  attempt_timeout_ms?: number;
};

type RawService = {
  name: string;
  image: string;
  command?: string | string[];
  ports?: RawPort[];
  env?: Record<string, EnvValue>;
  restart?: "never" | "always";
  readiness?: RawProbe;
};

type RawPhase = {
  name: string;
  commands: string[];
  filter?: string;
  coverage?: { artifact?: string };
  junit_report?: string;
  blocking?: boolean;
  workdir?: string;
  env?: Record<string, EnvValue>;
  lint?: { rcfile: string; jobs?: number };
  timeout_ms?: number;
};

/** Shape of harness.schema.json. */
export type RawHarnessConfig = {
  schema_version: string;
  project: string;
  runs_dir: string;
  env?: Record<string, EnvValue>;
  pass_env?: string[];
  supervisor?: { grace_ms?: number };
  identity?: { allow_shallow?: boolean };
  report?: {
    enabled?: boolean;
    endpoint?: string;
    token_env?: string;
    backoff_ms?: number;
    timeout_ms?: number;
    build_number_format?: BuildNumberFormat;
  };
  services: RawService[];
  phases: RawPhase[];
};

export type ConfigValidationResult =
  | { valid: true; config: RawHarnessConfig; errors: null }
  | { valid: false; errors: string };

export const PROBE_DEFAULTS = { intervalMs: 1000, retries: 60, attemptTimeoutMs: 2000 } as const;
export const DEFAULT_COVERAGE_ARTIFACT = ".coverage";

function matchesSchema(raw: unknown, errors: { text: string | null }): raw is RawHarnessConfig {
  const res = bundledSchemas().validate("harness", raw, "config");
  errors.text = res.errors;
  return res.valid;
}

/** Validate a loaded config against harness.schema.json. */
export function validateRawConfig(raw: unknown): ConfigValidationResult {
  const errors: { text: string | null } = { text: null };
  if (matchesSchema(raw, errors)) return { valid: true, config: raw, errors: null };
  return { valid: false, errors: errors.text ?? "unknown schema error" };
}

function stringifyEnv(env: Record<string, EnvValue> | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env ?? {})) out[k] = String(v);
  return out;
}

function toProbe(raw: RawProbe | undefined): ReadinessProbeSpec {
  const timing = {
    intervalMs: raw?.interval_ms ?? PROBE_DEFAULTS.intervalMs,
    retries: raw?.retries ?? PROBE_DEFAULTS.retries,
    attemptTimeoutMs: raw?.attempt_timeout_ms ?? PROBE_DEFAULTS.attemptTimeoutMs,
  };
  switch (raw?.kind) {
    case "exec":
      return { kind: "exec", command: raw?.command ?? [], ...timing };
    case "http":
      return { kind: "http", port: raw?.port, path: raw?.path ?? "/", expectStatus: raw?.expect_status, ...timing };
    default:
      return { kind: "tcp", port: raw?.port, ...timing };
  }
}

function toService(raw: RawService): ServiceSpec {
  const command = typeof raw.command === "string" ? [raw.command] : raw.command;
  return {
    name: raw.name,
    image: raw.image,
    command,
    ports: (raw.ports ?? []).map(parsePortBinding),
    env: stringifyEnv(raw.env),
    restartPolicy: raw.restart ?? "never",
    readiness: toProbe(raw.readiness),
  };
}

function toPhase(raw: RawPhase): PhaseSpec {
  return {
    name: raw.name,
    commands: [...raw.commands],
    filter: raw.filter,
    producesCoverage: raw.coverage !== undefined,
    coverageArtifact: raw.coverage ? (raw.coverage.artifact ?? DEFAULT_COVERAGE_ARTIFACT) : undefined,
    junitReport: raw.junit_report,
    blocking: raw.blocking ?? false,
    workdir: raw.workdir,
    env: stringifyEnv(raw.env),
    lint: raw.lint ? { rcfile: raw.lint.rcfile, jobs: raw.lint.jobs } : undefined,
    timeoutMs: raw.timeout_ms,
  };
}

/** Turn the schema-checked YAML into typed specs with defaults applied. */
export function normalizeConfig(raw: RawHarnessConfig): HarnessConfig {
  const phases = raw.phases.map(toPhase);
  const names = new Set<string>();
  for (const phase of phases) {
    if (names.has(phase.name)) throw new ConfigError(`Duplicate phase name: ${phase.name}`, { phase: phase.name });
    names.add(phase.name);
  }

  return {
    schemaVersion: raw.schema_version,
    project: raw.project,
    runsDir: raw.runs_dir,
    env: stringifyEnv(raw.env),
    passEnv: raw.pass_env ?? [],
    services: raw.services.map(toService),
    phases,
    supervisor: { graceMs: raw.supervisor?.grace_ms ?? 10000 },
    identity: { allowShallow: raw.identity?.allow_shallow ?? false },
    report: {
      enabled: raw.report?.enabled ?? true,
      endpoint: raw.report?.endpoint ?? "https://coveralls.io/webhook",
      tokenEnv: raw.report?.token_env ?? "COVERALLS_REPO_TOKEN",
      backoffMs: raw.report?.backoff_ms ?? 2000,
      timeoutMs: raw.report?.timeout_ms ?? 10000,
      buildNumberFormat: raw.report?.build_number_format ?? "revision",
    },
  };
}
