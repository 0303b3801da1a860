import fs from "node:fs";
import path from "node:path";
import { DEFAULT_CONFIG_DIR, loadRawConfig } from "../config/loader.js";
import { normalizeConfig, validateRawConfig } from "../config/validator.js";
import { HarnessError, errorMessage } from "../core/errors.js";
import { formatBinding } from "../registry/ports.js";
import { ServiceRegistry } from "../registry/service-registry.js";
import { placeholdersIn } from "../phases/command.js";
import type { HarnessConfig } from "../types/config.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type ValidateSummary = { services: string[]; bindings: string[]; phases: string[] };

export type ValidateResult =
  | { ok: true; summary: ValidateSummary; warnings: Diagnostic[] }
  | { ok: false; errors: Diagnostic[] };

function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

const KNOWN_PLACEHOLDERS = new Set(["filter", "rcfile", "jobs"]);

function lintConfig(config: HarnessConfig, env: NodeJS.ProcessEnv): Diagnostic[] {
  const warnings: Diagnostic[] = [];
  if (config.report.enabled && !env[config.report.tokenEnv]) {
    warnings.push(
      diag("warn", "REPORT_TOKEN_UNSET", `Reporting is enabled but ${config.report.tokenEnv} is not set; finalize will fail`),
    );
  }
  for (const phase of config.phases) {
    for (const command of phase.commands) {
      for (const name of placeholdersIn(command)) {
        if (!KNOWN_PLACEHOLDERS.has(name)) {
          warnings.push(
            diag("warn", "PHASE_PLACEHOLDER_UNKNOWN", `Phase '${phase.name}' uses unknown placeholder {{${name}}}`, {
              details: { phase: phase.name, command },
            }),
          );
        } else if (name === "filter" && phase.filter === undefined) {
          warnings.push(diag("warn", "PHASE_FILTER_UNSET", `Phase '${phase.name}' uses {{filter}} but sets no filter`));
        } else if (name === "rcfile" && !phase.lint) {
          warnings.push(diag("warn", "PHASE_LINT_UNSET", `Phase '${phase.name}' uses {{rcfile}} without a lint block`));
        }
      }
    }
  }
  return warnings;
}

/**
 * Check the layered config the way `run` would load it, without launching
 * anything: schema, normalization, then registry invariants.
 */
export function validateAll(opts: { configDir?: string; envName?: string; env?: NodeJS.ProcessEnv } = {}): ValidateResult {
  const configDir = path.resolve(opts.configDir ?? DEFAULT_CONFIG_DIR);
  const env = opts.env ?? process.env;

  if (!fs.existsSync(configDir)) {
    return { ok: false, errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${configDir}`, { path: configDir })] };
  }

  let raw: Record<string, unknown>;
  try {
    raw = loadRawConfig(opts.envName, configDir, env);
  } catch (e) {
    const file = e instanceof HarnessError && typeof e.context.path === "string" ? e.context.path : configDir;
    return { ok: false, errors: [diag("error", "CONFIG_READ_FAILED", errorMessage(e), { path: file })] };
  }

  const checked = validateRawConfig(raw);
  if (!checked.valid) {
    return {
      ok: false,
      errors: [diag("error", "CONFIG_INVALID", `Config invalid: ${checked.errors}`, { path: configDir })],
    };
  }

  let config: HarnessConfig;
  try {
    config = normalizeConfig(checked.config);
  } catch (e) {
    return { ok: false, errors: [diag("error", "CONFIG_INVALID", errorMessage(e), { path: configDir })] };
  }

  let registry: ServiceRegistry;
  try {
    registry = ServiceRegistry.from(config.services);
  } catch (e) {
    const details = e instanceof HarnessError ? e.context : undefined;
    return { ok: false, errors: [diag("error", "REGISTRY_INVALID", errorMessage(e), { details })] };
  }

  return {
    ok: true,
    summary: {
      services: registry.names(),
      bindings: registry.list().flatMap((s) => s.ports.map((p) => `${s.name}=${formatBinding(p)}`)),
      phases: config.phases.map((p) => p.name),
    },
    warnings: lintConfig(config, env),
  };
}
