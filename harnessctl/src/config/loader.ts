import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { ConfigError, errorMessage } from "../core/errors.js";
import type { HarnessConfig } from "../types/config.js";
import { ServiceRegistry } from "../registry/service-registry.js";
import { normalizeConfig, validateRawConfig } from "./validator.js";

export const DEFAULT_CONFIG_DIR = fileURLToPath(new URL("../../config", import.meta.url));

type Json = Record<string, unknown>;

function isPlainObject(v: unknown): v is Json {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: Json, override: Json): Json {
  const result: Json = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Json {
  if (!fs.existsSync(filePath)) return {};
  let parsed: unknown;
  try {
    parsed = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new ConfigError(`Cannot parse ${filePath}: ${errorMessage(e)}`, { path: filePath });
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file must hold a mapping: ${filePath}`, { path: filePath });
  }
  return parsed;
}

/** HARNESS_RUNS_DIR → runs_dir, HARNESS_PROJECT → project. */
const ENV_OVERRIDES: Record<string, string> = {
  HARNESS_RUNS_DIR: "runs_dir",
  HARNESS_PROJECT: "project",
};

function applyEnvOverrides(config: Json, env: NodeJS.ProcessEnv): Json {
  const result = { ...config };
  for (const [envKey, configKey] of Object.entries(ENV_OVERRIDES)) {
    const value = env[envKey];
    if (value !== undefined && value !== "") result[configKey] = value;
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← HARNESS_* variables.
 * The result is unvalidated.
 */
export function loadRawConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): Json {
  const dir = configDir ?? DEFAULT_CONFIG_DIR;
  const basePath = path.join(dir, "base.yaml");
  if (!fs.existsSync(basePath)) {
    throw new ConfigError(`Base config not found: ${basePath}`, { path: basePath });
  }

  let merged = loadYaml(basePath);
  if (envName) {
    const envPath = path.join(dir, `${envName}.yaml`);
    if (!fs.existsSync(envPath)) {
      throw new ConfigError(`Environment config not found: ${envPath}`, { path: envPath });
    }
    merged = deepMerge(merged, loadYaml(envPath));
  }

  return applyEnvOverrides(merged, env);
}

export type LoadedConfig = {
  config: HarnessConfig;
  registry: ServiceRegistry;
};

/**
 * Load, schema-check and normalize the harness config, then build the service
 * registry. Throws ConfigError or RegistryError before anything is launched.
 */
export function loadConfig(
  opts: { envName?: string; configDir?: string; env?: NodeJS.ProcessEnv } = {},
): LoadedConfig {
  const raw = loadRawConfig(opts.envName, opts.configDir, opts.env);
  const checked = validateRawConfig(raw);
  if (!checked.valid) {
    throw new ConfigError(`Config invalid: ${checked.errors}`, { configDir: opts.configDir ?? DEFAULT_CONFIG_DIR });
  }
  const config = normalizeConfig(checked.config);
  return { config, registry: ServiceRegistry.from(config.services) };
}
