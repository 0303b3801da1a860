import os from "node:os";
import { ConfigError } from "../core/errors.js";
import type { PhaseSpec } from "../types/phase.js";

const PLACEHOLDER = /\{\{\s*([a-z_]+)\s*\}\}/g;
const SHELL_SAFE = /^[A-Za-z0-9_\-.,:/=@%+]+$/;

export type PlaceholderValues = Partial<Record<"filter" | "rcfile" | "jobs", string>>;

/** Quote a value for /bin/sh unless it is made only of inert characters. */
export function shellQuote(value: string): string {
  if (value === "") return "''";
  if (SHELL_SAFE.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function placeholdersIn(template: string): string[] {
  return [...template.matchAll(PLACEHOLDER)].map((m) => m[1]);
}

/** Placeholder values a phase supplies to its commands. */
export function phaseValues(phase: PhaseSpec, cpuCount: number = os.availableParallelism()): PlaceholderValues {
  const values: PlaceholderValues = {};
  if (phase.filter !== undefined) values.filter = phase.filter;
  if (phase.lint) {
    values.rcfile = phase.lint.rcfile;
    values.jobs = String(phase.lint.jobs ?? cpuCount);
  }
  return values;
}

function isKnown(name: string): name is keyof PlaceholderValues {
  return name === "filter" || name === "rcfile" || name === "jobs";
}

/**
 * Substitute {{filter}}, {{rcfile}} and {{jobs}}, shell-quoted. The filter is
 * opaque: it is quoted, never parsed.
 */
export function expandCommand(template: string, values: PlaceholderValues): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => {
    if (!isKnown(name)) {
      throw new ConfigError(`Unknown placeholder {{${name}}} in command: ${template}`, { placeholder: name });
    }
    const value = values[name];
    if (value === undefined) {
      throw new ConfigError(`Placeholder {{${name}}} has no value in command: ${template}`, { placeholder: name });
    }
    return shellQuote(value);
  });
}
