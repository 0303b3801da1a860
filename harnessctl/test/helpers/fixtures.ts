import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createLogger, type Logger } from "../../src/utils/logger.js";
import type { PhaseSpec } from "../../src/types/phase.js";
import type { ReadinessProbeSpec, ServiceSpec } from "../../src/types/service.js";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export function tmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `harnessctl-${prefix}-`));
}

export function quietLogger(): Logger {
  return createLogger("test", { level: "silent" });
}

export function tcpProbe(overrides: Partial<Extract<ReadinessProbeSpec, { kind: "tcp" }>> = {}): ReadinessProbeSpec {
  return { kind: "tcp", intervalMs: 1, retries: 3, attemptTimeoutMs: 100, ...overrides };
}

export function service(name: string, hostPort: number, overrides: Partial<ServiceSpec> = {}): ServiceSpec {
  return {
    name,
    image: `${name}:latest`,
    ports: [{ bindAddress: "127.0.0.1", hostPort, containerPort: hostPort }],
    env: {},
    restartPolicy: "never",
    readiness: tcpProbe(),
    ...overrides,
  };
}

export function phase(name: string, overrides: Partial<PhaseSpec> = {}): PhaseSpec {
  return {
    name,
    commands: [`echo ${name}`],
    producesCoverage: false,
    blocking: false,
    env: {},
    ...overrides,
  };
}
