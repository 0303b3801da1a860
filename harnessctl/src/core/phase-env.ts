import { probeHost } from "../services/probes.js";
import type { ServiceInstance } from "../types/service.js";
import type { BuildIdentity } from "../types/run.js";
import { sanitizeEnv } from "../utils/security.js";

export type PhaseEnvInput = {
  hostEnv: NodeJS.ProcessEnv;
  configEnv: Readonly<Record<string, string>>;
  passEnv: readonly string[];
  identity: BuildIdentity;
  buildNumber: string;
  runId: string;
  instances: ReadonlyMap<string, ServiceInstance>;
};

/** "mssql" → "MSSQL", "graph-store" → "GRAPH_STORE" */
export function serviceEnvKey(name: string): string {
  return name.toUpperCase().replace(/[^A-Z0-9]/g, "_");
}

/**
 * Everything a phase sees, assembled explicitly: a minimal host base, the
 * variables named in pass_env, configured values, build identity and the
 * address of every running service. Nothing else leaks in from the host.
 */
export function buildPhaseEnv(input: PhaseEnvInput): Record<string, string> {
  const env: Record<string, string> = sanitizeEnv(input.hostEnv);

  for (const key of input.passEnv) {
    const value = input.hostEnv[key];
    if (value !== undefined) env[key] = value;
  }
  Object.assign(env, input.configEnv);

  env.HARNESS_RUN_ID = input.runId;
  env.HARNESS_BUILD_NUMBER = input.buildNumber;
  env.HARNESS_COMMIT_COUNT = String(input.identity.commitCount);
  env.HARNESS_REVISION = input.identity.shortRevision;

  for (const [name, instance] of input.instances) {
    const first = instance.spec.ports[0];
    if (!first) continue;
    const key = serviceEnvKey(name);
    env[`HARNESS_SVC_${key}_HOST`] = probeHost(instance.spec, first.hostPort);
    env[`HARNESS_SVC_${key}_PORT`] = String(first.hostPort);
  }

  return env;
}
