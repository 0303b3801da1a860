import { RegistryError } from "../core/errors.js";
import type { PortBinding, ServiceSpec } from "../types/service.js";
import { bindingsConflict, formatBinding } from "./ports.js";

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

/** Host port a tcp/http probe connects to: the explicit one, else the first binding. */
export function probePort(spec: ServiceSpec): number | undefined {
  const probe = spec.readiness;
  if (probe.kind === "exec") return undefined;
  return probe.port ?? spec.ports[0]?.hostPort;
}

/**
 * Validated, immutable set of service specs. Construction fails on duplicate
 * names or overlapping host bindings so nothing is launched from a bad fleet.
 */
export class ServiceRegistry {
  private readonly byName: ReadonlyMap<string, ServiceSpec>;

  private constructor(private readonly specs: readonly ServiceSpec[]) {
    this.byName = new Map(specs.map((s) => [s.name, s]));
  }

  static from(specs: readonly ServiceSpec[]): ServiceRegistry {
    const seen = new Set<string>();
    const claimed: Array<{ service: string; binding: PortBinding }> = [];

    for (const spec of specs) {
      if (seen.has(spec.name)) {
        throw new RegistryError(`Duplicate service name: ${spec.name}`, { service: spec.name });
      }
      seen.add(spec.name);

      for (const binding of spec.ports) {
        const clash = claimed.find((c) => bindingsConflict(c.binding, binding));
        if (clash) {
          throw new RegistryError(
            `Host binding ${formatBinding(binding)} of '${spec.name}' conflicts with ${formatBinding(clash.binding)} of '${clash.service}'`,
            { service: spec.name, other: clash.service, hostPort: binding.hostPort },
          );
        }
        claimed.push({ service: spec.name, binding });
      }

      if (spec.readiness.kind !== "exec" && probePort(spec) === undefined) {
        throw new RegistryError(`Service '${spec.name}' has a ${spec.readiness.kind} probe but no port to probe`, {
          service: spec.name,
        });
      }
    }

    return new ServiceRegistry(deepFreeze(specs.map((s) => structuredClone(s))));
  }

  list(): readonly ServiceSpec[] {
    return this.specs;
  }

  names(): string[] {
    return this.specs.map((s) => s.name);
  }

  get(name: string): ServiceSpec | undefined {
    return this.byName.get(name);
  }

  get size(): number {
    return this.specs.length;
  }
}
