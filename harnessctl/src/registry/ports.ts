import { RegistryError } from "../core/errors.js";
import type { PortBinding } from "../types/service.js";

export const ANY_ADDRESS = "0.0.0.0";

export type RawPort = string | number | { bind?: string; host: number; container: number };

function toPort(value: string | number, raw: RawPort): number {
  const n = typeof value === "number" ? value : Number(value);
  if (!Number.isInteger(n) || n < 1 || n > 65535) {
    throw new RegistryError(`Invalid port ${JSON.stringify(raw)}`, { port: raw });
  }
  return n;
}

/**
 * Parse a port declaration. Accepts compose-style strings
 * ("127.0.0.1:3307:3306", "3307:3306", "5432"), a bare number, or an object.
 * Omitted bind addresses mean every interface.
 */
export function parsePortBinding(raw: RawPort): PortBinding {
  if (typeof raw === "number") {
    const port = toPort(raw, raw);
    return { bindAddress: ANY_ADDRESS, hostPort: port, containerPort: port };
  }

  if (typeof raw === "object") {
    return {
      bindAddress: raw.bind ?? ANY_ADDRESS,
      hostPort: toPort(raw.host, raw),
      containerPort: toPort(raw.container, raw),
    };
  }

  const parts = raw.split(":");
  switch (parts.length) {
    case 1:
      return parsePortBinding(toPort(parts[0], raw));
    case 2: {
      const [first, second] = parts;
      const container = toPort(second, raw);
      // "3307:3306" vs "127.0.0.1:5432"
      if (/^\d+$/.test(first)) {
        return { bindAddress: ANY_ADDRESS, hostPort: toPort(first, raw), containerPort: container };
      }
      return { bindAddress: first, hostPort: container, containerPort: container };
    }
    case 3:
      if (parts[0] === "") throw new RegistryError(`Invalid port ${JSON.stringify(raw)}`, { port: raw });
      return { bindAddress: parts[0], hostPort: toPort(parts[1], raw), containerPort: toPort(parts[2], raw) };
    default:
      throw new RegistryError(`Invalid port ${JSON.stringify(raw)}`, { port: raw });
  }
}

/** Two bindings collide when they claim the same host port on an overlapping address. */
export function bindingsConflict(a: PortBinding, b: PortBinding): boolean {
  if (a.hostPort !== b.hostPort) return false;
  return a.bindAddress === b.bindAddress || a.bindAddress === ANY_ADDRESS || b.bindAddress === ANY_ADDRESS;
}

export function formatBinding(b: PortBinding): string {
  return `${b.bindAddress}:${b.hostPort}:${b.containerPort}`;
}
