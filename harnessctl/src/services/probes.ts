import net from "node:net";
import { setTimeout as sleep } from "node:timers/promises";
import axios from "axios";
import { ANY_ADDRESS } from "../registry/ports.js";
import { probePort } from "../registry/service-registry.js";
import type { ProcessHandle, ReadinessProbeSpec, ServiceSpec } from "../types/service.js";
import type { ContainerRuntime } from "./runtime.js";

/** One readiness check; resolves true once the service answers. */
export type ProbeAttempt = () => Promise<boolean>;

export function tcpCheck(host: string, port: number, timeoutMs: number): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const socket = new net.Socket();
    socket
      .setTimeout(timeoutMs)
      .once("connect", () => {
        socket.destroy();
        resolve(true);
      })
      .once("timeout", () => {
        socket.destroy();
        resolve(false);
      })
      .once("error", () => {
        socket.destroy();
        resolve(false);
      })
      .connect(port, host);
  });
}

export async function httpCheck(url: string, timeoutMs: number, expectStatus?: number): Promise<boolean> {
  try {
    const res = await axios.get(url, { timeout: timeoutMs, validateStatus: () => true, maxRedirects: 0 });
    return expectStatus === undefined ? res.status >= 200 && res.status < 400 : res.status === expectStatus;
  } catch {
    // refused / reset / timeout: not up yet
    return false;
  }
}

/** Address the harness reaches a service on. */
export function probeHost(spec: ServiceSpec, port: number): string {
  const binding = spec.ports.find((p) => p.hostPort === port) ?? spec.ports[0];
  if (!binding || binding.bindAddress === ANY_ADDRESS) return "127.0.0.1";
  return binding.bindAddress;
}

export function createProbe(spec: ServiceSpec, handle: ProcessHandle, runtime: ContainerRuntime): ProbeAttempt {
  const probe = spec.readiness;
  if (probe.kind === "exec") {
    return async () => (await runtime.exec(handle, probe.command, probe.attemptTimeoutMs)) === 0;
  }

  const port = probePort(spec);
  if (port === undefined) {
    throw new Error(`No port to probe for service '${spec.name}'`);
  }
  const host = probeHost(spec, port);

  if (probe.kind === "http") {
    const url = `http://${host}:${port}${probe.path}`;
    return () => httpCheck(url, probe.attemptTimeoutMs, probe.expectStatus);
  }
  return () => tcpCheck(host, port, probe.attemptTimeoutMs);
}

export type WaitOptions = {
  /** Polled after every failed attempt; false means the process exited. */
  isAlive?: () => Promise<boolean>;
  onAttempt?: (attempt: number, ok: boolean) => void;
};

/**
 * Poll `attempt` every intervalMs, at most `retries` times. Throws when the
 * retries run out or the process dies while starting.
 */
export async function waitUntilReady(
  probe: ReadinessProbeSpec,
  attempt: ProbeAttempt,
  opts: WaitOptions = {},
): Promise<number> {
  for (let i = 1; i <= probe.retries; i++) {
    let ok = false;
    try {
      ok = await attempt();
    } catch {
      ok = false;
    }
    opts.onAttempt?.(i, ok);
    if (ok) return i;

    if (opts.isAlive && !(await opts.isAlive())) {
      throw new Error(`process exited before becoming ready (attempt ${i})`);
    }
    if (i < probe.retries) await sleep(probe.intervalMs);
  }
  throw new Error(`${probe.kind} probe did not succeed after ${probe.retries} attempts`);
}
