import { setTimeout as sleep } from "node:timers/promises";
import axios from "axios";
import { FinalizationError, errorMessage } from "../core/errors.js";
import { buildNumber } from "../git/identity.js";
import type { ReportConfig } from "../types/config.js";
import type { BuildIdentity, OverallStatus } from "../types/run.js";
import type { Logger } from "../utils/logger.js";

export type FinalStatus = Exclude<OverallStatus, "pending">;

export type TransportResponse = { status: number; data: unknown };

/** POSTs a form body; swapped for a fake in tests. */
export type ReportTransport = (
  url: string,
  body: string,
  opts: { timeoutMs: number; headers: Record<string, string> },
) => Promise<TransportResponse>;

export const axiosTransport: ReportTransport = async (url, body, opts) => {
  const res = await axios.post<unknown>(url, body, {
    timeout: opts.timeoutMs,
    headers: opts.headers,
    validateStatus: () => true,
  });
  return { status: res.status, data: res.data };
};

export type Ack = {
  attempts: number;
  status: number;
  skipped: boolean;
};

const TRANSIENT_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "ECONNABORTED", "EAI_AGAIN", "EPIPE"]);

export function isTransientError(e: unknown): boolean {
  if (e === null || typeof e !== "object" || !("code" in e)) return false;
  const code = Reflect.get(e, "code");
  return typeof code === "string" && TRANSIENT_CODES.has(code);
}

/** Status marker understood by the webhook: "done" or a failure marker. */
export function statusMarker(status: FinalStatus): "done" | "failed" | "aborted" {
  switch (status) {
    case "success":
      return "done";
    case "partial_failure":
      return "failed";
    default:
      return "aborted";
  }
}

export function webhookBody(buildNum: string, status: FinalStatus): string {
  return new URLSearchParams({
    "payload[build_num]": buildNum,
    "payload[status]": statusMarker(status),
  }).toString();
}

export type FinalizerOptions = {
  env: NodeJS.ProcessEnv;
  logger: Logger;
  transport?: ReportTransport;
  delay?: (ms: number) => Promise<unknown>;
};

class TransientStatusError extends Error {
  readonly code = "ETRANSIENT_STATUS";
}

/**
 * Posts the build number and terminal status to the reporting webhook, once
 * per run. One retry after a fixed backoff on transient failures.
 */
export class ResultFinalizer {
  private finalized = false;
  private readonly transport: ReportTransport;
  private readonly delay: (ms: number) => Promise<unknown>;
  private readonly log: Logger;
  private readonly env: NodeJS.ProcessEnv;

  constructor(
    private readonly config: ReportConfig,
    opts: FinalizerOptions,
  ) {
    this.env = opts.env;
    this.transport = opts.transport ?? axiosTransport;
    this.delay = opts.delay ?? sleep;
    this.log = opts.logger.child({ component: "finalizer" });
  }

  async finalize(identity: BuildIdentity, status: FinalStatus): Promise<Ack> {
    if (this.finalized) {
      throw new FinalizationError("Run already finalized", 0, false);
    }
    this.finalized = true;

    const buildNum = buildNumber(identity, this.config.buildNumberFormat);
    if (!this.config.enabled) {
      this.log.info({ buildNum, status }, "reporting disabled; skipping finalize");
      return { attempts: 0, status: 0, skipped: true };
    }

    const token = this.env[this.config.tokenEnv];
    if (!token) {
      throw new FinalizationError(`Reporting token not set (${this.config.tokenEnv})`, 0, false);
    }

    const url = new URL(this.config.endpoint);
    url.searchParams.set("repo_token", token);
    const body = webhookBody(buildNum, status);
    const headers = { "content-type": "application/x-www-form-urlencoded" };

    const maxAttempts = 2;
    for (let attempt = 1; ; attempt++) {
      try {
        const res = await this.transport(url.toString(), body, { timeoutMs: this.config.timeoutMs, headers });
        if (res.status >= 500) throw new TransientStatusError(`webhook answered ${res.status}`);
        if (res.status >= 400) {
          throw new FinalizationError(`Webhook rejected finalize with status ${res.status}`, attempt, false);
        }
        this.log.info({ endpoint: this.config.endpoint, buildNum, status, attempts: attempt }, "finalized");
        return { attempts: attempt, status: res.status, skipped: false };
      } catch (e) {
        if (e instanceof FinalizationError) throw e;
        const transient = e instanceof TransientStatusError || isTransientError(e);
        if (!transient || attempt >= maxAttempts) {
          throw new FinalizationError(`Finalize failed after ${attempt} attempt(s): ${errorMessage(e)}`, attempt, transient, e);
        }
        this.log.warn({ err: errorMessage(e), backoffMs: this.config.backoffMs }, "transient finalize failure; retrying");
        await this.delay(this.config.backoffMs);
      }
    }
  }
}
