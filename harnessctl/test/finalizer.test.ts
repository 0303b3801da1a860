import { describe, expect, it, vi } from "vitest";
import { FinalizationError } from "../src/core/errors.js";
import { ResultFinalizer, webhookBody, type ReportTransport } from "../src/report/finalizer.js";
import type { ReportConfig } from "../src/types/config.js";
import { quietLogger } from "./helpers/fixtures.js";

const CONFIG: ReportConfig = {
  enabled: true,
  endpoint: "https://coveralls.example/webhook",
  tokenEnv: "COVERALLS_REPO_TOKEN",
  backoffMs: 2000,
  timeoutMs: 5000,
  buildNumberFormat: "revision",
};
const ENV = { COVERALLS_REPO_TOKEN: "test-token" };
const IDENTITY = { commitCount: 12, shortRevision: "abc1234" };

function respondWith(...steps: Array<number | Error>) {
  const queue = [...steps];
  return vi.fn<Parameters<ReportTransport>, ReturnType<ReportTransport>>(async () => {
    const next = queue.shift() ?? 200;
    if (next instanceof Error) throw next;
    return { status: next, data: {} };
  });
}

function networkError(code: string): Error {
  return Object.assign(new Error(`connect ${code}`), { code });
}

function finalizerWith(transport: ReportTransport, config: Partial<ReportConfig> = {}, env: NodeJS.ProcessEnv = ENV) {
  const delay = vi.fn(async (_ms: number) => undefined);
  const finalizer = new ResultFinalizer({ ...CONFIG, ...config }, { env, logger: quietLogger(), transport, delay });
  return { finalizer, delay };
}

async function failure(p: Promise<unknown>): Promise<FinalizationError> {
  const err = await p.catch((e: unknown) => e);
  if (!(err instanceof FinalizationError)) throw new Error(`expected FinalizationError, got ${String(err)}`);
  return err;
}

describe("ResultFinalizer", () => {
  it("posts build number and status as a form body", async () => {
    const transport = respondWith(200);
    const { finalizer } = finalizerWith(transport);

    const ack = await finalizer.finalize(IDENTITY, "success");

    expect(ack).toEqual({ attempts: 1, status: 200, skipped: false });
    expect(transport).toHaveBeenCalledTimes(1);
    expect(transport).toHaveBeenCalledWith(
      "https://coveralls.example/webhook?repo_token=test-token",
      "payload%5Bbuild_num%5D=abc1234&payload%5Bstatus%5D=done",
      { timeoutMs: 5000, headers: { "content-type": "application/x-www-form-urlencoded" } },
    );
  });

  it("uses the configured build number format", async () => {
    const transport = respondWith(200);
    const { finalizer } = finalizerWith(transport, { buildNumberFormat: "count" });
    await finalizer.finalize(IDENTITY, "partial_failure");
    expect(transport.mock.calls[0][1]).toBe("payload%5Bbuild_num%5D=12&payload%5Bstatus%5D=failed");
  });

  it("retries once after the backoff on a transient failure", async () => {
    const transport = respondWith(networkError("ECONNRESET"), 200);
    const { finalizer, delay } = finalizerWith(transport);

    const ack = await finalizer.finalize(IDENTITY, "success");

    expect(ack.attempts).toBe(2);
    expect(transport).toHaveBeenCalledTimes(2);
    expect(delay).toHaveBeenCalledWith(2000);
  });

  it("gives up after the second transient failure", async () => {
    const transport = respondWith(503, 503, 200);
    const { finalizer } = finalizerWith(transport);

    const err = await failure(finalizer.finalize(IDENTITY, "success"));

    expect(err.attempts).toBe(2);
    expect(err.transient).toBe(true);
    expect(err.message).toBe("Finalize failed after 2 attempt(s): webhook answered 503");
    expect(transport).toHaveBeenCalledTimes(2);
  });

  it("does not retry a rejected request", async () => {
    const transport = respondWith(422);
    const { finalizer, delay } = finalizerWith(transport);

    const err = await failure(finalizer.finalize(IDENTITY, "success"));

    expect(err.message).toBe("Webhook rejected finalize with status 422");
    expect(err.attempts).toBe(1);
    expect(err.transient).toBe(false);
    expect(delay).not.toHaveBeenCalled();
  });

  it("does not retry an error that is not a network failure", async () => {
    const transport = respondWith(new Error("invalid URL"));
    const { finalizer } = finalizerWith(transport);

    const err = await failure(finalizer.finalize(IDENTITY, "success"));

    expect(err.attempts).toBe(1);
    expect(err.transient).toBe(false);
    expect(transport).toHaveBeenCalledTimes(1);
  });

  it("fails without a request when the token is missing", async () => {
    const transport = respondWith(200);
    const { finalizer } = finalizerWith(transport, {}, {});

    const err = await failure(finalizer.finalize(IDENTITY, "success"));

    expect(err.message).toBe("Reporting token not set (COVERALLS_REPO_TOKEN)");
    expect(err.attempts).toBe(0);
    expect(transport).not.toHaveBeenCalled();
  });

  it("skips reporting when disabled", async () => {
    const transport = respondWith(200);
    const { finalizer } = finalizerWith(transport, { enabled: false });

    expect(await finalizer.finalize(IDENTITY, "success")).toEqual({ attempts: 0, status: 0, skipped: true });
    expect(transport).not.toHaveBeenCalled();
  });

  it("finalizes a run at most once", async () => {
    const transport = respondWith(200, 200);
    const { finalizer } = finalizerWith(transport);
    await finalizer.finalize(IDENTITY, "success");

    await expect(finalizer.finalize(IDENTITY, "success")).rejects.toThrow("Run already finalized");
    expect(transport).toHaveBeenCalledTimes(1);
  });
});

describe("webhookBody", () => {
  it("marks an aborted run", () => {
    expect(webhookBody("abc1234", "aborted")).toBe("payload%5Bbuild_num%5D=abc1234&payload%5Bstatus%5D=aborted");
  });
});
