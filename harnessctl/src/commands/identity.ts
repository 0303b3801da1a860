import path from "node:path";
import { HarnessError, errorMessage } from "../core/errors.js";
import { BuildIdentityResolver, buildNumber } from "../git/identity.js";
import type { BuildNumberFormat } from "../types/config.js";
import type { BuildIdentity } from "../types/run.js";

export type IdentityResult =
  | { ok: true; identity: BuildIdentity; buildNumber: string }
  | { ok: false; error: { code: string; message: string } };

export async function identity(opts: {
  repoPath?: string;
  format?: BuildNumberFormat;
  allowShallow?: boolean;
}): Promise<IdentityResult> {
  const resolver = new BuildIdentityResolver(path.resolve(opts.repoPath ?? process.cwd()), {
    allowShallow: opts.allowShallow,
  });
  try {
    const id = await resolver.resolve();
    return { ok: true, identity: id, buildNumber: buildNumber(id, opts.format) };
  } catch (e) {
    return {
      ok: false,
      error: e instanceof HarnessError ? { code: e.code, message: e.message } : { code: "IDENTITY_UNAVAILABLE", message: errorMessage(e) },
    };
  }
}
