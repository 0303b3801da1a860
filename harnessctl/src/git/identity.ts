import { IdentityError, errorMessage } from "../core/errors.js";
import type { BuildNumberFormat } from "../types/config.js";
import type { BuildIdentity } from "../types/run.js";
import { GitOperations } from "./operations.js";

export type IdentityResolverOptions = {
  allowShallow?: boolean;
};

/** Source of a run's correlation key. */
export type IdentitySource = {
  resolve(): Promise<BuildIdentity>;
};

/**
 * Derives the build identity (commit count + short revision) from the
 * checkout. The first successful answer is cached, so every caller in a run
 * sees the same identity.
 */
export class BuildIdentityResolver implements IdentitySource {
  private cached: BuildIdentity | null = null;

  /** `source` is a repository path (opened on first resolve) or ready-made operations. */
  constructor(
    private readonly source: GitOperations | string,
    private readonly opts: IdentityResolverOptions = {},
  ) {}

  async resolve(): Promise<BuildIdentity> {
    if (this.cached) return this.cached;
    this.cached = await this.compute();
    return this.cached;
  }

  private open(): GitOperations {
    if (typeof this.source !== "string") return this.source;
    try {
      return new GitOperations(this.source);
    } catch (e) {
      throw new IdentityError(`Cannot open repository: ${errorMessage(e)}`, { repoPath: this.source });
    }
  }

  private async compute(): Promise<BuildIdentity> {
    const git = this.open();
    let commitCount: number;
    let shortRevision: string;
    try {
      commitCount = await git.commitCount();
      shortRevision = await git.shortRevision();
    } catch (e) {
      throw new IdentityError(`No commit history: ${errorMessage(e)}`);
    }

    if (!Number.isInteger(commitCount) || commitCount < 1) {
      throw new IdentityError(`Unusable commit count: ${String(commitCount)}`);
    }
    if (!/^[0-9a-f]{4,40}$/.test(shortRevision)) {
      throw new IdentityError(`Unusable revision: ${shortRevision}`);
    }

    if (!this.opts.allowShallow) {
      let shallow: boolean;
      try {
        shallow = await git.isShallow();
      } catch (e) {
        throw new IdentityError(`Cannot inspect checkout depth: ${errorMessage(e)}`);
      }
      if (shallow) {
        throw new IdentityError("Shallow checkout: commit count would not be stable", { commitCount });
      }
    }

    return Object.freeze({ commitCount, shortRevision });
  }
}

/** Render the identity as the build number sent to the reporting service. */
export function buildNumber(identity: BuildIdentity, format: BuildNumberFormat = "revision"): string {
  switch (format) {
    case "count":
      return String(identity.commitCount);
    case "count-revision":
      return `${identity.commitCount}-${identity.shortRevision}`;
    default:
      return identity.shortRevision;
  }
}
