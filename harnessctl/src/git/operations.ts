import fs from "node:fs";
import { simpleGit, type SimpleGit } from "simple-git";

/**
 * Git queries the harness needs — abstracts simple-git for testability.
 */
export class GitOperations {
  private git: SimpleGit;

  constructor(repoPath: string, git?: SimpleGit) {
    if (!git && !fs.existsSync(repoPath)) {
      throw new Error(`Repository path not found: ${repoPath}`);
    }
    this.git = git ?? simpleGit(repoPath);
  }

  /** Number of commits reachable from HEAD. */
  async commitCount(ref = "HEAD"): Promise<number> {
    const out = await this.git.raw(["rev-list", "--count", ref]);
    return Number.parseInt(out.trim(), 10);
  }

  /** Abbreviated SHA of HEAD. */
  async shortRevision(ref = "HEAD"): Promise<string> {
    const out = await this.git.revparse(["--short", ref]);
    return out.trim();
  }

  async isShallow(): Promise<boolean> {
    const out = await this.git.revparse(["--is-shallow-repository"]);
    return out.trim() === "true";
  }
}
