import { simpleGit, type SimpleGit } from "simple-git";

/** What the orchestrator needs to know about the repository it builds from. */
export interface RepoInfo {
  /** Absolute top-level directory, or null outside a git work tree. */
  getTopLevel(): Promise<string | null>;
  /** Tags pointing exactly at HEAD. */
  getTagsAtHead(): Promise<string[]>;
  /** Abbreviated HEAD commit id, or null when there is no commit. */
  getShortSha(): Promise<string | null>;
}

/**
 * Repository queries over simple-git.
 */
export class GitOperations implements RepoInfo {
  private git: SimpleGit;

  constructor(repoPath: string, git?: SimpleGit) {
    this.git = git ?? simpleGit(repoPath);
  }

  private async isRepo(): Promise<boolean> {
    return this.git.checkIsRepo();
  }

  /** A freshly initialised repository has no HEAD yet; git reports that as an error. */
  private async withHead<T>(fn: () => Promise<T>, noHead: T): Promise<T> {
    try {
      return await fn();
    } catch (e: unknown) {
      const message = e instanceof Error ? e.message : String(e);
      if (/unknown revision|ambiguous argument 'HEAD'|malformed object name|Needed a single revision/i.test(message)) {
        return noHead;
      }
      throw e;
    }
  }

  async getTopLevel(): Promise<string | null> {
    if (!(await this.isRepo())) return null;
    const result = await this.git.revparse(["--show-toplevel"]);
    return result.trim() || null;
  }

  async getTagsAtHead(): Promise<string[]> {
    if (!(await this.isRepo())) return [];
    const out = await this.withHead(() => this.git.raw(["tag", "--points-at", "HEAD"]), "");
    return out
      .split("\n")
      .map((t) => t.trim())
      .filter((t) => t.length > 0);
  }

  async getShortSha(): Promise<string | null> {
    if (!(await this.isRepo())) return null;
    const result = await this.withHead(() => this.git.revparse(["--short", "HEAD"]), "");
    return result.trim() || null;
  }
}
