import { simpleGit, CheckRepoActions, CleanOptions, type SimpleGit, type SimpleGitOptions } from "simple-git";
import fs from "node:fs";
import path from "node:path";
import type { OnExisting } from "../types/config.js";

/** A dependency reference with its destination resolved to an absolute path. */
export type ResolvedDependency = {
  name: string;
  url: string;
  branch: string;
  revision?: string;
  depth: number;
  dest: string;
};

export type FetchAction = "cloned" | "refreshed" | "replaced";

export type FetchResult = {
  action: FetchAction;
  sha: string;
};

export type FetchOptions = {
  onExisting: OnExisting;
  signal?: AbortSignal;
};

/** Materializes a dependency checkout at its destination. */
export interface DependencyFetcher {
  fetch(dep: ResolvedDependency, opts: FetchOptions): Promise<FetchResult>;
}

export type GitFactory = (options: Partial<SimpleGitOptions>) => SimpleGit;

/**
 * Clones and refreshes dependency checkouts with simple-git.
 */
export class GitOperations implements DependencyFetcher {
  private readonly factory: GitFactory;

  constructor(factory?: GitFactory) {
    this.factory = factory ?? ((options) => simpleGit(options));
  }

  /**
   * Shallow-clone a dependency, or bring an existing destination up to date
   * according to `onExisting`.
   */
  async fetch(dep: ResolvedDependency, opts: FetchOptions): Promise<FetchResult> {
    if (fs.existsSync(dep.dest)) {
      if (opts.onExisting === "fail") {
        throw new Error(`Destination already exists: ${dep.dest}`);
      }
      if (opts.onExisting === "refresh" && (await this.isCheckoutOf(dep))) {
        const sha = await this.refresh(dep, opts.signal);
        return { action: "refreshed", sha };
      }
      fs.rmSync(dep.dest, { recursive: true, force: true });
      const sha = await this.clone(dep, opts.signal);
      return { action: "replaced", sha };
    }

    fs.mkdirSync(path.dirname(dep.dest), { recursive: true });
    const sha = await this.clone(dep, opts.signal);
    return { action: "cloned", sha };
  }

  /** True when `dep.dest` is the root of a checkout whose origin is `dep.url`. */
  async isCheckoutOf(dep: ResolvedDependency): Promise<boolean> {
    const git = this.factory({ baseDir: dep.dest });
    if (!(await git.checkIsRepo(CheckRepoActions.IS_REPO_ROOT))) return false;
    const remotes = await git.getRemotes(true);
    const origin = remotes.find((r) => r.name === "origin");
    return origin?.refs.fetch === dep.url;
  }

  /** Get HEAD SHA of a checkout. */
  async getCurrentSha(repoPath: string): Promise<string> {
    const result = await this.factory({ baseDir: repoPath }).revparse(["HEAD"]);
    return result.trim();
  }

  /** Whether the checkout holds truncated history. */
  async isShallow(repoPath: string): Promise<boolean> {
    const result = await this.factory({ baseDir: repoPath }).revparse(["--is-shallow-repository"]);
    return result.trim() === "true";
  }

  private async clone(dep: ResolvedDependency, abort?: AbortSignal): Promise<string> {
    await this.factory({ abort }).clone(dep.url, dep.dest, ["--depth", String(dep.depth), "--branch", dep.branch]);
    if (dep.revision) {
      const git = this.factory({ baseDir: dep.dest, abort });
      await git.fetch("origin", dep.revision, ["--depth", String(dep.depth)]);
      await git.checkout(["--detach", "FETCH_HEAD"]);
    }
    return this.getCurrentSha(dep.dest);
  }

  private async refresh(dep: ResolvedDependency, abort?: AbortSignal): Promise<string> {
    const git = this.factory({ baseDir: dep.dest, abort });
    await git.fetch("origin", dep.revision ?? dep.branch, ["--depth", String(dep.depth)]);
    if (dep.revision) {
      await git.checkout(["--force", "--detach", "FETCH_HEAD"]);
    } else {
      await git.checkout(["--force", "-B", dep.branch, "FETCH_HEAD"]);
    }
    await git.clean(CleanOptions.FORCE + CleanOptions.RECURSIVE);
    return this.getCurrentSha(dep.dest);
  }
}
