import fs from "node:fs";
import { BootstrapError } from "../errors.js";
import { resolveDependencies } from "../commands.js";
import type { FetchAction, FetchResult } from "../../git/operations.js";
import type { StepContext, StepOutcome } from "./context.js";

function ensureWritableRoot(root: string): void {
  try {
    fs.mkdirSync(root, { recursive: true });
    fs.accessSync(root, fs.constants.W_OK);
  } catch (e) {
    throw new BootstrapError(
      "dependency_resolution",
      `External repositories root is not writable: ${root}`,
      undefined,
      { cause: e },
    );
  }
}

/**
 * Resolve step: shallow-clone every dependency into the external repos root.
 * The first failure aborts the remaining clones; nothing is retried or rolled back.
 */
export async function resolveDependenciesStep(ctx: StepContext): Promise<StepOutcome> {
  ensureWritableRoot(ctx.externalReposRoot);

  const resolved: Record<string, { dest: string; sha: string; action: FetchAction }> = {};
  for (const dep of resolveDependencies(ctx.config, ctx.externalReposRoot, ctx.vars)) {
    const ref = dep.revision ?? dep.branch;
    let result: FetchResult;
    try {
      result = await ctx.fetcher.fetch(dep, { onExisting: ctx.config.on_existing, signal: ctx.signal });
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      throw new BootstrapError(
        "dependency_resolution",
        `Failed to resolve ${dep.name} (${dep.url}@${ref}): ${message}`,
        undefined,
        { cause: e },
      );
    }

    resolved[dep.name] = { dest: dep.dest, sha: result.sha, action: result.action };
    ctx.emit({
      level: "info",
      code: `DEPENDENCY_${result.action.toUpperCase()}`,
      message: `${dep.name}@${ref} ${result.action} into ${dep.dest} (${result.sha.slice(0, 7)})`,
      step: "resolve_dependencies",
      path: dep.dest,
    });
  }

  return { status: "ok", outputs: { dependencies: resolved } };
}
