import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { BootstrapConfig } from "../types/config.js";
import type { Environment } from "../types/diagnostic.js";
import { resolveDependencies } from "../core/commands.js";
import { templateVars } from "../core/template.js";

export type CleanResult = {
  removed: string[];
  missing: string[];
};

/**
 * Delete the checkouts of every configured dependency. The external repos root
 * itself is never removed; resolveDependency rejects destinations outside it.
 */
export function cleanDependencies(config: BootstrapConfig, opts: { env: Environment; cwd: string }): CleanResult {
  const root = path.resolve(opts.cwd, config.external_repos_root);
  const vars = templateVars(config, opts.env, { externalReposRoot: root, runId: "clean", home: opts.env.HOME ?? os.homedir() });
  const result: CleanResult = { removed: [], missing: [] };

  for (const dep of resolveDependencies(config, root, vars)) {
    if (!fs.existsSync(dep.dest)) {
      result.missing.push(dep.dest);
      continue;
    }
    fs.rmSync(dep.dest, { recursive: true, force: true });
    result.removed.push(dep.dest);
  }

  return result;
}
