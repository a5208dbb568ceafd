import { NodeCommandRunner, type CommandRunner } from "../process/runner.js";
import { GitOperations, type DependencyFetcher } from "../git/operations.js";
import type { DisplayProbe } from "../display/readiness.js";
import { Orchestrator, type BootstrapResult } from "../core/orchestrator.js";
import type { StepName } from "../core/state-machine.js";
import type { Diagnostic, Environment } from "../types/diagnostic.js";
import { validateAll } from "./validate.js";

export type RunOpts = {
  configDir?: string;
  envName?: string;
  runId?: string;
  /** Overrides every configured or environment-provided root. */
  externalReposRoot?: string;
  skip?: StepName[];
  env?: Environment;
  cwd?: string;
  onEvent?: (d: Diagnostic) => void;
  runner?: CommandRunner;
  fetcher?: DependencyFetcher;
  probeFor?: (socketPath: string) => DisplayProbe;
};

export type RunResult = { ok: true; result: BootstrapResult } | { ok: false; errors: Diagnostic[] };

/**
 * Run the bootstrap sequence. `ok: false` means the config never validated and
 * no step ran; otherwise `result.exitCode` is the code the process should exit with.
 */
export async function runBootstrap(opts: RunOpts): Promise<RunResult> {
  const env = opts.env ?? process.env;
  const validated = validateAll({ configDir: opts.configDir, envName: opts.envName, env });
  if (!validated.ok) return validated;

  const config = { ...validated.config };
  if (opts.externalReposRoot) config.external_repos_root = opts.externalReposRoot;
  if (opts.skip && opts.skip.length > 0) config.skip_steps = [...new Set([...config.skip_steps, ...opts.skip])];

  const orchestrator = new Orchestrator(config, {
    runner: opts.runner ?? new NodeCommandRunner(),
    fetcher: opts.fetcher ?? new GitOperations(),
    probeFor: opts.probeFor,
    onEvent: opts.onEvent,
    cwd: opts.cwd,
  });

  const result = await orchestrator.run({ runId: opts.runId, baseEnv: env });
  return { ok: true, result };
}
