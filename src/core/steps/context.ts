import type { BootstrapConfig, CommandLine } from "../../types/config.js";
import type { Diagnostic, Environment } from "../../types/diagnostic.js";
import type { CommandRunner, ProcessHandle } from "../../process/runner.js";
import { formatCommand } from "../../process/runner.js";
import type { DependencyFetcher } from "../../git/operations.js";
import type { DisplayProbe } from "../../display/readiness.js";
import type { TemplateVars } from "../template.js";
import { BootstrapError, type FailureKind } from "../errors.js";

export type StepContext = {
  config: BootstrapConfig;
  runId: string;
  cwd: string;
  externalReposRoot: string;
  vars: TemplateVars;
  /** Environment handed to every child process. Steps extend it through setEnv. */
  env: Environment;
  /** Variables set by this run so far. */
  exported: Record<string, string>;
  runner: CommandRunner;
  fetcher: DependencyFetcher;
  probeFor: (socketPath: string) => DisplayProbe;
  /** Aborts the current step when its timeout elapses. */
  signal?: AbortSignal;
  emit: (d: Diagnostic) => void;
  resources: { display?: ProcessHandle };
};

export type StepOutcome = {
  status: "ok" | "skipped";
  outputs?: Record<string, unknown>;
};

export type StepHandler = (ctx: StepContext) => Promise<StepOutcome>;

export function setEnv(ctx: StepContext, name: string, value: string): void {
  ctx.env[name] = value;
  ctx.exported[name] = value;
}

/**
 * Run a command and throw a labeled BootstrapError carrying its exit code
 * when it does not exit 0.
 */
export async function runChecked(
  ctx: StepContext,
  argv: CommandLine,
  kind: FailureKind,
  label: string,
  cwd: string = ctx.cwd,
): Promise<void> {
  const res = await ctx.runner.run(argv, { cwd, env: ctx.env, signal: ctx.signal });
  if (res.exitCode === 0) return;

  const detail = res.timedOut
    ? "timed out"
    : res.error
      ? `could not be started (${res.error})`
      : `exited with ${res.exitCode}`;
  throw new BootstrapError(kind, `${label} failed: ${formatCommand(argv)} ${detail}`, res.exitCode);
}
