import os from "node:os";
import path from "node:path";
import type { BootstrapConfig } from "../types/config.js";
import type { Diagnostic, Environment } from "../types/diagnostic.js";
import type { RunState } from "../types/state.js";
import type { CommandRunner } from "../process/runner.js";
import type { DependencyFetcher } from "../git/operations.js";
import { socketProbe, type DisplayProbe } from "../display/readiness.js";
import { type BootstrapStatus, type StepName, getEffectiveSteps, isStepName, isTerminal, nextState } from "./state-machine.js";
import { TIMEOUT_EXIT, toBootstrapError, type FailureKind } from "./errors.js";
import { templateVars } from "./template.js";
import { makeRunId, statePathForRun, saveState } from "./run-state.js";
import { STEP_HANDLERS } from "./steps/index.js";
import type { StepContext } from "./steps/context.js";

export type OrchestratorDeps = {
  runner: CommandRunner;
  fetcher: DependencyFetcher;
  probeFor?: (socketPath: string) => DisplayProbe;
  onEvent?: (d: Diagnostic) => void;
  /** Directory relative config paths resolve against. Defaults to process.cwd(). */
  cwd?: string;
};

export type BootstrapResult = {
  success: boolean;
  exitCode: number;
  runId: string;
  statePath: string;
  final_status: BootstrapStatus;
  step_results: RunState["step_results"];
  environment: Record<string, string>;
  failure?: { step: StepName; kind: FailureKind; message: string };
};

/**
 * Drives the bootstrap sequence through the state machine.
 *
 * Main loop: execute step → persist → advance. The first failure is terminal;
 * the run's exit code is the failing command's, or the test runner's.
 */
export class Orchestrator {
  private readonly config: BootstrapConfig;
  private readonly deps: OrchestratorDeps;

  constructor(config: BootstrapConfig, deps: OrchestratorDeps) {
    this.config = config;
    this.deps = deps;
  }

  async run(opts: { runId?: string; baseEnv: Environment }): Promise<BootstrapResult> {
    const cwd = this.deps.cwd ?? process.cwd();
    const runId = opts.runId ?? makeRunId();
    const statePath = statePathForRun(path.resolve(cwd, this.config.runs_dir), runId);
    const externalReposRoot = path.resolve(cwd, this.config.external_repos_root);
    const steps = getEffectiveSteps(this.config.skip_steps);
    const emit = this.deps.onEvent ?? (() => undefined);

    const env: Environment = { ...opts.baseEnv, [this.config.external_repos_env]: externalReposRoot };
    const ctx: StepContext = {
      config: this.config,
      runId,
      cwd,
      externalReposRoot,
      vars: templateVars(this.config, env, { externalReposRoot, runId, home: env.HOME ?? os.homedir() }),
      env,
      exported: { [this.config.external_repos_env]: externalReposRoot },
      runner: this.deps.runner,
      fetcher: this.deps.fetcher,
      probeFor: this.deps.probeFor ?? socketProbe,
      emit,
      resources: {},
    };

    const now = new Date().toISOString();
    const state: RunState = {
      run_id: runId,
      current_step: steps[0] ?? "done",
      started_at: now,
      updated_at: now,
      external_repos_root: externalReposRoot,
      environment: ctx.exported,
      step_results: {},
      exit_code: null,
      error: null,
    };
    saveState(statePath, state);

    let exitCode = 0;
    let failure: BootstrapResult["failure"];

    try {
      while (!isTerminal(state.current_step)) {
        const step = state.current_step;
        if (!isStepName(step)) break;

        const timeoutMs = this.config.timeouts[step];
        ctx.signal = timeoutMs ? AbortSignal.timeout(timeoutMs) : undefined;
        emit({ level: "info", code: "STEP_STARTED", message: `${step} started`, step });
        const stepStart = Date.now();

        try {
          const outcome = await STEP_HANDLERS[step](ctx);
          const duration_ms = Date.now() - stepStart;
          state.step_results[step] = { status: outcome.status, duration_ms, outputs: outcome.outputs };
          state.current_step = nextState(step, "success", steps);
          emit({
            level: "info",
            code: outcome.status === "skipped" ? "STEP_SKIPPED" : "STEP_OK",
            message: `${step} ${outcome.status} (${duration_ms}ms)`,
            step,
          });
        } catch (e) {
          const duration_ms = Date.now() - stepStart;
          const err = toBootstrapError(step, e);
          const timedOut = ctx.signal?.aborted === true;
          const message = timedOut ? `${step} timed out after ${timeoutMs}ms: ${err.message}` : err.message;

          state.step_results[step] = {
            status: timedOut ? "timeout" : "failed",
            duration_ms,
            error: message,
            kind: err.kind,
          };
          state.current_step = nextState(step, timedOut ? "timeout" : "failure", steps);
          state.error = message;
          exitCode = timedOut ? TIMEOUT_EXIT : err.exitCode;
          failure = { step, kind: err.kind, message };
          emit({ level: "error", code: "STEP_FAILED", message, step, details: { kind: err.kind, exit_code: exitCode } });
        }

        ctx.signal = undefined;
        state.updated_at = new Date().toISOString();
        saveState(statePath, state);
      }
    } finally {
      await this.teardown(ctx);
      state.exit_code = exitCode;
      state.updated_at = new Date().toISOString();
      saveState(statePath, state);
    }

    return {
      success: state.current_step === "done",
      exitCode,
      runId,
      statePath,
      final_status: state.current_step,
      step_results: state.step_results,
      environment: { ...ctx.exported },
      failure,
    };
  }

  /** Stop a display server this run started. Cloned repositories stay in place. */
  private async teardown(ctx: StepContext): Promise<void> {
    const handle = ctx.resources.display;
    if (!handle || this.config.display.keep_running) return;

    const res = await handle.stop();
    ctx.emit({
      level: "info",
      code: "DISPLAY_STOPPED",
      message: `Display server stopped (exit ${res.exitCode})`,
      step: "start_display",
    });
  }
}
