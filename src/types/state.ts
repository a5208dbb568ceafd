/** Run state, persisted to {runs_dir}/{run_id}/state.json after every transition. */
import type { BootstrapStatus, StepName } from "../core/state-machine.js";
import type { FailureKind } from "../core/errors.js";

export type StepStatus = "ok" | "skipped" | "failed" | "timeout";

export type StepRecord = {
  status: StepStatus;
  duration_ms: number;
  error?: string;
  kind?: FailureKind;
  outputs?: Record<string, unknown>;
};

export type RunState = {
  run_id: string;
  current_step: BootstrapStatus;
  started_at: string;
  updated_at: string;
  external_repos_root: string;
  /** Variables this run exported to its child processes. */
  environment: Record<string, string>;
  step_results: Partial<Record<StepName, StepRecord>>;
  exit_code: number | null;
  error: string | null;
};
