import type { StepName } from "./state-machine.js";

export type FailureKind =
  | "dependency_resolution"
  | "installation"
  | "display_environment"
  | "test_execution"
  | "reporting";

/** Failure kind attributed to errors raised while a step runs. */
export const STEP_FAILURE_KIND: Record<StepName, FailureKind> = {
  resolve_dependencies: "dependency_resolution",
  install_requirements: "installation",
  install_gui_binding: "installation",
  start_display: "display_environment",
  configure_offscreen: "display_environment",
  run_tests: "test_execution",
  report_coverage: "reporting",
};

/** Exit code for failures that carry no command exit code of their own. */
export const GENERIC_FAILURE_EXIT = 1;

/** Exit code for a step aborted by its configured timeout. */
export const TIMEOUT_EXIT = 124;

/**
 * A labeled step failure. `exitCode` is never 0: it is the failing command's
 * exit code when there is one, GENERIC_FAILURE_EXIT otherwise.
 */
export class BootstrapError extends Error {
  readonly kind: FailureKind;
  readonly exitCode: number;

  constructor(kind: FailureKind, message: string, exitCode: number = GENERIC_FAILURE_EXIT, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BootstrapError";
    this.kind = kind;
    this.exitCode = exitCode === 0 ? GENERIC_FAILURE_EXIT : exitCode;
  }
}

export function toBootstrapError(step: StepName, e: unknown): BootstrapError {
  if (e instanceof BootstrapError) return e;
  const message = e instanceof Error ? e.message : String(e);
  return new BootstrapError(STEP_FAILURE_KIND[step], `${step} failed: ${message}`, GENERIC_FAILURE_EXIT, { cause: e });
}
