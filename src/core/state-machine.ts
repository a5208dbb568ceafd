/**
 * All bootstrap steps in execution order.
 */
export const ALL_STEPS = [
  "resolve_dependencies",
  "install_requirements",
  "install_gui_binding",
  "start_display",
  "configure_offscreen",
  "run_tests",
  "report_coverage",
] as const;

export type StepName = (typeof ALL_STEPS)[number];

/**
 * Terminal and error states.
 */
export type BootstrapStatus = StepName | "done" | `failed_${StepName}` | `timeout_${StepName}`;

/**
 * Events that drive state transitions.
 */
export type TransitionEvent = "success" | "failure" | "timeout";

/** Steps that may never be listed in skip_steps. */
export const REQUIRED_STEPS: readonly StepName[] = ["run_tests"];

export function isStepName(value: string): value is StepName {
  return ALL_STEPS.some((s) => s === value);
}

/**
 * Determine the effective step list, applying skip rules.
 */
export function getEffectiveSteps(skip: readonly string[] = []): StepName[] {
  const required = new Set<string>(REQUIRED_STEPS);
  const toSkip = new Set(skip.filter((s) => !required.has(s)));
  return ALL_STEPS.filter((s) => !toSkip.has(s));
}

/**
 * Pure function: given current step + event, return next state.
 */
export function nextState(current: StepName, event: TransitionEvent, steps: readonly StepName[]): BootstrapStatus {
  if (event === "failure") return `failed_${current}`;
  if (event === "timeout") return `timeout_${current}`;

  const idx = steps.indexOf(current);
  if (idx === -1) return `failed_${current}`;
  if (idx >= steps.length - 1) return "done";
  return steps[idx + 1];
}

export function isTerminal(status: BootstrapStatus): boolean {
  return status === "done" || status.startsWith("failed_") || status.startsWith("timeout_");
}
