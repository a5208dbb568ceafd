import type { StepName } from "../state-machine.js";
import type { StepHandler } from "./context.js";
import { resolveDependenciesStep } from "./resolve-dependencies.js";
import { installRequirementsStep } from "./install-requirements.js";
import { installGuiBindingStep } from "./install-gui-binding.js";
import { startDisplayStep } from "./start-display.js";
import { configureOffscreenStep } from "./configure-offscreen.js";
import { runTestsStep } from "./run-tests.js";
import { reportCoverageStep } from "./report-coverage.js";

export const STEP_HANDLERS: Record<StepName, StepHandler> = {
  resolve_dependencies: resolveDependenciesStep,
  install_requirements: installRequirementsStep,
  install_gui_binding: installGuiBindingStep,
  start_display: startDisplayStep,
  configure_offscreen: configureOffscreenStep,
  run_tests: runTestsStep,
  report_coverage: reportCoverageStep,
};
