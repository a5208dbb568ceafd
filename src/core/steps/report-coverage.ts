import { BootstrapError } from "../errors.js";
import { coverageCommand } from "../commands.js";
import { runChecked, type StepContext, type StepOutcome } from "./context.js";

/**
 * Reporting step: upload collected coverage. Only reached after the test
 * runner exited 0.
 */
export async function reportCoverageStep(ctx: StepContext): Promise<StepOutcome> {
  const argv = coverageCommand(ctx.config, ctx.vars);
  if (!argv || !ctx.config.coverage) return { status: "skipped" };

  try {
    await runChecked(ctx, argv, "reporting", "coverage report");
  } catch (e) {
    if (ctx.config.coverage.required || !(e instanceof BootstrapError)) throw e;
    ctx.emit({ level: "warn", code: "COVERAGE_REPORT_FAILED", message: e.message, step: "report_coverage" });
    return { status: "ok", outputs: { reported: false, exit_code: e.exitCode } };
  }
  return { status: "ok", outputs: { reported: true } };
}
