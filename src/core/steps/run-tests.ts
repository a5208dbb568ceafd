import fs from "node:fs";
import path from "node:path";
import { parseCoberturaFile, type CoverageSummary } from "../../adapter/cobertura.js";
import { testCommand } from "../commands.js";
import { runChecked, type StepContext, type StepOutcome } from "./context.js";

/**
 * Test step: run the test runner with coverage instrumentation. A non-zero
 * exit becomes the run's exit code.
 */
export async function runTestsStep(ctx: StepContext): Promise<StepOutcome> {
  const { tests } = ctx.config;
  const cwd = path.resolve(ctx.cwd, tests.cwd);
  const argv = testCommand(ctx.config, ctx.vars);

  await runChecked(ctx, argv, "test_execution", "test runner", cwd);

  const coverage = tests.report_file ? readCoverage(ctx, path.resolve(cwd, tests.report_file)) : null;
  return { status: "ok", outputs: coverage ? { coverage } : undefined };
}

function readCoverage(ctx: StepContext, reportPath: string): CoverageSummary | null {
  if (!fs.existsSync(reportPath)) {
    ctx.emit({
      level: "warn",
      code: "COVERAGE_REPORT_MISSING",
      message: `Coverage report not found: ${reportPath}`,
      step: "run_tests",
      path: reportPath,
    });
    return null;
  }

  try {
    const summary = parseCoberturaFile(reportPath);
    ctx.emit({
      level: "info",
      code: "COVERAGE_SUMMARY",
      message: `Line coverage ${summary.percent}%`,
      step: "run_tests",
      path: reportPath,
      details: summary,
    });
    return summary;
  } catch (e) {
    ctx.emit({
      level: "warn",
      code: "COVERAGE_REPORT_INVALID",
      message: `Could not read coverage report ${reportPath}: ${e instanceof Error ? e.message : String(e)}`,
      step: "run_tests",
      path: reportPath,
    });
    return null;
  }
}
