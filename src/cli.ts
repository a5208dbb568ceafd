#!/usr/bin/env node

import path from "node:path";
import { Command, InvalidArgumentError } from "commander";
import { runBootstrap } from "./commands/run.js";
import { validateAll } from "./commands/validate.js";
import { buildPlan } from "./commands/plan.js";
import { status, listRuns } from "./commands/status.js";
import { cleanDependencies } from "./commands/clean.js";
import { createReporter, isOutputFormat, type OutputFormat } from "./commands/output.js";
import { EXIT } from "./commands/exit-codes.js";
import { formatCommand } from "./process/runner.js";
import { ALL_STEPS, isStepName, type StepName } from "./core/state-machine.js";
import type { Diagnostic } from "./types/diagnostic.js";

const program = new Command();

function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) throw new InvalidArgumentError("Expected human or jsonl.");
  return value;
}

function collectStep(value: string, previous: StepName[]): StepName[] {
  if (!isStepName(value)) throw new InvalidArgumentError(`Expected one of: ${ALL_STEPS.join(", ")}.`);
  return [...previous, value];
}

function failWith(errors: Diagnostic[], format: OutputFormat, exitCode: number): never {
  const report = createReporter(format);
  for (const err of errors) report(err);
  process.exit(exitCode);
}

program
  .name("ci-bootstrap")
  .description("Bootstrap a headless GUI test environment and run a plugin's test suite")
  .version("0.1.0");

program
  .command("run")
  .description("Clone dependencies, install, start the display, run tests and report coverage")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Environment override layer (config/<name>.yaml)")
  .option("--run <id>", "Run id (default: generated)")
  .option("--external-repos-root <path>", "Root directory for dependency checkouts")
  .option("--skip <step>", "Skip a step (repeatable)", collectStep, [])
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(
    async (opts: {
      config?: string;
      env?: string;
      run?: string;
      externalReposRoot?: string;
      skip: StepName[];
      format: OutputFormat;
    }) => {
      const report = createReporter(opts.format);
      const res = await runBootstrap({
        configDir: opts.config,
        envName: opts.env,
        runId: opts.run,
        externalReposRoot: opts.externalReposRoot,
        skip: opts.skip,
        onEvent: report,
      });

      if (!res.ok) failWith(res.errors, opts.format, EXIT.INVALID_CONFIG);

      const { result } = res;
      if (opts.format === "jsonl") {
        process.stdout.write(
          JSON.stringify({
            level: result.success ? "info" : "error",
            code: result.success ? "OK" : "RUN_FAILED",
            runId: result.runId,
            status: result.final_status,
            exitCode: result.exitCode,
            statePath: result.statePath,
          }) + "\n",
        );
      } else if (result.success) {
        console.log(`Run ${result.runId}: ${result.final_status}`);
      } else {
        console.error(`Run ${result.runId}: ${result.final_status} (exit ${result.exitCode})`);
      }
      process.exit(result.exitCode);
    },
  );

program
  .command("validate")
  .description("Validate the layered config")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Environment override layer")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action((opts: { config?: string; env?: string; format: OutputFormat }) => {
    const res = validateAll({ configDir: opts.config, envName: opts.env });
    if (!res.ok) failWith(res.errors, opts.format, EXIT.INVALID_CONFIG);

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK" }) + "\n");
    } else {
      console.log("OK");
    }
  });

program
  .command("plan")
  .description("Print the steps and resolved commands a run would execute")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Environment override layer")
  .option("--external-repos-root <path>", "Root directory for dependency checkouts")
  .option("--skip <step>", "Skip a step (repeatable)", collectStep, [])
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(
    (opts: { config?: string; env?: string; externalReposRoot?: string; skip: StepName[]; format: OutputFormat }) => {
      const res = validateAll({ configDir: opts.config, envName: opts.env });
      if (!res.ok) failWith(res.errors, opts.format, EXIT.INVALID_CONFIG);

      const config = {
        ...res.config,
        external_repos_root: opts.externalReposRoot ?? res.config.external_repos_root,
        skip_steps: [...res.config.skip_steps, ...opts.skip],
      };
      const plan = buildPlan(config, { env: process.env, cwd: process.cwd() });

      if (opts.format === "jsonl") {
        for (const entry of plan.steps) process.stdout.write(JSON.stringify(entry) + "\n");
        return;
      }
      console.log(`External repos root: ${plan.external_repos_root}`);
      for (const entry of plan.steps) {
        console.log(`${entry.step}${entry.note ? `  (${entry.note})` : ""}`);
        for (const [name, value] of Object.entries(entry.env)) console.log(`  export ${name}=${value}`);
        for (const argv of entry.commands) console.log(`  $ ${formatCommand(argv)}`);
      }
    },
  );

program
  .command("status")
  .description("Show run status")
  .argument("[id]", "Run ID (omit to list all)")
  .option("--runs-dir <path>", "Runs directory", ".ci-bootstrap/runs")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action((id: string | undefined, opts: { runsDir: string; format: OutputFormat }) => {
    const runsDir = path.resolve(opts.runsDir);
    if (id) {
      const res = status({ runsDir, runId: id });
      if (!res.ok) {
        failWith([{ level: "error", code: "RUN_NOT_FOUND", message: res.error }], opts.format, EXIT.FAILURE);
      }
      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify(res.state) + "\n");
      } else {
        console.log(JSON.stringify(res.state, null, 2));
      }
      return;
    }

    const list = listRuns(runsDir);
    if (opts.format === "jsonl") {
      for (const item of list) process.stdout.write(JSON.stringify(item) + "\n");
    } else {
      if (list.length === 0) { console.log("No runs found."); return; }
      for (const item of list) console.log(`${item.id}  ${item.status}  exit=${item.exit_code ?? "-"}  ${item.updated_at}`);
    }
  });

program
  .command("clean")
  .description("Delete the configured dependency checkouts")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Environment override layer")
  .option("--external-repos-root <path>", "Root directory for dependency checkouts")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action((opts: { config?: string; env?: string; externalReposRoot?: string; format: OutputFormat }) => {
    const res = validateAll({ configDir: opts.config, envName: opts.env });
    if (!res.ok) failWith(res.errors, opts.format, EXIT.INVALID_CONFIG);

    const config = { ...res.config, external_repos_root: opts.externalReposRoot ?? res.config.external_repos_root };
    const cleaned = cleanDependencies(config, { env: process.env, cwd: process.cwd() });
    const report = createReporter(opts.format);
    for (const p of cleaned.removed) report({ level: "info", code: "REMOVED", message: `Removed ${p}`, path: p });
    for (const p of cleaned.missing) report({ level: "info", code: "NOT_PRESENT", message: `Not present: ${p}`, path: p });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.FAILURE);
});
