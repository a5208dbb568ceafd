import os from "node:os";
import path from "node:path";
import type { BootstrapConfig, CommandLine } from "../types/config.js";
import type { Environment } from "../types/diagnostic.js";
import { type StepName, getEffectiveSteps } from "../core/state-machine.js";
import { templateVars } from "../core/template.js";
import { displaySocketPath, parseDisplayIdentifier } from "../display/display-id.js";
import {
  cloneCommand,
  coverageCommand,
  displayCommand,
  guiBindingCommands,
  requirementsCommand,
  requirementsManifest,
  resolveDependencies,
  testCommand,
} from "../core/commands.js";

export type PlanEntry = {
  step: StepName;
  commands: CommandLine[];
  /** Variables the step exports to later steps. */
  env: Record<string, string>;
  note?: string;
};

export type Plan = {
  external_repos_root: string;
  steps: PlanEntry[];
};

/**
 * Describe what a run would do, with every command line resolved. Executes nothing.
 */
export function buildPlan(config: BootstrapConfig, opts: { env: Environment; cwd: string; runId?: string }): Plan {
  const root = path.resolve(opts.cwd, config.external_repos_root);
  const vars = templateVars(config, opts.env, {
    externalReposRoot: root,
    runId: opts.runId ?? "<run-id>",
    home: opts.env.HOME ?? os.homedir(),
  });

  const entries = getEffectiveSteps(config.skip_steps).map((step): PlanEntry => {
    switch (step) {
      case "resolve_dependencies":
        return {
          step,
          commands: resolveDependencies(config, root, vars).map(cloneCommand),
          env: { [config.external_repos_env]: root },
          note: `existing checkouts: ${config.on_existing}`,
        };
      case "install_requirements": {
        const manifest = requirementsManifest(config, root, vars);
        return manifest === null
          ? { step, commands: [], env: {}, note: "no requirements configured" }
          : { step, commands: [requirementsCommand(config, manifest, vars)], env: {} };
      }
      case "install_gui_binding": {
        const commands = guiBindingCommands(config, vars);
        return commands.length === 0 ? { step, commands, env: {}, note: "no GUI binding configured" } : { step, commands, env: {} };
      }
      case "start_display": {
        const id = parseDisplayIdentifier(config.display.identifier);
        const socket = id ? displaySocketPath(config.display.socket_dir, id.display) : "?";
        const { readiness } = config.display;
        const wait =
          readiness.strategy === "poll"
            ? `poll ${socket} for up to ${readiness.timeout_ms}ms`
            : `sleep ${readiness.delay_ms}ms, then probe ${socket} once`;
        return {
          step,
          commands: [displayCommand(config, vars)],
          env: { DISPLAY: config.display.identifier },
          note: `${config.display.mode}; ${wait}`,
        };
      }
      case "configure_offscreen":
        return { step, commands: [], env: { [config.offscreen.variable]: config.offscreen.value } };
      case "run_tests":
        return { step, commands: [testCommand(config, vars)], env: {}, note: `cwd ${path.resolve(opts.cwd, config.tests.cwd)}` };
      case "report_coverage": {
        const argv = coverageCommand(config, vars);
        return argv
          ? { step, commands: [argv], env: {}, note: "only after tests exit 0" }
          : { step, commands: [], env: {}, note: "no coverage reporting configured" };
      }
    }
  });

  return { external_repos_root: root, steps: entries };
}
