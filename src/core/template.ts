import path from "node:path";
import type { BootstrapConfig, CommandLine } from "../types/config.js";
import type { Environment } from "../types/diagnostic.js";

export type TemplateVars = Record<string, string>;

const PLACEHOLDER = /\$\{([a-z_]+)\}/g;

/** Interpreter version: `version_env` from the environment wins over the configured value. */
export function interpreterVersion(config: BootstrapConfig, env: Environment): string {
  const name = config.interpreter.version_env;
  const fromEnv = name ? env[name] : undefined;
  return fromEnv && fromEnv.length > 0 ? fromEnv : config.interpreter.version;
}

export function templateVars(
  config: BootstrapConfig,
  env: Environment,
  extra: { externalReposRoot: string; runId: string; home: string },
): TemplateVars {
  return {
    home: extra.home,
    external_repos_root: extra.externalReposRoot,
    interpreter_version: interpreterVersion(config, env),
    display: config.display.identifier,
    run_id: extra.runId,
  };
}

/**
 * Expand `${name}` placeholders and a leading `~/`.
 * Unknown placeholders are an error, never left in place.
 */
export function expand(value: string, vars: TemplateVars): string {
  const home = vars.home;
  let withHome = value;
  if (home && value === "~") withHome = home;
  else if (home && value.startsWith("~/")) withHome = path.join(home, value.slice(2));

  return withHome.replace(PLACEHOLDER, (match, name: string) => {
    const resolved = vars[name];
    if (resolved === undefined) throw new Error(`Unknown placeholder ${match} in "${value}"`);
    return resolved;
  });
}

export function expandCommand(argv: CommandLine, vars: TemplateVars): CommandLine {
  return argv.map((arg) => expand(arg, vars));
}
