import path from "node:path";
import type { BootstrapConfig, CommandLine, DependencyConfig } from "../types/config.js";
import type { ResolvedDependency } from "../git/operations.js";
import { expand, expandCommand, type TemplateVars } from "./template.js";

/** True when `target` lies below `root`; the root itself does not count. */
export function isInsideRoot(root: string, target: string): boolean {
  const rel = path.relative(path.resolve(root), path.resolve(target));
  return rel !== "" && !path.isAbsolute(rel) && rel.split(path.sep)[0] !== "..";
}

/**
 * Destination of a dependency: `path` (relative to the root) or `<root>/<name>`.
 * Destinations are deleted on replace and clean, so they must lie inside the root.
 */
export function resolveDependency(dep: DependencyConfig, externalReposRoot: string, vars: TemplateVars): ResolvedDependency {
  const dest = path.resolve(externalReposRoot, dep.path === undefined ? dep.name : expand(dep.path, vars));
  if (!isInsideRoot(externalReposRoot, dest)) {
    throw new Error(`Destination of ${dep.name} is not inside the external repos root ${externalReposRoot}: ${dest}`);
  }
  return {
    name: dep.name,
    url: expand(dep.url, vars),
    branch: dep.branch,
    revision: dep.revision,
    depth: dep.depth,
    dest,
  };
}

export function resolveDependencies(config: BootstrapConfig, externalReposRoot: string, vars: TemplateVars): ResolvedDependency[] {
  return config.dependencies.map((dep) => resolveDependency(dep, externalReposRoot, vars));
}

/** The git invocation a clone amounts to; used for plans and logs. */
export function cloneCommand(dep: ResolvedDependency): CommandLine {
  return ["git", "clone", "--depth", String(dep.depth), "--branch", dep.branch, dep.url, dep.dest];
}

export function requirementsManifest(config: BootstrapConfig, externalReposRoot: string, vars: TemplateVars): string | null {
  const req = config.requirements;
  if (!req) return null;
  const source = config.dependencies.find((d) => d.name === req.from);
  if (!source) throw new Error(`requirements.from names unknown dependency "${req.from}"`);
  return path.join(resolveDependency(source, externalReposRoot, vars).dest, expand(req.file, vars));
}

export function requirementsCommand(config: BootstrapConfig, manifest: string, vars: TemplateVars): CommandLine {
  const req = config.requirements;
  if (!req) throw new Error("No requirements configured");
  return [...expandCommand(req.install, vars), manifest];
}

/** Commands for the GUI binding, in order: system packages, binary install, post-install. */
export function guiBindingCommands(config: BootstrapConfig, vars: TemplateVars): CommandLine[] {
  const gui = config.gui_binding;
  if (!gui) return [];
  const commands: CommandLine[] = [];
  if (gui.system_packages.length > 0) {
    commands.push([...expandCommand(gui.system_install, vars), ...gui.system_packages]);
  }
  commands.push([...expandCommand(gui.install, vars), expand(gui.index_url, vars), gui.package]);
  if (gui.post_install && gui.post_install.length > 0) {
    commands.push(expandCommand(gui.post_install, vars));
  }
  return commands;
}

export function displayCommand(config: BootstrapConfig, vars: TemplateVars): CommandLine {
  return expandCommand(config.display.server, vars);
}

export function testCommand(config: BootstrapConfig, vars: TemplateVars): CommandLine {
  const argv = expandCommand(config.tests.command, vars);
  return config.tests.coverage_flag ? [...argv, config.tests.coverage_flag] : argv;
}

export function coverageCommand(config: BootstrapConfig, vars: TemplateVars): CommandLine | null {
  return config.coverage ? expandCommand(config.coverage.command, vars) : null;
}
