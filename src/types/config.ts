/** Layered bootstrap config (base.yaml ← env.yaml ← environment). */
import type { StepName } from "../core/state-machine.js";

/** An argv array; the first element is the program. Never run through a shell. */
export type CommandLine = string[];

export type OnExisting = "refresh" | "replace" | "fail";

export type DependencyConfig = {
  name: string;
  url: string;
  branch: string;
  /** Commit to pin the checkout to. Without it the branch tip is used. */
  revision?: string;
  /** Destination; relative paths resolve against external_repos_root. */
  path?: string;
  depth: number;
};

export type RequirementsConfig = {
  /** Name of the dependency whose checkout holds the manifest. */
  from: string;
  file: string;
  install: CommandLine;
};

export type GuiBindingConfig = {
  package: string;
  index_url: string;
  install: CommandLine;
  post_install?: CommandLine;
  system_packages: string[];
  system_install: CommandLine;
};

export type ReadinessStrategy = "poll" | "fixed-delay";

export type ReadinessConfig = {
  strategy: ReadinessStrategy;
  timeout_ms: number;
  interval_ms: number;
  max_interval_ms: number;
  delay_ms: number;
};

export type DisplayMode = "spawn" | "service";

export type DisplayConfig = {
  identifier: string;
  server: CommandLine;
  mode: DisplayMode;
  socket_dir: string;
  keep_running: boolean;
  readiness: ReadinessConfig;
};

export type OffscreenConfig = {
  variable: string;
  value: string;
};

export type TestsConfig = {
  command: CommandLine;
  coverage_flag: string;
  cwd: string;
  report_file?: string;
};

export type CoverageConfig = {
  command: CommandLine;
  required: boolean;
};

export type InterpreterConfig = {
  version: string;
  /** Environment variable that overrides `version` when set. */
  version_env?: string;
};

export type BootstrapConfig = {
  schema_version: string;
  external_repos_root: string;
  external_repos_env: string;
  runs_dir: string;
  on_existing: OnExisting;
  interpreter: InterpreterConfig;
  dependencies: DependencyConfig[];
  requirements?: RequirementsConfig;
  gui_binding?: GuiBindingConfig;
  display: DisplayConfig;
  offscreen: OffscreenConfig;
  tests: TestsConfig;
  coverage?: CoverageConfig;
  skip_steps: StepName[];
  timeouts: Partial<Record<StepName, number>>;
};
