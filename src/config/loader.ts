import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import type { Environment } from "../types/diagnostic.js";
import { isRecord } from "../types/guards.js";

export const DEFAULT_CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

/** Prefix of environment variables that override config keys; `__` separates nested keys. */
export const ENV_PREFIX = "CI_BOOTSTRAP_";

/** Variable read for the external repositories root when the config names none. */
export const DEFAULT_EXTERNAL_REPOS_ENV = "EXTERNAL_REPOS_ROOT";

export type RawConfig = Record<string, unknown>;

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined || val === null) continue;
    const current = result[key];
    result[key] = isRecord(val) && isRecord(current) ? deepMerge(current, val) : val;
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): RawConfig {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = YAML.parse(raw);
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) throw new Error(`Config file must contain a mapping: ${filePath}`);
  return parsed;
}

function setPath(target: RawConfig, segments: string[], value: string): void {
  const [head, ...rest] = segments;
  if (!head) return;
  if (rest.length === 0) {
    target[head] = value;
    return;
  }
  const child = target[head];
  const next: RawConfig = isRecord(child) ? { ...child } : {};
  target[head] = next;
  setPath(next, rest, value);
}

/** Apply CI_BOOTSTRAP_ prefixed environment variable overrides. */
function applyEnvOverrides(config: RawConfig, env: Environment): RawConfig {
  const result: RawConfig = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // CI_BOOTSTRAP_DISPLAY__IDENTIFIER → display.identifier
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter((s) => s.length > 0);
    setPath(result, segments, value);
  }
  return result;
}

/** The root variable named by `external_repos_env` overrides `external_repos_root`. */
function applyExternalReposRoot(config: RawConfig, env: Environment): RawConfig {
  const name = typeof config.external_repos_env === "string" ? config.external_repos_env : DEFAULT_EXTERNAL_REPOS_ENV;
  const value = env[name];
  return value ? { ...config, external_repos_root: value } : config;
}

export type LoadConfigOptions = {
  /** Environment name; loads `{configDir}/{envName}.yaml` as override layer. */
  envName?: string;
  configDir?: string;
  env?: Environment;
};

/**
 * Load layered config: base.yaml ← {env}.yaml ← root variable ← CI_BOOTSTRAP_* variables.
 * The result is unvalidated; pass it through validateConfig.
 */
export function loadConfig(opts: LoadConfigOptions = {}): RawConfig {
  const dir = opts.configDir ?? DEFAULT_CONFIG_DIR;
  const env = opts.env ?? process.env;

  // Layer 1: base.yaml
  let merged = loadYaml(path.join(dir, "base.yaml"));

  // Layer 2: environment-specific override
  if (opts.envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${opts.envName}.yaml`)));
  }

  // Layer 3: environment variables
  merged = applyExternalReposRoot(merged, env);
  return applyEnvOverrides(merged, env);
}
