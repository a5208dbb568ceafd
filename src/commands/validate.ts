import fs from "node:fs";
import path from "node:path";
import { DEFAULT_CONFIG_DIR, loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import type { BootstrapConfig } from "../types/config.js";
import type { Diagnostic, Environment } from "../types/diagnostic.js";
import { errorMessage } from "../types/guards.js";

export type ValidateOpts = {
  configDir?: string;
  envName?: string;
  env?: Environment;
};

export type ValidateResult = { ok: true; config: BootstrapConfig } | { ok: false; errors: Diagnostic[] };

/**
 * Load and validate the layered config. Every command that needs a config goes through here.
 */
export function validateAll(opts: ValidateOpts): ValidateResult {
  const configDir = path.resolve(opts.configDir ?? DEFAULT_CONFIG_DIR);

  if (!fs.existsSync(configDir) || !fs.statSync(configDir).isDirectory()) {
    return {
      ok: false,
      errors: [{ level: "error", code: "CONFIG_DIR_MISSING", message: `Config directory not found: ${configDir}`, path: configDir }],
    };
  }
  if (opts.envName && !fs.existsSync(path.join(configDir, `${opts.envName}.yaml`))) {
    const envPath = path.join(configDir, `${opts.envName}.yaml`);
    return {
      ok: false,
      errors: [{ level: "error", code: "CONFIG_ENV_MISSING", message: `Environment config not found: ${envPath}`, path: envPath }],
    };
  }

  let raw: Record<string, unknown>;
  try {
    raw = loadConfig({ configDir, envName: opts.envName, env: opts.env });
  } catch (e) {
    return { ok: false, errors: [{ level: "error", code: "CONFIG_READ_FAILED", message: errorMessage(e), path: configDir }] };
  }

  const res = validateConfig(raw);
  return res.valid ? { ok: true, config: res.config } : { ok: false, errors: res.errors };
}
