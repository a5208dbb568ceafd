import path from "node:path";
import { loadAjv } from "../schema/ajv.js";
import { isInsideRoot } from "../core/commands.js";
import { ALL_STEPS, REQUIRED_STEPS } from "../core/state-machine.js";
import { parseDisplayIdentifier } from "../display/display-id.js";
import type { BootstrapConfig } from "../types/config.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { DEFAULT_EXTERNAL_REPOS_ENV } from "./loader.js";

const COMMAND_LINE = { type: "array", items: { type: "string" }, minItems: 1 };

const CONFIG_SCHEMA = {
  type: "object",
  additionalProperties: false,
  required: ["schema_version", "external_repos_root", "interpreter", "dependencies", "display", "tests"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    external_repos_root: { type: "string", minLength: 1 },
    external_repos_env: { type: "string", pattern: "^[A-Za-z_][A-Za-z0-9_]*$", default: DEFAULT_EXTERNAL_REPOS_ENV },
    runs_dir: { type: "string", minLength: 1, default: ".ci-bootstrap/runs" },
    on_existing: { type: "string", enum: ["refresh", "replace", "fail"], default: "refresh" },
    interpreter: {
      type: "object",
      additionalProperties: false,
      required: ["version"],
      properties: {
        version: { type: "string", minLength: 1 },
        version_env: { type: "string", minLength: 1 },
      },
    },
    dependencies: {
      type: "array",
      items: {
        type: "object",
        additionalProperties: false,
        required: ["name", "url", "branch"],
        properties: {
          name: { type: "string", pattern: "^[A-Za-z0-9._-]+$" },
          url: { type: "string", minLength: 1 },
          branch: { type: "string", minLength: 1 },
          revision: { type: "string", pattern: "^[0-9a-fA-F]{7,40}$" },
          path: { type: "string", minLength: 1 },
          depth: { type: "integer", minimum: 1, default: 1 },
        },
      },
    },
    requirements: {
      type: "object",
      additionalProperties: false,
      required: ["from", "file", "install"],
      properties: {
        from: { type: "string", minLength: 1 },
        file: { type: "string", minLength: 1 },
        install: COMMAND_LINE,
      },
    },
    gui_binding: {
      type: "object",
      additionalProperties: false,
      required: ["package", "index_url", "install"],
      properties: {
        package: { type: "string", minLength: 1 },
        index_url: { type: "string", format: "uri" },
        install: COMMAND_LINE,
        post_install: COMMAND_LINE,
        system_packages: { type: "array", items: { type: "string", minLength: 1 }, default: [] },
        system_install: { ...COMMAND_LINE, default: ["sudo", "apt-get", "install", "-y"] },
      },
    },
    display: {
      type: "object",
      additionalProperties: false,
      required: ["identifier", "server"],
      properties: {
        identifier: { type: "string", minLength: 1 },
        server: COMMAND_LINE,
        mode: { type: "string", enum: ["spawn", "service"], default: "spawn" },
        socket_dir: { type: "string", minLength: 1, default: "/tmp/.X11-unix" },
        keep_running: { type: "boolean", default: false },
        readiness: {
          type: "object",
          additionalProperties: false,
          default: {},
          properties: {
            strategy: { type: "string", enum: ["poll", "fixed-delay"], default: "poll" },
            timeout_ms: { type: "integer", minimum: 1, default: 10000 },
            interval_ms: { type: "integer", minimum: 1, default: 50 },
            max_interval_ms: { type: "integer", minimum: 1, default: 1000 },
            delay_ms: { type: "integer", minimum: 0, default: 3000 },
          },
        },
      },
    },
    offscreen: {
      type: "object",
      additionalProperties: false,
      default: {},
      properties: {
        variable: { type: "string", minLength: 1, default: "QT_QPA_PLATFORM" },
        value: { type: "string", minLength: 1, default: "offscreen" },
      },
    },
    tests: {
      type: "object",
      additionalProperties: false,
      required: ["command"],
      properties: {
        command: COMMAND_LINE,
        coverage_flag: { type: "string", default: "--with-coverage" },
        cwd: { type: "string", minLength: 1, default: "." },
        report_file: { type: "string", minLength: 1 },
      },
    },
    coverage: {
      type: "object",
      additionalProperties: false,
      required: ["command"],
      properties: {
        command: COMMAND_LINE,
        required: { type: "boolean", default: true },
      },
    },
    skip_steps: {
      type: "array",
      items: { type: "string", enum: [...ALL_STEPS] },
      default: [],
    },
    timeouts: {
      type: "object",
      default: {},
      propertyNames: { type: "string", enum: [...ALL_STEPS] },
      additionalProperties: { type: "integer", minimum: 1 },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: BootstrapConfig }
  | { valid: false; errors: Diagnostic[] };

function diag(code: string, message: string, path?: string): Diagnostic {
  return { level: "error", code, message, path };
}

/** Cross-field rules the schema cannot express. */
function checkSemantics(config: BootstrapConfig): Diagnostic[] {
  const errors: Diagnostic[] = [];

  const names = new Set<string>();
  const dests = new Set<string>();
  config.dependencies.forEach((dep, i) => {
    if (names.has(dep.name)) {
      errors.push(diag("DUPLICATE_DEPENDENCY", `Dependency name "${dep.name}" is declared twice`, `/dependencies/${i}/name`));
    }
    names.add(dep.name);
    const dest = dep.path ?? dep.name;
    if (dests.has(dest)) {
      errors.push(diag("DUPLICATE_DESTINATION", `Dependency destination "${dest}" is used twice`, `/dependencies/${i}`));
    }
    dests.add(dest);

    // Placeholders are only known at run time; resolveDependency checks those.
    if (dep.path !== undefined && !dep.path.includes("${")) {
      const root = path.resolve(config.external_repos_root);
      if (!isInsideRoot(root, path.resolve(root, dep.path))) {
        errors.push(
          diag("DESTINATION_OUTSIDE_ROOT", `Dependency "${dep.name}" path "${dep.path}" is not inside external_repos_root`, `/dependencies/${i}/path`),
        );
      }
    }
  });

  if (config.requirements && !names.has(config.requirements.from)) {
    errors.push(
      diag("UNKNOWN_DEPENDENCY", `requirements.from names unknown dependency "${config.requirements.from}"`, "/requirements/from"),
    );
  }

  for (const step of config.skip_steps) {
    if (REQUIRED_STEPS.includes(step)) {
      errors.push(diag("STEP_NOT_SKIPPABLE", `Step "${step}" cannot be skipped`, "/skip_steps"));
    }
  }

  if (!parseDisplayIdentifier(config.display.identifier)) {
    errors.push(diag("INVALID_DISPLAY", `Invalid display identifier "${config.display.identifier}"`, "/display/identifier"));
  }

  return errors;
}

/**
 * Validate a loaded config against the config schema, filling in defaults.
 * The input object is updated in place with defaults and coerced scalars.
 */
export function validateConfig(raw: unknown): ConfigValidationResult {
  const ajv = loadAjv();
  const validate = ajv.compile<BootstrapConfig>(CONFIG_SCHEMA);
  if (!validate(raw)) {
    const errors = (validate.errors ?? []).map((e) =>
      diag("CONFIG_INVALID", `${e.instancePath || "/"} ${e.message ?? "is invalid"}`, e.instancePath || "/"),
    );
    return { valid: false, errors: errors.length > 0 ? errors : [diag("CONFIG_INVALID", ajv.errorsText(validate.errors))] };
  }

  const errors = checkSemantics(raw);
  return errors.length > 0 ? { valid: false, errors } : { valid: true, config: raw };
}
