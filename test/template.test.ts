import { describe, expect, it } from "vitest";
import path from "node:path";
import { expand, expandCommand, interpreterVersion, templateVars } from "../src/core/template.js";
import {
  cloneCommand,
  guiBindingCommands,
  isInsideRoot,
  requirementsManifest,
  resolveDependency,
  testCommand,
} from "../src/core/commands.js";
import { makeConfig } from "./helpers/fakes.js";

const ROOT = "/work";

describe("template expansion", () => {
  it("replaces known placeholders", () => {
    expect(expand("${external_repos_root}/tk-core", { external_repos_root: "/tmp" })).toBe("/tmp/tk-core");
  });

  it("expands a leading ~/ to the home directory", () => {
    const vars = { home: "/home/ci", interpreter_version: "2.7" };
    expect(expand("~/virtualenv/python${interpreter_version}/bin/pyside_postinstall.py", vars)).toBe(
      "/home/ci/virtualenv/python2.7/bin/pyside_postinstall.py",
    );
  });

  it("rejects unknown placeholders", () => {
    expect(() => expand("${nope}/x", { home: "/h" })).toThrow('Unknown placeholder ${nope} in "${nope}/x"');
  });

  it("expands every element of a command line", () => {
    expect(expandCommand(["echo", "${display}", "plain"], { display: ":99.0" })).toEqual(["echo", ":99.0", "plain"]);
  });

  it("prefers the interpreter version from the environment", () => {
    const config = makeConfig(ROOT, { interpreter: { version: "2.7", version_env: "PYTHON_VERSION" } });
    expect(interpreterVersion(config, { PYTHON_VERSION: "3.9" })).toBe("3.9");
    expect(interpreterVersion(config, {})).toBe("2.7");
    expect(interpreterVersion(config, { PYTHON_VERSION: "" })).toBe("2.7");
  });

  it("builds the variable set", () => {
    const vars = templateVars(makeConfig(ROOT), {}, { externalReposRoot: "/repos", runId: "r1", home: "/home/ci" });
    expect(vars).toEqual({
      home: "/home/ci",
      external_repos_root: "/repos",
      interpreter_version: "2.7",
      display: ":99.0",
      run_id: "r1",
    });
  });
});

describe("command builders", () => {
  const vars = { home: "/home/ci", external_repos_root: "/repos", interpreter_version: "2.7", display: ":99.0", run_id: "r1" };

  it("places dependencies under the root by name or relative path", () => {
    const byName = resolveDependency({ name: "core", url: "u", branch: "main", depth: 1 }, "/repos", vars);
    const byPath = resolveDependency({ name: "core", url: "u", branch: "main", depth: 1, path: "nested/core" }, "/repos", vars);
    const absolute = resolveDependency({ name: "core", url: "u", branch: "main", depth: 1, path: "/repos/pinned/core" }, "/repos", vars);
    expect(byName.dest).toBe("/repos/core");
    expect(byPath.dest).toBe("/repos/nested/core");
    expect(absolute.dest).toBe("/repos/pinned/core");
  });

  it("rejects destinations outside the external repos root", () => {
    const outside = (p: string) => () =>
      resolveDependency({ name: "core", url: "u", branch: "main", depth: 1, path: p }, "/repos", vars);
    expect(outside("..")).toThrow("Destination of core is not inside the external repos root /repos: /");
    expect(outside("/opt/core")).toThrow("Destination of core is not inside the external repos root /repos: /opt/core");
    expect(outside(".")).toThrow("Destination of core is not inside the external repos root /repos: /repos");
    expect(outside("${external_repos_root}/../etc")).toThrow("/repos: /etc");
  });

  it("isInsideRoot treats sibling prefixes as outside", () => {
    expect(isInsideRoot("/repos", "/repos/core")).toBe(true);
    expect(isInsideRoot("/repos", "/repos-old/core")).toBe(false);
    expect(isInsideRoot("/repos", "/repos/..foo")).toBe(true);
    expect(isInsideRoot("/repos", "/repos")).toBe(false);
  });

  it("renders the equivalent shallow clone", () => {
    const dep = resolveDependency({ name: "core", url: "https://git.example.test/core", branch: "main", depth: 1 }, "/repos", vars);
    expect(cloneCommand(dep)).toEqual(["git", "clone", "--depth", "1", "--branch", "main", "https://git.example.test/core", "/repos/core"]);
  });

  it("locates the requirements manifest inside its dependency", () => {
    expect(requirementsManifest(makeConfig(ROOT), "/repos", vars)).toBe(path.join("/repos", "core", "tests", "ci_requirements.txt"));
    expect(requirementsManifest(makeConfig(ROOT, { requirements: undefined }), "/repos", vars)).toBeNull();
  });

  it("orders GUI binding commands: system packages, binary install, post-install", () => {
    const config = makeConfig(ROOT);
    if (config.gui_binding) config.gui_binding.system_packages = ["libqt4-dev"];
    expect(guiBindingCommands(config, vars)).toEqual([
      ["sudo", "apt-get", "install", "-y", "libqt4-dev"],
      ["pip", "install", "--no-index", "--find-links", "https://wheels.example.test/", "PySide"],
      ["python", "/home/ci/venv/python2.7/bin/pyside_postinstall.py", "-install"],
    ]);
  });

  it("appends the coverage flag to the test command", () => {
    expect(testCommand(makeConfig(ROOT), vars)).toEqual(["tests/run_tests.sh", "--with-coverage"]);
    const noFlag = makeConfig(ROOT, { tests: { command: ["make", "test"], coverage_flag: "", cwd: "." } });
    expect(testCommand(noFlag, vars)).toEqual(["make", "test"]);
  });
});
