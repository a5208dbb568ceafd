import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { Orchestrator } from "../src/core/orchestrator.js";
import { loadState } from "../src/core/run-state.js";
import type { BootstrapConfig } from "../src/types/config.js";
import type { Diagnostic } from "../src/types/diagnostic.js";
import { FakeFetcher, FakeRunner, makeConfig } from "./helpers/fakes.js";

const BASE_ENV = { PATH: "/usr/bin:/bin", HOME: "/home/ci" };

describe("orchestrator", () => {
  let tmpDir: string;
  let runner: FakeRunner;
  let fetcher: FakeFetcher;
  let events: Diagnostic[];
  let displayUp: boolean;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "ci-bootstrap-orch-"));
    runner = new FakeRunner();
    fetcher = new FakeFetcher();
    events = [];
    displayUp = true;
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function orchestrator(config: BootstrapConfig): Orchestrator {
    return new Orchestrator(config, {
      runner,
      fetcher,
      probeFor: () => async () => displayUp,
      onEvent: (d) => events.push(d),
      cwd: tmpDir,
    });
  }

  it("runs every step in order and reports coverage once", async () => {
    const res = await orchestrator(makeConfig(tmpDir)).run({ runId: "run-1", baseEnv: BASE_ENV });

    expect(res.success).toBe(true);
    expect(res.exitCode).toBe(0);
    expect(res.final_status).toBe("done");
    expect(fetcher.fetched.map((d) => d.dest)).toEqual([
      path.join(tmpDir, "repos", "core"),
      path.join(tmpDir, "repos", "widgets"),
    ]);
    expect(runner.argvs()).toEqual([
      ["pip", "install", "-r", path.join(tmpDir, "repos", "core", "tests", "ci_requirements.txt")],
      ["pip", "install", "--no-index", "--find-links", "https://wheels.example.test/", "PySide"],
      ["python", "/home/ci/venv/python2.7/bin/pyside_postinstall.py", "-install"],
      ["tests/run_tests.sh", "--with-coverage"],
      ["coveralls"],
    ]);
    expect(runner.started.map((c) => c.argv)).toEqual([["Xvfb", ":99"]]);
    expect(runner.argvs().filter((a) => a[0] === "coveralls")).toHaveLength(1);
  });

  it("hands the test runner an explicit environment", async () => {
    const ambientDisplay = process.env.DISPLAY;
    await orchestrator(makeConfig(tmpDir)).run({ runId: "run-env", baseEnv: BASE_ENV });

    const testCall = runner.calls.find((c) => c.argv[0] === "tests/run_tests.sh");
    expect(testCall?.env.DISPLAY).toBe(":99.0");
    expect(testCall?.env.QT_QPA_PLATFORM).toBe("offscreen");
    expect(testCall?.env.EXTERNAL_REPOS_ROOT).toBe(path.join(tmpDir, "repos"));
    expect(testCall?.env.PATH).toBe("/usr/bin:/bin");
    expect(testCall?.cwd).toBe(tmpDir);

    // the requirements install runs before the display exists
    const pipCall = runner.calls[0];
    expect(pipCall.env.DISPLAY).toBeUndefined();
    expect(process.env.DISPLAY).toBe(ambientDisplay);
  });

  it("propagates the test runner's exit code and skips coverage reporting", async () => {
    runner.failWhen("tests/run_tests.sh", 5);
    const res = await orchestrator(makeConfig(tmpDir)).run({ runId: "run-fail", baseEnv: BASE_ENV });

    expect(res.success).toBe(false);
    expect(res.exitCode).toBe(5);
    expect(res.final_status).toBe("failed_run_tests");
    expect(res.failure?.kind).toBe("test_execution");
    expect(res.failure?.message).toBe("test runner failed: tests/run_tests.sh --with-coverage exited with 5");
    expect(runner.argvs().some((a) => a[0] === "coveralls")).toBe(false);
    expect(res.step_results.report_coverage).toBeUndefined();
  });

  it("stops after an unreachable dependency without installing or testing", async () => {
    fetcher.unreachable.add("https://git.example.test/widgets");
    const res = await orchestrator(makeConfig(tmpDir)).run({ runId: "run-dep", baseEnv: BASE_ENV });

    expect(res.success).toBe(false);
    expect(res.exitCode).toBe(1);
    expect(res.final_status).toBe("failed_resolve_dependencies");
    expect(res.failure?.kind).toBe("dependency_resolution");
    expect(res.failure?.message).toContain("Failed to resolve widgets (https://git.example.test/widgets@master)");
    expect(runner.calls).toHaveLength(0);
    expect(runner.started).toHaveLength(0);
    // no rollback of what was already cloned
    expect(fs.existsSync(path.join(tmpDir, "repos", "core"))).toBe(true);
  });

  it("propagates an installer failure immediately", async () => {
    runner.failWhen("-r", 2);
    const res = await orchestrator(makeConfig(tmpDir)).run({ runId: "run-pip", baseEnv: BASE_ENV });

    expect(res.exitCode).toBe(2);
    expect(res.final_status).toBe("failed_install_requirements");
    expect(res.failure?.kind).toBe("installation");
    expect(runner.calls).toHaveLength(1);
    expect(runner.started).toHaveLength(0);
  });

  it("fails when the requirements manifest is missing from the checkout", async () => {
    fetcher = new FakeFetcher({});
    const res = await orchestrator(makeConfig(tmpDir)).run({ runId: "run-manifest", baseEnv: BASE_ENV });

    expect(res.final_status).toBe("failed_install_requirements");
    expect(res.exitCode).toBe(1);
    expect(res.failure?.message).toBe(
      `Requirements manifest not found: ${path.join(tmpDir, "repos", "core", "tests", "ci_requirements.txt")}`,
    );
  });

  it("fails the display step when the display never becomes ready and stops the server", async () => {
    displayUp = false;
    const res = await orchestrator(makeConfig(tmpDir)).run({ runId: "run-display", baseEnv: BASE_ENV });

    expect(res.final_status).toBe("failed_start_display");
    expect(res.failure?.kind).toBe("display_environment");
    expect(res.failure?.message).toContain("Display :99.0 not ready");
    expect(res.exitCode).toBe(1);
    expect(runner.argvs().some((a) => a[0] === "tests/run_tests.sh")).toBe(false);
    expect(runner.handles[0].stopCalls).toBe(1);
  });

  it("reports a display server that exits before becoming ready", async () => {
    runner.crashOnStart(2);
    displayUp = false;
    const res = await orchestrator(makeConfig(tmpDir)).run({ runId: "run-crash", baseEnv: BASE_ENV });

    expect(res.final_status).toBe("failed_start_display");
    expect(res.exitCode).toBe(2);
    expect(res.failure?.message).toBe("Display server exited before :99.0 became ready: Xvfb :99 exited with 2");
  });

  it("starts a service-mode display through its command and leaves it running", async () => {
    const config = makeConfig(tmpDir);
    config.display.mode = "service";
    const res = await orchestrator(config).run({ runId: "run-service", baseEnv: BASE_ENV });

    expect(res.success).toBe(true);
    expect(runner.started).toHaveLength(0);
    expect(runner.argvs()[3]).toEqual(["Xvfb", ":99"]);
    expect(runner.calls[3].env.DISPLAY).toBe(":99.0");
    expect(events.map((e) => e.code)).toContain("DISPLAY_READY");
    expect(events.map((e) => e.code)).not.toContain("DISPLAY_STOPPED");
  });

  it("propagates a failing service-mode display command", async () => {
    const config = makeConfig(tmpDir);
    config.display.mode = "service";
    runner.failWhen("Xvfb", 4);
    const res = await orchestrator(config).run({ runId: "run-service-fail", baseEnv: BASE_ENV });

    expect(res.final_status).toBe("failed_start_display");
    expect(res.exitCode).toBe(4);
    expect(res.failure?.message).toBe("display server startup failed: Xvfb :99 exited with 4");
    expect(runner.argvs().some((a) => a[0] === "tests/run_tests.sh")).toBe(false);
  });

  it("applies the step timeout to the display readiness wait", async () => {
    displayUp = false;
    const config = makeConfig(tmpDir, { timeouts: { start_display: 50 } });
    config.display.readiness.timeout_ms = 5000;
    const started = Date.now();
    const res = await orchestrator(config).run({ runId: "run-display-timeout", baseEnv: BASE_ENV });

    expect(Date.now() - started).toBeLessThan(2000);
    expect(res.final_status).toBe("timeout_start_display");
    expect(res.exitCode).toBe(124);
    expect(res.step_results.start_display?.status).toBe("timeout");
    expect(res.failure?.message).toContain("start_display timed out after 50ms");
    expect(runner.handles[0].stopCalls).toBe(1);
  });

  it("stops the display server after a successful run", async () => {
    await orchestrator(makeConfig(tmpDir)).run({ runId: "run-teardown", baseEnv: BASE_ENV });

    expect(runner.handles).toHaveLength(1);
    expect(runner.handles[0].stopCalls).toBe(1);
    expect(events.map((e) => e.code)).toContain("DISPLAY_STOPPED");
  });

  it("leaves the display server running when keep_running is set", async () => {
    const config = makeConfig(tmpDir);
    config.display.keep_running = true;
    await orchestrator(config).run({ runId: "run-keep", baseEnv: BASE_ENV });

    expect(runner.handles[0].stopCalls).toBe(0);
    expect(runner.handles[0].isRunning()).toBe(true);
  });

  it("skips configured steps", async () => {
    const config = makeConfig(tmpDir, { skip_steps: ["install_gui_binding", "report_coverage"] });
    const res = await orchestrator(config).run({ runId: "run-skip", baseEnv: BASE_ENV });

    expect(res.success).toBe(true);
    expect(runner.argvs().map((a) => a[0])).toEqual(["pip", "tests/run_tests.sh"]);
    expect(res.step_results.install_gui_binding).toBeUndefined();
    expect(res.step_results.report_coverage).toBeUndefined();
  });

  it("marks steps without configuration as skipped", async () => {
    const config = makeConfig(tmpDir, { requirements: undefined, gui_binding: undefined, coverage: undefined });
    const res = await orchestrator(config).run({ runId: "run-minimal", baseEnv: BASE_ENV });

    expect(res.success).toBe(true);
    expect(res.step_results.install_requirements?.status).toBe("skipped");
    expect(res.step_results.install_gui_binding?.status).toBe("skipped");
    expect(res.step_results.report_coverage?.status).toBe("skipped");
    expect(runner.argvs()).toEqual([["tests/run_tests.sh", "--with-coverage"]]);
  });

  it("fails the run when a required coverage upload fails", async () => {
    runner.failWhen("coveralls", 1);
    const res = await orchestrator(makeConfig(tmpDir)).run({ runId: "run-cov", baseEnv: BASE_ENV });

    expect(res.success).toBe(false);
    expect(res.exitCode).toBe(1);
    expect(res.final_status).toBe("failed_report_coverage");
    expect(res.failure?.kind).toBe("reporting");
  });

  it("only warns when an optional coverage upload fails", async () => {
    runner.failWhen("coveralls", 1);
    const res = await orchestrator(makeConfig(tmpDir, { coverage: { command: ["coveralls"], required: false } })).run({
      runId: "run-cov-opt",
      baseEnv: BASE_ENV,
    });

    expect(res.success).toBe(true);
    expect(res.exitCode).toBe(0);
    expect(res.step_results.report_coverage?.outputs).toEqual({ reported: false, exit_code: 1 });
    expect(events.find((e) => e.code === "COVERAGE_REPORT_FAILED")?.level).toBe("warn");
  });

  it("records the coverage report summary after the tests", async () => {
    fs.writeFileSync(
      path.join(tmpDir, "coverage.xml"),
      '<coverage line-rate="0.75" branch-rate="0.5" lines-covered="30" lines-valid="40"></coverage>',
    );
    const config = makeConfig(tmpDir);
    config.tests.report_file = "coverage.xml";
    const res = await orchestrator(config).run({ runId: "run-report", baseEnv: BASE_ENV });

    expect(res.success).toBe(true);
    expect(res.step_results.run_tests?.outputs).toEqual({
      coverage: { line_rate: 0.75, branch_rate: 0.5, lines_covered: 30, lines_valid: 40, percent: 75 },
    });
    const summary = events.find((e) => e.code === "COVERAGE_SUMMARY");
    expect(summary?.message).toBe("Line coverage 75%");
    expect(summary?.step).toBe("run_tests");
  });

  it("only warns when the coverage report is missing", async () => {
    const config = makeConfig(tmpDir);
    config.tests.report_file = "coverage.xml";
    const res = await orchestrator(config).run({ runId: "run-report-missing", baseEnv: BASE_ENV });

    expect(res.success).toBe(true);
    expect(res.step_results.run_tests?.outputs).toBeUndefined();
    const warning = events.find((e) => e.code === "COVERAGE_REPORT_MISSING");
    expect(warning?.level).toBe("warn");
    expect(warning?.message).toBe(`Coverage report not found: ${path.join(tmpDir, "coverage.xml")}`);
    expect(runner.argvs().filter((a) => a[0] === "coveralls")).toHaveLength(1);
  });

  it("only warns when the coverage report is not Cobertura", async () => {
    fs.writeFileSync(path.join(tmpDir, "coverage.xml"), "<testsuites></testsuites>");
    const config = makeConfig(tmpDir);
    config.tests.report_file = "coverage.xml";
    const res = await orchestrator(config).run({ runId: "run-report-invalid", baseEnv: BASE_ENV });

    expect(res.success).toBe(true);
    const warning = events.find((e) => e.code === "COVERAGE_REPORT_INVALID");
    expect(warning?.level).toBe("warn");
    expect(warning?.message).toBe(
      `Could not read coverage report ${path.join(tmpDir, "coverage.xml")}: Not a Cobertura report: missing <coverage> root element`,
    );
  });

  it("aborts a step that exceeds its timeout", async () => {
    runner.hangOn("tests/run_tests.sh");
    const res = await orchestrator(makeConfig(tmpDir, { timeouts: { run_tests: 30 } })).run({
      runId: "run-timeout",
      baseEnv: BASE_ENV,
    });

    expect(res.final_status).toBe("timeout_run_tests");
    expect(res.exitCode).toBe(124);
    expect(res.step_results.run_tests?.status).toBe("timeout");
  });

  it("persists state with the exported environment", async () => {
    const res = await orchestrator(makeConfig(tmpDir)).run({ runId: "run-state", baseEnv: BASE_ENV });

    expect(res.statePath).toBe(path.join(tmpDir, "runs", "run-state", "state.json"));
    const state = loadState(res.statePath);
    expect(state.current_step).toBe("done");
    expect(state.exit_code).toBe(0);
    expect(state.environment).toEqual({
      EXTERNAL_REPOS_ROOT: path.join(tmpDir, "repos"),
      DISPLAY: ":99.0",
      QT_QPA_PLATFORM: "offscreen",
    });
    expect(state.step_results.resolve_dependencies?.status).toBe("ok");
  });

  it("can run twice against the same external repos root", async () => {
    const config = makeConfig(tmpDir);
    const first = await orchestrator(config).run({ runId: "run-a", baseEnv: BASE_ENV });
    const second = await orchestrator(config).run({ runId: "run-b", baseEnv: BASE_ENV });

    expect(first.success).toBe(true);
    expect(second.success).toBe(true);
    expect(events.filter((e) => e.code === "DEPENDENCY_REFRESHED")).toHaveLength(2);
  });

  it("fails when the external repos root cannot be created", async () => {
    const blocker = path.join(tmpDir, "not-a-dir");
    fs.writeFileSync(blocker, "x");
    const res = await orchestrator(makeConfig(tmpDir, { external_repos_root: path.join(blocker, "repos") })).run({
      runId: "run-root",
      baseEnv: BASE_ENV,
    });

    expect(res.final_status).toBe("failed_resolve_dependencies");
    expect(res.failure?.message).toBe(`External repositories root is not writable: ${path.join(blocker, "repos")}`);
    expect(fetcher.fetched).toHaveLength(0);
  });
});
