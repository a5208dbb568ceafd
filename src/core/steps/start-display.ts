import { BootstrapError } from "../errors.js";
import { displayCommand } from "../commands.js";
import { displaySocketPath, parseDisplayIdentifier } from "../../display/display-id.js";
import { waitForDisplay } from "../../display/readiness.js";
import { formatCommand } from "../../process/runner.js";
import { runChecked, setEnv, type StepContext, type StepOutcome } from "./context.js";

/**
 * Display step: export DISPLAY, start the virtual X server and wait until its
 * socket accepts connections before any later step runs.
 */
export async function startDisplayStep(ctx: StepContext): Promise<StepOutcome> {
  const { display } = ctx.config;
  const id = parseDisplayIdentifier(display.identifier);
  if (!id) {
    throw new BootstrapError("display_environment", `Invalid display identifier: ${display.identifier}`);
  }

  setEnv(ctx, "DISPLAY", display.identifier);
  const argv = displayCommand(ctx.config, ctx.vars);

  if (display.mode === "service") {
    await runChecked(ctx, argv, "display_environment", "display server startup");
  } else {
    ctx.resources.display = ctx.runner.start(argv, { cwd: ctx.cwd, env: ctx.env });
  }

  const handle = ctx.resources.display;
  const socketPath = displaySocketPath(display.socket_dir, id.display);
  const readiness = await waitForDisplay(ctx.probeFor(socketPath), {
    strategy: display.readiness.strategy,
    timeoutMs: display.readiness.timeout_ms,
    intervalMs: display.readiness.interval_ms,
    maxIntervalMs: display.readiness.max_interval_ms,
    delayMs: display.readiness.delay_ms,
    isAlive: handle ? () => handle.isRunning() : undefined,
    signal: ctx.signal,
  });

  if (!readiness.ready) {
    if (readiness.reason === "exited" && handle) {
      const res = await handle.exited;
      throw new BootstrapError(
        "display_environment",
        `Display server exited before ${display.identifier} became ready: ${formatCommand(argv)} exited with ${res.exitCode}`,
        res.exitCode,
      );
    }
    throw new BootstrapError(
      "display_environment",
      `Display ${display.identifier} not ready after ${readiness.waitedMs}ms ` +
        `(${readiness.attempts} probe(s) of ${socketPath}, strategy ${display.readiness.strategy})`,
    );
  }

  ctx.emit({
    level: "info",
    code: "DISPLAY_READY",
    message: `Display ${display.identifier} ready after ${readiness.waitedMs}ms`,
    step: "start_display",
    path: socketPath,
    details: { attempts: readiness.attempts },
  });

  return {
    status: "ok",
    outputs: { display: display.identifier, socket: socketPath, pid: handle?.pid, waited_ms: readiness.waitedMs },
  };
}
