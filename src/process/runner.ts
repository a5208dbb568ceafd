import { spawn, type ChildProcess, type StdioOptions } from "node:child_process";
import os from "node:os";
import type { CommandLine } from "../types/config.js";
import type { Environment } from "../types/diagnostic.js";

export type CommandResult = {
  exitCode: number;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  /** Set when the program could not be started at all. */
  error?: string;
};

export type RunOptions = {
  cwd?: string;
  env: Environment;
  signal?: AbortSignal;
};

/** A long-lived child process owned by the run (the display server). */
export interface ProcessHandle {
  readonly pid: number | undefined;
  readonly exited: Promise<CommandResult>;
  isRunning(): boolean;
  /** SIGTERM, then SIGKILL once `graceMs` has passed without an exit. */
  stop(graceMs?: number): Promise<CommandResult>;
}

/**
 * Runs argv command lines as child processes.
 */
export interface CommandRunner {
  /** Run to completion and report the exit status. Never rejects for a non-zero exit. */
  run(argv: CommandLine, opts: RunOptions): Promise<CommandResult>;
  /** Start without waiting for exit. `opts.signal` is ignored: the handle outlives the step. */
  start(argv: CommandLine, opts: RunOptions): ProcessHandle;
}

/** Exit code reported when the program does not exist or cannot be executed. */
export const NOT_EXECUTABLE_EXIT = 127;
const TIMED_OUT_EXIT = 124;

/** Time a stopped process gets to exit on SIGTERM before it is killed. */
export const STOP_GRACE_MS = 5000;

function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + (os.constants.signals[signal] ?? 0);
}

function waitForClose(child: ChildProcess, abort?: AbortSignal): Promise<CommandResult> {
  return new Promise((resolve) => {
    let spawnError: Error | undefined;
    child.on("error", (err) => {
      spawnError = err;
    });
    // 'close' follows 'error' when the child failed to spawn, with a negative errno as code.
    child.on("close", (code, signal) => {
      if (abort?.aborted) {
        resolve({ exitCode: TIMED_OUT_EXIT, signal, timedOut: true });
      } else if (spawnError && (code === null || code < 0)) {
        resolve({ exitCode: NOT_EXECUTABLE_EXIT, signal, timedOut: false, error: spawnError.message });
      } else if (code !== null) {
        resolve({ exitCode: code, signal, timedOut: false });
      } else {
        resolve({ exitCode: signal ? signalExitCode(signal) : 1, signal, timedOut: false });
      }
    });
  });
}

function split(argv: CommandLine): [string, string[]] {
  const [command, ...args] = argv;
  if (!command) throw new Error("Empty command line");
  return [command, args];
}

export class NodeCommandRunner implements CommandRunner {
  /**
   * @param stdio - "inherit" streams child output into the CI log; "ignore" keeps tests quiet.
   */
  constructor(private readonly stdio: StdioOptions = "inherit") {}

  run(argv: CommandLine, opts: RunOptions): Promise<CommandResult> {
    const [command, args] = split(argv);
    const child = spawn(command, args, {
      cwd: opts.cwd,
      env: opts.env,
      stdio: this.stdio,
      signal: opts.signal,
      shell: false,
    });
    return waitForClose(child, opts.signal);
  }

  start(argv: CommandLine, opts: RunOptions): ProcessHandle {
    const [command, args] = split(argv);
    const child = spawn(command, args, {
      cwd: opts.cwd,
      env: opts.env,
      stdio: "ignore",
      shell: false,
    });
    let running = true;
    const exited = waitForClose(child).then((res) => {
      running = false;
      return res;
    });

    return {
      pid: child.pid,
      exited,
      isRunning: () => running,
      stop: async (graceMs = STOP_GRACE_MS) => {
        if (!running) return exited;
        child.kill("SIGTERM");
        const timer = setTimeout(() => {
          if (running) child.kill("SIGKILL");
        }, graceMs);
        try {
          return await exited;
        } finally {
          clearTimeout(timer);
        }
      },
    };
  }
}

/** Render a command line for logs and error messages. */
export function formatCommand(argv: CommandLine): string {
  return argv.map((a) => (/^[\w@%+=:,./-]+$/.test(a) ? a : JSON.stringify(a))).join(" ");
}
