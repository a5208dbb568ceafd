import net from "node:net";
import { setTimeout as delay } from "node:timers/promises";
import type { ReadinessStrategy } from "../types/config.js";
import { isErrnoException } from "../types/guards.js";

/** Resolves true once the display accepts connections. */
export type DisplayProbe = () => Promise<boolean>;

export type ReadinessOptions = {
  strategy: ReadinessStrategy;
  timeoutMs: number;
  intervalMs: number;
  maxIntervalMs: number;
  delayMs: number;
  /** Returns false once the server process has exited; checked before every probe. */
  isAlive?: () => boolean;
  /** Aborts the wait; checked before every probe and interrupts sleeps. */
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

export type ReadinessResult = {
  ready: boolean;
  attempts: number;
  waitedMs: number;
  reason?: "timeout" | "exited";
};

/**
 * Probe for the X server's Unix socket by connecting to it. A socket file left
 * behind by a dead server refuses the connection and counts as not ready.
 */
export function socketProbe(socketPath: string): DisplayProbe {
  return () =>
    new Promise<boolean>((resolve, reject) => {
      const socket = net.connect(socketPath);
      socket.once("connect", () => {
        socket.destroy();
        resolve(true);
      });
      socket.once("error", (err) => {
        socket.destroy();
        if (isErrnoException(err) && (err.code === "ENOENT" || err.code === "ECONNREFUSED")) resolve(false);
        else reject(err);
      });
    });
}

/**
 * Wait until the display is reachable.
 *
 * "poll" probes with exponential backoff (intervalMs doubling up to maxIntervalMs)
 * until timeoutMs has elapsed. "fixed-delay" sleeps delayMs and probes once, so a
 * server slower than the delay is reported as not ready.
 */
export async function waitForDisplay(probe: DisplayProbe, opts: ReadinessOptions): Promise<ReadinessResult> {
  const { signal } = opts;
  const sleep = opts.sleep ?? ((ms: number) => delay(ms, undefined, { signal }));
  const now = opts.now ?? Date.now;
  const start = now();

  if (opts.strategy === "fixed-delay") {
    signal?.throwIfAborted();
    await sleep(opts.delayMs);
    signal?.throwIfAborted();
    if (opts.isAlive && !opts.isAlive()) return { ready: false, attempts: 0, waitedMs: now() - start, reason: "exited" };
    const ready = await probe();
    return ready
      ? { ready, attempts: 1, waitedMs: now() - start }
      : { ready, attempts: 1, waitedMs: now() - start, reason: "timeout" };
  }

  let interval = opts.intervalMs;
  let attempts = 0;
  for (;;) {
    if (opts.isAlive && !opts.isAlive()) {
      return { ready: false, attempts, waitedMs: now() - start, reason: "exited" };
    }
    signal?.throwIfAborted();
    attempts++;
    if (await probe()) return { ready: true, attempts, waitedMs: now() - start };

    const elapsed = now() - start;
    if (elapsed >= opts.timeoutMs) return { ready: false, attempts, waitedMs: elapsed, reason: "timeout" };

    await sleep(Math.min(interval, opts.timeoutMs - elapsed));
    interval = Math.min(interval * 2, opts.maxIntervalMs);
  }
}
