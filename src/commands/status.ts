import fs from "node:fs";
import path from "node:path";
import type { RunState } from "../types/state.js";
import { loadState, statePathForRun } from "../core/run-state.js";
import { errorMessage, isRecord } from "../types/guards.js";

export type StatusResult =
  | { ok: true; state: RunState }
  | { ok: false; error: string };

export type RunSummary = { id: string; status: string; exit_code: number | null; updated_at: string };

/**
 * Read run state for a given ID.
 */
export function status(opts: { runsDir: string; runId: string }): StatusResult {
  const statePath = statePathForRun(opts.runsDir, opts.runId);

  if (!fs.existsSync(statePath)) {
    return { ok: false, error: `No run found: ${opts.runId}` };
  }

  try {
    return { ok: true, state: loadState(statePath) };
  } catch (e) {
    return { ok: false, error: `Failed to read state: ${errorMessage(e)}` };
  }
}

/**
 * List all runs with their current status, most recent first.
 */
export function listRuns(runsDir: string): RunSummary[] {
  if (!fs.existsSync(runsDir)) return [];

  const entries = fs.readdirSync(runsDir, { withFileTypes: true });
  const results: RunSummary[] = [];

  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const statePath = path.join(runsDir, entry.name, "state.json");
    if (!fs.existsSync(statePath)) continue;

    let state: unknown;
    try {
      state = JSON.parse(fs.readFileSync(statePath, "utf8"));
    } catch {
      results.push({ id: entry.name, status: "corrupted", exit_code: null, updated_at: "" });
      continue;
    }
    if (!isRecord(state)) {
      results.push({ id: entry.name, status: "corrupted", exit_code: null, updated_at: "" });
      continue;
    }
    results.push({
      id: entry.name,
      status: String(state.current_step ?? "unknown"),
      exit_code: typeof state.exit_code === "number" ? state.exit_code : null,
      updated_at: String(state.updated_at ?? ""),
    });
  }

  return results.sort((a, b) => b.updated_at.localeCompare(a.updated_at));
}
