import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import type { RunState } from "../types/state.js";

function randId(bytes = 8): string {
  return crypto.randomBytes(bytes).toString("hex");
}

export function makeRunId(): string {
  const ts = new Date().toISOString().replace(/[:.]/g, "-");
  return `${ts}-${randId(3)}`;
}

export function statePathForRun(runsDir: string, runId: string): string {
  return path.join(runsDir, runId, "state.json");
}

export function loadState(statePath: string): RunState {
  const raw = fs.readFileSync(statePath, "utf8");
  return JSON.parse(raw) as RunState;
}

export function saveState(statePath: string, state: RunState): void {
  fs.mkdirSync(path.dirname(statePath), { recursive: true });
  fs.writeFileSync(statePath, JSON.stringify(state, null, 2) + "\n", "utf8");
}
