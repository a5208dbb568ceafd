import fs from "node:fs";
import { BootstrapError } from "../errors.js";
import { requirementsCommand, requirementsManifest } from "../commands.js";
import { runChecked, type StepContext, type StepOutcome } from "./context.js";

/**
 * Install step: install the runtime requirements declared in a freshly cloned dependency.
 */
export async function installRequirementsStep(ctx: StepContext): Promise<StepOutcome> {
  const manifest = requirementsManifest(ctx.config, ctx.externalReposRoot, ctx.vars);
  if (manifest === null) return { status: "skipped" };

  if (!fs.existsSync(manifest)) {
    throw new BootstrapError("installation", `Requirements manifest not found: ${manifest}`);
  }

  const argv = requirementsCommand(ctx.config, manifest, ctx.vars);
  await runChecked(ctx, argv, "installation", "requirements install");
  return { status: "ok", outputs: { manifest } };
}
