import { guiBindingCommands } from "../commands.js";
import { runChecked, type StepContext, type StepOutcome } from "./context.js";

/**
 * GUI binding step: system packages, then the binding from its prebuilt binary
 * index (never a source build), then the binding's post-install script.
 */
export async function installGuiBindingStep(ctx: StepContext): Promise<StepOutcome> {
  const commands = guiBindingCommands(ctx.config, ctx.vars);
  if (commands.length === 0) return { status: "skipped" };

  for (const argv of commands) {
    await runChecked(ctx, argv, "installation", "GUI binding install");
  }
  return { status: "ok", outputs: { package: ctx.config.gui_binding?.package, commands: commands.length } };
}
