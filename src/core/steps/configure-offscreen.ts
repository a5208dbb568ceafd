import { setEnv, type StepContext, type StepOutcome } from "./context.js";

/** Force the toolkit to render offscreen, independent of the virtual display. */
export async function configureOffscreenStep(ctx: StepContext): Promise<StepOutcome> {
  const { variable, value } = ctx.config.offscreen;
  setEnv(ctx, variable, value);
  ctx.emit({ level: "info", code: "ENV_SET", message: `${variable}=${value}`, step: "configure_offscreen" });
  return { status: "ok", outputs: { [variable]: value } };
}
