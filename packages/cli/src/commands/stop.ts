import { composeStop } from "@synapse-env/lib/compose.ts";
import { info, green } from "@synapse-env/lib/ui.ts";
import type { CommandContext } from "../types.ts";

export async function stop(ctx: CommandContext): Promise<void> {
  info("Stopping services...");
  await composeStop(ctx.runtime);
  info(green("Services stopped."));
}
