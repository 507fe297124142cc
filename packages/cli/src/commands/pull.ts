import { composePull } from "@synapse-env/lib/compose.ts";
import { info, green } from "@synapse-env/lib/ui.ts";
import type { CommandContext } from "../types.ts";

export async function pull(ctx: CommandContext): Promise<void> {
  info("Pulling images...");
  await composePull(ctx.runtime);
  info(green("Images pulled."));
}
