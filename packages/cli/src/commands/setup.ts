import type { GenerateResult } from "@synapse-env/lib/types.ts";
import { composePull, composeUp, restartContainer } from "@synapse-env/lib/compose.ts";
import { assertCompatibleFeatures } from "@synapse-env/lib/generators/compose.ts";
import { containerName } from "@synapse-env/lib/paths.ts";
import { info, green } from "@synapse-env/lib/ui.ts";
import type { CommandContext, GeneratorName } from "../types.ts";
import { generate } from "./generate.ts";

/** Synapse must exist before MAS patches its config. */
export const GENERATOR_ORDER: readonly GeneratorName[] = ["compose", "nginx", "element", "hookshot", "synapse", "mas"];

export async function runAllGenerators(ctx: CommandContext): Promise<GenerateResult[]> {
  assertCompatibleFeatures(ctx.config);
  const results: GenerateResult[] = [];
  for (const name of GENERATOR_ORDER) results.push(await generate(ctx, name));
  return results;
}

/** Recreate every container, then nginx so it re-resolves its upstreams. */
export async function bringUp(ctx: CommandContext): Promise<void> {
  await composeUp(ctx.runtime);
  await restartContainer(ctx.runtime, containerName(ctx.config.project, "nginx"));
}

export async function setup(ctx: CommandContext): Promise<void> {
  await runAllGenerators(ctx);
  info("Pulling images...");
  await composePull(ctx.runtime);
  info("Starting containers...");
  await bringUp(ctx);
  info(green("Environment is up."));
}

export async function restartAll(ctx: CommandContext): Promise<void> {
  await runAllGenerators(ctx);
  info("Recreating containers...");
  await bringUp(ctx);
  info(green("Environment restarted."));
}
