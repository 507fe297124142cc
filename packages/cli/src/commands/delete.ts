import { rm } from "node:fs/promises";
import { basename } from "node:path";
import { composeDown, removeVolume } from "@synapse-env/lib/compose.ts";
import { NAMED_VOLUMES } from "@synapse-env/lib/generators/compose.ts";
import { volumeName } from "@synapse-env/lib/paths.ts";
import { log, info, green } from "@synapse-env/lib/ui.ts";
import type { CommandContext } from "../types.ts";

export const DELETE_CONFIRMATION = "YES";

/**
 * Tear the environment down: containers, named volumes and every generated
 * file. Anything but the exact confirmation phrase aborts untouched.
 */
export async function deleteEnvironment(ctx: CommandContext): Promise<boolean> {
  const { config, runtime } = ctx;
  const { paths } = config;
  const targets = [
    paths.hookshotData,
    paths.synapseData,
    paths.composeFile,
    paths.masConfigFile,
    paths.nginxConfigFile,
    paths.elementConfigFile,
  ];

  const listed = targets.map((target) => basename(target)).join(", ");
  const answer = await ctx.prompt(
    `Enter ${DELETE_CONFIRMATION} to confirm deleting the environment, its volumes, and ${listed}: `
  );
  if (answer !== DELETE_CONFIRMATION) {
    log("Aborted.");
    return false;
  }

  info("Removing containers...");
  await composeDown(runtime);
  for (const volume of NAMED_VOLUMES) {
    await removeVolume(runtime, volumeName(config.project, volume));
  }
  for (const target of targets) {
    await rm(target, { recursive: true, force: true });
  }
  info(green("Environment deleted."));
  return true;
}
