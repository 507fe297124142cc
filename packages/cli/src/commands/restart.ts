import type { OptionalServiceName } from "@synapse-env/lib/types.ts";
import { execInContainer, restartContainer } from "@synapse-env/lib/compose.ts";
import { SynapseEnvError } from "@synapse-env/lib/errors.ts";
import { containerName } from "@synapse-env/lib/paths.ts";
import { info, green } from "@synapse-env/lib/ui.ts";
import type { CommandContext, RestartTarget } from "../types.ts";

function optionalService(target: RestartTarget): OptionalServiceName | null {
  switch (target) {
    case "synapse":
    case "nginx":
      return null;
    default:
      return target;
  }
}

/**
 * Restart one container. Services behind nginx are followed by an nginx
 * restart; MAS re-checks and syncs its config after coming back.
 */
export async function restartService(ctx: CommandContext, target: RestartTarget): Promise<void> {
  const { config, runtime } = ctx;
  const optional = optionalService(target);
  if (optional && !config.services[optional].enabled) {
    throw new SynapseEnvError("service_disabled", `${target} is not enabled in ${config.configFile}`);
  }

  const container = containerName(config.project, target);
  info(`Restarting ${container}...`);
  await restartContainer(runtime, container);

  if (target === "mas") {
    await execInContainer(runtime, container, ["mas-cli", "config", "check"]);
    await execInContainer(runtime, container, ["mas-cli", "config", "sync", "--prune"]);
  }
  if (target !== "nginx") {
    await restartContainer(runtime, containerName(config.project, "nginx"));
  }
  info(green(`${container} restarted.`));
}
