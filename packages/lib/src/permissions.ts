import { existsSync } from "node:fs";
import type { RuntimeContext } from "./types.ts";
import { commandFailed } from "./errors.ts";
import { createLogger } from "./logger.ts";

const logger = createLogger("permissions");

/** UID the Synapse and Hookshot images run as. */
export const SERVICE_UID = 991;

/**
 * Make a bind-mounted path usable by a rootless container running as
 * `ownerId`: directories 775, files 664, owned by `ownerId` inside the
 * user namespace. Runs through `podman unshare` so the ownership maps to
 * the subordinate id range. Rootful Docker needs none of this.
 */
export async function fixPermissions(ctx: RuntimeContext, path: string, ownerId: number = SERVICE_UID): Promise<void> {
  if (ctx.platform !== "podman") {
    logger.debug("skipping permission fix outside podman", { path, platform: ctx.platform });
    return;
  }

  const steps: string[][] = [
    ["podman", "unshare", "find", path, "-type", "d", "-exec", "chmod", "775", "{}", "+"],
    ["podman", "unshare", "find", path, "-type", "f", "-exec", "chmod", "664", "{}", "+"],
    ["podman", "unshare", "chown", String(ownerId), "-R", path],
  ];
  for (const argv of steps) {
    const result = await ctx.runner(argv, { cwd: ctx.compose.cwd });
    if (result.exitCode !== 0) throw commandFailed(argv, result.exitCode, result.stderr);
  }
}

/** Host side of a `host:container[:opts]` volume spec. */
export function volumeHostPath(volume: string): string {
  const [host] = volume.split(":");
  return host ?? volume;
}

/** Fix every additional Synapse volume whose host path exists. */
export async function fixAdditionalVolumes(ctx: RuntimeContext, volumes: readonly string[]): Promise<void> {
  for (const volume of volumes) {
    const hostPath = volumeHostPath(volume);
    if (existsSync(hostPath)) await fixPermissions(ctx, hostPath);
  }
}
