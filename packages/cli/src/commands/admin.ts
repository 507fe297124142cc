import { execInContainer } from "@synapse-env/lib/compose.ts";
import { containerName } from "@synapse-env/lib/paths.ts";
import { info, green, dim } from "@synapse-env/lib/ui.ts";
import type { CommandContext } from "../types.ts";

export const ADMIN_USER = "admin";
const ADMIN_PASSWORD = "admin";

/** Register admin/admin through MAS when it owns accounts, else in Synapse. */
export async function createAdminAccount(ctx: CommandContext): Promise<void> {
  const { config, runtime } = ctx;
  if (config.services.mas.enabled) {
    await execInContainer(runtime, containerName(config.project, "mas"), [
      "mas-cli",
      "manage",
      "register-user",
      "--admin",
      "--email",
      "admin@example.com",
      "--ignore-password-complexity",
      "--password",
      ADMIN_PASSWORD,
      "--yes",
      ADMIN_USER,
    ]);
  } else {
    await execInContainer(runtime, containerName(config.project, "synapse"), [
      "/bin/bash",
      "-c",
      `register_new_matrix_user --admin --config /data/homeserver.yaml --password ${ADMIN_PASSWORD} --user ${ADMIN_USER}`,
    ]);
  }
  info(green(`Created account ${ADMIN_USER}.`));
}

/** Compatibility tokens only exist under MAS. */
export async function createCompatibilityToken(ctx: CommandContext): Promise<void> {
  const { config, runtime } = ctx;
  if (!config.services.mas.enabled) {
    info(dim("MAS is disabled; no compatibility token needed."));
    return;
  }
  await execInContainer(runtime, containerName(config.project, "mas"), [
    "mas-cli",
    "manage",
    "issue-compatibility-token",
    "--yes-i-want-to-grant-synapse-admin-privileges",
    ADMIN_USER,
  ]);
}
