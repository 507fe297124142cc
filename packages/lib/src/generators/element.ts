import { mkdir, writeFile } from "node:fs/promises";
import type { EnvironmentConfig, GenerateResult } from "../types.ts";
import { readJsonAsset } from "../assets.ts";
import { MANAGED_MARKER } from "../yaml.ts";
import { confirmOverwrite, skipped, written } from "./common.ts";
import type { GeneratorContext } from "./common.ts";

/**
 * Element Web config.json: the shipped base configuration pointed at the
 * local homeserver. JSON has no comments, so the marker is a
 * `<project>_notice` key placed first.
 */
export function buildElementConfig(config: EnvironmentConfig, base: Record<string, unknown>): Record<string, unknown> {
  const homeserverUrl = `http://${config.synapseHost}:${config.listenPort}`;
  const identity = base.default_server_config;
  const identityServer =
    typeof identity === "object" && identity !== null && "m.identity_server" in identity ? identity["m.identity_server"] : undefined;

  return {
    [`${config.project}_notice`]: MANAGED_MARKER,
    ...base,
    default_server_config: {
      "m.homeserver": { base_url: homeserverUrl, server_name: config.serverName },
      ...(identityServer === undefined ? {} : { "m.identity_server": identityServer }),
    },
    enable_presence_by_hs_url: {
      [homeserverUrl]: config.synapseEnablePresence,
      [`http://${config.serverName}`]: config.synapseEnablePresence,
    },
    room_directory: { servers: [config.serverName] },
  };
}

export async function generateElement(ctx: GeneratorContext): Promise<GenerateResult> {
  const file = ctx.config.paths.elementConfigFile;
  if (!(await confirmOverwrite(ctx, [file]))) return skipped("element", [file]);

  const base = await readJsonAsset("element/config.json");
  await mkdir(ctx.config.workDir, { recursive: true });
  await writeFile(file, `${JSON.stringify(buildElementConfig(ctx.config, base), null, 4)}\n`);
  return written("element", [file]);
}
