import { existsSync } from "node:fs";
import { mkdir, rename, rm } from "node:fs/promises";
import type { EnvironmentConfig, GenerateResult } from "../types.ts";
import { runEphemeral } from "../compose.ts";
import { SynapseEnvError } from "../errors.ts";
import { createLogger } from "../logger.ts";
import { fixAdditionalVolumes, fixPermissions } from "../permissions.ts";
import { deleteAt, patchYamlFile, setAt } from "../yaml.ts";
import type { YamlPatch } from "../yaml.ts";
import { HOOKSHOT_REGISTRATION_MOUNT } from "./compose.ts";
import { confirmOverwrite, skipped, written } from "./common.ts";
import type { GeneratorContext } from "./common.ts";

const logger = createLogger("generate");

export function synapseGenerateArgs(config: EnvironmentConfig): string[] {
  const script = [
    "python3 -m synapse.app.homeserver",
    "--config-path /data/homeserver.yaml",
    "--data-directory /data",
    "--generate-config",
    "--report-stats no",
    `--server-name ${config.serverName}`,
  ].join(" ");
  return ["--entrypoint", "/bin/bash", "--volume", `${config.paths.synapseData}:/data:Z`, config.synapseImage, "-c", script];
}

export const SYNAPSE_LOG_PATCHES: readonly YamlPatch[] = [setAt("handlers.file.filename", "/data/homeserver.log")];

/** Turns the generated single-process sqlite config into the local topology. */
export function synapsePatches(config: EnvironmentConfig): YamlPatch[] {
  const patches: YamlPatch[] = [
    deleteAt("listeners[0].bind_addresses"),
    setAt("database.args.cp_max", 10),
    setAt("database.args.cp_min", 5),
    setAt("database.args.database", "synapse"),
    setAt("database.args.host", "postgres"),
    setAt("database.args.password", "password"),
    setAt("database.args.user", "synapse"),
    setAt("database.name", "psycopg2"),
    setAt("enable_registration", true),
    setAt("enable_registration_without_verification", true),
    setAt("listeners[0].bind_addresses[0]", "0.0.0.0"),
    setAt("listeners[0].port", 8448),
    setAt("log_config", "/data/log.config.yaml"),
    setAt("password_config.pepper", "s3cr3tP3pp3r"),
    setAt("presence.enabled", config.synapseEnablePresence),
    setAt("suppress_key_server_warning", true),
    setAt("trusted_key_servers[0].accept_keys_insecurely", true),
    setAt("user_directory.enabled", true),
    setAt("user_directory.prefer_local_users", true),
    setAt("user_directory.search_all_users", true),
  ];

  if (config.services.hookshot.enabled) {
    patches.push(setAt("app_service_config_files[0]", HOOKSHOT_REGISTRATION_MOUNT));
    if (config.hookshotEncryption) {
      patches.push(
        setAt("experimental_features.msc2409_to_device_messages_enabled", true),
        setAt("experimental_features.msc3202_device_masquerading", true),
        setAt("experimental_features.msc3202_transaction_extensions", true)
      );
    }
  }
  return patches;
}

/**
 * Create the Synapse data directory on first use and hand bind-mounted
 * directories to the Synapse UID.
 */
export async function ensureSynapseDirectories(ctx: GeneratorContext): Promise<void> {
  const { synapseData } = ctx.config.paths;
  if (!existsSync(synapseData)) {
    await mkdir(synapseData, { recursive: true });
    await fixPermissions(ctx.runtime, synapseData);
  }
  await fixAdditionalVolumes(ctx.runtime, ctx.config.synapseAdditionalVolumes);
}

export async function generateSynapse(ctx: GeneratorContext): Promise<GenerateResult> {
  const { config } = ctx;
  const { synapseData, synapseConfigFile, synapseGeneratedLogConfigFile, synapseLogConfigFile } = config.paths;
  const files = [synapseConfigFile, synapseLogConfigFile];

  await ensureSynapseDirectories(ctx);
  if (!(await confirmOverwrite(ctx, files))) return skipped("synapse", files);

  await rm(synapseConfigFile, { force: true });
  await rm(synapseLogConfigFile, { force: true });

  logger.info("generating synapse config", { image: config.synapseImage, serverName: config.serverName });
  await runEphemeral(ctx.runtime, synapseGenerateArgs(config));
  await fixPermissions(ctx.runtime, synapseData);

  if (!existsSync(synapseConfigFile) || !existsSync(synapseGeneratedLogConfigFile)) {
    throw new SynapseEnvError("generate_failed", `synapse did not generate ${synapseConfigFile} and ${synapseGeneratedLogConfigFile}`);
  }
  await rename(synapseGeneratedLogConfigFile, synapseLogConfigFile);

  await patchYamlFile(synapseLogConfigFile, SYNAPSE_LOG_PATCHES);
  await patchYamlFile(synapseConfigFile, synapsePatches(config));
  return written("synapse", files);
}
