import { copyFile, mkdir, rm, writeFile } from "node:fs/promises";
import { Document } from "yaml";
import type { EnvironmentConfig, GenerateResult } from "../types.ts";
import { assetPath } from "../assets.ts";
import { fixPermissions } from "../permissions.ts";
import { applyPatches, markManaged, setAt, stringifyManagedYaml, stringifyYamlDocument } from "../yaml.ts";
import type { YamlPatch } from "../yaml.ts";
import { confirmOverwrite, disabled, skipped, written } from "./common.ts";
import type { GeneratorContext } from "./common.ts";

export const HOOKSHOT_AS_TOKEN = "hookshotastoken";
export const HOOKSHOT_HS_TOKEN = "hookshothstoken";

export function buildHookshotConfig(config: EnvironmentConfig): Record<string, unknown> {
  const publicBase = `http://${config.services.hookshot.host}:${config.listenPort}`;
  return {
    bot: { displayname: "Hookshot" },
    bridge: {
      bindAddress: "0.0.0.0",
      domain: config.serverName,
      mediaUrl: `http://${config.synapseHost}:${config.listenPort}`,
      port: 9993,
      url: "http://synapse:8448",
    },
    cache: { redisUri: "redis://redis:6379" },
    feeds: { enabled: true, pollIntervalSeconds: 600, pollTimeoutSeconds: 30 },
    generic: {
      allowJsTransformationFunctions: true,
      enableHttpGet: false,
      enabled: true,
      outbound: true,
      urlPrefix: `${publicBase}/webhook/`,
      userIdPrefix: "_webhooks_",
      waitForComplete: false,
    },
    listeners: [
      { bindAddress: "0.0.0.0", port: 9993, resources: ["webhooks", "widgets"] },
      { bindAddress: "0.0.0.0", port: 9101, resources: ["metrics"] },
    ],
    logging: { colorize: true, json: false, level: "info", timestampFormat: "HH:mm:ss:SSS" },
    metrics: { enabled: true },
    passFile: "/data/passkey.pem",
    permissions: [{ actor: "*", services: [{ level: "admin", service: "*" }] }],
    widgets: {
      addToAdminRooms: false,
      branding: { widgetTitle: "Hookshot Configuration" },
      disallowedIpRanges: [],
      openIdOverrides: { [config.serverName]: "http://synapse:8448" },
      publicUrl: `${publicBase}/widgetapi/v1/static/`,
      roomSetupWidget: { addOnInvite: false },
    },
  };
}

export function hookshotConfigPatches(config: EnvironmentConfig): YamlPatch[] {
  return config.hookshotEncryption ? [setAt("encryption.storagePath", "/encryption")] : [];
}

/** Application service registration Synapse loads from /appservices. */
export function buildHookshotRegistration(config: EnvironmentConfig): Record<string, unknown> {
  return {
    as_token: HOOKSHOT_AS_TOKEN,
    "de.sorunome.msc2409.push_ephemeral": true,
    hs_token: HOOKSHOT_HS_TOKEN,
    id: "hookshot",
    namespaces: {
      rooms: [],
      users: [{ exclusive: true, regex: `@_webhooks_.*:${config.serverName}` }],
    },
    "org.matrix.msc3202": true,
    push_ephemeral: true,
    rate_limited: false,
    sender_localpart: "hookshot",
    url: "http://hookshot:9993",
  };
}

export function renderHookshotConfig(config: EnvironmentConfig): string {
  const doc = new Document(buildHookshotConfig(config));
  applyPatches(doc, hookshotConfigPatches(config));
  markManaged(doc);
  return stringifyYamlDocument(doc);
}

/**
 * Recreate the Hookshot directory from scratch: bridge config,
 * registration and the static test passkey.
 */
export async function generateHookshot(ctx: GeneratorContext): Promise<GenerateResult> {
  const { config } = ctx;
  if (!config.services.hookshot.enabled) return disabled("hookshot");

  const { hookshotData, hookshotConfigFile, hookshotRegistrationFile, hookshotPasskeyFile } = config.paths;
  const files = [hookshotConfigFile, hookshotRegistrationFile];
  if (!(await confirmOverwrite(ctx, files))) return skipped("hookshot", files);

  await rm(hookshotData, { recursive: true, force: true });
  await mkdir(hookshotData, { recursive: true });
  await writeFile(hookshotConfigFile, renderHookshotConfig(config));
  await writeFile(hookshotRegistrationFile, stringifyManagedYaml(buildHookshotRegistration(config)));
  await copyFile(assetPath("hookshot/passkey.pem"), hookshotPasskeyFile);
  await fixPermissions(ctx.runtime, hookshotData);

  return written("hookshot", [...files, hookshotPasskeyFile]);
}
