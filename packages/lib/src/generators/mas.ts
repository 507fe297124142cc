import { existsSync } from "node:fs";
import { mkdir, rm, writeFile } from "node:fs/promises";
import type { EnvironmentConfig, GenerateResult } from "../types.ts";
import { runEphemeral } from "../compose.ts";
import { createLogger } from "../logger.ts";
import { appendAt, applyPatches, deleteAt, markManaged, parseYamlDocument, patchYamlFile, setAt, stringifyYamlDocument } from "../yaml.ts";
import type { YamlPatch } from "../yaml.ts";
import { confirmOverwrite, disabled, skipped, written } from "./common.ts";
import type { GeneratorContext } from "./common.ts";

const logger = createLogger("generate");

/** Client Synapse authenticates to MAS with. */
export const SYNAPSE_CLIENT_ID = "0000000000000000000SYNAPSE";
/** Client used by the admin API's Swagger UI. */
export const SWAGGER_CLIENT_ID = "01JTTHHQBMKE8W3VCXRVFVW04P";

export function masPublicUrl(config: EnvironmentConfig): string {
  return `http://${config.services.mas.host}:${config.listenPort}`;
}

/** `config generate` logs to the same stream it prints the config on. */
export function stripLogLines(output: string): string {
  return output
    .split("\n")
    .filter((line) => !line.includes("INFO"))
    .join("\n");
}

export function masPatches(config: EnvironmentConfig): YamlPatch[] {
  const publicUrl = masPublicUrl(config);
  const patches: YamlPatch[] = [
    deleteAt("http.trusted_proxies"),
    deleteAt("http.listeners[0].binds[0]"),
    deleteAt("database"),
    setAt("account.password_registration_enabled", true),
    setAt("clients[0].client_auth_method", "client_secret_basic"),
    setAt("clients[0].client_id", SYNAPSE_CLIENT_ID),
    setAt("clients[0].client_secret", "secret"),
    setAt("clients[1].client_auth_method", "client_secret_post"),
    setAt("clients[1].client_id", SWAGGER_CLIENT_ID),
    setAt("clients[1].client_secret", "secret"),
    setAt("clients[1].redirect_uris[0]", "https://element-hq.github.io/matrix-authentication-service/api/oauth2-redirect.html"),
    setAt("clients[1].redirect_uris[0]", `${publicUrl}/api/doc/oauth2-callback`),
    setAt("database.database", "mas"),
    setAt("database.host", "mas-postgres"),
    setAt("database.password", "password"),
    setAt("database.port", 5432),
    setAt("database.username", "mas"),
    setAt("experimental.access_token_ttl", 86400),
    setAt("experimental.compat_token_ttl", 86400),
    setAt("experimental.inactive_session_expiration.expire_compat_sessions", false),
    setAt("experimental.inactive_session_expiration.ttl", 86400),
    setAt("http.issuer", publicUrl),
    setAt("http.listeners[0].binds[0].host", "0.0.0.0"),
    setAt("http.listeners[0].binds[0].port", 8080),
    appendAt("http.listeners[0].resources", { name: "adminapi" }),
    setAt("http.public_base", publicUrl),
    setAt("http.trusted_proxies[0]", "0.0.0.0/0"),
    setAt("matrix.endpoint", "http://synapse:8448/"),
    setAt("matrix.kind", "synapse"),
    setAt("matrix.homeserver", config.serverName),
    setAt("matrix.secret", "secret"),
    setAt("passwords.minimum_complexity", 0),
    setAt("policy.client_registration.allow_host_mismatch", true),
    setAt("policy.client_registration.allow_insecure_uris", true),
    setAt("policy.client_registration.allow_missing_client_uri", true),
    setAt("policy.data.admin_clients[0]", SYNAPSE_CLIENT_ID),
    setAt("policy.data.admin_clients[1]", SWAGGER_CLIENT_ID),
    setAt("policy.data.admin_users[0]", "admin"),
  ];

  if (config.services.mailhog.enabled) {
    const from = `mas@${config.serverName}`;
    patches.push(
      setAt("email.from", from),
      setAt("email.hostname", "mailhog"),
      setAt("email.mode", "plain"),
      setAt("email.port", 1025),
      setAt("email.reply_to", from),
      setAt("email.transport", "smtp")
    );
  }
  return patches;
}

/** Hand Synapse's authentication over to MAS. */
export const MAS_HOMESERVER_PATCHES: readonly YamlPatch[] = [
  setAt("enable_registration", false),
  setAt("matrix_authentication_service.enabled", true),
  setAt("matrix_authentication_service.endpoint", "http://mas:8080/"),
  setAt("matrix_authentication_service.secret", "secret"),
];

export async function generateMas(ctx: GeneratorContext): Promise<GenerateResult> {
  const { config } = ctx;
  if (!config.services.mas.enabled) return disabled("mas");

  const { masConfigFile, synapseConfigFile } = config.paths;
  if (!(await confirmOverwrite(ctx, [masConfigFile]))) return skipped("mas", [masConfigFile]);

  await rm(masConfigFile, { force: true });
  logger.info("generating mas config", { image: config.services.mas.image });
  const output = await runEphemeral(ctx.runtime, [config.services.mas.image, "config", "generate"]);

  const doc = parseYamlDocument(stripLogLines(output), "mas config generate output");
  applyPatches(doc, masPatches(config));
  markManaged(doc);
  await mkdir(config.workDir, { recursive: true });
  await writeFile(masConfigFile, stringifyYamlDocument(doc));

  if (!existsSync(synapseConfigFile)) {
    logger.warn("homeserver config missing; MAS delegation not applied", { file: synapseConfigFile });
    return written("mas", [masConfigFile]);
  }
  await patchYamlFile(synapseConfigFile, MAS_HOMESERVER_PATCHES);
  return written("mas", [masConfigFile, synapseConfigFile]);
}
