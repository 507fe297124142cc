import { join } from "node:path";
import type { ContainerPlatform, EnvironmentConfig, OptionalServiceName, ServiceDescriptor } from "./types.ts";
import { parseBooleanValue, parseListValue, readEnvFile } from "./env.ts";
import { resolveGeneratedPaths, resolveProjectName, resolveWorkDir } from "./paths.ts";

export const CONFIG_FILE_NAME = "config.env";

export const DEFAULTS = {
  nginxImage: "docker.io/nginx:latest",
  ingressPort: "8080",
  serverName: "127.0.0.1",
  synapseHost: "127.0.0.10",
  masHost: "127.0.0.15",
  elementHost: "127.0.0.20",
  hookshotHost: "127.0.0.25",
  synapseAdminHost: "127.0.0.30",
  adminerHost: "127.0.0.35",
  mailhogHost: "127.0.0.40",
  synapseImage: "ghcr.io/element-hq/synapse:latest",
  synapseEnablePresence: true,
  enableMas: true,
  masImage: "ghcr.io/element-hq/matrix-authentication-service:latest",
  mailhogImage: "docker.io/mailhog/mailhog:latest",
  postgresImage: "docker.io/postgres:latest",
  enableAdminer: false,
  adminerImage: "docker.io/adminer:latest",
  enableElementWeb: true,
  elementImage: "ghcr.io/element-hq/element-web:latest",
  enableHookshot: false,
  hookshotEncryption: false,
  hookshotImage: "ghcr.io/matrix-org/matrix-hookshot:latest",
  redisImage: "docker.io/redis:latest",
  enableSynapseAdmin: true,
  synapseAdminImage: "ghcr.io/etkecc/synapse-admin:latest",
  overwriteWithoutAsking: false,
} as const;

function pick(env: Record<string, string>, key: string, fallback: string): string {
  const value = env[key];
  return value === undefined || value === "" ? fallback : value;
}

function parseRuntime(value: string | undefined): ContainerPlatform | undefined {
  if (value === "docker" || value === "podman") return value;
  return undefined;
}

function descriptor(enabled: boolean, image: string, host: string): ServiceDescriptor {
  return Object.freeze({ enabled, image, host });
}

/**
 * Build the configuration for one invocation from parsed config.env
 * entries. Every key left unset receives its default.
 */
export function buildEnvironmentConfig(
  env: Record<string, string>,
  workDir: string,
  configFile: string = join(workDir, CONFIG_FILE_NAME)
): EnvironmentConfig {
  const ingressPort = pick(env, "ingressPort", DEFAULTS.ingressPort);
  const serverName = pick(env, "serverName", DEFAULTS.serverName);
  const enableMas = parseBooleanValue(env.enableMas, DEFAULTS.enableMas);

  const services: Record<OptionalServiceName, ServiceDescriptor> = {
    adminer: descriptor(
      parseBooleanValue(env.enableAdminer, DEFAULTS.enableAdminer),
      pick(env, "adminerImage", DEFAULTS.adminerImage),
      pick(env, "adminerHost", DEFAULTS.adminerHost)
    ),
    elementweb: descriptor(
      parseBooleanValue(env.enableElementWeb, DEFAULTS.enableElementWeb),
      pick(env, "elementImage", DEFAULTS.elementImage),
      pick(env, "elementHost", DEFAULTS.elementHost)
    ),
    mas: descriptor(
      enableMas,
      pick(env, "masImage", DEFAULTS.masImage),
      pick(env, "masHost", DEFAULTS.masHost)
    ),
    hookshot: descriptor(
      parseBooleanValue(env.enableHookshot, DEFAULTS.enableHookshot),
      pick(env, "hookshotImage", DEFAULTS.hookshotImage),
      pick(env, "hookshotHost", DEFAULTS.hookshotHost)
    ),
    synapseadmin: descriptor(
      parseBooleanValue(env.enableSynapseAdmin, DEFAULTS.enableSynapseAdmin),
      pick(env, "synapseAdminImage", DEFAULTS.synapseAdminImage),
      pick(env, "synapseAdminHost", DEFAULTS.synapseAdminHost)
    ),
    // Mailhog follows MAS unless set explicitly
    mailhog: descriptor(
      parseBooleanValue(env.enableMailhog, enableMas),
      pick(env, "mailhogImage", DEFAULTS.mailhogImage),
      pick(env, "mailhogHost", DEFAULTS.mailhogHost)
    ),
  };

  const config: EnvironmentConfig = {
    workDir,
    project: resolveProjectName(workDir),
    configFile,
    containerRuntime: parseRuntime(env.containerRuntime),
    nginxImage: pick(env, "nginxImage", DEFAULTS.nginxImage),
    ingressPort,
    listenPort: pick(env, "listenPort", ingressPort),
    serverName,
    synapseHost: pick(env, "synapseHost", DEFAULTS.synapseHost),
    synapseImage: pick(env, "synapseImage", DEFAULTS.synapseImage),
    synapseEnablePresence: parseBooleanValue(env.synapseEnablePresence, DEFAULTS.synapseEnablePresence),
    synapseAdditionalVolumes: Object.freeze(parseListValue(env.synapseAdditionalVolumes)),
    postgresImage: pick(env, "postgresImage", DEFAULTS.postgresImage),
    redisImage: pick(env, "redisImage", DEFAULTS.redisImage),
    hookshotEncryption: parseBooleanValue(env.hookshotEncryption, DEFAULTS.hookshotEncryption),
    overwriteWithoutAsking: parseBooleanValue(env.overwriteWithoutAsking, DEFAULTS.overwriteWithoutAsking),
    services: Object.freeze(services),
    paths: Object.freeze(resolveGeneratedPaths(workDir, serverName)),
  };
  return Object.freeze(config);
}

/**
 * Load the environment configuration from `<workDir>/config.env`.
 * A missing file yields the defaults for every key.
 */
export function loadEnvironmentConfig(workDir: string = resolveWorkDir()): EnvironmentConfig {
  const configFile = join(workDir, CONFIG_FILE_NAME);
  return buildEnvironmentConfig(readEnvFile(configFile), workDir, configFile);
}
