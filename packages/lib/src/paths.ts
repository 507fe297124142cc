import { basename, join, resolve } from "node:path";
import type { GeneratedPaths } from "./types.ts";

/** Directory holding config.env and every generated file. */
export function resolveWorkDir(): string {
  return resolve(process.env.SYNAPSE_ENV_HOME || process.cwd());
}

export function resolveProjectName(workDir: string): string {
  return basename(workDir);
}

export function resolveGeneratedPaths(workDir: string, serverName: string): GeneratedPaths {
  const synapseData = join(workDir, "synapse");
  const hookshotData = join(workDir, "hookshot");
  return {
    composeFile: join(workDir, "compose.yml"),
    nginxConfigFile: join(workDir, "nginx.conf"),
    elementConfigFile: join(workDir, "elementConfig.json"),
    masConfigFile: join(workDir, "masConfig.yaml"),
    synapseData,
    synapseConfigFile: join(synapseData, "homeserver.yaml"),
    synapseGeneratedLogConfigFile: join(synapseData, `${serverName}.log.config`),
    synapseLogConfigFile: join(synapseData, "log.config.yaml"),
    hookshotData,
    hookshotConfigFile: join(hookshotData, "config.yml"),
    hookshotRegistrationFile: join(hookshotData, "registration.yml"),
    hookshotPasskeyFile: join(hookshotData, "passkey.pem"),
  };
}

/** Container name compose assigns to a service of this project. */
export function containerName(project: string, service: string): string {
  return `${project}-${service}`;
}

/** Name compose gives a named volume of this project. */
export function volumeName(project: string, volume: string): string {
  return `${project}_${volume}`;
}
