import { mkdir, writeFile } from "node:fs/promises";
import type { ComposeService, ComposeSpec } from "../compose-spec.ts";
import type { EnvironmentConfig, GenerateResult } from "../types.ts";
import { SynapseEnvError } from "../errors.ts";
import { containerName } from "../paths.ts";
import { stringifyManagedYaml } from "../yaml.ts";
import { confirmOverwrite, skipped, written } from "./common.ts";
import type { GeneratorContext } from "./common.ts";

/** Declared whether or not the services using them are enabled. */
export const NAMED_VOLUMES = ["hookshotEncryptionData", "masPostgresData", "postgresData", "redisData"] as const;

export type NamedVolume = (typeof NAMED_VOLUMES)[number];

export const HOOKSHOT_REGISTRATION_MOUNT = "/appservices/hookshot.yaml";

/**
 * Hookshot's end-to-bridge encryption cannot work with MAS delegated auth
 * (matrix-org/matrix-hookshot#980).
 */
export function assertCompatibleFeatures(config: EnvironmentConfig): void {
  if (config.hookshotEncryption && config.services.mas.enabled) {
    throw new SynapseEnvError(
      "incompatible_features",
      "Hookshot encryption is not compatible with MAS. https://github.com/matrix-org/matrix-hookshot/issues/980"
    );
  }
}

function synapseVolumes(config: EnvironmentConfig): string[] {
  const extra = [...config.synapseAdditionalVolumes];
  if (config.services.hookshot.enabled) {
    extra.push(`${config.paths.hookshotRegistrationFile}:${HOOKSHOT_REGISTRATION_MOUNT}`);
  }
  return [`${config.paths.synapseData}:/data:Z`, ...extra.map((volume) => `${volume}:Z`)];
}

/**
 * Build the compose manifest. Core services always come first; optional
 * services follow in a fixed order, each present only when enabled.
 */
export function buildComposeSpec(config: EnvironmentConfig): ComposeSpec {
  assertCompatibleFeatures(config);

  const { project, paths, services: optional } = config;
  const service = (name: string, image: string, rest: Omit<ComposeService, "container_name" | "image" | "restart">): [string, ComposeService] => [
    name,
    { container_name: containerName(project, name), image, restart: "unless-stopped", ...rest },
  ];

  const entries: [string, ComposeService][] = [
    service("nginx", config.nginxImage, {
      environment: ["NGINX_PORT=80"],
      ports: [`${config.ingressPort}:80`],
      volumes: [`${paths.nginxConfigFile}:/etc/nginx/conf.d/custom.conf`],
    }),
    service("synapse", config.synapseImage, {
      depends_on: ["postgres"],
      environment: ["SYNAPSE_CONFIG_PATH=/data/homeserver.yaml"],
      ports: ["127.0.0.1:47601-47602:8008-8009/tcp", "127.0.0.1:47600:8448/tcp"],
      volumes: synapseVolumes(config),
    }),
    service("postgres", config.postgresImage, {
      environment: [
        "POSTGRES_INITDB_ARGS=--encoding=UTF-8 --lc-collate=C --lc-ctype=C",
        "POSTGRES_PASSWORD=password",
        "POSTGRES_USER=synapse",
      ],
      ports: ["127.0.0.1:47610:5432/tcp"],
      volumes: ["postgresData:/var/lib/postgresql/data"],
    }),
  ];

  if (optional.adminer.enabled) {
    entries.push(
      service("adminer", optional.adminer.image, {
        environment: ["ADMINER_DEFAULT_SERVER=postgres"],
        ports: ["127.0.0.1:47603:8080/tcp"],
      })
    );
  }

  if (optional.elementweb.enabled) {
    entries.push(
      service("elementweb", optional.elementweb.image, {
        environment: ["ELEMENT_WEB_PORT=8080"],
        ports: ["127.0.0.1:47604:8080/tcp"],
        volumes: [`${paths.elementConfigFile}:/app/config.json:Z`],
      })
    );
  }

  if (optional.mas.enabled) {
    entries.push(
      service("mas", optional.mas.image, {
        environment: ["MAS_CONFIG=/config.yaml"],
        ports: ["127.0.0.1:47605:8080/tcp"],
        volumes: [`${paths.masConfigFile}:/config.yaml:Z`],
      }),
      service("mas-postgres", config.postgresImage, {
        environment: ["POSTGRES_PASSWORD=password", "POSTGRES_USER=mas"],
        ports: ["127.0.0.1:47609:5432/tcp"],
        volumes: ["masPostgresData:/var/lib/postgresql/data"],
      })
    );
  }

  if (optional.mailhog.enabled) {
    entries.push(service("mailhog", optional.mailhog.image, { ports: ["127.0.0.1:47612:8025"] }));
  }

  if (optional.synapseadmin.enabled) {
    entries.push(
      service("synapseadmin", optional.synapseadmin.image, {
        environment: ["SERVER_PORT=8080"],
        ports: ["127.0.0.1:47611:8080/tcp"],
      })
    );
  }

  if (optional.hookshot.enabled) {
    entries.push(
      service("hookshot", optional.hookshot.image, {
        ports: ["127.0.0.1:47607:9993", "127.0.0.1:47606:9993"],
        volumes: [`${paths.hookshotData}:/data:Z`, "hookshotEncryptionData:/encryption"],
      }),
      service("redis", config.redisImage, {
        command: "redis-server --save 20 1 --loglevel warning",
        ports: ["127.0.0.1:47608:6379"],
        volumes: ["redisData:/data"],
      })
    );
  }

  return {
    services: Object.fromEntries(entries),
    volumes: Object.fromEntries(NAMED_VOLUMES.map((name) => [name, null])),
  };
}

/** Top-level keys stay in insertion order so services read in start order. */
export function stringifyComposeSpec(spec: ComposeSpec): string {
  return stringifyManagedYaml({ volumes: spec.volumes, services: spec.services });
}

export async function generateCompose(ctx: GeneratorContext): Promise<GenerateResult> {
  const spec = buildComposeSpec(ctx.config);
  const file = ctx.config.paths.composeFile;
  if (!(await confirmOverwrite(ctx, [file]))) return skipped("compose", [file]);

  await mkdir(ctx.config.workDir, { recursive: true });
  await writeFile(file, stringifyComposeSpec(spec));
  return written("compose", [file]);
}
