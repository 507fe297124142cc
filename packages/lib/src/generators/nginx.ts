/**
 * Nginx virtual-host configuration. Every service is reached on the same
 * ingress port and told apart by its own loopback address, so each server
 * block is keyed by `server_name`.
 */
import { mkdir, writeFile } from "node:fs/promises";
import type { EnvironmentConfig, GenerateResult } from "../types.ts";
import { MANAGED_MARKER } from "../yaml.ts";
import { confirmOverwrite, skipped, written } from "./common.ts";
import type { GeneratorContext } from "./common.ts";

export type NginxLocation = {
  /** Everything between `location` and the opening brace. */
  match: string;
  /** Directives without their trailing semicolon. */
  directives: string[];
};

export type NginxServer = {
  title: string;
  serverName: string;
  locations: NginxLocation[];
};

const INDENT = "    ";

const SECURITY_HEADERS = [
  `add_header Content-Security-Policy "frame-ancestors 'self'"`,
  "add_header X-Content-Type-Options nosniff",
  "add_header X-Frame-Options SAMEORIGIN",
  `add_header X-XSS-Protection "1; mode=block"`,
];

const SYNAPSE_LOCATION: NginxLocation = {
  match: "~ ^(/_matrix|/_synapse/client|/_synapse/admin)",
  directives: [
    "proxy_pass http://synapse:8448",
    "client_max_body_size 50M",
    "proxy_http_version 1.1",
    "proxy_set_header Host $host:$server_port",
    "proxy_set_header X-Forwarded-For $remote_addr",
    "proxy_set_header X-Forwarded-Proto $scheme",
  ],
};

/** Login, logout and refresh go to MAS once it owns authentication. */
const MAS_AUTH_LOCATION: NginxLocation = {
  match: "~ ^/_matrix/client/(.*)/(login|logout|refresh)",
  directives: ["proxy_pass http://mas:8080", "proxy_http_version 1.1", "proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for"],
};

function proxiedServer(title: string, serverName: string, upstream: string): NginxServer {
  return {
    title,
    serverName,
    locations: [
      {
        match: "/",
        directives: [
          `proxy_pass ${upstream}`,
          ...SECURITY_HEADERS,
          "proxy_http_version 1.1",
          "proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for",
        ],
      },
    ],
  };
}

export function buildNginxServers(config: EnvironmentConfig): NginxServer[] {
  const { services, listenPort, synapseHost } = config;
  const homeserver = `${synapseHost}:${listenPort}`;

  const servers: NginxServer[] = [
    {
      title: "Well-known",
      serverName: config.serverName,
      locations: [
        {
          match: "/.well-known/matrix/client",
          directives: [
            `return 200 '${JSON.stringify({ "m.homeserver": { base_url: `http://${homeserver}` } })}'`,
            "add_header Content-Type application/json",
            "add_header 'Access-Control-Allow-Origin' '*'",
          ],
        },
        {
          match: "/.well-known/matrix/server",
          directives: [`return 200 '${JSON.stringify({ "m.server": homeserver })}'`, "add_header Content-Type application/json"],
        },
      ],
    },
    {
      title: "Synapse",
      serverName: synapseHost,
      locations: services.mas.enabled ? [MAS_AUTH_LOCATION, SYNAPSE_LOCATION] : [SYNAPSE_LOCATION],
    },
  ];

  if (services.mas.enabled) servers.push(proxiedServer("MAS", services.mas.host, "http://mas:8080"));
  if (services.mailhog.enabled) servers.push(proxiedServer("Mailhog", services.mailhog.host, "http://mailhog:8025"));
  if (services.elementweb.enabled) servers.push(proxiedServer("Element Web", services.elementweb.host, "http://elementweb:8080"));
  if (services.hookshot.enabled) servers.push(proxiedServer("Hookshot", services.hookshot.host, "http://hookshot:9993"));
  if (services.synapseadmin.enabled) {
    servers.push(proxiedServer("Synapse Admin", services.synapseadmin.host, "http://synapseadmin:8080"));
  }
  if (services.adminer.enabled) servers.push(proxiedServer("Adminer", services.adminer.host, "http://adminer:8080"));
  return servers;
}

export function renderNginxServer(server: NginxServer): string {
  const lines = [`# ${server.title}`, "server {", `${INDENT}listen       80;`, `${INDENT}server_name  ${server.serverName};`];
  for (const location of server.locations) {
    lines.push(`${INDENT}location ${location.match} {`);
    for (const directive of location.directives) lines.push(`${INDENT}${INDENT}${directive};`);
    lines.push(`${INDENT}}`);
  }
  lines.push("}");
  return lines.join("\n");
}

export function renderNginxConfig(config: EnvironmentConfig): string {
  const blocks = buildNginxServers(config).map(renderNginxServer);
  return [`# ${MANAGED_MARKER}`, ...blocks].join("\n") + "\n";
}

export async function generateNginx(ctx: GeneratorContext): Promise<GenerateResult> {
  const file = ctx.config.paths.nginxConfigFile;
  if (!(await confirmOverwrite(ctx, [file]))) return skipped("nginx", [file]);

  await mkdir(ctx.config.workDir, { recursive: true });
  await writeFile(file, renderNginxConfig(ctx.config));
  return written("nginx", [file]);
}
