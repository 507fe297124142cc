import type { EnvironmentConfig } from "./types.ts";

export type ServiceLink = { label: string; url: string };

const LABEL_WIDTH = 21;

/** Reachable addresses of the homeserver and every enabled service. */
export function serviceLinks(config: EnvironmentConfig): ServiceLink[] {
  const { services, listenPort } = config;
  const url = (host: string): string => `http://${host}:${listenPort}`;
  const homeserver = url(config.synapseHost);

  const links: ServiceLink[] = [
    { label: "Synapse server name", url: config.serverName },
    { label: "Synapse endpoint", url: homeserver },
  ];
  if (services.adminer.enabled) links.push({ label: "Adminer", url: url(services.adminer.host) });
  if (services.elementweb.enabled) links.push({ label: "Element Web", url: url(services.elementweb.host) });
  if (services.mas.enabled) {
    links.push({ label: "MAS", url: url(services.mas.host) });
    links.push({ label: "MAS Swagger UI", url: `${url(services.mas.host)}/api/doc/` });
  }
  if (services.mailhog.enabled) links.push({ label: "Mailhog", url: url(services.mailhog.host) });
  if (services.hookshot.enabled) links.push({ label: "Hookshot webhooks", url: `${url(services.hookshot.host)}/webhook/` });
  if (services.synapseadmin.enabled) {
    links.push({
      label: "Synapse Admin",
      url: `${url(services.synapseadmin.host)}?username=admin&password=admin&server=${homeserver}`,
    });
  }
  return links;
}

export function formatLinks(links: readonly ServiceLink[]): string {
  const lines = links.map((link) => `- ${`${link.label}:`.padEnd(LABEL_WIDTH)}${link.url}`);
  return ["Links:", "", ...lines].join("\n");
}
