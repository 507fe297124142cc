import type { EnvironmentConfig } from "@synapse-env/lib/types.ts";
import { formatLinks, serviceLinks } from "@synapse-env/lib/links.ts";
import { log } from "@synapse-env/lib/ui.ts";

export function links(config: EnvironmentConfig): void {
  log(formatLinks(serviceLinks(config)));
}
