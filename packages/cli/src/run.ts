import { readFileSync } from "node:fs";
import { loadEnvironmentConfig } from "@synapse-env/lib/config.ts";
import { createLogger } from "@synapse-env/lib/logger.ts";
import { log, warn } from "@synapse-env/lib/ui.ts";
import type { LifecycleCommand } from "./types.ts";
import type { ContextOptions } from "./context.ts";
import { createCommandContext } from "./context.ts";
import { createAdminAccount, createCompatibilityToken } from "./commands/admin.ts";
import { deleteEnvironment } from "./commands/delete.ts";
import { generate } from "./commands/generate.ts";
import { printHelp } from "./commands/help.ts";
import { links } from "./commands/links.ts";
import { pull } from "./commands/pull.ts";
import { restartService } from "./commands/restart.ts";
import { restartAll, setup } from "./commands/setup.ts";
import { stop } from "./commands/stop.ts";

const logger = createLogger("cli");

export type LifecycleOptions = ContextOptions & {
  /** Defaults to SYNAPSE_ENV_HOME or the current directory. */
  workDir?: string;
};

export function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

export async function runLifecycleCommand(command: LifecycleCommand, options: LifecycleOptions = {}): Promise<void> {
  logger.debug("command", { command });

  switch (command.kind) {
    case "help":
      if (command.unknown !== undefined) warn(`Unknown command: ${command.unknown}`);
      printHelp(readVersion());
      return;
    case "version":
      log(`synapse-env v${readVersion()}`);
      return;
    case "links":
      links(loadEnvironmentConfig(options.workDir));
      return;
  }

  const ctx = createCommandContext(loadEnvironmentConfig(options.workDir), options);
  switch (command.kind) {
    case "setup":
      return setup(ctx);
    case "restart-all":
      return restartAll(ctx);
    case "restart":
      return restartService(ctx, command.target);
    case "stop":
      return stop(ctx);
    case "delete":
      await deleteEnvironment(ctx);
      return;
    case "pull":
      return pull(ctx);
    case "generate":
      await generate(ctx, command.generator);
      return;
    case "admin":
      return createAdminAccount(ctx);
    case "comp":
      return createCompatibilityToken(ctx);
  }
}
