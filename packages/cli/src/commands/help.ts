import { log, bold, dim } from "@synapse-env/lib/ui.ts";

export function printHelp(version: string): void {
  log(bold("synapse-env") + dim(` v${version}`));
  log("");
  log(bold("Usage:"));
  log("  synapse-env <command>");
  log("");
  log(bold("Commands:"));
  log("  setup                   Generate every config, pull images and start the environment");
  log("  restart-all, rsa        Regenerate configs (asking before overwrites) and recreate containers");
  log("  restart-synapse, rss    Restart Synapse");
  log("  restart-element, rse    Restart Element Web");
  log("  restart-hookshot, rsh   Restart Hookshot");
  log("  restart-mas, rsm        Restart MAS and sync its config");
  log("  restart-nginx, rsn      Restart Nginx");
  log("  restart-synapse-admin, rssa");
  log("                          Restart Synapse Admin");
  log("  stop                    Stop every container");
  log("  delete                  Remove containers, volumes and generated files");
  log("  pull                    Pull every image");
  log("  links                   Print the URL of every enabled service");
  log("  admin                   Create the admin/admin account");
  log("  comp                    Issue a MAS compatibility token for admin");
  log("  version                 Print version");
  log("  help                    Show this help");
  log("");
  log(bold("Generators:"));
  log("  gen-compose, gencom     compose.yml");
  log("  gen-element, genele     elementConfig.json");
  log("  gen-hookshot, genhook   hookshot/config.yml, registration.yml, passkey.pem");
  log("  gen-mas, genmas         masConfig.yaml");
  log("  gen-nginx, genng        nginx.conf");
  log("  gen-synapse, gensyn     synapse/homeserver.yaml, log.config.yaml");
  log("");
  log(bold("Configuration:"));
  log("  Settings are read from config.env in the work directory");
  log("  (SYNAPSE_ENV_HOME, or the current directory).");
}
