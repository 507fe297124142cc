import type { GeneratorName, LifecycleCommand, RestartTarget } from "./types.ts";

const RESTART_COMMANDS = new Map<string, RestartTarget>([
  ["restart-synapse", "synapse"],
  ["rss", "synapse"],
  ["restart-element", "elementweb"],
  ["rse", "elementweb"],
  ["restart-hookshot", "hookshot"],
  ["rsh", "hookshot"],
  ["restart-mas", "mas"],
  ["rsm", "mas"],
  ["restart-nginx", "nginx"],
  ["rsn", "nginx"],
  ["restart-synapse-admin", "synapseadmin"],
  ["rssa", "synapseadmin"],
]);

const GENERATE_COMMANDS = new Map<string, GeneratorName>([
  ["gen-compose", "compose"],
  ["gencom", "compose"],
  ["gen-element", "element"],
  ["genele", "element"],
  ["gen-hookshot", "hookshot"],
  ["genhook", "hookshot"],
  ["gen-mas", "mas"],
  ["genmas", "mas"],
  ["gen-nginx", "nginx"],
  ["genng", "nginx"],
  ["gen-synapse", "synapse"],
  ["gensyn", "synapse"],
]);

/** Map the first CLI argument to a command. Unrecognized input asks for help. */
export function parseCommand(argv: readonly string[]): LifecycleCommand {
  const [name] = argv;
  if (name === undefined) return { kind: "help" };
  switch (name) {
    case "help":
    case "--help":
    case "-h":
      return { kind: "help" };
    case "version":
    case "--version":
    case "-v":
      return { kind: "version" };
    case "setup":
      return { kind: "setup" };
    case "restart-all":
    case "rsa":
      return { kind: "restart-all" };
    case "stop":
      return { kind: "stop" };
    case "delete":
      return { kind: "delete" };
    case "pull":
      return { kind: "pull" };
    case "links":
      return { kind: "links" };
    case "admin":
      return { kind: "admin" };
    case "comp":
      return { kind: "comp" };
  }

  const target = RESTART_COMMANDS.get(name);
  if (target) return { kind: "restart", target };
  const generator = GENERATE_COMMANDS.get(name);
  if (generator) return { kind: "generate", generator };
  return { kind: "help", unknown: name };
}
