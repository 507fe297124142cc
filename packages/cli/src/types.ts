import type { GeneratorContext, GeneratorName } from "@synapse-env/lib/generators/common.ts";

/** Containers that can be restarted on their own. */
export type RestartTarget = "synapse" | "elementweb" | "hookshot" | "mas" | "nginx" | "synapseadmin";

export type LifecycleCommand =
  | { kind: "setup" }
  | { kind: "restart-all" }
  | { kind: "restart"; target: RestartTarget }
  | { kind: "stop" }
  | { kind: "delete" }
  | { kind: "pull" }
  | { kind: "links" }
  | { kind: "generate"; generator: GeneratorName }
  | { kind: "admin" }
  | { kind: "comp" }
  | { kind: "version" }
  | { kind: "help"; unknown?: string };

/** Config, runtime and prompter for commands that touch containers. */
export type CommandContext = GeneratorContext;

export type { GeneratorName };
