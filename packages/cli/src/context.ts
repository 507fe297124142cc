import type { CommandRunner, EnvironmentConfig, Prompter } from "@synapse-env/lib/types.ts";
import type { ProgramLookup } from "@synapse-env/lib/runtime.ts";
import { resolveComposeConfig } from "@synapse-env/lib/runtime.ts";
import { ensurePrerequisites } from "@synapse-env/lib/preflight.ts";
import { runCommand } from "@synapse-env/lib/exec.ts";
import { ask } from "@synapse-env/lib/ui.ts";
import type { CommandContext } from "./types.ts";

/** Seams the tests replace; each defaults to the real thing. */
export type ContextOptions = {
  runner?: CommandRunner;
  prompt?: Prompter;
  lookup?: ProgramLookup;
};

/**
 * Check prerequisites and resolve the runtime. Fails with every missing
 * program listed before any command runs.
 */
export function createCommandContext(config: EnvironmentConfig, options: ContextOptions = {}): CommandContext {
  const platform = ensurePrerequisites(config, options.lookup);
  return {
    config,
    runtime: {
      platform,
      compose: resolveComposeConfig(config, platform, options.lookup),
      runner: options.runner ?? runCommand,
    },
    prompt: options.prompt ?? ask,
  };
}
