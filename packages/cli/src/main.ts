#!/usr/bin/env tsx
import { SynapseEnvError } from "@synapse-env/lib/errors.ts";
import { error } from "@synapse-env/lib/ui.ts";
import { parseCommand } from "./args.ts";
import { runLifecycleCommand } from "./run.ts";

async function main(): Promise<void> {
  try {
    await runLifecycleCommand(parseCommand(process.argv.slice(2)));
  } catch (err) {
    if (err instanceof SynapseEnvError) {
      error(err.message);
      process.exit(err.exitStatus);
    }
    error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

void main();
