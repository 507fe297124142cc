import { existsSync } from "node:fs";
import type { EnvironmentConfig, GenerateResult, Prompter, RuntimeContext } from "../types.ts";
import { confirm } from "../ui.ts";
import { createLogger } from "../logger.ts";

const logger = createLogger("generate");

/** What every generator receives. */
export type GeneratorContext = {
  config: EnvironmentConfig;
  runtime: RuntimeContext;
  prompt: Prompter;
};

export type GeneratorName = "compose" | "nginx" | "element" | "hookshot" | "synapse" | "mas";

/**
 * Decide whether a generator may replace its output. Nothing on disk, or
 * `overwriteWithoutAsking`, means yes; otherwise the operator is asked once
 * for the whole set of files.
 */
export async function confirmOverwrite(ctx: GeneratorContext, files: readonly string[]): Promise<boolean> {
  if (!files.some((file) => existsSync(file))) return true;
  if (ctx.config.overwriteWithoutAsking) return true;
  return confirm(`Overwrite ${files.join(" and ")}?`, ctx.prompt);
}

export function written(generator: GeneratorName, files: string[]): GenerateResult {
  logger.info("generated", { generator, files });
  return { generator, status: "written", files };
}

export function skipped(generator: GeneratorName, files: string[]): GenerateResult {
  logger.info("kept existing files", { generator, files });
  return { generator, status: "skipped", files };
}

export function disabled(generator: GeneratorName): GenerateResult {
  logger.debug("service disabled", { generator });
  return { generator, status: "disabled", files: [] };
}
