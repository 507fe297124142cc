import type { GenerateResult } from "@synapse-env/lib/types.ts";
import { assertCompatibleFeatures, generateCompose } from "@synapse-env/lib/generators/compose.ts";
import { generateElement } from "@synapse-env/lib/generators/element.ts";
import { generateHookshot } from "@synapse-env/lib/generators/hookshot.ts";
import { generateMas } from "@synapse-env/lib/generators/mas.ts";
import { generateNginx } from "@synapse-env/lib/generators/nginx.ts";
import { generateSynapse } from "@synapse-env/lib/generators/synapse.ts";
import { info, dim } from "@synapse-env/lib/ui.ts";
import type { CommandContext, GeneratorName } from "../types.ts";

const GENERATORS: Record<GeneratorName, (ctx: CommandContext) => Promise<GenerateResult>> = {
  compose: generateCompose,
  nginx: generateNginx,
  element: generateElement,
  hookshot: generateHookshot,
  synapse: generateSynapse,
  mas: generateMas,
};

export function reportGenerated(result: GenerateResult): void {
  switch (result.status) {
    case "written":
      info(`Wrote ${result.files.join(", ")}`);
      return;
    case "skipped":
      info(dim(`Kept ${result.files.join(", ")}`));
      return;
    case "disabled":
      info(dim(`Skipped ${result.generator} (disabled in config.env)`));
      return;
  }
}

/** Refuses incompatible features before the generator touches anything. */
export async function generate(ctx: CommandContext, name: GeneratorName): Promise<GenerateResult> {
  assertCompatibleFeatures(ctx.config);
  const result = await GENERATORS[name](ctx);
  reportGenerated(result);
  return result;
}
