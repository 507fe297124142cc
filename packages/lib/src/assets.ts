import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

/** Files shipped in packages/lib/assets. */
export type AssetName = "config.env.example" | "element/config.json" | "hookshot/passkey.pem";

const ASSETS_ROOT = new URL("../assets/", import.meta.url);

export function assetPath(name: AssetName): string {
  return fileURLToPath(new URL(name, ASSETS_ROOT));
}

export async function readAsset(name: AssetName): Promise<string> {
  return readFile(assetPath(name), "utf8");
}

/** A JSON asset parsed into a plain object; anything else is rejected. */
export async function readJsonAsset(name: AssetName): Promise<Record<string, unknown>> {
  const parsed: unknown = JSON.parse(await readAsset(name));
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`asset ${name} is not a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}
