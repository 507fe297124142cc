/**
 * config.env reading backed by dotenv.parse().
 *
 * The file is written in shell-assignment style, so two shell forms are
 * accepted on top of what dotenv understands: a leading `export ` and
 * array values such as `synapseAdditionalVolumes=(/a:/b /c:/d)`.
 */
import { parse as dotenvParse } from "dotenv";
import { existsSync, readFileSync } from "node:fs";

const ARRAY_OPEN = /^\s*[A-Za-z_][A-Za-z0-9_]*=\(/;

/**
 * Fold `key=(` ... `)` spread over several lines into one line, which is
 * the only form dotenv reads. Comment lines inside the array are dropped.
 */
function joinArrayLines(lines: string[]): string[] {
  const joined: string[] = [];
  let open: string[] | null = null;
  for (const line of lines) {
    if (open) {
      if (!line.trim().startsWith("#")) open.push(line.trim());
      if (line.trimEnd().endsWith(")")) {
        joined.push(open.join(" "));
        open = null;
      }
      continue;
    }
    if (ARRAY_OPEN.test(line) && !line.trimEnd().endsWith(")")) {
      open = [line.trimEnd()];
      continue;
    }
    joined.push(line);
  }
  if (open) joined.push(open.join(" "));
  return joined;
}

/** Parse raw config.env content into a key-value record. */
export function parseEnvContent(content: string): Record<string, string> {
  const lines = content.split("\n").map((line) => line.replace(/^\s*export\s+/, ""));
  return dotenvParse(joinArrayLines(lines).join("\n"));
}

/** Read and parse an env file. Returns an empty record if it doesn't exist. */
export function readEnvFile(filePath: string): Record<string, string> {
  if (!existsSync(filePath)) return {};
  return parseEnvContent(readFileSync(filePath, "utf-8"));
}

/**
 * Split a list value. `(a b "c d")` uses shell array rules (whitespace
 * separated, quotes grouping); anything else is comma separated.
 */
export function parseListValue(value: string | undefined): string[] {
  if (value === undefined) return [];
  const trimmed = value.trim();
  if (trimmed.startsWith("(") && trimmed.endsWith(")")) {
    const inner = trimmed.slice(1, -1);
    const items: string[] = [];
    for (const match of inner.matchAll(/"([^"]*)"|'([^']*)'|(\S+)/g)) {
      items.push(match[1] ?? match[2] ?? match[3] ?? "");
    }
    return items.filter((item) => item.length > 0);
  }
  return trimmed
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/** Only the literal `true` enables a flag. */
export function parseBooleanValue(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") return fallback;
  return value === "true";
}
