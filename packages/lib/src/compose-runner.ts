import type { ComposeErrorCode, ComposeRunOptions, ComposeRunResult } from "./types.ts";
import { runCommand } from "./exec.ts";

export type { ComposeErrorCode, ComposeRunOptions, ComposeRunResult };

const transientErrorMatchers: Array<{ pattern: RegExp; code: ComposeErrorCode; retryable: boolean }> = [
  { pattern: /Cannot connect to the Docker daemon|Cannot connect to Podman|error during connect|dial unix/i, code: "daemon_unreachable", retryable: true },
  { pattern: /pull access denied|manifest unknown|failed to fetch|requested access to the resource is denied/i, code: "image_pull_failed", retryable: true },
  { pattern: /permission denied|access denied/i, code: "permission_denied", retryable: false },
  { pattern: /yaml:|invalid compose|unsupported config/i, code: "invalid_compose", retryable: false },
];

export function classifyError(stderr: string): { code: ComposeErrorCode; retryable: boolean } {
  for (const matcher of transientErrorMatchers) {
    if (matcher.pattern.test(stderr)) return { code: matcher.code, retryable: matcher.retryable };
  }
  return { code: "unknown", retryable: false };
}

export function buildComposeArgv(options: ComposeRunOptions, args: string[]): string[] {
  const base: string[] = [options.bin];
  if (options.subcommand) base.push(options.subcommand);
  base.push("-f", options.composeFile);
  return [...base, ...args];
}

async function runComposeOnce(args: string[], options: ComposeRunOptions): Promise<ComposeRunResult> {
  const run = options.runner ?? runCommand;
  const stream = options.stream ?? false;
  const result = await run(buildComposeArgv(options, args), {
    cwd: options.cwd,
    stream,
    timeoutMs: options.timeoutMs ?? (stream ? 0 : 30_000),
    env: options.env,
  });

  if (result.exitCode === 0) return { ok: true, ...result, code: "unknown" };
  return { ok: false, ...result, code: classifyError(result.stderr).code };
}

/** Run a compose subcommand, retrying failures classified as transient. */
export async function runCompose(args: string[], options: ComposeRunOptions): Promise<ComposeRunResult> {
  const retries = options.retries ?? 2;
  let attempt = 0;
  while (true) {
    const result = await runComposeOnce(args, options);
    if (result.ok) return result;
    const classified = classifyError(result.stderr);
    if (!classified.retryable || attempt >= retries) return result;
    attempt += 1;
  }
}
