import type { ComposeConfig, RunResult, RuntimeContext } from "./types.ts";
import { buildComposeArgv, runCompose } from "./compose-runner.ts";
import { commandFailed } from "./errors.ts";
import { isStandaloneCompose } from "./runtime.ts";

async function composeStep(ctx: RuntimeContext, args: string[]): Promise<void> {
  const compose: ComposeConfig = ctx.compose;
  const result = await runCompose(args, {
    bin: compose.bin,
    subcommand: compose.subcommand,
    composeFile: compose.composeFile,
    cwd: compose.cwd,
    stream: true,
    runner: ctx.runner,
  });

  if (!result.ok) {
    const reason = result.code === "unknown" ? undefined : result.code;
    throw commandFailed(buildComposeArgv(compose, args), result.exitCode, result.stderr, reason);
  }
}

export async function composePull(ctx: RuntimeContext): Promise<void> {
  await composeStep(ctx, ["pull"]);
}

/**
 * Create or recreate every container. podman-compose has no
 * --remove-orphans, so orphans survive there.
 */
export async function composeUp(ctx: RuntimeContext): Promise<void> {
  const args = ["up", "--detach", "--force-recreate"];
  if (!isStandaloneCompose(ctx.compose)) args.push("--remove-orphans");
  await composeStep(ctx, args);
}

export async function composeStop(ctx: RuntimeContext): Promise<void> {
  await composeStep(ctx, ["stop"]);
}

export async function composeDown(ctx: RuntimeContext): Promise<void> {
  await composeStep(ctx, ["down"]);
}

async function runtimeStep(ctx: RuntimeContext, args: string[], options: { stream?: boolean } = {}): Promise<RunResult> {
  const argv = [ctx.platform, ...args];
  const result = await ctx.runner(argv, { cwd: ctx.compose.cwd, stream: options.stream ?? true });
  if (result.exitCode !== 0) throw commandFailed(argv, result.exitCode, result.stderr);
  return result;
}

export async function restartContainer(ctx: RuntimeContext, container: string): Promise<void> {
  await runtimeStep(ctx, ["restart", container]);
}

export async function execInContainer(ctx: RuntimeContext, container: string, command: string[]): Promise<void> {
  await runtimeStep(ctx, ["exec", container, ...command]);
}

export async function volumeExists(ctx: RuntimeContext, volume: string): Promise<boolean> {
  const result = await ctx.runner([ctx.platform, "volume", "inspect", volume], { cwd: ctx.compose.cwd });
  return result.exitCode === 0;
}

/** Remove a named volume; one that was never created is left alone. */
export async function removeVolume(ctx: RuntimeContext, volume: string): Promise<boolean> {
  if (!(await volumeExists(ctx, volume))) return false;
  await runtimeStep(ctx, ["volume", "rm", volume]);
  return true;
}

/** Run a throwaway container and capture what it prints. */
export async function runEphemeral(ctx: RuntimeContext, runArgs: string[]): Promise<string> {
  const result = await runtimeStep(ctx, ["run", "--rm", ...runArgs], { stream: false });
  return result.stdout;
}
