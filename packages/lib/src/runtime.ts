import type { ComposeConfig, ContainerPlatform, EnvironmentConfig } from "./types.ts";
import { which } from "./exec.ts";

/** Finds a program on PATH; injected by tests. */
export type ProgramLookup = (program: string) => string | null;

const defaultLookup: ProgramLookup = (program) => which(program);

/** Podman is preferred: the rootless setup is the primary target. */
export function detectRuntime(lookup: ProgramLookup = defaultLookup): ContainerPlatform | null {
  if (lookup("podman")) return "podman";
  if (lookup("docker")) return "docker";
  return null;
}

/**
 * Under Podman the standalone podman-compose wins when installed, as it
 * predates the `podman compose` wrapper on many distributions.
 */
export function resolveComposeBin(
  platform: ContainerPlatform,
  lookup: ProgramLookup = defaultLookup
): { bin: string; subcommand: string } {
  switch (platform) {
    case "docker":
      return { bin: "docker", subcommand: "compose" };
    case "podman":
      if (lookup("podman-compose")) return { bin: "podman-compose", subcommand: "" };
      return { bin: "podman", subcommand: "compose" };
  }
}

export function resolveComposeConfig(
  config: EnvironmentConfig,
  platform: ContainerPlatform,
  lookup: ProgramLookup = defaultLookup
): ComposeConfig {
  const { bin, subcommand } = resolveComposeBin(platform, lookup);
  return {
    bin,
    subcommand,
    composeFile: config.paths.composeFile,
    cwd: config.workDir,
  };
}

/** True for the standalone podman-compose, which lacks some `up` flags. */
export function isStandaloneCompose(compose: ComposeConfig): boolean {
  return compose.subcommand === "";
}
