import type { ContainerPlatform, EnvironmentConfig, PreflightIssue, PreflightResult } from "./types.ts";
import type { ProgramLookup } from "./runtime.ts";
import { detectRuntime } from "./runtime.ts";
import { which } from "./exec.ts";
import { SynapseEnvError } from "./errors.ts";

const defaultLookup: ProgramLookup = (program) => which(program);

/** Programs a platform needs on the host. */
export function requiredPrograms(platform: ContainerPlatform): string[] {
  return [platform];
}

/** Report every missing program at once rather than stopping at the first. */
export function checkRequiredPrograms(
  programs: string[],
  lookup: ProgramLookup = defaultLookup
): PreflightIssue | null {
  const missing = programs.filter((program) => lookup(program) === null);
  if (missing.length === 0) return null;
  return {
    code: "missing_programs",
    message: "Required programs are missing on this system.",
    detail: `Please install:${missing.map((program) => `\n- ${program}`).join("")}`,
    meta: { missing },
  };
}

/**
 * Choose the container runtime and verify its programs. A runtime named in
 * config.env is used as-is; otherwise Podman, then Docker, is detected.
 */
export function runPreflightChecks(
  config: EnvironmentConfig,
  lookup: ProgramLookup = defaultLookup
): PreflightResult & { platform: ContainerPlatform | null } {
  const platform = config.containerRuntime ?? detectRuntime(lookup);
  if (!platform) {
    return {
      ok: false,
      platform: null,
      issues: [{
        code: "no_runtime",
        message: "No container runtime found.",
        detail: noRuntimeGuidance(),
        meta: { missing: ["podman", "docker"] },
      }],
    };
  }
  const issue = checkRequiredPrograms(requiredPrograms(platform), lookup);
  return { ok: issue === null, platform, issues: issue ? [issue] : [] };
}

/** Throwing form of runPreflightChecks for command entry points. */
export function ensurePrerequisites(
  config: EnvironmentConfig,
  lookup: ProgramLookup = defaultLookup
): ContainerPlatform {
  const result = runPreflightChecks(config, lookup);
  const [issue] = result.issues;
  if (!result.ok || !result.platform) {
    const message = issue ? [issue.message, issue.detail].filter(Boolean).join("\n") : "Preflight checks failed.";
    throw new SynapseEnvError(issue?.code ?? "missing_programs", message);
  }
  return result.platform;
}

export function noRuntimeGuidance(): string {
  return [
    "synapse-env runs every service in containers and needs Podman",
    "(rootless, recommended) or Docker with the Compose plugin.",
    "",
    "  Podman:  https://podman.io/docs/installation",
    "  Docker:  https://docs.docker.com/engine/install/",
    "",
    "Set containerRuntime=podman or containerRuntime=docker in config.env",
    "to choose one explicitly.",
  ].join("\n");
}
